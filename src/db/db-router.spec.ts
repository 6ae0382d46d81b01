import { Kysely } from 'kysely';
import { createTestDatabase } from '../../test/utils/test-database';
import { DbRouter } from './db-router';
import { DB } from './types';

describe('DbRouter', () => {
  let master: Kysely<DB>;
  let replicaA: Kysely<DB>;
  let replicaB: Kysely<DB>;

  beforeEach(async () => {
    [master, replicaA, replicaB] = await Promise.all([
      createTestDatabase(),
      createTestDatabase(),
      createTestDatabase(),
    ]);
  });

  afterEach(async () => {
    await new DbRouter(master, [replicaA, replicaB]).destroy();
  });

  it('reads from master without replicas', () => {
    const router = new DbRouter(master);
    expect(router.read()).toBe(master);
    expect(router.write()).toBe(master);
  });

  it('rotates reads across replicas', () => {
    const router = new DbRouter(master, [replicaA, replicaB]);
    expect(router.read()).toBe(replicaA);
    expect(router.read()).toBe(replicaB);
    expect(router.read()).toBe(replicaA);
  });

  it('falls back to master when a replica read fails', async () => {
    const router = new DbRouter(master, [replicaA]);
    const operation = jest.fn(async (db: Kysely<DB>) => {
      if (db === replicaA) throw new Error('replica down');
      return 'from master';
    });

    await expect(router.executeRead(operation)).resolves.toBe('from master');
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('does not retry a failed read on master', async () => {
    const router = new DbRouter(master);
    const operation = jest.fn(async () => {
      throw new Error('master down');
    });

    await expect(router.executeRead(operation)).rejects.toThrow('master down');
    expect(operation).toHaveBeenCalledTimes(1);
  });
});
