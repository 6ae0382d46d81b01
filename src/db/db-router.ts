import { Logger } from '@nestjs/common';
import { CamelCasePlugin, Dialect, Kysely, LogConfig } from 'kysely';
import type { DB } from './types';

/**
 * Builds a Kysely instance with the snake_case <-> camelCase mapping every
 * repository relies on. `underscoreBeforeDigits` keeps `conceptId1` mapped to
 * the OMOP column `concept_id_1`.
 */
export function createKysely(dialect: Dialect, log?: LogConfig): Kysely<DB> {
  return new Kysely<DB>({
    dialect,
    plugins: [new CamelCasePlugin({ underscoreBeforeDigits: true })],
    log,
  });
}

export class DbRouter {
  private readonly logger = new Logger(DbRouter.name);
  private currentReplicaIndex = 0;

  constructor(
    private readonly writeDb: Kysely<DB>, // Master instance (Write)
    private readonly replicas: Kysely<DB>[] = [], // Read replicas
  ) {}

  /**
   * Get the write connection (Master).
   */
  write(): Kysely<DB> {
    return this.writeDb;
  }

  /**
   * Get a read connection using Round-Robin load balancing.
   */
  read(): Kysely<DB> {
    if (this.replicas.length === 0) {
      return this.writeDb; // Fallback to Master if no replicas
    }

    const replica = this.replicas[this.currentReplicaIndex];
    this.currentReplicaIndex =
      (this.currentReplicaIndex + 1) % this.replicas.length;

    return replica;
  }

  /**
   * Executes a read operation with automatic Master fallback.
   */
  async executeRead<T>(operation: (db: Kysely<DB>) => Promise<T>): Promise<T> {
    const reader = this.read();
    if (reader === this.writeDb) {
      return operation(reader);
    }
    try {
      return await operation(reader);
    } catch (error) {
      this.logger.warn(
        `Replica read failed, falling back to master: ${String(error)}`,
      );
      return operation(this.writeDb);
    }
  }

  async destroy(): Promise<void> {
    await Promise.all(
      [this.writeDb, ...this.replicas].map((db) => db.destroy()),
    );
  }
}
