import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Kysely, MysqlDialect } from 'kysely';
import { createPool, PoolOptions } from 'mysql2';
import { createKysely, DbRouter } from './db-router';
import { migrateToLatest } from './migrations';
import type { DB } from './types';

const REPLICA_KEYS = ['DATABASE_REPLICA1', 'DATABASE_REPLICA2'] as const;

@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);

  // Entry point for repositories
  public readonly db: DbRouter;

  private readonly writeDb: Kysely<DB>;
  private readonly replicaCount: number;

  constructor(private readonly configService: ConfigService) {
    const commonConfig: PoolOptions = {
      user: this.configService.get<string>('DATABASE_USER', 'root'),
      password: this.configService.get<string>('DATABASE_PASSWORD', ''),
      database: this.configService.get<string>(
        'DATABASE_NAME',
        'concept_dictionary',
      ),
      connectionLimit: Number(
        this.configService.get<string>('DB_CONNECTION_LIMIT', '10'),
      ),
    };

    const masterPool = createPool({
      ...commonConfig,
      host: this.configService.get<string>('DATABASE_HOST', 'localhost'),
      port: Number(this.configService.get<string>('DATABASE_PORT', '3306')),
    });

    const replicas: Kysely<DB>[] = [];
    for (const key of REPLICA_KEYS) {
      const host = this.configService.get<string>(`${key}_HOST`);
      if (!host) continue;
      const pool = createPool({
        ...commonConfig,
        host,
        port: Number(this.configService.get<string>(`${key}_PORT`, '3306')),
      });
      replicas.push(createKysely(new MysqlDialect({ pool })));
    }
    this.replicaCount = replicas.length;

    this.writeDb = createKysely(new MysqlDialect({ pool: masterPool }), [
      'error',
    ]);
    this.db = new DbRouter(this.writeDb, replicas);
  }

  async onModuleInit() {
    try {
      if (this.configService.get<string>('DATABASE_MIGRATE', 'true') === 'true') {
        await migrateToLatest(this.writeDb);
      }
      await this.writeDb
        .selectFrom('concept')
        .select('conceptId')
        .limit(1)
        .execute();
      this.logger.log(
        `Database initialized. Replicas connected: ${this.replicaCount}`,
      );
    } catch (error) {
      this.logger.error('Failed to connect to database', error);
      throw error;
    }
  }

  async onModuleDestroy() {
    await this.db
      .destroy()
      .catch((err: unknown) =>
        this.logger.error('Error closing database connections', err),
      );
    this.logger.log('Database connections closed');
  }
}
