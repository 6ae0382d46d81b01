import { Logger } from '@nestjs/common';
import { MysqlDialect } from 'kysely';
import { createPool } from 'mysql2';
import { createKysely } from '../src/db/db-router';
import { migrateToLatest } from '../src/db/migrations';

async function main() {
  const db = createKysely(
    new MysqlDialect({
      pool: createPool({
        host: process.env.DATABASE_HOST || 'localhost',
        port: parseInt(process.env.DATABASE_PORT || '3306'),
        user: process.env.DATABASE_USER || 'root',
        password: process.env.DATABASE_PASSWORD || '',
        database: process.env.DATABASE_NAME || 'concept_dictionary',
      }),
    }),
  );

  try {
    await migrateToLatest(db, new Logger('migrate'));
  } finally {
    await db.destroy();
  }
}

main().catch((err: unknown) => {
  console.error('❌ Migration failed:', err);
  process.exit(1);
});
