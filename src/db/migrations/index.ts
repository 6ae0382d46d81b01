import { Logger } from '@nestjs/common';
import { Kysely, Migration, MigrationProvider, Migrator } from 'kysely';
import type { DB } from '../types';
import * as vocabulary from './001_vocabulary';
import * as conceptMapping from './002_concept_mapping';
import * as mappingHistory from './003_mapping_history';

export const migrations: Record<string, Migration> = {
  '001_vocabulary': vocabulary,
  '002_concept_mapping': conceptMapping,
  '003_mapping_history': mappingHistory,
};

class StaticMigrationProvider implements MigrationProvider {
  async getMigrations(): Promise<Record<string, Migration>> {
    return migrations;
  }
}

/**
 * Applies pending migrations. Runs without the CamelCasePlugin so the
 * migrations can spell out the snake_case OMOP names verbatim.
 */
export async function migrateToLatest(
  db: Kysely<DB>,
  logger = new Logger('Migrator'),
): Promise<void> {
  const migrator = new Migrator({
    db: db.withoutPlugins(),
    provider: new StaticMigrationProvider(),
  });

  const { error, results } = await migrator.migrateToLatest();

  for (const result of results ?? []) {
    if (result.status === 'Success') {
      logger.log(`Applied migration ${result.migrationName}`);
    } else if (result.status === 'Error') {
      logger.error(`Migration ${result.migrationName} failed`);
    }
  }

  if (error) {
    throw error;
  }
}
