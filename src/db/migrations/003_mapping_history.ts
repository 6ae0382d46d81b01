import type { Kysely } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('mapping_history')
    .addColumn('history_id', 'integer', (col) =>
      col.primaryKey().autoIncrement(),
    )
    .addColumn('created_at', 'varchar(32)', (col) => col.notNull())
    .addColumn('action_type', 'varchar(16)', (col) => col.notNull())
    .addColumn('general_concept_id', 'integer', (col) => col.notNull())
    .addColumn('omop_concept_id', 'integer', (col) => col.notNull())
    .addColumn('vocabulary_id', 'varchar(20)')
    .addColumn('concept_code', 'varchar(50)')
    .addColumn('concept_name', 'varchar(255)')
    .addColumn('comment', 'varchar(255)')
    .execute();

  await db.schema
    .createIndex('idx_mapping_history_general_concept')
    .on('mapping_history')
    .column('general_concept_id')
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('mapping_history').execute();
}
