import type { Kysely } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('concept_mapping')
    .addColumn('mapping_id', 'integer', (col) =>
      col.primaryKey().autoIncrement(),
    )
    .addColumn('general_concept_id', 'integer', (col) => col.notNull())
    .addColumn('omop_concept_id', 'integer', (col) => col.notNull())
    .addColumn('omop_unit_concept_id', 'integer')
    .addColumn('recommended', 'integer', (col) => col.notNull().defaultTo(0))
    .addColumn('source', 'varchar(32)', (col) =>
      col.notNull().defaultTo('manual'),
    )
    .execute();

  await db.schema
    .createIndex('uq_concept_mapping_pair')
    .on('concept_mapping')
    .columns(['general_concept_id', 'omop_concept_id'])
    .unique()
    .execute();

  await db.schema
    .createIndex('idx_concept_mapping_source')
    .on('concept_mapping')
    .column('source')
    .execute();

  await db.schema
    .createTable('app_setting')
    .addColumn('setting_key', 'varchar(64)', (col) => col.primaryKey())
    .addColumn('setting_value', 'varchar(255)', (col) => col.notNull())
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('app_setting').execute();
  await db.schema.dropTable('concept_mapping').execute();
}
