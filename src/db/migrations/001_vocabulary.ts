import type { Kysely } from 'kysely';

// OMOP vocabulary tables, loaded from an Athena export and never written by
// the service itself.

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('concept')
    .addColumn('concept_id', 'integer', (col) => col.primaryKey())
    .addColumn('concept_name', 'varchar(255)', (col) => col.notNull())
    .addColumn('domain_id', 'varchar(20)', (col) => col.notNull())
    .addColumn('vocabulary_id', 'varchar(20)', (col) => col.notNull())
    .addColumn('concept_class_id', 'varchar(20)', (col) => col.notNull())
    .addColumn('standard_concept', 'varchar(1)')
    .addColumn('concept_code', 'varchar(50)', (col) => col.notNull())
    .addColumn('invalid_reason', 'varchar(1)')
    .execute();

  await db.schema
    .createIndex('idx_concept_vocabulary')
    .on('concept')
    .column('vocabulary_id')
    .execute();

  await db.schema
    .createTable('concept_relationship')
    .addColumn('concept_id_1', 'integer', (col) => col.notNull())
    .addColumn('concept_id_2', 'integer', (col) => col.notNull())
    .addColumn('relationship_id', 'varchar(20)', (col) => col.notNull())
    .execute();

  await db.schema
    .createIndex('idx_concept_relationship_from')
    .on('concept_relationship')
    .columns(['concept_id_1', 'relationship_id'])
    .execute();

  await db.schema
    .createIndex('idx_concept_relationship_to')
    .on('concept_relationship')
    .column('concept_id_2')
    .execute();

  await db.schema
    .createTable('concept_ancestor')
    .addColumn('ancestor_concept_id', 'integer', (col) => col.notNull())
    .addColumn('descendant_concept_id', 'integer', (col) => col.notNull())
    .addColumn('min_levels_of_separation', 'integer', (col) => col.notNull())
    .addColumn('max_levels_of_separation', 'integer', (col) => col.notNull())
    .execute();

  await db.schema
    .createIndex('idx_concept_ancestor_down')
    .on('concept_ancestor')
    .columns(['ancestor_concept_id', 'min_levels_of_separation'])
    .execute();

  await db.schema
    .createIndex('idx_concept_ancestor_up')
    .on('concept_ancestor')
    .columns(['descendant_concept_id', 'min_levels_of_separation'])
    .execute();

  await db.schema
    .createTable('concept_synonym')
    .addColumn('concept_id', 'integer', (col) => col.notNull())
    .addColumn('concept_synonym_name', 'varchar(1000)', (col) => col.notNull())
    .addColumn('language_concept_id', 'integer', (col) => col.notNull())
    .execute();

  await db.schema
    .createIndex('idx_concept_synonym_concept')
    .on('concept_synonym')
    .column('concept_id')
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('concept_synonym').execute();
  await db.schema.dropTable('concept_ancestor').execute();
  await db.schema.dropTable('concept_relationship').execute();
  await db.schema.dropTable('concept').execute();
}
