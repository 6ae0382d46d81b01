import { ConfigService } from '@nestjs/config';
import { createReadStream, existsSync } from 'fs';
import { Redis } from 'ioredis';
import { createConnection, Connection } from 'mysql2/promise';
import { join } from 'path';
import { createInterface } from 'readline';
import { HierarchyCacheService } from '../src/hierarchy/hierarchy-cache.service';

// Loads an Athena vocabulary download (tab-delimited CSVs) into the
// read-only vocabulary tables, replacing their contents.
//
//   ts-node scripts/import-vocabulary.ts /path/to/athena-export

type ColumnKind = 'int' | 'text';

interface TableImport {
  file: string;
  table: string;
  columns: Array<{ name: string; kind: ColumnKind }>;
}

const IMPORTS: TableImport[] = [
  {
    file: 'CONCEPT.csv',
    table: 'concept',
    columns: [
      { name: 'concept_id', kind: 'int' },
      { name: 'concept_name', kind: 'text' },
      { name: 'domain_id', kind: 'text' },
      { name: 'vocabulary_id', kind: 'text' },
      { name: 'concept_class_id', kind: 'text' },
      { name: 'standard_concept', kind: 'text' },
      { name: 'concept_code', kind: 'text' },
      { name: 'invalid_reason', kind: 'text' },
    ],
  },
  {
    file: 'CONCEPT_RELATIONSHIP.csv',
    table: 'concept_relationship',
    columns: [
      { name: 'concept_id_1', kind: 'int' },
      { name: 'concept_id_2', kind: 'int' },
      { name: 'relationship_id', kind: 'text' },
    ],
  },
  {
    file: 'CONCEPT_ANCESTOR.csv',
    table: 'concept_ancestor',
    columns: [
      { name: 'ancestor_concept_id', kind: 'int' },
      { name: 'descendant_concept_id', kind: 'int' },
      { name: 'min_levels_of_separation', kind: 'int' },
      { name: 'max_levels_of_separation', kind: 'int' },
    ],
  },
  {
    file: 'CONCEPT_SYNONYM.csv',
    table: 'concept_synonym',
    columns: [
      { name: 'concept_id', kind: 'int' },
      { name: 'concept_synonym_name', kind: 'text' },
      { name: 'language_concept_id', kind: 'int' },
    ],
  },
];

// Keeps every statement under the 65535 placeholder limit
const MAX_PLACEHOLDERS = 60000;

function parseValue(raw: string | undefined, kind: ColumnKind) {
  // Athena leaves optional columns empty
  if (raw === undefined || raw === '') return null;
  return kind === 'int' ? parseInt(raw, 10) : raw;
}

async function importTable(
  connection: Connection,
  directory: string,
  tableImport: TableImport,
): Promise<number> {
  const path = join(directory, tableImport.file);
  if (!existsSync(path)) {
    console.log(`⚠️  ${tableImport.file} not found, skipping ${tableImport.table}`);
    return 0;
  }

  console.log(`📝 Importing ${tableImport.file} into ${tableImport.table}...`);
  await connection.query(`TRUNCATE TABLE ${tableImport.table}`);

  const batchSize = Math.floor(MAX_PLACEHOLDERS / tableImport.columns.length);
  const columnList = tableImport.columns.map((c) => c.name).join(', ');
  const rowPlaceholder = `(${tableImport.columns.map(() => '?').join(', ')})`;

  let columnIndexes: number[] | null = null;
  let batch: Array<string | number | null> = [];
  let batchRows = 0;
  let imported = 0;

  const flush = async () => {
    if (batchRows === 0) return;
    await connection.execute(
      `INSERT INTO ${tableImport.table} (${columnList}) VALUES ${Array(batchRows)
        .fill(rowPlaceholder)
        .join(',')}`,
      batch,
    );
    imported += batchRows;
    batch = [];
    batchRows = 0;
    process.stdout.write(`\r   Imported ${imported} rows...`);
  };

  const lines = createInterface({
    input: createReadStream(path, 'utf-8'),
    crlfDelay: Infinity,
  });

  for await (const line of lines) {
    if (line.length === 0) continue;
    const fields = line.split('\t');

    if (!columnIndexes) {
      const header = fields.map((f) => f.trim().toLowerCase());
      columnIndexes = tableImport.columns.map((column) => {
        const index = header.indexOf(column.name);
        if (index < 0) {
          throw new Error(`${tableImport.file}: missing column ${column.name}`);
        }
        return index;
      });
      continue;
    }

    const indexes = columnIndexes;
    tableImport.columns.forEach((column, i) => {
      batch.push(parseValue(fields[indexes[i]], column.kind));
    });
    batchRows++;
    if (batchRows >= batchSize) await flush();
  }
  await flush();

  console.log(`\n✅ ${tableImport.table}: ${imported} rows`);
  return imported;
}

async function main() {
  const directory = process.argv[2];
  if (!directory) {
    console.error('Usage: import-vocabulary <athena-export-directory>');
    process.exit(1);
  }

  const connection = await createConnection({
    host: process.env.DATABASE_HOST || 'localhost',
    port: parseInt(process.env.DATABASE_PORT || '3306'),
    user: process.env.DATABASE_USER || 'root',
    password: process.env.DATABASE_PASSWORD || '',
    database: process.env.DATABASE_NAME || 'concept_dictionary',
  });

  try {
    for (const tableImport of IMPORTS) {
      await importTable(connection, directory, tableImport);
    }
  } finally {
    await connection.end();
  }

  // Cached traversals describe the old vocabulary
  console.log('🧹 Clearing hierarchy cache...');
  const redis = new Redis(process.env.REDIS_URL || 'redis://localhost:6379');
  try {
    const cache = new HierarchyCacheService(redis, new ConfigService());
    const removed = await cache.invalidateAll();
    console.log(`✅ Removed ${removed} cached traversals`);
  } finally {
    await redis.quit();
  }
}

main().catch((err: unknown) => {
  console.error('❌ Import failed:', err);
  process.exit(1);
});
