import Database from 'better-sqlite3';
import { Insertable, Kysely, SqliteDialect } from 'kysely';
import { Test, TestingModule } from '@nestjs/testing';
import { Provider } from '@nestjs/common';
import { DatabaseService } from '../../src/db/database.service';
import { createKysely, DbRouter } from '../../src/db/db-router';
import { migrateToLatest } from '../../src/db/migrations';
import {
  ConceptAncestorTable,
  ConceptRelationshipTable,
  ConceptSynonymTable,
  ConceptTable,
  DB,
} from '../../src/db/types';
import {
  MappingHistoryRepository,
  MappingRepository,
  SettingRepository,
  VocabularyRepository,
} from '../../src/database/repositories';

/** Fresh in-memory SQLite database with every migration applied. */
export async function createTestDatabase(): Promise<Kysely<DB>> {
  const db = createKysely(
    new SqliteDialect({ database: new Database(':memory:') }),
  );
  await migrateToLatest(db);
  return db;
}

/**
 * Real repositories on top of the test database. `replicas` stand in for
 * read replicas, possibly lagging behind `db`.
 */
export async function createRepositoryModule(
  db: Kysely<DB>,
  providers: Provider[] = [],
  replicas: Kysely<DB>[] = [],
): Promise<TestingModule> {
  return Test.createTestingModule({
    providers: [
      { provide: DatabaseService, useValue: { db: new DbRouter(db, replicas) } },
      VocabularyRepository,
      MappingRepository,
      MappingHistoryRepository,
      SettingRepository,
      ...providers,
    ],
  }).compile();
}

export type ConceptSeed = Partial<Insertable<ConceptTable>> & {
  conceptId: number;
};

export function conceptRow(seed: ConceptSeed): Insertable<ConceptTable> {
  return {
    conceptName: `Concept ${seed.conceptId}`,
    domainId: 'Condition',
    vocabularyId: 'SNOMED',
    conceptClassId: 'Clinical Finding',
    standardConcept: 'S',
    conceptCode: String(seed.conceptId),
    invalidReason: null,
    ...seed,
  };
}

/**
 * Closure rows (self rows excluded) for a list of direct parent -> child
 * edges, with min/max levels of separation.
 */
export function closureRows(
  edges: Array<[number, number]>,
): Array<Insertable<ConceptAncestorTable>> {
  const children = new Map<number, number[]>();
  for (const [parent, child] of edges) {
    children.set(parent, [...(children.get(parent) ?? []), child]);
  }

  const rows: Array<Insertable<ConceptAncestorTable>> = [];
  for (const ancestor of children.keys()) {
    const levels = new Map<number, { min: number; max: number }>();
    const walk = (node: number, depth: number) => {
      for (const child of children.get(node) ?? []) {
        const seen = levels.get(child);
        levels.set(child, {
          min: seen ? Math.min(seen.min, depth) : depth,
          max: seen ? Math.max(seen.max, depth) : depth,
        });
        walk(child, depth + 1);
      }
    };
    walk(ancestor, 1);
    for (const [descendant, { min, max }] of levels) {
      rows.push({
        ancestorConceptId: ancestor,
        descendantConceptId: descendant,
        minLevelsOfSeparation: min,
        maxLevelsOfSeparation: max,
      });
    }
  }
  return rows;
}

export interface VocabularySeed {
  concepts?: ConceptSeed[];
  relationships?: Array<Insertable<ConceptRelationshipTable>>;
  /** Direct parent -> child edges; the closure is derived from them. */
  hierarchy?: Array<[number, number]>;
  synonyms?: Array<Insertable<ConceptSynonymTable>>;
}

export async function seedVocabulary(
  db: Kysely<DB>,
  seed: VocabularySeed,
): Promise<void> {
  if (seed.concepts?.length) {
    await db.insertInto('concept').values(seed.concepts.map(conceptRow)).execute();
  }
  if (seed.relationships?.length) {
    await db.insertInto('conceptRelationship').values(seed.relationships).execute();
  }
  const ancestors = closureRows(seed.hierarchy ?? []);
  if (ancestors.length) {
    await db.insertInto('conceptAncestor').values(ancestors).execute();
  }
  if (seed.synonyms?.length) {
    await db.insertInto('conceptSynonym').values(seed.synonyms).execute();
  }
}
