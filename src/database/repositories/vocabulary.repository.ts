import { Injectable } from '@nestjs/common';
import { Selectable } from 'kysely';
import { chunk } from '../../common/utils/chunk';
import { DatabaseService } from '../../db/database.service';
import { ConceptTable } from '../../db/types';
import {
  ConceptSearchFilter,
  ConceptSynonym,
  HierarchyLink,
  RelatedConcept,
  StandardFlag,
  VocabularyConcept,
  VocabularyCounts,
  VocabularyStore,
} from './domain.types';

// Keeps IN (...) lists well under the MySQL placeholder limit
const ID_BATCH_SIZE = 1000;

// Rows handed to the similarity ranking per search
const SEARCH_CANDIDATE_LIMIT = 1000;
const SEARCH_STEM_LENGTH = 3;

/** Lowercase alphanumeric words of a search query. */
export function tokenizeQuery(query: string): string[] {
  return query
    .toLowerCase()
    .split(/[^a-z0-9]+/g)
    .filter((token) => token.length > 0);
}

export function toStandardFlag(standardConcept: string | null): StandardFlag {
  if (standardConcept === 'S') return StandardFlag.STANDARD;
  if (standardConcept === 'C') return StandardFlag.CLASSIFICATION;
  return StandardFlag.NON_STANDARD;
}

export function toVocabularyConcept(
  row: Selectable<ConceptTable>,
): VocabularyConcept {
  return {
    conceptId: row.conceptId,
    name: row.conceptName,
    domainId: row.domainId,
    vocabularyId: row.vocabularyId,
    conceptClassId: row.conceptClassId,
    code: row.conceptCode,
    standardFlag: toStandardFlag(row.standardConcept),
    // Athena exports leave the column empty for valid concepts
    invalidReason: row.invalidReason ? row.invalidReason : null,
  };
}

@Injectable()
export class VocabularyRepository implements VocabularyStore {
  constructor(private readonly databaseService: DatabaseService) {}

  // ============================================
  // STATUS
  // ============================================

  async isLoaded(): Promise<boolean> {
    const row = await this.databaseService.db.executeRead((trx) =>
      trx.selectFrom('concept').select('conceptId').limit(1).executeTakeFirst(),
    );
    return row !== undefined;
  }

  async countRows(): Promise<VocabularyCounts> {
    return this.databaseService.db.executeRead(async (trx) => {
      const [concepts, relationships, ancestors, synonyms] = await Promise.all(
        [
          trx
            .selectFrom('concept')
            .select((eb) => eb.fn.countAll().as('count'))
            .executeTakeFirst(),
          trx
            .selectFrom('conceptRelationship')
            .select((eb) => eb.fn.countAll().as('count'))
            .executeTakeFirst(),
          trx
            .selectFrom('conceptAncestor')
            .select((eb) => eb.fn.countAll().as('count'))
            .executeTakeFirst(),
          trx
            .selectFrom('conceptSynonym')
            .select((eb) => eb.fn.countAll().as('count'))
            .executeTakeFirst(),
        ],
      );
      return {
        concepts: Number(concepts?.count ?? 0),
        relationships: Number(relationships?.count ?? 0),
        ancestors: Number(ancestors?.count ?? 0),
        synonyms: Number(synonyms?.count ?? 0),
      };
    });
  }

  // ============================================
  // CONCEPT LOOKUPS
  // ============================================

  async findConcept(conceptId: number): Promise<VocabularyConcept | null> {
    const row = await this.databaseService.db.executeRead((trx) =>
      trx
        .selectFrom('concept')
        .selectAll()
        .where('conceptId', '=', conceptId)
        .executeTakeFirst(),
    );
    return row ? toVocabularyConcept(row) : null;
  }

  async findConceptsByIds(conceptIds: number[]): Promise<VocabularyConcept[]> {
    const ids = Array.from(new Set(conceptIds));
    if (ids.length === 0) return [];

    const batches = await Promise.all(
      chunk(ids, ID_BATCH_SIZE).map((batch) =>
        this.databaseService.db.executeRead((trx) =>
          trx
            .selectFrom('concept')
            .selectAll()
            .where('conceptId', 'in', batch)
            .execute(),
        ),
      ),
    );
    return batches.flat().map(toVocabularyConcept);
  }

  /**
   * Candidates for a fuzzy name search: concepts whose name contains the
   * leading characters of any query word, or whose code equals the query.
   * Ranking happens in the caller.
   */
  async searchConcepts(
    query: string,
    filter: ConceptSearchFilter = {},
  ): Promise<VocabularyConcept[]> {
    const stems = Array.from(
      new Set(
        tokenizeQuery(query).map((token) => token.slice(0, SEARCH_STEM_LENGTH)),
      ),
    );
    const code = query.trim();

    const rows = await this.databaseService.db.executeRead((trx) => {
      let builder = trx
        .selectFrom('concept')
        .selectAll()
        .where((eb) =>
          eb.or([
            eb('conceptCode', '=', code),
            ...stems.map((stem) =>
              eb(eb.fn<string>('lower', ['conceptName']), 'like', `%${stem}%`),
            ),
          ]),
        );
      if (filter.vocabularyId !== undefined) {
        builder = builder.where('vocabularyId', '=', filter.vocabularyId);
      }
      if (filter.domainId !== undefined) {
        builder = builder.where('domainId', '=', filter.domainId);
      }
      return builder
        .orderBy('conceptId')
        .limit(SEARCH_CANDIDATE_LIMIT)
        .execute();
    });
    return rows.map(toVocabularyConcept);
  }

  // ============================================
  // RELATIONSHIPS & CLOSURE
  // ============================================

  async findRelatedIds(
    conceptId: number,
    relationshipKinds: readonly string[],
  ): Promise<number[]> {
    if (relationshipKinds.length === 0) return [];

    const rows = await this.databaseService.db.executeRead((trx) =>
      trx
        .selectFrom('conceptRelationship')
        .select('conceptId2')
        .where('conceptId1', '=', conceptId)
        .where('relationshipId', 'in', [...relationshipKinds])
        .execute(),
    );
    return Array.from(new Set(rows.map((row) => row.conceptId2)));
  }

  async findDescendantIds(conceptId: number): Promise<number[]> {
    const rows = await this.databaseService.db.executeRead((trx) =>
      trx
        .selectFrom('conceptAncestor')
        .select('descendantConceptId')
        .where('ancestorConceptId', '=', conceptId)
        .where('descendantConceptId', '!=', conceptId)
        .execute(),
    );
    return Array.from(new Set(rows.map((row) => row.descendantConceptId)));
  }

  async findRelationships(conceptId: number): Promise<RelatedConcept[]> {
    const rows = await this.databaseService.db.executeRead((trx) =>
      trx
        .selectFrom('conceptRelationship as cr')
        .innerJoin('concept as c', 'c.conceptId', 'cr.conceptId2')
        .selectAll('c')
        .select('cr.relationshipId')
        .where('cr.conceptId1', '=', conceptId)
        .execute(),
    );
    return rows.map((row) => ({
      relationshipId: row.relationshipId,
      concept: toVocabularyConcept(row),
    }));
  }

  /** Standard, valid concepts anywhere above the concept in the closure. */
  async findStandardAncestors(conceptId: number): Promise<VocabularyConcept[]> {
    const rows = await this.databaseService.db.executeRead((trx) =>
      trx
        .selectFrom('conceptAncestor as ca')
        .innerJoin('concept as c', 'c.conceptId', 'ca.ancestorConceptId')
        .selectAll('c')
        .distinct()
        .where('ca.descendantConceptId', '=', conceptId)
        .where('ca.ancestorConceptId', '!=', conceptId)
        .where('c.standardConcept', '=', 'S')
        .where((eb) =>
          eb.or([
            eb('c.invalidReason', 'is', null),
            eb('c.invalidReason', '=', ''),
          ]),
        )
        .execute(),
    );
    return rows.map(toVocabularyConcept);
  }

  /** Standard, valid concepts anywhere below the concept in the closure. */
  async findStandardDescendants(
    conceptId: number,
  ): Promise<VocabularyConcept[]> {
    const rows = await this.databaseService.db.executeRead((trx) =>
      trx
        .selectFrom('conceptAncestor as ca')
        .innerJoin('concept as c', 'c.conceptId', 'ca.descendantConceptId')
        .selectAll('c')
        .distinct()
        .where('ca.ancestorConceptId', '=', conceptId)
        .where('ca.descendantConceptId', '!=', conceptId)
        .where('c.standardConcept', '=', 'S')
        .where((eb) =>
          eb.or([
            eb('c.invalidReason', 'is', null),
            eb('c.invalidReason', '=', ''),
          ]),
        )
        .execute(),
    );
    return rows.map(toVocabularyConcept);
  }

  // ============================================
  // DIRECT HIERARCHY LINKS (BFS batches)
  // ============================================

  /** Direct parents of every given concept, restricted to known concepts. */
  async findParentLinks(conceptIds: number[]): Promise<HierarchyLink[]> {
    if (conceptIds.length === 0) return [];

    const batches = await Promise.all(
      chunk(conceptIds, ID_BATCH_SIZE).map((batch) =>
        this.databaseService.db.executeRead((trx) =>
          trx
            .selectFrom('conceptAncestor as ca')
            .innerJoin('concept as c', 'c.conceptId', 'ca.ancestorConceptId')
            .select([
              'ca.ancestorConceptId as parentId',
              'ca.descendantConceptId as childId',
            ])
            .where('ca.descendantConceptId', 'in', batch)
            .where('ca.minLevelsOfSeparation', '=', 1)
            .orderBy('ca.descendantConceptId')
            .orderBy('ca.ancestorConceptId')
            .execute(),
        ),
      ),
    );
    return batches.flat();
  }

  /** Direct children of every given concept, restricted to known concepts. */
  async findChildLinks(conceptIds: number[]): Promise<HierarchyLink[]> {
    if (conceptIds.length === 0) return [];

    const batches = await Promise.all(
      chunk(conceptIds, ID_BATCH_SIZE).map((batch) =>
        this.databaseService.db.executeRead((trx) =>
          trx
            .selectFrom('conceptAncestor as ca')
            .innerJoin('concept as c', 'c.conceptId', 'ca.descendantConceptId')
            .select([
              'ca.ancestorConceptId as parentId',
              'ca.descendantConceptId as childId',
            ])
            .where('ca.ancestorConceptId', 'in', batch)
            .where('ca.minLevelsOfSeparation', '=', 1)
            .orderBy('ca.ancestorConceptId')
            .orderBy('ca.descendantConceptId')
            .execute(),
        ),
      ),
    );
    return batches.flat();
  }

  // ============================================
  // SYNONYMS
  // ============================================

  async findSynonyms(conceptId: number): Promise<ConceptSynonym[]> {
    return this.databaseService.db.executeRead((trx) =>
      trx
        .selectFrom('conceptSynonym as cs')
        .leftJoin('concept as lang', 'lang.conceptId', 'cs.languageConceptId')
        .select([
          'cs.conceptSynonymName as synonym',
          'cs.languageConceptId',
          'lang.conceptName as language',
        ])
        .where('cs.conceptId', '=', conceptId)
        .orderBy('cs.conceptSynonymName')
        .execute(),
    );
  }
}
