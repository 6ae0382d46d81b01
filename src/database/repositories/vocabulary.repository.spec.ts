import { Kysely } from 'kysely';
import { DB } from '../../db/types';
import {
  createRepositoryModule,
  createTestDatabase,
  seedVocabulary,
} from '../../../test/utils/test-database';
import { StandardFlag } from './domain.types';
import { toStandardFlag, VocabularyRepository } from './vocabulary.repository';

describe('VocabularyRepository', () => {
  let db: Kysely<DB>;
  let repo: VocabularyRepository;

  beforeEach(async () => {
    db = await createTestDatabase();
    const module = await createRepositoryModule(db);
    repo = module.get(VocabularyRepository);
  });

  afterEach(async () => {
    await db.destroy();
  });

  it('reports an empty vocabulary as not loaded', async () => {
    expect(await repo.isLoaded()).toBe(false);
    expect(await repo.countRows()).toEqual({
      concepts: 0,
      relationships: 0,
      ancestors: 0,
      synonyms: 0,
    });
  });

  describe('with data', () => {
    beforeEach(async () => {
      await seedVocabulary(db, {
        concepts: [
          { conceptId: 1, conceptName: 'Root' },
          { conceptId: 2, conceptName: 'Middle', standardConcept: 'C' },
          { conceptId: 3, conceptName: 'Leaf', invalidReason: '' },
          { conceptId: 4, conceptName: 'Retired', invalidReason: 'D' },
          { conceptId: 5, conceptName: 'English', domainId: 'Metadata' },
        ],
        relationships: [
          { conceptId1: 3, conceptId2: 1, relationshipId: 'Maps to' },
          { conceptId1: 3, conceptId2: 2, relationshipId: 'Is a' },
          { conceptId1: 3, conceptId2: 4, relationshipId: 'Mapped from' },
        ],
        // 1 -> 2 -> 3, 1 -> 4
        hierarchy: [
          [1, 2],
          [2, 3],
          [1, 4],
        ],
        synonyms: [
          { conceptId: 3, conceptSynonymName: 'Tip', languageConceptId: 5 },
          { conceptId: 3, conceptSynonymName: 'End', languageConceptId: 99 },
        ],
      });
    });

    it('counts rows per table', async () => {
      expect(await repo.isLoaded()).toBe(true);
      expect(await repo.countRows()).toEqual({
        concepts: 5,
        relationships: 3,
        ancestors: 4,
        synonyms: 2,
      });
    });

    it('maps a concept row and normalizes an empty invalid reason', async () => {
      expect(await repo.findConcept(3)).toEqual({
        conceptId: 3,
        name: 'Leaf',
        domainId: 'Condition',
        vocabularyId: 'SNOMED',
        conceptClassId: 'Clinical Finding',
        code: '3',
        standardFlag: StandardFlag.STANDARD,
        invalidReason: null,
      });
      expect(await repo.findConcept(42)).toBeNull();
    });

    it('loads concepts by ids without duplicates', async () => {
      const concepts = await repo.findConceptsByIds([2, 1, 2, 42]);
      expect(concepts.map((c) => c.conceptId).sort()).toEqual([1, 2]);
    });

    it('filters related ids by relationship kind', async () => {
      expect(
        (await repo.findRelatedIds(3, ['Maps to', 'Mapped from'])).sort(),
      ).toEqual([1, 4]);
      expect(await repo.findRelatedIds(3, [])).toEqual([]);
    });

    it('returns every closure descendant except the concept itself', async () => {
      expect((await repo.findDescendantIds(1)).sort()).toEqual([2, 3, 4]);
      expect(await repo.findDescendantIds(3)).toEqual([]);
    });

    it('lists relationships with their target concept', async () => {
      const related = await repo.findRelationships(3);
      expect(
        related
          .map((r) => `${r.relationshipId}:${r.concept.conceptId}`)
          .sort(),
      ).toEqual(['Is a:2', 'Mapped from:4', 'Maps to:1']);
    });

    it('keeps only standard, valid closure concepts', async () => {
      // 2 is a classification concept
      expect(
        (await repo.findStandardAncestors(3)).map((c) => c.conceptId),
      ).toEqual([1]);
      // 4 is retired
      expect(
        (await repo.findStandardDescendants(1)).map((c) => c.conceptId),
      ).toEqual([3]);
    });

    it('returns direct links only', async () => {
      expect(await repo.findParentLinks([3, 4])).toEqual([
        { parentId: 2, childId: 3 },
        { parentId: 1, childId: 4 },
      ]);
      expect(await repo.findChildLinks([1])).toEqual([
        { parentId: 1, childId: 2 },
        { parentId: 1, childId: 4 },
      ]);
      expect(await repo.findChildLinks([])).toEqual([]);
    });

    it('lists synonyms with their language name', async () => {
      expect(await repo.findSynonyms(3)).toEqual([
        { synonym: 'End', languageConceptId: 99, language: null },
        { synonym: 'Tip', languageConceptId: 5, language: 'English' },
      ]);
    });
  });
});

describe('toStandardFlag', () => {
  it('maps the OMOP standard_concept codes', () => {
    expect(toStandardFlag('S')).toBe(StandardFlag.STANDARD);
    expect(toStandardFlag('C')).toBe(StandardFlag.CLASSIFICATION);
    expect(toStandardFlag(null)).toBe(StandardFlag.NON_STANDARD);
  });
});
