import { Kysely } from 'kysely';
import { NotConfiguredException } from '../common/exceptions/not-configured.exception';
import {
  ConceptMapping,
  MappingProvenance,
  MappingRepository,
  SettingKeys,
  SettingRepository,
  VocabularyRepository,
} from '../database/repositories';
import { DB } from '../db/types';
import {
  createRepositoryModule,
  createTestDatabase,
  seedVocabulary,
  VocabularySeed,
} from '../../test/utils/test-database';
import { EnrichmentService } from './enrichment.service';

function manual(generalConceptId: number, omopConceptId: number): ConceptMapping {
  return {
    generalConceptId,
    omopConceptId,
    unitConceptId: null,
    recommended: false,
    provenance: MappingProvenance.MANUAL,
  };
}

// 100 -(Maps to)-> 101, 100 has descendant 102
const VOCABULARY: VocabularySeed = {
  concepts: [{ conceptId: 100 }, { conceptId: 101 }, { conceptId: 102 }],
  relationships: [{ conceptId1: 100, conceptId2: 101, relationshipId: 'Maps to' }],
  hierarchy: [[100, 102]],
};

describe('EnrichmentService', () => {
  let db: Kysely<DB>;
  let service: EnrichmentService;
  let mappingRepo: MappingRepository;
  let settingRepo: SettingRepository;

  beforeEach(async () => {
    db = await createTestDatabase();
    const module = await createRepositoryModule(db, [EnrichmentService]);
    service = module.get(EnrichmentService);
    mappingRepo = module.get(MappingRepository);
    settingRepo = module.get(SettingRepository);

    await mappingRepo.create({
      generalConceptId: 1,
      omopConceptId: 100,
      unitConceptId: null,
      recommended: true,
      provenance: MappingProvenance.MANUAL,
    });
  });

  afterEach(async () => {
    await db.destroy();
  });

  it('refuses to sync before the vocabulary is loaded', async () => {
    await expect(service.sync()).rejects.toBeInstanceOf(NotConfiguredException);
    expect(await settingRepo.get(SettingKeys.OHDSI_MAPPINGS_LAST_SYNC)).toBeNull();
    expect(await mappingRepo.loadMappings()).toHaveLength(1);
  });

  describe('with a vocabulary', () => {
    beforeEach(async () => {
      await seedVocabulary(db, VOCABULARY);
    });

    it('stores derived mappings and records the sync', async () => {
      const summary = await service.sync();

      expect(summary).toMatchObject({
        preserveRecommended: false,
        manualCount: 1,
        derivedCount: 2,
        addedCount: 2,
        removedCount: 0,
      });
      expect(
        (await mappingRepo.loadMappings()).map((m) => [
          m.omopConceptId,
          m.provenance,
        ]),
      ).toEqual([
        [100, MappingProvenance.MANUAL],
        [101, MappingProvenance.DERIVED],
        [102, MappingProvenance.DERIVED],
      ]);
      expect(await service.getStatus()).toEqual({
        lastSyncedAt: summary.syncedAt,
        manualCount: 1,
        derivedCount: 2,
      });
    });

    it('preserves recommended flags once a sync has been recorded', async () => {
      await service.sync();
      const derived = await mappingRepo.findByPair(1, 101);
      if (derived?.mappingId === undefined) throw new Error('expected row');
      await mappingRepo.updateRecommended(derived.mappingId, true);

      const summary = await service.sync();

      expect(summary).toMatchObject({
        preserveRecommended: true,
        addedCount: 0,
        removedCount: 0,
      });
      expect((await mappingRepo.findByPair(1, 101))?.recommended).toBe(true);
      expect((await mappingRepo.findByPair(1, 102))?.recommended).toBe(false);
    });

    it('resets recommended flags when asked not to preserve', async () => {
      await service.sync();
      const derived = await mappingRepo.findByPair(1, 101);
      if (derived?.mappingId === undefined) throw new Error('expected row');
      await mappingRepo.updateRecommended(derived.mappingId, true);

      await service.sync(false);

      expect((await mappingRepo.findByPair(1, 101))?.recommended).toBe(false);
    });

    it('reports derived rows that disappear', async () => {
      await service.sync();
      const source = await mappingRepo.findByPair(1, 100);
      if (source?.mappingId === undefined) throw new Error('expected row');
      await mappingRepo.updateRecommended(source.mappingId, false);

      const summary = await service.sync();

      expect(summary).toMatchObject({
        manualCount: 1,
        derivedCount: 0,
        addedCount: 0,
        removedCount: 2,
      });
    });

    it('keeps manual rows written while the enrichment runs', async () => {
      const module = await createRepositoryModule(db, [EnrichmentService]);
      const vocabularyRepo = module.get(VocabularyRepository);
      const repo = module.get(MappingRepository);
      const findConceptsByIds = vocabularyRepo.findConceptsByIds.bind(vocabularyRepo);
      let written = false;
      jest
        .spyOn(vocabularyRepo, 'findConceptsByIds')
        .mockImplementation(async (ids) => {
          if (!written) {
            written = true;
            await repo.create(manual(2, 555));
            await repo.create(manual(1, 101));
          }
          return findConceptsByIds(ids);
        });

      const summary = await module.get(EnrichmentService).sync();

      expect(
        (await repo.loadMappings()).map((m) => [
          m.generalConceptId,
          m.omopConceptId,
          m.provenance,
        ]),
      ).toEqual([
        [1, 100, MappingProvenance.MANUAL],
        [2, 555, MappingProvenance.MANUAL],
        [1, 101, MappingProvenance.MANUAL],
        [1, 102, MappingProvenance.DERIVED],
      ]);
      expect(summary.derivedCount).toBe(1);
    });

    it('works from master when a replica lags behind', async () => {
      const replica = await createTestDatabase();
      await seedVocabulary(replica, VOCABULARY);
      await replica
        .insertInto('conceptMapping')
        .values({
          generalConceptId: 1,
          omopConceptId: 100,
          omopUnitConceptId: null,
          recommended: 1,
          source: MappingProvenance.MANUAL,
        })
        .execute();
      await mappingRepo.create(manual(3, 777));

      const module = await createRepositoryModule(db, [EnrichmentService], [replica]);
      await module.get(EnrichmentService).sync();

      expect(
        (await mappingRepo.loadMappings()).map((m) => [
          m.generalConceptId,
          m.omopConceptId,
          m.provenance,
        ]),
      ).toEqual([
        [1, 100, MappingProvenance.MANUAL],
        [3, 777, MappingProvenance.MANUAL],
        [1, 101, MappingProvenance.DERIVED],
        [1, 102, MappingProvenance.DERIVED],
      ]);
      await replica.destroy();
    });
  });
});
