import { Injectable, Logger } from '@nestjs/common';
import {
  ConceptMapping,
  MappingProvenance,
  MappingRepository,
  SettingKeys,
  SettingRepository,
  VocabularyRepository,
  VocabularyStore,
} from '../database/repositories';
import { EnrichmentStatusDto, EnrichmentSummaryDto } from './dto';
import { enrichMappings, mappingKey } from './enrich-mappings';

function derivedKeys(mappings: ConceptMapping[]): Set<string> {
  return new Set(
    mappings
      .filter((m) => m.provenance === MappingProvenance.DERIVED)
      .map((m) => mappingKey(m.generalConceptId, m.omopConceptId)),
  );
}

@Injectable()
export class EnrichmentService {
  private readonly logger = new Logger(EnrichmentService.name);

  constructor(
    private readonly vocabularyRepo: VocabularyRepository,
    private readonly mappingRepo: MappingRepository,
    private readonly settingRepo: SettingRepository,
  ) {}

  /**
   * The vocabulary counts as not loaded until the concept table has rows.
   */
  async resolveVocabularyStore(): Promise<VocabularyStore | null> {
    return (await this.vocabularyRepo.isLoaded()) ? this.vocabularyRepo : null;
  }

  /**
   * Regenerates the derived mappings and stores them in place of the old
   * ones; manual rows are never rewritten. Without an explicit choice,
   * recommended flags are preserved once a previous sync has been recorded.
   */
  async sync(preserveRecommended?: boolean): Promise<EnrichmentSummaryDto> {
    const startTime = Date.now();
    const [store, lastSync, current] = await Promise.all([
      this.resolveVocabularyStore(),
      this.settingRepo.get(SettingKeys.OHDSI_MAPPINGS_LAST_SYNC),
      this.mappingRepo.loadMappings({ fromMaster: true }),
    ]);
    const preserve = preserveRecommended ?? lastSync !== null;

    const enriched = await enrichMappings(store, current, {
      preserveRecommended: preserve,
    });
    const stored = await this.mappingRepo.replaceDerivedMappings(
      enriched.filter((m) => m.provenance === MappingProvenance.DERIVED),
    );

    const syncedAt = new Date().toISOString();
    await this.settingRepo.set(SettingKeys.OHDSI_MAPPINGS_LAST_SYNC, syncedAt);

    const before = derivedKeys(current);
    const after = derivedKeys(stored);
    const summary: EnrichmentSummaryDto = {
      syncedAt,
      preserveRecommended: preserve,
      manualCount: current.length - before.size,
      derivedCount: after.size,
      addedCount: [...after].filter((key) => !before.has(key)).length,
      removedCount: [...before].filter((key) => !after.has(key)).length,
      took: Date.now() - startTime,
    };

    this.logger.log(
      `Enrichment sync: ${summary.derivedCount} derived mappings ` +
        `(+${summary.addedCount} / -${summary.removedCount}), ` +
        `preserveRecommended=${preserve}, ${summary.took}ms`,
    );
    return summary;
  }

  async getStatus(): Promise<EnrichmentStatusDto> {
    const [lastSyncedAt, counts] = await Promise.all([
      this.settingRepo.get(SettingKeys.OHDSI_MAPPINGS_LAST_SYNC),
      this.mappingRepo.countByProvenance(),
    ]);
    return {
      lastSyncedAt,
      manualCount: counts[MappingProvenance.MANUAL],
      derivedCount: counts[MappingProvenance.DERIVED],
    };
  }
}
