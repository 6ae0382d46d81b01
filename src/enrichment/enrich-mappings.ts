import { NotConfiguredException } from '../common/exceptions/not-configured.exception';
import {
  ConceptMapping,
  MappingProvenance,
  VocabularyConcept,
  VocabularyStore,
} from '../database/repositories/domain.types';
import {
  ALLOWED_VOCABULARIES,
  CLINICAL_DRUG_CLASS_ID,
  DRUG_DOMAIN_ID,
  ENRICHMENT_RELATIONSHIP_KINDS,
} from './enrichment.constants';

export interface EnrichOptions {
  /**
   * Keep `recommended = true` on regenerated derived rows whose
   * (generalConceptId, omopConceptId) pair was recommended in the previous
   * derived set.
   */
  preserveRecommended: boolean;
}

export function mappingKey(
  generalConceptId: number,
  omopConceptId: number,
): string {
  return `${generalConceptId}:${omopConceptId}`;
}

/**
 * Same vocabulary as the source, still valid, and limited to Clinical Drug
 * when in the Drug domain (keeps packs, ingredients and components out).
 */
export function isEnrichmentCandidate(
  candidate: VocabularyConcept,
  sourceVocabularyId: string,
): boolean {
  if (candidate.vocabularyId !== sourceVocabularyId) return false;
  if (candidate.invalidReason) return false;
  if (
    candidate.domainId === DRUG_DOMAIN_ID &&
    candidate.conceptClassId !== CLINICAL_DRUG_CLASS_ID
  ) {
    return false;
  }
  return true;
}

async function collectCandidates(
  store: VocabularyStore,
  sourceConceptId: number,
): Promise<VocabularyConcept[]> {
  const source = await store.findConcept(sourceConceptId);
  // Orphaned reference: the vocabulary was refreshed without this concept
  if (!source) return [];
  if (!ALLOWED_VOCABULARIES.has(source.vocabularyId)) return [];

  const [relatedIds, descendantIds] = await Promise.all([
    store.findRelatedIds(sourceConceptId, ENRICHMENT_RELATIONSHIP_KINDS),
    store.findDescendantIds(sourceConceptId),
  ]);
  const candidateIds = Array.from(new Set([...relatedIds, ...descendantIds]));
  if (candidateIds.length === 0) return [];

  const concepts = await store.findConceptsByIds(candidateIds);
  return concepts
    .filter((concept) => isEnrichmentCandidate(concept, source.vocabularyId))
    .sort((a, b) => a.conceptId - b.conceptId);
}

/**
 * Regenerates the derived mappings from every recommended manual mapping and
 * returns the full replacement collection. Manual rows pass through
 * untouched; previously derived rows are dropped and rebuilt.
 *
 * @throws NotConfiguredException when no vocabulary store is available
 */
export async function enrichMappings(
  store: VocabularyStore | null,
  mappings: ConceptMapping[],
  options: EnrichOptions = { preserveRecommended: false },
): Promise<ConceptMapping[]> {
  if (!store) {
    throw new NotConfiguredException();
  }

  const carryOver = new Set<string>();
  if (options.preserveRecommended) {
    for (const mapping of mappings) {
      if (mapping.provenance === MappingProvenance.DERIVED && mapping.recommended) {
        carryOver.add(mappingKey(mapping.generalConceptId, mapping.omopConceptId));
      }
    }
  }

  const result = mappings.filter(
    (mapping) => mapping.provenance !== MappingProvenance.DERIVED,
  );

  const sources = result.filter(
    (mapping) =>
      mapping.provenance === MappingProvenance.MANUAL && mapping.recommended,
  );
  if (sources.length === 0) {
    return result;
  }

  const existingKeys = new Set(
    result.map((mapping) =>
      mappingKey(mapping.generalConceptId, mapping.omopConceptId),
    ),
  );

  for (const source of sources) {
    const candidates = await collectCandidates(store, source.omopConceptId);

    for (const candidate of candidates) {
      const key = mappingKey(source.generalConceptId, candidate.conceptId);
      if (existingKeys.has(key)) continue;
      existingKeys.add(key);

      result.push({
        generalConceptId: source.generalConceptId,
        omopConceptId: candidate.conceptId,
        unitConceptId: source.unitConceptId,
        recommended: options.preserveRecommended && carryOver.has(key),
        provenance: MappingProvenance.DERIVED,
      });
    }
  }

  return result;
}
