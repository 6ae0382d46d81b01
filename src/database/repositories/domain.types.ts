// Domain interfaces for vocabulary concepts and concept mappings

export enum StandardFlag {
  STANDARD = 'Standard',
  CLASSIFICATION = 'Classification',
  NON_STANDARD = 'Non-standard',
}

export interface VocabularyConcept {
  conceptId: number;
  name: string;
  domainId: string;
  vocabularyId: string;
  conceptClassId: string;
  code: string;
  standardFlag: StandardFlag;
  invalidReason: string | null;
}

export interface RelatedConcept {
  relationshipId: string;
  concept: VocabularyConcept;
}

export interface ConceptSynonym {
  synonym: string;
  languageConceptId: number;
  language: string | null;
}

/** Direct parent -> child edge (concept_ancestor at one level of separation). */
export interface HierarchyLink {
  parentId: number;
  childId: number;
}

export interface VocabularyCounts {
  concepts: number;
  relationships: number;
  ancestors: number;
  synonyms: number;
}

/**
 * Where a mapping came from. Derived rows are owned by the enrichment pass
 * and persisted under the `ohdsi_relationships` source tag.
 */
export enum MappingProvenance {
  MANUAL = 'manual',
  DERIVED = 'ohdsi_relationships',
}

export interface ConceptMapping {
  mappingId?: number;
  generalConceptId: number;
  omopConceptId: number;
  unitConceptId: number | null;
  recommended: boolean;
  provenance: MappingProvenance;
}

export enum HistoryAction {
  INSERT = 'insert',
  DELETE = 'delete',
  RECOMMEND = 'recommend',
  UNRECOMMEND = 'unrecommend',
}

export interface MappingHistoryEntry {
  historyId?: number;
  createdAt: string;
  action: HistoryAction;
  generalConceptId: number;
  omopConceptId: number;
  vocabularyId: string | null;
  conceptCode: string | null;
  conceptName: string | null;
  comment: string | null;
}

export interface ConceptSearchFilter {
  vocabularyId?: string;
  domainId?: string;
}

/**
 * Read-only lookups the enrichment engine needs from the vocabulary.
 */
export interface VocabularyStore {
  findConcept(conceptId: number): Promise<VocabularyConcept | null>;
  findConceptsByIds(conceptIds: number[]): Promise<VocabularyConcept[]>;
  findRelatedIds(
    conceptId: number,
    relationshipKinds: readonly string[],
  ): Promise<number[]>;
  findDescendantIds(conceptId: number): Promise<number[]>;
}
