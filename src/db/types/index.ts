import type { Generated } from 'kysely';

// Table interfaces are written in camelCase; CamelCasePlugin maps them to the
// snake_case OMOP column names (concept_id_1, min_levels_of_separation, ...).

export interface ConceptTable {
  conceptId: number;
  conceptName: string;
  domainId: string;
  vocabularyId: string;
  conceptClassId: string;
  standardConcept: string | null;
  conceptCode: string;
  invalidReason: string | null;
}

export interface ConceptRelationshipTable {
  conceptId1: number;
  conceptId2: number;
  relationshipId: string;
}

export interface ConceptAncestorTable {
  ancestorConceptId: number;
  descendantConceptId: number;
  minLevelsOfSeparation: number;
  maxLevelsOfSeparation: number;
}

export interface ConceptSynonymTable {
  conceptId: number;
  conceptSynonymName: string;
  languageConceptId: number;
}

export interface ConceptMappingTable {
  mappingId: Generated<number>;
  generalConceptId: number;
  omopConceptId: number;
  omopUnitConceptId: number | null;
  // 0 / 1, kept numeric so MySQL and SQLite read it back the same way
  recommended: number;
  source: string;
}

export interface AppSettingTable {
  settingKey: string;
  settingValue: string;
}

export interface MappingHistoryTable {
  historyId: Generated<number>;
  // ISO-8601, sortable as text
  createdAt: string;
  actionType: string;
  generalConceptId: number;
  omopConceptId: number;
  vocabularyId: string | null;
  conceptCode: string | null;
  conceptName: string | null;
  comment: string | null;
}

export interface DB {
  concept: ConceptTable;
  conceptRelationship: ConceptRelationshipTable;
  conceptAncestor: ConceptAncestorTable;
  conceptSynonym: ConceptSynonymTable;
  conceptMapping: ConceptMappingTable;
  appSetting: AppSettingTable;
  mappingHistory: MappingHistoryTable;
}
