/** Vocabularies whose concepts take part in relationship enrichment. */
export const ALLOWED_VOCABULARIES: ReadonlySet<string> = new Set([
  'RxNorm',
  'RxNorm Extension',
  'LOINC',
  'SNOMED',
  'ICD10',
]);

export const ENRICHMENT_RELATIONSHIP_KINDS = ['Maps to', 'Mapped from'] as const;

export const DRUG_DOMAIN_ID = 'Drug';
export const CLINICAL_DRUG_CLASS_ID = 'Clinical Drug';
