import { Injectable, NotFoundException } from '@nestjs/common';
import { jaroWinkler } from '../common/utils/jaro-winkler';
import {
  ConceptSearchFilter,
  ConceptSynonym,
  RelatedConcept,
  VocabularyConcept,
  VocabularyRepository,
} from '../database/repositories';
import {
  ConceptSearchResultDto,
  DEFAULT_SEARCH_LIMIT,
  HierarchyConceptDto,
  HierarchyRelation,
  VocabularyStatusDto,
} from './dto';

// Names scoring at or below this are not returned
const SIMILARITY_THRESHOLD = 0.75;

const byName = (a: VocabularyConcept, b: VocabularyConcept) =>
  a.name.localeCompare(b.name);

@Injectable()
export class VocabularyService {
  constructor(private readonly vocabularyRepo: VocabularyRepository) {}

  async getStatus(): Promise<VocabularyStatusDto> {
    const counts = await this.vocabularyRepo.countRows();
    return { loaded: counts.concepts > 0, ...counts };
  }

  async getConcept(conceptId: number): Promise<VocabularyConcept> {
    const concept = await this.vocabularyRepo.findConcept(conceptId);
    if (!concept) {
      throw new NotFoundException(`Concept ${conceptId} not found`);
    }
    return concept;
  }

  /**
   * Fuzzy name search: Jaro-Winkler similarity of the lowercased name against
   * the query, best first. A concept whose code equals the query scores 1.
   */
  async searchConcepts(
    query: string,
    filter: ConceptSearchFilter = {},
    limit = DEFAULT_SEARCH_LIMIT,
  ): Promise<ConceptSearchResultDto[]> {
    const needle = query.trim().toLowerCase();
    if (needle === '') return [];

    const candidates = await this.vocabularyRepo.searchConcepts(query, filter);
    return candidates
      .map((concept) => ({
        score:
          concept.code === query.trim()
            ? 1
            : jaroWinkler(concept.name.toLowerCase(), needle),
        concept,
      }))
      .filter((result) => result.score > SIMILARITY_THRESHOLD)
      .sort(
        (a, b) =>
          b.score - a.score || a.concept.conceptId - b.concept.conceptId,
      )
      .slice(0, limit);
  }

  /**
   * Outgoing relationships, most frequent relationship kind first; kinds of
   * equal frequency stay grouped, concepts by name within a kind.
   */
  async getRelatedConcepts(conceptId: number): Promise<RelatedConcept[]> {
    await this.getConcept(conceptId);
    const related = await this.vocabularyRepo.findRelationships(conceptId);

    const frequency = new Map<string, number>();
    for (const { relationshipId } of related) {
      frequency.set(relationshipId, (frequency.get(relationshipId) ?? 0) + 1);
    }

    return [...related].sort(
      (a, b) =>
        (frequency.get(b.relationshipId) ?? 0) -
          (frequency.get(a.relationshipId) ?? 0) ||
        a.relationshipId.localeCompare(b.relationshipId) ||
        byName(a.concept, b.concept),
    );
  }

  async getHierarchyConcepts(conceptId: number): Promise<HierarchyConceptDto[]> {
    await this.getConcept(conceptId);
    const [ancestors, descendants] = await Promise.all([
      this.vocabularyRepo.findStandardAncestors(conceptId),
      this.vocabularyRepo.findStandardDescendants(conceptId),
    ]);

    return [
      ...ancestors.sort(byName).map((concept) => ({
        relation: HierarchyRelation.ANCESTOR,
        concept,
      })),
      ...descendants.sort(byName).map((concept) => ({
        relation: HierarchyRelation.DESCENDANT,
        concept,
      })),
    ];
  }

  async getSynonyms(conceptId: number): Promise<ConceptSynonym[]> {
    await this.getConcept(conceptId);
    return this.vocabularyRepo.findSynonyms(conceptId);
  }
}
