import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  HierarchyLink,
  VocabularyConcept,
  VocabularyRepository,
} from '../database/repositories';
import {
  DEFAULT_MAX_LEVELS,
  HierarchyGraphDto,
  HierarchyNodeDto,
  HierarchySizeDto,
  HierarchyStatsDto,
} from './dto';
import { HierarchyCacheService } from './hierarchy-cache.service';
import {
  HierarchyTier,
  HierarchyTraversal,
  TraversedConcept,
} from './hierarchy.types';

const LABEL_MAX_LENGTH = 50;

enum WalkDirection {
  UP = 'up',
  DOWN = 'down',
}

export function truncateLabel(name: string): string {
  return name.length > LABEL_MAX_LENGTH
    ? `${name.slice(0, LABEL_MAX_LENGTH - 3)}...`
    : name;
}

@Injectable()
export class HierarchyService {
  private readonly logger = new Logger(HierarchyService.name);
  private readonly warningThreshold: number;

  constructor(
    private readonly vocabularyRepo: VocabularyRepository,
    private readonly cacheService: HierarchyCacheService,
    configService: ConfigService,
  ) {
    this.warningThreshold = Number(
      configService.get<string>('HIERARCHY_WARNING_THRESHOLD', '100'),
    );
  }

  // ============================================
  // PUBLIC OPERATIONS
  // ============================================

  async countHierarchy(
    conceptId: number,
    maxLevelsUp = DEFAULT_MAX_LEVELS,
    maxLevelsDown = DEFAULT_MAX_LEVELS,
  ): Promise<HierarchyStatsDto> {
    const traversal = await this.getTraversal(
      conceptId,
      maxLevelsUp,
      maxLevelsDown,
    );
    return this.toStats(traversal);
  }

  /**
   * Size guard for the graph view. Exceeding the threshold is a signal for
   * the caller, not an error.
   */
  async checkSize(
    conceptId: number,
    maxLevelsUp = DEFAULT_MAX_LEVELS,
    maxLevelsDown = DEFAULT_MAX_LEVELS,
  ): Promise<HierarchySizeDto> {
    const stats = await this.countHierarchy(
      conceptId,
      maxLevelsUp,
      maxLevelsDown,
    );
    return {
      ...stats,
      threshold: this.warningThreshold,
      exceedsThreshold: stats.totalCount > this.warningThreshold,
    };
  }

  async buildHierarchyGraph(
    conceptId: number,
    maxLevelsUp = DEFAULT_MAX_LEVELS,
    maxLevelsDown = DEFAULT_MAX_LEVELS,
    previousConceptId?: number,
  ): Promise<HierarchyGraphDto> {
    const traversal = await this.getTraversal(
      conceptId,
      maxLevelsUp,
      maxLevelsDown,
    );
    const stats = this.toStats(traversal);
    if (!traversal.found) {
      return { nodes: [], edges: [], stats };
    }

    const ordered: Array<TraversedConcept & { tier: HierarchyTier }> = [
      { conceptId, level: 0, tier: HierarchyTier.SELECTED },
      ...traversal.ancestors.map((a) => ({ ...a, tier: HierarchyTier.ANCESTOR })),
      ...traversal.descendants.map((d) => ({
        ...d,
        tier: HierarchyTier.DESCENDANT,
      })),
    ];

    const concepts = await this.vocabularyRepo.findConceptsByIds(
      ordered.map((entry) => entry.conceptId),
    );
    const conceptMap = new Map<number, VocabularyConcept>(
      concepts.map((c) => [c.conceptId, c]),
    );

    const nodes: HierarchyNodeDto[] = [];
    for (const entry of ordered) {
      const concept = conceptMap.get(entry.conceptId);
      if (!concept) continue;
      nodes.push({
        id: concept.conceptId,
        label: truncateLabel(concept.name),
        name: concept.name,
        level: entry.level,
        tier: entry.tier,
        isCurrent: entry.tier === HierarchyTier.SELECTED,
        isPrevious:
          previousConceptId !== undefined &&
          concept.conceptId === previousConceptId,
        vocabularyId: concept.vocabularyId,
        conceptCode: concept.code,
        conceptClassId: concept.conceptClassId,
      });
    }

    return {
      nodes,
      edges: traversal.edges.map((link) => ({
        source: link.parentId,
        target: link.childId,
      })),
      stats,
    };
  }

  // ============================================
  // TRAVERSAL
  // ============================================

  async getTraversal(
    conceptId: number,
    maxLevelsUp: number,
    maxLevelsDown: number,
  ): Promise<HierarchyTraversal> {
    const cached = await this.cacheService.getTraversal(
      conceptId,
      maxLevelsUp,
      maxLevelsDown,
    );
    if (cached) return cached;

    const startTime = Date.now();
    const traversal = await this.traverse(conceptId, maxLevelsUp, maxLevelsDown);
    this.logger.debug(
      `Hierarchy of ${conceptId} (up=${maxLevelsUp}, down=${maxLevelsDown}): ` +
        `${traversal.ancestors.length + traversal.descendants.length} nodes ` +
        `in ${Date.now() - startTime}ms`,
    );

    await this.cacheService.setTraversal(traversal);
    return traversal;
  }

  /**
   * Level-bounded BFS: upward first, then downward, sharing one visited set
   * so a concept reached from both sides is counted once.
   */
  private async traverse(
    conceptId: number,
    maxLevelsUp: number,
    maxLevelsDown: number,
  ): Promise<HierarchyTraversal> {
    const traversal: HierarchyTraversal = {
      conceptId,
      found: false,
      maxLevelsUp,
      maxLevelsDown,
      ancestors: [],
      descendants: [],
      edges: [],
    };

    const center = await this.vocabularyRepo.findConcept(conceptId);
    if (!center) return traversal;
    traversal.found = true;

    const visited = new Set<number>([conceptId]);
    const edgeKeys = new Set<string>();
    const addEdge = (link: HierarchyLink) => {
      const edgeKey = `${link.parentId}->${link.childId}`;
      if (edgeKeys.has(edgeKey)) return;
      edgeKeys.add(edgeKey);
      traversal.edges.push(link);
    };

    traversal.ancestors = await this.walk(
      conceptId,
      maxLevelsUp,
      WalkDirection.UP,
      visited,
      addEdge,
    );
    traversal.descendants = await this.walk(
      conceptId,
      maxLevelsDown,
      WalkDirection.DOWN,
      visited,
      addEdge,
    );
    return traversal;
  }

  private async walk(
    startId: number,
    maxDepth: number,
    direction: WalkDirection,
    visited: Set<number>,
    addEdge: (link: HierarchyLink) => void,
  ): Promise<TraversedConcept[]> {
    const reached: TraversedConcept[] = [];
    let currentLayer = [startId];
    let currentDepth = 0;

    while (currentLayer.length > 0 && currentDepth < maxDepth) {
      currentDepth++;
      const links =
        direction === WalkDirection.UP
          ? await this.vocabularyRepo.findParentLinks(currentLayer)
          : await this.vocabularyRepo.findChildLinks(currentLayer);

      const nextLayer: number[] = [];
      for (const link of links) {
        const neighborId =
          direction === WalkDirection.UP ? link.parentId : link.childId;

        // Even if visited, the edge belongs to the graph
        addEdge(link);

        if (!visited.has(neighborId)) {
          visited.add(neighborId);
          nextLayer.push(neighborId);
          reached.push({
            conceptId: neighborId,
            level:
              direction === WalkDirection.UP ? -currentDepth : currentDepth,
          });
        }
      }
      currentLayer = nextLayer;
    }

    return reached;
  }

  private toStats(traversal: HierarchyTraversal): HierarchyStatsDto {
    const ancestorCount = traversal.ancestors.length;
    const descendantCount = traversal.descendants.length;
    return {
      ancestorCount,
      descendantCount,
      totalCount: ancestorCount + descendantCount,
      edgeCount: traversal.edges.length,
      maxLevelsUp: traversal.maxLevelsUp,
      maxLevelsDown: traversal.maxLevelsDown,
    };
  }
}
