import { HierarchyLink } from '../database/repositories';

export interface TraversedConcept {
  conceptId: number;
  /** Negative above the center, positive below it. */
  level: number;
}

/**
 * Result of the bounded BFS around one concept. Plain JSON so it can be
 * cached as is; both the count and the graph endpoints read it.
 */
export interface HierarchyTraversal {
  conceptId: number;
  found: boolean;
  maxLevelsUp: number;
  maxLevelsDown: number;
  ancestors: TraversedConcept[];
  descendants: TraversedConcept[];
  edges: HierarchyLink[];
}

export enum HierarchyTier {
  ANCESTOR = 'ancestor',
  SELECTED = 'selected',
  DESCENDANT = 'descendant',
}
