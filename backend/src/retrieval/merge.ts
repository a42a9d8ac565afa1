import type { RetrievalResult } from '../../../shared/types.js';
import type { VectorHit } from './types.js';

/** Plain code-unit ordering; independent of locale. */
export function compareDocumentIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Merges hit lists from several subqueries. A document found more than once
 * keeps its smallest distance.
 */
export function mergeHits(hitLists: readonly VectorHit[][]): VectorHit[] {
  const best = new Map<string, number>();

  for (const hits of hitLists) {
    for (const hit of hits) {
      const existing = best.get(hit.documentId);
      if (existing === undefined || hit.distance < existing) {
        best.set(hit.documentId, hit.distance);
      }
    }
  }

  return Array.from(best, ([documentId, distance]) => ({ documentId, distance }));
}

/** Ascending distance, ties by document id, truncated to `topK` and ranked from 1. */
export function rankHits(hits: readonly VectorHit[], topK: number): RetrievalResult[] {
  return [...hits]
    .sort((a, b) => a.distance - b.distance || compareDocumentIds(a.documentId, b.documentId))
    .slice(0, topK)
    .map((hit, index) => ({ documentId: hit.documentId, distance: hit.distance, rank: index + 1 }));
}

/** Similarity exposed to callers; decreases monotonically with distance. */
export function distanceToScore(distance: number): number {
  return 1 / (1 + distance);
}
