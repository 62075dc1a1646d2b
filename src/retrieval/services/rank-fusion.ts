/**
 * Reciprocal Rank Fusion
 *
 * RRF Formula: score(passage) = Σ 1 / (k + r + 1), r = 0-based rank per list
 * - Works on rank positions only; raw dense and sparse scores never meet
 * - Passages found by both retrievers add both contributions
 * - Ties keep discovery order (dense list first, then sparse)
 *
 * Pure functions, no I/O.
 */

import type {
  FusedCandidate,
  RankedResult,
  RetrieverKind,
} from '../types';

/**
 * RRF constant (industry standard)
 */
export const DEFAULT_RRF_K = 60;

/**
 * Partial score contributed by one list at a 0-based rank position
 */
export function reciprocalRank(rank: number, k: number = DEFAULT_RRF_K): number {
  return 1 / (k + rank + 1);
}

interface Accumulator {
  candidate: FusedCandidate;
  discoveryOrder: number;
}

/**
 * Combine the dense and sparse rankings into one deduplicated, ordered set.
 */
export function fuseRankings(
  dense: readonly RankedResult[],
  sparse: readonly RankedResult[],
  k: number = DEFAULT_RRF_K,
): FusedCandidate[] {
  if (!Number.isFinite(k) || k <= 0) {
    throw new RangeError(`RRF k must be a positive number, got ${k}`);
  }

  const byIdentity = new Map<string, Accumulator>();

  const accumulate = (
    list: readonly RankedResult[],
    retriever: RetrieverKind,
  ): void => {
    const seenInList = new Set<string>();

    list.forEach((result, rank) => {
      // An identity repeated within one list only counts at its best position
      if (seenInList.has(result.id)) return;
      seenInList.add(result.id);

      const partial = reciprocalRank(rank, k);
      const existing = byIdentity.get(result.id);

      if (existing) {
        existing.candidate.fusionScore += partial;
        existing.candidate.score = existing.candidate.fusionScore;
        existing.candidate.retrievers.push(retriever);
        existing.candidate.originalScores[retriever] = result.score;
        return;
      }

      byIdentity.set(result.id, {
        discoveryOrder: byIdentity.size,
        candidate: {
          id: result.id,
          text: result.text,
          source: { ...result.source },
          score: partial,
          origin: 'fused',
          fusionScore: partial,
          retrievers: [retriever],
          originalScores: { [retriever]: result.score },
        },
      });
    });
  };

  accumulate(dense, 'dense');
  accumulate(sparse, 'sparse');

  return Array.from(byIdentity.values())
    .sort(
      (a, b) =>
        b.candidate.fusionScore - a.candidate.fusionScore ||
        a.discoveryOrder - b.discoveryOrder,
    )
    .map((entry) => entry.candidate);
}

/**
 * Present a fused candidate as a plain fusion-ranked result
 */
export function toFusedResult(candidate: FusedCandidate): RankedResult {
  return {
    id: candidate.id,
    text: candidate.text,
    source: candidate.source,
    score: candidate.fusionScore,
    origin: 'fused',
    fusionScore: candidate.fusionScore,
  };
}
