/**
 * Reciprocal Rank Fusion
 *
 * score(d) = Σ 1 / (k + rank_i(d)) over every list containing d, ranks 1-based.
 * Only ranks matter, so scores from different retrievers need no calibration.
 */

export interface RankedItem<T> {
  id: string;
  item: T;
}

export interface FusedItem<T> {
  id: string;
  item: T;
  score: number;
  /** 1-based rank in each input list, undefined where absent */
  ranks: Array<number | undefined>;
}

export interface RrfOptions {
  /** Smoothing constant (default 60) */
  k?: number;
  /** Maximum number of fused results */
  limit?: number;
}

export const DEFAULT_RRF_K = 60;

/**
 * Fuse ranked lists. Results are ordered by fused score descending; ties keep
 * the order in which documents were first seen (list order, then rank).
 * The item kept for a document is the one from the first list that has it.
 */
export function reciprocalRankFusion<T>(lists: Array<Array<RankedItem<T>>>, options: RrfOptions = {}): FusedItem<T>[] {
  const k = options.k ?? DEFAULT_RRF_K;
  const fused = new Map<string, FusedItem<T> & { firstSeen: number }>();
  let seen = 0;

  lists.forEach((list, listIndex) => {
    list.forEach((entry, position) => {
      const rank = position + 1;
      let current = fused.get(entry.id);
      if (!current) {
        current = {
          id: entry.id,
          item: entry.item,
          score: 0,
          ranks: new Array<number | undefined>(lists.length).fill(undefined),
          firstSeen: seen++,
        };
        fused.set(entry.id, current);
      }
      // A document repeated within one list counts at its best rank only
      if (current.ranks[listIndex] === undefined) {
        current.ranks[listIndex] = rank;
        current.score += 1 / (k + rank);
      }
    });
  });

  const sorted = [...fused.values()].sort((a, b) => b.score - a.score || a.firstSeen - b.firstSeen);
  const limited = options.limit !== undefined ? sorted.slice(0, options.limit) : sorted;
  return limited.map(({ id, item, score, ranks }) => ({ id, item, score, ranks }));
}
