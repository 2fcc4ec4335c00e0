import type { Candidate } from '../strategies/types.js';

export interface RankingOptions {
  /** Most candidates any one strategy may place in the capped list. */
  perStrategyCap: number;
  displayCount: number;
  /** Put each strategy's best candidate at the front of the list. */
  promoteTopPerStrategy: boolean;
}

export const DEFAULT_RANKING_OPTIONS: RankingOptions = {
  perStrategyCap: 5,
  displayCount: 10,
  promoteTopPerStrategy: true,
};

/**
 * One candidate per distinct text: the highest score wins, the first seen
 * wins a tie. Output keeps the first-seen order of the texts.
 */
export function dedupeByText(candidates: readonly Candidate[]): Candidate[] {
  const best = new Map<string, Candidate>();
  for (const candidate of candidates) {
    const current = best.get(candidate.text);
    if (!current || candidate.score > current.score) {
      best.set(candidate.text, candidate);
    }
  }
  return [...best.values()];
}

/** Stable descending sort by score. */
export function sortByScore(candidates: readonly Candidate[]): Candidate[] {
  return [...candidates].sort((a, b) => b.score - a.score);
}

interface Indexed {
  index: number;
  candidate: Candidate;
}

function capIndexed(sorted: readonly Indexed[], cap: number): Indexed[] {
  const emitted = new Map<string, number>();
  const capped: Indexed[] = [];
  for (const entry of sorted) {
    const count = emitted.get(entry.candidate.strategyName) ?? 0;
    if (count < cap) {
      capped.push(entry);
      emitted.set(entry.candidate.strategyName, count + 1);
    }
  }
  return capped;
}

/** Walk a score-sorted list keeping at most `cap` entries per strategy. */
export function capPerStrategy(sorted: readonly Candidate[], cap: number): Candidate[] {
  return capIndexed(
    sorted.map((candidate, index) => ({ index, candidate })),
    cap
  ).map((entry) => entry.candidate);
}

/**
 * Dedupe, sort, cap per strategy, optionally promote each strategy's best to
 * the front, then truncate. Seeds are tracked by their position in the sorted
 * list, not by object identity.
 */
export function rankCandidates(
  candidates: readonly Candidate[],
  options: RankingOptions = DEFAULT_RANKING_OPTIONS
): Candidate[] {
  const sorted: Indexed[] = sortByScore(dedupeByText(candidates)).map((candidate, index) => ({
    index,
    candidate,
  }));
  const capped = capIndexed(sorted, options.perStrategyCap);

  let ordered: Indexed[] = capped;
  if (options.promoteTopPerStrategy) {
    const seeds = new Map<string, Indexed>();
    for (const entry of sorted) {
      if (!seeds.has(entry.candidate.strategyName)) {
        seeds.set(entry.candidate.strategyName, entry);
      }
    }
    const seedList = [...seeds.values()].sort((a, b) => b.candidate.score - a.candidate.score);
    const seedIndexes = new Set(seedList.map((entry) => entry.index));
    ordered = [...seedList, ...capped.filter((entry) => !seedIndexes.has(entry.index))];
  }

  return dedupeByText(ordered.map((entry) => entry.candidate)).slice(0, Math.max(0, options.displayCount));
}
