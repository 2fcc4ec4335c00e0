import { logger } from '../../utils/logger.js';
import { hintFor, type NamingHint } from '../scoring/hint.js';
import type { Clock } from '../strategies/deadline.js';
import type { Candidate } from '../strategies/types.js';
import { DecipherOrchestrator, type StrategyDiagnostic, type StrategyRunSummary } from './DecipherOrchestrator.js';
import { rankCandidates } from './ranking.js';
import type { RunConfig } from './runConfig.js';

export interface RankedCandidate extends Candidate {
  rank: number;
  hint?: NamingHint;
}

export interface DecipherReport {
  ranked: RankedCandidate[];
  /** Candidates produced before deduplication and ranking. */
  totalCandidates: number;
  diagnostics: StrategyDiagnostic[];
  strategies: StrategyRunSummary[];
  budgetExceeded: boolean;
}

/** Run every configured strategy, then rank and annotate the survivors. */
export function decipher(ciphertext: string, config: RunConfig, clock?: Clock): DecipherReport {
  const orchestrator = new DecipherOrchestrator(config.strategies, {
    totalBudgetS: config.global.totalBudgetS,
    clock,
  });
  const result = orchestrator.run(ciphertext);

  const ranked = rankCandidates(result.candidates, {
    perStrategyCap: config.global.perStrategyCap,
    displayCount: config.global.topK,
    promoteTopPerStrategy: config.global.promoteTopPerStrategy,
  }).map((candidate, index): RankedCandidate => {
    const hint = hintFor(candidate.text, config.global.showHint);
    return hint ? { ...candidate, rank: index + 1, hint } : { ...candidate, rank: index + 1 };
  });

  logger.debug('Decipher run complete', {
    produced: result.candidates.length,
    ranked: ranked.length,
    budgetExceeded: result.budgetExceeded,
  });

  return {
    ranked,
    totalCandidates: result.candidates.length,
    diagnostics: result.diagnostics,
    strategies: result.strategies,
    budgetExceeded: result.budgetExceeded,
  };
}
