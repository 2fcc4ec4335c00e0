import { logger } from '../../utils/logger.js';
import { Deadline, systemClock, type Clock } from '../strategies/deadline.js';
import type { Candidate, PreparedStrategy, StrategyName } from '../strategies/types.js';

export interface StrategyDiagnostic {
  strategy: StrategyName;
  message: string;
}

export interface StrategyRunSummary {
  strategy: StrategyName;
  candidates: number;
  elapsedMs: number;
  /** Effective budget after clamping to what was left of the run budget. */
  budgetS: number;
  faulted: boolean;
}

export interface OrchestratorResult {
  candidates: Candidate[];
  diagnostics: StrategyDiagnostic[];
  strategies: StrategyRunSummary[];
  /** The run budget ran out; strategies not yet launched were skipped. */
  budgetExceeded: boolean;
}

export interface OrchestratorOptions {
  totalBudgetS: number;
  clock?: Clock;
}

function describeFault(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}

/**
 * Runs prepared strategies in order against one ciphertext under a shared
 * wall-clock budget. Each strategy gets the smaller of its own budget and
 * what is left of the run's. A strategy that throws is recorded as a
 * diagnostic and skipped; the rest still run.
 */
export class DecipherOrchestrator {
  private readonly clock: Clock;

  constructor(
    private readonly strategies: readonly PreparedStrategy[],
    private readonly options: OrchestratorOptions
  ) {
    this.clock = options.clock ?? systemClock;
  }

  run(ciphertext: string): OrchestratorResult {
    const runDeadline = new Deadline(this.options.totalBudgetS, this.clock);
    const candidates: Candidate[] = [];
    const diagnostics: StrategyDiagnostic[] = [];
    const summaries: StrategyRunSummary[] = [];

    for (const [position, strategy] of this.strategies.entries()) {
      const deadline = runDeadline.child(strategy.budgetS);
      const startedAt = this.clock();
      let produced = 0;
      let faulted = false;

      try {
        const output = strategy.run(ciphertext, { deadline });
        produced = output.length;
        candidates.push(...output);
      } catch (error) {
        faulted = true;
        const message = describeFault(error);
        diagnostics.push({ strategy: strategy.name, message });
        logger.warn(`Strategy ${strategy.name} failed; continuing with the remaining strategies`, {
          error: message,
        });
      }

      const elapsedMs = this.clock() - startedAt;
      summaries.push({ strategy: strategy.name, candidates: produced, elapsedMs, budgetS: deadline.budgetS, faulted });
      logger.debug(`Strategy ${strategy.name} finished`, { candidates: produced, elapsedMs: Math.round(elapsedMs) });

      const remaining = this.strategies.length - position - 1;
      if (runDeadline.expired() && remaining > 0) {
        logger.warn('Global time budget exceeded; returning best-so-far', {
          skipped: this.strategies.slice(position + 1).map((next) => next.name),
        });
        break;
      }
    }

    return { candidates, diagnostics, strategies: summaries, budgetExceeded: runDeadline.expired() };
  }
}
