export type Clock = () => number;

export const systemClock: Clock = () => performance.now();

/**
 * Soft wall-clock budget polled at loop boundaries. A zero budget is already
 * expired. Budgets are in seconds; the clock reads milliseconds.
 */
export class Deadline {
  private readonly startedAt: number;

  constructor(
    readonly budgetS: number,
    private readonly clock: Clock = systemClock
  ) {
    this.startedAt = clock();
  }

  elapsedMs(): number {
    return this.clock() - this.startedAt;
  }

  remainingS(): number {
    return Math.max(0, this.budgetS - this.elapsedMs() / 1000);
  }

  expired(): boolean {
    return this.elapsedMs() >= this.budgetS * 1000;
  }

  /** A nested budget that can never outlive this one. */
  child(budgetS: number): Deadline {
    return new Deadline(Math.min(budgetS, this.remainingS()), this.clock);
  }
}
