import type { BudgetBreaker, BudgetSnapshot, CircuitBreakerState, TaskLimits } from "./types.js";

export interface IterationEstimate {
  readonly tokens: number;
  readonly durationMs: number;
  readonly costUsd: number;
}

/**
 * Running totals for one task's circuit breakers. Owned by a single engine,
 * updated once per completed iteration and never rolled back.
 */
export class BudgetTracker {
  private tokensSpent = 0;
  private elapsedMs = 0;
  private iterationsCompleted = 0;
  private bestScore: number | null = null;
  private costUsd = 0;
  private maxIterationTokens = 0;
  private maxIterationMs = 0;
  private maxIterationCost = 0;

  constructor(
    private readonly limits: Pick<TaskLimits, "tokenBudget" | "timeBudgetMs">,
    private readonly costBudgetUsd: number | null = null,
  ) {}

  record(tokensUsed: number, durationMs: number, costUsd: number = 0): CircuitBreakerState {
    if (!Number.isFinite(tokensUsed) || tokensUsed < 0) {
      throw new RangeError(`tokensUsed must be a non-negative number, got ${String(tokensUsed)}`);
    }
    if (!Number.isFinite(durationMs) || durationMs < 0) {
      throw new RangeError(`durationMs must be a non-negative number, got ${String(durationMs)}`);
    }
    if (!Number.isFinite(costUsd) || costUsd < 0) {
      throw new RangeError(`costUsd must be a non-negative number, got ${String(costUsd)}`);
    }

    this.tokensSpent += tokensUsed;
    this.elapsedMs += durationMs;
    this.costUsd += costUsd;
    this.iterationsCompleted += 1;
    this.maxIterationTokens = Math.max(this.maxIterationTokens, tokensUsed);
    this.maxIterationMs = Math.max(this.maxIterationMs, durationMs);
    this.maxIterationCost = Math.max(this.maxIterationCost, costUsd);

    return this.state();
  }

  observeScore(score: number): void {
    if (this.bestScore === null || score > this.bestScore) {
      this.bestScore = score;
    }
  }

  remainingTokens(): number {
    return Math.max(0, this.limits.tokenBudget - this.tokensSpent);
  }

  remainingTimeMs(): number {
    return Math.max(0, this.limits.timeBudgetMs - this.elapsedMs);
  }

  /** `null` when no spending cap is set. */
  remainingCostUsd(): number | null {
    if (this.costBudgetUsd === null) return null;
    return Math.max(0, this.costBudgetUsd - this.costUsd);
  }

  /** Pre-flight check before committing to a new iteration. */
  wouldExceed(estimatedTokens: number, estimatedMs: number = 0, estimatedCostUsd: number = 0): boolean {
    return this.breakerFor(estimatedTokens, estimatedMs, estimatedCostUsd) !== null;
  }

  /** Checks tokens, then cost, then time. */
  breakerFor(estimatedTokens: number, estimatedMs: number = 0, estimatedCostUsd: number = 0): BudgetBreaker | null {
    if (this.remainingTokens() === 0 || this.tokensSpent + estimatedTokens > this.limits.tokenBudget) {
      return "tokens";
    }
    if (
      this.costBudgetUsd !== null &&
      (this.remainingCostUsd() === 0 || this.costUsd + estimatedCostUsd > this.costBudgetUsd)
    ) {
      return "cost";
    }
    if (this.remainingTimeMs() === 0 || this.elapsedMs + estimatedMs > this.limits.timeBudgetMs) {
      return "time";
    }
    return null;
  }

  /** Largest single-iteration spend seen so far; zero before the first iteration. */
  nextIterationEstimate(): IterationEstimate {
    return { tokens: this.maxIterationTokens, durationMs: this.maxIterationMs, costUsd: this.maxIterationCost };
  }

  /** Breaker that another iteration the size of the largest so far would trip. */
  projectedBreaker(): BudgetBreaker | null {
    const estimate = this.nextIterationEstimate();
    return this.breakerFor(estimate.tokens, estimate.durationMs, estimate.costUsd);
  }

  state(): CircuitBreakerState {
    return Object.freeze({
      tokensSpent: this.tokensSpent,
      elapsedMs: this.elapsedMs,
      iterationsCompleted: this.iterationsCompleted,
      bestScore: this.bestScore,
      costUsd: this.costUsd,
    });
  }

  snapshot(): BudgetSnapshot {
    return Object.freeze({
      ...this.state(),
      tokenBudget: this.limits.tokenBudget,
      timeBudgetMs: this.limits.timeBudgetMs,
      costBudgetUsd: this.costBudgetUsd,
    });
  }
}
