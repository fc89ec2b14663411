import { isRegression } from "./scoreHistory.js";
import type {
  BudgetBreaker,
  BudgetSnapshot,
  IterationDecision,
  StopDecision,
  TaskLimits,
} from "./types.js";

export interface DecisionInput {
  readonly iterationIndex: number;
  readonly aggregateScore: number;
  /** Last evaluated score before this iteration, or null when there is none. */
  readonly previousScore: number | null;
  readonly budget: BudgetSnapshot;
  readonly limits: Pick<TaskLimits, "maxIterations" | "qualityThreshold">;
  readonly regressionEpsilon: number;
  /**
   * Breaker another iteration of the largest size so far would trip. Only
   * consulted once the iteration cap is reached, where it takes precedence.
   */
  readonly projectedBreaker?: BudgetBreaker | null;
}

const CONTINUE: IterationDecision = { type: "continue" };

/**
 * Maps one iteration's inputs to exactly one decision. Rule order matters:
 * quality, then regression, then budget, then iteration count.
 */
export function decide(input: DecisionInput): IterationDecision {
  const { iterationIndex, aggregateScore, previousScore, budget, limits } = input;

  if (aggregateScore >= limits.qualityThreshold) {
    return { type: "quality_met", score: aggregateScore, threshold: limits.qualityThreshold };
  }

  if (
    iterationIndex > 1 &&
    previousScore !== null &&
    isRegression(aggregateScore, previousScore, input.regressionEpsilon)
  ) {
    return { type: "regression", score: aggregateScore, previousScore };
  }

  const breaker = exhaustedBreaker(budget);
  if (breaker !== null) {
    return { type: "budget_exhausted", breaker, preflight: false };
  }

  if (iterationIndex >= limits.maxIterations) {
    const projected = input.projectedBreaker ?? null;
    if (projected !== null) {
      return { type: "budget_exhausted", breaker: projected, preflight: true };
    }
    return { type: "max_iterations_reached", maxIterations: limits.maxIterations };
  }

  return CONTINUE;
}

function exhaustedBreaker(budget: BudgetSnapshot): BudgetBreaker | null {
  if (budget.tokensSpent >= budget.tokenBudget) return "tokens";
  if (budget.costBudgetUsd !== null && budget.costUsd >= budget.costBudgetUsd) return "cost";
  if (budget.elapsedMs >= budget.timeBudgetMs) return "time";
  return null;
}

export function isTerminal(decision: IterationDecision): decision is StopDecision {
  switch (decision.type) {
    case "continue":
      return false;
    case "quality_met":
    case "regression":
    case "budget_exhausted":
    case "max_iterations_reached":
      return true;
    default:
      return assertNever(decision);
  }
}

export function describeDecision(decision: IterationDecision): string {
  switch (decision.type) {
    case "continue":
      return "Continuing to next iteration";
    case "quality_met":
      return `Quality threshold met (${formatScore(decision.score)} >= ${formatScore(decision.threshold)})`;
    case "regression":
      return `Score regressed (${formatScore(decision.score)} < ${formatScore(decision.previousScore)})`;
    case "budget_exhausted":
      return decision.preflight
        ? `${breakerLabel(decision.breaker)} budget would be exceeded by another iteration`
        : `${breakerLabel(decision.breaker)} budget exhausted`;
    case "max_iterations_reached":
      return `Reached max iterations (${String(decision.maxIterations)})`;
    default:
      return assertNever(decision);
  }
}

function breakerLabel(breaker: BudgetBreaker): string {
  switch (breaker) {
    case "tokens":
      return "Token";
    case "cost":
      return "Cost";
    case "time":
      return "Time";
    default:
      return assertNever(breaker);
  }
}

export function formatScore(score: number): string {
  return score.toFixed(2);
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
