import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { decide, describeDecision, isTerminal } from "./decisionMachine.js";
import type { DecisionInput } from "./decisionMachine.js";
import type { BudgetSnapshot, IterationDecision } from "./types.js";

const ROOMY_BUDGET: BudgetSnapshot = {
  tokensSpent: 1_000,
  elapsedMs: 1_000,
  iterationsCompleted: 1,
  bestScore: null,
  costUsd: 0.5,
  tokenBudget: 100_000,
  timeBudgetMs: 300_000,
  costBudgetUsd: null,
};

function input(overrides: Partial<DecisionInput> = {}): DecisionInput {
  return {
    iterationIndex: 2,
    aggregateScore: 0.6,
    previousScore: 0.5,
    budget: ROOMY_BUDGET,
    limits: { maxIterations: 5, qualityThreshold: 0.8 },
    regressionEpsilon: 0,
    ...overrides,
  };
}

describe("orchestration/decisionMachine", () => {
  describe("decide", () => {
    it("should continue when no stop condition holds", () => {
      assert.deepEqual(decide(input()), { type: "continue" });
    });

    it("should stop on quality met at the threshold", () => {
      assert.deepEqual(decide(input({ aggregateScore: 0.8 })), {
        type: "quality_met",
        score: 0.8,
        threshold: 0.8,
      });
    });

    it("should prefer quality over every other stop condition", () => {
      const decision = decide(
        input({
          iterationIndex: 5,
          aggregateScore: 0.9,
          previousScore: 0.95,
          budget: { ...ROOMY_BUDGET, tokensSpent: 100_000 },
        }),
      );

      assert.equal(decision.type, "quality_met");
    });

    it("should stop on regression before budget and iteration limits", () => {
      const decision = decide(
        input({
          iterationIndex: 5,
          aggregateScore: 0.5,
          previousScore: 0.7,
          budget: { ...ROOMY_BUDGET, elapsedMs: 300_000 },
        }),
      );

      assert.deepEqual(decision, { type: "regression", score: 0.5, previousScore: 0.7 });
    });

    it("should never report regression on the first iteration", () => {
      assert.deepEqual(decide(input({ iterationIndex: 1, aggregateScore: 0.2, previousScore: 0.7 })), {
        type: "continue",
      });
    });

    it("should ignore drops within the regression epsilon", () => {
      assert.deepEqual(decide(input({ aggregateScore: 0.48, previousScore: 0.5, regressionEpsilon: 0.05 })), {
        type: "continue",
      });
    });

    it("should stop when a budget is already spent", () => {
      assert.deepEqual(decide(input({ budget: { ...ROOMY_BUDGET, tokensSpent: 100_000 } })), {
        type: "budget_exhausted",
        breaker: "tokens",
        preflight: false,
      });
      assert.deepEqual(decide(input({ budget: { ...ROOMY_BUDGET, elapsedMs: 300_001 } })), {
        type: "budget_exhausted",
        breaker: "time",
        preflight: false,
      });
    });

    it("should stop when the spending cap is reached, checking it between tokens and time", () => {
      const overCap = { ...ROOMY_BUDGET, costBudgetUsd: 0.5, elapsedMs: 300_001 };

      assert.deepEqual(decide(input({ budget: overCap })), {
        type: "budget_exhausted",
        breaker: "cost",
        preflight: false,
      });
      assert.deepEqual(decide(input({ budget: { ...overCap, tokensSpent: 100_000 } })), {
        type: "budget_exhausted",
        breaker: "tokens",
        preflight: false,
      });
    });

    it("should report a projected budget overrun over the iteration cap", () => {
      assert.deepEqual(decide(input({ iterationIndex: 5, projectedBreaker: "tokens" })), {
        type: "budget_exhausted",
        breaker: "tokens",
        preflight: true,
      });
    });

    it("should ignore a projected overrun before the iteration cap", () => {
      assert.deepEqual(decide(input({ iterationIndex: 4, projectedBreaker: "time" })), { type: "continue" });
    });

    it("should stop at the iteration cap", () => {
      assert.deepEqual(decide(input({ iterationIndex: 5 })), { type: "max_iterations_reached", maxIterations: 5 });
    });

    it("should return the same decision for the same input", () => {
      const same = input({ aggregateScore: 0.3, previousScore: 0.6 });

      assert.deepEqual(decide(same), decide(same));
    });

    it("should yield exactly one decision across a grid of inputs", () => {
      const seen = new Set<IterationDecision["type"]>();

      for (const iterationIndex of [1, 2, 5]) {
        for (const aggregateScore of [0, 0.5, 0.79, 0.8, 1]) {
          for (const previousScore of [null, 0.6]) {
            for (const tokensSpent of [0, 100_000]) {
              const decision = decide(
                input({ iterationIndex, aggregateScore, previousScore, budget: { ...ROOMY_BUDGET, tokensSpent } }),
              );
              seen.add(decision.type);
              assert.equal(isTerminal(decision), decision.type !== "continue");
            }
          }
        }
      }

      assert.deepEqual(
        [...seen].sort(),
        ["budget_exhausted", "continue", "max_iterations_reached", "quality_met", "regression"],
      );
    });
  });

  describe("describeDecision", () => {
    it("should describe each decision", () => {
      assert.equal(describeDecision({ type: "continue" }), "Continuing to next iteration");
      assert.equal(
        describeDecision({ type: "quality_met", score: 0.853, threshold: 0.8 }),
        "Quality threshold met (0.85 >= 0.80)",
      );
      assert.equal(
        describeDecision({ type: "regression", score: 0.5, previousScore: 0.7 }),
        "Score regressed (0.50 < 0.70)",
      );
      assert.equal(
        describeDecision({ type: "budget_exhausted", breaker: "tokens", preflight: true }),
        "Token budget would be exceeded by another iteration",
      );
      assert.equal(
        describeDecision({ type: "budget_exhausted", breaker: "time", preflight: false }),
        "Time budget exhausted",
      );
      assert.equal(
        describeDecision({ type: "budget_exhausted", breaker: "cost", preflight: false }),
        "Cost budget exhausted",
      );
      assert.equal(
        describeDecision({ type: "max_iterations_reached", maxIterations: 3 }),
        "Reached max iterations (3)",
      );
    });
  });
});
