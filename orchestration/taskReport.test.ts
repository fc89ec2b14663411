import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { describeOutcome, formatReport, isSuccessfulOutcome, outcomeLabel } from "./taskReport.js";
import type { TaskReport } from "./types.js";

const REPORT: TaskReport = {
  taskId: "task-7",
  outcome: { status: "stopped", decision: { type: "regression", score: 0.5, previousScore: 0.7 } },
  reason: "Score regressed (0.50 < 0.70)",
  finalScore: 0.5,
  bestScore: 0.7,
  iterationsCompleted: 2,
  tokensSpent: 4_200,
  costUsd: 0.0123,
  elapsedMs: 12_345,
  cycles: [],
  findings: [
    {
      id: 0,
      iteration: 1,
      finding: { severity: "blocker", dimension: "correctness", title: "Crashes on empty input", description: "", location: "src/a.ts:3" },
      resolvedByIteration: null,
    },
    {
      id: 1,
      iteration: 1,
      finding: { severity: "important", dimension: "clarity", title: "Vague names", description: "" },
      resolvedByIteration: 2,
    },
    {
      id: 2,
      iteration: 2,
      finding: { severity: "suggestion", dimension: "clarity", title: "Add an example", description: "" },
      resolvedByIteration: null,
    },
  ],
  bestArtifact: { id: "a1", content: "first draft" },
};

describe("orchestration/taskReport", () => {
  it("should label and describe each outcome", () => {
    assert.equal(outcomeLabel(REPORT.outcome), "regression");
    assert.equal(outcomeLabel({ status: "cancelled" }), "cancelled");
    assert.equal(describeOutcome({ status: "failed", errorKind: "timeout", message: "planner timed out" }), "Failed (timeout): planner timed out");
    assert.equal(describeOutcome({ status: "cancelled" }), "Cancelled by request");
  });

  it("should only treat quality met as success", () => {
    assert.equal(isSuccessfulOutcome({ status: "stopped", decision: { type: "quality_met", score: 0.9, threshold: 0.8 } }), true);
    assert.equal(isSuccessfulOutcome(REPORT.outcome), false);
    assert.equal(isSuccessfulOutcome({ status: "cancelled" }), false);
  });

  it("should format a report with open non-suggestion findings", () => {
    assert.equal(
      formatReport(REPORT),
      [
        "Task task-7: regression",
        "  Reason: Score regressed (0.50 < 0.70)",
        "  Final score: 0.50 (best 0.70)",
        "  Iterations: 2",
        "  Tokens: 4200",
        "  Cost: $0.0123",
        "  Elapsed: 12.3s",
        "  Open findings:",
        "    - [BLOCKER] correctness: Crashes on empty input (src/a.ts:3)",
      ].join("\n"),
    );
  });

  it("should format a report without scores", () => {
    const text = formatReport({
      ...REPORT,
      outcome: { status: "cancelled" },
      reason: "Cancelled by request",
      finalScore: null,
      bestScore: null,
      iterationsCompleted: 0,
      costUsd: 0,
      elapsedMs: 250,
      findings: [],
    });

    assert.equal(
      text,
      [
        "Task task-7: cancelled",
        "  Reason: Cancelled by request",
        "  Final score: n/a",
        "  Iterations: 0",
        "  Tokens: 4200",
        "  Cost: $0.0000",
        "  Elapsed: 250ms",
      ].join("\n"),
    );
  });
});
