import { assertNever, describeDecision, formatScore } from "./decisionMachine.js";
import type { FindingRecord, TaskOutcome, TaskReport } from "./types.js";

export function describeOutcome(outcome: TaskOutcome): string {
  switch (outcome.status) {
    case "stopped":
      return describeDecision(outcome.decision);
    case "failed":
      return `Failed (${outcome.errorKind}): ${outcome.message}`;
    case "cancelled":
      return "Cancelled by request";
    default:
      return assertNever(outcome);
  }
}

export function outcomeLabel(outcome: TaskOutcome): string {
  switch (outcome.status) {
    case "stopped":
      return outcome.decision.type;
    case "failed":
      return "failed";
    case "cancelled":
      return "cancelled";
    default:
      return assertNever(outcome);
  }
}

export function isSuccessfulOutcome(outcome: TaskOutcome): boolean {
  return outcome.status === "stopped" && outcome.decision.type === "quality_met";
}

function formatDuration(ms: number): string {
  if (ms < 1_000) return `${String(Math.round(ms))}ms`;
  return `${(ms / 1_000).toFixed(1)}s`;
}

function openBlockersAndImportant(findings: readonly FindingRecord[]): readonly FindingRecord[] {
  return findings.filter(
    (r) => r.resolvedByIteration === null && r.finding.severity !== "suggestion",
  );
}

/** Human-readable summary printed for every terminal outcome. */
export function formatReport(report: TaskReport): string {
  const lines = [
    `Task ${report.taskId}: ${outcomeLabel(report.outcome)}`,
    `  Reason: ${report.reason}`,
    `  Final score: ${report.finalScore === null ? "n/a" : formatScore(report.finalScore)}` +
      (report.bestScore === null ? "" : ` (best ${formatScore(report.bestScore)})`),
    `  Iterations: ${String(report.iterationsCompleted)}`,
    `  Tokens: ${String(report.tokensSpent)}`,
    `  Cost: $${report.costUsd.toFixed(4)}`,
    `  Elapsed: ${formatDuration(report.elapsedMs)}`,
  ];

  const open = openBlockersAndImportant(report.findings);
  if (open.length > 0) {
    lines.push("  Open findings:");
    for (const record of open) {
      const { finding } = record;
      const location = finding.location ? ` (${finding.location})` : "";
      lines.push(`    - [${finding.severity.toUpperCase()}] ${finding.dimension}: ${finding.title}${location}`);
    }
  }

  return lines.join("\n");
}
