import fs from "node:fs";
import path from "node:path";
import { getStateDir } from "../config/paths.js";
import { logger } from "../config/logger.js";
import { appendJsonLine, writeJsonAtomic } from "../shared/atomicWrite.js";
import { outcomeLabel } from "../orchestration/taskReport.js";
import type { BudgetSnapshot, ProgressEvent, ProgressListener } from "../orchestration/types.js";

export const CURRENT_TASK_FILE = "current-task.json";
export const TASK_HISTORY_FILE = "task-history.jsonl";

export interface CurrentTaskState {
  readonly taskId: string;
  readonly status: "running" | "finished";
  readonly lastEvent: ProgressEvent["type"];
  readonly iteration: number | null;
  readonly lastScore: number | null;
  readonly budget: BudgetSnapshot;
  readonly updatedAt: string;
}

export interface TaskHistoryEntry {
  readonly taskId: string;
  readonly outcome: string;
  readonly reason: string;
  readonly finalScore: number | null;
  readonly bestScore: number | null;
  readonly iterations: number;
  readonly tokensSpent: number;
  /** Missing on lines written before cost tracking. */
  readonly costUsd?: number;
  readonly elapsedMs: number;
  readonly finishedAt: string;
}

function toCurrentState(event: ProgressEvent, budget: BudgetSnapshot, now: Date): CurrentTaskState {
  const updatedAt = now.toISOString();
  switch (event.type) {
    case "iteration_start":
    case "evaluation_skipped":
      return {
        taskId: event.taskId,
        status: "running",
        lastEvent: event.type,
        iteration: event.iteration,
        lastScore: null,
        budget,
        updatedAt,
      };
    case "cycle_sealed":
      return {
        taskId: event.taskId,
        status: "running",
        lastEvent: event.type,
        iteration: event.cycle.index,
        lastScore: event.cycle.aggregateScore,
        budget,
        updatedAt,
      };
    case "finished":
      return {
        taskId: event.report.taskId,
        status: "finished",
        lastEvent: event.type,
        iteration: event.report.iterationsCompleted,
        lastScore: event.report.finalScore,
        budget,
        updatedAt,
      };
  }
}

/**
 * Progress listener that mirrors the running task into `current-task.json`
 * and appends one line per finished task to `task-history.jsonl`.
 */
export function createTaskStateListener(
  stateDir: string = getStateDir(),
  clock: () => Date = () => new Date(),
): ProgressListener {
  const currentPath = path.join(stateDir, CURRENT_TASK_FILE);
  const historyPath = path.join(stateDir, TASK_HISTORY_FILE);

  return (event, budget) => {
    const now = clock();
    writeJsonAtomic(currentPath, toCurrentState(event, budget, now));

    if (event.type !== "finished") return;

    const { report } = event;
    const entry: TaskHistoryEntry = {
      taskId: report.taskId,
      outcome: outcomeLabel(report.outcome),
      reason: report.reason,
      finalScore: report.finalScore,
      bestScore: report.bestScore,
      iterations: report.iterationsCompleted,
      tokensSpent: report.tokensSpent,
      costUsd: report.costUsd,
      elapsedMs: report.elapsedMs,
      finishedAt: now.toISOString(),
    };
    appendJsonLine(historyPath, entry);
  };
}

function isHistoryEntry(value: unknown): value is TaskHistoryEntry {
  if (value === null || typeof value !== "object") return false;
  return (
    "taskId" in value &&
    typeof value.taskId === "string" &&
    "outcome" in value &&
    typeof value.outcome === "string" &&
    "reason" in value &&
    typeof value.reason === "string"
  );
}

/** Most recent entries last; malformed lines are skipped. */
export function readTaskHistory(stateDir: string = getStateDir(), limit?: number): readonly TaskHistoryEntry[] {
  const historyPath = path.join(stateDir, TASK_HISTORY_FILE);
  if (!fs.existsSync(historyPath)) return [];

  const entries: TaskHistoryEntry[] = [];
  const lines = fs.readFileSync(historyPath, "utf-8").split("\n");

  for (const [index, line] of lines.entries()) {
    if (line.trim().length === 0) continue;
    try {
      const parsed: unknown = JSON.parse(line);
      if (isHistoryEntry(parsed)) {
        entries.push(parsed);
      } else {
        logger.warn({ line: index + 1 }, "Skipping malformed task history entry");
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn({ line: index + 1, error: message }, "Skipping unparseable task history line");
    }
  }

  return limit === undefined ? entries : entries.slice(-limit);
}
