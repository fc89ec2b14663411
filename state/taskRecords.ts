import type BetterSqlite3 from "better-sqlite3";
import { describeOutcome, outcomeLabel } from "../orchestration/taskReport.js";
import type {
  FindingRecord,
  IterationCycle,
  MemoryStore,
  Severity,
  Task,
  TaskOutcome,
} from "../orchestration/types.js";

export interface StoredTask {
  readonly id: string;
  readonly sessionId: string;
  readonly description: string;
  readonly category: string | null;
  readonly outcome: string;
  readonly outcomeReason: string;
  readonly errorKind: string | null;
  readonly finalScore: number | null;
  readonly tokensSpent: number;
  readonly costUsd: number;
  readonly createdAt: string;
  readonly finishedAt: string;
}

export interface StoredCycle {
  readonly index: number;
  readonly artifactId: string;
  readonly score: number | null;
  readonly evaluated: boolean;
  readonly decision: string;
  readonly decisionDetail: string;
  readonly inputTokens: number;
  readonly outputTokens: number;
  readonly costUsd: number;
  readonly durationMs: number;
  readonly createdAt: string;
}

export interface StoredFinding {
  readonly iteration: number;
  readonly severity: Severity;
  readonly dimension: string;
  readonly title: string;
  readonly description: string;
  readonly location: string | null;
  readonly fix: string | null;
  readonly resolvedByIteration: number | null;
}

export interface StoredTaskRecords {
  readonly task: StoredTask;
  readonly cycles: readonly StoredCycle[];
  readonly findings: readonly StoredFinding[];
}

interface TaskRow {
  id: string;
  session_id: string;
  description: string;
  category: string | null;
  outcome: string;
  outcome_reason: string;
  error_kind: string | null;
  final_score: number | null;
  tokens_spent: number;
  cost_usd: number;
  created_at: string;
  finished_at: string;
}

interface CycleRow {
  iteration_index: number;
  artifact_id: string;
  score: number | null;
  evaluated: number;
  decision: string;
  decision_detail: string;
  input_tokens: number;
  output_tokens: number;
  cost_usd: number;
  duration_ms: number;
  created_at: string;
}

interface FindingRow {
  iteration_index: number;
  severity: Severity;
  dimension: string;
  title: string;
  description: string;
  location: string | null;
  fix: string | null;
  resolved_by_iteration: number | null;
}

const DEFAULT_RECENT_LIMIT = 20;

function finalScoreOf(cycles: readonly IterationCycle[]): number | null {
  for (let i = cycles.length - 1; i >= 0; i--) {
    const score = cycles[i]?.aggregateScore;
    if (score !== undefined && score !== null) return score;
  }
  return null;
}

/** Writes a finished task with all of its cycles and findings in one transaction. */
export function saveTaskRecords(
  db: BetterSqlite3.Database,
  task: Task,
  cycles: readonly IterationCycle[],
  findings: readonly FindingRecord[],
  outcome: TaskOutcome,
): void {
  const insertTask = db.prepare(
    `INSERT OR REPLACE INTO tasks
       (id, session_id, description, category, max_iterations, token_budget, time_budget_ms,
        quality_threshold, outcome, outcome_reason, error_kind, final_score, tokens_spent, cost_usd, created_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
  );
  const insertCycle = db.prepare(
    `INSERT INTO iteration_cycles
       (task_id, iteration_index, artifact_id, score, evaluated, decision, decision_detail,
        input_tokens, output_tokens, cost_usd, duration_ms, created_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
  );
  const insertFinding = db.prepare(
    `INSERT INTO findings
       (task_id, finding_index, iteration_index, severity, dimension, title, description,
        location, fix, resolved_by_iteration)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
  );

  const tokensSpent = cycles.reduce((sum, c) => sum + c.usage.inputTokens + c.usage.outputTokens, 0);
  const costUsd = cycles.reduce((sum, c) => sum + c.costUsd, 0);

  const write = db.transaction(() => {
    db.prepare("DELETE FROM findings WHERE task_id = ?").run(task.id);
    db.prepare("DELETE FROM iteration_cycles WHERE task_id = ?").run(task.id);

    insertTask.run(
      task.id,
      task.sessionId,
      task.description,
      task.category,
      task.limits.maxIterations,
      task.limits.tokenBudget,
      task.limits.timeBudgetMs,
      task.limits.qualityThreshold,
      outcomeLabel(outcome),
      describeOutcome(outcome),
      outcome.status === "failed" ? outcome.errorKind : null,
      finalScoreOf(cycles),
      tokensSpent,
      costUsd,
      task.createdAt,
    );

    for (const cycle of cycles) {
      insertCycle.run(
        task.id,
        cycle.index,
        cycle.artifactId,
        cycle.aggregateScore,
        cycle.evaluated ? 1 : 0,
        cycle.decision.type,
        JSON.stringify(cycle.decision),
        cycle.usage.inputTokens,
        cycle.usage.outputTokens,
        cycle.costUsd,
        Math.round(cycle.durationMs),
        cycle.createdAt,
      );
    }

    for (const record of findings) {
      insertFinding.run(
        task.id,
        record.id,
        record.iteration,
        record.finding.severity,
        record.finding.dimension,
        record.finding.title,
        record.finding.description,
        record.finding.location ?? null,
        record.finding.fix ?? null,
        record.resolvedByIteration,
      );
    }
  });

  write();
}

function mapTask(row: TaskRow): StoredTask {
  return {
    id: row.id,
    sessionId: row.session_id,
    description: row.description,
    category: row.category,
    outcome: row.outcome,
    outcomeReason: row.outcome_reason,
    errorKind: row.error_kind,
    finalScore: row.final_score,
    tokensSpent: row.tokens_spent,
    costUsd: row.cost_usd,
    createdAt: row.created_at,
    finishedAt: row.finished_at,
  };
}

export function loadTaskRecords(db: BetterSqlite3.Database, taskId: string): StoredTaskRecords | null {
  const taskRow = db.prepare("SELECT * FROM tasks WHERE id = ?").get(taskId) as TaskRow | undefined;
  if (!taskRow) return null;

  const cycleRows = db
    .prepare("SELECT * FROM iteration_cycles WHERE task_id = ? ORDER BY iteration_index ASC")
    .all(taskId) as CycleRow[];

  const findingRows = db
    .prepare("SELECT * FROM findings WHERE task_id = ? ORDER BY finding_index ASC")
    .all(taskId) as FindingRow[];

  return {
    task: mapTask(taskRow),
    cycles: cycleRows.map((row) => ({
      index: row.iteration_index,
      artifactId: row.artifact_id,
      score: row.score,
      evaluated: row.evaluated === 1,
      decision: row.decision,
      decisionDetail: row.decision_detail,
      inputTokens: row.input_tokens,
      outputTokens: row.output_tokens,
      costUsd: row.cost_usd,
      durationMs: row.duration_ms,
      createdAt: row.created_at,
    })),
    findings: findingRows.map((row) => ({
      iteration: row.iteration_index,
      severity: row.severity,
      dimension: row.dimension,
      title: row.title,
      description: row.description,
      location: row.location,
      fix: row.fix,
      resolvedByIteration: row.resolved_by_iteration,
    })),
  };
}

export function listRecentTasks(
  db: BetterSqlite3.Database,
  limit: number = DEFAULT_RECENT_LIMIT,
): readonly StoredTask[] {
  const rows = db
    .prepare("SELECT * FROM tasks ORDER BY finished_at DESC, created_at DESC LIMIT ?")
    .all(limit) as TaskRow[];
  return rows.map(mapTask);
}

export class SqliteMemoryStore implements MemoryStore {
  constructor(private readonly db: BetterSqlite3.Database) {}

  async record(
    task: Task,
    cycles: readonly IterationCycle[],
    findings: readonly FindingRecord[],
    outcome: TaskOutcome,
  ): Promise<void> {
    saveTaskRecords(this.db, task, cycles, findings, outcome);
  }
}
