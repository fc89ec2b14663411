import type { AgentErrorKind } from "../shared/errors.js";

export interface TaskLimits {
  readonly maxIterations: number;
  readonly tokenBudget: number;
  readonly timeBudgetMs: number;
  readonly qualityThreshold: number;
}

export interface Task {
  readonly id: string;
  readonly description: string;
  readonly category: string | null;
  readonly sessionId: string;
  readonly limits: TaskLimits;
  readonly createdAt: string;
}

export interface TokenUsage {
  readonly inputTokens: number;
  readonly outputTokens: number;
}

export type Severity = "suggestion" | "important" | "blocker";

export interface Finding {
  readonly severity: Severity;
  readonly dimension: string;
  readonly title: string;
  readonly description: string;
  readonly location?: string;
  readonly fix?: string;
}

export interface DimensionWeight {
  readonly name: string;
  readonly weight: number;
  readonly description?: string;
}

export interface EvaluatorSkill {
  readonly name: string;
  readonly categories: readonly string[];
  readonly dimensions: readonly DimensionWeight[];
}

export interface DimensionScore {
  readonly dimension: string;
  readonly score: number;
  readonly weight: number;
  readonly degraded: boolean;
}

export interface EvaluationResult {
  readonly aggregateScore: number;
  readonly rawScore: number;
  readonly capped: boolean;
  readonly dimensions: readonly DimensionScore[];
  readonly findings: readonly Finding[];
  readonly usage: TokenUsage;
}

export interface PlanStep {
  readonly description: string;
}

export interface Plan {
  readonly summary: string;
  readonly steps: readonly PlanStep[];
  readonly usage?: TokenUsage;
}

export interface Artifact {
  readonly id: string;
  readonly content: string;
  /** Files or regions touched. An explicitly empty list means no-op. */
  readonly changes?: readonly string[];
}

export interface ExecutionOutcome {
  readonly artifact: Artifact;
  readonly usage: TokenUsage;
  readonly durationMs: number;
}

export interface CircuitBreakerState {
  readonly tokensSpent: number;
  readonly elapsedMs: number;
  readonly iterationsCompleted: number;
  readonly bestScore: number | null;
  readonly costUsd: number;
}

export interface BudgetSnapshot extends CircuitBreakerState {
  readonly tokenBudget: number;
  readonly timeBudgetMs: number;
  /** `null` when no spending cap is configured. */
  readonly costBudgetUsd: number | null;
}

export type BudgetBreaker = "tokens" | "cost" | "time";

export type IterationDecision =
  | { readonly type: "continue" }
  | { readonly type: "quality_met"; readonly score: number; readonly threshold: number }
  | { readonly type: "regression"; readonly score: number; readonly previousScore: number }
  | {
      readonly type: "budget_exhausted";
      readonly breaker: BudgetBreaker;
      readonly preflight: boolean;
    }
  | { readonly type: "max_iterations_reached"; readonly maxIterations: number };

export type StopDecision = Exclude<IterationDecision, { readonly type: "continue" }>;

export interface IterationCycle {
  readonly index: number;
  readonly taskId: string;
  readonly artifactId: string;
  readonly aggregateScore: number | null;
  readonly evaluated: boolean;
  readonly decision: IterationDecision;
  readonly usage: TokenUsage;
  readonly costUsd: number;
  readonly durationMs: number;
  readonly createdAt: string;
}

export type TaskOutcome =
  | { readonly status: "stopped"; readonly decision: StopDecision }
  | {
      readonly status: "failed";
      readonly errorKind: AgentErrorKind | "invalid_skill";
      readonly message: string;
    }
  | { readonly status: "cancelled" };

export type EnginePhase =
  | { readonly phase: "awaiting_first_iteration" }
  | { readonly phase: "iterating"; readonly iteration: number }
  | { readonly phase: "finished"; readonly outcome: TaskOutcome };

export interface FindingRecord {
  readonly id: number;
  readonly iteration: number;
  readonly finding: Finding;
  readonly resolvedByIteration: number | null;
}

export interface TaskReport {
  readonly taskId: string;
  readonly outcome: TaskOutcome;
  readonly reason: string;
  readonly finalScore: number | null;
  readonly bestScore: number | null;
  readonly iterationsCompleted: number;
  readonly tokensSpent: number;
  readonly costUsd: number;
  readonly elapsedMs: number;
  readonly cycles: readonly IterationCycle[];
  readonly findings: readonly FindingRecord[];
  readonly bestArtifact: Artifact | null;
}

export interface IterationContext {
  readonly task: Task;
  readonly iteration: number;
  readonly previousArtifact: Artifact | null;
  readonly previousFindings: readonly Finding[];
  readonly signal: AbortSignal;
}

export interface Planner {
  plan(task: Task, context: IterationContext): Promise<Plan>;
}

export interface Executor {
  execute(plan: Plan, context: IterationContext): Promise<ExecutionOutcome>;
}

export interface ScorerOutput {
  readonly score: number;
  readonly findings: readonly Finding[];
  /** Model tokens spent producing this score, if any. */
  readonly usage?: TokenUsage;
}

export interface ScoringContext {
  readonly task: Task;
  readonly iteration: number;
  readonly skill: EvaluatorSkill;
  readonly signal: AbortSignal;
}

export interface Scorer {
  readonly dimension: string;
  score(artifact: Artifact, context: ScoringContext): Promise<ScorerOutput>;
}

export interface SkillSelector {
  select(task: Task): EvaluatorSkill;
}

export interface MemoryStore {
  record(
    task: Task,
    cycles: readonly IterationCycle[],
    findings: readonly FindingRecord[],
    outcome: TaskOutcome,
  ): Promise<void>;
}

export type ProgressEvent =
  | { readonly type: "iteration_start"; readonly taskId: string; readonly iteration: number }
  | { readonly type: "evaluation_skipped"; readonly taskId: string; readonly iteration: number }
  | { readonly type: "cycle_sealed"; readonly taskId: string; readonly cycle: IterationCycle }
  | { readonly type: "finished"; readonly report: TaskReport };

export type ProgressListener = (event: ProgressEvent, budget: BudgetSnapshot) => void;
