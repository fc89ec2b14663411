import type { EngineConfig } from "../config/iteration.js";
import { logger } from "../config/logger.js";
import { FALLBACK_TOKEN_PRICE, costOfUsage } from "../config/pricing.js";
import type { TokenPrice } from "../config/pricing.js";
import { EvaluationAggregator } from "../evaluation/evaluationAggregator.js";
import { FindingLedger } from "../evaluation/findingLedger.js";
import { shouldEvaluate } from "../evaluation/shouldEvaluate.js";
import { EvaluatorSkillError, classifyError, errorMessage } from "../shared/errors.js";
import { withRetry } from "../shared/retry.js";
import type { RandomSource, Sleep } from "../shared/retry.js";
import { BudgetTracker } from "./budgetTracker.js";
import { decide, isTerminal } from "./decisionMachine.js";
import { ScoreHistory } from "./scoreHistory.js";
import { describeOutcome } from "./taskReport.js";
import type {
  Artifact,
  EnginePhase,
  EvaluationResult,
  ExecutionOutcome,
  Executor,
  IterationContext,
  IterationCycle,
  MemoryStore,
  Plan,
  Planner,
  ProgressEvent,
  ProgressListener,
  Scorer,
  SkillSelector,
  Task,
  TaskOutcome,
  TaskReport,
  TokenUsage,
} from "./types.js";

export type EngineSettings = Pick<
  EngineConfig,
  "regressionEpsilon" | "blockerScoreCap" | "scorerRetry" | "executorRetry" | "maxCostUsd"
> & {
  /** Price of the configured model; the fallback price when omitted. */
  readonly tokenPrice?: TokenPrice;
};

export interface IterationEngineDeps {
  readonly planner: Planner;
  readonly executor: Executor;
  readonly skillSelector: SkillSelector;
  readonly scorers: readonly Scorer[];
  readonly memoryStore?: MemoryStore;
  readonly onProgress?: ProgressListener;
  readonly sleep?: Sleep;
  readonly random?: RandomSource;
  readonly now?: () => number;
}

const ZERO_USAGE: TokenUsage = { inputTokens: 0, outputTokens: 0 };

/**
 * Drives one task through plan, execute, evaluate and decide until a
 * terminal outcome. One instance per task; `run` may be called once.
 */
export class IterationEngine {
  private readonly budget: BudgetTracker;
  private readonly history = new ScoreHistory();
  private readonly ledger = new FindingLedger();
  private readonly cycles: IterationCycle[] = [];
  private readonly now: () => number;
  private phase: EnginePhase = { phase: "awaiting_first_iteration" };
  private started = false;
  private startedAt = 0;
  private bestArtifact: Artifact | null = null;
  private readonly tokenPrice: TokenPrice;

  constructor(
    private readonly task: Task,
    private readonly settings: EngineSettings,
    private readonly deps: IterationEngineDeps,
  ) {
    this.budget = new BudgetTracker(task.limits, settings.maxCostUsd);
    this.tokenPrice = settings.tokenPrice ?? FALLBACK_TOKEN_PRICE;
    this.now = deps.now ?? Date.now;
  }

  getPhase(): EnginePhase {
    return this.phase;
  }

  async run(signal: AbortSignal = new AbortController().signal): Promise<TaskReport> {
    if (this.started) {
      throw new Error(`Task ${this.task.id} has already been run`);
    }
    this.started = true;
    this.startedAt = this.now();

    logger.info(
      { taskId: this.task.id, category: this.task.category, limits: this.task.limits },
      "Task started",
    );

    let aggregator: EvaluationAggregator;
    try {
      const skill = this.deps.skillSelector.select(this.task);
      aggregator = new EvaluationAggregator(skill, this.deps.scorers, {
        retryPolicy: this.settings.scorerRetry,
        blockerScoreCap: this.settings.blockerScoreCap,
        sleep: this.deps.sleep,
        random: this.deps.random,
      });
    } catch (error) {
      const errorKind = error instanceof EvaluatorSkillError ? "invalid_skill" : classifyError(error).kind;
      logger.error({ taskId: this.task.id, error: errorMessage(error) }, "Evaluator skill rejected");
      return this.finish({ status: "failed", errorKind, message: errorMessage(error) });
    }

    let previousArtifact: Artifact | null = null;

    for (let iteration = 1; ; iteration++) {
      if (signal.aborted) {
        return this.finish({ status: "cancelled" });
      }

      const estimate = this.budget.nextIterationEstimate();
      const preflightBreaker = this.budget.breakerFor(estimate.tokens, estimate.durationMs, estimate.costUsd);
      if (preflightBreaker !== null) {
        logger.warn(
          { taskId: this.task.id, iteration, estimate, budget: this.budget.snapshot() },
          "Pre-flight budget check failed, not starting iteration",
        );
        return this.finish({
          status: "stopped",
          decision: { type: "budget_exhausted", breaker: preflightBreaker, preflight: true },
        });
      }

      this.phase = { phase: "iterating", iteration };
      this.emit({ type: "iteration_start", taskId: this.task.id, iteration });

      const iterationStart = this.now();
      const context: IterationContext = {
        task: this.task,
        iteration,
        previousArtifact,
        previousFindings: this.ledger.openFindings(),
        signal,
      };

      let plan: Plan;
      let execution: ExecutionOutcome;
      try {
        plan = await this.callWithRetry("planner", () => this.deps.planner.plan(this.task, context), signal);
        execution = await this.callWithRetry("executor", () => this.deps.executor.execute(plan, context), signal);
      } catch (error) {
        return this.finishOnError(error, signal, iteration);
      }

      const artifact = execution.artifact;
      const lastEvaluated = this.history.latest();
      const gate = shouldEvaluate(artifact, previousArtifact);

      let evaluation: EvaluationResult | null = null;
      let score: number;
      if (gate.evaluate || lastEvaluated === null) {
        try {
          evaluation = await aggregator.evaluate(artifact, {
            task: this.task,
            iteration,
            skill: aggregator.getSkill(),
            signal,
          });
        } catch (error) {
          return this.finishOnError(error, signal, iteration);
        }
        score = evaluation.aggregateScore;
        this.history.push(score);
      } else {
        logger.info({ taskId: this.task.id, iteration, reason: gate.reason }, "Evaluation skipped");
        this.emit({ type: "evaluation_skipped", taskId: this.task.id, iteration });
        score = lastEvaluated;
      }

      const usage = sumUsage(plan.usage ?? ZERO_USAGE, execution.usage, evaluation?.usage ?? ZERO_USAGE);
      const costUsd = costOfUsage(usage, this.tokenPrice);
      const durationMs = Math.max(execution.durationMs, this.now() - iterationStart);
      this.budget.record(usage.inputTokens + usage.outputTokens, durationMs, costUsd);

      if (evaluation) {
        this.budget.observeScore(score);
        this.ledger.resolveAbsent(iteration, evaluation.findings);
        this.ledger.append(iteration, evaluation.findings);
        if (this.isBestSoFar(score)) this.bestArtifact = artifact;
      }

      const decision = decide({
        iterationIndex: iteration,
        aggregateScore: score,
        previousScore: lastEvaluated,
        budget: this.budget.snapshot(),
        limits: this.task.limits,
        regressionEpsilon: this.settings.regressionEpsilon,
        projectedBreaker: this.budget.projectedBreaker(),
      });

      const cycle: IterationCycle = Object.freeze({
        index: iteration,
        taskId: this.task.id,
        artifactId: artifact.id,
        aggregateScore: evaluation ? score : null,
        evaluated: evaluation !== null,
        decision,
        usage,
        costUsd,
        durationMs,
        createdAt: new Date(iterationStart).toISOString(),
      });
      this.cycles.push(cycle);
      this.emit({ type: "cycle_sealed", taskId: this.task.id, cycle });

      logger.info(
        {
          taskId: this.task.id,
          iteration,
          score,
          evaluated: cycle.evaluated,
          decision: decision.type,
          tokensSpent: this.budget.state().tokensSpent,
          costUsd: this.budget.state().costUsd,
        },
        "Iteration sealed",
      );

      if (isTerminal(decision)) {
        return this.finish({ status: "stopped", decision });
      }

      previousArtifact = artifact;
    }
  }

  private isBestSoFar(score: number): boolean {
    const best = this.history.best();
    return best === null || score >= best;
  }

  private callWithRetry<T>(label: string, operation: () => Promise<T>, signal: AbortSignal): Promise<T> {
    return withRetry(operation, {
      policy: this.settings.executorRetry,
      label: `${label}:${this.task.id}`,
      signal,
      sleep: this.deps.sleep,
      random: this.deps.random,
    });
  }

  private async finishOnError(error: unknown, signal: AbortSignal, iteration: number): Promise<TaskReport> {
    const classified = classifyError(error);
    if (signal.aborted || classified.kind === "cancelled") {
      return this.finish({ status: "cancelled" });
    }

    logger.error(
      { taskId: this.task.id, iteration, kind: classified.kind, error: classified.message },
      "Iteration failed",
    );
    return this.finish({ status: "failed", errorKind: classified.kind, message: classified.message });
  }

  private async finish(outcome: TaskOutcome): Promise<TaskReport> {
    this.phase = { phase: "finished", outcome };
    const state = this.budget.state();

    const report: TaskReport = Object.freeze({
      taskId: this.task.id,
      outcome,
      reason: describeOutcome(outcome),
      finalScore: this.history.latest(),
      bestScore: state.bestScore,
      iterationsCompleted: state.iterationsCompleted,
      tokensSpent: state.tokensSpent,
      costUsd: state.costUsd,
      elapsedMs: Math.max(state.elapsedMs, this.now() - this.startedAt),
      cycles: Object.freeze([...this.cycles]),
      findings: this.ledger.records(),
      bestArtifact: this.bestArtifact,
    });

    if (this.deps.memoryStore) {
      try {
        await this.deps.memoryStore.record(this.task, report.cycles, report.findings, outcome);
      } catch (error) {
        logger.warn({ taskId: this.task.id, error: errorMessage(error) }, "Failed to persist task records");
      }
    }

    logger.info(
      {
        taskId: this.task.id,
        outcome: outcome.status,
        reason: report.reason,
        iterations: report.iterationsCompleted,
        finalScore: report.finalScore,
        tokensSpent: report.tokensSpent,
        costUsd: report.costUsd,
      },
      "Task finished",
    );

    this.emit({ type: "finished", report });
    return report;
  }

  private emit(event: ProgressEvent): void {
    if (!this.deps.onProgress) return;
    try {
      this.deps.onProgress(event, this.budget.snapshot());
    } catch (error) {
      logger.warn({ taskId: this.task.id, event: event.type, error: errorMessage(error) }, "Progress listener failed");
    }
  }
}

function sumUsage(...parts: readonly TokenUsage[]): TokenUsage {
  return parts.reduce(
    (sum, part) => ({
      inputTokens: sum.inputTokens + part.inputTokens,
      outputTokens: sum.outputTokens + part.outputTokens,
    }),
    ZERO_USAGE,
  );
}
