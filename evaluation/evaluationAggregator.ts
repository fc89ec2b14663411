import { logger } from "../config/logger.js";
import { AgentError, errorMessage } from "../shared/errors.js";
import { withRetry } from "../shared/retry.js";
import type { RandomSource, RetryPolicy, Sleep } from "../shared/retry.js";
import type {
  Artifact,
  DimensionScore,
  DimensionWeight,
  EvaluationResult,
  EvaluatorSkill,
  Finding,
  Scorer,
  ScorerOutput,
  ScoringContext,
  TokenUsage,
} from "../orchestration/types.js";
import { assertWeightsSumToOne } from "./evaluatorSkill.js";

export const DEFAULT_BLOCKER_SCORE_CAP = 0.4;
const SCORE_PRECISION = 1e6;

export interface AggregatorOptions {
  readonly retryPolicy: RetryPolicy;
  readonly blockerScoreCap?: number;
  readonly sleep?: Sleep;
  readonly random?: RandomSource;
}

interface DimensionOutcome {
  readonly score: DimensionScore;
  readonly findings: readonly Finding[];
  readonly usage?: TokenUsage;
}

/**
 * Runs every scorer of the active evaluator skill in parallel and folds their
 * results into one capped aggregate score.
 */
export class EvaluationAggregator {
  private readonly scorersByDimension: ReadonlyMap<string, Scorer>;
  private readonly blockerScoreCap: number;

  constructor(
    private readonly skill: EvaluatorSkill,
    scorers: readonly Scorer[],
    private readonly options: AggregatorOptions,
  ) {
    assertWeightsSumToOne(skill);

    this.blockerScoreCap = options.blockerScoreCap ?? DEFAULT_BLOCKER_SCORE_CAP;
    if (this.blockerScoreCap < 0 || this.blockerScoreCap > 1) {
      throw new RangeError(`blockerScoreCap must be within [0, 1], got ${String(this.blockerScoreCap)}`);
    }

    const byDimension = new Map<string, Scorer>();
    for (const scorer of scorers) {
      if (byDimension.has(scorer.dimension)) {
        throw new Error(`More than one scorer registered for dimension "${scorer.dimension}"`);
      }
      byDimension.set(scorer.dimension, scorer);
    }

    const declared = new Set(skill.dimensions.map((d) => d.name));
    const unused = [...byDimension.keys()].filter((name) => !declared.has(name));
    if (unused.length > 0) {
      logger.debug({ skill: skill.name, unused }, "Scorers not used by evaluator skill");
    }

    this.scorersByDimension = byDimension;
  }

  getSkill(): EvaluatorSkill {
    return this.skill;
  }

  async evaluate(artifact: Artifact, context: ScoringContext): Promise<EvaluationResult> {
    const outcomes = await Promise.all(
      this.skill.dimensions.map((dimension) => this.scoreDimension(dimension, artifact, context)),
    );

    const dimensions = outcomes.map((o) => o.score);
    const findings = outcomes.flatMap((o) => o.findings);
    const usage = outcomes.reduce<TokenUsage>(
      (sum, o) => ({
        inputTokens: sum.inputTokens + (o.usage?.inputTokens ?? 0),
        outputTokens: sum.outputTokens + (o.usage?.outputTokens ?? 0),
      }),
      { inputTokens: 0, outputTokens: 0 },
    );

    const rawScore = roundScore(
      clampUnit(dimensions.reduce((sum, d) => sum + d.score * d.weight, 0)),
    );
    const hasBlocker = findings.some((f) => f.severity === "blocker");
    const capped = hasBlocker && rawScore > this.blockerScoreCap;
    const aggregateScore = capped ? this.blockerScoreCap : rawScore;

    logger.info(
      {
        taskId: context.task.id,
        iteration: context.iteration,
        skill: this.skill.name,
        rawScore,
        aggregateScore,
        capped,
        findings: findings.length,
        evaluationTokens: usage.inputTokens + usage.outputTokens,
      },
      "Evaluation aggregated",
    );

    return Object.freeze({
      aggregateScore,
      rawScore,
      capped,
      dimensions: Object.freeze(dimensions),
      findings: Object.freeze(findings),
      usage: Object.freeze(usage),
    });
  }

  private async scoreDimension(
    dimension: DimensionWeight,
    artifact: Artifact,
    context: ScoringContext,
  ): Promise<DimensionOutcome> {
    const scorer = this.scorersByDimension.get(dimension.name);
    if (!scorer) {
      logger.warn({ dimension: dimension.name, skill: this.skill.name }, "No scorer for dimension");
      return degraded(dimension, `No scorer is registered for dimension "${dimension.name}"`);
    }

    let output: ScorerOutput;
    try {
      output = await withRetry(
        async () => validateScorerOutput(await scorer.score(artifact, context), dimension.name),
        {
          policy: this.options.retryPolicy,
          label: `scorer:${dimension.name}`,
          signal: context.signal,
          sleep: this.options.sleep,
          random: this.options.random,
        },
      );
    } catch (error) {
      if (error instanceof AgentError && error.kind === "cancelled") throw error;

      logger.warn(
        { dimension: dimension.name, taskId: context.task.id, error: errorMessage(error) },
        "Scorer failed permanently, degrading dimension",
      );
      return degraded(dimension, `Scorer for "${dimension.name}" failed: ${errorMessage(error)}`);
    }

    const findings = output.findings.map((f) =>
      f.dimension.length > 0 ? f : { ...f, dimension: dimension.name },
    );

    return {
      score: { dimension: dimension.name, score: output.score, weight: dimension.weight, degraded: false },
      findings,
      usage: output.usage,
    };
  }
}

function validateScorerOutput(output: ScorerOutput, dimension: string): ScorerOutput {
  if (!Number.isFinite(output.score) || output.score < 0 || output.score > 1) {
    throw new AgentError(
      "provider",
      `Scorer for "${dimension}" returned an out-of-range score: ${String(output.score)}`,
      { transient: false },
    );
  }
  return output;
}

function degraded(dimension: DimensionWeight, description: string): DimensionOutcome {
  return {
    score: { dimension: dimension.name, score: 0, weight: dimension.weight, degraded: true },
    findings: [
      {
        severity: "blocker",
        dimension: dimension.name,
        title: "Scorer unavailable",
        description,
      },
    ],
  };
}

function clampUnit(value: number): number {
  return Math.min(1, Math.max(0, value));
}

export function roundScore(value: number): number {
  return Math.round(value * SCORE_PRECISION) / SCORE_PRECISION;
}
