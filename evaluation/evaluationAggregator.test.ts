import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { AgentError, EvaluatorSkillError } from "../shared/errors.js";
import type { RetryPolicy } from "../shared/retry.js";
import type { Artifact, EvaluatorSkill, Finding, Scorer, ScorerOutput, ScoringContext, Task } from "../orchestration/types.js";
import { EvaluationAggregator, roundScore } from "./evaluationAggregator.js";

const SKILL: EvaluatorSkill = {
  name: "triple",
  categories: [],
  dimensions: [
    { name: "a", weight: 0.5 },
    { name: "b", weight: 0.3 },
    { name: "c", weight: 0.2 },
  ],
};

const POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1_000,
  backoffFactor: 2,
  maxDelayMs: 10_000,
  jitterFraction: 0,
};

const TASK: Task = {
  id: "task-1",
  description: "Summarise the notes",
  category: null,
  sessionId: "s1",
  limits: { maxIterations: 3, tokenBudget: 10_000, timeBudgetMs: 60_000, qualityThreshold: 0.8 },
  createdAt: "2026-01-01T00:00:00.000Z",
};

const ARTIFACT: Artifact = { id: "art-1", content: "summary" };

function context(signal: AbortSignal = new AbortController().signal): ScoringContext {
  return { task: TASK, iteration: 1, skill: SKILL, signal };
}

function fixed(dimension: string, score: number, findings: readonly Finding[] = []): Scorer {
  return { dimension, score: () => Promise.resolve({ score, findings }) };
}

function failing(dimension: string, error: Error): Scorer {
  return { dimension, score: () => Promise.reject(error) };
}

function blocker(dimension: string): Finding {
  return { severity: "blocker", dimension, title: "Broken", description: "Does not work" };
}

function createAggregator(scorers: readonly Scorer[], sleeps: number[] = []): EvaluationAggregator {
  return new EvaluationAggregator(SKILL, scorers, {
    retryPolicy: POLICY,
    sleep: (ms) => {
      sleeps.push(ms);
      return Promise.resolve();
    },
    random: () => 0.5,
  });
}

describe("evaluation/evaluationAggregator", () => {
  it("should compute the weighted sum of dimension scores", async () => {
    const aggregator = createAggregator([fixed("a", 0.8), fixed("b", 0.6), fixed("c", 1)]);

    const result = await aggregator.evaluate(ARTIFACT, context());

    assert.equal(result.aggregateScore, 0.78);
    assert.equal(result.rawScore, 0.78);
    assert.equal(result.capped, false);
    assert.deepEqual(
      result.dimensions.map((d) => [d.dimension, d.score, d.weight, d.degraded]),
      [
        ["a", 0.8, 0.5, false],
        ["b", 0.6, 0.3, false],
        ["c", 1, 0.2, false],
      ],
    );
  });

  it("should cap the aggregate when any blocker is reported", async () => {
    const aggregator = createAggregator([fixed("a", 0.8, [blocker("a")]), fixed("b", 0.6), fixed("c", 1)]);

    const result = await aggregator.evaluate(ARTIFACT, context());

    assert.equal(result.rawScore, 0.78);
    assert.equal(result.aggregateScore, 0.4);
    assert.equal(result.capped, true);
  });

  it("should leave a score below the cap untouched", async () => {
    const aggregator = createAggregator([fixed("a", 0.2, [blocker("a")]), fixed("b", 0.2), fixed("c", 0.6)]);

    const result = await aggregator.evaluate(ARTIFACT, context());

    assert.equal(result.aggregateScore, 0.28);
    assert.equal(result.capped, false);
  });

  it("should degrade a dimension whose scorer fails permanently", async () => {
    const aggregator = createAggregator([
      fixed("a", 0.8),
      fixed("b", 0.6),
      failing("c", new AgentError("auth", "bad key")),
    ]);

    const result = await aggregator.evaluate(ARTIFACT, context());

    assert.deepEqual(result.dimensions[2], { dimension: "c", score: 0, weight: 0.2, degraded: true });
    assert.deepEqual(result.findings, [
      { severity: "blocker", dimension: "c", title: "Scorer unavailable", description: 'Scorer for "c" failed: bad key' },
    ]);
    assert.equal(result.rawScore, 0.58);
    assert.equal(result.aggregateScore, 0.4);
  });

  it("should degrade a dimension that has no scorer", async () => {
    const aggregator = createAggregator([fixed("a", 1), fixed("b", 1)]);

    const result = await aggregator.evaluate(ARTIFACT, context());

    assert.equal(result.dimensions[2]?.degraded, true);
    assert.equal(result.findings[0]?.description, 'No scorer is registered for dimension "c"');
  });

  it("should retry transient scorer failures with backoff", async () => {
    let calls = 0;
    const flaky: Scorer = {
      dimension: "a",
      score: (): Promise<ScorerOutput> => {
        calls += 1;
        return calls === 1
          ? Promise.reject(new AgentError("timeout", "judge timed out"))
          : Promise.resolve({ score: 1, findings: [] });
      },
    };
    const sleeps: number[] = [];
    const aggregator = createAggregator([flaky, fixed("b", 1), fixed("c", 1)], sleeps);

    const result = await aggregator.evaluate(ARTIFACT, context());

    assert.equal(calls, 2);
    assert.deepEqual(sleeps, [1_000]);
    assert.equal(result.aggregateScore, 1);
  });

  it("should treat an out-of-range score as a permanent failure", async () => {
    let calls = 0;
    const broken: Scorer = {
      dimension: "b",
      score: () => {
        calls += 1;
        return Promise.resolve({ score: 1.5, findings: [] });
      },
    };
    const aggregator = createAggregator([fixed("a", 1), broken, fixed("c", 1)]);

    const result = await aggregator.evaluate(ARTIFACT, context());

    assert.equal(calls, 1);
    assert.equal(result.dimensions[1]?.degraded, true);
  });

  it("should attribute findings without a dimension to the scorer's dimension", async () => {
    const aggregator = createAggregator([
      fixed("a", 1),
      fixed("b", 1, [{ severity: "suggestion", dimension: "", title: "Shorter intro", description: "" }]),
      fixed("c", 1),
    ]);

    const result = await aggregator.evaluate(ARTIFACT, context());

    assert.equal(result.findings[0]?.dimension, "b");
  });

  it("should propagate cancellation instead of degrading", async () => {
    const aggregator = createAggregator([
      fixed("a", 1),
      failing("b", new AgentError("cancelled", "stop")),
      fixed("c", 1),
    ]);

    await assert.rejects(aggregator.evaluate(ARTIFACT, context()), { name: "AgentError", message: "stop" });
  });

  it("should sum the token usage reported by scorers", async () => {
    const withUsage = (dimension: string, inputTokens: number, outputTokens: number): Scorer => ({
      dimension,
      score: () => Promise.resolve({ score: 1, findings: [], usage: { inputTokens, outputTokens } }),
    });
    const aggregator = createAggregator([withUsage("a", 300, 40), withUsage("b", 200, 10), fixed("c", 1)]);

    const result = await aggregator.evaluate(ARTIFACT, context());

    assert.deepEqual(result.usage, { inputTokens: 500, outputTokens: 50 });
  });

  it("should not count usage from a degraded dimension", async () => {
    const aggregator = createAggregator([
      fixed("a", 1),
      { dimension: "b", score: () => Promise.resolve({ score: 2, findings: [], usage: { inputTokens: 90, outputTokens: 9 } }) },
      fixed("c", 1),
    ]);

    const result = await aggregator.evaluate(ARTIFACT, context());

    assert.deepEqual(result.usage, { inputTokens: 0, outputTokens: 0 });
  });

  it("should run dimension scorers concurrently", async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const gated = (dimension: string): Scorer => ({
      dimension,
      score: async () => {
        inFlight += 1;
        maxInFlight = Math.max(maxInFlight, inFlight);
        await new Promise<void>((resolve) => setImmediate(resolve));
        inFlight -= 1;
        return { score: 1, findings: [] };
      },
    });
    const skill: EvaluatorSkill = {
      name: "pair",
      categories: [],
      dimensions: [
        { name: "a", weight: 0.5 },
        { name: "b", weight: 0.5 },
      ],
    };
    const aggregator = new EvaluationAggregator(skill, [gated("a"), gated("b")], { retryPolicy: POLICY });

    const result = await aggregator.evaluate(ARTIFACT, { ...context(), skill });

    assert.equal(maxInFlight, 2);
    assert.equal(result.aggregateScore, 1);
  });

  it("should reject skills whose weights do not sum to one", () => {
    const skill: EvaluatorSkill = { name: "bad", categories: [], dimensions: [{ name: "a", weight: 0.5 }] };

    assert.throws(() => new EvaluationAggregator(skill, [], { retryPolicy: POLICY }), EvaluatorSkillError);
  });

  it("should reject two scorers for one dimension", () => {
    assert.throws(
      () => createAggregator([fixed("a", 1), fixed("a", 0)]),
      { message: 'More than one scorer registered for dimension "a"' },
    );
  });

  it("should round to six decimal places", () => {
    assert.equal(roundScore(0.1 + 0.2), 0.3);
    assert.equal(roundScore(0.1234567), 0.123457);
  });
});
