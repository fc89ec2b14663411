import { describe, it } from "node:test";
import assert from "node:assert/strict";
import type { ChatFn, ChatRequest } from "../../llm/client.js";
import { AgentError } from "../../shared/errors.js";
import type { EvaluatorSkill, ScoringContext, Task } from "../../orchestration/types.js";
import { LlmJudge, buildJudgeSystemPrompt, buildJudgeUserMessage } from "./llmJudgeScorer.js";

const SKILL: EvaluatorSkill = {
  name: "code",
  categories: ["code"],
  dimensions: [
    { name: "correctness", weight: 0.6, description: "Works" },
    { name: "security", weight: 0.4 },
  ],
};

const TASK: Task = {
  id: "task-1",
  description: "Add a login form",
  category: "code",
  sessionId: "s",
  limits: { maxIterations: 3, tokenBudget: 1_000, timeBudgetMs: 1_000, qualityThreshold: 0.8 },
  createdAt: "2026-01-01T00:00:00.000Z",
};

function context(iteration = 1): ScoringContext {
  return { task: TASK, iteration, skill: SKILL, signal: new AbortController().signal };
}

function fakeChat(replies: readonly string[]) {
  const requests: ChatRequest[] = [];
  const chat: ChatFn = async (request) => {
    requests.push(request);
    const text = replies[requests.length - 1] ?? replies[replies.length - 1] ?? "";
    return { text, usage: { inputTokens: 100, outputTokens: 20 } };
  };
  return { chat, requests };
}

const REPLY = `SCORES:
correctness: 0.9
security: 0.3
FINDINGS:
- [BLOCKER][security] Plaintext password: stored without hashing
- [SUGGESTION] Label the submit button
SUGGESTION: Hash passwords.`;

describe("evaluation/scorers/llmJudgeScorer", () => {
  it("should make one judge call shared by every dimension", async () => {
    const { chat, requests } = fakeChat([REPLY]);
    const judge = new LlmJudge(chat);
    const [correctness, security] = judge.scorers(["correctness", "security"]);
    const artifact = { id: "a1", content: "<form></form>" };

    assert.ok(correctness && security);
    const [c, s] = await Promise.all([
      correctness.score(artifact, context()),
      security.score(artifact, context()),
    ]);

    assert.equal(requests.length, 1);
    assert.equal(c.score, 0.9);
    assert.deepEqual(c.findings, [
      { severity: "suggestion", dimension: "correctness", title: "Label the submit button", description: "" },
    ]);
    assert.equal(s.score, 0.3);
    assert.deepEqual(s.findings, [
      {
        severity: "blocker",
        dimension: "security",
        title: "Plaintext password",
        description: "stored without hashing",
      },
    ]);
  });

  it("should report the shared call's usage on one dimension only", async () => {
    const { chat } = fakeChat([REPLY]);
    const judge = new LlmJudge(chat);
    const [correctness, security] = judge.scorers(["correctness", "security"]);
    const artifact = { id: "a1", content: "<form></form>" };

    assert.ok(correctness && security);
    const outputs = await Promise.all([
      correctness.score(artifact, context()),
      security.score(artifact, context()),
    ]);

    assert.deepEqual(
      outputs.map((o) => o.usage),
      [{ inputTokens: 100, outputTokens: 20 }, undefined],
    );
  });

  it("should call the judge again for a new iteration", async () => {
    const { chat, requests } = fakeChat([REPLY]);
    const scorer = new LlmJudge(chat).scorerFor("correctness");

    await scorer.score({ id: "a1", content: "x" }, context(1));
    await scorer.score({ id: "a2", content: "y" }, context(2));

    assert.equal(requests.length, 2);
  });

  it("should raise a permanent error when its dimension is missing", async () => {
    const { chat } = fakeChat(["SCORES:\ncorrectness: 0.9"]);
    const scorer = new LlmJudge(chat).scorerFor("security");

    await assert.rejects(
      () => scorer.score({ id: "a1", content: "x" }, context()),
      (error: unknown) => error instanceof AgentError && !error.isTransient(),
    );
  });

  it("should raise a transient error and retry the call when the reply has no scores", async () => {
    const { chat, requests } = fakeChat(["I am not sure.", REPLY]);
    const scorer = new LlmJudge(chat).scorerFor("correctness");
    const artifact = { id: "a1", content: "x" };

    await assert.rejects(
      () => scorer.score(artifact, context()),
      (error: unknown) => error instanceof AgentError && error.isTransient(),
    );
    const output = await scorer.score(artifact, context());

    assert.equal(requests.length, 2);
    assert.equal(output.score, 0.9);
  });

  describe("prompts", () => {
    it("should list every dimension in the rubric", () => {
      const prompt = buildJudgeSystemPrompt(SKILL);

      assert.ok(prompt.includes("- correctness (weight 0.60): Works"));
      assert.ok(prompt.includes("- security (weight 0.40)\n"));
    });

    it("should truncate long artifacts", () => {
      const message = buildJudgeUserMessage("Task", { id: "a", content: "abcdef" }, 4);

      assert.equal(message, "Task:\nTask\n\nOutput to evaluate:\nabcd\n[... truncated 2 chars]");
    });
  });
});
