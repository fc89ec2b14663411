import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { AgentError } from "./errors.js";
import { DEFAULT_RETRY_POLICY, abortableSleep, computeBackoffDelay, withRetry } from "./retry.js";
import type { Sleep } from "./retry.js";

function recordingSleep(delays: number[]): Sleep {
  return (ms) => {
    delays.push(ms);
    return Promise.resolve();
  };
}

describe("shared/retry", () => {
  describe("computeBackoffDelay", () => {
    it("should grow exponentially from the initial delay", () => {
      const mid = (): number => 0.5;

      assert.equal(computeBackoffDelay(1, DEFAULT_RETRY_POLICY, mid), 2_000);
      assert.equal(computeBackoffDelay(2, DEFAULT_RETRY_POLICY, mid), 4_000);
      assert.equal(computeBackoffDelay(3, DEFAULT_RETRY_POLICY, mid), 8_000);
    });

    it("should apply jitter around the base delay", () => {
      assert.equal(computeBackoffDelay(3, DEFAULT_RETRY_POLICY, () => 0), 6_400);
      assert.equal(computeBackoffDelay(3, DEFAULT_RETRY_POLICY, () => 0.75), 8_800);
    });

    it("should cap the delay", () => {
      assert.equal(computeBackoffDelay(10, DEFAULT_RETRY_POLICY, () => 0.5), 30_000);
    });

    it("should honour a server-provided retry-after", () => {
      assert.equal(computeBackoffDelay(1, DEFAULT_RETRY_POLICY, () => 0.5, 5_000), 5_100);
    });

    it("should never go below the minimum delay", () => {
      const policy = { ...DEFAULT_RETRY_POLICY, initialDelayMs: 10, jitterFraction: 0 };

      assert.equal(computeBackoffDelay(1, policy), 100);
    });
  });

  describe("withRetry", () => {
    it("should retry transient failures until success", async () => {
      const delays: number[] = [];
      const retries: number[] = [];
      let calls = 0;

      const result = await withRetry(
        () => {
          calls += 1;
          return calls < 3 ? Promise.reject(new AgentError("rate_limited", "slow down")) : Promise.resolve("ok");
        },
        {
          policy: DEFAULT_RETRY_POLICY,
          label: "op",
          sleep: recordingSleep(delays),
          random: () => 0.5,
          onRetry: (attempt) => retries.push(attempt),
        },
      );

      assert.equal(result, "ok");
      assert.deepEqual(delays, [2_000, 4_000]);
      assert.deepEqual(retries, [1, 2]);
    });

    it("should stop at the first non-transient failure", async () => {
      let calls = 0;

      await assert.rejects(
        withRetry(
          () => {
            calls += 1;
            return Promise.reject(new AgentError("auth", "invalid key"));
          },
          { policy: DEFAULT_RETRY_POLICY, label: "op", sleep: recordingSleep([]) },
        ),
        { name: "AgentError", kind: "auth", message: "invalid key" },
      );
      assert.equal(calls, 1);
    });

    it("should give up as non-transient after the attempt ceiling", async () => {
      const policy = { ...DEFAULT_RETRY_POLICY, maxAttempts: 2 };

      const error = await withRetry(() => Promise.reject(new Error("request timed out")), {
        policy,
        label: "op",
        sleep: recordingSleep([]),
        random: () => 0.5,
      }).then(
        () => null,
        (e: unknown) => e,
      );

      assert.ok(error instanceof AgentError);
      assert.equal(error.kind, "timeout");
      assert.equal(error.message, "op failed after 2 attempts: request timed out");
      assert.equal(error.isTransient(), false);
    });

    it("should not start when the signal is already aborted", async () => {
      const controller = new AbortController();
      controller.abort();
      let calls = 0;

      await assert.rejects(
        withRetry(
          () => {
            calls += 1;
            return Promise.resolve(1);
          },
          { policy: DEFAULT_RETRY_POLICY, label: "op", signal: controller.signal },
        ),
        { kind: "cancelled", message: "op cancelled" },
      );
      assert.equal(calls, 0);
    });
  });

  describe("abortableSleep", () => {
    it("should reject immediately when already aborted", async () => {
      const controller = new AbortController();
      controller.abort();

      await assert.rejects(abortableSleep(10_000, controller.signal), {
        kind: "cancelled",
        message: "Cancelled before retry delay",
      });
    });

    it("should reject when aborted while waiting", async () => {
      const controller = new AbortController();
      const pending = abortableSleep(10_000, controller.signal);

      controller.abort();

      await assert.rejects(pending, { message: "Cancelled during retry delay" });
    });

    it("should resolve after the delay", async () => {
      await abortableSleep(1);
    });
  });
});
