import crypto from "node:crypto";
import type { Artifact } from "../orchestration/types.js";

export type EvaluationGateReason = "first_iteration" | "content_changed" | "empty_diff" | "identical_content";

export interface EvaluationGate {
  readonly evaluate: boolean;
  readonly reason: EvaluationGateReason;
}

/**
 * Skips evaluation only when the artifact is provably a no-op compared with
 * the previous iteration's. Anything short of proof means evaluate.
 */
export function shouldEvaluate(current: Artifact, previous: Artifact | null): EvaluationGate {
  if (previous === null) {
    return { evaluate: true, reason: "first_iteration" };
  }

  if (current.changes !== undefined && current.changes.length === 0) {
    return { evaluate: false, reason: "empty_diff" };
  }

  if (contentDigest(current) === contentDigest(previous)) {
    return { evaluate: false, reason: "identical_content" };
  }

  return { evaluate: true, reason: "content_changed" };
}

export function contentDigest(artifact: Artifact): string {
  return crypto.createHash("sha256").update(artifact.content, "utf-8").digest("hex");
}
