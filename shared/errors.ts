export type AgentErrorKind =
  | "rate_limited"
  | "timeout"
  | "transport"
  | "overflow"
  | "auth"
  | "invalid_request"
  | "provider"
  | "cancelled";

const TRANSIENT_KINDS: ReadonlySet<AgentErrorKind> = new Set<AgentErrorKind>([
  "rate_limited",
  "timeout",
  "transport",
  "overflow",
]);

export interface AgentErrorOptions {
  readonly retryAfterMs?: number;
  readonly httpStatus?: number;
  readonly transient?: boolean;
  readonly cause?: unknown;
}

/**
 * Classified failure raised by a planner, executor, scorer or model client.
 * The kind decides whether the retry loop tries again or gives up.
 */
export class AgentError extends Error {
  readonly kind: AgentErrorKind;
  readonly retryAfterMs?: number;
  readonly httpStatus?: number;
  private readonly transientOverride?: boolean;

  constructor(kind: AgentErrorKind, message: string, options: AgentErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "AgentError";
    this.kind = kind;
    this.retryAfterMs = options.retryAfterMs;
    this.httpStatus = options.httpStatus;
    this.transientOverride = options.transient;
  }

  isTransient(): boolean {
    if (this.transientOverride !== undefined) return this.transientOverride;
    return TRANSIENT_KINDS.has(this.kind);
  }
}

export function classifyError(error: unknown): AgentError {
  if (error instanceof AgentError) return error;

  const err = error instanceof Error ? error : new Error(String(error));
  const msg = err.message.toLowerCase();

  if (err.name === "AbortError") {
    return new AgentError("cancelled", err.message, { cause: err });
  }
  if (err.name === "TimeoutError" || msg.includes("timeout") || msg.includes("timed out")) {
    return new AgentError("timeout", err.message, { cause: err });
  }
  if (
    msg.includes("econnrefused") ||
    msg.includes("econnreset") ||
    msg.includes("fetch failed") ||
    msg.includes("socket hang up") ||
    msg.includes("network")
  ) {
    return new AgentError("transport", err.message, { cause: err });
  }

  return new AgentError("provider", err.message, { cause: err, transient: false });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class SubmissionValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SubmissionValidationError";
  }
}

export class EvaluatorSkillError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EvaluatorSkillError";
  }
}

export class ConfigValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigValidationError";
  }
}
