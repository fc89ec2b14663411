import { logger } from "../config/logger.js";
import { AgentError, ConfigValidationError, classifyError } from "../shared/errors.js";
import type { TokenUsage } from "../orchestration/types.js";

export interface ChatRequest {
  readonly system: string;
  readonly userMessage: string;
  readonly maxOutputTokens?: number;
}

export interface ChatResponse {
  readonly text: string;
  readonly usage: TokenUsage;
}

export interface ChatClientConfig {
  readonly baseUrl: string;
  readonly apiKey: string;
  readonly model: string;
  readonly timeoutMs: number;
}

export type ChatFn = (request: ChatRequest, signal?: AbortSignal) => Promise<ChatResponse>;

const DEFAULT_BASE_URL = "https://api.openai.com/v1";
const DEFAULT_MODEL = "gpt-4o";
const DEFAULT_TIMEOUT_MS = 60_000;
const DEFAULT_MAX_OUTPUT_TOKENS = 2_048;
const MAX_ERROR_BODY_CHARS = 500;

export function createChatConfig(env: NodeJS.ProcessEnv = process.env): ChatClientConfig {
  const apiKey = env.CADENCE_LLM_API_KEY;
  if (!apiKey) {
    throw new ConfigValidationError("CADENCE_LLM_API_KEY is required");
  }

  const timeoutRaw = env.CADENCE_LLM_TIMEOUT_MS;
  const timeoutMs = timeoutRaw ? Number(timeoutRaw) : DEFAULT_TIMEOUT_MS;
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new ConfigValidationError(`CADENCE_LLM_TIMEOUT_MS must be a positive number, got: "${timeoutRaw ?? ""}"`);
  }

  return {
    baseUrl: (env.CADENCE_LLM_BASE_URL ?? DEFAULT_BASE_URL).replace(/\/+$/, ""),
    apiKey,
    model: env.CADENCE_LLM_MODEL ?? DEFAULT_MODEL,
    timeoutMs,
  };
}

interface ChatCompletionResponse {
  readonly choices: ReadonlyArray<{
    readonly message: {
      readonly content: string | null;
      readonly refusal?: string | null;
    };
    readonly finish_reason: string;
  }>;
  readonly usage?: {
    readonly prompt_tokens: number;
    readonly completion_tokens: number;
  };
}

function requiresMaxCompletionTokens(model: string): boolean {
  return model.startsWith("o1") || model.startsWith("o3") || model.startsWith("o4") || model.startsWith("gpt-5");
}

function buildTokenLimit(model: string, maxTokens: number): Record<string, number> {
  if (requiresMaxCompletionTokens(model)) {
    return { max_completion_tokens: maxTokens };
  }
  return { max_tokens: maxTokens };
}

function buildMessages(model: string, request: ChatRequest): ReadonlyArray<{ role: string; content: string }> {
  const systemRole = requiresMaxCompletionTokens(model) ? "developer" : "system";
  return [
    { role: systemRole, content: request.system },
    { role: "user", content: request.userMessage },
  ];
}

/** Parses a Retry-After header given either as seconds or as an HTTP date. */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | undefined {
  if (!value) return undefined;

  const seconds = Number(value);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return Math.round(seconds * 1_000);
  }

  const date = Date.parse(value);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

export function classifyHttpStatus(status: number, body: string, retryAfterMs?: number): AgentError {
  const message = `Chat API ${String(status)}: ${body.slice(0, MAX_ERROR_BODY_CHARS)}`;

  if (status === 401 || status === 403) {
    return new AgentError("auth", message, { httpStatus: status });
  }
  if (status === 429) {
    return new AgentError("rate_limited", message, { httpStatus: status, retryAfterMs });
  }
  if (status === 413) {
    return new AgentError("overflow", message, { httpStatus: status });
  }
  if (status === 408) {
    return new AgentError("timeout", message, { httpStatus: status });
  }
  if (status >= 500) {
    return new AgentError("provider", message, { httpStatus: status, transient: true, retryAfterMs });
  }
  return new AgentError("invalid_request", message, { httpStatus: status });
}

function requestSignal(timeoutMs: number, signal?: AbortSignal): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  return signal ? AbortSignal.any([signal, timeout]) : timeout;
}

/**
 * One chat completion against an OpenAI-compatible endpoint. Never retries;
 * every failure surfaces as a classified `AgentError`.
 */
export async function callChat(
  config: ChatClientConfig,
  request: ChatRequest,
  signal?: AbortSignal,
): Promise<ChatResponse> {
  const maxTokens = request.maxOutputTokens ?? DEFAULT_MAX_OUTPUT_TOKENS;

  let response: Response;
  try {
    response = await fetch(`${config.baseUrl}/chat/completions`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${config.apiKey}`,
      },
      body: JSON.stringify({
        model: config.model,
        ...buildTokenLimit(config.model, maxTokens),
        messages: buildMessages(config.model, request),
      }),
      signal: requestSignal(config.timeoutMs, signal),
    });
  } catch (error) {
    throw classifyError(error);
  }

  if (!response.ok) {
    const body = await response.text();
    const retryAfterMs = parseRetryAfter(response.headers.get("retry-after"));
    throw classifyHttpStatus(response.status, body, retryAfterMs);
  }

  const data = (await response.json()) as ChatCompletionResponse;
  if (!Array.isArray(data.choices)) {
    throw new AgentError("provider", "Chat API response has no choices array", { transient: true });
  }
  const choice = data.choices[0];

  if (!choice) {
    throw new AgentError("provider", "Chat API returned no choices", { transient: true });
  }

  if (choice.message.refusal) {
    throw new AgentError("invalid_request", `Model refused: ${choice.message.refusal}`);
  }

  const text = choice.message.content;
  if (!text) {
    logger.warn({ finishReason: choice.finish_reason, model: config.model }, "Chat API returned empty content");
    if (choice.finish_reason === "length") {
      throw new AgentError("overflow", "Chat API ran out of output tokens before producing content");
    }
    throw new AgentError("provider", `Chat API returned empty content (finish_reason: ${choice.finish_reason})`, {
      transient: true,
    });
  }

  logger.debug(
    {
      model: config.model,
      chars: text.length,
      inputTokens: data.usage?.prompt_tokens ?? 0,
      outputTokens: data.usage?.completion_tokens ?? 0,
    },
    "Chat response received",
  );

  return {
    text,
    usage: {
      inputTokens: data.usage?.prompt_tokens ?? 0,
      outputTokens: data.usage?.completion_tokens ?? 0,
    },
  };
}

export function createChatFn(config: ChatClientConfig): ChatFn {
  return (request, signal) => callChat(config, request, signal);
}
