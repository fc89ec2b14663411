import fs from "node:fs";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { writeFileAtomic } from "../shared/atomicWrite.js";
import { ConfigValidationError } from "../shared/errors.js";
import { DEFAULT_RETRY_POLICY } from "../shared/retry.js";
import type { RetryPolicy } from "../shared/retry.js";
import { logger } from "./logger.js";
import { getConfigPath } from "./paths.js";
import type { ModelPrice } from "./pricing.js";

export interface EngineConfig {
  readonly maxIterations: number;
  readonly qualityThreshold: number;
  readonly tokenBudget: number;
  readonly timeoutSeconds: number;
  readonly regressionEpsilon: number;
  readonly blockerScoreCap: number;
  /** Spending cap per task in USD; `null` disables the cost breaker. */
  readonly maxCostUsd: number | null;
  /** Price entries consulted before the built-in table. */
  readonly modelPrices: readonly ModelPrice[];
  readonly scorerRetry: RetryPolicy;
  readonly executorRetry: RetryPolicy;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = Object.freeze({
  maxIterations: 3,
  qualityThreshold: 0.8,
  tokenBudget: 200_000,
  timeoutSeconds: 300,
  regressionEpsilon: 0,
  blockerScoreCap: 0.4,
  maxCostUsd: null,
  modelPrices: Object.freeze([]),
  scorerRetry: Object.freeze({ ...DEFAULT_RETRY_POLICY, maxAttempts: 3, initialDelayMs: 1_000 }),
  executorRetry: DEFAULT_RETRY_POLICY,
});

type ScalarSettings = Omit<EngineConfig, "scorerRetry" | "executorRetry" | "modelPrices">;

type Overrides = { -readonly [K in keyof ScalarSettings]?: ScalarSettings[K] } & {
  modelPrices?: readonly ModelPrice[];
  scorerRetry?: Partial<RetryPolicy>;
  executorRetry?: Partial<RetryPolicy>;
};

export interface LoadEngineConfigOptions {
  readonly configPath?: string;
  readonly env?: NodeJS.ProcessEnv;
}

/**
 * Defaults, then the YAML config file, then environment variables. The
 * result is frozen and meant to be loaded once per session.
 */
export function loadEngineConfig(options: LoadEngineConfigOptions = {}): EngineConfig {
  const configPath = options.configPath ?? getConfigPath();
  const env = options.env ?? process.env;

  const fromFile = readConfigFile(configPath);
  const fromEnv = readEnvOverrides(env);

  const merged: EngineConfig = {
    ...DEFAULT_ENGINE_CONFIG,
    ...fromFile,
    ...fromEnv,
    scorerRetry: {
      ...DEFAULT_ENGINE_CONFIG.scorerRetry,
      ...fromFile.scorerRetry,
      ...fromEnv.scorerRetry,
    },
    executorRetry: {
      ...DEFAULT_ENGINE_CONFIG.executorRetry,
      ...fromFile.executorRetry,
      ...fromEnv.executorRetry,
    },
  };

  validateEngineConfig(merged);

  return Object.freeze({
    ...merged,
    modelPrices: Object.freeze(merged.modelPrices.map((entry) => Object.freeze({ ...entry }))),
    scorerRetry: Object.freeze(merged.scorerRetry),
    executorRetry: Object.freeze(merged.executorRetry),
  });
}

export function saveEngineConfig(config: EngineConfig, configPath: string = getConfigPath()): void {
  validateEngineConfig(config);
  const document = {
    max_iterations: config.maxIterations,
    quality_threshold: config.qualityThreshold,
    token_budget: config.tokenBudget,
    timeout_seconds: config.timeoutSeconds,
    regression_epsilon: config.regressionEpsilon,
    blocker_score_cap: config.blockerScoreCap,
    ...(config.maxCostUsd === null ? {} : { max_cost_usd: config.maxCostUsd }),
    ...(config.modelPrices.length === 0
      ? {}
      : {
          model_prices: config.modelPrices.map((entry) => ({
            match: entry.match,
            input_per_mtok: entry.inputPerMTok,
            output_per_mtok: entry.outputPerMTok,
          })),
        }),
    scorer_retry: retryToYaml(config.scorerRetry),
    executor_retry: retryToYaml(config.executorRetry),
  };
  writeFileAtomic(configPath, stringifyYaml(document));
  logger.info({ configPath }, "Engine config saved");
}

function retryToYaml(policy: RetryPolicy): Record<string, number> {
  return {
    max_attempts: policy.maxAttempts,
    initial_delay_ms: policy.initialDelayMs,
    backoff_factor: policy.backoffFactor,
    max_delay_ms: policy.maxDelayMs,
    jitter_fraction: policy.jitterFraction,
  };
}

function readConfigFile(configPath: string): Overrides {
  if (!fs.existsSync(configPath)) {
    return {};
  }

  const raw = fs.readFileSync(configPath, "utf-8");
  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigValidationError(`Invalid YAML in ${configPath}: ${message}`);
  }

  if (parsed === null || parsed === undefined) return {};
  if (typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new ConfigValidationError(`${configPath} must contain a mapping`);
  }

  logger.debug({ configPath }, "Loaded engine config file");
  return parseOverrides(parsed as Record<string, unknown>);
}

function pick(record: Record<string, unknown>, snake: string, camel: string): unknown {
  return record[snake] ?? record[camel];
}

function parseOverrides(record: Record<string, unknown>): Overrides {
  const overrides: Overrides = {};

  const maxIterations = optionalNumber(pick(record, "max_iterations", "maxIterations"), "max_iterations");
  if (maxIterations !== undefined) overrides.maxIterations = maxIterations;

  const qualityThreshold = optionalNumber(
    pick(record, "quality_threshold", "qualityThreshold"),
    "quality_threshold",
  );
  if (qualityThreshold !== undefined) overrides.qualityThreshold = qualityThreshold;

  const tokenBudget = optionalNumber(pick(record, "token_budget", "tokenBudget"), "token_budget");
  if (tokenBudget !== undefined) overrides.tokenBudget = tokenBudget;

  const timeoutSeconds = optionalNumber(pick(record, "timeout_seconds", "timeoutSeconds"), "timeout_seconds");
  if (timeoutSeconds !== undefined) overrides.timeoutSeconds = timeoutSeconds;

  const regressionEpsilon = optionalNumber(
    pick(record, "regression_epsilon", "regressionEpsilon"),
    "regression_epsilon",
  );
  if (regressionEpsilon !== undefined) overrides.regressionEpsilon = regressionEpsilon;

  const blockerScoreCap = optionalNumber(
    pick(record, "blocker_score_cap", "blockerScoreCap"),
    "blocker_score_cap",
  );
  if (blockerScoreCap !== undefined) overrides.blockerScoreCap = blockerScoreCap;

  const maxCostUsd = optionalNumber(pick(record, "max_cost_usd", "maxCostUsd"), "max_cost_usd");
  if (maxCostUsd !== undefined) overrides.maxCostUsd = maxCostUsd;

  const modelPrices = parseModelPrices(pick(record, "model_prices", "modelPrices"));
  if (modelPrices) overrides.modelPrices = modelPrices;

  const scorerRetry = parseRetry(pick(record, "scorer_retry", "scorerRetry"), "scorer_retry");
  if (scorerRetry) overrides.scorerRetry = scorerRetry;

  const executorRetry = parseRetry(pick(record, "executor_retry", "executorRetry"), "executor_retry");
  if (executorRetry) overrides.executorRetry = executorRetry;

  return overrides;
}

function parseModelPrices(value: unknown): readonly ModelPrice[] | undefined {
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value)) {
    throw new ConfigValidationError("model_prices must be a list");
  }

  return value.map((item: unknown, index) => {
    const field = `model_prices[${String(index)}]`;
    if (typeof item !== "object" || item === null || Array.isArray(item)) {
      throw new ConfigValidationError(`${field} must be a mapping`);
    }
    const record = item as Record<string, unknown>;
    const match = record.match;
    if (typeof match !== "string" || match.trim().length === 0) {
      throw new ConfigValidationError(`${field}.match must be a non-empty string`);
    }
    const inputPerMTok = optionalNumber(pick(record, "input_per_mtok", "inputPerMTok"), `${field}.input_per_mtok`);
    const outputPerMTok = optionalNumber(
      pick(record, "output_per_mtok", "outputPerMTok"),
      `${field}.output_per_mtok`,
    );
    if (inputPerMTok === undefined || outputPerMTok === undefined) {
      throw new ConfigValidationError(`${field} needs input_per_mtok and output_per_mtok`);
    }
    return { match: match.trim(), inputPerMTok, outputPerMTok };
  });
}

function parseRetry(value: unknown, field: string): Partial<RetryPolicy> | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "object" || Array.isArray(value)) {
    throw new ConfigValidationError(`${field} must be a mapping`);
  }
  const record = value as Record<string, unknown>;
  const policy: { -readonly [K in keyof RetryPolicy]?: number } = {};

  const maxAttempts = optionalNumber(pick(record, "max_attempts", "maxAttempts"), `${field}.max_attempts`);
  if (maxAttempts !== undefined) policy.maxAttempts = maxAttempts;
  const initialDelayMs = optionalNumber(
    pick(record, "initial_delay_ms", "initialDelayMs"),
    `${field}.initial_delay_ms`,
  );
  if (initialDelayMs !== undefined) policy.initialDelayMs = initialDelayMs;
  const backoffFactor = optionalNumber(pick(record, "backoff_factor", "backoffFactor"), `${field}.backoff_factor`);
  if (backoffFactor !== undefined) policy.backoffFactor = backoffFactor;
  const maxDelayMs = optionalNumber(pick(record, "max_delay_ms", "maxDelayMs"), `${field}.max_delay_ms`);
  if (maxDelayMs !== undefined) policy.maxDelayMs = maxDelayMs;
  const jitterFraction = optionalNumber(
    pick(record, "jitter_fraction", "jitterFraction"),
    `${field}.jitter_fraction`,
  );
  if (jitterFraction !== undefined) policy.jitterFraction = jitterFraction;

  return policy;
}

function readEnvOverrides(env: NodeJS.ProcessEnv): Overrides {
  const overrides: Overrides = {};

  const maxIterations = optionalNumber(env.CADENCE_MAX_ITERATIONS, "CADENCE_MAX_ITERATIONS");
  if (maxIterations !== undefined) overrides.maxIterations = maxIterations;
  const qualityThreshold = optionalNumber(env.CADENCE_QUALITY_THRESHOLD, "CADENCE_QUALITY_THRESHOLD");
  if (qualityThreshold !== undefined) overrides.qualityThreshold = qualityThreshold;
  const tokenBudget = optionalNumber(env.CADENCE_TOKEN_BUDGET, "CADENCE_TOKEN_BUDGET");
  if (tokenBudget !== undefined) overrides.tokenBudget = tokenBudget;
  const timeoutSeconds = optionalNumber(env.CADENCE_TIMEOUT_SECONDS, "CADENCE_TIMEOUT_SECONDS");
  if (timeoutSeconds !== undefined) overrides.timeoutSeconds = timeoutSeconds;
  const regressionEpsilon = optionalNumber(env.CADENCE_REGRESSION_EPSILON, "CADENCE_REGRESSION_EPSILON");
  if (regressionEpsilon !== undefined) overrides.regressionEpsilon = regressionEpsilon;
  const blockerScoreCap = optionalNumber(env.CADENCE_BLOCKER_SCORE_CAP, "CADENCE_BLOCKER_SCORE_CAP");
  if (blockerScoreCap !== undefined) overrides.blockerScoreCap = blockerScoreCap;
  const maxCostUsd = optionalNumber(env.CADENCE_MAX_COST_USD, "CADENCE_MAX_COST_USD");
  if (maxCostUsd !== undefined) overrides.maxCostUsd = maxCostUsd;

  const scorerAttempts = optionalNumber(env.CADENCE_SCORER_MAX_ATTEMPTS, "CADENCE_SCORER_MAX_ATTEMPTS");
  if (scorerAttempts !== undefined) {
    overrides.scorerRetry = { maxAttempts: scorerAttempts };
  }
  const executorAttempts = optionalNumber(env.CADENCE_EXECUTOR_MAX_ATTEMPTS, "CADENCE_EXECUTOR_MAX_ATTEMPTS");
  if (executorAttempts !== undefined) {
    overrides.executorRetry = { maxAttempts: executorAttempts };
  }

  return overrides;
}

function optionalNumber(value: unknown, field: string): number | undefined {
  if (value === undefined || value === null || value === "") return undefined;
  const num = typeof value === "string" ? Number(value) : value;
  if (typeof num !== "number" || !Number.isFinite(num)) {
    throw new ConfigValidationError(`${field} must be a number. Got: "${String(value)}"`);
  }
  return num;
}

export function validateEngineConfig(config: EngineConfig): void {
  if (!Number.isInteger(config.maxIterations) || config.maxIterations < 1) {
    throw new ConfigValidationError(
      `max_iterations must be an integer >= 1. Got: ${String(config.maxIterations)}`,
    );
  }
  if (config.qualityThreshold < 0 || config.qualityThreshold > 1) {
    throw new ConfigValidationError(
      `quality_threshold must be within [0, 1]. Got: ${String(config.qualityThreshold)}`,
    );
  }
  if (config.tokenBudget <= 0) {
    throw new ConfigValidationError(`token_budget must be positive. Got: ${String(config.tokenBudget)}`);
  }
  if (config.timeoutSeconds <= 0) {
    throw new ConfigValidationError(`timeout_seconds must be positive. Got: ${String(config.timeoutSeconds)}`);
  }
  if (config.regressionEpsilon < 0 || config.regressionEpsilon >= 1) {
    throw new ConfigValidationError(
      `regression_epsilon must be within [0, 1). Got: ${String(config.regressionEpsilon)}`,
    );
  }
  if (config.blockerScoreCap < 0 || config.blockerScoreCap > 1) {
    throw new ConfigValidationError(
      `blocker_score_cap must be within [0, 1]. Got: ${String(config.blockerScoreCap)}`,
    );
  }
  if (config.maxCostUsd !== null && config.maxCostUsd <= 0) {
    throw new ConfigValidationError(`max_cost_usd must be positive. Got: ${String(config.maxCostUsd)}`);
  }
  for (const entry of config.modelPrices) {
    if (entry.inputPerMTok < 0 || entry.outputPerMTok < 0) {
      throw new ConfigValidationError(`model_prices entry "${entry.match}" must not have negative prices`);
    }
  }
  validateRetry(config.scorerRetry, "scorer_retry");
  validateRetry(config.executorRetry, "executor_retry");
}

function validateRetry(policy: RetryPolicy, field: string): void {
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw new ConfigValidationError(`${field}.max_attempts must be an integer >= 1`);
  }
  if (policy.initialDelayMs < 0 || policy.maxDelayMs < policy.initialDelayMs) {
    throw new ConfigValidationError(`${field} delays must satisfy 0 <= initial_delay_ms <= max_delay_ms`);
  }
  if (policy.backoffFactor < 1) {
    throw new ConfigValidationError(`${field}.backoff_factor must be >= 1`);
  }
  if (policy.jitterFraction < 0 || policy.jitterFraction >= 1) {
    throw new ConfigValidationError(`${field}.jitter_fraction must be within [0, 1)`);
  }
}
