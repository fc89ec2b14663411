import crypto from "node:crypto";
import { SubmissionValidationError } from "../shared/errors.js";
import type { Task, TaskLimits } from "./types.js";

export interface TaskSubmission {
  readonly description: string;
  readonly category?: string | null;
  readonly maxIterations?: number;
  readonly qualityThreshold?: number;
  readonly tokenBudget?: number;
  readonly timeBudgetSeconds?: number;
}

export interface SubmissionDefaults {
  readonly maxIterations: number;
  readonly qualityThreshold: number;
  readonly tokenBudget: number;
  readonly timeBudgetSeconds: number;
}

export const DEFAULT_SUBMISSION_LIMITS: SubmissionDefaults = Object.freeze({
  maxIterations: 3,
  qualityThreshold: 0.8,
  tokenBudget: 200_000,
  timeBudgetSeconds: 300,
});

const MAX_DESCRIPTION_LENGTH = 20_000;

export function validateSubmission(
  raw: unknown,
  defaults: SubmissionDefaults = DEFAULT_SUBMISSION_LIMITS,
): TaskSubmission {
  if (raw === null || typeof raw !== "object") {
    throw new SubmissionValidationError("Submission must be a non-null object");
  }

  const record = raw as Record<string, unknown>;

  const description = validateDescription(record["description"]);
  const category = validateCategory(record["category"]);
  const maxIterations = validateMaxIterations(record["maxIterations"] ?? defaults.maxIterations);
  const qualityThreshold = validateQualityThreshold(record["qualityThreshold"] ?? defaults.qualityThreshold);
  const tokenBudget = validatePositiveInteger(record["tokenBudget"] ?? defaults.tokenBudget, "tokenBudget");
  const timeBudgetSeconds = validatePositiveNumber(
    record["timeBudgetSeconds"] ?? defaults.timeBudgetSeconds,
    "timeBudgetSeconds",
  );

  return { description, category, maxIterations, qualityThreshold, tokenBudget, timeBudgetSeconds };
}

/** Validates a submission and turns it into an immutable task. */
export function createTask(
  raw: unknown,
  sessionId: string,
  defaults: SubmissionDefaults = DEFAULT_SUBMISSION_LIMITS,
): Task {
  const submission = validateSubmission(raw, defaults);

  const limits: TaskLimits = Object.freeze({
    maxIterations: submission.maxIterations ?? defaults.maxIterations,
    qualityThreshold: submission.qualityThreshold ?? defaults.qualityThreshold,
    tokenBudget: submission.tokenBudget ?? defaults.tokenBudget,
    timeBudgetMs: Math.round((submission.timeBudgetSeconds ?? defaults.timeBudgetSeconds) * 1_000),
  });

  return Object.freeze({
    id: crypto.randomUUID(),
    description: submission.description,
    category: submission.category ?? null,
    sessionId,
    limits,
    createdAt: new Date().toISOString(),
  });
}

function validateDescription(value: unknown): string {
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new SubmissionValidationError("description must be a non-empty string");
  }
  const description = value.trim();
  if (description.length > MAX_DESCRIPTION_LENGTH) {
    throw new SubmissionValidationError(
      `description must be at most ${String(MAX_DESCRIPTION_LENGTH)} characters, got ${String(description.length)}`,
    );
  }
  return description;
}

function validateCategory(value: unknown): string | null {
  if (value === undefined || value === null) return null;
  if (typeof value !== "string") {
    throw new SubmissionValidationError("category must be a string");
  }
  const category = value.trim().toLowerCase();
  return category.length > 0 ? category : null;
}

function validateMaxIterations(value: unknown): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
    throw new SubmissionValidationError(`maxIterations must be an integer >= 1. Got: ${String(value)}`);
  }
  return value;
}

function validateQualityThreshold(value: unknown): number {
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0 || value > 1) {
    throw new SubmissionValidationError(`qualityThreshold must be within [0, 1]. Got: ${String(value)}`);
  }
  return value;
}

function validatePositiveInteger(value: unknown, field: string): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
    throw new SubmissionValidationError(`${field} must be a positive integer. Got: ${String(value)}`);
  }
  return value;
}

function validatePositiveNumber(value: unknown, field: string): number {
  if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
    throw new SubmissionValidationError(`${field} must be a positive number. Got: ${String(value)}`);
  }
  return value;
}
