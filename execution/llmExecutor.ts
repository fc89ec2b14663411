import crypto from "node:crypto";
import { logger } from "../config/logger.js";
import type { ChatFn } from "../llm/client.js";
import type { ExecutionOutcome, Executor, Finding, IterationContext, Plan } from "../orchestration/types.js";

const EXECUTOR_SYSTEM_PROMPT = [
  "You carry out a plan and produce the complete deliverable for the task.",
  "Reply with the deliverable only, no commentary.",
  "When a previous version is given, revise it rather than starting over, and resolve the listed findings.",
].join("\n");

const DEFAULT_MAX_OUTPUT_TOKENS = 4_096;
const MAX_PREVIOUS_CHARS = 16_000;

export interface LlmExecutorOptions {
  readonly maxOutputTokens?: number;
  readonly now?: () => number;
}

function formatFinding(f: Finding): string {
  const location = f.location ? ` at ${f.location}` : "";
  const fix = f.fix ? ` Fix: ${f.fix}` : "";
  return `- [${f.severity.toUpperCase()}] ${f.dimension}: ${f.title}${location}. ${f.description}${fix}`.trimEnd();
}

export function buildExecutorMessage(plan: Plan, context: IterationContext): string {
  const sections = [`Task:\n${context.task.description}`, `Plan: ${plan.summary}`];

  if (plan.steps.length > 0) {
    sections.push(plan.steps.map((s, i) => `${String(i + 1)}. ${s.description}`).join("\n"));
  }

  if (context.previousArtifact) {
    const previous = context.previousArtifact.content.slice(0, MAX_PREVIOUS_CHARS);
    sections.push(`Previous version:\n${previous}`);
  }

  if (context.previousFindings.length > 0) {
    sections.push(`Findings to address:\n${context.previousFindings.map(formatFinding).join("\n")}`);
  }

  return sections.join("\n\n");
}

export class LlmExecutor implements Executor {
  private readonly maxOutputTokens: number;
  private readonly now: () => number;

  constructor(
    private readonly chat: ChatFn,
    options: LlmExecutorOptions = {},
  ) {
    this.maxOutputTokens = options.maxOutputTokens ?? DEFAULT_MAX_OUTPUT_TOKENS;
    this.now = options.now ?? Date.now;
  }

  async execute(plan: Plan, context: IterationContext): Promise<ExecutionOutcome> {
    const startedAt = this.now();
    const response = await this.chat(
      {
        system: EXECUTOR_SYSTEM_PROMPT,
        userMessage: buildExecutorMessage(plan, context),
        maxOutputTokens: this.maxOutputTokens,
      },
      context.signal,
    );
    const durationMs = Math.max(0, this.now() - startedAt);

    logger.debug(
      { taskId: context.task.id, iteration: context.iteration, chars: response.text.length, durationMs },
      "Executor produced artifact",
    );

    return {
      artifact: { id: crypto.randomUUID(), content: response.text },
      usage: response.usage,
      durationMs,
    };
  }
}
