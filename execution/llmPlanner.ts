import { logger } from "../config/logger.js";
import type { ChatFn } from "../llm/client.js";
import type { Finding, IterationContext, Plan, PlanStep, Planner, Task } from "../orchestration/types.js";

const PLANNER_SYSTEM_PROMPT = [
  "You plan the next attempt at a task.",
  "Reply with a one-line summary followed by numbered steps, one per line:",
  "SUMMARY: <summary>",
  "1. <step>",
  "2. <step>",
  "Keep the plan short. Address open findings from the previous attempt first.",
].join("\n");

const MAX_PLAN_STEPS = 12;
const MAX_PLANNER_OUTPUT_TOKENS = 800;

export function buildPlannerMessage(task: Task, iteration: number, findings: readonly Finding[]): string {
  const lines = [`Task (attempt ${String(iteration)}):`, task.description];

  const actionable = findings.filter((f) => f.severity !== "suggestion");
  if (actionable.length > 0) {
    lines.push("", "Open findings from the previous attempt:");
    for (const f of actionable) {
      lines.push(`- [${f.severity.toUpperCase()}] ${f.dimension}: ${f.title}${f.description ? ` (${f.description})` : ""}`);
    }
  }

  return lines.join("\n");
}

export function parsePlan(text: string, fallbackSummary: string): Pick<Plan, "summary" | "steps"> {
  let summary = "";
  const steps: PlanStep[] = [];

  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed.toUpperCase().startsWith("SUMMARY:")) {
      summary = trimmed.slice("SUMMARY:".length).trim();
      continue;
    }
    const step = /^(?:\d+[.)]|[-*])\s+(.+)$/.exec(trimmed);
    if (step?.[1] && steps.length < MAX_PLAN_STEPS) {
      steps.push({ description: step[1].trim() });
    }
  }

  return { summary: summary || fallbackSummary, steps };
}

export class LlmPlanner implements Planner {
  constructor(private readonly chat: ChatFn) {}

  async plan(task: Task, context: IterationContext): Promise<Plan> {
    const response = await this.chat(
      {
        system: PLANNER_SYSTEM_PROMPT,
        userMessage: buildPlannerMessage(task, context.iteration, context.previousFindings),
        maxOutputTokens: MAX_PLANNER_OUTPUT_TOKENS,
      },
      context.signal,
    );

    const parsed = parsePlan(response.text, task.description);
    logger.debug({ taskId: task.id, iteration: context.iteration, steps: parsed.steps.length }, "Plan produced");

    return { ...parsed, usage: response.usage };
  }
}
