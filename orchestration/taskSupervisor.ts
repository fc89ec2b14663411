import crypto from "node:crypto";
import type { EngineConfig } from "../config/iteration.js";
import { logger } from "../config/logger.js";
import { priceForModel } from "../config/pricing.js";
import { IterationEngine } from "./iterationEngine.js";
import type { EngineSettings, IterationEngineDeps } from "./iterationEngine.js";
import { createTask } from "./taskSubmission.js";
import type { SubmissionDefaults } from "./taskSubmission.js";
import type { EnginePhase, Task, TaskReport } from "./types.js";

export interface SubmittedTask {
  readonly task: Task;
  readonly done: Promise<TaskReport>;
}

export interface TaskStatus {
  readonly task: Task;
  readonly phase: EnginePhase;
  readonly report: TaskReport | null;
}

interface SupervisedTask {
  readonly task: Task;
  readonly engine: IterationEngine;
  readonly controller: AbortController;
  readonly done: Promise<TaskReport>;
  report: TaskReport | null;
}

export interface TaskSupervisorOptions {
  readonly sessionId?: string;
  /** Model id used to price token usage. */
  readonly model?: string;
}

export function submissionDefaultsFrom(config: EngineConfig): SubmissionDefaults {
  return {
    maxIterations: config.maxIterations,
    qualityThreshold: config.qualityThreshold,
    tokenBudget: config.tokenBudget,
    timeBudgetSeconds: config.timeoutSeconds,
  };
}

/**
 * Runs each submitted task in its own engine. Tasks share the session
 * configuration and collaborators but no mutable iteration state.
 */
export class TaskSupervisor {
  private readonly tasks = new Map<string, SupervisedTask>();
  private readonly settings: EngineSettings;
  readonly sessionId: string;

  constructor(
    private readonly config: EngineConfig,
    private readonly deps: IterationEngineDeps,
    options: TaskSupervisorOptions = {},
  ) {
    this.sessionId = options.sessionId ?? crypto.randomUUID();
    this.settings = { ...config, tokenPrice: priceForModel(options.model ?? "", config.modelPrices) };
  }

  /** Throws `SubmissionValidationError` before anything runs when the input is invalid. */
  submit(raw: unknown): SubmittedTask {
    const task = createTask(raw, this.sessionId, submissionDefaultsFrom(this.config));
    const engine = new IterationEngine(task, this.settings, this.deps);
    const controller = new AbortController();

    const done = engine.run(controller.signal).then((report) => {
      const entry = this.tasks.get(task.id);
      if (entry) entry.report = report;
      return report;
    });

    this.tasks.set(task.id, { task, engine, controller, done, report: null });
    logger.info({ taskId: task.id, sessionId: this.sessionId }, "Task submitted");

    return { task, done };
  }

  /** Requests cancellation; returns false when the task is unknown or already finished. */
  cancel(taskId: string): boolean {
    const entry = this.tasks.get(taskId);
    if (!entry || entry.report !== null || entry.controller.signal.aborted) return false;

    entry.controller.abort();
    logger.info({ taskId }, "Task cancellation requested");
    return true;
  }

  cancelAll(): number {
    let cancelled = 0;
    for (const taskId of this.tasks.keys()) {
      if (this.cancel(taskId)) cancelled += 1;
    }
    return cancelled;
  }

  get(taskId: string): TaskStatus | null {
    const entry = this.tasks.get(taskId);
    if (!entry) return null;
    return { task: entry.task, phase: entry.engine.getPhase(), report: entry.report };
  }

  list(): readonly TaskStatus[] {
    return [...this.tasks.values()].map((entry) => ({
      task: entry.task,
      phase: entry.engine.getPhase(),
      report: entry.report,
    }));
  }

  async waitAll(): Promise<readonly TaskReport[]> {
    return Promise.all([...this.tasks.values()].map((entry) => entry.done));
  }
}
