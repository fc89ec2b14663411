#!/usr/bin/env node
import { loadEngineConfig } from "../config/iteration.js";
import { logger } from "../config/logger.js";
import { ensureCadenceDirectories, getConfigPath, getSkillsDir, getStateDir } from "../config/paths.js";
import { LlmExecutor } from "../execution/llmExecutor.js";
import { LlmPlanner } from "../execution/llmPlanner.js";
import { createChatConfig, createChatFn } from "../llm/client.js";
import { formatReport } from "../orchestration/taskReport.js";
import { TaskSupervisor } from "../orchestration/taskSupervisor.js";
import { openDatabase } from "../state/db.js";
import { SqliteMemoryStore } from "../state/taskRecords.js";
import { createTaskStateListener, readTaskHistory } from "../state/taskStateFile.js";
import { ConfigValidationError, SubmissionValidationError, errorMessage } from "../shared/errors.js";
import { CliUsageError, USAGE, exitCodeFor, parseCliArgs } from "./cli.js";
import type { CliCommand } from "./cli.js";
import { buildScorers, createSkillSelector, initHome, loadSkills } from "./runtime.js";

async function runTask(command: Extract<CliCommand, { command: "run" }>): Promise<number> {
  const config = loadEngineConfig();
  ensureCadenceDirectories();

  const skills = loadSkills(getSkillsDir());
  const chatConfig = createChatConfig();
  const chat = createChatFn(chatConfig);

  const db = openDatabase();
  try {
    const supervisor = new TaskSupervisor(
      config,
      {
        planner: new LlmPlanner(chat),
        executor: new LlmExecutor(chat),
        skillSelector: createSkillSelector(skills),
        scorers: buildScorers({ chat, skills, testCommand: process.env.CADENCE_TEST_COMMAND, cwd: process.cwd() }),
        memoryStore: new SqliteMemoryStore(db),
        onProgress: createTaskStateListener(getStateDir()),
      },
      { model: chatConfig.model },
    );

    const { task, done } = supervisor.submit(command.submission);
    logger.info({ taskId: task.id, limits: task.limits }, "Task started");

    const onSigint = (): void => {
      logger.warn({ taskId: task.id }, "Interrupt received, cancelling task");
      supervisor.cancelAll();
    };
    process.once("SIGINT", onSigint);

    try {
      const report = await done;
      process.stdout.write(`${formatReport(report)}\n`);
      return exitCodeFor(report.outcome);
    } finally {
      process.removeListener("SIGINT", onSigint);
    }
  } finally {
    db.close();
  }
}

function showHistory(limit: number): number {
  const entries = readTaskHistory(getStateDir(), limit);
  if (entries.length === 0) {
    process.stdout.write("No finished tasks yet.\n");
    return 0;
  }

  for (const entry of entries) {
    const score = entry.finalScore === null ? "-" : entry.finalScore.toFixed(2);
    const cost = entry.costUsd === undefined ? "-" : `$${entry.costUsd.toFixed(4)}`;
    process.stdout.write(
      `${entry.finishedAt}  ${entry.taskId}  ${entry.outcome}  score=${score}  iterations=${String(entry.iterations)}  tokens=${String(entry.tokensSpent)}  cost=${cost}\n`,
    );
  }
  return 0;
}

function init(force: boolean): number {
  ensureCadenceDirectories();
  const written = initHome({ configPath: getConfigPath(), skillsDir: getSkillsDir() }, force);
  for (const file of written) {
    process.stdout.write(`wrote ${file}\n`);
  }
  if (written.length === 0) {
    process.stdout.write("Nothing to do; pass --force to overwrite.\n");
  }
  return 0;
}

async function main(argv: readonly string[]): Promise<number> {
  const command = parseCliArgs(argv);

  switch (command.command) {
    case "run":
      return runTask(command);
    case "history":
      return showHistory(command.limit);
    case "init":
      return init(command.force);
    case "help":
      process.stdout.write(`${USAGE}\n`);
      return 0;
  }
}

try {
  process.exitCode = await main(process.argv.slice(2));
} catch (error) {
  if (error instanceof CliUsageError) {
    process.stderr.write(`${error.message}\n\n${USAGE}\n`);
    process.exitCode = 64;
  } else if (error instanceof SubmissionValidationError || error instanceof ConfigValidationError) {
    process.stderr.write(`${error.message}\n`);
    process.exitCode = 64;
  } else {
    logger.error({ error: errorMessage(error) }, "cadence failed");
    process.exitCode = 1;
  }
}
