import { execFile } from "node:child_process";
import { logger } from "../../config/logger.js";
import { AgentError } from "../../shared/errors.js";
import type { Artifact, Scorer, ScorerOutput, ScoringContext } from "../../orchestration/types.js";

export interface CommandResult {
  readonly exitCode: number;
  readonly output: string;
  readonly timedOut: boolean;
}

export interface CommandSpec {
  readonly command: string;
  readonly args: readonly string[];
  readonly cwd: string;
  readonly timeoutMs: number;
}

export type CommandRunner = (spec: CommandSpec, signal: AbortSignal) => Promise<CommandResult>;

export interface CommandScorerOptions {
  readonly dimension: string;
  readonly command: string;
  readonly args?: readonly string[];
  readonly cwd?: string;
  readonly timeoutMs?: number;
  readonly run?: CommandRunner;
}

const DEFAULT_TIMEOUT_MS = 120_000;
const MAX_OUTPUT_BUFFER = 10 * 1024 * 1024;
const OUTPUT_TAIL_LINES = 40;
const OUTPUT_TAIL_CHARS = 3_000;

interface ExecFailure {
  readonly code?: unknown;
  readonly killed?: unknown;
  readonly stdout?: unknown;
  readonly stderr?: unknown;
  readonly name?: unknown;
}

function isExecFailure(error: unknown): error is ExecFailure {
  return error !== null && typeof error === "object";
}

function asText(value: unknown): string {
  return typeof value === "string" ? value : "";
}

export const execFileRunner: CommandRunner = (spec, signal) =>
  new Promise((resolve, reject) => {
    execFile(
      spec.command,
      [...spec.args],
      { cwd: spec.cwd, timeout: spec.timeoutMs, signal, maxBuffer: MAX_OUTPUT_BUFFER },
      (error, stdout, stderr) => {
        const output = `${stdout}${stderr}`.trim();
        if (!error) {
          resolve({ exitCode: 0, output, timedOut: false });
          return;
        }

        const failure: ExecFailure = isExecFailure(error) ? error : {};
        if (failure.name === "AbortError") {
          reject(new AgentError("cancelled", `${spec.command} cancelled`, { cause: error }));
          return;
        }
        if (typeof failure.code === "number") {
          resolve({ exitCode: failure.code, output, timedOut: false });
          return;
        }
        if (failure.killed === true) {
          resolve({ exitCode: -1, output, timedOut: true });
          return;
        }
        reject(
          new AgentError("invalid_request", `Failed to run ${spec.command}: ${error.message}`, { cause: error }),
        );
      },
    );
  });

export function outputTail(output: string): string {
  const lines = output.split(/\r?\n/);
  const tail = lines.slice(-OUTPUT_TAIL_LINES).join("\n");
  return tail.length > OUTPUT_TAIL_CHARS ? tail.slice(-OUTPUT_TAIL_CHARS) : tail;
}

/**
 * Scores a dimension by running a test or lint command: exit code 0 is a
 * full score, anything else is zero with the output tail as a finding.
 */
export class CommandScorer implements Scorer {
  readonly dimension: string;
  private readonly spec: CommandSpec;
  private readonly run: CommandRunner;

  constructor(options: CommandScorerOptions) {
    this.dimension = options.dimension;
    this.spec = {
      command: options.command,
      args: options.args ?? [],
      cwd: options.cwd ?? process.cwd(),
      timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    };
    this.run = options.run ?? execFileRunner;
  }

  async score(_artifact: Artifact, context: ScoringContext): Promise<ScorerOutput> {
    const commandLine = [this.spec.command, ...this.spec.args].join(" ");
    logger.info({ taskId: context.task.id, iteration: context.iteration, command: commandLine }, "Running scoring command");

    const result = await this.run(this.spec, context.signal);

    if (result.timedOut) {
      throw new AgentError(
        "timeout",
        `${commandLine} timed out after ${String(this.spec.timeoutMs)}ms`,
      );
    }

    if (result.exitCode === 0) {
      return { score: 1, findings: [] };
    }

    logger.warn({ command: commandLine, exitCode: result.exitCode }, "Scoring command failed");
    return {
      score: 0,
      findings: [
        {
          severity: "important",
          dimension: this.dimension,
          title: `${commandLine} exited with code ${String(result.exitCode)}`,
          description: outputTail(result.output),
        },
      ],
    };
  }
}
