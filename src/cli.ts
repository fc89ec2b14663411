import type { TaskSubmission } from "../orchestration/taskSubmission.js";
import type { TaskOutcome } from "../orchestration/types.js";

export type CliCommand =
  | { readonly command: "run"; readonly submission: TaskSubmission }
  | { readonly command: "history"; readonly limit: number }
  | { readonly command: "init"; readonly force: boolean }
  | { readonly command: "help" };

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export const USAGE = [
  "Usage:",
  '  cadence run "<task>" [--category <name>] [--max-iterations <n>] [--quality-threshold <q>]',
  "                       [--token-budget <tokens>] [--time-budget <seconds>]",
  "  cadence history [--limit <n>]",
  "  cadence init [--force]",
].join("\n");

const RUN_FLAGS = new Set([
  "--category",
  "--max-iterations",
  "--quality-threshold",
  "--token-budget",
  "--time-budget",
]);

const DEFAULT_HISTORY_LIMIT = 10;

function flagValue(args: readonly string[], flag: string): string | undefined {
  const index = args.indexOf(flag);
  if (index === -1) return undefined;
  const value = args[index + 1];
  if (value === undefined || value.startsWith("--")) {
    throw new CliUsageError(`${flag} requires a value`);
  }
  return value;
}

function numericFlag(args: readonly string[], flag: string): number | undefined {
  const raw = flagValue(args, flag);
  return raw === undefined ? undefined : Number(raw);
}

function positionals(
  args: readonly string[],
  valueFlags: ReadonlySet<string>,
  switches: ReadonlySet<string> = new Set(),
): readonly string[] {
  const result: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";
    if (valueFlags.has(arg)) {
      i += 1;
      continue;
    }
    if (arg.startsWith("--")) {
      if (!switches.has(arg)) {
        throw new CliUsageError(`Unknown option: ${arg}`);
      }
      continue;
    }
    result.push(arg);
  }
  return result;
}

export function parseCliArgs(argv: readonly string[]): CliCommand {
  const [command, ...rest] = argv;

  switch (command) {
    case "run": {
      const words = positionals(rest, RUN_FLAGS);
      if (words.length === 0) {
        throw new CliUsageError("run requires a task description");
      }
      return {
        command: "run",
        submission: {
          description: words.join(" "),
          category: flagValue(rest, "--category") ?? null,
          maxIterations: numericFlag(rest, "--max-iterations"),
          qualityThreshold: numericFlag(rest, "--quality-threshold"),
          tokenBudget: numericFlag(rest, "--token-budget"),
          timeBudgetSeconds: numericFlag(rest, "--time-budget"),
        },
      };
    }
    case "history": {
      positionals(rest, new Set(["--limit"]));
      const limit = numericFlag(rest, "--limit") ?? DEFAULT_HISTORY_LIMIT;
      if (!Number.isInteger(limit) || limit < 1) {
        throw new CliUsageError(`--limit must be a positive integer. Got: ${String(limit)}`);
      }
      return { command: "history", limit };
    }
    case "init":
      positionals(rest, new Set(), new Set(["--force"]));
      return { command: "init", force: rest.includes("--force") };
    case undefined:
    case "help":
    case "--help":
      return { command: "help" };
    default:
      throw new CliUsageError(`Unknown command: ${command}`);
  }
}

/** 0 when quality was met, 2 for other stops, 1 on failure, 130 when cancelled. */
export function exitCodeFor(outcome: TaskOutcome): number {
  switch (outcome.status) {
    case "stopped":
      return outcome.decision.type === "quality_met" ? 0 : 2;
    case "failed":
      return 1;
    case "cancelled":
      return 130;
  }
}
