import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { DEFAULT_ENGINE_CONFIG, saveEngineConfig } from "../config/iteration.js";
import { logger } from "../config/logger.js";
import { FileSkillSelector, loadAllSkills } from "../evaluation/skillLoader.js";
import { CommandScorer } from "../evaluation/scorers/commandScorer.js";
import { LlmJudge } from "../evaluation/scorers/llmJudgeScorer.js";
import type { ChatFn } from "../llm/client.js";
import type { EvaluatorSkill, Scorer } from "../orchestration/types.js";

export const TEST_DIMENSION = "tests";

const here = path.dirname(fileURLToPath(import.meta.url));

/** Skills shipped with the package; resolves from both the sources and dist/. */
export function bundledSkillsDir(): string {
  const candidates = [path.resolve(here, "..", "skills"), path.resolve(here, "..", "..", "skills")];
  return candidates.find((dir) => fs.existsSync(dir)) ?? candidates[0] ?? "skills";
}

export function loadSkills(skillsDir: string, fallbackDir: string = bundledSkillsDir()): readonly EvaluatorSkill[] {
  const skills = loadAllSkills(skillsDir);
  if (skills.length > 0) return skills;

  logger.info({ skillsDir, fallbackDir }, "No evaluator skills found, using bundled skills");
  return loadAllSkills(fallbackDir);
}

export function createSkillSelector(skills: readonly EvaluatorSkill[]): FileSkillSelector {
  return new FileSkillSelector(skills);
}

export interface ScorerSetup {
  readonly chat: ChatFn;
  readonly skills: readonly EvaluatorSkill[];
  /** Shell-free command line, split on whitespace, run for the "tests" dimension. */
  readonly testCommand?: string;
  readonly cwd?: string;
}

/**
 * One judge-backed scorer per dimension named by any loaded skill. When a
 * test command is configured it takes over the "tests" dimension.
 */
export function buildScorers(setup: ScorerSetup): readonly Scorer[] {
  const dimensions = new Set(setup.skills.flatMap((s) => s.dimensions.map((d) => d.name)));
  const [command, ...args] = (setup.testCommand ?? "").trim().split(/\s+/).filter(Boolean);

  const judge = new LlmJudge(setup.chat);

  if (command === undefined) {
    return judge.scorers(dimensions);
  }

  dimensions.delete(TEST_DIMENSION);
  return [
    ...judge.scorers(dimensions),
    new CommandScorer({ dimension: TEST_DIMENSION, command, args, cwd: setup.cwd }),
  ];
}

export interface InitPaths {
  readonly configPath: string;
  readonly skillsDir: string;
  readonly sourceSkillsDir?: string;
}

/** Writes the default config and copies bundled skills; returns the files written. */
export function initHome(paths: InitPaths, force: boolean): readonly string[] {
  const written: string[] = [];

  if (force || !fs.existsSync(paths.configPath)) {
    saveEngineConfig(DEFAULT_ENGINE_CONFIG, paths.configPath);
    written.push(paths.configPath);
  }

  const sourceDir = paths.sourceSkillsDir ?? bundledSkillsDir();
  fs.mkdirSync(paths.skillsDir, { recursive: true });

  const files = fs
    .readdirSync(sourceDir)
    .filter((f) => f.endsWith(".yaml") || f.endsWith(".yml"))
    .sort();

  for (const file of files) {
    const target = path.join(paths.skillsDir, file);
    if (!force && fs.existsSync(target)) continue;
    fs.copyFileSync(path.join(sourceDir, file), target);
    written.push(target);
  }

  return written;
}
