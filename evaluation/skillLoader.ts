import fs from "node:fs";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { logger } from "../config/logger.js";
import { getSkillsDir } from "../config/paths.js";
import { EvaluatorSkillError } from "../shared/errors.js";
import type { EvaluatorSkill, SkillSelector, Task } from "../orchestration/types.js";
import { validateEvaluatorSkill } from "./evaluatorSkill.js";

export const FALLBACK_SKILL_NAME = "general";
const SKILL_FILE_EXTENSIONS = new Set([".yaml", ".yml"]);

export function loadSkillFile(filePath: string): EvaluatorSkill {
  if (!fs.existsSync(filePath)) {
    throw new EvaluatorSkillError(`Evaluator skill not found at ${filePath}`);
  }

  const raw = fs.readFileSync(filePath, "utf-8");
  const parsed: unknown = parseYaml(raw);

  return validateEvaluatorSkill(parsed);
}

/** Loads every skill file in `skillsDir`; invalid files are logged and skipped. */
export function loadAllSkills(skillsDir: string = getSkillsDir()): readonly EvaluatorSkill[] {
  if (!fs.existsSync(skillsDir)) {
    logger.info({ skillsDir }, "No skills directory found, skipping skill loading");
    return [];
  }

  const entries = fs
    .readdirSync(skillsDir, { withFileTypes: true })
    .filter((e) => e.isFile() && SKILL_FILE_EXTENSIONS.has(path.extname(e.name)))
    .sort((a, b) => a.name.localeCompare(b.name));

  const skills: EvaluatorSkill[] = [];
  const seen = new Set<string>();

  for (const entry of entries) {
    const filePath = path.join(skillsDir, entry.name);
    try {
      const skill = loadSkillFile(filePath);
      if (seen.has(skill.name)) {
        logger.warn({ file: entry.name, skill: skill.name }, "Duplicate skill name, skipping");
        continue;
      }
      seen.add(skill.name);
      skills.push(skill);
      logger.debug({ skill: skill.name, dimensions: skill.dimensions.length }, "Evaluator skill loaded");
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn({ file: entry.name, error: message }, "Failed to load evaluator skill, skipping");
    }
  }

  return skills;
}

/**
 * Picks the first skill whose categories include the task's category, and
 * falls back to the skill named "general".
 */
export class FileSkillSelector implements SkillSelector {
  constructor(private readonly skills: readonly EvaluatorSkill[]) {}

  static fromDirectory(skillsDir: string = getSkillsDir()): FileSkillSelector {
    return new FileSkillSelector(loadAllSkills(skillsDir));
  }

  select(task: Task): EvaluatorSkill {
    const category = task.category?.toLowerCase() ?? null;

    if (category !== null) {
      const match = this.skills.find((s) => s.categories.some((c) => c.toLowerCase() === category));
      if (match) return match;
    }

    const fallback = this.skills.find((s) => s.name === FALLBACK_SKILL_NAME);
    if (!fallback) {
      throw new EvaluatorSkillError(
        `No evaluator skill matches category "${category ?? "none"}" and no "${FALLBACK_SKILL_NAME}" skill is loaded`,
      );
    }
    return fallback;
  }

  names(): readonly string[] {
    return this.skills.map((s) => s.name);
  }
}
