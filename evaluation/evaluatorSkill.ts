import { EvaluatorSkillError } from "../shared/errors.js";
import type { DimensionWeight, EvaluatorSkill } from "../orchestration/types.js";

export const WEIGHT_SUM_TOLERANCE = 1e-6;

const SKILL_NAME_REGEX = /^[a-z][a-z0-9_-]*$/;

export function validateEvaluatorSkill(raw: unknown): EvaluatorSkill {
  if (raw === null || typeof raw !== "object") {
    throw new EvaluatorSkillError("Evaluator skill must be a non-null object");
  }

  const record = raw as Record<string, unknown>;
  const name = validateSkillName(record["name"]);
  const categories = validateCategories(record["categories"], name);
  const dimensions = validateDimensions(record["dimensions"], name);

  return Object.freeze({ name, categories, dimensions });
}

export function assertWeightsSumToOne(skill: EvaluatorSkill): void {
  const total = skill.dimensions.reduce((sum, d) => sum + d.weight, 0);
  if (Math.abs(total - 1) > WEIGHT_SUM_TOLERANCE) {
    throw new EvaluatorSkillError(
      `Dimension weights of skill "${skill.name}" must sum to 1.0, got ${total.toFixed(6)}`,
    );
  }
}

function validateSkillName(value: unknown): string {
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new EvaluatorSkillError("Skill name must be a non-empty string");
  }
  const name = value.trim();
  if (!SKILL_NAME_REGEX.test(name)) {
    throw new EvaluatorSkillError(
      `Skill name must be lowercase letters, numbers, "-" or "_": "${name}"`,
    );
  }
  return name;
}

function validateCategories(value: unknown, skillName: string): readonly string[] {
  if (value === undefined || value === null) return Object.freeze([]);
  if (!Array.isArray(value) || !value.every((c): c is string => typeof c === "string")) {
    throw new EvaluatorSkillError(`categories of skill "${skillName}" must be a list of strings`);
  }
  return Object.freeze(value.map((c) => c.trim()).filter((c) => c.length > 0));
}

function validateDimensions(value: unknown, skillName: string): readonly DimensionWeight[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new EvaluatorSkillError(`Skill "${skillName}" must declare at least one dimension`);
  }

  const seen = new Set<string>();
  const dimensions: DimensionWeight[] = [];

  for (const entry of value) {
    if (entry === null || typeof entry !== "object") {
      throw new EvaluatorSkillError(`Skill "${skillName}" has a dimension that is not an object`);
    }
    const record = entry as Record<string, unknown>;

    const name = record["name"];
    if (typeof name !== "string" || name.trim().length === 0) {
      throw new EvaluatorSkillError(`Skill "${skillName}" has a dimension without a name`);
    }
    const dimensionName = name.trim();
    if (seen.has(dimensionName)) {
      throw new EvaluatorSkillError(`Skill "${skillName}" declares dimension "${dimensionName}" twice`);
    }
    seen.add(dimensionName);

    const weight = typeof record["weight"] === "string" ? Number(record["weight"]) : record["weight"];
    if (typeof weight !== "number" || !Number.isFinite(weight) || weight <= 0 || weight > 1) {
      throw new EvaluatorSkillError(
        `Dimension "${dimensionName}" of skill "${skillName}" must have a weight in (0, 1]. Got: "${String(record["weight"])}"`,
      );
    }

    const description = typeof record["description"] === "string" ? record["description"] : undefined;
    dimensions.push(Object.freeze({ name: dimensionName, weight, description }));
  }

  const skill: EvaluatorSkill = { name: skillName, categories: [], dimensions };
  assertWeightsSumToOne(skill);

  return Object.freeze(dimensions);
}
