import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { DEFAULT_ENGINE_CONFIG, loadEngineConfig } from "../config/iteration.js";
import type { ChatFn } from "../llm/client.js";
import { CommandScorer } from "../evaluation/scorers/commandScorer.js";
import { buildScorers, bundledSkillsDir, initHome, loadSkills } from "./runtime.js";

const unusedChat: ChatFn = () => Promise.reject(new Error("chat should not be called"));

describe("src/runtime", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "cadence-runtime-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("should fall back to bundled skills when the skills directory is empty", () => {
    const skills = loadSkills(dir);

    assert.deepEqual(
      skills.map((s) => s.name),
      ["code", "general"],
    );
  });

  it("should build one judge scorer per distinct dimension", () => {
    const skills = loadSkills(bundledSkillsDir());

    const scorers = buildScorers({ chat: unusedChat, skills });

    assert.deepEqual(
      scorers.map((s) => s.dimension),
      ["correctness", "tests", "maintainability", "completeness", "clarity"],
    );
  });

  it("should hand the tests dimension to a command scorer when a test command is set", () => {
    const skills = loadSkills(bundledSkillsDir());

    const scorers = buildScorers({ chat: unusedChat, skills, testCommand: "  npm test  " });

    assert.deepEqual(
      scorers.map((s) => s.dimension),
      ["correctness", "maintainability", "completeness", "clarity", "tests"],
    );
    assert.ok(scorers.at(-1) instanceof CommandScorer);
  });

  it("should write the default config and bundled skills once", () => {
    const configPath = path.join(dir, "config.yaml");
    const skillsDir = path.join(dir, "skills");

    const first = initHome({ configPath, skillsDir }, false);
    const second = initHome({ configPath, skillsDir }, false);

    assert.deepEqual(first, [configPath, path.join(skillsDir, "code.yaml"), path.join(skillsDir, "general.yaml")]);
    assert.deepEqual(second, []);
    assert.deepEqual(loadEngineConfig({ configPath, env: {} }), DEFAULT_ENGINE_CONFIG);
  });

  it("should overwrite existing files when forced", () => {
    const configPath = path.join(dir, "config.yaml");
    const skillsDir = path.join(dir, "skills");
    initHome({ configPath, skillsDir }, false);

    assert.equal(initHome({ configPath, skillsDir }, true).length, 3);
  });
});
