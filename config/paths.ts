import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { logger } from "./logger.js";

let _resolvedHome: string | null = null;

function resolveCadenceHome(): string {
  if (!_resolvedHome) {
    _resolvedHome = process.env.CADENCE_HOME ?? path.join(os.homedir(), ".cadence-agent");
    logger.debug({ cadenceHome: _resolvedHome }, "CADENCE_HOME resolved");
  }
  return _resolvedHome;
}

export function getCadenceHome(): string {
  return resolveCadenceHome();
}

export function getConfigPath(): string {
  return path.join(resolveCadenceHome(), "config.yaml");
}

export function getStateDir(): string {
  return path.join(resolveCadenceHome(), "state");
}

export function getSkillsDir(): string {
  return process.env.CADENCE_SKILLS_DIR ?? path.join(resolveCadenceHome(), "skills");
}

export function getDatabasePath(): string {
  return path.join(resolveCadenceHome(), "cadence.db");
}

export function ensureCadenceDirectories(): void {
  const dirs = [getCadenceHome(), getStateDir(), getSkillsDir()];

  for (const dir of dirs) {
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
      logger.info({ dir }, "Created cadence directory");
    }
  }
}
