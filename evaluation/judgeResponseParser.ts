import type { Finding, Severity } from "../orchestration/types.js";

export interface ParsedJudgeResponse {
  readonly scores: ReadonlyMap<string, number>;
  readonly findings: readonly Finding[];
  readonly suggestion: string;
}

type Section = "none" | "scores" | "findings" | "suggestion";

const SEVERITY_ALIASES: Readonly<Record<string, Severity>> = {
  BLOCKER: "blocker",
  CRITICAL: "blocker",
  IMPORTANT: "important",
  MAJOR: "important",
  HIGH: "important",
  SUGGESTION: "suggestion",
  MINOR: "suggestion",
  LOW: "suggestion",
};

const FINDING_REGEX = /^\[([A-Za-z]+)\](?:\[([A-Za-z0-9_-]+)\])?\s*(.*)$/;

/**
 * Parses a judge reply in the form:
 *
 * ```text
 * SCORES:
 * correctness: 0.85
 * FINDINGS:
 * - [BLOCKER][security] title: description
 * SUGGESTION: brief guidance
 * ```
 *
 * Dimension names are lowercased. Findings without a dimension tag carry an
 * empty dimension for the caller to fill in.
 */
export function parseJudgeResponse(text: string): ParsedJudgeResponse {
  const scores = new Map<string, number>();
  const findings: Finding[] = [];
  const suggestion: string[] = [];
  let section: Section = "none";

  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();

    const header = matchHeader(trimmed);
    if (header) {
      section = header.section;
      if (header.rest.length > 0 && section === "suggestion") suggestion.push(header.rest);
      continue;
    }

    switch (section) {
      case "scores": {
        const parsed = parseScoreLine(trimmed);
        if (parsed && !scores.has(parsed.name)) scores.set(parsed.name, parsed.score);
        break;
      }
      case "findings": {
        const finding = parseFindingLine(trimmed);
        if (finding) findings.push(finding);
        break;
      }
      case "suggestion":
        if (trimmed.length > 0) suggestion.push(trimmed);
        break;
      case "none":
        break;
    }
  }

  return { scores, findings, suggestion: suggestion.join(" ") };
}

function matchHeader(line: string): { section: Section; rest: string } | null {
  const headers: ReadonlyArray<[string, Section]> = [
    ["SCORES:", "scores"],
    ["## Scores", "scores"],
    ["FINDINGS:", "findings"],
    ["NEW_FINDINGS:", "findings"],
    ["## Findings", "findings"],
    ["SUGGESTION:", "suggestion"],
    ["## Suggestion", "suggestion"],
  ];

  for (const [prefix, section] of headers) {
    if (line.startsWith(prefix)) {
      return { section, rest: line.slice(prefix.length).trim() };
    }
  }
  return null;
}

/** `correctness: 0.85` or `- correctness: 0.85`; out-of-range scores are dropped. */
export function parseScoreLine(line: string): { name: string; score: number } | null {
  const body = line.trim().replace(/^-+/, "").trim();
  const colon = body.indexOf(":");
  if (colon <= 0) return null;

  const name = body.slice(0, colon).trim().toLowerCase();
  const rawScore = body.slice(colon + 1).trim();
  if (rawScore.length === 0) return null;

  const score = Number(rawScore);
  if (!Number.isFinite(score) || score < 0 || score > 1) return null;

  return { name, score };
}

export function parseFindingLine(line: string): Finding | null {
  const body = line.trim().replace(/^-+/, "").trim();
  if (body.length === 0) return null;

  const match = FINDING_REGEX.exec(body);
  if (!match) {
    return { severity: "suggestion", dimension: "", title: body, description: "" };
  }

  const severity = SEVERITY_ALIASES[(match[1] ?? "").toUpperCase()] ?? "suggestion";
  const dimension = (match[2] ?? "").toLowerCase();
  const rest = (match[3] ?? "").trim();

  const colon = rest.indexOf(":");
  const title = colon === -1 ? rest : rest.slice(0, colon).trim();
  const description = colon === -1 ? "" : rest.slice(colon + 1).trim();

  return { severity, dimension, title, description };
}
