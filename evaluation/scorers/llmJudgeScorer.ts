import { logger } from "../../config/logger.js";
import type { ChatFn } from "../../llm/client.js";
import { AgentError } from "../../shared/errors.js";
import type {
  Artifact,
  EvaluatorSkill,
  Finding,
  Scorer,
  ScorerOutput,
  ScoringContext,
  TokenUsage,
} from "../../orchestration/types.js";
import { parseJudgeResponse } from "../judgeResponseParser.js";
import type { ParsedJudgeResponse } from "../judgeResponseParser.js";

export interface LlmJudgeOptions {
  readonly maxOutputTokens?: number;
  readonly maxArtifactChars?: number;
}

const DEFAULT_MAX_OUTPUT_TOKENS = 1_024;
const DEFAULT_MAX_ARTIFACT_CHARS = 24_000;
const MAX_CACHED_VERDICTS = 16;

interface JudgeVerdict {
  readonly parsed: ParsedJudgeResponse;
  readonly usage: TokenUsage;
}

interface CachedVerdict {
  readonly pending: Promise<JudgeVerdict>;
  /** Set once a dimension scorer has reported the call's usage. */
  usageClaimed: boolean;
}

export function buildJudgeSystemPrompt(skill: EvaluatorSkill): string {
  const rubric = skill.dimensions
    .map((d) => `- ${d.name} (weight ${d.weight.toFixed(2)})${d.description ? `: ${d.description}` : ""}`)
    .join("\n");

  return [
    "You are an evaluator. Score the output against each rubric dimension from 0.0 to 1.0.",
    "",
    "Rubric:",
    rubric,
    "",
    "Reply in exactly this format:",
    "SCORES:",
    ...skill.dimensions.map((d) => `${d.name}: <score>`),
    "FINDINGS:",
    "- [BLOCKER|IMPORTANT|SUGGESTION][dimension] title: description",
    "SUGGESTION: brief improvement guidance",
  ].join("\n");
}

export function buildJudgeUserMessage(taskDescription: string, artifact: Artifact, maxChars: number): string {
  const content =
    artifact.content.length > maxChars
      ? `${artifact.content.slice(0, maxChars)}\n[... truncated ${String(artifact.content.length - maxChars)} chars]`
      : artifact.content;

  return `Task:\n${taskDescription}\n\nOutput to evaluate:\n${content}`;
}

/**
 * One judge call per artifact, shared by a scorer per dimension. Each
 * dimension scorer reads its own score out of the same reply; the call's
 * token usage is reported by the first of them only.
 */
export class LlmJudge {
  private readonly verdicts = new Map<string, CachedVerdict>();
  private readonly maxOutputTokens: number;
  private readonly maxArtifactChars: number;

  constructor(
    private readonly chat: ChatFn,
    options: LlmJudgeOptions = {},
  ) {
    this.maxOutputTokens = options.maxOutputTokens ?? DEFAULT_MAX_OUTPUT_TOKENS;
    this.maxArtifactChars = options.maxArtifactChars ?? DEFAULT_MAX_ARTIFACT_CHARS;
  }

  scorerFor(dimension: string): Scorer {
    return {
      dimension,
      score: (artifact, context) => this.scoreDimension(dimension, artifact, context),
    };
  }

  scorers(dimensions: Iterable<string>): readonly Scorer[] {
    return [...new Set(dimensions)].map((d) => this.scorerFor(d));
  }

  private async scoreDimension(dimension: string, artifact: Artifact, context: ScoringContext): Promise<ScorerOutput> {
    const entry = this.verdictFor(artifact, context);
    const { parsed, usage } = await entry.pending;

    const score = parsed.scores.get(dimension.toLowerCase());
    if (score === undefined) {
      throw new AgentError("provider", `Judge reply has no score for dimension "${dimension}"`, {
        transient: false,
      });
    }

    const findings = findingsFor(dimension, parsed.findings, context.skill);
    if (entry.usageClaimed) return { score, findings };

    entry.usageClaimed = true;
    return { score, findings, usage };
  }

  private verdictFor(artifact: Artifact, context: ScoringContext): CachedVerdict {
    const key = `${context.task.id}:${String(context.iteration)}:${artifact.id}`;
    const cached = this.verdicts.get(key);
    if (cached) return cached;

    const pending = this.requestVerdict(artifact, context);
    const entry: CachedVerdict = { pending, usageClaimed: false };
    this.verdicts.set(key, entry);
    void pending.catch(() => {
      this.verdicts.delete(key);
    });

    while (this.verdicts.size > MAX_CACHED_VERDICTS) {
      const oldest = this.verdicts.keys().next();
      if (oldest.done) break;
      this.verdicts.delete(oldest.value);
    }

    return entry;
  }

  private async requestVerdict(artifact: Artifact, context: ScoringContext): Promise<JudgeVerdict> {
    const response = await this.chat(
      {
        system: buildJudgeSystemPrompt(context.skill),
        userMessage: buildJudgeUserMessage(context.task.description, artifact, this.maxArtifactChars),
        maxOutputTokens: this.maxOutputTokens,
      },
      context.signal,
    );

    const verdict = parseJudgeResponse(response.text);
    logger.debug(
      {
        taskId: context.task.id,
        iteration: context.iteration,
        scores: Object.fromEntries(verdict.scores),
        findings: verdict.findings.length,
        judgeTokens: response.usage.inputTokens + response.usage.outputTokens,
      },
      "Judge verdict parsed",
    );

    if (verdict.scores.size === 0) {
      throw new AgentError("provider", "Judge reply contained no scores", { transient: true });
    }
    return { parsed: verdict, usage: response.usage };
  }
}

/**
 * Findings tagged with this dimension, plus untagged or unknown-dimension
 * findings when this is the skill's first dimension.
 */
function findingsFor(dimension: string, findings: readonly Finding[], skill: EvaluatorSkill): readonly Finding[] {
  const known = new Set(skill.dimensions.map((d) => d.name.toLowerCase()));
  const primary = skill.dimensions[0]?.name.toLowerCase();
  const own = dimension.toLowerCase();

  return findings
    .filter((f) => f.dimension === own || (own === primary && !known.has(f.dimension)))
    .map((f) => ({ ...f, dimension }));
}
