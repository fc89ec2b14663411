import type { TokenUsage } from "../orchestration/types.js";

/** USD per million tokens. */
export interface TokenPrice {
  readonly inputPerMTok: number;
  readonly outputPerMTok: number;
}

export interface ModelPrice extends TokenPrice {
  /** Case-insensitive substring of the model id. */
  readonly match: string;
}

export const FALLBACK_TOKEN_PRICE: TokenPrice = Object.freeze({ inputPerMTok: 1, outputPerMTok: 3 });

// Ordered: the first matching entry wins, so narrower ids come first.
export const DEFAULT_MODEL_PRICES: readonly ModelPrice[] = Object.freeze([
  { match: "claude-opus", inputPerMTok: 15, outputPerMTok: 75 },
  { match: "claude-sonnet", inputPerMTok: 3, outputPerMTok: 15 },
  { match: "haiku", inputPerMTok: 0.8, outputPerMTok: 4 },
  { match: "gpt-4.1-mini", inputPerMTok: 0.4, outputPerMTok: 1.6 },
  { match: "gpt-4.1", inputPerMTok: 2, outputPerMTok: 8 },
  { match: "gpt-4o-mini", inputPerMTok: 0.15, outputPerMTok: 0.6 },
  { match: "gpt-4o", inputPerMTok: 2.5, outputPerMTok: 10 },
  { match: "o3-mini", inputPerMTok: 1.1, outputPerMTok: 4.4 },
  { match: "o4-mini", inputPerMTok: 1.1, outputPerMTok: 4.4 },
  { match: "o3", inputPerMTok: 10, outputPerMTok: 40 },
  { match: "gemini-2.5-pro", inputPerMTok: 1.25, outputPerMTok: 10 },
  { match: "gemini-2.5-flash", inputPerMTok: 0.15, outputPerMTok: 0.6 },
  { match: "gemini-2.0-flash", inputPerMTok: 0.1, outputPerMTok: 0.4 },
  { match: "gemini-1.5-pro", inputPerMTok: 1.25, outputPerMTok: 5 },
  { match: "gemini-1.5-flash", inputPerMTok: 0.075, outputPerMTok: 0.3 },
  { match: "llama", inputPerMTok: 0, outputPerMTok: 0 },
  { match: "mistral", inputPerMTok: 0, outputPerMTok: 0 },
  { match: "gemma", inputPerMTok: 0, outputPerMTok: 0 },
  { match: "qwen", inputPerMTok: 0, outputPerMTok: 0 },
  { match: "codestral", inputPerMTok: 0, outputPerMTok: 0 },
  { match: "deepseek", inputPerMTok: 0, outputPerMTok: 0 },
]);

/**
 * Resolves the price of a model id. Configured overrides are consulted
 * before the built-in table; unknown models get the fallback price.
 */
export function priceForModel(model: string, overrides: readonly ModelPrice[] = []): TokenPrice {
  const id = model.toLowerCase();
  for (const entry of [...overrides, ...DEFAULT_MODEL_PRICES]) {
    if (entry.match.length > 0 && id.includes(entry.match.toLowerCase())) {
      return { inputPerMTok: entry.inputPerMTok, outputPerMTok: entry.outputPerMTok };
    }
  }
  return FALLBACK_TOKEN_PRICE;
}

export function costOfUsage(usage: TokenUsage, price: TokenPrice): number {
  return (usage.inputTokens * price.inputPerMTok + usage.outputTokens * price.outputPerMTok) / 1_000_000;
}
