export const DEFAULT_REGRESSION_EPSILON = 0;

/** Append-only sequence of evaluated aggregate scores for one task. */
export class ScoreHistory {
  private readonly scores: number[] = [];

  push(score: number): void {
    if (!Number.isFinite(score) || score < 0 || score > 1) {
      throw new RangeError(`score must be within [0, 1], got ${String(score)}`);
    }
    this.scores.push(score);
  }

  latest(): number | null {
    return this.scores.at(-1) ?? null;
  }

  previous(): number | null {
    return this.scores.length >= 2 ? (this.scores.at(-2) ?? null) : null;
  }

  best(): number | null {
    if (this.scores.length === 0) return null;
    return Math.max(...this.scores);
  }

  size(): number {
    return this.scores.length;
  }

  all(): readonly number[] {
    return Object.freeze([...this.scores]);
  }
}

export function isRegression(
  current: number,
  previous: number | null,
  epsilon: number = DEFAULT_REGRESSION_EPSILON,
): boolean {
  if (previous === null) return false;
  return current < previous - epsilon;
}
