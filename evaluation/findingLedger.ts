import type { Finding, FindingRecord } from "../orchestration/types.js";

interface StoredFinding {
  readonly id: number;
  readonly iteration: number;
  readonly finding: Finding;
}

interface Resolution {
  readonly findingId: number;
  readonly iteration: number;
}

function findingKey(finding: Finding): string {
  return `${finding.dimension}\u0000${finding.title.trim().toLowerCase()}`;
}

/**
 * Append-only store of findings across a task's iterations. Resolutions are
 * kept as separate entries; a stored finding is never edited.
 */
export class FindingLedger {
  private readonly entries: StoredFinding[] = [];
  private readonly resolutions: Resolution[] = [];

  append(iteration: number, findings: readonly Finding[]): readonly number[] {
    const ids: number[] = [];
    for (const finding of findings) {
      const id = this.entries.length;
      this.entries.push(Object.freeze({ id, iteration, finding: Object.freeze({ ...finding }) }));
      ids.push(id);
    }
    return ids;
  }

  /**
   * Marks open findings from earlier iterations as resolved by `iteration`
   * when the latest evaluation no longer reports them.
   */
  resolveAbsent(iteration: number, current: readonly Finding[]): readonly number[] {
    const stillReported = new Set(current.map(findingKey));
    const resolvedIds = this.resolvedIds();
    const newlyResolved: number[] = [];

    for (const entry of this.entries) {
      if (entry.iteration >= iteration) continue;
      if (resolvedIds.has(entry.id)) continue;
      if (stillReported.has(findingKey(entry.finding))) continue;

      this.resolutions.push(Object.freeze({ findingId: entry.id, iteration }));
      newlyResolved.push(entry.id);
    }

    return newlyResolved;
  }

  records(): readonly FindingRecord[] {
    const resolvedBy = new Map(this.resolutions.map((r) => [r.findingId, r.iteration]));
    return this.entries.map((entry) => ({
      id: entry.id,
      iteration: entry.iteration,
      finding: entry.finding,
      resolvedByIteration: resolvedBy.get(entry.id) ?? null,
    }));
  }

  /** One finding per dimension and title; the most recent report wins. */
  openFindings(): readonly Finding[] {
    const resolvedIds = this.resolvedIds();
    const latest = new Map<string, Finding>();
    for (const entry of this.entries) {
      if (resolvedIds.has(entry.id)) continue;
      latest.set(findingKey(entry.finding), entry.finding);
    }
    return [...latest.values()];
  }

  forIteration(iteration: number): readonly Finding[] {
    return this.entries.filter((e) => e.iteration === iteration).map((e) => e.finding);
  }

  private resolvedIds(): Set<number> {
    return new Set(this.resolutions.map((r) => r.findingId));
  }
}
