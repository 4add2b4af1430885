import type { ScoredMember } from './types.js';
import { resolveRange } from './range.js';

function compareEntries(a: ScoredMember, b: ScoredMember): number {
  if (a.score !== b.score) return a.score < b.score ? -1 : 1;
  if (a.member === b.member) return 0;
  return a.member < b.member ? -1 : 1;
}

/**
 * Members ordered by (score, member) with a member → score index.
 *
 * Inserts binary-search their slot and shift the tail, which is fine at the sizes
 * this engine targets. Both structures are only touched from inside a single keyspace
 * operation, so they never disagree.
 */
export class SortedSet {
  private entries: ScoredMember[] = [];
  private index = new Map<string, number>();

  get size(): number {
    return this.entries.length;
  }

  score(member: string): number | null {
    return this.index.get(member) ?? null;
  }

  /**
   * Returns true when the member is new or its score changed.
   */
  add(member: string, score: number): boolean {
    const current = this.index.get(member);
    if (current !== undefined) {
      if (current === score) return false;
      this.remove(member);
    }
    const entry: ScoredMember = { member, score };
    this.entries.splice(this.lowerBound(entry), 0, entry);
    this.index.set(member, score);
    return true;
  }

  remove(member: string): boolean {
    const score = this.index.get(member);
    if (score === undefined) return false;
    const pos = this.lowerBound({ member, score });
    if (pos < this.entries.length && this.entries[pos].member === member) {
      this.entries.splice(pos, 1);
    }
    this.index.delete(member);
    return true;
  }

  range(start: number, stop: number): string[] {
    return this.rangeWithScores(start, stop).map(e => e.member);
  }

  rangeWithScores(start: number, stop: number): ScoredMember[] {
    const bounds = resolveRange(this.entries.length, start, stop);
    if (!bounds) return [];
    return this.entries.slice(bounds.start, bounds.stop + 1).map(e => ({ ...e }));
  }

  members(): string[] {
    return this.entries.map(e => e.member);
  }

  private lowerBound(entry: ScoredMember): number {
    let lo = 0;
    let hi = this.entries.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (compareEntries(this.entries[mid], entry) < 0) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return lo;
  }
}
