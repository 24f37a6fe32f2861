import type { Month } from '../domain/types.js';
import type { PlannerSnapshot } from './snapshot.js';

/**
 * Per-user snapshot cache.
 *
 * Any write for a user must be followed by invalidate(userId) before the next
 * read, otherwise overspend checks run against pre-write totals.
 */
export class PlannerCache {
  private readonly entries = new Map<string, PlannerSnapshot>();

  /** A snapshot from an earlier month counts as a miss */
  get(userId: string, month: Month): PlannerSnapshot | undefined {
    const snapshot = this.entries.get(userId);
    if (!snapshot) return undefined;
    if (snapshot.month !== month) {
      this.entries.delete(userId);
      return undefined;
    }
    return snapshot;
  }

  set(snapshot: PlannerSnapshot): void {
    this.entries.set(snapshot.userId, snapshot);
  }

  invalidate(userId: string): void {
    this.entries.delete(userId);
  }

  has(userId: string): boolean {
    return this.entries.has(userId);
  }
}
