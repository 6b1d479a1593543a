import type { HealthRecord, TimeRange } from '@voltwatch/domain';

export const DEFAULT_MAX_HISTORY_ENTRIES = 1000;

/**
 * Append-ordered, capacity-bounded buffer of one vehicle's snapshots.
 * Records are never re-sorted, so out-of-order timestamps stay where they landed.
 */
export class HistoryStore {
  private readonly entries: HealthRecord[] = [];

  constructor(readonly maxEntries: number = DEFAULT_MAX_HISTORY_ENTRIES) {}

  append(record: HealthRecord): void {
    this.entries.push(record);
    while (this.entries.length > this.maxEntries) {
      this.entries.shift();
    }
  }

  /** Records with startTime < timestamp < endTime, in stored order. */
  query(range: TimeRange): HealthRecord[] {
    const start = range.startTime.getTime();
    const end = range.endTime.getTime();
    return this.entries.filter((r) => {
      const ts = r.timestamp.getTime();
      return ts > start && ts < end;
    });
  }

  latest(): HealthRecord | null {
    return this.entries[this.entries.length - 1] ?? null;
  }

  /** Drops head entries stamped before `cutoff`. Returns how many were removed. */
  pruneOlderThan(cutoff: Date): number {
    const limit = cutoff.getTime();
    let removed = 0;
    while (this.entries.length > 0 && (this.entries[0]?.timestamp.getTime() ?? limit) < limit) {
      this.entries.shift();
      removed++;
    }
    return removed;
  }

  clear(): void {
    this.entries.length = 0;
  }

  /** Copy of the buffer; with `limit`, only the most recent N in chronological order. */
  snapshot(limit?: number): HealthRecord[] {
    if (limit !== undefined && this.entries.length > limit) {
      return this.entries.slice(this.entries.length - Math.max(0, limit));
    }
    return [...this.entries];
  }

  get size(): number {
    return this.entries.length;
  }
}
