import type { NoSnapshot, Snapshot } from './exposureTypes.js';

export const NO_SNAPSHOT: NoSnapshot = Object.freeze({ kind: 'no-data' });

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/**
 * Holds the latest published snapshot. Publishing swaps the reference, so a
 * reader sees either the previous snapshot or the new one, never a mix.
 */
export class SnapshotStore {
  private current: Snapshot | null = null;
  private publishedAtMs: number | null = null;
  private readonly now: () => number;

  constructor(options: { now?: () => number } = {}) {
    this.now = options.now ?? Date.now;
  }

  publish(snapshot: Snapshot): void {
    if (this.current && snapshot.sequence <= this.current.sequence) {
      throw new Error(
        `Snapshot sequence ${snapshot.sequence} is not newer than published sequence ${this.current.sequence}`,
      );
    }
    this.current = deepFreeze(snapshot);
    this.publishedAtMs = this.now();
  }

  latest(): Snapshot | NoSnapshot {
    return this.current ?? NO_SNAPSHOT;
  }

  /** Milliseconds since the last publish, or null before the first one. */
  ageMs(nowMs: number = this.now()): number | null {
    return this.publishedAtMs === null ? null : Math.max(0, nowMs - this.publishedAtMs);
  }

  nextSequence(): number {
    return (this.current?.sequence ?? 0) + 1;
  }
}
