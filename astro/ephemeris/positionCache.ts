import { astroLogHelpers } from "../../logging/astroLog.js";
import type { PositionSet, ReferenceFrame } from "./types.js";

/**
 * Bounded least-recently-used cache of position sets.
 * Map iteration order is insertion order, so the first key is the oldest.
 */
export class PositionCache {
  private readonly entries = new Map<string, PositionSet>();

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Cache capacity must be a positive integer, got ${capacity}`);
    }
  }

  static key(epochMs: number, frame: ReferenceFrame): string {
    return `${epochMs}:${frame}`;
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: string): PositionSet | undefined {
    const hit = this.entries.get(key);
    if (hit === undefined) return undefined;
    this.entries.delete(key);
    this.entries.set(key, hit);
    return hit;
  }

  set(key: string, value: PositionSet): void {
    this.entries.delete(key);
    this.entries.set(key, value);

    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      astroLogHelpers.cacheEvicted({ key: oldest.value, size: this.entries.size });
    }
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  clear(): void {
    this.entries.clear();
  }
}
