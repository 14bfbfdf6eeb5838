/**
 * Rolling Window
 *
 * Fixed ring of time buckets. Each bucket covers `bucketMs` of wall time and
 * is lazily reset when the ring wraps around to it, so writes are O(1) and
 * old data rolls off by age without a sweep.
 */

export interface RollingWindowOptions<T> {
  /** Total span the ring can answer for (milliseconds) */
  spanMs: number;

  /** Width of a single bucket (milliseconds) */
  bucketMs: number;

  /** Factory for an empty bucket */
  create: () => T;

  /** Logical clock; defaults to Date.now() */
  now?: () => number;
}

interface Slot<T> {
  start: number;
  data: T;
}

export class RollingWindow<T> {
  private readonly bucketMs: number;
  private readonly slots: Array<Slot<T> | undefined>;
  private readonly create: () => T;
  private readonly now: () => number;

  constructor(options: RollingWindowOptions<T>) {
    if (!(options.bucketMs > 0) || !(options.spanMs >= options.bucketMs)) {
      throw new RangeError('RollingWindow requires bucketMs > 0 and spanMs >= bucketMs');
    }
    this.bucketMs = options.bucketMs;
    this.slots = new Array<Slot<T> | undefined>(Math.ceil(options.spanMs / options.bucketMs));
    this.create = options.create;
    this.now = options.now ?? Date.now;
  }

  /**
   * Bucket covering the current instant (created or recycled on demand)
   */
  public current(): T {
    const start = this.bucketStart(this.now());
    const index = this.slotIndex(start);
    const slot = this.slots[index];

    if (slot && slot.start === start) {
      return slot.data;
    }

    const fresh: Slot<T> = { start, data: this.create() };
    this.slots[index] = fresh;
    return fresh.data;
  }

  /**
   * Buckets covering the last `spanMs` (newest first), skipping empty ones.
   *
   * @param offsetMs - Shift the window into the past (e.g. the window before the recent one)
   */
  public values(spanMs: number, offsetMs = 0): T[] {
    const newest = this.bucketStart(this.now() - offsetMs);
    const count = Math.min(this.slots.length, Math.max(1, Math.ceil(spanMs / this.bucketMs)));
    const result: T[] = [];

    for (let i = 0; i < count; i++) {
      const start = newest - i * this.bucketMs;
      const slot = this.slots[this.slotIndex(start)];
      if (slot && slot.start === start) {
        result.push(slot.data);
      }
    }

    return result;
  }

  public reset(): void {
    this.slots.fill(undefined);
  }

  private bucketStart(timestamp: number): number {
    return Math.floor(timestamp / this.bucketMs) * this.bucketMs;
  }

  private slotIndex(start: number): number {
    const n = this.slots.length;
    return (((start / this.bucketMs) % n) + n) % n;
  }
}
