/**
 * Single-entry cache with a freshness window.
 */

/** Milliseconds since the epoch. */
export type Clock = () => number;

interface SlotEntry<T> {
  readonly value: T;
  readonly storedAt: number;
  readonly ttlMs: number;
}

export interface TtlSlotOptions {
  ttlSeconds: number;
  clock?: Clock;
}

/**
 * Holds at most one value. `get()` serves it while it is no older than the TTL and
 * reloads it otherwise. A reload replaces the entry whole; if the producer throws,
 * the slot is left empty and the error propagates.
 *
 * A reload that was already running when `invalidate()` was called still returns its
 * value to its caller, but does not store it.
 */
export class TtlSlot<T> {
  private entry: SlotEntry<T> | null = null;
  private generation = 0;
  protected readonly ttlSeconds: number;
  private readonly clock: Clock;

  constructor(
    private readonly produce: () => Promise<T>,
    options: TtlSlotOptions
  ) {
    this.ttlSeconds = options.ttlSeconds;
    this.clock = options.clock ?? Date.now;
  }

  /** Lifetime of a freshly produced value. Subclasses may shorten it per value. */
  protected ttlSecondsFor(value: T): number {
    return this.ttlSeconds;
  }

  isFresh(): boolean {
    return this.entry !== null && this.clock() - this.entry.storedAt <= this.entry.ttlMs;
  }

  async get(): Promise<T> {
    if (this.entry !== null && this.isFresh()) {
      return this.entry.value;
    }
    return this.refresh();
  }

  async refresh(): Promise<T> {
    const generation = this.generation;
    let value: T;
    try {
      value = await this.produce();
    } catch (err) {
      if (generation === this.generation) {
        this.entry = null;
      }
      throw err;
    }
    if (generation === this.generation) {
      this.entry = { value, storedAt: this.clock(), ttlMs: this.ttlSecondsFor(value) * 1000 };
    }
    return value;
  }

  /** Forces the next `get()` to reload regardless of age. */
  invalidate(): void {
    this.generation++;
    this.entry = null;
  }
}
