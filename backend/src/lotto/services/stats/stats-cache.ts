import { Clock } from '../../interfaces/stats.interface';

interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

/**
 * Time-bounded single-value cache with single-flight refresh.
 *
 * Concurrent callers during a refresh share the one in-flight promise, so N
 * simultaneous misses issue one load. The TTL runs from when a load
 * completes. A rejected load is not cached: the next call loads again.
 */
export class StatsCache<T> {
  private entry: CacheEntry<T> | null = null;
  private inFlight: Promise<T> | null = null;

  constructor(
    private readonly loader: () => Promise<T>,
    private readonly ttlMs: number,
    private readonly clock: Clock = () => Date.now(),
  ) {}

  /**
   * Cached value while fresh, otherwise load (or join the running load)
   */
  getOrRefresh(): Promise<T> {
    const cached = this.peek();
    if (cached !== null) {
      return Promise.resolve(cached);
    }
    return this.refresh();
  }

  /**
   * Load regardless of freshness; joins a load already running
   */
  refresh(): Promise<T> {
    if (this.inFlight) return this.inFlight;

    const pending = this.loader()
      .then((value) => {
        this.entry = { value, expiresAt: this.clock() + this.ttlMs };
        return value;
      })
      .finally(() => {
        this.inFlight = null;
      });

    this.inFlight = pending;
    return pending;
  }

  peek(): T | null {
    return this.entry && this.clock() < this.entry.expiresAt ? this.entry.value : null;
  }

  invalidate(): void {
    this.entry = null;
  }
}
