import type { Neighborhood } from '../types.js';
import type { ProviderResult } from './ports.js';
import { normalizeWhitespace } from './normalize.js';

export const DEFAULT_NEIGHBORHOOD_CACHE_ENTRIES = 200;

/**
 * Bounded city/state -> neighborhoods cache.
 *
 * Entries are immutable once written: `set` only inserts when the key is
 * absent. Concurrent `getOrLoad` calls for the same key share one in-flight
 * load. Eviction is least-recently-used.
 */
export class NeighborhoodCache {
  private readonly store = new Map<string, readonly Neighborhood[]>();
  private readonly inflight = new Map<string, Promise<ProviderResult<Neighborhood>>>();

  constructor(private readonly maxEntries = DEFAULT_NEIGHBORHOOD_CACHE_ENTRIES) {
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new RangeError('maxEntries must be a positive integer');
    }
  }

  static key(city: string, state: string): string {
    return `${normalizeWhitespace(city).toLowerCase()},${normalizeWhitespace(state).toLowerCase()}`;
  }

  get(city: string, state: string): readonly Neighborhood[] | undefined {
    const key = NeighborhoodCache.key(city, state);
    const entry = this.store.get(key);
    if (!entry) return undefined;

    // Refresh recency.
    this.store.delete(key);
    this.store.set(key, entry);
    return entry;
  }

  /** Insert-if-absent. Returns the entry that ends up cached. */
  set(city: string, state: string, neighborhoods: readonly Neighborhood[]): readonly Neighborhood[] {
    const key = NeighborhoodCache.key(city, state);
    const existing = this.store.get(key);
    if (existing) return existing;

    const frozen = Object.freeze(neighborhoods.map((n) => Object.freeze({ ...n })));
    this.store.set(key, frozen);

    while (this.store.size > this.maxEntries) {
      const oldest = this.store.keys().next();
      if (oldest.done) break;
      this.store.delete(oldest.value);
    }

    return frozen;
  }

  /**
   * Cached neighborhoods, or the loader's result. Only non-empty successful
   * loads are cached; failures and empty lists are retried on the next call.
   */
  async getOrLoad(
    city: string,
    state: string,
    loader: () => Promise<ProviderResult<Neighborhood>>
  ): Promise<ProviderResult<Neighborhood>> {
    const cached = this.get(city, state);
    if (cached) return { status: 'ok', items: [...cached] };

    const key = NeighborhoodCache.key(city, state);
    const pending = this.inflight.get(key);
    if (pending) return pending;

    // The loader runs on a later tick, after the in-flight entry is registered.
    const load = Promise.resolve()
      .then(loader)
      .then((result): ProviderResult<Neighborhood> => {
        if (result.status !== 'ok') return result;
        return { status: 'ok', items: [...this.set(city, state, result.items)] };
      })
      .finally(() => {
        this.inflight.delete(key);
      });

    this.inflight.set(key, load);
    return load;
  }

  has(city: string, state: string): boolean {
    return this.store.has(NeighborhoodCache.key(city, state));
  }

  size(): number {
    return this.store.size;
  }

  clear(): void {
    this.store.clear();
  }
}
