import { describe, expect, it, vi } from 'vitest';
import { NeighborhoodCache } from '../src/core/neighborhoodCache.js';
import type { ProviderResult } from '../src/core/ports.js';
import { ProviderUnavailableError } from '../src/errors.js';
import type { Neighborhood } from '../src/types.js';

const downtown: Neighborhood = { id: '101', name: 'Downtown' };
const eastSide: Neighborhood = { id: '102', name: 'East Side' };

describe('NeighborhoodCache', () => {
  it('shares one in-flight load between concurrent callers', async () => {
    const cache = new NeighborhoodCache();
    const loader = vi.fn(async (): Promise<ProviderResult<Neighborhood>> => ({ status: 'ok', items: [downtown] }));

    const [a, b] = await Promise.all([
      cache.getOrLoad('Austin', 'TX', loader),
      cache.getOrLoad('austin', 'tx', loader)
    ]);

    expect(loader).toHaveBeenCalledTimes(1);
    expect(a).toEqual({ status: 'ok', items: [downtown] });
    expect(b).toEqual(a);
    expect(cache.has(' Austin ', 'TX')).toBe(true);
  });

  it('serves later calls from the cache', async () => {
    const cache = new NeighborhoodCache();
    const loader = vi.fn(async (): Promise<ProviderResult<Neighborhood>> => ({ status: 'ok', items: [downtown] }));

    await cache.getOrLoad('Austin', 'TX', loader);
    await cache.getOrLoad('Austin', 'TX', loader);

    expect(loader).toHaveBeenCalledTimes(1);
  });

  it('does not cache failures or empty lists', async () => {
    const cache = new NeighborhoodCache();
    const failed: ProviderResult<Neighborhood> = {
      status: 'failed',
      error: new ProviderUnavailableError('mashvisor', 'mashvisor request failed (503): ')
    };
    const loader = vi
      .fn<() => Promise<ProviderResult<Neighborhood>>>()
      .mockResolvedValueOnce(failed)
      .mockResolvedValueOnce({ status: 'empty' })
      .mockResolvedValueOnce({ status: 'ok', items: [downtown] });

    expect(await cache.getOrLoad('Austin', 'TX', loader)).toBe(failed);
    expect(await cache.getOrLoad('Austin', 'TX', loader)).toEqual({ status: 'empty' });
    expect(cache.has('Austin', 'TX')).toBe(false);

    await cache.getOrLoad('Austin', 'TX', loader);
    expect(cache.has('Austin', 'TX')).toBe(true);
    expect(loader).toHaveBeenCalledTimes(3);
  });

  it('clears the in-flight entry when the loader throws', async () => {
    const cache = new NeighborhoodCache();
    const loader = vi
      .fn<() => Promise<ProviderResult<Neighborhood>>>()
      .mockImplementationOnce(() => {
        throw new Error('boom');
      })
      .mockResolvedValueOnce({ status: 'ok', items: [eastSide] });

    await expect(cache.getOrLoad('Austin', 'TX', loader)).rejects.toThrow('boom');
    expect(await cache.getOrLoad('Austin', 'TX', loader)).toEqual({ status: 'ok', items: [eastSide] });
  });

  it('only inserts when the key is absent', () => {
    const cache = new NeighborhoodCache();
    cache.set('Austin', 'TX', [downtown]);

    expect(cache.set('Austin', 'TX', [eastSide])).toEqual([downtown]);
    expect(cache.get('Austin', 'TX')).toEqual([downtown]);
  });

  it('freezes stored entries', () => {
    const cache = new NeighborhoodCache();
    const stored = cache.set('Austin', 'TX', [downtown]);

    expect(Object.isFrozen(stored)).toBe(true);
    expect(Object.isFrozen(stored[0])).toBe(true);
  });

  it('evicts the least recently used entry', () => {
    const cache = new NeighborhoodCache(2);
    cache.set('Austin', 'TX', [downtown]);
    cache.set('Dallas', 'TX', [eastSide]);
    cache.get('Austin', 'TX');
    cache.set('Houston', 'TX', [downtown]);

    expect(cache.size()).toBe(2);
    expect(cache.has('Austin', 'TX')).toBe(true);
    expect(cache.has('Dallas', 'TX')).toBe(false);
    expect(cache.has('Houston', 'TX')).toBe(true);
  });

  it('rejects a non-positive size', () => {
    expect(() => new NeighborhoodCache(0)).toThrow(RangeError);
  });
});
