import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import type { CatalogPayload } from '../services/catalogService';

const { loadCatalogPayload, rebuildAndSave } = vi.hoisted(() => ({
  loadCatalogPayload: vi.fn(),
  rebuildAndSave: vi.fn()
}));

vi.mock('../services/catalogService', () => ({ loadCatalogPayload, rebuildAndSave }));

import { CATALOG_CACHE_TTL_MS, getCatalogSnapshot, resetCatalogCache } from './catalogCache';

const START = Date.UTC(2026, 0, 1);

function payload(source: string): CatalogPayload {
  return {
    source,
    updatedAt: new Date(START).toISOString(),
    canonicalEpoch: 2451545.0,
    bodies: [
      {
        id: '10',
        name: 'Sun',
        type: 'star',
        collection: 'major_bodies',
        oscElements: [{ epoch: 2451545.0, refId: '10', e: 1, a: 0, i: 0, O: 0, w: 0, M: 0, p: 0 }]
      }
    ],
    metadata: { sources: [source] }
  };
}

describe('catalog snapshot cache', () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(START);
    resetCatalogCache();
    loadCatalogPayload.mockReset();
    rebuildAndSave.mockReset();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('loads on a miss and serves the memory copy afterwards', async () => {
    loadCatalogPayload.mockResolvedValue(payload('database'));

    const first = await getCatalogSnapshot({ requestId: 'req-1' });
    expect(first.cacheState).toBe('MISS');
    expect(first.cacheBackend).toBe('memory');
    expect(first.payload.metadata.cacheAgeMs).toBe(0);
    expect(first.payload.metadata.requestId).toBe('req-1');
    expect(loadCatalogPayload).toHaveBeenCalledWith({ requestId: 'req-1' });

    vi.setSystemTime(START + 1_000);
    const second = await getCatalogSnapshot({ requestId: 'req-2' });
    expect(second.cacheState).toBe('HIT');
    expect(second.cacheAgeMs).toBe(1_000);
    expect(second.payload.metadata.cacheExpiresInMs).toBe(CATALOG_CACHE_TTL_MS - 1_000);
    expect(second.payload.metadata.generatedAt).toBe(new Date(START).toISOString());
    expect(second.payload.metadata.requestId).toBe('req-2');
    expect(loadCatalogPayload).toHaveBeenCalledTimes(1);
  });

  it('reloads once the snapshot has expired', async () => {
    loadCatalogPayload.mockResolvedValue(payload('database'));

    await getCatalogSnapshot();
    vi.setSystemTime(START + CATALOG_CACHE_TTL_MS);
    const expired = await getCatalogSnapshot();

    expect(expired.cacheState).toBe('MISS');
    expect(loadCatalogPayload).toHaveBeenCalledTimes(2);
  });

  it('rebuilds from the sources on a forced refresh', async () => {
    loadCatalogPayload.mockResolvedValue(payload('database'));
    rebuildAndSave.mockResolvedValue(payload('horizons'));

    await getCatalogSnapshot();
    const refreshed = await getCatalogSnapshot({ forceRefresh: true, requestId: 'req-3' });

    expect(refreshed.cacheState).toBe('MISS');
    expect(refreshed.payload.source).toBe('horizons');
    expect(rebuildAndSave).toHaveBeenCalledWith({ requestId: 'req-3' });
  });

  it('shares one load between concurrent misses', async () => {
    loadCatalogPayload.mockResolvedValue(payload('database'));

    const [a, b] = await Promise.all([getCatalogSnapshot(), getCatalogSnapshot()]);

    expect(a.cacheState).toBe('MISS');
    expect(b.cacheState).toBe('MISS');
    expect(loadCatalogPayload).toHaveBeenCalledTimes(1);
  });

  it('serves the last snapshot frozen when a refresh fails', async () => {
    loadCatalogPayload.mockResolvedValue(payload('database'));
    rebuildAndSave.mockRejectedValue(new Error('sources unavailable'));

    await getCatalogSnapshot();
    vi.setSystemTime(START + 5_000);
    const frozen = await getCatalogSnapshot({ forceRefresh: true });

    expect(frozen.cacheState).toBe('FROZEN');
    expect(frozen.cacheAgeMs).toBe(5_000);
    expect(frozen.payload.source).toBe('database');
    expect(frozen.payload.metadata.frozenSnapshot).toBe(true);
    expect(frozen.payload.metadata.freezeReason).toBe('sources unavailable');
    expect(frozen.payload.metadata.cacheExpiresInMs).toBe(0);
  });

  it('fails when nothing was cached yet', async () => {
    loadCatalogPayload.mockRejectedValue(new Error('database unreadable'));

    await expect(getCatalogSnapshot()).rejects.toThrow('database unreadable');
  });
});
