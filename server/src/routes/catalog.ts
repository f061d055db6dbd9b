import { Router, Request, Response } from 'express';

import { CATALOG_CACHE_TTL_MS, getCatalogSnapshot, SnapshotResult } from '../cache/catalogCache';
import { errorMessage, logError } from '../observability/logger';

const router = Router();

function parseForceRefresh(req: Request): boolean {
  const refreshParam = req.query?.refresh;
  const refreshParamValue =
    typeof refreshParam === 'string'
      ? refreshParam
      : Array.isArray(refreshParam)
      ? refreshParam.find((v) => v === '1' || v === 'true')
      : undefined;
  const refreshHeaderRaw = req.headers['x-refresh-cache'];
  const refreshHeader = Array.isArray(refreshHeaderRaw) ? refreshHeaderRaw[0] : refreshHeaderRaw;

  return (
    refreshParamValue === '1' ||
    refreshParamValue === 'true' ||
    refreshHeader === '1' ||
    refreshHeader === 'true'
  );
}

function setCacheHeaders(res: Response, snapshot: SnapshotResult, requestId?: string): void {
  res.setHeader('X-Catalog-Cache', snapshot.cacheState);
  res.setHeader('X-Catalog-Cache-Backend', snapshot.cacheBackend);
  res.setHeader('X-Catalog-Cache-Age', snapshot.cacheAgeMs.toString());
  res.setHeader('X-Catalog-TTL', CATALOG_CACHE_TTL_MS.toString());
  res.setHeader('X-Catalog-Frozen', snapshot.payload.metadata.frozenSnapshot ? '1' : '0');
  res.setHeader('X-Request-Id', snapshot.payload.metadata.requestId ?? requestId ?? '');
}

router.get('/', async (req: Request, res: Response) => {
  const requestId = req.requestId;

  try {
    const snapshot = await getCatalogSnapshot({ forceRefresh: parseForceRefresh(req), requestId });
    setCacheHeaders(res, snapshot, requestId);
    res.json(snapshot.payload);
  } catch (err) {
    logError('catalog_fetch_failed', { error: errorMessage(err), requestId, query: req.query });
    res.status(500).json({ error: 'Failed to build the catalog', requestId });
  }
});

router.get('/bodies/:id', async (req: Request, res: Response) => {
  const requestId = req.requestId;
  const id = req.params.id;

  try {
    const snapshot = await getCatalogSnapshot({ forceRefresh: parseForceRefresh(req), requestId });
    const body = snapshot.payload.bodies.find((b) => b.id === id);
    setCacheHeaders(res, snapshot, requestId);
    if (!body) {
      res.status(404).json({ error: 'Unknown body id', id });
      return;
    }
    res.json(body);
  } catch (err) {
    logError('catalog_body_fetch_failed', { error: errorMessage(err), requestId, params: req.params });
    res.status(500).json({ error: 'Failed to build the catalog', requestId });
  }
});

export default router;
