/**
 * Snapshot Cache Routes Module
 *
 * @module routes/cache
 */

import { Router } from 'express';

import { authenticate } from '../middleware/authenticate.js';
import type { SnapshotCache } from '../services/snapshot.service.js';
import { HTTP_STATUS, sendSuccess } from '../utils/http.js';

/**
 * POST /api/cache/invalidate drops the cached snapshot so the next read
 * reloads every collection from the store
 */
export function createCacheRouter(cache: SnapshotCache): Router {
  const router = Router();

  router.use(authenticate);

  router.post('/invalidate', (req, res) => {
    cache.invalidate();

    console.log('[CACHE_ROUTES] Snapshot invalidated on request:', {
      correlationId: req.correlationId,
      timestamp: new Date().toISOString(),
    });

    sendSuccess(res, HTTP_STATUS.OK, { invalidated: true });
  });

  return router;
}
