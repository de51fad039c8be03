import { Router, Request, Response } from 'express';
import { getDb, isDbEnabled } from '../db';
import { errorMessage } from '../errors';
import { logger } from '../logger';

const router = Router();

/** Liveness: process is up */
router.get('/health', (_req: Request, res: Response) => {
  res.json({ ok: true });
});

/** Readiness: run history store is reachable when one is configured */
router.get('/ready', async (_req: Request, res: Response) => {
  if (!isDbEnabled()) {
    res.json({ ok: true, db: 'disabled' });
    return;
  }
  try {
    await getDb();
    res.json({ ok: true, db: 'connected' });
  } catch (err) {
    logger.warn('Readiness check failed', { error: errorMessage(err) });
    res.status(503).json({ ok: false, error: 'Database unavailable' });
  }
});

export default router;
