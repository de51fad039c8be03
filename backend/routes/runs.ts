import { Router, Request, Response, NextFunction } from 'express';
import { isDbEnabled } from '../db';
import { HttpError } from '../middleware';
import type { ContentType } from '../news/types';
import { listRuns } from '../runs';

const CONTENT_TYPES: readonly ContentType[] = ['daily', 'weekly', 'breaking'];

const router = Router();

router.get('/', async (req: Request, res: Response, next: NextFunction) => {
  try {
    if (!isDbEnabled()) throw new HttpError(503, 'Run history needs MONGODB_URI');
    const type = CONTENT_TYPES.find((t) => t === req.query.type);
    const limit = typeof req.query.limit === 'string' ? parseInt(req.query.limit, 10) : NaN;
    const runs = await listRuns(type, Number.isFinite(limit) ? limit : 50);
    res.json(runs);
  } catch (err) {
    next(err);
  }
});

export default router;
