import { Router, Request, Response } from 'express';
import { config } from '../config';
import { BreakingQuotaStore } from '../news/breakingState';

const router = Router();

/** Today's confirmed breaking stories against the daily cap */
router.get('/status', (_req: Request, res: Response) => {
  const store = new BreakingQuotaStore(config.dataDir, config.timezone);
  const now = new Date();
  const count = store.countFor(now);
  res.json({
    date: store.today(now),
    count,
    maxPerDay: config.breaking.maxPerDay,
    remaining: Math.max(0, config.breaking.maxPerDay - count),
    minSources: config.breaking.minSources
  });
});

export default router;
