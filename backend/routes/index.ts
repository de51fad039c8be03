import { Router } from 'express';
import health from './health';
import jobs from './jobs';
import runs from './runs';
import breaking from './breaking';

const router = Router();

router.use(health);
router.use('/api/jobs', jobs);
router.use('/api/runs', runs);
router.use('/api/breaking', breaking);

export default router;
