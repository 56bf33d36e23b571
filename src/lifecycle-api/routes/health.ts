import { Router } from 'express';
import { LIFECYCLE_TRACKER_VERSION } from '@shared/constants';
import { ok } from '../responses';

const router = Router();

router.get('/health', (_req, res) => {
  res.json(ok({ status: 'ok', version: LIFECYCLE_TRACKER_VERSION }));
});

export default router;
