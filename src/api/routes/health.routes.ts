import { Router } from 'express';

import { healthHandler, metricsHandler } from '../controllers/health.controller.js';

const router = Router();
router.get('/health', healthHandler);
router.get('/metrics', metricsHandler);

export default router;
