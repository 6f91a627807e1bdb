import { Router } from 'express';
import { getMetricsCollector } from '../utils/logger/metricsCollector.js';
import { classificationErrorHandler } from '../differential/ErrorHandler.js';

const router = Router();

router.get('/', (req, res) => {
  return res.status(200).json({
    healthy: classificationErrorHandler.isHealthy(),
    metrics: getMetricsCollector().getMetrics(),
    errors: classificationErrorHandler.getErrorStats(),
  });
});

export default router;
