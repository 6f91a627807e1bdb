import { Router } from 'express';
import { getCorrelationId } from '../middleware/correlationId.js';
import {
  createClassifyRequestSchema,
  getClassificationService,
  getConfigurationManager,
} from '../differential/index.js';

const router = Router();

router.post('/', (req, res, next) => {
  const service = getClassificationService();
  const { limits } = getConfigurationManager().getConfig();

  const parsed = createClassifyRequestSchema(limits).safeParse(req.body);
  if (!parsed.success) {
    return next(service.rejectPayload(parsed.error, getCorrelationId(req)));
  }

  try {
    const outcome = service.classify(parsed.data.results, getCorrelationId(req));
    return res.status(200).json({
      verdict: outcome.verdict,
      finding: outcome.finding ?? null,
      correlationId: outcome.correlationId,
      processingTime: outcome.processingTime,
    });
  } catch (error) {
    return next(error);
  }
});

export default router;
