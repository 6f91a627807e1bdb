import { Router } from 'express';
import { getCorrelationId } from '../middleware/correlationId.js';
import { getClassificationService, normalizeRequestSchema } from '../differential/index.js';

const router = Router();

router.post('/', (req, res, next) => {
  const service = getClassificationService();

  const parsed = normalizeRequestSchema.safeParse(req.body);
  if (!parsed.success) {
    return next(service.rejectPayload(parsed.error, getCorrelationId(req)));
  }

  try {
    const { request, server, other } = parsed.data;
    return res.status(200).json({ request: service.normalize(request, server, other) });
  } catch (error) {
    return next(error);
  }
});

export default router;
