import rateLimit from 'express-rate-limit';

const baseOptions = {
  windowMs: 60_000,
  max: 120,
  standardHeaders: true,
  legacyHeaders: false,
  validate: { xForwardedForHeader: false },
};

export const defaultLimiter = rateLimit(baseOptions);

export const strictLimiter = rateLimit({
  ...baseOptions,
  max: 10,
});
