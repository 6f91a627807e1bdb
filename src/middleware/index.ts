// Export all middleware for easy importing
export { correlationId, getCorrelationId, CORRELATION_HEADER } from './correlationId.js';
export { errorResponder } from './errorResponder.js';
export { defaultLimiter, strictLimiter } from './rateLimiter.js';
