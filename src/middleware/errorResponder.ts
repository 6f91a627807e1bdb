import type { Request, Response, NextFunction } from 'express';
import {
  ClassificationRequestError,
  UnknownProfileError,
} from '../differential/ErrorHandler.js';
import { getCorrelationId } from './correlationId.js';

/**
 * Maps classification errors onto HTTP responses.
 * Anything unrecognized is a server-side bug and answers 500.
 */
export function errorResponder(err: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    return next(err);
  }

  const correlationId = getCorrelationId(req);

  if (err instanceof ClassificationRequestError) {
    res.status(400).json({ error: err.message, issues: err.issues, correlationId });
    return;
  }

  if (err instanceof UnknownProfileError) {
    res.status(404).json({ error: err.message, profile: err.profileName, correlationId });
    return;
  }

  // Malformed JSON bodies from express.json()
  if (err instanceof SyntaxError && 'body' in err) {
    res.status(400).json({ error: 'Malformed JSON body', correlationId });
    return;
  }

  const message = err instanceof Error ? err.message : 'Unknown error';
  const name = err instanceof Error ? err.name : 'Error';
  res.status(500).json({ error: message, name, correlationId });
}
