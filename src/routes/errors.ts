import type { Response } from 'express';
import { MalformedVersionError, NotFoundError } from '../errors';

/**
 * Map a failed cluster call onto an HTTP reply.
 */
export function sendError(res: Response, error: unknown, context: string) {
  if (error instanceof NotFoundError) {
    return res.status(404).json({ error: error.message });
  }

  console.error(`${context}:`, error);

  if (error instanceof MalformedVersionError) {
    return res.status(502).json({ error: error.message });
  }
  return res.status(500).json({ error: context });
}
