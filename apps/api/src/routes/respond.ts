import type { Response } from 'express';
import type { ZodError } from 'zod';
import { AppError, errorMessage } from '../errors.js';
import { createLogger } from '../logger.js';

const log = createLogger('http');

export function validationError(res: Response, error: ZodError) {
  return res.status(400).json({ error: 'VALIDATION_ERROR', details: error.flatten() });
}

/**
 * Known application errors keep their code and status; anything else becomes
 * `fallbackCode` with `fallbackStatus` (500 unless given).
 */
export function sendError(res: Response, err: unknown, fallbackCode: string, fallbackStatus = 500) {
  if (err instanceof AppError) {
    if (err.status >= 500) log.warn({ code: err.code, error: err.message }, 'request failed');
    return res.status(err.status).json({ error: err.code, message: err.message });
  }

  const message = errorMessage(err);
  log.error({ code: fallbackCode, error: message }, 'request failed');
  return res.status(fallbackStatus).json({ error: fallbackCode, message });
}
