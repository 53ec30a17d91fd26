import type { Response } from 'express';
import { getCorrelationId, type ErrorEnvelope } from '@layoutid/shared';

export function errorEnvelope(code: string, message: string): ErrorEnvelope {
  return {
    error: {
      code,
      message,
      correlation_id: getCorrelationId(),
    },
  };
}

export function sendError(res: Response, status: number, code: string, message: string): void {
  res.status(status).json(errorEnvelope(code, message));
}
