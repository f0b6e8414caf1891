import type { Response } from 'express';
import type { ZodError } from 'zod';
import { ErrorCode } from '../../domain/errors.js';
import { errorResponse } from '../middleware/error-handler.js';

export function sendInvalidBody(res: Response, error: ZodError): void {
  const details = error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
  res.status(422).json(errorResponse(ErrorCode.VALIDATION_ERROR, 'Invalid request body', details));
}
