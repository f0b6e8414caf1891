import type { Request, Response, NextFunction } from 'express';
import { ErrorCode, isErrorCode, type AppError } from '../../domain/errors.js';
import { logger } from '../../infrastructure/logger.js';

export interface ApiResponse<T> {
  success: boolean;
  data: T | null;
  error: { code: string; message: string; details?: string } | null;
}

export function successResponse<T>(data: T): ApiResponse<T> {
  return { success: true, data, error: null };
}

export function errorResponse(code: string, message: string, details?: string): ApiResponse<null> {
  return { success: false, data: null, error: { code, message, details } };
}

function isAppError(value: unknown): value is AppError {
  return (
    typeof value === 'object' &&
    value !== null &&
    'code' in value &&
    isErrorCode(value.code) &&
    'message' in value
  );
}

function mapErrorCodeToStatus(code: string): number {
  switch (code) {
    case ErrorCode.ENV_FILE_NOT_FOUND:
    case ErrorCode.ENV_FILE_UNREADABLE:
      return 400;

    case ErrorCode.SCENARIO_NOT_FOUND:
      return 404;

    case ErrorCode.VALIDATION_ERROR:
      return 422;

    default:
      return 500;
  }
}

export function sendAppError(res: Response, appError: AppError): void {
  const status = mapErrorCodeToStatus(appError.code);
  res.status(status).json(errorResponse(appError.code, appError.message, appError.details));
}

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction): void {
  if (isAppError(err)) {
    const status = mapErrorCodeToStatus(err.code);
    res.status(status).json(errorResponse(err.code, err.message, err.details));
    return;
  }

  if ('type' in err && err.type === 'entity.parse.failed') {
    res.status(400).json(errorResponse(ErrorCode.VALIDATION_ERROR, 'Request body is not valid JSON'));
    return;
  }

  logger.error({ err: err.message }, 'Unhandled error');
  res.status(500).json(errorResponse('INTERNAL_ERROR', 'An unexpected error occurred'));
}
