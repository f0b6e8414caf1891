export const ErrorCode = {
  // Scenarios
  SCENARIO_NOT_FOUND: 'SCENARIO_NOT_FOUND',
  SCENARIO_CATALOG_INVALID: 'SCENARIO_CATALOG_INVALID',

  // Env files
  ENV_FILE_NOT_FOUND: 'ENV_FILE_NOT_FOUND',
  ENV_FILE_UNREADABLE: 'ENV_FILE_UNREADABLE',

  // Requests
  VALIDATION_ERROR: 'VALIDATION_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface AppError {
  code: ErrorCode;
  message: string;
  details?: string;
}

export function createAppError(code: ErrorCode, message: string, details?: string): AppError {
  return { code, message, details };
}

export function isErrorCode(value: unknown): value is ErrorCode {
  return Object.values(ErrorCode).some((code) => code === value);
}
