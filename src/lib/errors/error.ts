import { ErrorCode } from '@/lib/errors/error-codes';

import type { ErrorCodeType } from '@/lib/errors/error-codes';

export type JsonValue = string | number | boolean | null | { [key: string]: JsonValue } | JsonValue[];

export type ErrorCategory = 'auth' | 'permission' | 'config' | 'network' | 'parse' | 'not_found' | 'remote' | 'unknown';

export type ErrorDetail = {
  field?: string;
  issue?: string;
  message?: string;
};

export type AppError = {
  code: ErrorCodeType;
  category: ErrorCategory;
  message: string;
  retryable: boolean;
  redacted_context?: Record<string, JsonValue>;
  details?: ErrorDetail[];
};

export function isAppError(err: unknown): err is AppError {
  if (!err || typeof err !== 'object') return false;
  // Structural check only; codes are not validated against ErrorCode here.
  return (
    'code' in err &&
    'category' in err &&
    'message' in err &&
    'retryable' in err &&
    typeof err.code === 'string' &&
    typeof err.category === 'string' &&
    typeof err.message === 'string' &&
    typeof err.retryable === 'boolean'
  );
}

export function toPublicError(err: unknown): AppError {
  if (isAppError(err)) return err;
  return { code: ErrorCode.VSPHERE_FILE_INTERNAL_ERROR, category: 'unknown', message: 'Internal error', retryable: false };
}
