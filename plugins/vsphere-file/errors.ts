import { ErrorCode } from '@/lib/errors/error-codes';

import type { AppError, ErrorCategory, ErrorDetail, JsonValue } from '@/lib/errors/error';
import type { ErrorCodeType } from '@/lib/errors/error-codes';
import type { ResponseHeaders } from './types';

type ErrorInit = {
  errno?: string | null;
  status?: number | null;
  reason?: string | null;
  headers?: ResponseHeaders;
  context?: Record<string, JsonValue>;
  details?: ErrorDetail[];
  cause?: unknown;
};

export abstract class VsphereFileError extends Error {
  abstract readonly code: ErrorCodeType;
  abstract readonly category: ErrorCategory;
  readonly retryable = false;
  readonly errno: string | null;
  readonly status: number | null;
  readonly reason: string | null;
  readonly headers: ResponseHeaders | undefined;
  readonly context: Record<string, JsonValue>;
  readonly details: ErrorDetail[] | undefined;

  constructor(message: string, init: ErrorInit = {}) {
    super(message, init.cause === undefined ? undefined : { cause: init.cause });
    this.errno = init.errno ?? null;
    this.status = init.status ?? null;
    this.reason = init.reason ?? null;
    this.headers = init.headers;
    this.context = init.context ?? {};
    this.details = init.details;
  }

  toAppError(): AppError {
    const redacted_context: Record<string, JsonValue> = { ...this.context };
    if (this.status !== null) redacted_context.status = this.status;
    if (this.errno !== null) redacted_context.errno = this.errno;
    return {
      code: this.code,
      category: this.category,
      message: this.message,
      retryable: this.retryable,
      redacted_context,
      ...(this.details ? { details: this.details } : {}),
    };
  }
}

/** DNS, TLS, refused connections and timeouts. */
export class TransportError extends VsphereFileError {
  readonly code = ErrorCode.VSPHERE_FILE_NETWORK_ERROR;
  readonly category = 'network';
  override readonly name = 'TransportError';
}

/** HEAD answered with something other than 200 or 404. */
export class ProbeError extends VsphereFileError {
  readonly code = ErrorCode.VSPHERE_FILE_PROBE_FAILED;
  readonly category = 'remote';
  override readonly name = 'ProbeError';
}

export class NotFoundError extends VsphereFileError {
  readonly code = ErrorCode.VSPHERE_FILE_NOT_FOUND;
  readonly category = 'not_found';
  override readonly name = 'NotFoundError';
}

/** Delete, mkdir or PUT failed. */
export class MutationError extends VsphereFileError {
  readonly code = ErrorCode.VSPHERE_FILE_MUTATION_FAILED;
  readonly category = 'remote';
  override readonly name = 'MutationError';
}

export class MalformedResponseError extends VsphereFileError {
  readonly code = ErrorCode.VSPHERE_FILE_MALFORMED_RESPONSE;
  readonly category = 'parse';
  override readonly name = 'MalformedResponseError';
}

export class ConfigError extends VsphereFileError {
  readonly code = ErrorCode.VSPHERE_FILE_CONFIG_INVALID;
  readonly category = 'config';
  override readonly name = 'ConfigError';
}

function readStringField(obj: unknown, field: string): string | null {
  if (!obj || typeof obj !== 'object' || Array.isArray(obj)) return null;
  const value: unknown = Reflect.get(obj, field);
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

export function extractErrno(err: unknown): string | null {
  return readStringField(err, 'code');
}

export function extractMessage(err: unknown): string {
  if (err instanceof Error) return err.message || 'unknown error';
  const msg = readStringField(err, 'message');
  if (msg) return msg;
  return String(err);
}
