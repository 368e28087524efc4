import { fmt, msg, type ErrKey } from './lib/error-messages.js';

export type ErrorType =
  | 'BAD_INPUT'
  | 'LIMIT_EXCEEDED'
  | 'ALLOWLIST_DENIED'
  | 'NOT_FOUND'
  | 'GONE'
  | 'CONFLICT'
  | 'UPSTREAM'
  | 'TIMEOUT'
  | 'RETRYABLE'
  | 'RATE_LIMIT'
  | 'INTERNAL';

export interface ApiError {
  error: {
    type: ErrorType;
    code: string;
    message: string;
    hint?: string;
    fields?: Record<string, unknown>;
  };
}

export function errorResponse(
  type: ErrorType,
  code: string,
  message: string,
  hint?: string,
  fields?: Record<string, unknown>,
): ApiError {
  return { error: { type, code, message, hint, fields } };
}

export function errorTypeToStatus(type: ErrorType): number {
  switch (type) {
    case 'BAD_INPUT': return 400;
    case 'ALLOWLIST_DENIED': return 403;
    case 'NOT_FOUND': return 404;
    case 'CONFLICT': return 409;
    case 'GONE': return 410;
    case 'LIMIT_EXCEEDED': return 413;
    case 'RATE_LIMIT': return 429;
    case 'UPSTREAM': return 502;
    case 'RETRYABLE': return 503;
    case 'TIMEOUT': return 504;
    case 'INTERNAL':
    default: return 500;
  }
}

/**
 * Base class for every error the service raises on purpose. The `type`
 * selects the HTTP status, the `code` is stable and machine readable.
 */
export class AppError extends Error {
  readonly statusCode: number;

  constructor(
    readonly type: ErrorType,
    readonly code: string,
    message: string,
    readonly fields?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
    this.statusCode = errorTypeToStatus(type);
  }

  toResponse(hint?: string): ApiError {
    return errorResponse(this.type, this.code, this.message, hint, this.fields);
  }
}

export type ValidationCode = 'VALIDATION_ERROR' | 'MISSING_ENDPOINT' | 'INVALID_ENDPOINT' | 'EMPTY_BATCH';

export class ValidationError extends AppError {
  constructor(code: ValidationCode, message: string, fields?: Record<string, unknown>) {
    super('BAD_INPUT', code, message, fields);
  }
}

export type LimitCode = 'BATCH_TOO_LARGE' | 'RECORDS_LIMIT_EXCEEDED';

export class LimitExceededError extends AppError {
  constructor(code: LimitCode, vars: Record<string, number>) {
    super('LIMIT_EXCEEDED', code, fmt(code, vars), vars);
  }
}

export type DenyReason = 'NO_ALLOWLIST_CONFIGURED' | 'NOT_ALLOWLISTED' | 'PRIVATE_ADDRESS_BLOCKED';

export class AllowlistDeniedError extends AppError {
  constructor(readonly reason: DenyReason, host?: string) {
    super('ALLOWLIST_DENIED', reason, msg(reason), host ? { host } : undefined);
  }
}

export class NotFoundError extends AppError {
  constructor(code: 'JOB_NOT_FOUND' | 'RESULT_NOT_FOUND' = 'JOB_NOT_FOUND') {
    super('NOT_FOUND', code, msg(code));
  }
}

export class GoneError extends AppError {
  constructor() {
    super('GONE', 'RESULT_EXPIRED', msg('RESULT_EXPIRED'));
  }
}

export class ConflictError extends AppError {
  constructor(status: string) {
    super('CONFLICT', 'JOB_NOT_FINISHED', msg('JOB_NOT_FINISHED'), { status });
  }
}

export class QueueFullError extends AppError {
  constructor(size: number) {
    super('RETRYABLE', 'QUEUE_FULL', msg('QUEUE_FULL'), { queueSize: size });
  }
}

export class UpstreamRequestError extends AppError {
  constructor(timedOut: boolean, detail: string, statusCode?: number) {
    super(
      timedOut ? 'TIMEOUT' : 'UPSTREAM',
      timedOut ? 'UPSTREAM_TIMEOUT' : 'UPSTREAM_ERROR',
      timedOut ? msg('UPSTREAM_TIMEOUT') : `${msg('UPSTREAM_ERROR')}: ${detail}`,
      statusCode !== undefined ? { upstreamStatus: statusCode } : undefined,
    );
  }
}

export type InternalCode = 'STORE_UNAVAILABLE' | 'SERIALIZATION_FAILED' | 'INTERNAL_ERROR';

const INTERNAL_KEYS: Record<InternalCode, ErrKey> = {
  STORE_UNAVAILABLE: 'STORE_UNAVAILABLE',
  SERIALIZATION_FAILED: 'SERIALIZATION_FAILED',
  INTERNAL_ERROR: 'INTERNAL_UNEXPECTED',
};

export class InternalError extends AppError {
  constructor(code: InternalCode, detail?: string, cause?: unknown) {
    super('INTERNAL', code, detail ? `${msg(INTERNAL_KEYS[code])}: ${detail}` : msg(INTERNAL_KEYS[code]), undefined, { cause });
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
