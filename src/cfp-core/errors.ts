import type { ErrorKind } from '@shared/types';

// ---------------------------------------------------------------------------
// Error taxonomy
// ---------------------------------------------------------------------------

export const ERROR_CODES = {
  ValidationError: 'VALIDATION_ERROR',
  InvalidTransition: 'INVALID_TRANSITION',
  PermissionDenied: 'PERMISSION_DENIED',
  NotFound: 'NOT_FOUND',
  Conflict: 'CONFLICT',
  StateError: 'STATE_ERROR',
  StorageError: 'STORAGE_ERROR',
} as const satisfies Record<ErrorKind, string>;

export type ErrorCode = (typeof ERROR_CODES)[ErrorKind];

/**
 * The single error type every engine operation throws. `kind` names the
 * failure class and `code` is the stable reason code callers assert on.
 */
export class CfpError extends Error {
  readonly kind: ErrorKind;
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    kind: ErrorKind,
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'CfpError';
    this.kind = kind;
    this.code = ERROR_CODES[kind];
    this.details = details;
  }
}

export function isCfpError(err: unknown): err is CfpError {
  return err instanceof CfpError;
}

export const validationError = (message: string, details?: Record<string, unknown>) =>
  new CfpError('ValidationError', message, details);

export const notFound = (entity: string, id: string) =>
  new CfpError('NotFound', `${entity} not found`, { entity, id });

export const conflict = (message: string, details?: Record<string, unknown>) =>
  new CfpError('Conflict', message, details);

export const permissionDenied = (message: string) =>
  new CfpError('PermissionDenied', message);

export const stateError = (message: string, details?: Record<string, unknown>) =>
  new CfpError('StateError', message, details);
