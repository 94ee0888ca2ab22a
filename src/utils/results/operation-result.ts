/**
 * Failure taxonomy shared by every lifecycle operation.
 *
 * Expected outcomes (NOT_FOUND, CONFLICT, VALIDATION_FAILURE) and storage
 * faults are returned as values; lifecycle operations never throw them.
 */
export enum OperationErrorCode {
  NOT_FOUND = 'NOT_FOUND',
  CONFLICT = 'CONFLICT',
  VALIDATION_FAILURE = 'VALIDATION_FAILURE',
  STORAGE_FAULT = 'STORAGE_FAULT',
  CANCELLED = 'CANCELLED',
}

export interface OperationError {
  code: OperationErrorCode;
  message: string;
}

export type OperationResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: OperationError };

export function succeed<T>(value: T): OperationResult<T> {
  return { ok: true, value };
}

export function succeedVoid(): OperationResult<void> {
  return { ok: true, value: undefined };
}

export function fail<T>(
  code: OperationErrorCode,
  message: string,
): OperationResult<T> {
  return { ok: false, error: { code, message } };
}

export function notFound<T>(message: string): OperationResult<T> {
  return fail(OperationErrorCode.NOT_FOUND, message);
}

export function conflict<T>(message: string): OperationResult<T> {
  return fail(OperationErrorCode.CONFLICT, message);
}

export function invalid<T>(message: string): OperationResult<T> {
  return fail(OperationErrorCode.VALIDATION_FAILURE, message);
}

/**
 * Re-types a failed result so it can be returned from an operation with a
 * different success type.
 */
export function forward<T>(error: OperationError): OperationResult<T> {
  return { ok: false, error };
}

export function discardValue<T>(
  result: OperationResult<T>,
): OperationResult<void> {
  return result.ok ? succeedVoid() : forward(result.error);
}
