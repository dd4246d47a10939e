import { StyleError, isStyleError, type StyleErrorCode, type StyleErrorDetails } from './errors.js';

export type StyleSuccess<T> = {
  success: true;
  value: T;
};

export type StyleFailure = {
  success: false;
  error: StyleError;
};

/** Outcome of a fallible style operation. Expected failures are values, not exceptions. */
export type StyleResult<T = void> = StyleSuccess<T> | StyleFailure;

export function ok(): StyleSuccess<void>;
export function ok<T>(value: T): StyleSuccess<T>;
export function ok(value?: unknown): StyleSuccess<unknown> {
  return { success: true, value };
}

export function fail(error: StyleError): StyleFailure;
export function fail(code: StyleErrorCode, message: string, details?: StyleErrorDetails): StyleFailure;
export function fail(codeOrError: StyleErrorCode | StyleError, message = '', details?: StyleErrorDetails): StyleFailure {
  if (isStyleError(codeOrError)) {
    return { success: false, error: codeOrError };
  }
  return { success: false, error: new StyleError(codeOrError, message, details) };
}

/**
 * Wraps a lower-level failure in a new error so the original stays reachable
 * through `causedBy`.
 */
export function wrapFailure(
  failure: StyleFailure,
  code: StyleErrorCode,
  message: string,
  details?: StyleErrorDetails,
): StyleFailure {
  return fail(new StyleError(code, message, details, failure.error));
}

/**
 * Converts an exception thrown by a collaborator into an `ELEMENT_OPERATION_FAILED`
 * failure.
 */
export function failureFromException(error: unknown, operation: string): StyleFailure {
  if (isStyleError(error)) return fail(error);
  const message = error instanceof Error ? error.message : String(error);
  return fail('ELEMENT_OPERATION_FAILED', `${operation} failed: ${message}`, { operation });
}
