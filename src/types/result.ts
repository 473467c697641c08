/**
 * pg-fluent - Result Types
 *
 * Two-case outcome returned by every execution verb.
 */

export interface Success<T> {
  success: true;
  data: T;
  error?: never;
}

export interface Failure {
  success: false;
  data?: never;
  error: Error;
}

export type Result<T> = Success<T> | Failure;

export function isSuccess<T>(result: Result<T>): result is Success<T> {
  return result.success;
}

export function isFailure<T>(result: Result<T>): result is Failure {
  return !result.success;
}

export function success<T>(data: T): Success<T> {
  return { success: true, data };
}

export function failure(error: Error): Failure {
  return { success: false, error };
}
