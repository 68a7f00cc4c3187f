/**
 * Result type returned by every asynchronous orchestration operation.
 *
 * Operations resolve to Ok or Err instead of rejecting, so call sites can
 * branch on `ok` without try/catch and tests can assert on returned values.
 */

import { EdgeNodeError } from "./errors.js";

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E extends EdgeNodeError = EdgeNodeError> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E extends EdgeNodeError = EdgeNodeError> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E extends EdgeNodeError>(error: E): Err<E> {
  return { ok: false, error };
}

/** Wrap a non-project exception so it can travel inside an Err. */
export function toEdgeNodeError(error: unknown): EdgeNodeError {
  if (error instanceof EdgeNodeError) {
    return error;
  }
  return new EdgeNodeError(error instanceof Error ? error.message : String(error));
}

/** Run `fn` and capture any throw as an Err. */
export async function attempt<T>(fn: () => Promise<T>): Promise<Result<T>> {
  try {
    return ok(await fn());
  } catch (error) {
    return err(toEdgeNodeError(error));
  }
}

/** Transform the value of an Ok, passing an Err through untouched. */
export function mapResult<T, U>(result: Result<T>, fn: (value: T) => U): Result<U> {
  return result.ok ? ok(fn(result.value)) : result;
}

/** Return the value or throw the carried error. For the CLI and scripts. */
export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}
