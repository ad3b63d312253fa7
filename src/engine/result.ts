/**
 * Error → Result conversion.
 * SnapshotErrors become failure results with their kind and cell context.
 * Any other AppError is reported under its closest kind; anything that is not
 * an AppError is a fault and is re-thrown untouched.
 */

import { AppError, SnapshotError } from '../errors.js';
import type { EngineFailure, Result } from '../types/api.js';

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function toFailure(err: AppError): EngineFailure {
  if (err instanceof SnapshotError) {
    return { kind: err.kind, message: err.message, detail: { ...err.detail } };
  }
  return { kind: 'InvalidField', message: err.message, detail: {} };
}

/** Run `work`, converting expected failures into a failed Result. */
export async function toResult<T>(work: () => Promise<T>): Promise<Result<T>> {
  try {
    return ok(await work());
  } catch (err) {
    if (err instanceof AppError) {
      return { ok: false, error: toFailure(err) };
    }
    throw err;
  }
}
