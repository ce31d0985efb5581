/**
 * Result values returned across the health-source boundary, so calculators
 * only ever receive resolved data or an explicit "no data".
 */

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export type HealthDataErrorKind = 'unavailable' | 'missing_data';

export interface HealthDataError {
  kind: HealthDataErrorKind;
  message: string;
}

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}
