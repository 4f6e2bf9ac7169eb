/**
 * Outcome of a best-effort diagnostic (counts, previews).
 *
 * Diagnostics never throw: a failure becomes `unavailable` with a reason
 * so the caller can report a degraded value and carry on.
 */

export type Diagnostic<T> =
  | { status: 'ok'; value: T }
  | { status: 'unavailable'; reason: string };

export function ok<T>(value: T): Diagnostic<T> {
  return { status: 'ok', value };
}

export function unavailable<T = never>(reason: string): Diagnostic<T> {
  return { status: 'unavailable', reason };
}

export function isOk<T>(d: Diagnostic<T>): d is { status: 'ok'; value: T } {
  return d.status === 'ok';
}
