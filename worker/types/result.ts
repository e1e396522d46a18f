/**
 * Explicit success/failure values used at every pipeline boundary
 * (gateway call, checkpoint I/O, per-unit reconstruction).
 */

export type FailureKind =
  | 'timeout'
  | 'rate_limit'
  | 'network'
  | 'malformed'
  | 'validation'
  | 'io'
  | 'structure'
  | 'unknown'

export interface Success<T> {
  ok: true
  value: T
}

export interface Failure {
  ok: false
  kind: FailureKind
  detail: string
}

export type Result<T> = Success<T> | Failure

export function success<T>(value: T): Success<T> {
  return { ok: true, value }
}

export function failure(kind: FailureKind, detail: string): Failure {
  return { ok: false, kind, detail }
}
