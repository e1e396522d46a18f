import type { FailureKind } from '../types/result.js'

/**
 * Raised when configuration is invalid. Caller error, surfaced at load time.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

/**
 * Raised by `submit` for a level outside {1, 2, 3}. Caller error, never a job failure.
 */
export class InvalidLevelError extends Error {
  constructor(public readonly level: unknown) {
    super(`Invalid simplification level: ${String(level)} (expected 1, 2 or 3)`)
    this.name = 'InvalidLevelError'
  }
}

/**
 * Raised by `submit` when a job with the same id is still processing.
 */
export class JobConflictError extends Error {
  constructor(public readonly jobId: string) {
    super(`Job ${jobId} is already processing`)
    this.name = 'JobConflictError'
  }
}

/**
 * Raised by `submit` for a job id that cannot name a checkpoint directory or output file.
 */
export class InvalidJobIdError extends Error {
  constructor(public readonly jobId: string) {
    super(`Invalid job id: "${jobId}" (use letters, digits, '.', '_' or '-', not starting with '.')`)
    this.name = 'InvalidJobIdError'
  }
}

/**
 * The source document could not be read. Infrastructure failure: fails the job.
 */
export class DocumentReadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'DocumentReadError'
  }
}

/**
 * A single gateway call exceeded its time budget.
 */
export class TimeoutError extends Error {
  constructor(public readonly timeoutMs: number, operation: string) {
    super(`${operation} timed out after ${timeoutMs}ms`)
    this.name = 'TimeoutError'
  }
}

/**
 * A backend call failed with a known failure kind (HTTP status, malformed body...).
 */
export class GatewayCallError extends Error {
  constructor(
    public readonly kind: FailureKind,
    message: string,
    public readonly statusCode?: number
  ) {
    super(message)
    this.name = 'GatewayCallError'
  }
}

function readProperty(error: unknown, key: string): unknown {
  if (typeof error !== 'object' || error === null) return undefined
  const value: unknown = Reflect.get(error, key)
  return value
}

function statusOf(error: unknown): number | undefined {
  const direct = readProperty(error, 'statusCode') ?? readProperty(error, 'status')
  if (typeof direct === 'number') return direct
  const response = readProperty(error, 'response')
  const nested = readProperty(response, 'status')
  return typeof nested === 'number' ? nested : undefined
}

/**
 * Classifies a thrown value into a failure kind.
 * Looks at typed errors first, then error codes, HTTP status and message fragments.
 *
 * @example
 * classifyError(new Error('Request failed with status code 429')) // 'rate_limit'
 * classifyError(new TimeoutError(90000, 'rewrite'))               // 'timeout'
 */
export function classifyError(error: unknown): FailureKind {
  if (error instanceof GatewayCallError) return error.kind
  if (error instanceof TimeoutError) return 'timeout'

  const code = readProperty(error, 'code')
  if (code === 'ECONNABORTED' || code === 'ETIMEDOUT') return 'timeout'
  if (code === 'ECONNREFUSED' || code === 'ECONNRESET' || code === 'ENOTFOUND' || code === 'EAI_AGAIN') {
    return 'network'
  }
  if (code === 'ENOENT' || code === 'EACCES' || code === 'EISDIR' || code === 'ENOSPC' || code === 'EROFS') {
    return 'io'
  }

  const status = statusOf(error)
  if (status === 429) return 'rate_limit'
  if (status === 408 || status === 504) return 'timeout'
  if (status !== undefined && status >= 500) return 'network'

  const message = error instanceof Error ? error.message.toLowerCase() : String(error).toLowerCase()

  if (message.includes('rate limit') || message.includes('429') || message.includes('quota')) {
    return 'rate_limit'
  }
  if (message.includes('timeout') || message.includes('timed out') || message.includes('aborted')) {
    return 'timeout'
  }
  if (
    message.includes('network') ||
    message.includes('econnrefused') ||
    message.includes('econnreset') ||
    message.includes('socket hang up') ||
    message.includes('unavailable') ||
    message.includes('503') ||
    message.includes('502')
  ) {
    return 'network'
  }
  if (message.includes('json') || message.includes('malformed') || message.includes('unexpected response')) {
    return 'malformed'
  }

  return 'unknown'
}

export type FallbackAction = 'use-original' | 'continue' | 'leave-unit-unchanged'

/**
 * Recovery policy per failure kind. Failures below the chapter level never abort
 * the job: gateway problems keep the original text, checkpoint I/O degrades
 * resumability, structural problems leave the unit untouched.
 */
export function fallbackFor(kind: FailureKind): FallbackAction {
  switch (kind) {
    case 'io':
      return 'continue'
    case 'structure':
      return 'leave-unit-unchanged'
    case 'timeout':
    case 'rate_limit':
    case 'network':
    case 'malformed':
    case 'validation':
    case 'unknown':
      return 'use-original'
  }
}

/**
 * User-facing message for a failed job.
 */
export function getUserFriendlyError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error)

  if (error instanceof DocumentReadError) {
    return `${message}. The file may not be a valid EPUB.`
  }

  switch (classifyError(error)) {
    case 'io':
      return `${message}. Check that the output and checkpoint directories are writable.`
    case 'network':
    case 'timeout':
    case 'rate_limit':
      return `${message}. This is a temporary issue. Submit the job again to resume from its checkpoints.`
    default:
      return message
  }
}
