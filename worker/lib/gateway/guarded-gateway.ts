/**
 * Core policy around a raw RewriteGateway.
 *
 * Every call gets its own timeout. Rewrite and smoothing output is validated;
 * a timeout, backend error or rejected output counts as one failed attempt.
 * After `maxAttempts` failed attempts the original text is returned. Summaries
 * get a single attempt and fall back to a leading excerpt. Nothing here throws.
 */

import type { PipelineConfig } from '../config.js'
import { classifyError, fallbackFor, TimeoutError } from '../errors.js'
import { validateOutput, type ValidationVerdict } from './output-validator.js'
import type { RewriteGateway, RewriteRequest, SummaryScope } from './types.js'
import { failure, success, type Failure, type Result } from '../../types/result.js'

export type GuardPolicy = Pick<
  PipelineConfig,
  'callTimeoutMs' | 'maxAttempts' | 'retryDelayMs' | 'validation' | 'summaries'
>

export interface GuardedText {
  text: string
  /** True when the original (or excerpt) was used instead of backend output */
  fellBack: boolean
  /** Backend calls made */
  attempts: number
  /** Last failure when fellBack is true */
  failure?: Failure
}

/**
 * Leading `maxChars` characters of `text`, with "..." when truncated.
 */
export function excerpt(text: string, maxChars: number): string {
  return text.length > maxChars ? `${text.slice(0, maxChars)}...` : text
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

export class GuardedRewriteGateway {
  constructor(
    private readonly inner: RewriteGateway,
    private readonly policy: GuardPolicy
  ) {}

  get name(): string {
    return this.inner.name
  }

  async rewrite(request: RewriteRequest): Promise<GuardedText> {
    return this.attempt(
      'rewrite',
      signal => this.inner.rewrite(request, signal),
      text => validateOutput(text, this.policy.validation),
      request.windowText,
      this.policy.maxAttempts
    )
  }

  async smoothTransitions(text: string): Promise<GuardedText> {
    const { smoothingMinChars, smoothingMinLengthRatio } = this.policy.validation
    const minChars = Math.max(smoothingMinChars, Math.floor(text.length * smoothingMinLengthRatio))

    return this.attempt(
      'smoothTransitions',
      signal => this.inner.smoothTransitions(text, signal),
      output => validateOutput(output, this.policy.validation, minChars),
      text,
      this.policy.maxAttempts
    )
  }

  async summarize(text: string, scope: SummaryScope): Promise<GuardedText> {
    const { summaryMinChars } = this.policy.validation

    return this.attempt(
      `summarize(${scope})`,
      signal => this.inner.summarize(text, scope, signal),
      output =>
        output.trim().length >= summaryMinChars
          ? { valid: true }
          : { valid: false, reason: `summary too short (${output.trim().length} < ${summaryMinChars} chars)` },
      excerpt(text, this.policy.summaries.fallbackChars),
      1
    )
  }

  private async attempt(
    operation: string,
    call: (signal: AbortSignal) => Promise<string>,
    validate: (text: string) => ValidationVerdict,
    fallback: string,
    maxAttempts: number
  ): Promise<GuardedText> {
    let lastFailure: Failure = failure('unknown', 'no attempt made')

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (attempt > 1 && this.policy.retryDelayMs > 0) {
        await sleep(this.policy.retryDelayMs)
      }

      const outcome = await this.callWithTimeout(operation, call)
      if (outcome.ok) {
        const verdict = validate(outcome.value)
        if (verdict.valid) {
          return { text: outcome.value.trim(), fellBack: false, attempts: attempt }
        }
        lastFailure = failure('validation', verdict.reason)
      } else {
        lastFailure = outcome
      }

      console.warn(
        `[RewriteGateway] ${operation} attempt ${attempt}/${maxAttempts} failed (${lastFailure.kind}): ${lastFailure.detail}`
      )
    }

    console.warn(
      `[RewriteGateway] ${operation} exhausted ${maxAttempts} attempt(s), ${fallbackFor(lastFailure.kind)}`
    )
    return { text: fallback, fellBack: true, attempts: maxAttempts, failure: lastFailure }
  }

  private async callWithTimeout(
    operation: string,
    call: (signal: AbortSignal) => Promise<string>
  ): Promise<Result<string>> {
    const controller = new AbortController()
    const timeoutMs = this.policy.callTimeoutMs
    let timer: ReturnType<typeof setTimeout> | undefined

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort()
        reject(new TimeoutError(timeoutMs, operation))
      }, timeoutMs)
    })

    try {
      const text = await Promise.race([call(controller.signal), timeout])
      if (typeof text !== 'string') {
        return failure('malformed', `${operation} returned ${typeof text} instead of text`)
      }
      return success(text)
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error)
      return failure(classifyError(error), detail)
    } finally {
      clearTimeout(timer)
    }
  }
}
