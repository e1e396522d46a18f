/**
 * Cheap heuristics that catch degenerate backend output: too short, too
 * repetitive, or stuck in a generation loop.
 */

import type { ValidationThresholds } from '../config.js'

export type ValidationVerdict =
  | { valid: true }
  | { valid: false; reason: string }

const TOKEN_PATTERN = /[\p{L}\p{N}_]+/gu

export function tokenize(text: string): string[] {
  return (text.toLowerCase().match(TOKEN_PATTERN) ?? [])
}

/**
 * Highest occurrence count of any `size`-token sequence.
 */
export function maxNgramCount(tokens: string[], size: number): number {
  const counts = new Map<string, number>()
  let max = 0

  for (let i = 0; i + size <= tokens.length; i++) {
    const key = tokens.slice(i, i + size).join(' ')
    const count = (counts.get(key) ?? 0) + 1
    counts.set(key, count)
    if (count > max) max = count
  }

  return max
}

/**
 * @param minChars - Overrides `thresholds.minChars` (smoothing uses a length-relative floor)
 */
export function validateOutput(
  text: string,
  thresholds: ValidationThresholds,
  minChars: number = thresholds.minChars
): ValidationVerdict {
  const trimmed = text.trim()
  if (trimmed.length < minChars) {
    return { valid: false, reason: `too short (${trimmed.length} < ${minChars} chars)` }
  }

  const tokens = tokenize(trimmed)
  if (tokens.length === 0) {
    return { valid: false, reason: 'no word tokens' }
  }

  const uniqueRatio = new Set(tokens).size / tokens.length
  if (uniqueRatio < thresholds.minUniqueRatio) {
    return { valid: false, reason: `repetitive (unique ratio ${uniqueRatio.toFixed(2)})` }
  }

  const repeats = maxNgramCount(tokens, thresholds.ngramSize)
  if (repeats >= thresholds.maxNgramRepeats) {
    return { valid: false, reason: `looping (${thresholds.ngramSize}-gram repeated ${repeats} times)` }
  }

  return { valid: true }
}
