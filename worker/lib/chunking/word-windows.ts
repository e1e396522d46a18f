/**
 * Overlapping word windows for chapter rewriting.
 *
 * Windows are produced deterministically from (content, chunkSize, overlap):
 * window 0 starts at word 0, each next window starts `overlap` words before the
 * previous end, and the last window ends exactly at the last word.
 *
 * Paragraph breaks inside a window are kept as blank lines so the backend sees
 * (and can preserve) the paragraph structure. Word offsets ignore them.
 */

import type { TextWindow } from '../../types/simplification.js'

/** Chapters below this word count are treated as non-prose and passed through. */
export const MIN_PROSE_WORDS = 5

export interface WindowOptions {
  /** Words per window */
  chunkSize: number
  /** Words shared with the previous window; must be smaller than chunkSize */
  overlap: number
}

interface WordToken {
  word: string
  /** True when the word closes a paragraph */
  paragraphEnd: boolean
}

function tokenize(text: string): WordToken[] {
  const tokens: WordToken[] = []
  const paragraphs = text.split(/\n\s*\n/)

  for (const paragraph of paragraphs) {
    const words = paragraph.split(/\s+/).filter(Boolean)
    words.forEach((word, i) => {
      tokens.push({ word, paragraphEnd: i === words.length - 1 })
    })
  }

  return tokens
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length
}

export function isProse(text: string): boolean {
  return countWords(text) >= MIN_PROSE_WORDS
}

function joinTokens(tokens: WordToken[]): string {
  let out = ''
  tokens.forEach((token, i) => {
    out += token.word
    if (i < tokens.length - 1) {
      out += token.paragraphEnd ? '\n\n' : ' '
    }
  })
  return out
}

/**
 * Split chapter text into overlapping word windows.
 *
 * @returns Empty list when the text has fewer than MIN_PROSE_WORDS words
 *
 * @example
 * splitIntoWindows(thousandWords, { chunkSize: 350, overlap: 50 })
 * // starts at 0, 300, 600, 900; last window has 100 words
 */
export function splitIntoWindows(text: string, options: WindowOptions): TextWindow[] {
  const { chunkSize, overlap } = options

  if (chunkSize <= 0) {
    throw new RangeError(`chunkSize must be positive, got ${chunkSize}`)
  }
  if (overlap < 0 || overlap >= chunkSize) {
    throw new RangeError(`overlap must be in [0, ${chunkSize}), got ${overlap}`)
  }

  const tokens = tokenize(text)
  if (tokens.length < MIN_PROSE_WORDS) {
    return []
  }

  const windows: TextWindow[] = []
  let start = 0

  while (start < tokens.length) {
    const end = Math.min(tokens.length, start + chunkSize)
    const previousEnd = windows.length > 0 ? windows[windows.length - 1].endWord : start

    windows.push({
      index: windows.length,
      startWord: start,
      endWord: end,
      overlapWords: previousEnd - start,
      text: joinTokens(tokens.slice(start, end)),
      freshText: joinTokens(tokens.slice(previousEnd, end)),
      breakBefore: previousEnd > 0 && tokens[previousEnd - 1].paragraphEnd
    })

    if (end >= tokens.length) break
    start = end - overlap
  }

  return windows
}
