/**
 * Offline rewrite gateway: plain-word substitution from a lookup table plus
 * splitting of long sentences at commas and semicolons.
 *
 * Used when no network backend is configured, and as a deterministic backend in
 * end-to-end runs.
 */

import plainWords from '../../data/plain-words.json'
import type { SimplificationLevel } from '../../types/simplification.js'
import type { RewriteGateway, RewriteRequest } from './types.js'

type WordTable = Record<string, string>

const WORD_TABLES: Record<SimplificationLevel, WordTable> = {
  1: { ...plainWords.basic },
  2: { ...plainWords.basic, ...plainWords.common },
  3: { ...plainWords.basic, ...plainWords.common, ...plainWords.advanced }
}

/** Sentences longer than this are split; light keeps sentence structure. */
const MAX_SENTENCE_CHARS: Record<SimplificationLevel, number | undefined> = {
  1: undefined,
  2: 120,
  3: 80
}

const SUMMARY_CHARS = 600

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

function buildPattern(table: WordTable): RegExp {
  // Longest first so multi-word entries win over their prefixes
  const alternatives = Object.keys(table)
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
  return new RegExp(`\\b(?:${alternatives.join('|')})\\b`, 'gi')
}

const PATTERNS: Record<SimplificationLevel, RegExp> = {
  1: buildPattern(WORD_TABLES[1]),
  2: buildPattern(WORD_TABLES[2]),
  3: buildPattern(WORD_TABLES[3])
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1)
}

export function replaceWords(text: string, level: SimplificationLevel): string {
  const table = WORD_TABLES[level]
  return text.replace(PATTERNS[level], match => {
    const plain = table[match.toLowerCase()]
    if (plain === undefined) return match
    return /^[A-Z]/.test(match) ? capitalize(plain) : plain
  })
}

export function splitSentences(text: string): string[] {
  const matches = text.match(/[^.!?]+(?:[.!?]+|$)/g) ?? []
  return matches.map(sentence => sentence.trim()).filter(Boolean)
}

/**
 * Splits one sentence at commas/semicolons into sentences of at most
 * `maxChars` characters where the clauses allow it.
 *
 * @example
 * breakSentence('We walked home, it rained hard, and we got wet.', 20)
 * // 'We walked home. It rained hard. And we got wet.'
 */
export function breakSentence(sentence: string, maxChars: number): string {
  if (sentence.length <= maxChars) return sentence

  const terminalMatch = /[.!?]+$/.exec(sentence)
  const terminal = terminalMatch ? terminalMatch[0] : '.'
  const body = terminalMatch ? sentence.slice(0, terminalMatch.index) : sentence

  const clauses = body.split(/\s*[,;]\s+/).filter(Boolean)
  if (clauses.length < 2) return sentence

  const groups: string[] = []
  let current = ''
  for (const clause of clauses) {
    if (!current) {
      current = clause
    } else if (current.length + 2 + clause.length <= maxChars) {
      current += `, ${clause}`
    } else {
      groups.push(current)
      current = clause
    }
  }
  groups.push(current)

  return groups
    .map((group, i) => `${capitalize(group)}${i === groups.length - 1 ? terminal : '.'}`)
    .join(' ')
}

function simplifyParagraph(paragraph: string, level: SimplificationLevel): string {
  const replaced = replaceWords(paragraph.replace(/\s+/g, ' ').trim(), level)
  const maxChars = MAX_SENTENCE_CHARS[level]
  if (maxChars === undefined) return replaced

  return splitSentences(replaced)
    .map(sentence => breakSentence(sentence, maxChars))
    .join(' ')
}

export class RuleBasedRewriteGateway implements RewriteGateway {
  readonly name = 'rule-based'

  async rewrite(request: RewriteRequest): Promise<string> {
    return request.windowText
      .split(/\n\s*\n/)
      .map(paragraph => simplifyParagraph(paragraph, request.level))
      .filter(Boolean)
      .join('\n\n')
  }

  /** Leading sentences up to a fixed character budget (at least one sentence). */
  async summarize(text: string): Promise<string> {
    const sentences = splitSentences(text.replace(/\s+/g, ' '))
    const picked: string[] = []
    let length = 0

    for (const sentence of sentences) {
      if (picked.length > 0 && length + sentence.length + 1 > SUMMARY_CHARS) break
      picked.push(sentence)
      length += sentence.length + 1
    }

    return picked.join(' ')
  }

  async smoothTransitions(text: string): Promise<string> {
    return text
  }
}
