/**
 * Simplification Prompts
 *
 * Prompts for the three gateway operations: window rewrite, summary and
 * transition smoothing. Every prompt forbids summarising the text it rewrites
 * and asks for the paragraph breaks to be kept.
 */

import type { SimplificationLevel } from '../../types/simplification.js'

export type SummaryScope = 'document' | 'chapter'

export interface RewritePromptInput {
  windowText: string
  globalSummary: string
  chapterSummary: string
  memoryTail: string
  level: SimplificationLevel
}

const LEVEL_INSTRUCTIONS: Record<SimplificationLevel, string> = {
  1: 'Level: LIGHT. Keep the author\'s style and all of the content. Use shorter, clearer sentences and explain difficult terms in parentheses where needed.',
  2: 'Level: MODERATE. Keep all of the content and examples, but simplify the wording and sentence order for maximum clarity. Do not summarise.',
  3: 'Level: AGGRESSIVE. Keep all of the content and details, but firmly simplify vocabulary and sentence structure. Do not summarise. Preserve every name, date and number.'
}

export function levelInstructions(level: SimplificationLevel): string {
  return LEVEL_INSTRUCTIONS[level]
}

function section(heading: string, body: string): string {
  return `${heading}:\n${body.trim() || '(none)'}\n\n`
}

/**
 * Generates the rewrite prompt for one window.
 *
 * Context sections (book summary, chapter summary, previous output) print "(none)"
 * when empty, as they are in fast mode and on the first window of a chapter.
 */
export function generateRewritePrompt(input: RewritePromptInput): string {
  return (
    'You are an editorial assistant who rewrites text WITHOUT SUMMARISING.\n' +
    'Follow the instructions carefully. Preserve every fact, name, date, example and the logical structure.\n\n' +
    `${levelInstructions(input.level)}\n\n` +
    'Rules:\n' +
    '1) Do NOT summarise; keep the length close to the original.\n' +
    '2) Keep the paragraphs; paragraphs are separated by blank lines. Do not add or remove breaks.\n' +
    '3) Adjust sentences for clarity without deleting content.\n' +
    '4) Stay consistent with what has already been rewritten (previous output).\n' +
    '5) Reply with the rewritten text only.\n\n' +
    section('Book context (summary)', input.globalSummary) +
    section('Chapter context (summary)', input.chapterSummary) +
    section('Previous output (end of the last rewritten passage)', input.memoryTail) +
    'Text to rewrite (keep content and length, only simplify the language):\n' +
    `${input.windowText}\n\n` +
    'Rewritten text:'
  )
}

export function generateSummaryPrompt(text: string, scope: SummaryScope): string {
  const scopeLabel = scope === 'document' ? 'whole book (opening chapters)' : 'one chapter'
  return (
    'You are an editorial assistant. Write an OBJECTIVE, NON-EVALUATIVE summary covering every key idea.\n' +
    'Do not invent facts. At most 15 lines. Plain language.\n\n' +
    `Summary scope: ${scopeLabel}\n\n` +
    `Text:\n${text}\n\n` +
    'Summary:'
  )
}

export function generateSmoothingPrompt(text: string): string {
  return (
    'Revise the text below ONLY to smooth the transitions between paragraphs and sentences. ' +
    'Do not remove content, do not summarise, do not introduce new ideas. ' +
    'The text was rewritten in overlapping passages, so a few sentences may be repeated where two passages meet; ' +
    'keep one copy of each repeated sentence. ' +
    'Keep the same information and the same paragraphs, separated by blank lines.\n\n' +
    `Text:\n${text}\n\n` +
    'Revised text:'
  )
}
