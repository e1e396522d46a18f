/**
 * Document Reconstructor
 *
 * Maps rewritten chapter text back onto the original container. Only the text
 * inside existing (or appended) paragraph elements changes; headings, images
 * and every other element stay where they are. A unit that cannot be rebuilt
 * keeps its original bytes.
 */

import type { JSDOM } from 'jsdom'
import { fallbackFor } from '../errors.js'
import { MEDIA_SELECTOR, parseXhtml, textParagraphs } from './xhtml.js'
import type { EpubDocument } from './epub-document.js'
import { failure, success, type Result } from '../../types/result.js'
import {
  LEVEL_TITLE_SUFFIXES,
  type Chapter,
  type SimplificationLevel
} from '../../types/simplification.js'

export interface ReconstructionReport {
  rewritten: string[]
  unchanged: string[]
  failed: Array<{ id: string; detail: string }>
}

export interface Reconstruction {
  document: EpubDocument
  report: ReconstructionReport
}

export function splitParagraphs(text: string): string[] {
  return text
    .split(/\n\s*\n/)
    .map(paragraph => paragraph.trim())
    .filter(Boolean)
}

function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
}

/** True when no text of the paragraph comes before `element`. */
function leadsParagraph(paragraph: Element, element: Element): boolean {
  const texts: Node[] = []
  const collect = (node: Node): void => {
    if (node.nodeType === node.TEXT_NODE) {
      if (node.textContent?.trim()) texts.push(node)
      return
    }
    node.childNodes.forEach(collect)
  }
  collect(paragraph)

  return texts.every(text => !(element.compareDocumentPosition(text) & element.DOCUMENT_POSITION_PRECEDING))
}

/**
 * Replaces the paragraph's text. Media that opened the paragraph goes back in
 * front of the new text; any other media follows it.
 */
function setParagraphText(paragraph: Element, text: string): void {
  const media = Array.from(paragraph.querySelectorAll(MEDIA_SELECTOR)).filter(
    element => !element.parentElement?.closest(MEDIA_SELECTOR)
  )
  const leading = media.filter(element => leadsParagraph(paragraph, element))

  paragraph.textContent = text
  paragraph.prepend(...leading)
  for (const element of media) {
    if (!leading.includes(element)) paragraph.appendChild(element)
  }
}

/**
 * Rewrites the paragraph text of one XHTML unit.
 *
 * Rewritten paragraphs fill the existing text paragraphs in order. Extra
 * paragraphs are inserted after the last existing one (or appended to the
 * body); existing paragraphs left over are emptied, not removed.
 */
export function rewriteUnitMarkup(markup: string, rewrittenText: string): Result<string> {
  let dom: JSDOM
  try {
    dom = parseXhtml(markup)
  } catch (error) {
    return failure('structure', `not well-formed XHTML: ${error instanceof Error ? error.message : String(error)}`)
  }

  try {
    return success(fillParagraphs(dom, markup, rewrittenText))
  } catch (error) {
    return failure('structure', error instanceof Error ? error.message : String(error))
  }
}

/**
 * @throws when the document has no body or the DOM rejects a mutation
 */
function fillParagraphs(dom: JSDOM, markup: string, rewrittenText: string): string {
  const { document } = dom.window
  const body = document.body ?? document.querySelector('body')
  if (!body) {
    throw new Error('document has no <body>')
  }

  const paragraphs = textParagraphs(document)
  const rewritten = splitParagraphs(rewrittenText)

  paragraphs.forEach((paragraph, i) => {
    setParagraphText(paragraph, i < rewritten.length ? rewritten[i] : '')
  })

  let anchor: Element | undefined = paragraphs[paragraphs.length - 1]
  for (const text of rewritten.slice(paragraphs.length)) {
    const paragraph = document.createElementNS(body.namespaceURI, 'p')
    paragraph.textContent = text
    if (anchor) {
      anchor.after(paragraph)
    } else {
      body.appendChild(paragraph)
    }
    anchor = paragraph
  }

  const serialized = dom.serialize()
  const declaration = /^\s*<\?xml[^>]*\?>/.exec(markup)
  return declaration && !serialized.startsWith('<?xml') ? `${declaration[0].trim()}\n${serialized}` : serialized
}

/**
 * Sets `dc:title` in the package document.
 */
export function withTitle(opfXml: string, title: string): string {
  const pattern = /(<dc:title\b[^>]*>)([\s\S]*?)(<\/dc:title>)/
  if (pattern.test(opfXml)) {
    return opfXml.replace(pattern, (_match, open: string, _old: string, close: string) => `${open}${escapeXml(title)}${close}`)
  }
  return opfXml.replace(/<\/metadata>/, `<dc:title>${escapeXml(title)}</dc:title></metadata>`)
}

/**
 * Builds the output document from the original and the rewritten chapters
 * (joined by chapter id).
 */
export function reconstructDocument(
  original: EpubDocument,
  chapters: readonly Chapter[],
  level: SimplificationLevel
): Reconstruction {
  const byId = new Map(chapters.map(chapter => [chapter.id, chapter] as const))
  const replacements = new Map<string, string>()
  const report: ReconstructionReport = { rewritten: [], unchanged: [], failed: [] }

  for (const unit of original.units) {
    const chapter = byId.get(unit.id)
    if (!chapter || !chapter.content.trim() || chapter.content === unit.content) {
      report.unchanged.push(unit.id)
      continue
    }

    const markup = original.entryText(unit.href)
    const rebuilt = markup === undefined
      ? failure('structure', `entry ${unit.href} is missing`)
      : rewriteUnitMarkup(markup, chapter.content)

    if (rebuilt.ok) {
      replacements.set(unit.href, rebuilt.value)
      report.rewritten.push(unit.id)
    } else {
      console.warn(`[Reconstructor] ${unit.href}: ${rebuilt.detail} (${fallbackFor(rebuilt.kind)})`)
      report.failed.push({ id: unit.id, detail: rebuilt.detail })
    }
  }

  const opf = original.entryText(original.opfPath)
  if (opf !== undefined) {
    replacements.set(original.opfPath, withTitle(opf, `${original.title}${LEVEL_TITLE_SUFFIXES[level]}`))
  }

  console.log(
    `[Reconstructor] ${report.rewritten.length} unit(s) rewritten, ${report.unchanged.length} unchanged, ${report.failed.length} failed`
  )
  return { document: original.withReplacedEntries(replacements), report }
}
