/**
 * XHTML helpers shared by the parser and the reconstructor.
 *
 * A unit's prose is the text of its paragraph elements that carry text; both
 * sides select paragraphs the same way so rewritten paragraphs map back onto
 * the nodes they came from.
 */

import { JSDOM } from 'jsdom'

const XHTML_CONTENT_TYPE = 'application/xhtml+xml'

/** Elements kept in place when a paragraph's text is replaced. */
export const MEDIA_SELECTOR = 'img, svg, image, video, audio, object'

/**
 * @throws when the markup is not well-formed XML
 */
export function parseXhtml(markup: string): JSDOM {
  return new JSDOM(markup, { contentType: XHTML_CONTENT_TYPE })
}

export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim()
}

/**
 * Paragraph elements with non-empty text, in document order.
 */
export function textParagraphs(document: Document): Element[] {
  return Array.from(document.querySelectorAll('p')).filter(
    paragraph => normalizeWhitespace(paragraph.textContent ?? '').length > 0
  )
}

export function paragraphTexts(document: Document): string[] {
  return textParagraphs(document).map(paragraph => normalizeWhitespace(paragraph.textContent ?? ''))
}

/**
 * Title of a unit: `<title>`, then the first h1/h2, then undefined.
 */
export function documentTitle(document: Document): string | undefined {
  const candidates = [
    document.querySelector('title'),
    document.querySelector('h1'),
    document.querySelector('h2')
  ]
  for (const element of candidates) {
    const text = normalizeWhitespace(element?.textContent ?? '')
    if (text) return text
  }
  return undefined
}
