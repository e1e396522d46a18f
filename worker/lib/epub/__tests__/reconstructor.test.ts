import { EpubDocument } from '../epub-document.js'
import { reconstructDocument, rewriteUnitMarkup, splitParagraphs, withTitle } from '../reconstructor.js'
import { parseXhtml } from '../xhtml.js'
import { buildEpubEntries, chapterMarkup, xhtml } from '../../../tests/helpers'

function bodyOf(markup: string): Element {
  const body = parseXhtml(markup).window.document.querySelector('body')
  if (!body) throw new Error('no body in rewritten markup')
  return body
}

function rewritten(markup: string, text: string): string {
  const result = rewriteUnitMarkup(markup, text)
  if (!result.ok) throw new Error(result.detail)
  return result.value
}

describe('rewriteUnitMarkup', () => {
  const markup = xhtml(
    'One',
    '<h1>Chapter One</h1><p>Alpha one.</p><img src="pic.png" alt="pic"/><p>Beta two.</p><p>Gamma three.</p>'
  )

  it('inserts extra paragraphs after the last one and keeps other elements in place', () => {
    const body = bodyOf(rewritten(markup, 'A.\n\nB.\n\nC.\n\nD.\n\nE.'))

    expect(Array.from(body.children).map(element => element.localName)).toEqual(['h1', 'p', 'img', 'p', 'p', 'p', 'p'])
    expect(Array.from(body.querySelectorAll('p')).map(p => p.textContent)).toEqual(['A.', 'B.', 'C.', 'D.', 'E.'])
    expect(body.querySelector('img')?.getAttribute('src')).toBe('pic.png')
    expect(body.querySelector('h1')?.textContent).toBe('Chapter One')
  })

  it('empties leftover paragraphs when the rewrite has fewer', () => {
    const body = bodyOf(rewritten(markup, 'Only one.'))

    expect(Array.from(body.querySelectorAll('p')).map(p => p.textContent)).toEqual(['Only one.', '', ''])
  })

  it('keeps media inside a rewritten paragraph', () => {
    const body = bodyOf(rewritten(xhtml('Pic', '<p>Look <img src="x.png" alt=""/> here.</p>'), 'Simple.'))
    const paragraph = body.querySelector('p')

    expect(paragraph?.textContent).toBe('Simple.')
    expect(paragraph?.lastElementChild?.localName).toBe('img')
  })

  it('keeps media that opened a paragraph in front of the new text', () => {
    const body = bodyOf(
      rewritten(xhtml('Pic', '<p><img src="a.png" alt=""/> Look here <img src="b.png" alt=""/></p>'), 'Simple.')
    )
    const nodes = Array.from(body.querySelector('p')?.childNodes ?? [])

    expect(nodes.map(node => node.nodeName)).toEqual(['img', '#text', 'img'])
    expect(nodes[1].textContent).toBe('Simple.')
    expect(body.querySelector('img')?.getAttribute('src')).toBe('a.png')
  })

  it('appends paragraphs to the body when the unit has none', () => {
    const body = bodyOf(rewritten(xhtml('Empty', '<div class="title">Heading</div>'), 'First.\n\nSecond.'))

    expect(Array.from(body.children).map(element => element.localName)).toEqual(['div', 'p', 'p'])
  })

  it('keeps the XML declaration', () => {
    expect(rewritten(markup, 'A.').startsWith('<?xml version="1.0" encoding="UTF-8"?>\n<html')).toBe(true)
  })

  it('escapes rewritten text', () => {
    const output = rewritten(markup, 'Fish & chips <cheap>.')

    expect(output).toContain('<p>Fish &amp; chips &lt;cheap&gt;.</p>')
  })

  it('reports malformed markup as a structure failure', () => {
    expect(rewriteUnitMarkup('<html><body><p>Unclosed</body></html>', 'x')).toMatchObject({ ok: false, kind: 'structure' })
  })
})

describe('withTitle', () => {
  it('replaces the first dc:title', () => {
    expect(withTitle('<metadata><dc:title id="t">Old</dc:title></metadata>', 'New & Improved')).toBe(
      '<metadata><dc:title id="t">New &amp; Improved</dc:title></metadata>'
    )
  })

  it('adds a title when the package has none', () => {
    expect(withTitle('<metadata></metadata>', 'Added')).toBe('<metadata><dc:title>Added</dc:title></metadata>')
  })
})

describe('splitParagraphs', () => {
  it('splits on blank lines and drops empty paragraphs', () => {
    expect(splitParagraphs(' One.\n\n\n Two.\n  \n')).toEqual(['One.', 'Two.'])
  })
})

describe('reconstructDocument', () => {
  let log: jest.SpyInstance
  let warn: jest.SpyInstance

  beforeEach(() => {
    log = jest.spyOn(console, 'log').mockImplementation(() => {})
    warn = jest.spyOn(console, 'warn').mockImplementation(() => {})
  })

  afterEach(() => {
    log.mockRestore()
    warn.mockRestore()
  })

  const original = EpubDocument.fromEntries(
    buildEpubEntries({
      title: 'Harbour Tales',
      units: [
        { id: 'ch1', href: 'ch1.xhtml', markup: chapterMarkup('One', ['The vessel departed.', 'It was late.']) },
        { id: 'ch2', href: 'ch2.xhtml', markup: chapterMarkup('Two', ['Nothing changes here.']) },
        { id: 'cover', href: 'cover.xhtml', markup: xhtml('Cover', '<img src="cover.png" alt="cover"/>') }
      ]
    })
  )

  it('writes rewritten chapters and the level title', () => {
    const { document, report } = reconstructDocument(
      original,
      [
        { id: 'ch1', title: 'One', content: 'The boat left.\n\nIt was late.' },
        { id: 'ch2', title: 'Two', content: 'Nothing changes here.' },
        { id: 'cover', title: 'Cover', content: '' }
      ],
      2
    )

    expect(report).toEqual({ rewritten: ['ch1'], unchanged: ['ch2', 'cover'], failed: [] })
    expect(document.title).toBe('Harbour Tales - Moderate')
    expect(document.unit('ch1')?.content).toBe('The boat left.\n\nIt was late.')
    expect(document.entry('OEBPS/ch2.xhtml')).toEqual(original.entry('OEBPS/ch2.xhtml'))
    expect(document.entry('OEBPS/cover.xhtml')).toEqual(original.entry('OEBPS/cover.xhtml'))
    expect(document.entryNames).toEqual(original.entryNames)
  })

  it('leaves units without a rewritten chapter unchanged', () => {
    const { document, report } = reconstructDocument(original, [], 1)

    expect(report.rewritten).toEqual([])
    expect(report.unchanged).toEqual(['ch1', 'ch2', 'cover'])
    expect(document.title).toBe('Harbour Tales - Light')
    expect(document.chapters.map(c => c.content)).toEqual(original.chapters.map(c => c.content))
  })
})
