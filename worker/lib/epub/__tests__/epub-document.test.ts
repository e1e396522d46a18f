import AdmZip from 'adm-zip'
import { DocumentReadError } from '../../errors.js'
import { describeDocument, EpubDocument, outputFileName } from '../epub-document.js'
import { buildEpub, buildEpubEntries, chapterMarkup, xhtml } from '../../../tests/helpers'

const book = {
  title: 'Harbour Tales',
  units: [
    { id: 'ch2', href: 'text/ch2.xhtml', markup: chapterMarkup('Second', ['Boats came in.', 'The tide turned.']) },
    { id: 'ch1', href: 'text/ch1.xhtml', markup: chapterMarkup('First', ['It was  a quiet\n morning.']) },
    { id: 'notes', href: 'notes.xhtml', markup: chapterMarkup('Notes', ['Extra notes here.']), inSpine: false }
  ]
}

describe('EpubDocument', () => {
  let warn: jest.SpyInstance

  beforeEach(() => {
    warn = jest.spyOn(console, 'warn').mockImplementation(() => {})
  })

  afterEach(() => {
    warn.mockRestore()
  })

  it('reads metadata and units in spine order, then unreferenced documents', () => {
    const document = EpubDocument.fromBuffer(buildEpub(book))

    expect(document.metadata).toEqual({
      title: 'Harbour Tales',
      author: 'Test Author',
      language: 'en',
      identifier: 'urn:uuid:test-book'
    })
    expect(document.opfPath).toBe('OEBPS/content.opf')
    expect(document.units.map(u => [u.id, u.href, u.inSpine])).toEqual([
      ['ch2', 'OEBPS/text/ch2.xhtml', true],
      ['ch1', 'OEBPS/text/ch1.xhtml', true],
      ['notes', 'OEBPS/notes.xhtml', false]
    ])
  })

  it('exposes paragraph text as chapter content', () => {
    const document = EpubDocument.fromBuffer(buildEpub(book))

    expect(document.chapters).toEqual([
      { id: 'ch2', title: 'Second', content: 'Boats came in.\n\nThe tide turned.' },
      { id: 'ch1', title: 'First', content: 'It was a quiet morning.' },
      { id: 'notes', title: 'Notes', content: 'Extra notes here.' }
    ])
  })

  it('describes the document for the upload summary', () => {
    expect(describeDocument(EpubDocument.fromBuffer(buildEpub(book)))).toEqual({
      title: 'Harbour Tales',
      chapterCount: 3,
      totalWords: 14
    })
  })

  it('falls back to the heading, then the file name, for unit titles', () => {
    const document = EpubDocument.fromEntries(
      buildEpubEntries({
        units: [
          { id: 'a', href: 'a.xhtml', markup: xhtml('', '<h2>Heading Title</h2><p>Text.</p>') },
          { id: 'b', href: 'b.xhtml', markup: xhtml('', '<p>No heading here.</p>') }
        ]
      })
    )

    expect(document.units.map(u => u.title)).toEqual(['Heading Title', 'b'])
  })

  it('keeps a malformed unit with empty content', () => {
    const document = EpubDocument.fromEntries(
      buildEpubEntries({
        units: [
          { id: 'ok', href: 'ok.xhtml', markup: chapterMarkup('Fine', ['Readable text.']) },
          { id: 'bad', href: 'bad.xhtml', markup: '<html><body><p>Unclosed</body></html>' }
        ]
      })
    )

    expect(document.unit('bad')).toEqual({ id: 'bad', href: 'OEBPS/bad.xhtml', title: 'bad', content: '', inSpine: true })
    expect(document.unit('ok')?.content).toBe('Readable text.')
  })

  it('rejects bytes that are not a zip archive', () => {
    expect(() => EpubDocument.fromBuffer(Buffer.from('not an epub'))).toThrow(DocumentReadError)
  })

  it('rejects an archive without a package document', () => {
    const entries = new Map([['mimetype', Buffer.from('application/epub+zip')]])

    expect(() => EpubDocument.fromEntries(entries)).toThrow('EPUB is corrupted: No OPF package file found')
  })

  it('rejects a manifest entry whose file is missing', () => {
    const entries = buildEpubEntries(book)
    entries.delete('OEBPS/text/ch1.xhtml')

    expect(() => EpubDocument.fromEntries(entries)).toThrow(
      "EPUB is corrupted: Missing document OEBPS/text/ch1.xhtml (manifest item 'ch1')"
    )
  })

  it('replaces entries without touching the original', () => {
    const original = EpubDocument.fromBuffer(buildEpub(book))
    const replaced = original.withReplacedEntries(
      new Map([['OEBPS/text/ch1.xhtml', chapterMarkup('First', ['A calm morning.'])]])
    )

    expect(replaced.unit('ch1')?.content).toBe('A calm morning.')
    expect(original.unit('ch1')?.content).toBe('It was a quiet morning.')
    expect(replaced.entryNames).toEqual(original.entryNames)
  })

  it('writes mimetype first and uncompressed', () => {
    const written = EpubDocument.fromBuffer(buildEpub(book)).toBuffer()
    const entries = new AdmZip(written).getEntries()

    expect(entries[0].entryName).toBe('mimetype')
    expect(entries[0].header.method).toBe(0)
    expect(entries[0].getData().toString('utf8')).toBe('application/epub+zip')
    expect(entries.map(entry => entry.entryName)).toEqual([
      'mimetype',
      'META-INF/container.xml',
      'OEBPS/content.opf',
      'OEBPS/style.css',
      'OEBPS/text/ch2.xhtml',
      'OEBPS/text/ch1.xhtml',
      'OEBPS/notes.xhtml'
    ])
    expect(EpubDocument.fromBuffer(written).chapters).toEqual(EpubDocument.fromBuffer(buildEpub(book)).chapters)
  })
})

describe('outputFileName', () => {
  it('names the output by job and level', () => {
    expect(outputFileName('job-1', 3)).toBe('job-1_simplified_level_3.epub')
  })
})
