/**
 * Immutable EPUB container.
 *
 * Holds every archive entry plus the parsed package. Changes go through
 * `withReplacedEntries`, which returns a new document and leaves this one as is.
 */

import AdmZip from 'adm-zip'
import { countWords } from '../chunking/word-windows.js'
import { parsePackage, readZipEntries, type EpubMetadata, type EpubUnit } from './epub-parser.js'
import type { Chapter, DocumentSummary, SimplificationLevel } from '../../types/simplification.js'

const MIMETYPE_ENTRY = 'mimetype'
const EPUB_MIMETYPE = 'application/epub+zip'

export class EpubDocument {
  private constructor(
    private readonly entries: ReadonlyMap<string, Buffer>,
    readonly opfPath: string,
    readonly metadata: Readonly<EpubMetadata>,
    readonly units: readonly EpubUnit[]
  ) {}

  static fromEntries(entries: Map<string, Buffer>): EpubDocument {
    const pkg = parsePackage(entries)
    return new EpubDocument(new Map(entries), pkg.opfPath, pkg.metadata, pkg.units)
  }

  /**
   * @throws DocumentReadError if the buffer is not a readable EPUB
   */
  static fromBuffer(buffer: Buffer): EpubDocument {
    return EpubDocument.fromEntries(readZipEntries(buffer))
  }

  get title(): string {
    return this.metadata.title
  }

  /** Structural text units as chapters, in reading order. */
  get chapters(): Chapter[] {
    return this.units.map(unit => ({ id: unit.id, title: unit.title, content: unit.content }))
  }

  get entryNames(): string[] {
    return [...this.entries.keys()]
  }

  entry(name: string): Buffer | undefined {
    return this.entries.get(name)
  }

  entryText(name: string): string | undefined {
    return this.entries.get(name)?.toString('utf8')
  }

  unit(id: string): EpubUnit | undefined {
    return this.units.find(unit => unit.id === id)
  }

  /**
   * New document with the given entries overwritten. Entry order is kept.
   */
  withReplacedEntries(replacements: ReadonlyMap<string, Buffer | string>): EpubDocument {
    const next = new Map(this.entries)
    for (const [name, value] of replacements) {
      next.set(name, typeof value === 'string' ? Buffer.from(value, 'utf8') : value)
    }
    return EpubDocument.fromEntries(next)
  }

  /**
   * Serializes the container. `mimetype` is written first and uncompressed.
   */
  toBuffer(): Buffer {
    // adm-zip sorts entries by name on write unless told not to
    const zip = new AdmZip(undefined, { noSort: true })

    zip.addFile(MIMETYPE_ENTRY, this.entries.get(MIMETYPE_ENTRY) ?? Buffer.from(EPUB_MIMETYPE))
    const mimetype = zip.getEntry(MIMETYPE_ENTRY)
    if (mimetype) {
      mimetype.header.method = 0
    }

    for (const [name, data] of this.entries) {
      if (name !== MIMETYPE_ENTRY) zip.addFile(name, data)
    }
    return zip.toBuffer()
  }
}

/**
 * Upload summary of a document.
 */
export function describeDocument(document: EpubDocument): DocumentSummary {
  return {
    title: document.title,
    chapterCount: document.units.length,
    totalWords: document.units.reduce((sum, unit) => sum + countWords(unit.content), 0)
  }
}

export function outputFileName(jobId: string, level: SimplificationLevel): string {
  return `${jobId}_simplified_level_${level}.epub`
}
