import AdmZip from 'adm-zip'
import { XMLParser } from 'fast-xml-parser'
import path from 'path'
import { DocumentReadError } from '../errors.js'
import { documentTitle, paragraphTexts, parseXhtml } from './xhtml.js'

export interface EpubMetadata {
  title: string
  author: string
  language: string
  identifier?: string
}

/**
 * One XHTML document of the container.
 */
export interface EpubUnit {
  /** Manifest id; stable join key for rewritten content */
  id: string
  /** Entry name inside the zip */
  href: string
  title: string
  /** Paragraph text, paragraphs separated by blank lines */
  content: string
  /** True when the unit is listed in the spine */
  inSpine: boolean
}

export interface EpubPackage {
  opfPath: string
  metadata: EpubMetadata
  units: EpubUnit[]
}

type XmlNode = Record<string, unknown>

function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function child(node: unknown, key: string): unknown {
  return isNode(node) ? node[key] : undefined
}

function asList(value: unknown): unknown[] {
  if (value === undefined || value === null) return []
  return Array.isArray(value) ? value : [value]
}

/**
 * Text of an element parsed by fast-xml-parser: a plain string, or `#text`
 * when the element has attributes. Repeated elements yield the first one.
 */
function textOf(value: unknown): string | undefined {
  const first = Array.isArray(value) ? value[0] : value
  if (typeof first === 'string') return first.trim() || undefined
  if (typeof first === 'number') return String(first)
  const text = child(first, '#text')
  if (typeof text === 'string') return text.trim() || undefined
  return undefined
}

function attribute(node: unknown, name: string): string | undefined {
  const value = child(node, `@_${name}`)
  return typeof value === 'string' ? value : undefined
}

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
  parseAttributeValue: false,
  parseTagValue: false
})

/**
 * Reads every file entry of the archive, in archive order.
 *
 * @throws DocumentReadError if the buffer is not a readable zip
 */
export function readZipEntries(buffer: Buffer): Map<string, Buffer> {
  let zip: AdmZip
  try {
    zip = new AdmZip(buffer)
  } catch (err) {
    throw new DocumentReadError(
      `EPUB is corrupted: Failed to read ZIP archive - ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    )
  }

  const entries = new Map<string, Buffer>()
  for (const entry of zip.getEntries()) {
    if (!entry.isDirectory) {
      entries.set(entry.entryName, entry.getData())
    }
  }
  return entries
}

/**
 * Find the OPF (Open Packaging Format) file path.
 * Checks container.xml first, then searches for *.opf files.
 */
function findOpfPath(entries: Map<string, Buffer>): string | undefined {
  const container = entries.get('META-INF/container.xml')
  if (container) {
    const parsed: unknown = xmlParser.parse(container.toString('utf8'))
    const rootfiles = asList(child(child(child(parsed, 'container'), 'rootfiles'), 'rootfile'))
    for (const rootfile of rootfiles) {
      const fullPath = attribute(rootfile, 'full-path')
      if (fullPath && entries.has(fullPath)) return fullPath
    }
  }

  for (const name of entries.keys()) {
    if (name.endsWith('.opf')) return name
  }
  return undefined
}

function extractMetadata(pkg: unknown): EpubMetadata {
  const metadata = child(pkg, 'metadata')
  return {
    title: textOf(child(metadata, 'dc:title')) ?? 'Unknown Title',
    author: textOf(child(metadata, 'dc:creator')) ?? 'Unknown Author',
    language: textOf(child(metadata, 'dc:language')) ?? 'en',
    identifier: textOf(child(metadata, 'dc:identifier'))
  }
}

function readUnit(
  entries: Map<string, Buffer>,
  id: string,
  href: string,
  inSpine: boolean
): EpubUnit {
  const data = entries.get(href)
  if (!data) {
    throw new DocumentReadError(`EPUB is corrupted: Missing document ${href} (manifest item '${id}')`)
  }

  const markup = data.toString('utf8')
  const fallbackTitle = path.posix.basename(href, path.posix.extname(href))

  try {
    const { document } = parseXhtml(markup).window
    return {
      id,
      href,
      title: documentTitle(document) ?? fallbackTitle,
      content: paragraphTexts(document).join('\n\n'),
      inSpine
    }
  } catch (err) {
    // Not well-formed: keep the unit out of the rewrite so it passes through unchanged
    console.warn(`[EpubParser] ${href} is not well-formed XHTML, leaving it unchanged:`,
      err instanceof Error ? err.message : err)
    return { id, href, title: fallbackTitle, content: '', inSpine }
  }
}

/**
 * Parses the package document and every XHTML unit: spine order first, then
 * manifest documents the spine does not reference.
 *
 * @throws DocumentReadError if the EPUB is corrupted or malformed
 */
export function parsePackage(entries: Map<string, Buffer>): EpubPackage {
  const opfPath = findOpfPath(entries)
  if (!opfPath) {
    throw new DocumentReadError('EPUB is corrupted: No OPF package file found')
  }

  const opfData = entries.get(opfPath)
  if (!opfData) {
    throw new DocumentReadError(`EPUB is corrupted: OPF file not found at ${opfPath}`)
  }

  let parsed: unknown
  try {
    parsed = xmlParser.parse(opfData.toString('utf8'))
  } catch (err) {
    throw new DocumentReadError(`EPUB is corrupted: Unreadable OPF at ${opfPath}`, { cause: err })
  }

  const pkg = child(parsed, 'package')
  if (!isNode(pkg)) {
    throw new DocumentReadError(`EPUB is corrupted: ${opfPath} has no <package> element`)
  }

  const opfDir = path.posix.dirname(opfPath)
  const resolve = (href: string): string => {
    let target = href
    try {
      target = decodeURIComponent(href)
    } catch {
      // Keep malformed escapes as written
    }
    return opfDir === '.' ? target : path.posix.join(opfDir, target)
  }

  // Build manifest lookup (XHTML documents only)
  const documents = new Map<string, string>()
  for (const item of asList(child(child(pkg, 'manifest'), 'item'))) {
    const id = attribute(item, 'id')
    const href = attribute(item, 'href')
    const mediaType = attribute(item, 'media-type') ?? ''
    if (id && href && mediaType.includes('html')) {
      documents.set(id, resolve(href))
    }
  }

  const units: EpubUnit[] = []
  const seen = new Set<string>()

  const spineItems = asList(child(child(pkg, 'spine'), 'itemref'))
  spineItems.forEach((itemref, i) => {
    const idref = attribute(itemref, 'idref')
    if (!idref || seen.has(idref)) return

    const href = documents.get(idref)
    if (!href) {
      console.warn(`[EpubParser] Spine item ${i + 1} references non-document manifest item '${idref}', skipping`)
      return
    }

    seen.add(idref)
    units.push(readUnit(entries, idref, href, true))
  })

  for (const [id, href] of documents) {
    if (!seen.has(id)) {
      seen.add(id)
      units.push(readUnit(entries, id, href, false))
    }
  }

  if (units.length === 0) {
    throw new DocumentReadError('EPUB is corrupted: No readable chapters found')
  }

  return { opfPath, metadata: extractMetadata(pkg), units }
}
