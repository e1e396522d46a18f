/**
 * Durable key-value storage for checkpoint records, scoped by job id.
 *
 * Both operations return Result values and never throw: a failed write degrades
 * resumability for that record and the caller decides whether to log it.
 */

import { promises as fs } from 'fs'
import path from 'path'
import { classifyError } from '../errors.js'
import { failure, success, type Result } from '../../types/result.js'

export interface CheckpointStore {
  /**
   * @returns success(undefined) when no record exists under the key
   */
  load(jobId: string, key: string): Promise<Result<unknown>>
  /** Creates the job scope when it does not exist yet. */
  save(jobId: string, key: string, value: unknown): Promise<Result<void>>
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT'
}

/**
 * JSON files under `<rootDir>/<jobId>/<key>`.
 * Writes go to a temp file first and are renamed into place, so a crash mid-write
 * leaves the previous record intact.
 */
export class FileCheckpointStore implements CheckpointStore {
  constructor(private readonly rootDir: string) {}

  private pathFor(jobId: string, key: string): string {
    return path.join(this.rootDir, jobId, key)
  }

  async load(jobId: string, key: string): Promise<Result<unknown>> {
    const filePath = this.pathFor(jobId, key)
    let raw: string

    try {
      raw = await fs.readFile(filePath, 'utf8')
    } catch (error) {
      if (isMissingFile(error)) return success(undefined)
      return failure(classifyError(error), `Failed to read ${filePath}: ${messageOf(error)}`)
    }

    try {
      return success(JSON.parse(raw))
    } catch (error) {
      return failure('malformed', `Corrupt checkpoint ${filePath}: ${messageOf(error)}`)
    }
  }

  async save(jobId: string, key: string, value: unknown): Promise<Result<void>> {
    const filePath = this.pathFor(jobId, key)
    const tempPath = `${filePath}.tmp`

    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true })
      await fs.writeFile(tempPath, JSON.stringify(value, null, 2), 'utf8')
      await fs.rename(tempPath, filePath)
      return success(undefined)
    } catch (error) {
      return failure(classifyError(error), `Failed to write ${filePath}: ${messageOf(error)}`)
    }
  }
}

/**
 * Process-local store. Values are deep-copied through JSON on the way in and out
 * so callers cannot mutate stored records.
 */
export class InMemoryCheckpointStore implements CheckpointStore {
  private readonly records = new Map<string, string>()

  async load(jobId: string, key: string): Promise<Result<unknown>> {
    const raw = this.records.get(`${jobId}/${key}`)
    return success(raw === undefined ? undefined : JSON.parse(raw))
  }

  async save(jobId: string, key: string, value: unknown): Promise<Result<void>> {
    this.records.set(`${jobId}/${key}`, JSON.stringify(value))
    return success(undefined)
  }

  /** Keys stored for a job, for inspection in tests. */
  keys(jobId: string): string[] {
    const prefix = `${jobId}/`
    return [...this.records.keys()]
      .filter(key => key.startsWith(prefix))
      .map(key => key.slice(prefix.length))
      .sort()
  }
}
