/**
 * Persistent Memory Store
 *
 * Two durable mappings keyed by canonical URL: rejected URLs and imported URLs.
 * A URL lives in at most one of them and is never reclassified.
 *
 * JsonFileMemoryStore writes each mapping to its own pretty-printed JSON file after every
 * record (temp file + rename), through a single write queue.
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { z } from 'zod'
import { loggers } from '../../config/logger.js'
import { StoreCorruptionError } from '../errors.js'
import {
  REJECT_REASONS,
  type ImportedRecord,
  type ImportedRecordInput,
  type RejectReason,
  type RejectRecord,
} from '../types.js'
import { tryCanonicalizeUrl } from '../utils/url.js'

const log = loggers.store

export const REJECTS_FILE = 'rejects.json'
export const IMPORTED_FILE = 'imported.json'

export interface StoreCounts {
  rejected: number
  imported: number
}

export interface MemoryStore {
  load(): Promise<void>
  isRejected(url: string): boolean
  isImported(url: string): boolean
  getReject(url: string): RejectRecord | undefined
  getImported(url: string): ImportedRecord | undefined
  /**
   * @returns false if the URL was already classified (nothing written)
   */
  recordReject(url: string, reason: RejectReason, detail?: string): Promise<boolean>
  /**
   * @returns false if the URL was already classified (nothing written)
   */
  recordImported(url: string, input: ImportedRecordInput): Promise<boolean>
  /** Resolves once every pending write has reached disk */
  flush(): Promise<void>
  counts(): StoreCounts
}

/**
 * Store key for a URL. Unparseable URLs are kept verbatim.
 */
export function storeKey(url: string): string {
  return tryCanonicalizeUrl(url) ?? url.trim()
}

type Mapping = 'rejects' | 'imported'

abstract class BaseMemoryStore implements MemoryStore {
  protected readonly rejects = new Map<string, RejectRecord>()
  protected readonly imported = new Map<string, ImportedRecord>()

  constructor(protected readonly now: () => Date = () => new Date()) {}

  abstract load(): Promise<void>
  abstract flush(): Promise<void>
  protected abstract persist(mapping: Mapping): Promise<void>

  isRejected(url: string): boolean {
    return this.rejects.has(storeKey(url))
  }

  isImported(url: string): boolean {
    return this.imported.has(storeKey(url))
  }

  getReject(url: string): RejectRecord | undefined {
    return this.rejects.get(storeKey(url))
  }

  getImported(url: string): ImportedRecord | undefined {
    return this.imported.get(storeKey(url))
  }

  async recordReject(url: string, reason: RejectReason, detail?: string): Promise<boolean> {
    const key = storeKey(url)
    if (this.rejects.has(key) || this.imported.has(key)) {
      return false
    }

    const record: RejectRecord = { url: key, reason, rejectedAt: this.now().toISOString() }
    if (detail !== undefined) record.detail = detail

    this.rejects.set(key, record)
    await this.persist('rejects')
    return true
  }

  async recordImported(url: string, input: ImportedRecordInput): Promise<boolean> {
    const key = storeKey(url)
    if (this.rejects.has(key) || this.imported.has(key)) {
      return false
    }

    const record: ImportedRecord = { url: key, importedAt: this.now().toISOString(), simulated: input.simulated }
    if (input.recipeId !== undefined) record.recipeId = input.recipeId
    if (input.library !== undefined) record.library = input.library

    this.imported.set(key, record)
    await this.persist('imported')
    return true
  }

  counts(): StoreCounts {
    return { rejected: this.rejects.size, imported: this.imported.size }
  }
}

/**
 * Same semantics as the file store, nothing persisted. For tests and embedding.
 */
export class InMemoryMemoryStore extends BaseMemoryStore {
  async load(): Promise<void> {}

  async flush(): Promise<void> {}

  protected async persist(): Promise<void> {}
}

// ═══════════════════════════════════════════════════════════════════════════════
// File-backed store
// ═══════════════════════════════════════════════════════════════════════════════

const rejectRecordSchema = z.object({
  url: z.string().min(1),
  reason: z.enum(REJECT_REASONS),
  rejectedAt: z.string(),
  detail: z.string().optional(),
})

const importedRecordSchema = z.object({
  url: z.string().min(1),
  importedAt: z.string(),
  recipeId: z.string().optional(),
  simulated: z.boolean().default(false),
  library: z.string().optional(),
})

/** Current format: object keyed by URL. Older stores were a bare array of URLs. */
const storeFileSchema = z.union([z.array(z.string()), z.record(z.unknown())])

export interface JsonFileMemoryStoreOptions {
  dataDir: string
  now?: () => Date
}

export class JsonFileMemoryStore extends BaseMemoryStore {
  private readonly dataDir: string
  private writeQueue: Promise<void> = Promise.resolve()

  constructor(options: JsonFileMemoryStoreOptions) {
    super(options.now)
    this.dataDir = options.dataDir
  }

  get rejectsPath(): string {
    return join(this.dataDir, REJECTS_FILE)
  }

  get importedPath(): string {
    return join(this.dataDir, IMPORTED_FILE)
  }

  /**
   * Best-effort load: missing files start empty, corrupt files start empty with a warning
   * and are moved aside so the next write does not destroy them.
   */
  async load(): Promise<void> {
    await mkdir(this.dataDir, { recursive: true })
    this.rejects.clear()
    this.imported.clear()

    const loadedAt = this.now().toISOString()

    for (const [key, value] of await this.readMapping(this.rejectsPath)) {
      if (value === null) {
        this.rejects.set(key, { url: key, reason: 'legacy', rejectedAt: loadedAt })
        continue
      }
      const parsed = rejectRecordSchema.safeParse(value)
      if (parsed.success) {
        this.rejects.set(key, { ...parsed.data, url: key })
      } else {
        log.warn('Dropping invalid reject record', { file: this.rejectsPath, url: key })
      }
    }

    for (const [key, value] of await this.readMapping(this.importedPath)) {
      if (value === null) {
        this.imported.set(key, { url: key, importedAt: loadedAt, simulated: false })
        continue
      }
      const parsed = importedRecordSchema.safeParse(value)
      if (parsed.success) {
        this.imported.set(key, { ...parsed.data, url: key })
      } else {
        log.warn('Dropping invalid imported record', { file: this.importedPath, url: key })
      }
    }

    // Imported wins if both files claim a URL
    for (const key of this.imported.keys()) {
      this.rejects.delete(key)
    }

    log.info('Memory store loaded', { dataDir: this.dataDir, ...this.counts() })
  }

  async flush(): Promise<void> {
    await this.writeQueue
  }

  protected persist(mapping: Mapping): Promise<void> {
    const run = this.writeQueue.then(() => this.writeMapping(mapping))
    // Failures reach the caller through `run`; the queue itself keeps going
    this.writeQueue = run.catch(() => undefined)
    return run
  }

  /**
   * Entries of one store file as [canonicalKey, record]. Legacy URL-array entries map to null.
   */
  private async readMapping(file: string): Promise<Array<[string, unknown]>> {
    let raw: string
    try {
      raw = await readFile(file, 'utf8')
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return []
      }
      throw error
    }

    let data: z.infer<typeof storeFileSchema>
    try {
      data = storeFileSchema.parse(JSON.parse(raw))
    } catch (error) {
      const corruption = new StoreCorruptionError(file, `Store file ${file} is corrupt; starting empty`, error)
      const backup = `${file}.corrupt-${Date.now()}`
      await rename(file, backup)
      log.warn(corruption.message, { file, backup }, corruption)
      return []
    }

    if (Array.isArray(data)) {
      log.info('Migrating legacy store file', { file, entries: data.length })
      return data.map((url): [string, unknown] => [storeKey(url), null])
    }

    return Object.entries(data).map(([url, value]): [string, unknown] => [storeKey(url), value])
  }

  private async writeMapping(mapping: Mapping): Promise<void> {
    const file = mapping === 'rejects' ? this.rejectsPath : this.importedPath
    const records = mapping === 'rejects' ? this.rejects : this.imported

    const tmp = `${file}.${process.pid}.tmp`
    await writeFile(tmp, JSON.stringify(Object.fromEntries(records), null, 2) + '\n', 'utf8')
    await rename(tmp, file)
  }
}
