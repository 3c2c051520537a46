import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises'
import path from 'node:path'
import { randomUUID } from 'node:crypto'

/** Opaque key-value persistence for JSON-serializable records. */
export interface KeyValueStore {
  /** Resolves undefined when nothing is stored under `key`. */
  load(key: string): Promise<unknown>
  save(key: string, value: unknown): Promise<void>
  delete(key: string): Promise<void>
}

export class InMemoryKeyValueStore implements KeyValueStore {
  // Serialized so callers never share references with the store
  private readonly records = new Map<string, string>()

  async load(key: string): Promise<unknown> {
    const raw = this.records.get(key)
    return raw === undefined ? undefined : JSON.parse(raw)
  }

  async save(key: string, value: unknown) {
    this.records.set(key, JSON.stringify(value))
  }

  async delete(key: string) {
    this.records.delete(key)
  }

  get size() {
    return this.records.size
  }
}

function isMissingFile(err: unknown) {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

/** One JSON file per key; writes go to a temp file and are renamed into place. */
export class JsonFileKeyValueStore implements KeyValueStore {
  constructor(private readonly directory: string) {}

  fileFor(key: string) {
    return path.join(this.directory, `${encodeURIComponent(key)}.json`)
  }

  async load(key: string): Promise<unknown> {
    let raw: string
    try {
      raw = await readFile(this.fileFor(key), 'utf8')
    } catch (err) {
      if (isMissingFile(err)) return undefined
      throw err
    }
    return JSON.parse(raw)
  }

  async save(key: string, value: unknown) {
    await mkdir(this.directory, { recursive: true })
    const target = this.fileFor(key)
    const temp = `${target}.${randomUUID()}.tmp`
    try {
      await writeFile(temp, JSON.stringify(value, null, 2), 'utf8')
      await rename(temp, target)
    } catch (err) {
      await rm(temp, { force: true })
      throw err
    }
  }

  async delete(key: string) {
    await rm(this.fileFor(key), { force: true })
  }
}
