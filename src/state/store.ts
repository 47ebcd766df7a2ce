import { mkdir, readFile, writeFile } from 'fs/promises'
import path from 'path'
import { isUint32 } from '../utils/validation.js'

export type StateKey = 'last_page' | 'last_sent_id'

// Unsigned 32-bit counters by key. null means the counter was never written.
export interface StateStore {
  get(key: StateKey): Promise<number | null>
  set(key: StateKey, value: number): Promise<void>
}

const RECORD_BYTES = 4

function assertUint32(key: StateKey, value: number): void {
  if (!isUint32(value)) {
    throw new RangeError(`${key} must be an unsigned 32-bit integer, got ${value}`)
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

// One file per key, each a 4-byte little-endian u32.
export class FileStateStore implements StateStore {
  constructor(private readonly directory: string) {}

  pathFor(key: StateKey): string {
    return path.join(this.directory, key)
  }

  async get(key: StateKey): Promise<number | null> {
    let data: Buffer
    try {
      data = await readFile(this.pathFor(key))
    } catch (error) {
      if (isNotFound(error)) return null
      throw error
    }

    // A truncated record reads as unset
    if (data.length < RECORD_BYTES) return null
    return data.readUInt32LE(0)
  }

  async set(key: StateKey, value: number): Promise<void> {
    assertUint32(key, value)
    const data = Buffer.alloc(RECORD_BYTES)
    data.writeUInt32LE(value, 0)
    await mkdir(this.directory, { recursive: true })
    await writeFile(this.pathFor(key), data)
  }
}

export class MemoryStateStore implements StateStore {
  private readonly values: Map<StateKey, number>

  constructor(initial: Partial<Record<StateKey, number>> = {}) {
    this.values = new Map()
    if (initial.last_page !== undefined) this.values.set('last_page', initial.last_page)
    if (initial.last_sent_id !== undefined) this.values.set('last_sent_id', initial.last_sent_id)
  }

  async get(key: StateKey): Promise<number | null> {
    return this.values.get(key) ?? null
  }

  async set(key: StateKey, value: number): Promise<void> {
    assertUint32(key, value)
    this.values.set(key, value)
  }
}
