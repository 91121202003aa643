import { readFile } from 'node:fs/promises'
import path from 'node:path'
import type { BrandingDescriptor } from './types'

export type WatermarkSource = {
  /** Overlay bytes for a branding (or the default overlay when unbranded), or null for none. */
  load: (branding: BrandingDescriptor | null) => Promise<Buffer | null>
}

function isMissingFile(e: unknown): boolean {
  return e instanceof Error && 'code' in e && e.code === 'ENOENT'
}

export class FileWatermarkSource implements WatermarkSource {
  private readonly dir: string
  private readonly defaultName: string | null
  private readonly cache = new Map<string, Buffer | null>()

  constructor(dir: string, defaultName: string | null) {
    this.dir = dir
    this.defaultName = defaultName
  }

  async load(branding: BrandingDescriptor | null): Promise<Buffer | null> {
    const name = branding?.watermark ?? this.defaultName
    if (!name) return null
    const cached = this.cache.get(name)
    if (cached !== undefined) return cached

    // names come from the asset table; keep them inside the watermark dir
    const file = path.join(this.dir, path.basename(name))
    let bytes: Buffer | null
    try {
      bytes = await readFile(file)
    } catch (e) {
      if (!isMissingFile(e)) throw e
      bytes = null
    }
    this.cache.set(name, bytes)
    return bytes
  }
}

export class MemoryWatermarkSource implements WatermarkSource {
  private readonly files: ReadonlyMap<string, Buffer>
  private readonly defaultName: string | null

  constructor(files: Record<string, Buffer>, defaultName: string | null = null) {
    this.files = new Map(Object.entries(files))
    this.defaultName = defaultName
  }

  async load(branding: BrandingDescriptor | null): Promise<Buffer | null> {
    const name = branding?.watermark ?? this.defaultName
    if (!name) return null
    return this.files.get(name) ?? null
  }
}
