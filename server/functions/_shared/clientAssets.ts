import { readFile } from 'node:fs/promises'
import { z } from 'zod'
import type { BrandingDescriptor } from './types'

export const DEFAULT_BLEND_WEIGHT = 0.8

const AssetEntrySchema = z.object({
  asset_name: z.string().trim().min(1),
  blend_weight: z.number().min(0).max(1).optional(),
  watermark: z.string().trim().min(1).optional(),
  aliases: z.array(z.string().trim().min(1)).default([]),
})

export const ClientAssetTableSchema = z.object({
  default_blend_weight: z.number().min(0).max(1).default(DEFAULT_BLEND_WEIGHT),
  assets: z.array(AssetEntrySchema),
})

export type ClientAssetTable = z.input<typeof ClientAssetTableSchema>

export type ClientAssetListing = BrandingDescriptor & {
  aliases: string[]
}

/** Row shape of the storage backend's `client_logos` table. */
export type ClientLogoRow = {
  client_id: string
  logo_name: string
  blend_weight?: number | null
  watermark?: string | null
}

function normalizeKey(key: string): string {
  return key.trim().toLowerCase()
}

/**
 * Read-only client -> branding lookup. Built once from a table and never
 * mutated; every alias of an asset resolves to the same frozen descriptor.
 */
export class ClientAssetResolver {
  private readonly byAlias: ReadonlyMap<string, BrandingDescriptor>
  private readonly byAsset: ReadonlyMap<string, BrandingDescriptor>
  private readonly listing: readonly ClientAssetListing[]

  private constructor(
    byAlias: Map<string, BrandingDescriptor>,
    byAsset: Map<string, BrandingDescriptor>,
    listing: ClientAssetListing[],
  ) {
    this.byAlias = byAlias
    this.byAsset = byAsset
    this.listing = Object.freeze(listing)
  }

  static fromTable(raw: unknown): ClientAssetResolver {
    const table = ClientAssetTableSchema.parse(raw)
    const byAlias = new Map<string, BrandingDescriptor>()
    const byAsset = new Map<string, BrandingDescriptor>()
    const listing: ClientAssetListing[] = []

    for (const entry of table.assets) {
      const assetKey = normalizeKey(entry.asset_name)
      if (byAsset.has(assetKey)) throw new Error(`Duplicate branding asset: ${entry.asset_name}`)

      const descriptor: BrandingDescriptor = Object.freeze({
        asset_name: entry.asset_name,
        blend_weight: entry.blend_weight ?? table.default_blend_weight,
        ...(entry.watermark ? { watermark: entry.watermark } : {}),
      })
      byAsset.set(assetKey, descriptor)

      const aliases = Array.from(new Set(entry.aliases.map(normalizeKey)))
      for (const alias of aliases) {
        const existing = byAlias.get(alias)
        if (existing && existing !== descriptor) {
          throw new Error(`Client alias "${alias}" maps to both ${existing.asset_name} and ${descriptor.asset_name}`)
        }
        byAlias.set(alias, descriptor)
      }
      listing.push(Object.freeze({ ...descriptor, aliases }))
    }

    return new ClientAssetResolver(byAlias, byAsset, listing)
  }

  static empty(): ClientAssetResolver {
    return ClientAssetResolver.fromTable({ assets: [] })
  }

  /** A miss (including no client id at all) means unbranded generation. */
  resolve(clientId?: string | null): BrandingDescriptor | null {
    if (!clientId?.trim()) return null
    return this.byAlias.get(normalizeKey(clientId)) ?? null
  }

  /** Manual selections may name an asset directly or use a client alias. */
  resolveAsset(name: string): BrandingDescriptor | null {
    if (!name.trim()) return null
    return this.byAsset.get(normalizeKey(name)) ?? this.resolve(name)
  }

  list(): readonly ClientAssetListing[] {
    return this.listing
  }
}

export async function loadClientAssetTableFile(filePath: string): Promise<unknown> {
  const raw = await readFile(filePath, 'utf8')
  try {
    return JSON.parse(raw)
  } catch (e) {
    throw new Error(`Client asset table ${filePath} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`)
  }
}

export function clientAssetTableFromRows(rows: ClientLogoRow[]): ClientAssetTable {
  const grouped = new Map<string, { blend_weight?: number; watermark?: string; aliases: string[] }>()
  for (const row of rows) {
    const entry = grouped.get(row.logo_name) ?? { aliases: [] }
    entry.aliases.push(row.client_id)
    if (typeof row.blend_weight === 'number') entry.blend_weight = row.blend_weight
    if (row.watermark) entry.watermark = row.watermark
    grouped.set(row.logo_name, entry)
  }
  return {
    assets: Array.from(grouped, ([asset_name, entry]) => ({ asset_name, ...entry })),
  }
}
