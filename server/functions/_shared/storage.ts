import { createClient, type SupabaseClient } from '@supabase/supabase-js'
import { z } from 'zod'
import { clientAssetTableFromRows, type ClientAssetTable } from './clientAssets'
import { requireEnv } from './config'
import { StorageFailure, errorMessage } from './errors'
import { silentLogger, type Logger } from './logger'
import type { ImageSize } from './types'

export type StoreRequest = {
  job_id: string
  final_image_bytes: Buffer
  title: string
  subtitle: string | null
  client_id: string | null
  image_size: ImageSize
  generation_params: Record<string, unknown>
}

export type CoverListQuery = {
  limit: number
  offset: number
  client_id: string | null
}

/** A stored cover as listed back, newest first. */
export type CoverRecord = {
  job_id: string
  result_ref: string
  title: string
  subtitle: string | null
  client_id: string | null
  width: number
  height: number
  created_at: string
}

export type CoverStorage = {
  name: string
  /** Persists the final image and returns its durable reference. Fails with `StorageFailure`. */
  store: (req: StoreRequest) => Promise<string>
  list: (query: CoverListQuery) => Promise<CoverRecord[]>
}

export function coverObjectPath(jobId: string): string {
  return `covers/cover_${jobId.replace(/[^a-zA-Z0-9._-]+/g, '-')}.png`
}

type Env = Record<string, string | undefined>

export function getSupabaseServiceClient(env: Env = process.env): SupabaseClient {
  const url = requireEnv('SUPABASE_URL', env)
  const serviceRoleKey = requireEnv('SUPABASE_SERVICE_ROLE_KEY', env)
  return createClient(url, serviceRoleKey, {
    db: { schema: 'public' },
    auth: { persistSession: false },
  })
}

const ClientLogoRowSchema = z.object({
  client_id: z.string(),
  logo_name: z.string(),
  blend_weight: z.number().nullable().optional(),
  watermark: z.string().nullable().optional(),
})

const GeneratedImageRowSchema = z.object({
  job_id: z.string(),
  title: z.string(),
  subtitle: z.string().nullable(),
  client_id: z.string().nullable(),
  image_url: z.string(),
  width: z.number(),
  height: z.number(),
  created_at: z.string(),
})

export class SupabaseCoverStorage implements CoverStorage {
  readonly name = 'supabase'
  private readonly supabase: SupabaseClient
  private readonly bucket: string
  private readonly log: Logger

  constructor(supabase: SupabaseClient, bucket: string, log: Logger = silentLogger) {
    this.supabase = supabase
    this.bucket = bucket
    this.log = log
  }

  async store(req: StoreRequest): Promise<string> {
    const path = coverObjectPath(req.job_id)
    const up = await this.supabase.storage
      .from(this.bucket)
      .upload(path, req.final_image_bytes, { contentType: 'image/png', upsert: true })
      .catch((e: unknown) => {
        throw new StorageFailure(`Upload of ${path} failed: ${errorMessage(e)}`)
      })
    if (up.error) throw new StorageFailure(`Upload of ${path} failed: ${up.error.message}`)

    const publicUrl = this.supabase.storage.from(this.bucket).getPublicUrl(path).data.publicUrl

    const ins = await this.supabase.from('generated_images').insert({
      job_id: req.job_id,
      title: req.title,
      subtitle: req.subtitle,
      client_id: req.client_id,
      image_url: publicUrl,
      storage_path: path,
      width: req.image_size.width,
      height: req.image_size.height,
      generation_params: req.generation_params,
    })
    if (ins.error) {
      // best-effort: the image itself is stored
      this.log('warn', 'generated_images insert failed (ignored)', { job_id: req.job_id, error: ins.error.message })
    }
    return publicUrl
  }

  async list(query: CoverListQuery): Promise<CoverRecord[]> {
    let q = this.supabase
      .from('generated_images')
      .select('job_id, title, subtitle, client_id, image_url, width, height, created_at')
    if (query.client_id) q = q.eq('client_id', query.client_id)
    const res = await q.order('created_at', { ascending: false }).range(query.offset, query.offset + query.limit - 1)
    if (res.error) throw new StorageFailure(`generated_images query failed: ${res.error.message}`)

    const rows = z.array(GeneratedImageRowSchema).safeParse(res.data ?? [])
    if (!rows.success) throw new StorageFailure(`generated_images rows unreadable: ${rows.error.message}`)
    return rows.data.map(({ image_url, ...row }) => ({ ...row, result_ref: image_url }))
  }

  async fetchClientAssetTable(): Promise<ClientAssetTable> {
    const res = await this.supabase.from('client_logos').select('client_id, logo_name, blend_weight, watermark')
    if (res.error) throw new Error(`client_logos query failed: ${res.error.message}`)
    const rows = z.array(ClientLogoRowSchema).parse(res.data ?? [])
    return clientAssetTableFromRows(rows)
  }
}

export type StoredCover = StoreRequest & {
  result_ref: string
  created_at: string
}

/** Keeps covers in process memory; used by default and in tests. */
export class MemoryCoverStorage implements CoverStorage {
  readonly name = 'memory'
  private readonly objects = new Map<string, StoredCover>()
  private readonly now: () => Date

  constructor(options: { now?: () => Date } = {}) {
    this.now = options.now ?? (() => new Date())
  }

  async store(req: StoreRequest): Promise<string> {
    const resultRef = `memory://${coverObjectPath(req.job_id)}`
    // re-storing a job moves it to the newest position
    this.objects.delete(resultRef)
    this.objects.set(resultRef, { ...req, result_ref: resultRef, created_at: this.now().toISOString() })
    return resultRef
  }

  async list(query: CoverListQuery): Promise<CoverRecord[]> {
    return Array.from(this.objects.values())
      .reverse()
      .filter((c) => !query.client_id || c.client_id === query.client_id)
      .slice(query.offset, query.offset + query.limit)
      .map((c) => ({
        job_id: c.job_id,
        result_ref: c.result_ref,
        title: c.title,
        subtitle: c.subtitle,
        client_id: c.client_id,
        width: c.image_size.width,
        height: c.image_size.height,
        created_at: c.created_at,
      }))
  }

  get(resultRef: string): StoredCover | null {
    return this.objects.get(resultRef) ?? null
  }

  get size(): number {
    return this.objects.size
  }
}
