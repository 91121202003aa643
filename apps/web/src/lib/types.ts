import { z } from 'zod'

export const JobStatusSchema = z.enum([
  'queued',
  'generating',
  'awaiting_approval',
  'approved',
  'completed',
  'rejected',
  'failed',
])
export type JobStatus = z.infer<typeof JobStatusSchema>

const JobErrorSchema = z.object({ kind: z.string(), message: z.string() })

const BrandingSchema = z.object({
  asset_name: z.string(),
  blend_weight: z.number(),
  watermark: z.string().optional(),
})

export const CoverJobSchema = z.object({
  job_id: z.string(),
  workflow: z.enum(['automated', 'manual']),
  title: z.string(),
  subtitle: z.string().nullable(),
  client_id: z.string().nullable(),
  selected_assets: z.array(z.string()),
  custom_prompt: z.string().nullable(),
  target_size: z.object({ width: z.number(), height: z.number() }),
  status: JobStatusSchema,
  created_at: z.string(),
  updated_at: z.string(),
  result_ref: z.string().nullable(),
  error: JobErrorSchema.nullable(),
  idempotency_key: z.string().nullable(),
  decision: z.enum(['approved', 'rejected']).nullable(),
  branding: BrandingSchema.nullable(),
  fulfillment: z.enum(['none', 'stored', 'pending_persistence']),
  fulfillment_error: JobErrorSchema.nullable(),
  history: z.array(z.object({ status: JobStatusSchema, at: z.string() })),
})
export type CoverJob = z.infer<typeof CoverJobSchema>

export const SubmitResponseSchema = z.object({ job_id: z.string(), created: z.boolean() })
export type SubmitResponse = z.infer<typeof SubmitResponseSchema>

export const JobResponseSchema = z.object({ job: CoverJobSchema })
export type JobResponse = z.infer<typeof JobResponseSchema>

export const JobsResponseSchema = z.object({ jobs: z.array(CoverJobSchema) })
export type JobsResponse = z.infer<typeof JobsResponseSchema>

export const AssetsResponseSchema = z.object({
  assets: z.array(BrandingSchema.extend({ aliases: z.array(z.string()) })),
})
export type AssetsResponse = z.infer<typeof AssetsResponseSchema>
export type AssetListing = AssetsResponse['assets'][number]

export const CoverImageSchema = z.object({
  job_id: z.string(),
  result_ref: z.string(),
  title: z.string(),
  subtitle: z.string().nullable(),
  client_id: z.string().nullable(),
  width: z.number(),
  height: z.number(),
  created_at: z.string(),
})
export type CoverImage = z.infer<typeof CoverImageSchema>

export const CoverImagesResponseSchema = z.object({ images: z.array(CoverImageSchema) })
export type CoverImagesResponse = z.infer<typeof CoverImagesResponseSchema>

export type CoverSubmitAutomatedRequest = {
  title: string
  subtitle?: string
  client_id?: string
  size?: string
  idempotency_key?: string
}

export type CoverSubmitManualRequest = {
  title: string
  subtitle?: string
  selected_assets?: string[]
  custom_prompt?: string
  size?: string
  idempotency_key?: string
  seed?: number
  watermark_base64?: string
  text_style?: {
    title_color?: string
    subtitle_color?: string
  }
}

export const TERMINAL: readonly JobStatus[] = ['completed', 'rejected', 'failed']
