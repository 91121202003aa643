import { z } from 'zod'
import { stripXmlInvalid } from './compositor'
import { ValidationError } from './errors'
import type { CoverListQuery } from './storage'
import type { ImageSize, TextStyle } from './types'

export const DEFAULT_SIZE: ImageSize = { width: 1800, height: 900 }
export const MAX_TITLE_LENGTH = 200
const MAX_WATERMARK_BYTES = 8 * 1024 * 1024

export type SizeLimits = {
  maxWidth: number
  maxHeight: number
}

export function parseSizeString(raw: string): ImageSize | null {
  const m = /^\s*(\d+)\s*[xX×]\s*(\d+)\s*$/.exec(raw)
  if (!m) return null
  return { width: Number(m[1]), height: Number(m[2]) }
}

// control characters never reach the rendered text layer
const renderableText = z.string().transform(stripXmlInvalid)

const optionalText = renderableText
  .pipe(z.string().trim())
  .nullish()
  .transform((v) => (v ? v : null))

const colorSchema = z.string().regex(/^#(?:[0-9a-fA-F]{3}|[0-9a-fA-F]{6}|[0-9a-fA-F]{8})$/, 'expected a #rgb or #rrggbb colour')

const TextStyleSchema = z
  .object({
    font_family: z.string().trim().min(1).max(200),
    title_color: colorSchema,
    subtitle_color: colorSchema,
    shadow_color: colorSchema,
    shadow_opacity: z.number().min(0).max(1),
    shadow_offset: z.number().int().min(0).max(64),
    shadow_blur: z.number().min(0).max(64),
  })
  .partial()
  .strict()

function sizeSchema(limits: SizeLimits) {
  return z
    .union([
      z.string(),
      z.object({ width: z.number(), height: z.number() }),
    ])
    .optional()
    .transform((v, ctx): ImageSize => {
      if (v === undefined) return { ...DEFAULT_SIZE }
      const size = typeof v === 'string' ? parseSizeString(v) : v
      if (!size) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'expected WIDTHxHEIGHT' })
        return z.NEVER
      }
      if (!Number.isInteger(size.width) || !Number.isInteger(size.height) || size.width <= 0 || size.height <= 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'width and height must be positive integers' })
        return z.NEVER
      }
      if (size.width > limits.maxWidth || size.height > limits.maxHeight) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `must be at most ${limits.maxWidth}x${limits.maxHeight}`,
        })
        return z.NEVER
      }
      return { width: size.width, height: size.height }
    })
}

function baseShape(limits: SizeLimits) {
  return {
    title: renderableText.pipe(z.string().trim().min(1, 'title is required').max(MAX_TITLE_LENGTH)),
    subtitle: optionalText,
    size: sizeSchema(limits),
    idempotency_key: z
      .string()
      .trim()
      .max(200)
      .nullish()
      .transform((v) => (v ? v : null)),
  }
}

const watermarkSchema = z
  .string()
  .nullish()
  .transform((v, ctx): Buffer | null => {
    if (!v) return null
    const b64 = v.replace(/^data:[^;,]+;base64,/, '').replace(/\s+/g, '')
    if (!/^[A-Za-z0-9+/]+={0,2}$/.test(b64)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'expected base64 image data' })
      return z.NEVER
    }
    const bytes = Buffer.from(b64, 'base64')
    if (bytes.length === 0 || bytes.length > MAX_WATERMARK_BYTES) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `must decode to 1..${MAX_WATERMARK_BYTES} bytes` })
      return z.NEVER
    }
    return bytes
  })

export function automatedSubmissionSchema(limits: SizeLimits) {
  return z.object({
    ...baseShape(limits),
    client_id: optionalText,
  })
}

export function manualSubmissionSchema(limits: SizeLimits) {
  return z.object({
    ...baseShape(limits),
    selected_assets: z.array(z.string().trim().min(1)).max(20).default([]),
    custom_prompt: z
      .string()
      .trim()
      .max(2000)
      .nullish()
      .transform((v) => (v ? v : null)),
    text_style: TextStyleSchema.nullish().transform((v): Partial<TextStyle> => v ?? {}),
    watermark_base64: watermarkSchema,
    seed: z.number().int().min(0).max(4_294_967_295).nullish().transform((v) => v ?? null),
  })
}

export type AutomatedSubmission = z.output<ReturnType<typeof automatedSubmissionSchema>>
export type ManualSubmission = z.output<ReturnType<typeof manualSubmissionSchema>>

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
}

function parseWith<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const r = schema.safeParse(input)
  if (!r.success) throw new ValidationError(formatIssues(r.error))
  return r.data
}

export function parseAutomatedSubmission(input: unknown, limits: SizeLimits): AutomatedSubmission {
  return parseWith(automatedSubmissionSchema(limits), input)
}

export function parseManualSubmission(input: unknown, limits: SizeLimits): ManualSubmission {
  return parseWith(manualSubmissionSchema(limits), input)
}

export const MAX_COVER_LIST_LIMIT = 100

const CoverListQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(MAX_COVER_LIST_LIMIT).default(50),
  offset: z.coerce.number().int().min(0).default(0),
  client_id: optionalText,
})

/** `?limit=&offset=&client_id=` of the stored cover listing. */
export function parseCoverListQuery(params: URLSearchParams): CoverListQuery {
  return parseWith(CoverListQuerySchema, Object.fromEntries(params))
}
