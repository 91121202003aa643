import sharp from 'sharp'
import { z } from 'zod'
import { requireEnv } from './config'
import { InferenceFailure, errorMessage } from './errors'
import type { BrandingDescriptor, ImageSize } from './types'

export type InferenceRequest = {
  prompt: string
  negative_prompt?: string
  branding: BrandingDescriptor | null
  size_hint: ImageSize
  seed?: number | null
}

export type InferenceEngine = {
  name: string
  generate: (req: InferenceRequest) => Promise<Buffer>
}

export const MOCK_CANVAS_SIZE: ImageSize = { width: 1792, height: 896 }

function hash32(s: string): number {
  let h = 0x811c9dc5
  for (let i = 0; i < s.length; i++) {
    h ^= s.charCodeAt(i)
    h = Math.imul(h, 0x01000193)
  }
  return h >>> 0
}

export type MockEngineOptions = {
  delayMs?: number
}

/** Deterministic gradient canvas; same request, same bytes. */
export class MockInferenceEngine implements InferenceEngine {
  readonly name = 'mock'
  private readonly delayMs: number

  constructor(options: MockEngineOptions = {}) {
    this.delayMs = options.delayMs ?? 0
  }

  async generate(req: InferenceRequest): Promise<Buffer> {
    if (this.delayMs > 0) await new Promise((r) => setTimeout(r, this.delayMs))
    const key = [req.prompt, req.branding?.asset_name ?? '', req.branding?.blend_weight ?? '', req.seed ?? ''].join('|')
    const h = hash32(key)
    const hueA = h % 360
    const hueB = (hueA + 40 + ((h >>> 9) % 80)) % 360
    const { width, height } = MOCK_CANVAS_SIZE
    const svg =
      `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}">` +
      `<defs><linearGradient id="g" x1="0" y1="0" x2="1" y2="1">` +
      `<stop offset="0" stop-color="hsl(${hueA}, 55%, 18%)"/>` +
      `<stop offset="1" stop-color="hsl(${hueB}, 65%, 38%)"/>` +
      `</linearGradient></defs>` +
      `<rect width="100%" height="100%" fill="url(#g)"/>` +
      `<circle cx="${Math.round(width * 0.72)}" cy="${Math.round(height * 0.35)}" r="${Math.round(height * 0.28)}" fill="hsl(${hueB}, 80%, 60%)" fill-opacity="0.18"/>` +
      `</svg>`
    try {
      return await sharp(Buffer.from(svg)).png().toBuffer()
    } catch (e) {
      throw new InferenceFailure(`Mock canvas render failed: ${errorMessage(e)}`)
    }
  }
}

async function fetchWithTimeout(
  input: string,
  init: RequestInit,
  timeoutMs: number,
  fetchImpl: typeof fetch = fetch,
): Promise<Response> {
  const controller = new AbortController()
  const t = setTimeout(() => controller.abort(), timeoutMs)
  try {
    return await fetchImpl(input, { ...init, signal: controller.signal })
  } finally {
    clearTimeout(t)
  }
}

const ImagesResponseSchema = z.object({
  data: z
    .array(
      z.object({
        b64_json: z.string().optional(),
        url: z.string().optional(),
      }),
    )
    .min(1),
})

type Env = Record<string, string | undefined>

export type OpenAIEngineOptions = {
  apiKey: string
  model: string
  size: string
  requestTimeoutMs: number
  fetchImpl?: typeof fetch
}

export function openAIEngineOptionsFromEnv(env: Env = process.env): OpenAIEngineOptions {
  return {
    apiKey: requireEnv('OPENAI_API_KEY', env),
    model: env.OPENAI_IMAGE_MODEL?.trim() || 'gpt-image-1-mini',
    size: env.OPENAI_IMAGE_SIZE?.trim() || '1536x1024',
    requestTimeoutMs: Math.max(1000, Math.min(Number(env.OPENAI_IMAGE_TIMEOUT_MS ?? '120000') || 120000, 600000)),
  }
}

/**
 * OpenAI Images API. A single attempt per call: retrying is left to the
 * caller resubmitting the job.
 */
export class OpenAIImageEngine implements InferenceEngine {
  readonly name = 'openai'
  private readonly options: OpenAIEngineOptions

  constructor(options: OpenAIEngineOptions) {
    this.options = options
  }

  private fetch(input: string, init: RequestInit): Promise<Response> {
    return fetchWithTimeout(input, init, this.options.requestTimeoutMs, this.options.fetchImpl)
  }

  async generate(req: InferenceRequest): Promise<Buffer> {
    const { apiKey, model, size, requestTimeoutMs } = this.options
    const prompt = req.negative_prompt ? `${req.prompt}. Avoid: ${req.negative_prompt}` : req.prompt

    let res: Response
    let text: string
    try {
      res = await this.fetch('https://api.openai.com/v1/images/generations', {
        method: 'POST',
        headers: { authorization: `Bearer ${apiKey}`, 'content-type': 'application/json' },
        body: JSON.stringify({ model, prompt, size }),
      })
      text = await res.text()
    } catch (e) {
      const msg = e instanceof Error && e.name === 'AbortError' ? `timeout after ${requestTimeoutMs}ms` : errorMessage(e)
      throw new InferenceFailure(`OpenAI image request failed: ${msg}`)
    }
    if (!res.ok) throw new InferenceFailure(`OpenAI image error (${res.status}, size=${size}): ${text.slice(0, 500)}`)

    let body: z.infer<typeof ImagesResponseSchema>
    try {
      body = ImagesResponseSchema.parse(JSON.parse(text))
    } catch (e) {
      throw new InferenceFailure(`OpenAI image response unreadable: ${errorMessage(e)}`)
    }

    const first = body.data[0]
    if (first.b64_json) return Buffer.from(first.b64_json, 'base64')
    if (first.url) return this.download(first.url)
    throw new InferenceFailure('OpenAI image returned neither b64_json nor url')
  }

  private async download(url: string): Promise<Buffer> {
    let imgRes: Response
    try {
      imgRes = await this.fetch(url, { method: 'GET' })
    } catch (e) {
      throw new InferenceFailure(`Failed to fetch image URL: ${errorMessage(e)}`)
    }
    if (!imgRes.ok) throw new InferenceFailure(`Failed to fetch image URL (${imgRes.status})`)
    return Buffer.from(await imgRes.arrayBuffer())
  }
}
