import path from 'node:path'
import { fileURLToPath } from 'node:url'

export type InferenceEngineKind = 'mock' | 'openai'
export type StorageKind = 'memory' | 'supabase'
export type ClientAssetsSource = 'file' | 'supabase'

export type CoverConfig = {
  port: number
  maxWidth: number
  maxHeight: number
  inferenceTimeoutMs: number
  idempotencyWindowMs: number
  engine: InferenceEngineKind
  storage: StorageKind
  clientAssetsSource: ClientAssetsSource
  clientAssetsPath: string
  watermarkDir: string
  defaultWatermark: string | null
  bucket: string
}

type Env = Record<string, string | undefined>

const REPO_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../..')

export function requireEnv(name: string, env: Env = process.env): string {
  const v = env[name]?.trim()
  if (!v) throw new Error(`Missing required env: ${name}`)
  return v
}

function clampedNumber(env: Env, name: string, fallback: number, min: number, max: number): number {
  return Math.max(min, Math.min(Number(env[name] ?? String(fallback)) || fallback, max))
}

function oneOf<T extends string>(env: Env, name: string, allowed: readonly T[], fallback: T): T {
  const raw = env[name]?.trim().toLowerCase()
  return allowed.find((a) => a === raw) ?? fallback
}

export function loadConfig(env: Env = process.env): CoverConfig {
  const watermark = env.COVER_DEFAULT_WATERMARK?.trim()
  return {
    port: clampedNumber(env, 'PORT', 8787, 1, 65535),
    maxWidth: clampedNumber(env, 'COVER_MAX_WIDTH', 4096, 64, 8192),
    maxHeight: clampedNumber(env, 'COVER_MAX_HEIGHT', 4096, 64, 8192),
    // default 2 minutes
    inferenceTimeoutMs: clampedNumber(env, 'COVER_INFERENCE_TIMEOUT_MS', 120_000, 1_000, 600_000),
    idempotencyWindowMs: clampedNumber(env, 'COVER_IDEMPOTENCY_WINDOW_MS', 86_400_000, 1_000, 7 * 86_400_000),
    engine: oneOf(env, 'COVER_ENGINE', ['mock', 'openai'] as const, 'mock'),
    storage: oneOf(env, 'COVER_STORAGE', ['memory', 'supabase'] as const, 'memory'),
    clientAssetsSource: oneOf(env, 'COVER_CLIENT_ASSETS_SOURCE', ['file', 'supabase'] as const, 'file'),
    clientAssetsPath: env.COVER_CLIENT_ASSETS_PATH?.trim() || path.join(REPO_ROOT, 'config', 'client-assets.json'),
    watermarkDir: env.COVER_WATERMARK_DIR?.trim() || path.join(REPO_ROOT, 'assets', 'watermarks'),
    defaultWatermark: watermark === undefined ? 'default.svg' : watermark || null,
    bucket: env.COVER_BUCKET?.trim() || 'cover-images',
  }
}
