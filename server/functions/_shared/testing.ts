import sharp from 'sharp'
import { ClientAssetResolver } from './clientAssets'
import type { InferenceEngine, InferenceRequest } from './inference'
import { JobStore } from './jobStore'
import { silentLogger, type Logger } from './logger'
import { JobOrchestrator } from './orchestrator'
import { MemoryCoverStorage, type CoverStorage } from './storage'
import { MemoryWatermarkSource, type WatermarkSource } from './watermarks'

export type Rgb = { r: number; g: number; b: number }

export const CANVAS_COLOR: Rgb = { r: 20, g: 40, b: 80 }

export function solidPng(width: number, height: number, color: Rgb = CANVAS_COLOR): Promise<Buffer> {
  return sharp({ create: { width, height, channels: 3, background: color } }).png().toBuffer()
}

/** Full-canvas white overlay at half opacity. */
export function halfWhiteOverlay(width = 200, height = 100): Promise<Buffer> {
  return sharp({ create: { width, height, channels: 4, background: { r: 255, g: 255, b: 255, alpha: 0.5 } } })
    .png()
    .toBuffer()
}

export async function pixelAt(image: Buffer, x: number, y: number): Promise<Rgb> {
  const { data, info } = await sharp(image).raw().toBuffer({ resolveWithObject: true })
  const i = (y * info.width + x) * info.channels
  return { r: data[i], g: data[i + 1], b: data[i + 2] }
}

export function testAssets(): ClientAssetResolver {
  return ClientAssetResolver.fromTable({
    assets: [
      { asset_name: 'bitcoin_logo_lora', aliases: ['bitcoin', 'btc'], watermark: 'bitcoin.svg' },
      { asset_name: 'xdc_network_lora', aliases: ['xdc', 'xdc_network'], blend_weight: 0.7 },
    ],
  })
}

export type FakeEngine = InferenceEngine & {
  calls: InferenceRequest[]
  maxActive: number
}

/** Records every request; `impl` defaults to a solid 1792x896 canvas. */
export function fakeEngine(impl?: (req: InferenceRequest) => Promise<Buffer>): FakeEngine {
  let active = 0
  const engine: FakeEngine = {
    name: 'fake',
    calls: [],
    maxActive: 0,
    async generate(req) {
      engine.calls.push(req)
      active++
      engine.maxActive = Math.max(engine.maxActive, active)
      try {
        return impl ? await impl(req) : await solidPng(1792, 896)
      } finally {
        active--
      }
    },
  }
  return engine
}

export function sequentialIds(prefix = 'job'): () => string {
  let n = 0
  return () => `${prefix}-${++n}`
}

export type TestRig = {
  orchestrator: JobOrchestrator
  store: JobStore
  storage: MemoryCoverStorage
  engine: FakeEngine
}

export type RigOptions = {
  engine?: FakeEngine
  storage?: CoverStorage
  watermarks?: WatermarkSource
  inferenceTimeoutMs?: number
  log?: Logger
}

export async function createRig(options: RigOptions = {}): Promise<TestRig> {
  const store = new JobStore({ newId: sequentialIds() })
  const storage = new MemoryCoverStorage()
  const engine = options.engine ?? fakeEngine()
  const watermarks = options.watermarks ?? new MemoryWatermarkSource({ 'bitcoin.svg': await halfWhiteOverlay() })
  const orchestrator = new JobOrchestrator({
    store,
    assets: testAssets(),
    engine,
    storage: options.storage ?? storage,
    watermarks,
    limits: { maxWidth: 4096, maxHeight: 4096 },
    inferenceTimeoutMs: options.inferenceTimeoutMs ?? 5_000,
    log: options.log ?? silentLogger,
  })
  return { orchestrator, store, storage, engine }
}
