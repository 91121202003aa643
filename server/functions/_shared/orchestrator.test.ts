import sharp from 'sharp'
import { describe, expect, it } from 'vitest'
import { AlreadyDecidedError, InferenceFailure, InvalidTransitionError, NotFoundError, ValidationError } from './errors'
import type { CoverStorage } from './storage'
import { CANVAS_COLOR, createRig, fakeEngine, halfWhiteOverlay, pixelAt } from './testing'

const statuses = (history: { status: string }[]) => history.map((h) => h.status)

describe('JobOrchestrator automated workflow', () => {
  it('completes a branded job at the exact size with the watermark applied', async () => {
    const { orchestrator, storage, engine } = await createRig()
    const { job_id, created } = orchestrator.submitAutomated({
      title: 'Bitcoin Hits 100k',
      client_id: 'bitcoin',
      size: '1800x900',
    })
    expect(created).toBe(true)

    const job = await orchestrator.whenProcessed(job_id)
    expect(job.status).toBe('completed')
    expect(statuses(job.history)).toEqual(['queued', 'generating', 'completed'])
    expect(job.result_ref).toBe('memory://covers/cover_job-1.png')
    expect(job.fulfillment).toBe('stored')
    expect(job.error).toBeNull()
    expect(job.branding).toEqual({ asset_name: 'bitcoin_logo_lora', blend_weight: 0.8, watermark: 'bitcoin.svg' })

    const stored = storage.get('memory://covers/cover_job-1.png')
    expect(stored?.title).toBe('Bitcoin Hits 100k')
    expect(stored?.image_size).toEqual({ width: 1800, height: 900 })
    expect(stored?.generation_params.watermark).toBe('bitcoin.svg')
    const image = stored?.final_image_bytes ?? Buffer.alloc(0)
    const meta = await sharp(image).metadata()
    expect({ width: meta.width, height: meta.height }).toEqual({ width: 1800, height: 900 })
    const corner = await pixelAt(image, 10, 10)
    expect(corner.r).toBeGreaterThan(CANVAS_COLOR.r + 100)

    expect(engine.calls).toHaveLength(1)
    expect(engine.calls[0].branding?.asset_name).toBe('bitcoin_logo_lora')
    expect(engine.calls[0].prompt).toContain('bitcoin orange theme')
    expect(engine.calls[0].size_hint).toEqual({ width: 1800, height: 900 })
  })

  it('completes unbranded for an unknown client', async () => {
    const { orchestrator, storage } = await createRig()
    const { job_id } = orchestrator.submitAutomated({ title: 'Weekly recap', client_id: 'unknown-co' })

    const job = await orchestrator.whenProcessed(job_id)
    expect(job.status).toBe('completed')
    expect(job.branding).toBeNull()
    expect(job.error).toBeNull()
    const image = storage.get(job.result_ref ?? '')?.final_image_bytes ?? Buffer.alloc(0)
    const corner = await pixelAt(image, 10, 10)
    expect(Math.abs(corner.r - CANVAS_COLOR.r)).toBeLessThanOrEqual(1)
    expect(Math.abs(corner.b - CANVAS_COLOR.b)).toBeLessThanOrEqual(1)
  })

  it('fails with InferenceTimeout when the engine misses its deadline', async () => {
    const engine = fakeEngine(() => new Promise<Buffer>(() => {}))
    const { orchestrator, storage } = await createRig({ engine, inferenceTimeoutMs: 30 })
    const { job_id } = orchestrator.submitAutomated({ title: 'Slow one' })

    const job = await orchestrator.whenProcessed(job_id)
    expect(job.status).toBe('failed')
    expect(job.error).toEqual({ kind: 'InferenceTimeout', message: 'Inference exceeded deadline of 30ms' })
    expect(job.result_ref).toBeNull()
    expect(statuses(job.history)).toEqual(['queued', 'generating', 'failed'])
    expect(storage.size).toBe(0)
  })

  it('records an inference failure on the job', async () => {
    const engine = fakeEngine(async () => {
      throw new InferenceFailure('model unavailable')
    })
    const { orchestrator } = await createRig({ engine })
    const job = await orchestrator.whenProcessed(orchestrator.submitAutomated({ title: 'x' }).job_id)
    expect(job.status).toBe('failed')
    expect(job.error).toEqual({ kind: 'InferenceFailure', message: 'model unavailable' })
  })

  it('records a composition failure on the job', async () => {
    const engine = fakeEngine(async () => Buffer.from('not an image'))
    const { orchestrator } = await createRig({ engine })
    const job = await orchestrator.whenProcessed(orchestrator.submitAutomated({ title: 'x' }).job_id)
    expect(job.status).toBe('failed')
    expect(job.error?.kind).toBe('CompositionError')
  })

  it('completes a title carrying control characters', async () => {
    const { orchestrator, storage } = await createRig()
    const { job_id } = orchestrator.submitAutomated({ title: 'Bitcoin\u0008 Hits 100k', client_id: 'bitcoin' })

    const job = await orchestrator.whenProcessed(job_id)
    expect(job.status).toBe('completed')
    expect(job.title).toBe('Bitcoin Hits 100k')
    expect(storage.size).toBe(1)
  })

  it('flags a completed job whose image could not be stored', async () => {
    const broken: CoverStorage = {
      name: 'broken',
      store: async () => {
        throw new Error('bucket unreachable')
      },
      list: async () => [],
    }
    const { orchestrator } = await createRig({ storage: broken })
    const { job_id } = orchestrator.submitAutomated({ title: 'Bitcoin Hits 100k', client_id: 'btc' })

    const job = await orchestrator.whenProcessed(job_id)
    expect(job.status).toBe('completed')
    expect(job.result_ref).toBeNull()
    expect(job.error).toBeNull()
    expect(job.fulfillment).toBe('pending_persistence')
    expect(job.fulfillment_error).toEqual({ kind: 'StorageFailure', message: 'bucket unreachable' })

    const kept = orchestrator.getPreview(job_id)
    expect((await sharp(kept).metadata()).width).toBe(1800)
  })

  it('returns the same job for a repeated idempotency key without generating twice', async () => {
    const { orchestrator, engine, store } = await createRig()
    const first = orchestrator.submitAutomated({ title: 'Bitcoin Hits 100k', idempotency_key: 'article-7' })
    const second = orchestrator.submitAutomated({ title: 'Bitcoin Hits 100k', idempotency_key: 'article-7' })

    expect(second).toEqual({ job_id: first.job_id, created: false })
    await orchestrator.whenProcessed(first.job_id)
    expect(engine.calls).toHaveLength(1)
    expect(store.list()).toHaveLength(1)
  })

  it('creates no job for an invalid request', async () => {
    const { orchestrator, store } = await createRig()
    expect(() => orchestrator.submitAutomated({ title: '', size: '-1x900' })).toThrow(ValidationError)
    expect(store.list()).toHaveLength(0)
  })

  it('sends inference calls one at a time in submission order', async () => {
    const engine = fakeEngine(async () => {
      await new Promise((r) => setTimeout(r, 5))
      return sharp({ create: { width: 64, height: 32, channels: 3, background: { r: 0, g: 0, b: 0 } } }).png().toBuffer()
    })
    const { orchestrator } = await createRig({ engine })
    const ids = ['Bitcoin first', 'Ethereum second', 'DeFi third'].map((title) => orchestrator.submitAutomated({ title }).job_id)

    const jobs = await Promise.all(ids.map((id) => orchestrator.whenProcessed(id)))
    expect(jobs.map((j) => j.status)).toEqual(['completed', 'completed', 'completed'])
    expect(engine.maxActive).toBe(1)
    expect(engine.calls.map((c) => c.prompt.split(', ')[2])).toEqual([
      'bitcoin orange theme',
      'ethereum blue theme',
      'decentralized finance symbols',
    ])
    expect(jobs.map((j) => j.job_id)).toEqual(['job-1', 'job-2', 'job-3'])
  })

  it('refuses approval decisions on automated jobs', async () => {
    const { orchestrator } = await createRig()
    const { job_id } = orchestrator.submitAutomated({ title: 'x' })
    await orchestrator.whenProcessed(job_id)
    await expect(orchestrator.approve(job_id)).rejects.toBeInstanceOf(InvalidTransitionError)
    expect(() => orchestrator.reject(job_id)).toThrow(InvalidTransitionError)
  })
})

describe('JobOrchestrator manual workflow', () => {
  it('holds the artifact until approval, then stores it', async () => {
    const { orchestrator, storage } = await createRig()
    const { job_id } = orchestrator.submitManual({ title: 'Weekly recap', selected_assets: ['nope', 'xdc'] })

    const pending = await orchestrator.whenProcessed(job_id)
    expect(pending.status).toBe('awaiting_approval')
    expect(pending.result_ref).toBeNull()
    expect(pending.branding?.asset_name).toBe('xdc_network_lora')
    expect(storage.size).toBe(0)
    expect((await sharp(orchestrator.getPreview(job_id)).metadata()).height).toBe(900)

    const done = await orchestrator.approve(job_id)
    expect(done.status).toBe('completed')
    expect(done.decision).toBe('approved')
    expect(done.result_ref).toBe('memory://covers/cover_job-1.png')
    expect(statuses(done.history)).toEqual(['queued', 'generating', 'awaiting_approval', 'approved', 'completed'])
    expect(storage.size).toBe(1)
    expect(() => orchestrator.getPreview(job_id)).toThrow('No preview held for job job-1 (completed)')
  })

  it('discards the artifact on rejection and keeps that decision', async () => {
    const { orchestrator, storage } = await createRig()
    const { job_id } = orchestrator.submitManual({ title: 'Weekly recap' })
    await orchestrator.whenProcessed(job_id)

    const rejected = orchestrator.reject(job_id)
    expect(rejected.status).toBe('rejected')
    expect(rejected.result_ref).toBeNull()

    const second = orchestrator.approve(job_id)
    await expect(second).rejects.toBeInstanceOf(AlreadyDecidedError)
    await expect(second).rejects.toMatchObject({ decision: 'rejected' })
    expect(orchestrator.getStatus(job_id).status).toBe('rejected')
    expect(orchestrator.getStatus(job_id).result_ref).toBeNull()
    expect(storage.size).toBe(0)
    expect(() => orchestrator.getPreview(job_id)).toThrow(/No preview held/)
  })

  it('uses the request overrides for prompt, seed and watermark', async () => {
    const { orchestrator, engine, storage } = await createRig()
    const overlay = await halfWhiteOverlay()
    const { job_id } = orchestrator.submitManual({
      title: 'Custom',
      custom_prompt: 'neon city at night',
      seed: 7,
      watermark_base64: overlay.toString('base64'),
      text_style: { title_color: '#ffcc00' },
    })
    await orchestrator.whenProcessed(job_id)
    await orchestrator.approve(job_id)

    expect(engine.calls[0].prompt).toBe('neon city at night')
    expect(engine.calls[0].seed).toBe(7)
    expect(engine.calls[0].branding).toBeNull()
    const stored = storage.get('memory://covers/cover_job-1.png')
    expect(stored?.generation_params.watermark).toBe('custom')
    const corner = await pixelAt(stored?.final_image_bytes ?? Buffer.alloc(0), 10, 10)
    expect(corner.r).toBeGreaterThan(CANVAS_COLOR.r + 100)
  })

  it('refuses a decision while generation is still running', async () => {
    let release: (b: Buffer) => void = () => {}
    const engine = fakeEngine(() => new Promise<Buffer>((r) => (release = r)))
    const { orchestrator } = await createRig({ engine })
    const { job_id } = orchestrator.submitManual({ title: 'Weekly recap' })

    expect(orchestrator.getStatus(job_id).status).toBe('generating')
    await expect(orchestrator.approve(job_id)).rejects.toBeInstanceOf(InvalidTransitionError)
    release(await halfWhiteOverlay(64, 32))
    expect((await orchestrator.whenProcessed(job_id)).status).toBe('awaiting_approval')
  })
})

describe('JobOrchestrator queries', () => {
  it('fails NotFound for unknown jobs', async () => {
    const { orchestrator } = await createRig()
    expect(() => orchestrator.getStatus('missing')).toThrow(NotFoundError)
    expect(() => orchestrator.getPreview('missing')).toThrow(NotFoundError)
    await expect(orchestrator.approve('missing')).rejects.toBeInstanceOf(NotFoundError)
  })

  it('lists jobs newest first within the limit bounds', async () => {
    const { orchestrator } = await createRig()
    for (const title of ['a', 'b', 'c']) orchestrator.submitAutomated({ title })
    expect(orchestrator.listJobs(2).map((j) => j.title)).toEqual(['c', 'b'])
    expect(orchestrator.listJobs(0)).toHaveLength(3)
    expect(orchestrator.listAssets().map((a) => a.asset_name)).toEqual(['bitcoin_logo_lora', 'xdc_network_lora'])
    await Promise.all(orchestrator.listJobs().map((j) => orchestrator.whenProcessed(j.job_id)))
  })
})
