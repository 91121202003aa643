import { ApprovalGate } from './approvalGate'
import type { ClientAssetListing, ClientAssetResolver } from './clientAssets'
import { compose } from './compositor'
import { CoverJobError, errorMessage, toJobError } from './errors'
import type { InferenceEngine } from './inference'
import { InferenceSlot } from './inferenceSlot'
import type { CreateResult, JobStore } from './jobStore'
import { silentLogger, type Logger } from './logger'
import { buildGenerationInstruction } from './prompt'
import { parseAutomatedSubmission, parseManualSubmission, type SizeLimits } from './requests'
import type { CoverListQuery, CoverRecord, CoverStorage } from './storage'
import type { BrandingDescriptor, Job, JobError, JobStatus, TextStyle } from './types'
import type { WatermarkSource } from './watermarks'

export type OrchestratorDeps = {
  store: JobStore
  assets: ClientAssetResolver
  engine: InferenceEngine
  storage: CoverStorage
  watermarks: WatermarkSource
  limits: SizeLimits
  inferenceTimeoutMs: number
  slot?: InferenceSlot
  log?: Logger
}

type PipelineOptions = {
  text_style: Partial<TextStyle>
  watermark: Buffer | null
  seed: number | null
}

type Artifact = {
  image: Buffer
  generation_params: Record<string, unknown>
}

const NON_TERMINAL: readonly JobStatus[] = ['queued', 'generating', 'awaiting_approval', 'approved']

export const MAX_LIST_LIMIT = 50

function watermarkLabel(applied: Buffer | null, custom: Buffer | null, branding: BrandingDescriptor | null): string | null {
  if (!applied) return null
  if (custom) return 'custom'
  return branding?.watermark ?? 'default'
}

export class JobOrchestrator {
  private readonly store: JobStore
  private readonly assets: ClientAssetResolver
  private readonly engine: InferenceEngine
  private readonly storage: CoverStorage
  private readonly watermarks: WatermarkSource
  private readonly limits: SizeLimits
  private readonly timeoutMs: number
  private readonly slot: InferenceSlot
  private readonly gate: ApprovalGate
  private readonly log: Logger

  // awaiting a decision
  private readonly held = new Map<string, Artifact>()
  // completed but not persisted
  private readonly unpersisted = new Map<string, Artifact>()
  private readonly pipelines = new Map<string, Promise<void>>()

  constructor(deps: OrchestratorDeps) {
    this.store = deps.store
    this.assets = deps.assets
    this.engine = deps.engine
    this.storage = deps.storage
    this.watermarks = deps.watermarks
    this.limits = deps.limits
    this.timeoutMs = deps.inferenceTimeoutMs
    this.slot = deps.slot ?? new InferenceSlot()
    this.gate = new ApprovalGate(deps.store)
    this.log = deps.log ?? silentLogger
  }

  submitAutomated(input: unknown): CreateResult {
    const sub = parseAutomatedSubmission(input, this.limits)
    const created = this.store.create({
      workflow: 'automated',
      title: sub.title,
      subtitle: sub.subtitle,
      client_id: sub.client_id,
      target_size: sub.size,
      idempotency_key: sub.idempotency_key,
    })
    if (created.created) this.start(created.job_id, { text_style: {}, watermark: null, seed: null })
    this.log('info', 'automated job submitted', { job_id: created.job_id, created: created.created })
    return created
  }

  submitManual(input: unknown): CreateResult {
    const sub = parseManualSubmission(input, this.limits)
    const created = this.store.create({
      workflow: 'manual',
      title: sub.title,
      subtitle: sub.subtitle,
      selected_assets: sub.selected_assets,
      custom_prompt: sub.custom_prompt,
      target_size: sub.size,
      idempotency_key: sub.idempotency_key,
    })
    if (created.created) {
      this.start(created.job_id, { text_style: sub.text_style, watermark: sub.watermark_base64, seed: sub.seed })
    }
    this.log('info', 'manual job submitted', { job_id: created.job_id, created: created.created })
    return created
  }

  getStatus(jobId: string): Job {
    return this.store.get(jobId)
  }

  listJobs(limit = 20): Job[] {
    const n = Math.max(1, Math.min(Math.floor(limit) || 20, MAX_LIST_LIMIT))
    return this.store.list(n)
  }

  listAssets(): readonly ClientAssetListing[] {
    return this.assets.list()
  }

  /** Covers that reached storage, newest first. */
  listCovers(query: CoverListQuery): Promise<CoverRecord[]> {
    return this.storage.list(query)
  }

  /** PNG of a job awaiting approval, or of a completed job whose image never reached storage. */
  getPreview(jobId: string): Buffer {
    const job = this.store.get(jobId)
    const artifact = this.held.get(jobId) ?? this.unpersisted.get(jobId)
    if (!artifact) throw new CoverJobError('NotFound', `No preview held for job ${jobId} (${job.status})`, 404)
    return artifact.image
  }

  /** Resolves once the job's generation pipeline has run; approval is not awaited. */
  async whenProcessed(jobId: string): Promise<Job> {
    const run = this.pipelines.get(jobId)
    if (run) await run
    return this.store.get(jobId)
  }

  async approve(jobId: string): Promise<Job> {
    this.gate.approve(jobId)
    const artifact = this.held.get(jobId)
    this.held.delete(jobId)
    this.log('info', 'job approved', { job_id: jobId })
    if (!artifact) {
      this.fail(jobId, new Error('Approved job has no held artifact'))
      return this.store.get(jobId)
    }
    await this.finalize(jobId, ['approved'], artifact)
    return this.store.get(jobId)
  }

  reject(jobId: string): Job {
    const job = this.gate.reject(jobId)
    this.held.delete(jobId)
    this.log('info', 'job rejected, artifact discarded', { job_id: jobId })
    return job
  }

  private start(jobId: string, options: PipelineOptions) {
    if (this.pipelines.has(jobId)) return
    const run = this.process(jobId, options).finally(() => this.pipelines.delete(jobId))
    this.pipelines.set(jobId, run)
  }

  private resolveBranding(job: Job): BrandingDescriptor | null {
    if (job.workflow === 'automated') return this.assets.resolve(job.client_id)
    for (const name of job.selected_assets) {
      const hit = this.assets.resolveAsset(name)
      if (hit) return hit
    }
    return null
  }

  /**
   * Runs once per job and never rejects: every failure ends up on the job.
   * Everything before `slot.run` is synchronous, so inference order follows
   * submission order.
   */
  private async process(jobId: string, options: PipelineOptions): Promise<void> {
    let job: Job
    let branding: BrandingDescriptor | null
    try {
      branding = this.resolveBranding(this.store.get(jobId))
      job = this.store.transition(jobId, ['queued'], 'generating', { branding })
    } catch (e) {
      this.log('error', 'job could not start', { job_id: jobId, error: errorMessage(e) })
      return
    }

    const instruction = buildGenerationInstruction({
      title: job.title,
      client_id: job.client_id,
      custom_prompt: job.custom_prompt,
      branding,
    })
    this.log('info', 'generation queued', {
      job_id: jobId,
      asset: branding?.asset_name ?? null,
      slot_depth: this.slot.depth + 1,
    })

    try {
      const canvas = await this.slot.run(
        () =>
          this.engine.generate({
            prompt: instruction.prompt,
            negative_prompt: instruction.negative_prompt,
            branding,
            size_hint: job.target_size,
            seed: options.seed,
          }),
        this.timeoutMs,
      )
      const watermark = options.watermark ?? (await this.watermarks.load(branding))
      const { image } = await compose({
        canvas,
        target_size: job.target_size,
        watermark,
        title: job.title,
        subtitle: job.subtitle,
        style: options.text_style,
      })
      const artifact: Artifact = {
        image,
        generation_params: {
          workflow: job.workflow,
          engine: this.engine.name,
          prompt: instruction.prompt,
          negative_prompt: instruction.negative_prompt,
          asset_name: branding?.asset_name ?? null,
          blend_weight: branding?.blend_weight ?? null,
          watermark: watermarkLabel(watermark, options.watermark, branding),
          seed: options.seed,
        },
      }

      if (job.workflow === 'manual') {
        this.held.set(jobId, artifact)
        this.store.transition(jobId, ['generating'], 'awaiting_approval')
        this.log('info', 'awaiting approval', { job_id: jobId })
        return
      }
      await this.finalize(jobId, ['generating'], artifact)
    } catch (e) {
      this.held.delete(jobId)
      this.fail(jobId, e)
    }
  }

  private async finalize(jobId: string, from: readonly JobStatus[], artifact: Artifact) {
    const job = this.store.get(jobId)
    let resultRef: string | null = null
    let storageError: JobError | null = null
    try {
      resultRef = await this.storage.store({
        job_id: jobId,
        final_image_bytes: artifact.image,
        title: job.title,
        subtitle: job.subtitle,
        client_id: job.client_id,
        image_size: job.target_size,
        generation_params: artifact.generation_params,
      })
    } catch (e) {
      storageError = { kind: 'StorageFailure', message: errorMessage(e) }
    }

    if (resultRef) {
      this.store.transition(jobId, from, 'completed', { result_ref: resultRef, fulfillment: 'stored' })
      this.log('info', 'job completed', { job_id: jobId, result_ref: resultRef })
      return
    }
    this.unpersisted.set(jobId, artifact)
    this.store.transition(jobId, from, 'completed', {
      fulfillment: 'pending_persistence',
      fulfillment_error: storageError ?? { kind: 'StorageFailure', message: 'Storage returned no reference' },
    })
    this.log('warn', 'job completed without persistence', { job_id: jobId, error: storageError?.message ?? null })
  }

  private fail(jobId: string, e: unknown) {
    const error = toJobError(e)
    try {
      this.store.transition(jobId, NON_TERMINAL, 'failed', { error })
      this.log('error', 'job failed', { job_id: jobId, kind: error.kind, error: error.message })
    } catch (te) {
      this.log('error', 'job failure could not be recorded', { job_id: jobId, error: errorMessage(te), cause: error.message })
    }
  }
}
