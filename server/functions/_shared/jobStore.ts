import { InvalidTransitionError, NotFoundError } from './errors'
import type { Job, JobSpec, JobStatus, TransitionPayload, Workflow } from './types'

const EDGES: Record<JobStatus, readonly JobStatus[]> = {
  queued: ['generating', 'failed'],
  generating: ['awaiting_approval', 'completed', 'failed'],
  awaiting_approval: ['approved', 'rejected', 'failed'],
  approved: ['completed', 'failed'],
  completed: [],
  rejected: [],
  failed: [],
}

export function canTransition(workflow: Workflow, from: JobStatus, to: JobStatus): boolean {
  if (!EDGES[from].includes(to)) return false
  if (from === 'generating' && to === 'completed') return workflow === 'automated'
  if (to === 'awaiting_approval') return workflow === 'manual'
  return true
}

function payloadProblem(to: JobStatus, payload: TransitionPayload): string | null {
  if (to === 'failed' && !payload.error) return 'failed requires an error'
  if (to !== 'failed' && payload.error) return 'error is only recorded on failed'
  if (to !== 'completed' && payload.result_ref) return 'result_ref is only set on completed'
  if (payload.decision && to !== payload.decision) return `decision ${payload.decision} does not match ${to}`
  return null
}

function freezeJob(job: Job): Job {
  Object.freeze(job.target_size)
  Object.freeze(job.selected_assets)
  if (job.error) Object.freeze(job.error)
  if (job.fulfillment_error) Object.freeze(job.fulfillment_error)
  if (job.branding) Object.freeze(job.branding)
  job.history.forEach((h) => Object.freeze(h))
  Object.freeze(job.history)
  return Object.freeze(job)
}

type IdempotencyEntry = {
  jobId: string
  at: number
}

export type CreateResult = {
  job_id: string
  created: boolean
}

export type JobStoreOptions = {
  idempotencyWindowMs?: number
  now?: () => Date
  newId?: () => string
}

/**
 * In-memory job registry. Every stored record is frozen, so `get` hands out
 * the record itself as the snapshot and a transition always swaps in a new one.
 */
export class JobStore {
  private readonly jobs = new Map<string, Job>()
  private readonly idempotency = new Map<string, IdempotencyEntry>()
  private readonly windowMs: number
  private readonly now: () => Date
  private readonly newId: () => string

  constructor(options: JobStoreOptions = {}) {
    this.windowMs = options.idempotencyWindowMs ?? 86_400_000
    this.now = options.now ?? (() => new Date())
    this.newId = options.newId ?? (() => crypto.randomUUID())
  }

  create(spec: JobSpec): CreateResult {
    const now = this.now()
    const key = spec.idempotency_key?.trim() || null

    if (key) {
      const hit = this.idempotency.get(key)
      if (hit && now.getTime() - hit.at < this.windowMs && this.jobs.has(hit.jobId)) {
        return { job_id: hit.jobId, created: false }
      }
    }

    const jobId = this.newId()
    if (this.jobs.has(jobId)) throw new Error(`Duplicate job id generated: ${jobId}`)

    const at = now.toISOString()
    const job: Job = {
      job_id: jobId,
      workflow: spec.workflow,
      title: spec.title,
      subtitle: spec.subtitle ?? null,
      client_id: spec.client_id ?? null,
      selected_assets: [...(spec.selected_assets ?? [])],
      custom_prompt: spec.custom_prompt ?? null,
      target_size: { width: spec.target_size.width, height: spec.target_size.height },
      status: 'queued',
      created_at: at,
      updated_at: at,
      result_ref: null,
      error: null,
      idempotency_key: key,
      decision: null,
      branding: null,
      fulfillment: 'none',
      fulfillment_error: null,
      history: [{ status: 'queued', at }],
    }
    this.jobs.set(jobId, freezeJob(job))
    if (key) this.idempotency.set(key, { jobId, at: now.getTime() })
    this.pruneIdempotency(now.getTime())
    return { job_id: jobId, created: true }
  }

  get(jobId: string): Job {
    const job = this.jobs.get(jobId)
    if (!job) throw new NotFoundError(jobId)
    return job
  }

  list(limit = 20): Job[] {
    return Array.from(this.jobs.values()).reverse().slice(0, limit)
  }

  /**
   * Compare-and-swap: applies `to` only while the job is still in one of
   * `from`. On any mismatch the stored record is left as it was.
   */
  transition(jobId: string, from: readonly JobStatus[], to: JobStatus, payload: TransitionPayload = {}): Job {
    const current = this.get(jobId)
    if (!from.includes(current.status)) {
      throw new InvalidTransitionError(jobId, current.status, to, `expected one of ${from.join(', ')}`)
    }
    if (!canTransition(current.workflow, current.status, to)) {
      throw new InvalidTransitionError(jobId, current.status, to, `${current.workflow} workflow`)
    }
    const problem = payloadProblem(to, payload)
    if (problem) throw new InvalidTransitionError(jobId, current.status, to, problem)

    const at = this.now().toISOString()
    const next: Job = {
      ...current,
      status: to,
      updated_at: at,
      result_ref: payload.result_ref ?? current.result_ref,
      error: payload.error ?? current.error,
      decision: payload.decision ?? current.decision,
      branding: payload.branding === undefined ? current.branding : payload.branding,
      fulfillment: payload.fulfillment ?? current.fulfillment,
      fulfillment_error: payload.fulfillment_error ?? current.fulfillment_error,
      history: [...current.history, { status: to, at }],
    }
    this.jobs.set(jobId, freezeJob(next))
    return next
  }

  private pruneIdempotency(nowMs: number) {
    for (const [key, entry] of this.idempotency) {
      if (nowMs - entry.at >= this.windowMs) this.idempotency.delete(key)
    }
  }
}
