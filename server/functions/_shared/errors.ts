import type { Decision, JobError, JobErrorKind, JobStatus } from './types'

export type CoverErrorKind =
  | 'ValidationError'
  | 'NotFound'
  | 'InvalidTransition'
  | 'AlreadyDecided'
  | JobErrorKind

export class CoverJobError extends Error {
  readonly kind: CoverErrorKind
  readonly status: number
  constructor(kind: CoverErrorKind, message: string, status = 500) {
    super(message)
    this.name = kind
    this.kind = kind
    this.status = status
  }
}

export class ValidationError extends CoverJobError {
  readonly issues: string[]
  constructor(issues: string[]) {
    super('ValidationError', issues.length > 0 ? `Invalid request: ${issues.join('; ')}` : 'Invalid request', 400)
    this.issues = issues
  }
}

export class NotFoundError extends CoverJobError {
  constructor(jobId: string) {
    super('NotFound', `Job not found: ${jobId}`, 404)
  }
}

export class InvalidTransitionError extends CoverJobError {
  readonly from: JobStatus
  readonly to: JobStatus
  constructor(jobId: string, from: JobStatus, to: JobStatus, reason?: string) {
    super('InvalidTransition', `Job ${jobId} cannot move ${from} -> ${to}${reason ? ` (${reason})` : ''}`, 409)
    this.from = from
    this.to = to
  }
}

export class AlreadyDecidedError extends CoverJobError {
  readonly decision: Decision
  constructor(jobId: string, decision: Decision) {
    super('AlreadyDecided', `Job ${jobId} was already ${decision}`, 409)
    this.decision = decision
  }
}

export class InferenceFailure extends CoverJobError {
  constructor(message: string) {
    super('InferenceFailure', message)
  }
}

export class InferenceTimeout extends CoverJobError {
  constructor(timeoutMs: number) {
    super('InferenceTimeout', `Inference exceeded deadline of ${timeoutMs}ms`)
  }
}

export class CompositionError extends CoverJobError {
  constructor(message: string) {
    super('CompositionError', message)
  }
}

export class StorageFailure extends CoverJobError {
  constructor(message: string) {
    super('StorageFailure', message)
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message
  return String(e)
}

function isJobErrorKind(kind: CoverErrorKind): kind is JobErrorKind {
  return (
    kind === 'InferenceFailure' ||
    kind === 'InferenceTimeout' ||
    kind === 'CompositionError' ||
    kind === 'StorageFailure' ||
    kind === 'InternalError'
  )
}

/**
 * Structured form recorded on a failed job. Anything outside the pipeline
 * taxonomy is reported as an internal error.
 */
export function toJobError(e: unknown): JobError {
  if (e instanceof CoverJobError && isJobErrorKind(e.kind)) return { kind: e.kind, message: e.message }
  return { kind: 'InternalError', message: errorMessage(e) }
}
