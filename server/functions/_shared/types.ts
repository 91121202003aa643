export type Workflow = 'automated' | 'manual'

export type JobStatus = 'queued' | 'generating' | 'awaiting_approval' | 'approved' | 'completed' | 'rejected' | 'failed'

export type Decision = 'approved' | 'rejected'

export type ImageSize = {
  width: number
  height: number
}

export type JobErrorKind =
  | 'InferenceFailure'
  | 'InferenceTimeout'
  | 'CompositionError'
  | 'StorageFailure'
  | 'InternalError'

export type JobError = {
  kind: JobErrorKind
  message: string
}

// 'pending_persistence': the job completed but its image never reached storage
export type Fulfillment = 'none' | 'stored' | 'pending_persistence'

export type BrandingDescriptor = {
  asset_name: string
  blend_weight: number
  watermark?: string
}

export type StatusEntry = {
  status: JobStatus
  at: string
}

export type TextStyle = {
  font_family: string
  title_color: string
  subtitle_color: string
  shadow_color: string
  shadow_opacity: number
  shadow_offset: number
  shadow_blur: number
}

export type Job = {
  job_id: string
  workflow: Workflow
  title: string
  subtitle: string | null
  client_id: string | null
  selected_assets: string[]
  custom_prompt: string | null
  target_size: ImageSize
  status: JobStatus
  created_at: string
  updated_at: string
  result_ref: string | null
  error: JobError | null
  idempotency_key: string | null
  decision: Decision | null
  branding: BrandingDescriptor | null
  fulfillment: Fulfillment
  fulfillment_error: JobError | null
  history: StatusEntry[]
}

export type JobSpec = {
  workflow: Workflow
  title: string
  subtitle?: string | null
  client_id?: string | null
  selected_assets?: string[]
  custom_prompt?: string | null
  target_size: ImageSize
  idempotency_key?: string | null
}

export type TransitionPayload = {
  result_ref?: string | null
  error?: JobError | null
  decision?: Decision
  branding?: BrandingDescriptor | null
  fulfillment?: Fulfillment
  fulfillment_error?: JobError | null
}
