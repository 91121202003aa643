import { corsHeaders } from './cors'
import { AlreadyDecidedError, CoverJobError, ValidationError, errorMessage } from './errors'
import type { Logger } from './logger'

export function json(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), {
    status,
    headers: { ...corsHeaders, 'content-type': 'application/json; charset=utf-8' },
  })
}

export function methodNotAllowed() {
  return json({ error: 'Method not allowed' }, 405)
}

export function png(bytes: Buffer) {
  return new Response(new Uint8Array(bytes), {
    status: 200,
    headers: { ...corsHeaders, 'content-type': 'image/png', 'cache-control': 'no-store' },
  })
}

export type ErrorBody = {
  error: string
  kind: string
  decision?: string
  issues?: string[]
}

export function errorResponse(e: unknown, log: Logger) {
  if (e instanceof CoverJobError) {
    const body: ErrorBody = { error: e.message, kind: e.kind }
    if (e instanceof AlreadyDecidedError) body.decision = e.decision
    if (e instanceof ValidationError) body.issues = e.issues
    if (e.status >= 500) log('error', 'request failed', { kind: e.kind, error: e.message })
    return json(body, e.status)
  }
  log('error', 'unhandled request error', { error: errorMessage(e) })
  return json({ error: errorMessage(e), kind: 'InternalError' } satisfies ErrorBody, 500)
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v)
}

/** Empty body reads as `{}`; anything but a JSON object is a ValidationError. */
export async function readJsonObject(req: Request): Promise<Record<string, unknown>> {
  const text = await req.text()
  if (!text.trim()) return {}
  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch {
    throw new ValidationError(['body: invalid JSON'])
  }
  if (!isRecord(parsed)) throw new ValidationError(['body: expected a JSON object'])
  return parsed
}

/** The `Idempotency-Key` header stands in for a missing body field. */
export function withIdempotencyHeader(req: Request, body: Record<string, unknown>): Record<string, unknown> {
  const key = req.headers.get('idempotency-key')?.trim()
  if (!key || body.idempotency_key !== undefined) return body
  return { ...body, idempotency_key: key }
}

/** Path parameter first, then `?job_id=`, then a `job_id` body field. */
export function resolveJobId(req: Request, pathParam?: string, body?: Record<string, unknown>): string {
  const fromQuery = new URL(req.url).searchParams.get('job_id')
  const fromBody = typeof body?.job_id === 'string' ? body.job_id : undefined
  const jobId = (pathParam ?? fromQuery ?? fromBody ?? '').trim()
  if (!jobId) throw new ValidationError(['job_id is required'])
  return jobId
}

export type RouteParams = {
  job_id?: string
}
