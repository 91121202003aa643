import type { z } from 'zod'
import { getEnv } from './env'

type JsonValue = null | boolean | number | string | JsonValue[] | { [k: string]: JsonValue | undefined }

export class ApiError extends Error {
  status: number
  bodyText?: string
  bodyJson?: unknown
  constructor(message: string, status: number, bodyText?: string) {
    super(message)
    this.name = 'ApiError'
    this.status = status
    this.bodyText = bodyText
  }

  /** Error kind reported by the function, e.g. `AlreadyDecided`. */
  get kind(): string | undefined {
    return stringField(this.bodyJson, 'kind')
  }
}

function stringField(body: unknown, key: string): string | undefined {
  if (!body || typeof body !== 'object' || !(key in body)) return undefined
  const v: unknown = Reflect.get(body, key)
  return typeof v === 'string' && v.trim() ? v.trim() : undefined
}

function tryParseJson(text: string): unknown | undefined {
  const t = text.trim()
  if (!t) return undefined
  try {
    return JSON.parse(t)
  } catch {
    return undefined
  }
}

export function extractErrorMessage(bodyJson: unknown): string | undefined {
  return stringField(bodyJson, 'error') ?? stringField(bodyJson, 'message')
}

export function functionsUrl(pathWithQuery: string): string {
  const env = getEnv()
  return `${env.functionsBase.replace(/\/$/, '')}/${pathWithQuery.replace(/^\//, '')}`
}

async function send<S extends z.ZodTypeAny>(method: string, path: string, schema: S, init: RequestInit): Promise<z.infer<S>> {
  const res = await fetch(functionsUrl(path), { ...init, method })
  const text = await res.text()
  if (!res.ok) {
    const bodyJson = tryParseJson(text)
    const detail = extractErrorMessage(bodyJson)
    const err = new ApiError(detail ? `${method} ${path}: ${res.status} (${detail})` : `${method} ${path}: ${res.status}`, res.status, text)
    err.bodyJson = bodyJson
    throw err
  }
  const parsed = schema.safeParse(tryParseJson(text))
  if (!parsed.success) throw new ApiError(`${method} ${path}: unexpected response`, res.status, text)
  return parsed.data
}

export function functionsPost<S extends z.ZodTypeAny>(
  path: string,
  body: JsonValue,
  schema: S,
  init?: RequestInit,
): Promise<z.infer<S>> {
  return send('POST', path, schema, {
    ...init,
    headers: { 'content-type': 'application/json', ...(init?.headers ?? {}) },
    body: JSON.stringify(body),
  })
}

export function functionsGet<S extends z.ZodTypeAny>(pathWithQuery: string, schema: S, init?: RequestInit): Promise<z.infer<S>> {
  return send('GET', pathWithQuery, schema, { ...init })
}

export function describeError(err: unknown, fallback: string): string {
  if (err instanceof ApiError) return err.bodyText && !err.bodyJson ? `${err.message}\n${err.bodyText}` : err.message
  if (err instanceof Error) return err.message
  return fallback
}
