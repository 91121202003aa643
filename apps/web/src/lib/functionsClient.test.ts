import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { ApiError, describeError, functionsGet, functionsPost, functionsUrl } from './functionsClient'
import { coverImagesPath } from './clientUtils'
import { CoverImagesResponseSchema, JobsResponseSchema, SubmitResponseSchema } from './types'

function stubFetch(status: number, body: string) {
  const fetchMock = vi.fn(async (_input: RequestInfo | URL, _init?: RequestInit) => new Response(body, { status }))
  vi.stubGlobal('fetch', fetchMock)
  return fetchMock
}

describe('functionsClient', () => {
  beforeEach(() => {
    vi.stubEnv('VITE_COVER_FUNCTIONS_BASE', 'http://api.test/functions/v1/')
  })

  afterEach(() => {
    vi.unstubAllGlobals()
    vi.unstubAllEnvs()
  })

  it('joins paths onto the configured base', () => {
    expect(functionsUrl('/cover-status/job-1')).toBe('http://api.test/functions/v1/cover-status/job-1')
  })

  it('posts JSON and decodes the response', async () => {
    const fetchMock = stubFetch(202, JSON.stringify({ job_id: 'job-1', created: true }))

    const res = await functionsPost('cover-submit-automated', { title: 'Hello', client_id: 'bitcoin' }, SubmitResponseSchema)

    expect(res).toEqual({ job_id: 'job-1', created: true })
    const [url, init] = fetchMock.mock.calls[0]
    expect(url).toBe('http://api.test/functions/v1/cover-submit-automated')
    expect(init?.method).toBe('POST')
    expect(init?.body).toBe('{"title":"Hello","client_id":"bitcoin"}')
    expect(init?.headers).toEqual({ 'content-type': 'application/json' })
  })

  it('surfaces the error kind and message of a failed call', async () => {
    stubFetch(409, JSON.stringify({ error: 'Job job-1 already decided: rejected', kind: 'AlreadyDecided', decision: 'rejected' }))

    const err = await functionsPost('cover-approve/job-1', {}, SubmitResponseSchema).catch((e: unknown) => e)

    expect(err).toBeInstanceOf(ApiError)
    if (!(err instanceof ApiError)) return
    expect(err.status).toBe(409)
    expect(err.kind).toBe('AlreadyDecided')
    expect(err.message).toBe('POST cover-approve/job-1: 409 (Job job-1 already decided: rejected)')
    expect(describeError(err, 'fallback')).toBe('POST cover-approve/job-1: 409 (Job job-1 already decided: rejected)')
  })

  it('rejects a response that does not match the schema', async () => {
    stubFetch(200, JSON.stringify({ jobs: [{ job_id: 'job-1' }] }))

    await expect(functionsGet('cover-jobs', JobsResponseSchema)).rejects.toThrow('GET cover-jobs: unexpected response')
  })

  it('lists stored covers for one client', async () => {
    const image = {
      job_id: 'job-1',
      result_ref: 'https://cdn.test/covers/cover_job-1.png',
      title: 'Bitcoin Hits 100k',
      subtitle: null,
      client_id: 'bitcoin',
      width: 1800,
      height: 900,
      created_at: '2026-01-01T00:00:00.000Z',
    }
    const fetchMock = stubFetch(200, JSON.stringify({ images: [image] }))

    const res = await functionsGet(coverImagesPath({ clientId: ' bitcoin ', offset: 24, limit: 24 }), CoverImagesResponseSchema)

    expect(res.images).toEqual([image])
    expect(fetchMock.mock.calls[0][0]).toBe('http://api.test/functions/v1/cover-images?limit=24&offset=24&client_id=bitcoin')
    expect(coverImagesPath({ clientId: '', offset: 0, limit: 24 })).toBe('cover-images?limit=24&offset=0')
  })

  it('keeps a non-JSON error body in the description', async () => {
    stubFetch(502, 'Bad gateway')

    const err = await functionsGet('cover-assets', JobsResponseSchema).catch((e: unknown) => e)

    expect(err).toBeInstanceOf(ApiError)
    expect(describeError(err, 'fallback')).toBe('GET cover-assets: 502\nBad gateway')
    expect(describeError('???', 'fallback')).toBe('fallback')
  })
})
