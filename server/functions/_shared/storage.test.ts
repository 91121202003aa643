import { describe, expect, it } from 'vitest'
import { MemoryCoverStorage, coverObjectPath, type StoreRequest } from './storage'

function cover(jobId: string, clientId: string | null): StoreRequest {
  return {
    job_id: jobId,
    final_image_bytes: Buffer.from('png'),
    title: `Title ${jobId}`,
    subtitle: null,
    client_id: clientId,
    image_size: { width: 1800, height: 900 },
    generation_params: {},
  }
}

describe('coverObjectPath', () => {
  it('keeps object names inside the covers prefix', () => {
    expect(coverObjectPath('job-1')).toBe('covers/cover_job-1.png')
    expect(coverObjectPath('../x y')).toBe('covers/cover_..-x-y.png')
  })
})

describe('MemoryCoverStorage', () => {
  const at = '2026-01-01T00:00:00.000Z'

  async function seeded() {
    const storage = new MemoryCoverStorage({ now: () => new Date(at) })
    await storage.store(cover('job-1', 'bitcoin'))
    await storage.store(cover('job-2', 'xdc'))
    await storage.store(cover('job-3', 'bitcoin'))
    return storage
  }

  it('lists stored covers newest first', async () => {
    const storage = await seeded()
    const all = await storage.list({ limit: 10, offset: 0, client_id: null })
    expect(all.map((c) => c.job_id)).toEqual(['job-3', 'job-2', 'job-1'])
    expect(all[0]).toEqual({
      job_id: 'job-3',
      result_ref: 'memory://covers/cover_job-3.png',
      title: 'Title job-3',
      subtitle: null,
      client_id: 'bitcoin',
      width: 1800,
      height: 900,
      created_at: at,
    })
  })

  it('filters by client and pages with offset and limit', async () => {
    const storage = await seeded()
    const byClient = await storage.list({ limit: 10, offset: 0, client_id: 'bitcoin' })
    expect(byClient.map((c) => c.job_id)).toEqual(['job-3', 'job-1'])
    const page = await storage.list({ limit: 1, offset: 1, client_id: 'bitcoin' })
    expect(page.map((c) => c.job_id)).toEqual(['job-1'])
    expect(await storage.list({ limit: 10, offset: 0, client_id: 'hedera' })).toEqual([])
  })
})
