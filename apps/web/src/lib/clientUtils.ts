import type { CoverJob, JobStatus } from './types'

export async function copyText(text: string) {
  await navigator.clipboard.writeText(text)
}

function downloadBlob(filename: string, blob: Blob) {
  const url = URL.createObjectURL(blob)
  const a = document.createElement('a')
  a.href = url
  a.download = filename
  a.click()
  URL.revokeObjectURL(url)
}

export async function downloadFileFromUrl(url: string, filename: string) {
  try {
    const res = await fetch(url, { mode: 'cors' })
    if (!res.ok) throw new Error(`HTTP ${res.status}`)
    downloadBlob(filename, await res.blob())
  } catch {
    // fallback: open the url directly (CORS or network trouble)
    const a = document.createElement('a')
    a.href = url
    a.download = filename
    a.target = '_blank'
    a.rel = 'noreferrer'
    a.click()
  }
}

export function formatStatus(status: JobStatus): string {
  if (status === 'queued') return 'Queued'
  if (status === 'generating') return 'Generating'
  if (status === 'awaiting_approval') return 'Awaiting approval'
  if (status === 'approved') return 'Approved, storing'
  if (status === 'completed') return 'Completed'
  if (status === 'rejected') return 'Rejected'
  return 'Failed'
}

export function formatSize(job: Pick<CoverJob, 'target_size'>): string {
  return `${job.target_size.width}x${job.target_size.height}`
}

/** Only http(s) references can be opened in the browser; memory:// ones stay server side. */
export function isBrowsableRef(ref: string | null): ref is string {
  return Boolean(ref && /^https?:\/\//i.test(ref))
}

export function coverFilename(job: Pick<CoverJob, 'job_id' | 'title'>): string {
  const slug = job.title
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, 48)
  return `cover-${slug || job.job_id.slice(0, 8)}.png`
}

export function coverImagesPath(query: { clientId: string; offset: number; limit: number }): string {
  const q = new URLSearchParams({ limit: String(query.limit), offset: String(query.offset) })
  const clientId = query.clientId.trim()
  if (clientId) q.set('client_id', clientId)
  return `cover-images?${q.toString()}`
}
