import { useEffect, useMemo, useState, type FormEvent } from 'react'
import { Link, useNavigate } from 'react-router-dom'
import { describeError, functionsGet, functionsPost } from '../lib/functionsClient'
import { formatSize, formatStatus } from '../lib/clientUtils'
import {
  AssetsResponseSchema,
  JobsResponseSchema,
  SubmitResponseSchema,
  type AssetListing,
  type CoverJob,
  type CoverSubmitAutomatedRequest,
  type CoverSubmitManualRequest,
} from '../lib/types'
import { Shell } from '../ui/Shell'

type Workflow = 'automated' | 'manual'

const inputClass =
  'h-10 rounded-lg border border-white/10 bg-zinc-950 px-3 text-sm outline-none focus:border-white/20'

function readAsDataUrl(file: File): Promise<string> {
  return new Promise((resolve, reject) => {
    const reader = new FileReader()
    reader.onload = () => {
      if (typeof reader.result === 'string') resolve(reader.result)
      else reject(new Error('Could not read watermark file'))
    }
    reader.onerror = () => reject(reader.error ?? new Error('Could not read watermark file'))
    reader.readAsDataURL(file)
  })
}

export function HomePage() {
  const nav = useNavigate()
  const [workflow, setWorkflow] = useState<Workflow>('automated')
  const [title, setTitle] = useState('')
  const [subtitle, setSubtitle] = useState('')
  const [size, setSize] = useState('1800x900')
  const [clientId, setClientId] = useState('')
  const [selectedAssets, setSelectedAssets] = useState<string[]>([])
  const [customPrompt, setCustomPrompt] = useState('')
  const [seed, setSeed] = useState('')
  const [titleColor, setTitleColor] = useState('#ffffff')
  const [watermarkFile, setWatermarkFile] = useState<File | null>(null)
  const [isSubmitting, setIsSubmitting] = useState(false)
  const [error, setError] = useState<string | null>(null)

  const [assets, setAssets] = useState<AssetListing[]>([])
  const [jobs, setJobs] = useState<CoverJob[]>([])
  const [jobsError, setJobsError] = useState<string | null>(null)
  const [jobsLoading, setJobsLoading] = useState(false)

  const canSubmit = useMemo(() => title.trim().length > 0 && !isSubmitting, [title, isSubmitting])

  async function refreshJobs() {
    setJobsLoading(true)
    setJobsError(null)
    try {
      const res = await functionsGet('cover-jobs?limit=20', JobsResponseSchema)
      setJobs(res.jobs)
    } catch (err) {
      setJobsError(describeError(err, 'Could not load jobs.'))
    } finally {
      setJobsLoading(false)
    }
  }

  async function loadAssets() {
    try {
      const res = await functionsGet('cover-assets', AssetsResponseSchema)
      setAssets(res.assets)
    } catch (err) {
      setError(describeError(err, 'Could not load client assets.'))
    }
  }

  useEffect(() => {
    void refreshJobs()
    void loadAssets()
  }, [])

  function toggleAsset(name: string) {
    setSelectedAssets((prev) => (prev.includes(name) ? prev.filter((a) => a !== name) : [...prev, name]))
  }

  async function submit(): Promise<string> {
    const common = {
      title: title.trim(),
      subtitle: subtitle.trim() || undefined,
      size: size.trim() || undefined,
    }
    if (workflow === 'automated') {
      const payload: CoverSubmitAutomatedRequest = { ...common, client_id: clientId.trim() || undefined }
      const res = await functionsPost('cover-submit-automated', payload, SubmitResponseSchema)
      return res.job_id
    }
    const payload: CoverSubmitManualRequest = {
      ...common,
      selected_assets: selectedAssets,
      custom_prompt: customPrompt.trim() || undefined,
      seed: seed.trim() ? Number(seed) : undefined,
      watermark_base64: watermarkFile ? await readAsDataUrl(watermarkFile) : undefined,
      text_style: titleColor.toLowerCase() !== '#ffffff' ? { title_color: titleColor } : undefined,
    }
    const res = await functionsPost('cover-submit-manual', payload, SubmitResponseSchema)
    return res.job_id
  }

  async function onSubmit(e: FormEvent) {
    e.preventDefault()
    if (!canSubmit) return
    setIsSubmitting(true)
    setError(null)
    try {
      const jobId = await submit()
      nav(`/jobs/${jobId}`)
    } catch (err) {
      setError(describeError(err, 'Submission failed.'))
    } finally {
      setIsSubmitting(false)
    }
  }

  return (
    <Shell>
      <div className="grid gap-6">
        <div>
          <h1 className="text-2xl font-semibold tracking-tight">Branded cover images</h1>
          <p className="mt-2 text-sm leading-6 text-zinc-400">
            Automated jobs generate, brand and store a cover in one go. Manual jobs stop for review: you approve or
            reject the preview before anything is stored.
          </p>
        </div>

        <form onSubmit={onSubmit} className="card p-5">
          <div className="mb-4 flex gap-2">
            {(['automated', 'manual'] as const).map((w) => (
              <button
                key={w}
                type="button"
                onClick={() => setWorkflow(w)}
                className={(workflow === w ? 'btn-primary' : 'btn-dark') + ' h-9 px-3 text-xs'}
              >
                {w === 'automated' ? 'Automated' : 'Manual review'}
              </button>
            ))}
          </div>

          <div className="grid gap-4 md:grid-cols-3">
            <label className="grid gap-1 md:col-span-2">
              <span className="text-xs font-medium text-zinc-300">title (required)</span>
              <input
                className={inputClass}
                placeholder="e.g. Bitcoin hits a new high"
                value={title}
                onChange={(e) => setTitle(e.target.value)}
                maxLength={200}
                required
              />
            </label>
            <label className="grid gap-1">
              <span className="text-xs font-medium text-zinc-300">size</span>
              <input className={inputClass} value={size} placeholder="1800x900" onChange={(e) => setSize(e.target.value)} />
            </label>
            <label className="grid gap-1 md:col-span-3">
              <span className="text-xs font-medium text-zinc-300">subtitle</span>
              <input className={inputClass} value={subtitle} onChange={(e) => setSubtitle(e.target.value)} />
            </label>
          </div>

          {workflow === 'automated' ? (
            <label className="mt-4 grid gap-1">
              <span className="text-xs font-medium text-zinc-300">client_id</span>
              <input
                className={inputClass}
                list="client-ids"
                placeholder="e.g. bitcoin, xdc (leave empty for an unbranded cover)"
                value={clientId}
                onChange={(e) => setClientId(e.target.value)}
              />
              <datalist id="client-ids">
                {assets.flatMap((a) => a.aliases).map((alias) => (
                  <option key={alias} value={alias} />
                ))}
              </datalist>
            </label>
          ) : (
            <div className="mt-4 grid gap-4">
              <div className="grid gap-1">
                <span className="text-xs font-medium text-zinc-300">assets (the first one that resolves brands the cover)</span>
                <div className="flex flex-wrap gap-2">
                  {assets.map((a) => (
                    <label
                      key={a.asset_name}
                      className="flex items-center gap-2 rounded-lg border border-white/10 bg-zinc-950 px-3 py-1.5 text-xs"
                    >
                      <input
                        type="checkbox"
                        checked={selectedAssets.includes(a.asset_name)}
                        onChange={() => toggleAsset(a.asset_name)}
                      />
                      {a.aliases[0] ?? a.asset_name}
                    </label>
                  ))}
                  {assets.length === 0 ? <span className="text-xs text-zinc-500">No client assets configured.</span> : null}
                </div>
              </div>
              <label className="grid gap-1">
                <span className="text-xs font-medium text-zinc-300">custom prompt (replaces the generated one)</span>
                <textarea
                  className="min-h-24 rounded-lg border border-white/10 bg-zinc-950 p-3 text-sm outline-none focus:border-white/20"
                  value={customPrompt}
                  onChange={(e) => setCustomPrompt(e.target.value)}
                />
              </label>
              <div className="grid gap-4 md:grid-cols-3">
                <label className="grid gap-1">
                  <span className="text-xs font-medium text-zinc-300">seed</span>
                  <input
                    className={inputClass}
                    inputMode="numeric"
                    value={seed}
                    onChange={(e) => setSeed(e.target.value.replace(/[^0-9]/g, ''))}
                  />
                </label>
                <label className="grid gap-1">
                  <span className="text-xs font-medium text-zinc-300">title colour</span>
                  <input
                    type="color"
                    className="h-10 w-full rounded-lg border border-white/10 bg-zinc-950 px-1"
                    value={titleColor}
                    onChange={(e) => setTitleColor(e.target.value)}
                  />
                </label>
                <label className="grid gap-1">
                  <span className="text-xs font-medium text-zinc-300">watermark override</span>
                  <input
                    type="file"
                    accept="image/png,image/svg+xml,image/webp"
                    className="text-xs text-zinc-400"
                    onChange={(e) => setWatermarkFile(e.target.files?.[0] ?? null)}
                  />
                </label>
              </div>
            </div>
          )}

          <div className="mt-4 flex items-center justify-between gap-3">
            <button type="submit" disabled={!canSubmit} className="btn-primary h-10">
              {isSubmitting ? 'Submitting...' : 'Generate cover'}
            </button>
            <div className="text-xs text-zinc-500">Generation can take up to a couple of minutes (the job page polls)</div>
          </div>

          {error ? <div className="mt-4 whitespace-pre-wrap text-sm text-red-300">Error: {error}</div> : null}
        </form>

        <section className="card p-5">
          <div className="flex flex-wrap items-center justify-between gap-3">
            <h2 className="text-base font-semibold">Recent jobs</h2>
            <button onClick={() => void refreshJobs()} className="btn-dark h-9 px-3 text-xs">
              Refresh
            </button>
          </div>
          {jobsLoading ? <div className="mt-3 text-sm text-zinc-400">Loading...</div> : null}
          {jobsError ? <div className="mt-3 text-sm text-red-300">Error: {jobsError}</div> : null}
          {!jobsLoading && !jobsError ? (
            <div className="mt-3 grid gap-2">
              {jobs.map((j) => (
                <div
                  key={j.job_id}
                  className="flex flex-wrap items-center justify-between gap-3 rounded-xl border border-white/10 bg-zinc-950/60 px-3 py-2 text-sm"
                >
                  <div className="flex min-w-0 flex-1 flex-wrap items-center gap-3">
                    <Link to={`/jobs/${j.job_id}`} className="font-semibold hover:underline">
                      {j.title}
                    </Link>
                    <span className="text-xs text-zinc-500">{new Date(j.created_at).toLocaleString()}</span>
                    <span className="text-xs text-zinc-400">{formatStatus(j.status)}</span>
                    <span className="text-xs text-zinc-600">
                      {j.workflow} / {formatSize(j)}
                      {j.branding ? ` / ${j.branding.asset_name}` : ''}
                    </span>
                  </div>
                  <Link to={`/jobs/${j.job_id}`} className="btn-dark h-8 px-3 text-xs">
                    Open
                  </Link>
                </div>
              ))}
              {jobs.length === 0 ? <div className="text-sm text-zinc-500">No jobs yet.</div> : null}
            </div>
          ) : null}
        </section>
      </div>
    </Shell>
  )
}
