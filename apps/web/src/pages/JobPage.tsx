import { useEffect, useState } from 'react'
import { Link, useParams } from 'react-router-dom'
import { ApiError, describeError, functionsGet, functionsPost, functionsUrl } from '../lib/functionsClient'
import { copyText, coverFilename, downloadFileFromUrl, formatSize, formatStatus, isBrowsableRef } from '../lib/clientUtils'
import { JobResponseSchema, TERMINAL, type CoverJob } from '../lib/types'
import { ConfirmModal } from '../ui/ConfirmModal'
import { Shell } from '../ui/Shell'

type Decision = 'approve' | 'reject'

function hasPreview(job: CoverJob): boolean {
  return job.status === 'awaiting_approval' || (job.status === 'completed' && job.fulfillment === 'pending_persistence')
}

export function JobPage() {
  const { id } = useParams()
  const jobId = id ?? ''
  const [job, setJob] = useState<CoverJob | null>(null)
  const [error, setError] = useState<string | null>(null)
  const [isLoading, setIsLoading] = useState(true)
  const [pendingDecision, setPendingDecision] = useState<Decision | null>(null)
  const [isDeciding, setIsDeciding] = useState(false)
  const [decisionMsg, setDecisionMsg] = useState<string | null>(null)
  const [copied, setCopied] = useState(false)

  const status = job?.status
  // awaiting_approval only moves on a decision made here
  const isPolling = !status || (!TERMINAL.includes(status) && status !== 'awaiting_approval')

  async function refresh() {
    if (!jobId) return
    setError(null)
    try {
      const res = await functionsGet(`cover-status/${encodeURIComponent(jobId)}`, JobResponseSchema)
      setJob(res.job)
    } catch (err) {
      setError(describeError(err, 'Could not load the job.'))
    } finally {
      setIsLoading(false)
    }
  }

  useEffect(() => {
    setIsLoading(true)
    void refresh()
    // eslint-disable-next-line react-hooks/exhaustive-deps
  }, [jobId])

  useEffect(() => {
    if (!isPolling) return
    const t = window.setInterval(() => {
      void refresh()
    }, 2500)
    return () => window.clearInterval(t)
    // eslint-disable-next-line react-hooks/exhaustive-deps
  }, [jobId, isPolling])

  async function decide(decision: Decision) {
    setIsDeciding(true)
    setDecisionMsg(null)
    try {
      const res = await functionsPost(`cover-${decision}/${encodeURIComponent(jobId)}`, {}, JobResponseSchema)
      setJob(res.job)
      setDecisionMsg(decision === 'approve' ? 'Approved. The cover is being stored.' : 'Rejected. The preview was discarded.')
    } catch (err) {
      if (err instanceof ApiError && err.kind === 'AlreadyDecided') {
        setDecisionMsg('This job was already decided; showing the recorded decision.')
        await refresh()
      } else {
        setDecisionMsg(describeError(err, 'The decision could not be recorded.'))
      }
    } finally {
      setIsDeciding(false)
      setPendingDecision(null)
    }
  }

  async function onCopy(text: string) {
    await copyText(text)
    setCopied(true)
    window.setTimeout(() => setCopied(false), 1500)
  }

  const previewUrl = job && hasPreview(job) ? functionsUrl(`cover-preview/${encodeURIComponent(job.job_id)}?t=${encodeURIComponent(job.updated_at)}`) : null
  const resultUrl = job && isBrowsableRef(job.result_ref) ? job.result_ref : null

  return (
    <Shell title={job ? job.title : jobId.slice(0, 8)}>
      <div className="grid gap-6">
        <div className="flex flex-wrap items-center justify-between gap-3">
          <Link to="/" className="text-sm text-zinc-400 hover:text-white">
            ← All jobs
          </Link>
          <button onClick={() => void refresh()} className="btn-dark h-9 px-3 text-xs">
            Refresh
          </button>
        </div>

        {isLoading ? <div className="text-sm text-zinc-400">Loading...</div> : null}
        {error ? <div className="card whitespace-pre-wrap p-4 text-sm text-red-300">Error: {error}</div> : null}

        {job ? (
          <>
            <section className="card p-5">
              <div className="flex flex-wrap items-start justify-between gap-3">
                <div className="min-w-0">
                  <h1 className="text-xl font-semibold tracking-tight">{job.title}</h1>
                  {job.subtitle ? <p className="mt-1 text-sm text-zinc-400">{job.subtitle}</p> : null}
                </div>
                <span className="rounded-full border border-white/10 px-3 py-1 text-xs text-zinc-300">
                  {formatStatus(job.status)}
                  {isPolling ? ' …' : ''}
                </span>
              </div>
              <dl className="mt-4 grid gap-2 text-xs text-zinc-400 md:grid-cols-2">
                <div>
                  <dt className="inline text-zinc-500">job: </dt>
                  <dd className="inline font-mono">{job.job_id}</dd>
                </div>
                <div>
                  <dt className="inline text-zinc-500">workflow: </dt>
                  <dd className="inline">{job.workflow}</dd>
                </div>
                <div>
                  <dt className="inline text-zinc-500">size: </dt>
                  <dd className="inline">{formatSize(job)}</dd>
                </div>
                <div>
                  <dt className="inline text-zinc-500">branding: </dt>
                  <dd className="inline">
                    {job.branding ? `${job.branding.asset_name} (blend ${job.branding.blend_weight})` : 'none'}
                  </dd>
                </div>
                {job.client_id ? (
                  <div>
                    <dt className="inline text-zinc-500">client: </dt>
                    <dd className="inline">{job.client_id}</dd>
                  </div>
                ) : null}
                {job.selected_assets.length > 0 ? (
                  <div>
                    <dt className="inline text-zinc-500">assets: </dt>
                    <dd className="inline">{job.selected_assets.join(', ')}</dd>
                  </div>
                ) : null}
              </dl>
              {job.error ? (
                <div className="mt-4 rounded-lg border border-red-500/30 bg-red-500/10 p-3 text-sm text-red-200">
                  {job.error.kind}: {job.error.message}
                </div>
              ) : null}
              {job.fulfillment === 'pending_persistence' ? (
                <div className="mt-4 rounded-lg border border-amber-500/30 bg-amber-500/10 p-3 text-sm text-amber-200">
                  The cover was generated but could not be stored
                  {job.fulfillment_error ? `: ${job.fulfillment_error.message}` : '.'} The preview below is held by the
                  server until it restarts.
                </div>
              ) : null}
            </section>

            {previewUrl ? (
              <section className="card p-5">
                <h2 className="text-base font-semibold">Preview</h2>
                <img
                  src={previewUrl}
                  alt={job.title}
                  className="mt-3 w-full rounded-xl border border-white/10"
                  style={{ aspectRatio: `${job.target_size.width} / ${job.target_size.height}` }}
                />
                {job.status === 'awaiting_approval' ? (
                  <div className="mt-4 flex flex-wrap gap-2">
                    <button onClick={() => setPendingDecision('approve')} disabled={isDeciding} className="btn-primary h-10">
                      Approve
                    </button>
                    <button onClick={() => setPendingDecision('reject')} disabled={isDeciding} className="btn-danger h-10">
                      Reject
                    </button>
                  </div>
                ) : (
                  <button
                    onClick={() => void downloadFileFromUrl(previewUrl, coverFilename(job))}
                    className="btn-dark mt-4 h-9 px-3 text-xs"
                  >
                    Download
                  </button>
                )}
              </section>
            ) : null}

            {job.result_ref ? (
              <section className="card p-5">
                <h2 className="text-base font-semibold">Result</h2>
                <div className="mt-3 flex flex-wrap items-center gap-2 text-sm">
                  <code className="min-w-0 flex-1 truncate rounded-lg bg-zinc-950 px-3 py-2 text-xs">{job.result_ref}</code>
                  <button onClick={() => void onCopy(job.result_ref ?? '')} className="btn-dark h-9 px-3 text-xs">
                    {copied ? 'Copied' : 'Copy'}
                  </button>
                  {resultUrl ? (
                    <button
                      onClick={() => void downloadFileFromUrl(resultUrl, coverFilename(job))}
                      className="btn-dark h-9 px-3 text-xs"
                    >
                      Download
                    </button>
                  ) : null}
                </div>
                {resultUrl ? (
                  <img src={resultUrl} alt={job.title} className="mt-3 w-full rounded-xl border border-white/10" />
                ) : null}
              </section>
            ) : null}

            {decisionMsg ? <div className="text-sm text-zinc-300">{decisionMsg}</div> : null}

            <section className="card p-5">
              <h2 className="text-base font-semibold">History</h2>
              <ol className="mt-3 grid gap-1 text-xs text-zinc-400">
                {job.history.map((h) => (
                  <li key={`${h.status}-${h.at}`}>
                    <span className="text-zinc-500">{new Date(h.at).toLocaleTimeString()}</span> {formatStatus(h.status)}
                  </li>
                ))}
              </ol>
            </section>
          </>
        ) : null}
      </div>

      <ConfirmModal
        open={pendingDecision !== null}
        tone={pendingDecision ?? 'approve'}
        title={pendingDecision === 'reject' ? 'Reject this cover?' : 'Approve this cover?'}
        busy={isDeciding}
        onConfirm={() => {
          if (pendingDecision) void decide(pendingDecision)
        }}
        onClose={() => setPendingDecision(null)}
      />
    </Shell>
  )
}
