import { useEffect, useState, type FormEvent } from 'react'
import { Link, useSearchParams } from 'react-router-dom'
import { coverFilename, coverImagesPath, downloadFileFromUrl, isBrowsableRef } from '../lib/clientUtils'
import { describeError, functionsGet } from '../lib/functionsClient'
import { CoverImagesResponseSchema, type CoverImage } from '../lib/types'
import { Shell } from '../ui/Shell'

const PAGE_SIZE = 24

export function CoversPage() {
  const [params, setParams] = useSearchParams()
  const clientId = params.get('client_id')?.trim() ?? ''
  const offset = Math.max(0, Number(params.get('offset')) || 0)

  const [draftClient, setDraftClient] = useState(clientId)
  const [images, setImages] = useState<CoverImage[]>([])
  const [error, setError] = useState<string | null>(null)
  const [isLoading, setIsLoading] = useState(true)

  useEffect(() => {
    let cancelled = false
    setIsLoading(true)
    setError(null)
    functionsGet(coverImagesPath({ clientId, offset, limit: PAGE_SIZE }), CoverImagesResponseSchema)
      .then((res) => {
        if (!cancelled) setImages(res.images)
      })
      .catch((err: unknown) => {
        if (!cancelled) setError(describeError(err, 'Could not load stored covers.'))
      })
      .finally(() => {
        if (!cancelled) setIsLoading(false)
      })
    return () => {
      cancelled = true
    }
  }, [clientId, offset])

  function go(next: { client_id?: string; offset?: number }) {
    const q = new URLSearchParams()
    const c = next.client_id ?? clientId
    const o = next.offset ?? offset
    if (c) q.set('client_id', c)
    if (o > 0) q.set('offset', String(o))
    setParams(q)
  }

  function onFilter(e: FormEvent) {
    e.preventDefault()
    go({ client_id: draftClient.trim(), offset: 0 })
  }

  return (
    <Shell title="Stored covers">
      <div className="grid gap-6">
        <form onSubmit={onFilter} className="card flex flex-wrap items-end gap-3 p-5">
          <label className="grid gap-1 text-sm">
            <span className="text-zinc-400">Client</span>
            <input
              value={draftClient}
              onChange={(e) => setDraftClient(e.target.value)}
              placeholder="all clients"
              className="h-10 rounded-lg border border-white/10 bg-zinc-950 px-3 text-sm outline-none focus:border-white/20"
            />
          </label>
          <button type="submit" className="btn-primary h-10 px-4">
            Filter
          </button>
          {clientId ? (
            <button
              type="button"
              onClick={() => {
                setDraftClient('')
                go({ client_id: '', offset: 0 })
              }}
              className="btn-dark h-10 px-4"
            >
              Clear
            </button>
          ) : null}
        </form>

        {isLoading ? <div className="text-sm text-zinc-400">Loading...</div> : null}
        {error ? <div className="text-sm text-red-300">Error: {error}</div> : null}

        {!isLoading && !error ? (
          <div className="grid gap-3 sm:grid-cols-2 lg:grid-cols-3">
            {images.map((img) => (
              <div key={img.job_id} className="card overflow-hidden">
                {isBrowsableRef(img.result_ref) ? (
                  <img src={img.result_ref} alt={img.title} className="aspect-[2/1] w-full bg-black object-cover" />
                ) : (
                  <div className="grid aspect-[2/1] place-items-center bg-black/40 text-xs text-zinc-500">{img.result_ref}</div>
                )}
                <div className="grid gap-1 p-3 text-sm">
                  <Link to={`/jobs/${img.job_id}`} className="font-semibold hover:underline">
                    {img.title}
                  </Link>
                  {img.subtitle ? <div className="text-xs text-zinc-400">{img.subtitle}</div> : null}
                  <div className="text-xs text-zinc-600">
                    {img.client_id ?? 'no client'} / {img.width}x{img.height} / {new Date(img.created_at).toLocaleString()}
                  </div>
                  {isBrowsableRef(img.result_ref) ? (
                    <button
                      onClick={() => void downloadFileFromUrl(img.result_ref, coverFilename(img))}
                      className="btn-dark mt-1 h-8 justify-self-start px-3 text-xs"
                    >
                      Download
                    </button>
                  ) : null}
                </div>
              </div>
            ))}
            {images.length === 0 ? <div className="text-sm text-zinc-500">No stored covers.</div> : null}
          </div>
        ) : null}

        <div className="flex items-center justify-between">
          <button
            disabled={offset === 0 || isLoading}
            onClick={() => go({ offset: Math.max(0, offset - PAGE_SIZE) })}
            className="btn-dark h-9 px-3 text-xs"
          >
            Newer
          </button>
          <span className="text-xs text-zinc-500">
            {offset + 1}-{offset + images.length}
          </span>
          <button
            disabled={images.length < PAGE_SIZE || isLoading}
            onClick={() => go({ offset: offset + PAGE_SIZE })}
            className="btn-dark h-9 px-3 text-xs"
          >
            Older
          </button>
        </div>
      </div>
    </Shell>
  )
}
