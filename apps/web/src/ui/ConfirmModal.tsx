import { useEffect, useRef, type ReactNode } from 'react'

export type ConfirmTone = 'approve' | 'reject'

/** Decision dialog: Enter confirms, Escape or the backdrop cancels unless a request is in flight. */
export function ConfirmModal(props: {
  open: boolean
  tone: ConfirmTone
  title: string
  children?: ReactNode
  busy?: boolean
  onConfirm: () => void
  onClose: () => void
}) {
  const confirmRef = useRef<HTMLButtonElement | null>(null)
  const { open, busy, onConfirm, onClose } = props

  useEffect(() => {
    if (!open) return
    const prevOverflow = document.body.style.overflow
    document.body.style.overflow = 'hidden'
    const t = window.setTimeout(() => confirmRef.current?.focus(), 0)

    function onKeyDown(e: KeyboardEvent) {
      if (busy) return
      if (e.key === 'Escape') onClose()
      if (e.key === 'Enter') {
        e.preventDefault()
        onConfirm()
      }
    }
    window.addEventListener('keydown', onKeyDown)
    return () => {
      window.clearTimeout(t)
      window.removeEventListener('keydown', onKeyDown)
      document.body.style.overflow = prevOverflow
    }
  }, [open, busy, onConfirm, onClose])

  if (!open) return null

  const reject = props.tone === 'reject'
  const label = reject ? (busy ? 'Rejecting...' : 'Reject') : busy ? 'Approving...' : 'Approve'

  return (
    <div className="fixed inset-0 z-50" role="dialog" aria-modal="true" aria-label={props.title}>
      <div className="absolute inset-0 bg-black/60 backdrop-blur-sm" onClick={() => (busy ? undefined : onClose())} />
      <div className="absolute inset-0 grid place-items-center p-4">
        <div
          className={
            'w-full max-w-lg overflow-hidden rounded-2xl border bg-zinc-950/80 shadow-2xl ' +
            (reject ? 'border-red-500/30' : 'border-emerald-500/30')
          }
        >
          <div className="p-5">
            <div className="text-base font-semibold">{props.title}</div>
            <div className="mt-2 text-sm leading-6 text-zinc-300">
              {reject
                ? 'The preview is discarded and nothing is stored.'
                : 'The cover is uploaded to storage and the job completes.'}{' '}
              A decision cannot be changed.
            </div>
            {props.children ? <div className="mt-4">{props.children}</div> : null}
          </div>
          <div className="flex flex-wrap items-center justify-end gap-2 border-t border-white/10 bg-black/20 p-4">
            <button onClick={() => onClose()} disabled={busy} className="btn-dark h-10">
              Keep reviewing
            </button>
            <button
              ref={confirmRef}
              onClick={() => onConfirm()}
              disabled={busy}
              className={(reject ? 'btn-danger' : 'btn-primary') + ' h-10'}
            >
              {label}
            </button>
          </div>
        </div>
      </div>
    </div>
  )
}
