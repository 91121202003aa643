import type { ReactNode } from 'react'
import { Link, NavLink } from 'react-router-dom'
import { getEnv } from '../lib/env'

const NAV = [
  { to: '/', label: 'Jobs', end: true },
  { to: '/covers', label: 'Stored covers', end: false },
] as const

function navClass({ isActive }: { isActive: boolean }): string {
  return (
    'rounded-lg px-3 py-1.5 text-sm transition ' +
    (isActive ? 'bg-white/10 text-white' : 'text-zinc-400 hover:bg-white/5 hover:text-zinc-200')
  )
}

export function Shell(props: { title?: string; children: ReactNode }) {
  const { functionsBase } = getEnv()
  return (
    <div className="min-h-full">
      <header className="border-b border-white/10 bg-zinc-950/50 backdrop-blur">
        <div className="mx-auto flex max-w-5xl flex-wrap items-center gap-4 px-4 py-3">
          <Link to="/" className="text-sm font-semibold tracking-tight text-white">
            Covers
          </Link>
          <nav className="flex items-center gap-1">
            {NAV.map((n) => (
              <NavLink key={n.to} to={n.to} end={n.end} className={navClass}>
                {n.label}
              </NavLink>
            ))}
          </nav>
          <div className="ml-auto flex items-center gap-3">
            {props.title ? <span className="max-w-xs truncate text-sm text-zinc-300">{props.title}</span> : null}
          </div>
        </div>
      </header>
      <main className="mx-auto max-w-5xl px-4 py-8">{props.children}</main>
      <footer className="border-t border-white/10 bg-black/10 py-6">
        <div className="mx-auto flex max-w-5xl flex-wrap justify-between gap-2 px-4 text-xs text-zinc-500">
          <span>Jobs are held in server memory and are lost on restart. Stored covers persist.</span>
          <span className="font-mono text-zinc-600">{functionsBase}</span>
        </div>
      </footer>
    </div>
  )
}
