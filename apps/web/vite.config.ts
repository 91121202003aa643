import { defineConfig, loadEnv } from 'vite'
import react from '@vitejs/plugin-react'
import fs from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'

function parseEnvFile(filePath: string): Record<string, string> {
  if (!fs.existsSync(filePath)) return {}
  const raw = fs.readFileSync(filePath, 'utf8')
  const out: Record<string, string> = {}
  for (const line of raw.split(/\r?\n/)) {
    const trimmed = line.trim()
    if (!trimmed || trimmed.startsWith('#')) continue
    const eq = trimmed.indexOf('=')
    if (eq === -1) continue
    const key = trimmed.slice(0, eq).trim()
    let val = trimmed.slice(eq + 1).trim()
    if ((val.startsWith('"') && val.endsWith('"')) || (val.startsWith("'") && val.endsWith("'"))) {
      val = val.slice(1, -1)
    }
    if (key) out[key] = val
  }
  return out
}

// https://vite.dev/config/
export default defineConfig(({ mode }) => {
  // apps/web, wherever vite is started from
  const root = path.dirname(fileURLToPath(import.meta.url))

  // `env.local` (no leading dot) for environments that cannot create dotfiles
  const localNoDotEnv = parseEnvFile(path.join(root, 'env.local'))
  for (const [k, v] of Object.entries(localNoDotEnv)) {
    if (process.env[k] === undefined) process.env[k] = v
  }

  const env = loadEnv(mode, root, '')
  const functionsTarget = env.COVER_FUNCTIONS_ORIGIN || process.env.COVER_FUNCTIONS_ORIGIN || 'http://localhost:8787'

  return {
    root,
    plugins: [react()],
    server: {
      proxy: {
        '/functions': { target: functionsTarget, changeOrigin: true },
      },
    },
  }
})
