export type AppEnv = {
  functionsBase: string
}

function getOptionalEnv(key: string): string | undefined {
  const val: unknown = import.meta.env[key]
  return typeof val === 'string' && val.trim() ? val.trim() : undefined
}

/**
 * Read lazily so a missing value surfaces as a request error, not a blank
 * screen at import time. The default goes through the dev server proxy.
 */
export function getEnv(): AppEnv {
  return { functionsBase: getOptionalEnv('VITE_COVER_FUNCTIONS_BASE') ?? '/functions/v1' }
}
