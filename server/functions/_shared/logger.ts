export type LogLevel = 'info' | 'warn' | 'error'

export type LogSink = {
  log: (...args: unknown[]) => void
  warn: (...args: unknown[]) => void
  error: (...args: unknown[]) => void
}

export type Logger = (level: LogLevel, msg: string, data?: Record<string, unknown>) => void

const TAG = '[covergen]'

export function createLogger(sink: LogSink = console): Logger {
  return (level, msg, data) => {
    const payload = data ? { msg, ...data } : { msg }
    if (level === 'error') sink.error(TAG, payload)
    else if (level === 'warn') sink.warn(TAG, payload)
    else sink.log(TAG, payload)
  }
}

export const silentLogger: Logger = () => {}
