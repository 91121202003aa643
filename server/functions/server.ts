import { serve } from '@hono/node-server'
import { createApp } from './app'
import { loadConfig } from './_shared/config'
import { createContext } from './_shared/context'

const config = loadConfig()
const ctx = await createContext(config)
const app = createApp(ctx)

serve({ fetch: app.fetch, port: config.port }, (info) => {
  ctx.log('info', 'functions listening', { url: `http://localhost:${info.port}/functions/v1` })
})
