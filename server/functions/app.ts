import { Hono } from 'hono'
import type { FunctionContext } from './_shared/context'
import { errorResponse, json } from './_shared/http'
import { handler as coverApprove } from './cover-approve'
import { handler as coverAssets } from './cover-assets'
import { handler as coverImages } from './cover-images'
import { handler as coverJobs } from './cover-jobs'
import { handler as coverPreview } from './cover-preview'
import { handler as coverReject } from './cover-reject'
import { handler as coverStatus } from './cover-status'
import { handler as coverSubmitAutomated } from './cover-submit-automated'
import { handler as coverSubmitManual } from './cover-submit-manual'

export const FUNCTIONS_BASE = '/functions/v1'

/** Routes every function under `/functions/v1/<name>`, with `/<name>/:job_id` where the function takes a job. */
export function createApp(ctx: FunctionContext) {
  const app = new Hono().basePath(FUNCTIONS_BASE)

  app.all('/cover-submit-automated', (c) => coverSubmitAutomated(c.req.raw, ctx))
  app.all('/cover-submit-manual', (c) => coverSubmitManual(c.req.raw, ctx))
  app.all('/cover-jobs', (c) => coverJobs(c.req.raw, ctx))
  app.all('/cover-assets', (c) => coverAssets(c.req.raw, ctx))
  app.all('/cover-images', (c) => coverImages(c.req.raw, ctx))

  app.all('/cover-status', (c) => coverStatus(c.req.raw, ctx))
  app.all('/cover-status/:job_id', (c) => coverStatus(c.req.raw, ctx, { job_id: c.req.param('job_id') }))
  app.all('/cover-preview', (c) => coverPreview(c.req.raw, ctx))
  app.all('/cover-preview/:job_id', (c) => coverPreview(c.req.raw, ctx, { job_id: c.req.param('job_id') }))
  app.all('/cover-approve', (c) => coverApprove(c.req.raw, ctx))
  app.all('/cover-approve/:job_id', (c) => coverApprove(c.req.raw, ctx, { job_id: c.req.param('job_id') }))
  app.all('/cover-reject', (c) => coverReject(c.req.raw, ctx))
  app.all('/cover-reject/:job_id', (c) => coverReject(c.req.raw, ctx, { job_id: c.req.param('job_id') }))

  app.notFound(() => json({ error: 'Not found' }, 404))
  app.onError((err) => errorResponse(err, ctx.log))
  return app
}
