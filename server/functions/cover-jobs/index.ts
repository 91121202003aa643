import type { FunctionContext } from '../_shared/context'
import { handleOptions } from '../_shared/cors'
import { json, methodNotAllowed } from '../_shared/http'
import type { Job } from '../_shared/types'

type CoverJobsResponse = {
  jobs: Job[]
}

export async function handler(req: Request, ctx: FunctionContext): Promise<Response> {
  const opt = handleOptions(req)
  if (opt) return opt
  if (req.method !== 'GET') return methodNotAllowed()

  const url = new URL(req.url)
  const limitRaw = url.searchParams.get('limit') ?? '20'
  const body: CoverJobsResponse = { jobs: ctx.orchestrator.listJobs(Number(limitRaw) || 20) }
  return json(body)
}
