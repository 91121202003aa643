import type { FunctionContext } from '../_shared/context'
import { handleOptions } from '../_shared/cors'
import { errorResponse, json, methodNotAllowed, resolveJobId, type RouteParams } from '../_shared/http'
import type { Job } from '../_shared/types'

type CoverStatusResponse = {
  job: Job
}

export async function handler(req: Request, ctx: FunctionContext, params: RouteParams = {}): Promise<Response> {
  const opt = handleOptions(req)
  if (opt) return opt
  if (req.method !== 'GET') return methodNotAllowed()

  try {
    const job = ctx.orchestrator.getStatus(resolveJobId(req, params.job_id))
    const body: CoverStatusResponse = { job }
    return json(body)
  } catch (e) {
    return errorResponse(e, ctx.log)
  }
}
