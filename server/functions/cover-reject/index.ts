import type { FunctionContext } from '../_shared/context'
import { handleOptions } from '../_shared/cors'
import { errorResponse, json, methodNotAllowed, readJsonObject, resolveJobId, type RouteParams } from '../_shared/http'

export async function handler(req: Request, ctx: FunctionContext, params: RouteParams = {}): Promise<Response> {
  const opt = handleOptions(req)
  if (opt) return opt
  if (req.method !== 'POST') return methodNotAllowed()

  try {
    const jobId = resolveJobId(req, params.job_id, await readJsonObject(req))
    return json({ job: ctx.orchestrator.reject(jobId) })
  } catch (e) {
    return errorResponse(e, ctx.log)
  }
}
