import type { FunctionContext } from '../_shared/context'
import { handleOptions } from '../_shared/cors'
import { errorResponse, methodNotAllowed, png, resolveJobId, type RouteParams } from '../_shared/http'

export async function handler(req: Request, ctx: FunctionContext, params: RouteParams = {}): Promise<Response> {
  const opt = handleOptions(req)
  if (opt) return opt
  if (req.method !== 'GET') return methodNotAllowed()

  try {
    return png(ctx.orchestrator.getPreview(resolveJobId(req, params.job_id)))
  } catch (e) {
    return errorResponse(e, ctx.log)
  }
}
