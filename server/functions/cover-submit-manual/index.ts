import type { FunctionContext } from '../_shared/context'
import { handleOptions } from '../_shared/cors'
import { errorResponse, json, methodNotAllowed, readJsonObject, withIdempotencyHeader } from '../_shared/http'

export async function handler(req: Request, ctx: FunctionContext): Promise<Response> {
  const opt = handleOptions(req)
  if (opt) return opt
  if (req.method !== 'POST') return methodNotAllowed()

  try {
    const body = withIdempotencyHeader(req, await readJsonObject(req))
    const out = ctx.orchestrator.submitManual(body)
    return json(out, out.created ? 202 : 200)
  } catch (e) {
    return errorResponse(e, ctx.log)
  }
}
