import type { FunctionContext } from '../_shared/context'
import { handleOptions } from '../_shared/cors'
import { errorResponse, json, methodNotAllowed } from '../_shared/http'
import { parseCoverListQuery } from '../_shared/requests'
import type { CoverRecord } from '../_shared/storage'

type CoverImagesResponse = {
  images: CoverRecord[]
}

export async function handler(req: Request, ctx: FunctionContext): Promise<Response> {
  const opt = handleOptions(req)
  if (opt) return opt
  if (req.method !== 'GET') return methodNotAllowed()

  try {
    const query = parseCoverListQuery(new URL(req.url).searchParams)
    const body: CoverImagesResponse = { images: await ctx.orchestrator.listCovers(query) }
    return json(body)
  } catch (e) {
    return errorResponse(e, ctx.log)
  }
}
