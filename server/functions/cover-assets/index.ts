import type { ClientAssetListing } from '../_shared/clientAssets'
import type { FunctionContext } from '../_shared/context'
import { handleOptions } from '../_shared/cors'
import { json, methodNotAllowed } from '../_shared/http'

type CoverAssetsResponse = {
  assets: readonly ClientAssetListing[]
}

export async function handler(req: Request, ctx: FunctionContext): Promise<Response> {
  const opt = handleOptions(req)
  if (opt) return opt
  if (req.method !== 'GET') return methodNotAllowed()

  const body: CoverAssetsResponse = { assets: ctx.orchestrator.listAssets() }
  return json(body)
}
