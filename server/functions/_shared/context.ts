import { ClientAssetResolver, loadClientAssetTableFile } from './clientAssets'
import type { CoverConfig } from './config'
import { MockInferenceEngine, OpenAIImageEngine, openAIEngineOptionsFromEnv, type InferenceEngine } from './inference'
import { JobStore } from './jobStore'
import { createLogger, type Logger } from './logger'
import { JobOrchestrator } from './orchestrator'
import { MemoryCoverStorage, SupabaseCoverStorage, getSupabaseServiceClient, type CoverStorage } from './storage'
import { FileWatermarkSource } from './watermarks'

export type FunctionContext = {
  config: CoverConfig
  orchestrator: JobOrchestrator
  log: Logger
}

type Env = Record<string, string | undefined>

export async function createContext(config: CoverConfig, env: Env = process.env, log: Logger = createLogger()): Promise<FunctionContext> {
  let supabaseStorage: SupabaseCoverStorage | null = null
  if (config.storage === 'supabase' || config.clientAssetsSource === 'supabase') {
    supabaseStorage = new SupabaseCoverStorage(getSupabaseServiceClient(env), config.bucket, log)
  }

  const table = supabaseStorage && config.clientAssetsSource === 'supabase'
    ? await supabaseStorage.fetchClientAssetTable()
    : await loadClientAssetTableFile(config.clientAssetsPath)
  const assets = ClientAssetResolver.fromTable(table)

  const engine: InferenceEngine =
    config.engine === 'openai' ? new OpenAIImageEngine(openAIEngineOptionsFromEnv(env)) : new MockInferenceEngine()
  const storage: CoverStorage = config.storage === 'supabase' && supabaseStorage ? supabaseStorage : new MemoryCoverStorage()

  const orchestrator = new JobOrchestrator({
    store: new JobStore({ idempotencyWindowMs: config.idempotencyWindowMs }),
    assets,
    engine,
    storage,
    watermarks: new FileWatermarkSource(config.watermarkDir, config.defaultWatermark),
    limits: { maxWidth: config.maxWidth, maxHeight: config.maxHeight },
    inferenceTimeoutMs: config.inferenceTimeoutMs,
    log,
  })

  log('info', 'context ready', {
    engine: engine.name,
    storage: storage.name,
    assets: assets.list().length,
    inference_timeout_ms: config.inferenceTimeoutMs,
  })
  return { config, orchestrator, log }
}
