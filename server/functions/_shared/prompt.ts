import type { BrandingDescriptor } from './types'

export type GenerationInstruction = {
  prompt: string
  negative_prompt: string
}

export type PromptInput = {
  title: string
  client_id?: string | null
  custom_prompt?: string | null
  branding?: BrandingDescriptor | null
}

const BASE_THEME = 'professional cryptocurrency background, modern digital finance'

const QUALITY_MODIFIERS = 'high quality, professional, clean composition, 8k resolution'

// text, logos and watermarks are composited afterwards, never generated
export const NEGATIVE_PROMPT = 'text, letters, words, titles, watermarks, signatures, logos, low quality, blurry'

// first match wins, checked as substrings of the lowercased client id
const CLIENT_THEMES: ReadonlyArray<{ keywords: readonly string[]; theme: string }> = [
  { keywords: ['xdc'], theme: 'XDC network theme, enterprise blockchain, banking integration' },
  { keywords: ['hedera', 'hbar'], theme: 'Hedera hashgraph theme, distributed ledger technology' },
  { keywords: ['algorand'], theme: 'Algorand blockchain theme, proof of stake, green technology' },
  { keywords: ['constellation'], theme: 'Constellation DAG theme, distributed network visualization' },
  { keywords: ['hashpack'], theme: 'Hedera wallet theme, secure crypto storage' },
  { keywords: ['tha'], theme: 'THA blockchain theme, professional crypto services' },
  { keywords: ['genfinity'], theme: 'Genfinity media theme, crypto news and analysis' },
]

const TITLE_ACCENTS: ReadonlyArray<{ keyword: string; accent: string }> = [
  { keyword: 'bitcoin', accent: 'bitcoin orange theme' },
  { keyword: 'ethereum', accent: 'ethereum blue theme' },
  { keyword: 'defi', accent: 'decentralized finance symbols' },
]

export function clientTheme(clientId?: string | null): string | null {
  const id = clientId?.trim().toLowerCase()
  if (!id) return null
  return CLIENT_THEMES.find((t) => t.keywords.some((k) => id.includes(k)))?.theme ?? null
}

export function titleAccent(title: string): string | null {
  const t = title.toLowerCase()
  return TITLE_ACCENTS.find((a) => t.includes(a.keyword))?.accent ?? null
}

export function buildGenerationInstruction(input: PromptInput): GenerationInstruction {
  const custom = input.custom_prompt?.trim()
  if (custom) return { prompt: custom, negative_prompt: NEGATIVE_PROMPT }

  const parts = [BASE_THEME]
  const theme = clientTheme(input.client_id ?? input.branding?.asset_name)
  if (theme) parts.push(theme)
  const accent = titleAccent(input.title)
  if (accent) parts.push(accent)
  parts.push(QUALITY_MODIFIERS)
  return { prompt: parts.join(', '), negative_prompt: NEGATIVE_PROMPT }
}
