import { describe, expect, it } from 'vitest'
import { NEGATIVE_PROMPT, buildGenerationInstruction, clientTheme, titleAccent } from './prompt'

describe('buildGenerationInstruction', () => {
  it('adds the title accent to the base theme', () => {
    expect(buildGenerationInstruction({ title: 'Bitcoin Hits 100k', client_id: 'bitcoin' })).toEqual({
      prompt:
        'professional cryptocurrency background, modern digital finance, bitcoin orange theme, high quality, professional, clean composition, 8k resolution',
      negative_prompt: NEGATIVE_PROMPT,
    })
  })

  it('adds the client theme for a known network', () => {
    const { prompt } = buildGenerationInstruction({ title: 'Weekly recap', client_id: 'XDC_Network' })
    expect(prompt).toBe(
      'professional cryptocurrency background, modern digital finance, XDC network theme, enterprise blockchain, banking integration, high quality, professional, clean composition, 8k resolution',
    )
  })

  it('falls back to the branding asset name for the client theme', () => {
    const { prompt } = buildGenerationInstruction({
      title: 'Weekly recap',
      branding: { asset_name: 'algorand_lora', blend_weight: 0.7 },
    })
    expect(prompt).toContain('Algorand blockchain theme')
  })

  it('lets a custom prompt replace the generated one', () => {
    expect(buildGenerationInstruction({ title: 'Bitcoin', client_id: 'xdc', custom_prompt: '  neon city at night ' })).toEqual({
      prompt: 'neon city at night',
      negative_prompt: NEGATIVE_PROMPT,
    })
  })
})

describe('keyword lookups', () => {
  it('matches client themes by substring, first rule wins', () => {
    expect(clientTheme('hbar_fans')).toBe('Hedera hashgraph theme, distributed ledger technology')
    expect(clientTheme('unknown-co')).toBeNull()
    expect(clientTheme(null)).toBeNull()
  })

  it('matches title accents case-insensitively', () => {
    expect(titleAccent('ETHEREUM merge')).toBe('ethereum blue theme')
    expect(titleAccent('The DeFi summer')).toBe('decentralized finance symbols')
    expect(titleAccent('Weekly recap')).toBeNull()
  })
})
