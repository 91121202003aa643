import { describe, expect, it } from 'vitest'
import { ValidationError } from './errors'
import { parseAutomatedSubmission, parseCoverListQuery, parseManualSubmission, parseSizeString } from './requests'

const limits = { maxWidth: 4096, maxHeight: 4096 }

function issuesOf(run: () => unknown): string[] {
  try {
    run()
  } catch (e) {
    if (e instanceof ValidationError) return e.issues
    throw e
  }
  throw new Error('expected a ValidationError')
}

describe('parseSizeString', () => {
  it('reads WIDTHxHEIGHT', () => {
    expect(parseSizeString('1920x1080')).toEqual({ width: 1920, height: 1080 })
    expect(parseSizeString(' 800 X 600 ')).toEqual({ width: 800, height: 600 })
    expect(parseSizeString('1920by1080')).toBeNull()
  })
})

describe('parseAutomatedSubmission', () => {
  it('normalizes optional fields and defaults the size', () => {
    expect(parseAutomatedSubmission({ title: '  Bitcoin Hits 100k ', subtitle: '', client_id: 'bitcoin' }, limits)).toEqual({
      title: 'Bitcoin Hits 100k',
      subtitle: null,
      client_id: 'bitcoin',
      size: { width: 1800, height: 900 },
      idempotency_key: null,
    })
  })

  it('accepts the size as a string or an object', () => {
    expect(parseAutomatedSubmission({ title: 't', size: '1920x1080' }, limits).size).toEqual({ width: 1920, height: 1080 })
    expect(parseAutomatedSubmission({ title: 't', size: { width: 640, height: 320 } }, limits).size).toEqual({
      width: 640,
      height: 320,
    })
  })

  it('rejects a missing or blank title', () => {
    expect(issuesOf(() => parseAutomatedSubmission({ title: '   ' }, limits))).toEqual(['title: title is required'])
    expect(issuesOf(() => parseAutomatedSubmission({}, limits))).toEqual(['title: Required'])
  })

  it('drops control characters from the rendered text', () => {
    const sub = parseAutomatedSubmission({ title: 'Bitcoin\u0008 Hits 100k', subtitle: '\u0007Markets react' }, limits)
    expect(sub.title).toBe('Bitcoin Hits 100k')
    expect(sub.subtitle).toBe('Markets react')
    expect(issuesOf(() => parseAutomatedSubmission({ title: '\u0008\u001F' }, limits))).toEqual(['title: title is required'])
  })

  it('rejects an over-long title', () => {
    expect(() => parseAutomatedSubmission({ title: 'x'.repeat(201) }, limits)).toThrow(ValidationError)
    expect(parseAutomatedSubmission({ title: 'x'.repeat(200) }, limits).title).toHaveLength(200)
  })

  it('rejects non-positive, fractional and over-limit sizes', () => {
    expect(issuesOf(() => parseAutomatedSubmission({ title: 't', size: '0x900' }, limits))).toEqual([
      'size: width and height must be positive integers',
    ])
    expect(issuesOf(() => parseAutomatedSubmission({ title: 't', size: { width: 10.5, height: 10 } }, limits))).toEqual([
      'size: width and height must be positive integers',
    ])
    expect(issuesOf(() => parseAutomatedSubmission({ title: 't', size: '5000x100' }, limits))).toEqual([
      'size: must be at most 4096x4096',
    ])
    expect(issuesOf(() => parseAutomatedSubmission({ title: 't', size: 'big' }, limits))).toEqual([
      'size: expected WIDTHxHEIGHT',
    ])
  })

  it('reports a non-object body', () => {
    expect(() => parseAutomatedSubmission(null, limits)).toThrow(ValidationError)
  })
})

describe('parseManualSubmission', () => {
  it('defaults the manual-only fields', () => {
    expect(parseManualSubmission({ title: 'Weekly recap' }, limits)).toEqual({
      title: 'Weekly recap',
      subtitle: null,
      size: { width: 1800, height: 900 },
      idempotency_key: null,
      selected_assets: [],
      custom_prompt: null,
      text_style: {},
      watermark_base64: null,
      seed: null,
    })
  })

  it('decodes a base64 watermark, with or without a data url prefix', () => {
    const bytes = Buffer.from('overlay-bytes')
    const plain = parseManualSubmission({ title: 't', watermark_base64: bytes.toString('base64') }, limits)
    const dataUrl = parseManualSubmission(
      { title: 't', watermark_base64: `data:image/png;base64,${bytes.toString('base64')}` },
      limits,
    )
    expect(plain.watermark_base64?.equals(bytes)).toBe(true)
    expect(dataUrl.watermark_base64?.equals(bytes)).toBe(true)
    expect(issuesOf(() => parseManualSubmission({ title: 't', watermark_base64: '***' }, limits))).toEqual([
      'watermark_base64: expected base64 image data',
    ])
  })

  it('validates text style overrides', () => {
    expect(parseManualSubmission({ title: 't', text_style: { title_color: '#ffcc00', shadow_blur: 3 } }, limits).text_style).toEqual({
      title_color: '#ffcc00',
      shadow_blur: 3,
    })
    expect(issuesOf(() => parseManualSubmission({ title: 't', text_style: { title_color: 'red' } }, limits))).toEqual([
      'text_style.title_color: expected a #rgb or #rrggbb colour',
    ])
  })

  it('validates the seed', () => {
    expect(parseManualSubmission({ title: 't', seed: 42 }, limits).seed).toBe(42)
    expect(() => parseManualSubmission({ title: 't', seed: -1 }, limits)).toThrow(ValidationError)
  })
})

describe('parseCoverListQuery', () => {
  it('defaults to the first 50 covers of every client', () => {
    expect(parseCoverListQuery(new URLSearchParams(''))).toEqual({ limit: 50, offset: 0, client_id: null })
  })

  it('reads limit, offset and a trimmed client filter', () => {
    expect(parseCoverListQuery(new URLSearchParams('limit=5&offset=10&client_id=%20btc%20'))).toEqual({
      limit: 5,
      offset: 10,
      client_id: 'btc',
    })
  })

  it('rejects out-of-range paging', () => {
    expect(issuesOf(() => parseCoverListQuery(new URLSearchParams('limit=0')))).toEqual([
      'limit: Number must be greater than or equal to 1',
    ])
    expect(issuesOf(() => parseCoverListQuery(new URLSearchParams('limit=abc')))).toEqual([
      'limit: Expected number, received nan',
    ])
    expect(() => parseCoverListQuery(new URLSearchParams('offset=-1'))).toThrow(ValidationError)
  })
})
