import sharp from 'sharp'
import { CompositionError, errorMessage } from './errors'
import type { ImageSize, TextStyle } from './types'

export const DEFAULT_TEXT_STYLE: TextStyle = {
  font_family: 'DejaVu Sans, Helvetica, Arial, sans-serif',
  title_color: '#ffffff',
  subtitle_color: '#ffffff',
  shadow_color: '#000000',
  shadow_opacity: 0.65,
  shadow_offset: 4,
  shadow_blur: 6,
}

// starting estimate only; every line is measured before it is placed
const GLYPH_WIDTH_EM = 0.56
const SIDE_MARGIN = 0.06
const TITLE_MAX_OF_HEIGHT = 0.11
const TITLE_MIN_OF_HEIGHT = 0.04
const SUBTITLE_OPACITY = 0.85
const TITLE_WEIGHT = 700
const SUBTITLE_WEIGHT = 400
// covers rounding of the line position
const FIT_SLACK_PX = 2
const INK_THRESHOLD = 64

export type CompositionRequest = {
  canvas: Buffer
  target_size: ImageSize
  watermark?: Buffer | null
  title: string
  subtitle?: string | null
  style?: Partial<TextStyle>
}

export type CompositionResult = {
  image: Buffer
  width: number
  height: number
}

/** Horizontal extent of rendered ink; `offset` is measured from the text origin. */
export type InkSpan = {
  offset: number
  width: number
}

export type InkMeasure = (text: string, fontSize: number, fontWeight: number) => Promise<InkSpan | null>

export type FittedLine = {
  text: string
  font_size: number
  x: number
  y: number
}

export type TextLayout = {
  center_x: number
  available_width: number
  title: FittedLine
  subtitle: FittedLine | null
}

// characters XML 1.0 cannot carry, not even as references
const XML_INVALID_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]/g

export function stripXmlInvalid(s: string): string {
  return s.replace(XML_INVALID_CHARS, '')
}

export function escapeXml(s: string): string {
  return stripXmlInvalid(s)
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;')
}

type TextElement = {
  text: string
  x: number
  y: number
  font_size: number
  weight: number
  fill: string
  opacity: number
  filter?: string
}

function textElement(t: TextElement): string {
  const filter = t.filter ? ` filter="url(#${t.filter})"` : ''
  return (
    `<text x="${t.x}" y="${t.y}" font-size="${t.font_size}" font-weight="${t.weight}" ` +
    `fill="${escapeXml(t.fill)}" fill-opacity="${t.opacity}"${filter}>${escapeXml(t.text)}</text>`
  )
}

function fontGroup(fontFamily: string, body: string): string {
  return `<g font-family="${escapeXml(fontFamily)}">${body}</g>`
}

/**
 * Renders the line white on black, exactly as the text layer draws it, and
 * scans the columns for ink. Null when nothing is drawn (no glyphs, no fonts).
 */
export function measureInkWith(fontFamily: string): InkMeasure {
  return async (text, fontSize, fontWeight) => {
    const origin = fontSize
    const width = Math.ceil(Array.from(text).length * fontSize * 1.4) + origin * 2
    const height = Math.ceil(fontSize * 2)
    const svg =
      `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}">` +
      `<rect width="100%" height="100%" fill="#000000"/>` +
      fontGroup(
        fontFamily,
        textElement({ text, x: origin, y: Math.round(fontSize * 1.4), font_size: fontSize, weight: fontWeight, fill: '#ffffff', opacity: 1 }),
      ) +
      `</svg>`
    const { data, info } = await sharp(Buffer.from(svg)).greyscale().raw().toBuffer({ resolveWithObject: true })

    let left = -1
    let right = -1
    for (let x = 0; x < info.width; x++) {
      for (let y = 0; y < info.height; y++) {
        if (data[(y * info.width + x) * info.channels] > INK_THRESHOLD) {
          if (left < 0) left = x
          right = x
          break
        }
      }
    }
    if (left < 0) return null
    return { offset: left - origin, width: right - left + 1 }
  }
}

export function estimateFontSize(text: string, availableWidth: number, maxFont: number, minFont: number): number {
  const fitted = Math.floor(availableWidth / (Math.max(1, Array.from(text).length) * GLYPH_WIDTH_EM))
  return Math.max(minFont, Math.min(maxFont, fitted))
}

type MeasuredLine = {
  text: string
  font_size: number
  ink: InkSpan | null
}

const fits = (ink: InkSpan | null, width: number) => !ink || ink.width <= width

/**
 * Shrinks the font until the measured ink fits `availableWidth`; at the
 * minimum size the longest prefix that fits with an ellipsis is kept.
 */
export async function fitLine(
  text: string,
  availableWidth: number,
  maxFont: number,
  minFont: number,
  weight: number,
  measure: InkMeasure,
): Promise<MeasuredLine> {
  let fontSize = estimateFontSize(text, availableWidth, maxFont, minFont)
  let ink = await measure(text, fontSize, weight)
  while (!fits(ink, availableWidth) && fontSize > minFont) {
    const scaled = ink ? Math.floor((fontSize * availableWidth) / ink.width) : fontSize - 1
    fontSize = Math.max(minFont, Math.min(fontSize - 1, scaled))
    ink = await measure(text, fontSize, weight)
  }
  if (fits(ink, availableWidth)) return { text, font_size: fontSize, ink }

  const chars = Array.from(text)
  if (chars.length <= 1) return { text, font_size: fontSize, ink }
  const truncated = (n: number) => `${chars.slice(0, n).join('').trimEnd()}…`
  let best: MeasuredLine = { text: truncated(1), font_size: fontSize, ink: await measure(truncated(1), fontSize, weight) }
  let lo = 2
  let hi = chars.length - 1
  while (lo <= hi) {
    const mid = Math.floor((lo + hi) / 2)
    const candidate = truncated(mid)
    const candidateInk = await measure(candidate, fontSize, weight)
    if (fits(candidateInk, availableWidth)) {
      best = { text: candidate, font_size: fontSize, ink: candidateInk }
      lo = mid + 1
    } else {
      hi = mid - 1
    }
  }
  return best
}

function centred(line: MeasuredLine, centerX: number, y: number): FittedLine {
  const x = line.ink ? Math.round(centerX - line.ink.width / 2 - line.ink.offset) : centerX
  return { text: line.text, font_size: line.font_size, x, y }
}

/**
 * Title baseline sits at a fixed point of the lower third, whatever the title
 * length; only the font size (and, past the minimum size, the text) adapts.
 * Lines are placed so their measured ink is centred.
 */
export async function layoutText(
  size: ImageSize,
  title: string,
  subtitle: string | null | undefined,
  measure: InkMeasure,
): Promise<TextLayout> {
  const { width, height } = size
  const padding = Math.round(width * SIDE_MARGIN)
  const available = Math.max(1, width - padding * 2)
  const fitWidth = Math.max(1, available - FIT_SLACK_PX)
  const centerX = Math.round(width / 2)
  const regionTop = Math.round((height * 2) / 3)
  const maxFont = Math.max(1, Math.round(height * TITLE_MAX_OF_HEIGHT))
  const minFont = Math.max(1, Math.min(maxFont, Math.round(height * TITLE_MIN_OF_HEIGHT)))

  const titleLine = await fitLine(stripXmlInvalid(title), fitWidth, maxFont, minFont, TITLE_WEIGHT, measure)
  const titleY = regionTop + Math.round((height - regionTop) * 0.4)

  let subtitleLine: FittedLine | null = null
  const sub = subtitle ? stripXmlInvalid(subtitle).trim() : ''
  if (sub) {
    const subMax = Math.max(1, Math.round(titleLine.font_size * 0.5))
    const subMin = Math.max(1, Math.min(subMax, Math.round(minFont * 0.6)))
    const fitted = await fitLine(sub, fitWidth, subMax, subMin, SUBTITLE_WEIGHT, measure)
    const y = titleY + Math.round(titleLine.font_size * 0.35) + Math.round(fitted.font_size * 1.2)
    subtitleLine = centred(fitted, centerX, y)
  }

  return {
    center_x: centerX,
    available_width: available,
    title: centred(titleLine, centerX, titleY),
    subtitle: subtitleLine,
  }
}

function linePair(line: FittedLine, weight: number, color: string, opacity: number, style: TextStyle): string {
  const shadow = textElement({
    ...line,
    y: line.y + style.shadow_offset,
    weight,
    fill: style.shadow_color,
    opacity: style.shadow_opacity,
    filter: 'text-shadow',
  })
  return shadow + textElement({ ...line, weight, fill: color, opacity })
}

export function buildTextLayerSvg(size: ImageSize, layout: TextLayout, style: TextStyle): string {
  let body = linePair(layout.title, TITLE_WEIGHT, style.title_color, 1, style)
  if (layout.subtitle) body += linePair(layout.subtitle, SUBTITLE_WEIGHT, style.subtitle_color, SUBTITLE_OPACITY, style)
  return (
    `<svg xmlns="http://www.w3.org/2000/svg" width="${size.width}" height="${size.height}" viewBox="0 0 ${size.width} ${size.height}">` +
    `<defs><filter id="text-shadow" x="-5%" y="-50%" width="110%" height="200%"><feGaussianBlur stdDeviation="${style.shadow_blur}"/></filter></defs>` +
    fontGroup(style.font_family, body) +
    `</svg>`
  )
}

export function assertDimensions(actual: { width?: number; height?: number }, target: ImageSize, stage: string) {
  if (actual.width !== target.width || actual.height !== target.height) {
    throw new CompositionError(
      `${stage} is ${actual.width ?? '?'}x${actual.height ?? '?'}, expected ${target.width}x${target.height}`,
    )
  }
}

async function expectSize(image: Buffer, target: ImageSize, stage: string) {
  const meta = await sharp(image).metadata()
  assertDimensions(meta, target, stage)
}

async function step<T>(stage: string, run: () => Promise<T>): Promise<T> {
  try {
    return await run()
  } catch (e) {
    if (e instanceof CompositionError) throw e
    throw new CompositionError(`${stage} failed: ${errorMessage(e)}`)
  }
}

/**
 * Canvas -> exact `target_size` PNG. Sizing is resize-to-cover followed by a
 * centre crop; the watermark is contained in a transparent full-canvas layer
 * and alpha-blended, then the text layer goes on top.
 */
export async function compose(req: CompositionRequest): Promise<CompositionResult> {
  const target = req.target_size
  if (!Number.isInteger(target.width) || !Number.isInteger(target.height) || target.width <= 0 || target.height <= 0) {
    throw new CompositionError(`Invalid target size ${target.width}x${target.height}`)
  }
  const style: TextStyle = { ...DEFAULT_TEXT_STYLE, ...req.style }

  const base = await step('canvas resize', () =>
    sharp(req.canvas)
      .resize(target.width, target.height, { fit: 'cover', position: 'centre', kernel: 'lanczos3' })
      .ensureAlpha()
      .png()
      .toBuffer(),
  )
  await step('canvas resize', () => expectSize(base, target, 'resized canvas'))

  const layers: sharp.OverlayOptions[] = []
  const watermark = req.watermark
  if (watermark) {
    const layer = await step('watermark layer', () =>
      sharp(watermark)
        .ensureAlpha()
        .resize(target.width, target.height, {
          fit: 'contain',
          position: 'centre',
          background: { r: 0, g: 0, b: 0, alpha: 0 },
        })
        .png()
        .toBuffer(),
    )
    await step('watermark layer', () => expectSize(layer, target, 'watermark layer'))
    layers.push({ input: layer, blend: 'over', top: 0, left: 0 })
  }

  const layout = await step('text layout', () =>
    layoutText(target, req.title, req.subtitle, measureInkWith(style.font_family)),
  )
  layers.push({ input: Buffer.from(buildTextLayerSvg(target, layout, style)), blend: 'over', top: 0, left: 0 })

  const image = await step('composite', () => sharp(base).composite(layers).removeAlpha().png().toBuffer())
  await step('composite', () => expectSize(image, target, 'final image'))

  return { image, width: target.width, height: target.height }
}
