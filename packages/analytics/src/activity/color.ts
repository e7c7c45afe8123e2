/**
 * Color helpers: activity scheme mapping and HSL to RGB conversion.
 */

import type { ColorScheme } from "@txgraph/graph"

export interface Hsl {
  /** Degrees, 0-360 */
  hue: number
  /** Percent, 0-100 */
  saturation: number
  /** Percent, 0-100 */
  lightness: number
}

export interface Rgb {
  red: number
  green: number
  blue: number
}

export const COLOR_SCHEMES: readonly ColorScheme[] = ["heatmap", "activity", "grayscale"]

/**
 * Map a normalized value (0-100) to an HSL triple.
 * - heatmap: red (0) to green (120)
 * - activity: blue (240) down to red (0)
 * - grayscale: black to white
 */
export function schemeToHsl(normalized: number, scheme: ColorScheme): Hsl {
  const n = Math.max(0, Math.min(100, normalized))
  switch (scheme) {
    case "heatmap":
      return { hue: n * 1.2, saturation: 100, lightness: 50 }
    case "activity":
      return { hue: 240 - n * 2.4, saturation: 100, lightness: 50 }
    case "grayscale":
      return { hue: 0, saturation: 0, lightness: n }
  }
}

/**
 * Sector-based HSL to RGB conversion. Channels are rounded to 0-255.
 */
export function hslToRgb({ hue, saturation, lightness }: Hsl): Rgb {
  const h = (((hue % 360) + 360) % 360) / 360
  const s = saturation / 100
  const l = lightness / 100

  if (s === 0) {
    const gray = toChannel(l)
    return { red: gray, green: gray, blue: gray }
  }

  const q = l < 0.5 ? l * (1 + s) : l + s - l * s
  const p = 2 * l - q
  return {
    red: toChannel(hueToChannel(p, q, h + 1 / 3)),
    green: toChannel(hueToChannel(p, q, h)),
    blue: toChannel(hueToChannel(p, q, h - 1 / 3)),
  }
}

export function rgbToHex({ red, green, blue }: Rgb): string {
  return `#${[red, green, blue].map((c) => c.toString(16).padStart(2, "0")).join("")}`
}

export function hslToHex(hsl: Hsl): string {
  return rgbToHex(hslToRgb(hsl))
}

function hueToChannel(p: number, q: number, t: number): number {
  let x = t
  if (x < 0) x += 1
  if (x > 1) x -= 1
  if (x < 1 / 6) return p + (q - p) * 6 * x
  if (x < 1 / 2) return q
  if (x < 2 / 3) return p + (q - p) * (2 / 3 - x) * 6
  return p
}

function toChannel(fraction: number): number {
  return Math.max(0, Math.min(255, Math.round(fraction * 255)))
}
