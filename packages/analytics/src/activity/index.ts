export { ActivityColorMapper, normalize } from "./activity-color-mapper"
export type { ActivityColorMapperOptions, ActivityRecord, ActivityReport, ValueRange } from "./activity-color-mapper"
export { COLOR_SCHEMES, schemeToHsl, hslToRgb, rgbToHex, hslToHex } from "./color"
export type { Hsl, Rgb } from "./color"
