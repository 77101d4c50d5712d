/**
 * Named colors of the 16-color terminal palette, by 256-color index.
 */
export const TERMINAL_COLOR_NAMES: Readonly<Record<string, number>> = {
  black: 0,
  red: 1,
  green: 2,
  yellow: 3,
  blue: 4,
  magenta: 5,
  cyan: 6,
  white: 7,
  bright_black: 8,
  bright_red: 9,
  bright_green: 10,
  bright_yellow: 11,
  bright_blue: 12,
  bright_magenta: 13,
  bright_cyan: 14,
  bright_white: 15
}

/**
 * Converts a color name or a numeric string (0-255) to a palette index.
 * Returns null for anything else.
 */
export function toTerminalColor(value: string): number | null {
  const named = TERMINAL_COLOR_NAMES[value]
  if (named !== undefined) return named
  if (!/^\d{1,3}$/.test(value)) return null
  const index = Number.parseInt(value, 10)
  return index <= 255 ? index : null
}
