export interface OptionalMarkerResult {
  text: string
  optional: boolean
}

const OPTIONAL_PATTERN = /\([^)]*\boptional\b[^)]*\)/i

/**
 * Find a parenthetical mentioning "optional", e.g. "(optional)" or
 * "(Optional, for garnish)", and strip it from the text.
 * Other parentheticals are left in place.
 */
export function parseParenthetical(text: string): OptionalMarkerResult {
  const match = text.match(OPTIONAL_PATTERN)
  if (!match) return { text, optional: false }

  const cleaned = text
    .replace(match[0], ' ')
    .replace(/\s{2,}/g, ' ')
    .trim()

  return { text: cleaned, optional: true }
}
