import { numericQuantity } from 'numeric-quantity'
import { parseUnit } from './parseUnit.ts'

/** Unicode vulgar fractions mapped to ASCII. */
const UNICODE_FRACTIONS: Record<string, string> = {
  '¼': '1/4',
  '½': '1/2',
  '¾': '3/4',
  '⅓': '1/3',
  '⅔': '2/3',
  '⅛': '1/8',
  '⅜': '3/8',
  '⅝': '5/8',
  '⅞': '7/8',
}

/** Replace unicode fraction characters with ASCII equivalents ("1½" → "1 1/2"). */
export function normalizeUnicodeFractions(text: string): string {
  let result = text
  for (const [glyph, ascii] of Object.entries(UNICODE_FRACTIONS)) {
    result = result.replace(new RegExp(`(\\d)${glyph}`, 'g'), `$1 ${ascii}`)
    result = result.replace(new RegExp(glyph, 'g'), ascii)
  }
  return result
}

/** Leading quantity: mixed number, fraction, decimal (".5" included) or integer. */
const QTY_PATTERN = /^(\d+\s+\d+\/\d+|\d+\/\d+|\d*\.\d+|\d+)/

/**
 * A quantity ends at whitespace, the end of the text, or a known unit written
 * against it ("200g"). Anything else ("3-4", "2x") means there is no quantity.
 */
function endsQuantity(rest: string): boolean {
  if (rest.length === 0 || /^\s/.test(rest)) return true
  return /^[a-z]/i.test(rest) && parseUnit(rest).unit !== null
}

export interface QuantityResult {
  quantity: number | null
  remainder: string
}

/** Parse a numeric quantity from the front of a string. */
export function parseQuantity(text: string): QuantityResult {
  const trimmed = text.trim()

  const match = trimmed.match(QTY_PATTERN)
  if (match) {
    const rest = trimmed.slice(match[0].length)
    const token = match[1].startsWith('.') ? `0${match[1]}` : match[1]
    const value = numericQuantity(token)
    if (endsQuantity(rest) && Number.isFinite(value)) {
      return { quantity: value, remainder: rest.trim() }
    }
  }

  return { quantity: null, remainder: trimmed }
}
