import { UNIT_VOCABULARY, lookupUnit } from '@domain/constants/units.ts'

export interface UnitResult {
  unit: string | null
  remainder: string
}

// Longest first so "fl oz" wins over a shorter key
const UNIT_KEYS = Object.keys(UNIT_VOCABULARY).sort((a, b) => b.length - a.length)

/**
 * Parse a unit from the front of a string.
 *
 * Only whole tokens match: the key must be followed by whitespace, an
 * abbreviation period, or the end of the text.
 */
export function parseUnit(text: string): UnitResult {
  const trimmed = text.trim()
  const lower = trimmed.toLowerCase()

  for (const key of UNIT_KEYS) {
    if (!lower.startsWith(key)) continue

    let end = key.length
    if (lower[end] === '.') end += 1
    const nextChar = lower[end]
    if (nextChar !== undefined && !/\s/.test(nextChar)) continue

    return { unit: lookupUnit(key), remainder: trimmed.slice(end).trim() }
  }

  return { unit: null, remainder: trimmed }
}
