import type { ParsedIngredient } from '@domain/models/Ingredient.ts'
import { normalizeUnicodeFractions, parseQuantity } from './parseQuantity.ts'
import { parseUnit } from './parseUnit.ts'
import { parseParenthetical } from './parseParenthetical.ts'
import { parsePrepNotes } from './parsePrepNotes.ts'

/**
 * Normalize whitespace and unicode fractions in raw ingredient text.
 */
function normalize(raw: string): string {
  return normalizeUnicodeFractions(raw.trim()).replace(/\s+/g, ' ')
}

/** The whole line as the name, nothing else extracted. */
function wholeLine(raw: string, line: string): ParsedIngredient {
  return {
    raw,
    quantity: null,
    unit: null,
    name: line,
    preparation: null,
    optional: false,
  }
}

/**
 * Parse one free-text ingredient line into a structured record.
 *
 * Pipeline:
 * 1. "(optional)" parenthetical → optional flag
 * 2. First comma → preparation clause
 * 3. Leading quantity, then a known unit token
 * 4. What is left is the name
 *
 * Never throws. When no name survives the steps above, the trimmed input line
 * becomes the name. Blank input returns null.
 */
export function parseIngredient(raw: string): ParsedIngredient | null {
  const line = raw.trim()
  if (line.length === 0) return null

  const { text: withoutOptional, optional } = parseParenthetical(normalize(line))
  const { text: beforeComma, preparation } = parsePrepNotes(withoutOptional)
  const { quantity, remainder: afterQty } = parseQuantity(beforeComma)

  let unit: string | null = null
  let name = afterQty
  if (quantity !== null) {
    const parsedUnit = parseUnit(afterQty)
    unit = parsedUnit.unit
    name = parsedUnit.remainder
  }

  name = name.trim()
  if (name.length === 0) return wholeLine(raw, line)

  return { raw, quantity, unit, name, preparation, optional }
}

/** Parse a list of raw lines, skipping blank ones. */
export function parseIngredients(rawList: string[]): ParsedIngredient[] {
  const parsed: ParsedIngredient[] = []
  for (const raw of rawList) {
    const ingredient = parseIngredient(raw)
    if (ingredient) parsed.push(ingredient)
  }
  return parsed
}

/** Parse a pipe-separated ingredient list: "2 cups flour|1 tsp salt". */
export function parseIngredientList(text: string): ParsedIngredient[] {
  return parseIngredients(text.split('|'))
}
