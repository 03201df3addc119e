/**
 * Parse recipe CSV files into recipe records.
 *
 * One row per recipe. Ingredients are pipe-separated; a sectioned recipe
 * prefixes each section's ingredients and instructions with "[Name]":
 *
 *   ingredients:  "[Shell]2 cups flour|1/2 cup butter[Filling]2 cups ricotta"
 *   instructions: "[Shell]Mix and chill.[Filling]Whisk until smooth."
 *
 * Bad rows are reported as "Row N: ..." messages (the header is row 1) and
 * skipped; the remaining rows are still returned.
 */
import Papa from 'papaparse'
import type { RecipeBody, RecipeRecord } from '@domain/models/Recipe.ts'
import { parseIngredientList } from '@application/parser/IngredientParser.ts'
import { hasSectionMarkers, parseRecipeSections } from '@application/parser/parseSections.ts'

export const CSV_COLUMNS = [
  'title',
  'category',
  'description',
  'prep_time_minutes',
  'cook_time_minutes',
  'servings',
  'servings_unit',
  'ingredients',
  'instructions',
  'notes',
  'source',
] as const

export type CsvColumn = (typeof CSV_COLUMNS)[number]

type CsvRow = Partial<Record<string, string>>

export interface CsvImportResult {
  recipes: RecipeRecord[]
  errors: string[]
}

export interface CsvImportOptions {
  /** Used when a row leaves servings_unit blank. */
  defaultServingsUnit?: string
}

function field(row: CsvRow, column: CsvColumn): string {
  return (row[column] ?? '').trim()
}

function optionalField(row: CsvRow, column: CsvColumn): string | null {
  const value = field(row, column)
  return value.length > 0 ? value : null
}

/** Whole numbers only; anything else is null. */
export function parseInteger(value: string): number | null {
  const trimmed = value.trim()
  if (!/^[+-]?\d+$/.test(trimmed)) return null
  return parseInt(trimmed, 10)
}

/** Returns the body, or an error message for the row. */
function parseBody(row: CsvRow): RecipeBody | string {
  // Instructions are kept untrimmed until a section split decides
  const ingredientsText = row.ingredients ?? ''
  const instructionsText = row.instructions ?? ''

  if (hasSectionMarkers(ingredientsText) || hasSectionMarkers(instructionsText)) {
    const sections = parseRecipeSections(ingredientsText, instructionsText)
      .filter((section) => section.instructions.length > 0)
    if (sections.length === 0) {
      return 'Sectioned recipe must have at least one section with instructions'
    }
    return { hasSections: true, sections }
  }

  const instructions = instructionsText.trim()
  if (!instructions) return 'Instructions are required'

  return {
    hasSections: false,
    ingredients: parseIngredientList(ingredientsText),
    instructions,
  }
}

function parseRow(row: CsvRow, defaultServingsUnit: string): RecipeRecord | string {
  const title = field(row, 'title')
  if (!title) return 'Title is required'

  const body = parseBody(row)
  if (typeof body === 'string') return body

  return {
    title,
    category: optionalField(row, 'category'),
    description: optionalField(row, 'description'),
    prepTimeMinutes: parseInteger(field(row, 'prep_time_minutes')),
    cookTimeMinutes: parseInteger(field(row, 'cook_time_minutes')),
    servings: parseInteger(field(row, 'servings')),
    servingsUnit: optionalField(row, 'servings_unit') ?? defaultServingsUnit,
    notes: optionalField(row, 'notes'),
    source: optionalField(row, 'source'),
    ...body,
  }
}

export function parseRecipeCsv(content: string, options: CsvImportOptions = {}): CsvImportResult {
  const defaultServingsUnit = options.defaultServingsUnit ?? 'servings'
  const parsed = Papa.parse<CsvRow>(content, { header: true, skipEmptyLines: true })

  const recipes: RecipeRecord[] = []
  const errors: string[] = []

  // Short or long rows still carry their named columns; only broken quoting is fatal
  for (const error of parsed.errors) {
    if (error.type === 'FieldMismatch') continue
    const rowLabel = error.row === undefined ? 'File' : `Row ${error.row + 2}`
    errors.push(`${rowLabel}: ${error.message}`)
  }

  parsed.data.forEach((row, index) => {
    const rowNum = index + 2
    try {
      const result = parseRow(row, defaultServingsUnit)
      if (typeof result === 'string') {
        errors.push(`Row ${rowNum}: ${result}`)
      } else {
        recipes.push(result)
      }
    } catch (err) {
      errors.push(`Row ${rowNum}: ${err instanceof Error ? err.message : String(err)}`)
    }
  })

  return { recipes, errors }
}
