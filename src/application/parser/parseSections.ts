import type { ParsedIngredient } from '@domain/models/Ingredient.ts'
import type { RecipeSection } from '@domain/models/Recipe.ts'
import { parseIngredientList } from './IngredientParser.ts'

export interface TextSection {
  /** null for the implicit section of a block without markers */
  name: string | null
  content: string
}

export interface IngredientSection {
  name: string | null
  ingredients: ParsedIngredient[]
}

export interface InstructionSection {
  name: string | null
  instructions: string
}

const SECTION_MARKER = /\[([^\]]+)\]/

/** True when the text contains at least one "[Name]" marker. */
export function hasSectionMarkers(text: string): boolean {
  return SECTION_MARKER.test(text)
}

/**
 * Split a block on "[Name]" markers, in source order.
 *
 * Without markers the whole block is one unnamed section (none when blank).
 * With markers, text before the first one is dropped and each marker's
 * content runs to the next marker or the end of the block.
 */
export function splitSections(text: string): TextSection[] {
  if (!hasSectionMarkers(text)) {
    return text.trim().length > 0 ? [{ name: null, content: text }] : []
  }

  // ['before', 'Name1', 'content1', 'Name2', 'content2', ...]
  const parts = text.split(new RegExp(SECTION_MARKER.source))
  const sections: TextSection[] = []
  for (let i = 1; i < parts.length; i += 2) {
    sections.push({ name: parts[i].trim(), content: parts[i + 1] ?? '' })
  }
  return sections
}

/** Sections whose content is a pipe-separated ingredient list. */
export function parseIngredientSections(text: string): IngredientSection[] {
  return splitSections(text).map(({ name, content }) => ({
    name,
    ingredients: parseIngredientList(content),
  }))
}

/** Sections whose content is instruction text, kept verbatim apart from trimming. */
export function parseInstructionSections(text: string): InstructionSection[] {
  return splitSections(text).map(({ name, content }) => ({
    name,
    instructions: content.trim(),
  }))
}

/**
 * Merge sectioned ingredient and instruction blocks by section name.
 *
 * Sections appear in first-seen order, ingredient markers first. A name that
 * repeats within a block keeps its first position but its last content.
 * Unnamed content is ignored: a sectioned recipe only has named sections.
 */
export function parseRecipeSections(ingredientsText: string, instructionsText: string): RecipeSection[] {
  const byName = new Map<string, RecipeSection>()

  const sectionFor = (name: string): RecipeSection => {
    let section = byName.get(name)
    if (!section) {
      section = { name, ingredients: [], instructions: '' }
      byName.set(name, section)
    }
    return section
  }

  for (const { name, ingredients } of parseIngredientSections(ingredientsText)) {
    if (name === null) continue
    sectionFor(name).ingredients = ingredients
  }

  for (const { name, instructions } of parseInstructionSections(instructionsText)) {
    if (name === null) continue
    sectionFor(name).instructions = instructions
  }

  return [...byName.values()]
}
