import { describe, it, expect } from 'vitest'
import { createCsvExport, exportFilename } from '@application/export/exportRecipes.ts'
import { parseRecipeCsv } from '@application/import/parseRecipeCsv.ts'
import { parseIngredientList } from '@application/parser/IngredientParser.ts'
import type { RecipeMetadata, RecipeRecord } from '@domain/models/Recipe.ts'

const HEADER =
  'title,category,description,prep_time_minutes,cook_time_minutes,servings,servings_unit,ingredients,instructions,notes,source'

function metadata(overrides: Partial<RecipeMetadata>): RecipeMetadata {
  return {
    title: 'Untitled',
    category: null,
    description: null,
    prepTimeMinutes: null,
    cookTimeMinutes: null,
    servings: null,
    servingsUnit: 'servings',
    notes: null,
    source: null,
    ...overrides,
  }
}

const pancakes: RecipeRecord = {
  ...metadata({ title: 'Pancakes', category: 'Breakfast', prepTimeMinutes: 10, cookTimeMinutes: 15, servings: 4 }),
  hasSections: false,
  ingredients: parseIngredientList('1 1/2 cups flour|2 eggs|1 cup milk, warmed'),
  instructions: 'Whisk.',
}

const cannoli: RecipeRecord = {
  ...metadata({ title: 'Cannoli' }),
  hasSections: true,
  sections: [
    { name: 'Shell', ingredients: parseIngredientList('2 cups flour|1/2 cup butter'), instructions: 'Roll.' },
    { name: 'Filling', ingredients: [], instructions: 'Pipe.' },
  ],
}

describe('createCsvExport', () => {
  it('should write a simple recipe row', () => {
    const lines = createCsvExport([pancakes]).split('\r\n')
    expect(lines).toEqual([
      HEADER,
      'Pancakes,Breakfast,,10,15,4,servings,"1.5 cups flour|2 eggs|1 cup milk, warmed",Whisk.,,',
    ])
  })

  it('should write section markers', () => {
    const lines = createCsvExport([cannoli]).split('\r\n')
    expect(lines[1]).toBe('Cannoli,,,,,,servings,[Shell]2 cups flour|0.5 cup butter,[Shell]Roll.[Filling]Pipe.,,')
  })

  it('should read back through the importer', () => {
    const { recipes, errors } = parseRecipeCsv(createCsvExport([pancakes, cannoli]))
    expect(errors).toEqual([])
    expect(recipes.map((r) => r.title)).toEqual(['Pancakes', 'Cannoli'])

    const [simple, sectioned] = recipes
    if (simple.hasSections || !sectioned.hasSections) throw new Error('unexpected recipe shape')
    expect(simple.ingredients.map((i) => [i.quantity, i.unit, i.name, i.preparation])).toEqual([
      [1.5, 'cups', 'flour', null],
      [2, null, 'eggs', null],
      [1, 'cup', 'milk', 'warmed'],
    ])
    expect(sectioned.sections.map((s) => s.name)).toEqual(['Shell', 'Filling'])
  })
})

describe('exportFilename', () => {
  it('should include the export date', () => {
    expect(exportFilename(new Date('2024-03-05T12:00:00Z'))).toBe('cookbook-recipes-2024-03-05.csv')
  })
})
