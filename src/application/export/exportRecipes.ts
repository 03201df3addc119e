import Papa from 'papaparse'
import type { ParsedIngredient } from '@domain/models/Ingredient.ts'
import type { RecipeRecord } from '@domain/models/Recipe.ts'
import { CSV_COLUMNS } from '@application/import/parseRecipeCsv.ts'
import { formatIngredient } from '@application/scaler/formatIngredient.ts'

/** Quantities are written as plain decimals so a re-import reads the same value. */
function ingredientLine(ing: ParsedIngredient): string {
  return formatIngredient(ing, (quantity) => String(quantity))
}

function ingredientsAndInstructions(recipe: RecipeRecord): [string, string] {
  if (!recipe.hasSections) {
    return [recipe.ingredients.map(ingredientLine).join('|'), recipe.instructions]
  }

  let ingredients = ''
  let instructions = ''
  for (const section of recipe.sections) {
    if (section.ingredients.length > 0) {
      ingredients += `[${section.name}]${section.ingredients.map(ingredientLine).join('|')}`
    }
    if (section.instructions) {
      instructions += `[${section.name}]${section.instructions}`
    }
  }
  return [ingredients, instructions]
}

function optionalNumber(value: number | null): string {
  return value === null ? '' : String(value)
}

/** One header row plus one row per recipe, in the import column order. */
export function createCsvExport(recipes: RecipeRecord[]): string {
  const data = recipes.map((recipe) => {
    const [ingredients, instructions] = ingredientsAndInstructions(recipe)
    return [
      recipe.title,
      recipe.category ?? '',
      recipe.description ?? '',
      optionalNumber(recipe.prepTimeMinutes),
      optionalNumber(recipe.cookTimeMinutes),
      optionalNumber(recipe.servings),
      recipe.servingsUnit || 'servings',
      ingredients,
      instructions,
      recipe.notes ?? '',
      recipe.source ?? '',
    ]
  })

  return Papa.unparse({ fields: [...CSV_COLUMNS], data })
}

export function exportFilename(date: Date = new Date()): string {
  return `cookbook-recipes-${date.toISOString().slice(0, 10)}.csv`
}
