import type { ParsedIngredient } from '@domain/models/Ingredient.ts'
import type { UnitSystem } from '@domain/models/Conversion.ts'
import { convert } from './convertUnit.ts'

export interface DisplayIngredient extends ParsedIngredient {
  displayQuantity: number | null
  displayUnit: string | null
}

/**
 * Display copies of an ingredient list for the selected unit system.
 *
 * The stored quantity and unit are never modified: every call starts from
 * them, so switching metric → original shows the original values exactly.
 * Ingredients without both a quantity and a unit display as stored.
 */
export function applyUnitSystem(ingredients: ParsedIngredient[], target: UnitSystem): DisplayIngredient[] {
  return ingredients.map((ing) => {
    if (ing.quantity === null || ing.unit === null) {
      return { ...ing, displayQuantity: ing.quantity, displayUnit: ing.unit }
    }

    const converted = convert(ing.quantity, ing.unit, target)
    return { ...ing, displayQuantity: converted.quantity, displayUnit: converted.unit }
  })
}
