import type { ParsedIngredient } from '@domain/models/Ingredient.ts'
import { formatUnitQuantity } from './formatQuantity.ts'

export type QuantityFormatter = (quantity: number, unit: string | null) => string

/** "1 1/2 cups flour, sifted (optional)" */
export function formatIngredient(
  ingredient: ParsedIngredient,
  formatQuantity: QuantityFormatter = formatUnitQuantity,
): string {
  const parts: string[] = []
  if (ingredient.quantity !== null) {
    parts.push(formatQuantity(ingredient.quantity, ingredient.unit))
  }
  if (ingredient.unit) parts.push(ingredient.unit)
  parts.push(ingredient.name)

  let text = parts.join(' ')
  if (ingredient.preparation) text += `, ${ingredient.preparation}`
  if (ingredient.optional) text += ' (optional)'
  return text
}
