import type { RecipeMetadata } from '@domain/models/Recipe.ts'

export function totalTimeMinutes(recipe: Pick<RecipeMetadata, 'prepTimeMinutes' | 'cookTimeMinutes'>): number {
  return (recipe.prepTimeMinutes ?? 0) + (recipe.cookTimeMinutes ?? 0)
}

/**
 * Format minutes for a recipe card.
 *
 * Examples:
 * - 45 -> "45m"
 * - 120 -> "2h"
 * - 75 -> "1h 15m"
 * - 0 -> null
 */
export function formatTotalTime(minutes: number): string | null {
  if (minutes <= 0) return null
  const hours = Math.floor(minutes / 60)
  const rest = minutes % 60
  if (hours > 0) return rest > 0 ? `${hours}h ${rest}m` : `${hours}h`
  return `${rest}m`
}
