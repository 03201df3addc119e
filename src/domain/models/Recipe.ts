import type { ParsedIngredient } from './Ingredient.ts'

export interface RecipeSection {
  name: string
  ingredients: ParsedIngredient[]
  instructions: string
}

export interface SimpleRecipeBody {
  hasSections: false
  ingredients: ParsedIngredient[]
  instructions: string
}

export interface SectionedRecipeBody {
  hasSections: true
  sections: RecipeSection[]
}

export type RecipeBody = SimpleRecipeBody | SectionedRecipeBody

export interface RecipeMetadata {
  title: string
  category: string | null
  description: string | null
  prepTimeMinutes: number | null
  cookTimeMinutes: number | null
  servings: number | null
  servingsUnit: string
  notes: string | null
  source: string | null
}

export type RecipeRecord = RecipeMetadata & RecipeBody
