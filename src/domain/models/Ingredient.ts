export interface ParsedIngredient {
  raw: string
  quantity: number | null
  unit: string | null
  name: string
  preparation: string | null
  optional: boolean
}
