import type { UnitSystem } from '@domain/models/Conversion.ts'

export interface CookbookConfig {
  /** Unit system a recipe page opens in. */
  unitSystem: UnitSystem
  /** servings_unit for imported rows that leave it blank. */
  servingsUnit: string
}

const UNIT_SYSTEMS: readonly UnitSystem[] = ['metric', 'original']

function isUnitSystem(value: string): value is UnitSystem {
  return UNIT_SYSTEMS.some((system) => system === value)
}

/**
 * Read settings from the environment.
 *
 * COOKBOOK_UNIT_SYSTEM      metric | original (default original)
 * COOKBOOK_SERVINGS_UNIT    default "servings"
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CookbookConfig {
  const unitSystem = env.COOKBOOK_UNIT_SYSTEM?.trim().toLowerCase() || 'original'
  if (!isUnitSystem(unitSystem)) {
    throw new Error(`COOKBOOK_UNIT_SYSTEM must be "metric" or "original", got "${unitSystem}"`)
  }

  const servingsUnit = env.COOKBOOK_SERVINGS_UNIT?.trim() || 'servings'

  return { unitSystem, servingsUnit }
}
