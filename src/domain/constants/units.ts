import type { MetricUnit } from '@domain/models/Conversion.ts'

/** Freeze a lookup table and each entry in it. */
function freezeTable<T extends object>(table: Record<string, T>): Readonly<Record<string, Readonly<T>>> {
  for (const entry of Object.values(table)) Object.freeze(entry)
  return Object.freeze(table)
}

/**
 * Units the ingredient parser recognizes after a quantity.
 * Keys are lower-case tokens; values are the unit as it is stored.
 */
export const UNIT_VOCABULARY: Readonly<Record<string, string>> = Object.freeze({
  // Volume
  cup: 'cup',
  cups: 'cups',
  tablespoon: 'tablespoon',
  tablespoons: 'tablespoons',
  tbsp: 'tbsp',
  teaspoon: 'teaspoon',
  teaspoons: 'teaspoons',
  tsp: 'tsp',
  'fl oz': 'fl oz',
  'fluid ounce': 'fluid ounce',
  'fluid ounces': 'fluid ounces',
  pint: 'pint',
  pints: 'pints',
  quart: 'quart',
  quarts: 'quarts',
  gallon: 'gallon',
  gallons: 'gallons',
  milliliter: 'milliliter',
  milliliters: 'milliliters',
  ml: 'ml',
  liter: 'liter',
  liters: 'liters',
  l: 'L',

  // Weight
  ounce: 'ounce',
  ounces: 'ounces',
  oz: 'oz',
  pound: 'pound',
  pounds: 'pounds',
  lb: 'lb',
  lbs: 'lbs',
  gram: 'gram',
  grams: 'grams',
  g: 'g',
  kilogram: 'kilogram',
  kilograms: 'kilograms',
  kg: 'kg',

  // Count
  pinch: 'pinch',
  dash: 'dash',
  piece: 'piece',
  pieces: 'pieces',
  clove: 'clove',
  cloves: 'cloves',
  head: 'head',
  heads: 'heads',
  slice: 'slice',
  slices: 'slices',
  can: 'can',
  cans: 'cans',
  package: 'package',
  packages: 'packages',
  pkg: 'pkg',
  bunch: 'bunch',
  bunches: 'bunches',
  sprig: 'sprig',
  sprigs: 'sprigs',
  stalk: 'stalk',
  stalks: 'stalks',
  large: 'large',
  medium: 'medium',
  small: 'small',
})

export interface MetricConversion {
  unit: MetricUnit
  factor: number
}

/** US → metric factors, keyed by lower-case unit. */
export const US_TO_METRIC = freezeTable<MetricConversion>({
  cup: { unit: 'ml', factor: 236.588 },
  cups: { unit: 'ml', factor: 236.588 },
  tbsp: { unit: 'ml', factor: 14.787 },
  tablespoon: { unit: 'ml', factor: 14.787 },
  tablespoons: { unit: 'ml', factor: 14.787 },
  tsp: { unit: 'ml', factor: 4.929 },
  teaspoon: { unit: 'ml', factor: 4.929 },
  teaspoons: { unit: 'ml', factor: 4.929 },
  'fl oz': { unit: 'ml', factor: 29.574 },
  'fluid ounce': { unit: 'ml', factor: 29.574 },
  'fluid ounces': { unit: 'ml', factor: 29.574 },
  pint: { unit: 'ml', factor: 473.176 },
  pints: { unit: 'ml', factor: 473.176 },
  quart: { unit: 'L', factor: 0.946 },
  quarts: { unit: 'L', factor: 0.946 },
  gallon: { unit: 'L', factor: 3.785 },
  gallons: { unit: 'L', factor: 3.785 },

  oz: { unit: 'g', factor: 28.3495 },
  ounce: { unit: 'g', factor: 28.3495 },
  ounces: { unit: 'g', factor: 28.3495 },
  lb: { unit: 'g', factor: 453.592 },
  lbs: { unit: 'g', factor: 453.592 },
  pound: { unit: 'g', factor: 453.592 },
  pounds: { unit: 'g', factor: 453.592 },
})

/** Metric → US factors. Keys keep the metric spelling ("L" stays upper-case). */
export const METRIC_TO_US = freezeTable<{ unit: string; factor: number }>({
  ml: { unit: 'tsp', factor: 0.203 },
  L: { unit: 'quart', factor: 1.057 },
  g: { unit: 'oz', factor: 0.0353 },
  kg: { unit: 'lb', factor: 2.205 },
})

/** "Nice" metric quantities, ascending. */
export const METRIC_ROUND_VALUES: Readonly<Record<MetricUnit, readonly number[]>> = Object.freeze({
  ml: Object.freeze([5, 10, 15, 25, 50, 75, 100, 125, 150, 175, 200, 250, 300, 350, 400, 450, 500, 750, 1000]),
  g: Object.freeze([5, 10, 15, 25, 50, 75, 100, 125, 150, 175, 200, 225, 250, 300, 350, 400, 450, 500, 750, 1000]),
  L: Object.freeze([0.25, 0.5, 0.75, 1, 1.5, 2, 2.5, 3, 4, 5]),
})

/** Relative error under which a nice value replaces the raw result. */
export const SMART_ROUND_TOLERANCE = 0.15

/** US volume units whose quantities display as fractions. */
export const US_VOLUME_UNITS = new Set(['cup', 'cups', 'tbsp', 'tablespoon', 'tsp', 'teaspoon'])

function hasKey<T>(table: Readonly<Record<string, T>>, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(table, key)
}

export function isMetricUnit(unit: string): unit is MetricUnit {
  return hasKey(METRIC_ROUND_VALUES, unit)
}

/** Case-insensitive lookup into {@link UNIT_VOCABULARY}. */
export function lookupUnit(token: string): string | null {
  const key = token.toLowerCase()
  return hasKey(UNIT_VOCABULARY, key) ? UNIT_VOCABULARY[key] : null
}

/** Case-insensitive lookup into {@link US_TO_METRIC}. */
export function lookupMetricConversion(unit: string): Readonly<MetricConversion> | null {
  const key = unit.toLowerCase()
  return hasKey(US_TO_METRIC, key) ? US_TO_METRIC[key] : null
}

/** Lookup into {@link METRIC_TO_US}; "L" is matched case-insensitively, "ml"/"g"/"kg" by lower case. */
export function lookupUsConversion(unit: string): Readonly<{ unit: string; factor: number }> | null {
  const key = unit.toLowerCase() === 'l' ? 'L' : unit.toLowerCase()
  return hasKey(METRIC_TO_US, key) ? METRIC_TO_US[key] : null
}
