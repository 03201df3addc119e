import { US_VOLUME_UNITS } from '@domain/constants/units.ts'

/**
 * Known fractions for US volume display. Within THRESHOLD of one of these,
 * the fractional part renders as the fraction.
 */
const FRACTION_MAP: [number, string][] = [
  [0.125, '1/8'],
  [0.25, '1/4'],
  [0.333, '1/3'],
  [0.375, '3/8'],
  [0.5, '1/2'],
  [0.625, '5/8'],
  [0.667, '2/3'],
  [0.75, '3/4'],
  [0.875, '7/8'],
]

const THRESHOLD = 0.01

/**
 * Format a quantity for display: whole numbers without a decimal point,
 * anything else with one decimal digit and a trailing ".0" stripped.
 *
 * - 2 -> "2"
 * - 2.5 -> "2.5"
 * - 2.25 -> "2.3"
 * - 1.96 -> "2"
 */
export function formatQuantity(value: number): string {
  if (Number.isInteger(value)) return String(value)
  return value.toFixed(1).replace(/\.0$/, '')
}

/**
 * Format a quantity for its unit. US volume units show common fractions
 * ("1 1/2" cups); other quantities show whole numbers from 10 up and one
 * decimal below.
 */
export function formatUnitQuantity(value: number, unit: string | null): string {
  if (Number.isInteger(value)) return String(value)

  if (unit && US_VOLUME_UNITS.has(unit.toLowerCase()) && value > 0) {
    const whole = Math.floor(value)
    const fractional = value - whole
    for (const [frac, display] of FRACTION_MAP) {
      if (Math.abs(fractional - frac) < THRESHOLD) {
        return whole > 0 ? `${whole} ${display}` : display
      }
    }
  }

  if (value >= 10) return String(Math.round(value))
  return formatQuantity(value)
}
