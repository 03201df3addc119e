import type { ConversionResult, UnitSystem } from '@domain/models/Conversion.ts'
import {
  METRIC_ROUND_VALUES,
  METRIC_TO_US,
  SMART_ROUND_TOLERANCE,
  US_TO_METRIC,
  isMetricUnit,
  lookupMetricConversion,
  lookupUsConversion,
} from '@domain/constants/units.ts'

/** Nearest 5 at ≥100, nearest whole at ≥10, one decimal below. */
function roundByMagnitude(value: number): number {
  if (value >= 100) return Math.round(value / 5) * 5
  if (value >= 10) return Math.round(value)
  return Math.round(value * 10) / 10
}

/**
 * Snap a metric value to a "nice" quantity (236.588 ml → 250 ml).
 *
 * The closest reference value wins, the lower one on a tie, and is used only
 * when it is within 15% of the raw value. Otherwise the value is rounded by
 * magnitude. Zero and negative values skip the relative check.
 */
export function smartRoundMetric(value: number, unit: string): number {
  if (!isMetricUnit(unit)) return Math.round(value * 10) / 10
  if (value <= 0) return roundByMagnitude(value)

  const references = METRIC_ROUND_VALUES[unit]
  let closest = references[0]
  for (const candidate of references) {
    // Strict comparison keeps the lower value on a tie
    if (Math.abs(candidate - value) < Math.abs(closest - value)) {
      closest = candidate
    }
  }

  if (Math.abs(closest - value) / value <= SMART_ROUND_TOLERANCE) {
    return closest
  }
  return roundByMagnitude(value)
}

/**
 * Convert a US quantity to its smart-rounded metric equivalent.
 * Unknown units and non-finite quantities pass through unchanged.
 */
export function convertToMetric(quantity: number, unit: string): ConversionResult {
  const conversion = lookupMetricConversion(unit)
  if (!conversion || !Number.isFinite(quantity)) return { quantity, unit }

  return {
    quantity: smartRoundMetric(quantity * conversion.factor, conversion.unit),
    unit: conversion.unit,
  }
}

/** Convert a metric quantity to US units, rounded to two decimals. */
export function convertToUs(quantity: number, unit: string): ConversionResult {
  const conversion = lookupUsConversion(unit)
  if (!conversion || !Number.isFinite(quantity)) return { quantity, unit }

  return {
    quantity: Math.round(quantity * conversion.factor * 100) / 100,
    unit: conversion.unit,
  }
}

/**
 * Quantity and unit to display for the selected unit system.
 *
 * "original" always returns the stored pair, never a reverse conversion, so
 * switching back replaces whatever converted value was on screen.
 */
export function convert(quantity: number, unit: string, target: UnitSystem): ConversionResult {
  if (target === 'metric') return convertToMetric(quantity, unit)
  return { quantity, unit }
}

interface UnitFactor {
  unit: string
  factor: number
}

export interface ConversionData {
  usToMetric: Record<string, UnitFactor>
  metricToUs: Record<string, UnitFactor>
  roundValues: Record<string, number[]>
}

function copyFactors(table: Readonly<Record<string, Readonly<UnitFactor>>>): Record<string, UnitFactor> {
  return Object.fromEntries(Object.entries(table).map(([key, entry]) => [key, { ...entry }]))
}

/**
 * Conversion tables as plain data for a browser-side toggle. Each call
 * returns a fresh copy, so editing it leaves the converter's tables alone.
 */
export function getConversionData(): ConversionData {
  return {
    usToMetric: copyFactors(US_TO_METRIC),
    metricToUs: copyFactors(METRIC_TO_US),
    roundValues: Object.fromEntries(Object.entries(METRIC_ROUND_VALUES).map(([unit, values]) => [unit, [...values]])),
  }
}
