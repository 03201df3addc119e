import { describe, it, expect } from 'vitest'
import { loadConfig } from '@infrastructure/config/loadConfig.ts'

describe('loadConfig', () => {
  it('should default to original units and "servings"', () => {
    expect(loadConfig({})).toEqual({ unitSystem: 'original', servingsUnit: 'servings' })
  })

  it('should read both variables', () => {
    expect(loadConfig({ COOKBOOK_UNIT_SYSTEM: ' Metric ', COOKBOOK_SERVINGS_UNIT: 'portions' })).toEqual({
      unitSystem: 'metric',
      servingsUnit: 'portions',
    })
  })

  it('should treat blank values as unset', () => {
    expect(loadConfig({ COOKBOOK_UNIT_SYSTEM: '', COOKBOOK_SERVINGS_UNIT: '  ' })).toEqual({
      unitSystem: 'original',
      servingsUnit: 'servings',
    })
  })

  it('should reject an unknown unit system', () => {
    expect(() => loadConfig({ COOKBOOK_UNIT_SYSTEM: 'imperial' })).toThrow(
      'COOKBOOK_UNIT_SYSTEM must be "metric" or "original", got "imperial"',
    )
  })
})
