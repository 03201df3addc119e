import { describe, it, expect } from 'vitest'
import { formatTotalTime, totalTimeMinutes } from '@application/recipe/recipeTime.ts'

describe('totalTimeMinutes', () => {
  it('should add prep and cook time', () => {
    expect(totalTimeMinutes({ prepTimeMinutes: 15, cookTimeMinutes: 30 })).toBe(45)
  })

  it('should count missing times as zero', () => {
    expect(totalTimeMinutes({ prepTimeMinutes: null, cookTimeMinutes: 20 })).toBe(20)
    expect(totalTimeMinutes({ prepTimeMinutes: null, cookTimeMinutes: null })).toBe(0)
  })
})

describe('formatTotalTime', () => {
  it('should format minutes and hours', () => {
    expect(formatTotalTime(45)).toBe('45m')
    expect(formatTotalTime(120)).toBe('2h')
    expect(formatTotalTime(75)).toBe('1h 15m')
  })

  it('should return null when there is no time', () => {
    expect(formatTotalTime(0)).toBeNull()
  })
})
