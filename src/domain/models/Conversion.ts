export type MetricUnit = 'ml' | 'g' | 'L'

/** Which quantities the display layer shows. */
export type UnitSystem = 'metric' | 'original'

export interface ConversionResult {
  quantity: number
  unit: string
}
