/**
 * cost-pressure.ts
 *
 * Composite input-cost pressure: a weighted average of population z-scores of
 * the freight, diesel and packaging PPI drivers. A driver that is entirely
 * null or entirely zero is dropped and the remaining weights renormalised.
 */

import { isConstantColumn } from './cost-engine'
import type { PanelRow } from './types'

type DriverColumn = 'ocean_proxy' | 'diesel_usd_per_gal' | 'ppi_glass' | 'ppi_plastic_bottles' | 'ppi_steel'

export const COST_PRESSURE_WEIGHTS: ReadonlyArray<{ column: DriverColumn; weight: number }> = [
  { column: 'ocean_proxy', weight: 0.4 },
  { column: 'diesel_usd_per_gal', weight: 0.3 },
  { column: 'ppi_glass', weight: 0.1 },
  { column: 'ppi_plastic_bottles', weight: 0.1 },
  { column: 'ppi_steel', weight: 0.1 },
]

/** Population z-scores (ddof 0); all zeros when the column has no spread. */
export function populationZ(values: readonly (number | null)[]): (number | null)[] {
  const xs = values.filter((v): v is number => v !== null && Number.isFinite(v))
  if (xs.length === 0) return values.map(() => null)
  const mean = xs.reduce((a, b) => a + b, 0) / xs.length
  const sd = Math.sqrt(xs.reduce((a, v) => a + (v - mean) ** 2, 0) / xs.length)
  if (sd === 0 || isConstantColumn(xs)) return values.map(() => 0)
  return values.map((v) => (v !== null && Number.isFinite(v) ? (v - mean) / sd : null))
}

export function computeCostPressure<T extends PanelRow>(rows: readonly T[]): T[] {
  const drivers = COST_PRESSURE_WEIGHTS
    .map(({ column, weight }) => ({ weight, values: rows.map((r): number | null => r[column]) }))
    .filter(({ values }) => values.some((v) => v !== null) && !values.every((v) => v === 0))

  if (drivers.length === 0) return rows.map((row): T => ({ ...row, cost_pressure: 0 }))

  const totalWeight = drivers.reduce((a, d) => a + d.weight, 0)
  const scored = drivers.map((d) => ({ weight: d.weight / totalWeight, z: populationZ(d.values) }))

  return rows.map((row, i): T => {
    let pressure: number | null = 0
    for (const { weight, z } of scored) {
      const zi = z[i]
      pressure = pressure === null || zi === null ? null : pressure + zi * weight
    }
    return { ...row, cost_pressure: pressure }
  })
}
