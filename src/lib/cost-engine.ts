/**
 * cost-engine.ts
 *
 * Row-wise cost derivation for the weekly panel. Null inputs give null
 * outputs except where a default is documented below. Safe to re-run on an
 * already-derived panel: a derived column that already holds a value is kept,
 * only gaps are recomputed. ocean_uplift, diesel_uplift and z_base are the
 * exception and are always recomputed from the current inputs.
 */

import { DENSITY_KG_PER_L, dutyForRow, type CostPolicy } from './cost-policy'
import type { PanelRow } from './types'

export const PACK_COST_USD_PER_L: Readonly<Record<string, number>> = {
  glass: 0.22,
  plastic: 0.12,
  steel: 0.3,
}
export const DEFAULT_PACK_COST_USD_PER_L = 0.22

export const OCEAN_UPLIFT_PER_POINT = 0.003
export const DIESEL_UPLIFT_PER_USD = 0.15

function present(value: number | null | undefined): value is number {
  return typeof value === 'number' && Number.isFinite(value)
}

export function packCost(pack: string | null): number {
  if (pack === null) return DEFAULT_PACK_COST_USD_PER_L
  return PACK_COST_USD_PER_L[pack.trim().toLowerCase()] ?? DEFAULT_PACK_COST_USD_PER_L
}

export function meanOf(values: readonly (number | null)[]): number | null {
  const xs = values.filter(present)
  if (xs.length === 0) return null
  return xs.reduce((a, b) => a + b, 0) / xs.length
}

/** Sample standard deviation (n − 1); null below two observations. */
export function sampleStd(values: readonly (number | null)[]): number | null {
  const xs = values.filter(present)
  if (xs.length < 2) return null
  const m = xs.reduce((a, b) => a + b, 0) / xs.length
  const ss = xs.reduce((a, v) => a + (v - m) ** 2, 0)
  return Math.sqrt(ss / (xs.length - 1))
}

/** Every present value equal to the first; the float std of such a column need not be 0. */
export function isConstantColumn(values: readonly (number | null)[]): boolean {
  const xs = values.filter(present)
  return xs.every((v) => v === xs[0])
}

/** Column z-scores; the whole column is 0 when the deviation is zero or undefined. */
export function zScores(values: readonly (number | null)[]): (number | null)[] {
  const m = meanOf(values)
  const sd = sampleStd(values)
  if (m === null || sd === null || sd === 0 || isConstantColumn(values)) return values.map(() => 0)
  return values.map((v) => (present(v) ? (v - m) / sd : null))
}

function times(a: number | null, b: number | null): number | null {
  return present(a) && present(b) ? a * b : null
}

function orZero(value: number | null): number {
  return present(value) ? value : 0
}

export function deriveCosts<T extends PanelRow>(rows: readonly T[], policy: CostPolicy): T[] {
  const dieselMean = meanOf(rows.map((r) => r.diesel_usd_per_gal))

  const derived = rows.map((row): T => {
    const priceUsd = row.price_usd_per_l ?? times(row.price_eur_per_l, row.usd_per_eur)
    const base = row.base_usd_per_l ?? priceUsd
    const adval = row.adval_pct ?? 0
    const specific = row.specific_usd_per_kg ?? 0
    const dutySpecific = row.duty_specific_usd_per_l ?? specific * DENSITY_KG_PER_L
    const dutyCost = row.duty_cost ?? (present(priceUsd) ? (adval / 100) * priceUsd + dutySpecific : null)
    const dutyUsd = row.duty_usd_per_l ?? (present(priceUsd)
      ? dutyForRow(policy, priceUsd, row.grade_norm, specific, adval)
      : null)
    const pack = row.pack_cost ?? packCost(row.pack)

    const oceanUplift = present(row.ocean_proxy) ? OCEAN_UPLIFT_PER_POINT * row.ocean_proxy : null
    const dieselUplift = present(row.diesel_usd_per_gal) && dieselMean !== null
      ? DIESEL_UPLIFT_PER_USD * (row.diesel_usd_per_gal - dieselMean)
      : null

    const delivered = row.deliv_hat_usd_per_l ??
      orZero(base) + orZero(pack) + orZero(oceanUplift) + orZero(dieselUplift) + orZero(dutyCost)

    return {
      ...row,
      price_usd_per_l: priceUsd,
      base_usd_per_l: base,
      adval_pct: adval,
      duty_rate: row.duty_rate ?? adval,
      specific_usd_per_kg: specific,
      duty_specific_usd_per_l: dutySpecific,
      duty_cost: dutyCost,
      duty_usd_per_l: dutyUsd,
      pack_cost: pack,
      ocean_idx: row.ocean_idx ?? row.ocean_proxy,
      ocean_uplift: oceanUplift,
      diesel_uplift: dieselUplift,
      deliv_hat_usd_per_l: delivered,
    }
  })

  const z = zScores(derived.map((r) => r.base_usd_per_l))
  return derived.map((row, i): T => ({ ...row, z_base: z[i] }))
}
