/**
 * weekly-features.ts
 *
 * Per-entity time features over the usable panel. An entity is one
 * (country, market, grade); entities never see each other's rows. Lags are
 * taken over the observed sequence, so a skipped week does not produce a
 * null lag. Rolling means accept partial windows.
 */

import { isoWeekNumber } from './calendar'
import { comparePanelOrder } from './panel-merge'
import { PANEL_COLUMN_ORDER, toFrame } from './panel-schema'
import type { Frame } from './table-contract'
import type { FeaturePriceColumn, FeatureRow, UsablePanelRow } from './types'

export interface FeatureOptions {
  priceColumn?: FeaturePriceColumn
}

export const FEATURE_COLUMN_ORDER: readonly (keyof FeatureRow)[] = [
  ...PANEL_COLUMN_ORDER,
  'lag1week',
  'lag2week',
  'rolling3',
  'rolling10',
  'month',
  'day_of_week',
  'quarter',
  'sin_week',
]

export const MODEL_FEATURE_COLUMNS: readonly (keyof FeatureRow)[] = [
  'week_start',
  'country',
  'market',
  'grade',
  'grade_norm',
  'price_eur_per_l',
  'price_usd_per_l',
  'hs_prefix',
  'adval_pct',
  'specific_usd_per_kg',
  'duty_usd_per_l',
  'usd_per_eur',
  'brent_usd_per_bbl',
  'diesel_usd_per_gal',
  'ppi_glass',
  'ppi_plastic_bottles',
  'ppi_steel',
  'ocean_proxy',
  'cost_pressure',
  'lag1week',
  'lag2week',
  'rolling3',
  'rolling10',
  'month',
  'day_of_week',
  'quarter',
  'sin_week',
  'snapshot_date',
]

export function entityKey(row: Pick<UsablePanelRow, 'country' | 'market' | 'grade' | 'grade_norm'>): string {
  return JSON.stringify([row.country, row.market, row.grade ?? row.grade_norm])
}

/** Mean of the non-null values in the trailing window ending at idx; min window 1. */
export function trailingMean(values: readonly (number | null)[], idx: number, window: number): number | null {
  let sum = 0
  let count = 0
  for (let j = Math.max(0, idx - window + 1); j <= idx; j++) {
    const v = values[j]
    if (v !== null && Number.isFinite(v)) {
      sum += v
      count++
    }
  }
  return count > 0 ? sum / count : null
}

export function calendarFeatures(weekStart: Date): Pick<FeatureRow, 'month' | 'day_of_week' | 'quarter' | 'sin_week'> {
  return {
    month: weekStart.getUTCMonth() + 1,
    day_of_week: (weekStart.getUTCDay() + 6) % 7,
    quarter: Math.floor(weekStart.getUTCMonth() / 3) + 1,
    sin_week: Math.sin((2 * Math.PI * isoWeekNumber(weekStart)) / 52),
  }
}

function featuresForEntity(rows: UsablePanelRow[], priceColumn: FeaturePriceColumn): FeatureRow[] {
  const ordered = [...rows].sort((a, b) => a.week_start.getTime() - b.week_start.getTime())
  const prices = ordered.map((r): number | null => r[priceColumn])

  return ordered.map((row, i) => ({
    ...row,
    cost_pressure: row.cost_pressure ?? 0,
    lag1week: i >= 1 ? prices[i - 1] : null,
    lag2week: i >= 2 ? prices[i - 2] : null,
    rolling3: trailingMean(prices, i, 3),
    rolling10: trailingMean(prices, i, 10),
    ...calendarFeatures(row.week_start),
  }))
}

/** One feature row per input row, ordered by (week_start, country, market, grade). */
export function buildFeatureRows(rows: readonly UsablePanelRow[], options: FeatureOptions = {}): FeatureRow[] {
  const priceColumn = options.priceColumn ?? 'price_eur_per_l'
  const entities = new Map<string, UsablePanelRow[]>()
  for (const row of rows) {
    const key = entityKey(row)
    const list = entities.get(key) ?? []
    list.push(row)
    entities.set(key, list)
  }

  const out: FeatureRow[] = []
  for (const group of entities.values()) out.push(...featuresForEntity(group, priceColumn))
  return out.sort(comparePanelOrder)
}

export function featureRowsToFrame(rows: readonly FeatureRow[]): Frame {
  return toFrame(FEATURE_COLUMN_ORDER, rows)
}

/** Reduced column set handed to training. */
export function projectModelFeatures(rows: readonly FeatureRow[]): Frame {
  return toFrame(MODEL_FEATURE_COLUMNS, rows)
}
