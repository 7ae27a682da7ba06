/**
 * series-align.ts
 *
 * Raw (date, value) series → one point per Monday week, then a single
 * gap-free weekly macro grid. Forward fill only: a field stays null until its
 * first observation and never borrows from later weeks.
 */

import { MS_PER_DAY, toMondayWeek } from './calendar'
import { oceanProxy, type CostPolicy } from './cost-policy'
import {
  MACRO_FIELDS,
  type MacroField,
  type MacroGridRow,
  type MacroSeriesSet,
  type RawPoint,
  type WeeklyPoint,
  type WeeklySeriesSet,
} from './types'

const MS_PER_WEEK = 7 * MS_PER_DAY

/** Mean of same-week values; a week whose values are all null keeps a null point. */
export function alignWeekly(points: readonly RawPoint[]): WeeklyPoint[] {
  const buckets = new Map<number, { sum: number; count: number }>()

  for (const point of points) {
    if (point.date === null) continue
    const key = toMondayWeek(point.date).getTime()
    const bucket = buckets.get(key) ?? { sum: 0, count: 0 }
    if (point.value !== null && Number.isFinite(point.value)) {
      bucket.sum += point.value
      bucket.count++
    }
    buckets.set(key, bucket)
  }

  return [...buckets.entries()]
    .sort((a, b) => a[0] - b[0])
    .map(([key, b]) => ({
      weekStart: new Date(key),
      value: b.count > 0 ? b.sum / b.count : null,
    }))
}

export function alignMacroSeries(raw: MacroSeriesSet): WeeklySeriesSet {
  const out = emptyWeeklySeries()
  for (const field of MACRO_FIELDS) out[field] = alignWeekly(raw[field])
  return out
}

export function emptyWeeklySeries(): WeeklySeriesSet {
  return {
    usd_per_eur: [],
    brent_usd_per_bbl: [],
    diesel_usd_per_gal: [],
    ppi_glass: [],
    ppi_plastic_bottles: [],
    ppi_steel: [],
    fbx: [],
  }
}

/** Every Monday from start's week to end's week, inclusive. */
export function mondayRange(start: Date, end: Date): Date[] {
  const first = toMondayWeek(start).getTime()
  const last = toMondayWeek(end).getTime()
  const out: Date[] = []
  for (let t = first; t <= last; t += MS_PER_WEEK) out.push(new Date(t))
  return out
}

/**
 * Outer-join all aligned series on week_start over the full Monday range
 * (min → max observed week across every series) and forward-fill each field
 * independently. `ocean_proxy` is derived on the filled row.
 */
export function buildMacroGrid(series: WeeklySeriesSet, policy: CostPolicy): MacroGridRow[] {
  const lookups = new Map<MacroField, Map<number, number | null>>()
  let min = Infinity
  let max = -Infinity

  for (const field of MACRO_FIELDS) {
    const lookup = new Map<number, number | null>()
    for (const point of series[field]) {
      const key = toMondayWeek(point.weekStart).getTime()
      lookup.set(key, point.value)
      if (key < min) min = key
      if (key > max) max = key
    }
    lookups.set(field, lookup)
  }

  if (!Number.isFinite(min)) return []

  const carried = new Map<MacroField, number | null>(MACRO_FIELDS.map((f) => [f, null]))
  const grid: MacroGridRow[] = []

  for (const week of mondayRange(new Date(min), new Date(max))) {
    const key = week.getTime()
    for (const field of MACRO_FIELDS) {
      const observed = lookups.get(field)?.get(key)
      if (observed !== undefined && observed !== null) carried.set(field, observed)
    }

    const value = (field: MacroField): number | null => carried.get(field) ?? null
    grid.push({
      week_start: week,
      usd_per_eur: value('usd_per_eur'),
      brent_usd_per_bbl: value('brent_usd_per_bbl'),
      diesel_usd_per_gal: value('diesel_usd_per_gal'),
      ppi_glass: value('ppi_glass'),
      ppi_plastic_bottles: value('ppi_plastic_bottles'),
      ppi_steel: value('ppi_steel'),
      fbx: value('fbx'),
      ocean_proxy: oceanProxy(policy, value('fbx'), value('brent_usd_per_bbl')),
    })
  }

  return grid
}
