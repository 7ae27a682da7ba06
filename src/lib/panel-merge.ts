/**
 * panel-merge.ts
 *
 * Spot prices are the spine of the panel: every spot observation survives the
 * merge, with macro and tariff columns left null where coverage is missing.
 * The macro grid and tariff table are reduced to one row per join key
 * ("last wins") before joining so a join can never fan rows out.
 */

import { dateKeyUtc, toMondayWeek } from './calendar'
import { hsPrefixForGrade, normalizeGrade, type CostPolicy } from './cost-policy'
import { PipelineError } from './errors'
import type { LogSink, MacroGridRow, PanelRow, SpotPriceRow, TariffRecord } from './types'

export interface MergeOptions {
  snapshotDate: string
  policy: CostPolicy
  log?: LogSink
}

interface SpotWeek {
  week_start: Date | null
  country: string | null
  market: string | null
  grade: string | null
  price_eur_per_l: number | null
  pack: string | null
}

/** One row per key; a later row replaces an earlier one and takes its position. */
export function dedupeLastBy<T>(rows: readonly T[], key: (row: T) => string): T[] {
  const byKey = new Map<string, T>()
  for (const row of rows) {
    const k = key(row)
    byKey.delete(k)
    byKey.set(k, row)
  }
  return [...byKey.values()]
}

export function panelKey(row: Pick<PanelRow, 'week_start' | 'country' | 'market' | 'grade'>): string {
  return JSON.stringify([row.week_start ? row.week_start.getTime() : null, row.country, row.market, row.grade])
}

function compareNullable<T extends string | number>(a: T | null, b: T | null): number {
  if (a === b) return 0
  if (a === null) return -1
  if (b === null) return 1
  return a < b ? -1 : 1
}

export function comparePanelOrder(
  a: Pick<PanelRow, 'week_start' | 'country' | 'market' | 'grade'>,
  b: Pick<PanelRow, 'week_start' | 'country' | 'market' | 'grade'>
): number {
  return (
    compareNullable(a.week_start?.getTime() ?? null, b.week_start?.getTime() ?? null) ||
    compareNullable(a.country, b.country) ||
    compareNullable(a.market, b.market) ||
    compareNullable(a.grade, b.grade)
  )
}

/**
 * Several observations of one entity inside one Monday week collapse to their
 * mean price; the latest non-null pack is kept.
 */
export function collapseSpotWeeks(spot: readonly SpotPriceRow[]): SpotWeek[] {
  const ordered = [...spot].sort((a, b) => compareNullable(a.date?.getTime() ?? null, b.date?.getTime() ?? null))
  const groups = new Map<string, { row: SpotWeek; sum: number; count: number }>()

  for (const obs of ordered) {
    const week = obs.date ? toMondayWeek(obs.date) : null
    const draft: SpotWeek = {
      week_start: week,
      country: obs.country,
      market: obs.market,
      grade: obs.grade,
      price_eur_per_l: null,
      pack: obs.pack,
    }
    const key = panelKey(draft)
    const group = groups.get(key) ?? { row: draft, sum: 0, count: 0 }
    if (obs.price_eur_per_l !== null && Number.isFinite(obs.price_eur_per_l)) {
      group.sum += obs.price_eur_per_l
      group.count++
    }
    if (obs.pack !== null) group.row.pack = obs.pack
    groups.set(key, group)
  }

  return [...groups.values()].map(({ row, sum, count }) => ({
    ...row,
    price_eur_per_l: count > 0 ? sum / count : null,
  }))
}

export function assertUniquePanelKeys(rows: readonly PanelRow[]): void {
  const seen = new Set<string>()
  const dupes: string[] = []
  for (const row of rows) {
    const key = panelKey(row)
    if (seen.has(key)) dupes.push(key)
    seen.add(key)
  }
  if (dupes.length > 0) {
    throw new PipelineError('merge', `weekly panel has ${dupes.length} duplicate primary key(s), first: ${dupes[0]}`)
  }
}

export function mergePanel(
  spot: readonly SpotPriceRow[],
  grid: readonly MacroGridRow[],
  tariffs: readonly TariffRecord[],
  options: MergeOptions
): PanelRow[] {
  const log = options.log ?? console.log

  const gridRows = dedupeLastBy(
    [...grid].sort((a, b) => a.week_start.getTime() - b.week_start.getTime()),
    (g) => String(toMondayWeek(g.week_start).getTime())
  )
  const gridByWeek = new Map(gridRows.map((g) => [toMondayWeek(g.week_start).getTime(), g]))

  const tariffRows = dedupeLastBy(
    tariffs.map((t) => ({ ...t, hs_prefix: t.hs_prefix.trim() })),
    (t) => t.hs_prefix
  )
  const tariffByHs = new Map(tariffRows.map((t) => [t.hs_prefix, t]))

  if (tariffRows.length < tariffs.length) {
    log(`[panel] Tariffs deduplicated: ${tariffs.length} → ${tariffRows.length} (last hs_prefix wins)`)
  }

  const panel: PanelRow[] = collapseSpotWeeks(spot).map((s) => {
    const gradeNorm = normalizeGrade(s.grade)
    const hsPrefix = hsPrefixForGrade(options.policy, gradeNorm)
    const macro = s.week_start ? gridByWeek.get(s.week_start.getTime()) : undefined
    const tariff = hsPrefix !== null ? tariffByHs.get(hsPrefix) : undefined

    return {
      week_start: s.week_start,
      snapshot_date: options.snapshotDate,
      country: s.country,
      iso2: s.country,
      market: s.market,
      grade: s.grade,
      grade_norm: gradeNorm,
      hs_prefix: hsPrefix,
      pack: s.pack,
      price_eur_per_l: s.price_eur_per_l,
      price_usd_per_l: null,
      base_usd_per_l: null,
      usd_per_eur: macro?.usd_per_eur ?? null,
      adval_pct: tariff?.adval_pct ?? null,
      duty_rate: null,
      specific_usd_per_kg: tariff?.specific_usd_per_kg ?? null,
      duty_specific_usd_per_l: null,
      duty_cost: null,
      duty_usd_per_l: null,
      brent_usd_per_bbl: macro?.brent_usd_per_bbl ?? null,
      ocean_proxy: macro?.ocean_proxy ?? null,
      ocean_idx: null,
      ocean_uplift: null,
      diesel_usd_per_gal: macro?.diesel_usd_per_gal ?? null,
      diesel_uplift: null,
      pack_cost: null,
      ppi_glass: macro?.ppi_glass ?? null,
      ppi_plastic_bottles: macro?.ppi_plastic_bottles ?? null,
      ppi_steel: macro?.ppi_steel ?? null,
      deliv_hat_usd_per_l: null,
      z_base: null,
      cost_pressure: null,
    }
  })

  assertUniquePanelKeys(panel)
  panel.sort(comparePanelOrder)

  const withMacro = panel.filter((r) => r.usd_per_eur !== null).length
  const withTariff = panel.filter((r) => r.adval_pct !== null || r.specific_usd_per_kg !== null).length
  log(`[panel] Merged ${spot.length} spot observations → ${panel.length} panel rows`)
  log(`[panel] FX coverage ${withMacro} / ${panel.length}, tariff coverage ${withTariff} / ${panel.length}`)
  if (panel.length > 0) {
    const weeks = panel.map((r) => r.week_start).filter((w): w is Date => w !== null)
    if (weeks.length > 0) {
      log(`[panel] week_start range: ${dateKeyUtc(weeks[0])} → ${dateKeyUtc(weeks[weeks.length - 1])}`)
    }
  }

  return panel
}
