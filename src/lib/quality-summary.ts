import { dateKeyUtc } from './calendar'
import type { FeatureRow, LogSink } from './types'

export interface ColumnRange {
  column: string
  nonNull: number
  min: number | null
  max: number | null
}

export interface QualitySummary {
  totalRows: number
  usableRows: number
  featureRows: number
  countries: number
  markets: number
  grades: number
  weeks: number
  firstWeek: string | null
  lastWeek: string | null
  ranges: ColumnRange[]
}

type NumericFeatureColumn = {
  [K in keyof FeatureRow]: FeatureRow[K] extends number | null ? K : never
}[keyof FeatureRow]

const SUMMARY_COLUMNS: readonly NumericFeatureColumn[] = [
  'price_eur_per_l',
  'price_usd_per_l',
  'usd_per_eur',
  'duty_usd_per_l',
  'ocean_proxy',
  'diesel_usd_per_gal',
  'ppi_glass',
  'ppi_plastic_bottles',
  'ppi_steel',
  'cost_pressure',
  'lag1week',
  'lag2week',
  'rolling3',
  'rolling10',
]

function rangeOf(rows: readonly FeatureRow[], column: NumericFeatureColumn): ColumnRange {
  let nonNull = 0
  let min: number | null = null
  let max: number | null = null
  for (const row of rows) {
    const v: number | null = row[column]
    if (v === null || !Number.isFinite(v)) continue
    nonNull++
    if (min === null || v < min) min = v
    if (max === null || v > max) max = v
  }
  return { column, nonNull, min, max }
}

export function summarizeQuality(
  totalRows: number,
  usableRows: number,
  features: readonly FeatureRow[]
): QualitySummary {
  const weeks = [...new Set(features.map((r) => r.week_start.getTime()))].sort((a, b) => a - b)
  return {
    totalRows,
    usableRows,
    featureRows: features.length,
    countries: new Set(features.map((r) => r.country)).size,
    markets: new Set(features.map((r) => r.market)).size,
    grades: new Set(features.map((r) => r.grade_norm)).size,
    weeks: weeks.length,
    firstWeek: weeks.length ? dateKeyUtc(new Date(weeks[0])) : null,
    lastWeek: weeks.length ? dateKeyUtc(new Date(weeks[weeks.length - 1])) : null,
    ranges: SUMMARY_COLUMNS.map((c) => rangeOf(features, c)),
  }
}

function fmt(value: number | null): string {
  return value === null ? 'n/a' : value.toFixed(4)
}

export function logQualitySummary(summary: QualitySummary, log: LogSink = console.log): void {
  log(`\n=== Weekly Features Quality ===`)
  log(`Rows:      ${summary.featureRows} features from ${summary.usableRows} usable / ${summary.totalRows} panel rows`)
  log(`Entities:  ${summary.countries} countries, ${summary.markets} markets, ${summary.grades} grades`)
  log(`Weeks:     ${summary.weeks} (${summary.firstWeek ?? 'n/a'} → ${summary.lastWeek ?? 'n/a'})`)
  log(`\nCoverage:`)
  for (const r of summary.ranges) {
    const pct = summary.featureRows > 0 ? ((r.nonNull / summary.featureRows) * 100).toFixed(1) : '0.0'
    log(`  ${r.column.padEnd(22)} ${pct.padStart(5)}%  min=${fmt(r.min)}  max=${fmt(r.max)}`)
  }
}
