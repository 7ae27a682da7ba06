/**
 * usability.ts
 *
 * A panel row is usable for features when its core identifiers and EUR price
 * are present. Macro, FX, tariff and freight columns never exclude a row:
 * their coverage is expected to be patchy over long history and the model
 * handles the nulls.
 */

import { dutyForRow, type CostPolicy } from './cost-policy'
import { PipelineError } from './errors'
import { frameToPanelRows, PANEL_CONTRACT } from './panel-schema'
import { resolveFrame, type Frame } from './table-contract'
import type { LogSink, PanelRow, UsablePanelRow } from './types'

export interface UsabilityReport {
  total: number
  usable: number
  /** Diagnostics only; none of these filter. */
  coverage: {
    fx: number
    priceUsd: number
    tariff: number
    dutyUsd: number
    ocean: number
    diesel: number
    ppi: number
  }
}

export interface UsabilityResult {
  rows: UsablePanelRow[]
  report: UsabilityReport
}

export function isUsable(row: PanelRow): row is UsablePanelRow {
  return (
    row.week_start !== null &&
    row.country !== null &&
    row.market !== null &&
    row.grade_norm !== null &&
    row.price_eur_per_l !== null
  )
}

function countWhere(rows: readonly PanelRow[], test: (row: PanelRow) => boolean): number {
  let n = 0
  for (const row of rows) if (test(row)) n++
  return n
}

/**
 * Resolve the panel frame against its contract (throws when a core column is
 * absent from the schema), then keep usable rows. Throws when none remain.
 */
export function filterUsable(
  frame: Frame,
  options: { snapshotDate: string; log?: LogSink }
): UsabilityResult {
  const log = options.log ?? console.log
  const rows = frameToPanelRows(resolveFrame(frame, PANEL_CONTRACT), options.snapshotDate)
  const usable = rows.filter(isUsable)

  const report: UsabilityReport = {
    total: rows.length,
    usable: usable.length,
    coverage: {
      fx: countWhere(rows, (r) => r.usd_per_eur !== null),
      priceUsd: countWhere(rows, (r) => r.price_usd_per_l !== null),
      tariff: countWhere(rows, (r) => r.adval_pct !== null || r.specific_usd_per_kg !== null),
      dutyUsd: countWhere(rows, (r) => r.duty_usd_per_l !== null),
      ocean: countWhere(rows, (r) => r.ocean_proxy !== null),
      diesel: countWhere(rows, (r) => r.diesel_usd_per_gal !== null),
      ppi: countWhere(rows, (r) => r.ppi_glass !== null || r.ppi_plastic_bottles !== null || r.ppi_steel !== null),
    },
  }

  log(`[features] Usable rows for features: ${report.usable} / ${report.total}`)
  for (const [name, count] of Object.entries(report.coverage)) {
    log(`[features]   has_${name.padEnd(9)} ${String(count).padStart(7)} / ${report.total}`)
  }

  if (usable.length === 0) {
    throw new PipelineError('empty', 'No usable rows for features after core filtering')
  }

  return { rows: usable, report }
}

/** Fill price_usd_per_l, base_usd_per_l and duty_usd_per_l where their inputs allow. */
export function imputeDerived(
  rows: readonly UsablePanelRow[],
  policy: CostPolicy,
  log: LogSink = console.log
): UsablePanelRow[] {
  let pricesFilled = 0
  let dutiesFilled = 0

  const out = rows.map((row): UsablePanelRow => {
    let priceUsd = row.price_usd_per_l
    if (priceUsd === null && row.usd_per_eur !== null) {
      priceUsd = row.price_eur_per_l * row.usd_per_eur
      pricesFilled++
    }

    const base = row.base_usd_per_l ?? priceUsd

    let dutyUsd = row.duty_usd_per_l
    if (dutyUsd === null && base !== null && (row.adval_pct !== null || row.specific_usd_per_kg !== null)) {
      dutyUsd = dutyForRow(policy, base, row.grade_norm, row.specific_usd_per_kg, row.adval_pct)
      dutiesFilled++
    }

    return { ...row, price_usd_per_l: priceUsd, base_usd_per_l: base, duty_usd_per_l: dutyUsd }
  })

  if (pricesFilled > 0) log(`[features] Imputed price_usd_per_l for ${pricesFilled} rows`)
  if (dutiesFilled > 0) log(`[features] Imputed duty_usd_per_l for ${dutiesFilled} rows`)
  return out
}
