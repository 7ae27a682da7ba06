import { normalizeGrade } from './cost-policy'
import {
  cellDate,
  cellNumber,
  cellString,
  type ColumnSpec,
  type Frame,
  type FrameRecord,
  type TableContract,
} from './table-contract'
import type { PanelRow } from './types'

type NumericPanelColumn = {
  [K in keyof PanelRow]: PanelRow[K] extends number | null ? K : never
}[keyof PanelRow]

const NUMERIC_COLUMNS: readonly NumericPanelColumn[] = [
  'price_usd_per_l',
  'base_usd_per_l',
  'usd_per_eur',
  'adval_pct',
  'duty_rate',
  'specific_usd_per_kg',
  'duty_specific_usd_per_l',
  'duty_cost',
  'duty_usd_per_l',
  'brent_usd_per_bbl',
  'ocean_proxy',
  'ocean_idx',
  'ocean_uplift',
  'diesel_usd_per_gal',
  'diesel_uplift',
  'pack_cost',
  'ppi_glass',
  'ppi_plastic_bottles',
  'ppi_steel',
  'deliv_hat_usd_per_l',
  'z_base',
  'cost_pressure',
]

/** Output column order of the weekly panel file. */
export const PANEL_COLUMN_ORDER: readonly (keyof PanelRow)[] = [
  'week_start',
  'snapshot_date',
  'country',
  'iso2',
  'market',
  'grade',
  'grade_norm',
  'hs_prefix',
  'pack',
  'price_eur_per_l',
  'price_usd_per_l',
  'base_usd_per_l',
  'usd_per_eur',
  'adval_pct',
  'duty_rate',
  'specific_usd_per_kg',
  'duty_specific_usd_per_l',
  'duty_cost',
  'duty_usd_per_l',
  'brent_usd_per_bbl',
  'ocean_proxy',
  'ocean_idx',
  'ocean_uplift',
  'diesel_usd_per_gal',
  'diesel_uplift',
  'pack_cost',
  'ppi_glass',
  'ppi_plastic_bottles',
  'ppi_steel',
  'deliv_hat_usd_per_l',
  'z_base',
  'cost_pressure',
]

const PANEL_SPECS: ColumnSpec[] = [
  { name: 'week_start', kind: 'date', required: true },
  { name: 'snapshot_date', kind: 'string' },
  { name: 'country', kind: 'string', required: true },
  { name: 'iso2', kind: 'string' },
  { name: 'market', kind: 'string', required: true },
  { name: 'grade', kind: 'string', required: true },
  { name: 'grade_norm', kind: 'string' },
  { name: 'hs_prefix', kind: 'string' },
  { name: 'pack', kind: 'string' },
  { name: 'price_eur_per_l', kind: 'number', required: true },
  ...NUMERIC_COLUMNS.map((name): ColumnSpec => ({ name, kind: 'number' })),
]

export const PANEL_CONTRACT: TableContract = { table: 'weekly_panel', columns: PANEL_SPECS }

/** Rows of a frame already passed through resolveFrame(frame, PANEL_CONTRACT). */
export function frameToPanelRows(frame: Frame, snapshotDate: string): PanelRow[] {
  return frame.rows.map((r) => {
    const country = cellString(r, 'country')
    const grade = cellString(r, 'grade')
    const row: PanelRow = {
      week_start: cellDate(r, 'week_start'),
      snapshot_date: cellString(r, 'snapshot_date') ?? snapshotDate,
      country,
      iso2: cellString(r, 'iso2') ?? country,
      market: cellString(r, 'market'),
      grade,
      grade_norm: cellString(r, 'grade_norm') ?? normalizeGrade(grade),
      hs_prefix: cellString(r, 'hs_prefix'),
      pack: cellString(r, 'pack'),
      price_eur_per_l: cellNumber(r, 'price_eur_per_l'),
      price_usd_per_l: null,
      base_usd_per_l: null,
      usd_per_eur: null,
      adval_pct: null,
      duty_rate: null,
      specific_usd_per_kg: null,
      duty_specific_usd_per_l: null,
      duty_cost: null,
      duty_usd_per_l: null,
      brent_usd_per_bbl: null,
      ocean_proxy: null,
      ocean_idx: null,
      ocean_uplift: null,
      diesel_usd_per_gal: null,
      diesel_uplift: null,
      pack_cost: null,
      ppi_glass: null,
      ppi_plastic_bottles: null,
      ppi_steel: null,
      deliv_hat_usd_per_l: null,
      z_base: null,
      cost_pressure: null,
    }
    for (const name of NUMERIC_COLUMNS) row[name] = cellNumber(r, name)
    return row
  })
}

/** Project typed rows onto a frame with the given column order. */
export function toFrame<R>(columns: readonly (keyof R & string)[], rows: readonly R[]): Frame {
  return {
    columns: [...columns],
    rows: rows.map((row) => {
      const out: FrameRecord = {}
      for (const c of columns) out[c] = row[c]
      return out
    }),
  }
}

export function panelRowsToFrame(rows: readonly PanelRow[]): Frame {
  return toFrame(PANEL_COLUMN_ORDER, rows)
}
