/**
 * panel-sources.ts
 *
 * Where the raw spot, macro and tariff tables come from. Every source hands
 * back loosely-typed frames; the contracts below resolve header aliases and
 * coerce cells once, so the pipeline only ever sees typed rows.
 */

import fs from 'node:fs'
import path from 'node:path'
import { isoWeekStart } from './calendar'
import { DENSITY_KG_PER_L } from './cost-policy'
import { readCsvFile } from './csv'
import { PipelineError } from './errors'
import {
  cellDate,
  cellNumber,
  cellString,
  hasColumn,
  resolveFrame,
  type ColumnAlias,
  type Frame,
  type TableContract,
} from './table-contract'
import {
  MACRO_FIELDS,
  type LogSink,
  type MacroField,
  type MacroSeriesSet,
  type RawPoint,
  type SpotPriceRow,
  type TariffRecord,
} from './types'
import type { PanelInputs } from './weekly-pipeline'

export interface PanelSource {
  readonly name: string
  loadSpotPrices(): Promise<SpotPriceRow[]>
  loadMacroSeries(): Promise<MacroSeriesSet>
  loadTariffs(): Promise<TariffRecord[]>
  close(): Promise<void>
}

const alias = (...names: string[]): ColumnAlias[] => names.map((from) => ({ from }))

// ─── Spot prices ──────────────────────────────────────────────────────────

export const SPOT_CONTRACT: TableContract = {
  table: 'spot_prices',
  columns: [
    { name: 'date', kind: 'date', aliases: alias('referencefrom', 'reference_from', 'ref_from', 'week_start') },
    { name: 'country', kind: 'string', required: true, aliases: alias('member_state', 'memberstate') },
    { name: 'market', kind: 'string', required: true, aliases: alias('city', 'location') },
    { name: 'grade', kind: 'string', required: true, aliases: alias('category', 'product', 'prod', 'variety') },
    {
      name: 'price_eur_per_l',
      kind: 'number',
      required: true,
      aliases: [
        { from: 'eur_per_l' },
        { from: 'price' },
        { from: 'price_eur_per_kg', transform: (v) => v * DENSITY_KG_PER_L },
        { from: 'eur_per_kg', transform: (v) => v * DENSITY_KG_PER_L },
        { from: 'price_eur_per_100kg', transform: (v) => (v / 100) * DENSITY_KG_PER_L },
        { from: 'eur_100kg', transform: (v) => (v / 100) * DENSITY_KG_PER_L },
      ],
    },
    { name: 'pack', kind: 'string', aliases: alias('packaging', 'container') },
    { name: 'year', kind: 'number', aliases: alias('yr') },
    { name: 'week', kind: 'number', aliases: alias('wk') },
  ],
}

export function spotRowsFromFrame(frame: Frame): SpotPriceRow[] {
  const hasDate = hasColumn(frame, SPOT_CONTRACT, 'date')
  const hasYearWeek = hasColumn(frame, SPOT_CONTRACT, 'year') && hasColumn(frame, SPOT_CONTRACT, 'week')
  if (!hasDate && !hasYearWeek) {
    throw new PipelineError('schema', 'spot_prices missing required columns: date (or year + week)')
  }

  const resolved = resolveFrame(frame, SPOT_CONTRACT)
  return resolved.rows.map((r) => {
    let date = hasDate ? cellDate(r, 'date') : null
    if (!hasDate) {
      const year = cellNumber(r, 'year')
      const week = cellNumber(r, 'week')
      date = year !== null && week !== null ? isoWeekStart(year, week) : null
    }
    return {
      date,
      country: cellString(r, 'country'),
      market: cellString(r, 'market'),
      grade: cellString(r, 'grade'),
      price_eur_per_l: cellNumber(r, 'price_eur_per_l'),
      pack: cellString(r, 'pack'),
    }
  })
}

// ─── Tariffs ──────────────────────────────────────────────────────────────

export const TARIFF_CONTRACT: TableContract = {
  table: 'tariffs',
  columns: [
    { name: 'hs_prefix', kind: 'string', required: true, aliases: alias('hs4', 'hs_code', 'hs', 'hts8') },
    { name: 'adval_pct', kind: 'number', aliases: alias('mfn_ad_val_rate', 'mfn_ave', 'mfn_ad_val', 'ad_valorem_pct') },
    {
      name: 'specific_usd_per_kg',
      kind: 'number',
      aliases: alias('mfn_specific_rate', 'mfn_specific', 'specific_rate'),
    },
  ],
}

/** Digits only, first four: "1509.10.20" → "1509". */
export function toHsPrefix(code: string | null): string | null {
  if (code === null) return null
  const digits = code.replace(/\D/g, '').slice(0, 4)
  return digits.length ? digits : null
}

/** Rows without a usable HS code are dropped; absent rates read as 0. Input order is kept. */
export function tariffsFromFrame(frame: Frame): TariffRecord[] {
  const out: TariffRecord[] = []
  for (const r of resolveFrame(frame, TARIFF_CONTRACT).rows) {
    const hsPrefix = toHsPrefix(cellString(r, 'hs_prefix'))
    if (hsPrefix === null) continue
    out.push({
      hs_prefix: hsPrefix,
      adval_pct: cellNumber(r, 'adval_pct') ?? 0,
      specific_usd_per_kg: cellNumber(r, 'specific_usd_per_kg') ?? 0,
    })
  }
  return out
}

// ─── Macro series ─────────────────────────────────────────────────────────

const DATE_ALIASES = alias('week_start', 'observation_date', 'period', 'obs_date')

const invert = (v: number): number | null => (v === 0 ? null : 1 / v)

/** Value-column aliases per field, in preference order. */
export const MACRO_VALUE_ALIASES: Record<MacroField, readonly ColumnAlias[]> = {
  usd_per_eur: [{ from: 'value' }, { from: 'eurusd' }, { from: 'eur_usd' }, { from: 'dexuseu' }, { from: 'usdeur', transform: invert }],
  brent_usd_per_bbl: alias('value', 'brent', 'dcoilbrenteu', 'price'),
  diesel_usd_per_gal: alias('value', 'diesel', 'price'),
  ppi_glass: alias('glass'),
  ppi_plastic_bottles: alias('plastic_bottles', 'plastic'),
  ppi_steel: alias('steel'),
  fbx: alias('fbx_global', 'fbx_index', 'index', 'price', 'value'),
}

export function macroContract(table: string, fields: readonly MacroField[]): TableContract {
  return {
    table,
    columns: [
      { name: 'date', kind: 'date', required: true, aliases: DATE_ALIASES },
      ...fields.map((field) => ({ name: field, kind: 'number' as const, aliases: MACRO_VALUE_ALIASES[field] })),
    ],
  }
}

/**
 * Points for each requested field. A field whose value column is absent
 * comes back as an empty series with a warning; the date column is required.
 */
export function macroPointsFromFrame(
  table: string,
  frame: Frame,
  fields: readonly MacroField[],
  log: LogSink = console.warn
): Partial<Record<MacroField, RawPoint[]>> {
  const contract = macroContract(table, fields)
  const resolved = resolveFrame(frame, contract)
  const out: Partial<Record<MacroField, RawPoint[]>> = {}

  for (const field of fields) {
    if (!hasColumn(frame, contract, field)) {
      log(`[sources] WARN ${table}: no value column for ${field}; series left empty`)
      out[field] = []
      continue
    }
    out[field] = resolved.rows.map((r) => ({ date: cellDate(r, 'date'), value: cellNumber(r, field) }))
  }
  return out
}

export function emptyMacroSeries(): MacroSeriesSet {
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

export function isMacroField(value: string): value is MacroField {
  return MACRO_FIELDS.some((f) => f === value)
}

// ─── CSV directory source ─────────────────────────────────────────────────

export const MACRO_FILES: ReadonlyArray<{ file: string; fields: readonly MacroField[] }> = [
  { file: 'fx.csv', fields: ['usd_per_eur'] },
  { file: 'brent.csv', fields: ['brent_usd_per_bbl'] },
  { file: 'diesel.csv', fields: ['diesel_usd_per_gal'] },
  { file: 'ppi.csv', fields: ['ppi_glass', 'ppi_plastic_bottles', 'ppi_steel'] },
  { file: 'fbx.csv', fields: ['fbx'] },
]

export class CsvPanelSource implements PanelSource {
  readonly name = 'csv'

  constructor(
    private readonly dir: string,
    private readonly log: LogSink = console.log
  ) {}

  private file(name: string): string {
    return path.join(this.dir, name)
  }

  private readRequired(name: string): Frame {
    const file = this.file(name)
    if (!fs.existsSync(file)) {
      throw new PipelineError('empty', `Required input not found: ${file}`)
    }
    return readCsvFile(file)
  }

  async loadSpotPrices(): Promise<SpotPriceRow[]> {
    const rows = spotRowsFromFrame(this.readRequired('spot_prices.csv'))
    this.log(`[sources] spot_prices.csv: ${rows.length} rows`)
    return rows
  }

  async loadMacroSeries(): Promise<MacroSeriesSet> {
    const series = emptyMacroSeries()
    for (const { file, fields } of MACRO_FILES) {
      const full = this.file(file)
      if (!fs.existsSync(full)) {
        this.log(`[sources] WARN ${file} not found; ${fields.join(', ')} left empty`)
        continue
      }
      const points = macroPointsFromFrame(file, readCsvFile(full), fields, this.log)
      for (const field of fields) series[field] = points[field] ?? []
      this.log(`[sources] ${file}: ${fields.map((f) => `${f}=${series[f].length}`).join(' ')}`)
    }
    return series
  }

  async loadTariffs(): Promise<TariffRecord[]> {
    const file = this.file('tariffs.csv')
    if (!fs.existsSync(file)) {
      this.log(`[sources] WARN tariffs.csv not found; duty columns will be null`)
      return []
    }
    const rows = tariffsFromFrame(readCsvFile(file))
    this.log(`[sources] tariffs.csv: ${rows.length} rows`)
    return rows
  }

  async close(): Promise<void> {}
}

export async function loadPanelInputs(source: PanelSource): Promise<PanelInputs> {
  const [spot, macro, tariffs] = await Promise.all([
    source.loadSpotPrices(),
    source.loadMacroSeries(),
    source.loadTariffs(),
  ])
  return { spot, macro, tariffs }
}
