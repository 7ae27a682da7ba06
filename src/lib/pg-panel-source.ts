/**
 * pg-panel-source.ts: raw panel inputs from Postgres.
 *
 * Tables are created by sql/panel-sources.sql. Dates are selected as text so
 * node-postgres never shifts them through the local timezone.
 */

import pg from 'pg'
import { logResolvedDbTarget, resolvePanelDbUrl } from './db-url'
import {
  emptyMacroSeries,
  isMacroField,
  macroPointsFromFrame,
  spotRowsFromFrame,
  tariffsFromFrame,
  type PanelSource,
} from './panel-sources'
import type { Frame } from './table-contract'
import type { LogSink, MacroField, MacroSeriesSet, SpotPriceRow, TariffRecord } from './types'

/** The slice of pg.Pool this source needs. */
export interface SqlRunner {
  query(text: string, values?: unknown[]): Promise<{ rows: Record<string, unknown>[]; fields: { name: string }[] }>
  end(): Promise<void>
}

const SPOT_SQL = `
  select date::text as date, country, market, grade, price_eur_per_l, pack
  from spot_prices
  order by date, id`

const MACRO_SQL = `
  select series, obs_date::text as date, value
  from macro_observations
  order by series, obs_date`

const FREIGHT_SQL = `
  select week_start::text as date, fbx
  from freight_index
  order by week_start`

const TARIFF_SQL = `
  select hs_prefix, adval_pct, specific_usd_per_kg
  from tariffs
  order by id`

function toFrame(result: { rows: Record<string, unknown>[]; fields: { name: string }[] }): Frame {
  return { columns: result.fields.map((f) => f.name), rows: result.rows }
}

export class PgPanelSource implements PanelSource {
  readonly name = 'pg'

  constructor(
    private readonly db: SqlRunner,
    private readonly log: LogSink = console.log
  ) {}

  async loadSpotPrices(): Promise<SpotPriceRow[]> {
    const rows = spotRowsFromFrame(toFrame(await this.db.query(SPOT_SQL)))
    this.log(`[sources] spot_prices: ${rows.length} rows`)
    return rows
  }

  async loadMacroSeries(): Promise<MacroSeriesSet> {
    const series = emptyMacroSeries()

    const macro = await this.db.query(MACRO_SQL)
    const bySeries = new Map<MacroField, Record<string, unknown>[]>()
    for (const row of macro.rows) {
      const name = typeof row.series === 'string' ? row.series.trim() : ''
      if (!isMacroField(name)) continue
      const list = bySeries.get(name) ?? []
      list.push(row)
      bySeries.set(name, list)
    }
    for (const [name, rows] of bySeries) {
      const frame: Frame = { columns: ['date', name], rows: rows.map((r) => ({ date: r.date, [name]: r.value })) }
      const points = macroPointsFromFrame('macro_observations', frame, [name], this.log)
      series[name] = points[name] ?? []
    }

    const freight = macroPointsFromFrame('freight_index', toFrame(await this.db.query(FREIGHT_SQL)), ['fbx'], this.log)
    if (freight.fbx && freight.fbx.length > 0) series.fbx = freight.fbx

    this.log(`[sources] macro: ${Object.entries(series).map(([k, v]) => `${k}=${v.length}`).join(' ')}`)
    return series
  }

  async loadTariffs(): Promise<TariffRecord[]> {
    const rows = tariffsFromFrame(toFrame(await this.db.query(TARIFF_SQL)))
    this.log(`[sources] tariffs: ${rows.length} rows`)
    return rows
  }

  async close(): Promise<void> {
    await this.db.end()
  }
}

export function createPgPanelSource(log: LogSink = console.log): PgPanelSource {
  const target = resolvePanelDbUrl()
  logResolvedDbTarget('panel-source', target)
  const pool = new pg.Pool({ connectionString: target.url, max: 2 })
  return new PgPanelSource(
    {
      query: (text, values) => pool.query(text, values),
      end: () => pool.end(),
    },
    log
  )
}
