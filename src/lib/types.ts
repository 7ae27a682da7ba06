// ─── Raw inputs ───────────────────────────────────────────────────────────

export type MacroField =
  | 'usd_per_eur'
  | 'brent_usd_per_bbl'
  | 'diesel_usd_per_gal'
  | 'ppi_glass'
  | 'ppi_plastic_bottles'
  | 'ppi_steel'
  | 'fbx'

export const MACRO_FIELDS: readonly MacroField[] = [
  'usd_per_eur',
  'brent_usd_per_bbl',
  'diesel_usd_per_gal',
  'ppi_glass',
  'ppi_plastic_bottles',
  'ppi_steel',
  'fbx',
]

export interface RawPoint {
  date: Date | null
  value: number | null
}

export type MacroSeriesSet = Record<MacroField, RawPoint[]>

export interface SpotPriceRow {
  date: Date | null
  country: string | null
  market: string | null
  grade: string | null
  price_eur_per_l: number | null
  pack: string | null
}

export interface TariffRecord {
  hs_prefix: string
  adval_pct: number
  specific_usd_per_kg: number
}

// ─── Aligned series ───────────────────────────────────────────────────────

/** weekStart is always a UTC-midnight Monday. */
export interface WeeklyPoint {
  weekStart: Date
  value: number | null
}

export type WeeklySeriesSet = Record<MacroField, WeeklyPoint[]>

export type MacroValues = Record<MacroField, number | null> & {
  ocean_proxy: number | null
}

export interface MacroGridRow extends MacroValues {
  week_start: Date
}

// ─── Panel ────────────────────────────────────────────────────────────────

export interface PanelRow {
  week_start: Date | null
  snapshot_date: string
  country: string | null
  iso2: string | null
  market: string | null
  grade: string | null
  grade_norm: string | null
  hs_prefix: string | null
  pack: string | null
  price_eur_per_l: number | null
  price_usd_per_l: number | null
  base_usd_per_l: number | null
  usd_per_eur: number | null
  adval_pct: number | null
  duty_rate: number | null
  specific_usd_per_kg: number | null
  duty_specific_usd_per_l: number | null
  duty_cost: number | null
  duty_usd_per_l: number | null
  brent_usd_per_bbl: number | null
  ocean_proxy: number | null
  ocean_idx: number | null
  ocean_uplift: number | null
  diesel_usd_per_gal: number | null
  diesel_uplift: number | null
  pack_cost: number | null
  ppi_glass: number | null
  ppi_plastic_bottles: number | null
  ppi_steel: number | null
  deliv_hat_usd_per_l: number | null
  z_base: number | null
  cost_pressure: number | null
}

/** A panel row that passed the core-identifier check. */
export type UsablePanelRow = PanelRow & {
  week_start: Date
  country: string
  market: string
  grade_norm: string
  price_eur_per_l: number
}

export type FeaturePriceColumn = 'price_eur_per_l' | 'price_usd_per_l' | 'base_usd_per_l'

export interface FeatureRow extends UsablePanelRow {
  cost_pressure: number
  lag1week: number | null
  lag2week: number | null
  rolling3: number | null
  rolling10: number | null
  month: number
  day_of_week: number
  quarter: number
  sin_week: number
}

export type LogSink = (line: string) => void
