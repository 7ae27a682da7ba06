import { parseCostPolicy, type CostPolicy } from '../src/lib/cost-policy'
import type { MacroGridRow, PanelRow, UsablePanelRow } from '../src/lib/types'

export const TEST_POLICY: CostPolicy = parseCostPolicy({
  grades: {
    EVOO: { hsPrefix: '1509', advalMultiplier: 1, specificMultiplier: 1 },
    POMACE: { hsPrefix: '1510', advalMultiplier: 1, specificMultiplier: 1 },
  },
  defaultDuty: { advalMultiplier: 1, specificMultiplier: 1 },
  oceanProxy: { fbxScale: 1, brentScale: null },
})

export const utc = (day: string): Date => new Date(`${day}T00:00:00Z`)

export function near(actual: number | null | undefined, expected: number, eps = 1e-9): boolean {
  return typeof actual === 'number' && Math.abs(actual - expected) < eps
}

export function silentLog(lines: string[] = []): (line: string) => void {
  return (line) => {
    lines.push(line)
  }
}

export function panelRow(overrides: Partial<PanelRow> = {}): PanelRow {
  return {
    week_start: utc('2024-01-01'),
    snapshot_date: '2024-06-03',
    country: 'IT',
    iso2: 'IT',
    market: 'Milan',
    grade: 'EVOO',
    grade_norm: 'EVOO',
    hs_prefix: '1509',
    pack: null,
    price_eur_per_l: 4,
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
    ...overrides,
  }
}

export function usableRow(overrides: Partial<UsablePanelRow> = {}): UsablePanelRow {
  return {
    ...panelRow(),
    week_start: utc('2024-01-01'),
    country: 'IT',
    market: 'Milan',
    grade_norm: 'EVOO',
    price_eur_per_l: 4,
    ...overrides,
  }
}

export function gridRow(week: string, values: Partial<Omit<MacroGridRow, 'week_start'>> = {}): MacroGridRow {
  return {
    week_start: utc(week),
    usd_per_eur: null,
    brent_usd_per_bbl: null,
    diesel_usd_per_gal: null,
    ppi_glass: null,
    ppi_plastic_bottles: null,
    ppi_steel: null,
    fbx: null,
    ocean_proxy: null,
    ...values,
  }
}
