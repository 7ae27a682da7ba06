import test from 'node:test'
import assert from 'node:assert/strict'
import { PipelineError } from '../src/lib/errors'
import { assertUniquePanelKeys, collapseSpotWeeks, dedupeLastBy, mergePanel } from '../src/lib/panel-merge'
import type { SpotPriceRow } from '../src/lib/types'
import { TEST_POLICY, gridRow, near, panelRow, silentLog, utc } from './panel-fixtures'

function spot(day: string, price: number | null, overrides: Partial<SpotPriceRow> = {}): SpotPriceRow {
  return { date: utc(day), country: 'IT', market: 'Milan', grade: 'EVOO', price_eur_per_l: price, pack: null, ...overrides }
}

const options = (lines: string[] = []) => ({ snapshotDate: '2024-06-03', policy: TEST_POLICY, log: silentLog(lines) })

test('dedupeLastBy keeps the last row per key', () => {
  const rows = [
    { k: 'a', v: 1 },
    { k: 'b', v: 2 },
    { k: 'a', v: 3 },
  ]
  assert.deepEqual(dedupeLastBy(rows, (r) => r.k), [
    { k: 'b', v: 2 },
    { k: 'a', v: 3 },
  ])
})

test('duplicate tariffs do not inflate panel rows', () => {
  const lines: string[] = []
  const panel = mergePanel(
    [spot('2024-01-01', 4), spot('2024-01-08', 4.2)],
    [],
    [
      { hs_prefix: '1509', adval_pct: 5, specific_usd_per_kg: 0.1 },
      { hs_prefix: ' 1509 ', adval_pct: 7, specific_usd_per_kg: 0.2 },
    ],
    options(lines)
  )
  assert.equal(panel.length, 2)
  assert.deepEqual(panel.map((r) => r.adval_pct), [7, 7])
  assert.deepEqual(panel.map((r) => r.specific_usd_per_kg), [0.2, 0.2])
  assert.ok(lines.includes('[panel] Tariffs deduplicated: 2 → 1 (last hs_prefix wins)'))
})

test('every spot row survives even without macro or tariff coverage', () => {
  const panel = mergePanel([spot('2024-01-02', 3.5, { grade: 'mystery blend' })], [], [], options())
  assert.equal(panel.length, 1)
  const [row] = panel
  assert.deepEqual(row.week_start, utc('2024-01-01'))
  assert.equal(row.grade_norm, 'MYSTERY BLEND')
  assert.equal(row.hs_prefix, null)
  assert.equal(row.usd_per_eur, null)
  assert.equal(row.adval_pct, null)
  assert.equal(row.snapshot_date, '2024-06-03')
})

test('spot rows pick up the grid week and the grade tariff', () => {
  const panel = mergePanel(
    [spot('2024-01-10', 4, { grade: ' evoo ', country: 'ES', market: 'Jaen' })],
    [gridRow('2024-01-01', { usd_per_eur: 1.05 }), gridRow('2024-01-08', { usd_per_eur: 1.08, ppi_glass: 120 })],
    [{ hs_prefix: '1509', adval_pct: 3, specific_usd_per_kg: 0 }],
    options()
  )
  const [row] = panel
  assert.equal(row.iso2, 'ES')
  assert.equal(row.grade_norm, 'EVOO')
  assert.equal(row.hs_prefix, '1509')
  assert.equal(row.usd_per_eur, 1.08)
  assert.equal(row.ppi_glass, 120)
  assert.equal(row.adval_pct, 3)
})

test('duplicate grid weeks resolve to the last row', () => {
  const panel = mergePanel(
    [spot('2024-01-01', 4)],
    [gridRow('2024-01-01', { usd_per_eur: 1.0 }), gridRow('2024-01-01', { usd_per_eur: 1.1 })],
    [],
    options()
  )
  assert.equal(panel[0].usd_per_eur, 1.1)
})

test('same-week observations collapse to their mean price and latest pack', () => {
  const collapsed = collapseSpotWeeks([
    spot('2024-01-04', 4.4, { pack: null }),
    spot('2024-01-02', 4.0, { pack: 'glass' }),
  ])
  assert.equal(collapsed.length, 1)
  assert.ok(near(collapsed[0].price_eur_per_l, 4.2))
  assert.equal(collapsed[0].pack, 'glass')
})

test('panel is ordered by week, country, market, grade', () => {
  const panel = mergePanel(
    [
      spot('2024-01-08', 1, { country: 'IT' }),
      spot('2024-01-01', 2, { country: 'IT', market: 'Rome' }),
      spot('2024-01-01', 3, { country: 'ES', market: 'Jaen' }),
      spot('2024-01-01', 4, { country: 'IT', market: 'Bari' }),
    ],
    [],
    [],
    options()
  )
  assert.deepEqual(
    panel.map((r) => r.price_eur_per_l),
    [3, 4, 2, 1]
  )
})

test('assertUniquePanelKeys reports duplicates as a merge error', () => {
  assert.throws(
    () => assertUniquePanelKeys([panelRow(), panelRow()]),
    (err: unknown) => err instanceof PipelineError && err.kind === 'merge'
  )
  assert.doesNotThrow(() => assertUniquePanelKeys([panelRow(), panelRow({ market: 'Rome' })]))
})
