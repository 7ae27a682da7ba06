import test from 'node:test'
import assert from 'node:assert/strict'
import { formatCsv, parseCsv } from '../src/lib/csv'
import { PipelineError } from '../src/lib/errors'
import { emptyMacroSeries } from '../src/lib/panel-sources'
import { panelRowsToFrame } from '../src/lib/panel-schema'
import type { SpotPriceRow } from '../src/lib/types'
import { buildWeeklyFeatures, buildWeeklyPanel, type PanelInputs } from '../src/lib/weekly-pipeline'
import { TEST_POLICY, near, silentLog, utc } from './panel-fixtures'

const WEEKS = ['2024-01-01', '2024-01-08', '2024-01-15']
const PRICES = [4.0, 4.2, 4.1]

function milanInputs(): PanelInputs {
  const spot: SpotPriceRow[] = WEEKS.map((day, i) => ({
    date: utc(day),
    country: 'IT',
    market: 'Milan',
    grade: 'EVOO',
    price_eur_per_l: PRICES[i],
    pack: 'glass',
  }))
  const macro = emptyMacroSeries()
  macro.usd_per_eur = WEEKS.map((day) => ({ date: utc(day), value: 1.08 }))
  return {
    spot,
    macro,
    tariffs: [
      { hs_prefix: '1509', adval_pct: 0, specific_usd_per_kg: 0 },
      { hs_prefix: '1509', adval_pct: 0, specific_usd_per_kg: 0 },
    ],
  }
}

const options = { snapshotDate: '2024-06-03', policy: TEST_POLICY, log: silentLog() }

test('IT/Milan/EVOO: three weeks through panel and features', () => {
  const { grid, panel } = buildWeeklyPanel(milanInputs(), options)
  assert.equal(grid.length, 3)
  assert.equal(panel.length, 3)
  assert.deepEqual(panel.map((r) => r.usd_per_eur), [1.08, 1.08, 1.08])
  assert.ok(near(panel[0].price_usd_per_l, 4.32))
  assert.equal(panel[0].pack_cost, 0.22)
  assert.equal(panel[0].duty_usd_per_l, 0)

  const { features, report, modelFeatures } = buildWeeklyFeatures(panelRowsToFrame(panel), options)
  assert.equal(report.usable, 3)
  assert.equal(features.length, 3)
  const third = features[2]
  assert.deepEqual(third.week_start, utc('2024-01-15'))
  assert.equal(third.lag1week, 4.2)
  assert.equal(third.lag2week, 4.0)
  assert.ok(near(third.rolling3, 4.1))
  assert.deepEqual(features.map((f) => f.cost_pressure), [0, 0, 0])
  assert.equal(modelFeatures.rows.length, 3)
})

test('features built from the panel CSV match the in-memory run', () => {
  const { panel } = buildWeeklyPanel(milanInputs(), options)
  const reread = parseCsv(formatCsv(panelRowsToFrame(panel)))
  const { features } = buildWeeklyFeatures(reread, options)
  assert.deepEqual(features.map((f) => f.lag1week), [null, 4.0, 4.2])
  assert.deepEqual(features.map((f) => f.week_start), WEEKS.map(utc))
  assert.equal(features[0].grade_norm, 'EVOO')
})

test('an empty spot table is an empty-input error', () => {
  const inputs = { ...milanInputs(), spot: [] }
  assert.throws(
    () => buildWeeklyPanel(inputs, options),
    (err: unknown) => err instanceof PipelineError && err.kind === 'empty'
  )
})
