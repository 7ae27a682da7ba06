import test from 'node:test'
import assert from 'node:assert/strict'
import {
  MODEL_FEATURE_COLUMNS,
  buildFeatureRows,
  calendarFeatures,
  projectModelFeatures,
  trailingMean,
} from '../src/lib/weekly-features'
import { near, usableRow, utc } from './panel-fixtures'

test('lags and rolling means follow the observed weekly sequence', () => {
  const rows = buildFeatureRows([
    usableRow({ week_start: utc('2024-01-15'), price_eur_per_l: 4.1 }),
    usableRow({ week_start: utc('2024-01-01'), price_eur_per_l: 4.0 }),
    usableRow({ week_start: utc('2024-01-08'), price_eur_per_l: 4.2 }),
  ])
  assert.equal(rows.length, 3)
  assert.deepEqual(rows.map((r) => r.lag1week), [null, 4.0, 4.2])
  assert.deepEqual(rows.map((r) => r.lag2week), [null, null, 4.0])
  assert.equal(rows[0].rolling3, 4.0)
  assert.ok(near(rows[1].rolling3, 4.1))
  assert.ok(near(rows[2].rolling3, 4.1))
  assert.ok(near(rows[2].rolling10, 4.1))
})

test('a single-row entity has rolling10 == rolling3 == price and no lags', () => {
  const [row] = buildFeatureRows([usableRow({ price_eur_per_l: 3.7 })])
  assert.equal(row.rolling3, 3.7)
  assert.equal(row.rolling10, 3.7)
  assert.equal(row.lag1week, null)
  assert.equal(row.lag2week, null)
})

test('entities never see each other and row count is preserved', () => {
  const rows = buildFeatureRows([
    usableRow({ week_start: utc('2024-01-01'), market: 'Milan', price_eur_per_l: 4 }),
    usableRow({ week_start: utc('2024-01-01'), market: 'Rome', price_eur_per_l: 10 }),
    usableRow({ week_start: utc('2024-01-08'), market: 'Milan', price_eur_per_l: 5 }),
    usableRow({ week_start: utc('2024-01-08'), market: 'Rome', price_eur_per_l: 11 }),
    usableRow({ week_start: utc('2024-01-08'), market: 'Milan', grade: 'POMACE', grade_norm: 'POMACE', price_eur_per_l: 2 }),
  ])
  assert.equal(rows.length, 5)
  const milan = rows.filter((r) => r.market === 'Milan' && r.grade === 'EVOO')
  const rome = rows.filter((r) => r.market === 'Rome')
  const pomace = rows.filter((r) => r.grade === 'POMACE')
  assert.deepEqual(milan.map((r) => r.lag1week), [null, 4])
  assert.deepEqual(rome.map((r) => r.lag1week), [null, 10])
  assert.equal(pomace[0].lag1week, null)
  assert.equal(pomace[0].rolling3, 2)
})

test('a skipped week does not null the lag', () => {
  const rows = buildFeatureRows([
    usableRow({ week_start: utc('2024-01-01'), price_eur_per_l: 4 }),
    usableRow({ week_start: utc('2024-01-22'), price_eur_per_l: 5 }),
  ])
  assert.equal(rows[1].lag1week, 4)
})

test('calendar features for a January and a July Monday', () => {
  const jan = calendarFeatures(utc('2024-01-01'))
  assert.equal(jan.month, 1)
  assert.equal(jan.day_of_week, 0)
  assert.equal(jan.quarter, 1)
  assert.equal(jan.sin_week, Math.sin((2 * Math.PI * 1) / 52))

  const jul = calendarFeatures(utc('2024-07-01'))
  assert.equal(jul.month, 7)
  assert.equal(jul.quarter, 3)
  assert.equal(jul.sin_week, Math.sin((2 * Math.PI * 27) / 52))
})

test('missing cost_pressure becomes 0 and present values pass through', () => {
  const rows = buildFeatureRows([
    usableRow({ cost_pressure: null }),
    usableRow({ market: 'Rome', cost_pressure: 0.75 }),
  ])
  assert.deepEqual(rows.map((r) => r.cost_pressure), [0, 0.75])
})

test('the price column is configurable', () => {
  const rows = buildFeatureRows(
    [
      usableRow({ week_start: utc('2024-01-01'), price_usd_per_l: 4.4 }),
      usableRow({ week_start: utc('2024-01-08'), price_usd_per_l: null }),
      usableRow({ week_start: utc('2024-01-15'), price_usd_per_l: 4.8 }),
    ],
    { priceColumn: 'price_usd_per_l' }
  )
  assert.deepEqual(rows.map((r) => r.lag1week), [null, 4.4, null])
  assert.equal(rows[1].rolling3, 4.4)
  assert.ok(near(rows[2].rolling3, 4.6))
})

test('trailingMean ignores nulls inside the window', () => {
  assert.equal(trailingMean([null, null], 1, 3), null)
  assert.equal(trailingMean([1, null, 3, 5], 3, 3), 4)
  assert.equal(trailingMean([1, 2, 3, 4], 3, 2), 3.5)
})

test('model projection keeps only the training columns', () => {
  const frame = projectModelFeatures(buildFeatureRows([usableRow()]))
  assert.deepEqual(frame.columns, [...MODEL_FEATURE_COLUMNS])
  assert.equal(frame.rows[0].price_eur_per_l, 4)
  assert.equal('z_base' in frame.rows[0], false)
})
