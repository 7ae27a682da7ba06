import test from 'node:test'
import assert from 'node:assert/strict'
import { computeCostPressure, populationZ } from '../src/lib/cost-pressure'
import { near, panelRow } from './panel-fixtures'

test('populationZ uses ddof 0 and zeros a flat column', () => {
  assert.deepEqual(populationZ([1, 3]), [-1, 1])
  assert.deepEqual(populationZ([2, 2, null]), [0, 0, 0])
  assert.deepEqual(populationZ(Array.from({ length: 10 }, () => 0.1)), Array.from({ length: 10 }, () => 0))
  assert.deepEqual(populationZ([null, null]), [null, null])
})

test('all-null and all-zero drivers are skipped and weights renormalised', () => {
  const rows = computeCostPressure([
    panelRow({ ocean_proxy: 1, ppi_glass: 0 }),
    panelRow({ ocean_proxy: 3, ppi_glass: 0, market: 'Rome' }),
  ])
  assert.deepEqual(rows.map((r) => r.cost_pressure), [-1, 1])
})

test('weights blend several drivers', () => {
  const rows = computeCostPressure([
    panelRow({ ocean_proxy: 1, diesel_usd_per_gal: 2 }),
    panelRow({ ocean_proxy: 3, diesel_usd_per_gal: 4, market: 'Rome' }),
  ])
  assert.ok(near(rows[0].cost_pressure, -1))
  assert.ok(near(rows[1].cost_pressure, 1))
})

test('a null driver value leaves that row null', () => {
  const rows = computeCostPressure([
    panelRow({ ocean_proxy: 1 }),
    panelRow({ market: 'Rome' }),
    panelRow({ ocean_proxy: 3, market: 'Bari' }),
  ])
  assert.deepEqual(rows.map((r) => r.cost_pressure), [-1, null, 1])
})

test('no qualifying driver gives zero pressure', () => {
  const rows = computeCostPressure([panelRow(), panelRow({ market: 'Rome', diesel_usd_per_gal: 0 })])
  assert.deepEqual(rows.map((r) => r.cost_pressure), [0, 0])
})
