import test from 'node:test'
import assert from 'node:assert/strict'
import { deriveCosts, packCost, sampleStd, zScores } from '../src/lib/cost-engine'
import { TEST_POLICY, near, panelRow } from './panel-fixtures'

test('packCost uses the packaging table with a 0.22 default', () => {
  assert.equal(packCost('plastic'), 0.12)
  assert.equal(packCost(' Steel '), 0.3)
  assert.equal(packCost('GLASS'), 0.22)
  assert.equal(packCost('tetra'), 0.22)
  assert.equal(packCost(null), 0.22)
})

test('unknown pack derives pack_cost 0.22', () => {
  const [row] = deriveCosts([panelRow({ pack: 'bag-in-box' })], TEST_POLICY)
  assert.equal(row.pack_cost, 0.22)
})

test('sampleStd needs two observations', () => {
  assert.equal(sampleStd([5]), null)
  assert.equal(sampleStd([1, 3, null]), Math.SQRT2)
})

test('zScores are all zero on a constant column', () => {
  assert.deepEqual(zScores([3, 3, 3]), [0, 0, 0])
  assert.deepEqual(zScores([3]), [0])
})

test('z_base is 0 on a constant column whose mean is inexact', () => {
  const rows = deriveCosts(Array.from({ length: 10 }, () => panelRow({ price_usd_per_l: 0.1 })), TEST_POLICY)
  assert.deepEqual(rows.map((r) => r.z_base), Array.from({ length: 10 }, () => 0))
  assert.deepEqual(zScores([0.1, 0.1, null, 0.1]), [0, 0, 0, 0])
})

test('z_base is 0 when base_usd_per_l is constant', () => {
  const rows = deriveCosts(
    [panelRow({ price_usd_per_l: 3 }), panelRow({ price_usd_per_l: 3, market: 'Rome' }), panelRow({ price_usd_per_l: 3, market: 'Bari' })],
    TEST_POLICY
  )
  assert.deepEqual(rows.map((r) => r.z_base), [0, 0, 0])
})

test('full cost derivation for one priced row', () => {
  const [row] = deriveCosts(
    [
      panelRow({
        usd_per_eur: 1.1,
        adval_pct: 10,
        specific_usd_per_kg: 0.5,
        pack: 'plastic',
        ocean_proxy: 1000,
        diesel_usd_per_gal: 4,
      }),
    ],
    TEST_POLICY
  )
  assert.ok(near(row.price_usd_per_l, 4.4))
  assert.ok(near(row.base_usd_per_l, 4.4))
  assert.ok(near(row.duty_specific_usd_per_l, 0.458))
  assert.ok(near(row.duty_cost, 0.898))
  assert.ok(near(row.duty_usd_per_l, 0.898))
  assert.equal(row.duty_rate, 10)
  assert.equal(row.pack_cost, 0.12)
  assert.ok(near(row.ocean_uplift, 3))
  assert.equal(row.ocean_idx, 1000)
  assert.equal(row.diesel_uplift, 0)
  assert.ok(near(row.deliv_hat_usd_per_l, 8.418))
  assert.equal(row.z_base, 0)
})

test('null tariff inputs count as zero duty', () => {
  const [row] = deriveCosts([panelRow({ price_usd_per_l: 5 })], TEST_POLICY)
  assert.equal(row.adval_pct, 0)
  assert.equal(row.specific_usd_per_kg, 0)
  assert.equal(row.duty_specific_usd_per_l, 0)
  assert.equal(row.duty_cost, 0)
  assert.equal(row.duty_usd_per_l, 0)
})

test('without a USD price the duty stays null and delivered cost coalesces', () => {
  const [row] = deriveCosts([panelRow({ adval_pct: 10 })], TEST_POLICY)
  assert.equal(row.price_usd_per_l, null)
  assert.equal(row.duty_cost, null)
  assert.equal(row.duty_usd_per_l, null)
  assert.equal(row.ocean_uplift, null)
  assert.equal(row.deliv_hat_usd_per_l, 0.22)
})

test('diesel uplift is measured against the mean of the whole input', () => {
  const rows = deriveCosts(
    [panelRow({ diesel_usd_per_gal: 3 }), panelRow({ diesel_usd_per_gal: 5, market: 'Rome' }), panelRow({ market: 'Bari' })],
    TEST_POLICY
  )
  assert.ok(near(rows[0].diesel_uplift, -0.15))
  assert.ok(near(rows[1].diesel_uplift, 0.15))
  assert.equal(rows[2].diesel_uplift, null)
})

test('existing values are respected and a second pass changes nothing', () => {
  const input = [
    panelRow({ price_usd_per_l: 9, usd_per_eur: 1.1, pack: 'steel', diesel_usd_per_gal: 3 }),
    panelRow({ market: 'Rome', usd_per_eur: 1.2, adval_pct: 4, diesel_usd_per_gal: 5 }),
  ]
  const once = deriveCosts(input, TEST_POLICY)
  assert.equal(once[0].price_usd_per_l, 9)
  assert.deepEqual(deriveCosts(once, TEST_POLICY), once)
})

test('uplifts and z_base are recomputed over stale values', () => {
  const rows = deriveCosts(
    [
      panelRow({
        price_usd_per_l: 5,
        base_usd_per_l: 5,
        usd_per_eur: 1.1,
        pack: 'steel',
        pack_cost: 0.12,
        ocean_proxy: 200,
        ocean_uplift: 99,
        diesel_usd_per_gal: 4,
        diesel_uplift: 9,
        z_base: 7,
      }),
      panelRow({ market: 'Rome', price_usd_per_l: 7, diesel_usd_per_gal: 6 }),
    ],
    TEST_POLICY
  )
  assert.equal(rows[0].price_usd_per_l, 5)
  assert.equal(rows[0].pack_cost, 0.12)
  assert.ok(near(rows[0].ocean_uplift, 0.6))
  assert.ok(near(rows[0].diesel_uplift, -0.15))
  assert.ok(near(rows[0].z_base, -Math.SQRT1_2))
  assert.ok(near(rows[1].z_base, Math.SQRT1_2))
})
