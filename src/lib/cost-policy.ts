/**
 * cost-policy.ts
 *
 * Static policy data for the cost engine: grade → HS prefix, the per-grade
 * duty algebra, and the freight proxy blend. Loaded once by the driver from
 * config/cost-policy.json and passed explicitly to each stage.
 */

import fs from 'node:fs'
import { fileURLToPath } from 'node:url'
import { PipelineError } from './errors'

/** kg → L conversion for olive oil. */
export const DENSITY_KG_PER_L = 0.916

export interface DutyMultipliers {
  advalMultiplier: number
  specificMultiplier: number
}

export interface GradeRule extends DutyMultipliers {
  hsPrefix: string
}

export interface OceanProxyPolicy {
  fbxScale: number
  /** When set, Brent × brentScale stands in for weeks without a freight print. */
  brentScale: number | null
}

export interface CostPolicy {
  grades: Record<string, GradeRule>
  defaultDuty: DutyMultipliers
  oceanProxy: OceanProxyPolicy
}

export const DEFAULT_POLICY_PATH = fileURLToPath(new URL('../../config/cost-policy.json', import.meta.url))

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function requireFinite(value: unknown, where: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new PipelineError('config', `cost policy: ${where} must be a finite number`)
  }
  return value
}

function parseMultipliers(raw: unknown, where: string): DutyMultipliers {
  if (!isRecord(raw)) throw new PipelineError('config', `cost policy: ${where} must be an object`)
  return {
    advalMultiplier: requireFinite(raw.advalMultiplier, `${where}.advalMultiplier`),
    specificMultiplier: requireFinite(raw.specificMultiplier, `${where}.specificMultiplier`),
  }
}

export function parseCostPolicy(raw: unknown): CostPolicy {
  if (!isRecord(raw)) throw new PipelineError('config', 'cost policy must be a JSON object')
  if (!isRecord(raw.grades)) throw new PipelineError('config', 'cost policy: grades must be an object')

  const grades: Record<string, GradeRule> = {}
  for (const [grade, rule] of Object.entries(raw.grades)) {
    const where = `grades.${grade}`
    const hsPrefix = isRecord(rule) ? rule.hsPrefix : undefined
    if (typeof hsPrefix !== 'string' || !hsPrefix.trim()) {
      throw new PipelineError('config', `cost policy: ${where}.hsPrefix must be a non-empty string`)
    }
    grades[normalizeGrade(grade) ?? grade] = { hsPrefix: hsPrefix.trim(), ...parseMultipliers(rule, where) }
  }

  const ocean = raw.oceanProxy
  if (!isRecord(ocean)) throw new PipelineError('config', 'cost policy: oceanProxy must be an object')
  const brentScale = ocean.brentScale === null || ocean.brentScale === undefined
    ? null
    : requireFinite(ocean.brentScale, 'oceanProxy.brentScale')

  return {
    grades,
    defaultDuty: parseMultipliers(raw.defaultDuty, 'defaultDuty'),
    oceanProxy: { fbxScale: requireFinite(ocean.fbxScale, 'oceanProxy.fbxScale'), brentScale },
  }
}

export function loadCostPolicy(file: string = DEFAULT_POLICY_PATH): CostPolicy {
  let raw: unknown
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf8'))
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new PipelineError('config', `cost policy: cannot read ${file}: ${reason}`)
  }
  return parseCostPolicy(raw)
}

/** Upper-cased, trimmed grade label. */
export function normalizeGrade(grade: string | null): string | null {
  if (grade === null) return null
  const norm = grade.trim().toUpperCase()
  return norm.length ? norm : null
}

export function hsPrefixForGrade(policy: CostPolicy, gradeNorm: string | null): string | null {
  if (gradeNorm === null) return null
  return policy.grades[gradeNorm]?.hsPrefix ?? null
}

function finiteOrZero(value: number | null | undefined): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : 0
}

/**
 * Duty in USD/L for one row. Pure; null tariff inputs count as 0. Returns
 * null only when there is no USD price to apply the ad-valorem rate to.
 */
export function dutyForRow(
  policy: CostPolicy,
  priceUsdPerL: number | null,
  gradeNorm: string | null,
  specificUsdPerKg: number | null,
  advalPct: number | null
): number | null {
  if (priceUsdPerL === null || !Number.isFinite(priceUsdPerL)) return null
  const rule = (gradeNorm !== null ? policy.grades[gradeNorm] : undefined) ?? policy.defaultDuty
  const adval = (finiteOrZero(advalPct) / 100) * priceUsdPerL * rule.advalMultiplier
  const specific = finiteOrZero(specificUsdPerKg) * DENSITY_KG_PER_L * rule.specificMultiplier
  return adval + specific
}

export function oceanProxy(policy: CostPolicy, fbx: number | null, brent: number | null): number | null {
  if (fbx !== null && Number.isFinite(fbx)) return fbx * policy.oceanProxy.fbxScale
  const scale = policy.oceanProxy.brentScale
  if (scale !== null && brent !== null && Number.isFinite(brent)) return brent * scale
  return null
}
