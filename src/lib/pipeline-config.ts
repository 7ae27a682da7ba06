import path from 'node:path'
import { dateKeyUtc, parseDateText } from './calendar'
import { DEFAULT_POLICY_PATH } from './cost-policy'
import { PipelineError } from './errors'
import type { FeaturePriceColumn } from './types'

export type PanelSourceKind = 'pg' | 'csv'

export interface PipelineConfig {
  source: PanelSourceKind
  rawDataDir: string
  datasetsDir: string
  snapshotDate: string
  priceColumn: FeaturePriceColumn
  policyPath: string
}

/** CLI flags (`--source=csv`) take precedence over the environment. */
export interface ConfigOverrides {
  source?: string
  raw?: string
  datasets?: string
  snapshot?: string
  price?: string
  policy?: string
}

const PRICE_COLUMNS: readonly FeaturePriceColumn[] = ['price_eur_per_l', 'price_usd_per_l', 'base_usd_per_l']

function pick(...values: (string | undefined)[]): string | undefined {
  for (const v of values) {
    if (v !== undefined && v.trim() !== '') return v.trim()
  }
  return undefined
}

function parseSource(raw: string): PanelSourceKind {
  const value = raw.toLowerCase()
  if (value === 'pg' || value === 'csv') return value
  throw new PipelineError('config', `Unsupported panel source '${raw}'. Allowed: pg, csv`)
}

function parsePriceColumn(raw: string): FeaturePriceColumn {
  const match = PRICE_COLUMNS.find((c) => c === raw)
  if (!match) {
    throw new PipelineError('config', `Unsupported price column '${raw}'. Allowed: ${PRICE_COLUMNS.join(', ')}`)
  }
  return match
}

export function parseSnapshotDate(raw: string): string {
  const parsed = /^\d{4}-\d{2}-\d{2}$/.test(raw) ? parseDateText(raw) : null
  if (!parsed) throw new PipelineError('config', `SNAPSHOT_DATE must be YYYY-MM-DD, got '${raw}'`)
  return dateKeyUtc(parsed)
}

export function resolvePipelineConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
  now: Date = new Date()
): PipelineConfig {
  const cwd = process.cwd()
  return {
    source: parseSource(pick(overrides.source, env.PANEL_SOURCE) ?? 'csv'),
    rawDataDir: path.resolve(cwd, pick(overrides.raw, env.RAW_DATA_DIR) ?? 'data/raw'),
    datasetsDir: path.resolve(cwd, pick(overrides.datasets, env.DATASETS_DIR) ?? 'datasets'),
    snapshotDate: parseSnapshotDate(pick(overrides.snapshot, env.SNAPSHOT_DATE) ?? dateKeyUtc(now)),
    priceColumn: parsePriceColumn(pick(overrides.price, env.FEATURE_PRICE_COLUMN) ?? 'price_eur_per_l'),
    policyPath: path.resolve(cwd, pick(overrides.policy, env.COST_POLICY_PATH) ?? DEFAULT_POLICY_PATH),
  }
}

export function panelOutputPath(config: PipelineConfig): string {
  return path.join(config.datasetsDir, 'weekly_panel', `snapshot_date=${config.snapshotDate}`, 'weekly_panel.csv')
}

export function featureOutputDir(config: PipelineConfig): string {
  return path.join(config.datasetsDir, 'features', 'weekly_panel', `snapshot_date=${config.snapshotDate}`)
}

export function describeConfig(config: PipelineConfig): string {
  return JSON.stringify({
    source: config.source,
    snapshotDate: config.snapshotDate,
    priceColumn: config.priceColumn,
    rawDataDir: path.relative(process.cwd(), config.rawDataDir) || '.',
    datasetsDir: path.relative(process.cwd(), config.datasetsDir) || '.',
  })
}
