/**
 * weekly-pipeline.ts
 *
 * The two pipeline halves as pure compositions of the stage functions. The
 * CLI scripts own I/O; everything here takes tables in and returns tables.
 */

import { computeCostPressure } from './cost-pressure'
import { deriveCosts } from './cost-engine'
import type { CostPolicy } from './cost-policy'
import { PipelineError } from './errors'
import { mergePanel } from './panel-merge'
import { logQualitySummary, summarizeQuality, type QualitySummary } from './quality-summary'
import { alignMacroSeries, buildMacroGrid } from './series-align'
import type { Frame } from './table-contract'
import type {
  FeaturePriceColumn,
  FeatureRow,
  LogSink,
  MacroGridRow,
  MacroSeriesSet,
  PanelRow,
  SpotPriceRow,
  TariffRecord,
} from './types'
import { filterUsable, imputeDerived, type UsabilityReport } from './usability'
import { buildFeatureRows, projectModelFeatures } from './weekly-features'

export interface PanelInputs {
  spot: SpotPriceRow[]
  macro: MacroSeriesSet
  tariffs: TariffRecord[]
}

export interface PanelBuildOptions {
  snapshotDate: string
  policy: CostPolicy
  log?: LogSink
}

export interface PanelBuildResult {
  grid: MacroGridRow[]
  panel: PanelRow[]
}

export function buildWeeklyPanel(inputs: PanelInputs, options: PanelBuildOptions): PanelBuildResult {
  const log = options.log ?? console.log
  if (inputs.spot.length === 0) {
    throw new PipelineError('empty', 'No spot price rows to build the weekly panel from')
  }

  const grid = buildMacroGrid(alignMacroSeries(inputs.macro), options.policy)
  log(`[panel] Macro grid: ${grid.length} weeks`)

  const merged = mergePanel(inputs.spot, grid, inputs.tariffs, {
    snapshotDate: options.snapshotDate,
    policy: options.policy,
    log,
  })
  return { grid, panel: deriveCosts(merged, options.policy) }
}

export interface FeatureBuildOptions {
  snapshotDate: string
  policy: CostPolicy
  priceColumn?: FeaturePriceColumn
  log?: LogSink
}

export interface FeatureBuildResult {
  features: FeatureRow[]
  modelFeatures: Frame
  report: UsabilityReport
  summary: QualitySummary
}

/** Panel frame (as written by buildWeeklyPanel or read back from disk) → feature tables. */
export function buildWeeklyFeatures(panel: Frame, options: FeatureBuildOptions): FeatureBuildResult {
  const log = options.log ?? console.log
  const { rows, report } = filterUsable(panel, { snapshotDate: options.snapshotDate, log })

  const imputed = imputeDerived(rows, options.policy, log)
  const withPressure = computeCostPressure(deriveCosts(imputed, options.policy))
  const features = buildFeatureRows(withPressure, { priceColumn: options.priceColumn })

  const summary = summarizeQuality(report.total, report.usable, features)
  logQualitySummary(summary, log)

  return { features, modelFeatures: projectModelFeatures(features), report, summary }
}
