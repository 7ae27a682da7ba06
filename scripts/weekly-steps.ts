/**
 * weekly-steps.ts: I/O around the two pipeline halves, shared by the CLIs.
 */

import fs from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import { loadCostPolicy, type CostPolicy } from '../src/lib/cost-policy'
import { readCsvFile, writeCsvFile } from '../src/lib/csv'
import { PipelineError } from '../src/lib/errors'
import { panelRowsToFrame } from '../src/lib/panel-schema'
import { CsvPanelSource, loadPanelInputs, type PanelSource } from '../src/lib/panel-sources'
import { createPgPanelSource } from '../src/lib/pg-panel-source'
import { featureOutputDir, panelOutputPath, type PipelineConfig } from '../src/lib/pipeline-config'
import type { Frame } from '../src/lib/table-contract'
import { buildWeeklyFeatures, buildWeeklyPanel } from '../src/lib/weekly-pipeline'
import { featureRowsToFrame } from '../src/lib/weekly-features'
import { safeOutputPath } from './ingest-utils'

export const PROJECT_ROOT = fileURLToPath(new URL('..', import.meta.url))

export function createPanelSource(config: PipelineConfig): PanelSource {
  return config.source === 'pg' ? createPgPanelSource() : new CsvPanelSource(config.rawDataDir)
}

export function loadPolicy(config: PipelineConfig): CostPolicy {
  const policy = loadCostPolicy(config.policyPath)
  console.log(`[panel] Cost policy: ${Object.keys(policy.grades).length} grades from ${path.relative(PROJECT_ROOT, config.policyPath)}`)
  return policy
}

/** Build and write the weekly panel; returns the frame as written. */
export async function runPanelStep(config: PipelineConfig, policy: CostPolicy): Promise<Frame> {
  const source = createPanelSource(config)
  try {
    const inputs = await loadPanelInputs(source)
    const { panel } = buildWeeklyPanel(inputs, { snapshotDate: config.snapshotDate, policy })

    const outPath = safeOutputPath(panelOutputPath(config), PROJECT_ROOT)
    const frame = panelRowsToFrame(panel)
    writeCsvFile(outPath, frame)
    console.log(`[panel] Written ${panel.length} rows × ${frame.columns.length} columns to ${path.relative(PROJECT_ROOT, outPath)}`)
    return frame
  } finally {
    await source.close()
  }
}

export function readPanelFrame(config: PipelineConfig): Frame {
  const file = panelOutputPath(config)
  if (!fs.existsSync(file)) {
    throw new PipelineError('empty', `Weekly panel not found for snapshot ${config.snapshotDate}: ${file}`)
  }
  return readCsvFile(file)
}

export function runFeatureStep(config: PipelineConfig, policy: CostPolicy, panel: Frame): void {
  const result = buildWeeklyFeatures(panel, {
    snapshotDate: config.snapshotDate,
    policy,
    priceColumn: config.priceColumn,
  })

  const outDir = safeOutputPath(featureOutputDir(config), PROJECT_ROOT)
  const featuresPath = path.join(outDir, 'features.csv')
  const modelPath = path.join(outDir, 'model_features.csv')
  writeCsvFile(featuresPath, featureRowsToFrame(result.features))
  writeCsvFile(modelPath, result.modelFeatures)

  console.log(`\n[features] Written ${result.features.length} rows to ${path.relative(PROJECT_ROOT, featuresPath)}`)
  console.log(`[features] Model projection (${result.modelFeatures.columns.length} columns) → ${path.relative(PROJECT_ROOT, modelPath)}`)
}
