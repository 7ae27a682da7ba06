/**
 * build-weekly-features.ts
 *
 * Reads a weekly panel snapshot, keeps the usable rows, fills derivable
 * costs and writes the lag / rolling / calendar feature tables.
 *
 * Usage:
 *   npx tsx scripts/build-weekly-features.ts --snapshot=2024-06-03
 *   npx tsx scripts/build-weekly-features.ts --snapshot=2024-06-03 --price=price_usd_per_l
 */

import { describeConfig, resolvePipelineConfig } from '../src/lib/pipeline-config'
import { loadDotEnvFiles, parseConfigArgs } from './ingest-utils'
import { loadPolicy, readPanelFrame, runFeatureStep } from './weekly-steps'

async function run(): Promise<void> {
  loadDotEnvFiles()
  const config = resolvePipelineConfig(parseConfigArgs())
  console.log(`[features] Building weekly features ${describeConfig(config)}`)
  runFeatureStep(config, loadPolicy(config), readPanelFrame(config))
}

run().catch((error) => {
  console.error('[features] FATAL:', error instanceof Error ? error.message : error)
  process.exit(1)
})
