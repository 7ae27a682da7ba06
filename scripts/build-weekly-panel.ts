/**
 * build-weekly-panel.ts
 *
 * Spot prices + macro series + tariffs → one weekly panel snapshot with the
 * derived cost columns.
 *
 * Usage:
 *   npx tsx scripts/build-weekly-panel.ts
 *   npx tsx scripts/build-weekly-panel.ts --source=pg --snapshot=2024-06-03
 *   npx tsx scripts/build-weekly-panel.ts --raw=data/raw --datasets=datasets
 */

import { describeConfig, resolvePipelineConfig } from '../src/lib/pipeline-config'
import { loadDotEnvFiles, parseConfigArgs } from './ingest-utils'
import { loadPolicy, runPanelStep } from './weekly-steps'

async function run(): Promise<void> {
  loadDotEnvFiles()
  const config = resolvePipelineConfig(parseConfigArgs())
  console.log(`[panel] Building weekly panel ${describeConfig(config)}`)
  await runPanelStep(config, loadPolicy(config))
}

run().catch((error) => {
  console.error('[panel] FATAL:', error instanceof Error ? error.message : error)
  process.exit(1)
})
