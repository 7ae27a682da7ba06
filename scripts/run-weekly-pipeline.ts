/**
 * run-weekly-pipeline.ts: panel then features, in one process.
 *
 * Usage:
 *   npx tsx scripts/run-weekly-pipeline.ts
 *   npx tsx scripts/run-weekly-pipeline.ts --source=csv --raw=data/raw --snapshot=2024-06-03
 */

import { describeConfig, resolvePipelineConfig } from '../src/lib/pipeline-config'
import { loadDotEnvFiles, parseConfigArgs } from './ingest-utils'
import { loadPolicy, runFeatureStep, runPanelStep } from './weekly-steps'

async function run(): Promise<void> {
  loadDotEnvFiles()
  const config = resolvePipelineConfig(parseConfigArgs())
  console.log(`[pipeline] Weekly pipeline ${describeConfig(config)}`)

  const started = Date.now()
  const policy = loadPolicy(config)
  const panel = await runPanelStep(config, policy)
  runFeatureStep(config, policy, panel)
  console.log(`\n[pipeline] Done in ${((Date.now() - started) / 1000).toFixed(1)}s`)
}

run().catch((error) => {
  console.error('[pipeline] FATAL:', error instanceof Error ? error.message : error)
  process.exit(1)
})
