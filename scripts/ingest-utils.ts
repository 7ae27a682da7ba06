import path from 'node:path'
import { config } from 'dotenv'
import type { ConfigOverrides } from '../src/lib/pipeline-config'

/** .env.local first, then .env; values already in the environment win. */
export function loadDotEnvFiles(): void {
  for (const rel of ['.env.local', '.env']) {
    config({ path: path.resolve(process.cwd(), rel) })
  }
}

export function parseArg(name: string, fallback: string, argv: readonly string[] = process.argv.slice(2)): string {
  const prefixed = `--${name}=`
  for (const arg of argv) {
    if (arg.startsWith(prefixed)) return arg.slice(prefixed.length)
  }

  const idx = argv.indexOf(`--${name}`)
  if (idx >= 0 && argv[idx + 1]) return argv[idx + 1]
  return fallback
}

/** The shared `--source --raw --datasets --snapshot --price --policy` flags. */
export function parseConfigArgs(argv: readonly string[] = process.argv.slice(2)): ConfigOverrides {
  const read = (name: string): string | undefined => parseArg(name, '', argv) || undefined
  return {
    source: read('source'),
    raw: read('raw'),
    datasets: read('datasets'),
    snapshot: read('snapshot'),
    price: read('price'),
    policy: read('policy'),
  }
}

/** Constrain an output path to stay within the project root. Uses path.relative() to prevent sibling-prefix bypass. */
export function safeOutputPath(raw: string, projectRoot: string): string {
  const resolved = path.resolve(raw)
  const rel = path.relative(projectRoot, resolved)
  if (rel.startsWith('..') || path.isAbsolute(rel)) {
    throw new Error(`Output path "${resolved}" is outside project root "${projectRoot}"`)
  }
  return resolved
}
