import { PipelineError } from './errors'

type DbSource = 'LOCAL_DATABASE_URL' | 'DIRECT_URL' | 'DATABASE_URL'

export interface ResolvedDbTarget {
  source: DbSource
  url: string
  protocol: string
  host: string
  mode: string
}

function parseTarget(url: string): { protocol: string; host: string } {
  try {
    const parsed = new URL(url)
    return {
      protocol: parsed.protocol.replace(/:$/, ''),
      host: parsed.host || 'unknown',
    }
  } catch {
    return { protocol: 'unknown', host: 'unknown' }
  }
}

function buildTarget(source: DbSource, url: string, mode: string): ResolvedDbTarget {
  return { source, url, ...parseTarget(url), mode }
}

function fail(message: string): never {
  throw new PipelineError('config', `Panel DB URL resolution failed: ${message}`)
}

/**
 * Local-first: LOCAL_DATABASE_URL outside production, DATABASE_URL in
 * production. PG_DIRECT=1 forces DIRECT_URL, PG_LOCAL=1 forces the local URL.
 */
export function resolvePanelDbUrl(env: NodeJS.ProcessEnv = process.env): ResolvedDbTarget {
  const mode = env.NODE_ENV || 'unknown'
  const isProd = mode === 'production'
  const forceLocal = env.PG_LOCAL === '1'
  const forceDirect = env.PG_DIRECT === '1'
  const local = env.LOCAL_DATABASE_URL
  const direct = env.DIRECT_URL
  const database = env.DATABASE_URL

  if (forceLocal && forceDirect) fail('PG_LOCAL and PG_DIRECT cannot both be 1.')
  if (forceDirect) {
    if (direct) return buildTarget('DIRECT_URL', direct, mode)
    fail('PG_DIRECT=1 requires DIRECT_URL.')
  }
  if (forceLocal) {
    if (local) return buildTarget('LOCAL_DATABASE_URL', local, mode)
    fail('PG_LOCAL=1 requires LOCAL_DATABASE_URL.')
  }

  if (isProd) {
    if (database) return buildTarget('DATABASE_URL', database, mode)
    fail('DATABASE_URL is required in production.')
  }

  if (local) return buildTarget('LOCAL_DATABASE_URL', local, mode)
  fail('LOCAL_DATABASE_URL is required by default outside production. To read another database explicitly, set PG_DIRECT=1 with DIRECT_URL.')
}

export function describeDbTarget(target: ResolvedDbTarget): string {
  return JSON.stringify({
    source: target.source,
    protocol: target.protocol,
    host: target.host,
    mode: target.mode,
  })
}

export function logResolvedDbTarget(scope: string, target: ResolvedDbTarget): void {
  console.info(`[db-target] ${scope} ${describeDbTarget(target)}`)
}
