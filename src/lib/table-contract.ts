/**
 * table-contract.ts
 *
 * Loosely-typed tables (CSV files, pg result sets) enter the pipeline as a
 * Frame. A TableContract names the canonical columns a stage reads, which of
 * them are required, and the ordered alias list each one may arrive under.
 * resolveFrame() is run once at stage entry; after it every canonical column
 * exists and every cell has been coerced to its declared kind (or null).
 */

import { parseDateColumn } from './calendar'
import { PipelineError } from './errors'

export type CellKind = 'date' | 'string' | 'number'

export type FrameRecord = Record<string, unknown>

export interface Frame {
  columns: string[]
  rows: FrameRecord[]
}

export interface ColumnAlias {
  from: string
  /** Applied to numeric aliases, e.g. inverting a USD/EUR quote. */
  transform?: (value: number) => number | null
}

export interface ColumnSpec {
  name: string
  kind: CellKind
  required?: boolean
  aliases?: readonly ColumnAlias[]
}

export interface TableContract {
  table: string
  columns: readonly ColumnSpec[]
}

/** snake_case + lowercase; keeps letters, digits and underscores. */
export function normalizeHeader(name: string): string {
  return name.trim().toLowerCase().replace(/\W+/g, '_')
}

export function toNumberOrNull(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null
  if (typeof value === 'bigint') return Number(value)
  if (typeof value !== 'string') return null
  const trimmed = value.trim()
  if (!trimmed) return null
  const n = Number(trimmed)
  return Number.isFinite(n) ? n : null
}

export function toStringOrNull(value: unknown): string | null {
  if (value === null || value === undefined) return null
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value.toISOString().slice(0, 10)
  if (typeof value === 'number' && !Number.isFinite(value)) return null
  const s = String(value).trim()
  return s.length ? s : null
}

function coerceColumn(values: unknown[], kind: CellKind): unknown[] {
  switch (kind) {
    case 'date':
      return parseDateColumn(values)
    case 'number':
      return values.map(toNumberOrNull)
    case 'string':
      return values.map(toStringOrNull)
    default: {
      const never: never = kind
      throw new Error(`Unhandled cell kind: ${String(never)}`)
    }
  }
}

function sourceValues(frame: Frame, col: ColumnSpec): unknown[] | null {
  if (frame.columns.includes(col.name)) return frame.rows.map((r) => r[col.name])

  for (const alias of col.aliases ?? []) {
    if (!frame.columns.includes(alias.from)) continue
    const raw = frame.rows.map((r) => r[alias.from])
    const transform = alias.transform
    if (!transform) return raw
    return raw.map((v) => {
      const n = toNumberOrNull(v)
      return n === null ? null : transform(n)
    })
  }
  return null
}

/** Which canonical column names the frame can supply, directly or via an alias. */
export function missingRequiredColumns(frame: Frame, contract: TableContract): string[] {
  return contract.columns
    .filter((col) => col.required)
    .filter((col) => !frame.columns.includes(col.name) && !(col.aliases ?? []).some((a) => frame.columns.includes(a.from)))
    .map((col) => col.name)
}

export function hasColumn(frame: Frame, contract: TableContract, name: string): boolean {
  const col = contract.columns.find((c) => c.name === name)
  if (!col) return frame.columns.includes(name)
  return frame.columns.includes(name) || (col.aliases ?? []).some((a) => frame.columns.includes(a.from))
}

/**
 * Rename aliases to canonical names, add absent optional columns as null, and
 * coerce every contract column. Throws a schema PipelineError naming every
 * required column the frame cannot supply. Columns outside the contract are
 * carried after the canonical ones, untouched.
 */
export function resolveFrame(frame: Frame, contract: TableContract): Frame {
  const missing = missingRequiredColumns(frame, contract)
  if (missing.length > 0) {
    throw new PipelineError('schema', `${contract.table} missing required columns: ${missing.join(', ')}`)
  }

  const canonical = contract.columns.map((c) => c.name)
  const consumed = new Set<string>(canonical)
  const resolved = new Map<string, unknown[]>()

  for (const col of contract.columns) {
    const values = sourceValues(frame, col)
    resolved.set(col.name, values ? coerceColumn(values, col.kind) : frame.rows.map(() => null))
    for (const alias of col.aliases ?? []) {
      if (frame.columns.includes(alias.from)) consumed.add(alias.from)
    }
  }

  const extras = frame.columns.filter((c) => !consumed.has(c))
  const rows = frame.rows.map((row, i) => {
    const out: FrameRecord = {}
    for (const name of canonical) out[name] = resolved.get(name)?.[i] ?? null
    for (const name of extras) out[name] = row[name] ?? null
    return out
  })

  return { columns: [...canonical, ...extras], rows }
}

// ─── Typed cell readers (valid after resolveFrame) ────────────────────────

export function cellNumber(row: FrameRecord, name: string): number | null {
  const v = row[name]
  return typeof v === 'number' && Number.isFinite(v) ? v : null
}

export function cellString(row: FrameRecord, name: string): string | null {
  const v = row[name]
  return typeof v === 'string' && v.length > 0 ? v : null
}

export function cellDate(row: FrameRecord, name: string): Date | null {
  const v = row[name]
  return v instanceof Date && !Number.isNaN(v.getTime()) ? v : null
}
