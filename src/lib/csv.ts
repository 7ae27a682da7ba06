/**
 * csv.ts
 *
 * Minimal RFC 4180 reader/writer for the raw inputs and dataset outputs.
 * Headers are normalised to snake_case on read. On write, dates become
 * YYYY-MM-DD, nulls become empty cells, and text cells are passed through
 * neutralizeFormula before quoting.
 */

import fs from 'node:fs'
import path from 'node:path'
import { dateKeyUtc } from './calendar'
import { normalizeHeader, type Frame, type FrameRecord } from './table-contract'

function splitRecords(text: string): string[][] {
  const records: string[][] = []
  let field = ''
  let record: string[] = []
  let quoted = false

  for (let i = 0; i < text.length; i++) {
    const ch = text[i]
    if (quoted) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"'
          i++
        } else {
          quoted = false
        }
      } else {
        field += ch
      }
      continue
    }

    if (ch === '"') {
      quoted = true
    } else if (ch === ',') {
      record.push(field)
      field = ''
    } else if (ch === '\n' || ch === '\r') {
      if (ch === '\r' && text[i + 1] === '\n') i++
      record.push(field)
      records.push(record)
      record = []
      field = ''
    } else {
      field += ch
    }
  }

  if (field.length > 0 || record.length > 0) {
    record.push(field)
    records.push(record)
  }
  return records.filter((r) => r.some((cell) => cell.trim().length > 0))
}

/** Parse CSV text; empty cells become null, every other cell stays a string. */
export function parseCsv(text: string): Frame {
  const records = splitRecords(text.replace(/^﻿/, ''))
  if (records.length === 0) return { columns: [], rows: [] }

  const columns = records[0].map(normalizeHeader)
  const rows = records.slice(1).map((cells) => {
    const row: FrameRecord = {}
    columns.forEach((name, i) => {
      const cell = cells[i]
      row[name] = cell === undefined || cell.trim() === '' ? null : cell.trim()
    })
    return row
  })
  return { columns, rows }
}

export function readCsvFile(file: string): Frame {
  return parseCsv(fs.readFileSync(file, 'utf8'))
}

/** Neutralize spreadsheet formula injection in untrusted text before CSV export. */
export function neutralizeFormula(value: string): string {
  const trimmed = value.trimStart()
  if (/^[=+\-@]/.test(trimmed)) return "'" + value
  return value
}

export function formatCell(value: unknown): string {
  if (value === null || value === undefined) return ''
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? '' : dateKeyUtc(value)
  if (typeof value === 'number') return Number.isFinite(value) ? String(value) : ''
  const text = typeof value === 'string' ? neutralizeFormula(value) : String(value)
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text
}

export function formatCsv(frame: Frame): string {
  const lines = [
    frame.columns.map(formatCell).join(','),
    ...frame.rows.map((row) => frame.columns.map((c) => formatCell(row[c])).join(',')),
  ]
  return lines.join('\n') + '\n'
}

export function writeCsvFile(file: string, frame: Frame): void {
  fs.mkdirSync(path.dirname(file), { recursive: true })
  fs.writeFileSync(file, formatCsv(frame), 'utf8')
}
