/**
 * calendar.ts
 *
 * Date normalization for every table that enters the panel. All dates are
 * naive UTC: a parsed value is a Date whose UTC fields carry the wall-clock
 * reading of the source. Weekly keys are UTC-midnight Mondays.
 */

export const MS_PER_DAY = 24 * 60 * 60 * 1000

export type DateColumnKind = 'datetime' | 'epoch-ms' | 'text'

const NUMERIC_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/
const ISO_LOCAL_DATETIME = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/
const ISO_WEEK = /^(\d{4})-?W(\d{1,2})(?:-?([1-7]))?$/i
const HAS_ZONE = /(Z|[+-]\d{2}:?\d{2})$/i

export function dateKeyUtc(date: Date): string {
  return date.toISOString().slice(0, 10)
}

export function shiftUtcDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * MS_PER_DAY)
}

// Finite epochs past ±8.64e15 ms still give an Invalid Date.
function validDate(ms: number): Date | null {
  if (!Number.isFinite(ms)) return null
  const date = new Date(ms)
  return Number.isNaN(date.getTime()) ? null : date
}

function isNumericText(value: string): boolean {
  return NUMERIC_TEXT.test(value.trim())
}

function isBlank(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '')
}

function fromEpochMs(value: unknown): Date | null {
  if (typeof value === 'number') return validDate(value)
  if (typeof value === 'string' && isNumericText(value)) return validDate(Number(value.trim()))
  return null
}

function fromIsoDate(year: number, month: number, day: number): Date | null {
  const ms = Date.UTC(year, month - 1, day)
  const date = new Date(ms)
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null
  }
  return date
}

/** General text parser: ISO dates, ISO week strings, zoned and naive timestamps. */
export function parseDateText(text: string): Date | null {
  const trimmed = text.trim()
  if (!trimmed) return null

  const week = ISO_WEEK.exec(trimmed)
  if (week) {
    const monday = isoWeekStart(Number(week[1]), Number(week[2]))
    if (!monday) return null
    const weekday = week[3] ? Number(week[3]) : 1
    return shiftUtcDays(monday, weekday - 1)
  }

  const day = ISO_DATE.exec(trimmed)
  if (day) return fromIsoDate(Number(day[1]), Number(day[2]), Number(day[3]))

  if (ISO_LOCAL_DATETIME.test(trimmed)) {
    return validDate(Date.parse(`${trimmed.replace(' ', 'T')}Z`))
  }

  if (HAS_ZONE.test(trimmed)) return validDate(Date.parse(trimmed))

  // Free text ("Jan 5, 2024") parses in local time; keep its wall-clock fields.
  const local = new Date(Date.parse(trimmed))
  if (Number.isNaN(local.getTime())) return null
  return validDate(
    Date.UTC(
      local.getFullYear(),
      local.getMonth(),
      local.getDate(),
      local.getHours(),
      local.getMinutes(),
      local.getSeconds(),
      local.getMilliseconds()
    )
  )
}

/** Single value: Date passes through, numbers and numeric strings are epoch-ms, the rest is text. */
export function parseDateValue(value: unknown): Date | null {
  if (value instanceof Date) return validDate(value.getTime())
  if (typeof value === 'number') return fromEpochMs(value)
  if (typeof value !== 'string') return null
  if (isNumericText(value)) return fromEpochMs(value)
  return parseDateText(value)
}

export function detectDateKind(values: readonly unknown[]): DateColumnKind {
  const present = values.filter((v) => !isBlank(v))
  if (present.length > 0 && present.every((v) => v instanceof Date)) return 'datetime'
  if (present.length > 0 && present.every((v) => typeof v === 'number')) return 'epoch-ms'
  if (present.some((v) => typeof v === 'string' && isNumericText(v))) return 'epoch-ms'
  return 'text'
}

/**
 * Parse a date-like column of unknown representation. The representation is
 * decided once for the whole column; values that don't fit it become null.
 */
export function parseDateColumn(values: readonly unknown[]): (Date | null)[] {
  const kind = detectDateKind(values)
  switch (kind) {
    case 'datetime':
      return values.map((v) => (v instanceof Date ? validDate(v.getTime()) : null))
    case 'epoch-ms':
      return values.map((v) => fromEpochMs(v))
    case 'text':
      return values.map((v) => parseDateValue(v))
    default: {
      const never: never = kind
      throw new Error(`Unhandled date kind: ${String(never)}`)
    }
  }
}

/** Monday that begins the ISO week of `date`, at UTC midnight. */
export function toMondayWeek(date: Date): Date {
  const offset = (date.getUTCDay() + 6) % 7
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate() - offset))
}

export function isoWeekNumber(date: Date): number {
  const day = Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate())
  const weekday = (date.getUTCDay() + 6) % 7
  const thursday = new Date(day + (3 - weekday) * MS_PER_DAY)
  const yearStart = Date.UTC(thursday.getUTCFullYear(), 0, 1)
  return 1 + Math.floor((thursday.getTime() - yearStart) / (7 * MS_PER_DAY))
}

export function isoWeeksInYear(year: number): number {
  return isoWeekNumber(new Date(Date.UTC(year, 11, 28)))
}

/** ISO (year, week, weekday=1) → Monday, or null for an impossible pair. */
export function isoWeekStart(year: number, week: number): Date | null {
  if (!Number.isInteger(year) || !Number.isInteger(week)) return null
  if (week < 1 || week > isoWeeksInYear(year)) return null
  const jan4 = new Date(Date.UTC(year, 0, 4))
  const firstMonday = toMondayWeek(jan4)
  return shiftUtcDays(firstMonday, (week - 1) * 7)
}
