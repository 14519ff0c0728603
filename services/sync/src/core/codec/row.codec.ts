// services/sync/src/core/codec/row.codec.ts
import { RecordEncodeError } from '../sync.errors.js'

/**
 * RowCodec
 *
 * Converts typed records to flat rows of strings and back. Remote rows are
 * whatever a human typed into the sheet, so every coerce* helper returns null
 * for blank or unparsable input instead of throwing; deciding whether a null
 * means "skip the row" or "leave the field alone" is the caller's job.
 */

export type CellValue = string | number | boolean | null | undefined

// -----------------------------
// Encode (record -> row)
// -----------------------------

export function formatDate(d: Date): string {
  const y = String(d.getUTCFullYear()).padStart(4, '0')
  const m = String(d.getUTCMonth() + 1).padStart(2, '0')
  const day = String(d.getUTCDate()).padStart(2, '0')
  return `${y}-${m}-${day}`
}

export function formatCell(value: unknown, field: string, key?: string): string {
  if (value === null || value === undefined) return ''
  if (typeof value === 'string') return value
  if (typeof value === 'boolean') return value ? 'TRUE' : 'FALSE'
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new RecordEncodeError({ field, key, message: `non-finite number ${value}` })
    }
    return String(value)
  }
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new RecordEncodeError({ field, key, message: 'invalid date' })
    }
    return formatDate(value)
  }
  throw new RecordEncodeError({ field, key, message: `unsupported value type ${typeof value}` })
}

// -----------------------------
// Decode (row -> header map)
// -----------------------------

export function cellToString(cell: unknown): string {
  if (cell === null || cell === undefined) return ''
  if (typeof cell === 'string') return cell
  if (typeof cell === 'number' || typeof cell === 'boolean') return String(cell)
  return ''
}

export function normalizeHeaders(headerRow: readonly unknown[]): string[] {
  return headerRow.map((h) => cellToString(h).trim())
}

/**
 * Zip a row with the header row. Short rows are padded with '' so ragged
 * remote rows never index out of range; cells beyond the last header are dropped.
 */
export function decodeRow(row: readonly unknown[], headers: readonly string[]): Record<string, string> {
  const out: Record<string, string> = {}
  for (let i = 0; i < headers.length; i++) {
    out[headers[i]] = i < row.length ? cellToString(row[i]) : ''
  }
  return out
}

export function isBlankRow(row: readonly unknown[]): boolean {
  return row.every((cell) => cellToString(cell).trim() === '')
}

// -----------------------------
// Coercion (raw string -> typed | null)
// -----------------------------

type DateFormat = {
  name: string
  pattern: RegExp
  // capture-group index of year, month, day
  y: number
  m: number
  d: number
}

export const DATE_FORMATS: readonly DateFormat[] = [
  { name: 'YYYY-MM-DD', pattern: /^(\d{4})-(\d{1,2})-(\d{1,2})$/, y: 1, m: 2, d: 3 },
  { name: 'MM/DD/YYYY', pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/, y: 3, m: 1, d: 2 },
  { name: 'DD/MM/YYYY', pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/, y: 3, m: 2, d: 1 },
  { name: 'YYYY/MM/DD', pattern: /^(\d{4})\/(\d{1,2})\/(\d{1,2})$/, y: 1, m: 2, d: 3 },
]

export function makeCalendarDate(year: number, month: number, day: number): Date | null {
  if (month < 1 || month > 12 || day < 1 || day > 31) return null
  const d = new Date(Date.UTC(2000, month - 1, day))
  d.setUTCFullYear(year)
  if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) return null
  return d
}

export function coerceDate(raw: string | null | undefined): Date | null {
  const s = (raw ?? '').trim()
  if (!s) return null

  for (const fmt of DATE_FORMATS) {
    const m = fmt.pattern.exec(s)
    if (!m) continue
    const date = makeCalendarDate(Number(m[fmt.y]), Number(m[fmt.m]), Number(m[fmt.d]))
    if (date) return date
  }
  return null
}

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/

export function coerceFloat(raw: string | null | undefined): number | null {
  const s = (raw ?? '').trim()
  if (!s || !DECIMAL.test(s)) return null
  const n = Number(s)
  return Number.isFinite(n) ? n : null
}

export function coerceInt(raw: string | null | undefined): number | null {
  const n = coerceFloat(raw)
  return n === null ? null : Math.trunc(n)
}

const TRUTHY = new Set(['true', 'yes', '1', 'x', 'checked'])

export function coerceBool(raw: string | null | undefined): boolean {
  const s = (raw ?? '').trim().toLowerCase()
  if (!s) return false
  return TRUTHY.has(s)
}

export function coerceString(raw: string | null | undefined): string | null {
  const s = (raw ?? '').trim()
  return s ? s : null
}
