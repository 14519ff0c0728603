// services/sync/src/core/schema/schema.table.ts
import {
  coerceBool,
  coerceDate,
  coerceFloat,
  coerceInt,
  coerceString,
  formatCell,
} from '../codec/row.codec.js'
import { RowDecodeError } from '../sync.errors.js'
import type { EntityName } from './schema.types.js'

export type FieldKind = 'string' | 'date' | 'float' | 'int' | 'bool'

export type ColumnSpec<T> = {
  field: keyof T & string
  /** Header cell on the remote sheet; also the SQLite column name. */
  header: string
  kind: FieldKind
  /** Older header spellings still accepted when reading a sheet. */
  aliases?: readonly string[]
  /** Foreign key: the entity whose primary key this field holds. */
  references?: EntityName
}

/**
 * Static description of one synced entity. Pull and push both read from the
 * same table object so the two directions cannot drift apart.
 */
export type SchemaTable<T extends object> = {
  entity: EntityName
  sheetName: string
  sqlTable: string
  primaryKey: keyof T & string
  columns: readonly ColumnSpec<T>[]
  dependsOn: readonly EntityName[]
  build: (reader: RowReader<T>) => T
}

export type RowContext = {
  sheetName: string
  rowNumber: number
}

export function headerRow<T extends object>(table: SchemaTable<T>): string[] {
  return table.columns.map((c) => c.header)
}

export function columnFor<T extends object>(table: SchemaTable<T>, field: keyof T & string): ColumnSpec<T> {
  const col = table.columns.find((c) => c.field === field)
  if (!col) throw new Error(`${table.entity}: no column for field ${field}`)
  return col
}

export function primaryKeyColumn<T extends object>(table: SchemaTable<T>): ColumnSpec<T> {
  return columnFor(table, table.primaryKey)
}

/**
 * Position of a column in a remote header row, trying the canonical header
 * first and then each alias. -1 when absent.
 */
export function findColumnIndex<T>(headers: readonly string[], col: ColumnSpec<T>): number {
  for (const name of [col.header, ...(col.aliases ?? [])]) {
    const i = headers.indexOf(name)
    if (i >= 0) return i
  }
  return -1
}

/**
 * Lay a record out under an existing header row. Each column lands where
 * findColumnIndex puts it; header cells no column claims stay blank and
 * columns the header lacks are not written.
 */
export function encodeRecordRow<T extends object>(
  table: SchemaTable<T>,
  record: T,
  headers: readonly string[],
  key?: string
): string[] {
  const row = headers.map(() => '')
  for (const col of table.columns) {
    const i = findColumnIndex(headers, col)
    if (i >= 0) row[i] = formatCell(record[col.field], col.field, key)
  }
  return row
}

export function keyOf<T extends object>(table: SchemaTable<T>, record: T): string {
  const v = record[table.primaryKey]
  return typeof v === 'string' ? v.trim() : ''
}

/**
 * Field-by-field merge: a null/undefined incoming value never overwrites what
 * is already stored, and the primary key is never reassigned.
 */
export function mergeRecord<T extends object>(table: SchemaTable<T>, existing: T, incoming: T): T {
  const merged: T = { ...existing }
  for (const col of table.columns) {
    const field = col.field
    if (field === table.primaryKey) continue
    const value = incoming[field]
    if (value !== null && value !== undefined) {
      merged[field] = value
    }
  }
  return merged
}

/**
 * Reads typed field values out of a decoded header->cell map.
 *
 * A blank cell reads as null. A non-blank cell that doesn't coerce raises
 * RowDecodeError so the engine can skip the row rather than storing a
 * silently-wrong null.
 */
export class RowReader<T extends object> {
  private readonly table: SchemaTable<T>
  private readonly cells: Record<string, string>
  private readonly ctx: RowContext

  constructor(table: SchemaTable<T>, cells: Record<string, string>, ctx: RowContext) {
    this.table = table
    this.cells = cells
    this.ctx = ctx
  }

  raw(field: keyof T & string): string {
    const col = columnFor(this.table, field)
    for (const name of [col.header, ...(col.aliases ?? [])]) {
      const v = this.cells[name]
      if (v !== undefined && v.trim() !== '') return v
    }
    return ''
  }

  key(field: keyof T & string): string {
    const v = coerceString(this.raw(field))
    if (v === null) throw this.fail(field, 'missing primary key')
    return v
  }

  string(field: keyof T & string): string | null {
    return coerceString(this.raw(field))
  }

  date(field: keyof T & string): Date | null {
    const raw = this.raw(field)
    const v = coerceDate(raw)
    if (v === null && raw.trim() !== '') throw this.fail(field, `unparsable date "${raw}"`)
    return v
  }

  float(field: keyof T & string): number | null {
    const raw = this.raw(field)
    const v = coerceFloat(raw)
    if (v === null && raw.trim() !== '') throw this.fail(field, `not a number "${raw}"`)
    return v
  }

  int(field: keyof T & string): number | null {
    const raw = this.raw(field)
    const v = coerceInt(raw)
    if (v === null && raw.trim() !== '') throw this.fail(field, `not an integer "${raw}"`)
    return v
  }

  // Blank stays null so an empty checkbox column can't reset a stored true.
  bool(field: keyof T & string): boolean | null {
    const raw = this.raw(field)
    if (raw.trim() === '') return null
    return coerceBool(raw)
  }

  private fail(field: keyof T & string, message: string): RowDecodeError {
    const header = columnFor(this.table, field).header
    return new RowDecodeError({
      sheetName: this.ctx.sheetName,
      rowNumber: this.ctx.rowNumber,
      header,
      message: `${header}: ${message}`,
    })
  }
}
