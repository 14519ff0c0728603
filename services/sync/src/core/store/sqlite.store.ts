// services/sync/src/core/store/sqlite.store.ts
import Database from 'better-sqlite3'
import type { ChannelLogger } from '@brewsheet/logging'

import { formatCell } from '../codec/row.codec.js'
import { RowReader, primaryKeyColumn, type ColumnSpec, type FieldKind, type SchemaTable } from '../schema/schema.table.js'
import { ENTITY_ORDER, SCHEMA } from '../schema/schema.tables.js'
import type { EntityName, EntityRecordMap } from '../schema/schema.types.js'
import type { EntityStore, SyncStore } from './store.js'

type SqlValue = string | number | null

const SQL_TYPES: Record<FieldKind, string> = {
  string: 'TEXT',
  date: 'TEXT', // YYYY-MM-DD
  float: 'REAL',
  int: 'INTEGER',
  bool: 'INTEGER', // 0/1
}

function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`
}

function referenceTarget<E extends EntityName>(entity: E): { sqlTable: string; keyHeader: string } {
  const table: SchemaTable<EntityRecordMap[E]> = SCHEMA[entity]
  return { sqlTable: table.sqlTable, keyHeader: primaryKeyColumn(table).header }
}

export function createTableSql<T extends object>(table: SchemaTable<T>): string {
  const defs = table.columns.map((col) => {
    const parts = [quoteIdent(col.header), SQL_TYPES[col.kind]]
    if (col.field === table.primaryKey) parts.push('PRIMARY KEY NOT NULL')
    if (col.references) {
      const target = referenceTarget(col.references)
      parts.push(`REFERENCES ${quoteIdent(target.sqlTable)}(${quoteIdent(target.keyHeader)})`)
    }
    return parts.join(' ')
  })
  return `CREATE TABLE IF NOT EXISTS ${quoteIdent(table.sqlTable)} (\n  ${defs.join(',\n  ')}\n)`
}

function toSqlValue<T>(col: ColumnSpec<T>, value: unknown, key: string): SqlValue {
  if (value === null || value === undefined) return null
  if (col.kind === 'bool') return value === true ? 1 : 0
  if (typeof value === 'number') return value
  // dates and strings share the sheet's canonical text form
  return formatCell(value, col.field, key)
}

function fromSqlValue<T>(col: ColumnSpec<T>, value: unknown): string {
  if (value === null || value === undefined) return ''
  if (col.kind === 'bool') return value === 1 || value === 1n ? 'TRUE' : 'FALSE'
  if (typeof value === 'number' || typeof value === 'bigint') return String(value)
  if (typeof value === 'string') return value
  return ''
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null
}

/**
 * One entity's rows in SQLite. Reads are rebuilt through the schema table's
 * builder, so the store and the sheet share one set of coercion rules.
 */
export class SqliteEntityStore<T extends object> implements EntityStore<T> {
  private readonly db: Database.Database
  private readonly table: SchemaTable<T>

  private readonly selectOne: Database.Statement
  private readonly selectAll: Database.Statement
  private readonly upsert: Database.Statement

  constructor(db: Database.Database, table: SchemaTable<T>) {
    this.db = db
    this.table = table

    const t = quoteIdent(table.sqlTable)
    const pkCol = quoteIdent(primaryKeyColumn(table).header)

    const cols = table.columns.map((c) => quoteIdent(c.header))
    const updates = table.columns
      .filter((c) => c.field !== table.primaryKey)
      .map((c) => `${quoteIdent(c.header)} = COALESCE(excluded.${quoteIdent(c.header)}, ${t}.${quoteIdent(c.header)})`)

    this.selectOne = db.prepare(`SELECT * FROM ${t} WHERE ${pkCol} = ?`)
    this.selectAll = db.prepare(`SELECT * FROM ${t} ORDER BY ${pkCol}`)
    this.upsert = db.prepare(
      `INSERT INTO ${t} (${cols.join(', ')}) VALUES (${cols.map(() => '?').join(', ')}) ` +
        `ON CONFLICT(${pkCol}) DO UPDATE SET ${updates.join(', ')}`
    )
  }

  getByKey(key: string): T | null {
    const row: unknown = this.selectOne.get(key)
    return isRecord(row) ? this.fromRow(row, 0) : null
  }

  upsertMerge(record: T): void {
    const key = String(record[this.table.primaryKey])
    const params = this.table.columns.map((col) => toSqlValue(col, record[col.field], key))
    this.upsert.run(...params)
  }

  listAll(): T[] {
    const rows: unknown[] = this.selectAll.all()
    const out: T[] = []
    rows.forEach((row, i) => {
      if (isRecord(row)) out.push(this.fromRow(row, i + 1))
    })
    return out
  }

  runBatch<R>(fn: () => R): R {
    return this.db.transaction(fn)()
  }

  private fromRow(row: Record<string, unknown>, rowNumber: number): T {
    const cells: Record<string, string> = {}
    for (const col of this.table.columns) {
      cells[col.header] = fromSqlValue(col, row[col.header])
    }
    return this.table.build(new RowReader(this.table, cells, { sheetName: this.table.sqlTable, rowNumber }))
  }
}

type SqliteEntityStores = { [E in EntityName]: SqliteEntityStore<EntityRecordMap[E]> }

export class SqliteStore implements SyncStore {
  private readonly db: Database.Database
  private readonly log: ChannelLogger
  private readonly stores: SqliteEntityStores

  constructor(db: Database.Database, logger: ChannelLogger) {
    this.db = db
    this.log = logger
    this.ensureSchema()
    // statements are prepared against tables ensureSchema just created
    this.stores = {
      ingredients: new SqliteEntityStore(db, SCHEMA.ingredients),
      starters: new SqliteEntityStore(db, SCHEMA.starters),
      recipes: new SqliteEntityStore(db, SCHEMA.recipes),
      publishNotes: new SqliteEntityStore(db, SCHEMA.publishNotes),
    }
  }

  table<E extends EntityName>(entity: E): EntityStore<EntityRecordMap[E]> {
    return this.stores[entity]
  }

  close(): void {
    if (this.db.open) this.db.close()
  }

  private ensureSchema(): void {
    for (const entity of ENTITY_ORDER) {
      this.db.exec(this.createSqlFor(entity))
    }
    this.log.debug(`schema ready tables=${ENTITY_ORDER.length}`)
  }

  private createSqlFor<E extends EntityName>(entity: E): string {
    const table: SchemaTable<EntityRecordMap[E]> = SCHEMA[entity]
    return createTableSql(table)
  }
}

/**
 * Open (or create) the local database. Foreign keys stay declared but
 * unenforced: pull may land a reference before the row it points at.
 */
export function openSqliteStore(dbPath: string, logger: ChannelLogger): SqliteStore {
  const sqlite = new Database(dbPath)
  if (dbPath !== ':memory:') sqlite.pragma('journal_mode = WAL')
  sqlite.pragma('foreign_keys = OFF')
  logger.info(`opened sqlite path=${dbPath}`)
  return new SqliteStore(sqlite, logger)
}
