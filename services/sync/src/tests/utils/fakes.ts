// services/sync/src/tests/utils/fakes.ts
import { keyOf, mergeRecord, type SchemaTable } from '../../core/schema/schema.table.js'
import { SCHEMA } from '../../core/schema/schema.tables.js'
import type { EntityName, EntityRecordMap } from '../../core/schema/schema.types.js'
import type { EntityStore, SyncStore } from '../../core/store/store.js'
import type { SheetRow, Transport } from '../../core/transport/transport.js'

export type TransportCall =
  | { method: 'getRows'; sheetName: string }
  | { method: 'writeRows'; sheetName: string; startCell: string; rows: SheetRow[] }
  | { method: 'appendRows'; sheetName: string; afterRow: number; rows: SheetRow[] }
  | { method: 'clearRange'; sheetName: string; range: string }

type FailingMethod = TransportCall['method']

/**
 * In-process spreadsheet: one array of rows per sheet name. Writes land
 * where the real API would put them.
 */
export class FakeTransport implements Transport {
  readonly resourceId = 'sheet-test'
  title = 'Brew Log'

  readonly sheets = new Map<string, SheetRow[]>()
  readonly calls: TransportCall[] = []

  verifyError: Error | null = null
  private readonly failures = new Map<string, Error>()

  failOn(method: FailingMethod, sheetName: string, err: Error): void {
    this.failures.set(`${method}:${sheetName}`, err)
  }

  writes(): TransportCall[] {
    return this.calls.filter((c) => c.method !== 'getRows')
  }

  async verifyAccess(): Promise<string> {
    if (this.verifyError) throw this.verifyError
    return this.title
  }

  async getRows(sheetName: string): Promise<SheetRow[]> {
    this.calls.push({ method: 'getRows', sheetName })
    this.maybeFail('getRows', sheetName)
    return (this.sheets.get(sheetName) ?? []).map((row) => [...row])
  }

  async writeRows(sheetName: string, startCell: string, rows: SheetRow[]): Promise<void> {
    this.calls.push({ method: 'writeRows', sheetName, startCell, rows })
    this.maybeFail('writeRows', sheetName)
    this.put(sheetName, rowOf(startCell), rows)
  }

  async appendRows(sheetName: string, afterRow: number, rows: SheetRow[]): Promise<void> {
    this.calls.push({ method: 'appendRows', sheetName, afterRow, rows })
    this.maybeFail('appendRows', sheetName)
    this.put(sheetName, afterRow + 1, rows)
  }

  async clearRange(sheetName: string, range: string): Promise<void> {
    this.calls.push({ method: 'clearRange', sheetName, range })
    this.maybeFail('clearRange', sheetName)
    const from = rowOf(range.split(':')[0] ?? range)
    const sheet = this.sheets.get(sheetName)
    if (sheet) sheet.length = Math.min(sheet.length, from - 1)
  }

  private put(sheetName: string, firstRow: number, rows: SheetRow[]): void {
    const sheet = this.sheets.get(sheetName) ?? []
    while (sheet.length < firstRow - 1) sheet.push([])
    rows.forEach((row, i) => {
      sheet[firstRow - 1 + i] = [...row]
    })
    this.sheets.set(sheetName, sheet)
  }

  private maybeFail(method: FailingMethod, sheetName: string): void {
    const err = this.failures.get(`${method}:${sheetName}`)
    if (err) throw err
  }
}

function rowOf(cell: string): number {
  const m = /^[A-Z]+(\d+)$/.exec(cell)
  if (!m) throw new Error(`fake transport: unsupported cell ${cell}`)
  return Number(m[1])
}

export class MemoryEntityStore<T extends object> implements EntityStore<T> {
  private readonly table: SchemaTable<T>
  private rows = new Map<string, T>()

  constructor(table: SchemaTable<T>) {
    this.table = table
  }

  getByKey(key: string): T | null {
    const row = this.rows.get(key)
    return row ? { ...row } : null
  }

  upsertMerge(record: T): void {
    const key = keyOf(this.table, record)
    const existing = this.rows.get(key)
    this.rows.set(key, existing ? mergeRecord(this.table, existing, record) : { ...record })
  }

  listAll(): T[] {
    return [...this.rows.values()].map((row) => ({ ...row }))
  }

  runBatch<R>(fn: () => R): R {
    const snapshot = new Map(this.rows)
    try {
      return fn()
    } catch (err) {
      this.rows = snapshot
      throw err
    }
  }
}

/** Throws from the `failAt`-th upsert onward, as a full disk would. */
export class FailingEntityStore<T extends object> extends MemoryEntityStore<T> {
  private readonly failAt: number
  private upserts = 0

  constructor(table: SchemaTable<T>, failAt: number) {
    super(table)
    this.failAt = failAt
  }

  override upsertMerge(record: T): void {
    this.upserts++
    if (this.upserts >= this.failAt) throw new Error(`disk full on write ${this.upserts}`)
    super.upsertMerge(record)
  }
}

type MemoryEntityStores = { [E in EntityName]: MemoryEntityStore<EntityRecordMap[E]> }

export class MemoryStore implements SyncStore {
  readonly stores: MemoryEntityStores

  constructor(overrides: Partial<MemoryEntityStores> = {}) {
    this.stores = {
      ingredients: new MemoryEntityStore(SCHEMA.ingredients),
      starters: new MemoryEntityStore(SCHEMA.starters),
      recipes: new MemoryEntityStore(SCHEMA.recipes),
      publishNotes: new MemoryEntityStore(SCHEMA.publishNotes),
      ...overrides,
    }
  }

  table<E extends EntityName>(entity: E): EntityStore<EntityRecordMap[E]> {
    return this.stores[entity]
  }

  close(): void {}
}
