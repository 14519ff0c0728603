// services/sync/src/core/sync/sync.engine.ts
import type { ChannelLogger } from '@brewsheet/logging'

import { cellToString, decodeRow, isBlankRow, normalizeHeaders } from '../codec/row.codec.js'
import {
  RowReader,
  encodeRecordRow,
  findColumnIndex,
  headerRow,
  keyOf,
  mergeRecord,
  primaryKeyColumn,
  type SchemaTable,
} from '../schema/schema.table.js'
import { DEFAULT_SHEET_NAMES, SCHEMA, resolveEntityOrder, type SheetNames } from '../schema/schema.tables.js'
import type { EntityName, EntityRecordMap } from '../schema/schema.types.js'
import type { EntityStore, SyncStore } from '../store/store.js'
import { HeaderMismatchError, RecordEncodeError, RowDecodeError, describeError } from '../sync.errors.js'
import type { SheetRow, Transport } from '../transport/transport.js'
import {
  formatEntityReport,
  newEntityReport,
  type EntitySyncReport,
  type SyncDirection,
  type SyncIssue,
  type SyncRunReport,
} from './sync.report.js'

export type SyncEngineOptions = {
  transport: Transport
  store: SyncStore
  logger: ChannelLogger
  /** Remote tab per entity; defaults to the schema's sheet names. */
  sheetNames?: SheetNames
}

export interface SyncEngine {
  /** Resolves to the spreadsheet title; rejects with a Transport* error. */
  verifyAccess(): Promise<string>
  /** Remote rows into the local store, merging field by field. */
  pull(entities?: readonly string[]): Promise<SyncRunReport>
  /** Local records whose key is not on the sheet yet, appended below the last row. */
  push(entities?: readonly string[]): Promise<SyncRunReport>
  /** Rewrite each sheet from the local store and clear whatever is left below. */
  mirror(entities?: readonly string[]): Promise<SyncRunReport>
}

type EncodeResult = {
  rows: SheetRow[]
  skipped: number
  issues: SyncIssue[]
}

type PullResult = {
  report: EntitySyncReport
  /** Keys written in this run. */
  keys: string[]
}

/**
 * Build a sync engine over one transport and one store.
 *
 * Entities run one after another in dependency order. Every run verifies
 * access first and rejects if that fails; after that, a failure only marks
 * the entity it happened in and the run moves on.
 */
export function createSyncEngine(opts: SyncEngineOptions): SyncEngine {
  const { transport, store } = opts
  const log = opts.logger
  const sheetNames: SheetNames = opts.sheetNames ?? DEFAULT_SHEET_NAMES

  async function run(
    direction: SyncDirection,
    requested: readonly string[] | undefined,
    perEntity: (entity: EntityName) => Promise<EntitySyncReport>,
    afterAll?: (reports: EntitySyncReport[]) => void
  ): Promise<SyncRunReport> {
    const order = resolveEntityOrder(requested)
    const startedAt = new Date().toISOString()

    const spreadsheetTitle = await verifyAccess()
    log.info(`${direction} start entities=${order.join(',')}`, { spreadsheetId: transport.resourceId })

    const entities: EntitySyncReport[] = []
    for (const entity of order) {
      entities.push(await perEntity(entity))
    }
    afterAll?.(entities)

    for (const r of entities) {
      if (r.status === 'failed') log.error(formatEntityReport(r), { error: r.error })
      else if (r.issues.length) log.warn(formatEntityReport(r), { issues: r.issues.length })
      else log.info(formatEntityReport(r))
    }

    return {
      direction,
      spreadsheetTitle,
      startedAt,
      finishedAt: new Date().toISOString(),
      entities,
      ok: entities.every((r) => r.status !== 'failed'),
    }
  }

  async function verifyAccess(): Promise<string> {
    try {
      return await transport.verifyAccess()
    } catch (err) {
      log.error('access verification failed', { error: describeError(err) })
      throw err
    }
  }

  // -----------------------------
  // Pull
  // -----------------------------

  async function pullEntity<E extends EntityName>(entity: E): Promise<PullResult> {
    const table: SchemaTable<EntityRecordMap[E]> = SCHEMA[entity]
    const local: EntityStore<EntityRecordMap[E]> = store.table(entity)
    const sheetName = sheetNames[entity]
    const report = newEntityReport(entity, sheetName)

    try {
      const rows = await transport.getRows(sheetName)
      if (rows.length <= 1) {
        report.status = 'empty'
        log.info(`pull sheet=${sheetName} has no data rows`)
        return { report, keys: [] }
      }

      const [headerCells, ...dataRows] = rows
      const headers = normalizeHeaders(headerCells)
      const pk = primaryKeyColumn(table)
      if (findColumnIndex(headers, pk) < 0) {
        throw new HeaderMismatchError({ sheetName, missing: [pk.header] })
      }

      const candidates: EntityRecordMap[E][] = []
      dataRows.forEach((row, i) => {
        if (isBlankRow(row)) return
        const rowNumber = i + 2
        try {
          candidates.push(table.build(new RowReader(table, decodeRow(row, headers), { sheetName, rowNumber })))
        } catch (err) {
          if (!(err instanceof RowDecodeError)) throw err
          report.skipped++
          report.issues.push({ kind: err.kind, rowNumber, message: err.message })
          log.warn(`pull skipped row: ${err.message}`)
        }
      })

      let inserted = 0
      let updated = 0
      const keys = new Set<string>()
      local.runBatch(() => {
        for (const candidate of candidates) {
          const key = keyOf(table, candidate)
          const existing = local.getByKey(key)
          if (existing) {
            local.upsertMerge(mergeRecord(table, existing, candidate))
            updated++
          } else {
            local.upsertMerge(candidate)
            inserted++
          }
          keys.add(key)
        }
      })

      // counted only once the batch has committed
      report.inserted = inserted
      report.updated = updated
      return { report, keys: [...keys] }
    } catch (err) {
      report.status = 'failed'
      report.error = describeError(err)
      return { report, keys: [] }
    }
  }

  function hasKey<E extends EntityName>(entity: E, key: string): boolean {
    return store.table(entity).getByKey(key) !== null
  }

  /**
   * References to keys the store doesn't hold. Accepted, since a later pull
   * of the referenced entity may supply them, but reported.
   */
  function danglingReferences<E extends EntityName>(entity: E, keys: readonly string[]): SyncIssue[] {
    const table: SchemaTable<EntityRecordMap[E]> = SCHEMA[entity]
    const local: EntityStore<EntityRecordMap[E]> = store.table(entity)
    const issues: SyncIssue[] = []

    for (const key of keys) {
      const record = local.getByKey(key)
      if (!record) continue
      for (const col of table.columns) {
        const target = col.references
        const value = record[col.field]
        if (!target || typeof value !== 'string' || value === '') continue
        if (hasKey(target, value)) continue
        issues.push({
          kind: 'DanglingReference',
          key,
          message: `${col.header}=${value} has no ${target} row`,
        })
      }
    }
    return issues
  }

  async function pull(entities?: readonly string[]): Promise<SyncRunReport> {
    const touched = new Map<EntityName, string[]>()

    return run(
      'pull',
      entities,
      async (entity) => {
        const { report, keys } = await pullEntity(entity)
        touched.set(entity, keys)
        return report
      },
      (reports) => {
        for (const r of reports) {
          if (r.status !== 'ok') continue
          r.issues.push(...danglingReferences(r.entity, touched.get(r.entity) ?? []))
        }
      }
    )
  }

  // -----------------------------
  // Push / mirror
  // -----------------------------

  function encodeRecords<T extends object>(
    table: SchemaTable<T>,
    records: readonly T[],
    headers: readonly string[]
  ): EncodeResult {
    const out: EncodeResult = { rows: [], skipped: 0, issues: [] }

    for (const record of records) {
      const key = keyOf(table, record)
      try {
        out.rows.push(encodeRecordRow(table, record, headers, key))
      } catch (err) {
        if (!(err instanceof RecordEncodeError)) throw err
        out.skipped++
        out.issues.push({ kind: err.kind, key, message: err.message })
        log.warn(`skipped record: ${err.message}`)
      }
    }
    return out
  }

  /** Keys present in the remote primary-key column (header or alias). */
  function remoteKeys<T extends object>(table: SchemaTable<T>, sheetName: string, rows: readonly SheetRow[]): Set<string> {
    const keys = new Set<string>()
    if (rows.length === 0) return keys

    const [headerCells, ...dataRows] = rows
    const pk = primaryKeyColumn(table)
    const index = findColumnIndex(normalizeHeaders(headerCells), pk)
    if (index < 0) throw new HeaderMismatchError({ sheetName, missing: [pk.header] })

    for (const row of dataRows) {
      const key = cellToString(row[index]).trim()
      if (key) keys.add(key)
    }
    return keys
  }

  async function pushEntity<E extends EntityName>(entity: E): Promise<EntitySyncReport> {
    const table: SchemaTable<EntityRecordMap[E]> = SCHEMA[entity]
    const local: EntityStore<EntityRecordMap[E]> = store.table(entity)
    const sheetName = sheetNames[entity]
    const report = newEntityReport(entity, sheetName)

    try {
      const records = local.listAll()
      const rows = await transport.getRows(sheetName)
      const present = remoteKeys(table, sheetName, rows)

      const fresh = records.filter((r) => {
        const key = keyOf(table, r)
        return key !== '' && !present.has(key)
      })
      // appended rows follow the sheet's own header, which may use aliases or another order
      const headers = rows.length === 0 ? headerRow(table) : normalizeHeaders(rows[0])
      const encoded = encodeRecords(table, fresh, headers)
      report.skipped = encoded.skipped
      report.issues.push(...encoded.issues)

      if (encoded.rows.length === 0) {
        log.debug(`push sheet=${sheetName} nothing new local=${records.length} remote=${present.size}`)
        return report
      }

      if (rows.length === 0) {
        await transport.writeRows(sheetName, 'A1', [headers, ...encoded.rows])
      } else {
        // rows holds the header plus every data row, so the next free row is rows.length + 1
        await transport.appendRows(sheetName, rows.length, encoded.rows)
      }
      report.appended = encoded.rows.length
      return report
    } catch (err) {
      report.status = 'failed'
      report.appended = 0
      report.error = describeError(err)
      return report
    }
  }

  async function mirrorEntity<E extends EntityName>(entity: E): Promise<EntitySyncReport> {
    const table: SchemaTable<EntityRecordMap[E]> = SCHEMA[entity]
    const local: EntityStore<EntityRecordMap[E]> = store.table(entity)
    const sheetName = sheetNames[entity]
    const report = newEntityReport(entity, sheetName)

    try {
      const headers = headerRow(table)
      const encoded = encodeRecords(table, local.listAll(), headers)
      report.skipped = encoded.skipped
      report.issues.push(...encoded.issues)

      const block = [headers, ...encoded.rows]
      await transport.writeRows(sheetName, 'A1', block)
      await transport.clearRange(sheetName, `A${block.length + 1}:ZZ`)
      report.appended = encoded.rows.length
      return report
    } catch (err) {
      report.status = 'failed'
      report.error = describeError(err)
      return report
    }
  }

  return {
    verifyAccess,
    pull,
    push: (entities) => run('push', entities, pushEntity),
    mirror: (entities) => run('mirror', entities, mirrorEntity),
  }
}
