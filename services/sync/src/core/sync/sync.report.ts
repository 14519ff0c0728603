// services/sync/src/core/sync/sync.report.ts
import type { SyncErrorShape } from '../sync.errors.js'
import type { EntityName } from '../schema/schema.types.js'

export type SyncDirection = 'pull' | 'push' | 'mirror'

export type EntityStatus = 'ok' | 'empty' | 'failed'

/**
 * Something the run noticed without failing the entity: a skipped row or
 * record, or a reference to a key the store doesn't hold (yet).
 */
export type SyncIssue = {
  kind: 'RowDecodeError' | 'RecordEncodeError' | 'DanglingReference'
  message: string
  /** Sheet row number (header is row 1); pull only. */
  rowNumber?: number
  key?: string
}

export type EntitySyncReport = {
  entity: EntityName
  sheetName: string
  status: EntityStatus
  inserted: number
  updated: number
  /** Rows written to the sheet (push: appended, mirror: rewritten). */
  appended: number
  skipped: number
  issues: SyncIssue[]
  error?: SyncErrorShape
}

export type SyncRunReport = {
  direction: SyncDirection
  spreadsheetTitle: string
  startedAt: string
  finishedAt: string
  entities: EntitySyncReport[]
  /** False when any entity failed. */
  ok: boolean
}

export function newEntityReport(entity: EntityName, sheetName: string): EntitySyncReport {
  return {
    entity,
    sheetName,
    status: 'ok',
    inserted: 0,
    updated: 0,
    appended: 0,
    skipped: 0,
    issues: [],
  }
}

export function formatEntityReport(r: EntitySyncReport): string {
  const base =
    `entity=${r.entity} sheet=${r.sheetName} status=${r.status} ` +
    `inserted=${r.inserted} updated=${r.updated} appended=${r.appended} skipped=${r.skipped}`
  return r.error ? `${base} error=${r.error.kind}` : base
}

export function formatRunReport(r: SyncRunReport): string {
  const failed = r.entities.filter((e) => e.status === 'failed').map((e) => e.entity)
  return (
    `${r.direction} ${r.ok ? 'done' : 'finished with failures'} title="${r.spreadsheetTitle}" ` +
    `entities=${r.entities.length}` +
    (failed.length ? ` failed=${failed.join(',')}` : '')
  )
}
