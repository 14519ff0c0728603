// services/sync/src/core/sync.errors.ts

export type SyncErrorKind =
  | 'TransportNotFound'
  | 'TransportForbidden'
  | 'TransportTypeMismatch'
  | 'TransportCallFailed'
  | 'HeaderMismatch'
  | 'RowDecodeError'
  | 'RecordEncodeError'

/**
 * Root of every error the sync engine raises on purpose.
 *
 * Transport* errors are resource-level: they abort the current entity (or the
 * whole run when raised by access verification). RowDecodeError and
 * RecordEncodeError are row-local and only ever cause a skip.
 */
export abstract class SyncError extends Error {
  abstract readonly kind: SyncErrorKind

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

export class TransportNotFoundError extends SyncError {
  readonly kind = 'TransportNotFound' as const
  readonly resourceId: string
  readonly sheetName?: string

  constructor(params: { resourceId: string; sheetName?: string; cause?: unknown }) {
    const target = params.sheetName
      ? `sheet "${params.sheetName}" in spreadsheet ${params.resourceId}`
      : `spreadsheet ${params.resourceId}`
    super(
      `Not found: ${target}. Check the spreadsheet id (the part between /d/ and /edit in the URL) and the tab name.`,
      { cause: params.cause }
    )
    this.resourceId = params.resourceId
    this.sheetName = params.sheetName
  }
}

export class TransportForbiddenError extends SyncError {
  readonly kind = 'TransportForbidden' as const
  readonly resourceId: string
  readonly callerIdentity: string

  constructor(params: { resourceId: string; callerIdentity: string; cause?: unknown }) {
    super(
      `Permission denied for spreadsheet ${params.resourceId}. Share it as Editor with ${params.callerIdentity}.`,
      { cause: params.cause }
    )
    this.resourceId = params.resourceId
    this.callerIdentity = params.callerIdentity
  }
}

export class TransportTypeMismatchError extends SyncError {
  readonly kind = 'TransportTypeMismatch' as const
  readonly resourceId: string
  readonly sheetName?: string

  constructor(params: { resourceId: string; sheetName?: string; cause?: unknown }) {
    super(
      `Resource ${params.resourceId} is not a spreadsheet (it may be a document, slide deck or folder).`,
      { cause: params.cause }
    )
    this.resourceId = params.resourceId
    this.sheetName = params.sheetName
  }
}

export class TransportCallFailedError extends SyncError {
  readonly kind = 'TransportCallFailed' as const
  readonly resourceId: string
  readonly sheetName?: string
  readonly status?: number

  constructor(params: { resourceId: string; sheetName?: string; status?: number; message: string; cause?: unknown }) {
    const where = params.sheetName ? ` sheet=${params.sheetName}` : ''
    const status = params.status !== undefined ? ` status=${params.status}` : ''
    super(`Remote call failed spreadsheet=${params.resourceId}${where}${status}: ${params.message}`, {
      cause: params.cause,
    })
    this.resourceId = params.resourceId
    this.sheetName = params.sheetName
    this.status = params.status
  }
}

export class HeaderMismatchError extends SyncError {
  readonly kind = 'HeaderMismatch' as const
  readonly sheetName: string
  readonly missing: string[]

  constructor(params: { sheetName: string; missing: string[] }) {
    super(`Sheet "${params.sheetName}" header row is missing: ${params.missing.join(', ')}`)
    this.sheetName = params.sheetName
    this.missing = params.missing
  }
}

export class RowDecodeError extends SyncError {
  readonly kind = 'RowDecodeError' as const
  readonly sheetName: string
  readonly rowNumber: number
  readonly header?: string

  constructor(params: { sheetName: string; rowNumber: number; header?: string; message: string }) {
    super(`${params.sheetName} row ${params.rowNumber}: ${params.message}`)
    this.sheetName = params.sheetName
    this.rowNumber = params.rowNumber
    this.header = params.header
  }
}

export class RecordEncodeError extends SyncError {
  readonly kind = 'RecordEncodeError' as const
  readonly field: string
  readonly key?: string

  constructor(params: { field: string; key?: string; message: string }) {
    super(params.key ? `record ${params.key} field ${params.field}: ${params.message}` : `field ${params.field}: ${params.message}`)
    this.field = params.field
    this.key = params.key
  }
}

export function isSyncError(err: unknown): err is SyncError {
  return err instanceof SyncError
}

export type SyncErrorShape = {
  kind: SyncErrorKind | 'Unexpected'
  message: string
  resourceId?: string
  sheetName?: string
}

/**
 * Flatten any thrown value into something safe to log or put in a report.
 */
export function describeError(err: unknown): SyncErrorShape {
  if (err instanceof SyncError) {
    const shape: SyncErrorShape = { kind: err.kind, message: err.message }
    if ('resourceId' in err && typeof err.resourceId === 'string') shape.resourceId = err.resourceId
    if ('sheetName' in err && typeof err.sheetName === 'string') shape.sheetName = err.sheetName
    return shape
  }
  if (err instanceof Error) return { kind: 'Unexpected', message: err.message }
  return { kind: 'Unexpected', message: String(err) }
}
