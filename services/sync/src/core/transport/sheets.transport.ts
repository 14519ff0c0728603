// services/sync/src/core/transport/sheets.transport.ts
import { google, type sheets_v4 } from 'googleapis'
import type { ChannelLogger } from '@brewsheet/logging'

import type { ServiceAccountCredentials } from '../config/sync.config.js'
import { cellToString } from '../codec/row.codec.js'
import {
  SyncError,
  TransportCallFailedError,
  TransportForbiddenError,
  TransportNotFoundError,
  TransportTypeMismatchError,
} from '../sync.errors.js'
import { a1, type SheetRow, type Transport } from './transport.js'

const SCOPES = ['https://www.googleapis.com/auth/spreadsheets']

// Wide enough for every synced table (Recipe has 30 columns).
const READ_COLUMNS = 'A:ZZ'

/**
 * The handful of Sheets v4 calls the transport needs. Kept narrow so the
 * transport can be exercised without network access.
 */
export interface SheetsApi {
  getTitle(spreadsheetId: string): Promise<string>
  getValues(spreadsheetId: string, range: string): Promise<unknown[][]>
  updateValues(spreadsheetId: string, range: string, values: string[][]): Promise<void>
  clearValues(spreadsheetId: string, range: string): Promise<void>
}

/**
 * SheetsApi backed by googleapis with a service-account JWT. The client is
 * created lazily on first use and reused afterwards.
 */
export function createGoogleSheetsApi(credentials: ServiceAccountCredentials): SheetsApi {
  let client: sheets_v4.Sheets | null = null

  const sheets = (): sheets_v4.Sheets => {
    if (client) return client
    const auth = new google.auth.JWT({
      email: credentials.clientEmail,
      key: credentials.privateKey,
      scopes: SCOPES,
    })
    client = google.sheets({ version: 'v4', auth })
    return client
  }

  return {
    async getTitle(spreadsheetId) {
      const resp = await sheets().spreadsheets.get({
        spreadsheetId,
        includeGridData: false,
        fields: 'spreadsheetId,properties.title',
      })
      return resp.data.properties?.title ?? 'Unknown'
    },

    async getValues(spreadsheetId, range) {
      const resp = await sheets().spreadsheets.values.get({
        spreadsheetId,
        range,
        majorDimension: 'ROWS',
        valueRenderOption: 'FORMATTED_VALUE',
      })
      const values: unknown[][] = resp.data.values ?? []
      return values
    },

    async updateValues(spreadsheetId, range, values) {
      await sheets().spreadsheets.values.update({
        spreadsheetId,
        range,
        valueInputOption: 'RAW',
        requestBody: { values },
      })
    },

    async clearValues(spreadsheetId, range) {
      await sheets().spreadsheets.values.clear({
        spreadsheetId,
        range,
        requestBody: {},
      })
    },
  }
}

// -----------------------------
// Error classification
// -----------------------------

export type GoogleErrorContext = {
  resourceId: string
  callerIdentity: string
  sheetName?: string
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null
}

function numericStatus(v: unknown): number | undefined {
  if (typeof v === 'number' && Number.isInteger(v)) return v
  if (typeof v === 'string' && /^\d{3}$/.test(v)) return Number(v)
  return undefined
}

/**
 * HTTP status of a googleapis/gaxios error. Depending on the library version
 * it lives on `response.status`, `status` or `code`.
 */
export function googleErrorStatus(err: unknown): number | undefined {
  if (!isRecord(err)) return undefined
  const response = err.response
  if (isRecord(response)) {
    const s = numericStatus(response.status)
    if (s !== undefined) return s
  }
  return numericStatus(err.status) ?? numericStatus(err.code)
}

export function classifyGoogleError(err: unknown, ctx: GoogleErrorContext): SyncError {
  if (err instanceof SyncError) return err

  const status = googleErrorStatus(err)
  const message = err instanceof Error ? err.message : String(err)
  const lower = message.toLowerCase()
  const { resourceId, sheetName } = ctx

  if (status === 404) {
    return new TransportNotFoundError({ resourceId, cause: err })
  }
  if (status === 400 && lower.includes('not supported for this document')) {
    return new TransportTypeMismatchError({ resourceId, sheetName, cause: err })
  }
  if (status === 400 && sheetName && lower.includes('unable to parse range')) {
    // the spreadsheet exists but the tab doesn't
    return new TransportNotFoundError({ resourceId, sheetName, cause: err })
  }
  if (status === 401 || status === 403) {
    return new TransportForbiddenError({ resourceId, callerIdentity: ctx.callerIdentity, cause: err })
  }
  return new TransportCallFailedError({ resourceId, sheetName, status, message, cause: err })
}

// -----------------------------
// Transport
// -----------------------------

export type SheetsTransportOptions = {
  spreadsheetId: string
  api: SheetsApi
  /** Service-account email; named in permission errors so the user knows whom to share with. */
  callerIdentity: string
  logger: ChannelLogger
  /** When true, reads go through and every write is logged and skipped. */
  dryRun?: boolean
}

export class SheetsTransport implements Transport {
  readonly resourceId: string

  private readonly api: SheetsApi
  private readonly callerIdentity: string
  private readonly log: ChannelLogger
  private readonly dryRun: boolean

  constructor(opts: SheetsTransportOptions) {
    this.resourceId = opts.spreadsheetId
    this.api = opts.api
    this.callerIdentity = opts.callerIdentity
    this.log = opts.logger
    this.dryRun = opts.dryRun ?? false
  }

  async verifyAccess(): Promise<string> {
    const title = await this.call(undefined, () => this.api.getTitle(this.resourceId))
    this.log.info(`access verified title="${title}"`, { spreadsheetId: this.resourceId })
    return title
  }

  async getRows(sheetName: string): Promise<SheetRow[]> {
    const values = await this.call(sheetName, () => this.api.getValues(this.resourceId, a1(sheetName, READ_COLUMNS)))
    const rows = values.map((row) => (Array.isArray(row) ? row.map(cellToString) : []))
    this.log.debug(`read sheet=${sheetName} rows=${rows.length}`)
    return rows
  }

  async writeRows(sheetName: string, startCell: string, rows: SheetRow[]): Promise<void> {
    if (rows.length === 0) return
    const range = a1(sheetName, startCell)

    if (this.dryRun) {
      this.log.info(`dryRun: skipped write range=${range} rows=${rows.length}`)
      return
    }

    await this.call(sheetName, () => this.api.updateValues(this.resourceId, range, rows))
    this.log.debug(`wrote range=${range} rows=${rows.length}`)
  }

  async appendRows(sheetName: string, afterRow: number, rows: SheetRow[]): Promise<void> {
    if (!Number.isInteger(afterRow) || afterRow < 0) {
      throw new Error(`appendRows: invalid afterRow=${afterRow}`)
    }
    await this.writeRows(sheetName, `A${afterRow + 1}`, rows)
  }

  async clearRange(sheetName: string, range: string): Promise<void> {
    const full = a1(sheetName, range)

    if (this.dryRun) {
      this.log.info(`dryRun: skipped clear range=${full}`)
      return
    }

    await this.call(sheetName, () => this.api.clearValues(this.resourceId, full))
    this.log.debug(`cleared range=${full}`)
  }

  private async call<T>(sheetName: string | undefined, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn()
    } catch (err) {
      throw classifyGoogleError(err, {
        resourceId: this.resourceId,
        callerIdentity: this.callerIdentity,
        sheetName,
      })
    }
  }
}
