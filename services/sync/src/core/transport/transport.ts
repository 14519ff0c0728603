// services/sync/src/core/transport/transport.ts

export type SheetRow = string[]

/**
 * Rectangular-range access to the remote tabular resource.
 *
 * Implementations raise the Transport* errors from sync.errors.ts so callers
 * can tell a bad id, a missing permission and a flaky call apart.
 */
export interface Transport {
  /** Spreadsheet id (or equivalent) used in error context. */
  readonly resourceId: string

  /** All occupied rows of a sheet; the first row is the header row. */
  getRows(sheetName: string): Promise<SheetRow[]>

  /** Overwrite the block starting at `startCell` (A1 notation, e.g. "A1"). */
  writeRows(sheetName: string, startCell: string, rows: SheetRow[]): Promise<void>

  /** Write `rows` beginning at row `afterRow + 1` (1-based). */
  appendRows(sheetName: string, afterRow: number, rows: SheetRow[]): Promise<void>

  /** Clear a range such as "A12:ZZ". */
  clearRange(sheetName: string, range: string): Promise<void>

  /** Read the resource metadata; resolves to its title. */
  verifyAccess(): Promise<string>
}

// -----------------------------
// A1 helpers
// -----------------------------

// Sheet titles with spaces or punctuation must be single-quoted in A1 ranges.
export function quoteSheetName(sheetName: string): string {
  if (/^[A-Za-z0-9_]+$/.test(sheetName)) return sheetName
  return `'${sheetName.replace(/'/g, "''")}'`
}

export function a1(sheetName: string, range: string): string {
  return `${quoteSheetName(sheetName)}!${range}`
}
