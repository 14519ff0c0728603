// services/sync/src/core/config/sync.config.ts
import fs from 'node:fs'
import path from 'node:path'
import { z } from 'zod'

import {
  DEFAULT_SHEET_NAMES,
  resolveEntityOrder,
  type SheetNames,
} from '../schema/schema.tables.js'
import type { EntityName } from '../schema/schema.types.js'

export type SyncConfig = {
  spreadsheetId: string | null
  serviceAccountEmail: string | null
  privateKey: string | null
  credentialsPath: string | null

  dryRun: boolean
  dbPath: string

  sheetNames: SheetNames
  entities: EntityName[]
}

export type ServiceAccountCredentials = {
  clientEmail: string
  privateKey: string
  source: 'env' | 'file'
  path?: string
}

function parseBool(v: string | undefined, def: boolean): boolean {
  if (v === undefined) return def
  const n = v.trim().toLowerCase()
  if (n === 'true' || n === '1' || n === 'yes') return true
  if (n === 'false' || n === '0' || n === 'no') return false
  return def
}

function parseName(v: string | undefined, def: string): string {
  return (v ?? '').trim() || def
}

function parseList(v: string | undefined): string[] {
  return (v ?? '')
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean)
}

// Env formats often carry the PEM with literal "\n" sequences.
export function normalizePrivateKey(key: string): string {
  return key.replace(/\\n/g, '\n')
}

/**
 * Build SyncConfig from environment.
 *
 * Never throws on missing credentials; call `validateSyncConfig(cfg)` before
 * talking to the remote side. An unknown name in SYNC_ENTITIES does throw,
 * since silently syncing a different set of tables is worse than not starting.
 */
export function buildSyncConfigFromEnv(env: NodeJS.ProcessEnv = process.env): SyncConfig {
  const spreadsheetId = (env.GOOGLE_SHEETS_SPREADSHEET_ID ?? env.GOOGLE_SHEETS_DOC_ID ?? '').trim() || null
  const serviceAccountEmail = (env.GOOGLE_SERVICE_ACCOUNT_EMAIL ?? '').trim() || null
  const rawKey = (env.GOOGLE_PRIVATE_KEY ?? '').trim()
  const privateKey = rawKey ? normalizePrivateKey(rawKey) : null
  const credentialsPath = (env.GOOGLE_APPLICATION_CREDENTIALS ?? '').trim() || null

  const dryRun = parseBool(env.SYNC_DRY_RUN, false)
  const dbPath = parseName(env.SYNC_DB_PATH, 'brewsheet.sqlite')

  const sheetNames: SheetNames = {
    ingredients: parseName(env.SYNC_SHEET_INGREDIENTS, DEFAULT_SHEET_NAMES.ingredients),
    starters: parseName(env.SYNC_SHEET_STARTERS, DEFAULT_SHEET_NAMES.starters),
    recipes: parseName(env.SYNC_SHEET_RECIPES, DEFAULT_SHEET_NAMES.recipes),
    publishNotes: parseName(env.SYNC_SHEET_PUBLISH_NOTES, DEFAULT_SHEET_NAMES.publishNotes),
  }

  const entities = resolveEntityOrder(parseList(env.SYNC_ENTITIES))

  return {
    spreadsheetId,
    serviceAccountEmail,
    privateKey,
    credentialsPath,
    dryRun,
    dbPath,
    sheetNames,
    entities,
  }
}

export type SyncConfigValidation = { ok: true } | { ok: false; errors: string[] }

export function validateSyncConfig(cfg: SyncConfig): SyncConfigValidation {
  const errors: string[] = []

  if (!cfg.spreadsheetId) errors.push('GOOGLE_SHEETS_SPREADSHEET_ID is required')

  const hasInline = Boolean(cfg.serviceAccountEmail && cfg.privateKey)
  if (!hasInline && (cfg.serviceAccountEmail || cfg.privateKey)) {
    errors.push('GOOGLE_SERVICE_ACCOUNT_EMAIL and GOOGLE_PRIVATE_KEY must be set together')
  }

  const names = Object.values(cfg.sheetNames)
  if (new Set(names).size !== names.length) {
    errors.push(`sheet names must be distinct (got ${names.join(', ')})`)
  }

  return errors.length ? { ok: false, errors } : { ok: true }
}

const serviceAccountFileSchema = z.object({
  client_email: z.string().min(1),
  private_key: z.string().min(1),
})

/**
 * Resolve service-account credentials, in order:
 *   1) GOOGLE_SERVICE_ACCOUNT_EMAIL + GOOGLE_PRIVATE_KEY
 *   2) the JSON key file at GOOGLE_APPLICATION_CREDENTIALS
 *   3) ./service_account.json under `cwd` (local development)
 */
export function resolveCredentials(cfg: SyncConfig, cwd: string = process.cwd()): ServiceAccountCredentials {
  if (cfg.serviceAccountEmail && cfg.privateKey) {
    return { clientEmail: cfg.serviceAccountEmail, privateKey: cfg.privateKey, source: 'env' }
  }

  const candidates = [cfg.credentialsPath, path.resolve(cwd, 'service_account.json')].filter(
    (p): p is string => Boolean(p)
  )

  for (const file of candidates) {
    if (!fs.existsSync(file)) continue
    return readServiceAccountFile(file)
  }

  throw new Error(
    `Service account credentials not found. Set GOOGLE_SERVICE_ACCOUNT_EMAIL/GOOGLE_PRIVATE_KEY, ` +
      `set GOOGLE_APPLICATION_CREDENTIALS, or place service_account.json in the working directory ` +
      `(searched: ${candidates.join(', ')})`
  )
}

export function readServiceAccountFile(file: string): ServiceAccountCredentials {
  let json: unknown
  try {
    json = JSON.parse(fs.readFileSync(file, 'utf8'))
  } catch (err) {
    throw new Error(`Service account file ${file} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`)
  }

  const parsed = serviceAccountFileSchema.safeParse(json)
  if (!parsed.success) {
    const fields = parsed.error.issues.map((i) => i.path.join('.')).join(', ')
    throw new Error(`Service account file ${file} is missing ${fields}`)
  }

  return {
    clientEmail: parsed.data.client_email,
    privateKey: normalizePrivateKey(parsed.data.private_key),
    source: 'file',
    path: file,
  }
}
