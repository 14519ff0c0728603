// services/sync/src/tests/sync.config.test.ts
import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'

import {
  buildSyncConfigFromEnv,
  normalizePrivateKey,
  readServiceAccountFile,
  resolveCredentials,
  validateSyncConfig,
} from '../core/config/sync.config.js'
import { DEFAULT_SHEET_NAMES } from '../core/schema/schema.tables.js'

describe('buildSyncConfigFromEnv', () => {
  it('falls back to defaults', () => {
    const cfg = buildSyncConfigFromEnv({})

    expect(cfg.spreadsheetId).toBeNull()
    expect(cfg.serviceAccountEmail).toBeNull()
    expect(cfg.privateKey).toBeNull()
    expect(cfg.dryRun).toBe(false)
    expect(cfg.dbPath).toBe('brewsheet.sqlite')
    expect(cfg.sheetNames).toEqual(DEFAULT_SHEET_NAMES)
    expect(cfg.entities).toEqual(['ingredients', 'starters', 'recipes', 'publishNotes'])
  })

  it('reads overrides', () => {
    const cfg = buildSyncConfigFromEnv({
      GOOGLE_SHEETS_DOC_ID: ' doc-1 ',
      GOOGLE_PRIVATE_KEY: 'line-1\\nline-2',
      SYNC_DRY_RUN: 'yes',
      SYNC_DB_PATH: '/tmp/brew.sqlite',
      SYNC_SHEET_RECIPES: 'Recipes 2024',
      SYNC_ENTITIES: 'recipes, ingredients',
    })

    expect(cfg.spreadsheetId).toBe('doc-1')
    expect(cfg.privateKey).toBe('line-1\nline-2')
    expect(cfg.dryRun).toBe(true)
    expect(cfg.dbPath).toBe('/tmp/brew.sqlite')
    expect(cfg.sheetNames.recipes).toBe('Recipes 2024')
    expect(cfg.entities).toEqual(['ingredients', 'recipes'])
  })

  it('prefers the spreadsheet id over the doc id alias', () => {
    const cfg = buildSyncConfigFromEnv({ GOOGLE_SHEETS_SPREADSHEET_ID: 'sheet-1', GOOGLE_SHEETS_DOC_ID: 'doc-1' })
    expect(cfg.spreadsheetId).toBe('sheet-1')
  })

  it('throws on an unknown entity', () => {
    expect(() => buildSyncConfigFromEnv({ SYNC_ENTITIES: 'hops' })).toThrow('Unknown entity "hops"')
  })
})

describe('validateSyncConfig', () => {
  it('accepts a minimal config', () => {
    expect(validateSyncConfig(buildSyncConfigFromEnv({ GOOGLE_SHEETS_SPREADSHEET_ID: 'sheet-1' }))).toEqual({ ok: true })
  })

  it('collects every problem', () => {
    const cfg = buildSyncConfigFromEnv({
      GOOGLE_SERVICE_ACCOUNT_EMAIL: 'sync@test.iam.example',
      SYNC_SHEET_RECIPES: 'Starters',
    })

    expect(validateSyncConfig(cfg)).toEqual({
      ok: false,
      errors: [
        'GOOGLE_SHEETS_SPREADSHEET_ID is required',
        'GOOGLE_SERVICE_ACCOUNT_EMAIL and GOOGLE_PRIVATE_KEY must be set together',
        'sheet names must be distinct (got Ingredients, Starters, Starters, PublishNotes)',
      ],
    })
  })
})

describe('credentials', () => {
  let dir: string

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'brewsheet-'))
  })

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true })
  })

  it('uses the env pair when both halves are set', () => {
    const cfg = buildSyncConfigFromEnv({
      GOOGLE_SERVICE_ACCOUNT_EMAIL: 'sync@test.iam.example',
      GOOGLE_PRIVATE_KEY: 'test-secret',
    })

    expect(resolveCredentials(cfg, dir)).toEqual({
      clientEmail: 'sync@test.iam.example',
      privateKey: 'test-secret',
      source: 'env',
    })
  })

  it('finds service_account.json in the working directory', () => {
    const file = path.join(dir, 'service_account.json')
    fs.writeFileSync(file, JSON.stringify({ client_email: 'sync@test.iam.example', private_key: 'test\\nsecret' }))

    expect(resolveCredentials(buildSyncConfigFromEnv({}), dir)).toEqual({
      clientEmail: 'sync@test.iam.example',
      privateKey: 'test\nsecret',
      source: 'file',
      path: file,
    })
  })

  it('reads GOOGLE_APPLICATION_CREDENTIALS first', () => {
    const explicit = path.join(dir, 'key.json')
    fs.writeFileSync(explicit, JSON.stringify({ client_email: 'explicit@test.iam.example', private_key: 'test-secret' }))
    fs.writeFileSync(
      path.join(dir, 'service_account.json'),
      JSON.stringify({ client_email: 'local@test.iam.example', private_key: 'test-secret' })
    )

    const creds = resolveCredentials(buildSyncConfigFromEnv({ GOOGLE_APPLICATION_CREDENTIALS: explicit }), dir)
    expect(creds.clientEmail).toBe('explicit@test.iam.example')
  })

  it('names the searched places when nothing is found', () => {
    expect(() => resolveCredentials(buildSyncConfigFromEnv({}), dir)).toThrow(
      `(searched: ${path.resolve(dir, 'service_account.json')})`
    )
  })

  it('rejects a key file without the required fields', () => {
    const file = path.join(dir, 'key.json')
    fs.writeFileSync(file, JSON.stringify({ client_email: 'sync@test.iam.example' }))

    expect(() => readServiceAccountFile(file)).toThrow(`Service account file ${file} is missing private_key`)
  })

  it('rejects a key file that is not JSON', () => {
    const file = path.join(dir, 'key.json')
    fs.writeFileSync(file, 'not json')

    expect(() => readServiceAccountFile(file)).toThrow(`Service account file ${file} is not valid JSON`)
  })
})

describe('normalizePrivateKey', () => {
  it('turns escaped newlines into real ones', () => {
    expect(normalizePrivateKey('a\\nb\\nc')).toBe('a\nb\nc')
  })
})
