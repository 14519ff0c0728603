// services/sync/src/main.ts
import fs from 'node:fs'
import path from 'node:path'
import { config as dotenvConfig } from 'dotenv'
import { createLogger, LogChannel } from '@brewsheet/logging'

import { buildSyncConfigFromEnv, resolveCredentials, validateSyncConfig } from './core/config/sync.config.js'
import { openSqliteStore } from './core/store/sqlite.store.js'
import { createSyncEngine } from './core/sync/sync.engine.js'
import { formatRunReport, type SyncRunReport } from './core/sync/sync.report.js'
import { describeError } from './core/sync.errors.js'
import { SheetsTransport, createGoogleSheetsApi } from './core/transport/sheets.transport.js'

/**
 * Load environment variables with a clear precedence:
 *   1) .env
 *   2) .env.{NODE_ENV}
 *   3) .env.local
 * Later files override earlier ones.
 */
;(function loadEnv() {
  const cwd = process.cwd()
  const env = String(process.env.NODE_ENV || 'development')
  const files = [path.resolve(cwd, '.env'), path.resolve(cwd, `.env.${env}`), path.resolve(cwd, '.env.local')]

  for (const file of files) {
    if (fs.existsSync(file)) {
      dotenvConfig({ path: file, override: true })
    }
  }
})()

const COMMANDS = ['verify', 'pull', 'push', 'mirror'] as const
type Command = (typeof COMMANDS)[number]

function isCommand(v: string | undefined): v is Command {
  return COMMANDS.some((c) => c === v)
}

const { channel } = createLogger('sync')
const logApp = channel(LogChannel.app)

async function start(): Promise<number> {
  const command = process.argv[2]
  if (!isCommand(command)) {
    logApp.error(`usage: brewsheet-sync <${COMMANDS.join('|')}> (got "${command ?? ''}")`)
    return 2
  }

  const cfg = buildSyncConfigFromEnv()
  const valid = validateSyncConfig(cfg)
  if (!valid.ok || !cfg.spreadsheetId) {
    const errors = valid.ok ? ['GOOGLE_SHEETS_SPREADSHEET_ID is required'] : valid.errors
    for (const e of errors) logApp.error(`config: ${e}`)
    return 1
  }

  const credentials = resolveCredentials(cfg)
  logApp.info(
    `config spreadsheet=${cfg.spreadsheetId} credentials=${credentials.source} db=${cfg.dbPath} dryRun=${cfg.dryRun}`
  )

  const store = openSqliteStore(cfg.dbPath, channel(LogChannel.store))
  try {
    const transport = new SheetsTransport({
      spreadsheetId: cfg.spreadsheetId,
      api: createGoogleSheetsApi(credentials),
      callerIdentity: credentials.clientEmail,
      logger: channel(LogChannel.sheets),
      dryRun: cfg.dryRun,
    })
    const engine = createSyncEngine({
      transport,
      store,
      logger: channel(LogChannel.sync),
      sheetNames: cfg.sheetNames,
    })

    if (command === 'verify') {
      const title = await engine.verifyAccess()
      logApp.info(`access ok title="${title}"`)
      return 0
    }

    let report: SyncRunReport
    if (command === 'pull') report = await engine.pull(cfg.entities)
    else if (command === 'push') report = await engine.push(cfg.entities)
    else report = await engine.mirror(cfg.entities)

    if (report.ok) logApp.info(formatRunReport(report))
    else logApp.error(formatRunReport(report))
    return report.ok ? 0 : 1
  } finally {
    store.close()
  }
}

start().then(
  (code) => {
    process.exitCode = code
  },
  (err: unknown) => {
    logApp.fatal('sync aborted', { error: describeError(err) })
    process.exitCode = 1
  }
)
