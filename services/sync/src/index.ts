// services/sync/src/index.ts
export * from './core/codec/row.codec.js'
export * from './core/config/sync.config.js'
export * from './core/schema/schema.table.js'
export * from './core/schema/schema.tables.js'
export * from './core/schema/schema.types.js'
export * from './core/store/sqlite.store.js'
export type { EntityStore, SyncStore } from './core/store/store.js'
export * from './core/sync.errors.js'
export * from './core/sync/sync.engine.js'
export * from './core/sync/sync.report.js'
export * from './core/transport/sheets.transport.js'
export * from './core/transport/transport.js'
