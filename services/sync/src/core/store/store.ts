// services/sync/src/core/store/store.ts
import type { EntityName, EntityRecordMap } from '../schema/schema.types.js'

/**
 * Typed local persistence for one entity.
 *
 * `upsertMerge` inserts when the key is absent and otherwise merges: a null
 * field in the incoming record never overwrites a stored non-null value.
 */
export interface EntityStore<T extends object> {
  getByKey(key: string): T | null
  upsertMerge(record: T): void
  listAll(): T[]
  /** Run `fn` so that every write it makes commits together or not at all. */
  runBatch<R>(fn: () => R): R
}

export interface SyncStore {
  table<E extends EntityName>(entity: E): EntityStore<EntityRecordMap[E]>
  close(): void
}
