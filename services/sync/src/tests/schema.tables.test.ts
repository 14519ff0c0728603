// services/sync/src/tests/schema.tables.test.ts
import { describe, expect, it } from 'vitest'

import {
  RowReader,
  columnFor,
  findColumnIndex,
  headerRow,
  mergeRecord,
  primaryKeyColumn,
} from '../core/schema/schema.table.js'
import {
  DEFAULT_SHEET_NAMES,
  ENTITY_ORDER,
  IngredientsTable,
  PublishNotesTable,
  RecipesTable,
  SCHEMA,
  StartersTable,
  dependencyOrder,
  resolveEntityOrder,
} from '../core/schema/schema.tables.js'
import { EntityName } from '../core/schema/schema.types.js'
import { RowDecodeError } from '../core/sync.errors.js'
import { ingredient } from './utils/records.js'

describe('schema tables', () => {
  it('uses the sheet headers verbatim', () => {
    expect(headerRow(StartersTable).slice(0, 5)).toEqual(['StarterBatch', 'Date', 'BatchID', 'Amt_Kake', 'Amt_Koji'])
    expect(headerRow(RecipesTable)).toHaveLength(30)
    expect(headerRow(RecipesTable)).toContain('final_measured_Brix_%')
    expect(headerRow(PublishNotesTable)[0]).toBe('BatchID')
  })

  it('gives every table a primary-key column', () => {
    expect(primaryKeyColumn(IngredientsTable).header).toBe('ingredientID')
    expect(primaryKeyColumn(StartersTable).header).toBe('StarterBatch')
    expect(primaryKeyColumn(RecipesTable).header).toBe('batchID')
    expect(primaryKeyColumn(PublishNotesTable).header).toBe('BatchID')
  })

  it('registers each table under its own entity name', () => {
    for (const entity of ENTITY_ORDER) {
      expect(SCHEMA[entity].entity).toBe(entity)
    }
    expect(Object.values(DEFAULT_SHEET_NAMES)).toEqual(['Ingredients', 'Starters', 'Recipe', 'PublishNotes'])
  })

  it('lists dependencies that come earlier in the order', () => {
    for (const entity of ENTITY_ORDER) {
      for (const dep of SCHEMA[entity].dependsOn) {
        expect(ENTITY_ORDER.indexOf(dep)).toBeLessThan(ENTITY_ORDER.indexOf(entity))
      }
    }
  })
})

describe('dependencyOrder', () => {
  it('moves an entity after the ones it depends on', () => {
    const registry = { ...SCHEMA, ingredients: { ...IngredientsTable, dependsOn: [EntityName.Starters] } }
    const starters = { ...StartersTable, dependsOn: [] }

    expect(dependencyOrder({ ...registry, starters })).toEqual(['starters', 'ingredients', 'recipes', 'publishNotes'])
  })

  it('rejects a cycle', () => {
    const registry = { ...SCHEMA, ingredients: { ...IngredientsTable, dependsOn: [EntityName.PublishNotes] } }

    expect(() => dependencyOrder(registry)).toThrow('dependency cycle through ingredients')
  })
})

describe('resolveEntityOrder', () => {
  it('returns everything by default', () => {
    expect(resolveEntityOrder()).toEqual(['ingredients', 'starters', 'recipes', 'publishNotes'])
    expect(resolveEntityOrder([])).toEqual(['ingredients', 'starters', 'recipes', 'publishNotes'])
  })

  it('sorts and dedupes a subset', () => {
    expect(resolveEntityOrder(['publishNotes', ' ingredients', 'ingredients'])).toEqual(['ingredients', 'publishNotes'])
  })

  it('throws on unknown names', () => {
    expect(() => resolveEntityOrder(['Hops'])).toThrow('Unknown entity "Hops"')
  })
})

describe('findColumnIndex', () => {
  it('prefers the canonical header and falls back to aliases', () => {
    const id = columnFor(IngredientsTable, 'ingredientID')
    expect(findColumnIndex(['type', 'ID'], id)).toBe(1)
    expect(findColumnIndex(['ID', 'ingredientID'], id)).toBe(1)
    expect(findColumnIndex(['name'], id)).toBe(-1)
  })
})

describe('mergeRecord', () => {
  it('copies non-null incoming fields only', () => {
    const existing = ingredient('rice-1', { source: 'old mill', description: 'aged 3mo' })
    const incoming = ingredient('rice-1', { source: 'new mill', ingredientType: 'rice' })

    expect(mergeRecord(IngredientsTable, existing, incoming)).toEqual(
      ingredient('rice-1', { source: 'new mill', description: 'aged 3mo', ingredientType: 'rice' })
    )
  })

  it('never reassigns the key', () => {
    const merged = mergeRecord(IngredientsTable, ingredient('rice-1'), ingredient('rice-2', { source: 'farm' }))
    expect(merged.ingredientID).toBe('rice-1')
    expect(merged.source).toBe('farm')
  })
})

describe('RowReader', () => {
  const ctx = { sheetName: 'Recipe', rowNumber: 3 }

  it('reads blank checkbox cells as null', () => {
    const r = new RowReader(RecipesTable, { batchID: 'B001', clarified: '', pasteurized: 'no' }, ctx)
    expect(r.bool('clarified')).toBeNull()
    expect(r.bool('pasteurized')).toBe(false)
  })

  it('truncates integer cells', () => {
    const r = new RowReader(RecipesTable, { batch: '7.8' }, ctx)
    expect(r.int('batch')).toBe(7)
  })

  it('raises a row error naming the column', () => {
    const r = new RowReader(RecipesTable, { batch: 'seven' }, ctx)
    expect(() => r.int('batch')).toThrow(RowDecodeError)
    expect(() => r.int('batch')).toThrow('Recipe row 3: batch: not an integer "seven"')
  })

  it('requires the primary key', () => {
    const r = new RowReader(IngredientsTable, { ingredientID: '  ' }, { sheetName: 'Ingredients', rowNumber: 2 })
    expect(() => r.key('ingredientID')).toThrow('Ingredients row 2: ingredientID: missing primary key')
  })
})
