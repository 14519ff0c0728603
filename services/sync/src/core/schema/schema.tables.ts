// services/sync/src/core/schema/schema.tables.ts
import type { SchemaTable } from './schema.table.js'
import {
  EntityName,
  type EntityRecordMap,
  type Ingredient,
  type PublishNote,
  type Recipe,
  type Starter,
} from './schema.types.js'

// Headers follow the master spreadsheet exactly (mixed casing included).

export const IngredientsTable: SchemaTable<Ingredient> = {
  entity: EntityName.Ingredients,
  sheetName: 'Ingredients',
  sqlTable: 'ingredients',
  primaryKey: 'ingredientID',
  dependsOn: [],
  columns: [
    { field: 'ingredientID', header: 'ingredientID', kind: 'string', aliases: ['ID'] },
    { field: 'ingredientType', header: 'ingredient_type', kind: 'string', aliases: ['type'] },
    { field: 'accDate', header: 'acc_date', kind: 'date' },
    { field: 'source', header: 'source', kind: 'string' },
    { field: 'description', header: 'description', kind: 'string' },
  ],
  build: (r) => ({
    ingredientID: r.key('ingredientID'),
    ingredientType: r.string('ingredientType'),
    accDate: r.date('accDate'),
    source: r.string('source'),
    description: r.string('description'),
  }),
}

export const StartersTable: SchemaTable<Starter> = {
  entity: EntityName.Starters,
  sheetName: 'Starters',
  sqlTable: 'starters',
  primaryKey: 'starterBatch',
  // batchID -> recipes is a back-reference; it resolves once recipes are pulled
  dependsOn: [EntityName.Ingredients],
  columns: [
    { field: 'starterBatch', header: 'StarterBatch', kind: 'string' },
    { field: 'date', header: 'Date', kind: 'date' },
    { field: 'batchID', header: 'BatchID', kind: 'string', references: EntityName.Recipes },
    { field: 'amtKake', header: 'Amt_Kake', kind: 'float' },
    { field: 'amtKoji', header: 'Amt_Koji', kind: 'float' },
    { field: 'amtWater', header: 'Amt_water', kind: 'float' },
    { field: 'waterType', header: 'water_type', kind: 'string', references: EntityName.Ingredients },
    { field: 'kake', header: 'Kake', kind: 'string', references: EntityName.Ingredients },
    { field: 'koji', header: 'Koji', kind: 'string', references: EntityName.Ingredients },
    { field: 'yeast', header: 'yeast', kind: 'string', references: EntityName.Ingredients },
    { field: 'lacticAcid', header: 'lactic_acid', kind: 'float' },
    { field: 'mgSO4', header: 'MgSO4', kind: 'float' },
    { field: 'kCl', header: 'KCl', kind: 'float' },
    { field: 'tempC', header: 'temp_C', kind: 'float' },
  ],
  build: (r) => ({
    starterBatch: r.key('starterBatch'),
    date: r.date('date'),
    batchID: r.string('batchID'),
    amtKake: r.float('amtKake'),
    amtKoji: r.float('amtKoji'),
    amtWater: r.float('amtWater'),
    waterType: r.string('waterType'),
    kake: r.string('kake'),
    koji: r.string('koji'),
    yeast: r.string('yeast'),
    lacticAcid: r.float('lacticAcid'),
    mgSO4: r.float('mgSO4'),
    kCl: r.float('kCl'),
    tempC: r.float('tempC'),
  }),
}

export const RecipesTable: SchemaTable<Recipe> = {
  entity: EntityName.Recipes,
  sheetName: 'Recipe',
  sqlTable: 'recipe',
  primaryKey: 'batchID',
  dependsOn: [EntityName.Ingredients, EntityName.Starters],
  columns: [
    { field: 'batchID', header: 'batchID', kind: 'string' },
    { field: 'startDate', header: 'start_date', kind: 'date' },
    { field: 'pouchDate', header: 'pouch_date', kind: 'date' },
    { field: 'batch', header: 'batch', kind: 'int' },
    { field: 'style', header: 'style', kind: 'string' },
    { field: 'kake', header: 'kake', kind: 'string', references: EntityName.Ingredients },
    { field: 'koji', header: 'koji', kind: 'string', references: EntityName.Ingredients },
    { field: 'yeast', header: 'yeast', kind: 'string', references: EntityName.Ingredients },
    { field: 'starter', header: 'starter', kind: 'string', references: EntityName.Starters },
    { field: 'waterType', header: 'water_type', kind: 'string', references: EntityName.Ingredients },
    { field: 'totalKakeG', header: 'total_kake_g', kind: 'float' },
    { field: 'totalKojiG', header: 'total_koji_g', kind: 'float' },
    { field: 'totalWaterML', header: 'total_water_mL', kind: 'float' },
    { field: 'fermentTempC', header: 'ferment_temp_C', kind: 'float' },
    { field: 'addition1Notes', header: 'Addition1_Notes', kind: 'string' },
    { field: 'addition2Notes', header: 'Addition2_Notes', kind: 'string' },
    { field: 'addition3Notes', header: 'Addition3_Notes', kind: 'string' },
    { field: 'fermentFinishGravity', header: 'ferment_finish_gravity', kind: 'float' },
    { field: 'fermentFinishBrix', header: 'ferment_finish_brix', kind: 'float' },
    { field: 'finalMeasuredTempC', header: 'final_measured_temp_C', kind: 'float' },
    { field: 'finalMeasuredGravity', header: 'final_measured_gravity', kind: 'float' },
    { field: 'finalMeasuredBrixPct', header: 'final_measured_Brix_%', kind: 'float' },
    { field: 'finalGravity', header: 'final_gravity', kind: 'float' },
    { field: 'abvPct', header: 'ABV_%', kind: 'float' },
    { field: 'smv', header: 'SMV', kind: 'float' },
    { field: 'finalWaterAdditionML', header: 'final_water_addition_mL', kind: 'float' },
    { field: 'clarified', header: 'clarified', kind: 'bool' },
    { field: 'pasteurized', header: 'pasteurized', kind: 'bool' },
    { field: 'pasteurizationNotes', header: 'pasteurization_notes', kind: 'string' },
    { field: 'finishingAdditions', header: 'finishing_additions', kind: 'string' },
  ],
  build: (r) => ({
    batchID: r.key('batchID'),
    startDate: r.date('startDate'),
    pouchDate: r.date('pouchDate'),
    batch: r.int('batch'),
    style: r.string('style'),
    kake: r.string('kake'),
    koji: r.string('koji'),
    yeast: r.string('yeast'),
    starter: r.string('starter'),
    waterType: r.string('waterType'),
    totalKakeG: r.float('totalKakeG'),
    totalKojiG: r.float('totalKojiG'),
    totalWaterML: r.float('totalWaterML'),
    fermentTempC: r.float('fermentTempC'),
    addition1Notes: r.string('addition1Notes'),
    addition2Notes: r.string('addition2Notes'),
    addition3Notes: r.string('addition3Notes'),
    fermentFinishGravity: r.float('fermentFinishGravity'),
    fermentFinishBrix: r.float('fermentFinishBrix'),
    finalMeasuredTempC: r.float('finalMeasuredTempC'),
    finalMeasuredGravity: r.float('finalMeasuredGravity'),
    finalMeasuredBrixPct: r.float('finalMeasuredBrixPct'),
    finalGravity: r.float('finalGravity'),
    abvPct: r.float('abvPct'),
    smv: r.float('smv'),
    finalWaterAdditionML: r.float('finalWaterAdditionML'),
    clarified: r.bool('clarified'),
    pasteurized: r.bool('pasteurized'),
    pasteurizationNotes: r.string('pasteurizationNotes'),
    finishingAdditions: r.string('finishingAdditions'),
  }),
}

export const PublishNotesTable: SchemaTable<PublishNote> = {
  entity: EntityName.PublishNotes,
  sheetName: 'PublishNotes',
  sqlTable: 'publishnotes',
  primaryKey: 'batchID',
  dependsOn: [EntityName.Ingredients, EntityName.Recipes],
  columns: [
    { field: 'batchID', header: 'BatchID', kind: 'string', references: EntityName.Recipes },
    { field: 'pouchDate', header: 'Pouch_Date', kind: 'date' },
    { field: 'style', header: 'Style', kind: 'string' },
    { field: 'water', header: 'Water', kind: 'string', references: EntityName.Ingredients },
    { field: 'abv', header: 'ABV', kind: 'float' },
    { field: 'smv', header: 'SMV', kind: 'float' },
    { field: 'batchSizeL', header: 'Batch_Size_L', kind: 'float' },
    { field: 'rice', header: 'Rice', kind: 'string' },
    { field: 'description', header: 'Description', kind: 'string' },
  ],
  build: (r) => ({
    batchID: r.key('batchID'),
    pouchDate: r.date('pouchDate'),
    style: r.string('style'),
    water: r.string('water'),
    abv: r.float('abv'),
    smv: r.float('smv'),
    batchSizeL: r.float('batchSizeL'),
    rice: r.string('rice'),
    description: r.string('description'),
  }),
}

export type SchemaRegistry = { [E in EntityName]: SchemaTable<EntityRecordMap[E]> }

export const SCHEMA: SchemaRegistry = {
  ingredients: IngredientsTable,
  starters: StartersTable,
  recipes: RecipesTable,
  publishNotes: PublishNotesTable,
}

/**
 * Entities sorted so each comes after everything in its `dependsOn`. Ties
 * keep declaration order. The starter -> recipe reference is not in
 * `dependsOn`; with it the two would form a cycle.
 */
export function dependencyOrder(registry: SchemaRegistry): EntityName[] {
  const order: EntityName[] = []
  const visiting = new Set<EntityName>()

  const visit = (entity: EntityName): void => {
    if (order.includes(entity)) return
    if (visiting.has(entity)) throw new Error(`dependency cycle through ${entity}`)
    visiting.add(entity)
    for (const dep of registry[entity].dependsOn) visit(dep)
    visiting.delete(entity)
    order.push(entity)
  }

  Object.values(EntityName).forEach(visit)
  return order
}

export const ENTITY_ORDER: readonly EntityName[] = dependencyOrder(SCHEMA)

export function isEntityName(v: string): v is EntityName {
  return (ENTITY_ORDER as readonly string[]).includes(v)
}

/**
 * Put a requested subset of entities into dependency order (deduplicated).
 * No argument means all of them.
 */
export function resolveEntityOrder(requested?: readonly string[]): EntityName[] {
  if (!requested || requested.length === 0) return [...ENTITY_ORDER]

  const wanted = new Set<EntityName>()
  for (const name of requested) {
    const n = name.trim()
    if (!isEntityName(n)) {
      throw new Error(`Unknown entity "${name}" (expected one of ${ENTITY_ORDER.join(', ')})`)
    }
    wanted.add(n)
  }
  return ENTITY_ORDER.filter((e) => wanted.has(e))
}

export type SheetNames = Record<EntityName, string>

export const DEFAULT_SHEET_NAMES: SheetNames = {
  ingredients: IngredientsTable.sheetName,
  starters: StartersTable.sheetName,
  recipes: RecipesTable.sheetName,
  publishNotes: PublishNotesTable.sheetName,
}
