// services/sync/src/core/schema/schema.types.ts

// Entities are listed in foreign-key dependency order; pull and push walk them this way.
export const EntityName = {
  Ingredients: 'ingredients',
  Starters: 'starters',
  Recipes: 'recipes',
  PublishNotes: 'publishNotes',
} as const

export type EntityName = (typeof EntityName)[keyof typeof EntityName]

export type Ingredient = {
  ingredientID: string
  ingredientType: string | null // rice, yeast, water, nutrientMix, other
  accDate: Date | null
  source: string | null
  description: string | null
}

export type Starter = {
  starterBatch: string // s<N>
  date: Date | null
  batchID: string | null // -> Recipe
  amtKake: number | null // g
  amtKoji: number | null // g
  amtWater: number | null // mL
  waterType: string | null // -> Ingredient
  kake: string | null // -> Ingredient
  koji: string | null // -> Ingredient
  yeast: string | null // -> Ingredient
  lacticAcid: number | null // g
  mgSO4: number | null // g
  kCl: number | null // g
  tempC: number | null
}

export type Recipe = {
  batchID: string
  startDate: Date | null
  pouchDate: Date | null
  batch: number | null
  style: string | null // pure | rustic | rustic_experimental
  kake: string | null
  koji: string | null
  yeast: string | null
  starter: string | null // -> Starter
  waterType: string | null
  totalKakeG: number | null
  totalKojiG: number | null
  totalWaterML: number | null
  fermentTempC: number | null
  addition1Notes: string | null
  addition2Notes: string | null
  addition3Notes: string | null
  fermentFinishGravity: number | null
  fermentFinishBrix: number | null
  finalMeasuredTempC: number | null
  finalMeasuredGravity: number | null
  finalMeasuredBrixPct: number | null
  finalGravity: number | null
  abvPct: number | null
  smv: number | null
  finalWaterAdditionML: number | null
  clarified: boolean | null
  pasteurized: boolean | null
  pasteurizationNotes: string | null
  finishingAdditions: string | null
}

export type PublishNote = {
  batchID: string // = Recipe.batchID
  pouchDate: Date | null
  style: string | null
  water: string | null // -> Ingredient
  abv: number | null
  smv: number | null
  batchSizeL: number | null
  rice: string | null
  description: string | null
}

export type EntityRecordMap = {
  ingredients: Ingredient
  starters: Starter
  recipes: Recipe
  publishNotes: PublishNote
}
