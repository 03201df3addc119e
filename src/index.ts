export type { ParsedIngredient } from '@domain/models/Ingredient.ts'
export type {
  RecipeBody,
  RecipeMetadata,
  RecipeRecord,
  RecipeSection,
  SectionedRecipeBody,
  SimpleRecipeBody,
} from '@domain/models/Recipe.ts'
export type { ConversionResult, MetricUnit, UnitSystem } from '@domain/models/Conversion.ts'
export { UNIT_VOCABULARY, US_TO_METRIC, METRIC_TO_US, METRIC_ROUND_VALUES } from '@domain/constants/units.ts'

export { parseIngredient, parseIngredients, parseIngredientList } from '@application/parser/IngredientParser.ts'
export {
  hasSectionMarkers,
  splitSections,
  parseIngredientSections,
  parseInstructionSections,
  parseRecipeSections,
} from '@application/parser/parseSections.ts'
export type { TextSection, IngredientSection, InstructionSection } from '@application/parser/parseSections.ts'

export {
  convert,
  convertToMetric,
  convertToUs,
  smartRoundMetric,
  getConversionData,
} from '@application/scaler/convertUnit.ts'
export type { ConversionData } from '@application/scaler/convertUnit.ts'
export { formatQuantity, formatUnitQuantity } from '@application/scaler/formatQuantity.ts'
export { formatIngredient } from '@application/scaler/formatIngredient.ts'
export type { QuantityFormatter } from '@application/scaler/formatIngredient.ts'
export { applyUnitSystem } from '@application/scaler/applyUnitSystem.ts'
export type { DisplayIngredient } from '@application/scaler/applyUnitSystem.ts'

export { parseRecipeCsv, CSV_COLUMNS } from '@application/import/parseRecipeCsv.ts'
export type { CsvImportResult, CsvImportOptions, CsvColumn } from '@application/import/parseRecipeCsv.ts'
export { createCsvExport, exportFilename } from '@application/export/exportRecipes.ts'
export { totalTimeMinutes, formatTotalTime } from '@application/recipe/recipeTime.ts'

export { loadConfig } from '@infrastructure/config/loadConfig.ts'
export type { CookbookConfig } from '@infrastructure/config/loadConfig.ts'

export { WakeLockSession } from '@presentation/kitchen/WakeLockSession.ts'
export type {
  WakeLockProvider,
  WakeLockSentinelLike,
  VisibilitySource,
} from '@presentation/kitchen/WakeLockSession.ts'
