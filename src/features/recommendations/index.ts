/**
 * Recommendations feature exports.
 *
 * @module features/recommendations
 */

export type { Outfit, OutfitQuery, OutfitSlot, RandomSource } from './types';
export { temperatureBand, HOT_THRESHOLD, MEDIUM_THRESHOLD } from './utils/temperatureBand';
export { mathRandomSource, pickOne } from './utils/randomSource';
export { choose, filterCandidates } from './utils/chooseItem';
export {
  assembleOutfit,
  formatOutfitReport,
  formatOutfitSlot,
  needsJacket,
  outfitCategories,
  OUTFIT_REPORT_HEADING,
} from './utils/assembleOutfit';
export {
  parseOutfitQuery,
  OutfitQueryInputSchema,
  TemperatureInputSchema,
  type OutfitQueryInput,
} from './utils/queryValidation';
