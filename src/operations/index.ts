/**
 * Merge operations for per-study LoF tables
 */

export {
  aggregateVariant,
  computeFrequency,
  formatFrequency,
  toOutputFields,
  wingBlock,
} from "./aggregate.js";
export { combineVariantKeys, variantKeyIntersection, variantKeyUnion } from "./key-sets.js";
export { mergeFiles, mergeStudies, readStudies } from "./merge.js";
