/**
 * @module formats/lof
 * @description Per-study SNP LoF count tables
 *
 * @example Reading a study
 * ```typescript
 * import { LofCountsParser } from './formats/lof';
 *
 * const { table, warnings } = await new LofCountsParser().parseFile("cohort_a.tsv");
 * ```
 */

export type { LineResult, LofParserOptions } from "./types.js";

export { LofCountsParser } from "./parser.js";

export { LofTableWriter } from "./writer.js";

export {
  countCarriers,
  formatWarning,
  removeBOM,
  variantKeyId,
  warnToConsole,
} from "./utils.js";

export {
  DEFAULT_WING_VALUE,
  FIELD_DELIMITER,
  FREQUENCY_PRECISION,
  GENOTYPE,
  KEY_COLUMNS,
  LEADING_COLUMN_COUNT,
  LINE_ENDING,
  MISSING_FREQUENCY,
  OUTPUT_FIXED_COLUMNS,
} from "./constants.js";
