/**
 * snp-lof-merge - merge per-study SNP loss-of-function genotype tables
 *
 * Recomputes heterozygous and homozygous LoF carrier counts from raw
 * per-sample genotypes and concatenates genotype columns across studies,
 * keeping either the variants shared by every study or all of them.
 */

// Error types
export { ConfigError, FileError, InputError, LofMergeError, MergeInvariantError } from "./errors.js";

// LoF table format
export {
  DEFAULT_WING_VALUE,
  formatWarning,
  LofCountsParser,
  LofTableWriter,
  OUTPUT_FIXED_COLUMNS,
  variantKeyId,
} from "./formats/lof/index.js";
export type { LofParserOptions } from "./formats/lof/index.js";

// File I/O
export { exists, readToString } from "./io/file-reader.js";
export { writeString } from "./io/file-writer.js";

// Merge operations
export {
  aggregateVariant,
  combineVariantKeys,
  computeFrequency,
  formatFrequency,
  mergeFiles,
  mergeStudies,
  readStudies,
  variantKeyIntersection,
  variantKeyUnion,
} from "./operations/index.js";

// Core types
export type {
  AggregatedVariant,
  Frequency,
  MergeFilesOptions,
  MergeMode,
  MergeResult,
  MergeStudiesOptions,
  MergeSummary,
  ParsedStudy,
  ParseWarning,
  StudyTable,
  VariantKey,
  VariantKeyId,
  VariantRecord,
  WarningHandler,
} from "./types.js";
