/**
 * Core type definitions for per-study LoF genotype tables
 *
 * A study table maps each variant (SNP, allele, consequence and gene) to the
 * carrier counts recomputed from that study's raw per-sample genotype calls.
 */

import { type } from "arktype";

// =============================================================================
// VARIANTS AND STUDIES
// =============================================================================

/**
 * Variant identity within and across studies:
 * [SNP_ID, Allele, Consequence, gene_ID, gene_symbol]
 */
export type VariantKey = readonly [
  snpId: string,
  allele: string,
  consequence: string,
  geneId: string,
  geneSymbol: string,
];

/**
 * Map key form of a VariantKey (fields joined by tab)
 */
export type VariantKeyId = string;

/**
 * One variant's data within one study
 */
export interface VariantRecord {
  readonly key: VariantKey;
  /** Samples whose genotype token is 1 */
  readonly heterozygousLofCount: number;
  /** Samples whose genotype token is 2 */
  readonly homozygousLofCount: number;
  /** Number of per-sample fields on the source line */
  readonly totalSamples: number;
  /** Per-sample tokens, tab-joined in original column order */
  readonly genotypes: string;
  /** Source line number, for diagnostics */
  readonly lineNumber?: number;
}

/**
 * All variants of one input file, plus the file's sample columns
 */
export interface StudyTable {
  /** File path or label the table was read from */
  readonly source: string;
  readonly sampleNames: readonly string[];
  readonly records: ReadonlyMap<VariantKeyId, VariantRecord>;
}

/**
 * Non-fatal problem found while reading a study file
 */
export interface ParseWarning {
  readonly source: string;
  readonly lineNumber: number;
  readonly message: string;
  /** Offending raw line, when there is one */
  readonly line?: string;
}

/**
 * A study table together with the warnings raised while building it
 */
export interface ParsedStudy {
  readonly table: StudyTable;
  readonly warnings: readonly ParseWarning[];
}

// =============================================================================
// MERGING
// =============================================================================

/**
 * Which variants make it into the merged output
 */
export type MergeMode = "intersection" | "union";

/**
 * Warning callback shared by the parser and the merge operations
 */
export type WarningHandler = (warning: string, lineNumber?: number) => void;

/**
 * Per-variant totals folded across every study
 */
export interface AggregatedVariant {
  readonly key: VariantKey;
  /** Sum of every study's full sample count */
  readonly totalSamples: number;
  readonly heterozygousLofCount: number;
  readonly homozygousLofCount: number;
  /** One tab-joined genotype block per study, in study order */
  readonly genotypeBlocks: readonly string[];
}

/**
 * Carrier frequency as written to output: a number, or "NA" when there
 * are no samples at all
 */
export type Frequency = number | "NA";

/**
 * In-memory merge options
 */
export interface MergeStudiesOptions {
  /** Default: "intersection" */
  readonly mode?: MergeMode;
  /** Filler token for studies lacking a variant in union mode. Default: "0" */
  readonly wingValue?: string;
  readonly onWarning?: WarningHandler;
}

/**
 * Options for merging study files into an output file
 */
export interface MergeFilesOptions extends MergeStudiesOptions {
  readonly inputFiles: readonly string[];
  readonly outputFile: string;
  /** Overwrite an existing output file. Default: false */
  readonly clobber?: boolean;
}

/**
 * Rendered merge output
 */
export interface MergeResult {
  readonly header: string;
  readonly rows: readonly string[];
  readonly variants: readonly AggregatedVariant[];
  readonly warnings: readonly string[];
}

/**
 * What a file merge run produced
 */
export interface MergeSummary {
  readonly outputFile: string;
  readonly mode: MergeMode;
  readonly studies: number;
  readonly samples: number;
  readonly variantsWritten: number;
  readonly parseWarnings: readonly ParseWarning[];
}

// =============================================================================
// ARKTYPE VALIDATION SCHEMAS
// =============================================================================

/**
 * File path validation: non-empty, no null bytes
 */
export const FilePathSchema = type("string>0").narrow((path, ctx) => {
  if (path.includes("\0")) {
    return ctx.reject({
      expected: "a path without null characters",
      actual: JSON.stringify(path),
    });
  }
  return true;
});

/**
 * Wing value: any token that keeps the output row shape intact
 */
export const WingValueSchema = type("string").narrow((value, ctx) => {
  if (/[\t\r\n]/.test(value)) {
    return ctx.reject({
      expected: "a token without tabs or line breaks",
      actual: JSON.stringify(value),
    });
  }
  return true;
});

/**
 * Schema for in-memory merge options
 */
export const MergeStudiesOptionsSchema = type({
  "mode?": '"intersection"|"union"',
  "wingValue?": WingValueSchema,
});

/**
 * Schema for file merge options
 */
export const MergeFilesOptionsSchema = type({
  inputFiles: FilePathSchema.array(),
  outputFile: FilePathSchema,
  "mode?": '"intersection"|"union"',
  "wingValue?": WingValueSchema,
  "clobber?": "boolean",
});
