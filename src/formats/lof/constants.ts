/**
 * LoF Counts Format Constants
 *
 * Column layout, genotype codes and output tokens for per-study SNP LoF
 * count tables.
 */

// =============================================================================
// COLUMN LAYOUT
// =============================================================================

/**
 * Tab is the only delimiter the format uses
 */
export const FIELD_DELIMITER = "\t";

/**
 * Output line terminator
 */
export const LINE_ENDING = "\n";

/**
 * Columns identifying a variant, in file order
 */
export const KEY_COLUMNS = ["SNP_ID", "Allele", "Consequence", "gene_ID", "gene_symbol"] as const;

/**
 * Columns preceding the per-sample genotype columns. The four after the key
 * hold precomputed frequencies and carrier counts, which are recomputed
 * rather than read.
 */
export const OUTPUT_FIXED_COLUMNS = [
  ...KEY_COLUMNS,
  "heterozygous_LoF_frequency",
  "homozygous_LoF_frequency",
  "heterozygous_LoF_carriers",
  "homozygous_LoF_carriers",
] as const;

/**
 * Number of leading metadata columns before the first sample column
 */
export const LEADING_COLUMN_COUNT = OUTPUT_FIXED_COLUMNS.length;

// =============================================================================
// GENOTYPES
// =============================================================================

/**
 * Numeric genotype encoding of per-sample columns
 */
export const GENOTYPE = {
  NON_CARRIER: 0,
  HETEROZYGOUS_LOF: 1,
  HOMOZYGOUS_LOF: 2,
} as const;

/**
 * Filler token for studies lacking a variant in union mode
 */
export const DEFAULT_WING_VALUE = "0";

/**
 * Frequency written when a variant has no samples to divide by
 */
export const MISSING_FREQUENCY = "NA";

/**
 * Significant digits kept when printing frequencies
 */
export const FREQUENCY_PRECISION = 15;
