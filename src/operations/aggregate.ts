/**
 * Per-variant aggregation across studies
 *
 * For one variant, folds the ordered list of study tables into carrier
 * totals, a cohort-wide sample count and the concatenated genotype blocks.
 *
 * @module operations/aggregate
 */

import { MergeInvariantError } from "../errors.js";
import {
  FIELD_DELIMITER,
  FREQUENCY_PRECISION,
  MISSING_FREQUENCY,
} from "../formats/lof/constants.js";
import { variantKeyId } from "../formats/lof/utils.js";
import type { AggregatedVariant, Frequency, MergeMode, StudyTable, VariantKey } from "../types.js";

/**
 * Aggregate one variant over every study, in study order
 *
 * Every study adds its full sample count to the denominator, whether or not
 * it has the variant. In union mode a study lacking the variant contributes
 * a block of wing values and no carriers.
 *
 * @param key - Variant to aggregate
 * @param tables - Study tables in input order
 * @param mode - Merge mode the key was combined under
 * @param wingValue - Filler token for absent variants (union mode only)
 * @throws {MergeInvariantError} In intersection mode, if a study lacks the variant
 */
export function aggregateVariant(
  key: VariantKey,
  tables: readonly StudyTable[],
  mode: MergeMode,
  wingValue: string
): AggregatedVariant {
  const id = variantKeyId(key);
  const initial: AggregatedVariant = {
    key,
    totalSamples: 0,
    heterozygousLofCount: 0,
    homozygousLofCount: 0,
    genotypeBlocks: [],
  };

  return tables.reduce<AggregatedVariant>((acc, table) => {
    const studySize = table.sampleNames.length;
    const record = table.records.get(id);

    if (record === undefined) {
      if (mode === "intersection") {
        throw new MergeInvariantError(
          `Variant selected for intersection is missing from ${table.source}`,
          key.join(" "),
          table.source
        );
      }
      return {
        ...acc,
        totalSamples: acc.totalSamples + studySize,
        genotypeBlocks: [...acc.genotypeBlocks, wingBlock(wingValue, studySize)],
      };
    }

    return {
      ...acc,
      totalSamples: acc.totalSamples + studySize,
      heterozygousLofCount: acc.heterozygousLofCount + record.heterozygousLofCount,
      homozygousLofCount: acc.homozygousLofCount + record.homozygousLofCount,
      genotypeBlocks: [...acc.genotypeBlocks, record.genotypes],
    };
  }, initial);
}

/**
 * Filler genotype block: the wing value once per sample, tab-joined
 */
export function wingBlock(wingValue: string, sampleCount: number): string {
  return Array.from({ length: sampleCount }, () => wingValue).join(FIELD_DELIMITER);
}

/**
 * Carrier frequency
 *
 * @returns "NA" when there are no samples, the integer 0 when there are no
 * carriers, the quotient otherwise
 */
export function computeFrequency(count: number, totalSamples: number): Frequency {
  if (totalSamples === 0) return MISSING_FREQUENCY;
  if (count === 0) return 0;
  return count / totalSamples;
}

/**
 * Print a frequency the way `%.15g` does
 *
 * Fifteen significant digits, trailing zeros dropped. Exponent form is used
 * when the decimal exponent is below -4 or at least 15, with a signed
 * exponent of at least two digits.
 *
 * @example
 * ```typescript
 * formatFrequency(0.4);       // "0.4"
 * formatFrequency(1 / 3);     // "0.333333333333333"
 * formatFrequency(1 / 20000); // "5e-05"
 * formatFrequency("NA");      // "NA"
 * ```
 */
export function formatFrequency(frequency: Frequency): string {
  if (frequency === MISSING_FREQUENCY) return frequency;
  if (frequency === 0) return "0";

  const [mantissa = "", exponentText = "0"] = frequency
    .toExponential(FREQUENCY_PRECISION - 1)
    .split("e");
  const exponent = Number(exponentText);

  if (exponent < -4 || exponent >= FREQUENCY_PRECISION) {
    const sign = exponent < 0 ? "-" : "+";
    const digits = String(Math.abs(exponent)).padStart(2, "0");
    return `${stripTrailingZeros(mantissa)}e${sign}${digits}`;
  }

  return stripTrailingZeros(frequency.toFixed(FREQUENCY_PRECISION - 1 - exponent));
}

function stripTrailingZeros(digits: string): string {
  return digits.includes(".") ? digits.replace(/\.?0+$/, "") : digits;
}

/**
 * Output fields for one aggregated variant: key, het/hom frequency,
 * het/hom carrier counts, then each study's genotype block
 */
export function toOutputFields(variant: AggregatedVariant): string[] {
  return [
    ...variant.key,
    formatFrequency(computeFrequency(variant.heterozygousLofCount, variant.totalSamples)),
    formatFrequency(computeFrequency(variant.homozygousLofCount, variant.totalSamples)),
    String(variant.heterozygousLofCount),
    String(variant.homozygousLofCount),
    ...variant.genotypeBlocks,
  ];
}
