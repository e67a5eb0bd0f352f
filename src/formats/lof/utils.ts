/**
 * LoF Counts Utility Functions
 */

import type { VariantKey, VariantKeyId, WarningHandler } from "../../types.js";
import { FIELD_DELIMITER, GENOTYPE } from "./constants.js";

/**
 * Encode a variant key for map lookup
 *
 * Fields come from tab-split lines and never contain a tab, so joining on
 * tab is unambiguous.
 */
export function variantKeyId(key: VariantKey): VariantKeyId {
  return key.join(FIELD_DELIMITER);
}

const DECIMAL_TOKEN = /^\s*[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?\s*$/i;

/**
 * Count heterozygous and homozygous LoF carriers among genotype tokens
 *
 * Decimal tokens are compared numerically, so "1" and "1.0" both count as
 * heterozygous. Anything else, including hex or binary literals, is a
 * non-carrier.
 */
export function countCarriers(tokens: readonly string[]): {
  heterozygous: number;
  homozygous: number;
} {
  let heterozygous = 0;
  let homozygous = 0;

  for (const token of tokens) {
    if (!DECIMAL_TOKEN.test(token)) continue;
    const value = Number(token);
    if (value === GENOTYPE.HETEROZYGOUS_LOF) heterozygous++;
    else if (value === GENOTYPE.HOMOZYGOUS_LOF) homozygous++;
  }

  return { heterozygous, homozygous };
}

/**
 * Remove a UTF-8 byte order mark
 */
export function removeBOM(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

/**
 * Render a warning the way parsers report them on the console
 */
export function formatWarning(warning: string, lineNumber?: number): string {
  return lineNumber === undefined
    ? `LoF Warning: ${warning}`
    : `LoF Warning (line ${lineNumber}): ${warning}`;
}

/**
 * Default warning handler
 */
export const warnToConsole: WarningHandler = (warning, lineNumber) => {
  console.warn(formatWarning(warning, lineNumber));
};
