/**
 * LoF Counts Format Type Definitions
 */

import type { VariantRecord, WarningHandler } from "../../types.js";

/**
 * Parser configuration
 */
export interface LofParserOptions {
  /** Label used in warnings for string input. Default: "<input>" */
  source?: string;
  /** Called for every malformed or suspicious line */
  onWarning?: WarningHandler;
}

/**
 * Outcome of parsing a single data line
 */
export type LineResult =
  | { readonly ok: true; readonly record: VariantRecord }
  | { readonly ok: false; readonly message: string };
