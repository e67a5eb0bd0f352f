/**
 * Variant key set operations across study tables
 *
 * Both combiners return keys in a deterministic order: intersection follows
 * the first table's row order, union follows first appearance scanning the
 * tables in input order.
 *
 * @module operations/key-sets
 */

import { InputError } from "../errors.js";
import type { MergeMode, StudyTable, VariantKey, VariantKeyId } from "../types.js";

/**
 * Intersection: variants present in every table
 *
 * @param tables - Study tables, at least two
 * @returns Keys shared by all tables
 * @throws {InputError} If fewer than two tables are given
 */
export function variantKeyIntersection(tables: readonly StudyTable[]): VariantKey[] {
  const [first, ...rest] = requireTables(tables, "intersection");
  const result: VariantKey[] = [];

  for (const [id, record] of first.records) {
    if (rest.every((table) => table.records.has(id))) {
      result.push(record.key);
    }
  }

  return result;
}

/**
 * Union: variants present in any table, each once
 *
 * @param tables - Study tables, at least two
 * @returns Every distinct key across all tables
 * @throws {InputError} If fewer than two tables are given
 */
export function variantKeyUnion(tables: readonly StudyTable[]): VariantKey[] {
  const seen = new Map<VariantKeyId, VariantKey>();

  for (const table of requireTables(tables, "union")) {
    for (const [id, record] of table.records) {
      if (!seen.has(id)) {
        seen.set(id, record.key);
      }
    }
  }

  return [...seen.values()];
}

/**
 * Combine variant keys according to merge mode
 */
export function combineVariantKeys(
  tables: readonly StudyTable[],
  mode: MergeMode
): VariantKey[] {
  return mode === "union" ? variantKeyUnion(tables) : variantKeyIntersection(tables);
}

function requireTables(
  tables: readonly StudyTable[],
  operation: string
): readonly [StudyTable, ...StudyTable[]] {
  const [first, ...rest] = tables;
  if (first === undefined || rest.length === 0) {
    throw new InputError(
      `Need more than one study table to compute the ${operation} of variant keys: received ${tables.length}`
    );
  }
  return [first, ...rest];
}
