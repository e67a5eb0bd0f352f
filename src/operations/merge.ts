/**
 * Merge per-study LoF tables into one combined table
 *
 * mergeStudies works on tables already in memory; mergeFiles adds the
 * checks a command-line run needs, reads every input, and writes the result.
 * All fatal checks happen before the output file is touched, and the output
 * is written in a single write once the merge has succeeded.
 *
 * @module operations/merge
 */

import { type } from "arktype";
import { ConfigError, InputError } from "../errors.js";
import { DEFAULT_WING_VALUE } from "../formats/lof/constants.js";
import { LofCountsParser } from "../formats/lof/parser.js";
import { warnToConsole } from "../formats/lof/utils.js";
import { LofTableWriter } from "../formats/lof/writer.js";
import { exists } from "../io/file-reader.js";
import type {
  MergeFilesOptions,
  MergeResult,
  MergeStudiesOptions,
  MergeSummary,
  ParsedStudy,
  StudyTable,
  WarningHandler,
} from "../types.js";
import { MergeFilesOptionsSchema, MergeStudiesOptionsSchema } from "../types.js";
import { aggregateVariant, toOutputFields } from "./aggregate.js";
import { combineVariantKeys } from "./key-sets.js";

/**
 * Merge study tables held in memory
 *
 * @param tables - Study tables in input order, at least two
 * @param options - Mode, wing value and warning handler
 * @returns Formatted header and rows plus the aggregated variants behind them
 * @throws {ConfigError} If options are invalid
 * @throws {InputError} If fewer than two tables are given
 *
 * @example
 * ```typescript
 * const result = mergeStudies([studyA.table, studyB.table], { mode: "union", wingValue: "NA" });
 * console.log(result.rows.length);
 * ```
 */
export function mergeStudies(
  tables: readonly StudyTable[],
  options: MergeStudiesOptions = {}
): MergeResult {
  const validationResult = MergeStudiesOptionsSchema(options);
  if (validationResult instanceof type.errors) {
    throw new ConfigError(`Invalid merge options: ${validationResult.summary}`);
  }

  const mode = options.mode ?? "intersection";
  const wingValue = options.wingValue ?? DEFAULT_WING_VALUE;
  const onWarning = options.onWarning ?? warnToConsole;
  const writer = new LofTableWriter();
  const warnings: string[] = [];

  const variants = combineVariantKeys(tables, mode).map((key) =>
    aggregateVariant(key, tables, mode, wingValue)
  );

  for (const variant of variants) {
    if (variant.totalSamples === 0) {
      const warning = `no samples for variant ${variant.key.join(" ")}; frequencies reported as NA`;
      warnings.push(warning);
      onWarning(warning);
    }
  }

  return {
    header: writer.formatHeader(tables.map((table) => table.sampleNames)),
    rows: variants.map((variant) => writer.formatRow(toOutputFields(variant))),
    variants,
    warnings,
  };
}

/**
 * Read study files in order
 *
 * @throws {FileError} If a file cannot be read
 */
export async function readStudies(
  paths: readonly string[],
  onWarning: WarningHandler = warnToConsole
): Promise<ParsedStudy[]> {
  const parser = new LofCountsParser({ onWarning });
  const studies: ParsedStudy[] = [];
  for (const path of paths) {
    studies.push(await parser.parseFile(path));
  }
  return studies;
}

/**
 * Merge study files into an output file
 *
 * @param options - Input files, output file and merge settings
 * @returns What was written, with every parse warning collected
 * @throws {ConfigError} Fewer than two inputs, invalid options, or an
 * existing output file without clobber
 * @throws {InputError} If an input is not an existing regular file
 * @throws {FileError} If reading or writing fails
 */
export async function mergeFiles(options: MergeFilesOptions): Promise<MergeSummary> {
  const validationResult = MergeFilesOptionsSchema(options);
  if (validationResult instanceof type.errors) {
    throw new ConfigError(`Invalid merge options: ${validationResult.summary}`);
  }

  const { inputFiles, outputFile } = options;
  const mode = options.mode ?? "intersection";

  if (inputFiles.length < 2) {
    throw new ConfigError(
      `Need more than one input file to process: received ${inputFiles.length}`,
      "inputFiles"
    );
  }
  if (options.clobber !== true && (await exists(outputFile))) {
    throw new ConfigError(`Not clobbering ${outputFile}`, "outputFile");
  }
  for (const path of inputFiles) {
    if (!(await exists(path))) {
      throw new InputError(`Invalid file provided: ${path}`, path);
    }
  }

  const studies = await readStudies(inputFiles, options.onWarning);
  const tables = studies.map((study) => study.table);
  const result = mergeStudies(tables, options);

  await new LofTableWriter().writeFile(outputFile, result.header, result.rows);

  return {
    outputFile,
    mode,
    studies: tables.length,
    samples: tables.reduce((sum, table) => sum + table.sampleNames.length, 0),
    variantsWritten: result.rows.length,
    parseWarnings: studies.flatMap((study) => study.warnings),
  };
}
