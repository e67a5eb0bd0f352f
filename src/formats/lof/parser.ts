/**
 * @module formats/lof/parser
 * @description Reader for per-study SNP LoF count tables
 *
 * Builds a variant-keyed StudyTable from one tab-separated file. Carrier
 * counts are recomputed from the per-sample genotype columns; the
 * precomputed frequency and carrier columns of the input are skipped.
 * Malformed lines never abort a read: they become ParseWarnings. A row
 * with fewer than nine fields is left out of the table entirely.
 */

import { type } from "arktype";
import { ConfigError } from "../../errors.js";
import { readToString } from "../../io/file-reader.js";
import type {
  ParsedStudy,
  ParseWarning,
  VariantKey,
  VariantKeyId,
  VariantRecord,
  WarningHandler,
} from "../../types.js";
import { FIELD_DELIMITER, LEADING_COLUMN_COUNT } from "./constants.js";
import type { LineResult, LofParserOptions } from "./types.js";
import { countCarriers, removeBOM, variantKeyId, warnToConsole } from "./utils.js";

/**
 * ArkType validation for parser options
 */
const LofParserOptionsSchema = type({
  "source?": "string",
});

/**
 * Parser for SNP LoF count tables
 *
 * @example
 * ```typescript
 * const parser = new LofCountsParser();
 * const { table, warnings } = await parser.parseFile("cohort_a.tsv");
 * console.log(`${table.sampleNames.length} samples, ${table.records.size} variants`);
 * ```
 */
export class LofCountsParser {
  private readonly source: string;
  private readonly onWarning: WarningHandler;

  constructor(options: LofParserOptions = {}) {
    const validationResult = LofParserOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ConfigError(`Invalid LoF parser options: ${validationResult.summary}`);
    }

    this.source = options.source ?? "<input>";
    this.onWarning = options.onWarning ?? warnToConsole;
  }

  /**
   * Parse a study file
   *
   * @param path Path to a tab-separated LoF counts file
   * @throws {FileError} If the file cannot be read
   */
  async parseFile(path: string): Promise<ParsedStudy> {
    const content = await readToString(path);
    return this.parseString(content, path);
  }

  /**
   * Parse study data held in memory
   *
   * @param data Whole file content: header line, then data lines
   * @param source Label recorded on the table and its warnings
   */
  parseString(data: string, source: string = this.source): ParsedStudy {
    const lines = data.split(/\r?\n/);
    // A final line terminator leaves one empty string behind
    if (lines.length > 0 && lines[lines.length - 1] === "") {
      lines.pop();
    }

    const warnings: ParseWarning[] = [];
    const warn = (lineNumber: number, message: string, line?: string): void => {
      warnings.push({ source, lineNumber, message, line });
      this.onWarning(`${source}: ${message}`, lineNumber);
    };

    const [headerLine, ...dataLines] = lines;
    if (headerLine === undefined) {
      warn(1, "missing header line");
      return { table: { source, sampleNames: [], records: new Map() }, warnings };
    }

    const sampleNames = this.parseHeader(removeBOM(headerLine));
    const records = new Map<VariantKeyId, VariantRecord>();

    dataLines.forEach((line, index) => {
      const lineNumber = index + 2;
      const result = this.parseLine(line, lineNumber);

      if (!result.ok) {
        warn(lineNumber, result.message, line);
        return;
      }

      const { record } = result;
      if (record.totalSamples !== sampleNames.length) {
        warn(
          lineNumber,
          `row has ${record.totalSamples} genotype columns but the header names ${sampleNames.length} samples`,
          line
        );
      }

      const id = variantKeyId(record.key);
      const previous = records.get(id);
      if (previous !== undefined) {
        warn(
          lineNumber,
          `duplicate variant ${record.key.join(" ")} replaces the one on line ${previous.lineNumber}`,
          line
        );
      }
      records.set(id, record);
    });

    return { table: { source, sampleNames, records }, warnings };
  }

  /**
   * Extract sample names from a header line (every column after the leading
   * metadata columns)
   */
  parseHeader(line: string): string[] {
    return line.split(FIELD_DELIMITER).slice(LEADING_COLUMN_COUNT);
  }

  /**
   * Parse one data line into a variant record
   *
   * Lines with fewer than nine fields yield no record.
   */
  parseLine(line: string, lineNumber?: number): LineResult {
    const fields = line.split(FIELD_DELIMITER);
    if (fields.length < LEADING_COLUMN_COUNT) {
      return {
        ok: false,
        message: `expected at least ${LEADING_COLUMN_COUNT} tab-separated fields, found ${line === "" ? 0 : fields.length}`,
      };
    }

    const [snpId = "", allele = "", consequence = "", geneId = "", geneSymbol = ""] = fields;
    const key: VariantKey = [snpId, allele, consequence, geneId, geneSymbol];
    const tokens = fields.slice(LEADING_COLUMN_COUNT);
    const { heterozygous, homozygous } = countCarriers(tokens);

    return {
      ok: true,
      record: {
        key,
        heterozygousLofCount: heterozygous,
        homozygousLofCount: homozygous,
        totalSamples: tokens.length,
        genotypes: tokens.join(FIELD_DELIMITER),
        lineNumber,
      },
    };
  }
}
