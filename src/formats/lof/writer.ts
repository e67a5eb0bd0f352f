/**
 * @module formats/lof/writer
 * @description Writer for merged SNP LoF tables
 *
 * Output is tab-separated: the fixed key/frequency/carrier columns, then
 * every study's sample columns in input order. Nothing is quoted; fields
 * come from tab-split input and cannot contain the delimiter.
 */

import { writeString } from "../../io/file-writer.js";
import { FIELD_DELIMITER, LINE_ENDING, OUTPUT_FIXED_COLUMNS } from "./constants.js";

/**
 * LofTableWriter - formats and writes merged tables
 *
 * @example
 * ```typescript
 * const writer = new LofTableWriter();
 * const header = writer.formatHeader([["s1", "s2"], ["s3"]]);
 * await writer.writeFile("merged.tsv", header, rows);
 * ```
 */
export class LofTableWriter {
  /**
   * Format the header row from each study's sample names, in study order
   */
  formatHeader(sampleLists: readonly (readonly string[])[]): string {
    return [
      ...OUTPUT_FIXED_COLUMNS,
      ...sampleLists.map((samples) => samples.join(FIELD_DELIMITER)),
    ].join(FIELD_DELIMITER);
  }

  /**
   * Format a row of fields
   */
  formatRow(fields: readonly (string | number)[]): string {
    return fields.map(String).join(FIELD_DELIMITER);
  }

  /**
   * Render a whole table; every line, the last included, is terminated
   */
  formatTable(header: string, rows: readonly string[]): string {
    return [header, ...rows].map((line) => line + LINE_ENDING).join("");
  }

  /**
   * Write a table in a single write
   *
   * @param path - File path to write to
   * @param header - Formatted header row
   * @param rows - Formatted data rows
   * @throws {FileError} When the write fails
   */
  async writeFile(path: string, header: string, rows: readonly string[]): Promise<void> {
    await writeString(path, this.formatTable(header, rows));
  }
}
