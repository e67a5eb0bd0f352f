/**
 * Command-line interface
 *
 * @example
 * ```sh
 * snp-lof-merge -i first_snp_lof_counts,second_snp_lof_counts -o merged_snp_lof_counts
 * snp-lof-merge -i a.tsv,b.tsv,c.tsv -o merged.tsv --union --wing-value NA
 * ```
 */

import { Command, CommanderError } from "commander";
import { ConfigError, LofMergeError } from "./errors.js";
import { DEFAULT_WING_VALUE } from "./formats/lof/constants.js";
import { formatWarning } from "./formats/lof/utils.js";
import { mergeFiles } from "./operations/merge.js";
import type { MergeFilesOptions, MergeSummary, WarningHandler } from "./types.js";

/**
 * Where the CLI writes its messages
 */
export interface CliOutput {
  writeOut(str: string): void;
  writeErr(str: string): void;
}

interface CliOptions {
  inputFiles?: string;
  outputFile?: string;
  union: boolean;
  wingValue: string;
  clobber: boolean;
  quiet: boolean;
}

const processOutput: CliOutput = {
  writeOut: (str) => process.stdout.write(str),
  writeErr: (str) => process.stderr.write(str),
};

/**
 * Build the command
 *
 * Commander errors and --help surface as CommanderError instead of exiting
 * the process; run() turns them into an exit status.
 */
export function createProgram(output: CliOutput = processOutput): Command {
  const program = new Command();

  program
    .name("snp-lof-merge")
    .description("Merge SNP LoF counts files from multiple studies for mega-analysis.")
    .option("-i, --input-files <files>", "comma-separated list of input files to merge")
    .option("-o, --output-file <path>", "output file to write merged data to")
    .option("-u, --union", "compute the union of variants instead of the intersection", false)
    .option(
      "-w, --wing-value <value>",
      "genotype value for studies lacking a variant when --union is enabled",
      DEFAULT_WING_VALUE
    )
    .option("-c, --clobber", "overwrite the output file if it exists", false)
    .option("-q, --quiet", "do not report malformed input lines", false)
    .helpOption("-h, --help", "print this message and exit")
    .addHelpText(
      "after",
      "\nExample:\n  snp-lof-merge -i first_snp_lof_counts,second_snp_lof_counts -o merged_snp_lof_counts\n"
    )
    .configureOutput({ writeOut: output.writeOut, writeErr: output.writeErr })
    .exitOverride()
    .action(async (options: CliOptions) => {
      const summary = await mergeFiles(toMergeOptions(options, output));
      output.writeOut(`${describeSummary(summary)}\n`);
    });

  return program;
}

/**
 * Run the CLI
 *
 * @param args - Arguments after the executable and script name
 * @returns Process exit status
 */
export async function run(
  args: readonly string[],
  output: CliOutput = processOutput
): Promise<number> {
  const program = createProgram(output);

  try {
    await program.parseAsync([...args], { from: "user" });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    if (error instanceof LofMergeError) {
      output.writeErr(`${error.toString()}\n`);
      if (error instanceof ConfigError) {
        output.writeErr(`\n${program.helpInformation()}`);
      }
      return 1;
    }
    throw error;
  }
}

/**
 * Translate parsed flags into merge options
 *
 * @throws {ConfigError} If inputs or output are missing
 */
export function toMergeOptions(options: CliOptions, output: CliOutput): MergeFilesOptions {
  if (options.inputFiles === undefined) {
    throw new ConfigError("Need input files", "inputFiles");
  }
  if (options.outputFile === undefined) {
    throw new ConfigError("Need an output file to write to", "outputFile");
  }

  const onWarning: WarningHandler = options.quiet
    ? () => {}
    : (warning, lineNumber) => output.writeErr(`${formatWarning(warning, lineNumber)}\n`);

  return {
    inputFiles: options.inputFiles.split(",").filter((path) => path !== ""),
    outputFile: options.outputFile,
    mode: options.union ? "union" : "intersection",
    wingValue: options.wingValue,
    clobber: options.clobber,
    onWarning,
  };
}

/**
 * One-line account of a finished run
 */
export function describeSummary(summary: MergeSummary): string {
  const warnings = summary.parseWarnings.length;
  return (
    `Merged ${summary.studies} studies (${summary.samples} samples) into ${summary.outputFile}: ` +
    `${summary.variantsWritten} variants (${summary.mode})` +
    (warnings > 0 ? `, ${warnings} parse warning${warnings === 1 ? "" : "s"}` : "")
  );
}
