import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { type CliOutput, describeSummary, run } from "../src/cli.js";
import { studyContent, variant } from "./utils/lof-fixtures.js";

function captureOutput(): CliOutput & { out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    writeOut: (str) => {
      out.push(str);
    },
    writeErr: (str) => {
      err.push(str);
    },
  };
}

describe("CLI", () => {
  let dir: string;
  let first: string;
  let second: string;
  let output: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "lof-cli-"));
    first = join(dir, "first.tsv");
    second = join(dir, "second.tsv");
    output = join(dir, "merged.tsv");

    writeFileSync(
      first,
      `${studyContent(["A1", "A2", "A3"], [[variant("rs1"), [0, 1, 2]]])}short\tline\n`
    );
    writeFileSync(
      second,
      studyContent(["B1", "B2"], [
        [variant("rs1"), [1, 0]],
        [variant("rs2"), [2, 2]],
      ])
    );
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("merges the intersection by default", async () => {
    const io = captureOutput();

    const status = await run(["-i", `${first},${second}`, "-o", output], io);

    expect(status).toBe(0);
    expect(readFileSync(output, "utf8").split("\n")).toHaveLength(3);
    expect(io.out.join("")).toBe(
      `Merged 2 studies (5 samples) into ${output}: 1 variants (intersection), 1 parse warning\n`
    );
    expect(io.err).toEqual([
      `LoF Warning (line 3): ${first}: expected at least 9 tab-separated fields, found 2\n`,
    ]);
  });

  test("merges the union with a custom wing value", async () => {
    const io = captureOutput();

    const status = await run(
      ["--input-files", `${first},${second}`, "--output-file", output, "--union", "-w", "NA", "-q"],
      io
    );

    expect(status).toBe(0);
    const lines = readFileSync(output, "utf8").split("\n");
    expect(lines[2]).toBe(
      "rs2\tA\tstop_gained\tENSG_GENE1\tGENE1\t0\t0.4\t0\t2\tNA\tNA\tNA\t2\t2"
    );
    expect(io.err).toEqual([]);
  });

  test("refuses to clobber an existing output without -c", async () => {
    writeFileSync(output, "existing\n");
    const io = captureOutput();

    const status = await run(["-i", `${first},${second}`, "-o", output], io);

    expect(status).toBe(1);
    expect(io.err[0]).toBe(`ConfigError: Not clobbering ${output}\n`);
    expect(readFileSync(output, "utf8")).toBe("existing\n");
  });

  test("overwrites with -c", async () => {
    writeFileSync(output, "existing\n");

    const status = await run(["-i", `${first},${second}`, "-o", output, "-c", "-q"], captureOutput());

    expect(status).toBe(0);
    expect(readFileSync(output, "utf8")).not.toBe("existing\n");
  });

  test("requires input files", async () => {
    const io = captureOutput();

    const status = await run(["-o", output], io);

    expect(status).toBe(1);
    expect(io.err[0]).toBe("ConfigError: Need input files\n");
    expect(io.err[1]).toContain("Usage: snp-lof-merge");
    expect(existsSync(output)).toBe(false);
  });

  test("requires an output file", async () => {
    const io = captureOutput();

    const status = await run(["-i", `${first},${second}`], io);

    expect(status).toBe(1);
    expect(io.err[0]).toBe("ConfigError: Need an output file to write to\n");
  });

  test("requires more than one input file", async () => {
    const io = captureOutput();

    const status = await run(["-i", `${first},`, "-o", output], io);

    expect(status).toBe(1);
    expect(io.err[0]).toBe("ConfigError: Need more than one input file to process: received 1\n");
    expect(existsSync(output)).toBe(false);
  });

  test("reports an input that is not a file", async () => {
    const io = captureOutput();
    const missing = join(dir, "missing.tsv");

    const status = await run(["-i", `${first},${missing}`, "-o", output], io);

    expect(status).toBe(1);
    expect(io.err).toEqual([`InputError: Invalid file provided: ${missing}\n`]);
  });

  test("prints usage with --help", async () => {
    const io = captureOutput();

    const status = await run(["--help"], io);

    expect(status).toBe(0);
    const help = io.out.join("");
    expect(help).toContain("--input-files <files>");
    expect(help).toContain("--wing-value <value>");
    expect(help).toContain("snp-lof-merge -i first_snp_lof_counts,second_snp_lof_counts");
  });

  test("rejects unknown options", async () => {
    const io = captureOutput();

    const status = await run(["--frobnicate"], io);

    expect(status).toBe(1);
    expect(io.err.join("")).toContain("unknown option '--frobnicate'");
  });
});

describe("describeSummary", () => {
  test("omits the warning count when there were none", () => {
    expect(
      describeSummary({
        outputFile: "merged.tsv",
        mode: "union",
        studies: 3,
        samples: 12,
        variantsWritten: 40,
        parseWarnings: [],
      })
    ).toBe("Merged 3 studies (12 samples) into merged.tsv: 40 variants (union)");
  });
});
