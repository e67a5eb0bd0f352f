/**
 * Tests for Effect-backed file reading and writing
 */

import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { FileError } from "../../src/errors.js";
import { exists, readToString } from "../../src/io/file-reader.js";
import { writeString } from "../../src/io/file-writer.js";

describe("File I/O", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "lof-io-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe("exists", () => {
    test("detects regular files", async () => {
      const path = join(dir, "study.tsv");
      writeFileSync(path, "");
      expect(await exists(path)).toBe(true);
    });

    test("reports missing files and directories as absent", async () => {
      const subdir = join(dir, "nested");
      mkdirSync(subdir);

      expect(await exists(join(dir, "missing.tsv"))).toBe(false);
      expect(await exists(subdir)).toBe(false);
    });

    test("rejects invalid paths", async () => {
      await expect(exists("")).rejects.toThrow(FileError);
      await expect(exists("bad\0path")).rejects.toThrow(FileError);
    });
  });

  describe("readToString", () => {
    test("reads the whole file", async () => {
      const path = join(dir, "study.tsv");
      writeFileSync(path, "a\tb\nc\td\n");
      expect(await readToString(path)).toBe("a\tb\nc\td\n");
    });

    test("wraps failures in FileError", async () => {
      const missing = join(dir, "missing.tsv");
      const error = await readToString(missing).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(FileError);
      if (error instanceof FileError) {
        expect(error.filePath).toBe(missing);
        expect(error.operation).toBe("read");
      }
    });
  });

  describe("writeString", () => {
    test("creates or replaces a file", async () => {
      const path = join(dir, "out.tsv");
      await writeString(path, "first\n");
      await writeString(path, "second\n");
      expect(readFileSync(path, "utf8")).toBe("second\n");
    });

    test("wraps failures in FileError", async () => {
      await expect(writeString(join(dir, "no", "such", "dir.tsv"), "x")).rejects.toThrow(
        FileError
      );
    });
  });
});
