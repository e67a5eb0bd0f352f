/**
 * File reading utilities
 *
 * Promise-based wrappers around the Effect platform FileSystem service.
 * Input tables are small enough to be read whole, so there is no streaming API.
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect } from "effect";
import { FileError } from "../errors.js";
import { FilePathSchema } from "../types.js";
import { getPlatform } from "./runtime.js";

/**
 * Check whether a path refers to an existing regular file
 *
 * Directories and other special files report false.
 *
 * @param path File path to check
 * @returns Promise resolving to true if the path is a regular file
 * @throws {FileError} If the path is invalid or cannot be inspected
 */
export async function exists(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathExists = yield* fs.exists(validatedPath);
    if (!pathExists) return false;

    const info = yield* fs.stat(validatedPath);
    return info.type === "File";
  });

  try {
    return await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Read an entire file as UTF-8 text
 *
 * @param path File path to read
 * @returns Promise resolving to the file content
 * @throws {FileError} If the file cannot be read
 */
export async function readToString(path: string): Promise<string> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* fs.readFileString(validatedPath);
  });

  try {
    return await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("read", validatedPath, error);
  }
}

/**
 * Validate a file path with ArkType, reporting failures as FileError
 */
function validatePath(path: string): string {
  const validationResult = FilePathSchema(path);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file path: ${validationResult.summary}`, path, "stat");
  }
  return validationResult;
}
