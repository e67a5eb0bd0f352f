/**
 * Error handling for LoF table merging
 *
 * Fatal conditions (bad configuration, unusable inputs, I/O failures and
 * broken merge invariants) are thrown as subclasses of LofMergeError.
 * Malformed data lines are not errors: they surface as ParseWarning values.
 */

/**
 * Base error class for all merge-related errors
 */
export class LofMergeError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "LofMergeError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Invalid or incomplete run configuration
 *
 * Raised before any input is read or output is opened.
 */
export class ConfigError extends LofMergeError {
  constructor(
    message: string,
    public readonly option?: string,
    context?: string
  ) {
    super(message, "CONFIG_ERROR", undefined, context);
    this.name = "ConfigError";
  }
}

/**
 * Unusable input: a path that is not a regular file, or too few
 * study tables to combine
 */
export class InputError extends LofMergeError {
  constructor(
    message: string,
    public readonly source?: string,
    context?: string
  ) {
    super(message, "INPUT_ERROR", undefined, context);
    this.name = "InputError";
  }
}

/**
 * The key-set combiner and the aggregator disagree about which studies
 * hold a variant
 */
export class MergeInvariantError extends LofMergeError {
  constructor(
    message: string,
    public readonly variant: string,
    public readonly source?: string
  ) {
    super(message, "MERGE_INVARIANT_ERROR", undefined, `Variant: ${variant}`);
    this.name = "MergeInvariantError";
  }
}

/**
 * File I/O errors with system error context
 */
export class FileError extends LofMergeError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed for ${filePath}: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  /**
   * Get helpful suggestion based on system error
   */
  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions or run with appropriate privileges";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }
    if (msg.includes("enospc") || msg.includes("no space left")) {
      return "Free up disk space or use a different location";
    }

    return undefined;
  }
}
