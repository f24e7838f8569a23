/**
 * Error handling for peptide table processing
 *
 * Every failure raised by the pipeline is a {@link PipelineError} carrying a
 * stable code plus, where known, the offending line, pattern or file.
 */

/**
 * Base error class for all pipeline errors
 */
export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "PipelineError";
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
 * Validation errors for malformed options or data
 */
export class ValidationError extends PipelineError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends PipelineError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "PARSE_ERROR", lineNumber, context);
    this.name = "ParseError";
  }
}

/**
 * DSV-specific parsing error with column context
 */
export class DSVParseError extends ParseError {
  constructor(
    message: string,
    public readonly line?: number,
    public readonly column?: number,
    public readonly field?: string
  ) {
    const context = [
      line !== undefined ? `line ${line}` : undefined,
      column !== undefined ? `column ${column}` : undefined,
      field !== undefined ? `field "${field}"` : undefined,
    ]
      .filter((part): part is string => part !== undefined)
      .join(", ");

    super(context ? `${message} (${context})` : message, "DSV", line);
    this.name = "DSVParseError";
  }
}

/**
 * A peptide table that cannot be turned into records
 */
export class PeptideFileError extends ParseError {
  constructor(
    message: string,
    public readonly filePath: string,
    lineNumber?: number
  ) {
    super(`${filePath}: ${message}`, "PeptideGroups", lineNumber);
    this.name = "PeptideFileError";
  }
}

/**
 * File I/O errors with the failing path and operation
 */
export class FileError extends PipelineError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat" | "list" | "mkdir",
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

/**
 * A co-transduction pattern that is not a valid regular expression
 */
export class PatternCompilationError extends PipelineError {
  constructor(
    public readonly pattern: string,
    public readonly reason: string
  ) {
    super(`Invalid co-transduction pattern '${pattern}': ${reason}`, "PATTERN_COMPILATION_ERROR");
    this.name = "PatternCompilationError";
  }
}

/**
 * A persisted table whose header lacks the columns the pipeline keys on
 */
export class SchemaMismatchError extends PipelineError {
  constructor(
    public readonly filePath: string,
    public readonly missingColumns: readonly string[],
    public readonly foundColumns: readonly string[]
  ) {
    super(
      `${filePath} is missing required column(s): ${missingColumns.join(", ")}`,
      "SCHEMA_MISMATCH",
      1,
      `Found columns: ${foundColumns.join(", ")}`
    );
    this.name = "SchemaMismatchError";
  }
}

/**
 * Keep pipeline errors as they are; wrap anything else thrown while
 * processing `filePath`
 */
export function toPipelineError(error: unknown, filePath: string): PipelineError {
  if (error instanceof PipelineError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new PipelineError(`${filePath}: ${message}`, "UNEXPECTED_ERROR");
}
