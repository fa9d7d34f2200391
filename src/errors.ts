/**
 * Error taxonomy for the analyzer.
 *
 * Messages are safe to hand back to a caller: they never contain the
 * analyzed source text.
 */

export type AnalyzerErrorCode = "USAGE_ERROR" | "NOT_FOUND" | "SYNTAX_ERROR";

/**
 * Base class for every error the analyzer raises on purpose.
 */
export class AnalyzerError extends Error {
  constructor(
    message: string,
    public readonly code: AnalyzerErrorCode
  ) {
    super(message);
    this.name = this.constructor.name;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Ambiguous or missing construction arguments. Always caller-fixable.
 */
export class UsageError extends AnalyzerError {
  constructor(message: string) {
    super(message, "USAGE_ERROR");
  }
}

/**
 * The supplied file path does not exist or cannot be read.
 */
export class SourceNotFoundError extends AnalyzerError {
  constructor(public readonly filePath: string) {
    super("Source file not found or not readable", "NOT_FOUND");
  }
}

/**
 * The source text is not valid Python.
 */
export class PythonSyntaxError extends AnalyzerError {
  constructor(public readonly line: number) {
    super(`Invalid Python syntax at line ${line}`, "SYNTAX_ERROR");
  }
}

export function isAnalyzerError(error: unknown): error is AnalyzerError {
  return error instanceof AnalyzerError;
}
