/**
 * Error classes raised by the syntax front end.
 */

/**
 * Error thrown by strict parsing when a script does not match the grammar.
 * Carries the position of the furthest point the grammar reached and what
 * it expected to find there.
 */
export class ShellSyntaxError extends Error {
  readonly name = "ShellSyntaxError";

  constructor(
    message: string,
    public line: number,
    public column: number,
    public offset: number,
    public expected: string[] = [],
  ) {
    super(`Parse error at ${line}:${column}: ${message}`);
  }
}

/**
 * Error thrown when a parse exceeds one of the configured ParserLimits.
 */
export class ParseLimitError extends Error {
  readonly name = "ParseLimitError";

  constructor(
    message: string,
    public limit: "maxInputSize" | "maxParseSteps",
  ) {
    super(message);
  }
}

/**
 * Safely extract error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
