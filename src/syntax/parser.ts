/**
 * Script Parser - public entry points
 *
 * `parse` is the permissive entry point a shell uses: a script that does
 * not match the grammar yields no pipelines. `tryParse` and `parseStrict`
 * expose the failure position for hosts that want to report it.
 */

import { ParseLimitError, ShellSyntaxError } from "../errors.js";
import { type ParserLimits, resolveLimits } from "../limits.js";
import type { ShellLogger } from "../types.js";
import { ShellGrammar } from "./grammar.js";
import type { Pipeline } from "./types.js";

export interface ParseOptions {
  limits?: ParserLimits;
  /** Receives a debug entry when `parse` discards an unparsable script */
  logger?: ShellLogger;
}

export type ParseOutcome =
  | { ok: true; pipelines: Pipeline[] }
  | { ok: false; error: ShellSyntaxError | ParseLimitError };

/**
 * Parse a script, reporting failure as a value.
 */
export function tryParse(
  script: string,
  options: ParseOptions = {},
): ParseOutcome {
  const limits = resolveLimits(options.limits);

  if (script.length > limits.maxInputSize) {
    return {
      ok: false,
      error: new ParseLimitError(
        `Input too large: ${script.length} characters exceeds limit of ${limits.maxInputSize}`,
        "maxInputSize",
      ),
    };
  }

  const grammar = new ShellGrammar(script, limits.maxParseSteps);
  let pipelines: Pipeline[] | null;
  try {
    pipelines = grammar.parseScript();
  } catch (error) {
    if (error instanceof ParseLimitError) {
      return { ok: false, error };
    }
    throw error;
  }

  if (pipelines !== null) {
    return { ok: true, pipelines };
  }

  const { offset, expected } = grammar.failure();
  const { line, column } = locate(script, offset);
  const message =
    expected.length > 0
      ? `expected ${expected.join(", ")}`
      : "unexpected input";
  return {
    ok: false,
    error: new ShellSyntaxError(message, line, column, offset, expected),
  };
}

/**
 * Parse a script into pipelines. Unparsable input yields an empty list.
 */
export function parse(script: string, options: ParseOptions = {}): Pipeline[] {
  const outcome = tryParse(script, options);
  if (outcome.ok) {
    return outcome.pipelines;
  }
  const { error } = outcome;
  options.logger?.debug(
    "parse",
    error instanceof ShellSyntaxError
      ? {
          error: error.message,
          line: error.line,
          column: error.column,
          expected: error.expected,
          length: script.length,
        }
      : { error: error.message, limit: error.limit, length: script.length },
  );
  return [];
}

/**
 * Parse a script into pipelines, throwing on unparsable input.
 * @throws {ShellSyntaxError | ParseLimitError}
 */
export function parseStrict(
  script: string,
  options: ParseOptions = {},
): Pipeline[] {
  const outcome = tryParse(script, options);
  if (!outcome.ok) {
    throw outcome.error;
  }
  return outcome.pipelines;
}

/**
 * 1-based line and column of `offset`. CR, LF and CRLF each end a line.
 */
export function locate(
  script: string,
  offset: number,
): { line: number; column: number } {
  let line = 1;
  let lineStart = 0;
  for (let i = 0; i < offset && i < script.length; i++) {
    const ch = script[i];
    if (ch === "\n" || (ch === "\r" && script[i + 1] !== "\n")) {
      line++;
      lineStart = i + 1;
    }
  }
  return { line, column: offset - lineStart + 1 };
}
