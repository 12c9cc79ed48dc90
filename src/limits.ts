/**
 * Parser Limits Configuration
 *
 * Centralized configuration for the limits a single parse runs under.
 * These limits can be overridden per call or when creating a Shell instance.
 */

/**
 * Configuration for parser limits.
 * All limits are optional - undefined values use defaults.
 */
export interface ParserLimits {
  /** Maximum script length in characters (default: 1000000) */
  maxInputSize?: number;

  /**
   * Maximum primitive matching steps for one parse
   * (default: PARSE_STEPS_PER_CHARACTER steps per allowed input character)
   */
  maxParseSteps?: number;
}

/**
 * Step budget per character of maxInputSize. Backtracking never reaches
 * past one word or separator, so a parse takes a bounded number of steps
 * per character.
 */
export const PARSE_STEPS_PER_CHARACTER = 100;

/** Step budget for very small maxInputSize values */
const MIN_PARSE_STEPS = 1_000;

const DEFAULT_MAX_INPUT_SIZE = 1_000_000;

/**
 * Resolve parser limits by merging user-provided limits with defaults.
 * An unset maxParseSteps follows the resolved maxInputSize.
 */
export function resolveLimits(
  userLimits?: ParserLimits,
): Required<ParserLimits> {
  const maxInputSize = userLimits?.maxInputSize ?? DEFAULT_MAX_INPUT_SIZE;
  return {
    maxInputSize,
    maxParseSteps:
      userLimits?.maxParseSteps ??
      Math.max(MIN_PARSE_STEPS, maxInputSize * PARSE_STEPS_PER_CHARACTER),
  };
}
