/**
 * Backtracking PEG Engine
 *
 * A cursor over an immutable input string plus the ordered-choice
 * primitives grammars are written with. Every rule returns its value on
 * success or `null` on no-match; combinators that try something and fail
 * put the cursor back where they found it, so the first matching
 * alternative always wins and no rule sees a half-consumed input.
 *
 * The engine also remembers the furthest offset any primitive failed at,
 * and what was expected there, so callers can report a useful position
 * when a parse fails as a whole.
 */

import { ParseLimitError } from "../errors.js";

/** Predicate over a single character. */
export type CharClass = (ch: string) => boolean;

/** A rule: the matched value, or `null` when the rule does not match. */
export type Rule<T> = () => T | null;

/**
 * Character class matching any of the given characters.
 */
export function oneOf(chars: string): CharClass {
  const set = new Set(chars);
  return (ch) => set.has(ch);
}

/**
 * Character class matching anything except the given characters.
 */
export function noneOf(chars: string): CharClass {
  const set = new Set(chars);
  return (ch) => !set.has(ch);
}

export interface FailureInfo {
  /** Furthest offset any primitive failed at */
  offset: number;
  /** Labels of everything that was expected at that offset, sorted */
  expected: string[];
}

export class PegParser {
  protected pos = 0;
  private furthest = 0;
  private expected = new Set<string>();
  private steps = 0;

  constructor(
    protected readonly input: string,
    private readonly maxSteps: number = Number.POSITIVE_INFINITY,
  ) {}

  get position(): number {
    return this.pos;
  }

  atEnd(): boolean {
    return this.pos >= this.input.length;
  }

  /**
   * Record that `label` was expected at the current position.
   * Always returns null so rules can `return this.fail(...)`.
   */
  fail(label: string): null {
    if (this.pos > this.furthest) {
      this.furthest = this.pos;
      this.expected.clear();
    }
    if (this.pos === this.furthest) {
      this.expected.add(label);
    }
    return null;
  }

  failure(): FailureInfo {
    return {
      offset: this.furthest,
      expected: [...this.expected].sort(),
    };
  }

  // ===========================================================================
  // TERMINALS
  // ===========================================================================

  /**
   * Match exactly `text` at the cursor.
   */
  literal(text: string, label = JSON.stringify(text)): string | null {
    this.step();
    if (this.input.startsWith(text, this.pos)) {
      this.pos += text.length;
      return text;
    }
    return this.fail(label);
  }

  /**
   * Match a single character of class `cls`.
   */
  char(cls: CharClass, label: string): string | null {
    this.step();
    const ch = this.input[this.pos];
    if (ch !== undefined && cls(ch)) {
      this.pos++;
      return ch;
    }
    return this.fail(label);
  }

  /**
   * Match the longest run of class `cls`, failing if it is shorter
   * than `min` characters. `min = 0` never fails.
   */
  charRun(cls: CharClass, label: string, min = 1): string | null {
    this.step();
    const start = this.pos;
    let end = start;
    while (end < this.input.length && cls(this.input[end])) {
      end++;
    }
    if (end - start < min) {
      this.pos = end;
      this.fail(label);
      this.pos = start;
      return null;
    }
    this.pos = end;
    return this.input.slice(start, end);
  }

  // ===========================================================================
  // COMBINATORS
  // ===========================================================================

  /**
   * Run `rule`, restoring the cursor if it does not match.
   */
  attempt<T>(rule: Rule<T>): T | null {
    const start = this.pos;
    const result = rule();
    if (result === null) {
      this.pos = start;
    }
    return result;
  }

  /**
   * Ordered choice: the first alternative that matches wins.
   */
  choice<T>(...alternatives: Rule<T>[]): T | null {
    for (const alternative of alternatives) {
      const result = this.attempt(alternative);
      if (result !== null) {
        return result;
      }
    }
    return null;
  }

  /**
   * `rule?` - the value, or undefined when absent. Never fails.
   */
  optional<T>(rule: Rule<T>): T | undefined {
    return this.attempt(rule) ?? undefined;
  }

  /**
   * `rule*` - greedy. Stops on a match that consumed nothing, since
   * repeating it could never make progress.
   */
  many<T>(rule: Rule<T>): T[] {
    const results: T[] = [];
    for (;;) {
      const start = this.pos;
      const result = this.attempt(rule);
      if (result === null) {
        return results;
      }
      results.push(result);
      if (this.pos === start) {
        return results;
      }
    }
  }

  /**
   * `rule+` - greedy, at least one match.
   */
  many1<T>(rule: Rule<T>): [T, ...T[]] | null {
    const first = this.attempt(rule);
    if (first === null) {
      return null;
    }
    return [first, ...this.many(rule)];
  }

  /**
   * `item ++ separator` - one or more items with a separator between
   * each pair. A separator that is not followed by an item is given back.
   */
  sepBy1<T>(item: Rule<T>, separator: Rule<unknown>): [T, ...T[]] | null {
    const first = this.attempt(item);
    if (first === null) {
      return null;
    }
    const rest = this.many(() =>
      this.attempt(() => (separator() === null ? null : item())),
    );
    return [first, ...rest];
  }

  /**
   * `item ** separator` - like sepBy1, but zero items is a match.
   */
  sepBy<T>(item: Rule<T>, separator: Rule<unknown>): T[] {
    return this.sepBy1(item, separator) ?? [];
  }

  private step(): void {
    this.steps++;
    if (this.steps > this.maxSteps) {
      throw new ParseLimitError(
        `Maximum parse steps exceeded (${this.maxSteps})`,
        "maxParseSteps",
      );
    }
  }
}
