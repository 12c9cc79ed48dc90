/**
 * Word Lexer
 *
 * A word is tried as, in order:
 * - a double-quoted word: `"` then one or more non-`"` characters then `"`
 * - a single-quoted word: the same with `'`
 * - a bare word: the longest run of characters that are not whitespace,
 *   line ends, or one of `# ; & | < >`
 *
 * Quoted content is taken verbatim: no escapes, and the other quote
 * character is plain data. A backslash is never special.
 */

import { type CharClass, noneOf, type PegParser } from "../peg/engine.js";

export const BARE_WORD_DELIMITERS = " \t\r\n#;&|<>";

const isBareWordChar = noneOf(BARE_WORD_DELIMITERS);
const isNotDoubleQuote = noneOf('"');
const isNotSingleQuote = noneOf("'");

export function word(p: PegParser): string | null {
  return p.choice(
    () => quotedWord(p, '"', isNotDoubleQuote),
    () => quotedWord(p, "'", isNotSingleQuote),
    () => bareWord(p),
  );
}

function quotedWord(
  p: PegParser,
  quote: string,
  isContent: CharClass,
): string | null {
  if (p.literal(quote) === null) {
    return null;
  }
  const content = p.charRun(isContent, "quoted text");
  if (content === null || p.literal(quote) === null) {
    return null;
  }
  return content;
}

function bareWord(p: PegParser): string | null {
  return p.charRun(isBareWordChar, "word");
}
