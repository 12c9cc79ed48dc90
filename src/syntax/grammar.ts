/**
 * Shell Grammar
 *
 * PEG rules for scripts of pipelines. Whitespace and comments are never
 * implicit: every rule that allows them says so.
 *
 * Grammar:
 *   script      ::= (unused* newline)* pipeline ++ separator (newline unused*)*
 *                 / unused* ** newline
 *   separator   ::= (job_ending+ unused*)+
 *   pipeline    ::= whitespace? job ++ pipe whitespace? redirection
 *                   whitespace? comment?
 *   pipe        ::= whitespace? "|" whitespace?
 *   job         ::= word ++ whitespace (whitespace? "&")?
 *   redirection ::= stdin whitespace? stdout?
 *                 / stdout whitespace? stdin?
 *                 / ""
 *   stdin       ::= "<" whitespace? word
 *   stdout      ::= ">" whitespace? word
 *   unused      ::= whitespace comment? / comment
 *   comment     ::= "#" [^\r\n]*
 *   job_ending  ::= ";" / newline
 *   newline     ::= [\r\n]
 *   whitespace  ::= [ \t]+
 */

import { noneOf, oneOf, PegParser } from "../peg/engine.js";
import {
  createJob,
  type Job,
  type Pipeline,
  type Redirection,
} from "./types.js";
import { word } from "./words.js";

const isWhitespace = oneOf(" \t");
const isNewline = oneOf("\r\n");
const isCommentChar = noneOf("\r\n");

const NO_REDIRECTION: Readonly<Redirection> = {
  stdinFile: null,
  stdoutFile: null,
};

export class ShellGrammar extends PegParser {
  /**
   * Parse the whole input. Returns null unless every character was consumed.
   */
  parseScript(): Pipeline[] | null {
    const pipelines = this.script();
    if (pipelines === null) {
      return null;
    }
    if (!this.atEnd()) {
      return this.fail("end of input");
    }
    return pipelines;
  }

  script(): Pipeline[] | null {
    return this.choice<Pipeline[]>(
      () => {
        this.many(() => this.skipUnused() && this.newline());
        const pipelines = this.sepBy1(
          () => this.pipeline(),
          () => this.separator(),
        );
        if (pipelines === null) {
          return null;
        }
        this.many(() => this.newline() && this.skipUnused());
        return pipelines;
      },
      () => {
        this.sepBy(
          () => this.skipUnused(),
          () => this.newline(),
        );
        return [];
      },
    );
  }

  separator(): true | null {
    return this.many1(
      () => this.many1(() => this.jobEnding()) && this.skipUnused(),
    )
      ? true
      : null;
  }

  pipeline(): Pipeline | null {
    this.optional(() => this.whitespace());
    const jobs = this.sepBy1(
      () => this.job(),
      () => this.pipe(),
    );
    if (jobs === null) {
      return null;
    }
    this.optional(() => this.whitespace());
    const { stdinFile, stdoutFile } = this.redirection();
    this.optional(() => this.whitespace());
    this.optional(() => this.comment());
    return { jobs, stdinFile, stdoutFile };
  }

  pipe(): true | null {
    this.optional(() => this.whitespace());
    if (this.literal("|") === null) {
      return null;
    }
    this.optional(() => this.whitespace());
    return true;
  }

  job(): Job | null {
    const words = this.sepBy1(
      () => word(this),
      () => this.whitespace(),
    );
    if (words === null) {
      return null;
    }
    const marker = this.optional(() => {
      this.optional(() => this.whitespace());
      return this.literal("&");
    });
    return createJob(words, marker !== undefined);
  }

  /**
   * Redirections in either order. Tried stdin-first, so `> out < in`
   * fails the first alternative on its leading `>` and takes the second.
   */
  redirection(): Redirection {
    return (
      this.choice<Redirection>(
        () => {
          const stdinFile = this.stdinRedirect();
          if (stdinFile === null) {
            return null;
          }
          this.optional(() => this.whitespace());
          const stdoutFile = this.optional(() => this.stdoutRedirect());
          return { stdinFile, stdoutFile: stdoutFile ?? null };
        },
        () => {
          const stdoutFile = this.stdoutRedirect();
          if (stdoutFile === null) {
            return null;
          }
          this.optional(() => this.whitespace());
          const stdinFile = this.optional(() => this.stdinRedirect());
          return { stdinFile: stdinFile ?? null, stdoutFile };
        },
      ) ?? { ...NO_REDIRECTION }
    );
  }

  stdinRedirect(): string | null {
    return this.redirectTarget("<");
  }

  stdoutRedirect(): string | null {
    return this.redirectTarget(">");
  }

  private redirectTarget(operator: "<" | ">"): string | null {
    if (this.literal(operator) === null) {
      return null;
    }
    this.optional(() => this.whitespace());
    return word(this);
  }

  unused(): true | null {
    return this.choice<true>(
      () => {
        if (this.whitespace() === null) {
          return null;
        }
        this.optional(() => this.comment());
        return true;
      },
      () => this.comment(),
    );
  }

  /** `unused*`, which always matches. */
  skipUnused(): true {
    this.many(() => this.unused());
    return true;
  }

  comment(): true | null {
    if (this.literal("#") === null) {
      return null;
    }
    this.charRun(isCommentChar, "comment", 0);
    return true;
  }

  jobEnding(): true | null {
    return this.choice<true>(
      () => (this.literal(";") === null ? null : true),
      () => this.newline(),
    );
  }

  newline(): true | null {
    return this.char(isNewline, "newline") === null ? null : true;
  }

  whitespace(): true | null {
    return this.charRun(isWhitespace, "whitespace") === null ? null : true;
  }
}
