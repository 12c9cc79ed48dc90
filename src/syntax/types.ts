/**
 * Syntax Tree Types
 *
 * The in-memory form of a parsed script: an ordered list of pipelines,
 * each holding one or more jobs.
 */

/** A word sequence that always holds at least the command word. */
export type Words = [string, ...string[]];

/**
 * One command invocation.
 * `args[0]` is the command word itself; the rest are its arguments.
 */
export interface Job {
  readonly command: string;
  /** Mutated in place by glob expansion; `args[0]` is never touched. */
  args: Words;
  /** True when a `&` followed this job in the source. */
  readonly background: boolean;
}

/**
 * One or more jobs joined by `|`, plus the pipeline's redirections.
 */
export interface Pipeline {
  jobs: [Job, ...Job[]];
  stdinFile: string | null;
  stdoutFile: string | null;
}

/** Redirection clause normalized to a fixed (stdin, stdout) pair. */
export interface Redirection {
  stdinFile: string | null;
  stdoutFile: string | null;
}

export function createJob(words: Words, background = false): Job {
  return {
    command: words[0],
    args: words,
    background,
  };
}

/**
 * A pipeline runs in the background when its last job carries the `&`.
 */
export function isBackground(pipeline: Pipeline): boolean {
  return pipeline.jobs[pipeline.jobs.length - 1].background;
}
