/**
 * Glob Expander - Replaces glob arguments with the paths they match
 *
 * Runs after parsing and before execution. For every argument after the
 * command word that contains `?`, `*` or `[`, the glob service is asked
 * for matches; the argument is replaced in place by them. A pattern that
 * matches nothing, or that the service rejects, stays as written.
 */

import { getErrorMessage } from "../errors.js";
import type { Job, Pipeline } from "../syntax/types.js";
import type { GlobService, ShellLogger } from "../types.js";

/**
 * Check if a string contains glob characters
 */
export function isGlobPattern(str: string): boolean {
  return str.includes("*") || str.includes("?") || str.includes("[");
}

export class GlobExpander {
  constructor(
    private glob: GlobService,
    private logger?: ShellLogger,
  ) {}

  /**
   * Expand every argument of a job in place. The command word is left alone.
   */
  async expandJob(job: Job): Promise<void> {
    let i = 1;
    while (i < job.args.length) {
      const arg = job.args[i];
      if (!isGlobPattern(arg)) {
        i++;
        continue;
      }
      const matches = await this.match(arg);
      if (matches.length === 0) {
        i++;
        continue;
      }
      job.args.splice(i, 1, ...matches);
      // Skip past the inserted paths; they are never expanded again
      i += matches.length;
    }
  }

  async expandPipeline(pipeline: Pipeline): Promise<void> {
    for (const job of pipeline.jobs) {
      await this.expandJob(job);
    }
  }

  /**
   * Expand several pipelines. They share no state, so they run concurrently.
   */
  async expandPipelines(pipelines: Pipeline[]): Promise<void> {
    await Promise.all(pipelines.map((p) => this.expandPipeline(p)));
  }

  /**
   * Collect the service's matches for one pattern; empty on error.
   */
  async match(pattern: string): Promise<string[]> {
    const matches: string[] = [];
    try {
      for await (const path of this.glob(pattern)) {
        matches.push(path);
      }
    } catch (error) {
      this.logger?.debug("glob", { pattern, error: getErrorMessage(error) });
      return [];
    }
    if (matches.length === 0) {
      this.logger?.debug("glob", { pattern, matches: 0 });
    }
    return matches;
  }
}
