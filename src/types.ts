/**
 * Collaborator contracts: what the syntax front end hands to, and
 * expects from, the host shell.
 */

/**
 * Logger interface for parse and execution logging.
 * Implement this interface to receive logs.
 */
export interface ShellLogger {
  /** Log informational messages (exec pipelines, exit codes) */
  info(message: string, data?: Record<string, unknown>): void;
  /** Log debug messages (swallowed parse failures, glob misses) */
  debug(message: string, data?: Record<string, unknown>): void;
}

/**
 * Filesystem pattern matcher.
 *
 * Returns the matching paths in the order they should appear on the
 * command line. Throwing, either on call or while iterating, means the
 * pattern was rejected; the expander treats that the same as no match.
 */
export type GlobService = (
  pattern: string,
) => Iterable<string> | AsyncIterable<string>;

/** External process invocation built from one job. */
export interface CommandDescriptor {
  program: string;
  args: string[];
}

export interface JobInvocation extends CommandDescriptor {
  background: boolean;
}

/** Everything the execution collaborator needs to run one pipeline. */
export interface PipelineInvocation {
  commands: JobInvocation[];
  stdinFile: string | null;
  stdoutFile: string | null;
  /** Whether the pipeline as a whole should not be waited on */
  background: boolean;
}

/**
 * Process execution collaborator.
 * Spawns the commands, wires pipes and redirection files, and applies
 * background/foreground semantics. Resolves to the pipeline's exit code.
 */
export interface ProcessExecutor {
  execute(invocation: PipelineInvocation): Promise<number>;
}
