/**
 * Shell - parses scripts and hands their pipelines to an executor
 *
 * Script text is parsed, each pipeline's arguments are glob-expanded
 * just before it is handed off, and the resulting invocation goes to the
 * configured ProcessExecutor.
 */

import { buildInvocation } from "./command.js";
import { GlobExpander } from "./glob/expander.js";
import { createFsGlob } from "./glob/fs-glob.js";
import type { ParserLimits } from "./limits.js";
import { parse } from "./syntax/parser.js";
import type {
  GlobService,
  PipelineInvocation,
  ProcessExecutor,
  ShellLogger,
} from "./types.js";

export interface ShellOptions {
  /**
   * Runs each pipeline. Required for `run`; `plan` works without one.
   */
  executor?: ProcessExecutor;
  /**
   * Glob service for argument expansion.
   * Defaults to the filesystem, relative to `cwd`. Pass `false` to
   * leave glob arguments untouched.
   */
  glob?: GlobService | false;
  /** Working directory for the default glob service */
  cwd?: string;
  /** Parser limits, see ParserLimits */
  limits?: ParserLimits;
  /**
   * Optional logger for execution tracing.
   * When provided, logs pipelines handed off (info), exit codes (info),
   * discarded scripts and glob misses (debug).
   * Disabled by default.
   */
  logger?: ShellLogger;
}

export interface ShellRunResult {
  /** Exit code of every pipeline, in execution order */
  exitCodes: number[];
  /** Exit code of the last pipeline, 0 when nothing ran */
  exitCode: number;
}

export class Shell {
  private executor?: ProcessExecutor;
  private expander: GlobExpander | null;
  private limits?: ParserLimits;
  private logger?: ShellLogger;

  constructor(options: ShellOptions = {}) {
    this.executor = options.executor;
    this.limits = options.limits;
    this.logger = options.logger;

    const glob =
      options.glob === undefined
        ? createFsGlob({ cwd: options.cwd })
        : options.glob;
    this.expander = glob ? new GlobExpander(glob, this.logger) : null;
  }

  /**
   * Parse and expand a script without running it.
   */
  async plan(script: string): Promise<PipelineInvocation[]> {
    const pipelines = parse(script, {
      limits: this.limits,
      logger: this.logger,
    });
    await this.expander?.expandPipelines(pipelines);
    return pipelines.map(buildInvocation);
  }

  /**
   * Run a script's pipelines in source order.
   */
  async run(script: string): Promise<ShellRunResult> {
    const executor = this.executor;
    if (!executor) {
      throw new Error("Shell.run requires an executor");
    }

    const pipelines = parse(script, {
      limits: this.limits,
      logger: this.logger,
    });

    const exitCodes: number[] = [];
    for (const pipeline of pipelines) {
      await this.expander?.expandPipeline(pipeline);
      const invocation = buildInvocation(pipeline);
      this.logger?.info("exec", {
        commands: invocation.commands.map((c) => c.program),
        background: invocation.background,
      });
      const exitCode = await executor.execute(invocation);
      this.logger?.info("exit", { exitCode });
      exitCodes.push(exitCode);
    }

    return {
      exitCodes,
      exitCode: exitCodes.length > 0 ? exitCodes[exitCodes.length - 1] : 0,
    };
  }
}
