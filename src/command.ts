/**
 * Command Builder - maps parsed jobs to process invocations
 *
 * No lookup of the program happens here; whether it exists is the
 * execution collaborator's concern.
 */

import { isBackground, type Job, type Pipeline } from "./syntax/types.js";
import type { CommandDescriptor, PipelineInvocation } from "./types.js";

export function buildCommand(job: Job): CommandDescriptor {
  const [program, ...args] = job.args;
  return { program, args };
}

export function buildInvocation(pipeline: Pipeline): PipelineInvocation {
  return {
    commands: pipeline.jobs.map((job) => ({
      ...buildCommand(job),
      background: job.background,
    })),
    stdinFile: pipeline.stdinFile,
    stdoutFile: pipeline.stdoutFile,
    background: isBackground(pipeline),
  };
}
