export { buildCommand, buildInvocation } from "./command.js";
export {
  getErrorMessage,
  ParseLimitError,
  ShellSyntaxError,
} from "./errors.js";
export { GlobExpander, isGlobPattern } from "./glob/expander.js";
export { createFsGlob, type FsGlobOptions } from "./glob/fs-glob.js";
export {
  PARSE_STEPS_PER_CHARACTER,
  type ParserLimits,
  resolveLimits,
} from "./limits.js";
export {
  type CharClass,
  type FailureInfo,
  noneOf,
  oneOf,
  PegParser,
  type Rule,
} from "./peg/engine.js";
export type { ShellOptions, ShellRunResult } from "./Shell.js";
export { Shell } from "./Shell.js";
export { ShellGrammar } from "./syntax/grammar.js";
export {
  locate,
  type ParseOptions,
  type ParseOutcome,
  parse,
  parseStrict,
  tryParse,
} from "./syntax/parser.js";
export {
  createJob,
  isBackground,
  type Job,
  type Pipeline,
  type Redirection,
  type Words,
} from "./syntax/types.js";
export { word } from "./syntax/words.js";
export type {
  CommandDescriptor,
  GlobService,
  JobInvocation,
  PipelineInvocation,
  ProcessExecutor,
  ShellLogger,
} from "./types.js";
