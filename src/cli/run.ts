/**
 * pegsh CLI - parses a script and prints its pipelines as JSON.
 *
 * Usage:
 *   pegsh [options] [file]
 *   echo 'ls *.ts | wc -l' | pegsh --expand
 */

import { buildInvocation } from "../command.js";
import { getErrorMessage } from "../errors.js";
import { GlobExpander } from "../glob/expander.js";
import { createFsGlob } from "../glob/fs-glob.js";
import { tryParse } from "../syntax/parser.js";

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  readFile(path: string): Promise<string>;
  readStdin(): Promise<string>;
  cwd: string;
}

interface CliOptions {
  file?: string;
  cwd?: string;
  expand: boolean;
  commands: boolean;
  strict: boolean;
  help: boolean;
}

const USAGE = `Usage: pegsh [options] [file]

Parse a shell script (from file, or stdin) and print its pipelines as JSON.

Options:
  --expand         Expand glob arguments against the filesystem
  --cwd <dir>      Directory globs are resolved in (default: current)
  --commands       Print process invocations instead of pipelines
  --strict         Exit 1 with the syntax error instead of printing []
  --help, -h       Show this help message
`;

function parseArgs(args: string[]): CliOptions | string {
  const options: CliOptions = {
    expand: false,
    commands: false,
    strict: false,
    help: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--help" || arg === "-h") {
      options.help = true;
    } else if (arg === "--expand") {
      options.expand = true;
    } else if (arg === "--commands") {
      options.commands = true;
    } else if (arg === "--strict") {
      options.strict = true;
    } else if (arg === "--cwd") {
      const dir = args[i + 1];
      if (dir === undefined) {
        return "option --cwd requires a directory";
      }
      options.cwd = dir;
      i++;
    } else if (arg.startsWith("-") && arg !== "-") {
      return `unknown option: ${arg}`;
    } else if (options.file === undefined) {
      options.file = arg;
    } else {
      return `unexpected argument: ${arg}`;
    }
  }

  return options;
}

/**
 * Run the CLI. Resolves to the process exit code.
 */
export async function runCli(args: string[], io: CliIO): Promise<number> {
  const options = parseArgs(args);
  if (typeof options === "string") {
    io.stderr(`pegsh: ${options}\n${USAGE}`);
    return 2;
  }
  if (options.help) {
    io.stdout(USAGE);
    return 0;
  }

  let script: string;
  try {
    script =
      options.file === undefined || options.file === "-"
        ? await io.readStdin()
        : await io.readFile(options.file);
  } catch (error) {
    io.stderr(`pegsh: ${getErrorMessage(error)}\n`);
    return 1;
  }

  const outcome = tryParse(script);
  if (!outcome.ok && options.strict) {
    io.stderr(`pegsh: ${outcome.error.message}\n`);
    return 1;
  }
  const pipelines = outcome.ok ? outcome.pipelines : [];

  if (options.expand) {
    const expander = new GlobExpander(
      createFsGlob({ cwd: options.cwd ?? io.cwd }),
    );
    await expander.expandPipelines(pipelines);
  }

  const output = options.commands
    ? pipelines.map(buildInvocation)
    : pipelines;
  io.stdout(`${JSON.stringify(output, null, 2)}\n`);
  return 0;
}
