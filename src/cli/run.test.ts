import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { type CliIO, runCli } from "./run.js";

/**
 * Helper to run the CLI against in-memory streams
 */
async function run(
  args: string[],
  options: { stdin?: string; files?: Record<string, string>; cwd?: string } = {},
): Promise<{ stdout: string; stderr: string; exitCode: number }> {
  let stdout = "";
  let stderr = "";
  const io: CliIO = {
    stdout: (text) => {
      stdout += text;
    },
    stderr: (text) => {
      stderr += text;
    },
    readFile: async (file) => {
      const content = options.files?.[file];
      if (content === undefined) {
        throw new Error(`ENOENT: no such file or directory, open '${file}'`);
      }
      return content;
    },
    readStdin: async () => options.stdin ?? "",
    cwd: options.cwd ?? "/",
  };
  const exitCode = await runCli(args, io);
  return { stdout, stderr, exitCode };
}

describe("pegsh CLI", () => {
  describe("help and arguments", () => {
    it("should show help with --help", async () => {
      const result = await run(["--help"]);
      expect(result.stdout).toContain("Usage: pegsh [options] [file]");
      expect(result.exitCode).toBe(0);
    });

    it("should reject unknown options", async () => {
      const result = await run(["--bogus"]);
      expect(result.stderr).toMatch(/^pegsh: unknown option: --bogus\n/);
      expect(result.exitCode).toBe(2);
    });

    it("should require a value for --cwd", async () => {
      const result = await run(["--cwd"]);
      expect(result.stderr).toMatch(/^pegsh: option --cwd requires a directory/);
      expect(result.exitCode).toBe(2);
    });
  });

  describe("parsing", () => {
    it("should print pipelines read from stdin", async () => {
      const result = await run([], { stdin: "echo hi" });
      expect(result.exitCode).toBe(0);
      expect(JSON.parse(result.stdout)).toEqual([
        {
          jobs: [{ command: "echo", args: ["echo", "hi"], background: false }],
          stdinFile: null,
          stdoutFile: null,
        },
      ]);
    });

    it("should read the script from a file", async () => {
      const result = await run(["build.sh"], {
        files: { "build.sh": "make\nmake install\n" },
      });
      const pipelines = JSON.parse(result.stdout);
      expect(pipelines).toHaveLength(2);
    });

    it("should fail when the file cannot be read", async () => {
      const result = await run(["missing.sh"]);
      expect(result.exitCode).toBe(1);
      expect(result.stderr).toBe(
        "pegsh: ENOENT: no such file or directory, open 'missing.sh'\n",
      );
    });

    it("should print invocations with --commands", async () => {
      const result = await run(["--commands"], { stdin: "cat a | wc -l &" });
      expect(JSON.parse(result.stdout)).toEqual([
        {
          commands: [
            { program: "cat", args: ["a"], background: false },
            { program: "wc", args: ["-l"], background: true },
          ],
          stdinFile: null,
          stdoutFile: null,
          background: true,
        },
      ]);
    });

    it("should print [] for an unparsable script", async () => {
      const result = await run([], { stdin: "echo;" });
      expect(result.stdout).toBe("[]\n");
      expect(result.exitCode).toBe(0);
    });

    it("should report the syntax error with --strict", async () => {
      const result = await run(["--strict"], { stdin: "echo;" });
      expect(result.exitCode).toBe(1);
      expect(result.stdout).toBe("");
      expect(result.stderr).toMatch(/^pegsh: Parse error at 1:6: expected /);
    });
  });

  describe("glob expansion", () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "pegsh-cli-test-"));
      fs.writeFileSync(path.join(tempDir, "one.log"), "");
      fs.writeFileSync(path.join(tempDir, "two.log"), "");
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it("should expand globs with --expand --cwd", async () => {
      const result = await run(["--expand", "--cwd", tempDir, "--commands"], {
        stdin: "rm *.log",
      });
      const [invocation] = JSON.parse(result.stdout);
      expect(invocation.commands[0].args).toEqual(["one.log", "two.log"]);
    });

    it("should leave globs alone without --expand", async () => {
      const result = await run(["--commands"], {
        stdin: "rm *.log",
        cwd: tempDir,
      });
      const [invocation] = JSON.parse(result.stdout);
      expect(invocation.commands[0].args).toEqual(["*.log"]);
    });
  });
});
