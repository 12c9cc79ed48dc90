/**
 * Filesystem glob service
 *
 * Matches a pattern against the real filesystem one path segment at a
 * time. Segments with glob characters are matched against directory
 * listings with minimatch; literal segments must exist as written.
 * Paths come back relative to `cwd` unless the pattern is absolute.
 */

import type { Dirent } from "node:fs";
import { readdir, stat } from "node:fs/promises";
import * as path from "node:path";
import { minimatch } from "minimatch";
import type { GlobService } from "../types.js";
import { isGlobPattern } from "./expander.js";

export interface FsGlobOptions {
  /** Directory relative patterns are resolved against (default: process.cwd()) */
  cwd?: string;
  /** Let `*` and `?` match a leading dot (default: false) */
  dot?: boolean;
}

interface Candidate {
  /** Path as it will be reported */
  display: string;
  isDirectory: boolean;
}

export function createFsGlob(options: FsGlobOptions = {}): GlobService {
  const cwd = options.cwd ?? process.cwd();
  const dot = options.dot ?? false;
  return (pattern) => globFs(pattern, cwd, dot);
}

async function* globFs(
  pattern: string,
  cwd: string,
  dot: boolean,
): AsyncGenerator<string> {
  const absolute = pattern.startsWith("/");
  const directoriesOnly = pattern.endsWith("/");
  const segments = pattern.split("/").filter((s) => s !== "");

  let candidates: Candidate[] = [
    { display: absolute ? "/" : "", isDirectory: true },
  ];

  for (const segment of segments) {
    const next: Candidate[] = [];
    for (const candidate of candidates) {
      if (!candidate.isDirectory) {
        continue;
      }
      if (isGlobPattern(segment)) {
        next.push(...(await matchSegment(candidate, segment, cwd, dot)));
      } else {
        const entry = await literalSegment(candidate, segment, cwd);
        if (entry) {
          next.push(entry);
        }
      }
    }
    candidates = next;
    if (candidates.length === 0) {
      return;
    }
  }

  const results = candidates
    .filter((c) => !directoriesOnly || c.isDirectory)
    .map((c) => (directoriesOnly ? `${c.display}/` : c.display))
    .sort();
  yield* results;
}

async function matchSegment(
  parent: Candidate,
  segment: string,
  cwd: string,
  dot: boolean,
): Promise<Candidate[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(resolve(cwd, parent), { withFileTypes: true });
  } catch (error) {
    if (isMissingPathError(error)) {
      return [];
    }
    throw error;
  }

  // Backslashes are plain characters in shell words; minimatch would read
  // them as escapes.
  const matchPattern = segment.replace(/\\/g, "\\\\");
  const matches: Candidate[] = [];
  for (const entry of entries) {
    const matched = minimatch(entry.name, matchPattern, {
      dot: dot || segment.startsWith("."),
      nobrace: true,
      nocomment: true,
      noext: true,
      nonegate: true,
    });
    if (!matched) {
      continue;
    }
    const display = join(parent.display, entry.name);
    const isDirectory = entry.isSymbolicLink()
      ? await isDirectoryPath(path.resolve(cwd, display))
      : entry.isDirectory();
    matches.push({ display, isDirectory });
  }
  return matches;
}

async function literalSegment(
  parent: Candidate,
  segment: string,
  cwd: string,
): Promise<Candidate | null> {
  const display = join(parent.display, segment);
  try {
    const stats = await stat(path.resolve(cwd, display));
    return { display, isDirectory: stats.isDirectory() };
  } catch (error) {
    if (isMissingPathError(error)) {
      return null;
    }
    throw error;
  }
}

async function isDirectoryPath(fullPath: string): Promise<boolean> {
  try {
    return (await stat(fullPath)).isDirectory();
  } catch (error) {
    if (isMissingPathError(error)) {
      return false;
    }
    throw error;
  }
}

function resolve(cwd: string, candidate: Candidate): string {
  return path.resolve(cwd, candidate.display || ".");
}

function join(parent: string, name: string): string {
  if (parent === "") return name;
  if (parent === "/") return `/${name}`;
  return `${parent}/${name}`;
}

const MISSING_PATH_CODES = new Set(["ENOENT", "ENOTDIR", "EACCES", "ELOOP"]);

function isMissingPathError(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    typeof error.code === "string" &&
    MISSING_PATH_CODES.has(error.code)
  );
}
