/**
 * Pattern helpers shared by the catalog loader, detector and engine.
 *
 * Catalog patterns are written as strings and compiled here once. Matching
 * against file paths always goes through minimatch with the same options so
 * that rule globs, exclusions and config ignores agree on what a path means.
 */

import { minimatch } from "minimatch";
import * as vm from "vm";

/** Directories never walked: VCS metadata, dependency caches, build output. */
export const DEFAULT_EXCLUDES = [
  "**/.git/**",
  "**/.hg/**",
  "**/.svn/**",
  "**/node_modules/**",
  "**/bower_components/**",
  "**/vendor/**",
  "**/.venv/**",
  "**/venv/**",
  "**/__pycache__/**",
  "**/dist/**",
  "**/build/**",
  "**/out/**",
  "**/.next/**",
  "**/.nuxt/**",
  "**/.svelte-kit/**",
  "**/coverage/**",
  "**/target/**",
];

/** Bytes inspected by the binary-file heuristic. */
export const BINARY_SNIFF_BYTES = 512;

const GLOB_OPTIONS = { dot: true, matchBase: true, nocase: false } as const;

/**
 * Compile a catalog pattern. Sticky and global flags are stripped; the
 * engine adds "g" itself where it iterates matches.
 */
export function compilePattern(source: string, flags = ""): RegExp {
  const cleaned = flags.replace(/[gy]/g, "");
  return new RegExp(source, cleaned);
}

/**
 * Copy of a regex with the global flag set, for exec() loops.
 */
export function toGlobal(regex: RegExp): RegExp {
  return new RegExp(regex.source, regex.flags.includes("g") ? regex.flags : regex.flags + "g");
}

/**
 * Test a regex without leaking lastIndex state between calls.
 */
export function testPattern(regex: RegExp, content: string): boolean {
  regex.lastIndex = 0;
  return regex.test(content);
}

/**
 * Check if content matches any of the given patterns.
 */
export function matchesAnyPattern(content: string, patterns: readonly RegExp[]): boolean {
  return patterns.some((pattern) => testPattern(pattern, content));
}

/**
 * Normalize a relative path to forward slashes.
 */
export function toPosixPath(filePath: string): string {
  return filePath.replace(/\\/g, "/");
}

/**
 * Check if a relative file path matches a glob. Patterns without a slash
 * match against the basename at any depth ("Dockerfile*", ".env*").
 */
export function matchesGlob(filePath: string, pattern: string): boolean {
  return minimatch(toPosixPath(filePath), pattern, GLOB_OPTIONS);
}

/**
 * Check if a relative file path matches any of the given globs.
 */
export function matchesAnyGlob(filePath: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) => matchesGlob(filePath, pattern));
}

/**
 * Like matchesAnyGlob, but a pattern matching one of the path's parent
 * directories also counts, so "fixtures" excludes everything under any
 * fixtures/ directory and not only files named fixtures.
 */
export function matchesPathOrParent(filePath: string, patterns: readonly string[]): boolean {
  const segments = toPosixPath(filePath).split("/");
  for (let i = segments.length; i > 0; i--) {
    if (matchesAnyGlob(segments.slice(0, i).join("/"), patterns)) return true;
  }
  return false;
}

/**
 * Cheap binary heuristic: a null byte near the start of the file.
 */
export function looksBinary(head: Uint8Array): boolean {
  const limit = Math.min(head.length, BINARY_SNIFF_BYTES);
  for (let i = 0; i < limit; i++) {
    if (head[i] === 0) return true;
  }
  return false;
}

/**
 * 1-based line number of a character offset.
 */
export function lineAtOffset(content: string, offset: number): number {
  let line = 1;
  for (let i = 0; i < offset && i < content.length; i++) {
    if (content.charCodeAt(i) === 10) line++;
  }
  return line;
}

// One sandbox for every timed match; the script only calls back into this module
const pending: { task: (() => void) | null } = { task: null };
const matchContext = vm.createContext({
  invoke: (): void => {
    pending.task?.();
  },
});
const invokeScript = new vm.Script("invoke()");

/**
 * Node's error for a script stopped by its timeout. Checked by code rather
 * than class, since the error comes from another realm under test runners.
 */
export function isTimeoutError(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ERR_SCRIPT_EXECUTION_TIMEOUT";
}

/**
 * Run synchronous matching code with a hard time limit. V8 stops the call
 * even in the middle of a backtracking regex; the error then satisfies
 * isTimeoutError. Errors thrown by the task itself propagate unchanged.
 */
export function runWithTimeout<T>(task: () => T, timeoutMs: number): T {
  const slot: { result?: { value: T } } = {};
  pending.task = () => {
    slot.result = { value: task() };
  };
  try {
    invokeScript.runInContext(matchContext, { timeout: Math.max(1, Math.ceil(timeoutMs)) });
  } finally {
    pending.task = null;
  }
  if (!slot.result) {
    throw new Error("timed task did not run");
  }
  return slot.result.value;
}
