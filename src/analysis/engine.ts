/**
 * Scan engine: walks a tree and applies rules to every candidate file.
 */

import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { InputError } from "../errors";
import { LoadedConfig } from "../config/loader";
import { DEFAULT_MATCH_TIMEOUT_MS, DEFAULT_MAX_FILE_SIZE } from "../config/schema";
import { logger } from "../logger";
import { analyzeFile, isContentFree } from "./detectors/file";
import { Finding, ScanWarning } from "./detectors/types";
import { ListFilesOptions, listFiles, readTextFile } from "./files";
import { matchesAnyGlob, matchesPathOrParent } from "./patterns";
import { runPool } from "./pool";
import { ProfileId, Rule } from "./rules";

export interface ScanOptions {
  /** Concurrent file workers. Default: available parallelism */
  workers?: number;
  /** Files above this size are skipped with a warning. */
  maxFileSize?: number;
  /** Time budget for one rule on one file. */
  matchTimeoutMs?: number;
  /**
   * Extra globs to skip, relative to the root. A glob matching a directory
   * skips everything below it.
   */
  exclude?: string[];
  config?: LoadedConfig;
  signal?: AbortSignal;
  /** Called after each file finishes, in completion order. */
  onFileScanned?: (filePath: string) => void;
  /** File system the tree is walked through. */
  fileSystem?: ListFilesOptions["fileSystem"];
}

export interface ScanResult {
  root: string;
  profiles: ProfileId[];
  /** Findings in discovery order: file path, then rule order, then position. */
  findings: Finding[];
  warnings: ScanWarning[];
  filesScanned: number;
  cancelled: boolean;
}

interface FileOutcome {
  findings: Finding[];
  warnings: ScanWarning[];
}

/**
 * Resolve and check a scan root.
 *
 * @throws InputError when the path does not exist or is not a directory
 */
export async function resolveRoot(rootPath: string): Promise<string> {
  const root = path.resolve(rootPath);
  const stat = await fs.stat(root).catch((err: unknown) => {
    throw new InputError(`Root path does not exist: ${rootPath}`, "ROOT_NOT_FOUND", { cause: err });
  });
  if (!stat.isDirectory()) {
    throw new InputError(`Root path is not a directory: ${rootPath}`, "ROOT_NOT_DIRECTORY");
  }
  return root;
}

/**
 * Scan a directory tree with the given rules.
 */
export async function scan(
  rootPath: string,
  profiles: ReadonlySet<ProfileId>,
  rules: readonly Rule[],
  options: ScanOptions = {}
): Promise<ScanResult> {
  const root = await resolveRoot(rootPath);
  const maxFileSize = options.maxFileSize ?? DEFAULT_MAX_FILE_SIZE;
  const matchTimeoutMs = options.matchTimeoutMs ?? DEFAULT_MATCH_TIMEOUT_MS;
  const exclude = options.exclude ?? [];

  const excluded = (filePath: string): boolean =>
    (exclude.length > 0 && matchesPathOrParent(filePath, exclude)) || options.config?.isFileIgnored(filePath) === true;

  const listing = await listFiles(root, { fileSystem: options.fileSystem });
  const listingWarnings = listing.warnings.filter((warning) => !excluded(warning.path));
  for (const warning of listingWarnings) {
    logger.warn("Directory not scanned", { path: warning.path, reason: warning.message });
  }

  const candidates: { path: string; rules: Rule[] }[] = [];
  for (const filePath of listing.files) {
    if (excluded(filePath)) continue;
    const fileRules = rules.filter((rule) => matchesAnyGlob(filePath, rule.files));
    if (fileRules.length > 0) {
      candidates.push({ path: filePath, rules: fileRules });
    }
  }

  logger.debug("Scan starting", { root, candidates: candidates.length, rules: rules.length });

  // One slot per file keeps the merged order independent of completion order
  const outcomes: (FileOutcome | undefined)[] = new Array(candidates.length);

  const { cancelled } = await runPool(
    candidates.length,
    options.workers ?? os.availableParallelism(),
    async (index) => {
      const candidate = candidates[index];
      const read = await readTextFile(path.join(root, candidate.path), maxFileSize);
      const analyzeOptions = { matchTimeoutMs, config: options.config };

      if (read.kind === "skipped") {
        const pathOnly = candidate.rules.filter(isContentFree);
        const analysis = analyzeFile(candidate.path, null, pathOnly, analyzeOptions);
        outcomes[index] = {
          findings: analysis.findings,
          warnings: [{ kind: "file", path: candidate.path, reason: read.reason, message: read.message }],
        };
        logger.info("Skipped file", { path: candidate.path, reason: read.reason });
      } else {
        outcomes[index] = analyzeFile(candidate.path, read.content, candidate.rules, analyzeOptions);
      }
      options.onFileScanned?.(candidate.path);
    },
    options.signal
  );

  const findings: Finding[] = [];
  const warnings: ScanWarning[] = [...listingWarnings];
  let filesScanned = 0;
  for (const outcome of outcomes) {
    if (!outcome) continue;
    filesScanned++;
    findings.push(...outcome.findings);
    warnings.push(...outcome.warnings);
  }

  for (const warning of warnings) {
    if (warning.kind === "match") {
      logger.warn("Rule skipped on file", { path: warning.path, rule: warning.rule, reason: warning.message });
    }
  }
  if (cancelled) {
    logger.warn("Scan cancelled", { scanned: filesScanned, total: candidates.length });
  }

  return {
    root,
    profiles: [...profiles],
    findings,
    warnings,
    filesScanned,
    cancelled,
  };
}
