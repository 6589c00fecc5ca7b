/**
 * Scan orchestration.
 *
 * Ties the pieces together for one invocation: config, catalog, detection,
 * rule selection, the engine and the aggregator.
 */

import { LoadedConfig, loadConfig, resolveScanConfig } from "../config/loader";
import { env } from "../env";
import { logger } from "../logger";
import { DEFAULT_CATALOG_DIR, loadCatalog } from "./catalog";
import { detectProfiles } from "./detector";
import { resolveRoot, scan } from "./engine";
import { PatternRegistry } from "./registry";
import { ScanReport, summarize } from "./report";
import { ProfileId } from "./rules";

export interface RunScanOptions {
  /** Forced profiles; skips detection when set. */
  profiles?: string[];
  exclude?: string[];
  /** Raw flag values, validated with the environment and config file. */
  workers?: string;
  maxFileSize?: string;
  catalogDir?: string;
  configPath?: string;
  signal?: AbortSignal;
  onFileScanned?: (filePath: string) => void;
}

export interface ScanContext {
  root: string;
  config: LoadedConfig;
  registry: PatternRegistry;
}

/**
 * Load the config and catalog for a root. Catalog directory precedence:
 * option > STACKGUARD_CATALOG > bundled catalog.
 */
export async function prepareScan(rootPath: string, options: RunScanOptions = {}): Promise<ScanContext> {
  const root = await resolveRoot(rootPath);
  const config = loadConfig(root, options.configPath);
  const registry = new PatternRegistry(loadCatalog(options.catalogDir ?? env.CATALOG ?? DEFAULT_CATALOG_DIR));
  return { root, config, registry };
}

/**
 * Run a complete scan and build its report.
 *
 * @throws InputError for a bad root, catalog, forced profile or option value
 * @throws ConfigError for a malformed catalog or config file
 */
export async function runScan(rootPath: string, options: RunScanOptions = {}): Promise<ScanReport> {
  const { root, config, registry } = await prepareScan(rootPath, options);
  const scanConfig = resolveScanConfig(config, { workers: options.workers, maxFileSize: options.maxFileSize });

  const forced = options.profiles ?? config.raw.profiles;
  let profiles: Set<ProfileId>;
  if (forced !== undefined) {
    profiles = registry.resolveProfiles(forced);
    logger.info("Using forced profiles", { profiles: [...profiles] });
  } else {
    profiles = await detectProfiles(root, registry.allProfiles());
  }

  const rules = registry.rulesFor(profiles);
  const result = await scan(root, profiles, rules, {
    workers: scanConfig.workers,
    maxFileSize: scanConfig.max_file_size,
    matchTimeoutMs: scanConfig.match_timeout_ms,
    exclude: options.exclude,
    config,
    signal: options.signal,
    onFileScanned: options.onFileScanned,
  });

  return summarize(result.findings, {
    root: rootPath,
    profiles: result.profiles,
    warnings: result.warnings,
    cancelled: result.cancelled,
    filesScanned: result.filesScanned,
  });
}
