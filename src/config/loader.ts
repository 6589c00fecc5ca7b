/**
 * Configuration loader for stackguard.
 *
 * Loads .stackguard.yml from the scan root (or an explicit path), validates
 * it, and resolves scan settings against command-line flags and the
 * STACKGUARD_* environment variables.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import * as yaml from "js-yaml";
import { ConfigError, InputError, errorMessage } from "../errors";
import { env } from "../env";
import { logger } from "../logger";
import { matchesAnyGlob } from "../analysis/patterns";
import { Severity, isSeverity } from "../analysis/rules";
import {
  CONFIG_FILE_NAME,
  DEFAULT_MATCH_TIMEOUT_MS,
  DEFAULT_MAX_FILE_SIZE,
  RequiredScanConfig,
  RuleConfig,
  RuleOverride,
  StackguardConfig,
} from "./schema";

/**
 * Effective configuration for a single rule.
 */
export interface ResolvedRuleConfig {
  enabled: boolean;
  /** Replaces the catalog severity when set. */
  severity?: Severity;
}

/**
 * The loaded and resolved configuration with helper methods.
 */
export interface LoadedConfig {
  /**
   * The validated configuration (or defaults if no file found).
   */
  raw: StackguardConfig;

  /**
   * Path the configuration was read from, if any.
   */
  source?: string;

  /**
   * Check if a file should be skipped entirely.
   * @param filePath - Relative file path from the scan root
   */
  isFileIgnored(filePath: string): boolean;

  /**
   * Get the effective configuration for a rule, optionally for a specific file.
   * Merges config.rules -> overrides in order.
   */
  getRuleConfig(ruleId: string, filePath?: string): ResolvedRuleConfig;
}

/**
 * Scan settings supplied on the command line, as raw strings.
 */
export interface ScanFlagValues {
  workers?: string;
  maxFileSize?: string;
}

const DEFAULT_CONFIG: StackguardConfig = {
  version: 1,
  rules: {},
  files: { ignore: [] },
  scan: {},
  overrides: [],
};

/**
 * Load configuration from a scan root, or from an explicit file.
 *
 * @throws InputError when an explicit config path cannot be read
 * @throws ConfigError when the file is malformed
 */
export function loadConfig(rootDir: string, explicitPath?: string): LoadedConfig {
  const configPath = explicitPath ?? path.join(rootDir, CONFIG_FILE_NAME);

  if (!explicitPath && !fs.existsSync(configPath)) {
    return buildLoadedConfig(DEFAULT_CONFIG);
  }

  let contents: string;
  try {
    contents = fs.readFileSync(configPath, "utf-8");
  } catch (err) {
    throw new InputError(`Cannot read config file ${configPath}: ${errorMessage(err)}`, "INVALID_OPTION", { cause: err });
  }

  const loaded = parseConfig(contents, configPath);
  logger.debug("Loaded config", { path: configPath });
  return buildLoadedConfig(loaded, configPath);
}

/**
 * Load configuration from a YAML string. Does not touch the filesystem.
 *
 * @throws ConfigError when the content is malformed
 */
export function loadConfigFromString(yamlContent: string): LoadedConfig {
  return buildLoadedConfig(parseConfig(yamlContent, CONFIG_FILE_NAME));
}

/**
 * Create a default LoadedConfig without any file.
 */
export function createDefaultConfig(): LoadedConfig {
  return buildLoadedConfig(DEFAULT_CONFIG);
}

/**
 * Resolve scan settings. Precedence: flag > environment > config file > default.
 *
 * @throws InputError when a flag or environment value is not a positive integer
 */
export function resolveScanConfig(config: LoadedConfig, flags: ScanFlagValues = {}): RequiredScanConfig {
  const file = config.raw.scan ?? {};
  return {
    workers:
      parsePositiveInt(flags.workers, "--workers") ??
      parsePositiveInt(env.WORKERS, "STACKGUARD_WORKERS") ??
      file.workers ??
      os.availableParallelism(),
    max_file_size:
      parsePositiveInt(flags.maxFileSize, "--max-file-size") ??
      parsePositiveInt(env.MAX_FILE_SIZE, "STACKGUARD_MAX_FILE_SIZE") ??
      file.max_file_size ??
      DEFAULT_MAX_FILE_SIZE,
    match_timeout_ms: file.match_timeout_ms ?? DEFAULT_MATCH_TIMEOUT_MS,
  };
}

/**
 * Parse a positive integer option value; undefined passes through.
 */
export function parsePositiveInt(value: string | undefined, name: string): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  if (!/^\d+$/.test(value.trim())) {
    throw new InputError(`${name} must be a positive integer, got "${value}"`);
  }
  const parsed = parseInt(value, 10);
  if (parsed <= 0) {
    throw new InputError(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

// ============================================================================
// Parsing and validation
// ============================================================================

function parseConfig(contents: string, source: string): StackguardConfig {
  let parsed: unknown;
  try {
    parsed = yaml.load(contents);
  } catch (err) {
    throw new ConfigError(`invalid YAML: ${errorMessage(err)}`, { source, code: "CONFIG_INVALID", cause: err });
  }

  // An empty file is the same as no file
  if (parsed === undefined || parsed === null) {
    return { ...DEFAULT_CONFIG };
  }
  const raw = record(parsed, "config", source);

  const version = raw.version ?? 1;
  if (version !== 1) {
    throw configError(`unsupported config version ${JSON.stringify(version)}`, source);
  }

  const files = raw.files === undefined ? {} : record(raw.files, "files", source);
  const scan = raw.scan === undefined ? {} : record(raw.scan, "scan", source);

  return {
    version: 1,
    profiles: raw.profiles === undefined ? undefined : strings(raw.profiles, "profiles", source),
    rules: raw.rules === undefined ? {} : ruleConfigs(raw.rules, "rules", source),
    files: {
      ignore: files.ignore === undefined ? [] : strings(files.ignore, "files.ignore", source),
    },
    scan: {
      max_file_size: positiveInt(scan.max_file_size, "scan.max_file_size", source),
      workers: positiveInt(scan.workers, "scan.workers", source),
      match_timeout_ms: positiveInt(scan.match_timeout_ms, "scan.match_timeout_ms", source),
    },
    overrides:
      raw.overrides === undefined
        ? []
        : list(raw.overrides, "overrides", source).map((item, i): RuleOverride => {
            const entry = record(item, `overrides[${i}]`, source);
            return {
              patterns: strings(entry.patterns, `overrides[${i}].patterns`, source),
              rules: ruleConfigs(entry.rules, `overrides[${i}].rules`, source),
            };
          }),
  };
}

function ruleConfigs(value: unknown, field: string, source: string): Record<string, RuleConfig> {
  const result: Record<string, RuleConfig> = {};
  for (const [ruleId, entry] of Object.entries(record(value, field, source))) {
    const item = record(entry, `${field}.${ruleId}`, source);
    const { enabled, severity } = item;
    if (enabled !== undefined && typeof enabled !== "boolean") {
      throw configError(`${field}.${ruleId}.enabled must be true or false`, source);
    }
    if (severity !== undefined && !isSeverity(severity)) {
      throw configError(`${field}.${ruleId}.severity must be one of CRITICAL, HIGH, MEDIUM, LOW, INFO`, source);
    }
    result[ruleId] = { enabled, severity };
  }
  return result;
}

function record(value: unknown, field: string, source: string): Record<string, unknown> {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    throw configError(`${field} must be a mapping`, source);
  }
  return Object.fromEntries(Object.entries(value));
}

function list(value: unknown, field: string, source: string): unknown[] {
  if (!Array.isArray(value)) {
    throw configError(`${field} must be a list`, source);
  }
  return value;
}

function strings(value: unknown, field: string, source: string): string[] {
  return list(value, field, source).map((item) => {
    if (typeof item !== "string") {
      throw configError(`${field} must contain only strings`, source);
    }
    return item;
  });
}

function positiveInt(value: unknown, field: string, source: string): number | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
    throw configError(`${field} must be a positive integer`, source);
  }
  return value;
}

function configError(message: string, source: string): ConfigError {
  return new ConfigError(message, { source, code: "CONFIG_INVALID" });
}

// ============================================================================
// Resolution
// ============================================================================

/**
 * Build a LoadedConfig from a validated StackguardConfig.
 */
function buildLoadedConfig(rawConfig: StackguardConfig, source?: string): LoadedConfig {
  const ignorePatterns = rawConfig.files?.ignore ?? [];

  function isFileIgnored(filePath: string): boolean {
    return matchesAnyGlob(filePath, ignorePatterns);
  }

  function getRuleConfig(ruleId: string, filePath?: string): ResolvedRuleConfig {
    let result: ResolvedRuleConfig = { enabled: true };

    const globalRuleConfig = rawConfig.rules?.[ruleId];
    if (globalRuleConfig) {
      result = mergeRuleConfig(result, globalRuleConfig);
    }

    if (filePath && rawConfig.overrides) {
      for (const override of rawConfig.overrides) {
        if (matchesAnyGlob(filePath, override.patterns)) {
          const overrideRuleConfig = override.rules[ruleId];
          if (overrideRuleConfig) {
            result = mergeRuleConfig(result, overrideRuleConfig);
          }
        }
      }
    }

    return result;
  }

  return {
    raw: rawConfig,
    source,
    isFileIgnored,
    getRuleConfig,
  };
}

function mergeRuleConfig(base: ResolvedRuleConfig, override: RuleConfig): ResolvedRuleConfig {
  return {
    enabled: override.enabled ?? base.enabled,
    severity: override.severity ?? base.severity,
  };
}
