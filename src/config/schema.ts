/**
 * Configuration schema types for .stackguard.yml files.
 *
 * The file is optional and lives at the root of the scanned tree. Command-line
 * flags and STACKGUARD_* environment variables take precedence over it.
 */

import { Severity } from "../analysis/rules";

/**
 * Per-rule override.
 */
export interface RuleConfig {
  enabled?: boolean;
  severity?: Severity;
}

/**
 * A rule override that applies to specific file patterns.
 */
export interface RuleOverride {
  patterns: string[];
  rules: Record<string, RuleConfig>;
}

/**
 * File filtering configuration options.
 */
export interface StackguardFilesConfig {
  /**
   * Glob patterns for files to skip entirely.
   * Example: ["tests/fixtures/**", "**\/*.snap"]
   */
  ignore?: string[];
}

/**
 * Scan engine tuning.
 */
export interface StackguardScanConfig {
  /**
   * Files larger than this many bytes are skipped with a warning.
   * Default: 1048576 (1 MiB)
   */
  max_file_size?: number;

  /**
   * Number of concurrent file workers.
   * Default: available parallelism
   */
  workers?: number;

  /**
   * Time budget for one rule on one file, in milliseconds.
   * Default: 250
   */
  match_timeout_ms?: number;
}

/**
 * Complete .stackguard.yml configuration schema.
 */
export interface StackguardConfig {
  /**
   * Config file version. Currently only version 1 is supported.
   */
  version: number;

  /**
   * Profiles to force instead of auto-detection.
   */
  profiles?: string[];

  /**
   * Rule-level configuration, keyed by rule id.
   */
  rules?: Record<string, RuleConfig>;

  files?: StackguardFilesConfig;

  scan?: StackguardScanConfig;

  /**
   * Path-specific rule overrides.
   * Applied in order; later overrides take precedence.
   */
  overrides?: RuleOverride[];
}

export interface RequiredScanConfig {
  max_file_size: number;
  workers: number;
  match_timeout_ms: number;
}

export const DEFAULT_MAX_FILE_SIZE = 1024 * 1024;

export const DEFAULT_MATCH_TIMEOUT_MS = 250;

export const CONFIG_FILE_NAME = ".stackguard.yml";
