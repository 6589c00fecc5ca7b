/**
 * Types produced by the scan engine.
 */

import { FindingTag, RuleCategory, Severity } from "../rules";

export interface Finding {
  /** Path relative to the scan root, always "/"-separated. */
  path: string;
  /** 1-based line, or null for whole-file checks. */
  line: number | null;
  rule: string;
  title: string;
  severity: Severity;
  /** Redacted form of the captured text; null when the rule captures nothing. */
  snippet: string | null;
  category: FindingTag;
  ruleCategory: RuleCategory;
  remediation?: string;
}

export type FileWarningReason = "oversized" | "binary" | "unreadable" | "truncated";

/** A file that was skipped or only partly scanned. */
export interface FileWarning {
  kind: "file";
  path: string;
  reason: FileWarningReason;
  message: string;
}

/** A (file, rule) pair whose matcher failed. */
export interface MatchWarning {
  kind: "match";
  path: string;
  rule: string;
  message: string;
}

export type ScanWarning = FileWarning | MatchWarning;
