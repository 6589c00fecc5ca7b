/**
 * stackguard library entry point.
 */

export { runScan, prepareScan } from "./analysis/orchestration";
export type { RunScanOptions, ScanContext } from "./analysis/orchestration";
export { loadCatalog, loadCatalogFromDocuments, DEFAULT_CATALOG_DIR } from "./analysis/catalog";
export type { CatalogDocument } from "./analysis/catalog";
export { PatternRegistry } from "./analysis/registry";
export { detectProfiles } from "./analysis/detector";
export type { DetectOptions } from "./analysis/detector";
export { scan, resolveRoot } from "./analysis/engine";
export type { ScanOptions, ScanResult } from "./analysis/engine";
export { redact } from "./analysis/redaction";
export { summarize, render, dedupeFindings } from "./analysis/report";
export type { ScanReport, ReportFormat, SeverityCounts, SummarizeOptions } from "./analysis/report";
export { loadConfig, loadConfigFromString, createDefaultConfig, resolveScanConfig } from "./config/loader";
export type { LoadedConfig, ResolvedRuleConfig } from "./config/loader";
export type { StackguardConfig } from "./config/schema";
export { StackguardError, InputError, ConfigError, MatchError, isFatalError } from "./errors";
export type { ErrorCode } from "./errors";
export { SEVERITIES } from "./analysis/rules";
export type {
  Severity,
  RuleCategory,
  FindingTag,
  ProfileId,
  Rule,
  Profile,
  Matcher,
  Applicability,
  DetectionPredicate,
} from "./analysis/rules";
export type { Finding, ScanWarning, FileWarning, MatchWarning } from "./analysis/detectors/types";
