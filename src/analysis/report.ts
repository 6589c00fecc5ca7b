/**
 * Severity aggregation and report rendering.
 */

import { Finding, ScanWarning } from "./detectors/types";
import { ProfileId, SEVERITIES, Severity, severityRank } from "./rules";

export type ReportFormat = "text" | "json";

export const REPORT_FORMATS: readonly ReportFormat[] = ["text", "json"];

export type SeverityCounts = Record<Severity, number>;

export interface ScanReport {
  readonly root: string;
  readonly profiles: readonly ProfileId[];
  /** Deduplicated findings, most severe first, discovery order within a band. */
  readonly findings: readonly Finding[];
  readonly bySeverity: Readonly<Record<Severity, readonly Finding[]>>;
  readonly counts: Readonly<SeverityCounts>;
  readonly total: number;
  readonly issuesFound: boolean;
  readonly exitCode: 0 | 1;
  readonly warnings: readonly ScanWarning[];
  readonly cancelled: boolean;
  readonly filesScanned: number;
}

export interface SummarizeOptions {
  root?: string;
  profiles?: Iterable<ProfileId>;
  warnings?: readonly ScanWarning[];
  cancelled?: boolean;
  filesScanned?: number;
}

/**
 * Collapse findings that describe the same problem.
 *
 * Line findings are keyed on (path, line, ruleCategory), whole-file findings
 * on (path, rule). The most severe finding of a key wins and takes the slot
 * of the first one discovered; ties keep the earlier finding.
 */
export function dedupeFindings(findings: readonly Finding[]): Finding[] {
  const result: Finding[] = [];
  const slots = new Map<string, number>();

  for (const finding of findings) {
    const key =
      finding.line === null
        ? `${finding.path}\0file\0${finding.rule}`
        : `${finding.path}\0${finding.line}\0${finding.ruleCategory}`;
    const slot = slots.get(key);
    if (slot === undefined) {
      slots.set(key, result.length);
      result.push(finding);
    } else if (severityRank(finding.severity) < severityRank(result[slot].severity)) {
      result[slot] = finding;
    }
  }

  return result;
}

/**
 * Build the frozen report for a scan.
 */
export function summarize(findings: readonly Finding[], options: SummarizeOptions = {}): ScanReport {
  const unique = dedupeFindings(findings);
  // Array.prototype.sort is stable, so discovery order survives within a band
  const ordered = [...unique].sort((a, b) => severityRank(a.severity) - severityRank(b.severity));

  const bySeverity: Record<Severity, Finding[]> = { CRITICAL: [], HIGH: [], MEDIUM: [], LOW: [], INFO: [] };
  const counts: SeverityCounts = { CRITICAL: 0, HIGH: 0, MEDIUM: 0, LOW: 0, INFO: 0 };
  for (const finding of ordered) {
    bySeverity[finding.severity].push(finding);
    counts[finding.severity]++;
  }

  const issuesFound = ordered.length > 0;
  const report: ScanReport = {
    root: options.root ?? ".",
    profiles: Object.freeze([...(options.profiles ?? [])]),
    findings: Object.freeze(ordered.map((f) => Object.freeze({ ...f }))),
    bySeverity: Object.freeze(bySeverity),
    counts: Object.freeze(counts),
    total: ordered.length,
    issuesFound,
    exitCode: issuesFound ? 1 : 0,
    warnings: Object.freeze([...(options.warnings ?? [])]),
    cancelled: options.cancelled ?? false,
    filesScanned: options.filesScanned ?? 0,
  };
  return Object.freeze(report);
}

/**
 * Render a report. Output depends only on the report's content.
 */
export function render(report: ScanReport, format: ReportFormat): string {
  return format === "json" ? renderJson(report) : renderText(report);
}

function location(finding: Finding): string {
  return finding.line === null ? finding.path : `${finding.path}:${finding.line}`;
}

function renderText(report: ScanReport): string {
  const lines: string[] = [];
  lines.push(`stackguard report for ${report.root}`);
  lines.push(`Profiles: ${report.profiles.length > 0 ? report.profiles.join(", ") : "none detected"}`);
  lines.push(`Files scanned: ${report.filesScanned}`);

  for (const severity of SEVERITIES) {
    const band = report.bySeverity[severity];
    if (band.length === 0) continue;
    lines.push("");
    lines.push(`[${severity}] (${band.length})`);
    for (const finding of band) {
      const parts = [location(finding), finding.title];
      if (finding.snippet !== null) parts.push(finding.snippet);
      lines.push(`  ${parts.join(" - ")}`);
      if (finding.remediation) {
        lines.push(`    Fix: ${finding.remediation}`);
      }
    }
  }

  if (report.warnings.length > 0) {
    lines.push("");
    lines.push(`Warnings (${report.warnings.length})`);
    for (const warning of report.warnings) {
      lines.push(
        warning.kind === "file"
          ? `  ${warning.path}: ${warning.reason}: ${warning.message}`
          : `  ${warning.path}: ${warning.rule}: ${warning.message}`
      );
    }
  }

  if (report.cancelled) {
    lines.push("");
    lines.push("Scan cancelled before every file was scanned; results are partial.");
  }

  lines.push("");
  const countText = SEVERITIES.map((s) => `${report.counts[s]} ${s.toLowerCase()}`).join(", ");
  lines.push(
    report.issuesFound ? `Summary: ${report.total} issue(s) found (${countText})` : "Summary: no issues found"
  );

  return lines.join("\n") + "\n";
}

function renderJson(report: ScanReport): string {
  const payload = {
    findings: report.findings.map((f) => ({
      path: f.path,
      line: f.line,
      rule: f.rule,
      title: f.title,
      severity: f.severity,
      snippet: f.snippet,
      category: f.category,
      ruleCategory: f.ruleCategory,
      ...(f.remediation ? { remediation: f.remediation } : {}),
    })),
    summary: {
      root: report.root,
      profiles: report.profiles,
      filesScanned: report.filesScanned,
      total: report.total,
      counts: report.counts,
      issuesFound: report.issuesFound,
      exitCode: report.exitCode,
      cancelled: report.cancelled,
    },
    warnings: report.warnings,
  };
  return JSON.stringify(payload, null, 2) + "\n";
}
