/**
 * Applies a set of rules to one file's content.
 */

import { MatchError, errorMessage } from "../../errors";
import { LoadedConfig } from "../../config/loader";
import { filterSuppressedFindings, parseSuppressionDirectives } from "../../core/suppression";
import {
  isTimeoutError,
  lineAtOffset,
  matchesAnyGlob,
  matchesAnyPattern,
  runWithTimeout,
  testPattern,
  toGlobal,
} from "../patterns";
import { redact } from "../redaction";
import { Rule, Severity } from "../rules";
import { Finding, ScanWarning } from "./types";

// Maximum matches one rule may report in one file before the rest are dropped
export const MAX_MATCHES_PER_RULE = 100;

/**
 * A rule hit before severity resolution and redaction.
 * The raw value never leaves this module.
 */
interface RawMatch {
  line: number | null;
  value: string | null;
}

interface RuleHits {
  matches: RawMatch[];
  /** The rule's escalation pattern occurs in the file. */
  patternTriggered: boolean;
}

export interface AnalyzeFileOptions {
  /** Hard time budget for one rule on this file, escalation check included. */
  matchTimeoutMs: number;
  config?: LoadedConfig;
}

export interface FileAnalysis {
  findings: Finding[];
  warnings: ScanWarning[];
}

const globalCache = new WeakMap<RegExp, RegExp>();

function globalFor(regex: RegExp): RegExp {
  let cached = globalCache.get(regex);
  if (!cached) {
    cached = toGlobal(regex);
    globalCache.set(regex, cached);
  }
  cached.lastIndex = 0;
  return cached;
}

/**
 * True when a rule can be decided from the file path alone.
 */
export function isContentFree(rule: Rule): boolean {
  return rule.matcher.kind === "exists" && rule.requires.length === 0 && rule.excludes.length === 0;
}

/**
 * Analyze one file.
 *
 * @param filePath - Path relative to the scan root
 * @param content - File text, or null when the file could not be read; only
 *   content-free rules run in that case
 * @param rules - Candidate rules; those whose globs miss the path are skipped
 */
export function analyzeFile(
  filePath: string,
  content: string | null,
  rules: readonly Rule[],
  options: AnalyzeFileOptions
): FileAnalysis {
  const warnings: ScanWarning[] = [];
  const text = content ?? "";
  const lines = content === null ? [] : content.split("\n").map((l) => (l.endsWith("\r") ? l.slice(0, -1) : l));

  const applicable = rules.filter((rule) => {
    if (!matchesAnyGlob(filePath, rule.files)) return false;
    if (content === null && !isContentFree(rule)) return false;
    return options.config?.getRuleConfig(rule.id, filePath).enabled ?? true;
  });

  // First pass: raw matches per rule
  const hits = new Map<string, RuleHits>();
  for (const rule of applicable) {
    try {
      const found = runWithTimeout(() => collectHits(rule, text, lines), options.matchTimeoutMs);
      if (found.matches.length > MAX_MATCHES_PER_RULE) {
        warnings.push({
          kind: "file",
          path: filePath,
          reason: "truncated",
          message: `${rule.id} matched more than ${MAX_MATCHES_PER_RULE} times; only the first ${MAX_MATCHES_PER_RULE} are reported`,
        });
      }
      hits.set(rule.id, { ...found, matches: found.matches.slice(0, MAX_MATCHES_PER_RULE) });
    } catch (err) {
      const failure = isTimeoutError(err)
        ? new MatchError(`${rule.id} exceeded its time budget on ${filePath}`, rule.id, filePath, "MATCH_TIMEOUT")
        : new MatchError(`matcher failed: ${errorMessage(err)}`, rule.id, filePath);
      warnings.push({ kind: "match", path: filePath, rule: rule.id, message: failure.message });
    }
  }

  // Second pass: correlate rules within the file, then redact
  const findings: Finding[] = [];
  for (const rule of applicable) {
    const found = hits.get(rule.id);
    if (!found || found.matches.length === 0) continue;

    const severity = resolveSeverity(rule, found, hits, options.config, filePath);
    for (const match of found.matches) {
      findings.push({
        path: filePath,
        line: match.line,
        rule: rule.id,
        title: rule.title,
        severity,
        snippet: match.value === null ? null : redact(match.value),
        category: rule.tag,
        ruleCategory: rule.category,
        ...(rule.remediation ? { remediation: rule.remediation } : {}),
      });
    }
  }

  const directives = content === null ? [] : parseSuppressionDirectives(content);
  return { findings: filterSuppressedFindings(findings, directives), warnings };
}

function resolveSeverity(
  rule: Rule,
  found: RuleHits,
  hits: ReadonlyMap<string, RuleHits>,
  config: LoadedConfig | undefined,
  filePath: string
): Severity {
  let severity = rule.severity;

  if (rule.escalate) {
    const when = rule.escalate.when;
    const triggered = "rule" in when ? (hits.get(when.rule)?.matches.length ?? 0) > 0 : found.patternTriggered;
    if (triggered) {
      severity = rule.escalate.severity;
    }
  }

  return config?.getRuleConfig(rule.id, filePath).severity ?? severity;
}

function collectHits(rule: Rule, content: string, lines: string[]): RuleHits {
  const matches = collectMatches(rule, content, lines);
  const when = rule.escalate?.when;
  if (matches.length === 0 || when === undefined || !("pattern" in when)) {
    return { matches, patternTriggered: false };
  }
  return { matches, patternTriggered: testPattern(when.pattern, content) };
}

function collectMatches(rule: Rule, content: string, lines: string[]): RawMatch[] {
  if (rule.requires.length > 0 && !rule.requires.every((p) => testPattern(p, content))) return [];
  if (matchesAnyPattern(content, rule.excludes)) return [];

  const matcher = rule.matcher;
  switch (matcher.kind) {
    case "exists":
      return [{ line: null, value: null }];

    case "absent":
      return testPattern(matcher.regex, content) ? [] : [{ line: null, value: null }];

    case "pattern": {
      const regex = globalFor(matcher.regex);
      const results: RawMatch[] = [];
      const pick = (m: RegExpExecArray): string => (matcher.capture !== null ? m[matcher.capture] : undefined) ?? m[0];

      if (matcher.mode === "file") {
        let m: RegExpExecArray | null;
        while ((m = regex.exec(content)) !== null) {
          if (m[0].length === 0) regex.lastIndex++;
          results.push({ line: lineAtOffset(content, m.index), value: pick(m) });
          if (results.length > MAX_MATCHES_PER_RULE) break;
        }
        return results;
      }

      for (let i = 0; i < lines.length; i++) {
        const line = lines[i];
        if (rule.unless.length > 0 && matchesAnyPattern(line, rule.unless)) continue;
        regex.lastIndex = 0;
        let m: RegExpExecArray | null;
        while ((m = regex.exec(line)) !== null) {
          if (m[0].length === 0) regex.lastIndex++;
          results.push({ line: i + 1, value: pick(m) });
        }
        if (results.length > MAX_MATCHES_PER_RULE) break;
      }
      return results;
    }
  }
}
