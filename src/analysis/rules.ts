/**
 * Rule and profile types for stackguard.
 *
 * Rules are declared as data in the catalog (see catalog/*.yml) and compiled
 * once by the loader. Nothing here is mutated after load.
 */

/**
 * Severity levels, most severe first.
 * DO NOT reorder - report sorting and escalation depend on this order.
 */
export const SEVERITIES = ["CRITICAL", "HIGH", "MEDIUM", "LOW", "INFO"] as const;

export type Severity = (typeof SEVERITIES)[number];

/**
 * What a rule looks for: a leaked credential, or an unsafe setting.
 */
export const RULE_CATEGORIES = ["secret", "misconfiguration"] as const;

export type RuleCategory = (typeof RULE_CATEGORIES)[number];

/**
 * Classification tag carried by every finding.
 */
export const FINDING_TAGS = ["secret", "config", "auth", "network"] as const;

export type FindingTag = (typeof FINDING_TAGS)[number];

export type ProfileId = string;

/** Line-oriented (default) or whole-file matching. */
export type MatchMode = "line" | "file";

/**
 * Applicability expression over the set of active profiles.
 * All present clauses must hold.
 */
export interface Applicability {
  anyOf?: ProfileId[];
  allOf?: ProfileId[];
  noneOf?: ProfileId[];
}

/**
 * Condition under which a rule's severity is raised for one file.
 * Either another rule matched in the same file, or a pattern is present in it.
 */
export type EscalationTrigger = { rule: string } | { pattern: RegExp };

export interface Escalation {
  severity: Severity;
  when: EscalationTrigger;
}

/**
 * How a rule decides that a file has a problem.
 * - pattern: every regex match is a finding
 * - absent: one whole-file finding when the pattern is missing
 * - exists: one whole-file finding for every file the globs select
 */
export type Matcher =
  | { kind: "pattern"; regex: RegExp; mode: MatchMode; capture: number | null }
  | { kind: "absent"; regex: RegExp }
  | { kind: "exists" };

/**
 * A compiled, immutable detection rule.
 */
export interface Rule {
  readonly id: string;
  readonly title: string;
  readonly category: RuleCategory;
  readonly tag: FindingTag;
  readonly severity: Severity;
  readonly files: readonly string[];
  readonly matcher: Matcher;
  /** Line filters: a line matching any of these is not reported. */
  readonly unless: readonly RegExp[];
  /** File preconditions: every pattern must occur somewhere in the file. */
  readonly requires: readonly RegExp[];
  /** File preconditions: no pattern may occur anywhere in the file. */
  readonly excludes: readonly RegExp[];
  readonly escalate?: Escalation;
  readonly applies?: Applicability;
  readonly remediation?: string;
  /** Profile that declared the rule, or the generic group it belongs to. */
  readonly group: string;
}

/**
 * Predicates a stack profile uses to decide whether it applies.
 * A profile is active when any one predicate holds.
 */
export type DetectionPredicate =
  | { file: string }
  | { directory: string }
  | { glob: string }
  | { manifest: string; contains: string; ignoreCase: boolean };

export interface Profile {
  readonly id: ProfileId;
  readonly name: string;
  /** Generic groups are always on and never reported as detected. */
  readonly always: boolean;
  readonly detect: readonly DetectionPredicate[];
  readonly rules: readonly Rule[];
}

const SEVERITY_NAMES = new Set<string>(SEVERITIES);
const CATEGORY_NAMES = new Set<string>(RULE_CATEGORIES);
const TAG_NAMES = new Set<string>(FINDING_TAGS);

/**
 * Rank of a severity; lower is more severe.
 */
export function severityRank(severity: Severity): number {
  return SEVERITIES.indexOf(severity);
}

/**
 * Check if a string is a valid Severity.
 */
export function isSeverity(value: unknown): value is Severity {
  return typeof value === "string" && SEVERITY_NAMES.has(value);
}

export function isRuleCategory(value: unknown): value is RuleCategory {
  return typeof value === "string" && CATEGORY_NAMES.has(value);
}

export function isFindingTag(value: unknown): value is FindingTag {
  return typeof value === "string" && TAG_NAMES.has(value);
}

/**
 * Evaluate an applicability expression against the active profiles.
 */
export function isApplicable(applies: Applicability | undefined, profiles: ReadonlySet<ProfileId>): boolean {
  if (!applies) return true;
  if (applies.anyOf && !applies.anyOf.some((p) => profiles.has(p))) return false;
  if (applies.allOf && !applies.allOf.every((p) => profiles.has(p))) return false;
  if (applies.noneOf && applies.noneOf.some((p) => profiles.has(p))) return false;
  return true;
}
