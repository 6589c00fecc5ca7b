/**
 * Inline suppression directive parsing.
 *
 * Supports comment-based suppressions that work across languages:
 * - stackguard-ignore-file ALL|RULE_ID[,RULE_ID...]
 * - stackguard-ignore-line ALL|RULE_ID[,RULE_ID...]
 * - stackguard-ignore-next-line ALL|RULE_ID[,RULE_ID...]
 *
 * A reason may follow the rule list after a separator such as "--".
 */

/**
 * The scope of a suppression directive.
 */
export type SuppressionScope = "file" | "line" | "next-line";

/**
 * A parsed suppression directive.
 */
export interface SuppressionDirective {
  scope: SuppressionScope;

  /**
   * If true, all rules are suppressed for this scope.
   */
  allRules: boolean;

  /**
   * Specific rule IDs to suppress (empty if allRules is true).
   */
  rules: string[];

  /**
   * The 1-based line number where this directive appears.
   */
  line: number;
}

const RULE_ID_TOKEN = /^[a-z0-9][a-z0-9_./-]*$/i;

/**
 * Parse all suppression directives from file content.
 */
export function parseSuppressionDirectives(source: string): SuppressionDirective[] {
  const directives: SuppressionDirective[] = [];
  // Fast path: most files carry no directives
  if (!source.includes("stackguard-ignore-")) {
    return directives;
  }
  const lines = source.split(/\r?\n/);

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    const lineNumber = i + 1;

    // Fresh regex per line; exec() on a shared global regex keeps state
    const directiveRegex = /stackguard-ignore-(file|next-line|line)\s+([A-Za-z0-9_./,\s-]+)/g;

    let match: RegExpExecArray | null;
    while ((match = directiveRegex.exec(line)) !== null) {
      const scope = toScope(match[1]);
      const tokens = match[2]
        .split(/[,\s]+/)
        .map((s) => s.trim())
        .filter((s) => s.length > 0);

      if (tokens.length > 0 && tokens[0].toUpperCase() === "ALL") {
        directives.push({ scope, allRules: true, rules: [], line: lineNumber });
        continue;
      }

      // The rule list ends at the first token that cannot be a rule id
      // ("-", "--", a closing "-->"); anything after it is free text
      const rules: string[] = [];
      for (const token of tokens) {
        if (!RULE_ID_TOKEN.test(token)) break;
        rules.push(token);
      }
      if (rules.length > 0) {
        directives.push({ scope, allRules: false, rules, line: lineNumber });
      }
    }
  }

  return directives;
}

function toScope(value: string): SuppressionScope {
  switch (value.toLowerCase()) {
    case "file":
      return "file";
    case "next-line":
      return "next-line";
    default:
      return "line";
  }
}

/**
 * Check if a rule is suppressed at a given line. Whole-file findings
 * (line null) are only suppressed by file-scope directives.
 */
export function isSuppressed(ruleId: string, line: number | null, directives: SuppressionDirective[]): boolean {
  for (const directive of directives) {
    const matchesRule = directive.allRules || directive.rules.includes(ruleId);
    if (!matchesRule) {
      continue;
    }

    switch (directive.scope) {
      case "file":
        return true;

      case "line":
        if (line !== null && directive.line === line) {
          return true;
        }
        break;

      case "next-line":
        if (line !== null && directive.line + 1 === line) {
          return true;
        }
        break;
    }
  }

  return false;
}

/**
 * Filter findings based on suppression directives.
 */
export function filterSuppressedFindings<T extends { rule: string; line: number | null }>(
  findings: T[],
  directives: SuppressionDirective[]
): T[] {
  if (directives.length === 0) return findings;
  return findings.filter((finding) => !isSuppressed(finding.rule, finding.line, directives));
}
