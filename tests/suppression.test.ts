import { filterSuppressedFindings, isSuppressed, parseSuppressionDirectives } from "../src/core/suppression";

describe("Inline suppression", () => {
  describe("parseSuppressionDirectives", () => {
    it("should return nothing for files without directives", () => {
      expect(parseSuppressionDirectives("const a = 1;\n")).toEqual([]);
    });

    it("should parse every scope with rule lists", () => {
      const source = [
        "# stackguard-ignore-file docker/no-user",
        'API_KEY = "x" # stackguard-ignore-line secrets/generic-api-key, secrets/jwt-secret',
        "// stackguard-ignore-next-line all",
      ].join("\n");

      expect(parseSuppressionDirectives(source)).toEqual([
        { scope: "file", allRules: false, rules: ["docker/no-user"], line: 1 },
        { scope: "line", allRules: false, rules: ["secrets/generic-api-key", "secrets/jwt-secret"], line: 2 },
        { scope: "next-line", allRules: true, rules: [], line: 3 },
      ]);
    });

    it("should drop tokens that cannot be rule ids", () => {
      const directives = parseSuppressionDirectives("<!-- stackguard-ignore-line secrets/env-file -->");
      expect(directives).toEqual([{ scope: "line", allRules: false, rules: ["secrets/env-file"], line: 1 }]);
    });

    it("should treat text after the rule list as a reason, even when it says all", () => {
      const source = [
        "// stackguard-ignore-next-line secrets/jwt-secret - placeholder used in all test envs",
        'const key = "AKIATESTKEY000000000";',
      ].join("\n");

      const directives = parseSuppressionDirectives(source);

      expect(directives).toEqual([{ scope: "next-line", allRules: false, rules: ["secrets/jwt-secret"], line: 1 }]);
      expect(isSuppressed("secrets/aws-access-key", 2, directives)).toBe(false);
      expect(isSuppressed("secrets/jwt-secret", 2, directives)).toBe(true);
    });

    it("should only suppress everything when ALL comes first", () => {
      expect(parseSuppressionDirectives("x # stackguard-ignore-line docker/no-user -- all good")).toEqual([
        { scope: "line", allRules: false, rules: ["docker/no-user"], line: 1 },
      ]);
      expect(parseSuppressionDirectives("x # stackguard-ignore-line ALL -- fixture file")).toEqual([
        { scope: "line", allRules: true, rules: [], line: 1 },
      ]);
    });
  });

  describe("isSuppressed", () => {
    const directives = parseSuppressionDirectives(
      ["a", "b // stackguard-ignore-line rule/one", "// stackguard-ignore-next-line rule/two", "d"].join("\n")
    );

    it("should suppress only the named rule on the directive line", () => {
      expect(isSuppressed("rule/one", 2, directives)).toBe(true);
      expect(isSuppressed("rule/one", 1, directives)).toBe(false);
      expect(isSuppressed("rule/two", 2, directives)).toBe(false);
    });

    it("should suppress the line after a next-line directive", () => {
      expect(isSuppressed("rule/two", 4, directives)).toBe(true);
      expect(isSuppressed("rule/two", 3, directives)).toBe(false);
    });

    it("should leave whole-file findings to file-scope directives", () => {
      expect(isSuppressed("rule/one", null, directives)).toBe(false);
      const fileScope = parseSuppressionDirectives("# stackguard-ignore-file rule/one");
      expect(isSuppressed("rule/one", null, fileScope)).toBe(true);
    });
  });

  describe("filterSuppressedFindings", () => {
    it("should remove suppressed findings and keep the rest in order", () => {
      const directives = parseSuppressionDirectives("x // stackguard-ignore-line ALL");
      const findings = [
        { rule: "a/b", line: 1 },
        { rule: "a/c", line: 2 },
        { rule: "a/d", line: null },
      ];
      expect(filterSuppressedFindings(findings, directives)).toEqual([
        { rule: "a/c", line: 2 },
        { rule: "a/d", line: null },
      ]);
    });
  });
});
