import { redact, SHORT_VALUE_MASK } from "../src/analysis/redaction";

describe("redact", () => {
  it("should keep the first and last four characters of long values", () => {
    expect(redact("AKIATESTKEY000000000")).toBe("AKIA...0000");
  });

  it("should partially disclose values of exactly eight characters", () => {
    expect(redact("abcdefgh")).toBe("abcd...efgh");
  });

  it("should mask short values completely", () => {
    expect(redact("short")).toBe(SHORT_VALUE_MASK);
    expect(redact("1234567")).toBe("********");
    expect(redact("")).toBe("********");
  });

  it("should never reveal the middle of a value", () => {
    const redacted = redact("test-secret-value-1234");
    expect(redacted).toBe("test...1234");
    expect(redacted).not.toContain("secret");
  });

  it("should flatten line breaks inside the visible ends", () => {
    expect(redact("ab\ncdefg\nhi")).toBe("ab c...g hi");
  });
});
