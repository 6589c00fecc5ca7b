import * as path from "path";
import { main, CliIO } from "../src/cli";
import { makeTree, removeTree } from "./support/tree";

interface CapturedIO extends CliIO {
  out: string[];
  err: string[];
}

function captureIO(): CapturedIO {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: (text) => {
      out.push(text);
    },
    stderr: (text) => {
      err.push(text);
    },
  };
}

const COMPOSE = 'services:\n  postgres:\n    image: postgres:16\n    ports: ["5432:5432"]\n';

describe("CLI", () => {
  let composeRoot: string;
  let emptyRoot: string;

  beforeAll(() => {
    composeRoot = makeTree({ "docker-compose.yml": COMPOSE });
    emptyRoot = makeTree({});
  });

  afterAll(() => {
    removeTree(composeRoot);
    removeTree(emptyRoot);
  });

  it("should exit with 1 and print JSON when findings exist", async () => {
    const io = captureIO();
    const code = await main([composeRoot, "--format", "json"], io);

    expect(code).toBe(1);
    const parsed = JSON.parse(io.out.join(""));
    expect(parsed.findings.map((f: { rule: string }) => f.rule)).toEqual(["docker/compose-db-port"]);
    expect(parsed.summary.profiles).toEqual(["docker"]);
  });

  it("should exit with 0 for a tree without findings", async () => {
    const io = captureIO();
    const code = await main([emptyRoot], io);

    expect(code).toBe(0);
    expect(io.out.join("").trimEnd().split("\n").pop()).toBe("Summary: no issues found");
  });

  it("should force profiles given on the command line", async () => {
    const io = captureIO();
    const code = await main([composeRoot, "--profiles", "nextjs", "--format", "json"], io);

    expect(code).toBe(0);
    expect(JSON.parse(io.out.join("")).summary.profiles).toEqual(["nextjs"]);
  });

  it("should exit with 2 for a missing root", async () => {
    const io = captureIO();
    const missing = path.join(emptyRoot, "missing");
    const code = await main([missing], io);

    expect(code).toBe(2);
    expect(io.err.join("")).toBe(`stackguard: Root path does not exist: ${missing}\n`);
    expect(io.out).toEqual([]);
  });

  it("should exit with 2 for an unknown profile", async () => {
    const io = captureIO();
    const code = await main([emptyRoot, "--profiles", "rails"], io);

    expect(code).toBe(2);
    expect(io.err.join("")).toContain('Unknown profile "rails"');
  });

  it("should exit with 2 for invalid option values", async () => {
    const workers = captureIO();
    expect(await main([emptyRoot, "--workers", "0"], workers)).toBe(2);
    expect(workers.err.join("")).toBe('stackguard: --workers must be a positive integer, got "0"\n');

    const format = captureIO();
    expect(await main([emptyRoot, "--format", "xml"], format)).toBe(2);
    expect(format.err.join("")).toContain("xml");
  });

  it("should list profiles and rules from the catalog", async () => {
    const profiles = captureIO();
    expect(await main(["--list-profiles"], profiles)).toBe(0);
    const lines = profiles.out.join("").trimEnd().split("\n");
    expect(lines).toHaveLength(10);
    expect(lines[0].startsWith("secrets")).toBe(true);

    const rules = captureIO();
    expect(await main(["--list-rules"], rules)).toBe(0);
    expect(rules.out.join("").split("\n")[0].startsWith("secrets/aws-access-key")).toBe(true);
  });

  it("should print the version", async () => {
    const io = captureIO();
    expect(await main(["--version"], io)).toBe(0);
    expect(io.out.join("")).toBe("0.1.0\n");
  });

  it("should return the partial report when the scan is aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const io = { ...captureIO(), signal: controller.signal };
    const code = await main([composeRoot], io);

    expect(code).toBe(0);
    expect(io.out.join("")).toContain("Scan cancelled before every file was scanned; results are partial.");
  });
});
