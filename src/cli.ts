#!/usr/bin/env node
/**
 * stackguard command-line interface.
 *
 * Exit codes: 0 no findings, 1 findings, 2 fatal input or config error.
 */

import * as fs from "fs";
import * as path from "path";
import { Command, CommanderError, Option } from "commander";
import { FATAL_EXIT_CODE, InputError, errorMessage, isFatalError } from "./errors";
import { env } from "./env";
import { isLogLevel, logger } from "./logger";
import { DEFAULT_CATALOG_DIR, loadCatalog } from "./analysis/catalog";
import { runScan } from "./analysis/orchestration";
import { PatternRegistry } from "./analysis/registry";
import { REPORT_FORMATS, ReportFormat, render } from "./analysis/report";

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  /** Aborts a running scan; the partial report is still printed. */
  signal?: AbortSignal;
}

type CliOptions = {
  profiles?: string;
  exclude: string[];
  maxFileSize?: string;
  workers?: string;
  format: string;
  catalog?: string;
  config?: string;
  listProfiles?: boolean;
  listRules?: boolean;
  logLevel?: string;
};

const defaultIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

function readVersion(): string {
  // package.json sits one level above both src/ and dist/
  const manifestPath = path.resolve(__dirname, "..", "package.json");
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(manifestPath, "utf-8"));
    if (parsed !== null && typeof parsed === "object" && "version" in parsed && typeof parsed.version === "string") {
      return parsed.version;
    }
  } catch (err) {
    logger.debug("Could not read package version", { error: errorMessage(err) });
  }
  return "0.0.0";
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function isReportFormat(value: string): value is ReportFormat {
  return REPORT_FORMATS.some((format) => format === value);
}

function buildProgram(io: CliIO): Command {
  return new Command()
    .name("stackguard")
    .description("Scan a project tree for leaked secrets and stack misconfigurations")
    .version(readVersion())
    .argument("[root]", "project root to scan", ".")
    .option("--profiles <list>", "comma-separated profiles to force instead of detection")
    .option("--exclude <glob>", "skip files or directories matching a glob (repeatable)", collect, [])
    .option("--max-file-size <bytes>", "skip files larger than this many bytes")
    .option("--workers <n>", "number of concurrent file workers")
    .addOption(new Option("--format <format>", "report format").choices(REPORT_FORMATS).default("text"))
    .option("--catalog <dir>", "rule catalog directory")
    .option("--config <file>", "config file (default: <root>/.stackguard.yml)")
    .option("--list-profiles", "list the catalog's profiles and exit")
    .option("--list-rules", "list the catalog's rules and exit")
    .option("--log-level <level>", "debug, info, warn or error")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text),
      writeErr: (text) => io.stderr(text),
    });
}

function listProfiles(registry: PatternRegistry): string {
  return registry
    .allProfiles()
    .map((p) => `${p.id.padEnd(10)} ${p.always ? "always" : "detect"}  ${String(p.rules.length).padStart(3)} rules  ${p.name}`)
    .join("\n");
}

function listRules(registry: PatternRegistry): string {
  return registry
    .allRules()
    .map((r) => `${r.id.padEnd(36)} ${r.severity.padEnd(8)} ${r.tag.padEnd(7)} ${r.title}`)
    .join("\n");
}

/**
 * Run the CLI with user arguments (without the node and script entries).
 * Resolves to the process exit code.
 */
export async function main(argv: string[], io: CliIO = defaultIO): Promise<number> {
  const program = buildProgram(io);

  try {
    await program.parseAsync(argv, { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError) {
      // Help and version exit with 0; usage errors are fatal input errors
      return err.exitCode === 0 ? 0 : FATAL_EXIT_CODE;
    }
    throw err;
  }

  const options = program.opts<CliOptions>();
  const [root = "."] = program.args;

  try {
    if (options.logLevel !== undefined) {
      if (!isLogLevel(options.logLevel)) {
        throw new InputError(`--log-level must be one of debug, info, warn, error, got "${options.logLevel}"`);
      }
      logger.setLevel(options.logLevel);
    }

    if (options.listProfiles || options.listRules) {
      const registry = new PatternRegistry(loadCatalog(options.catalog ?? env.CATALOG ?? DEFAULT_CATALOG_DIR));
      io.stdout((options.listProfiles ? listProfiles(registry) : listRules(registry)) + "\n");
      return 0;
    }

    const format = options.format;
    if (!isReportFormat(format)) {
      throw new InputError(`--format must be text or json, got "${format}"`);
    }

    const report = await runScan(root, {
      profiles: options.profiles?.split(",").map((p) => p.trim()).filter((p) => p.length > 0),
      exclude: options.exclude,
      workers: options.workers,
      maxFileSize: options.maxFileSize,
      catalogDir: options.catalog,
      configPath: options.config,
      signal: io.signal,
    });

    io.stdout(render(report, format));
    return report.exitCode;
  } catch (err) {
    if (isFatalError(err)) {
      io.stderr(`stackguard: ${err.message}\n`);
      return err.exitCode;
    }
    logger.error("Unexpected failure", { error: errorMessage(err) });
    return FATAL_EXIT_CODE;
  }
}

if (require.main === module) {
  const controller = new AbortController();
  const onInterrupt = (): void => {
    logger.warn("Interrupted; finishing files in progress");
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);

  main(process.argv.slice(2), { ...defaultIO, signal: controller.signal })
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      logger.error("Unexpected failure", { error: errorMessage(err) });
      process.exitCode = FATAL_EXIT_CODE;
    })
    .finally(() => {
      process.removeListener("SIGINT", onInterrupt);
    });
}
