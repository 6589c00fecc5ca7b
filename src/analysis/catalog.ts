/**
 * Rule catalog loader.
 *
 * The catalog is a directory of YAML documents, one per profile, plus an
 * index.yml that fixes the registration order. Every pattern is compiled
 * here, so a malformed rule fails the load instead of a later scan.
 */

import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";
import { ConfigError, InputError, errorMessage } from "../errors";
import { logger } from "../logger";
import { compilePattern } from "./patterns";
import {
  Applicability,
  DetectionPredicate,
  Escalation,
  FindingTag,
  MatchMode,
  Matcher,
  Profile,
  Rule,
  isFindingTag,
  isRuleCategory,
  isSeverity,
} from "./rules";

/** Bundled catalog, resolved from both src/analysis and dist/analysis. */
export const DEFAULT_CATALOG_DIR = path.resolve(__dirname, "..", "..", "catalog");

const INDEX_FILE = "index.yml";

export interface CatalogDocument {
  /** File name or label used in error messages. */
  source: string;
  text: string;
}

type RawRecord = Record<string, unknown>;

/**
 * Load every profile listed in a catalog directory's index.yml.
 *
 * @throws InputError when the directory or one of its files cannot be read
 * @throws ConfigError when a document is malformed
 */
export function loadCatalog(catalogDir: string = DEFAULT_CATALOG_DIR): Profile[] {
  const indexPath = path.join(catalogDir, INDEX_FILE);
  const indexText = readCatalogFile(indexPath);
  const index = asRecord(parseYaml(indexText, INDEX_FILE), INDEX_FILE);
  const names = stringList(index.profiles, "profiles", INDEX_FILE);
  if (names.length === 0) {
    throw new ConfigError("index lists no profiles", { source: INDEX_FILE });
  }

  const documents: CatalogDocument[] = names.map((name) => {
    const fileName = name.endsWith(".yml") || name.endsWith(".yaml") ? name : `${name}.yml`;
    return { source: fileName, text: readCatalogFile(path.join(catalogDir, fileName)) };
  });

  const profiles = loadCatalogFromDocuments(documents);
  logger.debug("Loaded rule catalog", {
    dir: catalogDir,
    profiles: profiles.length,
    rules: profiles.reduce((sum, p) => sum + p.rules.length, 0),
  });
  return profiles;
}

/**
 * Parse catalog documents without touching the filesystem.
 */
export function loadCatalogFromDocuments(documents: CatalogDocument[]): Profile[] {
  return documents.map((doc) => parseProfile(parseYaml(doc.text, doc.source), doc.source));
}

function readCatalogFile(filePath: string): string {
  try {
    return fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new InputError(`Cannot read rule catalog file ${filePath}: ${errorMessage(err)}`, "CATALOG_UNREADABLE", {
      cause: err,
    });
  }
}

function parseYaml(text: string, source: string): unknown {
  try {
    return yaml.load(text);
  } catch (err) {
    throw new ConfigError(`invalid YAML: ${errorMessage(err)}`, { source, cause: err });
  }
}

// ============================================================================
// Profile and rule parsing
// ============================================================================

function parseProfile(value: unknown, source: string): Profile {
  const raw = asRecord(value, source);
  const id = requiredString(raw.id, "id", source);
  const always = optionalBoolean(raw.always, "always", source) ?? false;
  const detect = raw.detect === undefined ? [] : asList(raw.detect, "detect", source).map((p) => parsePredicate(p, source));

  if (!always && detect.length === 0) {
    throw new ConfigError(`profile "${id}" has no detection predicates and is not marked always`, { source });
  }

  const rules = asList(raw.rules ?? [], "rules", source).map((r, i) => parseRule(r, id, `${source} rules[${i}]`));

  return {
    id,
    name: optionalString(raw.name, "name", source) ?? id,
    always,
    detect,
    rules,
  };
}

function parsePredicate(value: unknown, source: string): DetectionPredicate {
  const raw = asRecord(value, `${source} detect`);
  const { file, directory, glob, manifest } = raw;
  if (typeof file === "string") return { file };
  if (typeof directory === "string") return { directory };
  if (typeof glob === "string") return { glob };
  if (typeof manifest === "string") {
    return {
      manifest,
      contains: requiredString(raw.contains, "contains", `${source} detect`),
      ignoreCase: optionalBoolean(raw.ignoreCase, "ignoreCase", source) ?? false,
    };
  }
  throw new ConfigError("detection predicate needs one of file, directory, glob or manifest", { source });
}

function parseRule(value: unknown, group: string, source: string): Rule {
  const raw = asRecord(value, source);
  const id = requiredString(raw.id, "id", source);
  const where = `${source} (${id})`;

  const severity = raw.severity;
  if (!isSeverity(severity)) {
    throw new ConfigError(`unknown severity ${JSON.stringify(severity)}`, { source: where });
  }
  const category = raw.category;
  if (!isRuleCategory(category)) {
    throw new ConfigError(`unknown category ${JSON.stringify(category)}`, { source: where });
  }
  const tag: unknown = raw.tag ?? defaultTag(category);
  if (!isFindingTag(tag)) {
    throw new ConfigError(`unknown tag ${JSON.stringify(tag)}`, { source: where });
  }

  const files = raw.files === undefined ? ["**/*"] : stringList(raw.files, "files", where);
  if (files.length === 0) {
    throw new ConfigError("files must list at least one glob", { source: where });
  }

  const flags = optionalString(raw.flags, "flags", where) ?? "";
  const compile = (pattern: unknown, field: string): RegExp => {
    const text = requiredString(pattern, field, where);
    try {
      return compilePattern(text, flags);
    } catch (err) {
      throw new ConfigError(`invalid ${field} regex: ${errorMessage(err)}`, { source: where, cause: err });
    }
  };
  const compileList = (list: unknown, field: string): RegExp[] =>
    list === undefined ? [] : stringList(list, field, where).map((p) => compile(p, field));

  const matcher = parseMatcher(raw, where, compile);
  const unless = compileList(raw.unless, "unless");
  if (unless.length > 0 && !(matcher.kind === "pattern" && matcher.mode === "line")) {
    throw new ConfigError("unless only applies to line-mode pattern rules", { source: where });
  }

  return {
    id,
    title: requiredString(raw.title, "title", where),
    category,
    tag,
    severity,
    files,
    matcher,
    unless,
    requires: compileList(raw.requires, "requires"),
    excludes: compileList(raw.excludes, "excludes"),
    escalate: raw.escalate === undefined ? undefined : parseEscalation(raw.escalate, where, compile),
    applies: raw.applies === undefined ? undefined : parseApplicability(raw.applies, where),
    remediation: optionalString(raw.remediation, "remediation", where),
    group,
  };
}

function parseMatcher(raw: RawRecord, where: string, compile: (p: unknown, field: string) => RegExp): Matcher {
  const kinds = ["pattern", "absent", "exists"].filter((k) => raw[k] !== undefined);
  if (kinds.length !== 1) {
    throw new ConfigError("rule needs exactly one of pattern, absent or exists", { source: where });
  }

  if (raw.pattern !== undefined) {
    let mode: MatchMode;
    if (raw.mode === undefined || raw.mode === "line") {
      mode = "line";
    } else if (raw.mode === "file") {
      mode = "file";
    } else {
      throw new ConfigError(`unknown mode ${JSON.stringify(raw.mode)}`, { source: where });
    }
    const regex = compile(raw.pattern, "pattern");
    let capture: number | null = null;
    if (raw.capture !== undefined) {
      const value = raw.capture;
      if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
        throw new ConfigError("capture must be a non-negative integer", { source: where });
      }
      capture = value;
    }
    return { kind: "pattern", regex, mode, capture };
  }
  if (raw.absent !== undefined) {
    return { kind: "absent", regex: compile(raw.absent, "absent") };
  }
  if (raw.exists !== true) {
    throw new ConfigError("exists must be true", { source: where });
  }
  return { kind: "exists" };
}

function parseEscalation(value: unknown, where: string, compile: (p: unknown, field: string) => RegExp): Escalation {
  const raw = asRecord(value, `${where} escalate`);
  const severity = raw.severity;
  if (!isSeverity(severity)) {
    throw new ConfigError(`unknown escalation severity ${JSON.stringify(severity)}`, { source: where });
  }
  const when = asRecord(raw.when, `${where} escalate.when`);
  const rule = when.rule;
  if (typeof rule === "string") {
    return { severity, when: { rule } };
  }
  if (when.pattern !== undefined) {
    return { severity, when: { pattern: compile(when.pattern, "escalate.when.pattern") } };
  }
  throw new ConfigError("escalate.when needs rule or pattern", { source: where });
}

function parseApplicability(value: unknown, where: string): Applicability {
  const raw = asRecord(value, `${where} applies`);
  const result: Applicability = {};
  if (raw.anyOf !== undefined) result.anyOf = stringList(raw.anyOf, "applies.anyOf", where);
  if (raw.allOf !== undefined) result.allOf = stringList(raw.allOf, "applies.allOf", where);
  if (raw.noneOf !== undefined) result.noneOf = stringList(raw.noneOf, "applies.noneOf", where);
  return result;
}

function defaultTag(category: string): FindingTag {
  return category === "secret" ? "secret" : "config";
}

// ============================================================================
// Shape helpers
// ============================================================================

function asRecord(value: unknown, source: string): RawRecord {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    throw new ConfigError("expected a mapping", { source });
  }
  return Object.fromEntries(Object.entries(value));
}

function asList(value: unknown, field: string, source: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new ConfigError(`${field} must be a list`, { source });
  }
  return value;
}

function stringList(value: unknown, field: string, source: string): string[] {
  const list = typeof value === "string" ? [value] : asList(value, field, source);
  return list.map((item) => requiredString(item, field, source));
}

function requiredString(value: unknown, field: string, source: string): string {
  if (typeof value !== "string" || value.length === 0) {
    throw new ConfigError(`${field} must be a non-empty string`, { source });
  }
  return value;
}

function optionalString(value: unknown, field: string, source: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw new ConfigError(`${field} must be a string`, { source });
  }
  return value;
}

function optionalBoolean(value: unknown, field: string, source: string): boolean | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "boolean") {
    throw new ConfigError(`${field} must be true or false`, { source });
  }
  return value;
}
