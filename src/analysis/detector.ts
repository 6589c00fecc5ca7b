/**
 * Stack detection: decides which profiles apply to a project root.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { logger } from "../logger";
import { FileListing, listFiles } from "./files";
import { matchesGlob } from "./patterns";
import { DetectionPredicate, Profile, ProfileId } from "./rules";

export interface DetectOptions {
  /** Manifest reader, injectable for tests. Resolves null when the file is missing. */
  readFile?: (absolutePath: string) => Promise<string | null>;
}

async function readIfPresent(absolutePath: string): Promise<string | null> {
  try {
    return await fs.readFile(absolutePath, "utf-8");
  } catch (err) {
    logger.debug("Manifest not readable", { path: absolutePath, error: err instanceof Error ? err.message : String(err) });
    return null;
  }
}

async function pathKind(absolutePath: string): Promise<"file" | "directory" | null> {
  try {
    const stat = await fs.stat(absolutePath);
    if (stat.isDirectory()) return "directory";
    return stat.isFile() ? "file" : null;
  } catch {
    return null;
  }
}

/**
 * Detect the stack profiles active under a root. Generic groups are never
 * returned. An empty set is a valid result.
 */
export async function detectProfiles(
  rootDir: string,
  profiles: readonly Profile[],
  options: DetectOptions = {}
): Promise<Set<ProfileId>> {
  const readFile = options.readFile ?? readIfPresent;

  // Each manifest is read at most once per call; the file list at most once
  const manifests = new Map<string, Promise<string | null>>();
  let fileList: Promise<FileListing> | undefined;

  const manifest = (name: string): Promise<string | null> => {
    let pending = manifests.get(name);
    if (!pending) {
      pending = readFile(path.join(rootDir, name));
      manifests.set(name, pending);
    }
    return pending;
  };

  const holds = async (predicate: DetectionPredicate): Promise<boolean> => {
    if ("file" in predicate) {
      return (await pathKind(path.join(rootDir, predicate.file))) === "file";
    }
    if ("directory" in predicate) {
      return (await pathKind(path.join(rootDir, predicate.directory))) === "directory";
    }
    if ("glob" in predicate) {
      fileList ??= listFiles(rootDir);
      return (await fileList).files.some((f) => matchesGlob(f, predicate.glob));
    }
    const text = await manifest(predicate.manifest);
    if (text === null) return false;
    return predicate.ignoreCase
      ? text.toLowerCase().includes(predicate.contains.toLowerCase())
      : text.includes(predicate.contains);
  };

  const detected = new Set<ProfileId>();
  for (const profile of profiles) {
    if (profile.always) continue;
    for (const predicate of profile.detect) {
      if (await holds(predicate)) {
        detected.add(profile.id);
        break;
      }
    }
  }

  logger.info("Detected profiles", { root: rootDir, profiles: [...detected] });
  return detected;
}
