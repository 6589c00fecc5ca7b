/**
 * File discovery and bounded reads for the scan engine.
 */

import fg from "fast-glob";
import * as nodeFs from "fs";
import * as fs from "fs/promises";
import * as path from "path";
import { DEFAULT_EXCLUDES, looksBinary, toPosixPath } from "./patterns";
import { FileWarning, FileWarningReason } from "./detectors/types";

export type ReadResult =
  | { kind: "text"; content: string }
  | { kind: "skipped"; reason: FileWarningReason; message: string };

const decoder = new TextDecoder("utf-8", { fatal: true });

export interface FileListing {
  /** Relative, "/"-separated, sorted. */
  files: string[];
  /** Directories the walker could not open; their contents are missing from files. */
  warnings: FileWarning[];
}

export interface ListFilesOptions {
  /** File system the walker reads through. Default: node's fs */
  fileSystem?: typeof nodeFs;
}

/**
 * List every regular file under a root, skipping the default exclusion
 * directories. Symbolic links are not followed. A directory that cannot be
 * read is reported as an unreadable warning and the walk goes on.
 */
export async function listFiles(rootDir: string, options: ListFilesOptions = {}): Promise<FileListing> {
  const warnings: FileWarning[] = [];
  const fileSystem = reportingReaddir(options.fileSystem ?? nodeFs, (directory, err) => {
    warnings.push({
      kind: "file",
      path: toPosixPath(path.relative(rootDir, directory)) || ".",
      reason: "unreadable",
      message: `cannot read directory (${err.code ?? "read error"})`,
    });
  });

  const entries = await fg("**/*", {
    cwd: rootDir,
    dot: true,
    onlyFiles: true,
    followSymbolicLinks: false,
    ignore: DEFAULT_EXCLUDES,
    fs: fileSystem,
  });
  warnings.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  return { files: entries.map(toPosixPath).sort(), warnings };
}

/**
 * Wrap a file system so a failed readdir is handed to onError and looks
 * like an empty directory to the caller. A vanished directory (ENOENT)
 * passes through; fast-glob already skips those.
 */
function reportingReaddir(
  base: typeof nodeFs,
  onError: (directory: string, err: NodeJS.ErrnoException) => void
): typeof nodeFs {
  const readdir = (...args: unknown[]): void => {
    const callback = args.pop();
    if (typeof callback !== "function") {
      throw new TypeError("readdir needs a callback");
    }
    const directory = String(args[0]);
    Reflect.apply(base.readdir, base, [
      ...args,
      (err: NodeJS.ErrnoException | null, entries: unknown) => {
        if (err && err.code !== "ENOENT") {
          onError(directory, err);
          callback(null, []);
          return;
        }
        callback(err, entries);
      },
    ]);
  };

  return new Proxy(base, {
    get: (target, property, receiver) => (property === "readdir" ? readdir : Reflect.get(target, property, receiver)),
  });
}

/**
 * Read a file as UTF-8 text unless it is too large, binary, or unreadable.
 * Never reads more than maxFileSize + 1 bytes, even if the file grows
 * after its size was checked.
 */
export async function readTextFile(absolutePath: string, maxFileSize: number): Promise<ReadResult> {
  let buffer: Buffer;
  try {
    const handle = await fs.open(absolutePath, "r");
    try {
      const { size } = await handle.stat();
      if (size > maxFileSize) {
        return oversized(`file is ${size} bytes, above the ${maxFileSize} byte limit`);
      }
      buffer = await readAtMost(handle, size, maxFileSize + 1);
    } finally {
      await handle.close();
    }
  } catch (err) {
    const code = typeof err === "object" && err !== null && "code" in err ? String(err.code) : "read error";
    return { kind: "skipped", reason: "unreadable", message: `cannot read file (${code})` };
  }

  if (buffer.length > maxFileSize) {
    return oversized(`file grew past the ${maxFileSize} byte limit while being read`);
  }
  if (looksBinary(buffer)) {
    return { kind: "skipped", reason: "binary", message: "binary file" };
  }

  try {
    return { kind: "text", content: decoder.decode(buffer) };
  } catch {
    return { kind: "skipped", reason: "unreadable", message: "file is not valid UTF-8" };
  }
}

function oversized(message: string): ReadResult {
  return { kind: "skipped", reason: "oversized", message };
}

async function readAtMost(handle: fs.FileHandle, expected: number, limit: number): Promise<Buffer> {
  let chunk = Buffer.alloc(Math.min(limit, expected + 1));
  let length = 0;
  for (;;) {
    if (length === chunk.length) {
      if (chunk.length === limit) break;
      const grown = Buffer.alloc(Math.min(limit, chunk.length * 2));
      chunk.copy(grown, 0, 0, length);
      chunk = grown;
    }
    const { bytesRead } = await handle.read(chunk, length, chunk.length - length, length);
    if (bytesRead === 0) break;
    length += bytesRead;
  }
  return chunk.subarray(0, length);
}
