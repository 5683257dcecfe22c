import type { Dirent } from "node:fs";
import * as fs from "node:fs";
import * as path from "node:path";

import { CONFIG } from "../../config";

interface WalkOptions {
  extension?: string;
}

function readSortedEntries(dir: string): Dirent[] | null {
  try {
    const entries = fs.readdirSync(dir, { withFileTypes: true });
    return entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  } catch {
    return null;
  }
}

/**
 * Yield every source file under `rootDir`, depth first, siblings in name
 * order. Paths are joined onto `rootDir` as given. Unreadable directories
 * and broken links are skipped; linked directories are not entered.
 */
export function* walk(
  rootDir: string,
  options: WalkOptions = {},
): Generator<string> {
  const extension = options.extension ?? CONFIG.SOURCE_EXTENSION;

  let rootStats: fs.Stats;
  try {
    rootStats = fs.statSync(rootDir);
  } catch {
    return;
  }

  if (rootStats.isFile()) {
    if (path.extname(rootDir) === extension) yield rootDir;
    return;
  }

  yield* _walk(rootDir, extension);
}

function* _walk(currentDir: string, extension: string): Generator<string> {
  const entries = readSortedEntries(currentDir);
  if (!entries) return;

  for (const entry of entries) {
    const absPath = path.join(currentDir, entry.name);

    if (entry.isDirectory()) {
      yield* _walk(absPath, extension);
      continue;
    }

    if (path.extname(entry.name) !== extension) continue;

    if (entry.isFile()) {
      yield absPath;
    } else if (entry.isSymbolicLink() && isLinkToFile(absPath)) {
      yield absPath;
    }
  }
}

function isLinkToFile(linkPath: string): boolean {
  try {
    return fs.statSync(linkPath).isFile();
  } catch {
    return false;
  }
}
