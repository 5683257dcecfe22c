import * as fs from "node:fs";

import { SourceParseError, SourceReadError } from "../errors";
import { walk } from "../index/walker";
import type { SourceParser } from "../parser/rust-parser";
import { type LineWriter, renderSkeleton } from "./skeletonizer";
import { formatSkeletonHeader } from "./summary-formatter";

export interface RunOptions {
  /** Directory to scan (or a single source file) */
  root: string;
  parser: SourceParser;
  write: LineWriter;
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

/** Read a source file as strict UTF-8. */
export function readSource(filePath: string): string {
  try {
    return utf8.decode(fs.readFileSync(filePath));
  } catch (err) {
    throw new SourceReadError(filePath, err);
  }
}

/**
 * Print a header and the skeleton of every source file under `root`, in walk
 * order. Stops at the first file that cannot be read or parsed; lines already
 * written for earlier files stay written.
 *
 * @returns the number of files printed
 */
export function printSkeletons({ root, parser, write }: RunOptions): number {
  let printed = 0;

  for (const filePath of walk(root)) {
    const text = readSource(filePath);
    const result = parser.parse(text);
    if (!result.success) {
      throw new SourceParseError(filePath, result.error);
    }

    write(formatSkeletonHeader(root, filePath));
    renderSkeleton(result.tree, write);
    printed++;
  }

  return printed;
}
