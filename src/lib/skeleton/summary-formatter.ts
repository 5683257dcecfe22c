/**
 * Line-level formatting shared by the skeleton printer.
 *
 * Output format:
 *   // ************* src/lib.rs
 *   ///  Adds two numbers.
 *   pub fn add (a : i32 , b : i32) -> i32 ;
 */

import * as path from "node:path";

import { CONFIG } from "../../config";
import { formatTokens, ident, punct, type TokenStream } from "./tokens";
import type { Visibility } from "./model";

export function indent(depth: number): string {
  return CONFIG.INDENT_UNIT.repeat(depth);
}

/**
 * Path shown in a file header: relative to the scan root, or absolute when
 * the file is the root itself or lies outside it.
 */
export function displayPath(root: string, filePath: string): string {
  const relative = path.relative(root, filePath);
  if (
    !relative ||
    relative === ".." ||
    relative.startsWith(`..${path.sep}`) ||
    path.isAbsolute(relative)
  ) {
    return path.resolve(filePath);
  }
  return relative;
}

export function formatSkeletonHeader(root: string, filePath: string): string {
  return `${CONFIG.HEADER_MARKER} ${displayPath(root, filePath)}`;
}

/**
 * Split a doc comment value into output lines. Line comments pass through;
 * block comments lose their blank first/last lines and ` * ` gutters.
 */
export function docCommentLines(value: string): string[] {
  if (!value.includes("\n")) return [value];

  const lines = value.split(/\r?\n/);
  while (lines.length > 0 && lines[0].trim() === "") lines.shift();
  while (lines.length > 0 && lines[lines.length - 1].trim() === "") lines.pop();

  const gutter = /^\s*\*/;
  if (lines.length > 0 && lines.every((line) => gutter.test(line))) {
    return lines.map((line) => line.replace(gutter, ""));
  }
  return lines;
}

export function formatDocLines(docs: string[], depth: number): string[] {
  const ind = indent(depth);
  return docs.flatMap(docCommentLines).map((line) => `${ind}/// ${line}`);
}

export function visibilityTokens(vis: Visibility): TokenStream {
  switch (vis.kind) {
    case "public":
      return [ident("pub")];
    case "restricted":
      return vis.clause;
    case "inherited":
      return [];
  }
}

/** A declaration line terminated by `;`. */
export function formatStatement(tokens: TokenStream, depth: number): string {
  return `${indent(depth)}${formatTokens([...tokens, punct(";")])}`;
}

/** The opening line of a braced block: tokens followed by `{`. */
export function formatBlockHeader(tokens: TokenStream, depth: number): string {
  return `${indent(depth)}${formatTokens(tokens)} {`;
}

export function formatBlockEnd(depth: number): string {
  return `${indent(depth)}}`;
}
