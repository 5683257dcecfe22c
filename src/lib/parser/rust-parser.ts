import { Language, Parser, type Node } from "web-tree-sitter";

import { RUST } from "../core/languages";
import { describeCause, GrammarLoadError } from "../errors";
import { resolveGrammarWasm } from "../index/grammar-loader";
import type { SourceTree } from "../skeleton/model";
import {
  buildSourceTree,
  childrenOf,
  unitWhereClause,
} from "./declarations";

export type ParseResult =
  | { success: true; tree: SourceTree }
  | { success: false; error: string };

/** Turns the text of one source file into its declaration tree. */
export interface SourceParser {
  parse(text: string): ParseResult;
}

// The wasm runtime is process-wide; initialise it once.
let runtimeReady: Promise<void> | null = null;
const languages = new Map<string, Promise<Language>>();

function initRuntime(): Promise<void> {
  if (!runtimeReady) {
    runtimeReady = Parser.init().catch((err: unknown) => {
      runtimeReady = null;
      throw err;
    });
  }
  return runtimeReady;
}

function loadLanguage(wasmPath: string): Promise<Language> {
  let language = languages.get(wasmPath);
  if (!language) {
    language = Language.load(wasmPath).catch((err: unknown) => {
      languages.delete(wasmPath);
      throw new GrammarLoadError(wasmPath, err);
    });
    languages.set(wasmPath, language);
  }
  return language;
}

/**
 * First ERROR or MISSING node in document order, other than the recovered
 * where-clause of a unit struct.
 */
function findSyntaxError(node: Node): Node | null {
  if (node.type === "ERROR" || node.isMissing) return node;
  if (!node.hasError) return null;
  const recovered = unitWhereClause(node);
  for (const child of childrenOf(node)) {
    if (recovered && child.type === "ERROR") continue;
    const found = findSyntaxError(child);
    if (found) return found;
  }
  return null;
}

function describeSyntaxError(node: Node): string {
  const { row, column } = node.startPosition;
  const where = `line ${row + 1}, column ${column + 1}`;
  return node.isMissing
    ? `expected \`${node.type}\` at ${where}`
    : `syntax error at ${where}`;
}

/**
 * Rust front end backed by tree-sitter. Call `init()` once before parsing
 * and `close()` when done.
 */
export class RustSourceParser implements SourceParser {
  private parser: Parser | null = null;

  async init(): Promise<void> {
    if (this.parser) return;

    const wasmPath = resolveGrammarWasm(RUST);
    await initRuntime();
    const language = await loadLanguage(wasmPath);

    const parser = new Parser();
    parser.setLanguage(language);
    this.parser = parser;
  }

  parse(text: string): ParseResult {
    if (!this.parser) {
      throw new Error("RustSourceParser not initialized. Call init() first.");
    }

    const tree = this.parser.parse(text);
    if (!tree) return { success: false, error: "parsing was cancelled" };

    try {
      const failure = findSyntaxError(tree.rootNode);
      if (failure) {
        return { success: false, error: describeSyntaxError(failure) };
      }
      return { success: true, tree: buildSourceTree(tree.rootNode) };
    } catch (err) {
      return { success: false, error: describeCause(err) };
    } finally {
      tree.delete();
    }
  }

  close(): void {
    this.parser?.delete();
    this.parser = null;
  }
}
