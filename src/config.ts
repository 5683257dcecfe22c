import * as path from "node:path";

export const CONFIG = {
  SOURCE_EXTENSION: ".rs",
  INDENT_UNIT: "    ",
  HEADER_MARKER: "// *************",
};

const grammarOverride = process.env.RUST_SKELETON_GRAMMAR_WASM;

export const PATHS = {
  /** Grammar to load instead of the one shipped with tree-sitter-rust. */
  grammarOverride: grammarOverride ? path.resolve(grammarOverride) : undefined,
};

export const DEBUG =
  process.env.RUST_SKELETON_DEBUG === "1" ||
  process.env.RUST_SKELETON_DEBUG === "true";
