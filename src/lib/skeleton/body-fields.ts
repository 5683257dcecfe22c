/**
 * Node type mappings for the Rust TreeSitter grammar.
 *
 * Maps node type -> body field name
 * - string: The field holding the executable body, cut from the signature
 * - null: Node type has no body to cut (bodiless trait methods)
 * - undefined: Node type is not a function
 */

import type { DeclarationKind } from "./model";

export const BODY_FIELDS: Record<string, string | null> = {
  function_item: "body",
  function_signature_item: null,
};

/** Top-level items the skeleton prints. Everything else is "other". */
export const DECLARATION_KINDS: Record<string, DeclarationKind> = {
  function_item: "function",
  struct_item: "struct",
  enum_item: "enum",
  trait_item: "trait",
  impl_item: "impl",
};

/** Members printed inside trait and impl blocks. */
export const METHOD_TYPES: Record<"trait" | "impl", string[]> = {
  trait: ["function_item", "function_signature_item"],
  impl: ["function_item"],
};

/**
 * Nodes that sit between items without being items themselves. Doc comments
 * and outer attributes among them attach to the next item.
 */
export const TRIVIA_TYPES = new Set([
  "line_comment",
  "block_comment",
  "attribute_item",
  "inner_attribute_item",
]);

export function getDeclarationKind(nodeType: string): DeclarationKind {
  return DECLARATION_KINDS[nodeType] ?? "other";
}

export function getBodyField(nodeType: string): string | null | undefined {
  return BODY_FIELDS[nodeType];
}

export function isMethodType(container: "trait" | "impl", nodeType: string): boolean {
  return METHOD_TYPES[container].includes(nodeType);
}
