/**
 * Build the declaration model from a Rust syntax tree.
 *
 * Only the shape of each item is read; bodies are never visited. Doc
 * comments and outer attributes are siblings of the item they annotate, so
 * they are collected while walking a node list and handed to the next item.
 */

import type { Node } from "web-tree-sitter";

import {
  getBodyField,
  getDeclarationKind,
  isMethodType,
  TRIVIA_TYPES,
} from "../skeleton/body-fields";
import type {
  Declaration,
  EnumVariant,
  Fields,
  MethodSignature,
  SourceTree,
  StructField,
  Visibility,
} from "../skeleton/model";
import {
  formatTokens,
  isIdent,
  isPunct,
  parseStringLiteral,
  tokenize,
  type TokenStream,
} from "../skeleton/tokens";

/** Doc comments and attributes waiting for the item they belong to. */
export interface Attached {
  docs: string[];
  /** Every outer attribute, doc comments as `#[doc = ...]` */
  attributes: TokenStream;
  /** Outer attributes other than docs */
  plainAttributes: TokenStream;
}

const emptyAttached = (): Attached => ({
  docs: [],
  attributes: [],
  plainAttributes: [],
});

export function childrenOf(node: Node): Node[] {
  return node.children.filter((child): child is Node => child !== null);
}

function childOfType(node: Node, type: string): Node | undefined {
  return childrenOf(node).find((child) => child.type === type);
}

function tokensOf(node: Node | null | undefined): TokenStream {
  return node ? tokenize(node.text) : [];
}

/** Value of `#[doc = "..."]` (or `/// ...`, once tokenised), else null. */
export function docAttributeValue(tokens: TokenStream): string | null {
  if (tokens.length !== 2 || !isPunct(tokens[0], "#")) return null;
  const body = tokens[1];
  if (body.kind !== "group" || body.delimiter !== "bracket") return null;
  if (body.stream.length !== 3) return null;
  const [name, eq, value] = body.stream;
  if (!isIdent(name, "doc") || !isPunct(eq, "=") || value.kind !== "literal") {
    return null;
  }
  return parseStringLiteral(value.text);
}

/**
 * Record a comment or attribute node. Plain comments and inner attributes
 * (`//!`, `#![...]`) attach to nothing.
 */
function attach(pending: Attached, node: Node): void {
  if (node.type === "inner_attribute_item") return;

  const tokens = tokenize(node.text);
  // Plain comments tokenise to nothing; inner docs start with `# !`.
  if (tokens.length === 0 || isPunct(tokens[1], "!")) return;

  const doc = docAttributeValue(tokens);
  pending.attributes.push(...tokens);
  if (doc !== null) {
    pending.docs.push(doc);
  } else {
    pending.plainAttributes.push(...tokens);
  }
}

/**
 * Walk a node list, passing each named non-trivia node together with the
 * docs and attributes that precede it.
 */
function collect<T>(
  nodes: Node[],
  build: (node: Node, attached: Attached) => T | null,
): T[] {
  const results: T[] = [];
  let pending = emptyAttached();

  for (const node of nodes) {
    if (TRIVIA_TYPES.has(node.type)) {
      attach(pending, node);
      continue;
    }
    if (!node.isNamed) continue;

    const result = build(node, pending);
    if (result !== null) results.push(result);
    pending = emptyAttached();
  }

  return results;
}

export function visibilityOf(node: Node): Visibility {
  const modifier = childOfType(node, "visibility_modifier");
  if (!modifier) return { kind: "inherited" };

  const clause = tokenize(modifier.text);
  if (clause.length === 1 && isIdent(clause[0], "pub")) {
    return { kind: "public" };
  }
  return { kind: "restricted", clause };
}

/**
 * Everything between the visibility modifier and the body: qualifiers,
 * `fn`, name, generics, parameters, return type and where-clause.
 */
export function signatureTokens(node: Node): TokenStream {
  const bodyField = getBodyField(node.type);
  const body =
    typeof bodyField === "string" ? node.childForFieldName(bodyField) : null;

  const parts = childrenOf(node)
    .filter(
      (child) =>
        child.type !== "visibility_modifier" &&
        child.type !== ";" &&
        (body === null || child.startIndex !== body.startIndex),
    )
    .map((child) => child.text);

  // Newline-joined so a trailing line comment cannot swallow the next part.
  return tokenize(parts.join("\n"));
}

function nameOf(node: Node): string {
  return node.childForFieldName("name")?.text ?? "";
}

function namedFields(list: Node): StructField[] {
  return collect(childrenOf(list), (node, attached) => {
    if (node.type !== "field_declaration") return null;
    return {
      attributes: attached.attributes,
      visibility: visibilityOf(node),
      name: nameOf(node),
      type: tokensOf(node.childForFieldName("type")),
    };
  });
}

/** Tuple fields are not wrapped in a node of their own. */
function tupleFields(list: Node): StructField[] {
  const fields: StructField[] = [];
  let pending = emptyAttached();
  let visibility: Visibility = { kind: "inherited" };

  for (const node of childrenOf(list)) {
    if (TRIVIA_TYPES.has(node.type)) {
      attach(pending, node);
    } else if (node.type === "visibility_modifier") {
      const clause = tokenize(node.text);
      visibility =
        clause.length === 1 && isIdent(clause[0], "pub")
          ? { kind: "public" }
          : { kind: "restricted", clause };
    } else if (node.isNamed) {
      fields.push({
        attributes: pending.attributes,
        visibility,
        name: null,
        type: tokenize(node.text),
      });
      pending = emptyAttached();
      visibility = { kind: "inherited" };
    }
  }

  return fields;
}

export function fieldsOf(body: Node | null): Fields {
  if (!body) return { style: "unit" };
  switch (body.type) {
    case "field_declaration_list":
      return { style: "named", fields: namedFields(body) };
    case "ordered_field_declaration_list":
      return { style: "tuple", fields: tupleFields(body) };
    default:
      return { style: "unit" };
  }
}

/**
 * `struct S<T> where T: Copy;` is valid Rust that the grammar only accepts
 * with a where-clause before `{` or after `(...)`. It recovers as a bodiless
 * `struct_item` ending in `;` whose single ERROR child holds the clause.
 */
export function unitWhereClause(node: Node): Node | null {
  if (node.type !== "struct_item" || node.childForFieldName("body")) {
    return null;
  }
  const children = childrenOf(node);
  const errors = children.filter((child) => child.type === "ERROR");
  if (errors.length !== 1 || !node.text.trimEnd().endsWith(";")) return null;
  if (children.some((child) => child.isMissing)) return null;

  const [error] = errors;
  return isIdent(tokenize(error.text)[0], "where") ? error : null;
}

function whereClauseOf(node: Node): TokenStream {
  const clause = childOfType(node, "where_clause");
  if (clause) return tokenize(clause.text);

  const recovered = unitWhereClause(node);
  if (!recovered) return [];
  const tokens = tokenize(recovered.text);
  return isPunct(tokens[tokens.length - 1], ";") ? tokens.slice(0, -1) : tokens;
}

function variantsOf(list: Node | null): EnumVariant[] {
  if (!list) return [];
  return collect(childrenOf(list), (node, attached) => {
    if (node.type !== "enum_variant") return null;
    const value = node.childForFieldName("value");
    return {
      docs: attached.docs,
      attributes: attached.plainAttributes,
      name: nameOf(node),
      fields: fieldsOf(node.childForFieldName("body")),
      discriminant: value ? tokenize(value.text) : null,
    };
  });
}

function methodsOf(
  container: "trait" | "impl",
  body: Node | null,
): MethodSignature[] {
  if (!body) return [];
  return collect(childrenOf(body), (node, attached) => {
    if (!isMethodType(container, node.type)) return null;
    return {
      docs: attached.docs,
      name: nameOf(node),
      signature: signatureTokens(node),
    };
  });
}

function supertraitsOf(node: Node): TokenStream {
  const bounds = tokensOf(node.childForFieldName("bounds"));
  return isPunct(bounds[0], ":") ? bounds.slice(1) : bounds;
}

export function buildDeclaration(node: Node, attached: Attached): Declaration {
  const base = {
    visibility: visibilityOf(node),
    name: nameOf(node),
    generics: tokensOf(node.childForFieldName("type_parameters")),
    docs: attached.docs,
  };
  const kind = getDeclarationKind(node.type);

  switch (kind) {
    case "function":
      return { ...base, kind, signature: signatureTokens(node) };
    case "struct":
      return {
        ...base,
        kind,
        fields: fieldsOf(node.childForFieldName("body")),
        whereClause: whereClauseOf(node),
      };
    case "enum":
      return {
        ...base,
        kind,
        variants: variantsOf(node.childForFieldName("body")),
        whereClause: whereClauseOf(node),
      };
    case "trait":
      return {
        ...base,
        kind,
        unsafety: childOfType(node, "unsafe") !== undefined,
        supertraits: supertraitsOf(node),
        whereClause: whereClauseOf(node),
        methods: methodsOf("trait", node.childForFieldName("body")),
      };
    case "impl": {
      const traitNode = node.childForFieldName("trait");
      const selfType = tokensOf(node.childForFieldName("type"));
      return {
        ...base,
        kind,
        name: formatTokens(selfType),
        unsafety: childOfType(node, "unsafe") !== undefined,
        negative: traitNode !== null && childOfType(node, "!") !== undefined,
        traitPath: traitNode ? tokenize(traitNode.text) : null,
        selfType,
        whereClause: whereClauseOf(node),
        methods: methodsOf("impl", node.childForFieldName("body")),
      };
    }
    case "other":
      return { ...base, kind, nodeType: node.type };
  }
}

/** Top-level declarations of a parsed file, in source order. */
export function buildSourceTree(root: Node): SourceTree {
  return { declarations: collect(childrenOf(root), buildDeclaration) };
}
