/**
 * Skeletonizer - print the declarations of a parsed Rust file without bodies.
 *
 * Preserves, in source order:
 * - Function signatures (visibility, qualifiers, generics, where-clauses)
 * - Struct and enum shapes, fields and variants included
 * - Trait and impl headers with their method signatures
 * - Doc comments, one `///` line each
 *
 * Items of any other kind are skipped without a trace.
 */

import type {
  Declaration,
  EnumDeclaration,
  EnumVariant,
  Fields,
  FunctionDeclaration,
  ImplDeclaration,
  MethodSignature,
  SourceTree,
  StructDeclaration,
  StructField,
  TraitDeclaration,
} from "./model";
import {
  formatBlockEnd,
  formatBlockHeader,
  formatDocLines,
  formatStatement,
  indent,
  visibilityTokens,
} from "./summary-formatter";
import {
  formatTokens,
  group,
  ident,
  punct,
  type TokenStream,
} from "./tokens";

export type LineWriter = (line: string) => void;

function fieldTokens(field: StructField): TokenStream {
  const tokens: TokenStream = [
    ...field.attributes,
    ...visibilityTokens(field.visibility),
  ];
  if (field.name !== null) {
    tokens.push(ident(field.name), punct(":"));
  }
  tokens.push(...field.type);
  return tokens;
}

/** `{ a : u8 , b : u8 }`, `(u8 , u8)`, or nothing for unit shapes. */
export function fieldsTokens(fields: Fields): TokenStream {
  if (fields.style === "unit") return [];

  const inner: TokenStream = [];
  fields.fields.forEach((field, index) => {
    if (index > 0) inner.push(punct(","));
    inner.push(...fieldTokens(field));
  });
  return [group(fields.style === "named" ? "brace" : "parenthesis", inner)];
}

export class Skeletonizer {
  constructor(private readonly write: LineWriter) {}

  /** Print every recognised declaration of `tree` at the given depth. */
  render(tree: SourceTree, depth = 0): void {
    for (const declaration of tree.declarations) {
      this.printDeclaration(declaration, depth);
    }
  }

  printDeclaration(declaration: Declaration, depth: number): void {
    switch (declaration.kind) {
      case "function":
        return this.printFunction(declaration, depth);
      case "struct":
        return this.printStruct(declaration, depth);
      case "enum":
        return this.printEnum(declaration, depth);
      case "trait":
        return this.printTrait(declaration, depth);
      case "impl":
        return this.printImpl(declaration, depth);
      case "other":
        return;
    }
  }

  private printDocs(docs: string[], depth: number): void {
    for (const line of formatDocLines(docs, depth)) {
      this.write(line);
    }
  }

  private printFunction(fn: FunctionDeclaration, depth: number): void {
    this.printDocs(fn.docs, depth);
    this.write(
      formatStatement(
        [...visibilityTokens(fn.visibility), ...fn.signature],
        depth,
      ),
    );
  }

  private printStruct(st: StructDeclaration, depth: number): void {
    this.printDocs(st.docs, depth);

    const tokens: TokenStream = [
      ...visibilityTokens(st.visibility),
      ident("struct"),
      ident(st.name),
      ...st.generics,
    ];

    // Unit structs end at `;` with the where-clause trailing it; the others
    // end with their field list and where-clause.
    if (st.fields.style === "unit") {
      tokens.push(punct(";"), ...st.whereClause);
    } else {
      tokens.push(...fieldsTokens(st.fields), ...st.whereClause);
    }
    this.write(`${indent(depth)}${formatTokens(tokens)}`);
  }

  private printEnum(en: EnumDeclaration, depth: number): void {
    this.printDocs(en.docs, depth);
    this.write(
      formatBlockHeader(
        [
          ...visibilityTokens(en.visibility),
          ident("enum"),
          ident(en.name),
          ...en.generics,
          ...en.whereClause,
        ],
        depth,
      ),
    );
    for (const variant of en.variants) {
      this.printVariant(variant, depth + 1);
    }
    this.write(formatBlockEnd(depth));
  }

  private printVariant(variant: EnumVariant, depth: number): void {
    this.printDocs(variant.docs, depth);
    const tokens: TokenStream = [
      ...variant.attributes,
      ident(variant.name),
      ...fieldsTokens(variant.fields),
    ];
    if (variant.discriminant) {
      tokens.push(punct("="), ...variant.discriminant);
    }
    this.write(`${indent(depth)}${formatTokens(tokens)}`);
  }

  private printTrait(tr: TraitDeclaration, depth: number): void {
    this.printDocs(tr.docs, depth);

    const header: TokenStream = [...visibilityTokens(tr.visibility)];
    if (tr.unsafety) header.push(ident("unsafe"));
    header.push(ident("trait"), ident(tr.name), ...tr.generics);
    if (tr.supertraits.length > 0) {
      header.push(punct(":"), ...tr.supertraits);
    }
    header.push(...tr.whereClause);

    this.write(formatBlockHeader(header, depth));
    this.printMethods(tr.methods, depth + 1);
    this.write(formatBlockEnd(depth));
  }

  private printImpl(im: ImplDeclaration, depth: number): void {
    this.printDocs(im.docs, depth);

    const header: TokenStream = [];
    if (im.unsafety) header.push(ident("unsafe"));
    header.push(ident("impl"), ...im.generics);
    if (im.traitPath) {
      if (im.negative) header.push(punct("!"));
      header.push(...im.traitPath, ident("for"));
    }
    header.push(...im.selfType, ...im.whereClause);

    this.write(formatBlockHeader(header, depth));
    this.printMethods(im.methods, depth + 1);
    this.write(formatBlockEnd(depth));
  }

  private printMethods(methods: MethodSignature[], depth: number): void {
    for (const method of methods) {
      this.printDocs(method.docs, depth);
      this.write(formatStatement(method.signature, depth));
    }
  }
}

/**
 * Convenience function to print a tree through a line writer.
 */
export function renderSkeleton(tree: SourceTree, write: LineWriter): void {
  new Skeletonizer(write).render(tree);
}
