import type { TokenStream } from "./tokens";

export type Visibility =
  | { kind: "public" }
  /** `pub(crate)`, `pub(in path)`, legacy `crate`; kept verbatim */
  | { kind: "restricted"; clause: TokenStream }
  | { kind: "inherited" };

export interface StructField {
  /** Outer attributes, doc comments included as `#[doc = ...]` */
  attributes: TokenStream;
  visibility: Visibility;
  /** null for positional (tuple) fields */
  name: string | null;
  type: TokenStream;
}

export type Fields =
  | { style: "unit" }
  | { style: "named"; fields: StructField[] }
  | { style: "tuple"; fields: StructField[] };

export interface EnumVariant {
  docs: string[];
  /** Non-doc outer attributes such as `#[default]` */
  attributes: TokenStream;
  name: string;
  fields: Fields;
  discriminant: TokenStream | null;
}

export interface MethodSignature {
  docs: string[];
  name: string;
  /** Qualifiers, `fn`, name, generics, parameters, return type, where-clause */
  signature: TokenStream;
}

interface DeclarationBase {
  visibility: Visibility;
  name: string;
  generics: TokenStream;
  docs: string[];
}

export interface FunctionDeclaration extends DeclarationBase {
  kind: "function";
  signature: TokenStream;
}

export interface StructDeclaration extends DeclarationBase {
  kind: "struct";
  fields: Fields;
  whereClause: TokenStream;
}

export interface EnumDeclaration extends DeclarationBase {
  kind: "enum";
  variants: EnumVariant[];
  whereClause: TokenStream;
}

export interface TraitDeclaration extends DeclarationBase {
  kind: "trait";
  unsafety: boolean;
  /** Bounds after the colon, without it; empty when there are none */
  supertraits: TokenStream;
  whereClause: TokenStream;
  methods: MethodSignature[];
}

export interface ImplDeclaration extends DeclarationBase {
  kind: "impl";
  unsafety: boolean;
  /** `impl !Trait for Type` */
  negative: boolean;
  traitPath: TokenStream | null;
  selfType: TokenStream;
  whereClause: TokenStream;
  methods: MethodSignature[];
}

/** Any item the skeleton does not print (use, mod, const, macros...). */
export interface OtherDeclaration extends DeclarationBase {
  kind: "other";
  nodeType: string;
}

export type Declaration =
  | FunctionDeclaration
  | StructDeclaration
  | EnumDeclaration
  | TraitDeclaration
  | ImplDeclaration
  | OtherDeclaration;

export type DeclarationKind = Declaration["kind"];

export interface SourceTree {
  declarations: Declaration[];
}
