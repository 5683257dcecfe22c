import * as path from "node:path";
import { describe, expect, it } from "vitest";
import {
  type Declaration,
  displayPath,
  formatSkeletonHeader,
  renderSkeleton,
  type StructField,
  tokenize,
} from "../src/lib/skeleton";
import { docCommentLines, formatDocLines } from "../src/lib/skeleton/summary-formatter";

function render(...declarations: Declaration[]): string[] {
  const lines: string[] = [];
  renderSkeleton({ declarations }, (line) => lines.push(line));
  return lines;
}

const field = (name: string | null, type: string, pub = false): StructField => ({
  attributes: [],
  visibility: pub ? { kind: "public" } : { kind: "inherited" },
  name,
  type: tokenize(type),
});

describe("Skeletonizer", () => {
  it("prints a function signature with its docs and no body", () => {
    expect(
      render({
        kind: "function",
        visibility: { kind: "public" },
        name: "add",
        generics: [],
        docs: [" Adds two numbers."],
        signature: tokenize("fn add(a: i32, b: i32) -> i32"),
      }),
    ).toEqual([
      "///  Adds two numbers.",
      "pub fn add (a : i32 , b : i32) -> i32 ;",
    ]);
  });

  it("prints a unit struct without a field block", () => {
    expect(
      render({
        kind: "struct",
        visibility: { kind: "inherited" },
        name: "Marker",
        generics: [],
        docs: [],
        fields: { style: "unit" },
        whereClause: [],
      }),
    ).toEqual(["struct Marker ;"]);
  });

  it("ends a unit struct at `;` before its where-clause", () => {
    expect(
      render({
        kind: "struct",
        visibility: { kind: "inherited" },
        name: "S",
        generics: tokenize("<T>"),
        docs: [],
        fields: { style: "unit" },
        whereClause: tokenize("where T: Copy"),
      }),
    ).toEqual(["struct S < T > ; where T : Copy"]);
  });

  it("puts the where-clause after tuple fields", () => {
    expect(
      render({
        kind: "struct",
        visibility: { kind: "restricted", clause: tokenize("pub(crate)") },
        name: "Wrapper",
        generics: tokenize("<T>"),
        docs: [],
        fields: { style: "tuple", fields: [field(null, "T", true)] },
        whereClause: tokenize("where T: Clone"),
      }),
    ).toEqual(["pub (crate) struct Wrapper < T > (pub T) where T : Clone"]);
  });

  it("keeps named fields and their doc attributes inline", () => {
    const x: StructField = {
      ...field("x", "f64", true),
      attributes: tokenize("/// X coordinate."),
    };
    expect(
      render({
        kind: "struct",
        visibility: { kind: "public" },
        name: "Point",
        generics: [],
        docs: [],
        fields: { style: "named", fields: [x, field("y", "f64")] },
        whereClause: [],
      }),
    ).toEqual([
      'pub struct Point { # [doc = " X coordinate."] pub x : f64 , y : f64 }',
    ]);
  });

  it("prints variant docs above their variant, one level deeper", () => {
    expect(
      render({
        kind: "enum",
        visibility: { kind: "public" },
        name: "Shape",
        generics: [],
        docs: [],
        whereClause: [],
        variants: [
          {
            docs: [" A round shape."],
            attributes: [],
            name: "Circle",
            fields: { style: "tuple", fields: [field(null, "f64")] },
            discriminant: null,
          },
          {
            docs: [],
            attributes: [],
            name: "Empty",
            fields: { style: "unit" },
            discriminant: null,
          },
        ],
      }),
    ).toEqual([
      "pub enum Shape {",
      "    ///  A round shape.",
      "    Circle (f64)",
      "    Empty",
      "}",
    ]);
  });

  it("prints variant attributes and discriminants", () => {
    expect(
      render({
        kind: "enum",
        visibility: { kind: "inherited" },
        name: "Level",
        generics: [],
        docs: [],
        whereClause: [],
        variants: [
          {
            docs: [],
            attributes: tokenize("#[default]"),
            name: "Low",
            fields: { style: "unit" },
            discriminant: tokenize("1"),
          },
        ],
      }),
    ).toEqual(["enum Level {", "    # [default] Low = 1", "}"]);
  });

  it("prints a trait header with supertraits and its method signatures", () => {
    expect(
      render({
        kind: "trait",
        visibility: { kind: "public" },
        name: "Shape",
        generics: [],
        docs: [],
        unsafety: false,
        supertraits: tokenize("Debug + Clone"),
        whereClause: [],
        methods: [
          {
            docs: [" Area."],
            name: "area",
            signature: tokenize("fn area(&self) -> f64"),
          },
          {
            docs: [],
            name: "name",
            signature: tokenize("fn name(&self) -> String"),
          },
        ],
      }),
    ).toEqual([
      "pub trait Shape : Debug + Clone {",
      "    ///  Area.",
      "    fn area (& self) -> f64 ;",
      "    fn name (& self) -> String ;",
      "}",
    ]);
  });

  it("prints a generic trait impl", () => {
    expect(
      render({
        kind: "impl",
        visibility: { kind: "inherited" },
        name: "Wrapper < T >",
        generics: tokenize("<T>"),
        docs: [],
        unsafety: false,
        negative: false,
        traitPath: tokenize("Display"),
        selfType: tokenize("Wrapper<T>"),
        whereClause: tokenize("where T: Display"),
        methods: [
          {
            docs: [],
            name: "fmt",
            signature: tokenize(
              "fn fmt(&self, f: &mut fmt::Formatter<'_>) -> fmt::Result",
            ),
          },
        ],
      }),
    ).toEqual([
      "impl < T > Display for Wrapper < T > where T : Display {",
      "    fn fmt (& self , f : & mut fmt :: Formatter < '_ >) -> fmt :: Result ;",
      "}",
    ]);
  });

  it("prints impl methods without their visibility", () => {
    expect(
      render({
        kind: "impl",
        visibility: { kind: "inherited" },
        name: "Counter",
        generics: [],
        docs: [],
        unsafety: false,
        negative: false,
        traitPath: null,
        selfType: tokenize("Counter"),
        whereClause: [],
        methods: [
          {
            docs: [" Starts at zero."],
            name: "new",
            signature: tokenize("fn new() -> Self"),
          },
        ],
      }),
    ).toEqual([
      "impl Counter {",
      "    ///  Starts at zero.",
      "    fn new () -> Self ;",
      "}",
    ]);
  });

  it("prints unsafe and negative impls", () => {
    expect(
      render({
        kind: "impl",
        visibility: { kind: "inherited" },
        name: "Handle",
        generics: [],
        docs: [],
        unsafety: true,
        negative: true,
        traitPath: tokenize("Send"),
        selfType: tokenize("Handle"),
        whereClause: [],
        methods: [],
      }),
    ).toEqual(["unsafe impl ! Send for Handle {", "}"]);
  });

  it("skips other items and keeps source order", () => {
    const unit = (name: string): Declaration => ({
      kind: "struct",
      visibility: { kind: "inherited" },
      name,
      generics: [],
      docs: [],
      fields: { style: "unit" },
      whereClause: [],
    });
    expect(
      render(
        unit("First"),
        {
          kind: "other",
          nodeType: "use_declaration",
          visibility: { kind: "inherited" },
          name: "",
          generics: [],
          docs: [" Ignored."],
        },
        unit("Second"),
      ),
    ).toEqual(["struct First ;", "struct Second ;"]);
  });
});

describe("summary formatting", () => {
  it("shows header paths relative to the scan root", () => {
    const root = path.resolve("/work");
    expect(formatSkeletonHeader(root, path.join(root, "src", "lib.rs"))).toBe(
      `// ************* ${path.join("src", "lib.rs")}`,
    );
  });

  it("falls back to the absolute path outside the root", () => {
    const root = path.resolve("/work/a");
    const file = path.resolve("/work/b/c.rs");
    expect(displayPath(root, file)).toBe(file);
    expect(displayPath(file, file)).toBe(file);
  });

  it("keeps files whose names start with two dots inside the root", () => {
    const root = path.resolve("/work");
    expect(displayPath(root, path.join(root, "..hidden.rs"))).toBe("..hidden.rs");
    expect(displayPath(root, path.join(root, "..cfg", "a.rs"))).toBe(
      path.join("..cfg", "a.rs"),
    );
  });

  it("splits block docs and strips their gutter", () => {
    expect(docCommentLines("\n * First\n * Second\n ")).toEqual([
      " First",
      " Second",
    ]);
    expect(docCommentLines(" one line")).toEqual([" one line"]);
    expect(formatDocLines(["\n * First\n * Second\n "], 1)).toEqual([
      "    ///  First",
      "    ///  Second",
    ]);
  });
});
