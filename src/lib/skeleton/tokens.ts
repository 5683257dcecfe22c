/**
 * Token trees for Rust source fragments.
 *
 * Signatures, types and field lists are re-serialised from tokens rather than
 * copied from the source text, so layout and plain comments disappear while
 * doc comments survive as `#[doc = "..."]` attributes. Formatting follows the
 * canonical token-stream display: one space between tokens, compound
 * operators and lifetimes glued, `{ ... }` padded, `(...)` and `[...]` not.
 */

export type Delimiter = "parenthesis" | "bracket" | "brace";

export type TokenTree =
  | { kind: "ident"; text: string }
  | { kind: "punct"; char: string; joint: boolean }
  | { kind: "literal"; text: string }
  | { kind: "group"; delimiter: Delimiter; stream: TokenStream };

export type TokenStream = TokenTree[];

export const ident = (text: string): TokenTree => ({ kind: "ident", text });

export const punct = (char: string, joint = false): TokenTree => ({
  kind: "punct",
  char,
  joint,
});

export const literal = (text: string): TokenTree => ({ kind: "literal", text });

export const group = (delimiter: Delimiter, stream: TokenStream): TokenTree => ({
  kind: "group",
  delimiter,
  stream,
});

export function isPunct(tree: TokenTree | undefined, char: string): boolean {
  return tree?.kind === "punct" && tree.char === char;
}

export function isIdent(tree: TokenTree | undefined, text: string): boolean {
  return tree?.kind === "ident" && tree.text === text;
}

// Longest first.
const COMPOUND_OPERATORS = [
  "<<=",
  ">>=",
  "...",
  "..=",
  "::",
  "->",
  "=>",
  "==",
  "!=",
  "<=",
  ">=",
  "&&",
  "||",
  "+=",
  "-=",
  "*=",
  "/=",
  "%=",
  "^=",
  "&=",
  "|=",
  "<<",
  ">>",
  "..",
];

// Binary only after an operand; `&&T` and `<<T as A>::B as C>` are two tokens.
const OPERAND_SENSITIVE = new Set(["&&", "||", "<<", "<<="]);

const NON_OPERAND_KEYWORDS = new Set([
  "as",
  "const",
  "dyn",
  "for",
  "impl",
  "in",
  "move",
  "mut",
  "return",
  "where",
]);

const OPENERS: Record<string, Delimiter> = {
  "(": "parenthesis",
  "[": "bracket",
  "{": "brace",
};

const CLOSERS: Record<string, Delimiter> = {
  ")": "parenthesis",
  "]": "bracket",
  "}": "brace",
};

const IDENT = /(?:r#)?[\p{XID_Start}_]\p{XID_Continue}*/uy;
const IDENT_START = /[\p{XID_Start}_]/u;
const RAW_STRING_START = /(?:br|cr|r)(#*)"/y;
const PREFIXED_STRING_START = /[bc]"/y;
const SUFFIX = /\p{XID_Continue}*/uy;
const NUMBER_CHAR = /[0-9A-Za-z_]/;

interface Frame {
  delimiter: Delimiter | null;
  stream: TokenStream;
  /** Unclosed `<` seen in this group; a `>` while positive closes one. */
  angleDepth: number;
}

function isOperand(tree: TokenTree | undefined): boolean {
  if (!tree) return false;
  switch (tree.kind) {
    case "literal":
    case "group":
      return true;
    case "ident":
      return !tree.text.startsWith("'") && !NON_OPERAND_KEYWORDS.has(tree.text);
    case "punct":
      return false;
  }
}

export function quoteString(value: string): string {
  let out = '"';
  for (const ch of value) {
    switch (ch) {
      case "\\":
        out += "\\\\";
        break;
      case '"':
        out += '\\"';
        break;
      case "\n":
        out += "\\n";
        break;
      case "\r":
        out += "\\r";
        break;
      case "\t":
        out += "\\t";
        break;
      case "\0":
        out += "\\0";
        break;
      default:
        out += ch;
    }
  }
  return `${out}"`;
}

class Lexer {
  private pos = 0;
  private readonly stack: Frame[];

  constructor(private readonly source: string) {
    this.stack = [{ delimiter: null, stream: [], angleDepth: 0 }];
  }

  run(): TokenStream {
    const { source } = this;
    while (this.pos < source.length) {
      const ch = source[this.pos];

      if (/\s/.test(ch)) {
        this.pos++;
      } else if (source.startsWith("//", this.pos)) {
        this.lineComment();
      } else if (source.startsWith("/*", this.pos)) {
        this.blockComment();
      } else if (ch in OPENERS) {
        this.stack.push({ delimiter: OPENERS[ch], stream: [], angleDepth: 0 });
        this.pos++;
      } else if (ch in CLOSERS) {
        this.close(ch);
      } else if (ch === "'") {
        this.quote();
      } else if (ch === '"') {
        this.stringLiteral(this.pos);
      } else if (this.matchAt(RAW_STRING_START)) {
        this.rawString();
      } else if (this.matchAt(PREFIXED_STRING_START)) {
        this.stringLiteral(this.pos + 1);
      } else if (source.startsWith("b'", this.pos)) {
        this.charLiteral(this.pos + 1);
      } else if (ch >= "0" && ch <= "9") {
        this.number();
      } else if (this.matchAt(IDENT)) {
        this.identifier();
      } else {
        this.punctuation();
      }
    }

    // Unbalanced input: close whatever is still open.
    while (this.stack.length > 1) {
      this.popGroup();
    }
    return this.stack[0].stream;
  }

  private get frame(): Frame {
    return this.stack[this.stack.length - 1];
  }

  private emit(tree: TokenTree): void {
    this.frame.stream.push(tree);
  }

  private matchAt(pattern: RegExp): RegExpExecArray | null {
    pattern.lastIndex = this.pos;
    return pattern.exec(this.source);
  }

  private popGroup(): void {
    const done = this.stack.pop();
    if (!done || done.delimiter === null) return;
    this.emit(group(done.delimiter, done.stream));
  }

  private close(ch: string): void {
    this.pos++;
    if (this.frame.delimiter === CLOSERS[ch]) {
      this.popGroup();
    } else {
      this.emit(punct(ch));
    }
  }

  private emitDoc(value: string, inner: boolean): void {
    this.emit(punct("#"));
    if (inner) this.emit(punct("!"));
    this.emit(
      group("bracket", [ident("doc"), punct("="), literal(quoteString(value))]),
    );
  }

  private lineComment(): void {
    const end = this.source.indexOf("\n", this.pos);
    const stop = end === -1 ? this.source.length : end;
    const text = this.source.slice(this.pos, stop).replace(/\r$/, "");
    this.pos = stop;

    if (text.startsWith("///") && !text.startsWith("////")) {
      this.emitDoc(text.slice(3), false);
    } else if (text.startsWith("//!")) {
      this.emitDoc(text.slice(3), true);
    }
  }

  private blockComment(): void {
    const { source } = this;
    let depth = 1;
    let j = this.pos + 2;
    while (j < source.length && depth > 0) {
      if (source.startsWith("/*", j)) {
        depth++;
        j += 2;
      } else if (source.startsWith("*/", j)) {
        depth--;
        j += 2;
      } else {
        j++;
      }
    }
    const text = source.slice(this.pos, j);
    this.pos = j;

    if (text === "/**/" || text === "/***/") return;
    if (text.startsWith("/**") && !text.startsWith("/***")) {
      this.emitDoc(text.slice(3, -2), false);
    } else if (text.startsWith("/*!")) {
      this.emitDoc(text.slice(3, -2), true);
    }
  }

  /** `'a` (lifetime or label) or a character literal. */
  private quote(): void {
    const { source } = this;
    const next = source[this.pos + 1];
    if (next === "\\") {
      this.charLiteral(this.pos);
      return;
    }
    const codePoint = source.codePointAt(this.pos + 1);
    const width = codePoint !== undefined && codePoint > 0xffff ? 2 : 1;
    if (next !== undefined && source[this.pos + 1 + width] === "'") {
      this.charLiteral(this.pos);
      return;
    }
    if (next !== undefined && IDENT_START.test(next)) {
      IDENT.lastIndex = this.pos + 1;
      const match = IDENT.exec(source);
      const end = this.pos + 1 + (match ? match[0].length : 0);
      this.emit(ident(source.slice(this.pos, end)));
      this.pos = end;
      return;
    }
    this.emit(punct("'"));
    this.pos++;
  }

  private charLiteral(quoteAt: number): void {
    const { source } = this;
    let j = quoteAt + 1;
    while (j < source.length && source[j] !== "'") {
      j += source[j] === "\\" ? 2 : 1;
    }
    this.emitLiteral(Math.min(j + 1, source.length));
  }

  private stringLiteral(quoteAt: number): void {
    const { source } = this;
    let j = quoteAt + 1;
    while (j < source.length && source[j] !== '"') {
      j += source[j] === "\\" ? 2 : 1;
    }
    this.emitLiteral(Math.min(j + 1, source.length));
  }

  private rawString(): void {
    const match = this.matchAt(RAW_STRING_START);
    const hashes = match ? match[1] : "";
    const bodyStart = this.pos + (match ? match[0].length : 0);
    const terminator = `"${hashes}`;
    const end = this.source.indexOf(terminator, bodyStart);
    this.emitLiteral(end === -1 ? this.source.length : end + terminator.length);
  }

  /** Emit source[pos, end) plus any literal suffix (`1u8`, `"x"suffix`). */
  private emitLiteral(end: number): void {
    SUFFIX.lastIndex = end;
    const suffix = SUFFIX.exec(this.source);
    const stop = end + (suffix ? suffix[0].length : 0);
    this.emit(literal(this.source.slice(this.pos, stop)));
    this.pos = stop;
  }

  private number(): void {
    const { source } = this;
    const hex = source.startsWith("0x", this.pos);
    let j = this.pos;
    const digits = () => {
      while (j < source.length && NUMBER_CHAR.test(source[j])) {
        const ch = source[j++];
        if (!hex && (ch === "e" || ch === "E") && /[+-]/.test(source[j] ?? "")) {
          j++;
        }
      }
    };
    digits();
    const afterDot = source[j + 1];
    if (
      source[j] === "." &&
      afterDot !== "." &&
      !(afterDot !== undefined && IDENT_START.test(afterDot))
    ) {
      j++;
      digits();
    }
    this.emit(literal(source.slice(this.pos, j)));
    this.pos = j;
  }

  private identifier(): void {
    const match = this.matchAt(IDENT);
    const end = this.pos + (match ? match[0].length : 1);
    this.emit(ident(this.source.slice(this.pos, end)));
    this.pos = end;
  }

  private punctuation(): void {
    const { source, frame } = this;
    const ch = source[this.pos];

    if (ch === ">" && frame.angleDepth > 0) {
      frame.angleDepth--;
      this.emit(punct(">"));
      this.pos++;
      return;
    }

    let op = COMPOUND_OPERATORS.find((candidate) =>
      source.startsWith(candidate, this.pos),
    );
    if (
      op &&
      OPERAND_SENSITIVE.has(op) &&
      !isOperand(frame.stream[frame.stream.length - 1])
    ) {
      op = undefined;
    }

    if (op) {
      for (let k = 0; k < op.length; k++) {
        this.emit(punct(op[k], k < op.length - 1));
      }
      this.pos += op.length;
      return;
    }

    if (ch === "<") frame.angleDepth++;
    this.emit(punct(ch));
    this.pos++;
  }
}

/** Split a source fragment into token trees. Never fails. */
export function tokenize(source: string): TokenStream {
  return new Lexer(source).run();
}

function formatTree(tree: TokenTree): string {
  switch (tree.kind) {
    case "ident":
      return tree.text;
    case "punct":
      return tree.char;
    case "literal":
      return tree.text;
    case "group": {
      const inner = formatTokens(tree.stream);
      switch (tree.delimiter) {
        case "parenthesis":
          return `(${inner})`;
        case "bracket":
          return `[${inner}]`;
        case "brace":
          return inner ? `{ ${inner} }` : "{ }";
      }
    }
  }
}

/** Render tokens on one line using the token-stream spacing rule. */
export function formatTokens(stream: TokenStream): string {
  let out = "";
  let joint = false;
  stream.forEach((tree, index) => {
    if (index !== 0 && !joint) out += " ";
    joint = tree.kind === "punct" && tree.joint;
    out += formatTree(tree);
  });
  return out;
}

const SIMPLE_ESCAPES: Record<string, string> = {
  n: "\n",
  r: "\r",
  t: "\t",
  "\\": "\\",
  "0": "\0",
  "'": "'",
  '"': '"',
};

function isUnicodeScalar(codePoint: number): boolean {
  return (
    Number.isInteger(codePoint) &&
    codePoint >= 0 &&
    codePoint <= 0x10ffff &&
    (codePoint < 0xd800 || codePoint > 0xdfff)
  );
}

/**
 * Value of a string literal token (`"a\nb"`, `r#"raw"#`), or null when the
 * text is not a plain or raw string literal or holds an invalid escape.
 */
export function parseStringLiteral(text: string): string | null {
  const raw = /^r(#*)"([\s\S]*)"\1$/.exec(text);
  if (raw) return raw[2];

  if (!/^"[\s\S]*"$/.test(text) || text.length < 2) return null;
  const body = text.slice(1, -1);
  let out = "";
  for (let i = 0; i < body.length; i++) {
    const ch = body[i];
    if (ch !== "\\") {
      out += ch;
      continue;
    }
    const next = body[++i];
    if (next === undefined) break;
    if (next in SIMPLE_ESCAPES) {
      out += SIMPLE_ESCAPES[next];
    } else if (next === "x") {
      out += String.fromCharCode(Number.parseInt(body.slice(i + 1, i + 3), 16));
      i += 2;
    } else if (next === "u") {
      const close = body.indexOf("}", i);
      if (close === -1) return null;
      const codePoint = Number.parseInt(
        body.slice(i + 2, close).replace(/_/g, ""),
        16,
      );
      if (!isUnicodeScalar(codePoint)) return null;
      out += String.fromCodePoint(codePoint);
      i = close;
    } else if (next === "\n" || next === "\r") {
      // line continuation: skip the newline and leading whitespace
      while (i + 1 < body.length && /\s/.test(body[i + 1])) i++;
    } else {
      out += next;
    }
  }
  return out;
}
