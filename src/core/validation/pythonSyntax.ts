import { parser } from "@lezer/python";

export interface PythonSyntaxError {
  /** 1-based line of the first error. */
  line: number;
  message: string;
}

/**
 * Report the first syntax error in Python source, or null.
 *
 * Two passes run over the code. A line scanner checks what the Lezer grammar
 * recovers from silently: indentation, unterminated strings, print
 * statements and assignments to literals. Lezer then parses the scanner's
 * normalized copy of the source, where a parenthesized `with` header is
 * flattened into the form the grammar accepts. The earlier of the two errors
 * wins, the scanner's on a tie.
 */
export function findSyntaxError(source: string): PythonSyntaxError | null {
  const scan = new SourceScanner(source).scan();
  const treeError = findErrorNode(scan.normalized);

  if (scan.error && (!treeError || scan.error.line <= treeError.line)) {
    return scan.error;
  }
  return treeError;
}

// ── Lezer pass ──────────────────────────────────────────────────────

function findErrorNode(source: string): PythonSyntaxError | null {
  const cursor = parser.parse(source).cursor();
  do {
    if (cursor.type.isError) {
      return {
        line: lineAt(source, cursor.from),
        message: describe(source, cursor.from, cursor.to),
      };
    }
  } while (cursor.next());

  return null;
}

function lineAt(source: string, offset: number): number {
  let line = 1;
  for (let i = 0; i < offset && i < source.length; i++) {
    if (source.charCodeAt(i) === 10) line++;
  }
  return line;
}

function describe(source: string, from: number, to: number): string {
  if (from >= source.trimEnd().length) {
    return "unexpected end of input";
  }
  const text = (to > from ? source.slice(from, to) : source.slice(from, from + 1)).split("\n")[0] ?? "";
  return text.trim() ? `invalid syntax near '${text.trim()}'` : "invalid syntax";
}

// ── Line scanner ────────────────────────────────────────────────────

interface Token {
  kind: "name" | "number" | "string" | "op";
  text: string;
  line: number;
  start: number;
  /** Bracket depth outside the token; an opening bracket and its match share one. */
  depth: number;
}

interface Edit {
  at: number;
  length: number;
  text: string;
}

interface ScanResult {
  error: PythonSyntaxError | null;
  normalized: string;
}

const OPERATORS = [
  "**=", "//=", ">>=", "<<=", "...",
  "**", "//", "<<", ">>", "<=", ">=", "==", "!=", "->", ":=",
  "+=", "-=", "*=", "/=", "%=", "&=", "|=", "^=", "@=",
];
const OPENING = new Set(["(", "[", "{"]);
const CLOSING = new Set([")", "]", "}"]);
const STRING_PREFIXES = new Set(["r", "u", "b", "f", "br", "rb", "fr", "rf"]);
const NAME = /[\p{L}_][\p{L}\p{N}\p{Mn}\p{Mc}_]*/uy;
const NUMBER = /0[xXoObB][\da-fA-F_]+|(?:\d[\d_]*\.?[\d_]*|\.\d[\d_]*)(?:[eE][+-]?\d[\d_]*)?[jJ]?/y;
// `print in xs`, `print if a else b` and the like are expressions, not print statements.
const OPERATOR_KEYWORDS = new Set(["in", "not", "is", "and", "or", "if", "else", "for"]);
const CONSTANTS = new Set(["True", "False", "None"]);

class SourceScanner {
  private pos = 0;
  private line = 1;
  private depth = 0;
  private readonly indents = [0];
  private expectIndent = false;
  private tokens: Token[] = [];
  private bracketNewlines: number[] = [];
  private bracketComments: Array<{ start: number; end: number }> = [];
  private readonly edits: Edit[] = [];

  constructor(private readonly source: string) {}

  scan(): ScanResult {
    const error = this.run();
    return { error, normalized: applyEdits(this.source, this.edits) };
  }

  private run(): PythonSyntaxError | null {
    const src = this.source;
    let atLineStart = true;

    while (this.pos < src.length) {
      if (atLineStart) {
        const indent = this.readIndent();
        if (this.atBlankLine()) {
          this.skipLine();
          continue;
        }
        const error = this.checkIndent(indent);
        if (error) return error;
        atLineStart = false;
        continue;
      }

      const ch = src.charAt(this.pos);

      if (ch === "#") {
        const newline = src.indexOf("\n", this.pos);
        const end = newline < 0 ? src.length : newline;
        if (this.depth > 0) this.bracketComments.push({ start: this.pos, end });
        this.pos = end;
        continue;
      }

      if (ch === "\\" && (src.startsWith("\n", this.pos + 1) || src.startsWith("\r\n", this.pos + 1))) {
        this.pos = src.indexOf("\n", this.pos) + 1;
        this.line++;
        continue;
      }

      if (ch === "\n") {
        if (this.depth > 0) {
          this.bracketNewlines.push(this.pos);
        } else {
          const error = this.endLogicalLine(this.pos);
          if (error) return error;
          atLineStart = true;
        }
        this.pos++;
        this.line++;
        continue;
      }

      if (ch === " " || ch === "\t" || ch === "\r" || ch === "\f") {
        this.pos++;
        continue;
      }

      if (ch === '"' || ch === "'") {
        const error = this.readString(this.pos, this.pos);
        if (error) return error;
        continue;
      }

      NAME.lastIndex = this.pos;
      const name = NAME.exec(src);
      if (name) {
        const end = this.pos + name[0].length;
        const next = src.charAt(end);
        if ((next === '"' || next === "'") && STRING_PREFIXES.has(name[0].toLowerCase())) {
          const error = this.readString(this.pos, end);
          if (error) return error;
        } else {
          this.addToken("name", name[0], end);
        }
        continue;
      }

      NUMBER.lastIndex = this.pos;
      const number = NUMBER.exec(src);
      if (number) {
        this.addToken("number", number[0], this.pos + number[0].length);
        continue;
      }

      const op = OPERATORS.find((candidate) => src.startsWith(candidate, this.pos)) ?? ch;
      if (CLOSING.has(op)) {
        this.depth = Math.max(0, this.depth - 1);
      }
      this.addToken("op", op, this.pos + op.length);
      if (OPENING.has(op)) {
        this.depth++;
      }
    }

    const error = this.endLogicalLine(src.length);
    if (error) return error;
    if (this.expectIndent) {
      return { line: this.line, message: "expected an indented block" };
    }
    return null;
  }

  private addToken(kind: Token["kind"], text: string, end: number, line = this.line, start = this.pos): void {
    this.tokens.push({ kind, text, line, start, depth: this.depth });
    this.pos = end;
  }

  private readIndent(): number {
    let width = 0;
    for (;;) {
      const ch = this.source.charAt(this.pos);
      if (ch === " ") {
        width++;
      } else if (ch === "\t") {
        width = width - (width % 8) + 8;
      } else if (ch === "\f") {
        width = 0;
      } else {
        return width;
      }
      this.pos++;
    }
  }

  private atBlankLine(): boolean {
    const ch = this.source.charAt(this.pos);
    return ch === "" || ch === "\n" || ch === "\r" || ch === "#";
  }

  private skipLine(): void {
    const newline = this.source.indexOf("\n", this.pos);
    if (newline < 0) {
      this.pos = this.source.length;
      return;
    }
    this.pos = newline + 1;
    this.line++;
  }

  private get currentIndent(): number {
    return this.indents[this.indents.length - 1] ?? 0;
  }

  private checkIndent(indent: number): PythonSyntaxError | null {
    const expected = this.expectIndent;
    this.expectIndent = false;

    if (indent > this.currentIndent) {
      if (!expected) {
        return { line: this.line, message: "unexpected indent" };
      }
      this.indents.push(indent);
      return null;
    }
    if (expected) {
      return { line: this.line, message: "expected an indented block" };
    }

    while (this.indents.length > 1 && indent < this.currentIndent) {
      this.indents.pop();
    }
    if (indent !== this.currentIndent) {
      return { line: this.line, message: "unindent does not match any outer indentation level" };
    }
    return null;
  }

  /** Read a string literal whose prefix starts at `start` and whose quotes start at `quoteStart`. */
  private readString(start: number, quoteStart: number): PythonSyntaxError | null {
    const src = this.source;
    const quote = src.charAt(quoteStart);
    const triple = src.startsWith(quote.repeat(3), quoteStart);
    const delimiter = triple ? quote.repeat(3) : quote;
    const startLine = this.line;

    let i = quoteStart + delimiter.length;
    while (i < src.length) {
      const ch = src.charAt(i);
      if (ch === "\\") {
        const escaped = src.startsWith("\r\n", i + 1) ? 2 : 1;
        if (src.charAt(i + escaped) === "\n") this.line++;
        i += 1 + escaped;
        continue;
      }
      if (src.startsWith(delimiter, i)) {
        const end = i + delimiter.length;
        this.addToken("string", src.slice(start, end), end, startLine, start);
        return null;
      }
      if (ch === "\n") {
        if (!triple) break;
        this.line++;
      }
      i++;
    }

    return {
      line: startLine,
      message: triple ? "unterminated triple-quoted string literal" : "unterminated string literal",
    };
  }

  private endLogicalLine(endOffset: number): PythonSyntaxError | null {
    const tokens = this.tokens;
    const newlines = this.bracketNewlines;
    const comments = this.bracketComments;
    this.tokens = [];
    this.bracketNewlines = [];
    this.bracketComments = [];

    const last = tokens[tokens.length - 1];
    if (!last) return null;

    this.expectIndent = last.kind === "op" && last.text === ":";
    this.flattenWithHeader(tokens, newlines, comments, endOffset);
    return checkPrintStatement(tokens) ?? checkAssignmentTargets(tokens);
  }

  /**
   * Rewrite `with (a as b, c as d,):` to `with  a as b, c as d  :`. The
   * header's inner line breaks move to the end of the logical line so later
   * lines keep their numbers; comments inside the parentheses are blanked.
   */
  private flattenWithHeader(
    tokens: Token[],
    newlines: number[],
    comments: Array<{ start: number; end: number }>,
    endOffset: number,
  ): void {
    const keywordIndex = tokens[0]?.text === "async" ? 1 : 0;
    const keyword = tokens[keywordIndex];
    const open = tokens[keywordIndex + 1];
    if (keyword?.kind !== "name" || keyword.text !== "with" || open?.kind !== "op" || open.text !== "(") {
      return;
    }

    const closeIndex = tokens.findIndex(
      (token, i) => i > keywordIndex + 1 && token.kind === "op" && token.text === ")" && token.depth === open.depth,
    );
    const close = tokens[closeIndex];
    const colon = tokens[closeIndex + 1];
    if (closeIndex < 0 || !close || colon?.kind !== "op" || colon.text !== ":") {
      return;
    }

    const inHeader = (offset: number) => offset > open.start && offset < close.start;
    const moved = newlines.filter(inHeader);
    this.edits.push({ at: open.start, length: 1, text: " " }, { at: close.start, length: 1, text: " " });

    const trailing = tokens[closeIndex - 1];
    if (trailing?.kind === "op" && trailing.text === "," && trailing.depth === open.depth + 1) {
      this.edits.push({ at: trailing.start, length: 1, text: " " });
    }
    for (const offset of moved) {
      this.edits.push({ at: offset, length: 1, text: " " });
    }
    for (const comment of comments.filter((c) => inHeader(c.start))) {
      const length = comment.end - comment.start;
      this.edits.push({ at: comment.start, length, text: " ".repeat(length) });
    }
    if (moved.length > 0) {
      this.edits.push({ at: endOffset, length: 0, text: "\n".repeat(moved.length) });
    }
  }
}

function checkPrintStatement(tokens: Token[]): PythonSyntaxError | null {
  const [first, second] = tokens;
  if (first?.kind !== "name" || first.text !== "print" || !second) {
    return null;
  }
  const operand =
    second.kind === "string" ||
    second.kind === "number" ||
    (second.kind === "name" && !OPERATOR_KEYWORDS.has(second.text));
  return operand
    ? { line: first.line, message: "Missing parentheses in call to 'print'. Did you mean print(...)?" }
    : null;
}

function checkAssignmentTargets(tokens: Token[]): PythonSyntaxError | null {
  let target: Token[] = [];
  for (const token of tokens) {
    if (token.kind === "op" && token.text === "=" && token.depth === 0) {
      const error = checkTarget(target);
      if (error) return error;
      target = [];
    } else {
      target.push(token);
    }
  }
  return null;
}

function checkTarget(target: Token[]): PythonSyntaxError | null {
  const [only] = target;
  if (!only || target.length !== 1) return null;

  if (only.kind === "number" || only.kind === "string") {
    return { line: only.line, message: "cannot assign to literal" };
  }
  if (only.kind === "name" && CONSTANTS.has(only.text)) {
    return { line: only.line, message: `cannot assign to ${only.text}` };
  }
  return null;
}

function applyEdits(source: string, edits: Edit[]): string {
  let result = "";
  let cursor = 0;
  for (const edit of [...edits].sort((a, b) => a.at - b.at)) {
    result += source.slice(cursor, edit.at) + edit.text;
    cursor = edit.at + edit.length;
  }
  return result + source.slice(cursor);
}
