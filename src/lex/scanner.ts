import {
  canStartRegexLiteral,
  identifierAllowsRegexStart,
  isIdentChar,
  isIdentStart,
  isWhitespace,
} from "./chars";

export type ScanMode =
  | { kind: "normal" }
  | { kind: "single" }
  | { kind: "double" }
  | { kind: "backtick" }
  | { kind: "templateExpr"; braceDepth: number }
  | { kind: "regex"; inClass: boolean }
  | { kind: "lineComment" }
  | { kind: "blockComment" };

const NORMAL: ScanMode = { kind: "normal" };

/**
 * Character-level classifier for JS source. Feeding positions through
 * `advance` tells callers whether they sit inside a string, template, regex or
 * comment, and how deep in brackets, without building a token stream.
 *
 * `advance` always returns an index past `i`; identifiers are consumed whole.
 */
export class Scanner {
  mode: ScanMode = NORMAL;
  private readonly modeStack: ScanMode[] = [];
  paren = 0;
  bracket = 0;
  brace = 0;
  previousSignificant: string | undefined = undefined;
  private previousIdentifierAllowsRegex = false;

  /** A scanner positioned just after the `${` of a template literal. */
  static insideTemplateExpr(): Scanner {
    const scanner = new Scanner();
    scanner.modeStack.push({ kind: "backtick" });
    scanner.mode = { kind: "templateExpr", braceDepth: 1 };
    return scanner;
  }

  get nesting(): number {
    return this.modeStack.length;
  }

  inNormal(): boolean {
    return this.mode.kind === "normal";
  }

  isTopLevel(): boolean {
    return (
      this.inNormal() && this.paren === 0 && this.bracket === 0 && this.brace === 0
    );
  }

  /** Records `text` as if it had been scanned as significant code. */
  consumeSignificant(text: string): void {
    for (const ch of text) this.noteSignificant(ch);
  }

  slashStartsCommentOrRegex(src: string, i: number): boolean {
    if (!this.inNormal() || src[i] !== "/") return false;
    const next = src[i + 1];
    if (next === "/" || next === "*") return true;
    return this.expectsOperand();
  }

  /**
   * True when the next token sits in operand position: a `/` there opens a
   * regex and a `+`/`-` there is a sign.
   */
  expectsOperand(): boolean {
    return (
      canStartRegexLiteral(this.previousSignificant) ||
      this.previousIdentifierAllowsRegex
    );
  }

  /** Postfix `++`/`--` ends an operand even though its last char is an operator. */
  markOperandEnd(): void {
    this.previousSignificant = ")";
    this.previousIdentifierAllowsRegex = false;
  }

  advance(src: string, i: number): number {
    const ch = src[i];
    switch (this.mode.kind) {
      case "normal":
        return this.advanceCode(src, i, ch);
      case "templateExpr":
        return this.advanceTemplateExpr(src, i, ch, this.mode.braceDepth);
      case "single":
        return this.advanceQuoted(src, i, ch, "'");
      case "double":
        return this.advanceQuoted(src, i, ch, '"');
      case "backtick":
        if (ch === "\\") return Math.min(i + 2, src.length);
        if (ch === "$" && src[i + 1] === "{") {
          this.pushMode({ kind: "templateExpr", braceDepth: 1 });
          return i + 2;
        }
        if (ch === "`") this.closeLiteral("`");
        return i + 1;
      case "lineComment":
        if (ch === "\n" || ch === "\r") this.popMode();
        return i + 1;
      case "blockComment":
        if (ch === "*" && src[i + 1] === "/") {
          this.popMode();
          return i + 2;
        }
        return i + 1;
      case "regex":
        return this.advanceRegex(src, i, ch, this.mode.inClass);
    }
  }

  private advanceQuoted(src: string, i: number, ch: string, quote: string): number {
    if (ch === "\\") return Math.min(i + 2, src.length);
    if (ch === quote) this.closeLiteral(quote);
    return i + 1;
  }

  private advanceRegex(src: string, i: number, ch: string, inClass: boolean): number {
    if (ch === "\\") return Math.min(i + 2, src.length);
    if (ch === "[") {
      this.mode = { kind: "regex", inClass: true };
    } else if (ch === "]" && inClass) {
      this.mode = { kind: "regex", inClass: false };
    } else if (ch === "/" && !inClass) {
      this.closeLiteral("/");
    }
    return i + 1;
  }

  /** Shared by normal code and `${...}` bodies; undefined leaves `ch` to the caller. */
  private advanceCommon(src: string, i: number, ch: string): number | undefined {
    if (isWhitespace(ch)) return i + 1;
    if (isIdentStart(ch)) {
      let end = i + 1;
      while (end < src.length && isIdentChar(src[end])) end++;
      const prev = this.previousSignificant;
      this.previousSignificant = src[end - 1];
      this.previousIdentifierAllowsRegex = identifierAllowsRegexStart(
        src.slice(i, end),
        prev
      );
      return end;
    }
    switch (ch) {
      case "'":
        this.openLiteral({ kind: "single" });
        return i + 1;
      case '"':
        this.openLiteral({ kind: "double" });
        return i + 1;
      case "`":
        this.openLiteral({ kind: "backtick" });
        return i + 1;
      case "/": {
        const next = src[i + 1];
        if (next === "/") {
          this.pushMode({ kind: "lineComment" });
          return i + 2;
        }
        if (next === "*") {
          this.pushMode({ kind: "blockComment" });
          return i + 2;
        }
        if (this.expectsOperand()) {
          this.openLiteral({ kind: "regex", inClass: false });
          return i + 1;
        }
        this.noteSignificant("/");
        return i + 1;
      }
      default:
        return undefined;
    }
  }

  private advanceCode(src: string, i: number, ch: string): number {
    const common = this.advanceCommon(src, i, ch);
    if (common !== undefined) return common;
    this.noteSignificant(ch);
    return i + 1;
  }

  private advanceTemplateExpr(
    src: string,
    i: number,
    ch: string,
    braceDepth: number
  ): number {
    const common = this.advanceCommon(src, i, ch);
    if (common !== undefined) return common;
    if (ch === "{") {
      this.noteSignificant("{");
      this.mode = { kind: "templateExpr", braceDepth: braceDepth + 1 };
    } else if (ch === "}" && braceDepth === 1) {
      this.closeLiteral("}");
    } else if (ch === "}") {
      this.noteSignificant("}");
      this.mode = { kind: "templateExpr", braceDepth: braceDepth - 1 };
    } else {
      this.noteSignificant(ch);
    }
    return i + 1;
  }

  private noteSignificant(ch: string): void {
    switch (ch) {
      case "(":
        this.paren++;
        break;
      case ")":
        this.paren = Math.max(0, this.paren - 1);
        break;
      case "[":
        this.bracket++;
        break;
      case "]":
        this.bracket = Math.max(0, this.bracket - 1);
        break;
      case "{":
        this.brace++;
        break;
      case "}":
        this.brace = Math.max(0, this.brace - 1);
        break;
    }
    this.previousSignificant = ch;
    this.previousIdentifierAllowsRegex = false;
  }

  private openLiteral(mode: ScanMode): void {
    this.pushMode(mode);
    this.previousIdentifierAllowsRegex = false;
  }

  private closeLiteral(last: string): void {
    this.popMode();
    this.previousSignificant = last;
    this.previousIdentifierAllowsRegex = false;
  }

  private pushMode(next: ScanMode): void {
    this.modeStack.push(this.mode);
    this.mode = next;
  }

  private popMode(): void {
    this.mode = this.modeStack.pop() ?? NORMAL;
  }
}

/**
 * Walks `src` and calls `visit` for every position that starts in normal code
 * (outside strings, comments and regexes), before the scanner consumes it.
 * Returning a number from `visit` stops the walk with that result.
 */
export function scanTopLevel(
  src: string,
  visit: (i: number, scanner: Scanner) => number | void,
  scanner: Scanner = new Scanner()
): number | undefined {
  let i = 0;
  while (i < src.length) {
    if (scanner.inNormal()) {
      const stop = visit(i, scanner);
      if (typeof stop === "number") return stop;
    }
    i = scanner.advance(src, i);
  }
  return undefined;
}
