import { ErrorCode, throwParse } from "../errors";
import { isIdentChar, isIdentStart, isWhitespace } from "./chars";
import { Scanner } from "./scanner";
import { unescapeString } from "./strings";

/** Forward-only reader over one source slice. Offsets in errors are slice-relative. */
export class Cursor {
  i = 0;

  constructor(readonly src: string) {}

  eof(): boolean {
    return this.i >= this.src.length;
  }

  peek(offset = 0): string | undefined {
    return this.src[this.i + offset];
  }

  rest(): string {
    return this.src.slice(this.i);
  }

  consumeChar(ch: string): boolean {
    if (this.peek() !== ch) return false;
    this.i++;
    return true;
  }

  expectChar(ch: string): void {
    if (!this.consumeChar(ch)) {
      throwParse(ErrorCode.EXPECTED_CHAR, { ch, pos: this.i }, this.i);
    }
  }

  consumeAscii(token: string): boolean {
    if (!this.src.startsWith(token, this.i)) return false;
    this.i += token.length;
    return true;
  }

  expectAscii(token: string): void {
    if (!this.consumeAscii(token)) {
      throwParse(ErrorCode.EXPECTED_KEYWORD, { keyword: token, pos: this.i }, this.i);
    }
  }

  /** Consumes `word` only when it is not the prefix of a longer identifier. */
  consumeKeyword(word: string): boolean {
    if (!this.src.startsWith(word, this.i)) return false;
    if (isIdentChar(this.src[this.i + word.length])) return false;
    this.i += word.length;
    return true;
  }

  skipWs(): void {
    for (;;) {
      while (isWhitespace(this.peek())) this.i++;
      if (this.consumeAscii("//")) {
        while (!this.eof() && this.src[this.i] !== "\n") this.i++;
        continue;
      }
      if (this.consumeAscii("/*")) {
        const end = this.src.indexOf("*/", this.i);
        this.i = end < 0 ? this.src.length : end + 2;
        continue;
      }
      return;
    }
  }

  parseIdentifier(): string | undefined {
    const start = this.i;
    if (!isIdentStart(this.peek())) return undefined;
    this.i++;
    while (isIdentChar(this.peek())) this.i++;
    return this.src.slice(start, this.i);
  }

  parseStringLiteral(): string {
    const quote = this.peek();
    if (quote !== "'" && quote !== '"') {
      return throwParse(
        ErrorCode.EXPECTED_CHAR,
        { ch: "string literal", pos: this.i },
        this.i
      );
    }
    this.i++;
    const start = this.i;
    while (this.i < this.src.length) {
      const ch = this.src[this.i];
      if (ch === "\\") {
        this.i += 2;
        continue;
      }
      if (ch === quote) {
        const raw = this.src.slice(start, this.i);
        this.i++;
        return unescapeString(raw);
      }
      this.i++;
    }
    return throwParse(ErrorCode.UNCLOSED_STRING, {}, start - 1);
  }

  /**
   * Reads from an `open` character to its matching `close`, ignoring brackets
   * inside strings, templates, regexes and comments. Returns the inner text.
   */
  readBalancedBlock(open: string, close: string): string {
    const openedAt = this.i;
    this.expectChar(open);
    const start = this.i;
    const scanner = new Scanner();
    let depth = 1;
    let idx = this.i;
    while (idx < this.src.length) {
      const ch = this.src[idx];
      const wasNormal = scanner.inNormal();
      idx = scanner.advance(this.src, idx);
      if (!wasNormal) continue;
      if (ch === open) {
        depth++;
      } else if (ch === close) {
        depth--;
        if (depth === 0) {
          this.i = idx;
          return this.src.slice(start, idx - 1);
        }
      }
    }
    return throwParse(ErrorCode.UNCLOSED_BLOCK, {}, openedAt);
  }
}
