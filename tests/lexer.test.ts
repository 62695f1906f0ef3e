import { describe, it, expect } from "vitest";
import { ScriptParseError } from "../src/errors";
import { Cursor } from "../src/lex/cursor";
import { Scanner, scanTopLevel } from "../src/lex/scanner";
import { stripJsComments, unescapeString } from "../src/lex/strings";

function topLevelPlus(src: string): number[] {
  const hits: number[] = [];
  scanTopLevel(src, (i, scanner) => {
    if (src[i] === "+" && scanner.isTopLevel()) hits.push(i);
  });
  return hits;
}

describe("scanner", () => {
  it("skips operators inside string literals", () => {
    expect(topLevelPlus("a+'b+c'+d")).toEqual([1, 7]);
  });

  it("skips operators inside brackets and templates", () => {
    expect(topLevelPlus("f(a+b)+[c+d]")).toEqual([6]);
    expect(topLevelPlus("`x${a+`y${b+c}`}`+z")).toEqual([17]);
  });

  it("treats a slash after an operand as division", () => {
    const scanner = new Scanner();
    const src = "a / b";
    let i = 0;
    while (i < src.length) i = scanner.advance(src, i);
    expect(scanner.inNormal()).toBe(true);
  });

  it("treats a slash after '=' or a keyword as a regex", () => {
    expect(topLevelPlus("x = /a+b/; y+z")).toEqual([12]);
    expect(topLevelPlus("return /+/.test(s)+1")).toEqual([18]);
  });

  it("does not treat a property named like a keyword as regex start", () => {
    expect(topLevelPlus("o.return /2+1")).toEqual([11]);
  });

  it("tracks bracket depth", () => {
    const scanner = new Scanner();
    const src = "f({a: [1";
    let i = 0;
    while (i < src.length) i = scanner.advance(src, i);
    expect([scanner.paren, scanner.brace, scanner.bracket]).toEqual([1, 1, 1]);
    expect(scanner.isTopLevel()).toBe(false);
  });

  it("stops the walk when the visitor returns a position", () => {
    const src = "a, b, c";
    expect(scanTopLevel(src, (i) => (src[i] === "," ? i : undefined))).toBe(1);
    expect(scanTopLevel("abc", () => undefined)).toBeUndefined();
  });

  it("ignores comment contents", () => {
    expect(topLevelPlus("a // +\n+b /* + */")).toEqual([7]);
  });
});

describe("cursor", () => {
  it("reads identifiers and keywords", () => {
    const cursor = new Cursor("letter let");
    expect(cursor.consumeKeyword("let")).toBe(false);
    expect(cursor.parseIdentifier()).toBe("letter");
    cursor.skipWs();
    expect(cursor.consumeKeyword("let")).toBe(true);
    expect(cursor.eof()).toBe(true);
  });

  it("skips whitespace and comments", () => {
    const cursor = new Cursor("  // note\n /* block */ x");
    cursor.skipWs();
    expect(cursor.peek()).toBe("x");
  });

  it("parses string literals with escapes", () => {
    const cursor = new Cursor("'it\\'s\\n' rest");
    expect(cursor.parseStringLiteral()).toBe("it's\n");
    expect(cursor.rest()).toBe(" rest");
  });

  it("reports an unclosed string", () => {
    expect(() => new Cursor("'abc").parseStringLiteral()).toThrow(
      "unclosed string literal"
    );
  });

  it("reports a missing expected char with its position", () => {
    const cursor = new Cursor("x");
    expect(() => cursor.expectChar("(")).toThrow("expected '(' at 0");
    try {
      cursor.expectChar("(");
    } catch (e) {
      expect(e).toBeInstanceOf(ScriptParseError);
      if (e instanceof ScriptParseError) expect(e.offset).toBe(0);
    }
  });

  it("reads a balanced block ignoring brackets in strings", () => {
    const cursor = new Cursor("(a, ')') + 1");
    expect(cursor.readBalancedBlock("(", ")")).toBe("a, ')'");
    expect(cursor.i).toBe(8);
  });

  it("reads nested balanced blocks", () => {
    const cursor = new Cursor("{ if (x) { y(); } }z");
    expect(cursor.readBalancedBlock("{", "}")).toBe(" if (x) { y(); } ");
    expect(cursor.peek()).toBe("z");
  });

  it("reports an unclosed block", () => {
    expect(() => new Cursor("(a, b").readBalancedBlock("(", ")")).toThrow(
      "unclosed block"
    );
  });
});

describe("string helpers", () => {
  it("strips comments but keeps strings and regexes", () => {
    expect(stripJsComments("a // c\nb /* d */ c")).toBe("a \nb   c");
    expect(stripJsComments("s = '//x'; r = /\\/*/")).toBe("s = '//x'; r = /\\/*/");
  });

  it("reports an unterminated block comment", () => {
    expect(() => stripJsComments("a /* b")).toThrow("unterminated block comment");
  });

  it("decodes escape sequences", () => {
    expect(unescapeString("a\\tb")).toBe("a\tb");
    expect(unescapeString("\\x41\\u0042\\u{43}")).toBe("ABC");
    expect(unescapeString("\\q")).toBe("q");
    expect(unescapeString("line\\\nnext")).toBe("linenext");
  });
});
