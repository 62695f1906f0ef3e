import { describe, it, expect } from "vitest";
import type { Expr } from "../src/ast";
import { ErrorCode, ScriptParseError } from "../src/errors";
import {
  parseExpr,
  parseScript,
  parseScriptHandler,
  tryParseExpr,
} from "../src/parser";

const v = (name: string): Expr => ({ kind: "Var", name });
const n = (value: number): Expr => ({ kind: "Number", value });

describe("expression precedence", () => {
  it("folds + runs into one Add and - pairwise", () => {
    expect(parseExpr("a + b - c + d")).toEqual({
      kind: "Add",
      operands: [
        {
          kind: "Binary",
          op: "Sub",
          left: { kind: "Add", operands: [v("a"), v("b")] },
          right: v("c"),
        },
        v("d"),
      ],
    });
    expect(parseExpr("a + b + c")).toEqual({
      kind: "Add",
      operands: [v("a"), v("b"), v("c")],
    });
  });

  it("binds * tighter than +", () => {
    expect(parseExpr("1 + 2 * 3")).toEqual({
      kind: "Add",
      operands: [n(1), { kind: "Binary", op: "Mul", left: n(2), right: n(3) }],
    });
  });

  it("makes ** right associative", () => {
    expect(parseExpr("2 ** 3 ** 2")).toEqual({
      kind: "Binary",
      op: "Pow",
      left: n(2),
      right: { kind: "Binary", op: "Pow", left: n(3), right: n(2) },
    });
  });

  it("orders logical operators", () => {
    expect(parseExpr("a || b && c")).toEqual({
      kind: "Binary",
      op: "Or",
      left: v("a"),
      right: { kind: "Binary", op: "And", left: v("b"), right: v("c") },
    });
    expect(parseExpr("a ?? b")).toEqual({
      kind: "Binary",
      op: "Nullish",
      left: v("a"),
      right: v("b"),
    });
  });

  it("parses ternaries and assignments", () => {
    expect(parseExpr("x ? 1 : 2")).toEqual({
      kind: "Ternary",
      cond: v("x"),
      then: n(1),
      otherwise: n(2),
    });
    expect(parseExpr("x = y += 2")).toEqual({
      kind: "Assign",
      target: { kind: "Var", name: "x" },
      op: "=",
      value: {
        kind: "Assign",
        target: { kind: "Var", name: "y" },
        op: "+=",
        value: n(2),
      },
    });
  });

  it("parses postfix updates", () => {
    expect(parseExpr("i++")).toEqual({
      kind: "Update",
      target: { kind: "Var", name: "i" },
      delta: 1,
      prefix: false,
    });
    expect(parseExpr("--i")).toEqual({
      kind: "Update",
      target: { kind: "Var", name: "i" },
      delta: -1,
      prefix: true,
    });
  });
});

describe("literals", () => {
  it("classifies numeric literals", () => {
    expect(parseExpr("1.5")).toEqual({ kind: "Float", value: 1.5 });
    expect(parseExpr("10n")).toEqual({ kind: "BigInt", value: 10n });
    expect(parseExpr("0x1f")).toEqual(n(31));
    expect(parseExpr("1_000")).toEqual(n(1000));
    expect(parseExpr("1e3")).toEqual({ kind: "Float", value: 1000 });
  });

  it("rejects non-finite numeric literals", () => {
    expect(() => parseExpr("1e400")).toThrow("invalid numeric literal: 1e400");
  });

  it("splits template literals into an Add", () => {
    expect(parseExpr("`a${x}b`")).toEqual({
      kind: "Add",
      operands: [{ kind: "String", value: "a" }, v("x"), { kind: "String", value: "b" }],
    });
    expect(parseExpr("`${x}`")).toEqual({
      kind: "Add",
      operands: [{ kind: "String", value: "" }, v("x")],
    });
    expect(parseExpr("`plain`")).toEqual({ kind: "String", value: "plain" });
  });

  it("keeps operators inside string literals", () => {
    expect(parseExpr("'a+b'")).toEqual({ kind: "String", value: "a+b" });
    expect(parseExpr('"x, y" + z')).toEqual({
      kind: "Add",
      operands: [{ kind: "String", value: "x, y" }, v("z")],
    });
  });

  it("tells regex literals from division", () => {
    expect(parseExpr("/ab/g.test(x)")).toEqual({
      kind: "RegexTest",
      regex: { kind: "RegexLiteral", pattern: "ab", flags: "g" },
      input: v("x"),
    });
    expect(parseExpr("a/b/g")).toEqual({
      kind: "Binary",
      op: "Div",
      left: { kind: "Binary", op: "Div", left: v("a"), right: v("b") },
      right: v("g"),
    });
  });

  it("rejects unknown regex flags", () => {
    expect(() => parseExpr("/ab/q")).toThrow("invalid regular expression flags: q");
  });
});

describe("calls and members", () => {
  it("distinguishes function calls and member calls", () => {
    expect(parseExpr("f(1)")).toEqual({ kind: "FunctionCall", target: "f", args: [n(1)] });
    expect(parseExpr("o.m(1)")).toEqual({
      kind: "MemberCall",
      target: v("o"),
      member: "m",
      args: [n(1)],
      optional: false,
      optionalCall: false,
    });
  });

  it("keeps optional chains optional to the end", () => {
    expect(parseExpr("o?.a.b")).toEqual({
      kind: "MemberGet",
      target: { kind: "MemberGet", target: v("o"), member: "a", optional: true },
      member: "b",
      optional: true,
    });
  });

  it("parses arrow functions with defaults", () => {
    expect(parseExpr("(a, b = 2) => a + b")).toEqual({
      kind: "Function",
      handler: {
        params: [
          { name: "a", isRest: false },
          { name: "b", isRest: false, default: n(2) },
        ],
        stmts: [{ kind: "Return", value: { kind: "Add", operands: [v("a"), v("b")] } }],
      },
      isAsync: false,
      isArrow: true,
    });
  });
});

describe("builtin shapes", () => {
  it("recognizes Math members", () => {
    expect(parseExpr("Math.max(1, 2)")).toEqual({
      kind: "MathMethod",
      method: "max",
      args: [n(1), n(2)],
    });
    expect(parseExpr("Math.PI")).toEqual({ kind: "MathConst", name: "PI" });
  });

  it("recognizes console calls", () => {
    expect(parseExpr("console.log('hi', 1)")).toEqual({
      kind: "Console",
      level: "log",
      args: [{ kind: "String", value: "hi" }, n(1)],
    });
  });

  it("keeps inline timer callbacks and defers references", () => {
    expect(parseExpr("setTimeout(() => tick(), 10)")).toEqual({
      kind: "SetTimeout",
      callback: {
        kind: "Inline",
        handler: {
          params: [],
          stmts: [{ kind: "Return", value: { kind: "FunctionCall", target: "tick", args: [] } }],
        },
      },
      delay: n(10),
      args: [],
    });
    expect(parseExpr("setTimeout(tick, 5)")).toEqual({
      kind: "SetTimeout",
      callback: { kind: "Reference", expr: v("tick") },
      delay: n(5),
      args: [],
    });
  });

  it("checks constructor arity", () => {
    expect(() => parseExpr("new Date(1, 2, 3, 4, 5, 6, 7, 8)")).toThrow(
      "new Date supports zero to seven arguments"
    );
  });
});

describe("parse errors", () => {
  it("reports empty and incomplete expressions", () => {
    expect(() => parseExpr("")).toThrow("empty expression");
    expect(() => parseExpr("1 +")).toThrow("invalid additive expression");
  });

  it("returns a Result from tryParseExpr", () => {
    const bad = tryParseExpr("1 +");
    expect(bad.ok).toBe(false);
    if (!bad.ok) {
      expect(bad.error).toBeInstanceOf(ScriptParseError);
      expect(bad.error.code).toBe(ErrorCode.INVALID_OPERATOR_EXPRESSION);
    }
    const good = tryParseExpr("x");
    expect(good).toEqual({ ok: true, value: v("x") });
  });

  it("rebases error offsets onto the failing statement", () => {
    try {
      parseScript("a = 1;\nb = (");
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ScriptParseError);
      if (e instanceof ScriptParseError) {
        expect(e.message).toBe("unclosed block");
        expect(e.offset).toBe(7);
      }
    }
  });
});

describe("statements", () => {
  it("expands multi-name declarations", () => {
    expect(parseScript("let a = 1, b; const c = 2")).toEqual([
      { kind: "VarDecl", declKind: "let", target: { kind: "Name", name: "a" }, init: n(1) },
      { kind: "VarDecl", declKind: "let", target: { kind: "Name", name: "b" } },
      { kind: "VarDecl", declKind: "const", target: { kind: "Name", name: "c" }, init: n(2) },
    ]);
  });

  it("splits statements at line breaks unless the next line continues", () => {
    expect(parseScript("a = 1\nb = 2")).toHaveLength(2);
    expect(parseScript("x = 1\n+ 2")).toEqual([
      {
        kind: "Assign",
        target: { kind: "Var", name: "x" },
        op: "=",
        value: { kind: "Add", operands: [n(1), n(2)] },
      },
    ]);
  });

  it("keeps an unbraced else with its if", () => {
    const assign = (value: number) => ({
      kind: "Assign",
      target: { kind: "Var", name: "a" },
      op: "=",
      value: n(value),
    });
    expect(parseScript("if (x) a = 1; else a = 2")).toEqual([
      { kind: "If", cond: v("x"), then: [assign(1)], otherwise: [assign(2)] },
    ]);
  });

  it("parses classic for loops", () => {
    expect(parseScript("for (let i = 0; i < 3; i++) {}")).toEqual([
      {
        kind: "For",
        init: [{ kind: "VarDecl", declKind: "let", target: { kind: "Name", name: "i" }, init: n(0) }],
        test: { kind: "Binary", op: "Lt", left: v("i"), right: n(3) },
        update: { kind: "Update", target: { kind: "Var", name: "i" }, delta: 1, prefix: false },
        body: [],
      },
    ]);
  });

  it("ignores statement labels", () => {
    expect(parseScript("outer: for (;;) { break }")).toEqual([
      { kind: "For", init: [], body: [{ kind: "Break" }] },
    ]);
  });

  it("parses switch cases", () => {
    expect(parseScript("switch (x) { case 1: y(); break; default: z() }")).toEqual([
      {
        kind: "Switch",
        discriminant: v("x"),
        cases: [
          {
            test: n(1),
            body: [{ kind: "Expr", expr: { kind: "FunctionCall", target: "y", args: [] } }, { kind: "Break" }],
          },
          { body: [{ kind: "Expr", expr: { kind: "FunctionCall", target: "z", args: [] } }] },
        ],
      },
    ]);
  });

  it("parses function declarations and handlers", () => {
    const [decl] = parseScript("function f(a) { return a }");
    expect(decl).toEqual({
      kind: "FunctionDecl",
      name: "f",
      handler: { params: [{ name: "a", isRest: false }], stmts: [{ kind: "Return", value: v("a") }] },
      isAsync: false,
    });
    expect(parseScriptHandler("function (a) { return a }")).toEqual({
      params: [{ name: "a", isRest: false }],
      stmts: [{ kind: "Return", value: v("a") }],
    });
  });
});
