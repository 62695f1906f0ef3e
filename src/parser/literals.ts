import type { Expr, ObjectProp } from "../ast/nodes";
import { numberLiteral, str, undef } from "../ast/nodes";
import { ErrorCode, throwParse } from "../errors";
import { isIdentifier } from "../lex/chars";
import { Cursor } from "../lex/cursor";
import { Scanner } from "../lex/scanner";
import { unescapeString } from "../lex/strings";
import type { ParserContext } from "./context";
import { parseFunctionSource } from "./functions";
import { findTopLevelOps, splitArgs } from "./split";

// ============= NUMBERS =============

const NUMBER_TOKEN_RE =
  /^(0[xXoObB][0-9a-zA-Z_]*|\d[\d_]*n|(\d[\d_]*)?(\.[\d_]*)?([eE][+-]?[\d_]+)?)/;

/** Length of the numeric literal token at the start of `src` (0 when none). */
export function numericTokenLength(src: string): number {
  if (!/^(\d|\.\d)/.test(src)) return 0;
  const m = NUMBER_TOKEN_RE.exec(src);
  return m ? m[0].length : 0;
}

const RADIX: Record<string, number> = { x: 16, o: 8, b: 2 };
const RADIX_DIGITS: Record<number, RegExp> = {
  16: /^[0-9a-fA-F]+(_[0-9a-fA-F]+)*$/,
  8: /^[0-7]+(_[0-7]+)*$/,
  2: /^[01]+(_[01]+)*$/,
};
const DECIMAL_RE =
  /^(?=\.?\d)(\d+(_\d+)*)?(\.(\d+(_\d+)*)?)?([eE][+-]?\d+(_\d+)*)?$/;

function parseBigIntLiteral(src: string): Expr {
  const body = src.slice(0, -1);
  const prefix = /^0([xXoObB])/.exec(body);
  if (prefix) {
    const radix = RADIX[prefix[1].toLowerCase()];
    const digits = body.slice(2);
    if (!RADIX_DIGITS[radix].test(digits)) {
      return throwParse(ErrorCode.INVALID_BIGINT_LITERAL, { src });
    }
    return { kind: "BigInt", value: BigInt(`0${prefix[1]}${digits.replace(/_/g, "")}`) };
  }
  if (!/^(0|[1-9]\d*(_\d+)*)$/.test(body)) {
    return throwParse(ErrorCode.INVALID_BIGINT_LITERAL, { src });
  }
  return { kind: "BigInt", value: BigInt(body.replace(/_/g, "")) };
}

/**
 * Parses a complete numeric literal. Returns undefined when `src` does not
 * start like a number at all; throws when it does but is malformed.
 */
export function parseNumericLiteral(src: string): Expr | undefined {
  if (!/^(\d|\.\d)/.test(src)) return undefined;
  if (src.endsWith("n")) return parseBigIntLiteral(src);
  const prefix = /^0([xXoObB])/.exec(src);
  if (prefix) {
    const radix = RADIX[prefix[1].toLowerCase()];
    const digits = src.slice(2);
    if (!RADIX_DIGITS[radix].test(digits)) {
      return throwParse(ErrorCode.INVALID_NUMERIC_LITERAL, { src });
    }
    const value = parseInt(digits.replace(/_/g, ""), radix);
    return numberLiteral(value);
  }
  if (!DECIMAL_RE.test(src)) {
    return throwParse(ErrorCode.INVALID_NUMERIC_LITERAL, { src });
  }
  const value = Number(src.replace(/_/g, ""));
  if (!Number.isFinite(value)) {
    return throwParse(ErrorCode.INVALID_NUMERIC_LITERAL, { src });
  }
  const integral = !/[.eE]/.test(src);
  return integral && Number.isSafeInteger(value)
    ? { kind: "Number", value }
    : { kind: "Float", value };
}

// ============= STRINGS AND TEMPLATES =============

export function parseQuotedString(src: string): Expr | undefined {
  const quote = src[0];
  if (quote !== "'" && quote !== '"') return undefined;
  const cursor = new Cursor(src);
  const value = cursor.parseStringLiteral();
  return cursor.eof() ? str(value) : undefined;
}

/** Index just past the closing backtick of the template starting at 0, or -1. */
export function findTemplateEnd(src: string): number {
  const scanner = new Scanner();
  let i = scanner.advance(src, 0);
  while (i < src.length) {
    i = scanner.advance(src, i);
    if (scanner.inNormal()) return i;
  }
  return -1;
}

/**
 * Parses a whole template literal into interleaved string segments and
 * `${...}` expressions folded into one `Add`.
 */
export function parseTemplateLiteral(src: string, ctx: ParserContext): Expr | undefined {
  if (!src.startsWith("`")) return undefined;
  const end = findTemplateEnd(src);
  if (end < 0) return throwParse(ErrorCode.UNCLOSED_TEMPLATE, {}, 0);
  if (end !== src.length) return undefined;

  const body = src.slice(1, -1);
  const parts: Expr[] = [];
  let raw = "";
  let i = 0;
  while (i < body.length) {
    const ch = body[i];
    if (ch === "\\") {
      raw += body.slice(i, i + 2);
      i += 2;
      continue;
    }
    if (ch === "$" && body[i + 1] === "{") {
      const scanner = Scanner.insideTemplateExpr();
      let j = i + 2;
      while (j < body.length && scanner.mode.kind !== "backtick") {
        j = scanner.advance(body, j);
      }
      if (scanner.mode.kind !== "backtick") {
        return throwParse(ErrorCode.UNCLOSED_TEMPLATE, {}, i);
      }
      if (raw !== "" || parts.length === 0) parts.push(str(unescapeString(raw)));
      raw = "";
      parts.push(ctx.parseExpr(body.slice(i + 2, j - 1)));
      i = j;
      continue;
    }
    raw += ch;
    i++;
  }
  if (raw !== "") parts.push(str(unescapeString(raw)));
  if (parts.length === 0) return str("");
  if (parts.length === 1 && parts[0].kind === "String") return parts[0];
  return { kind: "Add", operands: parts };
}

// ============= ARRAYS AND OBJECTS =============

function parseElement(src: string | undefined, ctx: ParserContext): Expr {
  if (src === undefined) return undef();
  if (src.startsWith("...")) {
    return { kind: "Spread", expr: ctx.parseExpr(src.slice(3)) };
  }
  return ctx.parseExpr(src);
}

/** `[a, ...b, , c]`; holes read as undefined. */
export function parseArrayLiteral(src: string, ctx: ParserContext): Expr {
  const inner = src.slice(1, -1);
  return {
    kind: "ArrayLiteral",
    items: splitArgs(inner).map((item) => parseElement(item, ctx)),
  };
}

function parsePropertyKey(src: string): string {
  const key = src.trim();
  if (key.startsWith("'") || key.startsWith('"')) {
    const cursor = new Cursor(key);
    return cursor.parseStringLiteral();
  }
  if (/^(\d|\.\d)/.test(key)) {
    const literal = parseNumericLiteral(key);
    if (literal && (literal.kind === "Number" || literal.kind === "Float")) {
      return String(literal.value);
    }
  }
  if (!isIdentifier(key)) {
    return throwParse(ErrorCode.INVALID_SYNTAX, { type: "object key", src: key });
  }
  return key;
}

const METHOD_RE = /^(async\s+)?(\*\s*)?([_$A-Za-z][_$A-Za-z0-9]*)\s*\(/;

function parseObjectProp(src: string, ctx: ParserContext): ObjectProp {
  if (src.startsWith("...")) {
    return { kind: "Spread", expr: ctx.parseExpr(src.slice(3)) };
  }
  const method = METHOD_RE.exec(src);
  if (method && src.endsWith("}")) {
    const name = method[3];
    const fnSrc = `${method[1] ?? ""}function ${src.slice(method[0].length - 1)}`;
    const fn = parseFunctionSource(fnSrc, ctx);
    if (fn) return { kind: "Prop", key: name, value: { ...fn, name } };
  }
  const colon = findTopLevelOps(src, [":", "?"]).find((m) => m.op === ":");
  if (!colon) {
    if (isIdentifier(src)) return { kind: "Prop", key: src, value: { kind: "Var", name: src } };
    return throwParse(ErrorCode.INVALID_SYNTAX, { type: "object literal", src });
  }
  const keySrc = src.slice(0, colon.index).trim();
  const value = ctx.parseExpr(src.slice(colon.index + 1));
  if (keySrc.startsWith("[") && keySrc.endsWith("]")) {
    return { kind: "Computed", key: ctx.parseExpr(keySrc.slice(1, -1)), value };
  }
  return { kind: "Prop", key: parsePropertyKey(keySrc), value };
}

/** `{a: 1, b, [k]: v, ...rest, m() {}}`. */
export function parseObjectLiteral(src: string, ctx: ParserContext): Expr {
  const inner = src.slice(1, -1);
  const props: ObjectProp[] = [];
  for (const part of splitArgs(inner)) {
    if (part === undefined) {
      return throwParse(ErrorCode.INVALID_SYNTAX, { type: "object literal", src });
    }
    props.push(parseObjectProp(part, ctx));
  }
  return { kind: "ObjectLiteral", props };
}
