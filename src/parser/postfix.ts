import type { Expr } from "../ast/nodes";
import { str, undef, varRef } from "../ast/nodes";
import { ErrorCode, throwParse } from "../errors";
import { isIdentChar, isIdentStart, isWhitespace } from "../lex/chars";
import { Cursor } from "../lex/cursor";
import { builtinShapeRecognizer } from "./builtins";
import type { ParserContext, Recognizer } from "./context";
import {
  findTemplateEnd,
  numericTokenLength,
  parseArrayLiteral,
  parseNumericLiteral,
  parseObjectLiteral,
  parseTemplateLiteral,
} from "./literals";
import { readRegexLiteral, regexConstructorRecognizer } from "./regex";
import { findMatchingClose } from "./split";
import { timerRecognizer } from "./timers";

type Segment =
  | { kind: "member"; name: string; optional: boolean; end: number }
  | { kind: "index"; src: string; optional: boolean; end: number }
  | { kind: "call"; argSrc: string; optional: boolean; end: number };

interface Atom {
  expr: Expr;
  end: number;
  /** Identifier and `new` atoms may head a builtin shape. */
  shapeCandidate: boolean;
}

const SHAPE_RECOGNIZERS: readonly Recognizer[] = [
  timerRecognizer,
  regexConstructorRecognizer,
  builtinShapeRecognizer,
];

const unsupported = (src: string): never =>
  throwParse(ErrorCode.UNSUPPORTED_EXPRESSION, { src });

function closeOf(src: string, open: number): number {
  const close = findMatchingClose(src, open);
  if (close < 0) return throwParse(ErrorCode.UNCLOSED_BLOCK, {}, open);
  return close;
}

function readIdentifier(src: string, at: number): number {
  let end = at;
  while (end < src.length && isIdentChar(src[end])) end++;
  return end;
}

function identifierAtom(name: string): Expr {
  switch (name) {
    case "true":
      return { kind: "Bool", value: true };
    case "false":
      return { kind: "Bool", value: false };
    case "null":
      return { kind: "Null" };
    case "undefined":
      return undef();
    case "NaN":
      return { kind: "Float", value: NaN };
    case "Infinity":
      return { kind: "Float", value: Infinity };
    default:
      return varRef(name);
  }
}

/** `new Path.To(args)` with a user-defined constructor. */
function readNewAtom(src: string, ctx: ParserContext): Atom {
  let i = skipWs(src, 3);
  const start = i;
  while (i < src.length && (isIdentChar(src[i]) || src[i] === ".")) i++;
  const path = src.slice(start, i);
  if (path === "" || !isIdentStart(path[0])) return unsupported(src);
  const j = skipWs(src, i);
  let args: Expr[] = [];
  let end = i;
  if (src[j] === "(") {
    const close = closeOf(src, j);
    args = ctx.parseArgs(src.slice(j + 1, close));
    end = close + 1;
  }
  return {
    expr: { kind: "New", callee: ctx.parseExpr(path), args },
    end,
    shapeCandidate: true,
  };
}

function readAtom(src: string, ctx: ParserContext): Atom {
  const ch = src[0];
  if (ch === "'" || ch === '"') {
    const cursor = new Cursor(src);
    const value = cursor.parseStringLiteral();
    return { expr: str(value), end: cursor.i, shapeCandidate: false };
  }
  if (ch === "`") {
    const end = findTemplateEnd(src);
    if (end < 0) return throwParse(ErrorCode.UNCLOSED_TEMPLATE, {}, 0);
    const expr = parseTemplateLiteral(src.slice(0, end), ctx);
    if (!expr) return unsupported(src);
    return { expr, end, shapeCandidate: false };
  }
  const numLen = numericTokenLength(src);
  if (numLen > 0) {
    const expr = parseNumericLiteral(src.slice(0, numLen));
    if (!expr) return unsupported(src);
    return { expr, end: numLen, shapeCandidate: false };
  }
  if (ch === "(" || ch === "[" || ch === "{") {
    const close = closeOf(src, 0);
    const slice = src.slice(0, close + 1);
    const expr =
      ch === "("
        ? ctx.parseExpr(slice.slice(1, -1))
        : ch === "["
          ? parseArrayLiteral(slice, ctx)
          : parseObjectLiteral(slice, ctx);
    return { expr, end: close + 1, shapeCandidate: false };
  }
  if (ch === "/") {
    const token = readRegexLiteral(src);
    if (!token) return unsupported(src);
    return {
      expr: { kind: "RegexLiteral", pattern: token.pattern, flags: token.flags },
      end: token.end,
      shapeCandidate: false,
    };
  }
  if (isIdentStart(ch)) {
    const end = readIdentifier(src, 0);
    const name = src.slice(0, end);
    if (name === "new") return readNewAtom(src, ctx);
    return { expr: identifierAtom(name), end, shapeCandidate: true };
  }
  return unsupported(src);
}

function skipWs(src: string, i: number): number {
  let j = i;
  while (isWhitespace(src[j])) j++;
  return j;
}

function readSegments(src: string, from: number): Segment[] {
  const segments: Segment[] = [];
  let i = skipWs(src, from);
  while (i < src.length) {
    let optional = false;
    let dotted = false;
    if (src.startsWith("?.", i)) {
      optional = true;
      i = skipWs(src, i + 2);
    } else if (src[i] === ".") {
      dotted = true;
      i = skipWs(src, i + 1);
    }
    const ch = src[i];
    if (!dotted && (ch === "(" || ch === "[")) {
      const close = closeOf(src, i);
      const inner = src.slice(i + 1, close);
      segments.push(
        ch === "("
          ? { kind: "call", argSrc: inner, optional, end: close + 1 }
          : { kind: "index", src: inner, optional, end: close + 1 }
      );
      i = skipWs(src, close + 1);
    } else if ((dotted || optional) && isIdentStart(ch)) {
      const end = readIdentifier(src, i);
      segments.push({ kind: "member", name: src.slice(i, end), optional, end });
      i = skipWs(src, end);
    } else {
      return unsupported(src);
    }
  }
  return segments;
}

function applySegments(base: Expr, segments: Segment[], ctx: ParserContext): Expr {
  let current = base;
  // once a chain goes optional, later links short-circuit too
  let inOptional = false;
  for (let k = 0; k < segments.length; k++) {
    const seg = segments[k];
    inOptional = inOptional || seg.optional;
    const next = segments[k + 1];
    if (seg.kind === "member" && next && next.kind === "call") {
      current = {
        kind: "MemberCall",
        target: current,
        member: seg.name,
        args: ctx.parseArgs(next.argSrc),
        optional: inOptional,
        optionalCall: next.optional,
      };
      inOptional = inOptional || next.optional;
      k++;
      continue;
    }
    switch (seg.kind) {
      case "member":
        current = { kind: "MemberGet", target: current, member: seg.name, optional: inOptional };
        break;
      case "index":
        current = { kind: "IndexGet", target: current, index: ctx.parseExpr(seg.src), optional: inOptional };
        break;
      case "call":
        current =
          current.kind === "Var" && !seg.optional
            ? { kind: "FunctionCall", target: current.name, args: ctx.parseArgs(seg.argSrc) }
            : { kind: "Call", callee: current, args: ctx.parseArgs(seg.argSrc), optional: inOptional };
        break;
    }
  }
  return current;
}

function recognizeShape(src: string, ctx: ParserContext): Expr | undefined {
  for (const recognize of SHAPE_RECOGNIZERS) {
    const expr = recognize(src, ctx);
    if (expr) return expr;
  }
  return undefined;
}

/**
 * Primary expression with its postfix chain (`.name`, `?.name`, `[i]`,
 * `?.[i]`, `(args)`, `?.(args)`). The longest prefix that forms a builtin
 * shape becomes the base of the chain.
 */
export function parsePostfix(src: string, ctx: ParserContext): Expr {
  const atom = readAtom(src, ctx);
  const segments = readSegments(src, atom.end);
  if (atom.shapeCandidate) {
    for (let k = segments.length; k >= 0; k--) {
      const end = k === 0 ? atom.end : segments[k - 1].end;
      const shape = recognizeShape(src.slice(0, end), ctx);
      if (shape) return applySegments(shape, segments.slice(k), ctx);
    }
  }
  return applySegments(atom.expr, segments, ctx);
}
