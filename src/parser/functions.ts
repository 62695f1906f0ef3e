import type {
  Expr,
  FunctionExpr,
  FunctionParam,
  ScriptHandler,
  Stmt,
} from "../ast/nodes";
import { ErrorCode, throwParse } from "../errors";
import { isIdentifier, isKeywordAt } from "../lex/chars";
import type { ParserContext } from "./context";
import { parseBindingTarget } from "./patterns";
import { findMatchingClose, findTopLevelOps, splitArgs } from "./split";

function parseParam(src: string, ctx: ParserContext): FunctionParam {
  let text = src.trim();
  const isRest = text.startsWith("...");
  if (isRest) text = text.slice(3).trim();
  const eq = findTopLevelOps(text, ["="])[0];
  const head = eq ? text.slice(0, eq.index).trim() : text;
  const defaultExpr = eq ? ctx.parseExpr(text.slice(eq.index + 1)) : undefined;
  const param: FunctionParam = { name: head, isRest };
  if (defaultExpr) param.default = defaultExpr;
  if (isIdentifier(head)) return param;
  const pattern = parseBindingTarget(head, ctx);
  if (pattern.kind === "Name") return { ...param, name: pattern.name };
  return { ...param, pattern };
}

export function parseParams(src: string, ctx: ParserContext): FunctionParam[] {
  return splitArgs(src).map((part) => {
    if (part === undefined) {
      return throwParse(ErrorCode.INVALID_SYNTAX, { type: "parameter list", src });
    }
    return parseParam(part, ctx);
  });
}

/** `{ ... }` gives its statements; any other body becomes `return body`. */
function parseBody(src: string, ctx: ParserContext): Stmt[] {
  const body = src.trim();
  if (body.startsWith("{") && findMatchingClose(body, 0) === body.length - 1) {
    return ctx.parseStatements(body.slice(1, -1));
  }
  if (body === "") return throwParse(ErrorCode.INVALID_SYNTAX, { type: "arrow function" });
  const value: Expr = ctx.parseExpr(body);
  return [{ kind: "Return", value }];
}

function parseFunctionKeywordForm(
  src: string,
  isAsync: boolean,
  ctx: ParserContext
): FunctionExpr | undefined {
  let rest = src.slice("function".length).trimStart();
  if (rest.startsWith("*")) rest = rest.slice(1).trimStart();
  const nameMatch = /^[_$A-Za-z][_$A-Za-z0-9]*/.exec(rest);
  const name = nameMatch ? nameMatch[0] : undefined;
  if (nameMatch) rest = rest.slice(nameMatch[0].length).trimStart();
  if (!rest.startsWith("(")) {
    return throwParse(ErrorCode.INVALID_SYNTAX, { type: "function", src });
  }
  const closeParams = findMatchingClose(rest, 0);
  if (closeParams < 0) return throwParse(ErrorCode.UNCLOSED_BLOCK, {});
  const params = parseParams(rest.slice(1, closeParams), ctx);
  const body = rest.slice(closeParams + 1).trim();
  if (!body.startsWith("{")) {
    return throwParse(ErrorCode.INVALID_SYNTAX, { type: "function", src });
  }
  // `function () {}()` and friends are not a bare function literal
  if (findMatchingClose(body, 0) !== body.length - 1) return undefined;
  const fn: FunctionExpr = {
    kind: "Function",
    handler: { params, stmts: ctx.parseStatements(body.slice(1, -1)) },
    isAsync,
    isArrow: false,
  };
  if (name !== undefined) fn.name = name;
  return fn;
}

function parseArrowForm(
  src: string,
  isAsync: boolean,
  ctx: ParserContext
): FunctionExpr | undefined {
  let paramsSrc: string;
  let rest: string;
  if (src.startsWith("(")) {
    const close = findMatchingClose(src, 0);
    if (close < 0) return undefined;
    paramsSrc = src.slice(1, close);
    rest = src.slice(close + 1).trimStart();
  } else {
    const ident = /^[_$A-Za-z][_$A-Za-z0-9]*/.exec(src);
    if (!ident) return undefined;
    paramsSrc = ident[0];
    rest = src.slice(ident[0].length).trimStart();
  }
  if (!rest.startsWith("=>")) return undefined;
  return {
    kind: "Function",
    handler: {
      params: parseParams(paramsSrc, ctx),
      stmts: parseBody(rest.slice(2), ctx),
    },
    isAsync,
    isArrow: true,
  };
}

/**
 * Recognizes a complete function or arrow expression:
 * `function name?(...) {}`, `async function`, `x => ...`, `(a, b) => ...`,
 * `async (x) => ...`.
 */
export function parseFunctionSource(
  src: string,
  ctx: ParserContext
): FunctionExpr | undefined {
  let text = src.trim();
  let isAsync = false;
  if (isKeywordAt(text, 0, "async")) {
    const after = text.slice(5).trimStart();
    if (after.startsWith("(") || isKeywordAt(after, 0, "function") || /^[_$A-Za-z]/.test(after)) {
      isAsync = true;
      text = after;
    }
  }
  if (isKeywordAt(text, 0, "function")) {
    return parseFunctionKeywordForm(text, isAsync, ctx);
  }
  return parseArrowForm(text, isAsync, ctx);
}

export function parseCallbackHandler(
  src: string,
  ctx: ParserContext
): ScriptHandler | undefined {
  return parseFunctionSource(src, ctx)?.handler;
}
