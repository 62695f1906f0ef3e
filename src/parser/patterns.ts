import type {
  AssignTarget,
  BindingElement,
  BindingTarget,
  Expr,
  ObjectPatternProp,
} from "../ast/nodes";
import { ErrorCode, throwParse } from "../errors";
import { isIdentifier } from "../lex/chars";
import { Cursor } from "../lex/cursor";
import type { ParserContext } from "./context";
import { findMatchingClose, findTopLevelOps, splitArgs } from "./split";

function invalidPattern(src: string): never {
  return throwParse(ErrorCode.INVALID_SYNTAX, { type: "destructuring pattern", src });
}

function splitDefault(
  src: string,
  ctx: ParserContext
): { head: string; default?: Expr } {
  const eq = findTopLevelOps(src, ["="])[0];
  if (!eq) return { head: src.trim() };
  return {
    head: src.slice(0, eq.index).trim(),
    default: ctx.parseExpr(src.slice(eq.index + 1)),
  };
}

function element(src: string, ctx: ParserContext): BindingElement {
  const { head, default: fallback } = splitDefault(src, ctx);
  const el: BindingElement = { target: parseBindingTarget(head, ctx) };
  if (fallback) el.default = fallback;
  return el;
}

function parseArrayPattern(src: string, ctx: ParserContext): BindingTarget {
  const items: Array<BindingElement | null> = [];
  let rest: BindingTarget | undefined;
  const parts = splitArgs(src.slice(1, -1));
  for (let idx = 0; idx < parts.length; idx++) {
    const part = parts[idx];
    if (part === undefined) {
      items.push(null);
    } else if (part.startsWith("...")) {
      if (idx !== parts.length - 1) invalidPattern(src);
      rest = parseBindingTarget(part.slice(3), ctx);
    } else {
      items.push(element(part, ctx));
    }
  }
  return rest ? { kind: "ArrayPattern", items, rest } : { kind: "ArrayPattern", items };
}

function propKey(src: string): string {
  if (src.startsWith("'") || src.startsWith('"')) {
    return new Cursor(src).parseStringLiteral();
  }
  if (!isIdentifier(src) && !/^\d+$/.test(src)) invalidPattern(src);
  return src;
}

function parseObjectPattern(src: string, ctx: ParserContext): BindingTarget {
  const props: ObjectPatternProp[] = [];
  let rest: string | undefined;
  for (const part of splitArgs(src.slice(1, -1))) {
    if (part === undefined) return invalidPattern(src);
    if (part.startsWith("...")) {
      const name = part.slice(3).trim();
      if (!isIdentifier(name)) invalidPattern(src);
      rest = name;
      continue;
    }
    const colon = findTopLevelOps(part, [":"])[0];
    if (!colon) {
      const { head, default: fallback } = splitDefault(part, ctx);
      if (!isIdentifier(head)) invalidPattern(src);
      const prop: ObjectPatternProp = { key: head, target: { kind: "Name", name: head } };
      if (fallback) prop.default = fallback;
      props.push(prop);
      continue;
    }
    const key = propKey(part.slice(0, colon.index).trim());
    const { target, default: fallback } = element(part.slice(colon.index + 1), ctx);
    const prop: ObjectPatternProp = { key, target };
    if (fallback) prop.default = fallback;
    props.push(prop);
  }
  return rest !== undefined
    ? { kind: "ObjectPattern", props, rest }
    : { kind: "ObjectPattern", props };
}

/** Parses `name`, `[a, , b = 1, ...rest]` or `{a, b: c, ...rest}`. */
export function parseBindingTarget(src: string, ctx: ParserContext): BindingTarget {
  const text = src.trim();
  if (isIdentifier(text)) return { kind: "Name", name: text };
  const open = text[0];
  if ((open === "[" || open === "{") && findMatchingClose(text, 0) === text.length - 1) {
    return open === "[" ? parseArrayPattern(text, ctx) : parseObjectPattern(text, ctx);
  }
  return invalidPattern(text);
}

/**
 * Converts the left side of an assignment into a target. Only variables,
 * member and index accesses, and destructuring patterns are assignable.
 */
export function parseAssignTarget(src: string, ctx: ParserContext): AssignTarget {
  const text = src.trim();
  if (isIdentifier(text)) return { kind: "Var", name: text };
  if ((text.startsWith("[") || text.startsWith("{")) && findMatchingClose(text, 0) === text.length - 1) {
    const pattern = parseBindingTarget(text, ctx);
    if (pattern.kind !== "Name") return { kind: "Pattern", pattern };
  }
  const expr = ctx.parseExpr(text);
  switch (expr.kind) {
    case "Var":
      return { kind: "Var", name: expr.name };
    case "MemberGet":
      return { kind: "Member", object: expr.target, member: expr.member };
    case "IndexGet":
      return { kind: "Index", object: expr.target, index: expr.index };
    default:
      return throwParse(ErrorCode.INVALID_ASSIGNMENT_TARGET, { src: text });
  }
}
