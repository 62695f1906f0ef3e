import type { Expr, ScriptHandler, Stmt } from "../ast/nodes";
import { isIdentifier } from "../lex/chars";
import { findMatchingClose } from "./split";

/**
 * Interface for the parser services recognizers need, so shape recognizers
 * never import the ladder directly.
 */
export interface ParserContext {
  parseExpr(src: string): Expr;
  /** Parses a comma-separated argument list (the text between the parens). */
  parseArgs(src: string): Expr[];
  parseStatements(src: string): Stmt[];
  /** Parses an inline callback (`() => {...}`, `function () {...}`) or returns undefined. */
  parseCallbackHandler(src: string): ScriptHandler | undefined;
}

/**
 * A recognizer answers "not this shape" with `undefined`, and "this shape, but
 * malformed" by throwing a ScriptParseError.
 */
export type Recognizer = (src: string, ctx: ParserContext) => Expr | undefined;

export interface CallShape {
  isNew: boolean;
  /** Dotted callee path such as `Math.max` or `window.setTimeout`. */
  path: string;
  /** Raw text between the call parens; absent when there is no call. */
  argSrc?: string;
}

const PATH_RE = /^[_$A-Za-z][_$A-Za-z0-9]*(\s*\.\s*[_$A-Za-z][_$A-Za-z0-9]*)*/;

/**
 * Reads `new? a.b.c` optionally followed by one `( ... )` group that must end
 * the source. Anything else is not a call shape.
 */
export function readCallShape(src: string): CallShape | undefined {
  let rest = src.trim();
  let isNew = false;
  if (/^new\s/.test(rest)) {
    isNew = true;
    rest = rest.slice(3).trimStart();
  }
  const head = PATH_RE.exec(rest);
  if (!head) return undefined;
  const path = head[0].replace(/\s+/g, "");
  const tail = rest.slice(head[0].length).trimStart();
  if (tail === "") return { isNew, path };
  if (!tail.startsWith("(")) return undefined;
  const close = findMatchingClose(tail, 0);
  if (close !== tail.length - 1) return undefined;
  return { isNew, path, argSrc: tail.slice(1, -1) };
}

/** `window.setTimeout` and `globalThis.alert` name the same globals. */
export function stripGlobalPrefix(path: string): string {
  return path.replace(/^(window|globalThis|self)\./, "");
}

export function isPlainIdentifier(src: string): boolean {
  return isIdentifier(src.trim());
}
