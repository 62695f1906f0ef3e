import type { Expr } from "../ast/nodes";
import { ErrorCode, throwParse } from "../errors";
import type { Recognizer } from "./context";
import { readCallShape } from "./context";
import { findMatchingClose } from "./split";

const VALID_FLAGS = "dgimsuvy";

/** Empty string when `flags` is a valid set, otherwise the reason. */
export function regexFlagsProblem(flags: string): string {
  const seen = new Set<string>();
  for (const flag of flags) {
    if (!VALID_FLAGS.includes(flag)) return `unknown flag '${flag}'`;
    if (seen.has(flag)) return `duplicate flag '${flag}'`;
    seen.add(flag);
  }
  if (seen.has("u") && seen.has("v")) return "flags 'u' and 'v' are exclusive";
  return "";
}

export function assertRegexFlags(flags: string): void {
  if (regexFlagsProblem(flags) !== "") {
    throwParse(ErrorCode.INVALID_REGEX_FLAGS, { flags });
  }
}

export interface RegexToken {
  pattern: string;
  flags: string;
  /** Index just past the flags. */
  end: number;
}

/** Reads `/pattern/flags` starting at index 0 of `src`. */
export function readRegexLiteral(src: string): RegexToken | undefined {
  if (src[0] !== "/" || src[1] === "/" || src[1] === "*") return undefined;
  let inClass = false;
  let i = 1;
  while (i < src.length) {
    const ch = src[i];
    if (ch === "\\") {
      i += 2;
      continue;
    }
    if (ch === "\n") break;
    if (ch === "[") inClass = true;
    else if (ch === "]") inClass = false;
    else if (ch === "/" && !inClass) {
      let end = i + 1;
      while (end < src.length && /[A-Za-z]/.test(src[end])) end++;
      const flags = src.slice(i + 1, end);
      assertRegexFlags(flags);
      return { pattern: src.slice(1, i), flags, end };
    }
    i++;
  }
  return throwParse(ErrorCode.UNTERMINATED_REGEX, {}, 0);
}

/** A whole-source regex literal. */
export const regexLiteralRecognizer: Recognizer = (src) => {
  const token = readRegexLiteral(src);
  if (!token || token.end !== src.length) return undefined;
  return { kind: "RegexLiteral", pattern: token.pattern, flags: token.flags };
};

const REGEX_METHOD_RE = /^\s*\.\s*(test|exec|toString)\s*\(/;

/** `/re/.test(x)`, `/re/.exec(x)`, `/re/.toString()` on a literal receiver. */
export const regexMethodRecognizer: Recognizer = (src, ctx) => {
  if (src[0] !== "/") return undefined;
  const token = readRegexLiteral(src);
  if (!token) return undefined;
  const tail = src.slice(token.end);
  const method = REGEX_METHOD_RE.exec(tail);
  if (!method) return undefined;
  const open = method[0].length - 1;
  if (findMatchingClose(tail, open) !== tail.length - 1) return undefined;
  const regex: Expr = { kind: "RegexLiteral", pattern: token.pattern, flags: token.flags };
  const args = ctx.parseArgs(tail.slice(open + 1, -1));
  const name = method[1];
  if (name === "toString") {
    if (args.length !== 0) {
      return throwParse(ErrorCode.ARITY, { callee: "RegExp.prototype.toString", rule: "takes no arguments" });
    }
    return { kind: "RegexToString", regex };
  }
  if (args.length !== 1) {
    return throwParse(ErrorCode.ARITY, { callee: `RegExp.prototype.${name}`, rule: "requires exactly one argument" });
  }
  return name === "test"
    ? { kind: "RegexTest", regex, input: args[0] }
    : { kind: "RegexExec", regex, input: args[0] };
};

/** `new RegExp(pattern, flags?)` and `RegExp(pattern, flags?)`. */
export const regexConstructorRecognizer: Recognizer = (src, ctx) => {
  const shape = readCallShape(src);
  if (!shape || shape.path !== "RegExp" || shape.argSrc === undefined) return undefined;
  const args = ctx.parseArgs(shape.argSrc);
  if (args.length < 1 || args.length > 2) {
    return throwParse(ErrorCode.ARITY, { callee: "RegExp", rule: "requires one or two arguments" });
  }
  const [pattern, flags] = args;
  if (flags && flags.kind === "String") assertRegexFlags(flags.value);
  return flags ? { kind: "RegexNew", pattern, flags } : { kind: "RegexNew", pattern };
};

