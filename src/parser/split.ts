import { isDigit, isIdentChar, isIdentStart, isKeywordAt } from "../lex/chars";
import { Scanner, scanTopLevel } from "../lex/scanner";

// Longest first, so maximal munch picks `>>>=` over `>>` over `>`.
const PUNCTUATORS = [
  ">>>=",
  "...",
  "===",
  "!==",
  "**=",
  "<<=",
  ">>=",
  ">>>",
  "&&=",
  "||=",
  "??=",
  "=>",
  "==",
  "!=",
  "<=",
  ">=",
  "&&",
  "||",
  "??",
  "?.",
  "++",
  "--",
  "**",
  "<<",
  ">>",
  "+=",
  "-=",
  "*=",
  "/=",
  "%=",
  "&=",
  "|=",
  "^=",
  "=",
  "<",
  ">",
  "+",
  "-",
  "*",
  "/",
  "%",
  "&",
  "|",
  "^",
  "!",
  "~",
  "?",
  ":",
];

const OPERATOR_CHARS = new Set("=!<>&|?^%*/+-~:.");

/** Reads the punctuator starting at `i`, if any. */
export function punctuatorAt(src: string, i: number): string | undefined {
  if (!OPERATOR_CHARS.has(src[i])) return undefined;
  for (const p of PUNCTUATORS) {
    if (!src.startsWith(p, i)) continue;
    // `a?.5:b` is a ternary over `.5`
    if (p === "?." && isDigit(src[i + 2])) continue;
    return p;
  }
  return undefined;
}

export interface OpMatch {
  index: number;
  op: string;
}

export interface OpScanOptions {
  /** Stop collecting after a top-level `=>` (arrow bodies are opaque). */
  arrowOpaque?: boolean;
  /** Only report operators found in binary (operand-following) position. */
  binaryOnly?: boolean;
  /** Extra predicate over a candidate match. */
  accept?: (src: string, match: OpMatch) => boolean;
}

/** True when the sign at `i` belongs to a decimal exponent such as `1e-5`. */
export function isExponentSign(src: string, i: number): boolean {
  const e = src[i - 1];
  if (e !== "e" && e !== "E") return false;
  let start = i - 1;
  while (start > 0 && (isIdentChar(src[start - 1]) || src[start - 1] === ".")) {
    start--;
  }
  const word = src.slice(start, i - 1);
  if (!/^(\d[\d_]*\.?[\d_]*|\.\d[\d_]*)$/.test(word)) return false;
  return !/^0[xX]/.test(word);
}

/**
 * Collects top-level occurrences of `ops` in `src`. Punctuators are matched by
 * maximal munch, so `<` never matches inside `<<`, `<=` or `=>`; keyword
 * operators (`in`, `instanceof`) need identifier boundaries on both sides.
 */
export function findTopLevelOps(
  src: string,
  ops: readonly string[],
  options: OpScanOptions = {}
): OpMatch[] {
  const wanted = new Set(ops);
  const matches: OpMatch[] = [];
  const scanner = new Scanner();
  let i = 0;
  while (i < src.length) {
    if (!scanner.inNormal()) {
      i = scanner.advance(src, i);
      continue;
    }
    const ch = src[i];
    if (isIdentStart(ch)) {
      let end = i + 1;
      while (end < src.length && isIdentChar(src[end])) end++;
      const word = src.slice(i, end);
      if (
        wanted.has(word) &&
        scanner.isTopLevel() &&
        !scanner.expectsOperand() &&
        isKeywordAt(src, i, word)
      ) {
        matches.push({ index: i, op: word });
      }
      i = scanner.advance(src, i);
      continue;
    }
    const punct =
      ch === "/" && scanner.slashStartsCommentOrRegex(src, i)
        ? undefined
        : punctuatorAt(src, i);
    if (punct === undefined) {
      i = scanner.advance(src, i);
      continue;
    }
    const topLevel = scanner.isTopLevel();
    const operandBefore = !scanner.expectsOperand();
    if (topLevel && punct === "=>" && options.arrowOpaque) break;
    if (topLevel && wanted.has(punct)) {
      const match = { index: i, op: punct };
      const positional = !options.binaryOnly || operandBefore;
      if (positional && (!options.accept || options.accept(src, match))) {
        matches.push(match);
      }
    }
    scanner.consumeSignificant(punct);
    if ((punct === "++" || punct === "--") && operandBefore) {
      scanner.markOperandEnd();
    }
    i += punct.length;
  }
  return matches;
}

export interface OpSplit {
  operands: string[];
  ops: string[];
}

/** Splits `src` into operands around every top-level match of `ops`. */
export function splitTopLevelByOps(
  src: string,
  ops: readonly string[],
  options: OpScanOptions = {}
): OpSplit | undefined {
  const matches = findTopLevelOps(src, ops, options);
  if (matches.length === 0) return undefined;
  const operands: string[] = [];
  let start = 0;
  for (const m of matches) {
    operands.push(src.slice(start, m.index).trim());
    start = m.index + m.op.length;
  }
  operands.push(src.slice(start).trim());
  return { operands, ops: matches.map((m) => m.op) };
}

/** Additive split: signs only count in binary position and never inside `1e-5`. */
export function splitTopLevelAddSub(src: string): OpSplit | undefined {
  return splitTopLevelByOps(src, ["+", "-"], {
    binaryOnly: true,
    arrowOpaque: true,
    accept: (s, m) => !isExponentSign(s, m.index),
  });
}

/** Splits on a single top-level character such as `,` or `;`. */
export function splitTopLevelByChar(src: string, ch: string): string[] {
  const parts: string[] = [];
  let start = 0;
  scanTopLevel(src, (i, scanner) => {
    if (src[i] === ch && scanner.isTopLevel()) {
      parts.push(src.slice(start, i));
      start = i + 1;
    }
  });
  parts.push(src.slice(start));
  return parts;
}

/**
 * Splits an argument or element list. A trailing comma is allowed; any other
 * empty slot is reported as `undefined` so callers can decide.
 */
export function splitArgs(src: string): Array<string | undefined> {
  if (src.trim() === "") return [];
  const parts = splitTopLevelByChar(src, ",").map((p) => p.trim());
  if (parts.length > 1 && parts[parts.length - 1] === "") parts.pop();
  return parts.map((p) => (p === "" ? undefined : p));
}

/** Index of the bracket closing the one at `openIdx`, or -1. */
export function findMatchingClose(src: string, openIdx: number): number {
  const scanner = new Scanner();
  const open = src[openIdx];
  const close = open === "(" ? ")" : open === "[" ? "]" : "}";
  let depth = 0;
  let i = openIdx;
  while (i < src.length) {
    const ch = src[i];
    const normal = scanner.inNormal();
    i = scanner.advance(src, i);
    if (!normal) continue;
    if (ch === open) depth++;
    else if (ch === close && --depth === 0) return i - 1;
  }
  return -1;
}

/** Removes redundant outer parentheses, repeatedly: `((a + b))` gives `a + b`. */
export function stripOuterParens(src: string): string {
  let current = src.trim();
  while (
    current.startsWith("(") &&
    findMatchingClose(current, 0) === current.length - 1
  ) {
    current = current.slice(1, -1).trim();
  }
  return current;
}

/** Ternary split: the first top-level `?` and the `:` that balances it. */
export function findTernaryParts(
  src: string
): { cond: string; then: string; otherwise: string } | "unbalanced" | undefined {
  const marks = findTopLevelOps(src, ["?", ":"]);
  const q = marks.findIndex((m) => m.op === "?");
  if (q < 0) return undefined;
  let depth = 0;
  for (let k = q + 1; k < marks.length; k++) {
    const m = marks[k];
    if (m.op === "?") {
      depth++;
    } else if (depth > 0) {
      depth--;
    } else {
      const question = marks[q].index;
      return {
        cond: src.slice(0, question).trim(),
        then: src.slice(question + 1, m.index).trim(),
        otherwise: src.slice(m.index + 1).trim(),
      };
    }
  }
  return "unbalanced";
}

export interface SourceSegment {
  src: string;
  offset: number;
}

const CONTINUING_KEYWORDS = ["else", "catch", "finally"];

// After a top-level `}`, these keep the statement going (`} else`, `}.x`, `} : y`).
const BRACE_CONTINUATIONS = new Set(".,;?:=)]&|+-*/%<>^");

// A line starting with one of these continues the previous line.
const LINE_CONTINUATIONS = new Set(".,?:)]}&|+-*/%<>^=");

function nextSignificantIndex(src: string, from: number): number {
  let i = from;
  while (i < src.length && /\s/.test(src[i])) i++;
  return i;
}

function startsControlHeadAt(text: string, openIdx: number): boolean {
  const before = text.slice(0, openIdx).trimEnd();
  return ["if", "while", "for"].some((kw) =>
    isKeywordAt(before, before.length - kw.length, kw)
  );
}

/** True while a statement still awaits its body or operand (`if (x)`, `a =`, `else`). */
function statementIsIncomplete(text: string, scanner: Scanner, lastOpen: number): boolean {
  const trimmed = text.trimEnd();
  if (trimmed === "") return true;
  if (/(^|[^\w$])(else|do)$/.test(trimmed)) return true;
  const isDoWhile = isKeywordAt(text.trimStart(), 0, "do");
  if (
    trimmed.endsWith(")") &&
    lastOpen >= 0 &&
    !isDoWhile &&
    startsControlHeadAt(text, lastOpen)
  ) {
    return true;
  }
  return scanner.expectsOperand();
}

function lineContinues(src: string, at: number): boolean {
  const ch = src[at];
  if (ch === undefined) return false;
  if (ch === "+" && src[at + 1] === "+") return false;
  if (ch === "-" && src[at + 1] === "-") return false;
  if (LINE_CONTINUATIONS.has(ch)) return true;
  return CONTINUING_KEYWORDS.some((kw) => isKeywordAt(src, at, kw));
}

/**
 * Splits a script into statement sources: at top-level `;`, after a top-level
 * `}` that is not continued (`else`, `catch`, `finally`, the `while` of a
 * `do` block, `:`, `=`, member access), and at line breaks where the
 * statement is complete and the next line does not continue it.
 */
export function splitTopLevelStatements(src: string): SourceSegment[] {
  const segments: SourceSegment[] = [];
  const scanner = new Scanner();
  let start = 0;
  // start of the top-level paren group that closed last, for `if (x)\n body`
  let lastOpen = -1;
  let openAt = -1;

  const push = (end: number): void => {
    const raw = src.slice(start, end);
    const lead = raw.length - raw.trimStart().length;
    const text = raw.trim();
    if (text !== "") segments.push({ src: text, offset: start + lead });
    start = end;
    lastOpen = -1;
  };

  let i = 0;
  while (i < src.length) {
    const ch = src[i];
    if (!scanner.inNormal()) {
      i = scanner.advance(src, i);
      continue;
    }
    const topLevel = scanner.isTopLevel();
    if (topLevel && ch === ";") {
      scanner.consumeSignificant(";");
      // `if (a) x = 1; else y = 2` stays one statement
      if (!isKeywordAt(src, nextSignificantIndex(src, i + 1), "else")) {
        push(i);
        start = i + 1;
      }
      i++;
      continue;
    }
    if (topLevel && ch === "(") openAt = i - start;
    if (topLevel && (ch === "\n" || ch === "\r")) {
      const text = src.slice(start, i);
      const next = nextSignificantIndex(src, i);
      if (!statementIsIncomplete(text, scanner, lastOpen) && !lineContinues(src, next)) {
        push(i);
      }
      i++;
      continue;
    }
    i = scanner.advance(src, i);
    if (ch === ")" && scanner.isTopLevel()) lastOpen = openAt;
    if (ch === "}" && scanner.isTopLevel() && scanner.inNormal()) {
      const next = nextSignificantIndex(src, i);
      const head = src.slice(start, i).trimStart();
      const doWhile = isKeywordAt(head, 0, "do") && isKeywordAt(src, next, "while");
      const continued =
        BRACE_CONTINUATIONS.has(src[next] ?? "") ||
        CONTINUING_KEYWORDS.some((kw) => isKeywordAt(src, next, kw)) ||
        doWhile;
      if (!continued) push(i);
    }
  }
  push(src.length);
  return segments;
}
