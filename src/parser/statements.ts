import type {
  DeclKind,
  Expr,
  ForEachStmt,
  ScriptHandler,
  Stmt,
  StmtOf,
  SwitchCase,
  TryStmt,
} from "../ast/nodes";
import {
  ErrorCode,
  ScriptParseError,
  throwParse,
} from "../errors";
import { isKeywordAt } from "../lex/chars";
import { Cursor } from "../lex/cursor";
import { Scanner } from "../lex/scanner";
import { stripJsComments } from "../lex/strings";
import { parseExpr, parserContext } from "./expression";
import { parseFunctionSource, parseParams } from "./functions";
import { parseBindingTarget } from "./patterns";
import {
  findMatchingClose,
  findTopLevelOps,
  splitTopLevelByChar,
  splitTopLevelStatements,
} from "./split";
import type { OpMatch } from "./split";

const DECL_KINDS: readonly DeclKind[] = ["let", "const", "var"];

// `outer: for (...)`; labels are accepted and ignored
const LABEL_RE = /^([_$A-Za-z][_$A-Za-z0-9]*)\s*:(?!:)/;

function invalid(type: string, src?: string): never {
  return throwParse(
    ErrorCode.INVALID_SYNTAX,
    src === undefined ? { type } : { type, src }
  );
}

function leadingDeclKind(src: string): DeclKind | undefined {
  return DECL_KINDS.find(
    (kind) => isKeywordAt(src, 0, kind) && /^\s*[[{_$A-Za-z]/.test(src.slice(kind.length))
  );
}

/** Index of the first top-level occurrence of keyword `word`, or -1. */
function findTopLevelKeyword(src: string, word: string, from = 0): number {
  const scanner = new Scanner();
  let i = 0;
  while (i < src.length) {
    if (i >= from && scanner.isTopLevel() && isKeywordAt(src, i, word)) return i;
    i = scanner.advance(src, i);
  }
  return -1;
}

/** `{ ... }` covering the whole source gives its statements; otherwise one statement. */
function parseBody(src: string): Stmt[] {
  const body = src.trim();
  if (body === "" || body === ";") return [];
  if (body.startsWith("{") && findMatchingClose(body, 0) === body.length - 1) {
    return parseScript(body.slice(1, -1));
  }
  return parseScript(body);
}

/** Reads a `{ ... }` block at the cursor and parses its statements. */
function readBlock(cursor: Cursor, what: string): Stmt[] {
  cursor.skipWs();
  if (cursor.peek() !== "{") return invalid(what, cursor.rest());
  return parseScript(cursor.readBalancedBlock("{", "}"));
}

function readParenHead(cursor: Cursor, keyword: string): string {
  cursor.i = keyword.length;
  cursor.skipWs();
  return cursor.readBalancedBlock("(", ")");
}

// ============= DECLARATIONS =============

function parseDeclarations(src: string, declKind: DeclKind): Stmt[] {
  const rest = src.slice(declKind.length).trim();
  return splitTopLevelByChar(rest, ",").map((part) => {
    const eq = findTopLevelOps(part, ["="])[0];
    const head = eq ? part.slice(0, eq.index) : part;
    const target = parseBindingTarget(head, parserContext());
    if (!eq) {
      if (declKind === "const" || target.kind !== "Name") {
        return invalid("declaration", part.trim());
      }
      return { kind: "VarDecl", declKind, target };
    }
    return {
      kind: "VarDecl",
      declKind,
      target,
      init: parseExpr(part.slice(eq.index + 1)),
    };
  });
}

function parseFunctionDeclaration(src: string): Stmt | undefined {
  const fn = parseFunctionSource(src, parserContext());
  if (!fn || fn.isArrow || fn.name === undefined) return undefined;
  return { kind: "FunctionDecl", name: fn.name, handler: fn.handler, isAsync: fn.isAsync };
}

// ============= CONTROL FLOW =============

/**
 * Splits `then-branch else else-branch` for an unbraced then-branch. Nested
 * `if`s without braces claim the nearest `else` first.
 */
function findMatchingElse(src: string): number {
  const scanner = new Scanner();
  let pendingIfs = 0;
  let i = 0;
  while (i < src.length) {
    if (scanner.isTopLevel()) {
      if (isKeywordAt(src, i, "if")) pendingIfs++;
      else if (isKeywordAt(src, i, "else")) {
        if (pendingIfs === 0) return i;
        pendingIfs--;
      }
    }
    i = scanner.advance(src, i);
  }
  return -1;
}

function parseElse(src: string): Stmt[] {
  const text = src.trim();
  if (isKeywordAt(text, 0, "if")) return [parseStatement(text)];
  return parseBody(text);
}

function parseIf(src: string): Stmt {
  const cursor = new Cursor(src);
  const cond = parseExpr(readParenHead(cursor, "if"));
  const rest = cursor.rest().trim();
  if (rest.startsWith("{")) {
    const close = findMatchingClose(rest, 0);
    if (close < 0) return throwParse(ErrorCode.UNCLOSED_BLOCK);
    const then = parseScript(rest.slice(1, close));
    const after = rest.slice(close + 1).trim();
    if (after === "") return { kind: "If", cond, then };
    if (!isKeywordAt(after, 0, "else")) return invalid("if statement", src);
    return { kind: "If", cond, then, otherwise: parseElse(after.slice(4)) };
  }
  const elseAt = findMatchingElse(rest);
  if (elseAt < 0) return { kind: "If", cond, then: parseBody(rest) };
  return {
    kind: "If",
    cond,
    then: parseBody(rest.slice(0, elseAt).trim().replace(/;$/, "")),
    otherwise: parseElse(rest.slice(elseAt + 4)),
  };
}

function parseWhile(src: string): Stmt {
  const cursor = new Cursor(src);
  const cond = parseExpr(readParenHead(cursor, "while"));
  return { kind: "While", cond, body: parseBody(cursor.rest()) };
}

function parseDoWhile(src: string): Stmt {
  const whileAt = findTopLevelKeyword(src, "while", 2);
  if (whileAt < 0) return invalid("do-while", src);
  const body = parseBody(src.slice(2, whileAt).trim().replace(/;$/, ""));
  const cursor = new Cursor(src.slice(whileAt));
  const cond = parseExpr(readParenHead(cursor, "while"));
  if (cursor.rest().trim() !== "") return invalid("do-while", src);
  return { kind: "DoWhile", body, cond };
}

function parseForEachHead(head: string): Omit<ForEachStmt, "body"> | undefined {
  const split = findTopLevelOps(head, ["of", "in"])[0];
  if (!split) return undefined;
  let left = head.slice(0, split.index).trim();
  const declKind = leadingDeclKind(left);
  if (declKind) left = left.slice(declKind.length).trim();
  const stmt: Omit<ForEachStmt, "body"> = {
    kind: split.op === "of" ? "ForOf" : "ForIn",
    target: parseBindingTarget(left, parserContext()),
    iterable: parseExpr(head.slice(split.index + split.op.length)),
  };
  if (declKind) stmt.declKind = declKind;
  return stmt;
}

function parseFor(src: string): Stmt {
  const cursor = new Cursor(src);
  cursor.i = 3;
  cursor.skipWs();
  // `for await` iterates like `for`; awaited values settle through the evaluator
  if (cursor.consumeKeyword("await")) cursor.skipWs();
  const head = cursor.readBalancedBlock("(", ")");
  const body = parseBody(cursor.rest());
  const parts = splitTopLevelByChar(head, ";");
  if (parts.length === 3) {
    const [init, test, update] = parts.map((p) => p.trim());
    const stmt: StmtOf<"For"> = { kind: "For", init: init ? parseStatements(init) : [], body };
    if (test) stmt.test = parseExpr(test);
    if (update) stmt.update = parseExpr(update);
    return stmt;
  }
  const each = parseForEachHead(head);
  if (!each || parts.length !== 1) return invalid("for", head);
  return { ...each, body };
}

function parseTry(src: string): Stmt {
  const cursor = new Cursor(src);
  cursor.i = 3;
  const stmt: TryStmt = { kind: "Try", body: readBlock(cursor, "try") };
  cursor.skipWs();
  if (cursor.consumeKeyword("catch")) {
    cursor.skipWs();
    if (cursor.peek() === "(") {
      const param = cursor.readBalancedBlock("(", ")").trim();
      if (param !== "") stmt.catchParam = parseBindingTarget(param, parserContext());
    }
    stmt.catchBody = readBlock(cursor, "catch");
    cursor.skipWs();
  }
  if (cursor.consumeKeyword("finally")) {
    stmt.finallyBody = readBlock(cursor, "finally");
    cursor.skipWs();
  }
  if (!cursor.eof() || (!stmt.catchBody && !stmt.finallyBody)) {
    return invalid("try statement", src);
  }
  return stmt;
}

/** Start offsets of `case`/`default` labels at the top level of a switch body. */
function findCaseLabels(body: string): number[] {
  const labels: number[] = [];
  const scanner = new Scanner();
  let i = 0;
  while (i < body.length) {
    if (
      scanner.isTopLevel() &&
      (isKeywordAt(body, i, "case") || isKeywordAt(body, i, "default")) &&
      /(^|[;{}:\n])\s*$/.test(body.slice(0, i))
    ) {
      labels.push(i);
    }
    i = scanner.advance(body, i);
  }
  return labels;
}

/** The `:` ending a case label, skipping the colons of ternaries in the test. */
function findLabelColon(clause: string): OpMatch | undefined {
  let pending = 0;
  for (const mark of findTopLevelOps(clause, ["?", ":"])) {
    if (mark.op === "?") pending++;
    else if (pending > 0) pending--;
    else return mark;
  }
  return undefined;
}

function parseSwitch(src: string): Stmt {
  const cursor = new Cursor(src);
  const discriminant = parseExpr(readParenHead(cursor, "switch"));
  cursor.skipWs();
  const body = cursor.readBalancedBlock("{", "}");
  const labels = findCaseLabels(body);
  const cases: SwitchCase[] = labels.map((start, idx) => {
    const end = idx + 1 < labels.length ? labels[idx + 1] : body.length;
    const clause = body.slice(start, end);
    const isDefault = isKeywordAt(clause, 0, "default");
    const colon = findLabelColon(clause);
    if (!colon) return invalid("switch case", clause.trim());
    const stmts = parseScript(clause.slice(colon.index + 1));
    if (isDefault) return { body: stmts };
    return { test: parseExpr(clause.slice(4, colon.index)), body: stmts };
  });
  if (body.slice(0, labels[0] ?? body.length).trim() !== "") {
    return invalid("switch statement", src);
  }
  return { kind: "Switch", discriminant, cases };
}

function parseKeywordOperand(src: string, keyword: string): Expr | undefined {
  const operand = src.slice(keyword.length).trim();
  return operand === "" ? undefined : parseExpr(operand);
}

// ============= ENTRY POINTS =============

function parseExpressionStatement(src: string): Stmt {
  const expr = parseExpr(src);
  switch (expr.kind) {
    case "Assign":
      return { kind: "Assign", target: expr.target, op: expr.op, value: expr.value };
    case "Update":
      return { kind: "Update", target: expr.target, delta: expr.delta, prefix: expr.prefix };
    default:
      return { kind: "Expr", expr };
  }
}

/** Parses one statement source; declarations of several names expand to several statements. */
export function parseStatements(src: string): Stmt[] {
  const text = src.trim();
  const declKind = leadingDeclKind(text);
  if (declKind) return parseDeclarations(text, declKind);
  return [parseStatement(text)];
}

export function parseStatement(src: string): Stmt {
  const text = src.trim();
  if (text.startsWith("{") && findMatchingClose(text, 0) === text.length - 1) {
    return { kind: "Block", body: parseScript(text.slice(1, -1)) };
  }
  if (leadingDeclKind(text)) {
    const stmts = parseStatements(text);
    return stmts.length === 1 ? stmts[0] : { kind: "Block", body: stmts };
  }
  if (isKeywordAt(text, 0, "function") || isKeywordAt(text, 0, "async")) {
    const decl = parseFunctionDeclaration(text);
    if (decl) return decl;
  }
  const label = LABEL_RE.exec(text);
  if (label && !DECL_KINDS.some((kind) => kind === label[1])) {
    return parseStatement(text.slice(label[0].length));
  }
  if (isKeywordAt(text, 0, "if")) return parseIf(text);
  if (isKeywordAt(text, 0, "while")) return parseWhile(text);
  if (isKeywordAt(text, 0, "do")) return parseDoWhile(text);
  if (isKeywordAt(text, 0, "for")) return parseFor(text);
  if (isKeywordAt(text, 0, "try")) return parseTry(text);
  if (isKeywordAt(text, 0, "switch")) return parseSwitch(text);
  if (isKeywordAt(text, 0, "return")) {
    const value = parseKeywordOperand(text, "return");
    return value ? { kind: "Return", value } : { kind: "Return" };
  }
  if (isKeywordAt(text, 0, "throw")) {
    const value = parseKeywordOperand(text, "throw");
    if (!value) return throwParse(ErrorCode.MISSING_OPERAND, { operator: "throw" });
    return { kind: "Throw", value };
  }
  if (isKeywordAt(text, 0, "break")) return { kind: "Break" };
  if (isKeywordAt(text, 0, "continue")) return { kind: "Continue" };
  return parseExpressionStatement(text);
}

/**
 * Parses a script body into statements. Comments are stripped first; parse
 * errors carry the offset of the statement that failed.
 */
export function parseScript(src: string): Stmt[] {
  const segments = splitTopLevelStatements(stripJsComments(src));
  const stmts: Stmt[] = [];
  for (const segment of segments) {
    try {
      stmts.push(...parseStatements(segment.src));
    } catch (e) {
      if (e instanceof ScriptParseError) {
        throw new ScriptParseError(e.code, e.message, segment.offset);
      }
      throw e;
    }
  }
  return stmts;
}

/** Parses a function, arrow or callback source into a handler. */
export function parseScriptHandler(src: string): ScriptHandler {
  const ctx = parserContext();
  const fn = parseFunctionSource(src, ctx);
  if (fn) return fn.handler;
  return invalid("handler", src.trim());
}

/** Builds a handler for `new Function("a", "b", "return a + b")`. */
export function parseFunctionConstructor(params: string[], body: string): ScriptHandler {
  return {
    params: parseParams(params.join(","), parserContext()),
    stmts: parseScript(body),
  };
}
