import type { ForEachStmt, ForStmt, Stmt, StmtOf, SwitchStmt, TryStmt } from "../ast/nodes";
import { ErrorCode, ScriptThrow, throwRuntime } from "../errors";
import { Env } from "../runtime/env";
import { asString, truthy } from "../runtime/coerce";
import { strictEqual } from "../runtime/equality";
import { thrownValue } from "../runtime/thrown";
import type { Value } from "../runtime/value";
import { isNullish, str, undef } from "../runtime/value";
import { evalAssign, evalUpdate } from "./assign";
import { assignInto, bindPattern, declareInto } from "./bindings";
import { createFunction } from "./calls";
import type { EvalContext, Frame } from "./context";
import { enumerableKeys, iterableValues } from "./iterate";
import { BreakSignal, ContinueSignal, ReturnSignal } from "./signals";

type Completion = Value | undefined;

// ============= LOOP HELPERS =============

class LoopCounter {
  private iterations = 0;

  constructor(private readonly limit: number) {}

  tick(): void {
    this.iterations++;
    if (this.iterations > this.limit) throwRuntime(ErrorCode.LOOP_LIMIT, { limit: this.limit });
  }
}

/** Runs one loop body; false when the body broke out of the loop. */
function runLoopBody(ctx: EvalContext, body: Stmt[], env: Env): { keepGoing: boolean; completion: Completion } {
  try {
    return { keepGoing: true, completion: executeStatements(ctx, body, { env: env.child() }) };
  } catch (e) {
    if (e instanceof BreakSignal) return { keepGoing: false, completion: undefined };
    if (e instanceof ContinueSignal) return { keepGoing: true, completion: undefined };
    throw e;
  }
}

/** A sibling of `env` holding the same bindings, so closures keep each iteration's values. */
function copyScope(env: Env): Env {
  const copy = new Env(env.parent, false);
  for (const [name, item] of env.vars) copy.vars.set(name, { ...item });
  return copy;
}

function execFor(ctx: EvalContext, stmt: ForStmt, frame: Frame): Completion {
  let iterEnv = frame.env.child();
  executeStatements(ctx, stmt.init, { env: iterEnv });
  const counter = new LoopCounter(ctx.limits.maxLoopIterations);
  let completion: Completion;
  for (;;) {
    iterEnv = copyScope(iterEnv);
    if (stmt.test && !truthy(ctx.evalExpr(stmt.test, { env: iterEnv }))) break;
    counter.tick();
    const step = runLoopBody(ctx, stmt.body, iterEnv);
    completion = step.completion ?? completion;
    if (!step.keepGoing) break;
    iterEnv = copyScope(iterEnv);
    if (stmt.update) ctx.evalExpr(stmt.update, { env: iterEnv });
  }
  return completion;
}

function execForEach(ctx: EvalContext, stmt: ForEachStmt, frame: Frame): Completion {
  const source = ctx.evalExpr(stmt.iterable, frame);
  const counter = new LoopCounter(ctx.limits.maxLoopIterations);
  let completion: Completion;
  const visit = (item: Value): boolean => {
    counter.tick();
    const iterEnv = frame.env.child();
    const bind = stmt.declKind ? declareInto(iterEnv, stmt.declKind) : assignInto(frame.env);
    bindPattern(ctx, stmt.target, item, { env: iterEnv }, bind);
    const step = runLoopBody(ctx, stmt.body, iterEnv);
    completion = step.completion ?? completion;
    return step.keepGoing;
  };
  if (stmt.kind === "ForIn") {
    if (isNullish(source)) return undefined;
    for (const key of enumerableKeys(source)) if (!visit(str(key))) break;
    return completion;
  }
  if (source.kind === "Array") {
    // arrays are walked live, so pushes during the loop are visited
    for (let i = 0; i < source.elements.length; i++) {
      if (!visit(source.elements[i] ?? undef())) break;
    }
    return completion;
  }
  for (const item of iterableValues(source)) if (!visit(item)) break;
  return completion;
}

// ============= TRY / SWITCH =============

function execTry(ctx: EvalContext, stmt: TryStmt, frame: Frame): Completion {
  try {
    return executeStatements(ctx, stmt.body, { env: frame.env.child() });
  } catch (e) {
    if (!stmt.catchBody) throw e;
    const value = thrownValue(e);
    if (value === undefined) throw e;
    const env = frame.env.child();
    if (stmt.catchParam) bindPattern(ctx, stmt.catchParam, value, { env }, declareInto(env, "let"));
    return executeStatements(ctx, stmt.catchBody, { env });
  } finally {
    if (stmt.finallyBody) executeStatements(ctx, stmt.finallyBody, { env: frame.env.child() });
  }
}

function execSwitch(ctx: EvalContext, stmt: SwitchStmt, frame: Frame): Completion {
  const discriminant = ctx.evalExpr(stmt.discriminant, frame);
  const env = frame.env.child();
  let start = stmt.cases.findIndex(
    (c) => c.test !== undefined && strictEqual(discriminant, ctx.evalExpr(c.test, { env }))
  );
  if (start < 0) start = stmt.cases.findIndex((c) => c.test === undefined);
  if (start < 0) return undefined;
  let completion: Completion;
  try {
    for (const c of stmt.cases.slice(start)) {
      completion = executeStatements(ctx, c.body, { env }) ?? completion;
    }
  } catch (e) {
    if (!(e instanceof BreakSignal)) throw e;
  }
  return completion;
}

// ============= STATEMENTS =============

function execVarDecl(ctx: EvalContext, stmt: StmtOf<"VarDecl">, frame: Frame): void {
  const { target, init, declKind } = stmt;
  if (!init) {
    // `var x;` leaves a hoisted or earlier value alone
    if (declKind === "var" && target.kind === "Name") return;
    bindPattern(ctx, target, undef(), frame, declareInto(frame.env, declKind));
    return;
  }
  const value = ctx.evalExpr(init, frame);
  if (target.kind === "Name" && init.kind === "Function" && init.name === undefined && value.kind === "Function") {
    value.name = target.name;
  }
  bindPattern(ctx, target, value, frame, declareInto(frame.env, declKind));
}

function executeStatement(ctx: EvalContext, stmt: Stmt, frame: Frame): Completion {
  switch (stmt.kind) {
    case "Expr":
      return ctx.evalExpr(stmt.expr, frame);
    case "VarDecl":
      execVarDecl(ctx, stmt, frame);
      return undefined;
    case "FunctionDecl":
      // bound when the enclosing block started
      return undefined;
    case "Assign":
      return evalAssign(ctx, stmt.target, stmt.op, stmt.value, frame);
    case "Update":
      return evalUpdate(ctx, stmt.target, stmt.delta, stmt.prefix, frame);
    case "If": {
      const branch = truthy(ctx.evalExpr(stmt.cond, frame)) ? stmt.then : stmt.otherwise;
      return branch ? executeStatements(ctx, branch, { env: frame.env.child() }) : undefined;
    }
    case "While": {
      const counter = new LoopCounter(ctx.limits.maxLoopIterations);
      let completion: Completion;
      while (truthy(ctx.evalExpr(stmt.cond, frame))) {
        counter.tick();
        const step = runLoopBody(ctx, stmt.body, frame.env);
        completion = step.completion ?? completion;
        if (!step.keepGoing) break;
      }
      return completion;
    }
    case "DoWhile": {
      const counter = new LoopCounter(ctx.limits.maxLoopIterations);
      let completion: Completion;
      do {
        counter.tick();
        const step = runLoopBody(ctx, stmt.body, frame.env);
        completion = step.completion ?? completion;
        if (!step.keepGoing) break;
      } while (truthy(ctx.evalExpr(stmt.cond, frame)));
      return completion;
    }
    case "For":
      return execFor(ctx, stmt, frame);
    case "ForOf":
    case "ForIn":
      return execForEach(ctx, stmt, frame);
    case "Block":
      return executeStatements(ctx, stmt.body, { env: frame.env.child() });
    case "Return":
      throw new ReturnSignal(stmt.value ? ctx.evalExpr(stmt.value, frame) : undef());
    case "Break":
      throw new BreakSignal();
    case "Continue":
      throw new ContinueSignal();
    case "Throw": {
      const value = ctx.evalExpr(stmt.value, frame);
      throw new ScriptThrow(value, `Uncaught ${asString(value)}`);
    }
    case "Try":
      return execTry(ctx, stmt, frame);
    case "Switch":
      return execSwitch(ctx, stmt, frame);
  }
}

/**
 * Runs a statement list in `frame`. Function declarations are bound before
 * the first statement runs. The result is the value of the last statement
 * that produced one.
 */
export function executeStatements(ctx: EvalContext, stmts: Stmt[], frame: Frame): Completion {
  for (const stmt of stmts) {
    if (stmt.kind !== "FunctionDecl") continue;
    const fn = createFunction(stmt.handler, frame.env, {
      isAsync: stmt.isAsync,
      isArrow: false,
      name: stmt.name,
    });
    frame.env.define(stmt.name, fn);
  }
  let completion: Completion;
  for (const stmt of stmts) {
    completion = executeStatement(ctx, stmt, frame) ?? completion;
  }
  return completion;
}
