import type { BindingTarget, DeclKind, Expr, FunctionParam, Stmt } from "../ast/nodes";
import type { Env } from "../runtime/env";
import type { Value } from "../runtime/value";
import { arr, obj, undef } from "../runtime/value";
import type { EvalContext, Frame } from "./context";
import { enumerableKeys, iterableValues } from "./iterate";
import { getMember } from "./members";

/** Receives each name a pattern binds. */
export type BindFn = (name: string, value: Value) => void;

export function declareInto(env: Env, kind: DeclKind): BindFn {
  return (name, value) => env.declare(kind, name, value);
}

export function assignInto(env: Env): BindFn {
  return (name, value) => env.assign(name, value);
}

function withDefault(ctx: EvalContext, value: Value, fallback: Expr | undefined, frame: Frame): Value {
  return value.kind === "Undefined" && fallback ? ctx.evalExpr(fallback, frame) : value;
}

/** Destructures `value` into `target`, evaluating defaults in `frame`. */
export function bindPattern(
  ctx: EvalContext,
  target: BindingTarget,
  value: Value,
  frame: Frame,
  bind: BindFn
): void {
  switch (target.kind) {
    case "Name":
      bind(target.name, value);
      return;
    case "ArrayPattern": {
      const values = iterableValues(value);
      target.items.forEach((item, i) => {
        if (!item) return;
        const el = withDefault(ctx, values[i] ?? undef(), item.default, frame);
        bindPattern(ctx, item.target, el, frame, bind);
      });
      if (target.rest) {
        bindPattern(ctx, target.rest, arr(values.slice(target.items.length)), frame, bind);
      }
      return;
    }
    case "ObjectPattern": {
      const used = new Set<string>();
      for (const prop of target.props) {
        used.add(prop.key);
        const el = withDefault(ctx, getMember(value, prop.key), prop.default, frame);
        bindPattern(ctx, prop.target, el, frame, bind);
      }
      if (target.rest !== undefined) {
        const restKeys = enumerableKeys(value).filter((k) => !used.has(k));
        bind(target.rest, obj(restKeys.map((k): [string, Value] => [k, getMember(value, k)])));
      }
      return;
    }
  }
}

/** Binds call arguments to parameters in a fresh function scope. */
export function bindParams(ctx: EvalContext, params: FunctionParam[], args: Value[], scope: Env): void {
  const frame: Frame = { env: scope };
  const bind: BindFn = (name, value) => scope.define(name, value);
  params.forEach((param, i) => {
    const raw = param.isRest ? arr(args.slice(i)) : args[i] ?? undef();
    const value = withDefault(ctx, raw, param.default, frame);
    if (param.pattern) bindPattern(ctx, param.pattern, value, frame, bind);
    else bind(param.name, value);
  });
}

function patternNames(target: BindingTarget, out: string[]): string[] {
  switch (target.kind) {
    case "Name":
      out.push(target.name);
      break;
    case "ArrayPattern":
      for (const item of target.items) if (item) patternNames(item.target, out);
      if (target.rest) patternNames(target.rest, out);
      break;
    case "ObjectPattern":
      for (const prop of target.props) patternNames(prop.target, out);
      if (target.rest !== undefined) out.push(target.rest);
      break;
  }
  return out;
}

function collectVarNames(stmts: Stmt[], out: string[]): void {
  for (const stmt of stmts) {
    switch (stmt.kind) {
      case "VarDecl":
        if (stmt.declKind === "var") patternNames(stmt.target, out);
        break;
      case "If":
        collectVarNames(stmt.then, out);
        if (stmt.otherwise) collectVarNames(stmt.otherwise, out);
        break;
      case "While":
      case "DoWhile":
      case "Block":
        collectVarNames(stmt.body, out);
        break;
      case "For":
        collectVarNames(stmt.init, out);
        collectVarNames(stmt.body, out);
        break;
      case "ForOf":
      case "ForIn":
        if (stmt.declKind === "var") patternNames(stmt.target, out);
        collectVarNames(stmt.body, out);
        break;
      case "Try":
        collectVarNames(stmt.body, out);
        if (stmt.catchBody) collectVarNames(stmt.catchBody, out);
        if (stmt.finallyBody) collectVarNames(stmt.finallyBody, out);
        break;
      case "Switch":
        for (const c of stmt.cases) collectVarNames(c.body, out);
        break;
      default:
        break;
    }
  }
}

/** Pre-binds every `var` name of a body (outside nested functions) to undefined. */
export function hoistVarNames(stmts: Stmt[], env: Env): void {
  const scope = env.nearestFunctionScope();
  const names: string[] = [];
  collectVarNames(stmts, names);
  for (const name of names) {
    if (!scope.vars.has(name)) scope.define(name, undef());
  }
}
