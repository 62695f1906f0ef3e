import type { ScriptHandler } from "../ast/nodes";
import { ErrorCode, throwRuntime } from "../errors";
import type { Env } from "../runtime/env";
import { createPromise, rejectPromise, resolvePromise } from "../runtime/promise";
import { thrownValue } from "../runtime/thrown";
import type { FunctionValue, Value } from "../runtime/value";
import { arr, isPrimitive, obj, undef } from "../runtime/value";
import { bindParams, hoistVarNames } from "./bindings";
import type { EvalContext } from "./context";
import { functionPrototype } from "./members";
import { ReturnSignal } from "./signals";

export interface FunctionOptions {
  isAsync: boolean;
  isArrow: boolean;
  name?: string;
}

export function createFunction(handler: ScriptHandler, captured: Env, options: FunctionOptions): FunctionValue {
  const fn: FunctionValue = {
    kind: "Function",
    handler,
    captured,
    isAsync: options.isAsync,
    isArrow: options.isArrow,
    properties: new Map(),
  };
  if (options.name !== undefined) fn.name = options.name;
  return fn;
}

function invoke(ctx: EvalContext, fn: FunctionValue, args: Value[], thisValue: Value | undefined): Value {
  const scope = fn.captured.functionScope();
  const callArgs = fn.boundArgs ? [...fn.boundArgs, ...args] : args;
  if (!fn.isArrow) {
    scope.define("this", fn.boundThis ?? thisValue ?? undef());
    scope.define("arguments", arr([...callArgs]));
    // a named function expression can call itself by name
    if (fn.name !== undefined && !scope.has(fn.name)) scope.define(fn.name, fn);
  }
  bindParams(ctx, fn.handler.params, callArgs, scope);
  hoistVarNames(fn.handler.stmts, scope);
  try {
    ctx.execStatements(fn.handler.stmts, { env: scope });
  } catch (e) {
    if (e instanceof ReturnSignal) return e.value;
    throw e;
  }
  return undef();
}

/**
 * Calls a script function. Async functions run to completion synchronously
 * and hand back a promise settled with the outcome.
 */
export function callFunction(
  ctx: EvalContext,
  fn: FunctionValue,
  args: Value[],
  thisValue?: Value
): Value {
  const limit = ctx.limits.maxCallDepth;
  if (ctx.callDepth >= limit) throwRuntime(ErrorCode.CALL_DEPTH, { limit });
  ctx.callDepth++;
  try {
    if (!fn.isAsync) return invoke(ctx, fn, args, thisValue);
    const promise = createPromise(ctx);
    try {
      resolvePromise(ctx, promise, invoke(ctx, fn, args, thisValue));
    } catch (e) {
      const reason = thrownValue(e);
      if (reason === undefined) throw e;
      rejectPromise(ctx, promise, reason);
    }
    return promise;
  } finally {
    ctx.callDepth--;
  }
}

/** `new F(...)` for a script function. */
export function constructFunction(ctx: EvalContext, fn: FunctionValue, args: Value[]): Value {
  if (fn.isArrow || fn.isAsync) {
    return throwRuntime(ErrorCode.NOT_A_CONSTRUCTOR, { name: fn.name ?? "anonymous" });
  }
  const instance = obj();
  instance.constructedBy = fn;
  instance.proto = functionPrototype(fn);
  const result = callFunction(ctx, fn, args, instance);
  return isPrimitive(result) ? instance : result;
}
