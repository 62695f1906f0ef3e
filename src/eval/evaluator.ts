import type { BuiltinExpr, Expr, ExprOf, TimerExpr, UnaryOp } from "../ast/nodes";
import { astExprToString } from "../ast/stringify";
import { ErrorCode, ScriptThrow, runtimeError, throwRuntime } from "../errors";
import { BYTES_PER_ELEMENT } from "../runtime/buffers";
import { asString, propertyKey, truthy, valueToI64 } from "../runtime/coerce";
import { jsonParse } from "../runtime/json";
import { createRegExp } from "../runtime/regex";
import { createUrl } from "../runtime/url";
import type { Value } from "../runtime/value";
import {
  arr,
  big,
  bool,
  builtin,
  ctor,
  float,
  isCallable,
  isNullish,
  nul,
  num,
  obj,
  str,
  typeOf,
  undef,
} from "../runtime/value";
import { evalAssign, evalUpdate } from "./assign";
import {
  arrayFrom,
  callMath,
  callNumberStatic,
  callObjectStatic,
  callPromiseStatic,
  consoleCall,
  constructArrayBuffer,
  constructBlob,
  constructBuiltin,
  constructError,
  constructFunctionFromSource,
  constructTypedArray,
  createMap,
  createSet,
  dateNew,
  dateParse,
  dateUtc,
  instanceOf,
  mathConstant,
  newPromise,
  numberConstant,
  stringifyJson,
  toBigInt,
  toNumber,
} from "./builtins";
import { createFunction } from "./calls";
import type { EvalContext, Frame } from "./context";
import { callDialog, callGlobal } from "./globals";
import { enumerableKeys, evalSpreadList } from "./iterate";
import { deleteMember, getMember, hasProperty, invokeMethod, memberIsMissing } from "./members";
import { addValues, applyBinary, applyNumericUnary } from "./operators";

// ============= NAMES =============

function eventSnapshot(ctx: EvalContext): Value | undefined {
  const event = ctx.activeEvent;
  if (!event) return undefined;
  const { state } = event;
  return obj([
    ["type", str(state.type)],
    ["target", str(state.target)],
    ["bubbles", bool(state.bubbles)],
    ["cancelable", bool(state.cancelable)],
    ["timeStamp", num(state.timeStamp)],
    ["defaultPrevented", bool(state.defaultPrevented)],
    ["preventDefault", builtin("event.preventDefault")],
  ]);
}

/** A name's value, or undefined when nothing binds it. */
function lookupName(ctx: EvalContext, name: string, frame: Frame): Value | undefined {
  if (ctx.activeEvent && name === ctx.activeEvent.param) return eventSnapshot(ctx);
  const value = frame.env.get(name);
  if (value === undefined && name === "this") return undef();
  return value;
}

function evalVar(ctx: EvalContext, name: string, frame: Frame): Value {
  const value = lookupName(ctx, name, frame);
  if (value === undefined) return throwRuntime(ErrorCode.UNKNOWN_VARIABLE, { name });
  return value;
}

// ============= OPERATORS =============

function evalAwait(ctx: EvalContext, value: Value): Value {
  if (value.kind !== "Promise") return value;
  if (!ctx.scheduler.inMicrotask) ctx.scheduler.drainMicrotasks();
  const state = value.state;
  switch (state.status) {
    case "fulfilled":
      return state.value;
    case "rejected": {
      value.handled = true;
      const message = runtimeError(ErrorCode.AWAIT_REJECTED, { reason: asString(state.reason) }).message;
      throw new ScriptThrow(state.reason, message);
    }
    case "pending":
      // no suspension: a pending await completes with undefined
      return undef();
  }
}

function evalUnary(ctx: EvalContext, op: UnaryOp, operand: Expr, frame: Frame): Value {
  switch (op) {
    case "TypeOf":
      if (operand.kind === "Var") {
        const value = lookupName(ctx, operand.name, frame);
        return str(value === undefined ? "undefined" : typeOf(value));
      }
      return str(typeOf(ctx.evalExpr(operand, frame)));
    case "Delete":
      if (operand.kind === "Var") return bool(!frame.env.has(operand.name));
      if (operand.kind === "MemberGet") {
        return bool(deleteMember(ctx.evalExpr(operand.target, frame), operand.member));
      }
      if (operand.kind === "IndexGet") {
        const object = ctx.evalExpr(operand.target, frame);
        return bool(deleteMember(object, propertyKey(ctx.evalExpr(operand.index, frame))));
      }
      ctx.evalExpr(operand, frame);
      return bool(true);
    case "Not":
      return bool(!truthy(ctx.evalExpr(operand, frame)));
    case "Void":
      ctx.evalExpr(operand, frame);
      return undef();
    case "Await":
      return evalAwait(ctx, ctx.evalExpr(operand, frame));
    case "Yield":
    case "YieldStar":
      return ctx.evalExpr(operand, frame);
    case "Neg":
    case "Pos":
    case "BitNot":
      return applyNumericUnary(op, ctx.evalExpr(operand, frame));
  }
}

type ShortCircuitOp = "And" | "Or" | "Nullish";

function isShortCircuit(op: string): op is ShortCircuitOp {
  return op === "And" || op === "Or" || op === "Nullish";
}

/** Operands of a left-associative run of `op`, leftmost first. */
function shortCircuitOperands(expr: ExprOf<"Binary">, op: ShortCircuitOp): Expr[] {
  const operands: Expr[] = [expr.right];
  let current: Expr = expr.left;
  while (current.kind === "Binary" && current.op === op) {
    operands.push(current.right);
    current = current.left;
  }
  operands.push(current);
  return operands.reverse();
}

function decides(op: ShortCircuitOp, value: Value): boolean {
  switch (op) {
    case "And":
      return !truthy(value);
    case "Or":
      return truthy(value);
    case "Nullish":
      return !isNullish(value);
  }
}

function evalShortCircuit(ctx: EvalContext, expr: ExprOf<"Binary">, op: ShortCircuitOp, frame: Frame): Value {
  let value: Value = undef();
  for (const operand of shortCircuitOperands(expr, op)) {
    value = ctx.evalExpr(operand, frame);
    if (decides(op, value)) return value;
  }
  return value;
}

function evalBinary(ctx: EvalContext, expr: ExprOf<"Binary">, frame: Frame): Value {
  if (isShortCircuit(expr.op)) return evalShortCircuit(ctx, expr, expr.op, frame);
  const left = ctx.evalExpr(expr.left, frame);
  switch (expr.op) {
    case "In":
      return bool(hasProperty(ctx.evalExpr(expr.right, frame), propertyKey(left)));
    case "InstanceOf":
      return bool(instanceOf(left, ctx.evalExpr(expr.right, frame)));
    default:
      return applyBinary(expr.op, left, ctx.evalExpr(expr.right, frame));
  }
}

// ============= LITERALS =============

function evalObjectLiteral(ctx: EvalContext, expr: ExprOf<"ObjectLiteral">, frame: Frame): Value {
  const result = obj();
  for (const prop of expr.props) {
    switch (prop.kind) {
      case "Prop": {
        const value = ctx.evalExpr(prop.value, frame);
        if (prop.value.kind === "Function" && prop.value.name === undefined && value.kind === "Function") {
          value.name = prop.key;
        }
        result.entries.set(prop.key, value);
        break;
      }
      case "Computed": {
        const key = propertyKey(ctx.evalExpr(prop.key, frame));
        result.entries.set(key, ctx.evalExpr(prop.value, frame));
        break;
      }
      case "Spread": {
        const source = ctx.evalExpr(prop.expr, frame);
        if (isNullish(source)) break;
        for (const key of enumerableKeys(source)) result.entries.set(key, getMember(source, key));
        break;
      }
    }
  }
  return result;
}

// ============= CALLS =============

function evalCall(ctx: EvalContext, expr: ExprOf<"Call">, frame: Frame): Value {
  const { callee } = expr;
  if (callee.kind === "IndexGet" || callee.kind === "MemberGet") {
    // `obj[key](...)` keeps `obj` as the receiver
    const object = ctx.evalExpr(callee.target, frame);
    if (callee.optional && isNullish(object)) return undef();
    const key =
      callee.kind === "MemberGet" ? callee.member : propertyKey(ctx.evalExpr(callee.index, frame));
    if (expr.optional && memberIsMissing(object, key)) return undef();
    return invokeMethod(ctx, object, key, evalSpreadList(ctx, expr.args, frame));
  }
  const fn = ctx.evalExpr(callee, frame);
  if (expr.optional && isNullish(fn)) return undef();
  if (!isCallable(fn)) return throwRuntime(ErrorCode.NOT_A_FUNCTION, { target: astExprToString(callee) });
  return ctx.callValue(fn, evalSpreadList(ctx, expr.args, frame));
}

function evalFunctionCall(ctx: EvalContext, expr: ExprOf<"FunctionCall">, frame: Frame): Value {
  const fn = lookupName(ctx, expr.target, frame);
  if (fn === undefined || !isCallable(fn)) {
    return throwRuntime(ErrorCode.NOT_A_FUNCTION, { target: expr.target });
  }
  return ctx.callValue(fn, evalSpreadList(ctx, expr.args, frame));
}

function evalMemberCall(ctx: EvalContext, expr: ExprOf<"MemberCall">, frame: Frame): Value {
  const object = ctx.evalExpr(expr.target, frame);
  if (expr.optional && isNullish(object)) return undef();
  if (expr.optionalCall && memberIsMissing(object, expr.member)) return undef();
  return invokeMethod(ctx, object, expr.member, evalSpreadList(ctx, expr.args, frame));
}

// ============= BUILTIN SHAPES =============

function optional(ctx: EvalContext, expr: Expr | undefined, frame: Frame): Value | undefined {
  return expr ? ctx.evalExpr(expr, frame) : undefined;
}

function evalBuiltin(ctx: EvalContext, expr: BuiltinExpr, frame: Frame): Value {
  const list = (exprs: Expr[]): Value[] => evalSpreadList(ctx, exprs, frame);
  const one = (e: Expr): Value => ctx.evalExpr(e, frame);
  switch (expr.kind) {
    case "RegexNew": {
      const flags = optional(ctx, expr.flags, frame);
      return constructBuiltin(ctx, "RegExp", flags ? [one(expr.pattern), flags] : [one(expr.pattern)]);
    }
    case "RegexTest":
      return invokeMethod(ctx, one(expr.regex), "test", [one(expr.input)]);
    case "RegexExec":
      return invokeMethod(ctx, one(expr.regex), "exec", [one(expr.input)]);
    case "RegexToString":
      return invokeMethod(ctx, one(expr.regex), "toString", []);
    case "DateNew":
      return dateNew(ctx, list(expr.args));
    case "DateNow":
      return num(ctx.scheduler.nowMs);
    case "DateParse":
      return dateParse(one(expr.value));
    case "DateUtc":
      return dateUtc(list(expr.args));
    case "PerformanceNow":
      return float(ctx.scheduler.nowMs);
    case "MathConst":
      return mathConstant(expr.name);
    case "MathMethod":
      return callMath(ctx, expr.method, list(expr.args));
    case "NumberConst":
      return numberConstant(expr.name);
    case "NumberMethod":
      return callNumberStatic(expr.method, list(expr.args));
    case "NumberConstruct":
      return toNumber(optional(ctx, expr.value, frame));
    case "StringConstruct":
      return str(expr.value ? asString(one(expr.value)) : "");
    case "BooleanConstruct":
      return bool(expr.value ? truthy(one(expr.value)) : false);
    case "BigIntConstruct":
      return toBigInt(one(expr.value));
    case "JsonParse":
      return jsonParse(asString(one(expr.text)));
    case "JsonStringify":
      return stringifyJson(
        ctx,
        one(expr.value),
        optional(ctx, expr.replacer, frame),
        optional(ctx, expr.space, frame)
      );
    case "ObjectStatic":
      return callObjectStatic(expr.method, list(expr.args));
    case "ArrayIsArray":
      return bool(one(expr.value).kind === "Array");
    case "ArrayFrom":
      return arrayFrom(ctx, one(expr.source), optional(ctx, expr.mapFn, frame));
    case "ArrayOf":
      return arr(list(expr.args));
    case "PromiseConstruct":
      return newPromise(ctx, one(expr.executor));
    case "PromiseStatic":
      return callPromiseStatic(ctx, expr.method, list(expr.args));
    case "MapConstruct":
      return createMap(optional(ctx, expr.iterable, frame), expr.weak);
    case "SetConstruct":
      return createSet(optional(ctx, expr.iterable, frame), expr.weak);
    case "SymbolConstruct": {
      const description = optional(ctx, expr.description, frame);
      return ctx.createSymbol(
        description && description.kind !== "Undefined" ? asString(description) : undefined
      );
    }
    case "SymbolFor":
      return ctx.symbolFor(asString(one(expr.key)));
    case "ArrayBufferConstruct":
      return constructArrayBuffer(one(expr.length), optional(ctx, expr.options, frame));
    case "TypedArrayConstruct":
      return constructTypedArray(expr.type, list(expr.args));
    case "TypedArrayBytesPerElement":
      return num(BYTES_PER_ELEMENT[expr.type]);
    case "UrlConstruct": {
      const base = optional(ctx, expr.base, frame);
      return createUrl(asString(one(expr.input)), base ? asString(base) : undefined);
    }
    case "BlobConstruct":
      return constructBlob(optional(ctx, expr.parts, frame), optional(ctx, expr.options, frame));
    case "ErrorConstruct":
      return constructError(expr.name, optional(ctx, expr.message, frame));
    case "FunctionConstructor":
      return constructFunctionFromSource(ctx, list(expr.args));
    case "ConstructorRef":
      return ctor(expr.name);
    case "BuiltinRef":
      return builtin(expr.name);
    case "GlobalFunction":
      return callGlobal(ctx, expr.name, list(expr.args));
    case "Dialog":
      return callDialog(ctx, expr.dialog, list(expr.args));
    case "Console":
      return consoleCall(ctx, expr.level, list(expr.args));
  }
}

// ============= TIMERS =============

function evalTimer(ctx: EvalContext, expr: TimerExpr, frame: Frame): Value {
  const { scheduler } = ctx;
  switch (expr.kind) {
    case "SetTimeout":
    case "SetInterval": {
      const delay = expr.delay ? valueToI64(ctx.evalExpr(expr.delay, frame)) : 0;
      const args = evalSpreadList(ctx, expr.args, frame);
      const id =
        expr.kind === "SetTimeout"
          ? scheduler.scheduleTimeout(expr.callback, delay, args, frame.env)
          : scheduler.scheduleInterval(expr.callback, delay, args, frame.env);
      return num(id);
    }
    case "RequestAnimationFrame":
      return num(scheduler.scheduleAnimationFrame(expr.callback, (dueAt) => num(dueAt), frame.env));
    case "QueueMicrotask": {
      const fn = ctx.evalExpr(expr.callback, frame);
      if (!isCallable(fn)) {
        return throwRuntime(ErrorCode.INVALID_ARGUMENT, {
          callee: "queueMicrotask",
          message: `callback ${asString(fn)} is not a function`,
        });
      }
      ctx.queueMicrotask(() => {
        ctx.callValue(fn, []);
      });
      return undef();
    }
    case "ClearTimer": {
      const id = expr.id ? ctx.evalExpr(expr.id, frame) : undef();
      if (id.kind === "Number" || id.kind === "Float") scheduler.clear(Math.trunc(id.value));
      return undef();
    }
  }
}

// ============= DISPATCH =============

/** Evaluates one expression in `frame`. */
export function evaluate(ctx: EvalContext, expr: Expr, frame: Frame): Value {
  switch (expr.kind) {
    case "String":
      return str(expr.value);
    case "Bool":
      return bool(expr.value);
    case "Null":
      return nul();
    case "Undefined":
      return undef();
    case "Number":
      return num(expr.value);
    case "Float":
      return float(expr.value);
    case "BigInt":
      return big(expr.value);
    case "RegexLiteral":
      return createRegExp(expr.pattern, expr.flags);
    case "Spread":
      return ctx.evalExpr(expr.expr, frame);
    case "ArrayLiteral":
      return arr(evalSpreadList(ctx, expr.items, frame));
    case "ObjectLiteral":
      return evalObjectLiteral(ctx, expr, frame);
    case "Function":
      return createFunction(expr.handler, frame.env, {
        isAsync: expr.isAsync,
        isArrow: expr.isArrow,
        name: expr.name,
      });
    case "Var":
      return evalVar(ctx, expr.name, frame);
    case "Binary":
      return evalBinary(ctx, expr, frame);
    case "Add": {
      const operands = expr.operands.map((operand) => ctx.evalExpr(operand, frame));
      const [first, ...rest] = operands;
      return rest.reduce(addValues, first ?? undef());
    }
    case "Ternary":
      return ctx.evalExpr(truthy(ctx.evalExpr(expr.cond, frame)) ? expr.then : expr.otherwise, frame);
    case "Comma": {
      let last: Value = undef();
      for (const e of expr.exprs) last = ctx.evalExpr(e, frame);
      return last;
    }
    case "Unary":
      return evalUnary(ctx, expr.op, expr.operand, frame);
    case "Assign":
      return evalAssign(ctx, expr.target, expr.op, expr.value, frame);
    case "Update":
      return evalUpdate(ctx, expr.target, expr.delta, expr.prefix, frame);
    case "Call":
      return evalCall(ctx, expr, frame);
    case "FunctionCall":
      return evalFunctionCall(ctx, expr, frame);
    case "MemberCall":
      return evalMemberCall(ctx, expr, frame);
    case "MemberGet": {
      const object = ctx.evalExpr(expr.target, frame);
      if (expr.optional && isNullish(object)) return undef();
      return getMember(object, expr.member);
    }
    case "IndexGet": {
      const object = ctx.evalExpr(expr.target, frame);
      if (expr.optional && isNullish(object)) return undef();
      return getMember(object, propertyKey(ctx.evalExpr(expr.index, frame)));
    }
    case "New": {
      const callee =
        expr.callee.kind === "ConstructorRef" ? ctor(expr.callee.name) : ctx.evalExpr(expr.callee, frame);
      return ctx.construct(callee, evalSpreadList(ctx, expr.args, frame));
    }
    case "SetTimeout":
    case "SetInterval":
    case "RequestAnimationFrame":
    case "QueueMicrotask":
    case "ClearTimer":
      return evalTimer(ctx, expr, frame);
    default:
      return evalBuiltin(ctx, expr, frame);
  }
}
