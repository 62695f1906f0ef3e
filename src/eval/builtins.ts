import type { ConsoleLevel, TypedArrayType } from "../ast/nodes";
import { ErrorCode, throwRuntime } from "../errors";
import { TYPED_ARRAY_TYPES } from "../parser/builtins";
import { parseFunctionConstructor } from "../parser";
import {
  createArrayBuffer,
  createTypedArray,
  createTypedArrayView,
  typedArrayBytes,
  writeElement,
} from "../runtime/buffers";
import {
  asString,
  coerceNumberForGlobal,
  numericValue,
  propertyKey,
  toIntegerOrInfinity,
  truthy,
} from "../runtime/coerce";
import { parseDateString, utcFromComponents } from "../runtime/dates";
import { sameValueZero } from "../runtime/equality";
import { formatConsoleArgs } from "../runtime/inspect";
import { jsonParse, jsonStringify } from "../runtime/json";
import type { StringifyOptions } from "../runtime/json";
import {
  callResolver,
  createPromise,
  createResolvingFunctions,
  promiseAll,
  promiseAllSettled,
  promiseAny,
  promiseRace,
  promiseReject,
  promiseResolve,
} from "../runtime/promise";
import { createRegExp } from "../runtime/regex";
import { thrownValue } from "../runtime/thrown";
import { createUrl } from "../runtime/url";
import type {
  BlobValue,
  BuiltinValue,
  DateValue,
  MapValue,
  ObjectValue,
  SetValue,
  TypedArrayValue,
  Value,
} from "../runtime/value";
import {
  arr,
  big,
  bool,
  builtin,
  errorObject,
  float,
  isCallable,
  isNullish,
  isNumeric,
  isPrimitive,
  nul,
  num,
  obj,
  ownProperties,
  str,
  undef,
} from "../runtime/value";
import { createFunction } from "./calls";
import type { EvalContext } from "./context";
import { callDialog, callGlobal, parseFloatValue, parseIntValue } from "./globals";
import { enumerableKeys, iterableValues } from "./iterate";
import { functionPrototype, getMember, setMember } from "./members";
import { lookupMethod } from "./methods";
import { elementInput } from "./methods/buffers";
import { arg, callbackArg, optionalArg } from "./methods/shared";

function invalid(callee: string, message: string): never {
  return throwRuntime(ErrorCode.INVALID_ARGUMENT, { callee, message });
}

// ============= MATH =============

const MATH_CONSTANTS: Readonly<Record<string, number>> = {
  E: Math.E,
  LN2: Math.LN2,
  LN10: Math.LN10,
  LOG2E: Math.LOG2E,
  LOG10E: Math.LOG10E,
  PI: Math.PI,
  SQRT1_2: Math.SQRT1_2,
  SQRT2: Math.SQRT2,
};

const MATH_UNARY: Readonly<Record<string, (x: number) => number>> = {
  abs: Math.abs,
  ceil: Math.ceil,
  floor: Math.floor,
  round: Math.round,
  trunc: Math.trunc,
  sign: Math.sign,
  sqrt: Math.sqrt,
  cbrt: Math.cbrt,
  exp: Math.exp,
  expm1: Math.expm1,
  log: Math.log,
  log2: Math.log2,
  log10: Math.log10,
  log1p: Math.log1p,
  sin: Math.sin,
  cos: Math.cos,
  tan: Math.tan,
  asin: Math.asin,
  acos: Math.acos,
  atan: Math.atan,
  sinh: Math.sinh,
  cosh: Math.cosh,
  tanh: Math.tanh,
  asinh: Math.asinh,
  acosh: Math.acosh,
  atanh: Math.atanh,
  fround: Math.fround,
  clz32: Math.clz32,
};

const MATH_VARIADIC: Readonly<Record<string, (...xs: number[]) => number>> = {
  max: Math.max,
  min: Math.min,
  hypot: Math.hypot,
  atan2: Math.atan2,
  pow: Math.pow,
  imul: Math.imul,
};

export function mathConstant(name: string): Value {
  const value = MATH_CONSTANTS[name];
  return value === undefined ? undef() : num(value);
}

export function callMath(ctx: EvalContext, method: string, args: Value[]): Value {
  if (method === "random") return float(ctx.random());
  const numbers = args.map(numericValue);
  if (Object.prototype.hasOwnProperty.call(MATH_UNARY, method)) {
    return num(MATH_UNARY[method](numbers[0] ?? NaN));
  }
  if (Object.prototype.hasOwnProperty.call(MATH_VARIADIC, method)) {
    return num(MATH_VARIADIC[method](...numbers));
  }
  return throwRuntime(ErrorCode.NOT_A_FUNCTION, { target: `Math.${method}` });
}

// ============= NUMBER =============

const NUMBER_CONSTANTS: Readonly<Record<string, number>> = {
  MAX_SAFE_INTEGER: Number.MAX_SAFE_INTEGER,
  MIN_SAFE_INTEGER: Number.MIN_SAFE_INTEGER,
  MAX_VALUE: Number.MAX_VALUE,
  MIN_VALUE: Number.MIN_VALUE,
  EPSILON: Number.EPSILON,
  POSITIVE_INFINITY: Infinity,
  NEGATIVE_INFINITY: -Infinity,
  NaN: NaN,
};

export function numberConstant(name: string): Value {
  const value = NUMBER_CONSTANTS[name];
  return value === undefined ? undef() : num(value);
}

export function callNumberStatic(method: string, args: Value[]): Value {
  const value = arg(args, 0);
  const n = isNumeric(value) ? value.value : undefined;
  switch (method) {
    case "isInteger":
      return bool(n !== undefined && Number.isInteger(n));
    case "isSafeInteger":
      return bool(n !== undefined && Number.isSafeInteger(n));
    case "isFinite":
      return bool(n !== undefined && Number.isFinite(n));
    case "isNaN":
      return bool(n !== undefined && Number.isNaN(n));
    case "parseFloat":
      return parseFloatValue(value);
    case "parseInt":
      return parseIntValue(value, args[1]);
    default:
      return throwRuntime(ErrorCode.NOT_A_FUNCTION, { target: `Number.${method}` });
  }
}

/** `Number(value)`. */
export function toNumber(value: Value | undefined): Value {
  if (!value) return num(0);
  if (value.kind === "BigInt") return num(Number(value.value));
  return num(coerceNumberForGlobal(value));
}

/** `BigInt(value)`. */
export function toBigInt(value: Value): Value {
  switch (value.kind) {
    case "BigInt":
      return value;
    case "Bool":
      return big(value.value ? 1n : 0n);
    case "Number":
    case "Float":
      if (!Number.isInteger(value.value)) {
        return throwRuntime(ErrorCode.RANGE, {
          message: `The number ${asString(value)} cannot be converted to a BigInt because it is not an integer`,
        });
      }
      return big(BigInt(value.value));
    case "String": {
      const text = value.value.trim();
      try {
        return big(BigInt(text === "" ? "0" : text));
      } catch {
        return invalid("BigInt", `cannot convert ${value.value} to a BigInt`);
      }
    }
    default:
      return invalid("BigInt", `cannot convert ${asString(value)} to a BigInt`);
  }
}

// ============= OBJECT =============

function requireObjectCoercible(value: Value, callee: string): void {
  if (isNullish(value)) invalid(callee, "cannot convert undefined or null to object");
}

function hasOwn(value: Value, key: string): boolean {
  if (value.kind === "Array") {
    const idx = Number(key);
    if (Number.isInteger(idx) && idx >= 0 && idx < value.elements.length) return true;
  }
  if (value.kind === "String") {
    const idx = Number(key);
    if (key === "length" || (Number.isInteger(idx) && idx >= 0 && idx < value.value.length)) return true;
  }
  if (value.kind === "Storage" && value.items.has(key)) return true;
  return ownProperties(value)?.has(key) ?? false;
}

function objectCreate(proto: Value, props: Value | undefined): Value {
  if (proto.kind !== "Object" && proto.kind !== "Null") {
    return invalid("Object.create", "Object prototype may only be an Object or null");
  }
  const created = obj();
  if (proto.kind === "Object") created.proto = proto;
  if (props && !isNullish(props)) {
    for (const key of enumerableKeys(props)) {
      created.entries.set(key, getMember(getMember(props, key), "value"));
    }
  }
  return created;
}

export function callObjectStatic(method: string, args: Value[]): Value {
  const target = arg(args, 0);
  const callee = `Object.${method}`;
  switch (method) {
    case "keys":
      requireObjectCoercible(target, callee);
      return arr(enumerableKeys(target).map((k) => str(k)));
    case "values":
      requireObjectCoercible(target, callee);
      return arr(enumerableKeys(target).map((k) => getMember(target, k)));
    case "entries":
      requireObjectCoercible(target, callee);
      return arr(enumerableKeys(target).map((k) => arr([str(k), getMember(target, k)])));
    case "assign": {
      requireObjectCoercible(target, callee);
      for (const source of args.slice(1)) {
        if (isNullish(source)) continue;
        for (const key of enumerableKeys(source)) setMember(target, key, getMember(source, key));
      }
      return target;
    }
    case "freeze":
      if (target.kind === "Object") target.frozen = true;
      return target;
    case "isFrozen":
      return bool(target.kind === "Object" ? target.frozen : isPrimitive(target));
    case "fromEntries": {
      const result = obj();
      for (const entry of iterableValues(target)) {
        const [key, value] = iterableValues(entry);
        result.entries.set(propertyKey(key ?? undef()), value ?? undef());
      }
      return result;
    }
    case "hasOwn":
      requireObjectCoercible(target, callee);
      return bool(hasOwn(target, propertyKey(arg(args, 1))));
    case "getPrototypeOf":
      requireObjectCoercible(target, callee);
      return target.kind === "Object" && target.proto ? target.proto : nul();
    case "create":
      return objectCreate(target, args[1]);
    default:
      return throwRuntime(ErrorCode.NOT_A_FUNCTION, { target: callee });
  }
}

// ============= ARRAY =============

/** Elements `0..length-1` of an object with a `length` property. */
function arrayLikeValues(source: Value): Value[] {
  const length = toIntegerOrInfinity(getMember(source, "length"));
  return Array.from({ length: Math.max(0, length) }, (_, i) => getMember(source, String(i)));
}

export function arrayFrom(ctx: EvalContext, source: Value, mapFn: Value | undefined): Value {
  let items: Value[];
  if (source.kind === "Object") {
    items = arrayLikeValues(source);
  } else if (isNullish(source)) {
    return invalid("Array.from", "cannot convert undefined or null to object");
  } else if (source.kind === "Number" || source.kind === "Float" || source.kind === "Bool") {
    items = [];
  } else {
    items = iterableValues(source);
  }
  if (!mapFn || mapFn.kind === "Undefined") return arr(items);
  const fn = callbackArg([mapFn], 0, "Array.from");
  return arr(items.map((item, i) => ctx.callValue(fn, [item, num(i)])));
}

function callArrayStatic(ctx: EvalContext, method: string, args: Value[]): Value {
  switch (method) {
    case "isArray":
      return bool(arg(args, 0).kind === "Array");
    case "from":
      return arrayFrom(ctx, arg(args, 0), optionalArg(args, 1));
    case "of":
      return arr([...args]);
    default:
      return throwRuntime(ErrorCode.NOT_A_FUNCTION, { target: `Array.${method}` });
  }
}

function constructArray(args: Value[]): Value {
  const [only] = args;
  if (args.length !== 1 || !only || !isNumeric(only)) return arr([...args]);
  if (!Number.isInteger(only.value) || only.value < 0 || only.value >= 2 ** 32) {
    return throwRuntime(ErrorCode.RANGE, { message: "Invalid array length" });
  }
  return arr(Array.from({ length: only.value }, () => undef()));
}

// ============= PROMISE =============

/** `new Promise(executor)`; a throwing executor rejects the promise. */
export function newPromise(ctx: EvalContext, executor: Value): Value {
  if (!isCallable(executor)) {
    return invalid("Promise", `resolver ${asString(executor)} is not a function`);
  }
  const promise = createPromise(ctx);
  const { resolve, reject } = createResolvingFunctions(promise);
  try {
    ctx.callValue(executor, [resolve, reject]);
  } catch (e) {
    const reason = thrownValue(e);
    if (reason === undefined) throw e;
    callResolver(ctx, reject, reason);
  }
  return promise;
}

export function callPromiseStatic(ctx: EvalContext, method: string, args: Value[]): Value {
  const first = arg(args, 0);
  switch (method) {
    case "resolve":
      return promiseResolve(ctx, first);
    case "reject":
      return promiseReject(ctx, first);
    case "all":
      return promiseAll(ctx, iterableValues(first));
    case "allSettled":
      return promiseAllSettled(ctx, iterableValues(first));
    case "race":
      return promiseRace(ctx, iterableValues(first));
    case "any":
      return promiseAny(ctx, iterableValues(first));
    default:
      return throwRuntime(ErrorCode.NOT_A_FUNCTION, { target: `Promise.${method}` });
  }
}

// ============= DATE =============

const MAX_TIME = 8.64e15;

function timeClip(ms: number): number {
  if (!Number.isFinite(ms) || Math.abs(ms) > MAX_TIME) return NaN;
  return Math.trunc(ms) + 0;
}

function dateFromComponents(args: Value[]): number {
  const parts = args.map(numericValue);
  if (parts.length === 0 || parts.some((n) => !Number.isFinite(n))) return NaN;
  const [year, month = 0, day = 1, hour = 0, minute = 0, second = 0, ms = 0] = parts.map(Math.trunc);
  return timeClip(utcFromComponents(year, month, day, hour, minute, second, ms));
}

/** `new Date(...)` against the virtual clock. */
export function dateNew(ctx: EvalContext, args: Value[]): DateValue {
  if (args.length === 0) return { kind: "Date", ms: ctx.scheduler.nowMs };
  if (args.length === 1) {
    const [value] = args;
    if (value.kind === "Date") return { kind: "Date", ms: value.ms };
    if (value.kind === "String") return { kind: "Date", ms: parseDateString(value.value) ?? NaN };
    return { kind: "Date", ms: timeClip(coerceNumberForGlobal(value)) };
  }
  return { kind: "Date", ms: dateFromComponents(args) };
}

function msValue(ms: number): Value {
  return Number.isNaN(ms) ? float(NaN) : num(ms);
}

export function dateParse(text: Value): Value {
  return msValue(parseDateString(asString(text)) ?? NaN);
}

export function dateUtc(args: Value[]): Value {
  return msValue(dateFromComponents(args));
}

function callDateStatic(ctx: EvalContext, method: string, args: Value[]): Value {
  switch (method) {
    case "now":
      return num(ctx.scheduler.nowMs);
    case "parse":
      return dateParse(arg(args, 0));
    case "UTC":
      return dateUtc(args);
    default:
      return throwRuntime(ErrorCode.NOT_A_FUNCTION, { target: `Date.${method}` });
  }
}

// ============= COLLECTIONS =============

function checkWeakKey(value: Value, callee: string): void {
  if (isPrimitive(value)) invalid(callee, `invalid value used as weak key: ${asString(value)}`);
}

export function createMap(iterable: Value | undefined, weak: boolean): MapValue {
  const map: MapValue = { kind: "Map", entries: [], properties: new Map(), weak };
  if (!iterable || isNullish(iterable)) return map;
  const callee = weak ? "WeakMap" : "Map";
  for (const entry of iterableValues(iterable)) {
    if (isPrimitive(entry)) invalid(callee, `iterator value ${asString(entry)} is not an entry object`);
    const key = getMember(entry, "0");
    const value = getMember(entry, "1");
    if (weak) checkWeakKey(key, callee);
    const existing = map.entries.find(([k]) => sameValueZero(k, key));
    if (existing) existing[1] = value;
    else map.entries.push([key, value]);
  }
  return map;
}

export function createSet(iterable: Value | undefined, weak: boolean): SetValue {
  const set: SetValue = { kind: "Set", values: [], properties: new Map(), weak };
  if (!iterable || isNullish(iterable)) return set;
  for (const value of iterableValues(iterable)) {
    if (weak) checkWeakKey(value, "WeakSet");
    if (!set.values.some((v) => sameValueZero(v, value))) set.values.push(value);
  }
  return set;
}

// ============= BUFFERS, BLOBS, ERRORS =============

function isTypedArrayName(name: string): name is TypedArrayType {
  return TYPED_ARRAY_TYPES.some((t) => t === name);
}

export function constructArrayBuffer(length: Value, options: Value | undefined): Value {
  const max = options && options.kind === "Object" ? getMember(options, "maxByteLength") : undefined;
  return createArrayBuffer(
    toIntegerOrInfinity(length),
    max && max.kind !== "Undefined" ? toIntegerOrInfinity(max) : undefined
  );
}

export function constructTypedArray(type: TypedArrayType, args: Value[]): TypedArrayValue {
  const [first, offset, length] = args;
  if (!first || first.kind === "Undefined" || first.kind === "Null") return createTypedArray(type, 0);
  if (first.kind === "ArrayBuffer") {
    return createTypedArrayView(
      type,
      first,
      toIntegerOrInfinity(offset),
      length && length.kind !== "Undefined" ? toIntegerOrInfinity(length) : undefined
    );
  }
  if (isNumeric(first)) return createTypedArray(type, toIntegerOrInfinity(first));
  const values = first.kind === "Object" ? arrayLikeValues(first) : iterableValues(first);
  const view = createTypedArray(type, values.length);
  values.forEach((value, i) => writeElement(view, i, elementInput(value)));
  return view;
}

function partBytes(part: Value): Uint8Array {
  switch (part.kind) {
    case "Blob":
      return part.bytes;
    case "ArrayBuffer":
      return part.bytes.slice();
    case "TypedArray":
      return typedArrayBytes(part);
    default:
      return Buffer.from(asString(part), "utf8");
  }
}

export function constructBlob(parts: Value | undefined, options: Value | undefined): BlobValue {
  const chunks = parts && !isNullish(parts) ? iterableValues(parts).map(partBytes) : [];
  const type = options && options.kind === "Object" ? getMember(options, "type") : undefined;
  return {
    kind: "Blob",
    bytes: new Uint8Array(Buffer.concat(chunks)),
    type: type && type.kind !== "Undefined" ? asString(type).toLowerCase() : "",
  };
}

/** `new Error(message, { cause })` and the other error constructors. */
export function constructError(name: string, message: Value | undefined, options?: Value): ObjectValue {
  const error = errorObject(name, message && message.kind !== "Undefined" ? asString(message) : "");
  if (options && options.kind === "Object" && options.entries.has("cause")) {
    error.entries.set("cause", getMember(options, "cause"));
  }
  return error;
}

export function constructFunctionFromSource(ctx: EvalContext, args: Value[]): Value {
  const texts = args.map(asString);
  const body = texts.pop() ?? "";
  const handler = parseFunctionConstructor(texts, body);
  return createFunction(handler, ctx.globals.root(), { isAsync: false, isArrow: false, name: "anonymous" });
}

// ============= CONSTRUCTOR MARKERS =============

const ERROR_CONSTRUCTORS = new Set(["Error", "TypeError", "RangeError", "SyntaxError", "ReferenceError"]);

/** `new Name(...)` for a constructor marker. */
export function constructBuiltin(ctx: EvalContext, name: string, args: Value[]): Value {
  const first = arg(args, 0);
  if (isTypedArrayName(name)) return constructTypedArray(name, args);
  if (ERROR_CONSTRUCTORS.has(name)) return constructError(name, args[0], args[1]);
  switch (name) {
    case "Map":
    case "WeakMap":
      return createMap(args[0], name === "WeakMap");
    case "Set":
    case "WeakSet":
      return createSet(args[0], name === "WeakSet");
    case "Promise":
      return newPromise(ctx, first);
    case "Date":
      return dateNew(ctx, args);
    case "RegExp": {
      const flags = optionalArg(args, 1);
      if (first.kind === "RegExp") return createRegExp(first.source, flags ? asString(flags) : first.flags);
      return createRegExp(first.kind === "Undefined" ? "" : asString(first), flags ? asString(flags) : "");
    }
    case "ArrayBuffer":
      return constructArrayBuffer(first, args[1]);
    case "URL": {
      const base = optionalArg(args, 1);
      return createUrl(asString(first), base ? asString(base) : undefined);
    }
    case "Blob":
      return constructBlob(args[0], args[1]);
    case "Array":
      return constructArray(args);
    case "Object":
      return isPrimitive(first) ? obj() : first;
    case "Function":
      return constructFunctionFromSource(ctx, args);
    // primitive wrappers are not modelled; `new Number(5)` is the primitive
    case "Number":
      return toNumber(args[0]);
    case "String":
      return str(args.length ? asString(first) : "");
    case "Boolean":
      return bool(args.length > 0 && truthy(first));
    default:
      return throwRuntime(ErrorCode.NOT_A_CONSTRUCTOR, { name });
  }
}

/** A constructor marker called without `new`, e.g. `String(x)` through an alias. */
export function callConstructorAsFunction(ctx: EvalContext, name: string, args: Value[]): Value {
  const first = arg(args, 0);
  switch (name) {
    case "Number":
      return toNumber(args[0]);
    case "String":
      return str(args.length ? asString(first) : "");
    case "Boolean":
      return bool(truthy(first));
    case "BigInt":
      return toBigInt(first);
    case "Symbol":
      return ctx.createSymbol(first.kind === "Undefined" ? undefined : asString(first));
    case "Date":
      return str(asString(dateNew(ctx, [])));
    case "Array":
    case "Object":
    case "RegExp":
    case "Function":
      return constructBuiltin(ctx, name, args);
    default:
      if (ERROR_CONSTRUCTORS.has(name)) return constructError(name, args[0], args[1]);
      return invalid(name, "constructor requires 'new'");
  }
}

/** `value instanceof ctorValue`. */
export function instanceOf(value: Value, ctorValue: Value): boolean {
  if (ctorValue.kind === "Function") {
    if (value.kind !== "Object") return false;
    const target = functionPrototype(ctorValue);
    const seen = new Set<ObjectValue>();
    for (let proto = value.proto; proto && !seen.has(proto); proto = proto.proto) {
      if (proto === target) return true;
      seen.add(proto);
    }
    return false;
  }
  if (ctorValue.kind !== "Constructor") {
    return invalid("instanceof", "right-hand side is not callable");
  }
  const name = ctorValue.name;
  if (isTypedArrayName(name)) return value.kind === "TypedArray" && value.type === name;
  if (name === "Error") return value.kind === "Object" && value.errorName !== undefined;
  if (ERROR_CONSTRUCTORS.has(name)) return value.kind === "Object" && value.errorName === name;
  switch (name) {
    case "Object":
      return !isPrimitive(value);
    case "Array":
      return value.kind === "Array";
    case "Map":
    case "WeakMap":
      return value.kind === "Map" && value.weak === (name === "WeakMap");
    case "Set":
    case "WeakSet":
      return value.kind === "Set" && value.weak === (name === "WeakSet");
    case "Promise":
    case "Date":
    case "RegExp":
    case "ArrayBuffer":
    case "Blob":
      return value.kind === name;
    case "URL":
      return value.kind === "Url";
    case "Function":
      return isCallable(value);
    default:
      return false;
  }
}

// ============= JSON AND CONSOLE =============

export function stringifyJson(
  ctx: EvalContext,
  value: Value,
  replacer: Value | undefined,
  space: Value | undefined
): Value {
  const options: StringifyOptions = {};
  if (space) options.space = space;
  if (replacer && isCallable(replacer)) {
    options.replace = (key, current) => ctx.callValue(replacer, [str(key), current]);
  } else if (replacer && replacer.kind === "Array") {
    options.allow = new Set(replacer.elements.map(asString));
  }
  const text = jsonStringify(value, options);
  return text === undefined ? undef() : str(text);
}

export function consoleCall(ctx: EvalContext, level: ConsoleLevel, args: Value[]): Value {
  ctx.hooks.console(level, formatConsoleArgs(args));
  return undef();
}

const CONSOLE_LEVELS: ReadonlySet<string> = new Set(["log", "info", "warn", "error", "debug"]);

function isConsoleLevel(name: string): name is ConsoleLevel {
  return CONSOLE_LEVELS.has(name);
}

// ============= BUILTIN VALUES =============

/** Calls a builtin passed around as a value: `Math.max`, `parseInt`, `arr.push`. */
export function callBuiltin(ctx: EvalContext, fn: BuiltinValue, args: Value[]): Value {
  if (fn.receiver) {
    const method = lookupMethod(fn.receiver, fn.name);
    if (!method) return throwRuntime(ErrorCode.MEMBER_NOT_A_FUNCTION, { member: fn.name });
    return method(ctx, args);
  }
  if (fn.name === "event.preventDefault") {
    const event = ctx.activeEvent;
    if (event && event.state.cancelable) event.state.defaultPrevented = true;
    return undef();
  }
  const dot = fn.name.indexOf(".");
  if (dot < 0) {
    if (fn.name === "alert" || fn.name === "confirm" || fn.name === "prompt") {
      return callDialog(ctx, fn.name, args);
    }
    return callGlobal(ctx, fn.name, args);
  }
  const namespace = fn.name.slice(0, dot);
  const member = fn.name.slice(dot + 1);
  switch (namespace) {
    case "Math":
      return callMath(ctx, member, args);
    case "Number":
      return callNumberStatic(member, args);
    case "Object":
      return callObjectStatic(member, args);
    case "Array":
      return callArrayStatic(ctx, member, args);
    case "Promise":
      return callPromiseStatic(ctx, member, args);
    case "Date":
      return callDateStatic(ctx, member, args);
    case "JSON":
      if (member === "stringify") return stringifyJson(ctx, arg(args, 0), args[1], args[2]);
      if (member === "parse") return jsonParse(asString(arg(args, 0)));
      break;
    case "console":
      if (isConsoleLevel(member)) return consoleCall(ctx, member, args);
      break;
    default:
      break;
  }
  return throwRuntime(ErrorCode.NOT_A_FUNCTION, { target: fn.name });
}

/** `Math`, `JSON` and `console` as objects, for code that reaches them other than by a direct call. */
export function namespaceObjects(): Array<[string, ObjectValue]> {
  const math = obj(Object.entries(MATH_CONSTANTS).map(([k, v]): [string, Value] => [k, num(v)]));
  for (const name of [...Object.keys(MATH_UNARY), ...Object.keys(MATH_VARIADIC), "random"]) {
    math.entries.set(name, builtin(`Math.${name}`));
  }
  const json = obj([
    ["parse", builtin("JSON.parse")],
    ["stringify", builtin("JSON.stringify")],
  ]);
  const console = obj([...CONSOLE_LEVELS].map((level): [string, Value] => [level, builtin(`console.${level}`)]));
  const namespaces: Array<[string, ObjectValue]> = [
    ["Math", math],
    ["JSON", json],
    ["console", console],
  ];
  for (const [, value] of namespaces) value.frozen = true;
  return namespaces;
}
