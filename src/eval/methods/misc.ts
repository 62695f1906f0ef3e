import { ErrorCode, throwRuntime } from "../../errors";
import { bufferFromBytes } from "../../runtime/buffers";
import {
  asString,
  formatFloat,
  propertyKey,
  relativeIndex,
  toIntegerOrInfinity,
} from "../../runtime/coerce";
import { dateParts, formatIsoDate } from "../../runtime/dates";
import type { DateParts } from "../../runtime/dates";
import { promiseFinally, promiseResolve, promiseThen } from "../../runtime/promise";
import { regexExec, regexTest } from "../../runtime/regex";
import {
  storageClear,
  storageGetItem,
  storageKey,
  storageRemoveItem,
  storageSetItem,
} from "../../runtime/storage";
import type {
  BigIntValue,
  BlobValue,
  BoolValue,
  CallableValue,
  DateValue,
  FloatValue,
  NumberValue,
  ObjectValue,
  PromiseValue,
  RegExpValue,
  StorageValue,
  SymbolValue,
  UrlValue,
  Value,
} from "../../runtime/value";
import { bool, float, nul, num, str, undef } from "../../runtime/value";
import type { EvalContext } from "../context";
import type { MethodTable } from "./shared";
import { arg, optionalArg, stringArg } from "./shared";

// ============= NUMBERS =============

function digitsArg(args: Value[], callee: string, min: number, max: number): number | undefined {
  const value = optionalArg(args, 0);
  if (!value) return undefined;
  const n = toIntegerOrInfinity(value);
  if (n < min || n > max) {
    return throwRuntime(ErrorCode.RANGE, { message: `${callee} argument must be between ${min} and ${max}` });
  }
  return n;
}

function radixString(n: number, args: Value[]): string {
  const radix = digitsArg(args, "toString()", 2, 36) ?? 10;
  if (radix === 10 || !Number.isFinite(n)) return formatFloat(n);
  return n.toString(radix);
}

export const NUMBER_METHODS: MethodTable<NumberValue | FloatValue> = {
  toFixed: (_ctx, self, args) => {
    const digits = digitsArg(args, "toFixed()", 0, 100) ?? 0;
    if (!Number.isFinite(self.value)) return str(formatFloat(self.value));
    return str(self.value.toFixed(digits));
  },
  toPrecision: (_ctx, self, args) => {
    const precision = digitsArg(args, "toPrecision()", 1, 100);
    if (precision === undefined || !Number.isFinite(self.value)) return str(formatFloat(self.value));
    return str(self.value.toPrecision(precision));
  },
  toString: (_ctx: EvalContext, self: NumberValue | FloatValue, args: Value[]) => str(radixString(self.value, args)),
  toLocaleString: (_ctx: EvalContext, self: NumberValue | FloatValue) => str(self.value.toLocaleString("en-US")),
  valueOf: (_ctx: EvalContext, self: NumberValue | FloatValue) => self,
};

export const BIGINT_METHODS: MethodTable<BigIntValue> = {
  toString: (_ctx: EvalContext, self: BigIntValue, args: Value[]) => str(self.value.toString(digitsArg(args, "toString()", 2, 36) ?? 10)),
  toLocaleString: (_ctx: EvalContext, self: BigIntValue) => str(self.value.toLocaleString("en-US")),
  valueOf: (_ctx: EvalContext, self: BigIntValue) => self,
};

export const BOOL_METHODS: MethodTable<BoolValue> = {
  toString: (_ctx: EvalContext, self: BoolValue) => str(asString(self)),
  valueOf: (_ctx: EvalContext, self: BoolValue) => self,
};

export const SYMBOL_METHODS: MethodTable<SymbolValue> = {
  toString: (_ctx: EvalContext, self: SymbolValue) => str(asString(self)),
  valueOf: (_ctx: EvalContext, self: SymbolValue) => self,
};

// ============= DATES =============

function dateGetter(part: keyof DateParts): (ctx: unknown, self: DateValue) => Value {
  return (_ctx, self) => (Number.isFinite(self.ms) ? num(dateParts(self.ms)[part]) : float(NaN));
}

function isoString(self: DateValue): string {
  const iso = formatIsoDate(self.ms);
  if (iso === undefined) return throwRuntime(ErrorCode.RANGE, { message: "Invalid time value" });
  return iso;
}

export const DATE_METHODS: MethodTable<DateValue> = {
  getTime: (_ctx, self) => num(self.ms),
  valueOf: (_ctx: EvalContext, self: DateValue) => num(self.ms),
  setTime: (_ctx, self, args) => {
    const n = toIntegerOrInfinity(arg(args, 0));
    self.ms = Number.isFinite(n) ? n : NaN;
    return num(self.ms);
  },
  toISOString: (_ctx, self) => str(isoString(self)),
  toJSON: (_ctx, self) => {
    const iso = formatIsoDate(self.ms);
    return iso === undefined ? nul() : str(iso);
  },
  toString: (_ctx: EvalContext, self: DateValue) => str(asString(self)),
  getTimezoneOffset: () => num(0),
  getFullYear: dateGetter("year"),
  getMonth: dateGetter("month"),
  getDate: dateGetter("date"),
  getDay: dateGetter("day"),
  getHours: dateGetter("hours"),
  getMinutes: dateGetter("minutes"),
  getSeconds: dateGetter("seconds"),
  getMilliseconds: dateGetter("milliseconds"),
  getUTCFullYear: dateGetter("year"),
  getUTCMonth: dateGetter("month"),
  getUTCDate: dateGetter("date"),
  getUTCDay: dateGetter("day"),
  getUTCHours: dateGetter("hours"),
  getUTCMinutes: dateGetter("minutes"),
  getUTCSeconds: dateGetter("seconds"),
  getUTCMilliseconds: dateGetter("milliseconds"),
};

// ============= REGEXP =============

export const REGEXP_METHODS: MethodTable<RegExpValue> = {
  test: (_ctx, self, args) => bool(regexTest(self, stringArg(args, 0))),
  exec: (_ctx, self, args) => regexExec(self, stringArg(args, 0)),
  toString: (_ctx: EvalContext, self: RegExpValue) => str(asString(self)),
};

// ============= PROMISES =============

export const PROMISE_METHODS: MethodTable<PromiseValue> = {
  then: (ctx, self, args) => promiseThen(ctx, self, optionalArg(args, 0), optionalArg(args, 1)),
  catch: (ctx, self, args) => promiseThen(ctx, self, undefined, optionalArg(args, 0)),
  finally: (ctx, self, args) => promiseFinally(ctx, self, optionalArg(args, 0)),
};

// ============= HOST OBJECTS =============

export const STORAGE_METHODS: MethodTable<StorageValue> = {
  getItem: (_ctx, self, args) => storageGetItem(self, stringArg(args, 0)),
  setItem: (_ctx, self, args) => {
    storageSetItem(self, stringArg(args, 0), stringArg(args, 1));
    return undef();
  },
  removeItem: (_ctx, self, args) => {
    storageRemoveItem(self, stringArg(args, 0));
    return undef();
  },
  clear: (_ctx, self) => {
    storageClear(self);
    return undef();
  },
  key: (_ctx, self, args) => storageKey(self, toIntegerOrInfinity(arg(args, 0))),
};

export const URL_METHODS: MethodTable<UrlValue> = {
  toString: (_ctx: EvalContext, self: UrlValue) => str(self.href),
  toJSON: (_ctx, self) => str(self.href),
};

export function blobText(blob: BlobValue): string {
  return Buffer.from(blob.bytes).toString("utf8");
}

export const BLOB_METHODS: MethodTable<BlobValue> = {
  text: (ctx, self) => promiseResolve(ctx, str(blobText(self))),
  arrayBuffer: (ctx, self) => promiseResolve(ctx, bufferFromBytes(self.bytes.slice())),
  slice: (_ctx, self, args) => {
    const n = self.bytes.length;
    const type = optionalArg(args, 2);
    return {
      kind: "Blob",
      bytes: self.bytes.slice(relativeIndex(args[0], n, 0), relativeIndex(args[1], n, n)),
      type: type ? asString(type).toLowerCase() : "",
    };
  },
};

// ============= FUNCTIONS AND OBJECTS =============

function spreadArgs(list: Value | undefined): Value[] {
  if (!list || list.kind === "Undefined" || list.kind === "Null") return [];
  if (list.kind === "Array") return [...list.elements];
  return throwRuntime(ErrorCode.INVALID_ARGUMENT, {
    callee: "Function.prototype.apply",
    message: "argument list must be an array",
  });
}

export const FUNCTION_METHODS: MethodTable<CallableValue> = {
  call: (ctx, self, args) => ctx.callValue(self, args.slice(1), arg(args, 0)),
  apply: (ctx, self, args) => ctx.callValue(self, spreadArgs(args[1]), arg(args, 0)),
  bind: (_ctx, self, args) => {
    if (self.kind !== "Function") {
      if (args.length <= 1) return self;
      return throwRuntime(ErrorCode.INVALID_ARGUMENT, {
        callee: "Function.prototype.bind",
        message: "cannot pre-fill arguments of a builtin",
      });
    }
    return {
      ...self,
      boundThis: self.boundThis ?? arg(args, 0),
      boundArgs: [...(self.boundArgs ?? []), ...args.slice(1)],
      properties: new Map(),
    };
  },
  toString: (_ctx: EvalContext, self: CallableValue) => str(asString(self)),
};

export const OBJECT_METHODS: MethodTable<ObjectValue> = {
  hasOwnProperty: (_ctx: EvalContext, self: ObjectValue, args: Value[]) => bool(self.entries.has(propertyKey(arg(args, 0)))),
  toString: (_ctx: EvalContext, self: ObjectValue) => str(asString(self)),
  valueOf: (_ctx: EvalContext, self: ObjectValue) => self,
};
