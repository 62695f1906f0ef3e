import type {
  ConsoleLevel,
  DialogKind,
  ErrorName,
  Expr,
  ExprOf,
  TypedArrayType,
} from "../ast/nodes";
import { ErrorCode, throwParse } from "../errors";
import type { CallShape, ParserContext, Recognizer } from "./context";
import { readCallShape, stripGlobalPrefix } from "./context";

export const TYPED_ARRAY_TYPES: readonly TypedArrayType[] = [
  "Int8Array",
  "Uint8Array",
  "Uint8ClampedArray",
  "Int16Array",
  "Uint16Array",
  "Int32Array",
  "Uint32Array",
  "Float32Array",
  "Float64Array",
  "BigInt64Array",
  "BigUint64Array",
];

const ERROR_NAMES: readonly ErrorName[] = [
  "Error",
  "TypeError",
  "RangeError",
  "SyntaxError",
  "ReferenceError",
];

/** Names that evaluate to a constructor marker when used bare. */
export const CONSTRUCTOR_NAMES: ReadonlySet<string> = new Set([
  "Array",
  "Object",
  "Number",
  "String",
  "Boolean",
  "BigInt",
  "Symbol",
  "Map",
  "Set",
  "WeakMap",
  "WeakSet",
  "Promise",
  "Date",
  "RegExp",
  "ArrayBuffer",
  "URL",
  "Blob",
  "Function",
  ...ERROR_NAMES,
  ...TYPED_ARRAY_TYPES,
]);

const MATH_CONSTANTS = new Set([
  "E",
  "LN2",
  "LN10",
  "LOG2E",
  "LOG10E",
  "PI",
  "SQRT1_2",
  "SQRT2",
]);

const NUMBER_CONSTANTS = new Set([
  "MAX_SAFE_INTEGER",
  "MIN_SAFE_INTEGER",
  "MAX_VALUE",
  "MIN_VALUE",
  "EPSILON",
  "POSITIVE_INFINITY",
  "NEGATIVE_INFINITY",
  "NaN",
]);

const NUMBER_METHODS = new Set([
  "isInteger",
  "isSafeInteger",
  "isFinite",
  "isNaN",
  "parseFloat",
  "parseInt",
]);

const OBJECT_METHODS = new Set([
  "keys",
  "values",
  "entries",
  "assign",
  "freeze",
  "isFrozen",
  "fromEntries",
  "hasOwn",
  "getPrototypeOf",
  "create",
]);

const PROMISE_STATICS = new Set([
  "resolve",
  "reject",
  "all",
  "allSettled",
  "race",
  "any",
]);

export const GLOBAL_FUNCTIONS: ReadonlySet<string> = new Set([
  "parseInt",
  "parseFloat",
  "isNaN",
  "isFinite",
  "encodeURIComponent",
  "encodeURI",
  "decodeURIComponent",
  "decodeURI",
  "escape",
  "unescape",
  "atob",
  "btoa",
  "structuredClone",
]);

const CONSOLE_LEVELS: readonly ConsoleLevel[] = ["log", "info", "warn", "error", "debug"];
const DIALOGS: readonly DialogKind[] = ["alert", "confirm", "prompt"];

function arity(callee: string, rule: string): never {
  return throwParse(ErrorCode.ARITY, { callee, rule });
}

function argsOf(shape: CallShape, ctx: ParserContext): Expr[] {
  return shape.argSrc === undefined ? [] : ctx.parseArgs(shape.argSrc);
}

function between(
  callee: string,
  args: Expr[],
  min: number,
  max: number,
  rule: string
): Expr[] {
  if (args.length < min || args.length > max) arity(callee, rule);
  return args;
}

function isTypedArrayType(name: string): name is TypedArrayType {
  return TYPED_ARRAY_TYPES.some((t) => t === name);
}

function isErrorName(name: string): name is ErrorName {
  return ERROR_NAMES.some((n) => n === name);
}

function asConsoleLevel(name: string): ConsoleLevel | undefined {
  return CONSOLE_LEVELS.find((l) => l === name);
}

function asDialog(name: string): DialogKind | undefined {
  return DIALOGS.find((d) => d === name);
}

// ============= CONSTRUCTORS (`new X(...)`) =============

function recognizeNew(shape: CallShape, ctx: ParserContext): Expr | undefined {
  const name = shape.path;
  const args = argsOf(shape, ctx);
  if (name === "Date") {
    between("new Date", args, 0, 7, "supports zero to seven arguments");
    return { kind: "DateNew", args };
  }
  if (name === "Promise") {
    between("new Promise", args, 1, 1, "requires exactly one argument");
    return { kind: "PromiseConstruct", executor: args[0] };
  }
  if (name === "Map" || name === "WeakMap" || name === "Set" || name === "WeakSet") {
    between(`new ${name}`, args, 0, 1, "supports zero or one argument");
    const weak = name.startsWith("Weak");
    const expr: ExprOf<"MapConstruct"> | ExprOf<"SetConstruct"> = name.endsWith("Map")
      ? { kind: "MapConstruct", weak }
      : { kind: "SetConstruct", weak };
    if (args.length) expr.iterable = args[0];
    return expr;
  }
  if (name === "ArrayBuffer") {
    between("new ArrayBuffer", args, 1, 2, "requires one or two arguments");
    return args.length === 2
      ? { kind: "ArrayBufferConstruct", length: args[0], options: args[1] }
      : { kind: "ArrayBufferConstruct", length: args[0] };
  }
  if (isTypedArrayType(name)) {
    between(`new ${name}`, args, 0, 3, "supports zero to three arguments");
    return { kind: "TypedArrayConstruct", type: name, args };
  }
  if (name === "URL") {
    between("new URL", args, 1, 2, "requires one or two arguments");
    return args.length === 2
      ? { kind: "UrlConstruct", input: args[0], base: args[1] }
      : { kind: "UrlConstruct", input: args[0] };
  }
  if (name === "Blob") {
    between("new Blob", args, 0, 2, "supports zero to two arguments");
    const [parts, options] = args;
    const blob: ExprOf<"BlobConstruct"> = { kind: "BlobConstruct" };
    if (parts) blob.parts = parts;
    if (options) blob.options = options;
    return blob;
  }
  if (isErrorName(name)) {
    return args.length
      ? { kind: "ErrorConstruct", name, message: args[0] }
      : { kind: "ErrorConstruct", name };
  }
  if (name === "Function") return { kind: "FunctionConstructor", args };
  if (name === "Symbol" || name === "BigInt") {
    return throwParse(ErrorCode.INVALID_SYNTAX, { type: "constructor", src: `new ${name}` });
  }
  if (CONSTRUCTOR_NAMES.has(name)) {
    return { kind: "New", callee: { kind: "ConstructorRef", name }, args };
  }
  return undefined;
}

// ============= NAMESPACES (`Math.x`, `JSON.x`, ...) =============

type NamespaceHandler = (
  member: string,
  shape: CallShape,
  ctx: ParserContext
) => Expr | undefined;

const NAMESPACES: Record<string, NamespaceHandler> = {
  Math: (member, shape, ctx) => {
    if (shape.argSrc === undefined) {
      return MATH_CONSTANTS.has(member)
        ? { kind: "MathConst", name: member }
        : { kind: "BuiltinRef", name: `Math.${member}` };
    }
    return { kind: "MathMethod", method: member, args: argsOf(shape, ctx) };
  },
  Number: (member, shape, ctx) => {
    if (shape.argSrc === undefined) {
      if (NUMBER_CONSTANTS.has(member)) return { kind: "NumberConst", name: member };
      return NUMBER_METHODS.has(member)
        ? { kind: "BuiltinRef", name: `Number.${member}` }
        : undefined;
    }
    if (!NUMBER_METHODS.has(member)) return undefined;
    return { kind: "NumberMethod", method: member, args: argsOf(shape, ctx) };
  },
  JSON: (member, shape, ctx) => {
    if (shape.argSrc === undefined) return undefined;
    const args = argsOf(shape, ctx);
    if (member === "parse") {
      between("JSON.parse", args, 1, 2, "requires one or two arguments");
      return { kind: "JsonParse", text: args[0] };
    }
    if (member === "stringify") {
      between("JSON.stringify", args, 1, 3, "requires one to three arguments");
      const [value, replacer, space] = args;
      const expr: ExprOf<"JsonStringify"> = { kind: "JsonStringify", value };
      if (replacer) expr.replacer = replacer;
      if (space) expr.space = space;
      return expr;
    }
    return undefined;
  },
  Object: (member, shape, ctx) => {
    if (!OBJECT_METHODS.has(member)) return undefined;
    if (shape.argSrc === undefined) return { kind: "BuiltinRef", name: `Object.${member}` };
    return { kind: "ObjectStatic", method: member, args: argsOf(shape, ctx) };
  },
  Array: (member, shape, ctx) => {
    if (shape.argSrc === undefined) {
      return ["isArray", "from", "of"].includes(member)
        ? { kind: "BuiltinRef", name: `Array.${member}` }
        : undefined;
    }
    const args = argsOf(shape, ctx);
    if (member === "isArray") {
      between("Array.isArray", args, 1, 1, "requires exactly one argument");
      return { kind: "ArrayIsArray", value: args[0] };
    }
    if (member === "from") {
      between("Array.from", args, 1, 2, "requires one or two arguments");
      return args.length === 2
        ? { kind: "ArrayFrom", source: args[0], mapFn: args[1] }
        : { kind: "ArrayFrom", source: args[0] };
    }
    if (member === "of") return { kind: "ArrayOf", args };
    return undefined;
  },
  Promise: (member, shape, ctx) => {
    if (!PROMISE_STATICS.has(member)) return undefined;
    if (shape.argSrc === undefined) return { kind: "BuiltinRef", name: `Promise.${member}` };
    return { kind: "PromiseStatic", method: member, args: argsOf(shape, ctx) };
  },
  Symbol: (member, shape, ctx) => {
    if (member !== "for" || shape.argSrc === undefined) return undefined;
    const args = between("Symbol.for", argsOf(shape, ctx), 1, 1, "requires exactly one argument");
    return { kind: "SymbolFor", key: args[0] };
  },
  Date: (member, shape, ctx) => {
    if (shape.argSrc === undefined) {
      return ["now", "parse", "UTC"].includes(member)
        ? { kind: "BuiltinRef", name: `Date.${member}` }
        : undefined;
    }
    const args = argsOf(shape, ctx);
    if (member === "now") {
      between("Date.now", args, 0, 0, "takes no arguments");
      return { kind: "DateNow" };
    }
    if (member === "parse") {
      between("Date.parse", args, 1, 1, "requires exactly one argument");
      return { kind: "DateParse", value: args[0] };
    }
    if (member === "UTC") {
      between("Date.UTC", args, 1, 7, "requires one to seven arguments");
      return { kind: "DateUtc", args };
    }
    return undefined;
  },
  performance: (member, shape, ctx) => {
    if (member !== "now" || shape.argSrc === undefined) return undefined;
    between("performance.now", argsOf(shape, ctx), 0, 0, "takes no arguments");
    return { kind: "PerformanceNow" };
  },
  console: (member, shape, ctx) => {
    const level = asConsoleLevel(member);
    if (!level || shape.argSrc === undefined) return undefined;
    return { kind: "Console", level, args: argsOf(shape, ctx) };
  },
};

function recognizeTypedArrayStatic(type: TypedArrayType, member: string): Expr | undefined {
  return member === "BYTES_PER_ELEMENT"
    ? { kind: "TypedArrayBytesPerElement", type }
    : undefined;
}

// ============= PLAIN CALLS AND NAMES =============

function recognizeGlobalCall(name: string, shape: CallShape, ctx: ParserContext): Expr | undefined {
  const args = argsOf(shape, ctx);
  switch (name) {
    case "Number":
      between("Number", args, 0, 1, "supports zero or one argument");
      return args.length ? { kind: "NumberConstruct", value: args[0] } : { kind: "NumberConstruct" };
    case "String":
      between("String", args, 0, 1, "supports zero or one argument");
      return args.length ? { kind: "StringConstruct", value: args[0] } : { kind: "StringConstruct" };
    case "Boolean":
      between("Boolean", args, 0, 1, "supports zero or one argument");
      return args.length ? { kind: "BooleanConstruct", value: args[0] } : { kind: "BooleanConstruct" };
    case "BigInt":
      between("BigInt", args, 1, 1, "requires exactly one argument");
      return { kind: "BigIntConstruct", value: args[0] };
    case "Symbol":
      between("Symbol", args, 0, 1, "supports zero or one argument");
      return args.length ? { kind: "SymbolConstruct", description: args[0] } : { kind: "SymbolConstruct" };
    case "Function":
      return { kind: "FunctionConstructor", args };
    case "Array":
      return { kind: "New", callee: { kind: "ConstructorRef", name: "Array" }, args };
    default:
      break;
  }
  if (isErrorName(name)) {
    return args.length
      ? { kind: "ErrorConstruct", name, message: args[0] }
      : { kind: "ErrorConstruct", name };
  }
  if (GLOBAL_FUNCTIONS.has(name)) return { kind: "GlobalFunction", name, args };
  const dialog = asDialog(name);
  if (dialog) return { kind: "Dialog", dialog, args };
  return undefined;
}

function recognizeBareName(name: string): Expr | undefined {
  if (CONSTRUCTOR_NAMES.has(name)) return { kind: "ConstructorRef", name };
  if (GLOBAL_FUNCTIONS.has(name) || asDialog(name)) return { kind: "BuiltinRef", name };
  return undefined;
}

/**
 * Recognizes builtin constructor, namespace and global-function shapes over a
 * whole source slice: `new Map(...)`, `Math.max(...)`, `Number.EPSILON`,
 * `parseInt(...)`, `alert(...)`, bare constructors such as `Number`.
 */
export const builtinShapeRecognizer: Recognizer = (src, ctx) => {
  const shape = readCallShape(src);
  if (!shape) return undefined;
  const path = stripGlobalPrefix(shape.path);
  if (shape.isNew) {
    return shape.argSrc === undefined && !CONSTRUCTOR_NAMES.has(path)
      ? undefined
      : recognizeNew({ ...shape, path }, ctx);
  }
  const dot = path.indexOf(".");
  if (dot < 0) {
    return shape.argSrc === undefined
      ? recognizeBareName(path)
      : recognizeGlobalCall(path, shape, ctx);
  }
  const head = path.slice(0, dot);
  const member = path.slice(dot + 1);
  if (member.includes(".")) return undefined;
  if (isTypedArrayType(head) && shape.argSrc === undefined) {
    return recognizeTypedArrayStatic(head, member);
  }
  const handler = Object.prototype.hasOwnProperty.call(NAMESPACES, head)
    ? NAMESPACES[head]
    : undefined;
  return handler ? handler(member, shape, ctx) : undefined;
};
