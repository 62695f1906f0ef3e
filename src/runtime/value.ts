import type { ScriptHandler, TypedArrayType } from "../ast/nodes";
import type { Env } from "./env";

// ============= PRIMITIVES =============

export interface NullValue {
  kind: "Null";
}

export interface UndefinedValue {
  kind: "Undefined";
}

export interface BoolValue {
  kind: "Bool";
  value: boolean;
}

/** Integral number inside the safe-integer range. */
export interface NumberValue {
  kind: "Number";
  value: number;
}

export interface FloatValue {
  kind: "Float";
  value: number;
}

export interface BigIntValue {
  kind: "BigInt";
  value: bigint;
}

export interface StringValue {
  kind: "String";
  value: string;
}

export interface SymbolValue {
  kind: "Symbol";
  id: number;
  description?: string;
  /** Set for symbols from `Symbol.for`. */
  registryKey?: string;
}

// ============= CONTAINERS =============
// Containers are shared by reference: every holder sees the same object.

export type Properties = Map<string, Value>;

export interface ArrayValue {
  kind: "Array";
  elements: Value[];
  properties: Properties;
}

export interface ObjectValue {
  kind: "Object";
  entries: Properties;
  frozen: boolean;
  /** The user function that constructed this object via `new`. */
  constructedBy?: FunctionValue;
  /** Fallback for property reads, set by `new F()` and `Object.create`. */
  proto?: ObjectValue;
  /** Error name for objects created by `new Error(...)` and friends. */
  errorName?: string;
}

export interface MapValue {
  kind: "Map";
  entries: Array<[Value, Value]>;
  properties: Properties;
  weak: boolean;
}

export interface SetValue {
  kind: "Set";
  values: Value[];
  properties: Properties;
  weak: boolean;
}

export interface DateValue {
  kind: "Date";
  ms: number;
}

export interface RegExpValue {
  kind: "RegExp";
  source: string;
  flags: string;
  lastIndex: number;
  properties: Properties;
}

export type PromiseState =
  | { status: "pending" }
  | { status: "fulfilled"; value: Value }
  | { status: "rejected"; reason: Value };

export interface PromiseReaction {
  onFulfilled?: Value;
  onRejected?: Value;
  /** `finally` handlers run without an argument and pass the settlement through. */
  isFinally: boolean;
  child?: PromiseValue;
  /** Host-side observer used by the combinators. */
  observer?: (state: Exclude<PromiseState, { status: "pending" }>) => void;
}

export interface PromiseValue {
  kind: "Promise";
  id: number;
  state: PromiseState;
  reactions: PromiseReaction[];
  handled: boolean;
}

export interface ArrayBufferValue {
  kind: "ArrayBuffer";
  bytes: Uint8Array;
  maxByteLength?: number;
  detached: boolean;
}

export interface TypedArrayValue {
  kind: "TypedArray";
  type: TypedArrayType;
  buffer: ArrayBufferValue;
  byteOffset: number;
  /** Absent for views that track a resizable buffer's length. */
  fixedLength?: number;
}

export interface BlobValue {
  kind: "Blob";
  bytes: Uint8Array;
  type: string;
}

export interface UrlValue {
  kind: "Url";
  href: string;
  properties: Properties;
}

export interface StorageValue {
  kind: "Storage";
  items: Map<string, string>;
  properties: Properties;
}

export interface FunctionValue {
  kind: "Function";
  handler: ScriptHandler;
  captured: Env;
  isAsync: boolean;
  isArrow: boolean;
  name?: string;
  /** Set by `bind`. */
  boundThis?: Value;
  boundArgs?: Value[];
  properties: Properties;
}

/** The resolve or reject function handed to a Promise executor. */
export interface ResolverValue {
  kind: "Resolver";
  promise: PromiseValue;
  reject: boolean;
  /** Shared by a resolve/reject pair; only the first call of either counts. */
  alreadyResolved: { value: boolean };
}

/** A callable builtin passed around as a value, e.g. `Math.max` or `parseInt`. */
export interface BuiltinValue {
  kind: "Builtin";
  name: string;
  /** Receiver for extracted methods such as `arr.push`. */
  receiver?: Value;
}

/** Constructor markers such as `Map`, `Promise` or `Uint8Array`. */
export interface ConstructorValue {
  kind: "Constructor";
  name: string;
}

export type PrimitiveValue =
  | NullValue
  | UndefinedValue
  | BoolValue
  | NumberValue
  | FloatValue
  | BigIntValue
  | StringValue
  | SymbolValue;

export type ContainerValue =
  | ArrayValue
  | ObjectValue
  | MapValue
  | SetValue
  | DateValue
  | RegExpValue
  | PromiseValue
  | ArrayBufferValue
  | TypedArrayValue
  | BlobValue
  | UrlValue
  | StorageValue;

export type CallableValue =
  | FunctionValue
  | ResolverValue
  | BuiltinValue
  | ConstructorValue;

export type Value = PrimitiveValue | ContainerValue | CallableValue;

export type ValueOf<K extends Value["kind"]> = Extract<Value, { kind: K }>;

// ============= CONSTRUCTORS =============

const NULL: NullValue = { kind: "Null" };
const UNDEFINED: UndefinedValue = { kind: "Undefined" };
const TRUE: BoolValue = { kind: "Bool", value: true };
const FALSE: BoolValue = { kind: "Bool", value: false };

export const nul = (): NullValue => NULL;
export const undef = (): UndefinedValue => UNDEFINED;
export const bool = (value: boolean): BoolValue => (value ? TRUE : FALSE);
export const str = (value: string): StringValue => ({ kind: "String", value });
export const float = (value: number): FloatValue => ({ kind: "Float", value });
export const big = (value: bigint): BigIntValue => ({ kind: "BigInt", value });

/** Integral results inside the safe range stay `Number`; everything else is `Float`. */
export function num(value: number): NumberValue | FloatValue {
  return Number.isSafeInteger(value) && !Object.is(value, -0)
    ? { kind: "Number", value }
    : { kind: "Float", value };
}

export function arr(elements: Value[] = []): ArrayValue {
  return { kind: "Array", elements, properties: new Map() };
}

export function obj(entries: Iterable<[string, Value]> = []): ObjectValue {
  return { kind: "Object", entries: new Map(entries), frozen: false };
}

export function builtin(name: string, receiver?: Value): BuiltinValue {
  return receiver ? { kind: "Builtin", name, receiver } : { kind: "Builtin", name };
}

export function ctor(name: string): ConstructorValue {
  return { kind: "Constructor", name };
}

export function errorObject(name: string, message: string): ObjectValue {
  const value = obj([
    ["name", str(name)],
    ["message", str(message)],
  ]);
  value.errorName = name;
  return value;
}

// ============= PREDICATES =============

export function isNullish(value: Value): value is NullValue | UndefinedValue {
  return value.kind === "Null" || value.kind === "Undefined";
}

export function isNumeric(value: Value): value is NumberValue | FloatValue {
  return value.kind === "Number" || value.kind === "Float";
}

export function isCallable(value: Value): value is CallableValue {
  return (
    value.kind === "Function" ||
    value.kind === "Resolver" ||
    value.kind === "Builtin" ||
    value.kind === "Constructor"
  );
}

const PRIMITIVE_KINDS: ReadonlySet<Value["kind"]> = new Set([
  "Null",
  "Undefined",
  "Bool",
  "Number",
  "Float",
  "BigInt",
  "String",
  "Symbol",
]);

export function isPrimitive(value: Value): value is PrimitiveValue {
  return PRIMITIVE_KINDS.has(value.kind);
}

/** JS `typeof`. */
export function typeOf(value: Value): string {
  switch (value.kind) {
    case "Undefined":
      return "undefined";
    case "Bool":
      return "boolean";
    case "Number":
    case "Float":
      return "number";
    case "BigInt":
      return "bigint";
    case "String":
      return "string";
    case "Symbol":
      return "symbol";
    case "Function":
    case "Resolver":
    case "Builtin":
    case "Constructor":
      return "function";
    default:
      return "object";
  }
}

/** Own-property bag of a container, where it has one. */
export function ownProperties(value: Value): Properties | undefined {
  switch (value.kind) {
    case "Object":
      return value.entries;
    case "Array":
    case "Map":
    case "Set":
    case "RegExp":
    case "Url":
    case "Storage":
    case "Function":
      return value.properties;
    default:
      return undefined;
  }
}
