import { ErrorCode, throwRuntime } from "../errors";
import { typedArrayElements } from "./buffers";
import { formatIsoDate } from "./dates";
import type { Value } from "./value";

export function truthy(value: Value): boolean {
  switch (value.kind) {
    case "Null":
    case "Undefined":
      return false;
    case "Bool":
      return value.value;
    case "Number":
    case "Float":
      return value.value !== 0 && !Number.isNaN(value.value);
    case "BigInt":
      return value.value !== 0n;
    case "String":
      return value.value !== "";
    default:
      return true;
  }
}

/** `NaN`, `Infinity`, `-Infinity`, `0` for both zeros, else host formatting. */
export function formatFloat(n: number): string {
  if (Number.isNaN(n)) return "NaN";
  if (n === Infinity) return "Infinity";
  if (n === -Infinity) return "-Infinity";
  if (n === 0) return "0";
  return String(n);
}

function callableName(value: Value): string {
  switch (value.kind) {
    case "Function":
      return value.name ?? "";
    case "Builtin":
    case "Constructor":
      return value.name;
    default:
      return "";
  }
}

/** JS `ToString`. */
export function asString(value: Value): string {
  switch (value.kind) {
    case "Null":
      return "null";
    case "Undefined":
      return "undefined";
    case "Bool":
      return value.value ? "true" : "false";
    case "Number":
      return String(value.value);
    case "Float":
      return formatFloat(value.value);
    case "BigInt":
      return value.value.toString();
    case "String":
      return value.value;
    case "Symbol":
      return `Symbol(${value.description ?? ""})`;
    case "Array":
      return value.elements
        .map((el) => (el.kind === "Null" || el.kind === "Undefined" ? "" : asString(el)))
        .join(",");
    case "Object": {
      if (value.errorName === undefined) return "[object Object]";
      const message = value.entries.get("message");
      const text = message ? asString(message) : "";
      const name = value.entries.get("name");
      const label = name ? asString(name) : value.errorName;
      return text === "" ? label : `${label}: ${text}`;
    }
    case "Map":
      return value.weak ? "[object WeakMap]" : "[object Map]";
    case "Set":
      return value.weak ? "[object WeakSet]" : "[object Set]";
    case "Date":
      return formatIsoDate(value.ms) ?? "Invalid Date";
    case "RegExp":
      return `/${value.source}/${value.flags}`;
    case "Promise":
      return "[object Promise]";
    case "ArrayBuffer":
      return "[object ArrayBuffer]";
    case "TypedArray":
      return typedArrayElements(value).map(asString).join(",");
    case "Blob":
      return "[object Blob]";
    case "Url":
      return value.href;
    case "Storage":
      return "[object Storage]";
    case "Function":
    case "Resolver":
    case "Builtin":
    case "Constructor":
      return `function ${callableName(value)}() { [native code] }`;
  }
}

const STRICT_FLOAT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const STRICT_SPECIAL = /^[+-]?(inf|infinity|nan)$/i;

/** Decimal float syntax with no surrounding whitespace, or undefined. */
function parseStrictFloat(text: string): number | undefined {
  if (STRICT_FLOAT.test(text)) return Number(text);
  if (STRICT_SPECIAL.test(text)) {
    if (/nan/i.test(text)) return NaN;
    return text.startsWith("-") ? -Infinity : Infinity;
  }
  return undefined;
}

/**
 * Numeric coercion for unary `+`/`-`, arithmetic and comparison. Anything
 * that is not a number, bigint, date or nullish goes through its string form
 * and falls back to 0 when that does not parse (`+"abc"` and `+true` are 0).
 */
export function numericValue(value: Value): number {
  switch (value.kind) {
    case "Number":
    case "Float":
      return value.value;
    case "BigInt":
      return Number(value.value);
    case "Date":
      return value.ms;
    case "Null":
      return 0;
    case "Undefined":
      return NaN;
    case "Symbol":
      return throwRuntime(ErrorCode.SYMBOL_TO_PRIMITIVE);
    default:
      return parseStrictFloat(asString(value)) ?? 0;
  }
}

const RADIX_BASES: Record<string, number> = { x: 16, o: 8, b: 2 };

/** String to number the way `Number("...")` reads it. */
export function parseJsNumber(src: string): number {
  const text = src.trim();
  if (text === "") return 0;
  if (/^[+-]?Infinity$/.test(text)) return text.startsWith("-") ? -Infinity : Infinity;
  const radix = /^0([xXoObB])([0-9a-fA-F]+)$/.exec(text);
  if (radix) {
    const base = RADIX_BASES[radix[1].toLowerCase()] ?? 10;
    const digits = radix[2];
    const valid = base === 16 ? /^[0-9a-f]+$/i : base === 8 ? /^[0-7]+$/ : /^[01]+$/;
    return valid.test(digits) ? parseInt(digits, base) : NaN;
  }
  return STRICT_FLOAT.test(text) ? Number(text) : NaN;
}

/** Numeric coercion behind `Number()`, `isNaN` and loose equality. */
export function coerceNumberForGlobal(value: Value): number {
  switch (value.kind) {
    case "Bool":
      return value.value ? 1 : 0;
    case "String":
      return parseJsNumber(value.value);
    case "Null":
      return 0;
    case "Undefined":
      return NaN;
    case "Number":
    case "Float":
      return value.value;
    case "BigInt":
      return Number(value.value);
    case "Date":
      return value.ms;
    case "Array":
    case "TypedArray":
      return parseJsNumber(asString(value));
    case "Symbol":
      return throwRuntime(ErrorCode.SYMBOL_TO_PRIMITIVE);
    default:
      return NaN;
  }
}

export function toInt32(n: number): number {
  if (!Number.isFinite(n)) return 0;
  return Math.trunc(n) | 0;
}

export function toUint32(n: number): number {
  return toInt32(n) >>> 0;
}

/** Integer conversion for delays and indices: NaN is 0, fractions truncate. */
export function valueToI64(value: Value): number {
  const n = numericValue(value);
  if (Number.isNaN(n)) return 0;
  if (n === Infinity) return Number.MAX_SAFE_INTEGER;
  if (n === -Infinity) return Number.MIN_SAFE_INTEGER;
  return Math.trunc(n);
}

/** Integer argument for `slice`, `at`, `padStart` and friends. */
export function toIntegerOrInfinity(value: Value | undefined): number {
  if (!value || value.kind === "Undefined") return 0;
  const n = coerceNumberForGlobal(value);
  if (Number.isNaN(n)) return 0;
  return Number.isFinite(n) ? Math.trunc(n) : n;
}

/** Resolves a possibly negative relative index against `length`. */
export function relativeIndex(value: Value | undefined, length: number, fallback: number): number {
  if (!value || value.kind === "Undefined") return fallback;
  const n = toIntegerOrInfinity(value);
  if (n < 0) return Math.max(length + n, 0);
  return Math.min(n, length);
}

/** Property key for member and index access; symbols get a private prefix. */
export function propertyKey(value: Value): string {
  if (value.kind === "Symbol") return `@@symbol:${value.id}`;
  return asString(value);
}

export function isSymbolKey(key: string): boolean {
  return key.startsWith("@@symbol:");
}

/** Canonical array index for `key`, or undefined. */
export function arrayIndex(key: string): number | undefined {
  if (!/^(0|[1-9]\d*)$/.test(key)) return undefined;
  const n = Number(key);
  return n < 2 ** 32 - 1 ? n : undefined;
}
