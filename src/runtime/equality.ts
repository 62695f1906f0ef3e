import { asString, coerceNumberForGlobal } from "./coerce";
import type { Value } from "./value";
import { isNullish, isNumeric, isPrimitive } from "./value";

/** `===`: primitives by value (numbers numerically), containers by identity. */
export function strictEqual(a: Value, b: Value): boolean {
  if (isNumeric(a) && isNumeric(b)) return a.value === b.value;
  switch (a.kind) {
    case "Null":
    case "Undefined":
      return a.kind === b.kind;
    case "Bool":
    case "String":
    case "BigInt":
      return b.kind === a.kind && b.value === a.value;
    case "Symbol":
      return b.kind === "Symbol" && b.id === a.id;
    case "Builtin":
      return b.kind === "Builtin" && b.name === a.name && b.receiver === a.receiver;
    case "Constructor":
      return b.kind === "Constructor" && b.name === a.name;
    default:
      return a === b;
  }
}

/** SameValueZero, used by `includes`, Map keys and Set members. */
export function sameValueZero(a: Value, b: Value): boolean {
  if (isNumeric(a) && isNumeric(b)) {
    return a.value === b.value || (Number.isNaN(a.value) && Number.isNaN(b.value));
  }
  return strictEqual(a, b);
}

/** Exact: `2n ** 53n + 1n` is not equal to `2 ** 53`. */
function bigintEqualsNumber(a: bigint, n: number): boolean {
  return Number.isInteger(n) && BigInt(n) === a;
}

/** `==` */
export function looseEqual(a: Value, b: Value): boolean {
  if (strictEqual(a, b)) return true;
  if (isNullish(a) || isNullish(b)) return isNullish(a) && isNullish(b);
  if (a.kind === "Symbol" || b.kind === "Symbol") return false;
  if (a.kind === "Bool") return looseEqual({ kind: "Float", value: a.value ? 1 : 0 }, b);
  if (b.kind === "Bool") return looseEqual(a, { kind: "Float", value: b.value ? 1 : 0 });
  if (a.kind === "BigInt" && isNumeric(b)) return bigintEqualsNumber(a.value, b.value);
  if (isNumeric(a) && b.kind === "BigInt") return bigintEqualsNumber(b.value, a.value);
  if (a.kind === "BigInt" && b.kind === "String") return bigintEqualsString(a.value, b.value);
  if (a.kind === "String" && b.kind === "BigInt") return bigintEqualsString(b.value, a.value);
  if (isNumeric(a) && b.kind === "String") return a.value === coerceNumberForGlobal(b);
  if (a.kind === "String" && isNumeric(b)) return coerceNumberForGlobal(a) === b.value;
  const aPrim = isPrimitive(a);
  const bPrim = isPrimitive(b);
  if (aPrim === bPrim) return false;
  // primitive against container: compare through the container's string form
  const container = aPrim ? b : a;
  const primitive = aPrim ? a : b;
  const text = asString(container);
  if (primitive.kind === "String") return primitive.value === text;
  return looseEqual(primitive, { kind: "String", value: text });
}

function bigintEqualsString(value: bigint, text: string): boolean {
  const trimmed = text.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) return false;
  return BigInt(trimmed) === value;
}
