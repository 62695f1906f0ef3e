import type { Expr } from "../ast/nodes";
import { ErrorCode, throwRuntime } from "../errors";
import { typedArrayElements, typedArrayLength } from "../runtime/buffers";
import { isSymbolKey } from "../runtime/coerce";
import type { Value } from "../runtime/value";
import { arr, str, typeOf } from "../runtime/value";
import type { EvalContext, Frame } from "./context";

function describe(value: Value): string {
  return value.kind === "Null" ? "null" : typeOf(value);
}

export function isIterable(value: Value): boolean {
  switch (value.kind) {
    case "Array":
    case "String":
    case "Set":
    case "Map":
    case "TypedArray":
      return true;
    default:
      return false;
  }
}

/** Snapshot of what `for...of` and spread see. Maps yield `[key, value]` pairs. */
export function iterableValues(value: Value): Value[] {
  switch (value.kind) {
    case "Array":
      return [...value.elements];
    case "String":
      return Array.from(value.value, (ch) => str(ch));
    case "Set":
      return [...value.values];
    case "Map":
      return value.entries.map(([k, v]) => arr([k, v]));
    case "TypedArray":
      return typedArrayElements(value);
    default:
      return throwRuntime(ErrorCode.NOT_ITERABLE, { value: describe(value) });
  }
}

/** Enumerable keys visited by `for...in`. */
export function enumerableKeys(value: Value): string[] {
  switch (value.kind) {
    case "Object":
      return [...value.entries.keys()].filter((k) => !isSymbolKey(k));
    case "Array":
      return [...value.elements.keys()].map(String).concat([...value.properties.keys()]);
    case "String":
      return Array.from({ length: value.value.length }, (_, i) => String(i));
    case "TypedArray":
      return Array.from({ length: typedArrayLength(value) }, (_, i) => String(i));
    case "Storage":
      return [...value.items.keys()];
    case "Map":
    case "Set":
    case "Url":
    case "RegExp":
    case "Function":
      return [...value.properties.keys()].filter((k) => !isSymbolKey(k));
    default:
      return [];
  }
}

/** Evaluates an argument or element list, expanding `...spread` entries. */
export function evalSpreadList(ctx: EvalContext, exprs: Expr[], frame: Frame): Value[] {
  const out: Value[] = [];
  for (const expr of exprs) {
    if (expr.kind === "Spread") {
      out.push(...iterableValues(ctx.evalExpr(expr.expr, frame)));
    } else {
      out.push(ctx.evalExpr(expr, frame));
    }
  }
  return out;
}
