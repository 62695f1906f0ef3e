import { ErrorCode, throwRuntime } from "../errors";
import { formatFloat, isSymbolKey } from "./coerce";
import { typedArrayElements } from "./buffers";
import type { Value } from "./value";
import { arr, bool, nul, num, obj, str } from "./value";

function fromHost(value: unknown): Value {
  if (value === null) return nul();
  if (typeof value === "boolean") return bool(value);
  if (typeof value === "number") return num(value);
  if (typeof value === "string") return str(value);
  if (Array.isArray(value)) return arr(value.map(fromHost));
  if (typeof value === "object") {
    return obj(Object.entries(value).map(([k, v]): [string, Value] => [k, fromHost(v)]));
  }
  return nul();
}

export function jsonParse(text: string): Value {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    return throwRuntime(ErrorCode.JSON_PARSE, { message });
  }
  return fromHost(parsed);
}

export interface StringifyOptions {
  /** Indentation: a number of spaces (max 10) or a string (first 10 chars). */
  space?: Value;
  /** Property allowlist from an array replacer. */
  allow?: ReadonlySet<string>;
  /** Function replacer, called as `replacer(key, value)`. */
  replace?: (key: string, value: Value) => Value;
}

function indentUnit(space: Value | undefined): string {
  if (!space) return "";
  if (space.kind === "Number" || space.kind === "Float") {
    const n = Math.min(10, Math.max(0, Math.trunc(space.value)));
    return " ".repeat(n);
  }
  if (space.kind === "String") return space.value.slice(0, 10);
  return "";
}

/** `JSON.stringify`; undefined when the top-level value has no JSON form. */
export function jsonStringify(value: Value, options: StringifyOptions = {}): string | undefined {
  const unit = indentUnit(options.space);
  const stack: Value[] = [];

  const serialize = (key: string, input: Value, indent: string): string | undefined => {
    let current = input;
    if (current.kind === "Date") {
      current = Number.isFinite(current.ms) ? str(new Date(current.ms).toISOString()) : nul();
    }
    if (options.replace) current = options.replace(key, current);
    switch (current.kind) {
      case "Null":
        return "null";
      case "Bool":
        return current.value ? "true" : "false";
      case "Number":
        return String(current.value);
      case "Float":
        return Number.isFinite(current.value) ? formatFloat(current.value) : "null";
      case "String":
        return JSON.stringify(current.value);
      case "BigInt":
        return throwRuntime(ErrorCode.INVALID_ARGUMENT, {
          callee: "JSON.stringify",
          message: "cannot serialize a BigInt",
        });
      case "Undefined":
      case "Symbol":
      case "Function":
      case "Resolver":
      case "Builtin":
      case "Constructor":
        return undefined;
      default:
        break;
    }
    if (stack.includes(current)) {
      return throwRuntime(ErrorCode.INVALID_ARGUMENT, {
        callee: "JSON.stringify",
        message: "cannot serialize a circular structure",
      });
    }
    stack.push(current);
    const inner = indent + unit;
    const open = (items: string[], start: string, end: string): string => {
      if (items.length === 0) return `${start}${end}`;
      if (unit === "") return `${start}${items.join(",")}${end}`;
      return `${start}\n${inner}${items.join(`,\n${inner}`)}\n${indent}${end}`;
    };
    let out: string;
    if (current.kind === "Url") {
      out = JSON.stringify(current.href);
    } else if (current.kind === "Array" || current.kind === "TypedArray") {
      const elements = current.kind === "Array" ? current.elements : typedArrayElements(current);
      out = open(
        elements.map((el, i) => serialize(String(i), el, inner) ?? "null"),
        "[",
        "]"
      );
    } else {
      // Maps, Sets and the other containers serialize as empty objects
      const entries = current.kind === "Object" ? [...current.entries] : [];
      const parts: string[] = [];
      for (const [k, v] of entries) {
        if (isSymbolKey(k) || (options.allow && !options.allow.has(k))) continue;
        const text = serialize(k, v, inner);
        if (text !== undefined) parts.push(`${JSON.stringify(k)}:${unit === "" ? "" : " "}${text}`);
      }
      out = open(parts, "{", "}");
    }
    stack.pop();
    return out;
  };

  return serialize("", value, "");
}
