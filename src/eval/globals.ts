import type { DialogKind } from "../ast/nodes";
import { ErrorCode, throwRuntime } from "../errors";
import { bufferFromBytes } from "../runtime/buffers";
import { asString, coerceNumberForGlobal } from "../runtime/coerce";
import type { MapValue, SetValue, TypedArrayValue, Value } from "../runtime/value";
import { arr, bool, float, isCallable, nul, num, obj, str, undef } from "../runtime/value";
import type { EvalContext } from "./context";
import { arg } from "./methods/shared";

function invalid(callee: string, message: string): never {
  return throwRuntime(ErrorCode.INVALID_ARGUMENT, { callee, message });
}

// ============= NUMBER PARSING =============

/** `parseInt(text, radix)`: leading whitespace, optional sign and `0x`, longest valid digit prefix. */
export function parseIntValue(text: Value, radix: Value | undefined): Value {
  const source = asString(text).trimStart();
  let base = radix && radix.kind !== "Undefined" ? Math.trunc(coerceNumberForGlobal(radix)) : 0;
  if (Number.isNaN(base)) base = 0;
  if (base !== 0 && (base < 2 || base > 36)) return float(NaN);
  let rest = source;
  let sign = 1;
  if (rest.startsWith("-") || rest.startsWith("+")) {
    if (rest.startsWith("-")) sign = -1;
    rest = rest.slice(1);
  }
  if ((base === 0 || base === 16) && /^0[xX]/.test(rest)) {
    base = 16;
    rest = rest.slice(2);
  }
  if (base === 0) base = 10;
  const digits = "0123456789abcdefghijklmnopqrstuvwxyz".slice(0, base);
  let end = 0;
  while (end < rest.length && digits.includes(rest[end].toLowerCase())) end++;
  if (end === 0) return float(NaN);
  const value = parseInt(rest.slice(0, end), base);
  return num(sign * value);
}

/** `parseFloat(text)`: the longest decimal prefix, `Infinity` included. */
export function parseFloatValue(text: Value): Value {
  const match = /^[+-]?(Infinity|\d+\.?\d*(?:[eE][+-]?\d+)?|\.\d+(?:[eE][+-]?\d+)?)/.exec(
    asString(text).trimStart()
  );
  return match ? num(Number(match[0])) : float(NaN);
}

// ============= URI AND BASE64 =============

function uriCall(name: string, text: string, op: (input: string) => string): Value {
  try {
    return str(op(text));
  } catch (e) {
    if (e instanceof URIError) return invalid(name, "URI malformed");
    throw e;
  }
}

function btoaValue(text: string): Value {
  for (const ch of text) {
    if (ch.charCodeAt(0) > 0xff) {
      return invalid("btoa", "the string to be encoded contains characters outside of the Latin1 range");
    }
  }
  return str(Buffer.from(text, "latin1").toString("base64"));
}

const BASE64_RE = /^[A-Za-z0-9+/]*={0,2}$/;

function atobValue(text: string): Value {
  const compact = text.replace(/[\t\n\f\r ]/g, "");
  if (!BASE64_RE.test(compact) || compact.replace(/=+$/, "").length % 4 === 1) {
    return invalid("atob", "the string to be decoded is not correctly encoded");
  }
  return str(Buffer.from(compact, "base64").toString("latin1"));
}

// ============= STRUCTURED CLONE =============

function cloneError(value: Value): never {
  return throwRuntime(ErrorCode.INVALID_ARGUMENT, {
    callee: "structuredClone",
    message: `${asString(value)} could not be cloned`,
  });
}

/** Deep copy that keeps shared and cyclic references shared in the copy. */
export function structuredCloneValue(input: Value): Value {
  const copies = new Map<Value, Value>();

  const clone = (value: Value): Value => {
    const existing = copies.get(value);
    if (existing) return existing;
    switch (value.kind) {
      case "Null":
      case "Undefined":
      case "Bool":
      case "Number":
      case "Float":
      case "BigInt":
      case "String":
        return value;
      case "Array": {
        const copy = arr();
        copies.set(value, copy);
        copy.elements = value.elements.map(clone);
        return copy;
      }
      case "Object": {
        const copy = obj();
        copies.set(value, copy);
        for (const [k, v] of value.entries) {
          if (isCallable(v)) cloneError(v);
          copy.entries.set(k, clone(v));
        }
        if (value.errorName !== undefined) copy.errorName = value.errorName;
        return copy;
      }
      case "Map": {
        if (value.weak) return cloneError(value);
        const copy: MapValue = { kind: "Map", entries: [], properties: new Map(), weak: false };
        copies.set(value, copy);
        copy.entries = value.entries.map(([k, v]): [Value, Value] => [clone(k), clone(v)]);
        return copy;
      }
      case "Set": {
        if (value.weak) return cloneError(value);
        const copy: SetValue = { kind: "Set", values: [], properties: new Map(), weak: false };
        copies.set(value, copy);
        copy.values = value.values.map(clone);
        return copy;
      }
      case "Date":
        return { kind: "Date", ms: value.ms };
      case "RegExp":
        return { kind: "RegExp", source: value.source, flags: value.flags, lastIndex: 0, properties: new Map() };
      case "ArrayBuffer": {
        const copy = bufferFromBytes(value.bytes.slice());
        if (value.maxByteLength !== undefined) copy.maxByteLength = value.maxByteLength;
        copies.set(value, copy);
        return copy;
      }
      case "TypedArray": {
        const buffer = clone(value.buffer);
        if (buffer.kind !== "ArrayBuffer") return cloneError(value);
        const copy: TypedArrayValue = { ...value, buffer };
        copies.set(value, copy);
        return copy;
      }
      case "Blob":
        return { kind: "Blob", bytes: value.bytes.slice(), type: value.type };
      default:
        return cloneError(value);
    }
  };

  return clone(input);
}

// ============= DIALOGS =============

export function callDialog(ctx: EvalContext, dialog: DialogKind, args: Value[]): Value {
  const message = args.length ? asString(args[0]) : "";
  switch (dialog) {
    case "alert":
      ctx.hooks.alert(message);
      return undef();
    case "confirm":
      return bool(ctx.hooks.confirm(message));
    case "prompt": {
      const fallback = args[1];
      const answer = ctx.hooks.prompt(
        message,
        fallback && fallback.kind !== "Undefined" ? asString(fallback) : undefined
      );
      return answer === null ? nul() : str(answer);
    }
  }
}

// ============= DISPATCH =============

/** Global functions such as `parseInt` and `encodeURIComponent`. */
export function callGlobal(ctx: EvalContext, name: string, args: Value[]): Value {
  const text = (): string => asString(arg(args, 0));
  switch (name) {
    case "parseInt":
      return parseIntValue(arg(args, 0), args[1]);
    case "parseFloat":
      return parseFloatValue(arg(args, 0));
    case "isNaN":
      return bool(Number.isNaN(coerceNumberForGlobal(arg(args, 0))));
    case "isFinite":
      return bool(Number.isFinite(coerceNumberForGlobal(arg(args, 0))));
    case "encodeURIComponent":
      return uriCall(name, text(), encodeURIComponent);
    case "encodeURI":
      return uriCall(name, text(), encodeURI);
    case "decodeURIComponent":
      return uriCall(name, text(), decodeURIComponent);
    case "decodeURI":
      return uriCall(name, text(), decodeURI);
    case "escape":
      return str(escape(text()));
    case "unescape":
      return str(unescape(text()));
    case "btoa":
      return btoaValue(text());
    case "atob":
      return atobValue(text());
    case "structuredClone":
      return structuredCloneValue(arg(args, 0));
    case "alert":
    case "confirm":
    case "prompt":
      return callDialog(ctx, name, args);
    default:
      return throwRuntime(ErrorCode.NOT_A_FUNCTION, { target: name });
  }
}
