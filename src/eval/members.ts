import { ErrorCode, throwRuntime } from "../errors";
import {
  BYTES_PER_ELEMENT,
  byteLengthOf,
  readElement,
  typedArrayByteLength,
  typedArrayLength,
  writeElement,
} from "../runtime/buffers";
import { arrayIndex, asString, numericValue, toIntegerOrInfinity } from "../runtime/coerce";
import { storageLength } from "../runtime/storage";
import { isUrlComponent, urlGet, urlSet } from "../runtime/url";
import type { FunctionValue, ObjectValue, Value } from "../runtime/value";
import { bool, builtin, isCallable, num, obj, ownProperties, str, undef } from "../runtime/value";
import type { EvalContext } from "./context";
import { hasMethod, lookupMethod } from "./methods";
import { elementInput } from "./methods/buffers";

function nullishError(object: Value, member: string): never {
  return throwRuntime(ErrorCode.PROPERTY_OF_NULLISH, {
    member,
    value: object.kind === "Null" ? "null" : "undefined",
  });
}

/** `F.prototype`, created on first access. */
export function functionPrototype(fn: FunctionValue): ObjectValue {
  const existing = fn.properties.get("prototype");
  if (existing && existing.kind === "Object") return existing;
  const proto = obj();
  fn.properties.set("prototype", proto);
  return proto;
}

/** Own property of a container, then the `proto` links of plain objects. */
function ownOrInherited(object: Value, key: string): Value | undefined {
  const own = ownProperties(object)?.get(key);
  if (own !== undefined || object.kind !== "Object") return own;
  const seen = new Set<ObjectValue>([object]);
  for (let proto = object.proto; proto && !seen.has(proto); proto = proto.proto) {
    const inherited = proto.entries.get(key);
    if (inherited !== undefined) return inherited;
    seen.add(proto);
  }
  return undefined;
}

function intrinsicProperty(object: Value, key: string): Value | undefined {
  switch (object.kind) {
    case "String": {
      if (key === "length") return num(object.value.length);
      const idx = arrayIndex(key);
      const ch = idx === undefined ? undefined : object.value[idx];
      return ch === undefined ? undefined : str(ch);
    }
    case "Array": {
      if (key === "length") return num(object.elements.length);
      const idx = arrayIndex(key);
      return idx === undefined ? undefined : object.elements[idx] ?? undef();
    }
    case "Symbol":
      return key === "description" && object.description !== undefined ? str(object.description) : undefined;
    case "Map":
      return key === "size" ? num(object.entries.length) : undefined;
    case "Set":
      return key === "size" ? num(object.values.length) : undefined;
    case "RegExp":
      switch (key) {
        case "source":
          return str(object.source);
        case "flags":
          return str(object.flags);
        case "lastIndex":
          return num(object.lastIndex);
        case "global":
          return bool(object.flags.includes("g"));
        case "ignoreCase":
          return bool(object.flags.includes("i"));
        case "multiline":
          return bool(object.flags.includes("m"));
        case "sticky":
          return bool(object.flags.includes("y"));
        case "unicode":
          return bool(object.flags.includes("u"));
        default:
          return undefined;
      }
    case "ArrayBuffer":
      switch (key) {
        case "byteLength":
          return num(byteLengthOf(object));
        case "maxByteLength":
          return num(object.maxByteLength ?? byteLengthOf(object));
        case "resizable":
          return bool(object.maxByteLength !== undefined);
        case "detached":
          return bool(object.detached);
        default:
          return undefined;
      }
    case "TypedArray": {
      switch (key) {
        case "length":
          return num(typedArrayLength(object));
        case "byteLength":
          return num(typedArrayByteLength(object));
        case "byteOffset":
          return num(typedArrayLength(object) === 0 && object.buffer.detached ? 0 : object.byteOffset);
        case "buffer":
          return object.buffer;
        case "BYTES_PER_ELEMENT":
          return num(BYTES_PER_ELEMENT[object.type]);
        default:
          break;
      }
      const idx = arrayIndex(key);
      return idx !== undefined && idx < typedArrayLength(object) ? readElement(object, idx) : undefined;
    }
    case "Blob":
      if (key === "size") return num(object.bytes.length);
      return key === "type" ? str(object.type) : undefined;
    case "Url":
      return isUrlComponent(key) ? urlGet(object, key) : undefined;
    case "Storage":
      return key === "length" ? storageLength(object) : undefined;
    case "Function":
      if (key === "name") return str(object.name ?? "");
      if (key === "length") {
        return num(object.handler.params.filter((p) => !p.isRest && !p.default).length);
      }
      return key === "prototype" ? functionPrototype(object) : undefined;
    case "Builtin":
    case "Constructor":
      return key === "name" ? str(object.name) : undefined;
    default:
      return undefined;
  }
}

/** `object.key` and `object[key]`. */
export function getMember(object: Value, key: string): Value {
  if (object.kind === "Null" || object.kind === "Undefined") return nullishError(object, key);
  const intrinsic = intrinsicProperty(object, key);
  if (intrinsic !== undefined) return intrinsic;
  const own = ownOrInherited(object, key);
  if (own !== undefined) return own;
  if (hasMethod(object, key)) return builtin(key, object);
  if (object.kind === "Storage") {
    const item = object.items.get(key);
    if (item !== undefined) return str(item);
  }
  return undef();
}

function setArrayLength(elements: Value[], length: Value): void {
  const n = numericValue(length);
  if (!Number.isInteger(n) || n < 0 || n >= 2 ** 32) {
    throwRuntime(ErrorCode.RANGE, { message: "Invalid array length" });
  }
  if (n < elements.length) elements.length = n;
  while (elements.length < n) elements.push(undef());
}

/** `object.key = value`; writes to primitives and frozen objects are dropped. */
export function setMember(object: Value, key: string, value: Value): void {
  switch (object.kind) {
    case "Null":
    case "Undefined":
      return nullishError(object, key);
    case "Array": {
      if (key === "length") {
        setArrayLength(object.elements, value);
        return;
      }
      const idx = arrayIndex(key);
      if (idx === undefined) {
        object.properties.set(key, value);
        return;
      }
      while (object.elements.length < idx) object.elements.push(undef());
      object.elements[idx] = value;
      return;
    }
    case "Object":
      if (!object.frozen) object.entries.set(key, value);
      return;
    case "TypedArray": {
      const idx = arrayIndex(key);
      if (idx !== undefined && idx < typedArrayLength(object)) writeElement(object, idx, elementInput(value));
      return;
    }
    case "Url":
      if (isUrlComponent(key)) urlSet(object, key, asString(value));
      else object.properties.set(key, value);
      return;
    case "RegExp":
      if (key === "lastIndex") object.lastIndex = Math.max(0, toIntegerOrInfinity(value));
      else object.properties.set(key, value);
      return;
    case "Storage":
      if (key === "length" || hasMethod(object, key)) object.properties.set(key, value);
      else object.items.set(key, asString(value));
      return;
    case "Map":
    case "Set":
    case "Function":
      object.properties.set(key, value);
      return;
    default:
      return;
  }
}

/** `delete object.key`. */
export function deleteMember(object: Value, key: string): boolean {
  if (object.kind === "Null" || object.kind === "Undefined") return nullishError(object, key);
  if (object.kind === "Object" && object.frozen) return false;
  if (object.kind === "Array") {
    const idx = arrayIndex(key);
    if (idx !== undefined) {
      if (idx < object.elements.length) object.elements[idx] = undef();
      return true;
    }
  }
  if (object.kind === "Storage" && object.items.delete(key)) return true;
  ownProperties(object)?.delete(key);
  return true;
}

/** `key in object`. */
export function hasProperty(object: Value, key: string): boolean {
  switch (object.kind) {
    case "Array": {
      if (key === "length" || object.properties.has(key)) return true;
      const idx = arrayIndex(key);
      return idx !== undefined && idx < object.elements.length;
    }
    case "TypedArray": {
      const idx = arrayIndex(key);
      return idx !== undefined ? idx < typedArrayLength(object) : intrinsicProperty(object, key) !== undefined;
    }
    case "Storage":
      return object.items.has(key) || hasMethod(object, key) || key === "length";
    case "Object":
      return ownOrInherited(object, key) !== undefined || hasMethod(object, key);
    case "Map":
    case "Set":
    case "RegExp":
    case "Url":
    case "Function":
    case "Date":
    case "Promise":
    case "ArrayBuffer":
    case "Blob":
    case "Resolver":
    case "Builtin":
    case "Constructor":
      return (
        intrinsicProperty(object, key) !== undefined ||
        ownOrInherited(object, key) !== undefined ||
        hasMethod(object, key)
      );
    default:
      return throwRuntime(ErrorCode.INVALID_ARGUMENT, {
        callee: "in",
        message: `cannot search for '${key}' in ${asString(object)}`,
      });
  }
}

/** `object.member(...args)`: own callable properties shadow the built-in table. */
export function invokeMethod(ctx: EvalContext, object: Value, member: string, args: Value[]): Value {
  if (object.kind === "Null" || object.kind === "Undefined") return nullishError(object, member);
  const own = ownOrInherited(object, member);
  if (own !== undefined) {
    if (isCallable(own)) return ctx.callValue(own, args, object);
    return throwRuntime(ErrorCode.MEMBER_NOT_A_FUNCTION, { member });
  }
  const method = lookupMethod(object, member);
  if (method) return method(ctx, args);
  const intrinsic = intrinsicProperty(object, member);
  if (intrinsic && isCallable(intrinsic)) return ctx.callValue(intrinsic, args, object);
  return throwRuntime(ErrorCode.MEMBER_NOT_A_FUNCTION, { member });
}

/** Whether `getMember` would find anything, for `a.m?.()`. */
export function memberIsMissing(object: Value, member: string): boolean {
  const value = getMember(object, member);
  return value.kind === "Undefined" || value.kind === "Null";
}
