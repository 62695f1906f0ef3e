import type { Value } from "../../runtime/value";
import { ARRAY_METHODS } from "./array";
import { ARRAY_BUFFER_METHODS, TYPED_ARRAY_METHODS } from "./buffers";
import { MAP_METHODS, SET_METHODS } from "./collections";
import {
  BIGINT_METHODS,
  BLOB_METHODS,
  BOOL_METHODS,
  DATE_METHODS,
  FUNCTION_METHODS,
  NUMBER_METHODS,
  OBJECT_METHODS,
  PROMISE_METHODS,
  REGEXP_METHODS,
  STORAGE_METHODS,
  SYMBOL_METHODS,
  URL_METHODS,
} from "./misc";
import type { BoundMethod } from "./shared";
import { bindMethod } from "./shared";
import { STRING_METHODS } from "./string";

export type { BoundMethod } from "./shared";

/** The built-in method `name` of the receiver's kind, bound to the receiver. */
export function lookupMethod(value: Value, name: string): BoundMethod | undefined {
  switch (value.kind) {
    case "Array":
      return bindMethod(ARRAY_METHODS, value, name);
    case "String":
      return bindMethod(STRING_METHODS, value, name);
    case "Number":
    case "Float":
      return bindMethod(NUMBER_METHODS, value, name);
    case "BigInt":
      return bindMethod(BIGINT_METHODS, value, name);
    case "Bool":
      return bindMethod(BOOL_METHODS, value, name);
    case "Symbol":
      return bindMethod(SYMBOL_METHODS, value, name);
    case "Map":
      return bindMethod(MAP_METHODS, value, name);
    case "Set":
      return bindMethod(SET_METHODS, value, name);
    case "Date":
      return bindMethod(DATE_METHODS, value, name);
    case "RegExp":
      return bindMethod(REGEXP_METHODS, value, name);
    case "Promise":
      return bindMethod(PROMISE_METHODS, value, name);
    case "ArrayBuffer":
      return bindMethod(ARRAY_BUFFER_METHODS, value, name);
    case "TypedArray":
      return bindMethod(TYPED_ARRAY_METHODS, value, name);
    case "Blob":
      return bindMethod(BLOB_METHODS, value, name);
    case "Url":
      return bindMethod(URL_METHODS, value, name);
    case "Storage":
      return bindMethod(STORAGE_METHODS, value, name);
    case "Object":
      return bindMethod(OBJECT_METHODS, value, name);
    case "Function":
    case "Resolver":
    case "Builtin":
    case "Constructor":
      return bindMethod(FUNCTION_METHODS, value, name);
    default:
      return undefined;
  }
}

export function hasMethod(value: Value, name: string): boolean {
  return lookupMethod(value, name) !== undefined;
}
