import { ErrorCode, ScriptRuntimeError, ScriptThrow } from "../errors";
import type { Value } from "./value";
import { errorObject } from "./value";

const ERROR_NAMES: Partial<Record<ErrorCode, string>> = {
  [ErrorCode.UNKNOWN_VARIABLE]: "ReferenceError",
  [ErrorCode.NOT_A_FUNCTION]: "TypeError",
  [ErrorCode.MEMBER_NOT_A_FUNCTION]: "TypeError",
  [ErrorCode.NOT_A_CONSTRUCTOR]: "TypeError",
  [ErrorCode.ASSIGN_TO_CONST]: "TypeError",
  [ErrorCode.BIGINT_MIX_ADD]: "TypeError",
  [ErrorCode.BIGINT_MIX]: "TypeError",
  [ErrorCode.BIGINT_TO_NUMBER]: "TypeError",
  [ErrorCode.SYMBOL_TO_PRIMITIVE]: "TypeError",
  [ErrorCode.DETACHED_BUFFER]: "TypeError",
  [ErrorCode.PROPERTY_OF_NULLISH]: "TypeError",
  [ErrorCode.NOT_ITERABLE]: "TypeError",
  [ErrorCode.INVALID_ARGUMENT]: "TypeError",
  [ErrorCode.DIVISION_BY_ZERO]: "RangeError",
  [ErrorCode.RANGE]: "RangeError",
  [ErrorCode.CALL_DEPTH]: "RangeError",
  [ErrorCode.JSON_PARSE]: "SyntaxError",
};

// harness guards, not script errors
const UNCATCHABLE: ReadonlySet<ErrorCode> = new Set([
  ErrorCode.LOOP_LIMIT,
  ErrorCode.TIMER_STEP_LIMIT,
]);

/**
 * The script-visible value of a host exception: the thrown value of a
 * `ScriptThrow`, an Error-shaped object for runtime errors, or undefined for
 * anything a script must not catch.
 */
export function thrownValue(e: unknown): Value | undefined {
  if (e instanceof ScriptThrow) return e.value;
  if (e instanceof ScriptRuntimeError) {
    if (UNCATCHABLE.has(e.code)) return undefined;
    return errorObject(ERROR_NAMES[e.code] ?? "Error", e.message);
  }
  return undefined;
}
