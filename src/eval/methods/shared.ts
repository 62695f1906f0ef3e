import { ErrorCode, throwRuntime } from "../../errors";
import { asString } from "../../runtime/coerce";
import type { CallableValue, Value } from "../../runtime/value";
import { isCallable, undef } from "../../runtime/value";
import type { EvalContext } from "../context";

export type Method<T extends Value> = (ctx: EvalContext, self: T, args: Value[]) => Value;

export type MethodTable<T extends Value> = Readonly<Record<string, Method<T>>>;

/** A method already bound to its receiver. */
export type BoundMethod = (ctx: EvalContext, args: Value[]) => Value;

export function bindMethod<T extends Value>(
  table: MethodTable<T>,
  self: T,
  name: string
): BoundMethod | undefined {
  if (!Object.prototype.hasOwnProperty.call(table, name)) return undefined;
  const method = table[name];
  return (ctx, args) => method(ctx, self, args);
}

export function arg(args: Value[], index: number): Value {
  return args[index] ?? undef();
}

export function optionalArg(args: Value[], index: number): Value | undefined {
  const value = args[index];
  return value === undefined || value.kind === "Undefined" ? undefined : value;
}

export function stringArg(args: Value[], index: number): string {
  return asString(arg(args, index));
}

export function callbackArg(args: Value[], index: number, callee: string): CallableValue {
  const fn = arg(args, index);
  if (!isCallable(fn)) {
    return throwRuntime(ErrorCode.INVALID_ARGUMENT, {
      callee,
      message: `callback ${asString(fn)} is not a function`,
    });
  }
  return fn;
}
