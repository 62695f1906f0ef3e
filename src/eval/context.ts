import type { ConsoleLevel, Expr, Stmt } from "../ast/nodes";
import type { Env } from "../runtime/env";
import type { PromiseHost } from "../runtime/promise";
import type { Scheduler } from "../runtime/scheduler";
import type { StorageValue, SymbolValue, Value } from "../runtime/value";

/** The DOM-style event a handler script runs for. */
export interface EventState {
  type: string;
  target: string;
  bubbles: boolean;
  cancelable: boolean;
  timeStamp: number;
  defaultPrevented: boolean;
}

export interface ActiveEvent {
  /** Name the handler uses for the event, e.g. `event` or `e`. */
  param: string;
  state: EventState;
}

export interface Frame {
  env: Env;
}

/** Side effects a script can have outside the interpreter. */
export interface HostHooks {
  console(level: ConsoleLevel, line: string): void;
  alert(message: string): void;
  confirm(message: string): boolean;
  prompt(message: string, defaultValue?: string): string | null;
}

export interface EvalLimits {
  maxLoopIterations: number;
  maxCallDepth: number;
}

/**
 * Interface for the interpreter services the evaluator, executor and builtin
 * tables need, so none of them import the interpreter directly.
 */
export interface EvalContext extends PromiseHost {
  readonly scheduler: Scheduler;
  readonly globals: Env;
  readonly hooks: HostHooks;
  readonly limits: EvalLimits;
  readonly storage: StorageValue;
  /** Set while an event handler script runs. */
  activeEvent: ActiveEvent | undefined;
  /** Script function calls currently on the host stack. */
  callDepth: number;
  evalExpr(expr: Expr, frame: Frame): Value;
  /** Runs a statement list; the value of the last expression statement, if any. */
  execStatements(stmts: Stmt[], frame: Frame): Value | undefined;
  callValue(fn: Value, args: Value[], thisValue?: Value): Value;
  construct(callee: Value, args: Value[]): Value;
  random(): number;
  createSymbol(description?: string): SymbolValue;
  symbolFor(key: string): SymbolValue;
}
