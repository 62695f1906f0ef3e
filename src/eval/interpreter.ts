import type { Stmt } from "../ast/nodes";
import { astExprToString } from "../ast/stringify";
import { ErrorCode, throwRuntime } from "../errors";
import { parseExpr, parseScript } from "../parser";
import { Env } from "../runtime/env";
import { asString } from "../runtime/coerce";
import { callResolver } from "../runtime/promise";
import { SeededRandom } from "../runtime/random";
import type { ScheduledTask } from "../runtime/scheduler";
import { Scheduler } from "../runtime/scheduler";
import { createStorage } from "../runtime/storage";
import type { StorageValue, SymbolValue, Value } from "../runtime/value";
import { isCallable, undef } from "../runtime/value";
import { hoistVarNames } from "./bindings";
import { callBuiltin, callConstructorAsFunction, constructBuiltin, namespaceObjects } from "./builtins";
import { callFunction, constructFunction, createFunction } from "./calls";
import type { ActiveEvent, EvalContext, EvalLimits, EventState, Frame, HostHooks } from "./context";
import { evaluate } from "./evaluator";
import { executeStatements } from "./executor";
import { ReturnSignal } from "./signals";

export interface InterpreterOptions {
  startTimeMs: number;
  timerStepLimit: number;
  maxLoopIterations: number;
  maxCallDepth: number;
  randomSeed: number;
  localStorage: Readonly<Record<string, string>>;
}

/**
 * Owns the global scope, the scheduler and every service the evaluator
 * reaches through `EvalContext`.
 */
export class Interpreter implements EvalContext {
  readonly scheduler: Scheduler;
  readonly globals = new Env();
  readonly storage: StorageValue;
  readonly limits: EvalLimits;
  activeEvent: ActiveEvent | undefined;
  callDepth = 0;

  private readonly rng: SeededRandom;
  private symbolCount = 0;
  private readonly symbolRegistry = new Map<string, SymbolValue>();
  private promiseCount = 0;

  constructor(
    options: InterpreterOptions,
    readonly hooks: HostHooks,
    trace?: (line: string) => void
  ) {
    this.scheduler = new Scheduler(
      { startTimeMs: options.startTimeMs, timerStepLimit: options.timerStepLimit },
      (task) => this.runTask(task),
      trace
    );
    this.limits = {
      maxLoopIterations: options.maxLoopIterations,
      maxCallDepth: options.maxCallDepth,
    };
    this.rng = new SeededRandom(options.randomSeed);
    this.storage = createStorage(options.localStorage);
    this.globals.define("localStorage", this.storage);
    for (const [name, value] of namespaceObjects()) this.globals.define(name, value);
  }

  // ============= EVALCONTEXT =============

  evalExpr(expr: Parameters<EvalContext["evalExpr"]>[0], frame: Frame): Value {
    return evaluate(this, expr, frame);
  }

  execStatements(stmts: Stmt[], frame: Frame): Value | undefined {
    return executeStatements(this, stmts, frame);
  }

  callValue(fn: Value, args: Value[], thisValue?: Value): Value {
    switch (fn.kind) {
      case "Function":
        return callFunction(this, fn, args, thisValue);
      case "Resolver": {
        callResolver(this, fn, args[0] ?? undef());
        return undef();
      }
      case "Builtin":
        return callBuiltin(this, fn, args);
      case "Constructor":
        return callConstructorAsFunction(this, fn.name, args);
      default:
        return throwRuntime(ErrorCode.NOT_A_FUNCTION, { target: asString(fn) });
    }
  }

  call(fn: Value, args: Value[], thisValue?: Value): Value {
    return this.callValue(fn, args, thisValue);
  }

  construct(callee: Value, args: Value[]): Value {
    switch (callee.kind) {
      case "Constructor":
        return constructBuiltin(this, callee.name, args);
      case "Function":
        return constructFunction(this, callee, args);
      case "Builtin":
        return throwRuntime(ErrorCode.NOT_A_CONSTRUCTOR, { name: callee.name });
      default:
        return throwRuntime(ErrorCode.NOT_A_CONSTRUCTOR, { name: asString(callee) });
    }
  }

  queueMicrotask(job: () => void): void {
    this.scheduler.queueMicrotask(job);
  }

  nextPromiseId(): number {
    return ++this.promiseCount;
  }

  random(): number {
    return this.rng.next();
  }

  reseed(seed: number): void {
    this.rng.reseed(seed);
  }

  createSymbol(description?: string): SymbolValue {
    const symbol: SymbolValue = { kind: "Symbol", id: ++this.symbolCount };
    if (description !== undefined) symbol.description = description;
    return symbol;
  }

  symbolFor(key: string): SymbolValue {
    const existing = this.symbolRegistry.get(key);
    if (existing) return existing;
    const symbol = this.createSymbol(key);
    symbol.registryKey = key;
    this.symbolRegistry.set(key, symbol);
    return symbol;
  }

  // ============= ENTRY POINTS =============

  /** Runs a script in the global scope; the completion value of its last expression statement. */
  runScript(source: string): Value {
    const stmts = parseScript(source);
    hoistVarNames(stmts, this.globals);
    let completion: Value | undefined;
    try {
      completion = executeStatements(this, stmts, { env: this.globals });
    } catch (e) {
      if (!(e instanceof ReturnSignal)) throw e;
      completion = e.value;
    }
    this.scheduler.drainMicrotasks();
    return completion ?? undef();
  }

  evaluateExpression(source: string): Value {
    const value = evaluate(this, parseExpr(source), { env: this.globals });
    this.scheduler.drainMicrotasks();
    return value;
  }

  /** Runs a handler script with `param` bound to a snapshot of the event. */
  runWithEvent(source: string, param: string, state: EventState): Value {
    const previous = this.activeEvent;
    this.activeEvent = { param, state };
    try {
      return this.runScript(source);
    } finally {
      this.activeEvent = previous;
    }
  }

  private runTask(task: ScheduledTask): void {
    const { callback } = task;
    if (callback.kind === "Inline") {
      const fn = createFunction(callback.handler, task.env, { isAsync: false, isArrow: true });
      callFunction(this, fn, task.args);
      return;
    }
    // references resolve when the timer fires, so later reassignments are seen
    const fn = evaluate(this, callback.expr, { env: task.env });
    if (!isCallable(fn)) {
      throwRuntime(ErrorCode.NOT_A_FUNCTION, { target: astExprToString(callback.expr) });
    }
    this.callValue(fn, task.args);
  }
}
