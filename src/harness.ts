import type { ConsoleLevel } from "./ast/nodes";
import type { HarnessOptions } from "./config";
import { resolveOptions } from "./config";
import { ErrorCode, throwRuntime } from "./errors";
import type { EventState, HostHooks } from "./eval/context";
import { Interpreter } from "./eval/interpreter";
import { Logger } from "./logger";
import type { PendingTimer } from "./runtime/scheduler";
import type { Value } from "./runtime/value";

export interface ConsoleEntry {
  level: ConsoleLevel;
  line: string;
}

const DEFAULT_EVENT: EventState = {
  type: "click",
  target: "",
  bubbles: true,
  cancelable: true,
  timeStamp: 0,
  defaultPrevented: false,
};

/**
 * Public entry point: runs scripts against one global scope and exposes the
 * virtual clock, dialog mocks and trace buffer to the test driving it.
 */
export class Harness {
  readonly options: HarnessOptions;
  readonly logger: Logger;
  private readonly interpreter: Interpreter;

  private consoleEntries: ConsoleEntry[] = [];
  private alerts: string[] = [];
  private readonly confirmResponses: boolean[] = [];
  private defaultConfirm = false;
  private readonly promptResponses: Array<string | null> = [];
  private defaultPrompt: string | null | undefined;

  private traceEnabled: boolean;
  private traceTimers = true;
  private traceLimit: number;
  private traceLogs: string[] = [];

  constructor(options: Partial<HarnessOptions> = {}) {
    this.options = resolveOptions(options);
    this.logger = new Logger(this.options.logLevel);
    this.traceEnabled = this.options.traceTimers;
    this.traceLimit = this.options.traceLogLimit;
    this.interpreter = new Interpreter(this.options, this.hostHooks(), (line) => this.traceTimer(line));
  }

  private hostHooks(): HostHooks {
    const scriptLog = this.logger.child("console");
    return {
      console: (level, line) => {
        this.consoleEntries.push({ level, line });
        scriptLog.debug(`${level}: ${line}`);
      },
      alert: (message) => {
        this.alerts.push(message);
      },
      confirm: () => this.confirmResponses.shift() ?? this.defaultConfirm,
      prompt: (_message, defaultValue) => {
        if (this.promptResponses.length) return this.promptResponses.shift() ?? null;
        if (this.defaultPrompt !== undefined) return this.defaultPrompt;
        return defaultValue ?? null;
      },
    };
  }

  // ============= SCRIPTS =============

  /** Runs a script in the global scope, then drains microtasks. */
  run(source: string): Value {
    return this.interpreter.runScript(source);
  }

  evaluate(expression: string): Value {
    return this.interpreter.evaluateExpression(expression);
  }

  /**
   * Runs `source` as an event handler with `param` bound to the event.
   * Returns the event state after the handler, so callers can see
   * `preventDefault()`.
   */
  runWithEvent(source: string, param = "event", event: Partial<EventState> = {}): EventState {
    const state: EventState = { ...DEFAULT_EVENT, timeStamp: this.nowMs(), ...event };
    this.interpreter.runWithEvent(source, param, state);
    return state;
  }

  get(name: string): Value | undefined {
    return this.interpreter.globals.get(name);
  }

  set(name: string, value: Value): void {
    this.interpreter.globals.define(name, value);
  }

  // ============= TIMERS =============

  nowMs(): number {
    return this.interpreter.scheduler.nowMs;
  }

  advanceTime(deltaMs: number): number {
    return this.interpreter.scheduler.advanceTime(deltaMs);
  }

  advanceTimeTo(targetMs: number): number {
    return this.interpreter.scheduler.advanceTimeTo(targetMs);
  }

  flush(): number {
    return this.interpreter.scheduler.flush();
  }

  runDueTimers(): number {
    return this.interpreter.scheduler.runDueTimers();
  }

  runNextTimer(): boolean {
    return this.interpreter.scheduler.runNextTimer();
  }

  runNextDueTimer(): boolean {
    return this.interpreter.scheduler.runNextDueTimer();
  }

  pendingTimers(): PendingTimer[] {
    return this.interpreter.scheduler.pendingTimers();
  }

  clearTimer(id: number): boolean {
    return this.interpreter.scheduler.clearTimer(id);
  }

  clearAllTimers(): number {
    return this.interpreter.scheduler.clearAll();
  }

  setTimerStepLimit(limit: number): void {
    this.interpreter.scheduler.setStepLimit(limit);
  }

  // ============= MOCKS =============

  takeConsoleLogs(): string[] {
    return this.takeConsoleEntries().map((entry) => entry.line);
  }

  takeConsoleEntries(): ConsoleEntry[] {
    const entries = this.consoleEntries;
    this.consoleEntries = [];
    return entries;
  }

  takeAlertMessages(): string[] {
    const alerts = this.alerts;
    this.alerts = [];
    return alerts;
  }

  enqueueConfirmResponse(accepted: boolean): void {
    this.confirmResponses.push(accepted);
  }

  setDefaultConfirmResponse(accepted: boolean): void {
    this.defaultConfirm = accepted;
  }

  enqueuePromptResponse(value: string | null): void {
    this.promptResponses.push(value);
  }

  /** `undefined` restores the default: the script's own default value, else null. */
  setDefaultPromptResponse(value: string | null | undefined): void {
    this.defaultPrompt = value;
  }

  localStorage(): Record<string, string> {
    return Object.fromEntries(this.interpreter.storage.items);
  }

  setRandomSeed(seed: number): void {
    this.interpreter.reseed(seed);
  }

  // ============= TRACE =============

  enableTrace(enabled: boolean): void {
    this.traceEnabled = enabled;
  }

  setTraceTimers(enabled: boolean): void {
    this.traceTimers = enabled;
  }

  setTraceLogLimit(limit: number): void {
    if (!Number.isInteger(limit) || limit < 1) {
      throwRuntime(ErrorCode.INVALID_OPTION, { name: "traceLogLimit", reason: "must be an integer >= 1" });
    }
    this.traceLimit = limit;
    if (this.traceLogs.length > limit) this.traceLogs = this.traceLogs.slice(-limit);
  }

  takeTraceLogs(): string[] {
    const logs = this.traceLogs;
    this.traceLogs = [];
    return logs;
  }

  private traceTimer(line: string): void {
    if (!this.traceEnabled || !this.traceTimers) return;
    if (this.traceLogs.length >= this.traceLimit) this.traceLogs.shift();
    this.traceLogs.push(line);
    this.logger.debug(line);
  }
}
