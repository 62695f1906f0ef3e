import { readFile } from "node:fs/promises";
import { ErrorCode, ScriptRuntimeError, runtimeError } from "./errors";
import type { LogLevel } from "./logger";
import { isLogLevel } from "./logger";
import type { Result } from "./result";
import { capture, err } from "./result";

export interface HarnessOptions {
  /** Virtual clock value the harness starts at. */
  startTimeMs: number;
  /** Timer tasks one `flush`/`advanceTime` call may run. */
  timerStepLimit: number;
  maxLoopIterations: number;
  maxCallDepth: number;
  randomSeed: number;
  traceTimers: boolean;
  traceLogLimit: number;
  logLevel: LogLevel;
  localStorage: Record<string, string>;
}

export const DEFAULT_OPTIONS: Readonly<HarnessOptions> = {
  startTimeMs: 0,
  timerStepLimit: 10_000,
  maxLoopIterations: 1_000_000,
  maxCallDepth: 256,
  randomSeed: 0x2545f491,
  traceTimers: false,
  traceLogLimit: 10_000,
  logLevel: "warn",
  localStorage: {},
};

function invalidOption(name: string, reason: string): never {
  throw runtimeError(ErrorCode.INVALID_OPTION, { name, reason });
}

function positiveInteger(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) invalidOption(name, "must be an integer >= 1");
  return value;
}

/** Merges `partial` over the defaults and validates the result. */
export function resolveOptions(partial: Partial<HarnessOptions> = {}): HarnessOptions {
  const options: HarnessOptions = {
    ...DEFAULT_OPTIONS,
    ...partial,
    localStorage: { ...(partial.localStorage ?? DEFAULT_OPTIONS.localStorage) },
  };
  if (!Number.isFinite(options.startTimeMs) || options.startTimeMs < 0) {
    invalidOption("startTimeMs", "must be a finite number >= 0");
  }
  positiveInteger("timerStepLimit", options.timerStepLimit);
  positiveInteger("maxLoopIterations", options.maxLoopIterations);
  positiveInteger("maxCallDepth", options.maxCallDepth);
  positiveInteger("traceLogLimit", options.traceLogLimit);
  if (!Number.isInteger(options.randomSeed)) invalidOption("randomSeed", "must be an integer");
  if (!isLogLevel(options.logLevel)) invalidOption("logLevel", `unknown level '${options.logLevel}'`);
  for (const [key, value] of Object.entries(options.localStorage)) {
    if (typeof value !== "string") invalidOption(`localStorage.${key}`, "must be a string");
  }
  return options;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const NUMBER_KEYS = [
  "startTimeMs",
  "timerStepLimit",
  "maxLoopIterations",
  "maxCallDepth",
  "randomSeed",
  "traceLogLimit",
] as const;

/** Reads the JSON shape of `HarnessOptions`; unknown keys are rejected. */
export function optionsFromJson(raw: unknown): Partial<HarnessOptions> {
  if (!isRecord(raw)) invalidOption("config", "must be a JSON object");
  const partial: Partial<HarnessOptions> = {};
  for (const [key, value] of Object.entries(raw)) {
    const numberKey = NUMBER_KEYS.find((k) => k === key);
    if (numberKey) {
      if (typeof value !== "number") invalidOption(key, "must be a number");
      partial[numberKey] = value;
    } else if (key === "traceTimers") {
      if (typeof value !== "boolean") invalidOption(key, "must be a boolean");
      partial.traceTimers = value;
    } else if (key === "logLevel") {
      if (typeof value !== "string" || !isLogLevel(value)) invalidOption(key, "unknown level");
      partial.logLevel = value;
    } else if (key === "localStorage") {
      if (!isRecord(value)) invalidOption(key, "must be an object of strings");
      const items: Record<string, string> = {};
      for (const [k, v] of Object.entries(value)) {
        if (typeof v !== "string") invalidOption(`localStorage.${k}`, "must be a string");
        items[k] = v;
      }
      partial.localStorage = items;
    } else {
      invalidOption(key, "unknown option");
    }
  }
  return partial;
}

/** Loads and validates a JSON options file for the CLI. */
export async function loadOptionsFile(path: string): Promise<Result<HarnessOptions, Error>> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (e) {
    return err(e instanceof Error ? e : new Error(String(e)));
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    return err(new Error(`${path}: ${e instanceof Error ? e.message : String(e)}`));
  }
  return capture(() => resolveOptions(optionsFromJson(raw)), ScriptRuntimeError);
}
