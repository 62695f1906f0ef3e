export { Harness } from "./harness";
export type { ConsoleEntry } from "./harness";
export { DEFAULT_OPTIONS, loadOptionsFile, optionsFromJson, resolveOptions } from "./config";
export type { HarnessOptions } from "./config";
export { Logger } from "./logger";
export type { LogLevel } from "./logger";
export { formatScriptError, positionAt } from "./diagnostics";
export { parseCliArgs } from "./cliArgs";
export type { CliArgs } from "./cliArgs";
export {
  ERROR_CATALOG,
  ErrorCode,
  ScriptError,
  ScriptParseError,
  ScriptRuntimeError,
  ScriptThrow,
} from "./errors";
export * from "./result";

export * as ast from "./ast";
export {
  parseExpr,
  parseScript,
  parseScriptHandler,
  parseStatements,
  tryParseExpr,
} from "./parser";
export { Scanner, scanTopLevel } from "./lex/scanner";
export { Cursor } from "./lex/cursor";
export { stripJsComments, unescapeString } from "./lex/strings";

export { Interpreter } from "./eval/interpreter";
export type { EventState, HostHooks } from "./eval/context";
export { Env } from "./runtime/env";
export { Scheduler } from "./runtime/scheduler";
export type { PendingTimer } from "./runtime/scheduler";
export { asString, coerceNumberForGlobal, numericValue, truthy } from "./runtime/coerce";
export { looseEqual, sameValueZero, strictEqual } from "./runtime/equality";
export { inspect } from "./runtime/inspect";
export type { Value } from "./runtime/value";
export { arr, big, bool, float, nul, num, obj, str, undef } from "./runtime/value";
