/**
 * Centralized error catalog for the script harness.
 * Every parse and runtime failure is raised through a code from this table so
 * messages stay consistent across the parser, evaluator and scheduler.
 */
import type { Value } from "./runtime/value";

export enum ErrorCode {
  // parse
  EMPTY_EXPRESSION = "EMPTY_EXPRESSION",
  UNSUPPORTED_EXPRESSION = "UNSUPPORTED_EXPRESSION",
  INVALID_OPERATOR_EXPRESSION = "INVALID_OPERATOR_EXPRESSION",
  EXPECTED_CHAR = "EXPECTED_CHAR",
  EXPECTED_KEYWORD = "EXPECTED_KEYWORD",
  UNCLOSED_STRING = "UNCLOSED_STRING",
  UNCLOSED_BLOCK = "UNCLOSED_BLOCK",
  UNCLOSED_TEMPLATE = "UNCLOSED_TEMPLATE",
  UNTERMINATED_COMMENT = "UNTERMINATED_COMMENT",
  UNTERMINATED_REGEX = "UNTERMINATED_REGEX",
  INVALID_REGEX_FLAGS = "INVALID_REGEX_FLAGS",
  INVALID_NUMERIC_LITERAL = "INVALID_NUMERIC_LITERAL",
  INVALID_BIGINT_LITERAL = "INVALID_BIGINT_LITERAL",
  ARITY = "ARITY",
  MISSING_OPERAND = "MISSING_OPERAND",
  INVALID_SYNTAX = "INVALID_SYNTAX",
  INVALID_ASSIGNMENT_TARGET = "INVALID_ASSIGNMENT_TARGET",
  // runtime
  UNKNOWN_VARIABLE = "UNKNOWN_VARIABLE",
  NOT_A_FUNCTION = "NOT_A_FUNCTION",
  MEMBER_NOT_A_FUNCTION = "MEMBER_NOT_A_FUNCTION",
  NOT_A_CONSTRUCTOR = "NOT_A_CONSTRUCTOR",
  ASSIGN_TO_CONST = "ASSIGN_TO_CONST",
  BIGINT_MIX_ADD = "BIGINT_MIX_ADD",
  BIGINT_MIX = "BIGINT_MIX",
  BIGINT_TO_NUMBER = "BIGINT_TO_NUMBER",
  DIVISION_BY_ZERO = "DIVISION_BY_ZERO",
  SYMBOL_TO_PRIMITIVE = "SYMBOL_TO_PRIMITIVE",
  AWAIT_REJECTED = "AWAIT_REJECTED",
  DETACHED_BUFFER = "DETACHED_BUFFER",
  INVALID_ARGUMENT = "INVALID_ARGUMENT",
  PROPERTY_OF_NULLISH = "PROPERTY_OF_NULLISH",
  NOT_ITERABLE = "NOT_ITERABLE",
  TIMER_STEP_LIMIT = "TIMER_STEP_LIMIT",
  LOOP_LIMIT = "LOOP_LIMIT",
  CALL_DEPTH = "CALL_DEPTH",
  NEGATIVE_ADVANCE = "NEGATIVE_ADVANCE",
  ADVANCE_TO_PAST = "ADVANCE_TO_PAST",
  INVALID_OPTION = "INVALID_OPTION",
  JSON_PARSE = "JSON_PARSE",
  RANGE = "RANGE",
}

export type ErrorParams = Readonly<Record<string, string | number>>;

export interface ErrorDefinition {
  code: ErrorCode;
  kind: "parse" | "runtime";
  format: (params: ErrorParams) => string;
}

function parseDef(
  code: ErrorCode,
  format: (params: ErrorParams) => string
): ErrorDefinition {
  return { code, kind: "parse", format };
}

function runtimeDef(
  code: ErrorCode,
  format: (params: ErrorParams) => string
): ErrorDefinition {
  return { code, kind: "runtime", format };
}

export const ERROR_CATALOG: Record<ErrorCode, ErrorDefinition> = {
  [ErrorCode.EMPTY_EXPRESSION]: parseDef(
    ErrorCode.EMPTY_EXPRESSION,
    () => "empty expression"
  ),
  [ErrorCode.UNSUPPORTED_EXPRESSION]: parseDef(
    ErrorCode.UNSUPPORTED_EXPRESSION,
    ({ src }) => `unsupported expression: ${src}`
  ),
  [ErrorCode.INVALID_OPERATOR_EXPRESSION]: parseDef(
    ErrorCode.INVALID_OPERATOR_EXPRESSION,
    ({ level }) => `invalid ${level} expression`
  ),
  [ErrorCode.EXPECTED_CHAR]: parseDef(
    ErrorCode.EXPECTED_CHAR,
    ({ ch, pos }) => `expected '${ch}' at ${pos}`
  ),
  [ErrorCode.EXPECTED_KEYWORD]: parseDef(
    ErrorCode.EXPECTED_KEYWORD,
    ({ keyword, pos }) => `expected '${keyword}' at ${pos}`
  ),
  [ErrorCode.UNCLOSED_STRING]: parseDef(
    ErrorCode.UNCLOSED_STRING,
    () => "unclosed string literal"
  ),
  [ErrorCode.UNCLOSED_BLOCK]: parseDef(
    ErrorCode.UNCLOSED_BLOCK,
    () => "unclosed block"
  ),
  [ErrorCode.UNCLOSED_TEMPLATE]: parseDef(
    ErrorCode.UNCLOSED_TEMPLATE,
    () => "unclosed template literal"
  ),
  [ErrorCode.UNTERMINATED_COMMENT]: parseDef(
    ErrorCode.UNTERMINATED_COMMENT,
    () => "unterminated block comment"
  ),
  [ErrorCode.UNTERMINATED_REGEX]: parseDef(
    ErrorCode.UNTERMINATED_REGEX,
    () => "unterminated regex literal"
  ),
  [ErrorCode.INVALID_REGEX_FLAGS]: parseDef(
    ErrorCode.INVALID_REGEX_FLAGS,
    ({ flags }) => `invalid regular expression flags: ${flags}`
  ),
  [ErrorCode.INVALID_NUMERIC_LITERAL]: parseDef(
    ErrorCode.INVALID_NUMERIC_LITERAL,
    ({ src }) => `invalid numeric literal: ${src}`
  ),
  [ErrorCode.INVALID_BIGINT_LITERAL]: parseDef(
    ErrorCode.INVALID_BIGINT_LITERAL,
    ({ src }) => `invalid BigInt literal: ${src}`
  ),
  [ErrorCode.ARITY]: parseDef(
    ErrorCode.ARITY,
    ({ callee, rule }) => `${callee} ${rule}`
  ),
  [ErrorCode.MISSING_OPERAND]: parseDef(
    ErrorCode.MISSING_OPERAND,
    ({ operator }) => `${operator} requires an operand`
  ),
  [ErrorCode.INVALID_SYNTAX]: parseDef(
    ErrorCode.INVALID_SYNTAX,
    (params) =>
      "src" in params
        ? `invalid ${params.type} syntax: ${params.src}`
        : `invalid ${params.type} syntax`
  ),
  [ErrorCode.INVALID_ASSIGNMENT_TARGET]: parseDef(
    ErrorCode.INVALID_ASSIGNMENT_TARGET,
    ({ src }) => `invalid assignment target: ${src}`
  ),
  [ErrorCode.UNKNOWN_VARIABLE]: runtimeDef(
    ErrorCode.UNKNOWN_VARIABLE,
    ({ name }) => `unknown variable: ${name}`
  ),
  [ErrorCode.NOT_A_FUNCTION]: runtimeDef(
    ErrorCode.NOT_A_FUNCTION,
    ({ target }) => `'${target}' is not a function`
  ),
  [ErrorCode.MEMBER_NOT_A_FUNCTION]: runtimeDef(
    ErrorCode.MEMBER_NOT_A_FUNCTION,
    ({ member }) => `${member} is not a function`
  ),
  [ErrorCode.NOT_A_CONSTRUCTOR]: runtimeDef(
    ErrorCode.NOT_A_CONSTRUCTOR,
    ({ name }) => `${name} is not a constructor`
  ),
  [ErrorCode.ASSIGN_TO_CONST]: runtimeDef(
    ErrorCode.ASSIGN_TO_CONST,
    ({ name }) => `Assignment to constant variable '${name}'`
  ),
  [ErrorCode.BIGINT_MIX_ADD]: runtimeDef(
    ErrorCode.BIGINT_MIX_ADD,
    () => "cannot mix BigInt and other types in addition"
  ),
  [ErrorCode.BIGINT_MIX]: runtimeDef(
    ErrorCode.BIGINT_MIX,
    () => "cannot mix BigInt and other types, use explicit conversions"
  ),
  [ErrorCode.BIGINT_TO_NUMBER]: runtimeDef(
    ErrorCode.BIGINT_TO_NUMBER,
    () => "cannot convert a BigInt value to a number"
  ),
  [ErrorCode.DIVISION_BY_ZERO]: runtimeDef(
    ErrorCode.DIVISION_BY_ZERO,
    () => "division by zero"
  ),
  [ErrorCode.SYMBOL_TO_PRIMITIVE]: runtimeDef(
    ErrorCode.SYMBOL_TO_PRIMITIVE,
    () => "cannot convert Symbol to primitive"
  ),
  [ErrorCode.AWAIT_REJECTED]: runtimeDef(
    ErrorCode.AWAIT_REJECTED,
    ({ reason }) => `await rejected Promise: ${reason}`
  ),
  [ErrorCode.DETACHED_BUFFER]: runtimeDef(
    ErrorCode.DETACHED_BUFFER,
    () => "ArrayBuffer is detached"
  ),
  [ErrorCode.INVALID_ARGUMENT]: runtimeDef(
    ErrorCode.INVALID_ARGUMENT,
    ({ callee, message }) => `${callee} ${message}`
  ),
  [ErrorCode.PROPERTY_OF_NULLISH]: runtimeDef(
    ErrorCode.PROPERTY_OF_NULLISH,
    ({ member, value }) => `cannot read properties of ${value} (reading '${member}')`
  ),
  [ErrorCode.NOT_ITERABLE]: runtimeDef(
    ErrorCode.NOT_ITERABLE,
    ({ value }) => `${value} is not iterable`
  ),
  [ErrorCode.TIMER_STEP_LIMIT]: runtimeDef(
    ErrorCode.TIMER_STEP_LIMIT,
    ({ limit, steps, nowMs, dueLimit, pending, next }) =>
      `flush exceeded max task steps (possible uncleared setInterval): limit=${limit}, steps=${steps}, now_ms=${nowMs}, due_limit=${dueLimit}, pending_tasks=${pending}, next_task=${next}`
  ),
  [ErrorCode.LOOP_LIMIT]: runtimeDef(
    ErrorCode.LOOP_LIMIT,
    ({ limit }) => `loop iteration limit exceeded (${limit})`
  ),
  [ErrorCode.CALL_DEPTH]: runtimeDef(
    ErrorCode.CALL_DEPTH,
    ({ limit }) => `maximum call depth exceeded (${limit})`
  ),
  [ErrorCode.NEGATIVE_ADVANCE]: runtimeDef(
    ErrorCode.NEGATIVE_ADVANCE,
    () => "advanceTime requires non-negative milliseconds"
  ),
  [ErrorCode.ADVANCE_TO_PAST]: runtimeDef(
    ErrorCode.ADVANCE_TO_PAST,
    ({ target, nowMs }) =>
      `advanceTimeTo requires target >= nowMs (target=${target}, nowMs=${nowMs})`
  ),
  [ErrorCode.INVALID_OPTION]: runtimeDef(
    ErrorCode.INVALID_OPTION,
    ({ name, reason }) => `invalid option ${name}: ${reason}`
  ),
  [ErrorCode.JSON_PARSE]: runtimeDef(
    ErrorCode.JSON_PARSE,
    ({ message }) => `JSON.parse: ${message}`
  ),
  [ErrorCode.RANGE]: runtimeDef(ErrorCode.RANGE, ({ message }) => `${message}`),
};

export abstract class ScriptError extends Error {
  abstract readonly kind: "parse" | "runtime";

  constructor(
    readonly code: ErrorCode,
    message: string,
    readonly offset?: number
  ) {
    super(message);
  }
}

export class ScriptParseError extends ScriptError {
  readonly kind = "parse";
  override name = "ScriptParseError";
}

export class ScriptRuntimeError extends ScriptError {
  readonly kind = "runtime";
  override name = "ScriptRuntimeError";
}

/** A script-level `throw` travelling through host frames. */
export class ScriptThrow extends Error {
  override name = "ScriptThrow";

  constructor(readonly value: Value, message: string) {
    super(message);
  }
}

export function parseError(
  code: ErrorCode,
  params: ErrorParams = {},
  offset?: number
): ScriptParseError {
  return new ScriptParseError(code, ERROR_CATALOG[code].format(params), offset);
}

export function runtimeError(
  code: ErrorCode,
  params: ErrorParams = {}
): ScriptRuntimeError {
  return new ScriptRuntimeError(code, ERROR_CATALOG[code].format(params));
}

export function throwParse(
  code: ErrorCode,
  params: ErrorParams = {},
  offset?: number
): never {
  throw parseError(code, params, offset);
}

export function throwRuntime(code: ErrorCode, params: ErrorParams = {}): never {
  throw runtimeError(code, params);
}
