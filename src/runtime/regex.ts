import { ErrorCode, throwRuntime } from "../errors";
import { regexFlagsProblem } from "../parser/regex";
import type { RegExpValue, Value } from "./value";
import { arr, nul, num, obj, str, undef } from "./value";

export function createRegExp(source: string, flags: string): RegExpValue {
  const problem = regexFlagsProblem(flags);
  if (problem !== "") {
    throwRuntime(ErrorCode.INVALID_ARGUMENT, {
      callee: "RegExp",
      message: `invalid flags '${flags}': ${problem}`,
    });
  }
  compileRegex(source, flags);
  return { kind: "RegExp", source: source === "" ? "(?:)" : source, flags, lastIndex: 0, properties: new Map() };
}

/** Host RegExp for `source`/`flags`; pattern errors become runtime errors. */
export function compileRegex(source: string, flags: string): RegExp {
  try {
    return new RegExp(source, flags);
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    return throwRuntime(ErrorCode.INVALID_ARGUMENT, { callee: "RegExp", message });
  }
}

/** Host RegExp positioned at the value's `lastIndex`. */
export function hostRegex(regex: RegExpValue): RegExp {
  const re = compileRegex(regex.source, regex.flags);
  re.lastIndex = regex.lastIndex;
  return re;
}

function usesLastIndex(regex: RegExpValue): boolean {
  return regex.flags.includes("g") || regex.flags.includes("y");
}

/** Converts a host match into the script array shape (`index`, `input`, `groups`). */
export function matchToValue(match: RegExpExecArray | RegExpMatchArray, input: string): Value {
  const result = arr(Array.from(match, (part) => (part === undefined ? undef() : str(part))));
  result.properties.set("index", num(match.index ?? 0));
  result.properties.set("input", str(input));
  const groups = match.groups;
  result.properties.set(
    "groups",
    groups
      ? obj(Object.entries(groups).map(([k, v]): [string, Value] => [k, v === undefined ? undef() : str(v)]))
      : undef()
  );
  return result;
}

export function regexExec(regex: RegExpValue, input: string): Value {
  const re = hostRegex(regex);
  const match = re.exec(input);
  if (usesLastIndex(regex)) regex.lastIndex = match ? re.lastIndex : 0;
  return match ? matchToValue(match, input) : nul();
}

export function regexTest(regex: RegExpValue, input: string): boolean {
  return regexExec(regex, input).kind !== "Null";
}
