import { ErrorCode, throwRuntime } from "../../errors";
import { asString, relativeIndex, toIntegerOrInfinity } from "../../runtime/coerce";
import { compileRegex, hostRegex, matchToValue } from "../../runtime/regex";
import type { StringValue, Value } from "../../runtime/value";
import { arr, bool, float, isCallable, nul, num, str, undef } from "../../runtime/value";
import type { EvalContext } from "../context";
import type { MethodTable } from "./shared";
import { arg, optionalArg, stringArg } from "./shared";

function position(args: Value[], index: number, length: number, fallback: number): number {
  const value = optionalArg(args, index);
  if (!value) return fallback;
  return Math.min(Math.max(toIntegerOrInfinity(value), 0), length);
}

/** Host replacer that calls a script function with the match details. */
function scriptReplacer(ctx: EvalContext, fn: Value): (match: string, ...rest: unknown[]) => string {
  return (match, ...rest) => {
    const args: Value[] = [str(match)];
    for (const part of rest) {
      if (typeof part === "string") args.push(str(part));
      else if (typeof part === "number") args.push(num(part));
      else if (part === undefined) args.push(undef());
    }
    return asString(ctx.callValue(fn, args));
  };
}

function replaceWith(ctx: EvalContext, self: StringValue, args: Value[], all: boolean): Value {
  const pattern = arg(args, 0);
  const replacement = arg(args, 1);
  let search: string | RegExp;
  if (pattern.kind === "RegExp") {
    if (all && !pattern.flags.includes("g")) {
      return throwRuntime(ErrorCode.INVALID_ARGUMENT, {
        callee: "replaceAll",
        message: "must be called with a global RegExp",
      });
    }
    search = hostRegex(pattern);
    search.lastIndex = 0;
    if (search.global) pattern.lastIndex = 0;
  } else {
    search = asString(pattern);
  }
  const text = self.value;
  const useAll = all && typeof search === "string";
  if (!isCallable(replacement)) {
    const replaceText = asString(replacement);
    return str(useAll ? text.replaceAll(search, replaceText) : text.replace(search, replaceText));
  }
  const fn = scriptReplacer(ctx, replacement);
  return str(useAll ? text.replaceAll(search, fn) : text.replace(search, fn));
}

/** Strings passed to `match`, `matchAll` and `search` are regex sources. */
function toRegex(value: Value, flags: string): RegExp {
  if (value.kind === "RegExp") return hostRegex(value);
  return compileRegex(value.kind === "Undefined" ? "(?:)" : asString(value), flags);
}

export const STRING_METHODS: MethodTable<StringValue> = {
  trim: (_ctx, self) => str(self.value.trim()),
  trimStart: (_ctx, self) => str(self.value.trimStart()),
  trimEnd: (_ctx, self) => str(self.value.trimEnd()),
  toUpperCase: (_ctx, self) => str(self.value.toUpperCase()),
  toLowerCase: (_ctx, self) => str(self.value.toLowerCase()),
  includes: (_ctx, self, args) =>
    bool(self.value.includes(stringArg(args, 0), position(args, 1, self.value.length, 0))),
  startsWith: (_ctx, self, args) =>
    bool(self.value.startsWith(stringArg(args, 0), position(args, 1, self.value.length, 0))),
  endsWith: (_ctx, self, args) => {
    const n = self.value.length;
    return bool(self.value.endsWith(stringArg(args, 0), position(args, 1, n, n)));
  },
  slice: (_ctx, self, args) => {
    const n = self.value.length;
    return str(self.value.slice(relativeIndex(args[0], n, 0), relativeIndex(args[1], n, n)));
  },
  substring: (_ctx, self, args) => {
    const n = self.value.length;
    return str(self.value.substring(position(args, 0, n, 0), position(args, 1, n, n)));
  },
  substr: (_ctx, self, args) => {
    const n = self.value.length;
    const start = relativeIndex(args[0], n, 0);
    const length = optionalArg(args, 1) ? Math.max(toIntegerOrInfinity(args[1]), 0) : n - start;
    return str(self.value.slice(start, start + length));
  },
  indexOf: (_ctx, self, args) =>
    num(self.value.indexOf(stringArg(args, 0), position(args, 1, self.value.length, 0))),
  lastIndexOf: (_ctx, self, args) => {
    const from = optionalArg(args, 1);
    return num(self.value.lastIndexOf(stringArg(args, 0), from ? toIntegerOrInfinity(from) : Infinity));
  },
  charAt: (_ctx, self, args) => str(self.value.charAt(toIntegerOrInfinity(args[0]))),
  charCodeAt: (_ctx, self, args) => {
    const code = self.value.charCodeAt(toIntegerOrInfinity(args[0]));
    return Number.isNaN(code) ? float(NaN) : num(code);
  },
  codePointAt: (_ctx, self, args) => {
    const code = self.value.codePointAt(toIntegerOrInfinity(args[0]));
    return code === undefined ? undef() : num(code);
  },
  at: (_ctx, self, args) => {
    const n = self.value.length;
    const i = toIntegerOrInfinity(args[0]);
    const ch = self.value[i < 0 ? n + i : i];
    return ch === undefined ? undef() : str(ch);
  },
  concat: (_ctx, self, args) => str(self.value + args.map(asString).join("")),
  repeat: (_ctx, self, args) => {
    const count = toIntegerOrInfinity(args[0]);
    if (count < 0 || count === Infinity) {
      return throwRuntime(ErrorCode.RANGE, { message: `Invalid count value: ${asString(arg(args, 0))}` });
    }
    return str(self.value.repeat(count));
  },
  padStart: (_ctx, self, args) => {
    const fill = optionalArg(args, 1);
    return str(self.value.padStart(toIntegerOrInfinity(args[0]), fill ? asString(fill) : " "));
  },
  padEnd: (_ctx, self, args) => {
    const fill = optionalArg(args, 1);
    return str(self.value.padEnd(toIntegerOrInfinity(args[0]), fill ? asString(fill) : " "));
  },
  split: (_ctx, self, args) => {
    const sep = optionalArg(args, 0);
    const limitArg = optionalArg(args, 1);
    const limit = limitArg ? toIntegerOrInfinity(limitArg) >>> 0 : undefined;
    if (!sep) return arr(limit === 0 ? [] : [str(self.value)]);
    const parts =
      sep.kind === "RegExp" ? self.value.split(hostRegex(sep), limit) : self.value.split(asString(sep), limit);
    return arr(parts.map((p) => (p === undefined ? undef() : str(p))));
  },
  replace: (ctx, self, args) => replaceWith(ctx, self, args, false),
  replaceAll: (ctx, self, args) => replaceWith(ctx, self, args, true),
  match: (_ctx, self, args) => {
    const pattern = arg(args, 0);
    const re = toRegex(pattern, "");
    if (re.global) {
      re.lastIndex = 0;
      const all = self.value.match(re);
      if (pattern.kind === "RegExp") pattern.lastIndex = 0;
      return all ? arr(all.map((m) => str(m))) : nul();
    }
    const match = re.exec(self.value);
    return match ? matchToValue(match, self.value) : nul();
  },
  matchAll: (_ctx, self, args) => {
    const pattern = arg(args, 0);
    if (pattern.kind === "RegExp" && !pattern.flags.includes("g")) {
      return throwRuntime(ErrorCode.INVALID_ARGUMENT, {
        callee: "matchAll",
        message: "must be called with a global RegExp",
      });
    }
    const re = toRegex(pattern, "g");
    re.lastIndex = 0;
    return arr(Array.from(self.value.matchAll(re), (m) => matchToValue(m, self.value)));
  },
  search: (_ctx, self, args) => {
    const re = toRegex(arg(args, 0), "");
    re.lastIndex = 0;
    return num(self.value.search(re));
  },
  localeCompare: (_ctx, self, args) => num(Math.sign(self.value.localeCompare(stringArg(args, 0)))),
  toString: (_ctx: EvalContext, self: StringValue) => self,
  valueOf: (_ctx: EvalContext, self: StringValue) => self,
};
