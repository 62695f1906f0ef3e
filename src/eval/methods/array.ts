import { ErrorCode, throwRuntime } from "../../errors";
import { asString, numericValue, relativeIndex, toIntegerOrInfinity, truthy } from "../../runtime/coerce";
import { sameValueZero, strictEqual } from "../../runtime/equality";
import type { ArrayValue, Value } from "../../runtime/value";
import { arr, bool, num, str, undef } from "../../runtime/value";
import type { EvalContext } from "../context";
import type { MethodTable } from "./shared";
import { arg, callbackArg, optionalArg } from "./shared";

/** Element-wise callback loop shared by the iteration methods. */
function each(
  ctx: EvalContext,
  self: ArrayValue,
  args: Value[],
  callee: string,
  visit: (result: Value, el: Value, index: number) => boolean | void
): void {
  const fn = callbackArg(args, 0, callee);
  const thisArg = optionalArg(args, 1);
  for (let i = 0; i < self.elements.length; i++) {
    const el = self.elements[i];
    const result = ctx.callValue(fn, [el, num(i), self], thisArg);
    if (visit(result, el, i) === false) return;
  }
}

function findFrom(
  ctx: EvalContext,
  self: ArrayValue,
  args: Value[],
  callee: string,
  fromEnd: boolean
): { index: number; value: Value } {
  const fn = callbackArg(args, 0, callee);
  const n = self.elements.length;
  for (let k = 0; k < n; k++) {
    const i = fromEnd ? n - 1 - k : k;
    const el = self.elements[i] ?? undef();
    if (truthy(ctx.callValue(fn, [el, num(i), self], optionalArg(args, 1)))) {
      return { index: i, value: el };
    }
  }
  return { index: -1, value: undef() };
}

function reduceWith(ctx: EvalContext, self: ArrayValue, args: Value[], fromEnd: boolean): Value {
  const callee = fromEnd ? "reduceRight" : "reduce";
  const fn = callbackArg(args, 0, callee);
  const order = self.elements.map((_, i) => i);
  if (fromEnd) order.reverse();
  let acc: Value;
  let start = 0;
  if (args.length >= 2) {
    acc = arg(args, 1);
  } else {
    if (order.length === 0) {
      return throwRuntime(ErrorCode.INVALID_ARGUMENT, {
        callee,
        message: "of empty array with no initial value",
      });
    }
    acc = self.elements[order[0]];
    start = 1;
  }
  for (let k = start; k < order.length; k++) {
    const i = order[k];
    acc = ctx.callValue(fn, [acc, self.elements[i] ?? undef(), num(i), self]);
  }
  return acc;
}

function joinElements(elements: Value[], separator: string): string {
  return elements
    .map((el) => (el.kind === "Null" || el.kind === "Undefined" ? "" : asString(el)))
    .join(separator);
}

function flatten(elements: Value[], depth: number): Value[] {
  const out: Value[] = [];
  for (const el of elements) {
    if (el.kind === "Array" && depth > 0) out.push(...flatten(el.elements, depth - 1));
    else out.push(el);
  }
  return out;
}

/** Default sort order: string forms by code unit, undefined last. */
function defaultCompare(a: Value, b: Value): number {
  if (a.kind === "Undefined") return b.kind === "Undefined" ? 0 : 1;
  if (b.kind === "Undefined") return -1;
  const x = asString(a);
  const y = asString(b);
  return x < y ? -1 : x > y ? 1 : 0;
}

export const ARRAY_METHODS: MethodTable<ArrayValue> = {
  push: (_ctx, self, args) => {
    self.elements.push(...args);
    return num(self.elements.length);
  },
  pop: (_ctx, self) => self.elements.pop() ?? undef(),
  shift: (_ctx, self) => self.elements.shift() ?? undef(),
  unshift: (_ctx, self, args) => {
    self.elements.unshift(...args);
    return num(self.elements.length);
  },
  slice: (_ctx, self, args) => {
    const n = self.elements.length;
    return arr(self.elements.slice(relativeIndex(args[0], n, 0), relativeIndex(args[1], n, n)));
  },
  splice: (_ctx, self, args) => {
    const n = self.elements.length;
    const start = relativeIndex(args[0], n, 0);
    const count =
      args.length < 2 ? n - start : Math.min(Math.max(toIntegerOrInfinity(args[1]), 0), n - start);
    return arr(self.elements.splice(start, count, ...args.slice(2)));
  },
  concat: (_ctx, self, args) => {
    const out = [...self.elements];
    for (const a of args) {
      if (a.kind === "Array") out.push(...a.elements);
      else out.push(a);
    }
    return arr(out);
  },
  join: (_ctx, self, args) => {
    const sep = optionalArg(args, 0);
    return str(joinElements(self.elements, sep ? asString(sep) : ","));
  },
  reverse: (_ctx, self) => {
    self.elements.reverse();
    return self;
  },
  indexOf: (_ctx, self, args) => {
    const target = arg(args, 0);
    const from = relativeIndex(args[1], self.elements.length, 0);
    for (let i = from; i < self.elements.length; i++) {
      if (strictEqual(self.elements[i], target)) return num(i);
    }
    return num(-1);
  },
  lastIndexOf: (_ctx, self, args) => {
    const target = arg(args, 0);
    for (let i = self.elements.length - 1; i >= 0; i--) {
      if (strictEqual(self.elements[i], target)) return num(i);
    }
    return num(-1);
  },
  includes: (_ctx, self, args) => {
    const target = arg(args, 0);
    const from = relativeIndex(args[1], self.elements.length, 0);
    return bool(self.elements.slice(from).some((el) => sameValueZero(el, target)));
  },
  find: (ctx, self, args) => findFrom(ctx, self, args, "find", false).value,
  findIndex: (ctx, self, args) => num(findFrom(ctx, self, args, "findIndex", false).index),
  findLast: (ctx, self, args) => findFrom(ctx, self, args, "findLast", true).value,
  findLastIndex: (ctx, self, args) => num(findFrom(ctx, self, args, "findLastIndex", true).index),
  filter: (ctx, self, args) => {
    const out: Value[] = [];
    each(ctx, self, args, "filter", (result, el) => {
      if (truthy(result)) out.push(el);
    });
    return arr(out);
  },
  map: (ctx, self, args) => {
    const out: Value[] = [];
    each(ctx, self, args, "map", (result) => {
      out.push(result);
    });
    return arr(out);
  },
  forEach: (ctx, self, args) => {
    each(ctx, self, args, "forEach", () => undefined);
    return undef();
  },
  some: (ctx, self, args) => {
    let found = false;
    each(ctx, self, args, "some", (result) => {
      found = truthy(result);
      return !found;
    });
    return bool(found);
  },
  every: (ctx, self, args) => {
    let all = true;
    each(ctx, self, args, "every", (result) => {
      all = truthy(result);
      return all;
    });
    return bool(all);
  },
  reduce: (ctx, self, args) => reduceWith(ctx, self, args, false),
  reduceRight: (ctx, self, args) => reduceWith(ctx, self, args, true),
  sort: (ctx, self, args) => {
    const cmp = optionalArg(args, 0);
    const fn = cmp ? callbackArg(args, 0, "sort") : undefined;
    self.elements.sort((a, b) => {
      if (!fn) return defaultCompare(a, b);
      const n = numericValue(ctx.callValue(fn, [a, b]));
      return Number.isNaN(n) ? 0 : n;
    });
    return self;
  },
  flat: (_ctx, self, args) => {
    const depth = optionalArg(args, 0);
    return arr(flatten(self.elements, depth ? toIntegerOrInfinity(depth) : 1));
  },
  flatMap: (ctx, self, args) => {
    const mapped: Value[] = [];
    each(ctx, self, args, "flatMap", (result) => {
      mapped.push(result);
    });
    return arr(flatten(mapped, 1));
  },
  fill: (_ctx, self, args) => {
    const n = self.elements.length;
    const value = arg(args, 0);
    const end = relativeIndex(args[2], n, n);
    for (let i = relativeIndex(args[1], n, 0); i < end; i++) self.elements[i] = value;
    return self;
  },
  keys: (_ctx, self) => arr(self.elements.map((_, i) => num(i))),
  values: (_ctx, self) => arr([...self.elements]),
  entries: (_ctx, self) => arr(self.elements.map((el, i) => arr([num(i), el]))),
  at: (_ctx, self, args) => {
    const n = self.elements.length;
    const i = toIntegerOrInfinity(args[0]);
    const idx = i < 0 ? n + i : i;
    return self.elements[idx] ?? undef();
  },
  toString: (_ctx: EvalContext, self: ArrayValue) => str(asString(self)),
};
