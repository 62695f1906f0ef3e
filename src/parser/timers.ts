import type { ClearTimerApi, ExprOf, TimerCallback } from "../ast/nodes";
import { ErrorCode, throwParse } from "../errors";
import type { ParserContext, Recognizer } from "./context";
import { readCallShape, stripGlobalPrefix } from "./context";
import { splitArgs } from "./split";

const CLEAR_APIS: readonly ClearTimerApi[] = [
  "clearTimeout",
  "clearInterval",
  "cancelAnimationFrame",
];

/** Literal callbacks are kept inline; anything else is evaluated when the timer fires. */
function parseTimerCallback(src: string, ctx: ParserContext): TimerCallback {
  const handler = ctx.parseCallbackHandler(src);
  return handler ? { kind: "Inline", handler } : { kind: "Reference", expr: ctx.parseExpr(src) };
}

function requiredParts(api: string, argSrc: string): string[] {
  const parts = splitArgs(argSrc);
  if (parts.length === 0) {
    return throwParse(ErrorCode.ARITY, { callee: api, rule: "requires a callback argument" });
  }
  return parts.map((p) => {
    if (p === undefined) return throwParse(ErrorCode.INVALID_SYNTAX, { type: `${api} argument` });
    return p;
  });
}

/**
 * `setTimeout(cb, delay?, ...args)`, `setInterval(...)`,
 * `requestAnimationFrame(cb)`, `queueMicrotask(cb)` and the clear forms,
 * optionally prefixed with `window.`.
 */
export const timerRecognizer: Recognizer = (src, ctx) => {
  const shape = readCallShape(src);
  if (!shape || shape.isNew || shape.argSrc === undefined) return undefined;
  const api = stripGlobalPrefix(shape.path);
  const argSrc = shape.argSrc;
  switch (api) {
    case "setTimeout":
    case "setInterval": {
      const [cb, delay, ...rest] = requiredParts(api, argSrc);
      const callback = parseTimerCallback(cb, ctx);
      const args = rest.map((a) => ctx.parseExpr(a));
      const delayExpr = delay === undefined ? undefined : ctx.parseExpr(delay);
      const expr: ExprOf<"SetTimeout"> | ExprOf<"SetInterval"> =
        api === "setTimeout"
          ? { kind: "SetTimeout", callback, args }
          : { kind: "SetInterval", callback, args };
      if (delayExpr) expr.delay = delayExpr;
      return expr;
    }
    case "requestAnimationFrame": {
      const parts = requiredParts(api, argSrc);
      if (parts.length !== 1) {
        return throwParse(ErrorCode.ARITY, { callee: api, rule: "requires exactly one argument" });
      }
      return { kind: "RequestAnimationFrame", callback: parseTimerCallback(parts[0], ctx) };
    }
    case "queueMicrotask": {
      const parts = requiredParts(api, argSrc);
      if (parts.length !== 1) {
        return throwParse(ErrorCode.ARITY, { callee: api, rule: "requires exactly one argument" });
      }
      return { kind: "QueueMicrotask", callback: ctx.parseExpr(parts[0]) };
    }
    default:
      break;
  }
  const clear = CLEAR_APIS.find((c) => c === api);
  if (!clear) return undefined;
  const args = ctx.parseArgs(argSrc);
  if (args.length > 1) {
    return throwParse(ErrorCode.ARITY, { callee: clear, rule: "supports zero or one argument" });
  }
  return args.length ? { kind: "ClearTimer", api: clear, id: args[0] } : { kind: "ClearTimer", api: clear };
};
