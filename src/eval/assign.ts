import type { AssignOp, AssignTarget, Expr } from "../ast/nodes";
import { ErrorCode, throwRuntime } from "../errors";
import { propertyKey, truthy } from "../runtime/coerce";
import type { Value } from "../runtime/value";
import { isNullish } from "../runtime/value";
import { assignInto, bindPattern } from "./bindings";
import type { EvalContext, Frame } from "./context";
import { getMember, setMember } from "./members";
import type { EagerBinaryOp } from "./operators";
import { addValues, applyBinary, stepValue } from "./operators";

const COMPOUND_OPS: Partial<Record<AssignOp, EagerBinaryOp>> = {
  "-=": "Sub",
  "*=": "Mul",
  "/=": "Div",
  "%=": "Mod",
  "**=": "Pow",
  "<<=": "ShiftLeft",
  ">>=": "ShiftRight",
  ">>>=": "UnsignedShiftRight",
  "&=": "BitAnd",
  "|=": "BitOr",
  "^=": "BitXor",
};

/** A resolved assignment target: read and write without re-evaluating its parts. */
interface Place {
  read(): Value;
  write(value: Value): void;
}

function resolvePlace(ctx: EvalContext, target: AssignTarget, frame: Frame): Place {
  switch (target.kind) {
    case "Var": {
      const name = target.name;
      return {
        read: () => {
          const value = frame.env.get(name);
          if (value === undefined) return throwRuntime(ErrorCode.UNKNOWN_VARIABLE, { name });
          return value;
        },
        write: (value) => frame.env.assign(name, value),
      };
    }
    case "Member": {
      const object = ctx.evalExpr(target.object, frame);
      return {
        read: () => getMember(object, target.member),
        write: (value) => setMember(object, target.member, value),
      };
    }
    case "Index": {
      const object = ctx.evalExpr(target.object, frame);
      const key = propertyKey(ctx.evalExpr(target.index, frame));
      return {
        read: () => getMember(object, key),
        write: (value) => setMember(object, key, value),
      };
    }
    case "Pattern":
      return throwRuntime(ErrorCode.INVALID_ARGUMENT, {
        callee: "assignment",
        message: "pattern targets only support '='",
      });
  }
}

/** `target op= value`; the result is the value written (or kept, for skipped logical assignments). */
export function evalAssign(
  ctx: EvalContext,
  target: AssignTarget,
  op: AssignOp,
  valueExpr: Expr,
  frame: Frame
): Value {
  if (target.kind === "Pattern") {
    if (op !== "=") resolvePlace(ctx, target, frame);
    const value = ctx.evalExpr(valueExpr, frame);
    bindPattern(ctx, target.pattern, value, frame, assignInto(frame.env));
    return value;
  }
  const place = resolvePlace(ctx, target, frame);
  if (op === "&&=" || op === "||=" || op === "??=") {
    const current = place.read();
    const keep = op === "&&=" ? !truthy(current) : op === "||=" ? truthy(current) : !isNullish(current);
    if (keep) return current;
    const value = ctx.evalExpr(valueExpr, frame);
    place.write(value);
    return value;
  }
  let value: Value;
  if (op === "=") {
    value = ctx.evalExpr(valueExpr, frame);
  } else {
    const current = place.read();
    const rhs = ctx.evalExpr(valueExpr, frame);
    const binaryOp = COMPOUND_OPS[op];
    value = binaryOp ? applyBinary(binaryOp, current, rhs) : addValues(current, rhs);
  }
  place.write(value);
  return value;
}

/** `++x`, `x--` and friends. */
export function evalUpdate(
  ctx: EvalContext,
  target: AssignTarget,
  delta: 1 | -1,
  prefix: boolean,
  frame: Frame
): Value {
  const place = resolvePlace(ctx, target, frame);
  const { old, next } = stepValue(place.read(), delta);
  place.write(next);
  return prefix ? next : old;
}
