import type { BinaryOp, UnaryOp } from "../ast/nodes";
import { ErrorCode, throwRuntime } from "../errors";
import { asString, coerceNumberForGlobal, numericValue, toInt32, toUint32 } from "../runtime/coerce";
import { looseEqual, strictEqual } from "../runtime/equality";
import type { Value } from "../runtime/value";
import { big, bool, float, num, str } from "../runtime/value";

// ============= ADDITION =============

/** One step of the `Add` fold. */
export function addValues(left: Value, right: Value): Value {
  if (left.kind === "Symbol" || right.kind === "Symbol") {
    return throwRuntime(ErrorCode.SYMBOL_TO_PRIMITIVE);
  }
  if (left.kind === "String" || right.kind === "String") {
    return str(asString(left) + asString(right));
  }
  if (left.kind === "BigInt" && right.kind === "BigInt") {
    return big(left.value + right.value);
  }
  if (left.kind === "BigInt" || right.kind === "BigInt") {
    return throwRuntime(ErrorCode.BIGINT_MIX_ADD);
  }
  if (left.kind === "Number" && right.kind === "Number") {
    return num(left.value + right.value);
  }
  return float(coerceNumberForGlobal(left) + coerceNumberForGlobal(right));
}

// ============= ARITHMETIC =============

export type ArithmeticOp = "Sub" | "Mul" | "Div" | "Mod" | "Pow";

function bigintArithmetic(op: ArithmeticOp, a: bigint, b: bigint): bigint {
  switch (op) {
    case "Sub":
      return a - b;
    case "Mul":
      return a * b;
    case "Div":
      if (b === 0n) throwRuntime(ErrorCode.DIVISION_BY_ZERO);
      return a / b;
    case "Mod":
      if (b === 0n) throwRuntime(ErrorCode.DIVISION_BY_ZERO);
      return a % b;
    case "Pow":
      if (b < 0n) throwRuntime(ErrorCode.RANGE, { message: "Exponent must be non-negative" });
      return a ** b;
  }
}

function floatArithmetic(op: ArithmeticOp, a: number, b: number): number {
  switch (op) {
    case "Sub":
      return a - b;
    case "Mul":
      return a * b;
    case "Div":
      return a / b;
    case "Mod":
      return a % b;
    case "Pow":
      return a ** b;
  }
}

/** `-` and `%` read operands the unary way; `*`, `/` and `**` the way `Number()` does. */
function arithmeticOperand(op: ArithmeticOp, value: Value): number {
  return op === "Sub" || op === "Mod" ? numericValue(value) : coerceNumberForGlobal(value);
}

/** `-`, `*`, `/`, `%`, `**`: bigint pairs stay bigint, everything else is a float. */
export function arithmetic(op: ArithmeticOp, left: Value, right: Value): Value {
  if (left.kind === "BigInt" && right.kind === "BigInt") {
    return big(bigintArithmetic(op, left.value, right.value));
  }
  if (left.kind === "BigInt" || right.kind === "BigInt") {
    return throwRuntime(ErrorCode.BIGINT_MIX);
  }
  return float(floatArithmetic(op, arithmeticOperand(op, left), arithmeticOperand(op, right)));
}

// ============= BITWISE =============

export type BitwiseOp =
  | "BitOr"
  | "BitXor"
  | "BitAnd"
  | "ShiftLeft"
  | "ShiftRight"
  | "UnsignedShiftRight";

function bigintBitwise(op: BitwiseOp, a: bigint, b: bigint): bigint {
  switch (op) {
    case "BitOr":
      return a | b;
    case "BitXor":
      return a ^ b;
    case "BitAnd":
      return a & b;
    case "ShiftLeft":
      return a << b;
    case "ShiftRight":
      return a >> b;
    case "UnsignedShiftRight":
      return throwRuntime(ErrorCode.INVALID_ARGUMENT, {
        callee: ">>>",
        message: "is not supported for BigInt operands",
      });
  }
}

export function bitwise(op: BitwiseOp, left: Value, right: Value): Value {
  if (left.kind === "BigInt" && right.kind === "BigInt") {
    return big(bigintBitwise(op, left.value, right.value));
  }
  if (left.kind === "BigInt" || right.kind === "BigInt") {
    return throwRuntime(ErrorCode.BIGINT_MIX);
  }
  const a = toInt32(numericValue(left));
  const b = numericValue(right);
  switch (op) {
    case "BitOr":
      return num(a | toInt32(b));
    case "BitXor":
      return num(a ^ toInt32(b));
    case "BitAnd":
      return num(a & toInt32(b));
    case "ShiftLeft":
      return num(a << (toUint32(b) & 31));
    case "ShiftRight":
      return num(a >> (toUint32(b) & 31));
    case "UnsignedShiftRight":
      return num(toUint32(numericValue(left)) >>> (toUint32(b) & 31));
  }
}

// ============= COMPARISON =============

export type RelationalOp = "Lt" | "Gt" | "Le" | "Ge";

/** Strings compare by code unit, anything else numerically (NaN is never ordered). */
export function compare(op: RelationalOp, left: Value, right: Value): Value {
  if (left.kind === "String" && right.kind === "String") {
    const a = left.value;
    const b = right.value;
    switch (op) {
      case "Lt":
        return bool(a < b);
      case "Gt":
        return bool(a > b);
      case "Le":
        return bool(a <= b);
      case "Ge":
        return bool(a >= b);
    }
  }
  if (left.kind === "BigInt" && right.kind === "BigInt") {
    const a = left.value;
    const b = right.value;
    switch (op) {
      case "Lt":
        return bool(a < b);
      case "Gt":
        return bool(a > b);
      case "Le":
        return bool(a <= b);
      case "Ge":
        return bool(a >= b);
    }
  }
  const a = numericValue(left);
  const b = numericValue(right);
  switch (op) {
    case "Lt":
      return bool(a < b);
    case "Gt":
      return bool(a > b);
    case "Le":
      return bool(a <= b);
    case "Ge":
      return bool(a >= b);
  }
}

/** Binary operators that evaluate both sides eagerly. */
export type EagerBinaryOp = Exclude<BinaryOp, "And" | "Or" | "Nullish" | "In" | "InstanceOf">;

export function applyBinary(op: EagerBinaryOp, left: Value, right: Value): Value {
  switch (op) {
    case "Eq":
      return bool(looseEqual(left, right));
    case "Ne":
      return bool(!looseEqual(left, right));
    case "StrictEq":
      return bool(strictEqual(left, right));
    case "StrictNe":
      return bool(!strictEqual(left, right));
    case "Lt":
    case "Gt":
    case "Le":
    case "Ge":
      return compare(op, left, right);
    case "Sub":
    case "Mul":
    case "Div":
    case "Mod":
    case "Pow":
      return arithmetic(op, left, right);
    default:
      return bitwise(op, left, right);
  }
}

// ============= UNARY =============

export type NumericUnaryOp = Extract<UnaryOp, "Neg" | "Pos" | "BitNot">;

export function applyNumericUnary(op: NumericUnaryOp, operand: Value): Value {
  switch (op) {
    case "Neg":
      if (operand.kind === "BigInt") return big(-operand.value);
      if (operand.kind === "Number") return num(-operand.value);
      return float(-numericValue(operand));
    case "Pos":
      if (operand.kind === "BigInt") return throwRuntime(ErrorCode.BIGINT_TO_NUMBER);
      return float(numericValue(operand));
    case "BitNot":
      if (operand.kind === "BigInt") return big(~operand.value);
      return num(~toInt32(numericValue(operand)));
  }
}

/** `++`/`--` on a value: bigints step as bigints, everything else numerically. */
export function stepValue(value: Value, delta: 1 | -1): { old: Value; next: Value } {
  if (value.kind === "BigInt") {
    return { old: value, next: big(value.value + BigInt(delta)) };
  }
  const n = numericValue(value);
  return { old: num(n), next: num(n + delta) };
}
