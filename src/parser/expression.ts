import type { AssignOp, BinaryOp, Expr, UnaryOp } from "../ast/nodes";
import { binary, unary } from "../ast/nodes";
import { ErrorCode, ScriptParseError, throwParse } from "../errors";
import { isKeywordAt } from "../lex/chars";
import { capture } from "../result";
import type { Result } from "../result";
import type { ParserContext, Recognizer } from "./context";
import { parseCallbackHandler, parseFunctionSource } from "./functions";
import { parseAssignTarget } from "./patterns";
import { parsePostfix } from "./postfix";
import {
  regexConstructorRecognizer,
  regexLiteralRecognizer,
  regexMethodRecognizer,
} from "./regex";
import {
  findTernaryParts,
  findTopLevelOps,
  splitArgs,
  splitTopLevelAddSub,
  splitTopLevelByChar,
  splitTopLevelByOps,
  stripOuterParens,
} from "./split";
import { parseScript } from "./statements";

export const ASSIGN_OPS: readonly AssignOp[] = [
  "=",
  "+=",
  "-=",
  "*=",
  "/=",
  "%=",
  "**=",
  "<<=",
  ">>=",
  ">>>=",
  "&=",
  "|=",
  "^=",
  "&&=",
  "||=",
  "??=",
];

interface BinaryLevel {
  name: string;
  ops: Record<string, BinaryOp>;
}

// Lowest precedence first; `+`/`-` and `**` have their own rules below.
const BINARY_LEVELS: readonly BinaryLevel[] = [
  { name: "logical or", ops: { "||": "Or" } },
  { name: "nullish", ops: { "??": "Nullish" } },
  { name: "logical and", ops: { "&&": "And" } },
  { name: "bitwise or", ops: { "|": "BitOr" } },
  { name: "bitwise xor", ops: { "^": "BitXor" } },
  { name: "bitwise and", ops: { "&": "BitAnd" } },
  {
    name: "equality",
    ops: { "!==": "StrictNe", "===": "StrictEq", "!=": "Ne", "==": "Eq" },
  },
  {
    name: "relational",
    ops: {
      "<=": "Le",
      ">=": "Ge",
      "<": "Lt",
      ">": "Gt",
      instanceof: "InstanceOf",
      in: "In",
    },
  },
  {
    name: "shift",
    ops: { ">>>": "UnsignedShiftRight", "<<": "ShiftLeft", ">>": "ShiftRight" },
  },
];

const MULTIPLICATIVE: BinaryLevel = {
  name: "multiplicative",
  ops: { "*": "Mul", "/": "Div", "%": "Mod" },
};

const ENTRY_RECOGNIZERS: readonly Recognizer[] = [
  regexMethodRecognizer,
  regexLiteralRecognizer,
  regexConstructorRecognizer,
  (src, ctx) => parseFunctionSource(src, ctx),
];

const context: ParserContext = {
  parseExpr,
  parseArgs,
  parseStatements: (src) => parseScript(src),
  parseCallbackHandler: (src) => parseCallbackHandler(src, context),
};

export function parserContext(): ParserContext {
  return context;
}

function invalid(level: string): never {
  return throwParse(ErrorCode.INVALID_OPERATOR_EXPRESSION, { level });
}

/**
 * Parses one expression. Throws ScriptParseError for malformed input; use
 * `tryParseExpr` for a Result.
 */
export function parseExpr(src: string): Expr {
  const text = stripOuterParens(src);
  if (text === "") return throwParse(ErrorCode.EMPTY_EXPRESSION);
  for (const recognize of ENTRY_RECOGNIZERS) {
    const expr = recognize(text, context);
    if (expr) return expr;
  }
  return parseComma(text);
}

export function tryParseExpr(src: string): Result<Expr, ScriptParseError> {
  return capture(() => parseExpr(src), ScriptParseError);
}

/** Parses call arguments or array elements; `...x` becomes a Spread. */
export function parseArgs(src: string): Expr[] {
  return splitArgs(src).map((part) => {
    if (part === undefined) return throwParse(ErrorCode.INVALID_SYNTAX, { type: "argument list", src });
    if (part.startsWith("...")) return { kind: "Spread", expr: parseExpr(part.slice(3)) };
    return parseExpr(part);
  });
}

function parseComma(src: string): Expr {
  const parts = splitTopLevelByChar(src, ",");
  if (parts.length === 1) return parseAssignment(src);
  if (parts.some((p) => p.trim() === "")) return invalid("comma");
  return { kind: "Comma", exprs: parts.map((p) => parseExpr(p)) };
}

function isAssignOp(op: string): op is AssignOp {
  return ASSIGN_OPS.some((a) => a === op);
}

function parseAssignment(src: string): Expr {
  const match = findTopLevelOps(src, ASSIGN_OPS, { arrowOpaque: true })[0];
  if (!match || !isAssignOp(match.op)) return parseTernary(src);
  const left = src.slice(0, match.index).trim();
  const right = src.slice(match.index + match.op.length).trim();
  if (left === "" || right === "") return invalid("assignment");
  return {
    kind: "Assign",
    target: parseAssignTarget(left, context),
    op: match.op,
    value: parseExpr(right),
  };
}

function parseTernary(src: string): Expr {
  const parts = findTernaryParts(src);
  if (parts === undefined) return parseBinaryLevel(src, 0);
  if (parts === "unbalanced" || !parts.cond || !parts.then || !parts.otherwise) {
    return invalid("ternary");
  }
  return {
    kind: "Ternary",
    cond: parseExpr(parts.cond),
    then: parseExpr(parts.then),
    otherwise: parseExpr(parts.otherwise),
  };
}

function foldLeft(
  operands: string[],
  ops: string[],
  level: BinaryLevel,
  parseOperand: (src: string) => Expr
): Expr {
  if (operands.some((o) => o === "")) return invalid(level.name);
  let acc = parseOperand(operands[0]);
  for (let k = 0; k < ops.length; k++) {
    acc = binary(level.ops[ops[k]], acc, parseOperand(operands[k + 1]));
  }
  return acc;
}

function parseBinaryLevel(src: string, index: number): Expr {
  if (index >= BINARY_LEVELS.length) return parseAdditive(src);
  const level = BINARY_LEVELS[index];
  const split = splitTopLevelByOps(src, Object.keys(level.ops), {
    binaryOnly: true,
    arrowOpaque: true,
  });
  if (!split) return parseBinaryLevel(src, index + 1);
  return foldLeft(split.operands, split.ops, level, (operand) =>
    parseBinaryLevel(operand, index + 1)
  );
}

/**
 * `+` runs collapse into one n-ary Add; `-` folds pairwise in the same
 * left-to-right pass, so `a + b - c + d` is `Add[Sub(Add[a, b], c), d]`.
 */
function parseAdditive(src: string): Expr {
  const split = splitTopLevelAddSub(src);
  if (!split) return parseMultiplicative(src);
  if (split.operands.some((o) => o === "")) return invalid("additive");
  const operand = (s: string): Expr => parseMultiplicative(s);
  let acc = operand(split.operands[0]);
  for (let k = 0; k < split.ops.length; k++) {
    const rhs = operand(split.operands[k + 1]);
    if (split.ops[k] === "-") {
      acc = binary("Sub", acc, rhs);
    } else if (acc.kind === "Add" && split.ops[k - 1] === "+") {
      acc = { kind: "Add", operands: [...acc.operands, rhs] };
    } else {
      acc = { kind: "Add", operands: [acc, rhs] };
    }
  }
  return acc;
}

function parseMultiplicative(src: string): Expr {
  const split = splitTopLevelByOps(src, Object.keys(MULTIPLICATIVE.ops), {
    binaryOnly: true,
    arrowOpaque: true,
  });
  if (!split) return parseExponent(src);
  return foldLeft(split.operands, split.ops, MULTIPLICATIVE, (operand) =>
    parseExponent(operand)
  );
}

/** First top-level `**`; the right side recurses, so `**` is right associative. */
function parseExponent(src: string): Expr {
  const match = findTopLevelOps(src, ["**"], { binaryOnly: true, arrowOpaque: true })[0];
  if (!match) return parseUnary(src);
  const left = src.slice(0, match.index).trim();
  const right = src.slice(match.index + 2).trim();
  if (left === "" || right === "") return invalid("exponent");
  return binary("Pow", parseUnary(left), parseExponent(right));
}

const KEYWORD_UNARY: ReadonlyArray<[string, UnaryOp]> = [
  ["typeof", "TypeOf"],
  ["void", "Void"],
  ["delete", "Delete"],
];

const SIGN_UNARY: Record<string, UnaryOp> = {
  "+": "Pos",
  "-": "Neg",
  "!": "Not",
  "~": "BitNot",
};

function operandAfter(src: string, keyword: string): string {
  const operand = src.slice(keyword.length).trim();
  if (operand === "") return throwParse(ErrorCode.MISSING_OPERAND, { operator: keyword });
  return operand;
}

function parseUnary(src: string): Expr {
  const text = src.trim();
  if (text === "") return throwParse(ErrorCode.EMPTY_EXPRESSION);
  if (isKeywordAt(text, 0, "await")) {
    return unary("Await", parseExpr(operandAfter(text, "await")));
  }
  if (/^yield\s*\*/.test(text)) {
    const star = text.indexOf("*");
    const operand = text.slice(star + 1).trim();
    if (operand === "") return throwParse(ErrorCode.MISSING_OPERAND, { operator: "yield*" });
    return unary("YieldStar", parseExpr(operand));
  }
  if (isKeywordAt(text, 0, "yield")) {
    return unary("Yield", parseExpr(operandAfter(text, "yield")));
  }
  for (const [keyword, op] of KEYWORD_UNARY) {
    if (isKeywordAt(text, 0, keyword)) {
      return unary(op, parseUnary(operandAfter(text, keyword)));
    }
  }
  if (text.startsWith("++") || text.startsWith("--")) {
    return {
      kind: "Update",
      target: parseAssignTarget(operandAfter(text, text.slice(0, 2)), context),
      delta: text[0] === "+" ? 1 : -1,
      prefix: true,
    };
  }
  const sign = SIGN_UNARY[text[0]];
  if (sign) {
    return unary(sign, parseUnary(operandAfter(text, text[0])));
  }
  if ((text.endsWith("++") || text.endsWith("--")) && text.length > 2) {
    return {
      kind: "Update",
      target: parseAssignTarget(text.slice(0, -2), context),
      delta: text.endsWith("++") ? 1 : -1,
      prefix: false,
    };
  }
  const inner = stripOuterParens(text);
  return inner === text ? parsePostfix(text, context) : parseExpr(inner);
}
