import type {
  AssignTarget,
  BinaryOp,
  BindingTarget,
  Expr,
  FunctionParam,
  ObjectProp,
  TimerCallback,
  UnaryOp,
} from "./nodes";

const BINARY_SYMBOLS: Record<BinaryOp, string> = {
  Or: "||",
  And: "&&",
  Nullish: "??",
  Eq: "==",
  Ne: "!=",
  StrictEq: "===",
  StrictNe: "!==",
  BitOr: "|",
  BitXor: "^",
  BitAnd: "&",
  ShiftLeft: "<<",
  ShiftRight: ">>",
  UnsignedShiftRight: ">>>",
  Pow: "**",
  Lt: "<",
  Gt: ">",
  Le: "<=",
  Ge: ">=",
  In: "in",
  InstanceOf: "instanceof",
  Sub: "-",
  Mul: "*",
  Div: "/",
  Mod: "%",
};

const UNARY_PREFIX: Record<UnaryOp, string> = {
  Neg: "-",
  Pos: "+",
  Not: "!",
  BitNot: "~",
  TypeOf: "typeof ",
  Void: "void ",
  Delete: "delete ",
  Await: "await ",
  Yield: "yield ",
  YieldStar: "yield* ",
};

export function binaryOpSymbol(op: BinaryOp): string {
  return BINARY_SYMBOLS[op];
}

const list = (exprs: Expr[]): string => exprs.map(astExprToString).join(", ");

const optionalList = (exprs: Array<Expr | undefined>): string =>
  list(exprs.filter((e): e is Expr => e !== undefined));

function formatBinding(target: BindingTarget): string {
  switch (target.kind) {
    case "Name":
      return target.name;
    case "ArrayPattern": {
      const items = target.items.map((item) =>
        item === null ? "" : formatBinding(item.target)
      );
      if (target.rest) items.push(`...${formatBinding(target.rest)}`);
      return `[${items.join(", ")}]`;
    }
    case "ObjectPattern": {
      const props = target.props.map((p) =>
        p.target.kind === "Name" && p.target.name === p.key
          ? p.key
          : `${p.key}: ${formatBinding(p.target)}`
      );
      if (target.rest) props.push(`...${target.rest}`);
      return `{${props.join(", ")}}`;
    }
  }
}

function formatParam(param: FunctionParam): string {
  const head = param.pattern ? formatBinding(param.pattern) : param.name;
  return param.isRest ? `...${head}` : head;
}

export function formatAssignTarget(target: AssignTarget): string {
  switch (target.kind) {
    case "Var":
      return target.name;
    case "Member":
      return `${astExprToString(target.object)}.${target.member}`;
    case "Index":
      return `${astExprToString(target.object)}[${astExprToString(target.index)}]`;
    case "Pattern":
      return formatBinding(target.pattern);
  }
}

function formatProp(prop: ObjectProp): string {
  switch (prop.kind) {
    case "Prop":
      return `${prop.key}: ${astExprToString(prop.value)}`;
    case "Computed":
      return `[${astExprToString(prop.key)}]: ${astExprToString(prop.value)}`;
    case "Spread":
      return `...${astExprToString(prop.expr)}`;
  }
}

function formatCallback(callback: TimerCallback): string {
  return callback.kind === "Inline"
    ? `(${callback.handler.params.map(formatParam).join(", ")}) => {...}`
    : astExprToString(callback.expr);
}

function formatLiteralExpr(expr: Expr): string | undefined {
  switch (expr.kind) {
    case "String":
      return JSON.stringify(expr.value);
    case "Bool":
      return expr.value ? "true" : "false";
    case "Null":
      return "null";
    case "Undefined":
      return "undefined";
    case "Number":
    case "Float":
      return String(expr.value);
    case "BigInt":
      return `${expr.value}n`;
    case "RegexLiteral":
      return `/${expr.pattern}/${expr.flags}`;
    case "Var":
      return expr.name;
    default:
      return undefined;
  }
}

function formatAccessExpr(expr: Expr): string | undefined {
  switch (expr.kind) {
    case "Call":
      return `${astExprToString(expr.callee)}${expr.optional ? "?." : ""}(${list(expr.args)})`;
    case "FunctionCall":
      return `${expr.target}(${list(expr.args)})`;
    case "MemberCall":
      return `${astExprToString(expr.target)}${expr.optional ? "?." : "."}${expr.member}${expr.optionalCall ? "?." : ""}(${list(expr.args)})`;
    case "MemberGet":
      return `${astExprToString(expr.target)}${expr.optional ? "?." : "."}${expr.member}`;
    case "IndexGet":
      return `${astExprToString(expr.target)}${expr.optional ? "?." : ""}[${astExprToString(expr.index)}]`;
    case "New":
      return `new ${astExprToString(expr.callee)}(${list(expr.args)})`;
    default:
      return undefined;
  }
}

function formatOperatorExpr(expr: Expr): string | undefined {
  switch (expr.kind) {
    case "Binary":
      return `(${astExprToString(expr.left)} ${BINARY_SYMBOLS[expr.op]} ${astExprToString(expr.right)})`;
    case "Add":
      return `(${expr.operands.map(astExprToString).join(" + ")})`;
    case "Ternary":
      return `(${astExprToString(expr.cond)} ? ${astExprToString(expr.then)} : ${astExprToString(expr.otherwise)})`;
    case "Comma":
      return `(${list(expr.exprs)})`;
    case "Unary":
      return `${UNARY_PREFIX[expr.op]}${astExprToString(expr.operand)}`;
    case "Assign":
      return `(${formatAssignTarget(expr.target)} ${expr.op} ${astExprToString(expr.value)})`;
    case "Update": {
      const op = expr.delta > 0 ? "++" : "--";
      const target = formatAssignTarget(expr.target);
      return expr.prefix ? `${op}${target}` : `${target}${op}`;
    }
    case "Spread":
      return `...${astExprToString(expr.expr)}`;
    case "ArrayLiteral":
      return `[${list(expr.items)}]`;
    case "ObjectLiteral":
      return `{${expr.props.map(formatProp).join(", ")}}`;
    case "Function": {
      const params = expr.handler.params.map(formatParam).join(", ");
      const prefix = expr.isAsync ? "async " : "";
      return expr.isArrow
        ? `${prefix}(${params}) => {...}`
        : `${prefix}function ${expr.name ?? ""}(${params}) {...}`;
    }
    default:
      return undefined;
  }
}

function formatBuiltinExpr(expr: Expr): string {
  switch (expr.kind) {
    case "RegexNew":
      return `new RegExp(${optionalList([expr.pattern, expr.flags])})`;
    case "RegexTest":
      return `${astExprToString(expr.regex)}.test(${astExprToString(expr.input)})`;
    case "RegexExec":
      return `${astExprToString(expr.regex)}.exec(${astExprToString(expr.input)})`;
    case "RegexToString":
      return `${astExprToString(expr.regex)}.toString()`;
    case "DateNew":
      return `new Date(${list(expr.args)})`;
    case "DateNow":
      return "Date.now()";
    case "DateParse":
      return `Date.parse(${astExprToString(expr.value)})`;
    case "DateUtc":
      return `Date.UTC(${list(expr.args)})`;
    case "PerformanceNow":
      return "performance.now()";
    case "MathConst":
      return `Math.${expr.name}`;
    case "MathMethod":
      return `Math.${expr.method}(${list(expr.args)})`;
    case "NumberConst":
      return `Number.${expr.name}`;
    case "NumberMethod":
      return `Number.${expr.method}(${list(expr.args)})`;
    case "NumberConstruct":
      return `Number(${optionalList([expr.value])})`;
    case "StringConstruct":
      return `String(${optionalList([expr.value])})`;
    case "BooleanConstruct":
      return `Boolean(${optionalList([expr.value])})`;
    case "BigIntConstruct":
      return `BigInt(${astExprToString(expr.value)})`;
    case "JsonParse":
      return `JSON.parse(${astExprToString(expr.text)})`;
    case "JsonStringify":
      return `JSON.stringify(${optionalList([expr.value, expr.replacer, expr.space])})`;
    case "ObjectStatic":
      return `Object.${expr.method}(${list(expr.args)})`;
    case "ArrayIsArray":
      return `Array.isArray(${astExprToString(expr.value)})`;
    case "ArrayFrom":
      return `Array.from(${optionalList([expr.source, expr.mapFn])})`;
    case "ArrayOf":
      return `Array.of(${list(expr.args)})`;
    case "PromiseConstruct":
      return `new Promise(${astExprToString(expr.executor)})`;
    case "PromiseStatic":
      return `Promise.${expr.method}(${list(expr.args)})`;
    case "MapConstruct":
      return `new ${expr.weak ? "WeakMap" : "Map"}(${optionalList([expr.iterable])})`;
    case "SetConstruct":
      return `new ${expr.weak ? "WeakSet" : "Set"}(${optionalList([expr.iterable])})`;
    case "SymbolConstruct":
      return `Symbol(${optionalList([expr.description])})`;
    case "SymbolFor":
      return `Symbol.for(${astExprToString(expr.key)})`;
    case "ArrayBufferConstruct":
      return `new ArrayBuffer(${optionalList([expr.length, expr.options])})`;
    case "TypedArrayConstruct":
      return `new ${expr.type}(${list(expr.args)})`;
    case "TypedArrayBytesPerElement":
      return `${expr.type}.BYTES_PER_ELEMENT`;
    case "UrlConstruct":
      return `new URL(${optionalList([expr.input, expr.base])})`;
    case "BlobConstruct":
      return `new Blob(${optionalList([expr.parts, expr.options])})`;
    case "ErrorConstruct":
      return `new ${expr.name}(${optionalList([expr.message])})`;
    case "FunctionConstructor":
      return `new Function(${list(expr.args)})`;
    case "ConstructorRef":
    case "BuiltinRef":
      return expr.name;
    case "GlobalFunction":
      return `${expr.name}(${list(expr.args)})`;
    case "Dialog":
      return `${expr.dialog}(${list(expr.args)})`;
    case "Console":
      return `console.${expr.level}(${list(expr.args)})`;
    case "SetTimeout":
    case "SetInterval": {
      const name = expr.kind === "SetTimeout" ? "setTimeout" : "setInterval";
      const rest = optionalList([expr.delay, ...expr.args]);
      return `${name}(${formatCallback(expr.callback)}${rest ? `, ${rest}` : ""})`;
    }
    case "RequestAnimationFrame":
      return `requestAnimationFrame(${formatCallback(expr.callback)})`;
    case "QueueMicrotask":
      return `queueMicrotask(${astExprToString(expr.callback)})`;
    case "ClearTimer":
      return `${expr.api}(${optionalList([expr.id])})`;
    default:
      throw new Error(`Cannot convert AST expression to string: ${expr.kind}`);
  }
}

/**
 * Renders an expression back to JS-like source with every composite node
 * parenthesized, so the tree shape can be read off the string.
 */
export function astExprToString(expr: Expr): string {
  return (
    formatLiteralExpr(expr) ??
    formatAccessExpr(expr) ??
    formatOperatorExpr(expr) ??
    formatBuiltinExpr(expr)
  );
}
