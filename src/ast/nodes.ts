// ============= SCRIPT AST =============

export type BinaryOp =
  | "Or"
  | "And"
  | "Nullish"
  | "Eq"
  | "Ne"
  | "StrictEq"
  | "StrictNe"
  | "BitOr"
  | "BitXor"
  | "BitAnd"
  | "ShiftLeft"
  | "ShiftRight"
  | "UnsignedShiftRight"
  | "Pow"
  | "Lt"
  | "Gt"
  | "Le"
  | "Ge"
  | "In"
  | "InstanceOf"
  | "Sub"
  | "Mul"
  | "Div"
  | "Mod";

export type UnaryOp =
  | "Neg"
  | "Pos"
  | "Not"
  | "BitNot"
  | "TypeOf"
  | "Void"
  | "Delete"
  | "Await"
  | "Yield"
  | "YieldStar";

export type AssignOp =
  | "="
  | "+="
  | "-="
  | "*="
  | "/="
  | "%="
  | "**="
  | "<<="
  | ">>="
  | ">>>="
  | "&="
  | "|="
  | "^="
  | "&&="
  | "||="
  | "??=";

// ============= BINDINGS =============

export interface NameBinding {
  kind: "Name";
  name: string;
}

export interface BindingElement {
  target: BindingTarget;
  default?: Expr;
}

export interface ArrayPattern {
  kind: "ArrayPattern";
  /** `null` marks an elision such as `[, b]`. */
  items: Array<BindingElement | null>;
  rest?: BindingTarget;
}

export interface ObjectPatternProp {
  key: string;
  target: BindingTarget;
  default?: Expr;
}

export interface ObjectPattern {
  kind: "ObjectPattern";
  props: ObjectPatternProp[];
  rest?: string;
}

export type BindingTarget = NameBinding | ArrayPattern | ObjectPattern;

export interface FunctionParam {
  name: string;
  /** Set for destructured parameters; `name` then holds the source text. */
  pattern?: ArrayPattern | ObjectPattern;
  default?: Expr;
  isRest: boolean;
}

/** Parsed body of a function, arrow or inline callback. */
export interface ScriptHandler {
  params: FunctionParam[];
  stmts: Stmt[];
}

export type TimerCallback =
  | { kind: "Inline"; handler: ScriptHandler }
  | { kind: "Reference"; expr: Expr };

export type AssignTarget =
  | { kind: "Var"; name: string }
  | { kind: "Member"; object: Expr; member: string }
  | { kind: "Index"; object: Expr; index: Expr }
  | { kind: "Pattern"; pattern: ArrayPattern | ObjectPattern };

// ============= LITERAL EXPRESSIONS =============

export interface StringExpr {
  kind: "String";
  value: string;
}

export interface BoolExpr {
  kind: "Bool";
  value: boolean;
}

export interface NullExpr {
  kind: "Null";
}

export interface UndefinedExpr {
  kind: "Undefined";
}

/** Integral literal inside the safe-integer range. */
export interface NumberExpr {
  kind: "Number";
  value: number;
}

export interface FloatExpr {
  kind: "Float";
  value: number;
}

export interface BigIntExpr {
  kind: "BigInt";
  value: bigint;
}

export interface SpreadExpr {
  kind: "Spread";
  expr: Expr;
}

export interface ArrayLiteralExpr {
  kind: "ArrayLiteral";
  items: Expr[];
}

export type ObjectProp =
  | { kind: "Prop"; key: string; value: Expr }
  | { kind: "Computed"; key: Expr; value: Expr }
  | { kind: "Spread"; expr: Expr };

export interface ObjectLiteralExpr {
  kind: "ObjectLiteral";
  props: ObjectProp[];
}

export interface FunctionExpr {
  kind: "Function";
  handler: ScriptHandler;
  isAsync: boolean;
  isArrow: boolean;
  name?: string;
}

export interface RegexLiteralExpr {
  kind: "RegexLiteral";
  pattern: string;
  flags: string;
}

// ============= OPERATOR EXPRESSIONS =============

export interface VarExpr {
  kind: "Var";
  name: string;
}

export interface BinaryExpr {
  kind: "Binary";
  op: BinaryOp;
  left: Expr;
  right: Expr;
}

/** N-ary `+`; never expressed as a BinaryOp. */
export interface AddExpr {
  kind: "Add";
  operands: Expr[];
}

export interface TernaryExpr {
  kind: "Ternary";
  cond: Expr;
  then: Expr;
  otherwise: Expr;
}

export interface CommaExpr {
  kind: "Comma";
  exprs: Expr[];
}

export interface UnaryExpr {
  kind: "Unary";
  op: UnaryOp;
  operand: Expr;
}

export interface AssignExpr {
  kind: "Assign";
  target: AssignTarget;
  op: AssignOp;
  value: Expr;
}

export interface UpdateExpr {
  kind: "Update";
  target: AssignTarget;
  delta: 1 | -1;
  prefix: boolean;
}

// ============= CALLS AND MEMBERS =============

export interface CallExpr {
  kind: "Call";
  callee: Expr;
  args: Expr[];
  optional: boolean;
}

export interface FunctionCallExpr {
  kind: "FunctionCall";
  target: string;
  args: Expr[];
}

export interface MemberCallExpr {
  kind: "MemberCall";
  target: Expr;
  member: string;
  args: Expr[];
  /** `a?.m()`: a nullish receiver short-circuits to undefined. */
  optional: boolean;
  /** `a.m?.()`: a missing member short-circuits to undefined. */
  optionalCall: boolean;
}

export interface MemberGetExpr {
  kind: "MemberGet";
  target: Expr;
  member: string;
  optional: boolean;
}

export interface IndexGetExpr {
  kind: "IndexGet";
  target: Expr;
  index: Expr;
  optional: boolean;
}

export interface NewExpr {
  kind: "New";
  callee: Expr;
  args: Expr[];
}

// ============= BUILTIN SHAPES =============

export type TypedArrayType =
  | "Int8Array"
  | "Uint8Array"
  | "Uint8ClampedArray"
  | "Int16Array"
  | "Uint16Array"
  | "Int32Array"
  | "Uint32Array"
  | "Float32Array"
  | "Float64Array"
  | "BigInt64Array"
  | "BigUint64Array";

export type ErrorName =
  | "Error"
  | "TypeError"
  | "RangeError"
  | "SyntaxError"
  | "ReferenceError";

export type DialogKind = "alert" | "confirm" | "prompt";
export type ConsoleLevel = "log" | "info" | "warn" | "error" | "debug";
export type ClearTimerApi =
  | "clearTimeout"
  | "clearInterval"
  | "cancelAnimationFrame";

export type BuiltinExpr =
  | { kind: "RegexNew"; pattern: Expr; flags?: Expr }
  | { kind: "RegexTest"; regex: Expr; input: Expr }
  | { kind: "RegexExec"; regex: Expr; input: Expr }
  | { kind: "RegexToString"; regex: Expr }
  | { kind: "DateNew"; args: Expr[] }
  | { kind: "DateNow" }
  | { kind: "DateParse"; value: Expr }
  | { kind: "DateUtc"; args: Expr[] }
  | { kind: "PerformanceNow" }
  | { kind: "MathConst"; name: string }
  | { kind: "MathMethod"; method: string; args: Expr[] }
  | { kind: "NumberConst"; name: string }
  | { kind: "NumberMethod"; method: string; args: Expr[] }
  | { kind: "NumberConstruct"; value?: Expr }
  | { kind: "StringConstruct"; value?: Expr }
  | { kind: "BooleanConstruct"; value?: Expr }
  | { kind: "BigIntConstruct"; value: Expr }
  | { kind: "JsonParse"; text: Expr }
  | { kind: "JsonStringify"; value: Expr; replacer?: Expr; space?: Expr }
  | { kind: "ObjectStatic"; method: string; args: Expr[] }
  | { kind: "ArrayIsArray"; value: Expr }
  | { kind: "ArrayFrom"; source: Expr; mapFn?: Expr }
  | { kind: "ArrayOf"; args: Expr[] }
  | { kind: "PromiseConstruct"; executor: Expr }
  | { kind: "PromiseStatic"; method: string; args: Expr[] }
  | { kind: "MapConstruct"; iterable?: Expr; weak: boolean }
  | { kind: "SetConstruct"; iterable?: Expr; weak: boolean }
  | { kind: "SymbolConstruct"; description?: Expr }
  | { kind: "SymbolFor"; key: Expr }
  | { kind: "ArrayBufferConstruct"; length: Expr; options?: Expr }
  | { kind: "TypedArrayConstruct"; type: TypedArrayType; args: Expr[] }
  | { kind: "TypedArrayBytesPerElement"; type: TypedArrayType }
  | { kind: "UrlConstruct"; input: Expr; base?: Expr }
  | { kind: "BlobConstruct"; parts?: Expr; options?: Expr }
  | { kind: "ErrorConstruct"; name: ErrorName; message?: Expr }
  | { kind: "FunctionConstructor"; args: Expr[] }
  | { kind: "ConstructorRef"; name: string }
  | { kind: "BuiltinRef"; name: string }
  | { kind: "GlobalFunction"; name: string; args: Expr[] }
  | { kind: "Dialog"; dialog: DialogKind; args: Expr[] }
  | { kind: "Console"; level: ConsoleLevel; args: Expr[] };

export type TimerExpr =
  | { kind: "SetTimeout"; callback: TimerCallback; delay?: Expr; args: Expr[] }
  | { kind: "SetInterval"; callback: TimerCallback; delay?: Expr; args: Expr[] }
  | { kind: "RequestAnimationFrame"; callback: TimerCallback }
  | { kind: "QueueMicrotask"; callback: Expr }
  | { kind: "ClearTimer"; api: ClearTimerApi; id?: Expr };

// ============= EXPRESSION GROUPINGS =============

export type LiteralExpr =
  | StringExpr
  | BoolExpr
  | NullExpr
  | UndefinedExpr
  | NumberExpr
  | FloatExpr
  | BigIntExpr
  | RegexLiteralExpr;

export type CompositeExpr =
  | SpreadExpr
  | ArrayLiteralExpr
  | ObjectLiteralExpr
  | FunctionExpr;

export type OperatorExpr =
  | VarExpr
  | BinaryExpr
  | AddExpr
  | TernaryExpr
  | CommaExpr
  | UnaryExpr
  | AssignExpr
  | UpdateExpr;

export type AccessExpr =
  | CallExpr
  | FunctionCallExpr
  | MemberCallExpr
  | MemberGetExpr
  | IndexGetExpr
  | NewExpr;

export type Expr =
  | LiteralExpr
  | CompositeExpr
  | OperatorExpr
  | AccessExpr
  | BuiltinExpr
  | TimerExpr;

export type ExprOf<K extends Expr["kind"]> = Extract<Expr, { kind: K }>;

// ============= STATEMENTS =============

export type DeclKind = "let" | "const" | "var";

export interface VarDeclStmt {
  kind: "VarDecl";
  declKind: DeclKind;
  target: BindingTarget;
  init?: Expr;
}

export interface FunctionDeclStmt {
  kind: "FunctionDecl";
  name: string;
  handler: ScriptHandler;
  isAsync: boolean;
}

export interface AssignStmt {
  kind: "Assign";
  target: AssignTarget;
  op: AssignOp;
  value: Expr;
}

export interface UpdateStmt {
  kind: "Update";
  target: AssignTarget;
  delta: 1 | -1;
  prefix: boolean;
}

export interface IfStmt {
  kind: "If";
  cond: Expr;
  then: Stmt[];
  otherwise?: Stmt[];
}

export interface WhileStmt {
  kind: "While";
  cond: Expr;
  body: Stmt[];
}

export interface DoWhileStmt {
  kind: "DoWhile";
  body: Stmt[];
  cond: Expr;
}

export interface ForStmt {
  kind: "For";
  /** Runs once in the loop scope; `let i = 0, j = 1` gives two declarations. */
  init: Stmt[];
  test?: Expr;
  update?: Expr;
  body: Stmt[];
}

export interface ForEachStmt {
  kind: "ForOf" | "ForIn";
  declKind?: DeclKind;
  target: BindingTarget;
  iterable: Expr;
  body: Stmt[];
}

export interface BlockStmt {
  kind: "Block";
  body: Stmt[];
}

export interface ReturnStmt {
  kind: "Return";
  value?: Expr;
}

export interface BreakStmt {
  kind: "Break";
}

export interface ContinueStmt {
  kind: "Continue";
}

export interface ThrowStmt {
  kind: "Throw";
  value: Expr;
}

export interface TryStmt {
  kind: "Try";
  body: Stmt[];
  catchParam?: BindingTarget;
  catchBody?: Stmt[];
  finallyBody?: Stmt[];
}

export interface SwitchCase {
  /** Absent for `default:`. */
  test?: Expr;
  body: Stmt[];
}

export interface SwitchStmt {
  kind: "Switch";
  discriminant: Expr;
  cases: SwitchCase[];
}

export interface ExprStmt {
  kind: "Expr";
  expr: Expr;
}

export type Stmt =
  | VarDeclStmt
  | FunctionDeclStmt
  | AssignStmt
  | UpdateStmt
  | IfStmt
  | WhileStmt
  | DoWhileStmt
  | ForStmt
  | ForEachStmt
  | BlockStmt
  | ReturnStmt
  | BreakStmt
  | ContinueStmt
  | ThrowStmt
  | TryStmt
  | SwitchStmt
  | ExprStmt;

export type StmtOf<K extends Stmt["kind"]> = Extract<Stmt, { kind: K }>;

// ============= CONSTRUCTORS =============

export const str = (value: string): StringExpr => ({ kind: "String", value });
export const undef = (): UndefinedExpr => ({ kind: "Undefined" });
export const varRef = (name: string): VarExpr => ({ kind: "Var", name });

export function numberLiteral(value: number): NumberExpr | FloatExpr {
  return Number.isSafeInteger(value) && !Object.is(value, -0)
    ? { kind: "Number", value }
    : { kind: "Float", value };
}

export function binary(op: BinaryOp, left: Expr, right: Expr): BinaryExpr {
  return { kind: "Binary", op, left, right };
}

export function unary(op: UnaryOp, operand: Expr): UnaryExpr {
  return { kind: "Unary", op, operand };
}
