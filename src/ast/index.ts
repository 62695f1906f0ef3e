export type {
  AssignOp,
  AssignTarget,
  BinaryOp,
  BindingElement,
  BindingTarget,
  ArrayPattern,
  ObjectPattern,
  ObjectPatternProp,
  ClearTimerApi,
  ConsoleLevel,
  DeclKind,
  DialogKind,
  ErrorName,
  Expr,
  ExprOf,
  FunctionParam,
  ObjectProp,
  ScriptHandler,
  Stmt,
  StmtOf,
  SwitchCase,
  TimerCallback,
  TypedArrayType,
  UnaryOp,
} from "./nodes";

export {
  binary,
  numberLiteral,
  str,
  unary,
  undef,
  varRef,
} from "./nodes";

export {
  astExprToString,
  binaryOpSymbol,
  formatAssignTarget,
} from "./stringify";
