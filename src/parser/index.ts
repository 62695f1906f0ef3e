export { parseArgs, parseExpr, parserContext, tryParseExpr } from "./expression";
export {
  parseFunctionConstructor,
  parseScript,
  parseScriptHandler,
  parseStatement,
  parseStatements,
} from "./statements";
export { regexFlagsProblem } from "./regex";
export type { ParserContext, Recognizer } from "./context";
