import { describe, it, expect } from "vitest";

import { formatScriptError, positionAt } from "../src/diagnostics";
import { ErrorCode, ScriptThrow, runtimeError } from "../src/errors";
import { parseScript } from "../src/parser";
import { str } from "../src/runtime/value";

function parseFailure(source: string): unknown {
  try {
    parseScript(source);
  } catch (e) {
    return e;
  }
  throw new Error("expected a parse error");
}

describe("pretty diagnostics", () => {
  it("includes file:line:col and a caret code frame for parse errors", () => {
    const source = "a = 1;\nb = (";
    const out = formatScriptError(parseFailure(source), source, { filePath: "demo.js" });
    expect(out).toBe("demo.js:2:1 parse error: unclosed block\n2 | b = (\n  | ^");
  });

  it("prints surrounding lines on request", () => {
    const source = "a = 1;\nb = (";
    const out = formatScriptError(parseFailure(source), source, {
      filePath: "demo.js",
      contextLines: 1,
    });
    expect(out.split("\n")).toEqual([
      "demo.js:2:1 parse error: unclosed block",
      "1 | a = 1;",
      "2 | b = (",
      "  | ^",
    ]);
  });

  it("formats errors without an offset on one line", () => {
    const error = runtimeError(ErrorCode.UNKNOWN_VARIABLE, { name: "x" });
    expect(formatScriptError(error)).toBe("runtime error: unknown variable: x");
    const thrown = new ScriptThrow(str("oops"), "Uncaught oops");
    expect(formatScriptError(thrown, "throw 'oops'", { filePath: "f.js" })).toBe(
      "f.js uncaught: oops"
    );
    expect(formatScriptError("plain")).toBe("error: plain");
  });
});

describe("positionAt", () => {
  it("maps offsets to 1-based line and column", () => {
    expect(positionAt("ab\ncd", 4)).toEqual({ line: 2, col: 2 });
    expect(positionAt("ab\ncd", 3)).toEqual({ line: 2, col: 1 });
  });

  it("clamps offsets past the end", () => {
    expect(positionAt("ab", 99)).toEqual({ line: 1, col: 3 });
  });
});
