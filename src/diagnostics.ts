import { ScriptError, ScriptThrow } from "./errors";
import { asString } from "./runtime/coerce";

export type FormatErrorOptions = {
  filePath?: string;
  contextLines?: number;
};

export type SourcePosition = {
  line: number;
  col: number;
};

function computeLineStarts(src: string): number[] {
  const starts = [0];
  for (let i = 0; i < src.length; i++) {
    if (src.charCodeAt(i) === 10 /* \n */) starts.push(i + 1);
  }
  return starts;
}

function getLineText(src: string, lineStarts: number[], line: number): string {
  const idx = Math.max(1, line) - 1;
  const start = lineStarts[idx] ?? 0;
  const end = lineStarts[idx + 1] ?? src.length;
  const raw = src.slice(start, end);
  return raw.endsWith("\n") ? raw.slice(0, -1) : raw;
}

function padLeft(s: string, width: number): string {
  if (s.length >= width) return s;
  return " ".repeat(width - s.length) + s;
}

function caretLine(col: number, lineNoWidth: number): string {
  const safeCol = Math.max(1, col);
  return `${" ".repeat(lineNoWidth)} | ${" ".repeat(safeCol - 1)}^`;
}

/** 1-based line and column of a source offset. */
export function positionAt(src: string, offset: number): SourcePosition {
  const lineStarts = computeLineStarts(src);
  const clamped = Math.min(Math.max(0, offset), src.length);
  let line = 0;
  while (line + 1 < lineStarts.length && lineStarts[line + 1] <= clamped) line++;
  return { line: line + 1, col: clamped - lineStarts[line] + 1 };
}

function describe(error: unknown): { label: string; message: string; offset?: number } {
  if (error instanceof ScriptError) {
    const label = error.kind === "parse" ? "parse error" : "runtime error";
    return { label, message: error.message, offset: error.offset };
  }
  if (error instanceof ScriptThrow) {
    return { label: "uncaught", message: asString(error.value) };
  }
  if (error instanceof Error) return { label: "error", message: error.message };
  return { label: "error", message: String(error) };
}

/**
 * Formats a harness error for humans. Parse errors with a known offset get a
 * code frame with a caret under the offending column.
 */
export function formatScriptError(
  error: unknown,
  source?: string,
  opts: FormatErrorOptions = {}
): string {
  const { label, message, offset } = describe(error);
  if (offset === undefined || source === undefined) {
    return opts.filePath ? `${opts.filePath} ${label}: ${message}` : `${label}: ${message}`;
  }
  const { line, col } = positionAt(source, offset);
  const where = opts.filePath ? `${opts.filePath}:${line}:${col}` : `${line}:${col}`;
  const lineStarts = computeLineStarts(source);
  const contextLines = opts.contextLines ?? 0;
  const startLine = Math.max(1, line - contextLines);
  const endLine = Math.min(lineStarts.length, line + contextLines);
  const lineNoWidth = String(endLine).length;

  const lines: string[] = [`${where} ${label}: ${message}`];
  for (let ln = startLine; ln <= endLine; ln++) {
    lines.push(`${padLeft(String(ln), lineNoWidth)} | ${getLineText(source, lineStarts, ln)}`);
    if (ln === line) lines.push(caretLine(col, lineNoWidth));
  }
  return lines.join("\n");
}
