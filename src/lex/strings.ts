import { ErrorCode, throwParse } from "../errors";
import { Scanner } from "./scanner";

const SIMPLE_ESCAPES: Record<string, string> = {
  n: "\n",
  r: "\r",
  t: "\t",
  b: "\b",
  f: "\f",
  v: "\v",
  "0": "\0",
  "\\": "\\",
  "'": "'",
  '"': '"',
  "`": "`",
  $: "$",
};

const HEX_RE = /^[0-9a-fA-F]+$/;

function readHex(src: string, start: number, len: number): number | undefined {
  const digits = src.slice(start, start + len);
  if (digits.length !== len || !HEX_RE.test(digits)) return undefined;
  return parseInt(digits, 16);
}

/**
 * Decodes escape sequences in the raw body of a string or template literal.
 * Unknown escapes keep the escaped character.
 */
export function unescapeString(raw: string): string {
  let out = "";
  let i = 0;
  while (i < raw.length) {
    const ch = raw[i];
    if (ch !== "\\" || i + 1 >= raw.length) {
      out += ch;
      i++;
      continue;
    }
    const next = raw[i + 1];
    const simple = SIMPLE_ESCAPES[next];
    if (simple !== undefined) {
      out += simple;
      i += 2;
      continue;
    }
    if (next === "\n") {
      // line continuation
      i += 2;
      continue;
    }
    if (next === "u" && raw[i + 2] === "{") {
      const close = raw.indexOf("}", i + 3);
      const code = close < 0 ? undefined : readHex(raw, i + 3, close - i - 3);
      if (close >= 0 && code !== undefined && code <= 0x10ffff) {
        out += String.fromCodePoint(code);
        i = close + 1;
        continue;
      }
    } else if (next === "u") {
      const code = readHex(raw, i + 2, 4);
      if (code !== undefined) {
        out += String.fromCharCode(code);
        i += 6;
        continue;
      }
    } else if (next === "x") {
      const code = readHex(raw, i + 2, 2);
      if (code !== undefined) {
        out += String.fromCharCode(code);
        i += 4;
        continue;
      }
    }
    out += next;
    i += 2;
  }
  return out;
}

/**
 * Removes `//` and `/* *\/` comments from script source. Quotes, templates and
 * regex literals pass through untouched; line comments keep their newline and
 * block comments collapse to one space so neighbouring tokens stay apart.
 */
export function stripJsComments(src: string): string {
  const scanner = new Scanner();
  let out = "";
  let i = 0;
  while (i < src.length) {
    if (scanner.inNormal() && src[i] === "/" && src[i + 1] === "/") {
      const end = src.indexOf("\n", i);
      i = end < 0 ? src.length : end;
      continue;
    }
    if (scanner.inNormal() && src[i] === "/" && src[i + 1] === "*") {
      const end = src.indexOf("*/", i + 2);
      if (end < 0) throwParse(ErrorCode.UNTERMINATED_COMMENT, {}, i);
      out += " ";
      i = end + 2;
      continue;
    }
    const next = scanner.advance(src, i);
    out += src.slice(i, next);
    i = next;
  }
  return out;
}
