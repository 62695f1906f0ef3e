export function isWhitespace(ch: string | undefined): boolean {
  return (
    ch === " " ||
    ch === "\t" ||
    ch === "\n" ||
    ch === "\r" ||
    ch === "\f" ||
    ch === "\v"
  );
}

export function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= "0" && ch <= "9";
}

export function isAsciiAlpha(ch: string | undefined): boolean {
  return (
    ch !== undefined && ((ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z"))
  );
}

export function isIdentStart(ch: string | undefined): boolean {
  return ch === "_" || ch === "$" || isAsciiAlpha(ch);
}

export function isIdentChar(ch: string | undefined): boolean {
  return isIdentStart(ch) || isDigit(ch);
}

const IDENTIFIER_RE = /^[_$A-Za-z][_$A-Za-z0-9]*$/;

export function isIdentifier(src: string): boolean {
  return IDENTIFIER_RE.test(src);
}

// Characters after which a `/` begins a regex literal rather than a division.
const REGEX_PRECEDERS = new Set("([{,;:=!?&|^~<>+-*%/");

export function canStartRegexLiteral(previous: string | undefined): boolean {
  return previous === undefined || REGEX_PRECEDERS.has(previous);
}

const REGEX_KEYWORDS = new Set([
  "return",
  "throw",
  "case",
  "delete",
  "typeof",
  "void",
  "yield",
  "await",
  "in",
  "of",
  "instanceof",
]);

/** Keywords that leave the scanner expecting an operand, unless used as a property name. */
export function identifierAllowsRegexStart(
  ident: string,
  previous: string | undefined
): boolean {
  if (previous === ".") return false;
  return REGEX_KEYWORDS.has(ident);
}

/** True when `word` occurs at `pos` and is not glued to identifier characters. */
export function isKeywordAt(src: string, pos: number, word: string): boolean {
  if (!src.startsWith(word, pos)) return false;
  if (pos > 0 && isIdentChar(src[pos - 1])) return false;
  return !isIdentChar(src[pos + word.length]);
}

export function startsWithKeyword(src: string, word: string): boolean {
  return isKeywordAt(src, 0, word);
}
