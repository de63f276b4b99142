import { parse, printParseErrorCode } from "jsonc-parser";
import type { ParseError } from "jsonc-parser";

const EXCERPT_LENGTH = 60;

const PARSE_ERROR_TEXT: Record<string, string> = {
  InvalidSymbol: "invalid symbol",
  InvalidNumberFormat: "invalid number format",
  PropertyNameExpected: "property name expected",
  ValueExpected: "value expected",
  ColonExpected: "colon expected",
  CommaExpected: "comma expected",
  CloseBraceExpected: "closing brace expected",
  CloseBracketExpected: "closing bracket expected",
  EndOfFileExpected: "end of input expected",
  InvalidCommentToken: "comments are not allowed",
  UnexpectedEndOfComment: "unterminated comment",
  UnexpectedEndOfString: "unterminated string",
  UnexpectedEndOfNumber: "unterminated number",
  InvalidUnicode: "invalid unicode escape",
  InvalidEscapeCharacter: "invalid escape character",
  InvalidCharacter: "invalid character in string",
};

export type ParseOutcome =
  | { ok: true; data: unknown }
  | { ok: false; errors: string[] };

interface SourceLocation {
  line: number;
  column: number;
  text: string;
}

function excerpt(text: string): string {
  return text.length > EXCERPT_LENGTH
    ? `${text.slice(0, EXCERPT_LENGTH)}...`
    : text;
}

function locate(source: string, offset: number): SourceLocation {
  const lineStart = source.lastIndexOf("\n", offset - 1) + 1;
  const lineEnd = source.indexOf("\n", offset);
  return {
    line: source.slice(0, offset).split("\n").length,
    column: offset - lineStart + 1,
    text: source.slice(lineStart, lineEnd === -1 ? undefined : lineEnd).trimEnd(),
  };
}

/**
 * Offset of the comma when the error sits on a closing bracket right after one
 */
function trailingCommaOffset(source: string, error: ParseError): number | undefined {
  const code = printParseErrorCode(error.error);
  if (code !== "ValueExpected" && code !== "PropertyNameExpected") return undefined;

  const closing = source[error.offset];
  if (closing !== "}" && closing !== "]") return undefined;

  const before = source.slice(0, error.offset).trimEnd();
  return before.endsWith(",") ? before.length - 1 : undefined;
}

/**
 * Comment and trailing comma faults as one line each; undefined for any
 * other parse error
 */
function describeEditingMistake(source: string, error: ParseError): string | undefined {
  if (printParseErrorCode(error.error) === "InvalidCommentToken") {
    const { line, text } = locate(source, error.offset);
    const kind = source.startsWith("/*", error.offset)
      ? "block comments (/* */)"
      : "line comments (//)";
    return `JSON cannot contain ${kind}, found on line ${line}: ${excerpt(text.trim())}`;
  }

  const commaOffset = trailingCommaOffset(source, error);
  if (commaOffset !== undefined) {
    const { line, text } = locate(source, commaOffset);
    return `trailing comma before closing bracket on line ${line}: ${text.trim()}`;
  }
  return undefined;
}

/**
 * Line, column and the offending line with a caret under the fault.
 * Failures at the end of the input point at the last non-blank character.
 */
function describeParseError(source: string, error: ParseError): string[] {
  const lastContent = Math.max(source.trimEnd().length - 1, 0);
  const offset = Math.min(error.offset, lastContent);
  const { line, column, text } = locate(source, offset);

  const code = printParseErrorCode(error.error);
  let detail = PARSE_ERROR_TEXT[code] ?? code;
  if (code === "InvalidSymbol") {
    detail += `: ${source.slice(error.offset, error.offset + error.length)}`;
  }

  const prefix = `line ${line}: `;
  return [
    `JSON parse error at line ${line}, column ${column}: ${detail}`,
    `${prefix}${text}`,
    `${" ".repeat(prefix.length + column - 1)}^`,
  ];
}

/**
 * Parse strict JSON. On failure every comment and trailing comma is
 * reported, followed by the first other fault with its source line.
 */
export function parseJsonSource(source: string): ParseOutcome {
  const parseErrors: ParseError[] = [];
  const data: unknown = parse(source, parseErrors, {
    disallowComments: true,
    allowTrailingComma: false,
    allowEmptyContent: false,
  });

  if (parseErrors.length === 0) {
    return { ok: true, data };
  }

  const errors: string[] = [];
  const seenOffsets = new Set<number>();
  let firstFault: ParseError | undefined;

  for (const error of parseErrors) {
    // one fault can raise several codes at the same token
    if (seenOffsets.has(error.offset)) continue;
    seenOffsets.add(error.offset);

    const mistake = describeEditingMistake(source, error);
    if (mistake !== undefined) {
      errors.push(mistake);
    } else {
      firstFault ??= error;
    }
  }

  if (firstFault) {
    errors.push(...describeParseError(source, firstFault));
  }
  return { ok: false, errors };
}
