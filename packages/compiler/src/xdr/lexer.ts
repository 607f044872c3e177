import { fail, type Span } from "../diagnostics.js";
import { isIntegerLiteral } from "./primitives.js";

export type IdlTokenKind = "ident" | "number" | "punct" | "eof";

export type IdlToken = {
  readonly kind: IdlTokenKind;
  readonly text: string;
  readonly span: Span;
};

const PUNCTUATION = new Set(["{", "}", "[", "]", "<", ">", "(", ")", ";", ",", ":", "=", "*"]);

function isIdentStart(ch: string): boolean {
  return /^[A-Za-z_]$/.test(ch);
}

function isIdentPart(ch: string): boolean {
  return /^[A-Za-z0-9_]$/.test(ch);
}

function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9";
}

/**
 * Splits IDL text into tokens. Comments (`/* *\/`, `//`) and rpcgen
 * passthrough lines (starting with `%`) are dropped.
 */
export function tokenizeIdl(text: string, fileName: string): readonly IdlToken[] {
  const tokens: IdlToken[] = [];
  const span = (start: number, end: number): Span => ({ fileName, start, end });
  let pos = 0;
  let lineStart = true;

  while (pos < text.length) {
    const ch = text.charAt(pos);

    if (ch === "\n") {
      pos++;
      lineStart = true;
      continue;
    }
    if (ch === " " || ch === "\t" || ch === "\r") {
      pos++;
      continue;
    }
    if (ch === "%" && lineStart) {
      const end = text.indexOf("\n", pos);
      pos = end < 0 ? text.length : end;
      continue;
    }
    lineStart = false;

    if (text.startsWith("/*", pos)) {
      const end = text.indexOf("*/", pos + 2);
      if (end < 0) fail("XDR1002", "Unterminated block comment.", span(pos, text.length));
      pos = end + 2;
      continue;
    }
    if (text.startsWith("//", pos)) {
      const end = text.indexOf("\n", pos);
      pos = end < 0 ? text.length : end;
      continue;
    }

    if (isIdentStart(ch)) {
      const start = pos;
      while (pos < text.length && isIdentPart(text.charAt(pos))) pos++;
      tokens.push({ kind: "ident", text: text.slice(start, pos), span: span(start, pos) });
      continue;
    }

    if (isDigit(ch) || (ch === "-" && isDigit(text.charAt(pos + 1)))) {
      const start = pos;
      pos++;
      while (pos < text.length && isIdentPart(text.charAt(pos))) pos++;
      const literal = text.slice(start, pos);
      if (!isIntegerLiteral(literal)) {
        fail("XDR1005", `Invalid integer literal '${literal}'.`, span(start, pos));
      }
      tokens.push({ kind: "number", text: literal, span: span(start, pos) });
      continue;
    }

    if (PUNCTUATION.has(ch)) {
      tokens.push({ kind: "punct", text: ch, span: span(pos, pos + 1) });
      pos++;
      continue;
    }

    fail("XDR1001", `Unexpected character ${JSON.stringify(ch)}.`, span(pos, pos + 1));
  }

  tokens.push({ kind: "eof", text: "", span: span(text.length, text.length) });
  return tokens;
}
