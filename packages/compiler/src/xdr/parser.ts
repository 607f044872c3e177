import { fail, type Span } from "../diagnostics.js";
import type { IdlToken } from "./lexer.js";
import { tokenizeIdl } from "./lexer.js";
import type {
  IdlDeclaration,
  IdlDefinition,
  IdlEnumVariant,
  IdlIdent,
  IdlSpecification,
  IdlTypeSpecifier,
  IdlUnionArm,
  IdlValue,
} from "./parse-tree.js";

const RESERVED = new Set([
  "bool",
  "case",
  "const",
  "default",
  "double",
  "enum",
  "float",
  "hyper",
  "int",
  "opaque",
  "quadruple",
  "string",
  "struct",
  "switch",
  "typedef",
  "union",
  "unsigned",
  "void",
]);

class TokenCursor {
  readonly #tokens: readonly IdlToken[];
  #pos = 0;

  constructor(tokens: readonly IdlToken[]) {
    this.#tokens = tokens;
  }

  current(): IdlToken {
    const tok = this.#tokens[this.#pos] ?? this.#tokens[this.#tokens.length - 1];
    if (!tok) fail("XDR1003", "Unexpected end of input.", undefined);
    return tok;
  }

  advance(): IdlToken {
    const tok = this.current();
    if (tok.kind !== "eof") this.#pos++;
    return tok;
  }

  isAtEnd(): boolean {
    return this.current().kind === "eof";
  }

  check(text: string): boolean {
    const tok = this.current();
    return (tok.kind === "punct" || tok.kind === "ident") && tok.text === text;
  }

  match(text: string): boolean {
    if (!this.check(text)) return false;
    this.advance();
    return true;
  }

  expect(text: string): IdlToken {
    if (!this.check(text)) unexpected(this.current(), `'${text}'`);
    return this.advance();
  }
}

function describeToken(tok: IdlToken): string {
  return tok.kind === "eof" ? "end of input" : `'${tok.text}'`;
}

function unexpected(tok: IdlToken, expected: string): never {
  fail("XDR1003", `Expected ${expected} but found ${describeToken(tok)}.`, tok.span);
}

function join(start: Span, end: Span): Span {
  return { fileName: start.fileName, start: start.start, end: end.end };
}

function parseIdent(cur: TokenCursor): IdlIdent {
  const tok = cur.current();
  if (tok.kind !== "ident" || RESERVED.has(tok.text)) unexpected(tok, "an identifier");
  cur.advance();
  return { name: tok.text, span: tok.span };
}

function parseValue(cur: TokenCursor): IdlValue {
  const tok = cur.current();
  if (tok.kind === "number") {
    cur.advance();
    return { kind: "number", text: tok.text, span: tok.span };
  }
  if (tok.kind === "ident" && !RESERVED.has(tok.text)) {
    cur.advance();
    return { kind: "ident", name: tok.text, span: tok.span };
  }
  unexpected(tok, "a constant or identifier");
}

function parseTypeSpecifier(cur: TokenCursor): IdlTypeSpecifier {
  const tok = cur.current();
  if (tok.kind !== "ident") unexpected(tok, "a type");

  switch (tok.text) {
    case "unsigned": {
      cur.advance();
      const next = cur.current();
      if (next.kind === "ident" && (next.text === "int" || next.text === "hyper")) {
        cur.advance();
        return { spelling: `unsigned ${next.text}`, span: join(tok.span, next.span) };
      }
      return { spelling: "unsigned", span: tok.span };
    }
    case "int":
    case "hyper":
    case "float":
    case "double":
    case "bool":
    case "string":
    case "opaque":
      cur.advance();
      return { spelling: tok.text, span: tok.span };
    case "quadruple":
      fail("XDR1004", "'quadruple' has no Rust representation and is not supported.", tok.span);
    case "enum":
    case "struct":
    case "union": {
      cur.advance();
      if (cur.check("{") || cur.check("switch")) {
        fail(
          "XDR1004",
          `Inline ${tok.text} definitions are not supported; declare the ${tok.text} at top level.`,
          cur.current().span
        );
      }
      const name = parseIdent(cur);
      return { spelling: name.name, span: join(tok.span, name.span) };
    }
    default: {
      const name = parseIdent(cur);
      return { spelling: name.name, span: name.span };
    }
  }
}

function parseDeclaration(cur: TokenCursor): IdlDeclaration {
  const start = cur.current();
  if (cur.match("void")) return { kind: "void", span: start.span };

  const type = parseTypeSpecifier(cur);
  if (cur.match("*")) {
    const name = parseIdent(cur);
    if (cur.check("[") || cur.check("<")) {
      fail("XDR3003", `Optional declaration '${name.name}' cannot also be an array.`, cur.current().span);
    }
    return { kind: "optional", type, name, span: join(start.span, name.span) };
  }

  const name = parseIdent(cur);
  if (cur.match("[")) {
    const size = parseValue(cur);
    const close = cur.expect("]");
    return { kind: "fixed_array", type, name, size, span: join(start.span, close.span) };
  }
  if (cur.match("<")) {
    if (cur.check(">")) {
      const close = cur.advance();
      return { kind: "variable_array", type, name, span: join(start.span, close.span) };
    }
    const max = parseValue(cur);
    const close = cur.expect(">");
    return { kind: "variable_array", type, name, max, span: join(start.span, close.span) };
  }
  return { kind: "scalar", type, name, span: join(start.span, name.span) };
}

function parseConst(cur: TokenCursor, start: IdlToken): IdlDefinition {
  const name = parseIdent(cur);
  cur.expect("=");
  const value = parseValue(cur);
  const end = cur.expect(";");
  return { kind: "const", name, value, span: join(start.span, end.span) };
}

function parseTypedef(cur: TokenCursor, start: IdlToken): IdlDefinition {
  const declaration = parseDeclaration(cur);
  const end = cur.expect(";");
  return { kind: "typedef", declaration, span: join(start.span, end.span) };
}

function parseEnum(cur: TokenCursor, start: IdlToken): IdlDefinition {
  const name = parseIdent(cur);
  cur.expect("{");
  const variants: IdlEnumVariant[] = [];
  do {
    const variantName = parseIdent(cur);
    cur.expect("=");
    variants.push({ name: variantName, value: parseValue(cur) });
  } while (cur.match(",") && !cur.check("}"));
  const end = cur.expect("}");
  cur.match(";");
  return { kind: "enum", name, variants, span: join(start.span, end.span) };
}

function parseStruct(cur: TokenCursor, start: IdlToken): IdlDefinition {
  const name = parseIdent(cur);
  cur.expect("{");
  const fields: IdlDeclaration[] = [];
  while (!cur.check("}")) {
    fields.push(parseDeclaration(cur));
    cur.expect(";");
  }
  const end = cur.expect("}");
  cur.match(";");
  return { kind: "struct", name, fields, span: join(start.span, end.span) };
}

function parseUnion(cur: TokenCursor, start: IdlToken): IdlDefinition {
  const name = parseIdent(cur);
  cur.expect("switch");
  cur.expect("(");
  const discriminant = parseDeclaration(cur);
  cur.expect(")");
  cur.expect("{");

  const arms: IdlUnionArm[] = [];
  while (!cur.check("}")) {
    const armStart = cur.current();
    if (cur.match("default")) {
      cur.expect(":");
      const declaration = parseDeclaration(cur);
      const end = cur.expect(";");
      arms.push({ kind: "default", declaration, span: join(armStart.span, end.span) });
      continue;
    }
    if (!cur.check("case")) unexpected(cur.current(), "'case', 'default' or '}'");
    const values: IdlValue[] = [];
    while (cur.match("case")) {
      values.push(parseValue(cur));
      cur.expect(":");
    }
    const declaration = parseDeclaration(cur);
    const end = cur.expect(";");
    arms.push({ kind: "case", values, declaration, span: join(armStart.span, end.span) });
  }
  if (arms.length === 0) unexpected(cur.current(), "'case' or 'default'");
  const end = cur.expect("}");
  cur.match(";");
  return { kind: "union", name, discriminant, arms, span: join(start.span, end.span) };
}

function parseDefinition(cur: TokenCursor): IdlDefinition {
  const tok = cur.advance();
  if (tok.kind === "ident") {
    switch (tok.text) {
      case "const":
        return parseConst(cur, tok);
      case "typedef":
        return parseTypedef(cur, tok);
      case "enum":
        return parseEnum(cur, tok);
      case "struct":
        return parseStruct(cur, tok);
      case "union":
        return parseUnion(cur, tok);
      case "program":
        fail("XDR1004", "RPC program definitions are not supported.", tok.span);
    }
  }
  unexpected(tok, "'const', 'typedef', 'enum', 'struct' or 'union'");
}

export function parseIdl(text: string, fileName: string): IdlSpecification {
  const cur = new TokenCursor(tokenizeIdl(text, fileName));
  const definitions: IdlDefinition[] = [];
  while (!cur.isAtEnd()) {
    definitions.push(parseDefinition(cur));
  }
  return { kind: "specification", fileName, definitions };
}
