const RUST_RESERVED_WORDS: ReadonlySet<string> = new Set([
  "as",
  "async",
  "await",
  "break",
  "const",
  "continue",
  "crate",
  "dyn",
  "else",
  "enum",
  "extern",
  "false",
  "fn",
  "for",
  "if",
  "impl",
  "in",
  "let",
  "loop",
  "match",
  "mod",
  "move",
  "mut",
  "pub",
  "ref",
  "return",
  "Self",
  "self",
  "static",
  "struct",
  "super",
  "trait",
  "true",
  "type",
  "union",
  "unsafe",
  "use",
  "where",
  "while",
]);

export function isRustReservedWord(name: string): boolean {
  return RUST_RESERVED_WORDS.has(name);
}

/** Type, field and constant names: reserved words get a `_v` suffix. */
export function rustSafeName(name: string): string {
  return isRustReservedWord(name) ? `${name}_v` : name;
}

/** Union variant names derive from case labels, which may be numeric. */
export function rustVariantName(caseValue: string): string {
  const safe = rustSafeName(caseValue);
  if (/^[0-9]/.test(safe)) return `v_${safe}`;
  if (safe.startsWith("-")) return `v_neg_${safe.slice(1)}`;
  return safe;
}

/** Rust reads a leading-zero literal as decimal, so octal gets `0o`. */
export function rustIntegerLiteral(text: string): string {
  const negative = text.startsWith("-");
  const digits = negative ? text.slice(1) : text;
  if (/^0[0-7]+$/.test(digits)) return `${negative ? "-" : ""}0o${digits.slice(1)}`;
  return text;
}
