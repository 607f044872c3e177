type RuntimeScalar = {
  readonly rust: "u32" | "i32" | "u64" | "i64" | "f32" | "f64";
  readonly width: 4 | 8;
};

const RUNTIME_SCALARS: readonly RuntimeScalar[] = [
  { rust: "u32", width: 4 },
  { rust: "i32", width: 4 },
  { rust: "u64", width: 8 },
  { rust: "i64", width: 8 },
  { rust: "f32", width: 4 },
  { rust: "f64", width: 8 },
];

const ERROR_VARIANTS: readonly { readonly pattern: string; readonly decl: string; readonly display: string }[] = [
  { pattern: "Error::InvalidLength", decl: "InvalidLength", display: '"not enough bytes left to decode"' },
  { pattern: "Error::NonUtf8String", decl: "NonUtf8String", display: '"string is not valid UTF-8"' },
  { pattern: "Error::InvalidBoolean", decl: "InvalidBoolean", display: '"boolean is neither 0 nor 1"' },
  { pattern: "Error::UnknownVariant(d)", decl: "UnknownVariant(i32)", display: '"unknown discriminant {}", d' },
  {
    pattern: "Error::UnknownOptionVariant(d)",
    decl: "UnknownOptionVariant(u32)",
    display: '"unknown optional tag {}", d',
  },
];

function pushErrorType(lines: string[]): void {
  lines.push("#[derive(Debug, PartialEq)]");
  lines.push("pub enum Error {");
  for (const v of ERROR_VARIANTS) lines.push(`  ${v.decl},`);
  lines.push("}");
  lines.push("");
  lines.push("impl std::fmt::Display for Error {");
  lines.push("  fn fmt(&self, f: &mut std::fmt::Formatter<'_>) -> std::fmt::Result {");
  lines.push("    match self {");
  for (const v of ERROR_VARIANTS) lines.push(`      ${v.pattern} => write!(f, ${v.display}),`);
  lines.push("    }");
  lines.push("  }");
  lines.push("}");
  lines.push("");
  lines.push("impl std::error::Error for Error {}");
}

function pushPadding(lines: string[]): void {
  lines.push("pub fn pad_length(len: usize) -> usize {");
  lines.push("  (4 - len % 4) % 4");
  lines.push("}");
  lines.push("");
  lines.push("pub fn fixed_opaque_size(bytes: &[u8]) -> usize {");
  lines.push("  bytes.len() + pad_length(bytes.len())");
  lines.push("}");
  lines.push("");
  lines.push("pub fn variable_opaque_size(bytes: &[u8]) -> usize {");
  lines.push("  4 + fixed_opaque_size(bytes)");
  lines.push("}");
}

function pushDeserialiser(lines: string[]): void {
  lines.push("pub trait DeserialiserExt: Sized {");
  for (const s of RUNTIME_SCALARS) lines.push(`  fn try_${s.rust}(&mut self) -> Result<${s.rust}, Error>;`);
  lines.push("  fn try_bool(&mut self) -> Result<bool, Error>;");
  lines.push("  fn try_bytes(&mut self, len: usize) -> Result<Bytes, Error>;");
  lines.push("  fn try_variable_bytes(&mut self, max: Option<usize>) -> Result<Bytes, Error>;");
  lines.push("  fn try_string(&mut self, max: Option<usize>) -> Result<String, Error>;");
  lines.push("  fn try_variable_array<E, F>(&mut self, max: Option<usize>, f: F) -> Result<Vec<E>, Error>");
  lines.push("  where");
  lines.push("    F: FnMut(&mut Self) -> Result<E, Error>;");
  lines.push("  fn try_option<E, F>(&mut self, f: F) -> Result<Option<Box<E>>, Error>");
  lines.push("  where");
  lines.push("    F: FnOnce(&mut Self) -> Result<E, Error>;");
  lines.push("}");
  lines.push("");
  lines.push("impl DeserialiserExt for Bytes {");
  for (const s of RUNTIME_SCALARS) {
    lines.push(`  fn try_${s.rust}(&mut self) -> Result<${s.rust}, Error> {`);
    lines.push(`    if self.remaining() < ${s.width} {`);
    lines.push("      return Err(Error::InvalidLength);");
    lines.push("    }");
    lines.push(`    Ok(self.get_${s.rust}())`);
    lines.push("  }");
    lines.push("");
  }
  lines.push("  fn try_bool(&mut self) -> Result<bool, Error> {");
  lines.push("    match self.try_u32()? {");
  lines.push("      0 => Ok(false),");
  lines.push("      1 => Ok(true),");
  lines.push("      _ => Err(Error::InvalidBoolean),");
  lines.push("    }");
  lines.push("  }");
  lines.push("");
  lines.push("  fn try_bytes(&mut self, len: usize) -> Result<Bytes, Error> {");
  lines.push("    let padded = len + pad_length(len);");
  lines.push("    if self.remaining() < padded {");
  lines.push("      return Err(Error::InvalidLength);");
  lines.push("    }");
  lines.push("    let data = self.split_to(len);");
  lines.push("    self.advance(padded - len);");
  lines.push("    Ok(data)");
  lines.push("  }");
  lines.push("");
  lines.push("  fn try_variable_bytes(&mut self, max: Option<usize>) -> Result<Bytes, Error> {");
  lines.push("    let len = self.try_u32()? as usize;");
  lines.push("    if max.map_or(false, |max| len > max) {");
  lines.push("      return Err(Error::InvalidLength);");
  lines.push("    }");
  lines.push("    self.try_bytes(len)");
  lines.push("  }");
  lines.push("");
  lines.push("  fn try_string(&mut self, max: Option<usize>) -> Result<String, Error> {");
  lines.push("    let data = self.try_variable_bytes(max)?;");
  lines.push("    String::from_utf8(data.to_vec()).map_err(|_| Error::NonUtf8String)");
  lines.push("  }");
  lines.push("");
  lines.push("  fn try_variable_array<E, F>(&mut self, max: Option<usize>, mut f: F) -> Result<Vec<E>, Error>");
  lines.push("  where");
  lines.push("    F: FnMut(&mut Self) -> Result<E, Error>,");
  lines.push("  {");
  lines.push("    let len = self.try_u32()? as usize;");
  lines.push("    if max.map_or(false, |max| len > max) {");
  lines.push("      return Err(Error::InvalidLength);");
  lines.push("    }");
  lines.push("    let mut out = Vec::with_capacity(len.min(self.remaining() / 4));");
  lines.push("    for _ in 0..len {");
  lines.push("      out.push(f(self)?);");
  lines.push("    }");
  lines.push("    Ok(out)");
  lines.push("  }");
  lines.push("");
  lines.push("  fn try_option<E, F>(&mut self, f: F) -> Result<Option<Box<E>>, Error>");
  lines.push("  where");
  lines.push("    F: FnOnce(&mut Self) -> Result<E, Error>,");
  lines.push("  {");
  lines.push("    match self.try_u32()? {");
  lines.push("      0 => Ok(None),");
  lines.push("      1 => Ok(Some(Box::new(f(self)?))),");
  lines.push("      d => Err(Error::UnknownOptionVariant(d)),");
  lines.push("    }");
  lines.push("  }");
  lines.push("}");
}

function pushWireSize(lines: string[]): void {
  lines.push("pub trait WireSize {");
  lines.push("  fn wire_size(&self) -> usize;");
  lines.push("}");
  const impls: readonly (readonly [string, string, string])[] = [
    ...RUNTIME_SCALARS.map((s) => ["", s.rust, String(s.width)] as const),
    ["", "bool", "4"],
    ["", "String", "variable_opaque_size(self.as_bytes())"],
    ["<E: WireSize>", "Vec<E>", "4 + self.iter().map(WireSize::wire_size).sum::<usize>()"],
    ["<E: WireSize, const N: usize>", "[E; N]", "self.iter().map(WireSize::wire_size).sum::<usize>()"],
    ["<E: WireSize>", "Box<E>", "(**self).wire_size()"],
    ["<E: WireSize>", "Option<Box<E>>", "4 + self.as_ref().map_or(0, |inner| inner.wire_size())"],
  ];
  for (const [generics, ty, body] of impls) {
    lines.push("");
    lines.push(`impl${generics} WireSize for ${ty} {`);
    lines.push("  fn wire_size(&self) -> usize {");
    lines.push(`    ${body}`);
    lines.push("  }");
    lines.push("}");
  }
}

function pushEncode(lines: string[]): void {
  lines.push("pub trait XdrEncode {");
  lines.push("  fn encode<B: BufMut>(&self, buf: &mut B);");
  lines.push("}");
  lines.push("");
  lines.push("pub fn put_fixed_opaque<B: BufMut>(buf: &mut B, bytes: &[u8]) {");
  lines.push("  buf.put_slice(bytes);");
  lines.push("  buf.put_bytes(0, pad_length(bytes.len()));");
  lines.push("}");
  lines.push("");
  lines.push("pub fn put_variable_opaque<B: BufMut>(buf: &mut B, bytes: &[u8]) {");
  lines.push("  buf.put_u32(bytes.len() as u32);");
  lines.push("  put_fixed_opaque(buf, bytes);");
  lines.push("}");
  const impls: readonly (readonly [string, string, readonly string[]])[] = [
    ...RUNTIME_SCALARS.map((s) => ["", s.rust, [`buf.put_${s.rust}(*self);`]] as const),
    ["", "bool", ["buf.put_u32(if *self { 1 } else { 0 });"]],
    ["", "String", ["put_variable_opaque(buf, self.as_bytes());"]],
    ["<E: XdrEncode>", "Vec<E>", ["buf.put_u32(self.len() as u32);", "for e in self {", "  e.encode(buf);", "}"]],
    ["<E: XdrEncode, const N: usize>", "[E; N]", ["for e in self {", "  e.encode(buf);", "}"]],
    ["<E: XdrEncode>", "Box<E>", ["(**self).encode(buf);"]],
    [
      "<E: XdrEncode>",
      "Option<Box<E>>",
      [
        "match self {",
        "  Some(inner) => {",
        "    buf.put_u32(1);",
        "    inner.encode(buf);",
        "  }",
        "  None => buf.put_u32(0),",
        "}",
      ],
    ],
  ];
  for (const [generics, ty, body] of impls) {
    lines.push("");
    lines.push(`impl${generics} XdrEncode for ${ty} {`);
    lines.push("  fn encode<B: BufMut>(&self, buf: &mut B) {");
    for (const line of body) lines.push(`    ${line}`);
    lines.push("  }");
    lines.push("}");
  }
}

/**
 * Rust support code every generated file starts with: the decode error type,
 * the `Bytes` reader extension, padding helpers and the `WireSize` and
 * `XdrEncode` traits with their impls for built-in types.
 */
export function renderXdrRuntime(): readonly string[] {
  const lines: string[] = [];
  lines.push("// Generated by xdrust. Do not edit.");
  lines.push("#![allow(non_camel_case_types, dead_code, unused_mut, unused_variables, unused_imports)]");
  lines.push("");
  lines.push("use bytes::{Buf, BufMut, Bytes};");
  lines.push("use std::convert::TryFrom;");
  lines.push("use std::fmt::Debug;");
  lines.push("");
  pushErrorType(lines);
  lines.push("");
  pushPadding(lines);
  lines.push("");
  pushDeserialiser(lines);
  lines.push("");
  pushWireSize(lines);
  lines.push("");
  pushEncode(lines);
  return lines;
}
