import type {
  RustExpr,
  RustGenericParam,
  RustItem,
  RustMatchPattern,
  RustParam,
  RustPattern,
  RustProgram,
  RustStmt,
  RustType,
} from "./ir.js";

function emitPath(segments: readonly string[]): string {
  return segments.join("::");
}

function emitType(ty: RustType): string {
  switch (ty.kind) {
    case "unit":
      return "()";
    case "ref":
      return ty.mut ? `&mut ${emitType(ty.inner)}` : `&${emitType(ty.inner)}`;
    case "slice":
      return `[${emitType(ty.inner)}]`;
    case "array":
      return `[${emitType(ty.inner)}; ${emitExpr(ty.len)}]`;
    case "path": {
      const base = emitPath(ty.path.segments);
      if (ty.args.length === 0) return base;
      return `${base}<${ty.args.map(emitType).join(", ")}>`;
    }
  }
}

function emitGenericParams(params: readonly RustGenericParam[]): string {
  if (params.length === 0) return "";
  const rendered = params.map((p) =>
    p.bounds.length === 0 ? p.name : `${p.name}: ${p.bounds.map(emitType).join(" + ")}`
  );
  return `<${rendered.join(", ")}>`;
}

function emitPattern(p: RustPattern): string {
  switch (p.kind) {
    case "wild":
      return "_";
    case "ident":
      return p.name;
  }
}

function emitMatchPattern(p: RustMatchPattern): string {
  switch (p.kind) {
    case "wild":
      return "_";
    case "binding":
      return p.name;
    case "literal":
      return p.text;
    case "path":
      return emitPath(p.path.segments);
    case "tuple_struct":
      return `${emitPath(p.path.segments)}(${p.fields.map(emitPattern).join(", ")})`;
  }
}

// Expressions that can take a postfix (`.x`, `?`, `as`) without parentheses.
function isPostfixSafe(expr: RustExpr): boolean {
  switch (expr.kind) {
    case "ident":
    case "path":
    case "number":
    case "bool":
    case "field":
    case "call":
    case "method_call":
    case "assoc_call":
    case "array_lit":
    case "try":
      return true;
    default:
      return false;
  }
}

function emitPostfixOperand(expr: RustExpr): string {
  return isPostfixSafe(expr) ? emitExpr(expr) : `(${emitExpr(expr)})`;
}

function isShorthandField(field: { readonly name: string; readonly expr: RustExpr }): boolean {
  return field.expr.kind === "ident" && field.expr.name === field.name;
}

function emitExpr(expr: RustExpr): string {
  switch (expr.kind) {
    case "ident":
      return expr.name;
    case "path":
      return emitPath(expr.path.segments);
    case "number":
      return expr.text;
    case "bool":
      return expr.value ? "true" : "false";
    case "borrow":
      return `${expr.mut ? "&mut " : "&"}${emitExpr(expr.expr)}`;
    case "deref":
      return `*${emitExpr(expr.expr)}`;
    case "cast":
      return `${emitPostfixOperand(expr.expr)} as ${emitType(expr.type)}`;
    case "field":
      return `${emitPostfixOperand(expr.expr)}.${expr.name}`;
    case "sum":
      return expr.terms.map(emitExpr).join(" + ");
    case "call":
      return `${emitExpr(expr.callee)}(${expr.args.map(emitExpr).join(", ")})`;
    case "method_call":
      return `${emitPostfixOperand(expr.receiver)}.${expr.method}(${expr.args.map(emitExpr).join(", ")})`;
    case "assoc_call":
      return `${emitPath(expr.typePath.segments)}::${expr.member}(${expr.args.map(emitExpr).join(", ")})`;
    case "struct_lit": {
      const base = emitPath(expr.typePath.segments);
      if (expr.fields.length === 0) return `${base} {}`;
      const fields = expr.fields
        .map((f) => (isShorthandField(f) ? f.name : `${f.name}: ${emitExpr(f.expr)}`))
        .join(", ");
      return `${base} { ${fields} }`;
    }
    case "array_lit":
      return `[${expr.elements.map(emitExpr).join(", ")}]`;
    case "closure":
      return `|${expr.params.join(", ")}| ${emitExpr(expr.body)}`;
    case "try":
      return `${emitPostfixOperand(expr.expr)}?`;
    case "match": {
      const arms = expr.arms.map((a) => `${emitMatchPattern(a.pattern)} => ${emitExpr(a.expr)}`).join(", ");
      return `match ${emitExpr(expr.expr)} { ${arms} }`;
    }
  }
}

function wrapLines(prefix: string, lines: readonly string[], suffix: string): string[] {
  if (lines.length === 0) return [`${prefix}${suffix}`];
  const last = lines.length - 1;
  return lines.map((line, i) => `${i === 0 ? prefix : ""}${line}${i === last ? suffix : ""}`);
}

// Struct literals and matches spread over several lines; the first returned
// line continues the caller's current line.
function emitExprLines(expr: RustExpr, indent: string): readonly string[] {
  const inner = `${indent}  `;
  switch (expr.kind) {
    case "struct_lit": {
      if (expr.fields.length === 0) return [emitExpr(expr)];
      const out: string[] = [`${emitPath(expr.typePath.segments)} {`];
      for (const f of expr.fields) {
        if (isShorthandField(f)) {
          out.push(`${inner}${f.name},`);
          continue;
        }
        out.push(...wrapLines(`${inner}${f.name}: `, emitExprLines(f.expr, inner), ","));
      }
      out.push(`${indent}}`);
      return out;
    }
    case "match": {
      const out: string[] = [`match ${emitExpr(expr.expr)} {`];
      for (const arm of expr.arms) {
        out.push(...wrapLines(`${inner}${emitMatchPattern(arm.pattern)} => `, emitExprLines(arm.expr, inner), ","));
      }
      out.push(`${indent}}`);
      return out;
    }
    case "call": {
      const [only] = expr.args;
      if (only === undefined || expr.args.length !== 1) return [emitExpr(expr)];
      return wrapLines(`${emitExpr(expr.callee)}(`, emitExprLines(only, indent), ")");
    }
    case "sum": {
      const last = expr.terms[expr.terms.length - 1];
      if (last === undefined || expr.terms.length < 2) return [emitExpr(expr)];
      const head = expr.terms.slice(0, -1).map(emitExpr).join(" + ");
      return wrapLines(`${head} + `, emitExprLines(last, indent), "");
    }
    default:
      return [emitExpr(expr)];
  }
}

function emitStmtLines(st: RustStmt, indent: string): string[] {
  switch (st.kind) {
    case "let": {
      const mut = st.mut ? "mut " : "";
      const ty = st.type ? `: ${emitType(st.type)}` : "";
      return wrapLines(`${indent}let ${mut}${emitPattern(st.pattern)}${ty} = `, emitExprLines(st.init, indent), ";");
    }
    case "expr":
      return wrapLines(indent, emitExprLines(st.expr, indent), ";");
    case "tail":
      return wrapLines(indent, emitExprLines(st.expr, indent), "");
    case "match": {
      const out: string[] = [];
      out.push(`${indent}match ${emitExpr(st.expr)} {`);
      const armIndent = `${indent}  `;
      const bodyIndent = `${indent}    `;
      for (const arm of st.arms) {
        out.push(`${armIndent}${emitMatchPattern(arm.pattern)} => {`);
        for (const s of arm.body) out.push(...emitStmtLines(s, bodyIndent));
        out.push(`${armIndent}},`);
      }
      out.push(`${indent}}`);
      return out;
    }
  }
}

function emitParam(p: RustParam): string {
  return `${p.mut ? "mut " : ""}${p.name}: ${emitType(p.type)}`;
}

function emitItem(item: RustItem, indent: string): string[] {
  switch (item.kind) {
    case "const": {
      const vis = item.vis === "pub" ? "pub " : "";
      return [`${indent}${vis}const ${item.name}: ${emitType(item.type)} = ${emitExpr(item.value)};`];
    }
    case "enum": {
      const out: string[] = [];
      for (const a of item.attrs) out.push(`${indent}${a}`);
      const vis = item.vis === "pub" ? "pub " : "";
      out.push(`${indent}${vis}enum ${item.name}${emitGenericParams(item.typeParams)} {`);
      for (const v of item.variants) {
        if (v.fields.length > 0) {
          out.push(`${indent}  ${v.name}(${v.fields.map(emitType).join(", ")}),`);
          continue;
        }
        const discriminant = v.discriminant === undefined ? "" : ` = ${v.discriminant}`;
        out.push(`${indent}  ${v.name}${discriminant},`);
      }
      out.push(`${indent}}`);
      return out;
    }
    case "struct": {
      const out: string[] = [];
      for (const a of item.attrs) out.push(`${indent}${a}`);
      const vis = item.vis === "pub" ? "pub " : "";
      const head = `${indent}${vis}struct ${item.name}${emitGenericParams(item.typeParams)}`;
      if (item.fields.length === 0) {
        out.push(`${head};`);
        return out;
      }
      out.push(`${head} {`);
      for (const f of item.fields) {
        const fvis = f.vis === "pub" ? "pub " : "";
        out.push(`${indent}  ${fvis}${f.name}: ${emitType(f.type)},`);
      }
      out.push(`${indent}}`);
      return out;
    }
    case "tuple_struct": {
      const out: string[] = [];
      for (const a of item.attrs) out.push(`${indent}${a}`);
      const vis = item.vis === "pub" ? "pub " : "";
      const fields = item.fields.map((f) => `${f.vis === "pub" ? "pub " : ""}${emitType(f.type)}`).join(", ");
      out.push(`${indent}${vis}struct ${item.name}${emitGenericParams(item.typeParams)}(${fields});`);
      return out;
    }
    case "impl": {
      const out: string[] = [];
      const generics = emitGenericParams(item.typeParams);
      const head = item.traitType
        ? `impl${generics} ${emitType(item.traitType)} for ${emitType(item.selfType)}`
        : `impl${generics} ${emitType(item.selfType)}`;
      out.push(`${indent}${head} {`);
      const innerIndent = `${indent}  `;
      let first = true;
      for (const inner of item.items) {
        if (!first) out.push("");
        out.push(...emitItem(inner, innerIndent));
        first = false;
      }
      out.push(`${indent}}`);
      return out;
    }
    case "type_alias":
      return [`${indent}type ${item.name} = ${emitType(item.type)};`];
    case "fn": {
      const out: string[] = [];
      const retClause = item.ret.kind === "unit" ? "" : ` -> ${emitType(item.ret)}`;
      const vis = item.vis === "pub" ? "pub " : "";
      const receiver = (() => {
        if (item.receiver.kind === "none") return undefined;
        return item.receiver.mut ? "&mut self" : "&self";
      })();
      const params = receiver ? [receiver, ...item.params.map(emitParam)] : item.params.map(emitParam);
      out.push(`${indent}${vis}fn ${item.name}${emitGenericParams(item.typeParams)}(${params.join(", ")})${retClause} {`);
      const bodyIndent = `${indent}  `;
      for (const st of item.body) out.push(...emitStmtLines(st, bodyIndent));
      out.push(`${indent}}`);
      return out;
    }
  }
}

export function writeRustProgram(program: RustProgram, opts?: { readonly header?: readonly string[] }): string {
  const parts: string[] = [];
  for (const h of opts?.header ?? []) parts.push(h);
  for (const item of program.items) {
    if (parts.length > 0) parts.push("");
    parts.push(...emitItem(item, ""));
  }
  parts.push("");
  return parts.join("\n");
}

export { emitExpr as writeRustExpr, emitType as writeRustType };
