export type { EmitOptions, GenerateConfig } from "./generate.js";
export { analyzeIdl, DEFAULT_DERIVE, DEFAULT_FILE_NAME, generate } from "./generate.js";
export type { CompilerDiagnosticCode, CompilerDiagnosticDomain, Span } from "./diagnostics.js";
export { CompileError, COMPILER_DIAGNOSTIC_CODES, compilerDiagnosticDomain } from "./diagnostics.js";
export type {
  ArraySize,
  ArrayType,
  Ast,
  BasicType,
  Constant,
  Declaration,
  Enum,
  Struct,
  Typedef,
  TypeDeclaration,
  Union,
} from "./xdr/ast.js";
export { renderXdrRuntime } from "./rust/xdr-runtime.js";
