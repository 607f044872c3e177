export type Span = {
  readonly fileName: string;
  readonly start: number;
  readonly end: number;
};

export const COMPILER_DIAGNOSTIC_CODES = Object.freeze([
  // syntax
  "XDR1001",
  "XDR1002",
  "XDR1003",
  "XDR1004",
  "XDR1005",
  // symbols
  "XDR2001",
  "XDR2002",
  "XDR2003",
  "XDR2004",
  "XDR2005",
  // types
  "XDR3001",
  "XDR3002",
  "XDR3003",
  "XDR3004",
  "XDR3005",
  "XDR3006",
  // arrays
  "XDR4001",
  "XDR4002",
  "XDR4003",
] as const);

export type CompilerDiagnosticCode = (typeof COMPILER_DIAGNOSTIC_CODES)[number];

export type CompilerDiagnosticDomain = "syntax" | "symbols" | "types" | "arrays" | "other";

const KNOWN_CODES: ReadonlySet<string> = new Set<string>(COMPILER_DIAGNOSTIC_CODES);

export function isCompilerDiagnosticCode(code: string): code is CompilerDiagnosticCode {
  return KNOWN_CODES.has(code);
}

export function assertCompilerDiagnosticCode(code: string): asserts code is CompilerDiagnosticCode {
  if (!isCompilerDiagnosticCode(code)) {
    throw new Error(`Unknown compiler diagnostic code: ${code}`);
  }
}

export function compilerDiagnosticDomain(code: string): CompilerDiagnosticDomain {
  if (!isCompilerDiagnosticCode(code)) return "other";
  switch (code.charAt(3)) {
    case "1":
      return "syntax";
    case "2":
      return "symbols";
    case "3":
      return "types";
    case "4":
      return "arrays";
    default:
      return "other";
  }
}

export class CompileError extends Error {
  readonly code: CompilerDiagnosticCode;
  readonly span?: Span;

  constructor(code: string, message: string, span?: Span) {
    assertCompilerDiagnosticCode(code);
    super(message);
    this.code = code;
    this.span = span;
    this.name = "CompileError";
  }
}

export function fail(code: CompilerDiagnosticCode, message: string, span: Span | undefined): never {
  throw new CompileError(code, message, span);
}
