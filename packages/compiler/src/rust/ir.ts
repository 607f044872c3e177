import type { Span } from "../diagnostics.js";

export type NodeBase = {
  readonly span?: Span;
};

export type RustPath = {
  readonly segments: readonly string[];
};

export type RustVisibility = "private" | "pub";

export type RustReceiver =
  | { readonly kind: "none" }
  | { readonly kind: "ref_self"; readonly mut: boolean };

export type RustType =
  | (NodeBase & { readonly kind: "unit" })
  | (NodeBase & { readonly kind: "ref"; readonly mut: boolean; readonly inner: RustType })
  | (NodeBase & { readonly kind: "slice"; readonly inner: RustType })
  | (NodeBase & { readonly kind: "array"; readonly inner: RustType; readonly len: RustExpr })
  | (NodeBase & { readonly kind: "path"; readonly path: RustPath; readonly args: readonly RustType[] });

export type RustGenericParam = {
  readonly name: string;
  readonly bounds: readonly RustType[];
};

export type RustPattern =
  | (NodeBase & { readonly kind: "wild" })
  | (NodeBase & { readonly kind: "ident"; readonly name: string });

export type RustMatchPattern =
  | (NodeBase & { readonly kind: "wild" })
  | (NodeBase & { readonly kind: "binding"; readonly name: string })
  | (NodeBase & { readonly kind: "literal"; readonly text: string })
  | (NodeBase & { readonly kind: "path"; readonly path: RustPath })
  | (NodeBase & { readonly kind: "tuple_struct"; readonly path: RustPath; readonly fields: readonly RustPattern[] });

export type RustMatchExprArm = NodeBase & {
  readonly pattern: RustMatchPattern;
  readonly expr: RustExpr;
};

export type RustExpr =
  | (NodeBase & { readonly kind: "ident"; readonly name: string })
  | (NodeBase & { readonly kind: "path"; readonly path: RustPath })
  | (NodeBase & { readonly kind: "number"; readonly text: string })
  | (NodeBase & { readonly kind: "bool"; readonly value: boolean })
  | (NodeBase & { readonly kind: "borrow"; readonly mut: boolean; readonly expr: RustExpr })
  | (NodeBase & { readonly kind: "deref"; readonly expr: RustExpr })
  | (NodeBase & { readonly kind: "cast"; readonly expr: RustExpr; readonly type: RustType })
  | (NodeBase & { readonly kind: "field"; readonly expr: RustExpr; readonly name: string })
  | (NodeBase & { readonly kind: "sum"; readonly terms: readonly RustExpr[] })
  | (NodeBase & { readonly kind: "call"; readonly callee: RustExpr; readonly args: readonly RustExpr[] })
  | (NodeBase & {
      readonly kind: "method_call";
      readonly receiver: RustExpr;
      readonly method: string;
      readonly args: readonly RustExpr[];
    })
  | (NodeBase & {
      readonly kind: "assoc_call";
      readonly typePath: RustPath;
      readonly member: string;
      readonly args: readonly RustExpr[];
    })
  | (NodeBase & {
      readonly kind: "struct_lit";
      readonly typePath: RustPath;
      readonly fields: readonly { readonly name: string; readonly expr: RustExpr }[];
    })
  | (NodeBase & { readonly kind: "array_lit"; readonly elements: readonly RustExpr[] })
  | (NodeBase & { readonly kind: "closure"; readonly params: readonly string[]; readonly body: RustExpr })
  | (NodeBase & { readonly kind: "try"; readonly expr: RustExpr })
  | (NodeBase & { readonly kind: "match"; readonly expr: RustExpr; readonly arms: readonly RustMatchExprArm[] });

export type RustMatchArm = NodeBase & {
  readonly pattern: RustMatchPattern;
  readonly body: readonly RustStmt[];
};

export type RustStmt =
  | (NodeBase & {
      readonly kind: "let";
      readonly pattern: RustPattern;
      readonly mut: boolean;
      readonly type?: RustType;
      readonly init: RustExpr;
    })
  | (NodeBase & { readonly kind: "expr"; readonly expr: RustExpr })
  | (NodeBase & { readonly kind: "tail"; readonly expr: RustExpr })
  | (NodeBase & {
      readonly kind: "match";
      readonly expr: RustExpr;
      readonly arms: readonly RustMatchArm[];
    });

export type RustParam = NodeBase & { readonly name: string; readonly mut: boolean; readonly type: RustType };

export type RustStructField = NodeBase & {
  readonly vis: RustVisibility;
  readonly name: string;
  readonly type: RustType;
};

export type RustTupleField = NodeBase & {
  readonly vis: RustVisibility;
  readonly type: RustType;
};

export type RustEnumVariant = NodeBase & {
  readonly name: string;
  readonly fields: readonly RustType[];
  readonly discriminant?: string;
};

export type RustItem =
  | (NodeBase & {
      readonly kind: "const";
      readonly vis: RustVisibility;
      readonly name: string;
      readonly type: RustType;
      readonly value: RustExpr;
    })
  | (NodeBase & {
      readonly kind: "enum";
      readonly vis: RustVisibility;
      readonly name: string;
      readonly attrs: readonly string[];
      readonly typeParams: readonly RustGenericParam[];
      readonly variants: readonly RustEnumVariant[];
    })
  | (NodeBase & {
      readonly kind: "struct";
      readonly vis: RustVisibility;
      readonly name: string;
      readonly attrs: readonly string[];
      readonly typeParams: readonly RustGenericParam[];
      readonly fields: readonly RustStructField[];
    })
  | (NodeBase & {
      readonly kind: "tuple_struct";
      readonly vis: RustVisibility;
      readonly name: string;
      readonly attrs: readonly string[];
      readonly typeParams: readonly RustGenericParam[];
      readonly fields: readonly RustTupleField[];
    })
  | (NodeBase & {
      readonly kind: "impl";
      readonly typeParams: readonly RustGenericParam[];
      readonly traitType?: RustType;
      readonly selfType: RustType;
      readonly items: readonly RustItem[];
    })
  | (NodeBase & { readonly kind: "type_alias"; readonly name: string; readonly type: RustType })
  | (NodeBase & {
      readonly kind: "fn";
      readonly vis: RustVisibility;
      readonly receiver: RustReceiver;
      readonly name: string;
      readonly typeParams: readonly RustGenericParam[];
      readonly params: readonly RustParam[];
      readonly ret: RustType;
      readonly body: readonly RustStmt[];
    });

export type RustProgram = NodeBase & {
  readonly kind: "program";
  readonly items: readonly RustItem[];
};

export function unitType(): RustType {
  return { kind: "unit" };
}

export function pathType(segments: readonly string[], args: readonly RustType[] = []): RustType {
  return { kind: "path", path: { segments }, args };
}

export function identExpr(name: string): RustExpr {
  return { kind: "ident", name };
}

export function pathExpr(segments: readonly string[]): RustExpr {
  return { kind: "path", path: { segments } };
}

export function numberExpr(text: string): RustExpr {
  return { kind: "number", text };
}

export function callExpr(callee: string, args: readonly RustExpr[]): RustExpr {
  return { kind: "call", callee: identExpr(callee), args };
}

export function methodCall(receiver: RustExpr, method: string, args: readonly RustExpr[] = []): RustExpr {
  return { kind: "method_call", receiver, method, args };
}

export function tryExpr(expr: RustExpr): RustExpr {
  return { kind: "try", expr };
}
