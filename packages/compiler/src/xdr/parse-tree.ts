import type { Span } from "../diagnostics.js";

export type IdlIdent = {
  readonly name: string;
  readonly span: Span;
};

export type IdlValue =
  | { readonly kind: "number"; readonly text: string; readonly span: Span }
  | { readonly kind: "ident"; readonly name: string; readonly span: Span };

/** Spelling as written, with multi-word primitives joined (`unsigned hyper`). */
export type IdlTypeSpecifier = {
  readonly spelling: string;
  readonly span: Span;
};

export type IdlDeclaration =
  | { readonly kind: "void"; readonly span: Span }
  | { readonly kind: "scalar"; readonly type: IdlTypeSpecifier; readonly name: IdlIdent; readonly span: Span }
  | {
      readonly kind: "fixed_array";
      readonly type: IdlTypeSpecifier;
      readonly name: IdlIdent;
      readonly size: IdlValue;
      readonly span: Span;
    }
  | {
      readonly kind: "variable_array";
      readonly type: IdlTypeSpecifier;
      readonly name: IdlIdent;
      readonly max?: IdlValue;
      readonly span: Span;
    }
  | { readonly kind: "optional"; readonly type: IdlTypeSpecifier; readonly name: IdlIdent; readonly span: Span };

export type IdlUnionArm =
  | {
      readonly kind: "case";
      readonly values: readonly IdlValue[];
      readonly declaration: IdlDeclaration;
      readonly span: Span;
    }
  | { readonly kind: "default"; readonly declaration: IdlDeclaration; readonly span: Span };

export type IdlEnumVariant = {
  readonly name: IdlIdent;
  readonly value: IdlValue;
};

export type IdlDefinition =
  | { readonly kind: "const"; readonly name: IdlIdent; readonly value: IdlValue; readonly span: Span }
  | { readonly kind: "typedef"; readonly declaration: IdlDeclaration; readonly span: Span }
  | {
      readonly kind: "enum";
      readonly name: IdlIdent;
      readonly variants: readonly IdlEnumVariant[];
      readonly span: Span;
    }
  | {
      readonly kind: "struct";
      readonly name: IdlIdent;
      readonly fields: readonly IdlDeclaration[];
      readonly span: Span;
    }
  | {
      readonly kind: "union";
      readonly name: IdlIdent;
      readonly discriminant: IdlDeclaration;
      readonly arms: readonly IdlUnionArm[];
      readonly span: Span;
    };

export type IdlSpecification = {
  readonly kind: "specification";
  readonly fileName: string;
  readonly definitions: readonly IdlDefinition[];
};
