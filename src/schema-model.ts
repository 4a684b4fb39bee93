/**
 * Intermediate representation of a parsed GraphQL schema.
 * Built once by the parser and treated as read-only by everything downstream.
 */

/** What kind of GraphQL type a name refers to. */
export type TypeKind =
  | "Scalar"
  | "Enum"
  | "Object"
  | "InputObject"
  | "Interface"
  | "Union";

export type TypeRef =
  | { readonly kind: "Named"; readonly name: string }
  | { readonly kind: "List"; readonly ofType: TypeRef }
  | { readonly kind: "NonNull"; readonly ofType: TypeRef };

export interface ArgumentDef {
  readonly name: string;
  readonly description?: string;
  readonly type: TypeRef;
  readonly defaultValue?: string;
}

export interface FieldDef {
  readonly name: string;
  readonly description?: string;
  readonly type: TypeRef;
  readonly arguments: readonly ArgumentDef[];
  /** Raw SDL default; input fields only. */
  readonly defaultValue?: string;
}

export interface EnumValueDef {
  readonly name: string;
  readonly description?: string;
}

export interface EnumDef {
  readonly name: string;
  readonly description?: string;
  readonly values: readonly EnumValueDef[];
}

export interface ObjectDef {
  readonly name: string;
  readonly description?: string;
  readonly fields: readonly FieldDef[];
}

export interface InputDef {
  readonly name: string;
  readonly description?: string;
  readonly fields: readonly FieldDef[];
}

export interface ScalarDef {
  readonly name: string;
  readonly description?: string;
}

export interface ParsedSchema {
  readonly scalars: readonly ScalarDef[];
  readonly enums: readonly EnumDef[];
  readonly objects: readonly ObjectDef[];
  readonly inputs: readonly InputDef[];
  /** Fields of the `Query` root; the root itself is not in `objects`. */
  readonly queryFields: readonly FieldDef[];
  /** Fields of the `Mutation` root; the root itself is not in `objects`. */
  readonly mutationFields: readonly FieldDef[];
  readonly typeKinds: ReadonlyMap<string, TypeKind>;
  /** Non-fatal problems met while parsing. */
  readonly warnings: readonly string[];
}

export const BUILTIN_SCALARS = ["String", "Int", "Float", "Boolean", "ID"] as const;

const builtinScalars: ReadonlySet<string> = new Set(BUILTIN_SCALARS);

export const QUERY_ROOT = "Query";
export const MUTATION_ROOT = "Mutation";

/** Helper to create a non-null type ref */
export function nonNull(inner: TypeRef): TypeRef {
  return { kind: "NonNull", ofType: inner };
}

/** Helper to create a list type ref */
export function listOf(inner: TypeRef): TypeRef {
  return { kind: "List", ofType: inner };
}

/** Helper to create a named type ref */
export function named(name: string): TypeRef {
  return { kind: "Named", name };
}

/** Unwrap NonNull wrappers to get the base type ref */
export function unwrapNonNull(typeRef: TypeRef): TypeRef {
  if (typeRef.kind === "NonNull") {
    return typeRef.ofType;
  }
  return typeRef;
}

/** Get the leaf named type from a type ref */
export function getNamedType(typeRef: TypeRef): string {
  switch (typeRef.kind) {
    case "Named":
      return typeRef.name;
    case "NonNull":
    case "List":
      return getNamedType(typeRef.ofType);
  }
}

/** Render a type ref in SDL notation, e.g. `[User!]!`. */
export function renderTypeRef(typeRef: TypeRef): string {
  switch (typeRef.kind) {
    case "Named":
      return typeRef.name;
    case "NonNull":
      return `${renderTypeRef(typeRef.ofType)}!`;
    case "List":
      return `[${renderTypeRef(typeRef.ofType)}]`;
  }
}

/** Check if a type is a built-in scalar */
export function isBuiltinScalar(name: string): boolean {
  return builtinScalars.has(name);
}

/** True for kinds whose values carry a selection set. */
export function isCompositeKind(kind: TypeKind | undefined): boolean {
  return kind === "Object" || kind === "Interface" || kind === "Union";
}

/** Look up an object definition (roots excluded) by name. */
export function findObject(
  schema: ParsedSchema,
  name: string
): ObjectDef | undefined {
  return schema.objects.find((o) => o.name === name);
}
