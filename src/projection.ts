/**
 * Projections: caller-declared partial response shapes.
 *
 * A projection's field map determines its selection text, so there is no
 * query string to keep in sync with the type. When a projection names the
 * full type it narrows, the declaration is checked by the compiler: a field
 * missing from the full type, or a plain field whose descriptor is not a
 * compatible narrowing, fails to type-check.
 *
 * ```ts
 * const StateRef = projection({
 *   name: "StateRef",
 *   fields: { id: plain(t.string), name: plain(t.optional(t.string)) },
 * });
 *
 * const IssueSummary = projection({
 *   name: "IssueSummary",
 *   fullType: IssueFull,
 *   fields: {
 *     id: plain(t.string),
 *     created_at: plain(t.string),
 *     state: nested(StateRef),
 *   },
 * });
 *
 * IssueSummary.selection(); // "id createdAt state { id name }"
 * ```
 */

import {
  BoxedType,
  Compatible,
  Describe,
  ListType,
  NamedType,
  OptionalType,
  TypeDescriptor,
  describeType,
  isCompatible,
} from "./compat.js";
import { ProjectionError } from "./errors.js";
import { FullType } from "./full-type.js";
import { WireName, toWireName } from "./naming.js";

export interface PlainField<T extends TypeDescriptor> {
  readonly nested: false;
  readonly type: T;
}

/** How a nested projection appears in the response data. */
export type NestedWrap = "one" | "optional" | "list";

export interface NestedField<P extends AnyProjection, W extends NestedWrap> {
  readonly nested: true;
  readonly projection: P;
  readonly wrap: W;
}

export type ProjectionField =
  | PlainField<TypeDescriptor>
  | NestedField<AnyProjection, NestedWrap>;

export interface FieldMap {
  readonly [identifier: string]: ProjectionField;
}

export type ProofObligation =
  | { readonly kind: "exists"; readonly field: string }
  | {
      readonly kind: "compatible";
      readonly field: string;
      readonly projected: TypeDescriptor;
    };

export interface Projection<
  F extends FieldMap,
  Full extends FullType | undefined,
> {
  readonly name: string;
  readonly fields: F;
  readonly fullType: Full;
  /** Selection text, e.g. `id title state { id name }`. */
  selection(): string;
  /** What the declaration must satisfy against its full type. */
  obligations(): readonly ProofObligation[];
}

export type AnyProjection = Projection<FieldMap, FullType | undefined>;

export function plain<T extends TypeDescriptor>(type: T): PlainField<T> {
  return { nested: false, type };
}

export function nested<P extends AnyProjection>(
  projection: P
): NestedField<P, "one">;
export function nested<P extends AnyProjection, W extends NestedWrap>(
  projection: P,
  wrap: W
): NestedField<P, W>;
export function nested(
  projection: AnyProjection,
  wrap: NestedWrap = "one"
): NestedField<AnyProjection, NestedWrap> {
  return { nested: true, projection, wrap };
}

// --- compile-time validation ---

/** Carries a diagnostic into the compiler's "not assignable" message. */
export interface ProjectionTypeError<Message> {
  readonly projectionError: Message;
}

type FieldProblem<
  K extends string,
  Field,
  N extends string,
  FF extends Record<string, TypeDescriptor>,
> =
  WireName<K> extends infer W extends keyof FF & string
    ? Field extends PlainField<infer T extends TypeDescriptor>
      ? FF[W] extends infer D
        ? Compatible<D, T> extends true
          ? never
          : `field "${W}" is ${Describe<D> & string} on ${N}; ${Describe<T> & string} is not a compatible narrowing`
        : never
      : never
    : `field "${WireName<K>}" does not exist on ${N}`;

/** Per-field problems; empty when the full type's fields are not known statically. */
type FieldProblems<F, Full> =
  Full extends FullType<
    infer N extends string,
    infer FF extends Record<string, TypeDescriptor>
  >
    ? string extends keyof FF
      ? {}
      : { [K in keyof F & string]: FieldProblem<K, F[K], N, FF> }
    : {};

/** Every diagnostic a declaration would produce; `never` when it is valid. */
export type ProjectionErrors<F, Full> = FieldProblems<F, Full>[keyof FieldProblems<F, Full>];

type ValidateFields<F, Full> = {
  [K in keyof FieldProblems<F, Full>]: [FieldProblems<F, Full>[K]] extends [never]
    ? unknown
    : ProjectionTypeError<FieldProblems<F, Full>[K]>;
};

/**
 * Declare a projection. With `fullType`, every field must exist on the full
 * type and every plain field must be a compatible narrowing of it; nested
 * fields are only checked for existence; their own projection checks its
 * inner shape. Without `fullType` the projection is its own full view and
 * carries no obligations.
 */
export function projection<F extends FieldMap, Full extends FullType>(declaration: {
  readonly name: string;
  readonly fullType: Full;
  readonly fields: F & ValidateFields<F, Full>;
}): Projection<F, Full>;
export function projection<F extends FieldMap>(declaration: {
  readonly name: string;
  readonly fields: F;
}): Projection<F, undefined>;
export function projection(declaration: {
  readonly name: string;
  readonly fullType?: FullType;
  readonly fields: FieldMap;
}): AnyProjection {
  return new CompiledProjection(
    declaration.name,
    declaration.fields,
    declaration.fullType
  );
}

class CompiledProjection implements AnyProjection {
  private cachedSelection: string | undefined;
  private cachedObligations: readonly ProofObligation[] | undefined;

  constructor(
    readonly name: string,
    readonly fields: FieldMap,
    readonly fullType: FullType | undefined
  ) {}

  selection(): string {
    this.cachedSelection ??= Object.entries(this.fields)
      .map(([identifier, field]) => {
        const wire = toWireName(identifier);
        return field.nested ? `${wire} { ${field.projection.selection()} }` : wire;
      })
      .join(" ");
    return this.cachedSelection;
  }

  obligations(): readonly ProofObligation[] {
    if (!this.fullType) return [];
    this.cachedObligations ??= Object.entries(this.fields).flatMap(
      ([identifier, field]): ProofObligation[] => {
        const wire = toWireName(identifier);
        const exists: ProofObligation = { kind: "exists", field: wire };
        return field.nested
          ? [exists]
          : [exists, { kind: "compatible", field: wire, projected: field.type }];
      }
    );
    return this.cachedObligations;
  }
}

// --- generation-time validation ---

export interface ProjectionDiagnostic {
  readonly projection: string;
  readonly field: string;
  readonly message: string;
  readonly expected?: string;
  readonly actual?: string;
}

/**
 * Discharge the obligations of a projection and of every nested projection
 * reachable from it. Returns the unmet ones; an empty list means the
 * projection is valid.
 */
export function checkProjection(root: AnyProjection): ProjectionDiagnostic[] {
  const diagnostics: ProjectionDiagnostic[] = [];
  const visited = new Set<AnyProjection>();

  const visit = (p: AnyProjection): void => {
    if (visited.has(p)) return;
    visited.add(p);

    const full = p.fullType;
    if (full) {
      for (const obligation of p.obligations()) {
        const diagnostic = discharge(p.name, full, obligation);
        if (diagnostic) diagnostics.push(diagnostic);
      }
    }
    for (const field of Object.values(p.fields)) {
      if (field.nested) visit(field.projection);
    }
  };

  visit(root);
  return diagnostics;
}

/** Like {@link checkProjection}, but throws on the first unmet obligation. */
export function assertProjection(p: AnyProjection): void {
  const [first] = checkProjection(p);
  if (first) {
    throw new ProjectionError(`${first.projection}: ${first.message}`, first);
  }
}

function discharge(
  projectionName: string,
  full: FullType,
  obligation: ProofObligation
): ProjectionDiagnostic | undefined {
  const { field } = obligation;
  const expected = Object.hasOwn(full.fields, field)
    ? full.fields[field]
    : undefined;

  if (!expected) {
    // Reported once, by the existence obligation.
    if (obligation.kind === "compatible") return undefined;
    return {
      projection: projectionName,
      field,
      message: `field "${field}" does not exist on ${full.typeName}`,
    };
  }

  if (obligation.kind === "exists" || isCompatible(expected, obligation.projected)) {
    return undefined;
  }

  const expectedText = describeType(expected);
  const actualText = describeType(obligation.projected);
  return {
    projection: projectionName,
    field,
    message: `field "${field}" is ${expectedText} on ${full.typeName}; ${actualText} is not a compatible narrowing`,
    expected: expectedText,
    actual: actualText,
  };
}

// --- response data ---

type LeafData<N> = N extends "Int" | "Float"
  ? number
  : N extends "Boolean"
    ? boolean
    : N extends "JSON" | "JSONObject"
      ? unknown
      : string;

/** The TypeScript value a descriptor deserializes to. */
export type DescriptorData<D> =
  D extends NamedType<infer N extends string>
    ? LeafData<N>
    : D extends OptionalType<infer I>
      ? DescriptorData<I> | null
      : D extends BoxedType<infer I>
        ? DescriptorData<I>
        : D extends ListType<infer I>
          ? DescriptorData<I>[]
          : unknown;

type FieldData<Field> =
  Field extends PlainField<infer T extends TypeDescriptor>
    ? DescriptorData<T>
    : Field extends NestedField<infer P extends AnyProjection, infer W extends NestedWrap>
      ? W extends "list"
        ? ProjectionData<P>[]
        : W extends "optional"
          ? ProjectionData<P> | null
          : ProjectionData<P>
      : never;

/** The response object a projection's selection produces, keyed by wire name. */
export type ProjectionData<P> = P extends { readonly fields: infer F }
  ? { [K in keyof F & string as WireName<K>]: FieldData<F[K]> }
  : never;
