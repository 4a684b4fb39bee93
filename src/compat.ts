/**
 * Type descriptors and the field compatibility relation.
 *
 * A descriptor names the host-level type of a field: a leaf (`String`, `Int`,
 * `Timestamp`, an enum or object name) wrapped in `Optional`, `Boxed` or
 * `List`. Generated full types wrap fields in `Optional`, and references to
 * composite types in `Boxed`; a projection may keep or strip those wrappers
 * but never add them.
 *
 * `Compatible<F, P>` decides the relation for the compiler and
 * `isCompatible(f, p)` decides the same relation at generation time.
 */

export interface NamedType<N extends string = string> {
  readonly kind: "named";
  readonly name: N;
}

export interface OptionalType<T> {
  readonly kind: "optional";
  readonly ofType: T;
}

/** Indirection used for references to composite (possibly recursive) types. */
export interface BoxedType<T> {
  readonly kind: "boxed";
  readonly ofType: T;
}

export interface ListType<T> {
  readonly kind: "list";
  readonly ofType: T;
}

export type TypeDescriptor =
  | NamedType
  | OptionalType<TypeDescriptor>
  | BoxedType<TypeDescriptor>
  | ListType<TypeDescriptor>;

/** Leaf name for timestamp scalars, transmitted as formatted strings. */
export const TIMESTAMP = "Timestamp";

export type StringType = NamedType<"String">;
export type TimestampType = NamedType<typeof TIMESTAMP>;

function namedType<N extends string>(name: N): NamedType<N> {
  return { kind: "named", name };
}

/** Descriptor constructors. */
export const t = {
  string: namedType("String"),
  int: namedType("Int"),
  float: namedType("Float"),
  boolean: namedType("Boolean"),
  timestamp: namedType(TIMESTAMP),
  named: namedType,
  optional<T extends TypeDescriptor>(ofType: T): OptionalType<T> {
    return { kind: "optional", ofType };
  },
  boxed<T extends TypeDescriptor>(ofType: T): BoxedType<T> {
    return { kind: "boxed", ofType };
  },
  list<T extends TypeDescriptor>(ofType: T): ListType<T> {
    return { kind: "list", ofType };
  },
};

type Same<A, B> = [A] extends [B] ? ([B] extends [A] ? true : false) : false;

/**
 * Whether a projection field typed `P` is a legal narrowing of a full-type
 * field typed `F`. Besides identity, exactly these hold:
 *
 * - `Optional<T>` → `T`
 * - `Optional<Boxed<T>>` → `T` and `Optional<T>`
 * - `Timestamp` → `String`
 * - `Optional<Timestamp>` → `String` and `Optional<String>`
 */
export type Compatible<F, P> =
  Same<F, P> extends true
    ? true
    : F extends OptionalType<infer Inner>
      ? Same<Inner, P> extends true
        ? true
        : Inner extends BoxedType<infer Leaf>
          ? Same<Leaf, P> extends true
            ? true
            : Same<OptionalType<Leaf>, P>
          : Same<Inner, TimestampType> extends true
            ? Same<P, StringType> extends true
              ? true
              : Same<P, OptionalType<StringType>>
            : false
      : Same<F, TimestampType> extends true
        ? Same<P, StringType>
        : false;

/** Runtime counterpart of {@link Compatible}. */
export function isCompatible(full: TypeDescriptor, projected: TypeDescriptor): boolean {
  if (sameType(full, projected)) return true;

  if (full.kind === "optional") {
    const inner = full.ofType;
    if (sameType(inner, projected)) return true;
    if (inner.kind === "boxed") {
      const leaf = inner.ofType;
      return (
        sameType(leaf, projected) ||
        (projected.kind === "optional" && sameType(leaf, projected.ofType))
      );
    }
    if (isTimestamp(inner)) {
      return (
        isString(projected) ||
        (projected.kind === "optional" && isString(projected.ofType))
      );
    }
    return false;
  }

  return isTimestamp(full) && isString(projected);
}

/** Structural equality of two descriptors. */
export function sameType(a: TypeDescriptor, b: TypeDescriptor): boolean {
  if (a.kind === "named" || b.kind === "named") {
    return a.kind === "named" && b.kind === "named" && a.name === b.name;
  }
  return a.kind === b.kind && sameType(a.ofType, b.ofType);
}

function isTimestamp(d: TypeDescriptor): boolean {
  return d.kind === "named" && d.name === TIMESTAMP;
}

function isString(d: TypeDescriptor): boolean {
  return d.kind === "named" && d.name === "String";
}

/** Print a descriptor, e.g. `Optional<Boxed<String>>`. */
export function describeType(d: TypeDescriptor): string {
  switch (d.kind) {
    case "named":
      return d.name;
    case "optional":
      return `Optional<${describeType(d.ofType)}>`;
    case "boxed":
      return `Boxed<${describeType(d.ofType)}>`;
    case "list":
      return `List<${describeType(d.ofType)}>`;
  }
}

/** Type-level {@link describeType}. Gives up past eight levels of wrapping. */
export type Describe<D, Depth extends unknown[] = []> = Depth["length"] extends 8
  ? "..."
  : D extends NamedType<infer N extends string>
    ? N
    : D extends OptionalType<infer I>
      ? `Optional<${Describe<I, [...Depth, unknown]> & string}>`
      : D extends BoxedType<infer I>
        ? `Boxed<${Describe<I, [...Depth, unknown]> & string}>`
        : D extends ListType<infer I>
          ? `List<${Describe<I, [...Depth, unknown]> & string}>`
          : "Unknown";
