/**
 * Full types: the schema-derived shape a projection is checked against.
 */

import { NamedType, TypeDescriptor, TIMESTAMP, t } from "./compat.js";
import {
  ParsedSchema,
  TypeRef,
  findObject,
  isCompositeKind,
  unwrapNonNull,
} from "./schema-model.js";

export interface FullType<
  N extends string = string,
  F extends Record<string, TypeDescriptor> = Record<string, TypeDescriptor>,
> {
  readonly typeName: N;
  /** Descriptors keyed by wire name. */
  readonly fields: F;
}

export function fullType<
  N extends string,
  F extends Record<string, TypeDescriptor>,
>(typeName: N, fields: F): FullType<N, F> {
  return { typeName, fields };
}

export interface DescriptorOptions {
  /** Scalars received as timestamp strings. Defaults to `["DateTime"]`. */
  timestampScalars?: readonly string[];
}

const DEFAULT_TIMESTAMP_SCALARS = ["DateTime"];

/**
 * Map a field's TypeRef to the descriptor generated code declares for it.
 *
 * Every field is optional, because a response only carries the fields that
 * were selected; non-null wrapping therefore only matters for list elements.
 * References to objects, interfaces and unions are boxed.
 */
export function descriptorFor(
  typeRef: TypeRef,
  schema: ParsedSchema,
  options: DescriptorOptions = {}
): TypeDescriptor {
  return t.optional(innerDescriptor(unwrapNonNull(typeRef), schema, options));
}

function innerDescriptor(
  typeRef: TypeRef,
  schema: ParsedSchema,
  options: DescriptorOptions
): TypeDescriptor {
  switch (typeRef.kind) {
    case "NonNull":
      return innerDescriptor(typeRef.ofType, schema, options);
    case "List": {
      const element = typeRef.ofType;
      const inner = innerDescriptor(element, schema, options);
      return t.list(element.kind === "NonNull" ? inner : t.optional(inner));
    }
    case "Named": {
      const leaf = leafDescriptor(typeRef.name, options);
      return isCompositeKind(schema.typeKinds.get(typeRef.name))
        ? t.boxed(leaf)
        : leaf;
    }
  }
}

/** The host-level leaf for a schema type name. */
export function leafDescriptor(
  typeName: string,
  options: DescriptorOptions = {}
): NamedType {
  const timestamps = options.timestampScalars ?? DEFAULT_TIMESTAMP_SCALARS;
  if (typeName === "ID") return t.string;
  if (timestamps.includes(typeName)) return t.named(TIMESTAMP);
  return t.named(typeName);
}

/** Build the full type of a (non-root) object from the IR. */
export function fullTypeFromSchema(
  schema: ParsedSchema,
  typeName: string,
  options: DescriptorOptions = {}
): FullType | undefined {
  const object = findObject(schema, typeName);
  if (!object) return undefined;

  const fields: Record<string, TypeDescriptor> = {};
  for (const field of object.fields) {
    fields[field.name] = descriptorFor(field.type, schema, options);
  }
  return fullType(object.name, fields);
}
