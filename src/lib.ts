/**
 * Library entry point.
 *
 * Generated code imports its runtime helpers (`fullType`, `plain`,
 * `projection`, `t`) from here. The codegen pipeline is exported too; none of
 * it touches the file system, and only `fetchSchemaSdl` performs I/O.
 */

export {
  INTROSPECTION_QUERY,
  extractIntrospectionSchema,
  fetchSchemaSdl,
  introspectionToSdl,
  renderIntrospectionTypeRef,
} from "./introspection.js";
export type { FetchLike, FetchResponse, FetchSchemaOptions } from "./introspection.js";

export { parseSchema } from "./parser.js";

export { SchemaFetchError, ProjectionError } from "./errors.js";
export type { SchemaFetchErrorOptions } from "./errors.js";

export {
  RESERVED_WORDS,
  escapeIdentifier,
  isReservedWord,
  toWireName,
  unescapeIdentifier,
} from "./naming.js";
export type { ReservedWord, WireName } from "./naming.js";

export { TIMESTAMP, describeType, isCompatible, sameType, t } from "./compat.js";
export type {
  BoxedType,
  Compatible,
  Describe,
  ListType,
  NamedType,
  OptionalType,
  TypeDescriptor,
} from "./compat.js";

export {
  descriptorFor,
  fullType,
  fullTypeFromSchema,
  leafDescriptor,
} from "./full-type.js";
export type { DescriptorOptions, FullType } from "./full-type.js";

export {
  assertProjection,
  checkProjection,
  nested,
  plain,
  projection,
} from "./projection.js";
export type {
  AnyProjection,
  DescriptorData,
  FieldMap,
  NestedField,
  NestedWrap,
  PlainField,
  Projection,
  ProjectionData,
  ProjectionDiagnostic,
  ProjectionErrors,
  ProjectionField,
  ProjectionTypeError,
  ProofObligation,
} from "./projection.js";

export {
  EnumLiteral,
  buildConnectionQuery,
  buildMutation,
  buildQuery,
  renderValue,
} from "./query.js";
export type { ArgumentValue, Arguments } from "./query.js";

export { DEFAULT_RUNTIME_MODULE, emitTypeScript, renderDescriptor } from "./emitters/typescript.js";
export type { EmittedModule, TypeScriptEmitterOptions } from "./emitters/typescript.js";

export type {
  ArgumentDef,
  EnumDef,
  EnumValueDef,
  FieldDef,
  InputDef,
  ObjectDef,
  ParsedSchema,
  ScalarDef,
  TypeKind,
  TypeRef,
} from "./schema-model.js";

export {
  BUILTIN_SCALARS,
  MUTATION_ROOT,
  QUERY_ROOT,
  findObject,
  getNamedType,
  isBuiltinScalar,
  isCompositeKind,
  listOf,
  named,
  nonNull,
  renderTypeRef,
  unwrapNonNull,
} from "./schema-model.js";
