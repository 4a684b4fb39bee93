/**
 * Operation text built from a projection's selection.
 */

import { AnyProjection } from "./projection.js";

/** An enum value, rendered bare rather than quoted. */
export class EnumLiteral {
  constructor(readonly value: string) {}
}

export type ArgumentValue =
  | string
  | number
  | boolean
  | null
  | EnumLiteral
  | readonly ArgumentValue[]
  | { readonly [key: string]: ArgumentValue };

export type Arguments = Readonly<Record<string, ArgumentValue>>;

/** `query { field(args) { <selection> } }` */
export function buildQuery(
  field: string,
  projection: AnyProjection,
  args: Arguments = {}
): string {
  return `query { ${field}${renderArguments(args)} { ${projection.selection()} } }`;
}

/** `mutation { field(args) { <selection> } }` */
export function buildMutation(
  field: string,
  projection: AnyProjection,
  args: Arguments = {}
): string {
  return `mutation { ${field}${renderArguments(args)} { ${projection.selection()} } }`;
}

/** Relay connection: selects `nodes` with the projection plus `pageInfo`. */
export function buildConnectionQuery(
  field: string,
  projection: AnyProjection,
  args: Arguments = {}
): string {
  return (
    `query { ${field}${renderArguments(args)} { ` +
    `nodes { ${projection.selection()} } pageInfo { hasNextPage endCursor } } }`
  );
}

function renderArguments(args: Arguments): string {
  const entries = Object.entries(args);
  if (entries.length === 0) return "";
  return `(${entries.map(([name, value]) => `${name}: ${renderValue(value)}`).join(", ")})`;
}

/** Render a value as a GraphQL literal. Throws on `NaN` and infinities. */
export function renderValue(value: ArgumentValue): string {
  if (value === null) return "null";
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new Error(`Cannot render ${value} as a GraphQL literal`);
    }
    return String(value);
  }
  if (typeof value === "boolean") return String(value);
  if (value instanceof EnumLiteral) return value.value;
  if (isList(value)) return `[${value.map(renderValue).join(", ")}]`;
  const fields = Object.entries(value).map(
    ([key, inner]) => `${key}: ${renderValue(inner)}`
  );
  return `{${fields.join(", ")}}`;
}

function isList(
  value: readonly ArgumentValue[] | { readonly [key: string]: ArgumentValue }
): value is readonly ArgumentValue[] {
  return Array.isArray(value);
}
