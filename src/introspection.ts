/**
 * Fetch a GraphQL schema via introspection and render it as canonical SDL.
 *
 * The rendered text is stable: types are sorted by kind then name, so two
 * renderings of the same introspection result are byte-identical and the
 * SDL can be committed and diffed.
 */

import { getIntrospectionQuery } from "graphql";

import { SchemaFetchError } from "./errors.js";
import { isBuiltinScalar } from "./schema-model.js";

export const INTROSPECTION_QUERY = getIntrospectionQuery({
  descriptions: true,
});

/** Kinds in the order their declarations appear in the SDL. */
const KIND_ORDER: readonly string[] = [
  "SCALAR",
  "ENUM",
  "INPUT_OBJECT",
  "INTERFACE",
  "OBJECT",
  "UNION",
];

export interface FetchResponse {
  ok: boolean;
  status: number;
  statusText: string;
  json(): Promise<unknown>;
}

export type FetchLike = (
  url: string,
  init: { method: string; headers: Record<string, string>; body: string }
) => Promise<FetchResponse>;

export interface FetchSchemaOptions {
  /** Extra request headers, e.g. `Authorization`. */
  headers?: Record<string, string>;
  /** Transport override; defaults to the global `fetch`. */
  fetch?: FetchLike;
}

/**
 * POST the introspection query to `endpoint` and return the schema as SDL.
 * Transport, status and JSON failures surface as {@link SchemaFetchError}.
 */
export async function fetchSchemaSdl(
  endpoint: string,
  options: FetchSchemaOptions = {}
): Promise<string> {
  const doFetch: FetchLike = options.fetch ?? fetch;

  let response: FetchResponse;
  try {
    response = await doFetch(endpoint, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Accept: "application/json",
        ...options.headers,
      },
      body: JSON.stringify({ query: INTROSPECTION_QUERY }),
    });
  } catch (err) {
    throw new SchemaFetchError(`HTTP request failed: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  if (!response.ok) {
    throw new SchemaFetchError(
      `HTTP ${response.status} ${response.statusText}`.trimEnd(),
      { status: response.status }
    );
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (err) {
    throw new SchemaFetchError(`Failed to parse JSON: ${errorMessage(err)}`, {
      status: response.status,
      cause: err,
    });
  }

  return introspectionToSdl(extractIntrospectionSchema(body));
}

/** Pull `data.__schema` out of an introspection response body. */
export function extractIntrospectionSchema(
  body: unknown
): Record<string, unknown> {
  const schema = record(record(body)?.["data"])?.["__schema"];
  const result = record(schema);
  if (!result) {
    throw new SchemaFetchError("No __schema in response");
  }
  return result;
}

/**
 * Render an introspection `__schema` object as SDL.
 *
 * The input is walked as untyped JSON: missing names and kinds fall back to
 * `Unknown` instead of failing, so partial introspection data still renders.
 */
export function introspectionToSdl(schema: unknown): string {
  const types = list(record(schema)?.["types"]).flatMap((t) => {
    const type = record(t);
    return type ? [type] : [];
  });

  const userTypes = types
    .filter((t) => !(str(t["name"]) ?? "").startsWith("__"))
    .map((t) => ({
      type: t,
      kind: str(t["kind"]) ?? "",
      name: str(t["name"]) ?? "",
    }))
    .sort(
      (a, b) =>
        kindRank(a.kind) - kindRank(b.kind) || compareCodeUnits(a.name, b.name)
    );

  let sdl = "";
  for (const { type, kind, name } of userTypes) {
    if (!name) continue;
    const desc = descriptionPrefix(type, "");

    switch (kind) {
      case "SCALAR":
        if (isBuiltinScalar(name)) continue;
        sdl += `${desc}scalar ${name}\n\n`;
        break;
      case "ENUM": {
        sdl += `${desc}enum ${name} {\n`;
        for (const value of records(type["enumValues"])) {
          const valueName = str(value["name"]) ?? "";
          sdl += `  ${descriptionPrefix(value, "  ")}${valueName}${deprecation(value)}\n`;
        }
        sdl += "}\n\n";
        break;
      }
      case "INPUT_OBJECT": {
        sdl += `${desc}input ${name} {\n`;
        for (const field of records(type["inputFields"])) {
          sdl += `  ${descriptionPrefix(field, "  ")}${inputValue(field)}\n`;
        }
        sdl += "}\n\n";
        break;
      }
      case "OBJECT":
      case "INTERFACE": {
        const keyword = kind === "OBJECT" ? "type" : "interface";
        sdl += `${desc}${keyword} ${name}${implementsClause(type)} {\n`;
        for (const field of records(type["fields"])) {
          sdl += `  ${descriptionPrefix(field, "  ")}${fieldLine(field)}\n`;
        }
        sdl += "}\n\n";
        break;
      }
      case "UNION": {
        const members = records(type["possibleTypes"])
          .map((m) => str(m["name"]))
          .filter((m): m is string => m !== undefined);
        sdl += `${desc}union ${name} = ${members.join(" | ")}\n\n`;
        break;
      }
      default:
        break;
    }
  }

  return sdl;
}

/** Render an introspection type reference (`{ kind, name, ofType }`). */
export function renderIntrospectionTypeRef(typeRef: unknown): string {
  const ref = record(typeRef);
  switch (str(ref?.["kind"])) {
    case "NON_NULL":
      return `${renderIntrospectionTypeRef(ref?.["ofType"])}!`;
    case "LIST":
      return `[${renderIntrospectionTypeRef(ref?.["ofType"])}]`;
    default:
      return str(ref?.["name"]) ?? "Unknown";
  }
}

function kindRank(kind: string): number {
  const rank = KIND_ORDER.indexOf(kind);
  return rank === -1 ? KIND_ORDER.length : rank;
}

function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Description text placed before an element. Single-line descriptions share
 * the element's line; multi-line ones become a block string on their own line.
 */
function descriptionPrefix(
  element: Record<string, unknown>,
  indent: string
): string {
  const desc = str(element["description"]);
  if (!desc) return "";
  if (desc.includes("\n")) {
    return `"""${desc.replace(/"""/g, '\\"""')}"""\n${indent}`;
  }
  return `"${escapeString(desc)}" `;
}

function deprecation(element: Record<string, unknown>): string {
  if (element["isDeprecated"] !== true) return "";
  const reason = str(element["deprecationReason"]);
  if (reason === undefined) return " @deprecated";
  return ` @deprecated(reason: "${escapeString(reason)}")`;
}

function defaultClause(element: Record<string, unknown>): string {
  const value = str(element["defaultValue"]);
  return value ? ` = ${value}` : "";
}

function inputValue(element: Record<string, unknown>): string {
  const name = str(element["name"]) ?? "";
  return `${name}: ${renderIntrospectionTypeRef(element["type"])}${defaultClause(element)}`;
}

function implementsClause(type: Record<string, unknown>): string {
  const names = records(type["interfaces"])
    .map((i) => str(i["name"]))
    .filter((n): n is string => n !== undefined);
  return names.length > 0 ? ` implements ${names.join(" & ")}` : "";
}

function fieldLine(field: Record<string, unknown>): string {
  const name = str(field["name"]) ?? "";
  const type = renderIntrospectionTypeRef(field["type"]);
  const args = records(field["args"]);
  const signature =
    args.length > 0 ? `${name}(${args.map(inputValue).join(", ")})` : name;
  return `${signature}: ${type}${deprecation(field)}`;
}

function escapeString(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"');
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// --- untyped JSON access ---

function record(value: unknown): Record<string, unknown> | undefined {
  if (typeof value === "object" && value !== null && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return undefined;
}

function records(value: unknown): Record<string, unknown>[] {
  return list(value).flatMap((item) => {
    const r = record(item);
    return r ? [r] : [];
  });
}

function list(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

function str(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}
