import { describe, it } from "node:test";
import * as assert from "node:assert";
import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import {
  INTROSPECTION_QUERY,
  extractIntrospectionSchema,
  fetchSchemaSdl,
  introspectionToSdl,
  renderIntrospectionTypeRef,
} from "../src/introspection.js";
import type { FetchLike, FetchResponse } from "../src/introspection.js";
import { parseSchema } from "../src/parser.js";

const fixturesDir = path.join(
  path.dirname(fileURLToPath(import.meta.url)),
  "..",
  "fixtures"
);

const introspectionBody: unknown = JSON.parse(
  fs.readFileSync(path.join(fixturesDir, "introspection.json"), "utf-8")
);
const expectedSdl = fs.readFileSync(
  path.join(fixturesDir, "introspection.graphql"),
  "utf-8"
);

function jsonResponse(body: unknown): FetchResponse {
  return {
    ok: true,
    status: 200,
    statusText: "OK",
    json: async () => body,
  };
}

describe("introspectionToSdl", () => {
  it("should render every kind in canonical order", () => {
    const sdl = introspectionToSdl(extractIntrospectionSchema(introspectionBody));
    assert.strictEqual(sdl, expectedSdl);
  });

  it("should not depend on the order of the input types", () => {
    const schema = extractIntrospectionSchema(introspectionBody);
    const types = schema["types"];
    assert.ok(Array.isArray(types));
    const reversed = { ...schema, types: [...types].reverse() };

    assert.strictEqual(introspectionToSdl(reversed), introspectionToSdl(schema));
  });

  it("should drop meta types and built-in scalars", () => {
    const sdl = introspectionToSdl({
      types: [
        { kind: "OBJECT", name: "__Type", fields: [] },
        { kind: "SCALAR", name: "Boolean" },
        { kind: "SCALAR", name: "ID" },
        { kind: "SCALAR", name: "JSON" },
      ],
    });
    assert.strictEqual(sdl, "scalar JSON\n\n");
  });

  it("should sort names by code unit, not locale", () => {
    const sdl = introspectionToSdl({
      types: [
        { kind: "SCALAR", name: "alpha" },
        { kind: "SCALAR", name: "Zulu" },
        { kind: "SCALAR", name: "Beta" },
      ],
    });
    assert.strictEqual(sdl, "scalar Beta\n\nscalar Zulu\n\nscalar alpha\n\n");
  });

  it("should fall back to Unknown for missing type references", () => {
    const sdl = introspectionToSdl({
      types: [
        {
          kind: "OBJECT",
          name: "Partial",
          fields: [{ name: "mystery", args: [] }],
        },
        { kind: "OBJECT", fields: [] },
      ],
    });
    assert.strictEqual(sdl, "type Partial {\n  mystery: Unknown\n}\n\n");
  });

  it("should render an empty document for malformed input", () => {
    assert.strictEqual(introspectionToSdl(null), "");
    assert.strictEqual(introspectionToSdl({ types: "nope" }), "");
  });

  it("should produce SDL the parser reads without warnings", () => {
    const schema = parseSchema(expectedSdl);

    assert.deepStrictEqual(schema.warnings, []);
    assert.deepStrictEqual(
      schema.objects.map((o) => o.name),
      ["Issue"]
    );
    assert.deepStrictEqual(
      schema.queryFields.map((f) => f.name),
      ["issue", "issues"]
    );
    assert.deepStrictEqual(schema.enums[0]?.values, [
      { name: "LOW" },
      { name: "URGENT", description: "Needs attention\ntoday" },
      { name: "HIGH" },
    ]);
    assert.deepStrictEqual(schema.inputs[0]?.fields, [
      {
        name: "state",
        description: 'Only issues "open"',
        type: { kind: "Named", name: "Priority" },
        arguments: [],
        defaultValue: "LOW",
      },
    ]);
    assert.strictEqual(schema.typeKinds.get("SearchResult"), "Union");
    assert.strictEqual(schema.typeKinds.get("Node"), "Interface");
  });
});

describe("renderIntrospectionTypeRef", () => {
  it("should wrap lists and non-null types", () => {
    const ref = {
      kind: "NON_NULL",
      ofType: {
        kind: "LIST",
        ofType: { kind: "NON_NULL", ofType: { kind: "SCALAR", name: "String" } },
      },
    };
    assert.strictEqual(renderIntrospectionTypeRef(ref), "[String!]!");
  });

  it("should render missing names as Unknown", () => {
    assert.strictEqual(renderIntrospectionTypeRef(undefined), "Unknown");
    assert.strictEqual(renderIntrospectionTypeRef({ kind: "LIST" }), "[Unknown]");
  });
});

describe("extractIntrospectionSchema", () => {
  it("should reject a body without data.__schema", () => {
    assert.throws(
      () => extractIntrospectionSchema({ errors: [{ message: "denied" }] }),
      { name: "SchemaFetchError", message: "No __schema in response" }
    );
  });
});

describe("fetchSchemaSdl", () => {
  it("should POST the introspection query and render the result", async () => {
    const calls: Parameters<FetchLike>[] = [];
    const fetch: FetchLike = async (url, init) => {
      calls.push([url, init]);
      return jsonResponse(introspectionBody);
    };

    const sdl = await fetchSchemaSdl("https://api.example.test/graphql", {
      headers: { Authorization: "Bearer test-secret" },
      fetch,
    });

    assert.strictEqual(sdl, expectedSdl);
    assert.strictEqual(calls.length, 1);
    const [url, init] = calls[0] ?? [];
    assert.strictEqual(url, "https://api.example.test/graphql");
    assert.strictEqual(init?.method, "POST");
    assert.deepStrictEqual(init?.headers, {
      "Content-Type": "application/json",
      Accept: "application/json",
      Authorization: "Bearer test-secret",
    });
    assert.deepStrictEqual(JSON.parse(init?.body ?? ""), {
      query: INTROSPECTION_QUERY,
    });
  });

  it("should report transport failures", async () => {
    const fetch: FetchLike = async () => {
      throw new Error("connect ECONNREFUSED");
    };
    await assert.rejects(fetchSchemaSdl("http://localhost:1/graphql", { fetch }), {
      name: "SchemaFetchError",
      message: "HTTP request failed: connect ECONNREFUSED",
      status: undefined,
    });
  });

  it("should report non-2xx statuses", async () => {
    const fetch: FetchLike = async () => ({
      ok: false,
      status: 401,
      statusText: "Unauthorized",
      json: async () => ({}),
    });
    await assert.rejects(fetchSchemaSdl("http://localhost:1/graphql", { fetch }), {
      name: "SchemaFetchError",
      message: "HTTP 401 Unauthorized",
      status: 401,
    });
  });

  it("should omit an empty status text", async () => {
    const fetch: FetchLike = async () => ({
      ok: false,
      status: 502,
      statusText: "",
      json: async () => ({}),
    });
    await assert.rejects(fetchSchemaSdl("http://localhost:1/graphql", { fetch }), {
      message: "HTTP 502",
      status: 502,
    });
  });

  it("should report malformed JSON", async () => {
    const fetch: FetchLike = async () => ({
      ok: true,
      status: 200,
      statusText: "OK",
      json: async () => {
        throw new SyntaxError("Unexpected token < in JSON at position 0");
      },
    });
    await assert.rejects(fetchSchemaSdl("http://localhost:1/graphql", { fetch }), {
      name: "SchemaFetchError",
      message: "Failed to parse JSON: Unexpected token < in JSON at position 0",
    });
  });

  it("should report a response without a schema", async () => {
    const fetch: FetchLike = async () => jsonResponse({ data: null });
    await assert.rejects(fetchSchemaSdl("http://localhost:1/graphql", { fetch }), {
      name: "SchemaFetchError",
      message: "No __schema in response",
    });
  });
});
