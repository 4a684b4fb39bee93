import { describe, it } from "node:test";
import * as assert from "node:assert";
import { parseSchema } from "../src/parser.js";
import { listOf, named, nonNull } from "../src/schema-model.js";

describe("parseSchema", () => {
  it("should route roots and collect enums and scalars", () => {
    const schema = parseSchema("type Query { ping: String } enum E { A B } scalar Custom");

    assert.deepStrictEqual(schema.objects, []);
    assert.deepStrictEqual(schema.queryFields, [
      { name: "ping", type: named("String"), arguments: [] },
    ]);
    assert.deepStrictEqual(schema.enums, [
      { name: "E", values: [{ name: "A" }, { name: "B" }] },
    ]);
    assert.deepStrictEqual(schema.scalars, [{ name: "Custom" }]);
    assert.deepStrictEqual(Object.fromEntries(schema.typeKinds), {
      String: "Scalar",
      Int: "Scalar",
      Float: "Scalar",
      Boolean: "Scalar",
      ID: "Scalar",
      Query: "Object",
      E: "Enum",
      Custom: "Scalar",
    });
    assert.deepStrictEqual(schema.warnings, []);
  });

  it("should keep Mutation fields out of objects", () => {
    const schema = parseSchema(`
      type Query { issue: Issue }
      type Mutation {
        createIssue(title: String!, draft: Boolean = false): Issue!
      }
      type Issue { id: ID! }
    `);

    assert.deepStrictEqual(
      schema.objects.map((o) => o.name),
      ["Issue"]
    );
    assert.deepStrictEqual(schema.mutationFields, [
      {
        name: "createIssue",
        type: nonNull(named("Issue")),
        arguments: [
          { name: "title", type: nonNull(named("String")) },
          { name: "draft", type: named("Boolean"), defaultValue: "false" },
        ],
      },
    ]);
  });

  it("should resolve nested list and non-null wrappers", () => {
    const schema = parseSchema("type Board { columns: [[Card!]]! }");
    assert.deepStrictEqual(
      schema.objects[0]?.fields[0]?.type,
      nonNull(listOf(listOf(nonNull(named("Card")))))
    );
  });

  it("should keep input defaults as written", () => {
    const schema = parseSchema(`
      input IssueFilter {
        labels: [String!] = ["bug", "ui"]
        window: Window = { days: 7 }
      }
    `);
    assert.deepStrictEqual(
      schema.inputs[0]?.fields.map((f) => f.defaultValue),
      ['["bug", "ui"]', "{ days: 7 }"]
    );
  });

  it("should keep descriptions and drop empty ones", () => {
    const schema = parseSchema(`
      """
        The viewer.
      """
      type User {
        "Display name" name: String
        "" empty: Int
      }
    `);

    const user = schema.objects[0];
    assert.strictEqual(user?.description, "The viewer.");
    assert.strictEqual(user?.fields[0]?.description, "Display name");
    const empty = user?.fields[1];
    assert.ok(empty);
    assert.strictEqual(Object.hasOwn(empty, "description"), false);
  });

  it("should register interfaces and unions without collecting them", () => {
    const schema = parseSchema(`
      directive @cached(ttl: Int) repeatable on FIELD_DEFINITION | OBJECT
      schema { query: Query }
      interface Node { id: ID! }
      union Result = A | B
      extend type A { extra: Int }
      type A implements Node @cached(ttl: 5) { id: ID! }
      type B { id: ID! }
    `);

    assert.deepStrictEqual(schema.warnings, []);
    assert.deepStrictEqual(
      schema.objects.map((o) => [o.name, o.fields.map((f) => f.name)]),
      [
        ["A", ["id"]],
        ["B", ["id"]],
      ]
    );
    assert.strictEqual(schema.typeKinds.get("Node"), "Interface");
    assert.strictEqual(schema.typeKinds.get("Result"), "Union");
  });
});

describe("parseSchema members named like keywords", () => {
  it("should keep enum values named like definition keywords", () => {
    const schema = parseSchema("enum Kind { type input scalar } type Query { k: Kind }");

    assert.deepStrictEqual(schema.enums, [
      { name: "Kind", values: [{ name: "type" }, { name: "input" }, { name: "scalar" }] },
    ]);
    assert.deepStrictEqual(schema.objects, []);
    assert.deepStrictEqual(schema.queryFields, [
      { name: "k", type: named("Kind"), arguments: [] },
    ]);
    assert.strictEqual(schema.typeKinds.has("input"), false);
    assert.deepStrictEqual(schema.warnings, []);
  });

  it("should keep keyword values on their own lines", () => {
    const schema = parseSchema(
      ["enum Kind {", "  type", "  input", "  scalar @deprecated", "}", "type Query { k: Kind }"].join("\n")
    );

    assert.deepStrictEqual(
      schema.enums[0]?.values.map((v) => v.name),
      ["type", "input", "scalar"]
    );
    assert.deepStrictEqual(
      schema.queryFields.map((f) => f.name),
      ["k"]
    );
    assert.deepStrictEqual(schema.warnings, []);
  });

  it("should keep fields named like definition keywords", () => {
    const schema = parseSchema(
      ["type Query {", "  input: String", "  type(first: Int): Int", "}"].join("\n")
    );

    assert.deepStrictEqual(
      schema.queryFields.map((f) => f.name),
      ["input", "type"]
    );
    assert.deepStrictEqual(schema.warnings, []);
  });
});

describe("parseSchema recovery", () => {
  it("should skip a malformed field and keep its siblings", () => {
    const schema = parseSchema(
      ["type A {", "  ok: String", "  broken(: Int", "  fine: Int", "}", "", "type B { x: Int }"].join("\n")
    );

    assert.deepStrictEqual(
      schema.objects.map((o) => [o.name, o.fields.map((f) => f.name)]),
      [
        ["A", ["ok", "fine"]],
        ["B", ["x"]],
      ]
    );
    assert.deepStrictEqual(schema.warnings, [
      'A: Unexpected ":" at line 3, column 10, expected a name',
    ]);
  });

  it("should resume at the next definition after garbage", () => {
    const schema = parseSchema("type Query { a: Int }\nfoo bar\nenum E { A }");

    assert.deepStrictEqual(
      schema.enums.map((e) => e.name),
      ["E"]
    );
    assert.deepStrictEqual(schema.warnings, [
      'Unexpected name "foo" at line 2, column 1, expected a definition',
    ]);
  });

  it("should not let an unclosed block swallow the next definition", () => {
    const schema = parseSchema("type A {\n  x: Int\n\ntype B {\n  y: Int\n}");

    assert.deepStrictEqual(
      schema.objects.map((o) => [o.name, o.fields.map((f) => f.name)]),
      [
        ["A", ["x"]],
        ["B", ["y"]],
      ]
    );
    assert.deepStrictEqual(schema.warnings, ['A: expected "}" to close the block']);
  });

  it("should default a missing type annotation to String", () => {
    const schema = parseSchema("type Query { name }");

    assert.deepStrictEqual(schema.queryFields, [
      { name: "name", type: named("String"), arguments: [] },
    ]);
    assert.deepStrictEqual(schema.warnings, [
      "Query.name has no type annotation; assuming String",
    ]);
  });

  it("should blank an unexpected character and lex on", () => {
    const schema = parseSchema("type Query { a: Int % b: String }");

    assert.deepStrictEqual(
      schema.queryFields.map((f) => f.name),
      ["a", "b"]
    );
    assert.strictEqual(schema.warnings.length, 1);
    assert.match(schema.warnings[0] ?? "", /Unexpected character: "%"/);
    assert.ok(schema.warnings[0]?.endsWith("(line 1, column 21)"));
  });

  it("should stop at an unterminated string and keep what came before", () => {
    const schema = parseSchema('type Query { a: Int }\n"unterminated');

    assert.deepStrictEqual(
      schema.queryFields.map((f) => f.name),
      ["a"]
    );
    assert.strictEqual(schema.warnings.length, 1);
    assert.match(schema.warnings[0] ?? "", /Unterminated string/);
  });

  it("should report an empty document without warnings", () => {
    const schema = parseSchema("");
    assert.deepStrictEqual(schema.objects, []);
    assert.deepStrictEqual(schema.warnings, []);
  });
});
