/**
 * TypeScript code emitter.
 * Generates full types, exhaustive projections and operation tables from a
 * ParsedSchema.
 *
 * Each object gets a `<Name>Full` full type that lean projections can be
 * checked against, and a `<Name>` projection selecting every scalar and enum
 * field. Output order follows the schema, so regenerating from the same SDL
 * yields the same text.
 */

import { TIMESTAMP, TypeDescriptor } from "../compat.js";
import { DescriptorOptions, descriptorFor } from "../full-type.js";
import { escapeIdentifier, toWireName } from "../naming.js";
import {
  FieldDef,
  ObjectDef,
  ParsedSchema,
  getNamedType,
  isCompositeKind,
  renderTypeRef,
} from "../schema-model.js";

export interface TypeScriptEmitterOptions extends DescriptorOptions {
  /** Module the generated file imports its runtime helpers from. */
  runtimeModule?: string;
}

export interface EmittedModule {
  source: string;
  /** Fields left out of generated projections, and why. */
  warnings: string[];
}

export const DEFAULT_RUNTIME_MODULE = "graphql-lean-codegen";

export function emitTypeScript(
  schema: ParsedSchema,
  options: TypeScriptEmitterOptions = {}
): EmittedModule {
  const lines: string[] = [];
  const warnings: string[] = [];
  const runtimeModule = options.runtimeModule ?? DEFAULT_RUNTIME_MODULE;

  const projected = schema.objects.flatMap((object) => {
    const fields = selectableFields(object, schema, warnings);
    return fields.length > 0 ? [{ object, fields }] : [];
  });
  const helpers: string[] = [];
  if (schema.objects.length > 0) helpers.push("fullType", "t");
  if (projected.length > 0) helpers.push("plain", "projection");
  helpers.sort();

  lines.push("// Generated by graphql-lean-codegen. Do not edit.");
  lines.push("");
  if (helpers.length > 0) {
    lines.push(`import { ${helpers.join(", ")} } from ${JSON.stringify(runtimeModule)};`);
    lines.push("");
  }

  if (schema.enums.length > 0) {
    lines.push("// === Enums ===");
    lines.push("");
    for (const enumDef of schema.enums) {
      const binding = escapeIdentifier(enumDef.name);
      const values = enumDef.values.map((v) => JSON.stringify(v.name));
      lines.push(...docComment(enumDef.description, ""));
      lines.push(`export const ${binding}Values = [${values.join(", ")}] as const;`);
      lines.push(`export type ${binding} = (typeof ${binding}Values)[number];`);
      lines.push("");
    }
  }

  if (schema.objects.length > 0) {
    lines.push("// === Full types ===");
    lines.push("");
    for (const object of schema.objects) {
      lines.push(...emitFullType(object, schema, options));
      lines.push("");
    }
  }

  if (projected.length > 0) {
    lines.push("// === Projections (all scalar and enum fields) ===");
    lines.push("");
    for (const { object, fields } of projected) {
      lines.push(...emitProjection(object, fields, schema, options));
      lines.push("");
    }
  }

  lines.push("// === Operations ===");
  lines.push("");
  lines.push(...emitOperations("queryOperations", schema.queryFields));
  lines.push("");
  lines.push(...emitOperations("mutationOperations", schema.mutationFields));

  return { source: lines.join("\n") + "\n", warnings };
}

function emitFullType(
  object: ObjectDef,
  schema: ParsedSchema,
  options: DescriptorOptions
): string[] {
  const lines = docComment(object.description, "");
  lines.push(
    `export const ${escapeIdentifier(`${object.name}Full`)} = fullType(${JSON.stringify(object.name)}, {`
  );
  for (const field of object.fields) {
    lines.push(...docComment(field.description, "  "));
    lines.push(
      `  ${field.name}: ${renderDescriptor(descriptorFor(field.type, schema, options))},`
    );
  }
  lines.push("});");
  return lines;
}

function emitProjection(
  object: ObjectDef,
  fields: readonly FieldDef[],
  schema: ParsedSchema,
  options: DescriptorOptions
): string[] {
  const lines: string[] = [];
  lines.push(`export const ${escapeIdentifier(object.name)} = projection({`);
  lines.push(`  name: ${JSON.stringify(object.name)},`);
  lines.push("  fields: {");
  for (const field of fields) {
    lines.push(
      `    ${field.name}: plain(${renderDescriptor(descriptorFor(field.type, schema, options))}),`
    );
  }
  lines.push("  },");
  lines.push("});");
  return lines;
}

/**
 * Fields an exhaustive projection selects: scalar and enum fields with no
 * required arguments, whose name is its own wire name. A projection key is
 * sent as `toWireName(key)`, so a field like `html_url` has no key that
 * selects it; such fields are left out with a warning.
 */
function selectableFields(
  object: ObjectDef,
  schema: ParsedSchema,
  warnings: string[]
): FieldDef[] {
  return object.fields.filter((field) => {
    if (isCompositeKind(schema.typeKinds.get(getNamedType(field.type)))) return false;
    const needsArguments = field.arguments.some(
      (arg) => arg.type.kind === "NonNull" && arg.defaultValue === undefined
    );
    if (needsArguments) return false;
    if (toWireName(field.name) !== field.name) {
      warnings.push(
        `${object.name}.${field.name}: no projection key selects this field (it would be sent as "${toWireName(field.name)}"); left out of the ${object.name} projection`
      );
      return false;
    }
    return true;
  });
}

function emitOperations(binding: string, fields: readonly FieldDef[]): string[] {
  if (fields.length === 0) {
    return [`export const ${binding} = [] as const;`];
  }
  const lines = [`export const ${binding} = [`];
  for (const field of fields) {
    const args = field.arguments.map(
      (arg) =>
        `{ name: ${JSON.stringify(arg.name)}, type: ${JSON.stringify(renderTypeRef(arg.type))} }`
    );
    lines.push(
      `  { name: ${JSON.stringify(field.name)}, arguments: [${args.join(", ")}], returnType: ${JSON.stringify(renderTypeRef(field.type))} },`
    );
  }
  lines.push("] as const;");
  return lines;
}

/** Source text that rebuilds a descriptor through the `t` helpers. */
export function renderDescriptor(descriptor: TypeDescriptor): string {
  switch (descriptor.kind) {
    case "named":
      switch (descriptor.name) {
        case "String":
          return "t.string";
        case "Int":
          return "t.int";
        case "Float":
          return "t.float";
        case "Boolean":
          return "t.boolean";
        case TIMESTAMP:
          return "t.timestamp";
        default:
          return `t.named(${JSON.stringify(descriptor.name)})`;
      }
    case "optional":
      return `t.optional(${renderDescriptor(descriptor.ofType)})`;
    case "boxed":
      return `t.boxed(${renderDescriptor(descriptor.ofType)})`;
    case "list":
      return `t.list(${renderDescriptor(descriptor.ofType)})`;
  }
}

function docComment(description: string | undefined, indent: string): string[] {
  if (!description) return [];
  const text = description.replace(/\*\//g, "*\\/");
  const lines = text.split("\n");
  if (lines.length === 1) {
    return [`${indent}/** ${text} */`];
  }
  return [
    `${indent}/**`,
    ...lines.map((line) => (line ? `${indent} * ${line}` : `${indent} *`)),
    `${indent} */`,
  ];
}
