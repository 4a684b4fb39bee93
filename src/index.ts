#!/usr/bin/env node

/**
 * graphql-lean-codegen CLI
 *
 * Fetches a GraphQL schema by introspection and generates a typed client
 * surface (full types, exhaustive projections, operation tables) from it.
 *
 * Usage:
 *   graphql-lean-codegen fetch --endpoint https://api.example.com/graphql
 *   graphql-lean-codegen generate
 *
 * With explicit paths:
 *   graphql-lean-codegen fetch \
 *     --endpoint https://api.example.com/graphql \
 *     --header "X-Api-Version: 2024-01" \
 *     --output ./schema.graphql
 *
 *   graphql-lean-codegen generate \
 *     --schema ./schema.graphql \
 *     --output ./generated/ \
 *     --runtime-module graphql-lean-codegen \
 *     --strict
 *
 * `fetch` sends GRAPHQL_TOKEN, when set, as the Authorization header.
 * With --strict, `generate` fails on parse or codegen warnings.
 * When --schema is omitted, `generate` reads "schema.graphql" in the current
 * directory.
 */

import * as fs from "node:fs";
import * as path from "node:path";

import { SchemaFetchError } from "./errors.js";
import { DEFAULT_RUNTIME_MODULE, emitTypeScript } from "./emitters/typescript.js";
import { fetchSchemaSdl } from "./introspection.js";
import { parseSchema } from "./parser.js";

interface FetchArgs {
  command: "fetch";
  endpoint: string;
  headers: Record<string, string>;
  output: string;
}

interface GenerateArgs {
  command: "generate";
  schema: string;
  output: string;
  runtimeModule: string;
  strict: boolean;
}

type CliArgs = FetchArgs | GenerateArgs;

function fail(message: string): never {
  console.error(`Error: ${message}`);
  process.exit(1);
}

function optionValue(argv: string[], i: number): string {
  const value = argv[i + 1];
  if (value === undefined) fail(`${argv[i]} requires a value`);
  return value;
}

function parseFetchArgs(argv: string[]): FetchArgs {
  const args: FetchArgs = {
    command: "fetch",
    endpoint: "",
    headers: {},
    output: "schema.graphql",
  };

  let i = 0;
  while (i < argv.length) {
    switch (argv[i]) {
      case "--endpoint":
        args.endpoint = optionValue(argv, i++);
        break;
      case "--header": {
        const val = optionValue(argv, i++);
        const colonIndex = val.indexOf(":");
        if (colonIndex === -1) {
          fail(`--header value must be in format "Name: value", got "${val}"`);
        }
        args.headers[val.slice(0, colonIndex).trim()] = val.slice(colonIndex + 1).trim();
        break;
      }
      case "--output":
        args.output = optionValue(argv, i++);
        break;
      default:
        console.error(`Unknown option: ${argv[i]}`);
        process.exit(1);
    }
    i++;
  }

  if (!args.endpoint) {
    fail("--endpoint is required");
  }

  const token = process.env["GRAPHQL_TOKEN"];
  if (token && args.headers["Authorization"] === undefined) {
    args.headers["Authorization"] = token;
  }

  return args;
}

function parseGenerateArgs(argv: string[]): GenerateArgs {
  const args: GenerateArgs = {
    command: "generate",
    schema: "",
    output: "./generated/",
    runtimeModule: DEFAULT_RUNTIME_MODULE,
    strict: false,
  };

  let i = 0;
  while (i < argv.length) {
    switch (argv[i]) {
      case "--schema":
        args.schema = optionValue(argv, i++);
        break;
      case "--output":
        args.output = optionValue(argv, i++);
        break;
      case "--runtime-module":
        args.runtimeModule = optionValue(argv, i++);
        break;
      case "--strict":
        args.strict = true;
        break;
      default:
        console.error(`Unknown option: ${argv[i]}`);
        process.exit(1);
    }
    i++;
  }

  // Default schema to schema.graphql in the current directory
  if (!args.schema) {
    const defaultSchema = "schema.graphql";
    if (fs.existsSync(defaultSchema)) {
      args.schema = defaultSchema;
    } else {
      fail("--schema is required (no schema.graphql found in current directory)");
    }
  }

  return args;
}

function parseArgs(argv: string[]): CliArgs {
  const [command, ...rest] = argv;
  switch (command) {
    case "fetch":
      return parseFetchArgs(rest);
    case "generate":
      return parseGenerateArgs(rest);
    default:
      fail(
        command
          ? `Unknown command: ${command} (expected "fetch" or "generate")`
          : 'a command is required ("fetch" or "generate")'
      );
  }
}

async function runFetch(args: FetchArgs): Promise<void> {
  const sdl = await fetchSchemaSdl(args.endpoint, { headers: args.headers });
  const outputDir = path.dirname(args.output);
  fs.mkdirSync(outputDir, { recursive: true });
  fs.writeFileSync(args.output, sdl);
  console.log(`Wrote ${args.output}`);
}

function runGenerate(args: GenerateArgs): void {
  const schemaSource = fs.readFileSync(args.schema, "utf-8");
  const schema = parseSchema(schemaSource);

  for (const warning of schema.warnings) {
    console.error(`Schema parse warning: ${warning}`);
  }
  if (args.strict && schema.warnings.length > 0) {
    fail(`${schema.warnings.length} schema parse warning(s) in strict mode`);
  }

  const output = emitTypeScript(schema, { runtimeModule: args.runtimeModule });
  for (const warning of output.warnings) {
    console.error(`Codegen warning: ${warning}`);
  }
  if (args.strict && output.warnings.length > 0) {
    fail(`${output.warnings.length} codegen warning(s) in strict mode`);
  }

  fs.mkdirSync(args.output, { recursive: true });
  const outputPath = path.join(args.output, "schema.ts");
  fs.writeFileSync(outputPath, output.source);
  console.log(`Generated ${outputPath}`);
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  switch (args.command) {
    case "fetch":
      await runFetch(args);
      break;
    case "generate":
      runGenerate(args);
      break;
  }
}

main().catch((err: unknown) => {
  if (err instanceof SchemaFetchError) fail(err.message);
  throw err;
});
