/**
 * Naming conventions shared by projections and the emitter.
 *
 * Projection keys are TypeScript identifiers; the names sent over the wire
 * are lowerCamelCase GraphQL field names. `toWireName` converts the former to
 * the latter and `WireName` does the same at the type level, so both agree.
 */

/** ECMAScript reserved words, including strict-mode ones. */
export const RESERVED_WORDS = [
  "await",
  "break",
  "case",
  "catch",
  "class",
  "const",
  "continue",
  "debugger",
  "default",
  "delete",
  "do",
  "else",
  "enum",
  "export",
  "extends",
  "false",
  "finally",
  "for",
  "function",
  "if",
  "implements",
  "import",
  "in",
  "instanceof",
  "interface",
  "let",
  "new",
  "null",
  "package",
  "private",
  "protected",
  "public",
  "return",
  "static",
  "super",
  "switch",
  "this",
  "throw",
  "true",
  "try",
  "typeof",
  "var",
  "void",
  "while",
  "with",
  "yield",
] as const;

export type ReservedWord = (typeof RESERVED_WORDS)[number];

const reserved: ReadonlySet<string> = new Set(RESERVED_WORDS);

export function isReservedWord(name: string): boolean {
  return reserved.has(name);
}

/** Escape a name for use as a binding: reserved words get a trailing `_`. */
export function escapeIdentifier(name: string): string {
  return isReservedWord(name) ? `${name}_` : name;
}

/** Undo {@link escapeIdentifier}. Other names are returned unchanged. */
export function unescapeIdentifier(name: string): string {
  if (name.endsWith("_") && isReservedWord(name.slice(0, -1))) {
    return name.slice(0, -1);
  }
  return name;
}

/**
 * Convert an identifier to its wire name: leading underscores are kept,
 * a reserved-word escape is removed, and `snake_case` becomes `camelCase`.
 * Idempotent: `toWireName(toWireName(x)) === toWireName(x)`.
 */
export function toWireName(identifier: string): string {
  const leading = /^_*/.exec(identifier)?.[0] ?? "";
  const rest = identifier.slice(leading.length);
  return leading + camelWords(unescapeIdentifier(rest));
}

function camelWords(value: string): string {
  const [head = "", ...tail] = value.split("_");
  return uncapitalize(head) + tail.map(capitalize).join("");
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

function uncapitalize(value: string): string {
  return value.charAt(0).toLowerCase() + value.slice(1);
}

type CamelTail<S extends string> = S extends `${infer Head}_${infer Tail}`
  ? `${Capitalize<Head>}${CamelTail<Tail>}`
  : Capitalize<S>;

type CamelWords<S extends string> = S extends `${infer Head}_${infer Tail}`
  ? `${Uncapitalize<Head>}${CamelTail<Tail>}`
  : Uncapitalize<S>;

/** Type-level {@link toWireName}. */
export type WireName<K extends string> = K extends `_${infer Rest}`
  ? `_${WireName<Rest>}`
  : K extends `${infer Stem extends ReservedWord}_`
    ? Stem
    : CamelWords<K>;
