/**
 * Error-tolerant GraphQL SDL parser.
 *
 * Tokenises with graphql-js's `Lexer` and walks top-level definitions by hand,
 * producing a ParsedSchema for code generation. Unlike `buildSchema`, a
 * malformed definition or field is reported as a warning and skipped; the
 * rest of the document is still parsed.
 */

import { GraphQLError, Lexer, Source, TokenKind } from "graphql";
import type { Token } from "graphql";

import {
  ArgumentDef,
  BUILTIN_SCALARS,
  EnumDef,
  EnumValueDef,
  FieldDef,
  InputDef,
  MUTATION_ROOT,
  ObjectDef,
  ParsedSchema,
  QUERY_ROOT,
  ScalarDef,
  TypeKind,
  TypeRef,
  listOf,
  named,
  nonNull,
} from "./schema-model.js";

const DEFINITION_KEYWORDS = new Set([
  "scalar",
  "enum",
  "type",
  "input",
  "interface",
  "union",
  "schema",
  "directive",
  "extend",
]);

/**
 * Parse a GraphQL SDL document into a ParsedSchema.
 * Never throws; problems are collected in `warnings`.
 */
export function parseSchema(schemaSource: string): ParsedSchema {
  const warnings: string[] = [];
  const { tokens, text } = tokenize(schemaSource, warnings);
  return new SdlParser(tokens, text, warnings).parseDocument();
}

/**
 * Lex the whole document up front. A lexical error on a visible character
 * blanks that character and lexes again; any other lexical error ends the
 * token stream where it occurred.
 */
function tokenize(
  schemaSource: string,
  warnings: string[]
): { tokens: Token[]; text: string } {
  let text = schemaSource;

  for (;;) {
    const lexer = new Lexer(new Source(text));
    const tokens: Token[] = [];
    try {
      let token = lexer.advance();
      while (token.kind !== TokenKind.EOF) {
        tokens.push(token);
        token = lexer.advance();
      }
      return { tokens, text };
    } catch (err) {
      if (!(err instanceof GraphQLError)) throw err;
      warnings.push(formatGraphQLError(err));

      const position = err.positions?.[0];
      const char = position === undefined ? undefined : text[position];
      if (position === undefined || char === undefined || /\s/.test(char)) {
        return { tokens, text };
      }
      text = `${text.slice(0, position)} ${text.slice(position + 1)}`;
    }
  }
}

function formatGraphQLError(err: GraphQLError): string {
  const location = err.locations?.[0];
  return location
    ? `${err.message} (line ${location.line}, column ${location.column})`
    : err.message;
}

/** A local syntax problem; caught at the nearest recovery point. */
class SyntaxIssue extends Error {
  readonly token: Token | undefined;

  constructor(message: string, token: Token | undefined) {
    super(message);
    this.name = "SyntaxIssue";
    this.token = token;
  }
}

class SdlParser {
  private pos = 0;

  private readonly scalars: ScalarDef[] = [];
  private readonly enums: EnumDef[] = [];
  private readonly objects: ObjectDef[] = [];
  private readonly inputs: InputDef[] = [];
  private queryFields: FieldDef[] = [];
  private mutationFields: FieldDef[] = [];
  private readonly typeKinds = new Map<string, TypeKind>();

  constructor(
    private readonly tokens: readonly Token[],
    private readonly text: string,
    private readonly warnings: string[]
  ) {
    for (const scalar of BUILTIN_SCALARS) {
      this.typeKinds.set(scalar, "Scalar");
    }
  }

  parseDocument(): ParsedSchema {
    while (this.peek()) {
      const start = this.pos;
      try {
        this.parseDefinition();
      } catch (err) {
        if (!(err instanceof SyntaxIssue)) throw err;
        this.warnings.push(err.message);
        if (this.pos === start) this.pos++;
        this.recoverToDefinition();
      }
    }

    return {
      scalars: this.scalars,
      enums: this.enums,
      objects: this.objects,
      inputs: this.inputs,
      queryFields: this.queryFields,
      mutationFields: this.mutationFields,
      typeKinds: this.typeKinds,
      warnings: this.warnings,
    };
  }

  // --- definitions ---

  private parseDefinition(): void {
    const description = this.parseDescription();
    const keyword = this.peek();
    if (keyword?.kind !== TokenKind.NAME || !DEFINITION_KEYWORDS.has(keyword.value)) {
      throw this.unexpected(keyword, "a definition");
    }
    this.pos++;

    switch (keyword.value) {
      case "scalar": {
        const name = this.expectName();
        this.skipDirectives();
        this.typeKinds.set(name, "Scalar");
        this.scalars.push({ name, ...describe(description) });
        break;
      }
      case "enum": {
        const name = this.expectName();
        this.skipDirectives();
        this.typeKinds.set(name, "Enum");
        this.enums.push({
          name,
          ...describe(description),
          values: this.parseEnumValues(name),
        });
        break;
      }
      case "type": {
        const name = this.expectName();
        this.skipImplements();
        this.skipDirectives();
        this.typeKinds.set(name, "Object");
        const fields = this.parseFields(name, true);
        if (name === QUERY_ROOT) {
          this.queryFields = fields;
        } else if (name === MUTATION_ROOT) {
          this.mutationFields = fields;
        } else {
          this.objects.push({ name, ...describe(description), fields });
        }
        break;
      }
      case "input": {
        const name = this.expectName();
        this.skipDirectives();
        this.typeKinds.set(name, "InputObject");
        const fields = this.parseFields(name, false);
        this.inputs.push({ name, ...describe(description), fields });
        break;
      }
      case "interface": {
        const name = this.expectName();
        this.typeKinds.set(name, "Interface");
        this.skipImplements();
        this.skipDirectives();
        this.skipBalanced(TokenKind.BRACE_L, TokenKind.BRACE_R);
        break;
      }
      case "union": {
        const name = this.expectName();
        this.typeKinds.set(name, "Union");
        this.skipDirectives();
        if (this.accept(TokenKind.EQUALS)) {
          this.accept(TokenKind.PIPE);
          this.expectName();
          while (this.accept(TokenKind.PIPE)) this.expectName();
        }
        break;
      }
      case "schema":
        this.skipDirectives();
        this.skipBalanced(TokenKind.BRACE_L, TokenKind.BRACE_R);
        break;
      case "directive":
        this.skipDirectiveDefinition();
        break;
      case "extend":
        // Extensions are not merged into the IR.
        this.pos++;
        this.recoverToDefinition();
        break;
    }
  }

  private parseEnumValues(enumName: string): EnumValueDef[] {
    const values: EnumValueDef[] = [];
    if (!this.accept(TokenKind.BRACE_L)) return values;

    while (this.peek() && !this.at(TokenKind.BRACE_R)) {
      if (this.atDefinitionInBlock()) break;
      try {
        const description = this.parseDescription();
        const name = this.expectName();
        this.skipDirectives();
        values.push({ name, ...describe(description) });
      } catch (err) {
        if (!(err instanceof SyntaxIssue)) throw err;
        this.warnings.push(`${enumName}: ${err.message}`);
        this.recoverToMember(err.token);
      }
    }
    this.expectClosing(enumName);
    return values;
  }

  /**
   * Parse a `{ ... }` field block. Output fields may take arguments; input
   * fields may carry default values.
   */
  private parseFields(owner: string, withArguments: boolean): FieldDef[] {
    const fields: FieldDef[] = [];
    if (!this.accept(TokenKind.BRACE_L)) return fields;

    while (this.peek() && !this.at(TokenKind.BRACE_R)) {
      if (this.atDefinitionInBlock()) break;
      try {
        fields.push(this.parseField(owner, withArguments));
      } catch (err) {
        if (!(err instanceof SyntaxIssue)) throw err;
        this.warnings.push(`${owner}: ${err.message}`);
        this.recoverToMember(err.token);
      }
    }
    this.expectClosing(owner);
    return fields;
  }

  private parseField(owner: string, withArguments: boolean): FieldDef {
    const description = this.parseDescription();
    const name = this.expectName();

    let args: ArgumentDef[] = [];
    if (withArguments && this.at(TokenKind.PAREN_L)) {
      args = this.parseArguments(`${owner}.${name}`);
    }

    const type = this.parseTypeAnnotation(`${owner}.${name}`);
    const defaultValue = withArguments ? undefined : this.parseDefaultValue();
    this.skipDirectives();

    return {
      name,
      ...describe(description),
      type,
      arguments: args,
      ...(defaultValue === undefined ? {} : { defaultValue }),
    };
  }

  private parseArguments(owner: string): ArgumentDef[] {
    const args: ArgumentDef[] = [];
    this.expect(TokenKind.PAREN_L, "(");
    while (this.peek() && !this.at(TokenKind.PAREN_R)) {
      const description = this.parseDescription();
      const name = this.expectName();
      const type = this.parseTypeAnnotation(`${owner}(${name})`);
      const defaultValue = this.parseDefaultValue();
      this.skipDirectives();
      args.push({
        name,
        ...describe(description),
        type,
        ...(defaultValue === undefined ? {} : { defaultValue }),
      });
    }
    this.expect(TokenKind.PAREN_R, ")");
    return args;
  }

  /** `: Type`, defaulting to `String` when the annotation is absent. */
  private parseTypeAnnotation(element: string): TypeRef {
    if (!this.accept(TokenKind.COLON)) {
      this.warnings.push(`${element} has no type annotation; assuming String`);
      return named("String");
    }
    return this.parseTypeRef();
  }

  private parseTypeRef(): TypeRef {
    let typeRef: TypeRef;
    if (this.accept(TokenKind.BRACKET_L)) {
      const inner = this.parseTypeRef();
      this.expect(TokenKind.BRACKET_R, "]");
      typeRef = listOf(inner);
    } else {
      typeRef = named(this.expectName());
    }
    if (this.accept(TokenKind.BANG)) {
      typeRef = nonNull(typeRef);
    }
    return typeRef;
  }

  /** `= value`, returned as the raw source text of the value. */
  private parseDefaultValue(): string | undefined {
    if (!this.accept(TokenKind.EQUALS)) return undefined;
    const first = this.peek();
    if (!first) throw this.unexpected(first, "a default value");
    this.skipValue();
    const last = this.tokens[this.pos - 1];
    return this.text.slice(first.start, last?.end ?? first.end);
  }

  private skipValue(): void {
    const token = this.peek();
    switch (token?.kind) {
      case TokenKind.BRACKET_L:
        this.skipBalanced(TokenKind.BRACKET_L, TokenKind.BRACKET_R);
        return;
      case TokenKind.BRACE_L:
        this.skipBalanced(TokenKind.BRACE_L, TokenKind.BRACE_R);
        return;
      case TokenKind.DOLLAR:
        this.pos++;
        this.expectName();
        return;
      case TokenKind.NAME:
      case TokenKind.INT:
      case TokenKind.FLOAT:
      case TokenKind.STRING:
      case TokenKind.BLOCK_STRING:
        this.pos++;
        return;
      default:
        throw this.unexpected(token, "a value");
    }
  }

  // --- skipping ---

  private skipImplements(): void {
    const token = this.peek();
    if (token?.kind !== TokenKind.NAME || token.value !== "implements") return;
    this.pos++;
    this.accept(TokenKind.AMP);
    this.expectName();
    for (;;) {
      if (this.accept(TokenKind.AMP)) {
        this.expectName();
      } else if (this.at(TokenKind.NAME) && !this.atDefinitionStart()) {
        // Legacy comma/space separated interface lists.
        this.pos++;
      } else {
        return;
      }
    }
  }

  private skipDirectives(): void {
    while (this.accept(TokenKind.AT)) {
      this.expectName();
      if (this.at(TokenKind.PAREN_L)) {
        this.skipBalanced(TokenKind.PAREN_L, TokenKind.PAREN_R);
      }
    }
  }

  private skipDirectiveDefinition(): void {
    this.expect(TokenKind.AT, "@");
    this.expectName();
    if (this.at(TokenKind.PAREN_L)) {
      this.skipBalanced(TokenKind.PAREN_L, TokenKind.PAREN_R);
    }
    if (this.peekName() === "repeatable") this.pos++;
    if (this.peekName() !== "on") {
      throw this.unexpected(this.peek(), '"on"');
    }
    this.pos++;
    this.accept(TokenKind.PIPE);
    this.expectName();
    while (this.accept(TokenKind.PIPE)) this.expectName();
  }

  /** Skip an optional balanced group starting at `open`. */
  private skipBalanced(open: TokenKind, close: TokenKind): void {
    if (!this.at(open)) return;
    let depth = 0;
    for (let token = this.peek(); token; token = this.peek()) {
      this.pos++;
      if (token.kind === open) depth++;
      else if (token.kind === close && --depth === 0) return;
    }
    throw this.unexpected(undefined, `"${close}"`);
  }

  /** Advance to the next top-level definition, skipping nested groups. */
  private recoverToDefinition(): void {
    let depth = 0;
    for (let token = this.peek(); token; token = this.peek()) {
      if (depth === 0 && this.atDefinitionStart()) return;
      depth = Math.max(0, depth + nesting(token));
      this.pos++;
    }
  }

  /**
   * Advance to the next member of the enclosing block: a name or description
   * on a later line than the failure, or the block's closing brace.
   */
  private recoverToMember(failedAt: Token | undefined): void {
    const line = failedAt?.line ?? 0;
    let depth = 0;
    for (let token = this.peek(); token; token = this.peek()) {
      if (depth === 0) {
        if (token.kind === TokenKind.BRACE_R) return;
        if (token.line > line && isMemberStart(token)) return;
      }
      depth = Math.max(0, depth + nesting(token));
      this.pos++;
    }
  }

  /** A definition keyword (optionally after a description) followed by its name. */
  private atDefinitionStart(): boolean {
    const first = this.peek();
    if (!first) return false;
    const offset = isDescription(first) ? 1 : 0;
    const keyword = this.peek(offset);
    const after = this.peek(offset + 1);
    return (
      keyword?.kind === TokenKind.NAME &&
      DEFINITION_KEYWORDS.has(keyword.value) &&
      (after?.kind === TokenKind.NAME ||
        after?.kind === TokenKind.AT ||
        after?.kind === TokenKind.BRACE_L)
    );
  }

  /**
   * Inside a block, a definition keyword only ends the block early (an
   * unclosed `{`) when it opens a line, has its name on that line, and the
   * name is followed by `{`, `=`, `@`, `implements` or the end of the
   * document. Enum values and fields may themselves be named `type`,
   * `input` and so on.
   */
  private atDefinitionInBlock(): boolean {
    const first = this.peek();
    const previous = this.tokens[this.pos - 1];
    if (!first || (previous && first.line <= previous.line)) return false;

    const offset = isDescription(first) ? 1 : 0;
    const keyword = this.peek(offset);
    const name = this.peek(offset + 1);
    if (
      keyword?.kind !== TokenKind.NAME ||
      !DEFINITION_KEYWORDS.has(keyword.value) ||
      name?.kind !== TokenKind.NAME ||
      name.line !== keyword.line
    ) {
      return false;
    }

    const after = this.peek(offset + 2);
    return (
      after === undefined ||
      after.kind === TokenKind.BRACE_L ||
      after.kind === TokenKind.EQUALS ||
      after.kind === TokenKind.AT ||
      (after.kind === TokenKind.NAME && after.value === "implements")
    );
  }

  // --- token helpers ---

  private parseDescription(): string | undefined {
    const token = this.peek();
    if (!token || !isDescription(token)) return undefined;
    this.pos++;
    return token.value;
  }

  private peek(offset = 0): Token | undefined {
    return this.tokens[this.pos + offset];
  }

  private peekName(): string | undefined {
    const token = this.peek();
    return token?.kind === TokenKind.NAME ? token.value : undefined;
  }

  private at(kind: TokenKind): boolean {
    return this.peek()?.kind === kind;
  }

  private accept(kind: TokenKind): boolean {
    if (!this.at(kind)) return false;
    this.pos++;
    return true;
  }

  private expect(kind: TokenKind, expected: string): void {
    if (!this.accept(kind)) throw this.unexpected(this.peek(), `"${expected}"`);
  }

  private expectName(): string {
    const token = this.peek();
    if (token?.kind !== TokenKind.NAME) throw this.unexpected(token, "a name");
    this.pos++;
    return token.value;
  }

  private expectClosing(owner: string): void {
    if (!this.accept(TokenKind.BRACE_R)) {
      this.warnings.push(`${owner}: expected "}" to close the block`);
    }
  }

  private unexpected(token: Token | undefined, expected: string): SyntaxIssue {
    if (!token) {
      return new SyntaxIssue(
        `Unexpected end of document, expected ${expected}`,
        undefined
      );
    }
    const found = token.kind === TokenKind.NAME ? `name "${token.value}"` : `"${token.kind}"`;
    return new SyntaxIssue(
      `Unexpected ${found} at line ${token.line}, column ${token.column}, expected ${expected}`,
      token
    );
  }
}

function describe(description: string | undefined): { description?: string } {
  return description ? { description } : {};
}

function nesting(token: Token): number {
  switch (token.kind) {
    case TokenKind.BRACE_L:
    case TokenKind.BRACKET_L:
    case TokenKind.PAREN_L:
      return 1;
    case TokenKind.BRACE_R:
    case TokenKind.BRACKET_R:
    case TokenKind.PAREN_R:
      return -1;
    default:
      return 0;
  }
}

function isDescription(token: Token): boolean {
  return token.kind === TokenKind.STRING || token.kind === TokenKind.BLOCK_STRING;
}

function isMemberStart(token: Token): boolean {
  return token.kind === TokenKind.NAME || isDescription(token);
}
