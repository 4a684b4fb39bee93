/**
 * Errors raised while generating code. Nothing here is thrown by generated
 * code at request time.
 */

export interface SchemaFetchErrorOptions {
  status?: number;
  cause?: unknown;
}

/**
 * The introspection request failed, returned a non-2xx status, or produced a
 * body without `data.__schema`.
 */
export class SchemaFetchError extends Error {
  readonly status: number | undefined;

  constructor(message: string, options: SchemaFetchErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "SchemaFetchError";
    this.status = options.status;
  }
}

/** A projection does not narrow its declared full type. */
export class ProjectionError extends Error {
  readonly projection: string;
  readonly field: string;
  /** Description of the full type's field, or undefined when it is missing. */
  readonly expected: string | undefined;
  readonly actual: string | undefined;

  constructor(
    message: string,
    details: {
      projection: string;
      field: string;
      expected?: string;
      actual?: string;
    }
  ) {
    super(message);
    this.name = "ProjectionError";
    this.projection = details.projection;
    this.field = details.field;
    this.expected = details.expected;
    this.actual = details.actual;
  }
}
