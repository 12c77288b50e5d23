export interface SchemaIssue {
  /** Readable location such as `response.run_command`. */
  path: string;
  message: string;
  keyword: string;
}

export type SchemaCheckResult<T> =
  | { valid: true; value: T }
  | { valid: false; issues: SchemaIssue[] };

/**
 * A structured reply format. `check` validates a parsed JSON value and, when
 * it conforms, returns it in its normalized typed form.
 */
export interface ResponseSchema<T> {
  readonly name: string;
  check(payload: unknown): SchemaCheckResult<T>;
}
