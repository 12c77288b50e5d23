/**
 * AJV-backed validators for structured model replies with readable errors.
 */
import { Ajv, type JSONSchemaType } from 'ajv';
import { describeSchemaError } from './schemaErrors.js';
import type { ResponseSchema, SchemaCheckResult } from './types.js';

const ajv = new Ajv({ allErrors: true, strict: false });

/**
 * Compiles `jsonSchema` once and wraps it as a {@link ResponseSchema}. Values
 * that pass AJV are handed to `normalize` to produce the typed result.
 */
export function defineResponseSchema<Wire, T>(
  name: string,
  jsonSchema: JSONSchemaType<Wire>,
  normalize: (wire: Wire) => T,
): ResponseSchema<T> {
  const validate = ajv.compile(jsonSchema);

  return {
    name,
    check(payload: unknown): SchemaCheckResult<T> {
      if (validate(payload)) {
        return { valid: true, value: normalize(payload) };
      }

      const issues = (validate.errors ?? []).map((error) => describeSchemaError(error));
      if (issues.length === 0) {
        issues.push({ path: 'response', message: `Does not match the ${name} schema.`, keyword: 'unknown' });
      }
      return { valid: false, issues };
    },
  };
}
