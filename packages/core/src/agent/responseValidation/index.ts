export { defineResponseSchema } from './schemaValidation.js';
export { describeSchemaError, formatInstancePath, formatSchemaIssues } from './schemaErrors.js';
export type { ResponseSchema, SchemaCheckResult, SchemaIssue } from './types.js';
