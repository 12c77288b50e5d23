/** Helpers to translate AJV error structures into human-readable diagnostics. */
import type { ErrorObject } from 'ajv';
import type { SchemaIssue } from './types.js';

function decodePointerSegment(segment: string): string {
  return segment.replace(/~1/g, '/').replace(/~0/g, '~');
}

export function formatInstancePath(instancePath: string): string {
  if (!instancePath) {
    return 'response';
  }

  const segments = instancePath
    .split('/')
    .filter(Boolean)
    .map((segment) => decodePointerSegment(segment));

  let pathLabel = 'response';
  for (const segment of segments) {
    if (/^\d+$/.test(segment)) {
      pathLabel += `[${segment}]`;
    } else if (/^[A-Za-z_$][\w$]*$/.test(segment)) {
      pathLabel += `.${segment}`;
    } else {
      pathLabel += `['${segment}']`;
    }
  }

  return pathLabel;
}

export function buildSchemaErrorMessage(error: ErrorObject): string {
  const { params } = error;

  if (error.keyword === 'required' && typeof params.missingProperty === 'string') {
    return `Missing required property "${params.missingProperty}".`;
  }

  if (error.keyword === 'additionalProperties' && typeof params.additionalProperty === 'string') {
    return `Unexpected property "${params.additionalProperty}".`;
  }

  if (error.keyword === 'type' && typeof params.type === 'string') {
    return `Must be of type ${params.type}.`;
  }

  return (error.message ?? 'failed validation.').trim();
}

export function describeSchemaError(error: ErrorObject): SchemaIssue {
  return {
    path: formatInstancePath(error.instancePath),
    message: buildSchemaErrorMessage(error),
    keyword: error.keyword,
  };
}

/** Joins issues into a single line suitable for a corrective prompt. */
export function formatSchemaIssues(issues: readonly SchemaIssue[]): string {
  if (issues.length === 0) {
    return 'Schema validation failed.';
  }
  return issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ');
}
