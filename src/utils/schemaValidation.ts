import { Ajv } from 'ajv';
import type { ErrorObject, Schema, ValidateFunction } from 'ajv';

export const ajv = new Ajv({ allErrors: true, strict: false });

export function compileSchema<T>(schema: Schema): ValidateFunction<T> {
  return ajv.compile<T>(schema);
}

export function formatSchemaErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors || []).map(err => `${err.instancePath || '(root)'} ${err.message || ''}`.trim());
}
