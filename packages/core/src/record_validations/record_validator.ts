import type { ErrorObject } from "ajv";
import { ValidationError } from "../errors";
import type { FieldError } from "../errors";
import { SchemaValidationCache } from "../record_schemas";
import type { RecordSchemaName } from "../record_schemas";

export type RecordValidationResult = {
  isValid: boolean;
  errors: FieldError[];
};

function paramAsString(error: ErrorObject, key: string): string | null {
  const value: unknown = error.params[key];
  return typeof value === "string" ? value : null;
}

/**
 * Turns an AJV instance path into a dotted field name.
 * Errors raised on the parent object name the property through their params.
 */
export function formatFieldPath(error: ErrorObject): string {
  const base = error.instancePath.replace(/^\//, "").split("/").filter(Boolean).join(".");
  const child = paramAsString(error, "missingProperty") ?? paramAsString(error, "additionalProperty");
  if (child) {
    return base ? `${base}.${child}` : child;
  }
  return base || "root";
}

/**
 * Validates `data` against a named schema and returns every field error.
 * Use this in factories for comprehensive error reporting.
 */
export function validateRecordDetailed(schemaName: RecordSchemaName, data: unknown): RecordValidationResult {
  const validate = SchemaValidationCache.getValidator(schemaName);
  const isValid = validate(data) === true;
  const errors = (validate.errors ?? []).map((error) => ({
    field: formatFieldPath(error),
    message: error.message ?? "Validation failed",
  }));
  return { isValid, errors };
}

/**
 * Throws a ValidationError naming the first offending field; `details` holds all of them.
 */
export function assertValidRecord<T>(schemaName: RecordSchemaName, data: T): T {
  const { isValid, errors } = validateRecordDetailed(schemaName, data);
  const [first] = errors;
  if (!isValid && first) {
    throw new ValidationError(first.field, first.message, errors);
  }
  if (!isValid) {
    throw new ValidationError("root", `does not match ${schemaName}`);
  }
  return data;
}
