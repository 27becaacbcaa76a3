/**
 * Compile JSON Schemas with ajv into typed validators that report each
 * violation as field + constraint.
 */

import AjvImport, { type ErrorObject, type ValidateFunction } from "ajv";
import type {
  JsonSchema,
  SchemaIssue,
  SchemaValidator,
  ValidationResult,
} from "./types.js";

interface AjvInstance {
  compile<T = unknown>(schema: JsonSchema): ValidateFunction<T>;
}

type AjvConstructorType = new (opts?: { allErrors?: boolean }) => AjvInstance;

const AjvConstructor = (
  typeof AjvImport === "function"
    ? AjvImport
    : (AjvImport as unknown as { default: AjvConstructorType }).default
) as AjvConstructorType;

const ajv = new AjvConstructor({ allErrors: true });

function param(error: ErrorObject, key: string): unknown {
  const params: Record<string, unknown> = error.params;
  return params[key];
}

function toField(error: ErrorObject): string {
  const property =
    error.keyword === "required"
      ? param(error, "missingProperty")
      : error.keyword === "additionalProperties"
        ? param(error, "additionalProperty")
        : undefined;
  const segments = error.instancePath.split("/").filter(Boolean);
  if (typeof property === "string") {
    segments.push(property);
  }
  return segments.length > 0 ? segments.join(".") : "(root)";
}

function toConstraint(error: ErrorObject): string {
  const limit = param(error, "limit");
  if (typeof limit === "number") {
    return `${error.keyword} ${limit}`;
  }
  const allowed = param(error, "allowedValues");
  if (Array.isArray(allowed)) {
    return `${error.keyword} [${allowed.map(String).join(", ")}]`;
  }
  const type = param(error, "type");
  if (typeof type === "string") {
    return `${error.keyword} ${type}`;
  }
  return error.keyword;
}

function toMessage(error: ErrorObject): string {
  switch (error.keyword) {
    case "required":
      return "is required";
    case "additionalProperties":
      return "is not allowed";
    default:
      return error.message ?? `violates ${error.keyword}`;
  }
}

export function toSchemaIssues(
  errors: ErrorObject[] | null | undefined
): SchemaIssue[] {
  return (errors ?? []).map((error) => ({
    field: toField(error),
    constraint: toConstraint(error),
    message: toMessage(error),
  }));
}

export function formatIssues(issues: readonly SchemaIssue[]): string {
  return issues
    .map((issue) => `${issue.field} ${issue.message} (${issue.constraint})`)
    .join("; ");
}

/**
 * Compile once, validate many times. Throws when the schema itself is
 * invalid, so bad tool definitions fail at registration.
 */
export function compileSchema<T>(schema: JsonSchema): SchemaValidator<T> {
  const validate = ajv.compile<T>(schema);
  return (data: unknown): ValidationResult<T> => {
    if (validate(data)) {
      return { valid: true, data };
    }
    return { valid: false, issues: toSchemaIssues(validate.errors) };
  };
}
