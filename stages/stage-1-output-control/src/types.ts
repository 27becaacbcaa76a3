/**
 * Stage 1 Output Control types.
 * Model output and model-chosen arguments are untrusted: everything is
 * parsed and validated before use.
 */

/** JSON Schema (draft-07 style). */
export type JsonSchema = Record<string, unknown>;

/** One schema violation, named by field and the constraint it broke. */
export interface SchemaIssue {
  /** Dotted path of the offending field, or "(root)". */
  field: string;
  /** Keyword plus its limit, e.g. "maxLength 100" or "enum [add, subtract]". */
  constraint: string;
  message: string;
}

export type ValidationResult<T> =
  | { valid: true; data: T }
  | { valid: false; issues: SchemaIssue[] };

/** A compiled schema; narrows `unknown` input to `T` on success. */
export type SchemaValidator<T> = (data: unknown) => ValidationResult<T>;

export type ParseResult<T> =
  | { success: true; data: T }
  | { success: false; errors: string[]; raw: string };

export interface OutputControllerConfig {
  /** Strip ```json ... ``` wrappers before parsing (default true). */
  stripMarkdownCodeBlock?: boolean;
  /** How much of the offending text to keep on failure (default 500). */
  rawSnippetLength?: number;
}

export interface OutputController {
  /**
   * Extract the first JSON value from raw content and validate it.
   * Returns errors instead of throwing on parse or validation failure.
   */
  parseAndValidate<T>(
    content: string,
    validator: SchemaValidator<T>
  ): ParseResult<T>;
}
