export { createOutputController } from "./controller.js";
export { extractJson, type ExtractResult } from "./parse.js";
export { compileSchema, formatIssues, toSchemaIssues } from "./validate.js";
export type {
  JsonSchema,
  OutputController,
  OutputControllerConfig,
  ParseResult,
  SchemaIssue,
  SchemaValidator,
  ValidationResult,
} from "./types.js";
