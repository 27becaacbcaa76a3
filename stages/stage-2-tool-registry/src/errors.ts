import type { SchemaIssue } from "../../stage-1-output-control/src/types.js";
import { formatIssues } from "../../stage-1-output-control/src/validate.js";

export class DuplicateNameError extends Error {
  readonly toolName: string;

  constructor(toolName: string) {
    super(`Tool already registered: ${toolName}`);
    this.name = "DuplicateNameError";
    this.toolName = toolName;
  }
}

/** Arguments (or the tool name) chosen by the caller or model are invalid. */
export class ValidationError extends Error {
  readonly toolName: string;
  readonly issues: SchemaIssue[];

  constructor(toolName: string, issues: SchemaIssue[], message?: string) {
    super(
      message ??
        `Invalid arguments for tool "${toolName}": ${formatIssues(issues)}`
    );
    this.name = "ValidationError";
    this.toolName = toolName;
    this.issues = issues;
  }
}

/** A tool implementation failed. Thrown by tools, caught by the registry. */
export class ToolExecutionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ToolExecutionError";
  }
}
