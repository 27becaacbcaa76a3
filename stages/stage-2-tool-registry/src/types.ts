/**
 * Stage 2 Tool Registry types.
 * A tool is a spec the model sees plus an implementation we run locally.
 */

import type { ToolDefinition } from "../../stage-0-inference-client/src/types.js";
import type { JsonSchema } from "../../stage-1-output-control/src/types.js";

/** Name, description and JSON Schema for the arguments. Frozen once registered. */
export interface ToolSpec extends ToolDefinition {
  parameters: JsonSchema;
}

/**
 * Receives arguments that already passed schema validation and returns a
 * natural-language result. Throwing is allowed: the registry reports it.
 */
export type ToolImplementation<TArgs> = (
  args: TArgs
) => string | Promise<string>;

/** A spec bundled with its implementation, for defining tools as values. */
export interface Tool<TArgs> {
  spec: ToolSpec;
  execute: ToolImplementation<TArgs>;
}

export interface ToolInvocationResult {
  toolName: string;
  /** Result text, or a description of the failure when `isError`. */
  content: string;
  isError: boolean;
}

export interface ToolRegistry {
  /** Fails with DuplicateNameError when the name is taken. */
  register<TArgs>(spec: ToolSpec, implementation: ToolImplementation<TArgs>): void;
  has(name: string): boolean;
  /** Frozen specs in registration order. */
  list(): readonly ToolSpec[];
  /**
   * Validate then run. Fails with ValidationError for bad arguments or an
   * unknown tool; implementation failures come back as `isError` results.
   */
  invoke(name: string, args: unknown): Promise<ToolInvocationResult>;
}
