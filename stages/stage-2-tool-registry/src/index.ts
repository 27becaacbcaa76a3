export { DuplicateNameError, ToolExecutionError, ValidationError } from "./errors.js";
export { createToolRegistry, registerTool } from "./registry.js";
export { createDefaultToolRegistry } from "./defaults.js";
export * from "./tools/index.js";
export type {
  Tool,
  ToolImplementation,
  ToolInvocationResult,
  ToolRegistry,
  ToolSpec,
} from "./types.js";
