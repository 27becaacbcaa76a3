/**
 * Tool Registry: register tools by name, list specs for the model, invoke
 * by name with locally validated arguments.
 */

import { compileSchema } from "../../stage-1-output-control/src/validate.js";
import { DuplicateNameError, ToolExecutionError, ValidationError } from "./errors.js";
import type {
  Tool,
  ToolImplementation,
  ToolInvocationResult,
  ToolRegistry,
  ToolSpec,
} from "./types.js";

interface RegisteredTool {
  spec: ToolSpec;
  run(args: unknown): Promise<ToolInvocationResult>;
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object") {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

function toExecutionError(err: unknown): ToolExecutionError {
  if (err instanceof ToolExecutionError) {
    return err;
  }
  const message = err instanceof Error ? err.message : String(err);
  return new ToolExecutionError(message, { cause: err });
}

export function createToolRegistry(): ToolRegistry {
  const tools = new Map<string, RegisteredTool>();

  return {
    register<TArgs>(
      spec: ToolSpec,
      implementation: ToolImplementation<TArgs>
    ): void {
      const name = spec.name.trim();
      if (!name) {
        throw new Error("Tool name is required");
      }
      if (tools.has(name)) {
        throw new DuplicateNameError(name);
      }

      const frozen = deepFreeze(structuredClone({ ...spec, name }));
      const validate = compileSchema<TArgs>(frozen.parameters);

      tools.set(name, {
        spec: frozen,
        async run(args: unknown): Promise<ToolInvocationResult> {
          const validation = validate(args);
          if (!validation.valid) {
            throw new ValidationError(name, validation.issues);
          }
          try {
            const content = await implementation(validation.data);
            return { toolName: name, content, isError: false };
          } catch (err) {
            const failure = toExecutionError(err);
            return {
              toolName: name,
              content: `Error executing ${name}: ${failure.message}`,
              isError: true,
            };
          }
        },
      });
    },

    has(name: string): boolean {
      return tools.has(name);
    },

    list(): readonly ToolSpec[] {
      return Array.from(tools.values(), (tool) => tool.spec);
    },

    async invoke(name: string, args: unknown): Promise<ToolInvocationResult> {
      const tool = tools.get(name);
      if (!tool) {
        const available = Array.from(tools.keys()).join(", ") || "none";
        throw new ValidationError(
          name,
          [
            {
              field: "name",
              constraint: "registered tool",
              message: "is not a registered tool",
            },
          ],
          `Unknown tool "${name}". Available tools: ${available}`
        );
      }
      return tool.run(args);
    },
  };
}

export function registerTool<TArgs>(
  registry: ToolRegistry,
  tool: Tool<TArgs>
): void {
  registry.register(tool.spec, tool.execute);
}
