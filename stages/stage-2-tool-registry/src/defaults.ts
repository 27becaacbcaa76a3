import { registerTool, createToolRegistry } from "./registry.js";
import { calculateTool } from "./tools/calculator.js";
import { getWeatherTool } from "./tools/weather.js";
import type { ToolRegistry } from "./types.js";

/** Registry with get_weather and calculate, in that order. */
export function createDefaultToolRegistry(): ToolRegistry {
  const registry = createToolRegistry();
  registerTool(registry, getWeatherTool);
  registerTool(registry, calculateTool);
  return registry;
}
