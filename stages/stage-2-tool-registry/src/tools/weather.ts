import type { Tool } from "../types.js";

export interface GetWeatherArgs {
  location: string;
}

/** Stub lookup: no external call, same report for every location. */
export const getWeatherTool: Tool<GetWeatherArgs> = {
  spec: {
    name: "get_weather",
    description:
      "Get the current weather for a location. Use when the user asks about weather, temperature or conditions somewhere.",
    parameters: {
      type: "object",
      properties: {
        location: {
          type: "string",
          minLength: 1,
          maxLength: 100,
          description: "City or place name, e.g. Paris or San Francisco, CA",
        },
      },
      required: ["location"],
      additionalProperties: false,
    },
  },
  execute({ location }) {
    return `The weather in ${location} is sunny with a temperature of 22°C (72°F), light winds and 40% humidity.`;
  },
};
