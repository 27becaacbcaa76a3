import type { ToolDefinition } from "../../stage-0-inference-client/src/types.js";
import type { JsonSchema } from "../../stage-1-output-control/src/types.js";
import type { Transcript } from "../../stage-3-turn-controller/src/types.js";

const judgment = (valueKey: string, value: JsonSchema): JsonSchema => ({
  type: "object",
  properties: {
    [valueKey]: value,
    rationale: { type: "string" },
  },
  required: [valueKey, "rationale"],
});

/** Extra keys from the model are tolerated; missing or mistyped ones are not. */
export const VERDICT_SCHEMA: JsonSchema = {
  type: "object",
  properties: {
    tool_selection: judgment("correct", { type: "boolean" }),
    response_quality: judgment("score", {
      type: "integer",
      minimum: 1,
      maximum: 5,
    }),
    overall_success: judgment("success", { type: "boolean" }),
  },
  required: ["tool_selection", "response_quality", "overall_success"],
};

function formatArguments(args: unknown): string {
  return typeof args === "string" ? args : JSON.stringify(args);
}

function formatTools(tools: readonly ToolDefinition[]): string {
  return tools.map((t) => `- ${t.name}: ${t.description}`).join("\n");
}

export function buildEvaluationPrompt(
  transcript: Transcript,
  tools: readonly ToolDefinition[] = []
): string {
  const toolCalls =
    transcript.toolExchanges.length > 0
      ? transcript.toolExchanges
          .map(
            (exchange, index) =>
              `${index + 1}. ${exchange.toolName}(${formatArguments(exchange.arguments)}) -> ${
                exchange.isError ? "[error] " : ""
              }${exchange.result}`
          )
          .join("\n")
      : "(no tools were called)";

  const sections = [
    "You are grading an AI assistant that can call tools. Review the interaction below.",
    `## User request\n${transcript.userRequest}`,
  ];
  if (tools.length > 0) {
    sections.push(`## Tools available to the assistant\n${formatTools(tools)}`);
  }
  sections.push(
    `## Tool calls and results (in order)\n${toolCalls}`,
    `## Final answer\n${transcript.finalAnswer ?? "(no final answer was produced)"}`,
    `## Criteria
1. tool_selection: did the assistant call the right tools with sensible arguments, and avoid unnecessary calls? (true/false)
2. response_quality: is the final answer accurate with respect to the tool results, complete and clear? (integer 1-5)
3. overall_success: did the assistant accomplish what the user asked, including reporting tool errors honestly? (true/false)`,
    `Respond with exactly one JSON object and nothing else:
{"tool_selection": {"correct": true, "rationale": "..."}, "response_quality": {"score": 4, "rationale": "..."}, "overall_success": {"success": true, "rationale": "..."}}`
  );

  return sections.join("\n\n");
}
