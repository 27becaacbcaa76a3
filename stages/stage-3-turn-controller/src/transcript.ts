import type { Message } from "../../stage-0-inference-client/src/types.js";
import type { ToolExchange, Transcript } from "./types.js";

/**
 * Pair every tool call with its result message by position: the results
 * that follow an assistant turn answer its calls in request order.
 * Provider call ids are not trusted to be unique.
 */
export function buildTranscript(
  messages: readonly Message[],
  finalAnswer?: string
): Transcript {
  const userRequest =
    messages.find((m) => m.role === "user")?.content ?? "";

  const toolExchanges: ToolExchange[] = [];
  let pending: ToolExchange[] = [];
  for (const message of messages) {
    if (message.role === "assistant") {
      pending = message.toolCalls.map((call) => ({
        callId: call.id,
        toolName: call.name,
        arguments: call.arguments,
        result: "(no result)",
        isError: true,
      }));
      toolExchanges.push(...pending);
    } else if (message.role === "tool") {
      const exchange = pending.shift();
      if (exchange) {
        exchange.result = message.content;
        exchange.isError = message.isError;
      }
    }
  }

  return { userRequest, toolExchanges, finalAnswer, messages };
}
