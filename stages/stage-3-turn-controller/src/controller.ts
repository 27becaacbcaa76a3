/**
 * Turn Controller: drive one conversation through the model / tool loop
 * as an explicit state machine, bounded by a turn budget.
 */

import { ConfigurationError } from "../../stage-0-inference-client/src/errors.js";
import type {
  ToolCallRequest,
  ToolResultMessage,
} from "../../stage-0-inference-client/src/types.js";
import { ValidationError } from "../../stage-2-tool-registry/src/errors.js";
import type { ToolRegistry } from "../../stage-2-tool-registry/src/types.js";
import { createConversation, type Conversation } from "./conversation.js";
import { TurnLimitExceededError } from "./errors.js";
import { buildTranscript } from "./transcript.js";
import type {
  TurnController,
  TurnControllerDeps,
  TurnControllerOptions,
  TurnRunOptions,
  TurnResult,
  TurnState,
} from "./types.js";

export const DEFAULT_MAX_TURNS = 6;

export const DEFAULT_SYSTEM_PROMPT = `You are a helpful assistant with access to tools.
Call a tool whenever it can provide information or a computation the user asked for; you may call several tools at once.
After tool results arrive, answer the user directly and mention every part of their request.
If a tool reports an error, explain the problem to the user instead of retrying the same call.`;

/**
 * Run one tool call. Bad arguments and unknown tools become error results
 * so the model can see what went wrong; anything else propagates.
 */
export async function dispatchToolCall(
  registry: ToolRegistry,
  call: ToolCallRequest
): Promise<ToolResultMessage> {
  try {
    const result = await registry.invoke(call.name, call.arguments);
    return {
      role: "tool",
      toolCallId: call.id,
      toolName: call.name,
      content: result.content,
      isError: result.isError,
    };
  } catch (err) {
    if (err instanceof ValidationError) {
      return {
        role: "tool",
        toolCallId: call.id,
        toolName: call.name,
        content: `Error: ${err.message}`,
        isError: true,
      };
    }
    throw err;
  }
}

export function createTurnController(
  deps: TurnControllerDeps,
  options: TurnControllerOptions = {}
): TurnController {
  const maxTurns = options.maxTurns ?? DEFAULT_MAX_TURNS;
  if (!Number.isInteger(maxTurns) || maxTurns < 1) {
    throw new ConfigurationError(
      `maxTurns must be a positive integer, got ${maxTurns}.`
    );
  }
  if (!deps.client.supportsTools) {
    throw new ConfigurationError(
      `Model "${deps.client.model}" is not declared tool-capable; the turn controller needs native tool calls.`
    );
  }
  const systemPrompt = options.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;

  async function step(
    state: TurnState,
    conversation: Conversation,
    runOptions: TurnRunOptions
  ): Promise<TurnState> {
    switch (state.status) {
      case "awaiting_model": {
        if (state.turn >= maxTurns) {
          throw new TurnLimitExceededError(
            maxTurns,
            buildTranscript(conversation.messages)
          );
        }
        if (!conversation.isReadyForModel()) {
          throw new Error(
            "Conversation must end with a user or tool message before calling the model."
          );
        }

        const response = await deps.client.completeWithTools(
          conversation.messages,
          deps.registry.list(),
          {
            systemPrompt,
            temperature: options.temperature,
            maxTokens: options.maxTokens,
            abortSignal: runOptions.abortSignal,
          }
        );
        const turn = state.turn + 1;

        if (response.kind === "final_answer") {
          conversation.append({
            role: "assistant",
            content: response.text,
            toolCalls: [],
          });
          return { status: "answering", turn, answer: response.text };
        }

        conversation.append({
          role: "assistant",
          content: response.text,
          toolCalls: response.calls,
        });
        return { status: "calling_tools", turn, calls: response.calls };
      }

      case "calling_tools": {
        // 按请求顺序逐个执行；每个结果都独立回注
        for (const call of state.calls) {
          conversation.append(await dispatchToolCall(deps.registry, call));
        }
        return { status: "awaiting_model", turn: state.turn };
      }

      case "answering":
        return { status: "done", turn: state.turn, answer: state.answer };

      case "done":
        return state;
    }
  }

  return {
    maxTurns,

    async run(
      userMessage: string,
      runOptions: TurnRunOptions = {}
    ): Promise<TurnResult> {
      const conversation = createConversation(userMessage);
      let state: TurnState = { status: "awaiting_model", turn: 0 };
      options.onTransition?.(state, conversation.messages);

      while (state.status !== "done") {
        state = await step(state, conversation, runOptions);
        options.onTransition?.(state, conversation.messages);
      }

      const messages = conversation.messages;
      return {
        answer: state.answer,
        messages,
        transcript: buildTranscript(messages, state.answer),
        turns: state.turn,
      };
    },
  };
}
