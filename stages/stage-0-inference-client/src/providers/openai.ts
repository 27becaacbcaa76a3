import { RemoteUnavailableError } from "../errors.js";
import type {
  Message,
  OpenAICompatibleConfig,
  ProviderName,
  ProviderRequest,
  ProviderResult,
  ToolCallRequest,
} from "../types.js";
import { parseErrorMessage, uniqueCallId, type LLMProvider } from "./types.js";

const DEFAULT_OPENAI_BASE_URL = "https://api.openai.com/v1";

type WireMessage =
  | { role: "system" | "user"; content: string }
  | {
      role: "assistant";
      content: string | null;
      tool_calls?: WireToolCall[];
    }
  | { role: "tool"; tool_call_id: string; content: string };

interface WireToolCall {
  id: string;
  type: "function";
  function: { name: string; arguments: string };
}

interface ChatCompletionResponse {
  choices?: Array<{
    message?: {
      content?: string | null;
      tool_calls?: Array<{
        id?: string;
        function?: { name?: string; arguments?: unknown };
      }>;
    };
    finish_reason?: string;
  }>;
  usage?: {
    prompt_tokens?: number;
    completion_tokens?: number;
    total_tokens?: number;
  };
}

function buildHeaders(config: OpenAICompatibleConfig): Record<string, string> {
  const headers: Record<string, string> = {
    "Content-Type": "application/json",
  };

  if (config.apiKey) {
    headers.Authorization = `Bearer ${config.apiKey}`;
  }
  if (config.organization) {
    headers["OpenAI-Organization"] = config.organization;
  }

  return headers;
}

function toWireMessage(message: Message): WireMessage {
  switch (message.role) {
    case "user":
      return { role: "user", content: message.content };
    case "assistant":
      if (message.toolCalls.length === 0) {
        return { role: "assistant", content: message.content };
      }
      return {
        role: "assistant",
        content: message.content || null,
        tool_calls: message.toolCalls.map((call) => ({
          id: call.id,
          type: "function",
          function: {
            name: call.name,
            arguments:
              typeof call.arguments === "string"
                ? call.arguments
                : JSON.stringify(call.arguments ?? {}),
          },
        })),
      };
    case "tool":
      return {
        role: "tool",
        tool_call_id: message.toolCallId,
        content: message.content,
      };
  }
}

/**
 * Function arguments arrive as JSON text. Text that does not parse is kept
 * as-is so schema validation reports it instead of the client guessing.
 */
export function parseToolArguments(raw: unknown): unknown {
  if (typeof raw !== "string") {
    return raw ?? {};
  }
  if (raw.trim() === "") {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch {
    return raw;
  }
}

function buildBody(request: ProviderRequest): Record<string, unknown> {
  const messages: WireMessage[] = [];
  if (request.systemPrompt) {
    messages.push({ role: "system", content: request.systemPrompt });
  }
  messages.push(...request.messages.map(toWireMessage));

  const body: Record<string, unknown> = {
    model: request.model,
    messages,
    temperature: request.temperature,
    max_tokens: request.maxTokens,
  };

  if (request.mode === "tools" && request.tools.length > 0) {
    body.tools = request.tools.map((tool) => ({
      type: "function",
      function: {
        name: tool.name,
        description: tool.description,
        parameters: tool.parameters,
      },
    }));
    body.tool_choice = "auto";
  }

  return body;
}

async function callOpenAICompatible(
  providerName: ProviderName,
  request: ProviderRequest,
  config: OpenAICompatibleConfig,
  defaultBaseUrl: string
): Promise<ProviderResult> {
  const baseUrl = config.baseUrl ?? defaultBaseUrl;
  const response = await fetch(`${baseUrl}/chat/completions`, {
    method: "POST",
    headers: buildHeaders(config),
    body: JSON.stringify(buildBody(request)),
    signal: request.abortSignal,
  });

  if (!response.ok) {
    const errorDetails = await parseErrorMessage(response);
    throw new RemoteUnavailableError({
      provider: providerName,
      message: errorDetails.message,
      status: response.status,
      code: errorDetails.code,
    });
  }

  const data = (await response.json()) as ChatCompletionResponse;
  const choice = data.choices?.[0];
  if (!choice?.message) {
    throw new RemoteUnavailableError({
      provider: providerName,
      message: "Chat completion response contained no choices.",
      status: response.status,
    });
  }

  const seenIds = new Set<string>();
  const toolCalls: ToolCallRequest[] = (choice.message.tool_calls ?? []).map(
    (call) => ({
      id: uniqueCallId(call.id, seenIds),
      name: call.function?.name ?? "",
      arguments: parseToolArguments(call.function?.arguments),
    })
  );

  return {
    content: choice.message.content ?? "",
    toolCalls,
    finishReason: choice.finish_reason,
    usage: data.usage
      ? {
          inputTokens: data.usage.prompt_tokens ?? 0,
          outputTokens: data.usage.completion_tokens ?? 0,
          totalTokens: data.usage.total_tokens ?? 0,
        }
      : undefined,
  };
}

export function createOpenAICompatibleProvider(
  providerName: ProviderName,
  config: OpenAICompatibleConfig,
  defaultBaseUrl: string = DEFAULT_OPENAI_BASE_URL
): LLMProvider {
  return {
    name: providerName,
    chat(request: ProviderRequest) {
      return callOpenAICompatible(
        providerName,
        request,
        config,
        defaultBaseUrl
      );
    },
  };
}
