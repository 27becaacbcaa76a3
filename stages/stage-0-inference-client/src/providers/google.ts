import { RemoteUnavailableError } from "../errors.js";
import type {
  GoogleConfig,
  Message,
  ProviderRequest,
  ProviderResult,
  ToolCallRequest,
} from "../types.js";
import { parseErrorMessage, uniqueCallId, type LLMProvider } from "./types.js";

const DEFAULT_GOOGLE_BASE_URL =
  "https://generativelanguage.googleapis.com/v1beta";

// Gemini accepts an OpenAPI subset and rejects these JSON Schema keywords.
const UNSUPPORTED_SCHEMA_KEYS = new Set(["additionalProperties", "$schema"]);

type Part =
  | { text: string }
  | { functionCall: { name: string; args: Record<string, unknown> } }
  | {
      functionResponse: {
        name: string;
        response: { content: string; isError: boolean };
      };
    };

interface ContentItem {
  role: "user" | "model";
  parts: Part[];
}

interface GenerateContentResponse {
  candidates?: Array<{
    content?: {
      parts?: Array<{
        text?: string;
        functionCall?: { id?: string; name?: string; args?: unknown };
      }>;
    };
    finishReason?: string;
  }>;
  usageMetadata?: {
    promptTokenCount?: number;
    candidatesTokenCount?: number;
    totalTokenCount?: number;
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function toGeminiSchema(schema: unknown): unknown {
  if (Array.isArray(schema)) {
    return schema.map(toGeminiSchema);
  }
  if (!isRecord(schema)) {
    return schema;
  }
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(schema)) {
    if (!UNSUPPORTED_SCHEMA_KEYS.has(key)) {
      out[key] = toGeminiSchema(value);
    }
  }
  return out;
}

/** Consecutive tool results are grouped into one user turn, as Gemini expects. */
export function toContents(messages: readonly Message[]): ContentItem[] {
  const contents: ContentItem[] = [];

  for (const message of messages) {
    if (message.role === "user") {
      contents.push({ role: "user", parts: [{ text: message.content }] });
      continue;
    }

    if (message.role === "assistant") {
      const parts: Part[] = [];
      if (message.content) {
        parts.push({ text: message.content });
      }
      for (const call of message.toolCalls) {
        parts.push({
          functionCall: {
            name: call.name,
            args: isRecord(call.arguments) ? call.arguments : {},
          },
        });
      }
      contents.push({ role: "model", parts });
      continue;
    }

    const part: Part = {
      functionResponse: {
        name: message.toolName,
        response: { content: message.content, isError: message.isError },
      },
    };
    const previous = contents[contents.length - 1];
    if (
      previous?.role === "user" &&
      previous.parts.every((p) => "functionResponse" in p)
    ) {
      previous.parts.push(part);
    } else {
      contents.push({ role: "user", parts: [part] });
    }
  }

  return contents;
}

export function createGoogleProvider(config: GoogleConfig): LLMProvider {
  return {
    name: "google",
    async chat(request: ProviderRequest): Promise<ProviderResult> {
      if (!config.apiKey) {
        throw new RemoteUnavailableError({
          provider: "google",
          message: "API key is required for Google Gemini.",
        });
      }

      const baseUrl = config.baseUrl ?? DEFAULT_GOOGLE_BASE_URL;

      const body: Record<string, unknown> = {
        contents: toContents(request.messages),
        generationConfig: {
          temperature: request.temperature,
          maxOutputTokens: request.maxTokens,
        },
      };
      if (request.systemPrompt) {
        body.systemInstruction = { parts: [{ text: request.systemPrompt }] };
      }
      if (request.mode === "tools" && request.tools.length > 0) {
        body.tools = [
          {
            functionDeclarations: request.tools.map((tool) => ({
              name: tool.name,
              description: tool.description,
              parameters: toGeminiSchema(tool.parameters),
            })),
          },
        ];
      }

      const url = `${baseUrl}/models/${request.model}:generateContent`;
      const response = await fetch(url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "x-goog-api-key": config.apiKey,
        },
        body: JSON.stringify(body),
        signal: request.abortSignal,
      });

      if (!response.ok) {
        const errorDetails = await parseErrorMessage(response);
        throw new RemoteUnavailableError({
          provider: "google",
          message: errorDetails.message,
          status: response.status,
          code: errorDetails.code,
        });
      }

      const data = (await response.json()) as GenerateContentResponse;
      const candidate = data.candidates?.[0];
      if (!candidate?.content?.parts) {
        const reason = candidate?.finishReason;
        throw new RemoteUnavailableError({
          provider: "google",
          message: reason
            ? `Gemini returned no content (finishReason: ${reason}).`
            : "Gemini returned no candidates (possible safety filter or empty response).",
          status: response.status,
        });
      }

      const parts = candidate.content.parts;
      const content = parts.map((p) => p.text ?? "").join("");
      const seenIds = new Set<string>();
      const toolCalls: ToolCallRequest[] = parts.flatMap((p) =>
        p.functionCall
          ? [
              {
                id: uniqueCallId(p.functionCall.id, seenIds),
                name: p.functionCall.name ?? "",
                arguments: p.functionCall.args ?? {},
              },
            ]
          : []
      );

      const usage = data.usageMetadata
        ? {
            inputTokens: data.usageMetadata.promptTokenCount ?? 0,
            outputTokens: data.usageMetadata.candidatesTokenCount ?? 0,
            totalTokens: data.usageMetadata.totalTokenCount ?? 0,
          }
        : undefined;

      return {
        content,
        toolCalls,
        finishReason: candidate.finishReason,
        usage,
      };
    },
  };
}
