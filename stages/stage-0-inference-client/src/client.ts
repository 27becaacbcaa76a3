import { ConfigurationError, RemoteUnavailableError } from "./errors.js";
import { createConsoleLogger } from "./logger.js";
import { createDeepSeekProvider } from "./providers/deepseek.js";
import { createGLMProvider } from "./providers/glm.js";
import { createGoogleProvider } from "./providers/google.js";
import { createOpenAICompatibleProvider } from "./providers/openai.js";
import type { LLMProvider } from "./providers/types.js";
import type {
  CompletionMode,
  CompletionOptions,
  InferenceClient,
  InferenceClientConfig,
  Message,
  ModelResponse,
  ProviderName,
  ProviderResult,
  RequestLogger,
  ToolDefinition,
} from "./types.js";

const DEFAULT_MODEL_PROVIDER_MAP: Record<string, ProviderName> = {
  "gpt-4o": "openai",
  "gpt-4o-mini": "openai",
  "gemini-2.5-flash": "google",
  "gemini-2.0-flash": "google",
  "glm-4.7": "glm",
  "glm-4-flash": "glm",
  "glm-4-plus": "glm",
  "deepseek-chat": "deepseek",
  "deepseek-reasoner": "deepseek",
};

// deepseek-reasoner has no native function calling.
const DEFAULT_TOOL_CAPABLE_MODELS: readonly string[] = [
  "gpt-4o",
  "gpt-4o-mini",
  "gemini-2.5-flash",
  "gemini-2.0-flash",
  "glm-4.7",
  "glm-4-flash",
  "glm-4-plus",
  "deepseek-chat",
];

function resolveTimeout(
  options: CompletionOptions,
  config: InferenceClientConfig
): number | undefined {
  const requestTimeout = options.timeoutMs ?? Number.POSITIVE_INFINITY;
  const configTimeout = config.timeoutMs ?? Number.POSITIVE_INFINITY;
  const min = Math.min(requestTimeout, configTimeout);
  return Number.isFinite(min) ? min : undefined;
}

export function createMergedSignal(
  abortSignal: AbortSignal | undefined,
  timeoutMs: number | undefined
): { signal?: AbortSignal; cancel?: () => void } {
  if (!abortSignal && !timeoutMs) {
    return {};
  }

  const controller = new AbortController();
  let timeoutId: NodeJS.Timeout | undefined;

  if (timeoutMs) {
    timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  }

  const onAbort = () => controller.abort();
  if (abortSignal) {
    if (abortSignal.aborted) {
      controller.abort();
    } else {
      abortSignal.addEventListener("abort", onAbort, { once: true });
    }
  }

  return {
    signal: controller.signal,
    cancel: () => {
      if (timeoutId) {
        clearTimeout(timeoutId);
      }
      abortSignal?.removeEventListener("abort", onAbort);
    },
  };
}

function createProvider(
  name: ProviderName,
  config: InferenceClientConfig
): LLMProvider | undefined {
  switch (name) {
    case "openai":
      return config.providers.openai
        ? createOpenAICompatibleProvider("openai", config.providers.openai)
        : undefined;
    case "google":
      return config.providers.google
        ? createGoogleProvider(config.providers.google)
        : undefined;
    case "glm":
      return config.providers.glm
        ? createGLMProvider(config.providers.glm)
        : undefined;
    case "deepseek":
      return config.providers.deepseek
        ? createDeepSeekProvider(config.providers.deepseek)
        : undefined;
  }
}

function resolveProviderName(
  model: string,
  explicitProvider: ProviderName | undefined,
  modelProviderMap: Record<string, ProviderName>
): ProviderName {
  if (explicitProvider) {
    return explicitProvider;
  }

  const provider = modelProviderMap[model];
  if (!provider) {
    throw new ConfigurationError(
      `No provider mapping found for model: ${model}`
    );
  }

  return provider;
}

/** Anything the provider threw becomes RemoteUnavailableError. */
function toRemoteUnavailable(
  provider: ProviderName,
  error: unknown,
  timeoutMs: number | undefined
): RemoteUnavailableError {
  if (error instanceof RemoteUnavailableError) {
    return error;
  }
  if (error instanceof Error && error.name === "AbortError") {
    return new RemoteUnavailableError({
      provider,
      message: timeoutMs
        ? `Request aborted (timeout ${timeoutMs}ms or caller cancellation).`
        : "Request aborted by caller.",
      code: "ABORTED",
      cause: error,
    });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new RemoteUnavailableError({
    provider,
    message: `Request failed: ${message}`,
    code: "NETWORK",
    cause: error,
  });
}

export function createInferenceClient(
  config: InferenceClientConfig
): InferenceClient {
  const model = config.model.trim();
  if (!model) {
    throw new ConfigurationError("A model name is required.");
  }

  const modelProviderMap = {
    ...DEFAULT_MODEL_PROVIDER_MAP,
    ...(config.modelProviderMap ?? {}),
  };
  const providerName = resolveProviderName(
    model,
    config.provider,
    modelProviderMap
  );
  const provider = createProvider(providerName, config);
  if (!provider) {
    throw new ConfigurationError(`Provider not configured: ${providerName}`);
  }

  const toolCapable = new Set([
    ...DEFAULT_TOOL_CAPABLE_MODELS,
    ...(config.toolCapableModels ?? []),
  ]);
  const supportsTools = config.toolCapable ?? toolCapable.has(model);
  const logger: RequestLogger = config.logger ?? createConsoleLogger("info");

  const send = async function send(
    mode: CompletionMode,
    messages: readonly Message[],
    tools: readonly ToolDefinition[],
    options: CompletionOptions
  ): Promise<ProviderResult> {
    const timeoutMs = resolveTimeout(options, config);
    const requestId = options.requestId ?? crypto.randomUUID();
    const start = Date.now();

    logger.logRequest({
      timestamp: new Date().toISOString(),
      requestId,
      model,
      provider: providerName,
      mode,
      messageCount: messages.length,
      toolCount: tools.length,
      timeoutMs,
    });

    const { signal, cancel } = createMergedSignal(
      options.abortSignal,
      timeoutMs
    );
    try {
      const result = await provider.chat({
        model,
        mode,
        messages,
        tools,
        systemPrompt: options.systemPrompt,
        temperature: options.temperature ?? config.temperature,
        maxTokens: options.maxTokens ?? config.maxTokens,
        abortSignal: signal,
      });

      logger.logResponse({
        timestamp: new Date().toISOString(),
        requestId,
        model,
        provider: providerName,
        mode,
        durationMs: Date.now() - start,
        toolCallCount: result.toolCalls.length,
        usage: result.usage,
        finishReason: result.finishReason,
      });

      return result;
    } catch (error) {
      const failure = toRemoteUnavailable(providerName, error, timeoutMs);
      logger.logError({
        timestamp: new Date().toISOString(),
        requestId,
        model,
        provider: providerName,
        mode,
        durationMs: Date.now() - start,
        error: {
          name: failure.name,
          message: failure.message,
          status: failure.status,
          code: failure.code,
        },
      });
      throw failure;
    } finally {
      cancel?.();
    }
  };

  return {
    model,
    provider: providerName,
    supportsTools,

    async completeWithTools(
      conversation: readonly Message[],
      tools: readonly ToolDefinition[],
      options: CompletionOptions = {}
    ): Promise<ModelResponse> {
      if (!supportsTools) {
        throw new ConfigurationError(
          `Model "${model}" is not declared tool-capable; structured tool calls are unavailable.`
        );
      }
      const result = await send("tools", conversation, tools, options);
      if (result.toolCalls.length > 0) {
        return {
          kind: "tool_calls",
          calls: result.toolCalls,
          text: result.content,
        };
      }
      return { kind: "final_answer", text: result.content };
    },

    async completePlain(
      prompt: string,
      options: CompletionOptions = {}
    ): Promise<string> {
      const result = await send(
        "plain",
        [{ role: "user", content: prompt }],
        [],
        options
      );
      return result.content;
    },
  };
}
