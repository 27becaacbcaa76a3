export type ProviderName = "openai" | "google" | "glm" | "deepseek";

/** A request from the model to invoke one registered tool. */
export interface ToolCallRequest {
  /** Correlates the call with its tool-result message. */
  id: string;
  name: string;
  /**
   * Arguments exactly as the model produced them. Untrusted until the tool
   * registry validates them against the tool's schema.
   */
  arguments: unknown;
}

export interface UserMessage {
  role: "user";
  content: string;
}

export interface AssistantMessage {
  role: "assistant";
  content: string;
  toolCalls: ToolCallRequest[];
}

export interface ToolResultMessage {
  role: "tool";
  toolCallId: string;
  toolName: string;
  content: string;
  isError: boolean;
}

export type Message = UserMessage | AssistantMessage | ToolResultMessage;

/** What the model is told about a tool. */
export interface ToolDefinition {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

export type ModelResponse =
  | { kind: "final_answer"; text: string }
  | { kind: "tool_calls"; calls: ToolCallRequest[]; text: string };

export interface CompletionOptions {
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
  abortSignal?: AbortSignal;
  requestId?: string;
}

export type CompletionMode = "tools" | "plain";

export interface ProviderRequest {
  model: string;
  mode: CompletionMode;
  messages: readonly Message[];
  tools: readonly ToolDefinition[];
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
  abortSignal?: AbortSignal;
}

export interface Usage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface ProviderResult {
  content: string;
  toolCalls: ToolCallRequest[];
  usage?: Usage;
  finishReason?: string;
}

export interface RequestLog {
  timestamp: string;
  requestId: string;
  model: string;
  provider: ProviderName;
  mode: CompletionMode;
  messageCount: number;
  toolCount: number;
  timeoutMs?: number;
}

export interface ResponseLog {
  timestamp: string;
  requestId: string;
  model: string;
  provider: ProviderName;
  mode: CompletionMode;
  durationMs: number;
  toolCallCount: number;
  usage?: Usage;
  finishReason?: string;
}

export interface ErrorLog {
  timestamp: string;
  requestId: string;
  model: string;
  provider: ProviderName;
  mode: CompletionMode;
  durationMs: number;
  error: {
    name: string;
    message: string;
    status?: number;
    code?: string;
  };
}

export interface RequestLogger {
  logRequest(entry: RequestLog): void;
  logResponse(entry: ResponseLog): void;
  logError(entry: ErrorLog): void;
}

export interface OpenAICompatibleConfig {
  /** Optional for self-hosted servers that do not check keys. */
  apiKey?: string;
  baseUrl?: string;
  organization?: string;
}

export interface GoogleConfig {
  apiKey: string;
  baseUrl?: string;
}

export interface ProviderConfig {
  openai?: OpenAICompatibleConfig;
  google?: GoogleConfig;
  glm?: OpenAICompatibleConfig;
  deepseek?: OpenAICompatibleConfig;
}

export interface InferenceClientConfig {
  providers: ProviderConfig;
  model: string;
  /** Overrides the model → provider lookup. */
  provider?: ProviderName;
  modelProviderMap?: Record<string, ProviderName>;
  /**
   * Models declared able to return native structured tool calls, merged
   * with the built-in list.
   */
  toolCapableModels?: string[];
  /** Explicit declaration for `model`; wins over the lists when set. */
  toolCapable?: boolean;
  timeoutMs?: number;
  temperature?: number;
  maxTokens?: number;
  logger?: RequestLogger;
}

export interface InferenceClient {
  readonly model: string;
  readonly provider: ProviderName;
  readonly supportsTools: boolean;
  completeWithTools(
    conversation: readonly Message[],
    tools: readonly ToolDefinition[],
    options?: CompletionOptions
  ): Promise<ModelResponse>;
  completePlain(prompt: string, options?: CompletionOptions): Promise<string>;
}
