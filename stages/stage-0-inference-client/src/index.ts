export { createInferenceClient } from "./client.js";
export { ConfigurationError, RemoteUnavailableError } from "./errors.js";
export {
  createConsoleLogger,
  isLogLevel,
  LOG_LEVELS,
  type LogLevel,
} from "./logger.js";
export { parseToolArguments } from "./providers/openai.js";
export {
  buildInferenceClientConfig,
  buildProviderConfigFromModelMaps,
  getDefaultModelFromMaps,
  getModelMaps,
  getModelProviderMapFromMaps,
  getToolCapableModelsFromMaps,
  loadGlobalConfig,
} from "../../../config/index.js";
export type {
  AssistantMessage,
  CompletionOptions,
  GoogleConfig,
  InferenceClient,
  InferenceClientConfig,
  Message,
  ModelResponse,
  OpenAICompatibleConfig,
  ProviderConfig,
  ProviderName,
  RequestLogger,
  ToolCallRequest,
  ToolDefinition,
  ToolResultMessage,
  Usage,
  UserMessage,
} from "./types.js";
