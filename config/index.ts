import "dotenv/config";

import { ConfigurationError } from "../stages/stage-0-inference-client/src/errors.js";
import {
  isLogLevel,
  type LogLevel,
} from "../stages/stage-0-inference-client/src/logger.js";
import type {
  InferenceClientConfig,
  ProviderConfig,
  ProviderName,
} from "../stages/stage-0-inference-client/src/types.js";

export type Env = Record<string, string | undefined>;

export interface ModelMap {
  model: string;
  endpoint: string;
  apiKey?: string;
  /** Whether the model returns native structured tool calls. */
  toolCapable: boolean;
}

export interface GlobalConfig {
  defaultModel?: string;
  logLevel: LogLevel;
  maxTurns: number;
  timeoutMs: number;
}

const DEFAULT_MAX_TURNS = 6;
const DEFAULT_TIMEOUT_MS = 30_000;

// 选择默认模型时的优先顺序
const PROVIDER_ORDER: ProviderName[] = ["openai", "google", "glm", "deepseek"];

function readString(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function readBoolean(env: Env, key: string, fallback: boolean): boolean {
  const value = readString(env, key)?.toLowerCase();
  if (value === undefined) {
    return fallback;
  }
  if (["1", "true", "yes", "on"].includes(value)) {
    return true;
  }
  if (["0", "false", "no", "off"].includes(value)) {
    return false;
  }
  throw new ConfigurationError(`${key} must be a boolean, got "${value}".`);
}

function readPositiveInt(env: Env, key: string, fallback: number): number {
  const value = readString(env, key);
  if (value === undefined) {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigurationError(
      `${key} must be a positive integer, got "${value}".`
    );
  }
  return parsed;
}

/**
 * One entry per provider. The `openai` entry also covers self-hosted
 * OpenAI-compatible servers (vLLM, Ollama, ...) via OPENAI_BASE_URL.
 */
export function getModelMaps(
  env: Env = process.env
): Record<ProviderName, ModelMap> {
  return {
    openai: {
      model: readString(env, "OPENAI_MODEL") ?? "gpt-4o-mini",
      endpoint: readString(env, "OPENAI_BASE_URL") ?? "https://api.openai.com/v1",
      apiKey: readString(env, "OPENAI_API_KEY"),
      toolCapable: readBoolean(env, "OPENAI_TOOL_CAPABLE", true),
    },
    google: {
      model: readString(env, "GOOGLE_MODEL") ?? "gemini-2.5-flash",
      endpoint: "https://generativelanguage.googleapis.com/v1beta",
      apiKey: readString(env, "GOOGLE_API_KEY"),
      toolCapable: true,
    },
    glm: {
      model: readString(env, "GLM_MODEL") ?? "glm-4.7",
      endpoint: "https://open.bigmodel.cn/api/paas/v4",
      apiKey: readString(env, "GLM_API_KEY"),
      toolCapable: true,
    },
    deepseek: {
      model: readString(env, "DEEPSEEK_MODEL") ?? "deepseek-chat",
      endpoint: "https://api.deepseek.com/v1",
      apiKey: readString(env, "DEEPSEEK_API_KEY"),
      toolCapable: readBoolean(env, "DEEPSEEK_TOOL_CAPABLE", true),
    },
  };
}

// 一个 provider 可用：有 apiKey，或（仅 openai）指向自建服务
function isAvailable(name: ProviderName, map: ModelMap, env: Env): boolean {
  if (map.apiKey) {
    return true;
  }
  return name === "openai" && readString(env, "OPENAI_BASE_URL") !== undefined;
}

// 从 .env 读取统一配置，避免在调用处直接读取环境变量
export function loadGlobalConfig(env: Env = process.env): GlobalConfig {
  const logLevel = readString(env, "LOG_LEVEL") ?? "info";
  if (!isLogLevel(logLevel)) {
    throw new ConfigurationError(
      `LOG_LEVEL must be one of silent, error, info; got "${logLevel}".`
    );
  }
  return {
    defaultModel: readString(env, "DEFAULT_MODEL"),
    logLevel,
    maxTurns: readPositiveInt(env, "MAX_TURNS", DEFAULT_MAX_TURNS),
    timeoutMs: readPositiveInt(env, "TIMEOUT_MS", DEFAULT_TIMEOUT_MS),
  };
}

export function buildProviderConfigFromModelMaps(
  env: Env = process.env
): ProviderConfig {
  const maps = getModelMaps(env);
  const providers: ProviderConfig = {};
  if (isAvailable("openai", maps.openai, env)) {
    providers.openai = {
      apiKey: maps.openai.apiKey,
      baseUrl: maps.openai.endpoint,
    };
  }
  if (maps.google.apiKey) {
    providers.google = {
      apiKey: maps.google.apiKey,
      baseUrl: maps.google.endpoint,
    };
  }
  if (maps.glm.apiKey) {
    providers.glm = { apiKey: maps.glm.apiKey, baseUrl: maps.glm.endpoint };
  }
  if (maps.deepseek.apiKey) {
    providers.deepseek = {
      apiKey: maps.deepseek.apiKey,
      baseUrl: maps.deepseek.endpoint,
    };
  }
  return providers;
}

// model -> provider 映射，始终包含 config 中的 model，与 apiKey 无关
export function getModelProviderMapFromMaps(
  env: Env = process.env
): Record<string, ProviderName> {
  const map: Record<string, ProviderName> = {};
  const maps = getModelMaps(env);
  for (const name of PROVIDER_ORDER) {
    map[maps[name].model] = name;
  }
  return map;
}

export function getToolCapableModelsFromMaps(env: Env = process.env): string[] {
  const maps = getModelMaps(env);
  return PROVIDER_ORDER.filter((name) => maps[name].toolCapable).map(
    (name) => maps[name].model
  );
}

// DEFAULT_MODEL 优先，否则取第一个可用 provider 的 model
export function getDefaultModelFromMaps(env: Env = process.env): string {
  const fromEnv = readString(env, "DEFAULT_MODEL");
  if (fromEnv) {
    return fromEnv;
  }
  const maps = getModelMaps(env);
  for (const name of PROVIDER_ORDER) {
    if (isAvailable(name, maps[name], env)) {
      return maps[name].model;
    }
  }
  throw new ConfigurationError(
    "No model endpoint configured. Set OPENAI_API_KEY or OPENAI_BASE_URL, GOOGLE_API_KEY, GLM_API_KEY or DEEPSEEK_API_KEY in .env."
  );
}

/** Everything createInferenceClient needs except the logger. */
export function buildInferenceClientConfig(
  env: Env = process.env
): InferenceClientConfig {
  const global = loadGlobalConfig(env);
  const model = global.defaultModel ?? getDefaultModelFromMaps(env);
  const entry = Object.values(getModelMaps(env)).find(
    (map) => map.model === model
  );
  return {
    providers: buildProviderConfigFromModelMaps(env),
    model,
    modelProviderMap: getModelProviderMapFromMaps(env),
    toolCapableModels: getToolCapableModelsFromMaps(env),
    toolCapable: entry?.toolCapable,
    timeoutMs: global.timeoutMs,
  };
}
