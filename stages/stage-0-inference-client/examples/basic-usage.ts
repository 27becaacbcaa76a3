/**
 * Stage 0 Inference Client 基础用法：
 * 从 .env 组装客户端，先发一次 plain 请求，再发一次带工具声明的请求，
 * 展示返回的是 final_answer 还是 tool_calls。
 */

import {
  buildInferenceClientConfig,
  createConsoleLogger,
  createInferenceClient,
  loadGlobalConfig,
  type ToolDefinition,
} from "../src/index.js";

const echoTool: ToolDefinition = {
  name: "get_weather",
  description: "Get the current weather for a location.",
  parameters: {
    type: "object",
    properties: { location: { type: "string" } },
    required: ["location"],
  },
};

async function main() {
  const { logLevel } = loadGlobalConfig();
  const client = createInferenceClient({
    ...buildInferenceClientConfig(),
    logger: createConsoleLogger(logLevel),
  });
  console.log(
    `Model: ${client.model} (provider: ${client.provider}, tools: ${client.supportsTools})`
  );

  const text = await client.completePlain(
    "In one sentence, what is a tool-calling LLM?"
  );
  console.log("\n[plain] reply:", text);

  if (!client.supportsTools) {
    console.log("\n[tools] skipped: model is not declared tool-capable.");
    return;
  }

  const response = await client.completeWithTools(
    [{ role: "user", content: "What's the weather like in Lisbon?" }],
    [echoTool]
  );
  if (response.kind === "tool_calls") {
    for (const call of response.calls) {
      console.log(
        `\n[tools] model requested ${call.name}(${JSON.stringify(call.arguments)}) id=${call.id}`
      );
    }
  } else {
    console.log("\n[tools] model answered directly:", response.text);
  }
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
