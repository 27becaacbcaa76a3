/**
 * Stage 3 Turn Controller 基础用法：
 * 用户提问 -> 模型决定调用工具 -> 执行 -> 回注 -> 直到模型给出最终回复。
 * 通过 onTransition 打印状态机每一步：awaiting_model / calling_tools / answering / done。
 */

import {
  buildInferenceClientConfig,
  createConsoleLogger,
  createInferenceClient,
  loadGlobalConfig,
} from "../../stage-0-inference-client/src/index.js";
import { createDefaultToolRegistry } from "../../stage-2-tool-registry/src/index.js";
import {
  createTurnController,
  TurnLimitExceededError,
  type TurnState,
} from "../src/index.js";

function describe(state: TurnState): string {
  switch (state.status) {
    case "awaiting_model":
      return `awaiting_model (calls so far: ${state.turn})`;
    case "calling_tools":
      return `calling_tools: ${state.calls
        .map((c) => `${c.name}(${JSON.stringify(c.arguments)})`)
        .join(", ")}`;
    case "answering":
      return "answering";
    case "done":
      return `done after ${state.turn} call(s)`;
  }
}

async function main() {
  const global = loadGlobalConfig();
  const client = createInferenceClient({
    ...buildInferenceClientConfig(),
    logger: createConsoleLogger("error"),
  });
  const controller = createTurnController(
    { client, registry: createDefaultToolRegistry() },
    {
      maxTurns: global.maxTurns,
      temperature: 0.1,
      onTransition: (state) => console.log(`  -> ${describe(state)}`),
    }
  );

  const questions = [
    "What's 12 multiplied by 7?",
    "What's the weather in Paris and what is 10 divided by 0?",
  ];

  for (const question of questions) {
    console.log(`\nUser: ${question}`);
    try {
      const result = await controller.run(question);
      for (const exchange of result.transcript.toolExchanges) {
        console.log(
          `  [tool] ${exchange.toolName} -> ${exchange.isError ? "[error] " : ""}${exchange.result}`
        );
      }
      console.log(`Assistant: ${result.answer}`);
    } catch (err) {
      if (err instanceof TurnLimitExceededError) {
        console.log(
          `${err.message} Partial transcript has ${err.transcript.messages.length} messages.`
        );
      } else {
        throw err;
      }
    }
  }
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
