/**
 * 端到端入口：
 *   npm run agent -- "What's 12 multiplied by 7?"
 *   npm run agent -- --no-eval "What's the weather in Paris?"
 * 流程：Turn Controller 跑完工具循环 -> 打印最终回复 -> Evaluator 对 transcript 打分。
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
  type Transcript,
} from "../../stage-3-turn-controller/src/index.js";
import { createEvaluator, type EvaluationVerdict } from "../src/index.js";

const DEFAULT_QUERY = "What's the weather in Paris and what is 10 divided by 0?";

function parseArgs(argv: string[]): { query: string; evaluate: boolean } {
  const evaluate = !argv.includes("--no-eval");
  const query = argv
    .filter((arg) => arg !== "--no-eval")
    .join(" ")
    .trim();
  return { query: query || DEFAULT_QUERY, evaluate };
}

function printTranscript(transcript: Transcript) {
  for (const exchange of transcript.toolExchanges) {
    console.log(
      `  [tool] ${exchange.toolName}(${JSON.stringify(exchange.arguments)}) -> ${
        exchange.isError ? "[error] " : ""
      }${exchange.result}`
    );
  }
}

function printVerdict(verdict: EvaluationVerdict) {
  console.log("\n---------- Evaluation ----------");
  if (verdict.status === "unparseable") {
    console.log("Verdict could not be parsed:", verdict.errors.join("; "));
    console.log("Raw reply:", verdict.rationale);
    return;
  }
  console.log(
    `Tool selection: ${verdict.toolSelection.correct ? "correct" : "incorrect"} - ${verdict.toolSelection.rationale}`
  );
  console.log(
    `Response quality: ${verdict.responseQuality.score}/5 - ${verdict.responseQuality.rationale}`
  );
  console.log(
    `Overall: ${verdict.overallSuccess.success ? "success" : "failure"} - ${verdict.overallSuccess.rationale}`
  );
}

async function main() {
  const { query, evaluate } = parseArgs(process.argv.slice(2));
  const global = loadGlobalConfig();
  const client = createInferenceClient({
    ...buildInferenceClientConfig(),
    logger: createConsoleLogger(global.logLevel),
  });
  const registry = createDefaultToolRegistry();
  const controller = createTurnController(
    { client, registry },
    { maxTurns: global.maxTurns, temperature: 0.1 }
  );

  console.log(`User: ${query}`);

  let transcript: Transcript;
  try {
    const result = await controller.run(query);
    printTranscript(result.transcript);
    console.log(`Assistant: ${result.answer}`);
    transcript = result.transcript;
  } catch (err) {
    if (!(err instanceof TurnLimitExceededError)) {
      throw err;
    }
    console.log(err.message);
    printTranscript(err.transcript);
    transcript = err.transcript;
  }

  if (evaluate) {
    const evaluator = createEvaluator({ client }, { tools: registry.list() });
    printVerdict(await evaluator.evaluate(transcript));
  }
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
