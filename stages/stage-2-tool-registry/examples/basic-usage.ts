/**
 * Stage 2 Tool Registry 基础用法（不调模型）：
 * - 注册 get_weather、calculate
 * - 直接 invoke，展示成功结果、被捕获的执行错误（除以 0）、参数校验失败
 */

import {
  createDefaultToolRegistry,
  DuplicateNameError,
  getWeatherTool,
  ValidationError,
} from "../src/index.js";

async function main() {
  const registry = createDefaultToolRegistry();
  console.log(
    "Registered tools:",
    registry.list().map((t) => t.name)
  );

  const calls: Array<[string, unknown]> = [
    ["get_weather", { location: "Paris" }],
    ["calculate", { operation: "multiply", a: 12, b: 7 }],
    ["calculate", { operation: "divide", a: 10, b: 0 }],
    ["calculate", { operation: "modulo", a: 10, b: 3 }],
    ["get_weather", { location: "" }],
    ["get_time", {}],
  ];

  for (const [name, args] of calls) {
    try {
      const result = await registry.invoke(name, args);
      console.log(
        `${name}(${JSON.stringify(args)}) ->${result.isError ? " [error]" : ""} ${result.content}`
      );
    } catch (err) {
      if (err instanceof ValidationError) {
        console.log(`${name}(${JSON.stringify(args)}) -> ValidationError:`);
        for (const issue of err.issues) {
          console.log(`  ${issue.field}: ${issue.message} [${issue.constraint}]`);
        }
      } else {
        throw err;
      }
    }
  }

  try {
    registry.register(getWeatherTool.spec, getWeatherTool.execute);
  } catch (err) {
    if (err instanceof DuplicateNameError) {
      console.log("\nRe-registering get_weather:", err.message);
    } else {
      throw err;
    }
  }
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
