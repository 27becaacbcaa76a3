import { describe, expect, it } from "vitest";
import {
  createDefaultToolRegistry,
  createToolRegistry,
  DuplicateNameError,
  getWeatherTool,
  ToolExecutionError,
  ValidationError,
  type ToolSpec,
} from "../src/index.js";

const echoSpec = (): ToolSpec => ({
  name: "echo",
  description: "Echo the text back.",
  parameters: {
    type: "object",
    properties: { text: { type: "string" } },
    required: ["text"],
  },
});

describe("createToolRegistry", () => {
  it("lists specs in registration order", () => {
    const registry = createDefaultToolRegistry();
    expect(registry.list().map((spec) => spec.name)).toEqual([
      "get_weather",
      "calculate",
    ]);
    expect(registry.has("calculate")).toBe(true);
    expect(registry.has("get_time")).toBe(false);
  });

  it("rejects a duplicate name", () => {
    const registry = createDefaultToolRegistry();
    expect(() =>
      registry.register(getWeatherTool.spec, getWeatherTool.execute)
    ).toThrow(DuplicateNameError);
    expect(registry.list()).toHaveLength(2);
  });

  it("rejects an empty name", () => {
    const registry = createToolRegistry();
    expect(() =>
      registry.register({ ...echoSpec(), name: "  " }, () => "")
    ).toThrow("Tool name is required");
  });

  it("rejects an invalid schema at registration", () => {
    const registry = createToolRegistry();
    expect(() =>
      registry.register(
        { ...echoSpec(), parameters: { type: "no-such-type" } },
        () => ""
      )
    ).toThrow();
    expect(registry.has("echo")).toBe(false);
  });

  it("freezes registered specs and isolates them from the caller's object", () => {
    const registry = createToolRegistry();
    const spec = echoSpec();
    registry.register<{ text: string }>(spec, ({ text }) => text);
    spec.description = "changed";

    const [stored] = registry.list();
    expect(stored?.description).toBe("Echo the text back.");
    expect(Object.isFrozen(stored)).toBe(true);
    expect(Object.isFrozen(stored?.parameters)).toBe(true);
  });

  it("passes validated arguments to the implementation", async () => {
    const registry = createToolRegistry();
    registry.register<{ text: string }>(echoSpec(), async ({ text }) =>
      text.toUpperCase()
    );

    await expect(registry.invoke("echo", { text: "hi" })).resolves.toEqual({
      toolName: "echo",
      content: "HI",
      isError: false,
    });
  });

  it("treats an unknown tool as a validation failure", async () => {
    const registry = createDefaultToolRegistry();
    const failure = await registry
      .invoke("get_time", {})
      .catch((err: unknown) => err);

    expect(failure).toBeInstanceOf(ValidationError);
    expect(failure).toMatchObject({
      toolName: "get_time",
      message: 'Unknown tool "get_time". Available tools: get_weather, calculate',
      issues: [{ field: "name", constraint: "registered tool" }],
    });
  });

  it("names the tool and the issues in the validation message", async () => {
    const registry = createToolRegistry();
    registry.register(echoSpec(), () => "");

    await expect(registry.invoke("echo", { text: 5 })).rejects.toThrow(
      'Invalid arguments for tool "echo": text must be string (type string)'
    );
  });

  it("validates non-object arguments instead of trusting them", async () => {
    const registry = createToolRegistry();
    registry.register(echoSpec(), () => "");

    await expect(registry.invoke("echo", "{text: hi")).rejects.toMatchObject({
      issues: [{ field: "(root)", constraint: "type object" }],
    });
  });

  it("converts implementation failures into error results", async () => {
    const registry = createToolRegistry();
    registry.register({ ...echoSpec(), name: "flaky" }, () => {
      throw new Error("boom");
    });
    registry.register({ ...echoSpec(), name: "picky" }, async () => {
      throw new ToolExecutionError("text too boring");
    });

    await expect(registry.invoke("flaky", { text: "x" })).resolves.toEqual({
      toolName: "flaky",
      content: "Error executing flaky: boom",
      isError: true,
    });
    await expect(registry.invoke("picky", { text: "x" })).resolves.toEqual({
      toolName: "picky",
      content: "Error executing picky: text too boring",
      isError: true,
    });
  });

  it("serves concurrent invocations independently", async () => {
    const registry = createDefaultToolRegistry();
    const results = await Promise.all([
      registry.invoke("calculate", { operation: "add", a: 1, b: 1 }),
      registry.invoke("calculate", { operation: "divide", a: 1, b: 0 }),
      registry.invoke("get_weather", { location: "Oslo" }),
    ]);

    expect(results.map((r) => r.isError)).toEqual([false, true, false]);
    expect(results[0]?.content).toBe("The result of 1 plus 1 is 2.");
  });
});
