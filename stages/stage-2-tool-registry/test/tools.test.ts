import { describe, expect, it } from "vitest";
import {
  CALCULATOR_OPERATIONS,
  createDefaultToolRegistry,
  formatNumber,
  ValidationError,
  type CalculatorOperation,
} from "../src/index.js";

describe("get_weather", () => {
  const registry = createDefaultToolRegistry();

  it("returns the stub description for a location", async () => {
    await expect(
      registry.invoke("get_weather", { location: "Paris" })
    ).resolves.toEqual({
      toolName: "get_weather",
      content:
        "The weather in Paris is sunny with a temperature of 22°C (72°F), light winds and 40% humidity.",
      isError: false,
    });
  });

  it.each([1, 2, 50, 99, 100])(
    "accepts a %i-character location",
    async (length) => {
      const result = await registry.invoke("get_weather", {
        location: "a".repeat(length),
      });
      expect(result.isError).toBe(false);
      expect(result.content).toContain("a".repeat(length));
    }
  );

  it("rejects an empty location", async () => {
    const failure = await registry
      .invoke("get_weather", { location: "" })
      .catch((err: unknown) => err);
    expect(failure).toBeInstanceOf(ValidationError);
    expect(failure).toMatchObject({
      toolName: "get_weather",
      issues: [{ field: "location", constraint: "minLength 1" }],
    });
  });

  it("rejects a location over 100 characters", async () => {
    await expect(
      registry.invoke("get_weather", { location: "a".repeat(101) })
    ).rejects.toMatchObject({
      name: "ValidationError",
      issues: [{ field: "location", constraint: "maxLength 100" }],
    });
  });

  it("rejects a missing location", async () => {
    await expect(registry.invoke("get_weather", {})).rejects.toMatchObject({
      issues: [{ field: "location", constraint: "required" }],
    });
  });
});

describe("calculate", () => {
  const registry = createDefaultToolRegistry();

  it.each([
    ["add", 2, 3, "The result of 2 plus 3 is 5."],
    ["subtract", 10, 4, "The result of 10 minus 4 is 6."],
    ["multiply", 12, 7, "The result of 12 multiplied by 7 is 84."],
    ["divide", 10, 4, "The result of 10 divided by 4 is 2.5."],
    ["multiply", -3, 4, "The result of -3 multiplied by 4 is -12."],
    ["add", 0.1, 0.2, "The result of 0.1 plus 0.2 is 0.3."],
    ["divide", 0, 5, "The result of 0 divided by 5 is 0."],
  ] as const)("%s(%d, %d)", async (operation, a, b, expected) => {
    await expect(
      registry.invoke("calculate", { operation, a, b })
    ).resolves.toEqual({ toolName: "calculate", content: expected, isError: false });
  });

  it("states the correct result across operand combinations", async () => {
    const operands = [-7.5, -1, 0, 1, 3, 12, 1000];
    const expected: Record<CalculatorOperation, (a: number, b: number) => number> = {
      add: (a, b) => a + b,
      subtract: (a, b) => a - b,
      multiply: (a, b) => a * b,
      divide: (a, b) => a / b,
    };
    for (const operation of CALCULATOR_OPERATIONS) {
      for (const a of operands) {
        for (const b of operands) {
          if (operation === "divide" && b === 0) {
            continue;
          }
          const result = await registry.invoke("calculate", { operation, a, b });
          expect(result.isError).toBe(false);
          expect(result.content.endsWith(
            ` is ${formatNumber(expected[operation](a, b))}.`
          )).toBe(true);
        }
      }
    }
  });

  it.each([10, -4, 0, 2.5])(
    "reports division of %d by zero as an error result",
    async (a) => {
      await expect(
        registry.invoke("calculate", { operation: "divide", a, b: 0 })
      ).resolves.toEqual({
        toolName: "calculate",
        content: `Error executing calculate: Cannot divide ${formatNumber(a)} by zero.`,
        isError: true,
      });
    }
  );

  it("reports a non-finite result as an error result", async () => {
    await expect(
      registry.invoke("calculate", { operation: "multiply", a: 1e308, b: 10 })
    ).resolves.toEqual({
      toolName: "calculate",
      content:
        "Error executing calculate: The result of 1e+308 multiplied by 10 is not a finite number.",
      isError: true,
    });
  });

  it("rejects an operation outside the enum", async () => {
    await expect(
      registry.invoke("calculate", { operation: "modulo", a: 10, b: 3 })
    ).rejects.toMatchObject({
      name: "ValidationError",
      issues: [
        {
          field: "operation",
          constraint: "enum [add, subtract, multiply, divide]",
        },
      ],
    });
  });

  it("rejects numbers sent as strings", async () => {
    await expect(
      registry.invoke("calculate", { operation: "add", a: "12", b: 7 })
    ).rejects.toMatchObject({
      issues: [{ field: "a", constraint: "type number", message: "must be number" }],
    });
  });
});

describe("formatNumber", () => {
  it("hides floating point noise", () => {
    expect(formatNumber(0.1 + 0.2)).toBe("0.3");
    expect(formatNumber(84)).toBe("84");
    expect(formatNumber(-0.5)).toBe("-0.5");
  });
});
