import { ToolExecutionError } from "../errors.js";
import type { Tool } from "../types.js";

export const CALCULATOR_OPERATIONS = [
  "add",
  "subtract",
  "multiply",
  "divide",
] as const;

export type CalculatorOperation = (typeof CALCULATOR_OPERATIONS)[number];

export interface CalculateArgs {
  operation: CalculatorOperation;
  a: number;
  b: number;
}

const PHRASES: Record<CalculatorOperation, string> = {
  add: "plus",
  subtract: "minus",
  multiply: "multiplied by",
  divide: "divided by",
};

// 12 significant digits hides float noise such as 0.1 + 0.2
export function formatNumber(value: number): string {
  return String(Number(value.toPrecision(12)));
}

export function calculate({ operation, a, b }: CalculateArgs): number {
  switch (operation) {
    case "add":
      return a + b;
    case "subtract":
      return a - b;
    case "multiply":
      return a * b;
    case "divide":
      if (b === 0) {
        throw new ToolExecutionError(
          `Cannot divide ${formatNumber(a)} by zero.`
        );
      }
      return a / b;
  }
}

export const calculateTool: Tool<CalculateArgs> = {
  spec: {
    name: "calculate",
    description:
      "Perform basic arithmetic on two numbers. Use for any addition, subtraction, multiplication or division the user asks for.",
    parameters: {
      type: "object",
      properties: {
        operation: {
          type: "string",
          enum: [...CALCULATOR_OPERATIONS],
          description: "The arithmetic operation to perform",
        },
        a: { type: "number", description: "First operand" },
        b: { type: "number", description: "Second operand" },
      },
      required: ["operation", "a", "b"],
      additionalProperties: false,
    },
  },
  execute(args) {
    const result = calculate(args);
    if (!Number.isFinite(result)) {
      throw new ToolExecutionError(
        `The result of ${formatNumber(args.a)} ${PHRASES[args.operation]} ${formatNumber(args.b)} is not a finite number.`
      );
    }
    return `The result of ${formatNumber(args.a)} ${PHRASES[args.operation]} ${formatNumber(args.b)} is ${formatNumber(result)}.`;
  },
};
