export {
  calculate,
  calculateTool,
  CALCULATOR_OPERATIONS,
  formatNumber,
  type CalculateArgs,
  type CalculatorOperation,
} from "./calculator.js";
export { getWeatherTool, type GetWeatherArgs } from "./weather.js";
