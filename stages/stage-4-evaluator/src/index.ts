export { createEvaluator, parseVerdict, type Evaluator } from "./evaluator.js";
export { buildEvaluationPrompt, VERDICT_SCHEMA } from "./prompt.js";
export type {
  EvaluationVerdict,
  EvaluatorDeps,
  EvaluatorOptions,
  OverallSuccessJudgment,
  RawVerdict,
  ResponseQualityJudgment,
  ToolSelectionJudgment,
} from "./types.js";
