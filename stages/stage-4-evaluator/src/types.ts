/**
 * Stage 4 Evaluator types.
 * A second, plain-mode model call grades a finished (or partial) run.
 */

import type {
  InferenceClient,
  ToolDefinition,
} from "../../stage-0-inference-client/src/types.js";
import type { OutputController } from "../../stage-1-output-control/src/types.js";

export interface ToolSelectionJudgment {
  correct: boolean;
  rationale: string;
}

export interface ResponseQualityJudgment {
  /** 1 (poor) to 5 (excellent). */
  score: number;
  rationale: string;
}

export interface OverallSuccessJudgment {
  success: boolean;
  rationale: string;
}

export type EvaluationVerdict =
  | {
      status: "parsed";
      toolSelection: ToolSelectionJudgment;
      responseQuality: ResponseQualityJudgment;
      overallSuccess: OverallSuccessJudgment;
      raw: string;
    }
  | {
      status: "unparseable";
      /** The model's raw reply, kept so a human can still read it. */
      rationale: string;
      errors: string[];
    };

/** Shape the model is asked to return. */
export interface RawVerdict {
  tool_selection: ToolSelectionJudgment;
  response_quality: ResponseQualityJudgment;
  overall_success: OverallSuccessJudgment;
}

export interface EvaluatorDeps {
  client: InferenceClient;
  /** Defaults to a controller that strips markdown fences. */
  outputController?: OutputController;
}

export interface EvaluatorOptions {
  /** Listed in the prompt so tool choice can be judged against alternatives. */
  tools?: readonly ToolDefinition[];
  temperature?: number;
  maxTokens?: number;
}
