/**
 * Evaluator: ask the model to grade a transcript and parse its verdict.
 * A reply that does not follow the format degrades to "unparseable"
 * instead of failing the run.
 */

import { createOutputController } from "../../stage-1-output-control/src/controller.js";
import { compileSchema } from "../../stage-1-output-control/src/validate.js";
import type { Transcript } from "../../stage-3-turn-controller/src/types.js";
import { buildEvaluationPrompt, VERDICT_SCHEMA } from "./prompt.js";
import type {
  EvaluationVerdict,
  EvaluatorDeps,
  EvaluatorOptions,
  RawVerdict,
} from "./types.js";

const validateVerdict = compileSchema<RawVerdict>(VERDICT_SCHEMA);

export interface Evaluator {
  evaluate(transcript: Transcript): Promise<EvaluationVerdict>;
}

export function parseVerdict(
  raw: string,
  outputController = createOutputController({ stripMarkdownCodeBlock: true })
): EvaluationVerdict {
  const parsed = outputController.parseAndValidate(raw, validateVerdict);
  if (!parsed.success) {
    return { status: "unparseable", rationale: raw, errors: parsed.errors };
  }
  const { tool_selection, response_quality, overall_success } = parsed.data;
  return {
    status: "parsed",
    toolSelection: {
      correct: tool_selection.correct,
      rationale: tool_selection.rationale,
    },
    responseQuality: {
      score: response_quality.score,
      rationale: response_quality.rationale,
    },
    overallSuccess: {
      success: overall_success.success,
      rationale: overall_success.rationale,
    },
    raw,
  };
}

export function createEvaluator(
  deps: EvaluatorDeps,
  options: EvaluatorOptions = {}
): Evaluator {
  const outputController =
    deps.outputController ??
    createOutputController({ stripMarkdownCodeBlock: true });

  return {
    async evaluate(transcript: Transcript): Promise<EvaluationVerdict> {
      const prompt = buildEvaluationPrompt(transcript, options.tools);
      const raw = await deps.client.completePlain(prompt, {
        temperature: options.temperature ?? 0,
        maxTokens: options.maxTokens,
      });
      return parseVerdict(raw, outputController);
    },
  };
}
