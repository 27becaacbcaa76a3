/**
 * Stage 3 Turn Controller types.
 * One run: user message -> (model -> tools)* -> final answer.
 */

import type {
  InferenceClient,
  Message,
  ToolCallRequest,
} from "../../stage-0-inference-client/src/types.js";
import type { ToolRegistry } from "../../stage-2-tool-registry/src/types.js";

/**
 * `turn` counts inference calls made so far in the run.
 * awaiting_model -> answering -> done
 * awaiting_model -> calling_tools -> awaiting_model
 */
export type TurnState =
  | { status: "awaiting_model"; turn: number }
  | { status: "answering"; turn: number; answer: string }
  | { status: "calling_tools"; turn: number; calls: readonly ToolCallRequest[] }
  | { status: "done"; turn: number; answer: string };

export type TurnStatus = TurnState["status"];

/** One tool call paired with the result message it produced. */
export interface ToolExchange {
  callId: string;
  toolName: string;
  arguments: unknown;
  result: string;
  isError: boolean;
}

/** Everything the evaluator needs about a run, complete or partial. */
export interface Transcript {
  userRequest: string;
  toolExchanges: ToolExchange[];
  /** Absent when the run stopped before the model answered. */
  finalAnswer?: string;
  messages: readonly Message[];
}

export interface TurnControllerDeps {
  client: InferenceClient;
  registry: ToolRegistry;
}

export interface TurnControllerOptions {
  /** Upper bound on inference calls per run (default 6). */
  maxTurns?: number;
  /** Replaces the default instructions sent with every call. */
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
  /** Called with the initial state and after every transition. */
  onTransition?: (state: TurnState, messages: readonly Message[]) => void;
}

export interface TurnRunOptions {
  abortSignal?: AbortSignal;
}

export interface TurnResult {
  answer: string;
  messages: readonly Message[];
  transcript: Transcript;
  /** Inference calls used. */
  turns: number;
}

export interface TurnController {
  readonly maxTurns: number;
  run(userMessage: string, options?: TurnRunOptions): Promise<TurnResult>;
}
