export {
  createTurnController,
  DEFAULT_MAX_TURNS,
  DEFAULT_SYSTEM_PROMPT,
  dispatchToolCall,
} from "./controller.js";
export { createConversation, type Conversation } from "./conversation.js";
export { TurnLimitExceededError } from "./errors.js";
export { buildTranscript } from "./transcript.js";
export type {
  ToolExchange,
  Transcript,
  TurnController,
  TurnControllerDeps,
  TurnControllerOptions,
  TurnResult,
  TurnRunOptions,
  TurnState,
  TurnStatus,
} from "./types.js";
