import type { Transcript } from "./types.js";

/** The model kept requesting tools until the turn budget ran out. */
export class TurnLimitExceededError extends Error {
  readonly maxTurns: number;
  /** Progress so far; always holds at least the user message. */
  readonly transcript: Transcript;

  constructor(maxTurns: number, transcript: Transcript) {
    super(
      `No final answer after ${maxTurns} inference call${maxTurns === 1 ? "" : "s"}.`
    );
    this.name = "TurnLimitExceededError";
    this.maxTurns = maxTurns;
    this.transcript = transcript;
  }
}
