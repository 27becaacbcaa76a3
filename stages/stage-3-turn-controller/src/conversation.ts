/**
 * Append-only message history owned by a single run.
 */

import type { Message } from "../../stage-0-inference-client/src/types.js";

export interface Conversation {
  readonly messages: readonly Message[];
  append(message: Message): void;
  /** True when the last message is a user or tool-result message. */
  isReadyForModel(): boolean;
}

export function createConversation(userMessage: string): Conversation {
  const messages: Message[] = [{ role: "user", content: userMessage }];

  return {
    get messages(): readonly Message[] {
      return messages.slice();
    },

    append(message: Message): void {
      messages.push(message);
    },

    isReadyForModel(): boolean {
      const last = messages[messages.length - 1];
      return last?.role === "user" || last?.role === "tool";
    },
  };
}
