/**
 * Conversation history types.
 * Ordered turns, system prompt first; read by the orchestrator to build LLM context.
 */

import type { TurnRole } from "../pipeline/types";

export interface ConversationTurn {
  /** Stable id so a turn can be amended after barge-in. */
  id: string;
  role: TurnRole;
  content: string;
  timestamp: number;
  /** Assistant reply cut short by barge-in or a mid-stream failure; content is what was spoken. */
  interrupted?: boolean;
}

export interface HistorySnapshot {
  turns: ConversationTurn[];
  /** Total characters of non-system turns. */
  chars: number;
}

export interface IConversationHistory {
  /** Append a user or assistant turn; returns it, or undefined for blank content. */
  append(role: "user" | "assistant", content: string, options?: { interrupted?: boolean }): ConversationTurn | undefined;

  /** Amend a stored turn (e.g. cut an assistant reply down to the spoken part). */
  update(id: string, patch: { content?: string; interrupted?: boolean }): boolean;

  /** Messages for the LLM: system prompt first, then turns in order. */
  toMessages(): Array<{ role: TurnRole; content: string }>;

  getSnapshot(): HistorySnapshot;

  /** Drop everything except the system prompt. */
  clear(): void;
}
