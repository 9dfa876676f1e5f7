/**
 * In-memory conversation history with a character and turn budget.
 * The system prompt is pinned as the first turn and is never dropped.
 */

import { randomUUID } from "crypto";
import type { ConversationTurn, HistorySnapshot, IConversationHistory } from "./types";
import type { TurnRole } from "../pipeline/types";

export interface ConversationHistoryConfig {
  systemPrompt: string;
  /** Budget for non-system content. */
  maxHistoryChars: number;
  /** Max number of non-system turns to keep. */
  maxTurns: number;
}

export class ConversationHistory implements IConversationHistory {
  private readonly system: ConversationTurn;
  private turns: ConversationTurn[] = [];

  constructor(private readonly config: ConversationHistoryConfig) {
    this.system = { id: "system", role: "system", content: config.systemPrompt, timestamp: Date.now() };
  }

  append(role: "user" | "assistant", content: string, options?: { interrupted?: boolean }): ConversationTurn | undefined {
    const text = content.trim();
    if (!text) return undefined;
    const turn: ConversationTurn = { id: randomUUID(), role, content: text, timestamp: Date.now() };
    if (options?.interrupted) turn.interrupted = true;
    this.turns.push(turn);
    this.truncate();
    return turn;
  }

  update(id: string, patch: { content?: string; interrupted?: boolean }): boolean {
    const index = this.turns.findIndex((t) => t.id === id);
    if (index < 0) return false;
    const turn = this.turns[index];
    if (patch.content !== undefined) {
      const text = patch.content.trim();
      if (!text) {
        this.turns.splice(index, 1);
        return true;
      }
      turn.content = text;
    }
    if (patch.interrupted !== undefined) turn.interrupted = patch.interrupted;
    return true;
  }

  toMessages(): Array<{ role: TurnRole; content: string }> {
    return [this.system, ...this.turns].map((t) => ({ role: t.role, content: t.content }));
  }

  getSnapshot(): HistorySnapshot {
    return {
      turns: [this.system, ...this.turns].map((t) => ({ ...t })),
      chars: this.chars(),
    };
  }

  clear(): void {
    this.turns = [];
  }

  /**
   * Drop the oldest turns while over budget. The latest user turn (the current exchange) and
   * anything after it always stay, even when they alone exceed the budget.
   */
  private truncate(): void {
    let latestUser = -1;
    for (let i = this.turns.length - 1; i >= 0; i--) {
      if (this.turns[i].role === "user") {
        latestUser = i;
        break;
      }
    }
    let chars = this.chars();
    let droppable = latestUser < 0 ? this.turns.length - 1 : latestUser;
    while (droppable > 0 && (chars > this.config.maxHistoryChars || this.turns.length > this.config.maxTurns)) {
      const dropped = this.turns.shift();
      if (!dropped) break;
      chars -= dropped.content.length;
      droppable--;
    }
  }

  private chars(): number {
    return this.turns.reduce((n, t) => n + t.content.length, 0);
  }
}
