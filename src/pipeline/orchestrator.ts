/**
 * DialogueOrchestrator: transcript → history → streamed LLM reply → SpeechPlayer.
 *
 * One turn at a time. Reply chunks are handed to the player as soon as they arrive (or as soon as a
 * sentence completes), so playback starts before the reply is finished. bargeIn() cancels the turn in
 * flight and records only what the user actually heard.
 */

import { randomUUID } from "crypto";
import type { ILLM, Message } from "../adapters/llm";
import type { IConversationHistory } from "../memory/types";
import type { SpeechPlayer } from "./speech-player";
import type { BoundedQueue } from "./queue";
import type { PlaybackItem, Transcript } from "./types";
import { flushSentences, DEFAULT_MAX_CHARS_PER_CHUNK } from "./sentence-splitter";
import { abortable, abortableIterable, createDeadline, sleep } from "./deadline";
import { DialogueServiceError, classifyServiceError, errorMessage } from "../errors";
import type { ServiceFailureReason } from "../errors";
import { incrementCounter, recordTurnMetrics } from "../metrics";
import { logger, logLlmCall, logTurn } from "../logging";

export type PlaybackGrouping = "chunk" | "sentence";

export interface DialogueOrchestratorConfig {
  temperature: number;
  maxTokens: number;
  /** Deadline for one LLM request, first byte to last chunk. */
  timeoutMs: number;
  /** "chunk": one playback item per reply chunk; "sentence": items cut on sentence boundaries. */
  grouping: PlaybackGrouping;
  maxCharsPerItem?: number;
  /** Spoken when a turn fails; never stored in history. */
  apologyText: string;
  /** Retries before the first chunk, for rate_limit and network failures only. */
  retry?: { attempts: number; backoffMs: number };
}

export interface OrchestratorCallbacks {
  onUserTranscript?: (text: string) => void;
  onAgentReply?: (text: string, status: TurnStatus) => void;
}

export type TurnStatus = "completed" | "interrupted" | "failed" | "skipped";

export interface TurnResult {
  turnId: string;
  status: TurnStatus;
  /** Reply text as stored in history (spoken part for interrupted turns). */
  text: string;
  reason?: ServiceFailureReason;
}

interface Piece {
  item: PlaybackItem;
  /** Text as it appeared in the reply, whitespace included. */
  raw: string;
}

interface Turn {
  id: string;
  controller: AbortController;
  pieces: Piece[];
  /** History id once the assistant turn is stored; barge-in amends it. */
  storedTurnId?: string;
  interrupted: boolean;
}

export class DialogueOrchestrator {
  private active?: Turn;
  /** Most recent finished turn whose audio may still be playing. */
  private lastSpoken?: Turn;
  private readonly maxChars: number;
  private readonly retry: { attempts: number; backoffMs: number };

  constructor(
    private readonly llm: ILLM,
    private readonly history: IConversationHistory,
    private readonly player: SpeechPlayer,
    private readonly config: DialogueOrchestratorConfig,
    private readonly callbacks: OrchestratorCallbacks = {}
  ) {
    this.maxChars = config.maxCharsPerItem ?? DEFAULT_MAX_CHARS_PER_CHUNK;
    this.retry = config.retry ?? { attempts: 0, backoffMs: 0 };
  }

  /** True from the moment a transcript is accepted until its reply stream ends. */
  hasTurnInFlight(): boolean {
    return this.active !== undefined;
  }

  /** Process transcripts strictly in order until the queue closes. */
  async run(transcripts: BoundedQueue<Transcript>, signal?: AbortSignal): Promise<void> {
    for (;;) {
      const transcript = await transcripts.pull(signal);
      if (!transcript) return;
      await this.handleTranscript(transcript);
    }
  }

  async handleTranscript(transcript: Transcript): Promise<TurnResult> {
    const userText = transcript.text.trim();
    if (!transcript.valid || !userText) {
      return { turnId: "", status: "skipped", text: "" };
    }
    const turn: Turn = { id: randomUUID(), controller: new AbortController(), pieces: [], interrupted: false };
    this.active = turn;
    this.lastSpoken = undefined;
    logTurn(logger, "start", turn.id);
    this.history.append("user", userText);
    this.callbacks.onUserTranscript?.(userText);

    const messages: Message[] = this.history.toMessages();
    const llmStart = Date.now();
    let firstChunkAt: number | undefined;
    let full = "";
    let buffer = "";
    let pendingSpace = "";

    const emit = (raw: string): void => {
      const text = raw.trim();
      if (!text) {
        pendingSpace += raw;
        return;
      }
      if (firstChunkAt === undefined) firstChunkAt = Date.now();
      const item = this.player.enqueue({ turnId: turn.id, text });
      turn.pieces.push({ item, raw: pendingSpace + raw });
      pendingSpace = "";
    };
    const onChunk = (chunk: string): void => {
      if (turn.interrupted) return;
      full += chunk;
      if (this.config.grouping === "chunk") {
        emit(chunk);
        return;
      }
      const { sentences, remainder } = flushSentences(buffer + chunk, this.maxChars);
      buffer = remainder;
      for (const s of sentences) emit(s + " ");
    };

    try {
      await this.streamReply(messages, turn, onChunk);
      if (turn.interrupted) return this.interruptedResult(turn);
      if (this.config.grouping === "sentence") {
        for (const s of flushSentences(buffer, this.maxChars, true).sentences) emit(s);
      }
      const reply = full.trim();
      const stored = this.history.append("assistant", reply);
      turn.storedTurnId = stored?.id;
      this.lastSpoken = turn;
      incrementCounter("turns.completed");
      logLlmCall(logger, messages.length, reply.length, Date.now() - llmStart, firstChunkAt !== undefined ? firstChunkAt - llmStart : undefined);
      recordTurnMetrics({
        turnId: turn.id,
        asrLatencyMs: transcript.recognitionMs,
        llmFirstChunkMs: firstChunkAt !== undefined ? firstChunkAt - llmStart : undefined,
        llmLatencyMs: Date.now() - llmStart,
        endOfUserSpeechToFirstChunkMs: firstChunkAt !== undefined ? firstChunkAt - transcript.speechEndedAt : undefined,
        responseChars: reply.length,
      });
      this.callbacks.onAgentReply?.(reply, "completed");
      logTurn(logger, "end", turn.id, "completed");
      return { turnId: turn.id, status: "completed", text: reply };
    } catch (err) {
      if (turn.interrupted) return this.interruptedResult(turn);
      if (this.config.grouping === "sentence") {
        for (const s of flushSentences(buffer, this.maxChars, true).sentences) emit(s);
      }
      return this.failTurn(turn, err);
    } finally {
      if (this.active === turn) this.active = undefined;
    }
  }

  /**
   * User spoke over the agent: abort the request, silence playback and keep only the heard part of the reply.
   * Safe to call when nothing is in flight.
   */
  bargeIn(): void {
    const start = Date.now();
    incrementCounter("barge_in");
    const turn = this.interrupt("barge_in");
    if (turn) recordTurnMetrics({ turnId: turn.id, bargeInStopLatencyMs: Date.now() - start });
  }

  /** Abort the turn in flight and any playback (shutdown). History keeps what was heard. */
  cancel(): void {
    this.interrupt("shutdown");
  }

  /**
   * Speak a fixed utterance outside a turn. The greeting is stored as an assistant turn so the model
   * knows it was said; the farewell is not.
   */
  speak(text: string, kind: "greeting" | "farewell"): PlaybackItem | undefined {
    const trimmed = text.trim();
    if (!trimmed) return undefined;
    const turnId = `${kind}-${randomUUID()}`;
    const item = this.player.enqueue({ turnId, text: trimmed });
    if (kind === "greeting") {
      const stored = this.history.append("assistant", trimmed);
      this.lastSpoken = { id: turnId, controller: new AbortController(), pieces: [{ item, raw: trimmed }], storedTurnId: stored?.id, interrupted: false };
    }
    return item;
  }

  private interrupt(reason: "barge_in" | "shutdown"): Turn | undefined {
    this.player.cancelAll(reason);
    const turn = this.active ?? this.lastSpoken;
    this.lastSpoken = undefined;
    if (!turn || turn.interrupted) return undefined;
    const heard = turn.pieces.filter((p) => this.wasHeard(p.item));
    if (this.active !== turn && heard.length === turn.pieces.length) return undefined;

    turn.interrupted = true;
    turn.controller.abort();
    const spoken = heard.map((p) => p.raw).join("").trim();
    if (turn.storedTurnId) {
      this.history.update(turn.storedTurnId, { content: spoken, interrupted: true });
    } else {
      const stored = this.history.append("assistant", spoken, { interrupted: true });
      turn.storedTurnId = stored?.id;
    }
    incrementCounter("turns.interrupted");
    logger.info({ event: "TURN_INTERRUPTED", turnId: turn.id, reason, spokenChars: spoken.length, piecesHeard: heard.length, pieces: turn.pieces.length }, "Turn interrupted");
    return turn;
  }

  private wasHeard(item: PlaybackItem): boolean {
    const status = this.player.statusOf(item);
    return status === "playing" || status === "played";
  }

  private interruptedResult(turn: Turn): TurnResult {
    const text = turn.pieces.filter((p) => this.wasHeard(p.item)).map((p) => p.raw).join("").trim();
    this.callbacks.onAgentReply?.(text, "interrupted");
    logTurn(logger, "end", turn.id, "interrupted");
    return { turnId: turn.id, status: "interrupted", text };
  }

  private failTurn(turn: Turn, err: unknown): TurnResult {
    const reason = err instanceof DialogueServiceError ? err.reason : classifyServiceError(err);
    incrementCounter("llm.errors");
    incrementCounter("turns.failed");
    logger.warn({ event: "LLM_FAILED", turnId: turn.id, reason, err: errorMessage(err) }, "Reply failed; apologizing");

    // Mid-stream failure: what was already queued still plays and is recorded as cut short.
    const emitted = turn.pieces.map((p) => p.raw).join("").trim();
    if (emitted) {
      const stored = this.history.append("assistant", emitted, { interrupted: true });
      turn.storedTurnId = stored?.id;
      this.lastSpoken = turn;
    }
    this.player.enqueue({ turnId: turn.id, text: this.config.apologyText });
    this.callbacks.onAgentReply?.(emitted, "failed");
    logTurn(logger, "end", turn.id, "failed");
    return { turnId: turn.id, status: "failed", text: emitted, reason };
  }

  /** One request, retried before the first chunk on transient failures. Throws DialogueServiceError. */
  private async streamReply(messages: Message[], turn: Turn, onChunk: (chunk: string) => void): Promise<void> {
    let attempt = 0;
    for (;;) {
      let received = false;
      const deadline = createDeadline("llm", this.config.timeoutMs, turn.controller.signal);
      try {
        const response = await abortable(
          this.llm.chat(messages, {
            stream: true,
            maxTokens: this.config.maxTokens,
            temperature: this.config.temperature,
            signal: deadline.signal,
          }),
          deadline.signal
        );
        if (response.stream) {
          for await (const chunk of abortableIterable(response.stream, deadline.signal)) {
            if (turn.interrupted) return;
            if (!chunk) continue;
            received = true;
            onChunk(chunk);
          }
        } else if (response.text) {
          received = true;
          onChunk(response.text);
        }
        return;
      } catch (err) {
        const reason: ServiceFailureReason = deadline.expired() ? "timeout" : classifyServiceError(err);
        const retryable = reason === "rate_limit" || reason === "network";
        if (received || turn.interrupted || !retryable || attempt >= this.retry.attempts) {
          throw new DialogueServiceError(reason, `Reply failed: ${errorMessage(err)}`, { cause: err });
        }
        attempt++;
        incrementCounter("llm.retries");
        const delay = this.retry.backoffMs * 2 ** (attempt - 1);
        logger.warn({ event: "LLM_RETRY", turnId: turn.id, attempt, reason, delayMs: delay }, "Retrying reply request");
        if (!(await sleep(delay, turn.controller.signal))) {
          throw new DialogueServiceError("cancelled", "Reply cancelled during retry backoff");
        }
      } finally {
        deadline.dispose();
      }
    }
  }
}
