/**
 * LLM adapter types: chat messages in, text (or a stream of text chunks) out.
 */

export interface Message {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface ChatOptions {
  /** Stream tokens as they are generated. */
  stream?: boolean;
  maxTokens?: number;
  temperature?: number;
  /** Aborts the request and the stream (barge-in, deadline, shutdown). */
  signal?: AbortSignal;
}

export interface ChatResponse {
  /** Full text when not streaming. */
  text: string;
  /**
   * Reply chunks in arrival order when streaming. Finite and not restartable;
   * iteration throws on provider errors (auth, rate limit, network) or abort.
   */
  stream?: AsyncIterable<string>;
}

export interface ILLM {
  chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse>;
}
