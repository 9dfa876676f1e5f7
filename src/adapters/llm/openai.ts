/**
 * OpenAI Chat Completions LLM adapter.
 * Groq uses the same adapter with its OpenAI-compatible base URL.
 */

import OpenAI from "openai";
import type { ILLM, Message, ChatOptions, ChatResponse } from "./types";

export interface OpenAILlmConfig {
  apiKey: string;
  model: string;
  baseURL?: string;
}

export class OpenAILLM implements ILLM {
  private client: OpenAI;

  constructor(private readonly cfg: OpenAILlmConfig) {
    // Retry policy lives in the orchestrator.
    this.client = new OpenAI({ apiKey: cfg.apiKey, baseURL: cfg.baseURL, maxRetries: 0 });
  }

  async chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse> {
    const body = {
      model: this.cfg.model,
      messages: messages.map((m) => ({ role: m.role, content: m.content })),
      max_tokens: options?.maxTokens ?? 256,
      temperature: options?.temperature,
    };
    const requestOptions = { signal: options?.signal };
    if (options?.stream) {
      const streamResult = await this.client.chat.completions.create({ ...body, stream: true }, requestOptions);
      const asyncIter = (async function* (): AsyncIterable<string> {
        for await (const chunk of streamResult) {
          const delta = chunk.choices[0]?.delta?.content;
          if (delta) yield delta;
        }
      })();
      return { text: "", stream: asyncIter };
    }
    const response = await this.client.chat.completions.create({ ...body, stream: false }, requestOptions);
    const text = response.choices[0]?.message?.content ?? "";
    return { text };
  }
}
