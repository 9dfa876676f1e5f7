/**
 * Anthropic Claude LLM adapter.
 */

import Anthropic from "@anthropic-ai/sdk";
import type { ILLM, Message, ChatOptions, ChatResponse } from "./types";

export interface AnthropicLlmConfig {
  apiKey: string;
  model: string;
}

export class AnthropicLLM implements ILLM {
  private client: Anthropic;

  constructor(private readonly cfg: AnthropicLlmConfig) {
    this.client = new Anthropic({ apiKey: cfg.apiKey, maxRetries: 0 });
  }

  async chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse> {
    const system = messages.find((m) => m.role === "system")?.content;
    const msgs = messages.flatMap((m) =>
      m.role === "system" ? [] : [{ role: m.role, content: m.content }]
    );
    const body = {
      model: this.cfg.model,
      max_tokens: options?.maxTokens ?? 256,
      temperature: options?.temperature,
      system,
      messages: msgs,
    };
    const requestOptions = { signal: options?.signal };
    if (options?.stream) {
      const streamResult = this.client.messages.stream(body, requestOptions);
      const asyncIter = (async function* (): AsyncIterable<string> {
        for await (const event of streamResult) {
          if (event.type === "content_block_delta" && event.delta.type === "text_delta") {
            yield event.delta.text;
          }
        }
      })();
      return { text: "", stream: asyncIter };
    }
    const response = await this.client.messages.create(body, requestOptions);
    const textBlock = response.content.find((b) => b.type === "text");
    const text = textBlock && textBlock.type === "text" ? textBlock.text : "";
    return { text };
  }
}
