/**
 * Unit tests for LLM adapters (stub and factory).
 */

import { AnthropicLLM, OpenAILLM, StubLLM, createLLM } from "../../../src/adapters/llm";
import { loadConfig } from "../../../src/config";

describe("StubLLM", () => {
  it("returns empty response", async () => {
    const llm = new StubLLM();
    const result = await llm.chat([{ role: "user", content: "Hello" }]);
    expect(result.text).toBe("");
  });
});

describe("createLLM", () => {
  it("returns StubLLM when provider is stub", () => {
    expect(createLLM(loadConfig({ LLM_PROVIDER: "stub" }))).toBeInstanceOf(StubLLM);
  });

  it("returns StubLLM when the provider's key is missing", () => {
    expect(createLLM(loadConfig({ LLM_PROVIDER: "anthropic" }))).toBeInstanceOf(StubLLM);
  });

  it("picks the adapter for the provider", () => {
    expect(createLLM(loadConfig({ LLM_PROVIDER: "openai", OPENAI_API_KEY: "test-key" }))).toBeInstanceOf(OpenAILLM);
    expect(createLLM(loadConfig({ LLM_PROVIDER: "groq", GROQ_API_KEY: "test-key" }))).toBeInstanceOf(OpenAILLM);
    expect(createLLM(loadConfig({ LLM_PROVIDER: "anthropic", ANTHROPIC_API_KEY: "test-key" }))).toBeInstanceOf(AnthropicLLM);
  });
});
