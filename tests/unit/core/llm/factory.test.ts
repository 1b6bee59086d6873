import { describe, it, expect } from "vitest";
import { createProvider } from "../../../../src/core/llm/factory.js";
import { AnthropicProvider } from "../../../../src/core/llm/anthropic.js";
import { GoogleProvider } from "../../../../src/core/llm/google.js";
import { OpenAICompatProvider } from "../../../../src/core/llm/openai-compat.js";

describe("createProvider", () => {
  it('creates AnthropicProvider for type "anthropic"', () => {
    const provider = createProvider("anthropic", {
      type: "anthropic",
      api_key: "test-key",
      models: ["claude-sonnet-4-5"],
    });
    expect(provider).toBeInstanceOf(AnthropicProvider);
    expect(provider.name).toBe("anthropic");
  });

  it('creates GoogleProvider for type "google"', () => {
    const provider = createProvider("google", {
      type: "google",
      api_key: "test-key",
      models: ["gemini-2.0-flash"],
    });
    expect(provider).toBeInstanceOf(GoogleProvider);
    expect(provider.name).toBe("google");
  });

  it('creates OpenAICompatProvider for type "openai_compat" named after the config key', () => {
    const provider = createProvider("openrouter", {
      type: "openai_compat",
      api_key: "test-key",
      base_url: "https://openrouter.ai/api/v1",
      models: ["openai/gpt-4o-mini"],
      default_headers: { "X-Title": "ml-upgrader" },
    });
    expect(provider).toBeInstanceOf(OpenAICompatProvider);
    expect(provider.name).toBe("openrouter");
  });
});
