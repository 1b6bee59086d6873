import Anthropic from "@anthropic-ai/sdk";
import type { LLMProvider, LLMChatParams, LLMResponse } from "./provider.js";

export class AnthropicProvider implements LLMProvider {
  readonly name = "anthropic";
  private client: Anthropic;

  constructor(apiKey: string, baseURL?: string) {
    this.client = new Anthropic({ apiKey, baseURL, maxRetries: 0 });
  }

  async chat(params: LLMChatParams): Promise<LLMResponse> {
    const response = await this.client.messages.create(
      {
        model: params.model,
        max_tokens: params.maxTokens ?? 4096,
        system: params.system,
        messages: params.messages.map((m) => ({ role: m.role, content: m.content })),
      },
      { signal: params.signal }
    );

    const text = response.content
      .map((block) => (block.type === "text" ? block.text : ""))
      .join("");

    return {
      text: text.length > 0 ? text : null,
      stopReason: response.stop_reason === "max_tokens" ? "max_tokens" : "end_turn",
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      },
      model: params.model,
      provider: this.name,
    };
  }
}
