import OpenAI from "openai";
import type { LLMProvider, LLMChatParams, LLMResponse } from "./provider.js";

export interface OpenAICompatConfig {
  baseURL?: string;
  apiKey: string;
  name: string;
  defaultHeaders?: Record<string, string>;
}

/** OpenAI chat completions API; also serves OpenRouter and local gateways. */
export class OpenAICompatProvider implements LLMProvider {
  readonly name: string;
  private client: OpenAI;

  constructor(config: OpenAICompatConfig) {
    this.name = config.name;
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      defaultHeaders: config.defaultHeaders,
      // Retries are owned by the resilient collaborator.
      maxRetries: 0,
    });
  }

  async chat(params: LLMChatParams): Promise<LLMResponse> {
    const messages: OpenAI.ChatCompletionMessageParam[] = [
      { role: "system", content: params.system },
      ...params.messages.map((m): OpenAI.ChatCompletionMessageParam =>
        m.role === "assistant"
          ? { role: "assistant", content: m.content }
          : { role: "user", content: m.content }
      ),
    ];

    const response = await this.client.chat.completions.create(
      {
        model: params.model,
        messages,
        max_tokens: params.maxTokens ?? 4096,
      },
      { signal: params.signal }
    );

    const choice = response.choices[0];
    return {
      text: choice?.message.content ?? null,
      stopReason: choice?.finish_reason === "length" ? "max_tokens" : "end_turn",
      usage: {
        inputTokens: response.usage?.prompt_tokens ?? null,
        outputTokens: response.usage?.completion_tokens ?? null,
      },
      model: params.model,
      provider: this.name,
    };
  }
}
