import { GoogleGenAI } from "@google/genai";
import type { LLMProvider, LLMChatParams, LLMResponse } from "./provider.js";

export class GoogleProvider implements LLMProvider {
  readonly name = "google";
  private client: GoogleGenAI;

  constructor(apiKey: string) {
    this.client = new GoogleGenAI({ apiKey });
  }

  async chat(params: LLMChatParams): Promise<LLMResponse> {
    const response = await this.client.models.generateContent({
      model: params.model,
      contents: params.messages.map((m) => ({
        role: m.role === "assistant" ? "model" : "user",
        parts: [{ text: m.content }],
      })),
      config: {
        systemInstruction: params.system,
        maxOutputTokens: params.maxTokens ?? 4096,
        abortSignal: params.signal,
      },
    });

    const candidate = response.candidates?.[0];
    const text = (candidate?.content?.parts ?? [])
      .map((part) => part.text ?? "")
      .join("");

    return {
      text: text.length > 0 ? text : null,
      stopReason: candidate?.finishReason === "MAX_TOKENS" ? "max_tokens" : "end_turn",
      usage: {
        inputTokens: response.usageMetadata?.promptTokenCount ?? null,
        outputTokens: response.usageMetadata?.candidatesTokenCount ?? null,
      },
      model: params.model,
      provider: this.name,
    };
  }
}
