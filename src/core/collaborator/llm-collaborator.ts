import type { Logger } from "../../utils/logger.js";
import type { LLMProvider } from "../llm/provider.js";
import type { Collaborator, ProposalRequest } from "./collaborator.js";
import { SYSTEM_PROMPT, buildUserPrompt, extractCandidate } from "./prompt.js";

export interface LLMCollaboratorOptions {
  model: string;
  maxTokens: number;
}

/** Asks an LLM for a full rewrite of the file. */
export class LLMCollaborator implements Collaborator {
  constructor(
    private readonly provider: LLMProvider,
    private readonly options: LLMCollaboratorOptions,
    private readonly logger: Logger
  ) {}

  async propose(request: ProposalRequest, signal?: AbortSignal): Promise<string> {
    const response = await this.provider.chat({
      model: this.options.model,
      system: SYSTEM_PROMPT,
      messages: [{ role: "user", content: buildUserPrompt(request) }],
      maxTokens: this.options.maxTokens,
      signal,
    });

    this.logger.debug(
      {
        provider: response.provider,
        model: response.model,
        attempt: request.attempt,
        inputTokens: response.usage.inputTokens,
        outputTokens: response.usage.outputTokens,
        stopReason: response.stopReason,
      },
      "Collaborator replied"
    );

    if (response.stopReason === "max_tokens") {
      this.logger.warn({ attempt: request.attempt }, "Collaborator reply hit the token limit; candidate may be cut off");
    }

    return extractCandidate(response.text);
  }
}
