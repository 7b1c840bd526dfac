import { createAnthropic } from "@ai-sdk/anthropic";
import { generateText, type LanguageModel } from "ai";

export type CompletionRequest = {
  system: string;
  prompt: string;
};

export interface LanguageModelClient {
  complete(request: CompletionRequest): Promise<string>;
}

export type AnthropicClientOptions = {
  apiKey?: string;
  model: string;
  maxTokens: number;
};

export const EMPTY_COMPLETION_TEXT = "No response generated";

export class AnthropicLanguageModel implements LanguageModelClient {
  private readonly languageModel: LanguageModel;
  private readonly maxTokens: number;

  constructor(options: AnthropicClientOptions) {
    const provider = createAnthropic({ apiKey: options.apiKey });
    this.languageModel = provider(options.model);
    this.maxTokens = options.maxTokens;
  }

  async complete(request: CompletionRequest): Promise<string> {
    const result = await generateText({
      model: this.languageModel,
      system: request.system,
      messages: [{ role: "user", content: request.prompt }],
      maxTokens: this.maxTokens
    });

    const text = result.text.trim();
    return text.length > 0 ? text : EMPTY_COMPLETION_TEXT;
  }
}
