import OpenAI from "openai";
import { ConfigurationError } from "backend/utils/errors";

export interface CompletionOptions {
  system?: string;
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
}

/** Raw text in, raw text out. The response may be anything, including malformed JSON. */
export interface LlmClient {
  assertReady(): void;
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

export interface OpenAiClientSettings {
  model: string;
  timeoutMs: number;
  maxTokens: number;
  temperature?: number;
}

export class OpenAiLlmClient implements LlmClient {
  constructor(
    private readonly openai: OpenAI | null,
    private readonly settings: OpenAiClientSettings,
  ) {}

  assertReady() {
    if (!this.openai) {
      throw new ConfigurationError("OpenAI API key not configured");
    }
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    if (!this.openai) {
      throw new ConfigurationError("OpenAI API key not configured");
    }

    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
    if (options.system) {
      messages.push({ role: "system", content: options.system });
    }
    messages.push({ role: "user", content: prompt });

    const completion = await this.openai.chat.completions.create(
      {
        model: this.settings.model,
        messages,
        temperature: options.temperature ?? this.settings.temperature ?? 0,
        max_tokens: options.maxTokens ?? this.settings.maxTokens,
      },
      { timeout: options.timeoutMs ?? this.settings.timeoutMs },
    );

    return completion.choices[0]?.message?.content ?? "";
  }
}

export function createOpenAI(apiKey: string | undefined): OpenAI | null {
  return apiKey ? new OpenAI({ apiKey, maxRetries: 1 }) : null;
}
