import OpenAI from "openai";
import type { ILLM, Message, ChatOptions, ChatResponse } from "./types";

export const DEFAULT_OPENAI_MODEL = "gpt-4o-mini";
const DEFAULT_MAX_TOKENS = 256;

export interface OpenAILlmConfig {
  apiKey: string;
  model?: string;
  maxTokens?: number;
}

/** Chat Completions; the system entry travels as an ordinary message. */
export class OpenAILLM implements ILLM {
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(private readonly cfg: OpenAILlmConfig) {
    this.client = new OpenAI({ apiKey: cfg.apiKey });
    this.model = cfg.model || DEFAULT_OPENAI_MODEL;
  }

  async chat(messages: Message[], options: ChatOptions = {}): Promise<ChatResponse> {
    const completion = await this.client.chat.completions.create({
      model: this.model,
      messages: messages.map(({ role, content }) => ({ role, content })),
      max_tokens: options.maxTokens ?? this.cfg.maxTokens ?? DEFAULT_MAX_TOKENS,
    });
    return { text: completion.choices[0]?.message?.content ?? "" };
  }
}
