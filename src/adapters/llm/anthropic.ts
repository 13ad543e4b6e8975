/**
 * Anthropic Messages API adapter.
 * System entries are lifted into the dedicated `system` field; the rest must alternate user/assistant.
 */

import Anthropic from "@anthropic-ai/sdk";
import type { ILLM, Message, ChatOptions, ChatResponse } from "./types";

export const DEFAULT_ANTHROPIC_MODEL = "claude-3-5-sonnet-20241022";
const DEFAULT_MAX_TOKENS = 256;

export interface AnthropicLlmConfig {
  apiKey: string;
  model?: string;
  maxTokens?: number;
}

type TurnMessage = { role: "user" | "assistant"; content: string };

/** Split out the system text and merge adjacent same-role entries. */
export function toAnthropicMessages(messages: Message[]): { system: string | undefined; turns: TurnMessage[] } {
  const system: string[] = [];
  const turns: TurnMessage[] = [];
  for (const m of messages) {
    if (m.role === "system") {
      system.push(m.content);
      continue;
    }
    const last = turns[turns.length - 1];
    if (last && last.role === m.role) {
      last.content = `${last.content}\n${m.content}`;
    } else {
      turns.push({ role: m.role, content: m.content });
    }
  }
  return { system: system.length > 0 ? system.join("\n\n") : undefined, turns };
}

export class AnthropicLLM implements ILLM {
  private readonly client: Anthropic;
  private readonly model: string;

  constructor(private readonly cfg: AnthropicLlmConfig) {
    this.client = new Anthropic({ apiKey: cfg.apiKey });
    this.model = cfg.model || DEFAULT_ANTHROPIC_MODEL;
  }

  async chat(messages: Message[], options: ChatOptions = {}): Promise<ChatResponse> {
    const { system, turns } = toAnthropicMessages(messages);
    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: options.maxTokens ?? this.cfg.maxTokens ?? DEFAULT_MAX_TOKENS,
      ...(system ? { system } : {}),
      messages: turns,
    });
    const text = response.content
      .map((block) => (block.type === "text" ? block.text : ""))
      .join("");
    return { text };
  }
}
