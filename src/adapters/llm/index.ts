import type { AppConfig } from "../../config";
import type { ILLM } from "./types";
import { StubLLM } from "./stub";
import { OpenAILLM } from "./openai";
import { AnthropicLLM } from "./anthropic";

export type { ILLM, Message, ChatOptions, ChatResponse } from "./types";
export { StubLLM } from "./stub";
export { OpenAILLM, DEFAULT_OPENAI_MODEL } from "./openai";
export { AnthropicLLM, DEFAULT_ANTHROPIC_MODEL, toAnthropicMessages } from "./anthropic";

/** Generation provider for the configured backend; StubLLM when its API key is missing. */
export function createLLM(config: AppConfig): ILLM {
  const { provider, openaiApiKey, openaiModel, anthropicApiKey, anthropicModel, maxTokens } = config.llm;
  switch (provider) {
    case "openai":
      if (openaiApiKey) return new OpenAILLM({ apiKey: openaiApiKey, model: openaiModel, maxTokens });
      break;
    case "anthropic":
      if (anthropicApiKey) return new AnthropicLLM({ apiKey: anthropicApiKey, model: anthropicModel, maxTokens });
      break;
  }
  return new StubLLM();
}
