import { DEFAULT_SYSTEM_PROMPT } from "../config";
import { languageName } from "../languages";

/** Builds the system prompt for a conversation language. */
export interface PromptBuilder {
  buildSystemPrompt(language: string): string;
  /** Replace the persona text later prompts are built from. */
  setBasePrompt?(systemPrompt: string): void;
}

export interface PromptManagerConfig {
  /** Base system prompt/persona. Defaults to DEFAULT_SYSTEM_PROMPT. */
  systemPrompt?: string;
  /** Override the response-language instruction (e.g. for a persona that code-switches). */
  languageInstruction?: (language: string, name: string) => string;
}

/** System prompt = base persona + a response-language instruction for the turn language. */
export class PromptManager implements PromptBuilder {
  private systemPrompt: string;
  private readonly languageInstruction: (language: string, name: string) => string;

  constructor(cfg: PromptManagerConfig = {}) {
    this.systemPrompt = cfg.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;
    this.languageInstruction =
      cfg.languageInstruction ??
      ((_language, name) => `Always respond in ${name}, even if the caller mixes in other languages.`);
  }

  buildSystemPrompt(language: string): string {
    return [this.systemPrompt, this.languageInstruction(language, languageName(language))].join("\n\n");
  }

  setBasePrompt(systemPrompt: string): void {
    this.systemPrompt = systemPrompt;
  }

  getBasePrompt(): string {
    return this.systemPrompt;
  }
}
