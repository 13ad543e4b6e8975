/**
 * Bounded conversation memory for the generation stage.
 * Keeps at most one system entry (always first) and a sliding window of user/assistant pairs.
 */

import { logger as rootLogger, type Logger } from "../logging";
import type { ContextMessage, HistoryEntry } from "./types";

export interface ContextManagerConfig {
  /** Max user+assistant pairs retained (default 10). */
  maxHistory?: number;
  logger?: Logger;
}

export interface GetContextOptions {
  /** Append known user metadata to the system message (one is added when absent). */
  includeMetadata?: boolean;
}

export const DEFAULT_MAX_HISTORY = 10;

export class ContextManager {
  private system: HistoryEntry | undefined;
  private entries: HistoryEntry[] = [];
  private currentLanguage: string | undefined;
  private readonly userMetadata = new Map<string, unknown>();
  private readonly sessionContext = new Map<string, unknown>();
  private readonly maxHistory: number;
  private readonly log: Logger;

  constructor(config: ContextManagerConfig = {}) {
    this.maxHistory = config.maxHistory ?? DEFAULT_MAX_HISTORY;
    if (!Number.isInteger(this.maxHistory) || this.maxHistory < 1) {
      throw new RangeError(`maxHistory must be a positive integer, got ${this.maxHistory}`);
    }
    this.log = config.logger ?? rootLogger;
  }

  addTurn(userInput: string, assistantResponse: string, language: string): void {
    const timestamp = Date.now();
    this.entries.push(
      { role: "user", content: userInput, language, timestamp },
      { role: "assistant", content: assistantResponse, language, timestamp }
    );
    this.currentLanguage = language;

    const limit = this.maxHistory * 2;
    if (this.entries.length > limit) {
      const dropped = this.entries.length - limit;
      this.entries = this.entries.slice(-limit);
      this.log.debug({ event: "HISTORY_TRIMMED", dropped, retained: this.entries.length }, "Trimmed conversation history");
    }
  }

  /** Replace the single system entry. */
  setSystemPrompt(systemPrompt: string): void {
    this.system = { role: "system", content: systemPrompt, timestamp: Date.now() };
    this.log.debug({ event: "SYSTEM_PROMPT_SET", length: systemPrompt.length }, "System prompt updated");
  }

  getSystemPrompt(): string | undefined {
    return this.system?.content;
  }

  /**
   * Prompt-ready messages: stored system entry (or `systemPrompt` when none is stored),
   * then history in chronological order.
   */
  getContext(systemPrompt?: string, options: GetContextOptions = {}): ContextMessage[] {
    const messages: ContextMessage[] = [];
    const system = this.system?.content ?? systemPrompt;
    if (system) messages.push({ role: "system", content: system });
    for (const e of this.entries) messages.push({ role: e.role, content: e.content });

    if (options.includeMetadata && this.userMetadata.size > 0) {
      const line = `[User Metadata: ${JSON.stringify(Object.fromEntries(this.userMetadata))}]`;
      const first = messages[0];
      if (first && first.role === "system") {
        messages[0] = { role: "system", content: `${first.content}\n${line}` };
      } else {
        messages.unshift({ role: "system", content: line });
      }
    }
    return messages;
  }

  /** Drop every non-system entry. */
  clearHistory(): void {
    this.entries = [];
    this.log.info({ event: "HISTORY_CLEARED" }, "Conversation history cleared");
  }

  /** Number of user entries retained. */
  getTurnCount(): number {
    return this.entries.filter((e) => e.role === "user").length;
  }

  /** Last `n` user+assistant pairs, with internal fields. */
  getRecentHistory(n = 3): HistoryEntry[] {
    if (n <= 0) return [];
    return this.entries.slice(-(n * 2)).map((e) => ({ ...e }));
  }

  /** Non-system entry count. */
  size(): number {
    return this.entries.length;
  }

  getCurrentLanguage(): string | undefined {
    return this.currentLanguage;
  }

  setUserMetadata(key: string, value: unknown): void {
    this.userMetadata.set(key, value);
  }

  getUserMetadata(key: string): unknown {
    return this.userMetadata.get(key);
  }

  setSessionContext(key: string, value: unknown): void {
    this.sessionContext.set(key, value);
  }

  getSessionContext(key: string): unknown {
    return this.sessionContext.get(key);
  }
}
