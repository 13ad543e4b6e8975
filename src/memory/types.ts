/**
 * Conversation history types.
 */

export type HistoryRole = "user" | "assistant" | "system";

export interface HistoryEntry {
  role: HistoryRole;
  content: string;
  /** Language the turn was processed in; absent on the system entry. */
  language?: string;
  /** Epoch ms. */
  timestamp: number;
}

/** Prompt-ready message: role and content only. */
export interface ContextMessage {
  role: HistoryRole;
  content: string;
}
