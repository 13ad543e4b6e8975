/**
 * Generation provider contract.
 */

export interface Message {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface ChatOptions {
  maxTokens?: number;
}

export interface ChatResponse {
  text: string;
}

/**
 * Ordered messages in (system first, current caller text last), assistant reply out.
 * An empty `text` is treated as a failed generation by the router.
 */
export interface ILLM {
  chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse>;
}
