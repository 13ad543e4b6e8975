import type { ILLM, Message, ChatResponse } from "./types";

/** Offline generation: echoes the caller's last message. */
export class StubLLM implements ILLM {
  async chat(messages: Message[]): Promise<ChatResponse> {
    const lastUser = [...messages].reverse().find((m) => m.role === "user");
    return { text: lastUser ? `You said: ${lastUser.content}` : "" };
  }
}
