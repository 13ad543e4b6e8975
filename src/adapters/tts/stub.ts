import type { ITTS, VoiceOptions } from "./types";

const MS_PER_CHARACTER = 60;

/** Offline synthesis: 16-bit PCM silence lasting roughly as long as the text would take to say. */
export class StubTTS implements ITTS {
  async synthesize(text: string, options?: VoiceOptions): Promise<Buffer> {
    const sampleRateHz = options?.sampleRateHz ?? 16000;
    const samples = Math.round((sampleRateHz * MS_PER_CHARACTER * text.trim().length) / 1000);
    return Buffer.alloc(samples * 2);
  }
}
