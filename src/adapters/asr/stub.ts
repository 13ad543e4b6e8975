import type { IASR, TranscribeOptions, TranscriptResult } from "./types";

/** Offline transcription: every utterance reads as a fixed phrase in the hinted language. */
export class StubASR implements IASR {
  constructor(private readonly phrase = "hello") {}

  async transcribe(_audioBuffer: Buffer, options: TranscribeOptions = {}): Promise<TranscriptResult> {
    return options.languageHint ? { text: this.phrase, language: options.languageHint } : { text: this.phrase };
  }
}
