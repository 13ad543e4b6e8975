/**
 * OpenAI Whisper API ASR adapter.
 * Whisper reports the detected language by name ("telugu"); it is mapped back to a registry code.
 */

import OpenAI, { toFile } from "openai";
import { findLanguage, resolveLanguageCode } from "../../languages";
import type { IASR, TranscribeOptions, TranscriptResult } from "./types";

export interface OpenAIWhisperConfig {
  apiKey: string;
  model?: string;
  /**
   * Forward the language hint to Whisper. Off by default: a hinted request reports the hinted
   * language back, which would hide a caller's language change from auto-switching.
   */
  useLanguageHint?: boolean;
}

export class OpenAIWhisperASR implements IASR {
  private readonly client: OpenAI;

  constructor(private readonly config: OpenAIWhisperConfig) {
    this.client = new OpenAI({ apiKey: config.apiKey });
  }

  async transcribe(audioBuffer: Buffer, options: TranscribeOptions = {}): Promise<TranscriptResult> {
    const ext = options.format === "webm" ? "webm" : "wav";
    const hint =
      this.config.useLanguageHint && options.languageHint ? findLanguage(options.languageHint)?.iso639 : undefined;
    const transcription = await this.client.audio.transcriptions.create({
      file: await toFile(audioBuffer, `utterance.${ext}`),
      model: this.config.model ?? "whisper-1",
      response_format: "verbose_json",
      ...(hint ? { language: hint } : {}),
    });
    const result: { text?: string; language?: string } = transcription;
    return {
      text: result.text ?? "",
      language: resolveLanguageCode(result.language),
    };
  }
}
