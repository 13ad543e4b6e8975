import type { AppConfig } from "../../config";
import type { IASR } from "./types";
import { StubASR } from "./stub";
import { OpenAIWhisperASR } from "./openai-whisper";

export type { IASR, TranscriptResult, TranscribeOptions } from "./types";
export { StubASR } from "./stub";
export { OpenAIWhisperASR } from "./openai-whisper";

/** Transcription provider for the configured backend; StubASR when Whisper has no API key. */
export function createASR(config: AppConfig): IASR {
  const { provider, openaiApiKey, useLanguageHint } = config.asr;
  if (provider === "openai" && openaiApiKey) {
    return new OpenAIWhisperASR({ apiKey: openaiApiKey, useLanguageHint });
  }
  return new StubASR();
}
