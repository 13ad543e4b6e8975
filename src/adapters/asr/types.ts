/**
 * Transcription provider contract.
 */

export interface TranscriptResult {
  /** Transcribed text. */
  text: string;
  /** Detected language as a registry code (e.g. te-IN), when the provider reports one. */
  language?: string;
}

export interface TranscribeOptions {
  /** Expected language (registry code). Providers may ignore it. */
  languageHint?: string;
  /** Container/format hint (e.g. "wav", "webm"). Provider-dependent. */
  format?: string;
}

/**
 * One complete utterance (WAV) in, transcript and detected language out.
 * Rejects on malformed audio or transport failure; an empty `text` counts as a failed attempt upstream.
 */
export interface IASR {
  transcribe(audioBuffer: Buffer, options?: TranscribeOptions): Promise<TranscriptResult>;
}
