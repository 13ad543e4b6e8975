/**
 * Synthesis provider contract and voice selection.
 */

export interface VoiceOptions {
  /** Voice name or id (provider-specific). */
  voiceName?: string;
  /** Language code (e.g. te-IN). */
  languageCode?: string;
  /** Sample rate in Hz (8000 for telephony). */
  sampleRateHz?: number;
  /** Optional speaking rate (provider-specific). */
  speakingRate?: number;
}

/**
 * TTS adapter interface: text in, 16-bit mono PCM out (a WAV header may be present).
 */
export interface ITTS {
  synthesize(text: string, options?: VoiceOptions): Promise<Buffer>;
}

/**
 * Pick a voice for the language: explicit option, then the configured voice when it belongs to
 * the same language, then the registry default.
 */
export function pickVoice(
  languageCode: string,
  explicit: string | undefined,
  configured: string | undefined,
  registryDefault: string | undefined
): string | undefined {
  if (explicit) return explicit;
  if (configured && configured.toLowerCase().startsWith(languageCode.toLowerCase())) return configured;
  return registryDefault;
}
