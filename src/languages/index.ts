/**
 * Language registry: BCP-47 codes the engine knows, with the names and codes each provider expects.
 */

export interface LanguageInfo {
  /** BCP-47 code used throughout the pipeline (e.g. te-IN). */
  code: string;
  /** Human-readable English name (also used in prompts). */
  name: string;
  /** ISO-639-1 code accepted by Whisper as a language hint. */
  iso639: string;
  /** Name Whisper reports in verbose_json `language`. */
  whisperName: string;
  googleVoice: string;
  azureVoice: string;
}

export const LANGUAGES: readonly LanguageInfo[] = [
  { code: "te-IN", name: "Telugu", iso639: "te", whisperName: "telugu", googleVoice: "te-IN-Standard-A", azureVoice: "te-IN-ShrutiNeural" },
  { code: "hi-IN", name: "Hindi", iso639: "hi", whisperName: "hindi", googleVoice: "hi-IN-Neural2-A", azureVoice: "hi-IN-SwaraNeural" },
  { code: "en-IN", name: "English", iso639: "en", whisperName: "english", googleVoice: "en-IN-Neural2-A", azureVoice: "en-IN-NeerjaNeural" },
  { code: "gu-IN", name: "Gujarati", iso639: "gu", whisperName: "gujarati", googleVoice: "gu-IN-Standard-A", azureVoice: "gu-IN-DhwaniNeural" },
  { code: "ta-IN", name: "Tamil", iso639: "ta", whisperName: "tamil", googleVoice: "ta-IN-Standard-A", azureVoice: "ta-IN-PallaviNeural" },
  { code: "kn-IN", name: "Kannada", iso639: "kn", whisperName: "kannada", googleVoice: "kn-IN-Standard-A", azureVoice: "kn-IN-SapnaNeural" },
  { code: "mr-IN", name: "Marathi", iso639: "mr", whisperName: "marathi", googleVoice: "mr-IN-Standard-A", azureVoice: "mr-IN-AarohiNeural" },
  { code: "bn-IN", name: "Bengali", iso639: "bn", whisperName: "bengali", googleVoice: "bn-IN-Standard-A", azureVoice: "bn-IN-TanishaaNeural" },
];

export function findLanguage(code: string): LanguageInfo | undefined {
  return LANGUAGES.find((l) => l.code === code);
}

export function isKnownLanguage(code: string): boolean {
  return findLanguage(code) !== undefined;
}

/** Readable name for a code; unknown codes are returned as-is. */
export function languageName(code: string): string {
  return findLanguage(code)?.name ?? code;
}

/**
 * Map whatever a provider reports ("telugu", "te", "te-IN") to a registry code.
 * Returns undefined when nothing matches.
 */
export function resolveLanguageCode(reported: string | undefined): string | undefined {
  const v = reported?.trim().toLowerCase();
  if (!v) return undefined;
  const match = LANGUAGES.find(
    (l) => l.code.toLowerCase() === v || l.iso639 === v || l.whisperName === v || l.name.toLowerCase() === v
  );
  return match?.code;
}
