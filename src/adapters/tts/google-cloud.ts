/**
 * Google Cloud Text-to-Speech adapter.
 * - With API key: REST API (env GOOGLE_CLOUD_TTS_API_KEY).
 * - Without API key: @google-cloud/text-to-speech client using Application Default
 *   Credentials (GOOGLE_APPLICATION_CREDENTIALS service account JSON).
 * LINEAR16 responses carry a WAV header; callers strip it.
 */

import { TextToSpeechClient } from "@google-cloud/text-to-speech";
import { findLanguage } from "../../languages";
import { pickVoice, type ITTS, type VoiceOptions } from "./types";

export interface GoogleCloudTTSConfig {
  apiKey: string;
  voiceName?: string;
  languageCode?: string;
}

const SYNTHESIZE_URL = "https://texttospeech.googleapis.com/v1/text:synthesize";

interface SynthesizeRequest {
  input: { text: string };
  voice: { name?: string; languageCode: string };
  audioConfig: { audioEncoding: "LINEAR16"; sampleRateHertz: number; speakingRate?: number };
}

function buildRequest(
  text: string,
  options: VoiceOptions | undefined,
  config: { voiceName?: string; languageCode?: string }
): SynthesizeRequest {
  const languageCode = options?.languageCode ?? config.languageCode ?? "en-IN";
  const name = pickVoice(languageCode, options?.voiceName, config.voiceName, findLanguage(languageCode)?.googleVoice);
  return {
    input: { text },
    voice: name ? { name, languageCode } : { languageCode },
    audioConfig: {
      audioEncoding: "LINEAR16",
      sampleRateHertz: options?.sampleRateHz ?? 16000,
      ...(options?.speakingRate != null ? { speakingRate: options.speakingRate } : {}),
    },
  };
}

/** TTS using REST API with API key. */
export class GoogleCloudTTS implements ITTS {
  constructor(private readonly config: GoogleCloudTTSConfig) {}

  async synthesize(text: string, options?: VoiceOptions): Promise<Buffer> {
    const url = `${SYNTHESIZE_URL}?key=${encodeURIComponent(this.config.apiKey)}`;
    const response = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(buildRequest(text, options, this.config)),
    });
    if (!response.ok) {
      const errText = await response.text();
      throw new Error(`Google TTS failed: ${response.status} ${errText}`);
    }
    const data: unknown = await response.json();
    const b64 =
      typeof data === "object" && data !== null && "audioContent" in data && typeof data.audioContent === "string"
        ? data.audioContent
        : "";
    if (!b64) return Buffer.alloc(0);
    return Buffer.from(b64, "base64");
  }
}

/** TTS using official Node client and Application Default Credentials (OAuth2 / service account). */
export interface GoogleCloudTTSADCConfig {
  voiceName?: string;
  languageCode?: string;
}

export class GoogleCloudTTSADC implements ITTS {
  private readonly client: TextToSpeechClient;
  constructor(private readonly config: GoogleCloudTTSADCConfig = {}) {
    this.client = new TextToSpeechClient();
  }

  async synthesize(text: string, options?: VoiceOptions): Promise<Buffer> {
    const [response] = await this.client.synthesizeSpeech(buildRequest(text, options, this.config));
    const content = response.audioContent;
    if (!content || !(content instanceof Uint8Array)) return Buffer.alloc(0);
    return Buffer.from(content);
  }
}
