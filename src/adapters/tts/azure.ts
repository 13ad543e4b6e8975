/**
 * Azure Cognitive Services Text-to-Speech adapter.
 * Uses REST API with subscription key; returns raw 16-bit mono PCM at the requested rate.
 */

import { findLanguage } from "../../languages";
import { pickVoice, type ITTS, type VoiceOptions } from "./types";

export interface AzureTTSConfig {
  key: string;
  region: string;
  voiceName?: string;
  languageCode?: string;
}

const OUTPUT_FORMATS: Record<number, string> = {
  8000: "raw-8khz-16bit-mono-pcm",
  16000: "raw-16khz-16bit-mono-pcm",
  24000: "raw-24khz-16bit-mono-pcm",
  48000: "raw-48khz-16bit-mono-pcm",
};

export function azureOutputFormat(sampleRateHz: number): string {
  return OUTPUT_FORMATS[sampleRateHz] ?? OUTPUT_FORMATS[16000];
}

export class AzureTTS implements ITTS {
  constructor(private readonly config: AzureTTSConfig) {}

  async synthesize(text: string, options?: VoiceOptions): Promise<Buffer> {
    const languageCode = options?.languageCode ?? this.config.languageCode ?? "en-IN";
    const voiceName =
      pickVoice(languageCode, options?.voiceName, this.config.voiceName, findLanguage(languageCode)?.azureVoice) ??
      "en-IN-NeerjaNeural";
    const url = `https://${this.config.region}.tts.speech.microsoft.com/cognitiveservices/v1`;
    const response = await fetch(url, {
      method: "POST",
      headers: {
        "Ocp-Apim-Subscription-Key": this.config.key,
        "Content-Type": "application/ssml+xml",
        "X-Microsoft-OutputFormat": azureOutputFormat(options?.sampleRateHz ?? 16000),
      },
      body: `<speak version='1.0' xml:lang='${languageCode}'><voice name='${voiceName}'>${escapeXml(text)}</voice></speak>`,
    });
    if (!response.ok) throw new Error(`Azure TTS failed: ${response.status} ${response.statusText}`);
    const arrayBuffer = await response.arrayBuffer();
    return Buffer.from(arrayBuffer);
  }
}

export function escapeXml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}
