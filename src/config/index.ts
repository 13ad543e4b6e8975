/**
 * Env-based configuration for the turn engine.
 * Load from .env.local (or process.env). Do not commit secrets.
 */

import * as path from "path";
import { config as loadEnv } from "dotenv";
import { bytesForDuration } from "../pipeline/audio-utils";

// Load .env.local from project root when not set
const envPath = path.resolve(process.cwd(), ".env.local");
loadEnv({ path: envPath });

export type AsrProvider = "openai" | "stub";
export type LlmProvider = "openai" | "anthropic" | "stub";
export type TtsProvider = "google" | "azure" | "stub";
export type AudioEncoding = "mulaw" | "pcm16";
export type CircuitScope = "session" | "global";

export interface ConversationConfig {
  /** Language used until one is selected or detected. */
  defaultLanguage: string;
  /** Base system prompt; the prompt manager adds the response-language instruction. */
  systemPrompt: string;
  /** Max user+assistant pairs kept in context. */
  maxHistory: number;
  /** Consecutive identical mismatched detections needed to auto-switch. */
  switchThreshold: number;
  /** Detections retained for observability. */
  historySize: number;
  /** Detections that must have happened before any auto-switch. */
  minTurnsBeforeSwitch: number;
}

export interface ResilienceConfig {
  /** Attempts (not extra retries) for transcribe and synthesize. */
  retryCount: number;
  retryDelayMs: number;
  /** Per-attempt timeout for every provider call. */
  callTimeoutMs: number;
  enableCircuitBreaker: boolean;
  failureThreshold: number;
  circuitTimeoutMs: number;
  /** "session": one breaker set per call. "global": shared across every call in the process. */
  circuitScope: CircuitScope;
}

export interface AudioConfig {
  encoding: AudioEncoding;
  sampleRateHz: number;
  /** Bytes per inbound frame (160 = 20ms of 8kHz µ-law). */
  frameBytes: number;
  frameMs: number;
  /** RMS threshold on linear 16-bit samples; below = silence. */
  energyThreshold: number;
  /** Trailing silence that ends an utterance. */
  endpointSilenceMs: number;
  /** Shorter speech spans are discarded as noise. */
  minSpeechMs: number;
}

export interface StreamerConfig {
  chunkSize: number;
  chunkIntervalMs: number;
}

export interface AppConfig {
  /** ASR (speech-to-text) provider and options */
  asr: {
    provider: AsrProvider;
    openaiApiKey?: string;
    /** Send the turn language to the provider as a hint (disables detection on Whisper). */
    useLanguageHint?: boolean;
  };

  /** LLM provider and options */
  llm: {
    provider: LlmProvider;
    openaiApiKey?: string;
    openaiModel?: string;
    anthropicApiKey?: string;
    anthropicModel?: string;
    maxTokens?: number;
  };

  /** TTS (text-to-speech) provider and options */
  tts: {
    provider: TtsProvider;
    googleApiKey?: string;
    googleVoiceName?: string;
    azureKey?: string;
    azureRegion?: string;
    azureVoiceName?: string;
  };

  conversation: ConversationConfig;
  resilience: ResilienceConfig;
  audio: AudioConfig;
  streamer: StreamerConfig;
}

export const DEFAULT_SYSTEM_PROMPT = [
  "You are a helpful voice assistant on a phone call.",
  "Keep responses short: two or three sentences at most.",
  "Ask one clear question at a time.",
].join(" ");

export const DEFAULT_CONVERSATION: ConversationConfig = {
  defaultLanguage: "te-IN",
  systemPrompt: DEFAULT_SYSTEM_PROMPT,
  maxHistory: 10,
  switchThreshold: 2,
  historySize: 5,
  minTurnsBeforeSwitch: 2,
};

export const DEFAULT_RESILIENCE: ResilienceConfig = {
  retryCount: 2,
  retryDelayMs: 500,
  callTimeoutMs: 20_000,
  enableCircuitBreaker: true,
  failureThreshold: 5,
  circuitTimeoutMs: 60_000,
  circuitScope: "session",
};

export const DEFAULT_AUDIO: AudioConfig = {
  encoding: "mulaw",
  sampleRateHz: 8000,
  frameBytes: 160,
  frameMs: 20,
  energyThreshold: 500,
  endpointSilenceMs: 700,
  minSpeechMs: 500,
};

export const DEFAULT_STREAMER: StreamerConfig = {
  chunkSize: 160,
  chunkIntervalMs: 20,
};

function getEnv(key: string, defaultValue?: string): string | undefined {
  const v = process.env[key];
  if (v === undefined || v === "") return defaultValue;
  return v.trim();
}

function getInt(key: string, defaultValue: number, min = 0): number {
  const v = getEnv(key);
  if (v === undefined) return defaultValue;
  const n = parseInt(v, 10);
  return Number.isNaN(n) || n < min ? defaultValue : n;
}

function getBool(key: string, defaultValue: boolean): boolean {
  const v = getEnv(key)?.toLowerCase();
  if (v === undefined) return defaultValue;
  return v === "true" || v === "1";
}

function getChoice<T extends string>(value: string | undefined, allowed: readonly T[], defaultValue: T): T {
  return allowed.find((a) => a === value?.toLowerCase()) ?? defaultValue;
}

/**
 * Build config from environment variables.
 * ASR_PROVIDER, LLM_PROVIDER, TTS_PROVIDER select adapters (openai, anthropic, google, azure, stub).
 */
export function loadConfig(): AppConfig {
  const encoding = getChoice(getEnv("AUDIO_ENCODING"), ["mulaw", "pcm16"], DEFAULT_AUDIO.encoding);
  const sampleRateHz = getInt("AUDIO_SAMPLE_RATE", DEFAULT_AUDIO.sampleRateHz, 1);
  const frameMs = getInt("AUDIO_FRAME_MS", DEFAULT_AUDIO.frameMs, 1);
  const chunkIntervalMs = getInt("STREAM_CHUNK_INTERVAL_MS", DEFAULT_STREAMER.chunkIntervalMs);
  // Byte sizes follow the audio format unless set explicitly.
  const frameBytes = getInt("AUDIO_FRAME_BYTES", bytesForDuration(encoding, sampleRateHz, frameMs), 1);
  const chunkMs = chunkIntervalMs > 0 ? chunkIntervalMs : frameMs;
  return {
    asr: {
      provider: getChoice(getEnv("ASR_PROVIDER"), ["openai", "stub"], "openai"),
      openaiApiKey: getEnv("OPENAI_API_KEY"),
      useLanguageHint: getBool("ASR_LANGUAGE_HINT", false),
    },
    llm: {
      provider: getChoice(getEnv("MODEL_PROVIDER") ?? getEnv("LLM_PROVIDER"), ["openai", "anthropic", "stub"], "openai"),
      openaiApiKey: getEnv("OPENAI_API_KEY"),
      openaiModel: getEnv("OPENAI_MODEL_NAME") || "gpt-4o-mini",
      anthropicApiKey: getEnv("ANTHROPIC_API_KEY"),
      anthropicModel: getEnv("ANTHROPIC_MODEL_NAME") || "claude-3-5-sonnet-20241022",
      maxTokens: getInt("LLM_MAX_TOKENS", 200, 1),
    },
    tts: {
      provider: getChoice(getEnv("TTS_PROVIDER"), ["google", "azure", "stub"], "google"),
      googleApiKey: getEnv("GOOGLE_CLOUD_TTS_API_KEY"),
      googleVoiceName: getEnv("GOOGLE_TTS_VOICE_NAME"),
      azureKey: getEnv("AZURE_TTS_KEY"),
      azureRegion: getEnv("AZURE_TTS_REGION"),
      azureVoiceName: getEnv("AZURE_TTS_VOICE_NAME"),
    },
    conversation: {
      defaultLanguage: getEnv("DEFAULT_LANGUAGE") ?? DEFAULT_CONVERSATION.defaultLanguage,
      systemPrompt: getEnv("SYSTEM_PROMPT") ?? DEFAULT_CONVERSATION.systemPrompt,
      maxHistory: getInt("MAX_HISTORY", DEFAULT_CONVERSATION.maxHistory, 1),
      switchThreshold: getInt("SWITCH_THRESHOLD", DEFAULT_CONVERSATION.switchThreshold, 1),
      historySize: getInt("LANGUAGE_HISTORY_SIZE", DEFAULT_CONVERSATION.historySize, 1),
      minTurnsBeforeSwitch: getInt("MIN_TURNS_BEFORE_SWITCH", DEFAULT_CONVERSATION.minTurnsBeforeSwitch, 0),
    },
    resilience: {
      retryCount: getInt("RETRY_COUNT", DEFAULT_RESILIENCE.retryCount, 1),
      retryDelayMs: getInt("RETRY_DELAY_MS", DEFAULT_RESILIENCE.retryDelayMs),
      callTimeoutMs: getInt("CALL_TIMEOUT_MS", DEFAULT_RESILIENCE.callTimeoutMs, 1),
      enableCircuitBreaker: getBool("ENABLE_CIRCUIT_BREAKER", DEFAULT_RESILIENCE.enableCircuitBreaker),
      failureThreshold: getInt("FAILURE_THRESHOLD", DEFAULT_RESILIENCE.failureThreshold, 1),
      circuitTimeoutMs: getInt("CIRCUIT_TIMEOUT_MS", DEFAULT_RESILIENCE.circuitTimeoutMs),
      circuitScope: getChoice(getEnv("CIRCUIT_SCOPE"), ["session", "global"], DEFAULT_RESILIENCE.circuitScope),
    },
    audio: {
      encoding,
      sampleRateHz,
      frameBytes,
      frameMs,
      energyThreshold: getInt("VAD_ENERGY_THRESHOLD", DEFAULT_AUDIO.energyThreshold),
      endpointSilenceMs: getInt("VAD_SILENCE_MS", DEFAULT_AUDIO.endpointSilenceMs, 1),
      minSpeechMs: getInt("VAD_MIN_SPEECH_MS", DEFAULT_AUDIO.minSpeechMs),
    },
    streamer: {
      chunkSize: getInt("STREAM_CHUNK_SIZE", bytesForDuration(encoding, sampleRateHz, chunkMs), 1),
      chunkIntervalMs,
    },
  };
}
