/**
 * In-process providers and config for tests: scripted results, recorded calls, no network.
 */

import type { IASR, TranscribeOptions, TranscriptResult } from "../../src/adapters/asr";
import type { ChatOptions, ChatResponse, ILLM, Message } from "../../src/adapters/llm";
import type { ITTS, VoiceOptions } from "../../src/adapters/tts";
import {
  DEFAULT_AUDIO,
  DEFAULT_CONVERSATION,
  DEFAULT_RESILIENCE,
  DEFAULT_STREAMER,
  type AppConfig,
} from "../../src/config";
import type { SessionConfig } from "../../src/pipeline/call-session";

/** One scripted step: a value to resolve, an Error to reject with, or a pending promise. */
export type Step<T> = T | Error | Promise<T>;

function next<T>(steps: Step<T>[], fallback: Step<T>): Promise<T> {
  const step = steps.length > 0 ? steps.shift() : fallback;
  if (step instanceof Error) return Promise.reject(step);
  if (step instanceof Promise) return step;
  if (step === undefined) return Promise.reject(new Error("no scripted step"));
  return Promise.resolve(step);
}

export class FakeASR implements IASR {
  readonly calls: Array<{ audio: Buffer; options?: TranscribeOptions }> = [];
  constructor(
    private readonly steps: Step<TranscriptResult>[] = [],
    private readonly fallback: Step<TranscriptResult> = { text: "hello" }
  ) {}

  transcribe(audio: Buffer, options?: TranscribeOptions): Promise<TranscriptResult> {
    this.calls.push({ audio, options });
    return next(this.steps, this.fallback);
  }

  script(...steps: Step<TranscriptResult>[]): void {
    this.steps.push(...steps);
  }
}

export class FakeLLM implements ILLM {
  readonly calls: Array<{ messages: Message[]; options?: ChatOptions }> = [];
  constructor(
    private readonly steps: Step<ChatResponse>[] = [],
    private readonly fallback: Step<ChatResponse> = { text: "hi there" }
  ) {}

  chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse> {
    this.calls.push({ messages: messages.map((m) => ({ ...m })), options });
    return next(this.steps, this.fallback);
  }

  script(...steps: Step<ChatResponse>[]): void {
    this.steps.push(...steps);
  }
}

export class FakeTTS implements ITTS {
  readonly calls: Array<{ text: string; options?: VoiceOptions }> = [];
  constructor(
    private readonly steps: Step<Buffer>[] = [],
    private readonly fallback: Step<Buffer> = Buffer.alloc(320, 1)
  ) {}

  synthesize(text: string, options?: VoiceOptions): Promise<Buffer> {
    this.calls.push({ text, options });
    return next(this.steps, this.fallback);
  }

  script(...steps: Step<Buffer>[]): void {
    this.steps.push(...steps);
  }
}

/** Resolves immediately; records requested delays. */
export function instantSleep(): { sleep: (ms: number, signal?: AbortSignal) => Promise<void>; delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    sleep: (ms, signal) => {
      delays.push(ms);
      return signal?.aborted ? Promise.reject(new Error("Retry cancelled")) : Promise.resolve();
    },
  };
}

/** A promise plus its resolver, for holding a provider call open. */
export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

export function sessionConfig(overrides: Partial<SessionConfig> = {}): SessionConfig {
  return {
    conversation: { ...DEFAULT_CONVERSATION },
    resilience: { ...DEFAULT_RESILIENCE, retryDelayMs: 0 },
    audio: { ...DEFAULT_AUDIO },
    streamer: { ...DEFAULT_STREAMER, chunkIntervalMs: 0 },
    ...overrides,
  };
}

export function appConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  const { conversation, resilience, audio, streamer } = sessionConfig();
  return {
    asr: { provider: "stub" },
    llm: { provider: "stub" },
    tts: { provider: "stub" },
    conversation,
    resilience,
    audio,
    streamer,
    ...overrides,
  };
}

/** µ-law frames: 0x00 decodes to a full-scale sample (speech), 0xFF to zero (silence). */
export const SPEECH_FRAME = Buffer.alloc(160, 0x00);
export const SILENCE_FRAME = Buffer.alloc(160, 0xff);

export function frames(frame: Buffer, count: number): Buffer[] {
  return Array.from({ length: count }, () => frame);
}
