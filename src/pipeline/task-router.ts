/**
 * TaskRouter: the only component that calls the transcribe / generate / synthesize providers.
 * Each attempt runs under a per-call timeout and, when configured, the capability's circuit breaker.
 * Transcribe and synthesize retry with a fixed delay; generate is single-shot (not idempotent for a conversation).
 */

import type { IASR } from "../adapters/asr";
import type { ILLM, Message } from "../adapters/llm";
import type { ITTS, VoiceOptions } from "../adapters/tts";
import {
  CircuitOpenError,
  GenerationError,
  SynthesisError,
  TranscriptionError,
  toError,
  type Capability,
} from "../errors";
import { logger as rootLogger, logProviderCall, type Logger } from "../logging";
import { CircuitBreaker } from "./circuit-breaker";

export const DEFAULT_RETRY_COUNT = 2;
export const DEFAULT_RETRY_DELAY_MS = 500;
export const DEFAULT_CALL_TIMEOUT_MS = 20_000;

export type CapabilityBreakers = Partial<Record<Capability, CircuitBreaker>>;

export interface BreakerSettings {
  failureThreshold?: number;
  timeoutMs?: number;
  now?: () => number;
  logger?: Logger;
}

/** One breaker per capability. Share the result across sessions for process-wide protection. */
export function createCapabilityBreakers(settings: BreakerSettings = {}): Required<CapabilityBreakers> {
  const make = (name: Capability) => new CircuitBreaker({ name, ...settings });
  return { transcribe: make("transcribe"), generate: make("generate"), synthesize: make("synthesize") };
}

export interface TaskRouterOptions {
  /** Total attempts for transcribe and synthesize (default 2). */
  retryCount?: number;
  retryDelayMs?: number;
  timeouts?: { transcribeMs?: number; generateMs?: number; synthesizeMs?: number };
  /** Breakers per capability; a capability without one is called directly. */
  breakers?: CapabilityBreakers;
  /** Aborts the inter-attempt delay (session teardown). */
  signal?: AbortSignal;
  /** Voice settings forwarded to TTS (language comes from each call). */
  voice?: Omit<VoiceOptions, "languageCode">;
  maxTokens?: number;
  /** Delay implementation; injectable for tests. */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  logger?: Logger;
}

export interface TranscriptionOutcome {
  text: string;
  /** Detected language (registry code) or null when the provider reported none. */
  language: string | null;
}

/** Result of a bounded-attempt loop. */
export type AttemptOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; reason: "empty" | "error"; error?: Error; attempts: number }
  | { ok: false; reason: "circuit_open"; error: CircuitOpenError; attempts: number };

export function withTimeout<T>(p: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new Error(`${label} timed out after ${timeoutMs}ms`)), timeoutMs);
    p.then(
      (v) => {
        clearTimeout(timer);
        resolve(v);
      },
      (e) => {
        clearTimeout(timer);
        reject(e);
      }
    );
  });
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error("Retry cancelled"));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new Error("Retry cancelled"));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export class TaskRouter {
  private readonly retryCount: number;
  private readonly retryDelayMs: number;
  private readonly timeouts: { transcribeMs: number; generateMs: number; synthesizeMs: number };
  private readonly breakers: CapabilityBreakers;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly log: Logger;

  constructor(
    private readonly asr: IASR,
    private readonly llm: ILLM,
    private readonly tts: ITTS,
    private readonly options: TaskRouterOptions = {}
  ) {
    this.retryCount = options.retryCount ?? DEFAULT_RETRY_COUNT;
    if (!Number.isInteger(this.retryCount) || this.retryCount < 1) {
      throw new RangeError(`retryCount must be a positive integer, got ${this.retryCount}`);
    }
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.timeouts = {
      transcribeMs: options.timeouts?.transcribeMs ?? DEFAULT_CALL_TIMEOUT_MS,
      generateMs: options.timeouts?.generateMs ?? DEFAULT_CALL_TIMEOUT_MS,
      synthesizeMs: options.timeouts?.synthesizeMs ?? DEFAULT_CALL_TIMEOUT_MS,
    };
    this.breakers = options.breakers ?? {};
    this.sleep = options.sleep ?? sleep;
    this.log = options.logger ?? rootLogger;
  }

  async transcribe(audio: Buffer, languageHint?: string): Promise<TranscriptionOutcome> {
    const outcome = await this.runAttempts(
      "transcribe",
      this.retryCount,
      this.timeouts.transcribeMs,
      () => this.asr.transcribe(audio, { languageHint, format: "wav" }),
      (r) => r.text.trim().length
    );
    if (outcome.ok) {
      return { text: outcome.value.text.trim(), language: outcome.value.language ?? null };
    }
    if (outcome.reason === "circuit_open") throw outcome.error;
    throw new TranscriptionError(
      outcome.reason === "empty"
        ? `Transcription returned empty text on all ${outcome.attempts} attempt(s)`
        : `Transcription failed after ${outcome.attempts} attempt(s): ${outcome.error?.message ?? "unknown error"}`,
      { cause: outcome.error }
    );
  }

  async generate(userText: string, context: Message[], language: string): Promise<string> {
    const messages: Message[] = [...context, { role: "user", content: userText }];
    const outcome = await this.runAttempts(
      "generate",
      1,
      this.timeouts.generateMs,
      () => this.llm.chat(messages, { maxTokens: this.options.maxTokens }),
      (r) => r.text.trim().length,
      language
    );
    if (outcome.ok) return outcome.value.text.trim();
    if (outcome.reason === "circuit_open") throw outcome.error;
    throw new GenerationError(
      outcome.reason === "empty"
        ? "Generation returned an empty response"
        : `Generation failed: ${outcome.error?.message ?? "unknown error"}`,
      { cause: outcome.error }
    );
  }

  async synthesize(text: string, language: string): Promise<Buffer> {
    const outcome = await this.runAttempts(
      "synthesize",
      this.retryCount,
      this.timeouts.synthesizeMs,
      () => this.tts.synthesize(text, { ...this.options.voice, languageCode: language }),
      (r) => r.length,
      language
    );
    if (outcome.ok) return outcome.value;
    if (outcome.reason === "circuit_open") throw outcome.error;
    throw new SynthesisError(
      outcome.reason === "empty"
        ? `Synthesis returned empty audio on all ${outcome.attempts} attempt(s)`
        : `Synthesis failed after ${outcome.attempts} attempt(s): ${outcome.error?.message ?? "unknown error"}`,
      { cause: outcome.error }
    );
  }

  /**
   * Bounded-attempt loop. `measure` returns the usable size of a result; 0 means empty.
   * An empty result is retried but does not count against the breaker: the provider answered.
   */
  private async runAttempts<T>(
    capability: Capability,
    maxAttempts: number,
    timeoutMs: number,
    call: () => Promise<T>,
    measure: (value: T) => number,
    language?: string
  ): Promise<AttemptOutcome<T>> {
    const breaker = this.breakers[capability];
    let lastError: Error | undefined;
    let emptyAttempts = 0;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const started = Date.now();
      try {
        const guarded = () => withTimeout(call(), timeoutMs, capability);
        const value = breaker ? await breaker.call(guarded) : await guarded();
        const size = measure(value);
        if (size > 0) {
          logProviderCall(this.log, capability, { attempt, durationMs: Date.now() - started, outputSize: size, language });
          return { ok: true, value, attempts: attempt };
        }
        emptyAttempts += 1;
        this.log.warn({ event: "PROVIDER_EMPTY_RESULT", capability, attempt, maxAttempts }, `${capability} returned an empty result`);
      } catch (err) {
        if (err instanceof CircuitOpenError) {
          this.log.warn({ event: "PROVIDER_CIRCUIT_OPEN", capability, attempt, retryAfterMs: err.retryAfterMs }, `${capability} short-circuited`);
          return { ok: false, reason: "circuit_open", error: err, attempts: attempt };
        }
        lastError = toError(err);
        this.log.warn(
          { event: "PROVIDER_CALL_FAILED", capability, attempt, maxAttempts, err: lastError.message },
          `${capability} attempt failed`
        );
      }

      if (attempt < maxAttempts) {
        try {
          await this.sleep(this.retryDelayMs, this.options.signal);
        } catch (err) {
          return { ok: false, reason: "error", error: toError(err), attempts: attempt };
        }
      }
    }

    return emptyAttempts === maxAttempts
      ? { ok: false, reason: "empty", attempts: maxAttempts }
      : { ok: false, reason: "error", error: lastError, attempts: maxAttempts };
  }
}
