/**
 * CallSession: everything one call owns, wired to a transport.
 * transport frames -> segmenter -> orchestrator.processTurn -> streamer -> transport.
 * At most one turn is active (from processTurn start until its audio is streamed); later utterances wait in the segmenter.
 */

import { randomUUID } from "crypto";
import type { IASR } from "../adapters/asr";
import type { ILLM } from "../adapters/llm";
import type { ITTS } from "../adapters/tts";
import type { AppConfig } from "../config";
import { toError } from "../errors";
import { logger as rootLogger, logError, type Logger } from "../logging";
import { ContextManager } from "../memory/context-manager";
import { MetricsCollector } from "../metrics";
import { PromptManager, type PromptBuilder } from "../prompts/prompt-manager";
import type { AudioSink } from "../transport/types";
import { mulawToPcm16, pcm16ToMulaw, pcmToWav, stripWavHeader } from "./audio-utils";
import { AudioStreamer, type StreamResult } from "./audio-streamer";
import { LanguageCoordinator } from "./language-coordinator";
import { Orchestrator, type OrchestratorStatus, type TurnResult } from "./orchestrator";
import { AudioTurnSegmenter, type SegmenterState } from "./segmenter";
import { TaskRouter, createCapabilityBreakers, type CapabilityBreakers } from "./task-router";

export interface Providers {
  asr: IASR;
  llm: ILLM;
  tts: ITTS;
}

export type SessionConfig = Pick<AppConfig, "conversation" | "resilience" | "audio" | "streamer"> & {
  llm?: Pick<AppConfig["llm"], "maxTokens">;
};

export interface CallSessionCallbacks {
  /** A turn has started for this utterance (raw transport encoding). Errors thrown here are logged. */
  onUtteranceReady?(utterance: Buffer): void;
  /** Result of each turn, after its audio (if any) has been streamed. Not called after close(). */
  onTurnResult?(result: TurnResult, stream?: StreamResult): void;
}

export interface CallSessionOptions {
  sessionId?: string;
  /** Shared breakers (circuitScope "global"); when omitted the session builds its own if enabled. */
  breakers?: CapabilityBreakers;
  prompts?: PromptBuilder;
  /** Send user metadata with every generation request. */
  includeMetadata?: boolean;
  /** Initial selection; null starts unselected and lets the first detection decide. */
  initialLanguage?: string | null;
  callbacks?: CallSessionCallbacks;
  /** Delay used for retry backoff and stream pacing; injectable for tests. */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  logger?: Logger;
}

export interface CallSessionState {
  sessionId: string;
  closed: boolean;
  turnActive: boolean;
  segmenter: SegmenterState;
  orchestrator: OrchestratorStatus;
}

export class CallSession {
  readonly sessionId: string;
  private readonly log: Logger;
  private readonly segmenter: AudioTurnSegmenter;
  private readonly orchestrator: Orchestrator;
  private readonly streamer: AudioStreamer;
  private readonly metrics: MetricsCollector;
  private readonly abort = new AbortController();
  private readonly callbacks: CallSessionCallbacks;
  private turnActive = false;
  private closed = false;
  private currentTurn: Promise<void> | undefined;

  constructor(
    providers: Providers,
    transport: AudioSink,
    private readonly config: SessionConfig,
    options: CallSessionOptions = {}
  ) {
    this.sessionId = options.sessionId ?? randomUUID();
    this.log = (options.logger ?? rootLogger).child({ sessionId: this.sessionId });
    this.callbacks = options.callbacks ?? {};
    const { conversation, resilience, audio, streamer } = config;

    const breakers =
      options.breakers ??
      (resilience.enableCircuitBreaker
        ? createCapabilityBreakers({
            failureThreshold: resilience.failureThreshold,
            timeoutMs: resilience.circuitTimeoutMs,
            logger: this.log,
          })
        : {});

    const router = new TaskRouter(providers.asr, providers.llm, providers.tts, {
      retryCount: resilience.retryCount,
      retryDelayMs: resilience.retryDelayMs,
      timeouts: {
        transcribeMs: resilience.callTimeoutMs,
        generateMs: resilience.callTimeoutMs,
        synthesizeMs: resilience.callTimeoutMs,
      },
      breakers,
      signal: this.abort.signal,
      voice: { sampleRateHz: audio.sampleRateHz },
      maxTokens: config.llm?.maxTokens,
      sleep: options.sleep,
      logger: this.log,
    });

    const context = new ContextManager({ maxHistory: conversation.maxHistory, logger: this.log });
    const languages = new LanguageCoordinator({
      defaultLanguage: conversation.defaultLanguage,
      initialLanguage: options.initialLanguage,
      switchThreshold: conversation.switchThreshold,
      historySize: conversation.historySize,
      minTurnsBeforeSwitch: conversation.minTurnsBeforeSwitch,
      logger: this.log,
    });
    this.metrics = new MetricsCollector({ logger: this.log });
    this.orchestrator = new Orchestrator(
      router,
      context,
      languages,
      options.prompts ?? new PromptManager({ systemPrompt: conversation.systemPrompt }),
      { metrics: this.metrics, includeMetadata: options.includeMetadata, logger: this.log }
    );

    this.streamer = new AudioStreamer(transport, {
      chunkSize: streamer.chunkSize,
      chunkIntervalMs: streamer.chunkIntervalMs,
      signal: this.abort.signal,
      sleep: options.sleep,
      logger: this.log,
    });

    this.segmenter = new AudioTurnSegmenter(
      {
        onUtteranceReady: (utterance) => this.startTurn(utterance),
        canEmit: () => !this.turnActive && !this.closed,
      },
      {
        encoding: audio.encoding,
        sampleRateHz: audio.sampleRateHz,
        frameBytes: audio.frameBytes,
        frameMs: audio.frameMs,
        energyThreshold: audio.energyThreshold,
        endpointSilenceMs: audio.endpointSilenceMs,
        minSpeechMs: audio.minSpeechMs,
        logger: this.log,
      }
    );
    this.log.info({ event: "SESSION_STARTED", language: languages.ensureConsistency() }, "Call session started");
  }

  /** Feed one inbound frame. Throws once the session is closed. */
  pushFrame(frame: Buffer): void {
    if (this.closed) throw new Error(`Session ${this.sessionId} is closed`);
    this.segmenter.pushFrame(frame);
  }

  /** End of inbound audio: emit any in-progress speech. */
  flush(): void {
    if (this.closed) return;
    this.segmenter.flush();
  }

  /** Resolves once no turn is active and none is queued behind it. */
  async whenIdle(): Promise<void> {
    while (this.currentTurn) {
      await this.currentTurn;
    }
  }

  /** Tear down: abort retry and pacing sleeps, drop buffered audio. In-flight provider results are discarded. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.abort.abort();
    this.segmenter.reset();
    this.log.info({ event: "SESSION_CLOSED", turns: this.metrics.getTurns().length }, "Call session closed");
  }

  isClosed(): boolean {
    return this.closed;
  }

  setLanguage(code: string): void {
    this.orchestrator.setLanguage(code);
  }

  getOrchestrator(): Orchestrator {
    return this.orchestrator;
  }

  getMetrics(): MetricsCollector {
    return this.metrics;
  }

  getState(): CallSessionState {
    return {
      sessionId: this.sessionId,
      closed: this.closed,
      turnActive: this.turnActive,
      segmenter: this.segmenter.getState(),
      orchestrator: this.orchestrator.getStatus(),
    };
  }

  private startTurn(utterance: Buffer): void {
    this.turnActive = true;
    const turn = this.runTurn(utterance)
      .catch((err: unknown) => logError(this.log, toError(err), { event: "SESSION_TURN_ERROR" }))
      .finally(() => {
        this.turnActive = false;
        if (this.currentTurn === turn) this.currentTurn = undefined;
        if (!this.closed) this.segmenter.releaseDeferred();
      });
    this.currentTurn = turn;
    try {
      this.callbacks.onUtteranceReady?.(utterance);
    } catch (err) {
      logError(this.log, toError(err), { event: "SESSION_CALLBACK_ERROR", callback: "onUtteranceReady" });
    }
  }

  private async runTurn(utterance: Buffer): Promise<void> {
    const { encoding, sampleRateHz } = this.config.audio;
    const pcm = encoding === "mulaw" ? mulawToPcm16(utterance) : utterance;
    const result = await this.orchestrator.processTurn(pcmToWav(pcm, sampleRateHz));

    if (this.closed) {
      this.log.info({ event: "TURN_DISCARDED", reason: "session_closed" }, "Session closed during turn; result discarded");
      return;
    }
    if (!result.audio) {
      this.callbacks.onTurnResult?.(result);
      return;
    }

    const samples = stripWavHeader(result.audio);
    const outbound = encoding === "mulaw" ? pcm16ToMulaw(samples) : samples;
    const stream = await this.streamer.stream(outbound);
    this.callbacks.onTurnResult?.(result, stream);
  }
}

/**
 * Builds sessions that share one config and provider set.
 * With circuitScope "global" and breakers enabled, every session shares one breaker per capability.
 */
export function createSessionFactory(
  providers: Providers,
  config: SessionConfig,
  defaults: Omit<CallSessionOptions, "sessionId" | "breakers"> = {}
): (transport: AudioSink, options?: CallSessionOptions) => CallSession {
  const { resilience } = config;
  const shared =
    resilience.enableCircuitBreaker && resilience.circuitScope === "global"
      ? createCapabilityBreakers({
          failureThreshold: resilience.failureThreshold,
          timeoutMs: resilience.circuitTimeoutMs,
          logger: defaults.logger,
        })
      : undefined;
  return (transport, options = {}) =>
    new CallSession(providers, transport, config, { ...defaults, breakers: shared, ...options });
}
