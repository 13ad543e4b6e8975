/**
 * AudioTurnSegmenter: turns a stream of audio bytes into utterances with energy-based VAD.
 * Input is re-framed to frameBytes; runs synchronously on arrival, buffers are only concatenated on emit.
 */

import type { AudioEncoding } from "../config";
import { logger as rootLogger, type Logger } from "../logging";
import { bytesForDuration, rmsMulaw, rmsPcm16 } from "./audio-utils";

export interface SegmenterConfig {
  encoding?: AudioEncoding;
  /** Used to derive frameBytes when it is not given. */
  sampleRateHz?: number;
  /** Bytes per frame; defaults to frameMs of audio (160 = 20ms of 8kHz µ-law). */
  frameBytes?: number;
  frameMs?: number;
  /** RMS on linear 16-bit samples; frames at or below are silence. */
  energyThreshold?: number;
  /** Trailing silence that ends an utterance. */
  endpointSilenceMs?: number;
  /** Speech spans shorter than this are dropped as noise. */
  minSpeechMs?: number;
  /** Completed utterances held while emission is blocked; oldest dropped beyond this. */
  maxDeferredUtterances?: number;
  logger?: Logger;
}

export interface SegmenterCallbacks {
  /** Receives each completed utterance (frames concatenated, trailing silence excluded). */
  onUtteranceReady(utterance: Buffer): void;
  /** When this returns false, completed utterances are queued until releaseDeferred(). */
  canEmit?(): boolean;
}

export interface SegmenterState {
  speechFrames: number;
  silenceFrames: number;
  deferred: number;
  /** True while the last classified frame was speech. */
  inSpeech: boolean;
}

export const DEFAULT_ENERGY_THRESHOLD = 500;
export const DEFAULT_ENDPOINT_SILENCE_MS = 700;
export const DEFAULT_MIN_SPEECH_MS = 500;
export const DEFAULT_MAX_DEFERRED_UTTERANCES = 4;

export class AudioTurnSegmenter {
  private readonly encoding: AudioEncoding;
  private readonly frameBytes: number;
  private readonly energyThreshold: number;
  private readonly endpointSilenceFrames: number;
  private readonly minSpeechFrames: number;
  private readonly maxDeferred: number;
  private readonly log: Logger;
  private speech: Buffer[] = [];
  private silence: Buffer[] = [];
  private speechFrameCount = 0;
  private inSpeech = false;
  private deferred: Buffer[] = [];
  /** Bytes received that do not yet fill a frame. */
  private pending: Buffer = Buffer.alloc(0);

  constructor(
    private readonly callbacks: SegmenterCallbacks,
    config: SegmenterConfig = {}
  ) {
    this.encoding = config.encoding ?? "mulaw";
    const frameMs = config.frameMs ?? 20;
    this.frameBytes = config.frameBytes ?? bytesForDuration(this.encoding, config.sampleRateHz ?? 8000, frameMs);
    if (this.frameBytes < 1 || frameMs <= 0) {
      throw new RangeError("frameBytes and frameMs must be positive");
    }
    this.energyThreshold = config.energyThreshold ?? DEFAULT_ENERGY_THRESHOLD;
    this.endpointSilenceFrames = Math.max(1, Math.ceil((config.endpointSilenceMs ?? DEFAULT_ENDPOINT_SILENCE_MS) / frameMs));
    this.minSpeechFrames = Math.ceil((config.minSpeechMs ?? DEFAULT_MIN_SPEECH_MS) / frameMs);
    this.maxDeferred = config.maxDeferredUtterances ?? DEFAULT_MAX_DEFERRED_UTTERANCES;
    this.log = config.logger ?? rootLogger;
  }

  /** Accepts any chunk size; whole frames are classified and the remainder waits for the next call. */
  pushFrame(data: Buffer): void {
    if (this.pending.length === 0 && data.length === this.frameBytes) {
      this.processFrame(data);
      return;
    }
    const buf = this.pending.length > 0 ? Buffer.concat([this.pending, data]) : data;
    let offset = 0;
    while (buf.length - offset >= this.frameBytes) {
      this.processFrame(buf.subarray(offset, offset + this.frameBytes));
      offset += this.frameBytes;
    }
    this.pending = Buffer.from(buf.subarray(offset));
  }

  /** Emit in-progress speech now (e.g. at call end) if it meets the minimum length. */
  flush(): void {
    if (this.speech.length > 0) {
      // A partial frame directly after speech is the tail of the utterance.
      if (this.inSpeech && this.pending.length > 0) this.speech.push(this.pending);
      this.endUtterance();
    }
    this.pending = Buffer.alloc(0);
  }

  /** Emit queued utterances, oldest first, while the owner can accept them. */
  releaseDeferred(): void {
    while (this.deferred.length > 0 && this.emitAllowed()) {
      const next = this.deferred.shift();
      if (next) this.callbacks.onUtteranceReady(next);
    }
  }

  /** Drop all buffered audio and queued utterances. */
  reset(): void {
    this.speech = [];
    this.silence = [];
    this.speechFrameCount = 0;
    this.inSpeech = false;
    this.deferred = [];
    this.pending = Buffer.alloc(0);
  }

  getState(): SegmenterState {
    return {
      speechFrames: this.speechFrameCount,
      silenceFrames: this.silence.length,
      deferred: this.deferred.length,
      inSpeech: this.inSpeech,
    };
  }

  getFrameBytes(): number {
    return this.frameBytes;
  }

  private processFrame(f: Buffer): void {
    if (this.isSpeech(f)) {
      if (!this.inSpeech && this.speech.length === 0) {
        this.log.debug({ event: "VAD_SPEECH_STARTED" }, "VAD: speech started");
      }
      // A pause shorter than the endpoint stays inside the utterance.
      if (this.silence.length > 0) {
        this.speech.push(...this.silence);
        this.silence = [];
      }
      this.speech.push(f);
      this.speechFrameCount += 1;
      this.inSpeech = true;
      return;
    }

    this.inSpeech = false;
    if (this.speech.length === 0) return;
    this.silence.push(f);
    if (this.silence.length >= this.endpointSilenceFrames) {
      this.endUtterance();
    }
  }

  private isSpeech(frame: Buffer): boolean {
    const rms = this.encoding === "mulaw" ? rmsMulaw(frame) : rmsPcm16(frame);
    return rms > this.energyThreshold;
  }

  private endUtterance(): void {
    const speechFrames = this.speechFrameCount;
    const utterance = Buffer.concat(this.speech);
    this.speech = [];
    this.silence = [];
    this.speechFrameCount = 0;

    if (speechFrames < this.minSpeechFrames) {
      this.log.debug({ event: "VAD_NOISE_DISCARDED", speechFrames, minSpeechFrames: this.minSpeechFrames }, "VAD: speech too short; discarded");
      return;
    }
    this.log.info({ event: "VAD_END_OF_TURN", utteranceBytes: utterance.length, speechFrames }, "VAD: end of utterance");

    if (this.emitAllowed() && this.deferred.length === 0) {
      this.callbacks.onUtteranceReady(utterance);
      return;
    }
    this.deferred.push(utterance);
    if (this.deferred.length > this.maxDeferred) {
      this.deferred.shift();
      this.log.warn({ event: "VAD_DEFERRED_DROPPED", maxDeferred: this.maxDeferred }, "VAD: deferred queue full; oldest utterance dropped");
    }
  }

  private emitAllowed(): boolean {
    return this.callbacks.canEmit?.() ?? true;
  }
}
