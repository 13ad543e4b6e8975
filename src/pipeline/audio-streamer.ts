/**
 * AudioStreamer: paces synthesized audio onto the transport in fixed-size chunks at real-time cadence.
 */

import { logger as rootLogger, type Logger } from "../logging";
import type { AudioSink } from "../transport/types";
import { sleep as defaultSleep } from "./task-router";

export interface AudioStreamerConfig {
  /** Bytes per chunk (160 = 20ms of 8kHz µ-law). */
  chunkSize?: number;
  chunkIntervalMs?: number;
  /** Stops pacing and sending when aborted (session teardown). */
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  logger?: Logger;
}

export interface StreamResult {
  chunksSent: number;
  totalChunks: number;
  /** True when the transport disconnected (or the stream was cancelled) before every chunk was sent. */
  aborted: boolean;
}

export const DEFAULT_CHUNK_SIZE = 160;
export const DEFAULT_CHUNK_INTERVAL_MS = 20;

export class AudioStreamer {
  private readonly chunkSize: number;
  private readonly chunkIntervalMs: number;
  private readonly signal: AbortSignal | undefined;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly log: Logger;

  constructor(
    private readonly sink: AudioSink,
    config: AudioStreamerConfig = {}
  ) {
    this.chunkSize = config.chunkSize ?? DEFAULT_CHUNK_SIZE;
    this.chunkIntervalMs = config.chunkIntervalMs ?? DEFAULT_CHUNK_INTERVAL_MS;
    if (!Number.isInteger(this.chunkSize) || this.chunkSize < 1) {
      throw new RangeError(`chunkSize must be a positive integer, got ${this.chunkSize}`);
    }
    if (this.chunkIntervalMs < 0) {
      throw new RangeError(`chunkIntervalMs must be >= 0, got ${this.chunkIntervalMs}`);
    }
    this.signal = config.signal;
    this.sleep = config.sleep ?? defaultSleep;
    this.log = config.logger ?? rootLogger;
  }

  async stream(audio: Buffer): Promise<StreamResult> {
    const totalChunks = Math.ceil(audio.length / this.chunkSize);
    let chunksSent = 0;
    for (let offset = 0; offset < audio.length; offset += this.chunkSize) {
      if (this.signal?.aborted || !this.sink.isConnected()) {
        return this.stopped(chunksSent, totalChunks);
      }
      this.sink.sendAudio(audio.subarray(offset, offset + this.chunkSize));
      chunksSent += 1;
      if (chunksSent < totalChunks && this.chunkIntervalMs > 0) {
        try {
          await this.sleep(this.chunkIntervalMs, this.signal);
        } catch (err) {
          if (this.signal?.aborted) return this.stopped(chunksSent, totalChunks);
          throw err;
        }
      }
    }
    this.log.debug({ event: "STREAM_COMPLETE", chunksSent, bytes: audio.length }, "Audio streamed");
    return { chunksSent, totalChunks, aborted: false };
  }

  private stopped(chunksSent: number, totalChunks: number): StreamResult {
    const reason = this.signal?.aborted ? "cancelled" : "disconnected";
    this.log.info({ event: "STREAM_ABORTED", reason, chunksSent, totalChunks }, "Streaming stopped early");
    return { chunksSent, totalChunks, aborted: true };
  }
}
