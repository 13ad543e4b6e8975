/**
 * Mock transport for local testing: no telephony connection.
 * Optionally feed caller audio from a WAV file and capture outbound audio to a buffer or file.
 */

import * as fs from "fs";
import type { AudioEncoding } from "../config";
import { mulawToPcm16, pcm16ToMulaw, pcmToWav, stripWavHeader } from "../pipeline/audio-utils";
import type { CallTransport } from "./types";

export interface MockTransportConfig {
  /** Encoding of frames on the wire (what the session expects). */
  encoding?: AudioEncoding;
  sampleRateHz?: number;
  /** Inbound frame size in bytes (wire encoding). */
  frameBytes?: number;
  /** Optional path to a mono 16-bit WAV used as simulated caller audio. */
  inputWavPath?: string;
  /** Optional path to write the outbound audio as WAV. */
  outputWavPath?: string;
}

export class MockTransport implements CallTransport {
  private sent: Buffer[] = [];
  private connected = true;
  private frameHandler: ((frame: Buffer) => void) | undefined;
  private closeHandlers: Array<() => void> = [];
  private readonly encoding: AudioEncoding;
  private readonly sampleRateHz: number;
  private readonly frameBytes: number;

  constructor(private readonly config: MockTransportConfig = {}) {
    this.encoding = config.encoding ?? "mulaw";
    this.sampleRateHz = config.sampleRateHz ?? 8000;
    this.frameBytes = config.frameBytes ?? 160;
  }

  isConnected(): boolean {
    return this.connected;
  }

  sendAudio(chunk: Buffer): void {
    if (!this.connected) return;
    this.sent.push(Buffer.from(chunk));
  }

  onAudioFrame(handler: (frame: Buffer) => void): void {
    this.frameHandler = handler;
  }

  onClose(handler: () => void): void {
    this.closeHandlers.push(handler);
  }

  /** Deliver one inbound frame to the registered handler. */
  pushFrame(frame: Buffer): void {
    this.frameHandler?.(frame);
  }

  /** Split wire-encoded audio into frames and deliver each one. Returns the frame count. */
  feedAudio(audio: Buffer): number {
    let frames = 0;
    for (let offset = 0; offset + this.frameBytes <= audio.length; offset += this.frameBytes) {
      this.pushFrame(audio.subarray(offset, offset + this.frameBytes));
      frames++;
    }
    return frames;
  }

  /**
   * Simulate caller audio from a 16-bit mono WAV (at the configured sample rate).
   * Samples are converted to the wire encoding before framing. Returns the frame count, 0 when the file is missing.
   */
  feedFromWav(wavPath?: string): number {
    const p = wavPath ?? this.config.inputWavPath;
    if (!p || !fs.existsSync(p)) return 0;
    const pcm = stripWavHeader(fs.readFileSync(p));
    return this.feedAudio(this.encoding === "mulaw" ? pcm16ToMulaw(pcm) : pcm);
  }

  /** Outbound chunks in send order. */
  getSentChunks(): Buffer[] {
    return [...this.sent];
  }

  /** All outbound audio as a single buffer (wire encoding). */
  getSentAudio(): Buffer {
    return Buffer.concat(this.sent);
  }

  /** Write outbound audio to a 16-bit WAV and clear the buffer. */
  flushToFile(filePath?: string): string {
    const outPath = filePath ?? this.config.outputWavPath;
    if (!outPath) throw new Error("No output path");
    const audio = Buffer.concat(this.sent);
    this.sent = [];
    const pcm = this.encoding === "mulaw" ? mulawToPcm16(audio) : audio;
    fs.writeFileSync(outPath, pcmToWav(pcm, this.sampleRateHz));
    return outPath;
  }

  /** Simulate the far end hanging up. */
  disconnect(): void {
    if (!this.connected) return;
    this.connected = false;
    for (const h of this.closeHandlers) h();
  }
}
