/**
 * Boundary between a call session and whatever carries its audio (telephony socket, mock, test sink).
 */

/** Outbound side: where synthesized audio chunks go. */
export interface AudioSink {
  isConnected(): boolean;
  sendAudio(chunk: Buffer): void;
}

/** A full-duplex transport: inbound frames are delivered to the registered handler. */
export interface CallTransport extends AudioSink {
  onAudioFrame(handler: (frame: Buffer) => void): void;
  onClose?(handler: () => void): void;
}
