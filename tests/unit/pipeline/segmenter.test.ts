/**
 * Unit tests for AudioTurnSegmenter (energy VAD, endpointing, deferred emission).
 */

import { AudioTurnSegmenter, type SegmenterConfig } from "../../../src/pipeline/segmenter";
import { SILENCE_FRAME, SPEECH_FRAME, frames } from "../../helpers/fakes";

/** 20ms frames: 3 silent frames end an utterance, 3 speech frames are the minimum. */
const config: SegmenterConfig = { encoding: "mulaw", frameBytes: 160, frameMs: 20, endpointSilenceMs: 60, minSpeechMs: 60 };

function setup(overrides: SegmenterConfig = {}, canEmit: () => boolean = () => true) {
  const utterances: Buffer[] = [];
  const segmenter = new AudioTurnSegmenter({ onUtteranceReady: (u) => utterances.push(u), canEmit }, { ...config, ...overrides });
  const feed = (frame: Buffer, count: number) => frames(frame, count).forEach((f) => segmenter.pushFrame(f));
  return { segmenter, utterances, feed };
}

describe("AudioTurnSegmenter", () => {
  it("emits speech once trailing silence reaches the endpoint, without the silence", () => {
    const { utterances, feed } = setup();
    feed(SPEECH_FRAME, 5);
    feed(SILENCE_FRAME, 2);
    expect(utterances).toHaveLength(0);
    feed(SILENCE_FRAME, 1);
    expect(utterances.map((u) => u.length)).toEqual([5 * 160]);
  });

  it("discards speech shorter than the minimum", () => {
    const { utterances, feed, segmenter } = setup();
    feed(SPEECH_FRAME, 2);
    feed(SILENCE_FRAME, 3);
    expect(utterances).toHaveLength(0);
    expect(segmenter.getState()).toEqual({ speechFrames: 0, silenceFrames: 0, deferred: 0, inSpeech: false });
  });

  it("keeps a short pause inside the utterance", () => {
    const { utterances, feed } = setup();
    feed(SPEECH_FRAME, 3);
    feed(SILENCE_FRAME, 2);
    feed(SPEECH_FRAME, 2);
    feed(SILENCE_FRAME, 3);
    expect(utterances).toHaveLength(1);
    expect(utterances[0].length).toBe(7 * 160);
    expect(utterances[0].subarray(3 * 160, 5 * 160).equals(Buffer.concat(frames(SILENCE_FRAME, 2)))).toBe(true);
  });

  it("drops silence before any speech", () => {
    const { utterances, feed, segmenter } = setup();
    feed(SILENCE_FRAME, 10);
    expect(segmenter.getState().silenceFrames).toBe(0);
    feed(SPEECH_FRAME, 3);
    feed(SILENCE_FRAME, 3);
    expect(utterances.map((u) => u.length)).toEqual([480]);
  });

  it("re-frames chunks of any size without losing audio", () => {
    const { utterances, segmenter, feed } = setup();
    segmenter.pushFrame(Buffer.alloc(100, 0x00));
    expect(segmenter.getState().speechFrames).toBe(0);
    segmenter.pushFrame(Buffer.alloc(60, 0x00));
    expect(segmenter.getState().speechFrames).toBe(1);
    segmenter.pushFrame(Buffer.alloc(320, 0x00));
    segmenter.pushFrame(Buffer.alloc(320, 0x00));
    expect(segmenter.getState().speechFrames).toBe(5);
    feed(SILENCE_FRAME, 3);
    expect(utterances).toHaveLength(1);
    expect(utterances[0].equals(Buffer.alloc(800, 0x00))).toBe(true);
  });

  it("keeps every byte of double-size frames", () => {
    const { utterances, feed } = setup();
    feed(Buffer.alloc(320, 0x00), 25);
    feed(SILENCE_FRAME, 3);
    expect(utterances.map((u) => u.length)).toEqual([8000]);
  });

  it("flush() keeps a partial frame that follows speech", () => {
    const { utterances, feed, segmenter } = setup();
    feed(SPEECH_FRAME, 3);
    segmenter.pushFrame(Buffer.alloc(40, 0x00));
    segmenter.flush();
    expect(utterances.map((u) => u.length)).toEqual([520]);
  });

  it("derives the frame size from encoding, sample rate and frame duration", () => {
    const noop = { onUtteranceReady: () => undefined };
    expect(new AudioTurnSegmenter(noop).getFrameBytes()).toBe(160);
    expect(new AudioTurnSegmenter(noop, { encoding: "pcm16", sampleRateHz: 8000, frameMs: 20 }).getFrameBytes()).toBe(320);
    expect(new AudioTurnSegmenter(noop, { encoding: "pcm16", sampleRateHz: 16000, frameMs: 20 }).getFrameBytes()).toBe(640);
    expect(new AudioTurnSegmenter(noop, { encoding: "pcm16", sampleRateHz: 16000, frameBytes: 480 }).getFrameBytes()).toBe(480);
  });

  it("queues utterances while the owner cannot accept them and releases them in order", () => {
    let open = false;
    const { utterances, feed, segmenter } = setup({}, () => open);
    feed(SPEECH_FRAME, 3);
    feed(SILENCE_FRAME, 3);
    feed(SPEECH_FRAME, 4);
    feed(SILENCE_FRAME, 3);
    expect(utterances).toHaveLength(0);
    expect(segmenter.getState().deferred).toBe(2);

    open = true;
    segmenter.releaseDeferred();
    expect(utterances.map((u) => u.length)).toEqual([480, 640]);
    expect(segmenter.getState().deferred).toBe(0);
  });

  it("stops releasing as soon as the owner is busy again", () => {
    let open = false;
    const utterances: Buffer[] = [];
    const segmenter = new AudioTurnSegmenter(
      {
        onUtteranceReady: (u) => {
          utterances.push(u);
          open = false;
        },
        canEmit: () => open,
      },
      config
    );
    for (let n = 0; n < 2; n++) {
      frames(SPEECH_FRAME, 3).forEach((f) => segmenter.pushFrame(f));
      frames(SILENCE_FRAME, 3).forEach((f) => segmenter.pushFrame(f));
    }
    open = true;
    segmenter.releaseDeferred();
    expect(utterances).toHaveLength(1);
    expect(segmenter.getState().deferred).toBe(1);
  });

  it("drops the oldest deferred utterance beyond the queue bound", () => {
    let open = false;
    const { utterances, feed, segmenter } = setup({ maxDeferredUtterances: 2 }, () => open);
    for (const speech of [3, 4, 5]) {
      feed(SPEECH_FRAME, speech);
      feed(SILENCE_FRAME, 3);
    }
    expect(segmenter.getState().deferred).toBe(2);

    open = true;
    segmenter.releaseDeferred();
    expect(utterances.map((u) => u.length)).toEqual([640, 800]);
  });

  it("flush() emits in-progress speech that meets the minimum", () => {
    const { utterances, feed, segmenter } = setup();
    feed(SPEECH_FRAME, 4);
    feed(SILENCE_FRAME, 1);
    segmenter.flush();
    expect(utterances.map((u) => u.length)).toEqual([640]);

    feed(SPEECH_FRAME, 1);
    segmenter.flush();
    expect(utterances).toHaveLength(1);
  });

  it("reset() drops partial speech", () => {
    const { utterances, feed, segmenter } = setup();
    feed(SPEECH_FRAME, 4);
    segmenter.reset();
    feed(SILENCE_FRAME, 3);
    expect(utterances).toHaveLength(0);
    expect(segmenter.getState()).toEqual({ speechFrames: 0, silenceFrames: 0, deferred: 0, inSpeech: false });
  });

  it("classifies PCM16 frames by RMS against the threshold", () => {
    const loud = Buffer.alloc(320);
    for (let i = 0; i < 160; i++) loud.writeInt16LE(i % 2 === 0 ? 1000 : -1000, i * 2);
    const quiet = Buffer.alloc(320);
    for (let i = 0; i < 160; i++) quiet.writeInt16LE(400, i * 2);

    const { utterances, feed } = setup({ encoding: "pcm16", frameBytes: 320, energyThreshold: 500 });
    feed(loud, 3);
    feed(quiet, 3);
    expect(utterances.map((u) => u.length)).toEqual([960]);
  });
});
