/**
 * Unit tests for config loading.
 */

import { DEFAULT_AUDIO, DEFAULT_RESILIENCE, loadConfig } from "../../../src/config";

describe("loadConfig", () => {
  const saved = { ...process.env };
  afterEach(() => {
    process.env = { ...saved };
  });

  it("reads numeric and choice settings from the environment", () => {
    process.env.MAX_HISTORY = "4";
    process.env.SWITCH_THRESHOLD = "3";
    process.env.CIRCUIT_SCOPE = "GLOBAL";
    process.env.AUDIO_ENCODING = "pcm16";
    process.env.ENABLE_CIRCUIT_BREAKER = "false";
    const config = loadConfig();
    expect(config.conversation.maxHistory).toBe(4);
    expect(config.conversation.switchThreshold).toBe(3);
    expect(config.resilience.circuitScope).toBe("global");
    expect(config.resilience.enableCircuitBreaker).toBe(false);
    expect(config.audio.encoding).toBe("pcm16");
  });

  it("falls back to defaults for invalid values", () => {
    process.env.FAILURE_THRESHOLD = "zero";
    process.env.RETRY_COUNT = "0";
    process.env.VAD_SILENCE_MS = "-5";
    process.env.CIRCUIT_SCOPE = "everywhere";
    const config = loadConfig();
    expect(config.resilience.failureThreshold).toBe(DEFAULT_RESILIENCE.failureThreshold);
    expect(config.resilience.retryCount).toBe(DEFAULT_RESILIENCE.retryCount);
    expect(config.resilience.circuitScope).toBe(DEFAULT_RESILIENCE.circuitScope);
    expect(config.audio.endpointSilenceMs).toBe(DEFAULT_AUDIO.endpointSilenceMs);
  });

  describe("audio byte sizes", () => {
    const audioKeys = ["AUDIO_ENCODING", "AUDIO_SAMPLE_RATE", "AUDIO_FRAME_MS", "AUDIO_FRAME_BYTES", "STREAM_CHUNK_SIZE", "STREAM_CHUNK_INTERVAL_MS"];
    beforeEach(() => {
      for (const key of audioKeys) delete process.env[key];
    });

    it("sizes frames and chunks for 8kHz µ-law by default", () => {
      const config = loadConfig();
      expect(config.audio.frameBytes).toBe(160);
      expect(config.streamer.chunkSize).toBe(160);
    });

    it("doubles the sizes for PCM16", () => {
      process.env.AUDIO_ENCODING = "pcm16";
      process.env.AUDIO_SAMPLE_RATE = "8000";
      process.env.AUDIO_FRAME_MS = "20";
      const config = loadConfig();
      expect(config.audio.frameBytes).toBe(320);
      expect(config.streamer.chunkSize).toBe(320);
    });

    it("follows the sample rate and chunk interval", () => {
      process.env.AUDIO_ENCODING = "pcm16";
      process.env.AUDIO_SAMPLE_RATE = "16000";
      process.env.STREAM_CHUNK_INTERVAL_MS = "40";
      const config = loadConfig();
      expect(config.audio.frameBytes).toBe(640);
      expect(config.streamer.chunkSize).toBe(1280);
    });

    it("lets explicit sizes win", () => {
      process.env.AUDIO_ENCODING = "pcm16";
      process.env.AUDIO_FRAME_BYTES = "480";
      process.env.STREAM_CHUNK_SIZE = "200";
      const config = loadConfig();
      expect(config.audio.frameBytes).toBe(480);
      expect(config.streamer.chunkSize).toBe(200);
    });
  });

  it("accepts MODEL_PROVIDER as an alias for the LLM provider", () => {
    process.env.MODEL_PROVIDER = "anthropic";
    process.env.LLM_PROVIDER = "openai";
    expect(loadConfig().llm.provider).toBe("anthropic");
  });
});
