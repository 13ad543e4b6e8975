/**
 * Unit tests for TaskRouter: retry policy, timeouts, breakers, cancellation.
 */

import { TaskRouter, createCapabilityBreakers, sleep, withTimeout } from "../../../src/pipeline/task-router";
import { CircuitOpenError, GenerationError, SynthesisError, TranscriptionError } from "../../../src/errors";
import { FakeASR, FakeLLM, FakeTTS, instantSleep } from "../../helpers/fakes";

function router(
  providers: { asr?: FakeASR; llm?: FakeLLM; tts?: FakeTTS } = {},
  options: ConstructorParameters<typeof TaskRouter>[3] = {}
) {
  const asr = providers.asr ?? new FakeASR();
  const llm = providers.llm ?? new FakeLLM();
  const tts = providers.tts ?? new FakeTTS();
  const delay = instantSleep();
  return { asr, llm, tts, delays: delay.delays, router: new TaskRouter(asr, llm, tts, { sleep: delay.sleep, ...options }) };
}

describe("TaskRouter.transcribe", () => {
  it("returns trimmed text and detected language, passing the hint and wav format", async () => {
    const { asr, router: r } = router({ asr: new FakeASR([{ text: "  namaste  ", language: "hi-IN" }]) });
    await expect(r.transcribe(Buffer.from("audio"), "te-IN")).resolves.toEqual({ text: "namaste", language: "hi-IN" });
    expect(asr.calls[0].options).toEqual({ languageHint: "te-IN", format: "wav" });
  });

  it("reports null language when the provider gives none", async () => {
    const { router: r } = router({ asr: new FakeASR([{ text: "hello" }]) });
    await expect(r.transcribe(Buffer.alloc(4))).resolves.toEqual({ text: "hello", language: null });
  });

  it("retries after a failure with the configured delay", async () => {
    const asr = new FakeASR([new Error("network"), { text: "second try" }]);
    const { router: r, delays } = router({ asr }, { retryDelayMs: 250 });
    await expect(r.transcribe(Buffer.alloc(4))).resolves.toEqual({ text: "second try", language: null });
    expect(asr.calls).toHaveLength(2);
    expect(delays).toEqual([250]);
  });

  it("throws TranscriptionError when every attempt is blank", async () => {
    const asr = new FakeASR([{ text: "" }, { text: "   " }]);
    const { router: r } = router({ asr });
    const err = await r.transcribe(Buffer.alloc(4)).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TranscriptionError);
    expect(err).toHaveProperty("message", "Transcription returned empty text on all 2 attempt(s)");
  });

  it("throws TranscriptionError carrying the last failure after exhausting attempts", async () => {
    const asr = new FakeASR([new Error("first"), new Error("second"), new Error("third")]);
    const { router: r } = router({ asr }, { retryCount: 3 });
    const err = await r.transcribe(Buffer.alloc(4)).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TranscriptionError);
    expect(err).toHaveProperty("message", "Transcription failed after 3 attempt(s): third");
    expect(asr.calls).toHaveLength(3);
  });

  it("counts a timed-out attempt as a failure", async () => {
    const asr = new FakeASR([new Promise(() => undefined), { text: "late but fine" }]);
    const { router: r } = router({ asr }, { timeouts: { transcribeMs: 5 } });
    await expect(r.transcribe(Buffer.alloc(4))).resolves.toEqual({ text: "late but fine", language: null });
  });
});

describe("TaskRouter.generate", () => {
  it("sends context followed by the user message, in one attempt", async () => {
    const llm = new FakeLLM([{ text: " Reply " }]);
    const { router: r } = router({ llm }, { maxTokens: 64 });
    const context = [{ role: "system" as const, content: "Be brief." }];
    await expect(r.generate("Hi", context, "en-IN")).resolves.toBe("Reply");
    expect(llm.calls).toEqual([
      {
        messages: [
          { role: "system", content: "Be brief." },
          { role: "user", content: "Hi" },
        ],
        options: { maxTokens: 64 },
      },
    ]);
  });

  it("does not retry and throws GenerationError on failure", async () => {
    const llm = new FakeLLM([new Error("rate limited")]);
    const { router: r, delays } = router({ llm });
    const err = await r.generate("Hi", [], "en-IN").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(GenerationError);
    expect(err).toHaveProperty("message", "Generation failed: rate limited");
    expect(llm.calls).toHaveLength(1);
    expect(delays).toEqual([]);
  });

  it("throws GenerationError on an empty response", async () => {
    const { router: r } = router({ llm: new FakeLLM([{ text: "  " }]) });
    await expect(r.generate("Hi", [], "en-IN")).rejects.toThrow("Generation returned an empty response");
  });
});

describe("TaskRouter.synthesize", () => {
  it("passes the turn language and voice settings to the provider", async () => {
    const tts = new FakeTTS([Buffer.from([1, 2, 3])]);
    const { router: r } = router({ tts }, { voice: { sampleRateHz: 8000 } });
    await expect(r.synthesize("hello", "ta-IN")).resolves.toEqual(Buffer.from([1, 2, 3]));
    expect(tts.calls[0].options).toEqual({ sampleRateHz: 8000, languageCode: "ta-IN" });
  });

  it("retries empty audio and then throws SynthesisError", async () => {
    const tts = new FakeTTS([Buffer.alloc(0), Buffer.alloc(0)]);
    const { router: r } = router({ tts });
    const err = await r.synthesize("hello", "ta-IN").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SynthesisError);
    expect(err).toHaveProperty("message", "Synthesis returned empty audio on all 2 attempt(s)");
    expect(tts.calls).toHaveLength(2);
  });
});

describe("TaskRouter with circuit breakers", () => {
  it("propagates CircuitOpenError without further attempts", async () => {
    const breakers = createCapabilityBreakers({ failureThreshold: 1, timeoutMs: 60_000 });
    const asr = new FakeASR([new Error("down")]);
    const { router: r } = router({ asr }, { breakers, retryCount: 3 });

    await expect(r.transcribe(Buffer.alloc(4))).rejects.toBeInstanceOf(CircuitOpenError);
    expect(asr.calls).toHaveLength(1);
    expect(breakers.transcribe.getState().state).toBe("open");
    expect(breakers.generate.getState().state).toBe("closed");
  });

  it("does not count an empty result against the breaker", async () => {
    const breakers = createCapabilityBreakers({ failureThreshold: 1 });
    const { router: r } = router({ tts: new FakeTTS([Buffer.alloc(0), Buffer.alloc(0)]) }, { breakers });
    await expect(r.synthesize("x", "en-IN")).rejects.toBeInstanceOf(SynthesisError);
    expect(breakers.synthesize.getState()).toMatchObject({ state: "closed", consecutiveFailures: 0 });
  });

  it("stops retrying when the session signal aborts the delay", async () => {
    const controller = new AbortController();
    const asr = new FakeASR([new Error("flaky")]);
    const r = new TaskRouter(asr, new FakeLLM(), new FakeTTS(), {
      retryDelayMs: 10_000,
      signal: controller.signal,
    });
    const pending = r.transcribe(Buffer.alloc(4));
    controller.abort();
    await expect(pending).rejects.toThrow("Transcription failed after 1 attempt(s): Retry cancelled");
    expect(asr.calls).toHaveLength(1);
  });

  it("rejects a non-positive retryCount", () => {
    expect(() => new TaskRouter(new FakeASR(), new FakeLLM(), new FakeTTS(), { retryCount: 0 })).toThrow(RangeError);
  });
});

describe("withTimeout / sleep", () => {
  it("rejects with a labelled message when the promise is too slow", async () => {
    await expect(withTimeout(new Promise(() => undefined), 5, "transcribe")).rejects.toThrow("transcribe timed out after 5ms");
  });

  it("sleep rejects immediately on an already-aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(sleep(1_000, controller.signal)).rejects.toThrow("Retry cancelled");
  });
});
