/**
 * Entry point: load config, build providers, and run one call session on the mock transport.
 * Set MOCK_INPUT_WAV to a 16-bit mono WAV at AUDIO_SAMPLE_RATE to simulate a caller.
 */

import { loadConfig } from "./config";
import { createASR } from "./adapters/asr";
import { createLLM } from "./adapters/llm";
import { createTTS } from "./adapters/tts";
import { toError } from "./errors";
import { logger, logError } from "./logging";
import { createSessionFactory } from "./pipeline/call-session";
import { MockTransport } from "./transport/mock";

async function main(): Promise<void> {
  const config = loadConfig();
  const providers = { asr: createASR(config), llm: createLLM(config), tts: createTTS(config) };
  const newSession = createSessionFactory(providers, config, { logger });

  const transport = new MockTransport({
    encoding: config.audio.encoding,
    sampleRateHz: config.audio.sampleRateHz,
    frameBytes: config.audio.frameBytes,
    inputWavPath: process.env.MOCK_INPUT_WAV,
    outputWavPath: process.env.MOCK_OUTPUT_WAV ?? "tts_output.wav",
  });

  const session = newSession(transport, {
    callbacks: {
      onTurnResult: (result, stream) =>
        logger.info(
          {
            event: "TURN_RESULT",
            language: result.language,
            textLength: result.text?.length ?? 0,
            responseLength: result.response?.length ?? 0,
            chunksSent: stream?.chunksSent ?? 0,
            error: result.error?.code,
          },
          "Turn finished"
        ),
    },
  });
  transport.onAudioFrame((frame) => session.pushFrame(frame));
  transport.onClose(() => session.close());

  const frames = transport.feedFromWav();
  if (frames === 0) {
    logger.info("No caller audio; set MOCK_INPUT_WAV to a 16-bit mono WAV to run a turn");
  }
  session.flush();
  await session.whenIdle();

  const outPath = transport.flushToFile();
  logger.info({ event: "MOCK_OUTPUT_WRITTEN", path: outPath }, "Wrote outbound audio");
  process.stdout.write(`${session.getMetrics().generateReport()}\n`);
  transport.disconnect();
}

main().catch((err: unknown) => {
  logError(logger, toError(err));
  process.exit(1);
});
