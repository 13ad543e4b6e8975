/**
 * Orchestrator: runs one conversational turn, transcribe -> language -> context -> generate -> synthesize.
 * Never throws out of processTurn; every failure is returned as TurnResult.error and recorded in metrics.
 */

import type { Message } from "../adapters/llm";
import { BusyError, ErrorCodes, PipelineError, toError } from "../errors";
import { logger as rootLogger, logError, type Logger } from "../logging";
import type { ContextManager } from "../memory/context-manager";
import { MetricsCollector, type TurnMetrics } from "../metrics";
import type { PromptBuilder } from "../prompts/prompt-manager";
import type { LanguageCoordinator } from "./language-coordinator";
import type { TaskRouter } from "./task-router";

export type ProcessingState = "idle" | "transcribing" | "generating" | "synthesizing";

export interface TurnResult {
  /** Caller transcript (present once transcription succeeded). */
  text?: string;
  /** Assistant reply (present once generation succeeded). */
  response?: string;
  /** Synthesized audio as returned by the provider. */
  audio?: Buffer;
  /** Language every stage used for this turn. */
  language: string;
  metrics?: TurnMetrics;
  error?: PipelineError;
}

export interface OrchestratorStatus {
  isProcessing: boolean;
  processingState: ProcessingState;
  currentLanguage: string;
  languageName: string;
  turnCount: number;
  /** Stored history entries, system entry included. */
  historyLength: number;
}

export interface OrchestratorConfig {
  metrics?: MetricsCollector;
  /** Include user metadata in the system message sent to generation. */
  includeMetadata?: boolean;
  /** Clock source; injectable for tests. */
  now?: () => number;
  logger?: Logger;
}

interface StageTimings {
  transcribeLatencyMs: number;
  generateLatencyMs: number;
  synthesizeLatencyMs: number;
}

export class Orchestrator {
  private processing = false;
  private processingState: ProcessingState = "idle";
  private promptLanguage: string;
  private readonly metrics: MetricsCollector;
  private readonly includeMetadata: boolean;
  private readonly now: () => number;
  private readonly log: Logger;

  constructor(
    private readonly router: TaskRouter,
    private readonly context: ContextManager,
    private readonly languages: LanguageCoordinator,
    private readonly prompts: PromptBuilder,
    config: OrchestratorConfig = {}
  ) {
    this.log = config.logger ?? rootLogger;
    this.metrics = config.metrics ?? new MetricsCollector({ logger: this.log });
    this.includeMetadata = config.includeMetadata ?? false;
    this.now = config.now ?? Date.now;
    this.promptLanguage = this.languages.ensureConsistency();
    if (this.context.getSystemPrompt() === undefined) {
      this.context.setSystemPrompt(this.prompts.buildSystemPrompt(this.promptLanguage));
    }
  }

  /**
   * Run one turn on a complete utterance (WAV). Returns immediately with BusyError when a turn is in flight;
   * that path touches no history, language state or metrics.
   */
  async processTurn(audio: Buffer): Promise<TurnResult> {
    if (this.processing) {
      this.log.warn({ event: "TURN_REJECTED_BUSY" }, "Turn already in flight; rejecting");
      return { language: this.languages.ensureConsistency(), error: new BusyError() };
    }
    this.processing = true;
    const startedAt = this.now();
    const timings: StageTimings = { transcribeLatencyMs: 0, generateLatencyMs: 0, synthesizeLatencyMs: 0 };
    let language = this.languages.ensureConsistency();
    let text: string | undefined;
    let response: string | undefined;

    try {
      this.processingState = "transcribing";
      let stageStart = this.now();
      let transcript: { text: string; language: string | null };
      try {
        transcript = await this.router.transcribe(audio, language);
      } catch (err) {
        timings.transcribeLatencyMs = this.now() - stageStart;
        return this.fail({ language }, err, timings, startedAt);
      }
      timings.transcribeLatencyMs = this.now() - stageStart;
      text = transcript.text;

      if (transcript.language !== null) {
        this.languages.setDetectedLanguage(transcript.language);
      }
      language = this.languages.ensureConsistency();
      if (language !== this.promptLanguage) {
        this.context.setSystemPrompt(this.prompts.buildSystemPrompt(language));
        this.log.info({ event: "SYSTEM_PROMPT_REFRESHED", from: this.promptLanguage, to: language }, "System prompt rebuilt for new language");
        this.promptLanguage = language;
      }

      const contextMessages: Message[] = this.context.getContext(undefined, { includeMetadata: this.includeMetadata });

      this.processingState = "generating";
      stageStart = this.now();
      try {
        response = await this.router.generate(text, contextMessages, language);
      } catch (err) {
        timings.generateLatencyMs = this.now() - stageStart;
        return this.fail({ text, language }, err, timings, startedAt);
      }
      timings.generateLatencyMs = this.now() - stageStart;

      this.context.addTurn(text, response, language);

      this.processingState = "synthesizing";
      stageStart = this.now();
      let output: Buffer;
      try {
        output = await this.router.synthesize(response, language);
      } catch (err) {
        timings.synthesizeLatencyMs = this.now() - stageStart;
        const error = this.toPipelineError(err);
        this.log.warn({ event: "TURN_DEGRADED", err: error.toJSON() }, "Synthesis failed; returning text-only result");
        const metrics = this.metrics.recordTurn({
          ...timings,
          totalLatencyMs: this.now() - startedAt,
          language,
          success: true,
          degraded: true,
          errorKind: error.code,
        });
        return { text, response, audio: undefined, language, metrics, error };
      }
      timings.synthesizeLatencyMs = this.now() - stageStart;

      const metrics = this.metrics.recordTurn({
        ...timings,
        totalLatencyMs: this.now() - startedAt,
        language,
        success: true,
      });
      this.log.info({ event: "TURN_COMPLETE", language, audioBytes: output.length }, "Turn processed");
      return { text, response, audio: output, language, metrics };
    } catch (err) {
      return this.fail({ text, response, language }, err, timings, startedAt);
    } finally {
      this.processing = false;
      this.processingState = "idle";
    }
  }

  /** Explicit language selection; rebuilds the system prompt when the effective language changes. */
  setLanguage(code: string): void {
    this.languages.setLanguage(code);
    const language = this.languages.ensureConsistency();
    if (language !== this.promptLanguage) {
      this.context.setSystemPrompt(this.prompts.buildSystemPrompt(language));
      this.promptLanguage = language;
    }
  }

  /**
   * Replace the base prompt. With a builder that accepts one, the language instruction is kept
   * and later language changes rebuild from this text; otherwise it is stored as-is.
   */
  setSystemPrompt(systemPrompt: string): void {
    if (this.prompts.setBasePrompt) {
      this.prompts.setBasePrompt(systemPrompt);
      this.context.setSystemPrompt(this.prompts.buildSystemPrompt(this.promptLanguage));
      return;
    }
    this.context.setSystemPrompt(systemPrompt);
  }

  getContext(): Message[] {
    return this.context.getContext();
  }

  /** Caller facts (e.g. from CRM) made available to generation when includeMetadata is on. */
  setUserMetadata(key: string, value: unknown): void {
    this.context.setUserMetadata(key, value);
  }

  /** Clear conversation history; the system prompt stays. */
  clearContext(): void {
    this.context.clearHistory();
  }

  getStatus(): OrchestratorStatus {
    const currentLanguage = this.languages.ensureConsistency();
    return {
      isProcessing: this.processing,
      processingState: this.processingState,
      currentLanguage,
      languageName: this.languages.getLanguageName(currentLanguage),
      turnCount: this.context.getTurnCount(),
      historyLength: this.context.size() + (this.context.getSystemPrompt() === undefined ? 0 : 1),
    };
  }

  getMetrics(): MetricsCollector {
    return this.metrics;
  }

  isProcessing(): boolean {
    return this.processing;
  }

  private fail(
    partial: Pick<TurnResult, "text" | "response" | "language">,
    err: unknown,
    timings: StageTimings,
    startedAt: number
  ): TurnResult {
    const error = this.toPipelineError(err);
    if (error.code === ErrorCodes.INTERNAL) {
      logError(this.log, error, { event: "TURN_INTERNAL_ERROR", stage: this.processingState });
    } else {
      this.log.warn({ event: "TURN_FAILED", err: error.toJSON() }, `Turn failed at ${error.stage}`);
    }
    const metrics = this.metrics.recordTurn({
      ...timings,
      totalLatencyMs: this.now() - startedAt,
      language: partial.language,
      success: false,
      errorKind: error.code,
    });
    return { ...partial, metrics, error };
  }

  private toPipelineError(err: unknown): PipelineError {
    if (err instanceof PipelineError) return err;
    const cause = toError(err);
    return new PipelineError(ErrorCodes.INTERNAL, "internal", `Unexpected error: ${cause.message}`, { cause });
  }
}
