/**
 * Error taxonomy for the turn pipeline.
 * Every failure that ends up in TurnResult.error is a PipelineError; `code` is what metrics record as errorKind.
 */

export type PipelineStage = "transcribe" | "generate" | "synthesize" | "session" | "internal";

export type Capability = "transcribe" | "generate" | "synthesize";

export const ErrorCodes = {
  TRANSCRIPTION_FAILED: "TRANSCRIPTION_FAILED",
  GENERATION_FAILED: "GENERATION_FAILED",
  SYNTHESIS_FAILED: "SYNTHESIS_FAILED",
  CIRCUIT_OPEN: "CIRCUIT_OPEN",
  SESSION_BUSY: "SESSION_BUSY",
  INTERNAL: "INTERNAL",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/** Base class for all pipeline errors. */
export class PipelineError extends Error {
  readonly timestamp: string;

  constructor(
    readonly code: ErrorCode,
    readonly stage: PipelineStage,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = this.constructor.name;
    this.timestamp = new Date().toISOString();
  }

  /** Structured representation for logging. */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      stage: this.stage,
      message: this.message,
      timestamp: this.timestamp,
      ...(this.cause != null ? { cause: this.cause instanceof Error ? this.cause.message : String(this.cause) } : {}),
    };
  }
}

export class TranscriptionError extends PipelineError {
  constructor(message: string, options?: ErrorOptions) {
    super(ErrorCodes.TRANSCRIPTION_FAILED, "transcribe", message, options);
  }
}

export class GenerationError extends PipelineError {
  constructor(message: string, options?: ErrorOptions) {
    super(ErrorCodes.GENERATION_FAILED, "generate", message, options);
  }
}

export class SynthesisError extends PipelineError {
  constructor(message: string, options?: ErrorOptions) {
    super(ErrorCodes.SYNTHESIS_FAILED, "synthesize", message, options);
  }
}

/** Raised without invoking the operation while a capability is isolated. */
export class CircuitOpenError extends PipelineError {
  constructor(
    readonly capability: string,
    readonly retryAfterMs: number
  ) {
    super(
      ErrorCodes.CIRCUIT_OPEN,
      isCapability(capability) ? capability : "internal",
      `Circuit for ${capability} is open; retry after ${Math.ceil(retryAfterMs / 1000)}s`
    );
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), capability: this.capability, retryAfterMs: this.retryAfterMs };
  }
}

export class BusyError extends PipelineError {
  constructor() {
    super(ErrorCodes.SESSION_BUSY, "session", "A turn is already in flight for this session");
  }
}

function isCapability(value: string): value is Capability {
  return value === "transcribe" || value === "generate" || value === "synthesize";
}

/** Normalize anything thrown into an Error (for logging and `cause`). */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
