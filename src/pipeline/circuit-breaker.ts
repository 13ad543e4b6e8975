/**
 * Circuit breaker: isolates a failing external capability for a cooldown window.
 *
 * closed --(consecutiveFailures >= failureThreshold)--> open
 * open   --(timeoutMs elapsed since lastFailureTime)--> half_open (one trial call)
 * half_open --success--> closed, --failure--> open (window restarts)
 */

import { CircuitOpenError } from "../errors";
import { logger as rootLogger, type Logger } from "../logging";

export type CircuitStateName = "closed" | "open" | "half_open";

export interface CircuitState {
  state: CircuitStateName;
  consecutiveFailures: number;
  /** Epoch ms of the last failure; 0 when none. */
  lastFailureTime: number;
}

export interface CircuitSnapshot extends CircuitState {
  name: string;
  failureThreshold: number;
  timeoutMs: number;
  /** Remaining cooldown while open; 0 otherwise. */
  retryAfterMs: number;
}

export interface CircuitBreakerOptions {
  /** Label used in errors and logs (e.g. "transcribe"). */
  name: string;
  failureThreshold?: number;
  timeoutMs?: number;
  /** Clock source; injectable for tests. */
  now?: () => number;
  logger?: Logger;
}

export const DEFAULT_FAILURE_THRESHOLD = 5;
export const DEFAULT_CIRCUIT_TIMEOUT_MS = 60_000;

export class CircuitBreaker {
  readonly name: string;
  private readonly failureThreshold: number;
  private readonly timeoutMs: number;
  private readonly now: () => number;
  private readonly log: Logger;
  private circuit: CircuitState = { state: "closed", consecutiveFailures: 0, lastFailureTime: 0 };
  private trialInFlight = false;

  constructor(options: CircuitBreakerOptions) {
    this.name = options.name;
    this.failureThreshold = options.failureThreshold ?? DEFAULT_FAILURE_THRESHOLD;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_CIRCUIT_TIMEOUT_MS;
    if (!Number.isInteger(this.failureThreshold) || this.failureThreshold < 1) {
      throw new RangeError(`failureThreshold must be a positive integer, got ${this.failureThreshold}`);
    }
    if (this.timeoutMs < 0) {
      throw new RangeError(`timeoutMs must be >= 0, got ${this.timeoutMs}`);
    }
    this.now = options.now ?? Date.now;
    this.log = (options.logger ?? rootLogger).child({ circuit: this.name });
  }

  /**
   * Run `operation` under the breaker. Rejects with CircuitOpenError, without calling it,
   * while the circuit is open or a half-open trial is already in flight.
   */
  async call<T>(operation: () => Promise<T>): Promise<T> {
    this.admit();
    const isTrial = this.circuit.state === "half_open";
    if (isTrial) this.trialInFlight = true;
    try {
      const result = await operation();
      this.onSuccess();
      return result;
    } catch (err) {
      this.onFailure();
      throw err;
    } finally {
      if (isTrial) this.trialInFlight = false;
    }
  }

  getState(): CircuitSnapshot {
    return {
      name: this.name,
      ...this.circuit,
      failureThreshold: this.failureThreshold,
      timeoutMs: this.timeoutMs,
      retryAfterMs: this.circuit.state === "open" ? this.remainingCooldown() : 0,
    };
  }

  /** Force the circuit closed (operator action). */
  reset(): void {
    this.circuit = { state: "closed", consecutiveFailures: 0, lastFailureTime: 0 };
    this.trialInFlight = false;
    this.log.info({ event: "CIRCUIT_RESET" }, "Circuit manually reset to closed");
  }

  private admit(): void {
    if (this.circuit.state === "open") {
      const remaining = this.remainingCooldown();
      if (remaining > 0) throw new CircuitOpenError(this.name, remaining);
      this.transition("half_open");
    }
    if (this.circuit.state === "half_open" && this.trialInFlight) {
      throw new CircuitOpenError(this.name, 0);
    }
  }

  private onSuccess(): void {
    this.circuit.consecutiveFailures = 0;
    if (this.circuit.state !== "closed") this.transition("closed");
  }

  private onFailure(): void {
    this.circuit.consecutiveFailures += 1;
    this.circuit.lastFailureTime = this.now();
    if (this.circuit.state === "half_open" || this.circuit.consecutiveFailures >= this.failureThreshold) {
      if (this.circuit.state !== "open") this.transition("open");
    }
  }

  private remainingCooldown(): number {
    return Math.max(0, this.circuit.lastFailureTime + this.timeoutMs - this.now());
  }

  private transition(next: CircuitStateName): void {
    const from = this.circuit.state;
    this.circuit.state = next;
    const fields = { event: "CIRCUIT_TRANSITION", from, to: next, consecutiveFailures: this.circuit.consecutiveFailures };
    if (next === "open") this.log.warn(fields, `Circuit ${from} -> open`);
    else this.log.info(fields, `Circuit ${from} -> ${next}`);
  }
}
