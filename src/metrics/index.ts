/**
 * Per-session turn metrics.
 * Every completed processTurn (failed ones included) is recorded, logged and aggregated here.
 */

import { logger as rootLogger, type Logger } from "../logging";

/** Timing and outcome of one turn (ms). Stages that did not run record 0. */
export interface TurnMetrics {
  transcribeLatencyMs: number;
  generateLatencyMs: number;
  synthesizeLatencyMs: number;
  /** Wall time from turn start to result. */
  totalLatencyMs: number;
  language: string;
  success: boolean;
  /** True when the turn produced a reply but no audio. */
  degraded: boolean;
  /** PipelineError code of the failure, if any. */
  errorKind?: string;
  /** Epoch ms. */
  timestamp: number;
}

export type TurnMetricsInput = Omit<TurnMetrics, "totalLatencyMs" | "timestamp" | "degraded"> &
  Partial<Pick<TurnMetrics, "totalLatencyMs" | "timestamp" | "degraded">>;

export interface LatencyAverages {
  transcribe: number;
  generate: number;
  synthesize: number;
  total: number;
}

export interface LanguageStats extends LatencyAverages {
  count: number;
}

export interface MetricsCollectorConfig {
  /** Retained turns; oldest dropped beyond this (default 1000). */
  maxMetrics?: number;
  logger?: Logger;
}

export const DEFAULT_MAX_METRICS = 1000;

export class MetricsCollector {
  private turns: TurnMetrics[] = [];
  private readonly maxMetrics: number;
  private readonly log: Logger;

  constructor(config: MetricsCollectorConfig = {}) {
    this.maxMetrics = config.maxMetrics ?? DEFAULT_MAX_METRICS;
    if (!Number.isInteger(this.maxMetrics) || this.maxMetrics < 1) {
      throw new RangeError(`maxMetrics must be a positive integer, got ${this.maxMetrics}`);
    }
    this.log = config.logger ?? rootLogger;
  }

  recordTurn(input: TurnMetricsInput): TurnMetrics {
    const metrics: TurnMetrics = {
      ...input,
      degraded: input.degraded ?? false,
      totalLatencyMs:
        input.totalLatencyMs ?? input.transcribeLatencyMs + input.generateLatencyMs + input.synthesizeLatencyMs,
      timestamp: input.timestamp ?? Date.now(),
    };
    this.turns.push(metrics);
    if (this.turns.length > this.maxMetrics) {
      this.turns = this.turns.slice(-this.maxMetrics);
    }
    this.log.info(
      {
        event: "TURN_METRICS",
        transcribe_latency_ms: metrics.transcribeLatencyMs,
        generate_latency_ms: metrics.generateLatencyMs,
        synthesize_latency_ms: metrics.synthesizeLatencyMs,
        total_latency_ms: metrics.totalLatencyMs,
        language: metrics.language,
        success: metrics.success,
        degraded: metrics.degraded,
        error_kind: metrics.errorKind,
      },
      "Turn latency"
    );
    return { ...metrics };
  }

  getAverageLatencies(): LatencyAverages {
    return average(this.turns);
  }

  getLanguageStatistics(): Record<string, LanguageStats> {
    const byLanguage = new Map<string, TurnMetrics[]>();
    for (const t of this.turns) {
      const list = byLanguage.get(t.language) ?? [];
      list.push(t);
      byLanguage.set(t.language, list);
    }
    const out: Record<string, LanguageStats> = {};
    for (const [language, list] of byLanguage) {
      out[language] = { count: list.length, ...average(list) };
    }
    return out;
  }

  /** Fraction of successful turns; 1 when nothing has been recorded. */
  getSuccessRate(): number {
    if (this.turns.length === 0) return 1;
    return this.turns.filter((t) => t.success).length / this.turns.length;
  }

  /** Counts per errorKind, degraded turns included. */
  getErrorStatistics(): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const t of this.turns) {
      if (t.errorKind) counts[t.errorKind] = (counts[t.errorKind] ?? 0) + 1;
    }
    return counts;
  }

  getLastTurn(): TurnMetrics | undefined {
    const last = this.turns[this.turns.length - 1];
    return last ? { ...last } : undefined;
  }

  getTurns(): TurnMetrics[] {
    return this.turns.map((t) => ({ ...t }));
  }

  generateReport(): string {
    if (this.turns.length === 0) return "No metrics recorded yet.";

    const avg = this.getAverageLatencies();
    const degraded = this.turns.filter((t) => t.degraded).length;
    const lines = [
      "Performance Metrics Report",
      "=".repeat(50),
      `Total Turns: ${this.turns.length}`,
      `Success Rate: ${(this.getSuccessRate() * 100).toFixed(1)}%`,
      `Degraded Turns: ${degraded}`,
      "",
      "Average Latencies:",
      ...latencyLines(avg, "  "),
      "",
      "Language Statistics:",
    ];
    for (const [language, stats] of Object.entries(this.getLanguageStatistics())) {
      lines.push(`  ${language} (${stats.count} turns):`, ...latencyLines(stats, "    "));
    }
    const errors = Object.entries(this.getErrorStatistics());
    if (errors.length > 0) {
      lines.push("", "Error Statistics:", ...errors.map(([kind, count]) => `  - ${kind}: ${count}`));
    }
    return lines.join("\n");
  }

  reset(): void {
    this.turns = [];
    this.log.info({ event: "METRICS_RESET" }, "Metrics reset");
  }
}

function average(turns: readonly TurnMetrics[]): LatencyAverages {
  const n = turns.length;
  if (n === 0) return { transcribe: 0, generate: 0, synthesize: 0, total: 0 };
  const sum = (pick: (t: TurnMetrics) => number) => turns.reduce((acc, t) => acc + pick(t), 0) / n;
  return {
    transcribe: sum((t) => t.transcribeLatencyMs),
    generate: sum((t) => t.generateLatencyMs),
    synthesize: sum((t) => t.synthesizeLatencyMs),
    total: sum((t) => t.totalLatencyMs),
  };
}

function latencyLines(avg: LatencyAverages, indent: string): string[] {
  return [
    `${indent}- Transcribe: ${Math.round(avg.transcribe)}ms`,
    `${indent}- Generate: ${Math.round(avg.generate)}ms`,
    `${indent}- Synthesize: ${Math.round(avg.synthesize)}ms`,
    `${indent}- Total: ${Math.round(avg.total)}ms`,
  ];
}
