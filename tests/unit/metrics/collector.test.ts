/**
 * Unit tests for MetricsCollector aggregates and report.
 */

import { MetricsCollector, type TurnMetricsInput } from "../../../src/metrics";

function turn(overrides: Partial<TurnMetricsInput> = {}): TurnMetricsInput {
  return {
    transcribeLatencyMs: 100,
    generateLatencyMs: 200,
    synthesizeLatencyMs: 300,
    language: "te-IN",
    success: true,
    timestamp: 1,
    ...overrides,
  };
}

describe("MetricsCollector", () => {
  it("fills total latency and degraded defaults", () => {
    const metrics = new MetricsCollector();
    expect(metrics.recordTurn(turn())).toEqual({
      transcribeLatencyMs: 100,
      generateLatencyMs: 200,
      synthesizeLatencyMs: 300,
      totalLatencyMs: 600,
      language: "te-IN",
      success: true,
      degraded: false,
      timestamp: 1,
    });
    expect(metrics.recordTurn(turn({ totalLatencyMs: 650 })).totalLatencyMs).toBe(650);
  });

  it("averages latencies overall and per language", () => {
    const metrics = new MetricsCollector();
    metrics.recordTurn(turn());
    metrics.recordTurn(turn({ transcribeLatencyMs: 300, generateLatencyMs: 400, synthesizeLatencyMs: 500 }));
    metrics.recordTurn(turn({ language: "hi-IN", transcribeLatencyMs: 50, generateLatencyMs: 0, synthesizeLatencyMs: 0 }));

    expect(metrics.getAverageLatencies()).toEqual({ transcribe: 150, generate: 200, synthesize: 800 / 3, total: 1850 / 3 });
    expect(metrics.getLanguageStatistics()).toEqual({
      "te-IN": { count: 2, transcribe: 200, generate: 300, synthesize: 400, total: 900 },
      "hi-IN": { count: 1, transcribe: 50, generate: 0, synthesize: 0, total: 50 },
    });
  });

  it("reports success rate and error counts", () => {
    const metrics = new MetricsCollector();
    expect(metrics.getSuccessRate()).toBe(1);
    metrics.recordTurn(turn());
    metrics.recordTurn(turn({ success: false, errorKind: "TRANSCRIPTION_FAILED" }));
    metrics.recordTurn(turn({ success: false, errorKind: "TRANSCRIPTION_FAILED" }));
    metrics.recordTurn(turn({ degraded: true, errorKind: "SYNTHESIS_FAILED" }));
    expect(metrics.getSuccessRate()).toBe(0.5);
    expect(metrics.getErrorStatistics()).toEqual({ TRANSCRIPTION_FAILED: 2, SYNTHESIS_FAILED: 1 });
  });

  it("bounds retention to maxMetrics, dropping the oldest", () => {
    const metrics = new MetricsCollector({ maxMetrics: 2 });
    metrics.recordTurn(turn({ timestamp: 1 }));
    metrics.recordTurn(turn({ timestamp: 2 }));
    metrics.recordTurn(turn({ timestamp: 3 }));
    expect(metrics.getTurns().map((t) => t.timestamp)).toEqual([2, 3]);
    expect(metrics.getLastTurn()?.timestamp).toBe(3);
  });

  it("returns copies that cannot alter recorded turns", () => {
    const metrics = new MetricsCollector();
    metrics.recordTurn(turn());
    const [copy] = metrics.getTurns();
    copy.language = "xx";
    expect(metrics.getLastTurn()?.language).toBe("te-IN");
  });

  it("renders a plain-text report", () => {
    const metrics = new MetricsCollector();
    expect(metrics.generateReport()).toBe("No metrics recorded yet.");
    metrics.recordTurn(turn());
    metrics.recordTurn(turn({ success: false, errorKind: "GENERATION_FAILED", generateLatencyMs: 0, synthesizeLatencyMs: 0 }));
    expect(metrics.generateReport().split("\n")).toEqual([
      "Performance Metrics Report",
      "=".repeat(50),
      "Total Turns: 2",
      "Success Rate: 50.0%",
      "Degraded Turns: 0",
      "",
      "Average Latencies:",
      "  - Transcribe: 100ms",
      "  - Generate: 100ms",
      "  - Synthesize: 150ms",
      "  - Total: 350ms",
      "",
      "Language Statistics:",
      "  te-IN (2 turns):",
      "    - Transcribe: 100ms",
      "    - Generate: 100ms",
      "    - Synthesize: 150ms",
      "    - Total: 350ms",
      "",
      "Error Statistics:",
      "  - GENERATION_FAILED: 1",
    ]);
  });

  it("reset() clears everything", () => {
    const metrics = new MetricsCollector();
    metrics.recordTurn(turn());
    metrics.reset();
    expect(metrics.getTurns()).toEqual([]);
    expect(metrics.getLastTurn()).toBeUndefined();
  });
});
