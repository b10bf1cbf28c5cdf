/**
 * Metrics Module
 * In-memory counters for match decisions, strategy failures and reloads,
 * exportable in Prometheus text format
 */

interface LatencyMetric {
  sum: number;
  count: number;
}

/**
 * Metrics collector singleton
 */
class MetricsCollector {
  // commune_matches_total{method}
  private matches: Map<string, number> = new Map();

  // commune_strategy_failures_total{strategy, code}
  private strategyFailures: Map<string, Map<string, number>> = new Map();

  // commune_match_latency_ms
  private latency: LatencyMetric = { sum: 0, count: 0 };

  // commune_reloads_total{outcome}
  private reloads: Map<string, number> = new Map();

  /**
   * Count one match decision by method
   */
  incrementMatch(method: string): void {
    this.matches.set(method, (this.matches.get(method) ?? 0) + 1);
  }

  /**
   * Count one strategy that produced an error instead of candidates
   */
  incrementStrategyFailure(strategy: string, code: string): void {
    let byCode = this.strategyFailures.get(strategy);
    if (!byCode) {
      byCode = new Map();
      this.strategyFailures.set(strategy, byCode);
    }
    byCode.set(code, (byCode.get(code) ?? 0) + 1);
  }

  recordLatency(latencyMs: number): void {
    this.latency.sum += latencyMs;
    this.latency.count++;
  }

  incrementReload(outcome: 'success' | 'error'): void {
    this.reloads.set(outcome, (this.reloads.get(outcome) ?? 0) + 1);
  }

  /**
   * Get current metrics snapshot
   */
  getMetrics() {
    const strategyFailuresData: Record<string, Record<string, number>> = {};
    this.strategyFailures.forEach((byCode, strategy) => {
      strategyFailuresData[strategy] = Object.fromEntries(byCode);
    });

    return {
      matches: Object.fromEntries(this.matches),
      strategyFailures: strategyFailuresData,
      latency: {
        avg: this.latency.count > 0 ? this.latency.sum / this.latency.count : 0,
        count: this.latency.count,
      },
      reloads: Object.fromEntries(this.reloads),
    };
  }

  /**
   * Export metrics in Prometheus text format
   * See: https://prometheus.io/docs/instrumenting/exposition_formats/
   */
  exportPrometheus(): string {
    const lines: string[] = [];

    lines.push('# HELP commune_matches_total Total number of match decisions by method');
    lines.push('# TYPE commune_matches_total counter');
    this.matches.forEach((count, method) => {
      lines.push(`commune_matches_total{method="${method}"} ${count}`);
    });

    lines.push('');
    lines.push('# HELP commune_strategy_failures_total Strategy calls that produced an error');
    lines.push('# TYPE commune_strategy_failures_total counter');
    this.strategyFailures.forEach((byCode, strategy) => {
      byCode.forEach((count, code) => {
        lines.push(`commune_strategy_failures_total{strategy="${strategy}",code="${code}"} ${count}`);
      });
    });

    lines.push('');
    lines.push('# HELP commune_match_latency_ms_avg Average latency of match calls in milliseconds');
    lines.push('# TYPE commune_match_latency_ms_avg gauge');
    const avg = this.latency.count > 0 ? this.latency.sum / this.latency.count : 0;
    lines.push(`commune_match_latency_ms_avg ${avg.toFixed(2)}`);

    lines.push('');
    lines.push('# HELP commune_reloads_total Reference data reloads by outcome');
    lines.push('# TYPE commune_reloads_total counter');
    this.reloads.forEach((count, outcome) => {
      lines.push(`commune_reloads_total{outcome="${outcome}"} ${count}`);
    });

    return lines.join('\n') + '\n';
  }

  /**
   * Reset all metrics (useful for testing)
   */
  reset(): void {
    this.matches.clear();
    this.strategyFailures.clear();
    this.latency = { sum: 0, count: 0 };
    this.reloads.clear();
  }
}

// Singleton metrics collector
export const metrics = new MetricsCollector();
