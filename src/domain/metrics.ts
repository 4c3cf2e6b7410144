/**
 * Metrics Module
 * Simple in-memory metrics collection with Prometheus export
 */

type ToolOutcome = 'success' | 'error';
type UpstreamOutcome = 'success' | 'http_error' | 'network_error';
type CacheStatus = 'HIT' | 'MISS';

interface LatencyMetric {
  sum: number;
  count: number;
}

function increment<K>(map: Map<K, number>, key: K): void {
  map.set(key, (map.get(key) ?? 0) + 1);
}

/**
 * Metrics collector singleton
 */
class MetricsCollector {
  // mcp_tool_calls_total{tool_name, outcome}
  private toolCalls: Map<string, Map<ToolOutcome, number>> = new Map();

  // mcp_tool_latency_ms{tool_name}
  private latencies: Map<string, LatencyMetric> = new Map();

  // aladhan_upstream_calls_total{outcome}
  private upstreamCalls: Map<UpstreamOutcome, number> = new Map();

  // aladhan_methods_cache_total{status}
  private cacheStatuses: Map<CacheStatus, number> = new Map();

  incrementToolCall(toolName: string, outcome: ToolOutcome): void {
    let outcomeMap = this.toolCalls.get(toolName);
    if (!outcomeMap) {
      outcomeMap = new Map();
      this.toolCalls.set(toolName, outcomeMap);
    }
    increment(outcomeMap, outcome);
  }

  recordLatency(toolName: string, latencyMs: number): void {
    const metric = this.latencies.get(toolName) ?? { sum: 0, count: 0 };
    metric.sum += latencyMs;
    metric.count++;
    this.latencies.set(toolName, metric);
  }

  /**
   * Count one upstream attempt (retries count separately)
   */
  incrementUpstreamCall(outcome: UpstreamOutcome): void {
    increment(this.upstreamCalls, outcome);
  }

  incrementCacheStatus(status: CacheStatus): void {
    increment(this.cacheStatuses, status);
  }

  /**
   * Get current metrics snapshot
   */
  getMetrics() {
    const toolCallsData: Record<string, Partial<Record<ToolOutcome, number>>> = {};
    this.toolCalls.forEach((outcomeMap, toolName) => {
      toolCallsData[toolName] = Object.fromEntries(outcomeMap);
    });

    const latenciesData: Record<string, { avg: number; count: number }> = {};
    this.latencies.forEach((metric, toolName) => {
      latenciesData[toolName] = {
        avg: metric.count > 0 ? metric.sum / metric.count : 0,
        count: metric.count,
      };
    });

    return {
      toolCalls: toolCallsData,
      latencies: latenciesData,
      upstreamCalls: Object.fromEntries(this.upstreamCalls),
      cacheStatuses: Object.fromEntries(this.cacheStatuses),
      cacheHitRatio: this.cacheHitRatio(),
    };
  }

  private cacheHitRatio(): number {
    const hits = this.cacheStatuses.get('HIT') ?? 0;
    const misses = this.cacheStatuses.get('MISS') ?? 0;
    const total = hits + misses;
    return total > 0 ? hits / total : 0;
  }

  /**
   * Export metrics in Prometheus text format
   * See: https://prometheus.io/docs/instrumenting/exposition_formats/
   */
  exportPrometheus(): string {
    const lines: string[] = [];

    lines.push('# HELP mcp_tool_calls_total Total number of MCP tool calls by tool name and outcome');
    lines.push('# TYPE mcp_tool_calls_total counter');
    this.toolCalls.forEach((outcomeMap, toolName) => {
      outcomeMap.forEach((count, outcome) => {
        lines.push(`mcp_tool_calls_total{tool_name="${toolName}",outcome="${outcome}"} ${count}`);
      });
    });

    lines.push('');
    lines.push('# HELP mcp_tool_latency_ms_avg Average latency of MCP tool calls in milliseconds');
    lines.push('# TYPE mcp_tool_latency_ms_avg gauge');
    this.latencies.forEach((metric, toolName) => {
      const avg = metric.count > 0 ? metric.sum / metric.count : 0;
      lines.push(`mcp_tool_latency_ms_avg{tool_name="${toolName}"} ${avg.toFixed(2)}`);
    });

    lines.push('');
    lines.push('# HELP aladhan_upstream_calls_total Upstream HTTP attempts by outcome');
    lines.push('# TYPE aladhan_upstream_calls_total counter');
    this.upstreamCalls.forEach((count, outcome) => {
      lines.push(`aladhan_upstream_calls_total{outcome="${outcome}"} ${count}`);
    });

    lines.push('');
    lines.push('# HELP aladhan_methods_cache_total Calculation methods cache lookups by status');
    lines.push('# TYPE aladhan_methods_cache_total counter');
    this.cacheStatuses.forEach((count, status) => {
      lines.push(`aladhan_methods_cache_total{status="${status}"} ${count}`);
    });

    lines.push('');
    lines.push('# HELP aladhan_methods_cache_hit_ratio Ratio of cache hits to total lookups');
    lines.push('# TYPE aladhan_methods_cache_hit_ratio gauge');
    lines.push(`aladhan_methods_cache_hit_ratio ${this.cacheHitRatio().toFixed(4)}`);

    return lines.join('\n') + '\n';
  }

  /**
   * Reset all metrics (useful for testing)
   */
  reset(): void {
    this.toolCalls.clear();
    this.latencies.clear();
    this.upstreamCalls.clear();
    this.cacheStatuses.clear();
  }
}

export const metrics = new MetricsCollector();
