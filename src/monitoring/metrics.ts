/**
 * Prometheus Metrics
 *
 * Exposes metrics in Prometheus format for monitoring:
 * - Tool call latency
 * - Error rates per tool
 * - Request counts
 */

import { Router, Request, Response } from 'express';

interface ToolCallMetric {
  toolName: string;
  duration: number;
  success: boolean;
  timestamp: number;
}

export interface ToolMetrics {
  totalCalls: number;
  successfulCalls: number;
  failedCalls: number;
  totalDuration: number;
  avgDuration: number;
  lastCallTime: number;
}

export interface LatencyPercentiles {
  p50: number;
  p90: number;
  p95: number;
  p99: number;
}

export interface MetricsSummary {
  service: string;
  uptime: number;
  requestCount: number;
  errorCount: number;
  errorRate: number;
  tools: Record<string, ToolMetrics>;
  latency: LatencyPercentiles;
}

/**
 * Metrics Collector - Tracks and exposes server metrics
 */
export class MetricsCollector {
  private toolCalls: ToolCallMetric[] = [];
  private toolMetrics = new Map<string, ToolMetrics>();
  private requestCount = 0;
  private errorCount = 0;
  private startTime = Date.now();

  constructor(
    private readonly service: string,
    private readonly maxHistorySize = 10000
  ) {}

  /**
   * Record a tool call
   */
  recordToolCall(toolName: string, duration: number, success: boolean): void {
    this.toolCalls.push({ toolName, duration, success, timestamp: Date.now() });

    // Trim history if too large
    if (this.toolCalls.length > this.maxHistorySize) {
      this.toolCalls = this.toolCalls.slice(-Math.floor(this.maxHistorySize / 2));
    }

    this.updateToolMetrics(toolName, duration, success);
  }

  private updateToolMetrics(toolName: string, duration: number, success: boolean): void {
    let metrics = this.toolMetrics.get(toolName);

    if (!metrics) {
      metrics = {
        totalCalls: 0,
        successfulCalls: 0,
        failedCalls: 0,
        totalDuration: 0,
        avgDuration: 0,
        lastCallTime: 0,
      };
      this.toolMetrics.set(toolName, metrics);
    }

    metrics.totalCalls++;
    metrics.totalDuration += duration;
    metrics.avgDuration = metrics.totalDuration / metrics.totalCalls;
    metrics.lastCallTime = Date.now();

    if (success) {
      metrics.successfulCalls++;
    } else {
      metrics.failedCalls++;
    }
  }

  /**
   * Record a JSON-RPC request
   */
  recordRequest(isError: boolean = false): void {
    this.requestCount++;
    if (isError) {
      this.errorCount++;
    }
  }

  getToolMetrics(toolName: string): ToolMetrics | undefined {
    return this.toolMetrics.get(toolName);
  }

  /**
   * Get tool call latency percentiles
   */
  getLatencyPercentiles(toolName?: string): LatencyPercentiles {
    const calls = toolName ? this.toolCalls.filter(c => c.toolName === toolName) : this.toolCalls;

    if (calls.length === 0) {
      return { p50: 0, p90: 0, p95: 0, p99: 0 };
    }

    const durations = calls.map(c => c.duration).sort((a, b) => a - b);
    const at = (fraction: number): number => durations[Math.floor(durations.length * fraction)] ?? 0;

    return {
      p50: at(0.5),
      p90: at(0.9),
      p95: at(0.95),
      p99: at(0.99),
    };
  }

  getErrorRate(): number {
    return this.requestCount > 0 ? this.errorCount / this.requestCount : 0;
  }

  /**
   * Generate Prometheus format metrics
   */
  generatePrometheusMetrics(toolCount: number): string {
    const lines: string[] = [];
    const label = `service="${this.service}"`;

    lines.push('# HELP mcp_server_uptime_seconds Server uptime in seconds');
    lines.push('# TYPE mcp_server_uptime_seconds gauge');
    lines.push(`mcp_server_uptime_seconds{${label}} ${(Date.now() - this.startTime) / 1000}`);

    lines.push('');
    lines.push('# HELP mcp_server_requests_total Total number of requests');
    lines.push('# TYPE mcp_server_requests_total counter');
    lines.push(`mcp_server_requests_total{${label}} ${this.requestCount}`);

    lines.push('');
    lines.push('# HELP mcp_server_errors_total Total number of errors');
    lines.push('# TYPE mcp_server_errors_total counter');
    lines.push(`mcp_server_errors_total{${label}} ${this.errorCount}`);

    lines.push('');
    lines.push('# HELP mcp_tool_calls_total Total calls per tool');
    lines.push('# TYPE mcp_tool_calls_total counter');
    for (const [tool, metrics] of this.toolMetrics) {
      lines.push(`mcp_tool_calls_total{${label},tool="${tool}"} ${metrics.totalCalls}`);
    }

    lines.push('');
    lines.push('# HELP mcp_tool_errors_total Failed calls per tool');
    lines.push('# TYPE mcp_tool_errors_total counter');
    for (const [tool, metrics] of this.toolMetrics) {
      lines.push(`mcp_tool_errors_total{${label},tool="${tool}"} ${metrics.failedCalls}`);
    }

    lines.push('');
    lines.push('# HELP mcp_tool_latency_avg_ms Average latency per tool in ms');
    lines.push('# TYPE mcp_tool_latency_avg_ms gauge');
    for (const [tool, metrics] of this.toolMetrics) {
      lines.push(`mcp_tool_latency_avg_ms{${label},tool="${tool}"} ${metrics.avgDuration.toFixed(2)}`);
    }

    const percentiles = this.getLatencyPercentiles();
    lines.push('');
    lines.push('# HELP mcp_tool_latency_ms Tool call latency percentiles');
    lines.push('# TYPE mcp_tool_latency_ms summary');
    lines.push(`mcp_tool_latency_ms{${label},quantile="0.5"} ${percentiles.p50}`);
    lines.push(`mcp_tool_latency_ms{${label},quantile="0.9"} ${percentiles.p90}`);
    lines.push(`mcp_tool_latency_ms{${label},quantile="0.95"} ${percentiles.p95}`);
    lines.push(`mcp_tool_latency_ms{${label},quantile="0.99"} ${percentiles.p99}`);

    lines.push('');
    lines.push('# HELP mcp_tools_total Number of registered tools');
    lines.push('# TYPE mcp_tools_total gauge');
    lines.push(`mcp_tools_total{${label}} ${toolCount}`);

    return lines.join('\n');
  }

  getSummary(): MetricsSummary {
    return {
      service: this.service,
      uptime: Date.now() - this.startTime,
      requestCount: this.requestCount,
      errorCount: this.errorCount,
      errorRate: this.getErrorRate(),
      tools: Object.fromEntries(this.toolMetrics),
      latency: this.getLatencyPercentiles(),
    };
  }

  reset(): void {
    this.toolCalls = [];
    this.toolMetrics.clear();
    this.requestCount = 0;
    this.errorCount = 0;
    this.startTime = Date.now();
  }
}

/**
 * Create metrics routes
 */
export function createMetricsRoutes(metricsCollector: MetricsCollector, toolCount: () => number): Router {
  const router = Router();

  // Prometheus format metrics
  router.get('/metrics', (_req: Request, res: Response) => {
    res.setHeader('Content-Type', 'text/plain; charset=utf-8');
    res.send(metricsCollector.generatePrometheusMetrics(toolCount()));
  });

  // JSON format metrics
  router.get('/metrics/json', (_req: Request, res: Response) => {
    res.json(metricsCollector.getSummary());
  });

  return router;
}
