/**
 * Monitoring & Observability Module
 *
 * Prometheus metrics, latency tracking and error rates for the server.
 */

export { MetricsCollector, createMetricsRoutes } from './metrics.js';
export type { LatencyPercentiles, MetricsSummary, ToolMetrics } from './metrics.js';
