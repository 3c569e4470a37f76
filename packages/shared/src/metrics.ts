/**
 * Prometheus Metrics
 *
 * Metrics for monitoring queue depth, stage processing, and system health.
 */

import http from 'node:http';
import type { Queue } from 'bullmq';
import * as promClient from 'prom-client';
import { logger } from './logger';
import { getQueueMetrics } from './queues';

// Create a Registry for metrics
export const register = new promClient.Registry();

// Default metrics (CPU, memory, etc.) - wrap to avoid crashes on Alpine/restricted environments
try {
  promClient.collectDefaultMetrics({ register });
} catch (err) {
  logger.warn('Default Prometheus metrics collection skipped', {
    error: err instanceof Error ? err.message : String(err),
  });
}

// ============================================================================
// Queue Metrics
// ============================================================================

export const queueDepthGauge = new promClient.Gauge({
  name: 'decision_corpus_queue_depth',
  help: 'Current queue depth (waiting + active jobs)',
  labelNames: ['queue'],
  registers: [register],
});

export const queueMetricsGauge = new promClient.Gauge({
  name: 'decision_corpus_queue_metrics',
  help: 'Queue metrics by state',
  labelNames: ['queue', 'state'],
  registers: [register],
});

// ============================================================================
// Pipeline Metrics
// ============================================================================

export const identifiersProcessedCounter = new promClient.Counter({
  name: 'decision_corpus_identifiers_processed_total',
  help: 'Identifiers driven through process(), by outcome',
  labelNames: ['outcome'],
  registers: [register],
});

export const stageDurationHistogram = new promClient.Histogram({
  name: 'decision_corpus_stage_duration_seconds',
  help: 'Duration of a single pipeline stage',
  labelNames: ['stage', 'status'],
  buckets: [0.05, 0.1, 0.5, 1, 2, 5, 10, 30, 60, 120],
  registers: [register],
});

export const fetchAttemptsCounter = new promClient.Counter({
  name: 'decision_corpus_fetch_attempts_total',
  help: 'Portal requests issued, by outcome',
  labelNames: ['endpoint', 'outcome'],
  registers: [register],
});

export const extractionMethodCounter = new promClient.Counter({
  name: 'decision_corpus_extractions_total',
  help: 'Extracted texts produced, by method and quality class',
  labelNames: ['method', 'quality'],
  registers: [register],
});

export const ocrRequestDurationHistogram = new promClient.Histogram({
  name: 'decision_corpus_ocr_request_duration_seconds',
  help: 'Duration of OCR requests',
  labelNames: ['model', 'status'],
  buckets: [1, 2, 5, 10, 20, 30, 60, 120],
  registers: [register],
});

export const recordCompletenessCounter = new promClient.Counter({
  name: 'decision_corpus_records_total',
  help: 'Structured records written, by completeness',
  labelNames: ['completeness'],
  registers: [register],
});

export const contentStoreWritesCounter = new promClient.Counter({
  name: 'decision_corpus_content_store_writes_total',
  help: 'Content store puts, by result (created | duplicate)',
  labelNames: ['result'],
  registers: [register],
});

// ============================================================================
// Backpressure Metrics
// ============================================================================

export const backpressureRejectionsCounter = new promClient.Counter({
  name: 'decision_corpus_backpressure_rejections_total',
  help: 'Total number of requests rejected due to backpressure',
  registers: [register],
});

// ============================================================================
// HTTP Request Metrics
// ============================================================================

export const httpRequestDurationHistogram = new promClient.Histogram({
  name: 'decision_corpus_http_request_duration_seconds',
  help: 'Duration of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5],
  registers: [register],
});

export const httpRequestsCounter = new promClient.Counter({
  name: 'decision_corpus_http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  registers: [register],
});

// ============================================================================
// Database Metrics
// ============================================================================

export const dbQueryDurationHistogram = new promClient.Histogram({
  name: 'decision_corpus_db_query_duration_seconds',
  help: 'Duration of database queries',
  labelNames: ['operation'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2],
  registers: [register],
});

/**
 * Report queue depths and state metrics to Prometheus gauges.
 * Call before getMetrics() so scrapes include current queue state.
 */
export async function reportQueueMetrics(
  queues: Array<{ name: string; queue: Queue }>
): Promise<void> {
  for (const { name, queue } of queues) {
    try {
      const m = await getQueueMetrics(queue);
      const depth = m.waiting + m.active;
      queueDepthGauge.set({ queue: name }, depth);
      queueMetricsGauge.set({ queue: name, state: 'waiting' }, m.waiting);
      queueMetricsGauge.set({ queue: name, state: 'active' }, m.active);
      queueMetricsGauge.set({ queue: name, state: 'completed' }, m.completed);
      queueMetricsGauge.set({ queue: name, state: 'failed' }, m.failed);
      queueMetricsGauge.set({ queue: name, state: 'delayed' }, m.delayed);
    } catch (err) {
      logger.warn('Queue metrics unavailable', {
        queue: name,
        error: err instanceof Error ? err.message : String(err),
      });
      queueDepthGauge.set({ queue: name }, -1);
    }
  }
}

/**
 * Get Prometheus metrics endpoint handler
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

/**
 * Get content type for Prometheus metrics
 */
export function getMetricsContentType(): string {
  return register.contentType;
}

/**
 * Start a minimal HTTP server for /metrics (for worker processes).
 * Uses Node built-in http - no express required.
 */
export function serveMetrics(port: number): http.Server {
  const server = http.createServer((req, res) => {
    if (req.url === '/metrics' && req.method === 'GET') {
      res.setHeader('Content-Type', getMetricsContentType());
      getMetrics()
        .then((body) => res.end(body))
        .catch((err: unknown) => {
          logger.error('Metrics scrape failed', err);
          res.statusCode = 500;
          res.end();
        });
    } else {
      res.statusCode = 404;
      res.end();
    }
  });
  server.listen(port, () => {
    logger.info('Metrics server listening', { port });
  });
  return server;
}
