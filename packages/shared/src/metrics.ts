/**
 * Prometheus Metrics
 *
 * Metrics for monitoring template detection, queue depth, and system health.
 */

import http from 'node:http';
import * as promClient from 'prom-client';
import { logger } from './logger';
import { getQueueMetrics, type QueueCounts } from './queues';

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
// Detection Metrics
// ============================================================================

export const detectionsCounter = new promClient.Counter({
  name: 'layoutid_detections_total',
  help: 'Total number of template detections by outcome',
  labelNames: ['outcome'],
  registers: [register],
});

export const detectionDurationHistogram = new promClient.Histogram({
  name: 'layoutid_detection_duration_seconds',
  help: 'Wall-clock duration of a full template detection',
  labelNames: ['outcome'],
  buckets: [0.1, 0.25, 0.5, 1, 2, 5, 10, 30],
  registers: [register],
});

export const signalDurationHistogram = new promClient.Histogram({
  name: 'layoutid_signal_duration_seconds',
  help: 'Duration of each detection signal (text, visual, structure)',
  labelNames: ['signal'],
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2, 5],
  registers: [register],
});

export const detectionTimeoutsCounter = new promClient.Counter({
  name: 'layoutid_detection_timeouts_total',
  help: 'Detections abandoned after exceeding their time budget',
  registers: [register],
});

// ============================================================================
// Signature Store Metrics
// ============================================================================

export const templatesLoadedGauge = new promClient.Gauge({
  name: 'layoutid_templates_loaded',
  help: 'Number of template signatures in the most recently loaded database',
  registers: [register],
});

export const signatureFilesSkippedCounter = new promClient.Counter({
  name: 'layoutid_signature_files_skipped_total',
  help: 'Signature documents skipped because they could not be parsed or validated',
  registers: [register],
});

// ============================================================================
// Queue Metrics
// ============================================================================

export const queueDepthGauge = new promClient.Gauge({
  name: 'layoutid_queue_depth',
  help: 'Current queue depth (waiting + active jobs)',
  labelNames: ['queue'],
  registers: [register],
});

export const queueMetricsGauge = new promClient.Gauge({
  name: 'layoutid_queue_metrics',
  help: 'Queue metrics by state',
  labelNames: ['queue', 'state'],
  registers: [register],
});

export const jobDurationHistogram = new promClient.Histogram({
  name: 'layoutid_job_duration_seconds',
  help: 'Duration of job processing in seconds',
  labelNames: ['queue', 'status'],
  buckets: [0.1, 0.5, 1, 2, 5, 10, 30, 60],
  registers: [register],
});

export const jobsProcessedCounter = new promClient.Counter({
  name: 'layoutid_jobs_processed_total',
  help: 'Total number of jobs processed',
  labelNames: ['queue', 'status'],
  registers: [register],
});

export const backpressureRejectionsCounter = new promClient.Counter({
  name: 'layoutid_backpressure_rejections_total',
  help: 'Total number of requests rejected due to backpressure',
  registers: [register],
});

// ============================================================================
// HTTP Request Metrics
// ============================================================================

export const httpRequestDurationHistogram = new promClient.Histogram({
  name: 'layoutid_http_request_duration_seconds',
  help: 'Duration of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 10],
  registers: [register],
});

export const httpRequestsCounter = new promClient.Counter({
  name: 'layoutid_http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  registers: [register],
});

/**
 * Report queue depths and state metrics to Prometheus gauges.
 * Call before getMetrics() so scrapes include current queue state.
 */
export interface ReportedQueue {
  name: string;
  queue: QueueCounts;
}

export async function reportQueueMetrics(queues: ReportedQueue[]): Promise<void> {
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
 * Uses Node built-in http - no express required. Depths of the given queues
 * are refreshed on every scrape.
 */
export function serveMetrics(port: number, queues: ReportedQueue[] = []): http.Server {
  const server = http.createServer((req, res) => {
    if (req.url === '/metrics' && req.method === 'GET') {
      reportQueueMetrics(queues)
        .then(() => getMetrics())
        .then((body) => {
          res.setHeader('Content-Type', getMetricsContentType());
          res.end(body);
        })
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
