/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables.
 */

export interface Config {
  // Signatures
  signaturesDir: string;

  // Detection
  confidenceThreshold: number;
  visualWeight: number;
  structureWeight: number;
  ambiguityMargin: number;
  renderDpi: number;
  detectionTimeoutMs: number;

  // Redis
  redisHost: string;
  redisPort: number;
  redisUrl: string;

  // Queue & Worker
  workerConcurrency: number;
  maxJobAttempts: number;
  backoffBaseMs: number;

  // Backpressure Controls
  maxQueueDepthWarning: number;
  maxQueueDepthReject: number;
}

export const config: Config = {
  // Signatures
  signaturesDir: process.env.SIGNATURES_DIR || '',

  // Detection
  confidenceThreshold: parseFloat(process.env.CONFIDENCE_THRESHOLD || '0.5'),
  visualWeight: parseFloat(process.env.VISUAL_WEIGHT || '0.6'),
  structureWeight: parseFloat(process.env.STRUCTURE_WEIGHT || '0.4'),
  ambiguityMargin: parseFloat(process.env.AMBIGUITY_MARGIN || '0.15'),
  renderDpi: parseInt(process.env.RENDER_DPI || '300', 10),
  detectionTimeoutMs: parseInt(process.env.DETECTION_TIMEOUT_MS || '0', 10),

  // Redis
  redisHost: process.env.REDIS_HOST || 'redis',
  redisPort: parseInt(process.env.REDIS_PORT || '6379', 10),
  redisUrl: process.env.REDIS_URL || 'redis://redis:6379',

  // Queue & Worker (classification is CPU bound, one job at a time by default)
  workerConcurrency: parseInt(process.env.WORKER_CONCURRENCY || '1', 10),
  maxJobAttempts: parseInt(process.env.BULLMQ_DEFAULT_ATTEMPTS || '3', 10),
  backoffBaseMs: parseInt(process.env.BACKOFF_BASE_MS || '2000', 10),

  // Backpressure Controls
  maxQueueDepthWarning: parseInt(process.env.MAX_QUEUE_DEPTH_WARNING || '500', 10),
  maxQueueDepthReject: parseInt(process.env.MAX_QUEUE_DEPTH_REJECT || '1000', 10),
};
