/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  runWithContextAsync,
  runForDocument,
  type RequestContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export { config, type Config } from './config';

// Errors
export { ClassifierConfigurationError, SignatureDirectoryError } from './errors';

// Types
export * from './types';

// Queues
export {
  QUEUE_NAMES,
  type QueueName,
  type ClassifyDocumentJob,
  type TemplateDetectedJob,
  getRedisConnection,
  createQueue,
  createWorker,
  getQueueMetrics,
  checkBackpressure,
  type QueueCounts,
  type WorkerOptions,
} from './queues';

// Metrics
export {
  register,
  detectionsCounter,
  detectionDurationHistogram,
  signalDurationHistogram,
  detectionTimeoutsCounter,
  templatesLoadedGauge,
  signatureFilesSkippedCounter,
  queueDepthGauge,
  queueMetricsGauge,
  jobDurationHistogram,
  jobsProcessedCounter,
  backpressureRejectionsCounter,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  reportQueueMetrics,
  type ReportedQueue,
  getMetrics,
  getMetricsContentType,
  serveMetrics,
} from './metrics';

// Schemas
export { validateSignatureDocument, validateClassifyRequest, type ValidationResult } from './schemas';

// PDF access
export type { PdfDescription, PdfPageSize, PdfSource } from './pdf/types';
export { PdfjsSource } from './pdf/pdfjs-source';

// Imaging
export {
  INK_THRESHOLD,
  createGrayImage,
  cropImage,
  grayHistogram,
  inkDensity,
  type GrayImage,
} from './imaging/raster';
export { decodeToGray, equalizeAndBlur, resizeGray } from './imaging/sharp-ops';
export { cannyEdges } from './imaging/edges';
export { countNonZero, dilate, erode, openImage } from './imaging/morphology';

// Classifier
export * from './classifier';
