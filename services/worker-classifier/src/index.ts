/**
 * Classifier Worker
 *
 * Consumes classify_document jobs, identifies the template of each PDF and
 * enqueues template_detected for downstream field extractors.
 */

import { Job } from 'bullmq';
import {
  logger,
  config,
  runWithContextAsync,
  createWorker,
  createQueue,
  createDetectionContext,
  serveMetrics,
  QUEUE_NAMES,
  type ClassifyDocumentJob,
  type DetectionContext,
  type TemplateDetectedJob,
  jobsProcessedCounter,
  jobDurationHistogram,
} from '@layoutid/shared';
import { classifyDocument, detectedJobId } from './lib/classify-job';

const metricsPort = parseInt(process.env.METRICS_PORT || '9101', 10);

const templateDetectedQueue = createQueue<TemplateDetectedJob, void>(QUEUE_NAMES.TEMPLATE_DETECTED);

let contextTask: Promise<DetectionContext> | null = null;

function getDetectionContext(): Promise<DetectionContext> {
  if (!contextTask) {
    contextTask = createDetectionContext({ signaturesDir: config.signaturesDir }).catch((err: unknown) => {
      contextTask = null;
      throw err;
    });
  }
  return contextTask;
}

/**
 * Process classify_document job
 */
async function processClassifyDocument(job: Job<ClassifyDocumentJob, void>): Promise<void> {
  const { correlation_id, request } = job.data;

  return runWithContextAsync(
    { correlationId: correlation_id, documentPath: request.pdf_path, jobId: job.id },
    async () => {
      const startTime = Date.now();

      logger.info('Processing classify_document', {
        jobId: job.id,
        pdf_path: request.pdf_path,
        attempt: job.attemptsMade + 1,
      });

      try {
        const context = await getDetectionContext();
        const detected = await classifyDocument(job.data, context);

        await templateDetectedQueue.add(QUEUE_NAMES.TEMPLATE_DETECTED, detected, {
          jobId: detectedJobId(job.data),
        });

        logger.info('Enqueued template_detected', {
          pdf_path: request.pdf_path,
          template_id: detected.result.template_id,
        });

        const duration = (Date.now() - startTime) / 1000;
        jobsProcessedCounter.inc({ queue: QUEUE_NAMES.CLASSIFY_DOCUMENT, status: 'success' });
        jobDurationHistogram.observe({ queue: QUEUE_NAMES.CLASSIFY_DOCUMENT, status: 'success' }, duration);
      } catch (error) {
        jobsProcessedCounter.inc({ queue: QUEUE_NAMES.CLASSIFY_DOCUMENT, status: 'failed' });
        throw error;
      }
    }
  );
}

// Create and start the worker
const worker = createWorker<ClassifyDocumentJob, void>(
  QUEUE_NAMES.CLASSIFY_DOCUMENT,
  processClassifyDocument
);
const metricsServer = serveMetrics(metricsPort, [
  { name: QUEUE_NAMES.TEMPLATE_DETECTED, queue: templateDetectedQueue },
]);

logger.info('Classifier worker started');

// Graceful shutdown
async function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  await worker.close();
  await templateDetectedQueue.close();
  metricsServer.close();
  process.exit(0);
}

function onSignal(signal: string) {
  shutdown(signal).catch((err: unknown) => {
    logger.error('Shutdown failed', err);
    process.exit(1);
  });
}

process.on('SIGTERM', () => onSignal('SIGTERM'));
process.on('SIGINT', () => onSignal('SIGINT'));
