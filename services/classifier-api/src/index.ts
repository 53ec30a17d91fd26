/**
 * Classifier API
 *
 * POST /classify       - Identify the template of a PDF synchronously
 * POST /classify/async - Enqueue a PDF for the classifier worker
 * GET  /templates      - Registered template ids
 * POST /templates/reload - Reload signatures from disk
 */

import express, { Request, Response, NextFunction } from 'express';
import { ulid } from 'ulid';
import {
  logger,
  config,
  runWithContext,
  getCorrelationId,
  getMetrics,
  getMetricsContentType,
  reportQueueMetrics,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  backpressureRejectionsCounter,
  createQueue,
  checkBackpressure,
  validateClassifyRequest,
  ClassifierConfigurationError,
  SignatureDirectoryError,
  QUEUE_NAMES,
  type ClassifyAcceptedResponse,
  type ClassifyDocumentJob,
  type TemplateListResponse,
} from '@layoutid/shared';
import { ClassifierService } from './lib/classifier-service';
import { sendError } from './lib/http';

const app = express();
const port = parseInt(process.env.PORT || '8080', 10);

const classifier = new ClassifierService({ signaturesDir: config.signaturesDir });

const classifyQueue = createQueue<ClassifyDocumentJob, void>(QUEUE_NAMES.CLASSIFY_DOCUMENT);

// Middleware
app.use(express.json());

// Correlation ID middleware
app.use((req: Request, res: Response, next: NextFunction) => {
  const correlationId = req.get('x-correlation-id') || ulid();
  res.setHeader('X-Correlation-Id', correlationId);

  runWithContext({ correlationId }, () => {
    next();
  });
});

// Request timing middleware
app.use((req: Request, res: Response, next: NextFunction) => {
  const start = Date.now();

  res.on('finish', () => {
    const duration = (Date.now() - start) / 1000;
    const path: string = req.route?.path || req.path;

    httpRequestDurationHistogram.observe(
      { method: req.method, path, status: res.statusCode.toString() },
      duration
    );
    httpRequestsCounter.inc({
      method: req.method,
      path,
      status: res.statusCode.toString(),
    });

    logger.info('Request completed', {
      method: req.method,
      path: req.path,
      status: res.statusCode,
      duration_ms: Math.round(duration * 1000),
    });
  });

  next();
});

function sendClassifierError(res: Response, error: unknown): void {
  if (error instanceof SignatureDirectoryError || error instanceof ClassifierConfigurationError) {
    logger.error('Classifier is not configured', error);
    sendError(res, 503, 'classifier_unavailable', error.message);
    return;
  }

  logger.error('Classification request failed', error);
  sendError(res, 500, 'internal_error', error instanceof Error ? error.message : 'Unknown error');
}

// Health check
app.get('/health', async (req: Request, res: Response) => {
  try {
    const context = await classifier.getContext();
    const backpressure = await checkBackpressure(classifyQueue);

    res.json({
      status: 'healthy',
      service: 'classifier-api',
      templates: context.database.size,
      queue_depth: backpressure.depth,
      timestamp: new Date().toISOString(),
    });
  } catch (error) {
    res.status(503).json({
      status: 'unhealthy',
      service: 'classifier-api',
      error: error instanceof Error ? error.message : 'Unknown error',
      timestamp: new Date().toISOString(),
    });
  }
});

// Metrics endpoint
app.get('/metrics', async (req: Request, res: Response) => {
  try {
    await reportQueueMetrics([{ name: QUEUE_NAMES.CLASSIFY_DOCUMENT, queue: classifyQueue }]);
    const body = await getMetrics();
    res.setHeader('Content-Type', getMetricsContentType());
    res.send(body);
  } catch (error) {
    logger.error('Metrics scrape failed', error);
    res.status(500).end();
  }
});

/**
 * GET /templates
 * Lists the template ids in the loaded database
 */
app.get('/templates', async (req: Request, res: Response) => {
  try {
    const items = await classifier.templateIds();
    const response: TemplateListResponse = { items, count: items.length };
    res.json(response);
  } catch (error) {
    sendClassifierError(res, error);
  }
});

/**
 * POST /templates/reload
 * Rebuilds the template database from SIGNATURES_DIR
 */
app.post('/templates/reload', async (req: Request, res: Response) => {
  try {
    const report = await classifier.reload();
    res.json({
      count: report.database.size,
      skipped: report.skipped,
    });
  } catch (error) {
    sendClassifierError(res, error);
  }
});

/**
 * POST /classify
 * Runs detection inline and returns the DetectionResult
 */
app.post('/classify', async (req: Request, res: Response) => {
  const validation = validateClassifyRequest(req.body);
  if (!validation.valid) {
    sendError(res, 400, 'invalid_request', validation.errors.join('; '));
    return;
  }

  try {
    const result = await classifier.classify(validation.value);
    res.json(result);
  } catch (error) {
    sendClassifierError(res, error);
  }
});

/**
 * POST /classify/async
 * Enqueues a classify_document job for the worker
 */
app.post('/classify/async', async (req: Request, res: Response) => {
  const validation = validateClassifyRequest(req.body);
  if (!validation.valid) {
    sendError(res, 400, 'invalid_request', validation.errors.join('; '));
    return;
  }

  try {
    const backpressure = await checkBackpressure(classifyQueue);

    if (backpressure.shouldReject) {
      backpressureRejectionsCounter.inc();
      logger.warn('Request rejected due to backpressure', {
        queue_depth: backpressure.depth,
      });
      sendError(res, 503, 'service_unavailable', 'System is under heavy load. Please retry later.');
      return;
    }

    if (backpressure.shouldWarn) {
      logger.warn('Queue depth approaching threshold', {
        queue_depth: backpressure.depth,
      });
    }

    const correlationId = getCorrelationId();
    const payload: ClassifyDocumentJob = {
      event_type: 'document.submitted',
      correlation_id: correlationId,
      request: validation.value,
      submitted_at: new Date().toISOString(),
    };

    const job = await classifyQueue.add(QUEUE_NAMES.CLASSIFY_DOCUMENT, payload, {
      jobId: `classify_${correlationId}`,
    });

    logger.info('Enqueued classify_document', { pdf_path: payload.request.pdf_path, jobId: job.id });

    const response: ClassifyAcceptedResponse = {
      correlation_id: correlationId,
      job_id: job.id ?? `classify_${correlationId}`,
    };
    res.status(202).json(response);
  } catch (error) {
    logger.error('Enqueue failed', error);
    sendError(res, 500, 'internal_error', error instanceof Error ? error.message : 'Unknown error');
  }
});

// Start server
app.listen(port, () => {
  logger.info('Classifier API started', { port });
});

// Graceful shutdown
async function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  await classifyQueue.close();
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
