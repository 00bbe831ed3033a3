/**
 * Intake API
 *
 * POST /documents          - Store an upload and queue it for extraction
 * POST /documents/extract  - Run an extraction session synchronously
 * POST /sales              - Parse a POS sales export and queue it for storage
 */

import express, { Request, Response, NextFunction } from 'express';
import type { Queue } from 'bullmq';
import { ulid } from 'ulid';
import {
  config,
  logger,
  runWithContext,
  getCorrelationId,
  getMetrics,
  getMetricsContentType,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  backpressureRejectionsCounter,
  createQueue,
  checkBackpressure,
  jobIdFor,
  reportQueueMetrics,
  extractSalesReport,
  runExtraction,
  storeDocument,
  QUEUE_NAMES,
  type ExtractDocumentJob,
  type PersistRecordsJob,
  type ErrorEnvelope,
} from '@ledgerline/shared';
import { errorStatus, uploadBytes, uploadFilename } from './lib/request';

const app = express();
const port = config.intakeApiPort;

const extractDocumentQueue = createQueue<ExtractDocumentJob, number>(QUEUE_NAMES.EXTRACT_DOCUMENT);
const persistRecordsQueue = createQueue<PersistRecordsJob, number>(QUEUE_NAMES.PERSIST_RECORDS);

function errorEnvelope(code: string, message: string): ErrorEnvelope {
  return { error: { code, message, correlation_id: getCorrelationId() } };
}

// Correlation ID middleware
app.use((req: Request, res: Response, next: NextFunction) => {
  const header = req.headers['x-correlation-id'];
  const correlationId = typeof header === 'string' && header ? header : ulid();
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
    const path = req.route?.path || req.path;

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

// Uploads arrive as the raw request body
const rawUpload = express.raw({ type: () => true, limit: config.maxUploadBytes });

/**
 * Validate ?filename= and the body; answers 400 and returns null when either
 * is missing.
 */
function readUpload(req: Request, res: Response): { filename: string; bytes: Buffer } | null {
  const filename = uploadFilename(req.query);
  if (!filename) {
    res.status(400).json(errorEnvelope('invalid_request', 'filename query parameter is required'));
    return null;
  }
  const bytes = uploadBytes(req.body);
  if (!bytes) {
    res.status(400).json(errorEnvelope('invalid_request', 'request body is empty'));
    return null;
  }
  return { filename, bytes };
}

/**
 * Reject with 503 when the queue is too deep. True when the request may proceed.
 */
async function admit(queueName: string, queue: Queue, res: Response): Promise<boolean> {
  const backpressure = await checkBackpressure(queue);

  if (backpressure.shouldReject) {
    backpressureRejectionsCounter.inc();
    logger.warn('Request rejected due to backpressure', {
      queue: queueName,
      queue_depth: backpressure.depth,
    });
    res
      .status(503)
      .json(errorEnvelope('service_unavailable', 'System is under heavy load. Please retry later.'));
    return false;
  }

  if (backpressure.shouldWarn) {
    logger.warn('Queue depth approaching threshold', {
      queue: queueName,
      queue_depth: backpressure.depth,
    });
  }
  return true;
}

// Health check
app.get('/health', async (req: Request, res: Response) => {
  try {
    // Check Redis connection via queue
    const metrics = await checkBackpressure(extractDocumentQueue);

    res.json({
      status: 'healthy',
      service: 'intake-api',
      queue_depth: metrics.depth,
      timestamp: new Date().toISOString(),
    });
  } catch (error) {
    res.status(503).json({
      status: 'unhealthy',
      service: 'intake-api',
      error: error instanceof Error ? error.message : 'Unknown error',
      timestamp: new Date().toISOString(),
    });
  }
});

// Metrics endpoint
app.get('/metrics', async (req: Request, res: Response) => {
  await reportQueueMetrics([
    { name: QUEUE_NAMES.EXTRACT_DOCUMENT, queue: extractDocumentQueue },
    { name: QUEUE_NAMES.PERSIST_RECORDS, queue: persistRecordsQueue },
  ]);
  res.setHeader('Content-Type', getMetricsContentType());
  res.send(await getMetrics());
});

/**
 * POST /documents?filename=
 * Stores the upload and enqueues extract_document
 */
app.post('/documents', rawUpload, async (req: Request, res: Response) => {
  const upload = readUpload(req, res);
  if (!upload) return;

  try {
    const admitted = await admit(QUEUE_NAMES.EXTRACT_DOCUMENT, extractDocumentQueue, res);
    if (!admitted) return;

    const stored = await storeDocument(upload.bytes, upload.filename);
    const correlationId = getCorrelationId();

    const payload: ExtractDocumentJob = {
      event_type: 'document.received',
      correlation_id: correlationId,
      document_id: stored.documentId,
      raw_uri: stored.rawUri,
      filename: upload.filename,
      received_at: new Date().toISOString(),
    };
    await extractDocumentQueue.add('extract_document', payload, {
      jobId: jobIdFor('extract', stored.documentId),
    });

    logger.info('Enqueued extract_document job', {
      document_id: stored.documentId,
      filename: upload.filename,
    });

    res.status(202).json({ document_id: stored.documentId, correlation_id: correlationId });
  } catch (error) {
    logger.error('Document intake failed', error);
    res.status(500).json(errorEnvelope('internal_error', 'Failed to accept document'));
  }
});

/**
 * POST /documents/extract?filename=
 * Runs one extraction session and returns its records, attempts and trace
 */
app.post('/documents/extract', rawUpload, async (req: Request, res: Response) => {
  const upload = readUpload(req, res);
  if (!upload) return;

  const outcome = await runExtraction(upload);
  res.json({
    session_id: outcome.sessionId,
    filename: outcome.filename,
    vendor: outcome.vendor,
    is_scanned: outcome.isScanned,
    records: outcome.records,
    attempts: outcome.attempts,
    trace: outcome.trace,
  });
});

/**
 * POST /sales?filename=
 * Parses a POS sales export and enqueues persist_records
 */
app.post('/sales', rawUpload, async (req: Request, res: Response) => {
  const upload = readUpload(req, res);
  if (!upload) return;

  try {
    const records = extractSalesReport(upload.bytes, upload.filename);
    if (records.length === 0) {
      res.status(422).json(errorEnvelope('no_sales_rows', 'No sales rows found in the upload'));
      return;
    }

    const admitted = await admit(QUEUE_NAMES.PERSIST_RECORDS, persistRecordsQueue, res);
    if (!admitted) return;

    const stored = await storeDocument(upload.bytes, upload.filename);
    const correlationId = getCorrelationId();

    const payload: PersistRecordsJob = {
      kind: 'sales_records',
      correlation_id: correlationId,
      document_id: stored.documentId,
      filename: upload.filename,
      records,
    };
    await persistRecordsQueue.add('persist_records', payload, {
      jobId: jobIdFor('sales', stored.documentId),
    });

    res.status(202).json({
      document_id: stored.documentId,
      correlation_id: correlationId,
      row_count: records.length,
      month: records[0]?.month ?? null,
    });
  } catch (error) {
    logger.error('Sales intake failed', error);
    res.status(500).json(errorEnvelope('internal_error', 'Failed to accept sales report'));
  }
});

// Body-parser errors (oversized upload) use the error envelope
app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
  if (res.headersSent) {
    next(error);
    return;
  }
  const status = errorStatus(error);
  const code = status === 413 ? 'payload_too_large' : status < 500 ? 'invalid_request' : 'internal_error';
  logger.warn('Request failed before handler', { status, path: req.path });
  res
    .status(status)
    .json(errorEnvelope(code, error instanceof Error ? error.message : 'Request failed'));
});

// Start server
app.listen(port, () => {
  logger.info('Intake API started', { port });
});

// Graceful shutdown
async function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  await extractDocumentQueue.close();
  await persistRecordsQueue.close();
  process.exit(0);
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
