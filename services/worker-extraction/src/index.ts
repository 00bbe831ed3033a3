/**
 * Extraction Worker
 *
 * Consumes extract_document, runs one extraction session per stored upload
 * and enqueues persist_records when the session produced records.
 */

import { Job } from 'bullmq';
import {
  logger,
  runWithContextAsync,
  createWorker,
  createQueue,
  jobIdFor,
  readStoredDocument,
  runExtraction,
  serveMetrics,
  QUEUE_NAMES,
  type ExtractDocumentJob,
  type PersistRecordsJob,
  jobsProcessedCounter,
  jobDurationHistogram,
} from '@ledgerline/shared';

const persistRecordsQueue = createQueue<PersistRecordsJob, number>(QUEUE_NAMES.PERSIST_RECORDS);

/**
 * Process extract_document job. Only infrastructure errors (reading the
 * upload, enqueuing) throw and are retried; the session itself never throws.
 */
async function processExtractDocument(job: Job<ExtractDocumentJob, number>): Promise<number> {
  const { correlation_id, document_id, raw_uri, filename } = job.data;

  return runWithContextAsync({ correlationId: correlation_id, documentId: document_id }, async () => {
    const startTime = Date.now();

    logger.info('Processing extract_document', {
      jobId: job.id,
      document_id,
      filename,
      attempt: job.attemptsMade + 1,
    });

    try {
      const bytes = await readStoredDocument(raw_uri);
      const outcome = await runExtraction({ filename, bytes }, {}, { documentId: document_id });

      logger.info('Extraction session finished', {
        session_id: outcome.sessionId,
        vendor: outcome.vendor,
        is_scanned: outcome.isScanned,
        record_count: outcome.records.length,
        trace: outcome.trace,
      });

      if (outcome.records.length > 0) {
        const payload: PersistRecordsJob = {
          kind: 'invoice_records',
          correlation_id,
          document_id,
          session_id: outcome.sessionId,
          filename,
          records: outcome.records,
        };
        await persistRecordsQueue.add('persist_records', payload, {
          jobId: jobIdFor('persist', document_id),
        });
        logger.info('Enqueued persist_records job', { document_id });
      }

      const duration = (Date.now() - startTime) / 1000;
      jobsProcessedCounter.inc({ queue: QUEUE_NAMES.EXTRACT_DOCUMENT, status: 'success' });
      jobDurationHistogram.observe(
        { queue: QUEUE_NAMES.EXTRACT_DOCUMENT, status: 'success' },
        duration
      );
      return outcome.records.length;
    } catch (error) {
      jobsProcessedCounter.inc({ queue: QUEUE_NAMES.EXTRACT_DOCUMENT, status: 'failed' });
      throw error;
    }
  });
}

// Expose /metrics for Prometheus
serveMetrics(9091);

// Create and start the worker
const worker = createWorker<ExtractDocumentJob, number>(
  QUEUE_NAMES.EXTRACT_DOCUMENT,
  processExtractDocument
);

logger.info('Extraction worker started');

// Graceful shutdown
async function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  await worker.close();
  await persistRecordsQueue.close();
  process.exit(0);
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
