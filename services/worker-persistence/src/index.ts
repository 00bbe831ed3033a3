/**
 * Persistence Worker
 *
 * Consumes persist_records queue and upserts to Postgres.
 */

import { Job } from 'bullmq';
import {
  logger,
  runWithContextAsync,
  createWorker,
  createPgDatabase,
  serveMetrics,
  QUEUE_NAMES,
  type PersistRecordsJob,
  jobsProcessedCounter,
  jobDurationHistogram,
} from '@ledgerline/shared';
import { saveInvoiceRecords, saveSalesRecords } from './lib/db';

const db = createPgDatabase();

function persist(payload: PersistRecordsJob): Promise<number> {
  switch (payload.kind) {
    case 'invoice_records':
      return saveInvoiceRecords(db, payload.records, {
        documentId: payload.document_id,
        sessionId: payload.session_id,
        filename: payload.filename,
        correlationId: payload.correlation_id,
      });
    case 'sales_records':
      return saveSalesRecords(db, payload.records, {
        documentId: payload.document_id,
        filename: payload.filename,
        correlationId: payload.correlation_id,
      });
  }
}

/**
 * Process persist_records job
 */
async function processPersistRecords(job: Job<PersistRecordsJob, number>): Promise<number> {
  const payload = job.data;

  return runWithContextAsync(
    { correlationId: payload.correlation_id, documentId: payload.document_id },
    async () => {
      const startTime = Date.now();

      logger.info('Processing persist_records', {
        jobId: job.id,
        kind: payload.kind,
        filename: payload.filename,
        record_count: payload.records.length,
        attempt: job.attemptsMade + 1,
      });

      try {
        const saved = await persist(payload);

        const duration = (Date.now() - startTime) / 1000;
        jobsProcessedCounter.inc({ queue: QUEUE_NAMES.PERSIST_RECORDS, status: 'success' });
        jobDurationHistogram.observe(
          { queue: QUEUE_NAMES.PERSIST_RECORDS, status: 'success' },
          duration
        );

        logger.info('Persist complete', {
          document_id: payload.document_id,
          saved,
          duration_seconds: duration,
        });
        return saved;
      } catch (error) {
        jobsProcessedCounter.inc({ queue: QUEUE_NAMES.PERSIST_RECORDS, status: 'failed' });
        throw error;
      }
    }
  );
}

// Expose /metrics for Prometheus
serveMetrics(9092);

// Create and start the worker
const worker = createWorker<PersistRecordsJob, number>(
  QUEUE_NAMES.PERSIST_RECORDS,
  processPersistRecords
);

logger.info('Persistence worker started');

// Graceful shutdown
async function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  await worker.close();
  await db.close();
  process.exit(0);
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
