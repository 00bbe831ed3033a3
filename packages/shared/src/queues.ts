/**
 * BullMQ Queue Definitions
 *
 * Queue names, job payloads, and queue/worker factory functions.
 */

import { Queue, Worker, Job, ConnectionOptions } from 'bullmq';
import { config } from './config';
import { logger } from './logger';
import type { CanonicalRecord, SalesRecord } from './types';

// ============================================================================
// Queue Names
// ============================================================================

export const QUEUE_NAMES = {
  EXTRACT_DOCUMENT: 'extract_document',
  PERSIST_RECORDS: 'persist_records',
} as const;

export type QueueName = (typeof QUEUE_NAMES)[keyof typeof QUEUE_NAMES];

// ============================================================================
// Job Payloads
// ============================================================================

/**
 * extract_document - Enqueued by the intake API after the upload is stored
 */
export interface ExtractDocumentJob {
  event_type: 'document.received';
  correlation_id: string;
  document_id: string;
  /** Path of the stored bytes under the object store */
  raw_uri: string;
  filename: string;
  received_at: string;
}

/**
 * persist_records - Enqueued after extraction, or directly for sales reports
 */
export type PersistRecordsJob =
  | {
      kind: 'invoice_records';
      correlation_id: string;
      document_id: string;
      session_id: string;
      filename: string;
      records: CanonicalRecord[];
    }
  | {
      kind: 'sales_records';
      correlation_id: string;
      document_id: string;
      filename: string;
      records: SalesRecord[];
    };

// ============================================================================
// Job IDs
// ============================================================================

/**
 * Deterministic job id for a stored document, so a repeated upload of the
 * same bytes is deduplicated by BullMQ. Custom ids may not contain ':'.
 */
export function jobIdFor(prefix: string, documentId: string): string {
  return `${prefix}_${documentId.replace(/:/g, '_')}`;
}

// ============================================================================
// Redis Connection
// ============================================================================

/**
 * Connection options from REDIS_URL (host, port, password, db index), else
 * from REDIS_HOST/REDIS_PORT.
 */
export function getRedisConnection(redisUrl: string = config.redisUrl): ConnectionOptions {
  if (redisUrl.startsWith('redis://') || redisUrl.startsWith('rediss://')) {
    try {
      const url = new URL(redisUrl);
      const db = parseInt(url.pathname.replace(/^\//, '') || '0', 10);
      return {
        host: url.hostname,
        port: parseInt(url.port || '6379', 10),
        ...(url.password ? { password: decodeURIComponent(url.password) } : {}),
        ...(Number.isNaN(db) ? {} : { db }),
        ...(url.protocol === 'rediss:' ? { tls: {} } : {}),
        maxRetriesPerRequest: null, // Required for BullMQ
      };
    } catch (error) {
      logger.warn('REDIS_URL is not a valid URL, using REDIS_HOST/REDIS_PORT', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  return {
    host: config.redisHost,
    port: config.redisPort,
    maxRetriesPerRequest: null,
  };
}

// ============================================================================
// Queue Factory
// ============================================================================

const defaultJobOptions = {
  attempts: config.maxJobAttempts,
  backoff: {
    type: 'exponential' as const,
    delay: config.backoffBaseMs,
  },
  removeOnComplete: 100,
  removeOnFail: 1000,
};

export function createQueue<TData, TResult>(queueName: QueueName): Queue<TData, TResult> {
  return new Queue<TData, TResult>(queueName, {
    connection: getRedisConnection(),
    defaultJobOptions,
  });
}

// ============================================================================
// Worker Factory
// ============================================================================

export interface WorkerOptions {
  concurrency?: number;
}

export function createWorker<TData, TResult>(
  queueName: QueueName,
  processor: (job: Job<TData, TResult>) => Promise<TResult>,
  options: WorkerOptions = {}
): Worker<TData, TResult> {
  const concurrency = options.concurrency ?? config.workerConcurrency;
  const worker = new Worker<TData, TResult>(queueName, processor, {
    connection: getRedisConnection(),
    concurrency,
  });

  worker.on('completed', (job, result) => {
    logger.info('Job completed', { queue: queueName, job_id: job.id, result: String(result) });
  });

  worker.on('failed', (job, err) => {
    logger.error('Job failed', err, {
      queue: queueName,
      job_id: job?.id,
      attempts: job?.attemptsMade,
      final: job ? job.attemptsMade >= (job.opts.attempts ?? 1) : undefined,
    });
  });

  worker.on('error', (err) => {
    logger.error('Worker error', err, { queue: queueName });
  });

  logger.info('Worker started', { queue: queueName, concurrency });
  return worker;
}

// ============================================================================
// Queue Depth & Backpressure
// ============================================================================

export interface QueueCounts {
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
}

export async function getQueueMetrics(queue: Queue): Promise<QueueCounts> {
  const counts = await queue.getJobCounts('waiting', 'active', 'completed', 'failed', 'delayed');
  return {
    waiting: counts.waiting ?? 0,
    active: counts.active ?? 0,
    completed: counts.completed ?? 0,
    failed: counts.failed ?? 0,
    delayed: counts.delayed ?? 0,
  };
}

export interface Backpressure {
  shouldWarn: boolean;
  shouldReject: boolean;
  /** waiting + active */
  depth: number;
}

export function backpressureFor(
  depth: number,
  warnAt: number = config.maxQueueDepthWarning,
  rejectAt: number = config.maxQueueDepthReject
): Backpressure {
  return { shouldWarn: depth >= warnAt, shouldReject: depth >= rejectAt, depth };
}

export async function checkBackpressure(queue: Queue): Promise<Backpressure> {
  const counts = await getQueueMetrics(queue);
  return backpressureFor(counts.waiting + counts.active);
}
