/**
 * Query API
 *
 * Date-range reads and deletes over stored invoice and sales records.
 */

import express, { Request, Response, NextFunction } from 'express';
import { ulid } from 'ulid';
import {
  config,
  createPgDatabase,
  logger,
  runWithContext,
  getCorrelationId,
  getMetrics,
  getMetricsContentType,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  type ErrorEnvelope,
} from '@ledgerline/shared';
import {
  deleteInvoiceRecords,
  deleteSalesRecords,
  loadInvoiceRecords,
  loadSalesRecords,
} from './lib/db';
import { parseDateRange } from './lib/range';

const app = express();
const port = config.queryApiPort;
const db = createPgDatabase();

function errorEnvelope(code: string, message: string): ErrorEnvelope {
  return { error: { code, message, correlation_id: getCorrelationId() } };
}

function optionalText(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
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

// Health check
app.get('/health', async (req: Request, res: Response) => {
  try {
    await db.query('SELECT 1');

    res.json({
      status: 'healthy',
      service: 'query-api',
      database: 'connected',
      timestamp: new Date().toISOString(),
    });
  } catch (error) {
    res.status(503).json({
      status: 'unhealthy',
      service: 'query-api',
      database: 'disconnected',
      error: error instanceof Error ? error.message : 'Unknown error',
      timestamp: new Date().toISOString(),
    });
  }
});

// Metrics endpoint
app.get('/metrics', async (req: Request, res: Response) => {
  res.setHeader('Content-Type', getMetricsContentType());
  res.send(await getMetrics());
});

/**
 * GET /invoices?start=&end=&vendor=
 */
app.get('/invoices', async (req: Request, res: Response) => {
  const parsed = parseDateRange(req.query);
  if (!parsed.ok) {
    res.status(400).json(errorEnvelope('invalid_request', parsed.message));
    return;
  }

  try {
    const records = await loadInvoiceRecords(db, parsed.range, optionalText(req.query.vendor));
    res.json({ ...parsed.range, count: records.length, records });
  } catch (error) {
    logger.error('Failed to load invoices', error, { ...parsed.range });
    res.status(500).json(errorEnvelope('internal_error', 'Failed to load invoice records'));
  }
});

/**
 * DELETE /invoices?start=&end=
 */
app.delete('/invoices', async (req: Request, res: Response) => {
  const parsed = parseDateRange(req.query);
  if (!parsed.ok) {
    res.status(400).json(errorEnvelope('invalid_request', parsed.message));
    return;
  }

  try {
    const deleted = await deleteInvoiceRecords(db, parsed.range);
    res.json({ ...parsed.range, deleted });
  } catch (error) {
    logger.error('Failed to delete invoices', error, { ...parsed.range });
    res.status(500).json(errorEnvelope('internal_error', 'Failed to delete invoice records'));
  }
});

/**
 * GET /sales?start=&end=&item=
 */
app.get('/sales', async (req: Request, res: Response) => {
  const parsed = parseDateRange(req.query);
  if (!parsed.ok) {
    res.status(400).json(errorEnvelope('invalid_request', parsed.message));
    return;
  }

  try {
    const records = await loadSalesRecords(db, parsed.range, optionalText(req.query.item));
    res.json({ ...parsed.range, count: records.length, records });
  } catch (error) {
    logger.error('Failed to load sales', error, { ...parsed.range });
    res.status(500).json(errorEnvelope('internal_error', 'Failed to load sales records'));
  }
});

/**
 * DELETE /sales?start=&end=
 */
app.delete('/sales', async (req: Request, res: Response) => {
  const parsed = parseDateRange(req.query);
  if (!parsed.ok) {
    res.status(400).json(errorEnvelope('invalid_request', parsed.message));
    return;
  }

  try {
    const deleted = await deleteSalesRecords(db, parsed.range);
    res.json({ ...parsed.range, deleted });
  } catch (error) {
    logger.error('Failed to delete sales', error, { ...parsed.range });
    res.status(500).json(errorEnvelope('internal_error', 'Failed to delete sales records'));
  }
});

// Start server
app.listen(port, () => {
  logger.info('Query API started', { port });
});

// Graceful shutdown
async function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  await db.close();
  process.exit(0);
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
