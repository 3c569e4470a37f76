/**
 * Adapter API
 *
 * POST /sync - Lists decisions on the portal and enqueues them for the pipeline worker
 */

import express, { Request, Response, NextFunction } from 'express';
import { ulid } from 'ulid';
import {
  logger,
  runWithContext,
  getMetrics,
  getMetricsContentType,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  backpressureRejectionsCounter,
  reportQueueMetrics,
  createQueue,
  checkBackpressure,
  toErrorInfo,
  PipelineError,
  QUEUE_NAMES,
  type DecisionAvailableJob,
  type ErrorEnvelope,
} from '@decision-corpus/shared';
import { PortalClient } from '@decision-corpus/pipeline';
import { parseSyncRequest, syncDecisions } from './lib/sync';

const app = express();
const port = parseInt(process.env.PORT || '8080', 10);

const decisionQueue = createQueue<DecisionAvailableJob, void>(QUEUE_NAMES.DECISION_AVAILABLE);
const portalClient = new PortalClient();

function correlationIdOf(res: Response): string {
  const header = res.getHeader('X-Correlation-Id');
  return typeof header === 'string' ? header : ulid();
}

function errorEnvelope(code: string, message: string, correlationId: string): ErrorEnvelope {
  return { error: { code, message, correlation_id: correlationId } };
}

/**
 * Map pipeline errors onto HTTP statuses; anything unknown is a 500.
 */
function statusFor(error: unknown): { status: number; code: string } {
  if (!(error instanceof PipelineError)) {
    return { status: 500, code: 'internal_error' };
  }
  switch (error.code) {
    case 'validation':
      return { status: 400, code: 'invalid_request' };
    case 'transient_fetch':
    case 'permanent_fetch':
      return { status: 502, code: 'bad_gateway' };
    case 'cancelled':
      return { status: 503, code: 'service_unavailable' };
    default:
      return { status: 500, code: 'internal_error' };
  }
}

// Middleware
app.use(express.json());

// Correlation ID middleware
app.use((req: Request, res: Response, next: NextFunction) => {
  const header = req.headers['x-correlation-id'];
  const correlationId = typeof header === 'string' && header !== '' ? header : ulid();
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
    const routePath: unknown = req.route?.path;
    const path = typeof routePath === 'string' ? routePath : req.path;

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
    const metrics = await checkBackpressure(decisionQueue);

    res.json({
      status: 'healthy',
      service: 'adapter-api',
      queue_depth: metrics.depth,
      timestamp: new Date().toISOString(),
    });
  } catch (error) {
    res.status(503).json({
      status: 'unhealthy',
      service: 'adapter-api',
      error: error instanceof Error ? error.message : 'Unknown error',
      timestamp: new Date().toISOString(),
    });
  }
});

// Metrics endpoint
app.get('/metrics', async (req: Request, res: Response) => {
  await reportQueueMetrics([{ name: QUEUE_NAMES.DECISION_AVAILABLE, queue: decisionQueue }]);
  res.setHeader('Content-Type', getMetricsContentType());
  res.send(await getMetrics());
});

/**
 * POST /sync
 * Lists one slice of the portal and enqueues decision.available jobs
 */
app.post('/sync', async (req: Request, res: Response) => {
  const correlationId = correlationIdOf(res);

  try {
    const syncRequest = parseSyncRequest(req.body);

    const backpressure = await checkBackpressure(decisionQueue);

    if (backpressure.shouldReject) {
      backpressureRejectionsCounter.inc();
      logger.warn('Request rejected due to backpressure', {
        queue_depth: backpressure.depth,
      });

      res
        .status(503)
        .json(errorEnvelope('service_unavailable', 'System is under heavy load. Please retry later.', correlationId));
      return;
    }

    if (backpressure.shouldWarn) {
      logger.warn('Queue depth approaching threshold', {
        queue_depth: backpressure.depth,
      });
    }

    logger.info('Starting sync', {
      from_date: syncRequest.from_date,
      to_date: syncRequest.to_date,
      max_decisions: syncRequest.max_decisions,
    });

    const result = await syncDecisions(syncRequest, correlationId, decisionQueue, portalClient);

    res.status(202).json(result);
  } catch (error) {
    const { status, code } = statusFor(error);
    if (status >= 500) {
      logger.error('Sync failed', error);
    } else {
      logger.warn('Sync request rejected', { error: toErrorInfo(error) });
    }
    const message = error instanceof Error ? error.message : 'Unknown error';
    res.status(status).json(errorEnvelope(code, message, correlationId));
  }
});

// Start server
const server = app.listen(port, () => {
  logger.info('Adapter API started', { port });
});

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down`);
  server.close();
  await decisionQueue.close();
  await portalClient.close();
  process.exit(0);
}

process.on('SIGTERM', () => {
  shutdown('SIGTERM').catch((error: unknown) => logger.error('Shutdown failed', error));
});
process.on('SIGINT', () => {
  shutdown('SIGINT').catch((error: unknown) => logger.error('Shutdown failed', error));
});
