/**
 * Pipeline Worker
 *
 * Consumes the decision_available queue and runs each ADA through the
 * coordinator (fetch, extract, normalize).
 */

import { Job } from 'bullmq';
import {
  config,
  logger,
  createWorker,
  serveMetrics,
  QUEUE_NAMES,
  type DecisionAvailableJob,
  type ProcessResult,
} from '@decision-corpus/shared';
import { createPipeline } from '@decision-corpus/pipeline';
import { processDecisionJob } from './lib/process-job';

const metricsPort = parseInt(process.env.METRICS_PORT || '9091', 10);
const shutdownController = new AbortController();

const pipeline = createPipeline({ workerId: process.env.WORKER_ID });

async function main(): Promise<void> {
  await pipeline.assertAvailable();

  const metricsServer = serveMetrics(metricsPort);

  const worker = createWorker<DecisionAvailableJob, ProcessResult>(
    QUEUE_NAMES.DECISION_AVAILABLE,
    (job: Job<DecisionAvailableJob, ProcessResult>) =>
      processDecisionJob(pipeline.coordinator, job.data, { signal: shutdownController.signal }),
    { concurrency: config.workerConcurrency }
  );

  logger.info('Pipeline worker started', { data_dir: pipeline.dataDir });

  // Graceful shutdown: abort running stages (they roll back), then drain
  async function shutdown(signal: string): Promise<void> {
    logger.info(`${signal} received, shutting down`);
    shutdownController.abort();
    await worker.close();
    metricsServer.close();
    await pipeline.close();
    process.exit(0);
  }

  process.on('SIGTERM', () => {
    shutdown('SIGTERM').catch((error: unknown) => logger.error('Shutdown failed', error));
  });
  process.on('SIGINT', () => {
    shutdown('SIGINT').catch((error: unknown) => logger.error('Shutdown failed', error));
  });
}

main().catch(async (error: unknown) => {
  logger.error('Pipeline worker failed to start', error);
  await pipeline.close();
  process.exit(2);
});
