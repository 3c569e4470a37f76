#!/usr/bin/env node
/**
 * decision-corpus entry point. SIGINT/SIGTERM abort the run: in-flight
 * identifiers roll back their current stage and the checkpoint is saved.
 */

import { logger } from '@decision-corpus/shared';
import { runCli } from './cli';

const controller = new AbortController();

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    logger.warn(`${signal} received, stopping after in-flight identifiers settle`);
    controller.abort();
  });
}

runCli(process.argv.slice(2), { signal: controller.signal })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error('Unhandled CLI failure', error);
    process.exitCode = 2;
  });
