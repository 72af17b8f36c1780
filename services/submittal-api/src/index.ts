/**
 * Submittal API
 *
 * HTTP entry point: wires the assemble_submittal queue and the object store
 * into the express app.
 */

import {
  logger,
  createQueue,
  checkBackpressure,
  reportQueueMetrics,
  StructureStore,
  QUEUE_NAMES,
  type AssembleSubmittalJob,
} from '@submittal/shared';
import { createApp } from './app';

const port = parseInt(process.env.PORT || '8080', 10);

const assembleQueue = createQueue<AssembleSubmittalJob, void>(QUEUE_NAMES.ASSEMBLE_SUBMITTAL);

const app = createApp({
  store: new StructureStore(),
  queue: {
    async enqueue(jobId, job) {
      await assembleQueue.add(QUEUE_NAMES.ASSEMBLE_SUBMITTAL, job, { jobId });
    },
    backpressure: () => checkBackpressure(assembleQueue),
  },
  reportMetrics: () =>
    reportQueueMetrics([{ name: QUEUE_NAMES.ASSEMBLE_SUBMITTAL, queue: assembleQueue }]),
});

// Start server
const server = app.listen(port, () => {
  logger.info('Submittal API started', { port });
});

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down`);
  server.close();
  await assembleQueue.close();
  process.exit(0);
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));
