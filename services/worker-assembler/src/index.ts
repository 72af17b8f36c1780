/**
 * Assembler Worker
 *
 * Consumes assemble_submittal: renders the documents of a persisted
 * structure, builds title pages, assembles the submittal PDF and manifest,
 * and stores the job result for submittal-api.
 */

import type { Job } from 'bullmq';
import {
  logger,
  config,
  runWithContextAsync,
  createWorker,
  serveMetrics,
  StructureStore,
  pdfPageTextExtractor,
  QUEUE_NAMES,
  type AssembleSubmittalJob,
  type JobResult,
  jobsProcessedCounter,
  jobDurationHistogram,
} from '@submittal/shared';
import { runAssembleJob } from './lib/assemble-job';
import { GotenbergClient } from './lib/gotenberg';

const store = new StructureStore();

/**
 * Process assemble_submittal job
 */
async function processAssembleSubmittal(
  job: Job<AssembleSubmittalJob, JobResult>
): Promise<JobResult> {
  const jobId = job.id ?? job.data.structure_id;

  return runWithContextAsync(
    { correlationId: job.data.correlation_id, structureId: job.data.structure_id, jobId },
    async () => {
      const startTime = Date.now();

      logger.info('Processing assemble_submittal', {
        structure_id: job.data.structure_id,
        quality_mode: job.data.quality_mode,
        filter_pricing: job.data.filter_pricing,
        attempt: job.attemptsMade + 1,
      });

      try {
        const result = await runAssembleJob(jobId, job.data, {
          store,
          pageText: pdfPageTextExtractor,
          conversionConcurrency: config.conversionConcurrency,
          createOfficeRenderer: (qualityMode) =>
            new GotenbergClient({
              baseUrl: config.gotenbergUrl,
              timeoutMs: config.gotenbergTimeoutMs,
              qualityMode,
            }),
        });

        const duration = (Date.now() - startTime) / 1000;
        jobsProcessedCounter.inc({ queue: QUEUE_NAMES.ASSEMBLE_SUBMITTAL, status: result.status });
        jobDurationHistogram.observe(
          { queue: QUEUE_NAMES.ASSEMBLE_SUBMITTAL, status: result.status },
          duration
        );
        return result;
      } catch (error) {
        jobsProcessedCounter.inc({ queue: QUEUE_NAMES.ASSEMBLE_SUBMITTAL, status: 'error' });

        const attempts = job.opts.attempts ?? config.maxJobAttempts;
        if (job.attemptsMade + 1 >= attempts) {
          await store.saveJobResult({
            job_id: jobId,
            structure_id: job.data.structure_id,
            status: 'failed',
            error: {
              code: 'internal_error',
              message: error instanceof Error ? error.message : String(error),
            },
            finished_at: new Date().toISOString(),
          });
        }
        throw error;
      }
    }
  );
}

// Expose /metrics for Prometheus
const metricsServer = serveMetrics(parseInt(process.env.METRICS_PORT || '9091', 10));

// Create and start the worker
const worker = createWorker<AssembleSubmittalJob, JobResult>(
  QUEUE_NAMES.ASSEMBLE_SUBMITTAL,
  processAssembleSubmittal
);

logger.info('Assembler worker started', {
  gotenberg_url: config.gotenbergUrl,
  conversion_concurrency: config.conversionConcurrency,
});

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down`);
  await worker.close();
  metricsServer.close();
  process.exit(0);
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));
