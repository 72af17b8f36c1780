/**
 * Submittal API application
 *
 * Structure extraction, human edits, and assembly job submission.
 * Built as a factory so the queue and store can be swapped out.
 */

import express, { type Request, type Response, type NextFunction } from 'express';
import { ulid } from 'ulid';
import {
  logger,
  config,
  runWithContext,
  getCorrelationId,
  getMetrics,
  getMetricsContentType,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  backpressureRejectionsCounter,
  extractStructure,
  parseStructure,
  retagStructure,
  documentTextExtractor,
  SubmittalError,
  StructureStore,
  type AssembleSubmittalJob,
  type ErrorEnvelope,
  type JobResult,
  type TextExtractor,
} from '@submittal/shared';
import { discoverDirectory, discoverFiles } from './lib/discovery';
import {
  outputFilenameFor,
  parseAssembleRequest,
  parseCreateStructureRequest,
  parseRetagRequest,
} from './lib/requests';

export interface Backpressure {
  shouldWarn: boolean;
  shouldReject: boolean;
  depth: number;
}

/**
 * The slice of the assemble_submittal queue the API needs.
 */
export interface AssembleQueue {
  enqueue(jobId: string, job: AssembleSubmittalJob): Promise<void>;
  backpressure(): Promise<Backpressure>;
}

export interface AppDeps {
  store: StructureStore;
  queue: AssembleQueue;
  textExtractor?: TextExtractor;
  /** Refreshes queue gauges before a scrape */
  reportMetrics?: () => Promise<void>;
}

function sendError(res: Response, status: number, code: string, message: string): void {
  const body: ErrorEnvelope = {
    error: { code, message, correlation_id: getCorrelationId() },
  };
  res.status(status).json(body);
}

function statusForError(error: SubmittalError): number {
  switch (error.code) {
    case 'not_found':
      return 404;
    case 'invalid_structure':
      return 400;
    default:
      return 500;
  }
}

function handleError(res: Response, error: unknown, action: string): void {
  if (error instanceof SubmittalError) {
    logger.warn(`${action} rejected`, { code: error.code, error: error.message });
    sendError(res, statusForError(error), error.code, error.message);
    return;
  }
  logger.error(`${action} failed`, error);
  sendError(res, 500, 'internal_error', `${action} failed`);
}

export function createApp(deps: AppDeps): express.Express {
  const { store, queue } = deps;
  const textExtractor = deps.textExtractor ?? documentTextExtractor;
  const app = express();

  app.use(express.json({ limit: '5mb' }));

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
  app.get('/health', async (_req: Request, res: Response) => {
    try {
      const backpressure = await queue.backpressure();
      res.json({
        status: 'healthy',
        service: 'submittal-api',
        queue_depth: backpressure.depth,
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      res.status(503).json({
        status: 'unhealthy',
        service: 'submittal-api',
        error: error instanceof Error ? error.message : 'Unknown error',
        timestamp: new Date().toISOString(),
      });
    }
  });

  // Metrics endpoint
  app.get('/metrics', async (_req: Request, res: Response) => {
    if (deps.reportMetrics) {
      await deps.reportMetrics();
    }
    res.setHeader('Content-Type', getMetricsContentType());
    res.send(await getMetrics());
  });

  /**
   * POST /structures
   * Discover input files, extract tags, and persist a new structure
   */
  app.post('/structures', async (req: Request, res: Response) => {
    const parsed = parseCreateStructureRequest(req.body);
    if (!parsed.ok) {
      sendError(res, 400, 'invalid_request', parsed.message);
      return;
    }

    try {
      const { source_dir, files, mode = config.tagExtractionMode } = parsed.value;
      const discovered = source_dir
        ? await discoverDirectory(source_dir)
        : await discoverFiles(files ?? []);

      if (discovered.length === 0) {
        sendError(res, 400, 'invalid_request', 'No supported input files found');
        return;
      }

      const result = await extractStructure(discovered, mode, { textExtractor });
      const structureId = ulid();
      await store.saveStructure(structureId, result.structure);

      logger.info('Structure created', {
        structure_id: structureId,
        groups: result.structure.groups.length,
        failures: result.failures.length,
      });

      res.status(201).json({
        structure_id: structureId,
        structure: result.structure,
        failures: result.failures,
        ambiguities: result.ambiguities,
        tag_ambiguities: result.tag_ambiguities,
      });
    } catch (error) {
      handleError(res, error, 'Structure extraction');
    }
  });

  /**
   * GET /structures/:id
   */
  app.get('/structures/:id', async (req: Request, res: Response) => {
    try {
      res.json(await store.loadStructure(req.params.id));
    } catch (error) {
      handleError(res, error, 'Structure lookup');
    }
  });

  /**
   * PUT /structures/:id
   * Replace with a human-edited structure
   */
  app.put('/structures/:id', async (req: Request, res: Response) => {
    try {
      await store.loadStructure(req.params.id);
      const structure = parseStructure(req.body);
      await store.saveStructure(req.params.id, structure);
      res.json(structure);
    } catch (error) {
      handleError(res, error, 'Structure update');
    }
  });

  /**
   * POST /structures/:id/retag
   * Apply tag edits and rebuild the structure
   */
  app.post('/structures/:id/retag', async (req: Request, res: Response) => {
    const parsed = parseRetagRequest(req.body);
    if (!parsed.ok) {
      sendError(res, 400, 'invalid_request', parsed.message);
      return;
    }

    try {
      const current = await store.loadStructure(req.params.id);
      const structure = retagStructure(current, parsed.value);
      await store.saveStructure(req.params.id, structure);
      res.json({ structure_id: req.params.id, structure });
    } catch (error) {
      handleError(res, error, 'Retag');
    }
  });

  /**
   * POST /structures/:id/assemble
   * Enqueue an assembly job
   */
  app.post('/structures/:id/assemble', async (req: Request, res: Response) => {
    const parsed = parseAssembleRequest(req.body);
    if (!parsed.ok) {
      sendError(res, 400, 'invalid_request', parsed.message);
      return;
    }

    try {
      const structureId = req.params.id;
      await store.loadStructure(structureId);

      const backpressure = await queue.backpressure();
      if (backpressure.shouldReject) {
        backpressureRejectionsCounter.inc();
        logger.warn('Request rejected due to backpressure', {
          queue_depth: backpressure.depth,
        });
        sendError(res, 503, 'service_unavailable', 'System is under heavy load. Please retry later.');
        return;
      }

      if (backpressure.shouldWarn) {
        logger.warn('Queue depth approaching threshold', {
          queue_depth: backpressure.depth,
        });
      }

      const correlationId = getCorrelationId();
      const jobId = ulid();
      const job: AssembleSubmittalJob = {
        correlation_id: correlationId,
        structure_id: structureId,
        filter_pricing: parsed.value.filter_pricing ?? config.filterPricing,
        quality_mode: parsed.value.quality_mode ?? config.qualityMode,
        output_filename: outputFilenameFor(structureId, parsed.value.output_filename),
      };

      const pending: JobResult = { job_id: jobId, structure_id: structureId, status: 'pending' };
      await store.saveJobResult(pending);
      await queue.enqueue(jobId, job);

      logger.info('Assembly job enqueued', { job_id: jobId, structure_id: structureId });
      res.status(202).json({ job_id: jobId, correlation_id: correlationId });
    } catch (error) {
      handleError(res, error, 'Assembly submission');
    }
  });

  /**
   * GET /jobs/:id
   */
  app.get('/jobs/:id', async (req: Request, res: Response) => {
    try {
      const result = await store.loadJobResult(req.params.id);
      if (!result) {
        sendError(res, 404, 'not_found', `Job ${req.params.id} not found`);
        return;
      }
      res.json(result);
    } catch (error) {
      handleError(res, error, 'Job lookup');
    }
  });

  return app;
}
