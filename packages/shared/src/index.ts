/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  runWithContextAsync,
  type RequestContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export { config, DEFAULT_UNIT_TYPES, type Config } from './config';

// Types
export * from './types';

// Errors
export {
  SubmittalError,
  ConversionError,
  StructureValidationError,
  AssemblyFatalError,
  NotFoundError,
  type SubmittalErrorCode,
} from './errors';

// Queues
export {
  QUEUE_NAMES,
  type QueueName,
  type AssembleSubmittalJob,
  getRedisConnection,
  createQueue,
  createWorker,
  getQueueMetrics,
  checkBackpressure,
  type WorkerOptions,
} from './queues';

// Metrics
export {
  register,
  queueDepthGauge,
  queueMetricsGauge,
  jobDurationHistogram,
  jobsProcessedCounter,
  filesExtractedCounter,
  classificationAmbiguitiesCounter,
  conversionsCounter,
  conversionDurationHistogram,
  pagesRemovedCounter,
  assemblyDurationHistogram,
  backpressureRejectionsCounter,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  reportQueueMetrics,
  getMetrics,
  getMetricsContentType,
  serveMetrics,
} from './metrics';

// Schemas
export { validateStructure, isStructure, STRUCTURE_SCHEMA_FILE, type ValidationResult } from './schemas';

// Persistence
export { StructureStore } from './store';

// Tag extraction
export * from './tagging';

// Classification
export * from './classification';

// Structure building
export * from './structure';

// Page filtering and assembly
export * from './assembly';

// Text extraction
export * from './text';
