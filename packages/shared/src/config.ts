/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables.
 */

import type { ExtractionMode, QualityMode } from './types';

export const DEFAULT_UNIT_TYPES = [
  'AHU',
  'MAU',
  'EF',
  'RTU',
  'FCU',
  'VAV',
  'CAV',
  'OAHU',
  'WSHP',
  'DOAS',
  'BCU',
  'HP',
  'FC',
  'BC',
  'CH',
  'CU',
  'ACCU',
];

export interface Config {
  // Redis
  redisHost: string;
  redisPort: number;
  redisUrl: string;

  // Queue & Worker
  workerConcurrency: number;
  maxJobAttempts: number;
  backoffBaseMs: number;

  // Backpressure Controls
  maxQueueDepthWarning: number;
  maxQueueDepthReject: number;

  // Conversion (Gotenberg)
  gotenbergUrl: string;
  gotenbergTimeoutMs: number;
  qualityMode: QualityMode;
  conversionConcurrency: number;

  // Object Store
  objectStorePath: string;

  // Structuring
  tagExtractionMode: ExtractionMode;
  supportedUnitTypes: string[];
  filterPricing: boolean;
}

function parseUnitTypes(value: string | undefined): string[] {
  if (!value) return DEFAULT_UNIT_TYPES;
  const types = value
    .split(',')
    .map((t) => t.trim().toUpperCase())
    .filter((t) => /^[A-Z]+$/.test(t));
  return types.length > 0 ? types : DEFAULT_UNIT_TYPES;
}

function parseQualityMode(value: string | undefined): QualityMode {
  switch (value) {
    case 'fast':
    case 'balanced':
    case 'maximum':
      return value;
    default:
      return 'high';
  }
}

export const config: Config = {
  // Redis
  redisHost: process.env.REDIS_HOST || 'redis',
  redisPort: parseInt(process.env.REDIS_PORT || '6379', 10),
  redisUrl: process.env.REDIS_URL || 'redis://redis:6379',

  // Queue & Worker
  workerConcurrency: parseInt(process.env.WORKER_CONCURRENCY || '2', 10),
  maxJobAttempts: parseInt(process.env.BULLMQ_DEFAULT_ATTEMPTS || '3', 10),
  backoffBaseMs: parseInt(process.env.BACKOFF_BASE_MS || '2000', 10),

  // Backpressure Controls
  maxQueueDepthWarning: parseInt(process.env.MAX_QUEUE_DEPTH_WARNING || '50', 10),
  maxQueueDepthReject: parseInt(process.env.MAX_QUEUE_DEPTH_REJECT || '200', 10),

  // Conversion (Gotenberg)
  gotenbergUrl: process.env.GOTENBERG_URL || 'http://gotenberg:3000',
  gotenbergTimeoutMs: parseInt(process.env.GOTENBERG_TIMEOUT_MS || '300000', 10),
  qualityMode: parseQualityMode(process.env.QUALITY_MODE),
  conversionConcurrency: parseInt(process.env.CONVERSION_CONCURRENCY || '3', 10),

  // Object Store
  objectStorePath: process.env.OBJECT_STORE_PATH || '/object-store',

  // Structuring
  tagExtractionMode: process.env.TAG_EXTRACTION_MODE === 'content' ? 'content' : 'filename',
  supportedUnitTypes: parseUnitTypes(process.env.SUPPORTED_UNIT_TYPES),
  filterPricing: process.env.FILTER_PRICING !== 'false',
};
