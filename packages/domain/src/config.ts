/**
 * Configuration for BatchScribe
 *
 * Every service reads its settings from environment variables. Variables set
 * to an empty string count as unset, since docker-compose exports unset
 * variables that way.
 */

import { ASREngine } from './types/enums.js';
import type { RetryPolicy } from './retry.js';

export type Env = Record<string, string | undefined>;

/** S3 refuses presigned URLs valid for longer than seven days */
export const MAX_REFERENCE_TTL_SECONDS = 604800;

export const DEFAULT_REFERENCE_TTL_SECONDS = 3600;

export interface QueueConfig {
  host: string;
  port: number;
  password?: string;
  db: number;

  /** Name of the durable work queue */
  queueName: string;

  /** How long a fetched message stays locked to its worker between renewals */
  lockDurationMs: number;
}

export interface StorageConfig {
  bucket: string;

  /** Key prefix filter ("/" means everything) */
  prefix: string;

  region: string;

  /** Custom S3-compatible endpoint (MinIO etc.) */
  endpoint?: string;

  accessKeyId?: string;
  secretAccessKey?: string;

  /** Validity of each minted reference */
  referenceTtlSeconds: number;
}

export interface ProducerConfig {
  queue: QueueConfig;
  storage: StorageConfig;
  publishRetry: RetryPolicy;
}

export interface ASRConfig {
  engine: ASREngine;
  endpoint?: string;
  apiKey?: string;
  language: string;
  timeoutMs: number;
  retry: RetryPolicy;
}

export interface WorkerConfig {
  queue: QueueConfig;
  asr: ASRConfig;

  sink: {
    baseUrl: string;
    timeoutMs: number;

    /** Bearer token sent to a sink that requires one */
    authToken?: string;
  };

  delivery: RetryPolicy;

  usage: {
    /** Metering collector; usage is only logged when unset */
    url?: string;
  };

  /** Backoff before a transiently failed message is handed out again */
  requeue: {
    baseDelayMs: number;
    maxDelayMs: number;
  };

  reconnect: {
    baseDelayMs: number;
    maxDelayMs: number;
  };

  server: {
    host: string;
    port: number;
  };
}

export interface SinkConfig {
  host: string;
  port: number;
  authToken?: string;

  /** Number of recorded requests kept in memory */
  maxRequests: number;
}

/**
 * Load queue connection settings shared by producer and worker
 */
export function loadQueueConfig(env: Env = process.env): QueueConfig {
  return {
    host: readEnv(env, 'REDIS_HOST') || 'localhost',
    port: readInt(env, 'REDIS_PORT', 6379),
    password: readEnv(env, 'REDIS_PASSWORD'),
    db: readInt(env, 'REDIS_DB', 0),
    queueName: readEnv(env, 'QUEUE_NAME') || 'transcription',
    lockDurationMs: readInt(env, 'LOCK_DURATION_MS', 30000, 1000),
  };
}

export function loadProducerConfig(env: Env = process.env): ProducerConfig {
  const referenceTtlSeconds = readInt(env, 'REFERENCE_TTL_SECONDS', DEFAULT_REFERENCE_TTL_SECONDS, 1);
  if (referenceTtlSeconds > MAX_REFERENCE_TTL_SECONDS) {
    throw new Error(
      `REFERENCE_TTL_SECONDS must not exceed ${MAX_REFERENCE_TTL_SECONDS} (got ${referenceTtlSeconds})`
    );
  }

  return {
    queue: loadQueueConfig(env),
    storage: {
      bucket: requireEnv(env, 'S3_BUCKET_NAME'),
      prefix: readEnv(env, 'S3_FILE_PREFIX') || '/',
      region: readEnv(env, 'S3_REGION') || 'eu-west-2',
      endpoint: readEnv(env, 'S3_ENDPOINT'),
      accessKeyId: readEnv(env, 'AWS_ACCESS_KEY_ID'),
      secretAccessKey: readEnv(env, 'AWS_SECRET_ACCESS_KEY'),
      referenceTtlSeconds,
    },
    publishRetry: {
      maxAttempts: readInt(env, 'PUBLISH_MAX_ATTEMPTS', 3, 1),
      baseDelayMs: readInt(env, 'PUBLISH_BASE_DELAY_MS', 500),
      maxDelayMs: readInt(env, 'PUBLISH_MAX_DELAY_MS', 10000),
    },
  };
}

export function loadWorkerConfig(env: Env = process.env): WorkerConfig {
  const engine = parseEngine(readEnv(env, 'ASR_ENGINE') || ASREngine.HTTP);
  const endpoint = readEnv(env, 'ASR_ENDPOINT');
  if (engine === ASREngine.HTTP && !endpoint) {
    throw new Error('ASR_ENDPOINT is required when ASR_ENGINE=http');
  }

  return {
    queue: loadQueueConfig(env),
    asr: {
      engine,
      endpoint,
      apiKey: readEnv(env, 'ASR_API_KEY'),
      language: readEnv(env, 'ASR_LANGUAGE') || 'en',
      timeoutMs: readInt(env, 'ASR_TIMEOUT_MS', 600000, 1),
      // Redelivery is the primary retry path for the engine
      retry: {
        maxAttempts: readInt(env, 'ASR_MAX_ATTEMPTS', 1, 1),
        baseDelayMs: readInt(env, 'ASR_BASE_DELAY_MS', 1000),
        maxDelayMs: readInt(env, 'ASR_MAX_DELAY_MS', 30000),
      },
    },
    sink: {
      baseUrl: readEnv(env, 'CALLBACK_SERVER') || 'http://callback-server:8080',
      timeoutMs: readInt(env, 'SINK_TIMEOUT_MS', 30000, 1),
      authToken: readEnv(env, 'CALLBACK_AUTH_TOKEN'),
    },
    delivery: {
      maxAttempts: readInt(env, 'DELIVERY_MAX_ATTEMPTS', 5, 1),
      baseDelayMs: readInt(env, 'DELIVERY_BASE_DELAY_MS', 1000),
      maxDelayMs: readInt(env, 'DELIVERY_MAX_DELAY_MS', 30000),
    },
    usage: {
      url: readEnv(env, 'USAGE_URL'),
    },
    requeue: {
      baseDelayMs: readInt(env, 'REQUEUE_BASE_DELAY_MS', 1000),
      maxDelayMs: readInt(env, 'REQUEUE_MAX_DELAY_MS', 60000),
    },
    reconnect: {
      baseDelayMs: readInt(env, 'RECONNECT_BASE_DELAY_MS', 1000),
      maxDelayMs: readInt(env, 'RECONNECT_MAX_DELAY_MS', 30000),
    },
    server: {
      host: readEnv(env, 'WORKER_HOST') || '0.0.0.0',
      port: readInt(env, 'WORKER_PORT', 3010),
    },
  };
}

export function loadSinkConfig(env: Env = process.env): SinkConfig {
  return {
    host: readEnv(env, 'SINK_HOST') || '0.0.0.0',
    port: readInt(env, 'SINK_PORT', 8080),
    authToken: readEnv(env, 'SINK_AUTH_TOKEN'),
    maxRequests: readInt(env, 'SINK_MAX_REQUESTS', 100, 1),
  };
}

function parseEngine(value: string): ASREngine {
  switch (value.toLowerCase()) {
    case ASREngine.HTTP:
      return ASREngine.HTTP;
    case ASREngine.STUB:
      return ASREngine.STUB;
    default:
      throw new Error(`Unknown ASR_ENGINE "${value}" (expected http or stub)`);
  }
}

function readEnv(env: Env, name: string): string | undefined {
  const value = env[name];
  return value === undefined || value === '' ? undefined : value;
}

function requireEnv(env: Env, name: string): string {
  const value = readEnv(env, name);
  if (!value) {
    throw new Error(`Required environment variable ${name} is not set`);
  }
  return value;
}

function readInt(env: Env, name: string, fallback: number, min: number = 0): number {
  const raw = readEnv(env, name);
  if (raw === undefined) return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`Environment variable ${name} must be an integer >= ${min} (got "${raw}")`);
  }
  return value;
}
