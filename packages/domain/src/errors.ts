/**
 * Error taxonomy for the transcription pipeline.
 *
 * External clients (object store, broker, ASR engine, sink) throw whatever they
 * throw; adapters map those signals into the classes below at the boundary so
 * the producer and worker only ever reason about a classification.
 */

import { FailureClassification } from './types/enums.js';

export abstract class PipelineError extends Error {
  abstract readonly classification: FailureClassification;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  get retryable(): boolean {
    return this.classification === FailureClassification.RETRYABLE;
  }
}

/** Invalid credentials or insufficient permissions. Fatal for a batch. */
export class AccessError extends PipelineError {
  readonly classification = FailureClassification.NON_RETRYABLE;
}

/** Missing bucket or object. */
export class NotFoundError extends PipelineError {
  readonly classification = FailureClassification.NON_RETRYABLE;
}

/** Network trouble, rate limiting, timeouts. Retried with backoff. */
export class TransientError extends PipelineError {
  readonly classification = FailureClassification.RETRYABLE;

  constructor(
    message: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** Malformed input or a refusal that will not change on retry. */
export class PermanentError extends PipelineError {
  readonly classification = FailureClassification.NON_RETRYABLE;

  constructor(
    message: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** The work item's reference outlived its validity window. */
export class ReferenceExpiredError extends PermanentError {}

/** Broker connection lost. Callers reconnect with backoff. */
export class BrokerUnavailableError extends PipelineError {
  readonly classification = FailureClassification.RETRYABLE;
}

const TRANSIENT_NETWORK_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'ENOTFOUND',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
  'UND_ERR_SOCKET',
]);

const PERMANENT_MESSAGE_HINTS = ['codec', 'corrupt', 'invalid format', 'unsupported', 'malformed'];

const EXPIRED_BODY_PATTERN = /expired/i;

function stringProperty(value: unknown, property: 'code' | 'name'): string | undefined {
  if (typeof value === 'object' && value !== null && property in value) {
    const field: unknown = Reflect.get(value, property);
    return typeof field === 'string' ? field : undefined;
  }
  return undefined;
}

/**
 * Network error code carried by the error or its cause (fetch wraps socket
 * errors in a TypeError whose cause holds the code).
 */
export function networkErrorCode(error: unknown): string | undefined {
  const code = stringProperty(error, 'code');
  if (code) return code;

  if (error instanceof Error && error.cause !== undefined) {
    return stringProperty(error.cause, 'code');
  }
  return undefined;
}

/**
 * Map an HTTP error response into the taxonomy
 */
export function errorFromHttpResponse(
  status: number,
  body: string,
  context: string,
): PipelineError {
  const detail = body.trim().slice(0, 500);
  const message = `${context} responded ${status}${detail ? `: ${detail}` : ''}`;

  if (status === 408 || status === 425 || status === 429 || status >= 500) {
    return new TransientError(message, status);
  }

  if (status === 410 || EXPIRED_BODY_PATTERN.test(detail)) {
    return new ReferenceExpiredError(message, status);
  }

  if (status === 401 || status === 403) {
    return new AccessError(message);
  }

  if (status === 404) {
    return new NotFoundError(message);
  }

  return new PermanentError(message, status);
}

/**
 * Map any thrown value into the taxonomy.
 *
 * Unrecognised errors default to transient: a redelivery costs less than a
 * dropped job.
 */
export function classifyError(error: unknown): PipelineError {
  if (error instanceof PipelineError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const name = stringProperty(error, 'name');

  if (name === 'AbortError' || name === 'TimeoutError') {
    return new TransientError(`Request timed out: ${message}`, undefined, { cause: error });
  }

  const code = networkErrorCode(error);
  if (code && TRANSIENT_NETWORK_CODES.has(code)) {
    return new TransientError(`Network error (${code}): ${message}`, undefined, { cause: error });
  }

  const lowered = message.toLowerCase();
  if (PERMANENT_MESSAGE_HINTS.some((hint) => lowered.includes(hint))) {
    return new PermanentError(message, undefined, { cause: error });
  }

  return new TransientError(message, undefined, { cause: error });
}

export function isRetryable(error: unknown): boolean {
  return classifyError(error).retryable;
}
