/**
 * Outcome of a transcription as reported to the result sink
 */
export enum TranscriptStatus {
  SUCCESS = 'success',
  FAILURE = 'failure',
}

/**
 * Failure classification for retry logic
 */
export enum FailureClassification {
  RETRYABLE = 'RETRYABLE',
  NON_RETRYABLE = 'NON_RETRYABLE',
}

/**
 * Result of handing a transcript to the sink.
 * Drives whether the originating message is acknowledged or dropped.
 */
export enum DeliveryOutcome {
  DELIVERED = 'delivered',
  EXHAUSTED = 'exhausted', // Transient failures outlasted the retry ceiling
  REJECTED = 'rejected', // Sink refused the result permanently
}

/**
 * Worker loop states. IDLE -> FETCHING -> PROCESSING -> DELIVERING -> ACKNOWLEDGING -> IDLE
 */
export enum WorkerState {
  IDLE = 'idle',
  FETCHING = 'fetching',
  PROCESSING = 'processing',
  DELIVERING = 'delivering',
  ACKNOWLEDGING = 'acknowledging',
}

/**
 * Exactly one of these is issued per queue message
 */
export enum AckAction {
  ACK = 'ack',
  NACK_REQUEUE = 'nack_requeue',
  ACK_AFTER_FAILURE = 'ack_after_failure',
}

/**
 * Supported ASR engines
 */
export enum ASREngine {
  HTTP = 'http',
  STUB = 'stub', // Local development stub
}

/**
 * Outcome of a single ASR invocation, reported to the usage collector
 */
export enum InvocationOutcome {
  SUCCESS = 'success',
  TRANSIENT = 'transient',
  PERMANENT = 'permanent',
  EXPIRED = 'expired',
}
