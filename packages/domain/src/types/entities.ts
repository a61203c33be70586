import type { TranscriptStatus, InvocationOutcome } from './enums.js';

/**
 * One unit of transcription work, referencing a single source audio object.
 * Created once by the producer and never mutated afterwards.
 */
export interface WorkItem {
  /** Unique identifier assigned at enqueue time */
  readonly job_id: string;

  /** Object key in the source bucket */
  readonly object_key: string;

  /** Time-bounded URL the ASR engine fetches the audio from */
  readonly reference: string;

  /** ISO-8601 timestamp of when the item was published */
  readonly enqueued_at: string;

  /** How long the reference stays resolvable after enqueued_at */
  readonly validity_window_seconds: number;
}

/**
 * Wire envelope handed out by the queue client.
 * The worker holds at most one of these unacknowledged at a time.
 */
export interface QueueMessage {
  /** Broker-assigned tag used to ack/nack this delivery */
  delivery_tag: string;

  /** True if the broker has handed this message out before */
  redelivered: boolean;

  /** Number of times this message has been delivered, including this one */
  delivery_count: number;

  /** Serialized WorkItem */
  body: string;
}

/**
 * Transcript (or failure notice) for one work item
 */
export interface TranscriptResult {
  job_id: string;
  object_key: string;
  reference: string;
  text: string;
  status: TranscriptStatus;
  error_detail?: string;
}

/**
 * Metering record sent after every ASR invocation, whatever its outcome
 */
export interface UsageRecord {
  job_id: string;
  object_key: string;
  engine: string;
  invoked_at: string;
  duration_ms: number;
  outcome: InvocationOutcome;
}

/**
 * A presigned reference minted for one object
 */
export interface ObjectReference {
  key: string;
  url: string;
  minted_at: Date;
  ttl_seconds: number;
}

/**
 * Result of one producer batch run
 */
export interface ProducerSummary {
  bucket: string;
  prefix: string;

  /** References minted (in a dry run, the items that would be enqueued) */
  listed: number;

  enqueued: number;
  failed: number;
  skipped: number;
  aborted: boolean;
  error?: string;
}

/**
 * Instant after which the item's reference can no longer be resolved
 */
export function referenceDeadline(item: WorkItem): Date {
  return new Date(Date.parse(item.enqueued_at) + item.validity_window_seconds * 1000);
}

export function isReferenceExpired(item: WorkItem, now: Date = new Date()): boolean {
  return now.getTime() >= referenceDeadline(item).getTime();
}
