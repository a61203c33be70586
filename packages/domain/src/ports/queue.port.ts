import type { WorkItem, QueueMessage } from '../types/entities.js';

/**
 * Queue port interface
 *
 * Production: BullMQ on Redis
 * Tests: in-memory broker from @batchscribe/domain/testing
 *
 * Each producer or worker owns its own instance (and therefore its own
 * broker connection). Consumption is manual: one message is fetched at a
 * time and must be acked or nacked before the next fetch.
 */
export interface QueuePort {
  /**
   * Open the broker connection
   */
  initialize(): Promise<void>;

  /**
   * Publish a work item. Resolves once the broker has accepted it.
   */
  publish(item: WorkItem): Promise<void>;

  /**
   * Wait for the next message. Resolves null if none arrived within the
   * client's blocking window.
   */
  fetch(): Promise<QueueMessage | null>;

  /**
   * Acknowledge a message (remove it from the queue)
   */
  ack(message: QueueMessage): Promise<void>;

  /**
   * Negative acknowledge - return the message to the queue for redelivery.
   * The message is not handed out again before delayMs has passed; the
   * hand-back is a single broker operation.
   */
  nack(message: QueueMessage, reason: string, delayMs?: number): Promise<void>;

  /**
   * Get queue statistics
   */
  getStats(): Promise<QueueStats>;

  /**
   * Health check
   */
  healthCheck(): Promise<boolean>;

  /**
   * Close connection
   */
  close(): Promise<void>;
}

export interface QueueStats {
  /** Number of messages waiting */
  waiting: number;

  /** Number of messages held by a worker */
  active: number;

  /** Number of acknowledged messages still retained */
  completed: number;

  /** Number of messages parked as failed */
  failed: number;

  /** Number of messages scheduled for later */
  delayed: number;
}
