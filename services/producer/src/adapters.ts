/**
 * Adapter factory for the producer
 *
 * The producer owns its own broker connection and storage client.
 */

import type { ProducerConfig, QueuePort, StoragePort } from '@batchscribe/domain';
import { createBullMQQueueAdapter } from '@batchscribe/bullmq-queue';
import { createS3StorageAdapter } from '@batchscribe/s3-storage';

export interface Adapters {
  queue: QueuePort;
  storage: StoragePort;
}

export function createAdapters(config: ProducerConfig): Adapters {
  return {
    queue: createBullMQQueueAdapter(config.queue),
    storage: createS3StorageAdapter(config.storage),
  };
}

/**
 * Initialize all adapters
 */
export async function initializeAdapters(adapters: Adapters): Promise<void> {
  await Promise.all([adapters.queue.initialize(), adapters.storage.initialize()]);
}

/**
 * Close all adapters
 */
export async function closeAdapters(adapters: Adapters): Promise<void> {
  await Promise.all([adapters.queue.close(), adapters.storage.close()]);
}
