/**
 * Adapter factory for the transcription worker
 *
 * Every worker process owns its own broker connection.
 */

import type { ASRPort, QueuePort, ResultSinkPort, UsagePort, WorkerConfig } from '@batchscribe/domain';
import { createBullMQQueueAdapter } from '@batchscribe/bullmq-queue';
import { HttpResultSink, createASRAdapter, createUsageReporter } from '@batchscribe/http-services';

export interface Adapters {
  queue: QueuePort;
  asr: ASRPort;
  sink: ResultSinkPort;
  usage: UsagePort;
}

export function createAdapters(config: WorkerConfig): Adapters {
  return {
    queue: createBullMQQueueAdapter(config.queue),
    asr: createASRAdapter(config.asr),
    sink: new HttpResultSink(config.sink),
    usage: createUsageReporter(config.usage.url),
  };
}

/**
 * Initialize all adapters
 */
export async function initializeAdapters(adapters: Adapters): Promise<void> {
  await Promise.all([adapters.queue.initialize(), adapters.asr.initialize()]);
}

/**
 * Close all adapters
 */
export async function closeAdapters(adapters: Adapters): Promise<void> {
  await Promise.all([
    adapters.queue.close(),
    adapters.asr.close(),
    adapters.sink.close(),
    adapters.usage.close(),
  ]);
}
