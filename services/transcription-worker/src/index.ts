/**
 * BatchScribe Transcription Worker
 *
 * Long-lived consumer. Run as many replicas as needed; each one:
 * 1. Fetches one work item at a time from the queue
 * 2. Has the ASR engine transcribe the referenced audio
 * 3. Posts the transcript to the result sink
 * 4. Acknowledges the message only after delivery is settled
 *
 * Transient failures are requeued, permanent ones reported and dropped.
 */

import { loadWorkerConfig } from '@batchscribe/domain';
import { WorkerService } from './service.js';
import { createAdapters } from './adapters.js';
import { buildServer } from './server.js';

async function main() {
  console.log('[Worker] Starting BatchScribe transcription worker...');

  const config = loadWorkerConfig();
  const adapters = createAdapters(config);
  const worker = new WorkerService(adapters, {
    language: config.asr.language,
    asrRetry: config.asr.retry,
    delivery: config.delivery,
    requeue: config.requeue,
    reconnect: config.reconnect,
  });

  await worker.initialize();

  const server = buildServer(worker);

  worker.start();

  await server.listen({ port: config.server.port, host: config.server.host });
  console.log(`[Worker] Server listening on ${config.server.host}:${config.server.port}`);

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;

    console.log('[Worker] Shutting down...');
    await worker.stop();
    await server.close();
  };

  const onSignal = () => {
    shutdown().catch((error) => {
      console.error('[Worker] Shutdown failed:', error);
      process.exitCode = 1;
    });
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((error) => {
  console.error('[Worker] Fatal error:', error);
  process.exit(1);
});
