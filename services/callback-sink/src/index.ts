/**
 * BatchScribe Callback Sink
 *
 * Development receiver for transcript deliveries. Captures whatever is posted
 * to it so a batch run can be inspected afterwards.
 */

import { loadSinkConfig } from '@batchscribe/domain';
import { RequestStore } from './store.js';
import { buildSinkServer } from './server.js';

async function main() {
  console.log('[Sink] Starting BatchScribe callback sink...');

  const config = loadSinkConfig();
  const store = new RequestStore(config.maxRequests);
  const server = buildSinkServer(store, { authToken: config.authToken });

  await server.listen({ port: config.port, host: config.host });
  console.log(
    `[Sink] Listening on ${config.host}:${config.port}${config.authToken ? ' (bearer auth required)' : ''}`
  );

  const shutdown = () => {
    console.log('[Sink] Shutting down...');
    server.close().catch((error) => {
      console.error('[Sink] Shutdown failed:', error);
      process.exitCode = 1;
    });
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((error) => {
  console.error('[Sink] Fatal error:', error);
  process.exit(1);
});
