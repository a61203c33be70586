/**
 * BatchScribe Producer
 *
 * One-shot batch job: lists the source bucket, mints a time-bounded
 * reference per object and enqueues one transcription work item for each.
 *
 * Usage:
 *   producer [--prefix <prefix>] [--start-after <key>] [--dry-run]
 *
 * Exits 0 when the whole batch was enqueued, 1 when it was aborted.
 */

import { parseArgs } from 'node:util';
import { loadProducerConfig } from '@batchscribe/domain';
import { ProducerService } from './service.js';
import { createAdapters, initializeAdapters, closeAdapters } from './adapters.js';

const USAGE = `Usage: producer [options]

Options:
  --prefix <prefix>      Only enqueue keys under this prefix (default: S3_FILE_PREFIX or "/")
  --start-after <key>    Resume a previous run after this key
  --dry-run              List the references without publishing
  -h, --help             Show this help`;

async function main(): Promise<number> {
  const { values } = parseArgs({
    options: {
      prefix: { type: 'string' },
      'start-after': { type: 'string' },
      'dry-run': { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  if (values.help) {
    console.log(USAGE);
    return 0;
  }

  const config = loadProducerConfig();
  const adapters = createAdapters(config);

  const producer = new ProducerService(adapters, {
    bucket: config.storage.bucket,
    prefix: values.prefix ?? config.storage.prefix,
    referenceTtlSeconds: config.storage.referenceTtlSeconds,
    publishRetry: config.publishRetry,
    dryRun: values['dry-run'],
    startAfter: values['start-after'],
  });

  const interrupt = () => {
    console.log('[Producer] Interrupted, stopping after the current item...');
    producer.stop();
  };
  process.on('SIGTERM', interrupt);
  process.on('SIGINT', interrupt);

  try {
    await initializeAdapters(adapters);
    const summary = await producer.run();
    console.log(JSON.stringify(summary));
    return summary.aborted ? 1 : 0;
  } finally {
    await closeAdapters(adapters);
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error('[Producer] Fatal error:', error);
    process.exitCode = 1;
  });
