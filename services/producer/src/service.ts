/**
 * Producer Service Implementation
 *
 * One-shot batch job: every reference the generator mints becomes one work
 * item on the queue. Each publish is confirmed before the next one starts.
 *
 * The batch aborts (and reports what it managed) when:
 * - listing fails (bad credentials, missing bucket)
 * - a publish still fails after its retries
 * - stop() is called
 */

import { randomUUID } from 'crypto';
import {
  type ObjectReference,
  type ProducerSummary,
  type RetryPolicy,
  type WorkItem,
  classifyError,
  withRetry,
} from '@batchscribe/domain';
import { ReferenceGenerator } from './references.js';
import type { Adapters } from './adapters.js';

export interface ProducerOptions {
  bucket: string;
  prefix: string;
  referenceTtlSeconds: number;
  publishRetry: RetryPolicy;

  /** List and mint references without publishing */
  dryRun?: boolean;

  /** Resume a listing after this key */
  startAfter?: string;

  sleep?: (ms: number) => Promise<void>;
}

/**
 * enqueued_at is the mint time, so the item's deadline is the reference's expiry
 */
export function buildWorkItem(reference: ObjectReference, jobId: string = randomUUID()): WorkItem {
  return Object.freeze({
    job_id: jobId,
    object_key: reference.key,
    reference: reference.url,
    enqueued_at: reference.minted_at.toISOString(),
    validity_window_seconds: reference.ttl_seconds,
  });
}

export class ProducerService {
  private stopping = false;

  constructor(
    private readonly adapters: Adapters,
    private readonly options: ProducerOptions
  ) {}

  async run(): Promise<ProducerSummary> {
    const { bucket, prefix, dryRun } = this.options;
    const summary: ProducerSummary = {
      bucket,
      prefix,
      listed: 0,
      enqueued: 0,
      failed: 0,
      skipped: 0,
      aborted: false,
    };

    const generator = new ReferenceGenerator(this.adapters.storage, {
      bucket,
      prefix,
      ttlSeconds: this.options.referenceTtlSeconds,
      startAfter: this.options.startAfter,
    });

    console.log(`[Producer] Listing bucket ${bucket} (prefix=${prefix})${dryRun ? ' - dry run' : ''}`);

    try {
      for await (const generated of generator.generate()) {
        if (this.stopping) {
          summary.aborted = true;
          summary.error = 'Interrupted';
          break;
        }

        if (generated.kind === 'skipped') {
          summary.skipped++;
          console.warn(`[Producer] Skipping ${generated.key}: ${generated.error.message}`);
          continue;
        }

        summary.listed++;
        const item = buildWorkItem(generated.reference);

        if (dryRun) {
          console.log(`[Producer] ${item.object_key} -> ${item.reference}`);
          continue;
        }

        try {
          await withRetry(() => this.adapters.queue.publish(item), this.options.publishRetry, {
            sleep: this.options.sleep,
            onRetry: (error, attempt, delayMs) => {
              console.warn(
                `[Producer] Publish of ${item.object_key} failed (attempt ${attempt}), retrying in ${delayMs}ms: ${classifyError(error).message}`
              );
            },
          });
          summary.enqueued++;
        } catch (error) {
          summary.failed++;
          summary.aborted = true;
          summary.error = `Publishing ${item.object_key} failed: ${classifyError(error).message}`;
          break;
        }
      }
    } catch (error) {
      const classified = classifyError(error);
      summary.aborted = true;
      summary.error = `${classified.name}: ${classified.message}`;
    }

    if (summary.aborted) {
      console.error(
        `[Producer] Batch aborted: enqueued=${summary.enqueued} failed=${summary.failed} skipped=${summary.skipped} (${summary.error})`
      );
    } else {
      console.log(
        `[Producer] Batch complete: listed=${summary.listed} enqueued=${summary.enqueued} skipped=${summary.skipped}`
      );
    }

    return summary;
  }

  /**
   * Stop after the publish in progress
   */
  stop(): void {
    this.stopping = true;
  }
}
