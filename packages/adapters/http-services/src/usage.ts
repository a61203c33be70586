import type { UsagePort, UsageRecord } from '@batchscribe/domain';
import { joinUrl, sendRequest } from './http.js';

const USAGE_TIMEOUT_MS = 5000;

/**
 * Reports ASR invocations to a metering collector
 */
export class HttpUsageReporter implements UsagePort {
  constructor(private readonly baseUrl: string) {}

  async record(usage: UsageRecord): Promise<void> {
    await sendRequest(joinUrl(this.baseUrl, '/v1/usage'), { body: usage, timeoutMs: USAGE_TIMEOUT_MS }, 'Usage collector');
  }

  async close(): Promise<void> {}
}

/**
 * Used when no collector is configured
 */
export class LoggingUsageReporter implements UsagePort {
  async record(usage: UsageRecord): Promise<void> {
    console.log(
      `[Usage] job=${usage.job_id} engine=${usage.engine} outcome=${usage.outcome} duration=${usage.duration_ms}ms`
    );
  }

  async close(): Promise<void> {}
}

export function createUsageReporter(url: string | undefined): UsagePort {
  return url ? new HttpUsageReporter(url) : new LoggingUsageReporter();
}
