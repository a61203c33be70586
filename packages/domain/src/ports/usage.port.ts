import type { UsageRecord } from '../types/entities.js';

/**
 * Usage metering side-channel. Every ASR invocation is reported here,
 * independent of its outcome.
 */
export interface UsagePort {
  record(usage: UsageRecord): Promise<void>;

  close(): Promise<void>;
}
