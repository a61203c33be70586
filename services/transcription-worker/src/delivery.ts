import {
  type ResultSinkPort,
  type RetryPolicy,
  type TranscriptResult,
  DeliveryOutcome,
  classifyError,
  withRetry,
} from '@batchscribe/domain';

/**
 * Hands results to the sink with bounded retries. Never throws: the outcome
 * tells the worker whether the result made it.
 */
export class ResultDelivery {
  constructor(
    private readonly sink: ResultSinkPort,
    private readonly policy: RetryPolicy,
    private readonly sleep?: (ms: number) => Promise<void>
  ) {}

  async deliver(result: TranscriptResult): Promise<DeliveryOutcome> {
    try {
      await withRetry(() => this.sink.deliver(result), this.policy, {
        sleep: this.sleep,
        onRetry: (error, attempt, delayMs) => {
          console.warn(
            `[Delivery] Job ${result.job_id} attempt ${attempt} failed, retrying in ${delayMs}ms: ${classifyError(error).message}`
          );
        },
      });
      return DeliveryOutcome.DELIVERED;
    } catch (error) {
      const classified = classifyError(error);

      if (classified.retryable) {
        console.error(
          `[Delivery] Giving up on job ${result.job_id} after ${this.policy.maxAttempts} attempts: ${classified.message}`
        );
        return DeliveryOutcome.EXHAUSTED;
      }

      console.error(`[Delivery] Sink rejected job ${result.job_id}: ${classified.message}`);
      return DeliveryOutcome.REJECTED;
    }
  }
}
