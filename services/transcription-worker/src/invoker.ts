/**
 * Transcription Invoker
 *
 * Wraps the ASR port: refuses items whose reference has already lapsed,
 * classifies whatever the engine throws, and meters every invocation.
 */

import {
  type ASRPort,
  type ASRTranscript,
  type PipelineError,
  type RetryPolicy,
  type UsagePort,
  type WorkItem,
  AccessError,
  InvocationOutcome,
  ReferenceExpiredError,
  classifyError,
  isReferenceExpired,
  referenceDeadline,
  withRetry,
} from '@batchscribe/domain';

export interface InvokerOptions {
  /** Language hint passed to the engine */
  language: string;

  /** Attempts made within one delivery of the message */
  retry: RetryPolicy;

  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

export function invocationOutcome(error: PipelineError): InvocationOutcome {
  if (error instanceof ReferenceExpiredError) return InvocationOutcome.EXPIRED;
  return error.retryable ? InvocationOutcome.TRANSIENT : InvocationOutcome.PERMANENT;
}

export class TranscriptionInvoker {
  private readonly now: () => Date;

  constructor(
    private readonly asr: ASRPort,
    private readonly usage: UsagePort,
    private readonly options: InvokerOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Transcribe one work item. Throws a PipelineError on failure.
   */
  async invoke(item: WorkItem): Promise<ASRTranscript> {
    const deadline = referenceDeadline(item);
    if (isReferenceExpired(item, this.now())) {
      throw new ReferenceExpiredError(`Reference for ${item.object_key} expired at ${deadline.toISOString()}`);
    }

    return withRetry(() => this.invokeOnce(item, deadline), this.options.retry, {
      // No point retrying once the engine can no longer fetch the audio
      isRetryable: (error) => classifyError(error).retryable && !isReferenceExpired(item, this.now()),
      onRetry: (error, attempt, delayMs) => {
        console.warn(
          `[Invoker] Job ${item.job_id} attempt ${attempt} failed, retrying in ${delayMs}ms: ${classifyError(error).message}`
        );
      },
      sleep: this.options.sleep,
    });
  }

  private async invokeOnce(item: WorkItem, deadline: Date): Promise<ASRTranscript> {
    const invokedAt = this.now();
    let outcome = InvocationOutcome.SUCCESS;

    try {
      return await this.asr.transcribe(item.reference, {
        jobId: item.job_id,
        language: this.options.language,
        deadline,
      });
    } catch (error) {
      let classified = classifyError(error);

      // Object stores answer 403 to a signature that has lapsed
      if (classified instanceof AccessError && this.now().getTime() >= deadline.getTime()) {
        classified = new ReferenceExpiredError(
          `Reference for ${item.object_key} expired at ${deadline.toISOString()}: ${classified.message}`,
          undefined,
          { cause: classified }
        );
      }

      outcome = invocationOutcome(classified);
      throw classified;
    } finally {
      await this.report(item, invokedAt, outcome);
    }
  }

  private async report(item: WorkItem, invokedAt: Date, outcome: InvocationOutcome): Promise<void> {
    try {
      await this.usage.record({
        job_id: item.job_id,
        object_key: item.object_key,
        engine: this.asr.getEngine(),
        invoked_at: invokedAt.toISOString(),
        duration_ms: Math.max(0, this.now().getTime() - invokedAt.getTime()),
        outcome,
      });
    } catch (error) {
      console.warn(`[Invoker] Usage report for job ${item.job_id} failed: ${classifyError(error).message}`);
    }
  }
}
