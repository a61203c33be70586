/**
 * Transcription Worker Service
 *
 * One sequential loop per process:
 *
 *   idle -> fetching -> processing -> delivering -> acknowledging -> idle
 *
 * Exactly one ack or nack is issued per message, and only after delivery has
 * succeeded or been given up on. At most one message is held at a time; if
 * the process dies mid-iteration the broker hands the message to another
 * worker.
 *
 * Failure handling:
 * - Transient errors (timeouts, rate limits, unknown errors) nack-requeue,
 *   delayed by an exponential backoff on the delivery count
 * - Permanent errors (malformed body, rejected or expired reference) are
 *   reported to the sink as a failure result, then acked
 * - A lost broker connection keeps the worker in fetching with capped
 *   exponential backoff until the broker returns
 */

import { setTimeout as delay } from 'node:timers/promises';
import {
  type PipelineError,
  type QueueMessage,
  type RetryPolicy,
  type TranscriptResult,
  type WorkItem,
  AckAction,
  BrokerUnavailableError,
  DeliveryOutcome,
  TranscriptStatus,
  WorkerState,
  calculateBackoffDelay,
  classifyError,
  parseWorkItem,
} from '@batchscribe/domain';
import { type Adapters, initializeAdapters, closeAdapters } from './adapters.js';
import { TranscriptionInvoker } from './invoker.js';
import { ResultDelivery } from './delivery.js';

export interface WorkerOptions {
  /** Language hint passed to the ASR engine */
  language: string;

  asrRetry: RetryPolicy;
  delivery: RetryPolicy;

  /** Delay before a nacked message is handed out again */
  requeue: {
    baseDelayMs: number;
    maxDelayMs: number;
    jitter?: boolean;
  };

  reconnect: {
    baseDelayMs: number;
    maxDelayMs: number;
    jitter?: boolean;
  };

  /** How often a paused worker checks whether it was resumed */
  pausePollMs?: number;

  now?: () => Date;

  /** Replaces every backoff and poll delay (tests) */
  sleep?: (ms: number) => Promise<void>;
}

export interface WorkerStats {
  state: WorkerState;
  paused: boolean;

  /** Messages fetched */
  received: number;

  /** Messages acknowledged, whatever their outcome */
  acked: number;

  /** Messages returned to the queue */
  nacked: number;

  /** Messages acknowledged after a permanent failure or an abandoned delivery */
  dropped: number;

  /** Results (transcripts or failure notices) the sink accepted */
  delivered: number;

  /** Results the sink never accepted */
  deliveryFailures: number;

  /** Times the broker came back after being unreachable */
  reconnects: number;
}

interface Decision {
  action: AckAction;
  reason: string;

  /** Requeue delay, for NACK_REQUEUE */
  delayMs?: number;
}

const DEFAULT_PAUSE_POLL_MS = 1000;

export class WorkerService {
  private readonly invoker: TranscriptionInvoker;
  private readonly delivery: ResultDelivery;
  private readonly shutdown = new AbortController();

  private state: WorkerState = WorkerState.IDLE;
  private paused = false;
  private stopping = false;
  private loop: Promise<void> | null = null;
  private brokerFailures = 0;
  private counters = {
    received: 0,
    acked: 0,
    nacked: 0,
    dropped: 0,
    delivered: 0,
    deliveryFailures: 0,
    reconnects: 0,
  };

  constructor(
    private readonly adapters: Adapters,
    private readonly options: WorkerOptions
  ) {
    this.invoker = new TranscriptionInvoker(adapters.asr, adapters.usage, {
      language: options.language,
      retry: options.asrRetry,
      now: options.now,
      sleep: options.sleep,
    });
    this.delivery = new ResultDelivery(adapters.sink, options.delivery, options.sleep);
  }

  async initialize(): Promise<void> {
    await initializeAdapters(this.adapters);
    console.log('[Worker] Adapters initialized');
  }

  /**
   * Start the loop in the background. It runs until stop() is called.
   */
  start(): void {
    if (this.loop) return;

    console.log('[Worker] Starting to consume');
    this.loop = this.run();
  }

  get running(): boolean {
    return this.loop !== null && !this.stopping;
  }

  async pause(): Promise<void> {
    this.paused = true;
    console.log('[Worker] Processing paused');
  }

  async resume(): Promise<void> {
    this.paused = false;
    console.log('[Worker] Processing resumed');
  }

  /**
   * Let the in-flight iteration finish, then close the adapters
   */
  async stop(): Promise<void> {
    this.stopping = true;
    this.shutdown.abort();

    if (this.loop) {
      await this.loop;
      this.loop = null;
    }
    await closeAdapters(this.adapters);
    console.log('[Worker] Stopped');
  }

  /**
   * One pass through the state machine. Resolves with the action issued for
   * the fetched message, or null when nothing was fetched.
   */
  async runOnce(): Promise<AckAction | null> {
    const message = await this.fetch();
    if (!message) {
      this.setState(WorkerState.IDLE);
      return null;
    }

    this.counters.received++;
    const decision = await this.handleMessage(message);
    await this.settle(message, decision);
    this.setState(WorkerState.IDLE);

    return decision.action;
  }

  async healthCheck(): Promise<boolean> {
    try {
      const results = await Promise.all([this.adapters.queue.healthCheck(), this.adapters.asr.healthCheck()]);
      return results.every((r) => r);
    } catch {
      return false;
    }
  }

  getStats(): WorkerStats {
    return { state: this.state, paused: this.paused, ...this.counters };
  }

  private async run(): Promise<void> {
    while (!this.stopping) {
      if (this.paused) {
        await this.wait(this.options.pausePollMs ?? DEFAULT_PAUSE_POLL_MS);
        continue;
      }

      try {
        await this.runOnce();
      } catch (error) {
        // Per-item failures are settled inside runOnce; this is a bug or a fatal client error
        console.error('[Worker] Iteration failed:', error);
        this.setState(WorkerState.IDLE);
        await this.wait(this.options.reconnect.baseDelayMs);
      }
    }
  }

  private async fetch(): Promise<QueueMessage | null> {
    this.setState(WorkerState.FETCHING);

    try {
      const message = await this.adapters.queue.fetch();
      if (this.brokerFailures > 0) {
        console.log(`[Worker] Broker reachable again after ${this.brokerFailures} failed attempts`);
        this.brokerFailures = 0;
        this.counters.reconnects++;
      }
      return message;
    } catch (error) {
      const classified = classifyError(error);
      if (!(classified instanceof BrokerUnavailableError)) {
        throw classified;
      }

      const { baseDelayMs, maxDelayMs, jitter } = this.options.reconnect;
      const delayMs = calculateBackoffDelay(this.brokerFailures, baseDelayMs, maxDelayMs, jitter ?? true);
      this.brokerFailures++;
      console.warn(`[Worker] Broker unavailable (${classified.message}), retrying in ${delayMs}ms`);
      await this.wait(delayMs);
      return null;
    }
  }

  private async handleMessage(message: QueueMessage): Promise<Decision> {
    this.setState(WorkerState.PROCESSING);

    let item: WorkItem;
    try {
      item = parseWorkItem(message.body);
    } catch (error) {
      const classified = classifyError(error);
      console.error(`[Worker] Dropping message ${message.delivery_tag}: ${classified.message}`);
      return { action: AckAction.ACK_AFTER_FAILURE, reason: classified.message };
    }

    console.log(
      `[Worker] Processing job ${item.job_id} (${item.object_key}, delivery ${message.delivery_count})`
    );

    let text: string;
    try {
      const transcript = await this.invoker.invoke(item);
      text = transcript.text;
    } catch (error) {
      const classified = classifyError(error);

      if (classified.retryable) {
        const delayMs = this.requeueDelay(message);
        console.warn(
          `[Worker] Job ${item.job_id} failed transiently, requeueing in ${delayMs}ms: ${classified.message}`
        );
        return { action: AckAction.NACK_REQUEUE, reason: classified.message, delayMs };
      }

      console.error(`[Worker] Job ${item.job_id} failed permanently: ${classified.name}: ${classified.message}`);
      await this.deliver(failureResult(item, classified));
      return { action: AckAction.ACK_AFTER_FAILURE, reason: classified.message };
    }

    const outcome = await this.deliver({
      job_id: item.job_id,
      object_key: item.object_key,
      reference: item.reference,
      text,
      status: TranscriptStatus.SUCCESS,
    });

    if (outcome === DeliveryOutcome.DELIVERED) {
      return { action: AckAction.ACK, reason: 'delivered' };
    }
    return { action: AckAction.ACK_AFTER_FAILURE, reason: `delivery ${outcome}` };
  }

  private async deliver(result: TranscriptResult): Promise<DeliveryOutcome> {
    this.setState(WorkerState.DELIVERING);

    const outcome = await this.delivery.deliver(result);
    if (outcome === DeliveryOutcome.DELIVERED) {
      this.counters.delivered++;
    } else {
      this.counters.deliveryFailures++;
    }
    return outcome;
  }

  private async settle(message: QueueMessage, decision: Decision): Promise<void> {
    this.setState(WorkerState.ACKNOWLEDGING);

    try {
      if (decision.action === AckAction.NACK_REQUEUE) {
        await this.adapters.queue.nack(message, decision.reason, decision.delayMs ?? 0);
        this.counters.nacked++;
      } else {
        await this.adapters.queue.ack(message);
        this.counters.acked++;
        if (decision.action === AckAction.ACK_AFTER_FAILURE) {
          this.counters.dropped++;
        }
      }
      console.log(`[Worker] Message ${message.delivery_tag}: ${decision.action} (${decision.reason})`);
    } catch (error) {
      // Unsettled messages go back to the queue once their lock lapses
      console.error(
        `[Worker] Could not ${decision.action} message ${message.delivery_tag}: ${classifyError(error).message}`
      );
    }
  }

  private requeueDelay(message: QueueMessage): number {
    const { baseDelayMs, maxDelayMs, jitter } = this.options.requeue;
    return calculateBackoffDelay(message.delivery_count - 1, baseDelayMs, maxDelayMs, jitter ?? true);
  }

  private setState(state: WorkerState): void {
    this.state = state;
  }

  /**
   * Sleep that stop() cuts short
   */
  private async wait(ms: number): Promise<void> {
    if (this.options.sleep) {
      await this.options.sleep(ms);
      return;
    }

    try {
      await delay(ms, undefined, { signal: this.shutdown.signal });
    } catch (error) {
      if (!this.shutdown.signal.aborted) throw error;
    }
  }
}

export function failureResult(item: WorkItem, error: PipelineError): TranscriptResult {
  return {
    job_id: item.job_id,
    object_key: item.object_key,
    reference: item.reference,
    text: '',
    status: TranscriptStatus.FAILURE,
    error_detail: `${error.name}: ${error.message}`,
  };
}
