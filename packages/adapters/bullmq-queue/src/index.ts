/**
 * Queue Adapter using Redis + BullMQ
 *
 * Implements the QueuePort interface on top of a durable BullMQ queue.
 *
 * Consumption is manual: the worker pulls one job at a time with
 * Worker.getNextJob() and settles it explicitly, so a job is never marked
 * complete before the worker says so. While a job is held its lock is renewed;
 * if the worker dies the lock lapses and the stalled-job checker puts the job
 * back in the wait list for another worker. A nacked job is moved to the
 * delayed set in one step and returns to the wait list once its delay passes.
 *
 * Two Redis connections are used. The blocking one behind the Worker retries
 * forever, as BullMQ requires. Publishing and broker checks go over a
 * fail-fast connection with no offline queue, and are additionally bounded by
 * commandTimeoutMs, so an unreachable broker surfaces as
 * BrokerUnavailableError instead of a call that never settles.
 */

import { randomUUID } from 'crypto';
import { Queue, Worker, type Job } from 'bullmq';
import { Redis } from 'ioredis';
import {
  type QueuePort,
  type QueueStats,
  type QueueConfig,
  type QueueMessage,
  type WorkItem,
  type PipelineError,
  BrokerUnavailableError,
  classifyError,
  networkErrorCode,
  serializeWorkItem,
} from '@batchscribe/domain';

const JOB_NAME = 'transcribe';

const BROKER_CONNECTION_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'EPIPE', 'ENOTFOUND', 'EAI_AGAIN']);

const BROKER_CONNECTION_MESSAGES = /connection is closed|stream isn't writeable|max retries per request/i;

export interface BullMQQueueConfig {
  /** Redis host */
  host: string;

  /** Redis port */
  port: number;

  /** Redis password (optional) */
  password?: string;

  /** Redis database number */
  db?: number;

  /** Queue name */
  queueName: string;

  /** Lock duration for a held job in ms; renewed at half this interval */
  lockDurationMs?: number;

  /** Seconds a fetch blocks waiting for a job before returning empty */
  drainDelaySeconds?: number;

  /** Times a job may be recovered from a dead worker before BullMQ fails it */
  maxStalledCount?: number;

  /** Completed jobs retained for inspection */
  keepCompleted?: number;

  /** Upper bound on a publish or broker check before it is reported unavailable */
  commandTimeoutMs?: number;
}

interface HeldJob {
  job: Job<WorkItem>;
  token: string;
  lockTimer: NodeJS.Timeout;
}

/**
 * Queue adapter using Redis/BullMQ
 */
export class BullMQQueueAdapter implements QueuePort {
  private config: Required<Omit<BullMQQueueConfig, 'password'>> & { password?: string };
  private connection: Redis | null = null;
  private publisher: Redis | null = null;
  private queue: Queue<WorkItem> | null = null;
  private worker: Worker<WorkItem> | null = null;
  private held = new Map<string, HeldJob>();
  private readonly consumerId = randomUUID();
  private fetchCount = 0;

  constructor(config: BullMQQueueConfig) {
    this.config = {
      db: 0,
      lockDurationMs: 30000,
      drainDelaySeconds: 5,
      maxStalledCount: 1000,
      keepCompleted: 1000,
      commandTimeoutMs: 5000,
      ...config,
    };
  }

  /**
   * Initialize Redis connection and queue
   */
  async initialize(): Promise<void> {
    const target = {
      host: this.config.host,
      port: this.config.port,
      password: this.config.password,
      db: this.config.db,
    };

    this.connection = new Redis({
      ...target,
      maxRetriesPerRequest: null, // Required for BullMQ workers
    });
    this.publisher = new Redis({
      ...target,
      enableOfflineQueue: false,
      maxRetriesPerRequest: 1,
    });

    for (const client of [this.connection, this.publisher]) {
      client.on('error', (err) => {
        console.error('[BullMQ] Redis connection error:', err.message);
      });
    }

    this.queue = new Queue<WorkItem>(this.config.queueName, { connection: this.publisher });

    console.log(
      `[BullMQ] Connected to Redis at ${this.config.host}:${this.config.port} (queue=${this.config.queueName})`
    );
  }

  // ==================== Publishing ====================

  async publish(item: WorkItem): Promise<void> {
    if (!this.queue) {
      throw new Error('[BullMQ] Queue not initialized');
    }

    try {
      await this.withTimeout(
        this.queue.add(JOB_NAME, item, {
          jobId: item.job_id,
          removeOnComplete: { count: this.config.keepCompleted },
          removeOnFail: false,
        }),
        'publish'
      );
    } catch (error) {
      throw toBrokerError(error, 'publish');
    }

    console.log(`[BullMQ] Enqueued job ${item.job_id} for ${item.object_key}`);
  }

  // ==================== Consumption ====================

  async fetch(): Promise<QueueMessage | null> {
    if (this.held.size > 0) {
      throw new Error('[BullMQ] Previous message is still unacknowledged');
    }

    // The blocking connection waits out an outage silently; check first
    try {
      await this.withTimeout(this.ping(), 'fetch');
    } catch (error) {
      throw toBrokerError(error, 'fetch');
    }

    const worker = await this.ensureWorker();
    const token = `${this.consumerId}:${++this.fetchCount}`;

    let job: Job<WorkItem> | undefined;
    try {
      job = await worker.getNextJob(token, { block: true });
    } catch (error) {
      throw toBrokerError(error, 'fetch');
    }

    if (!job?.id) {
      return null;
    }

    const deliveryTag = job.id;
    const heldJob = job;
    const lockTimer = setInterval(async () => {
      try {
        await heldJob.extendLock(token, this.config.lockDurationMs);
      } catch (error) {
        console.error(`[BullMQ] Failed to extend lock for job ${deliveryTag}:`, error);
      }
    }, Math.max(500, Math.floor(this.config.lockDurationMs / 2)));
    lockTimer.unref();

    this.held.set(deliveryTag, { job, token, lockTimer });

    // attemptsStarted counts every move to active: delayed retries and stalled recoveries alike
    const deliveries = Math.max(job.attemptsStarted, job.attemptsMade + 1);

    return {
      delivery_tag: deliveryTag,
      redelivered: deliveries > 1,
      delivery_count: deliveries,
      body: serializeWorkItem(job.data),
    };
  }

  // ==================== Acknowledgment ====================

  async ack(message: QueueMessage): Promise<void> {
    const { job, token } = this.release(message);

    try {
      await job.moveToCompleted('acknowledged', token, false);
    } catch (error) {
      throw toBrokerError(error, 'ack');
    }
  }

  async nack(message: QueueMessage, reason: string, delayMs: number = 0): Promise<void> {
    const { job, token } = this.release(message);

    try {
      await job.moveToDelayed(Date.now() + delayMs, token);
    } catch (error) {
      throw toBrokerError(error, 'nack');
    }

    console.log(`[BullMQ] Requeued job ${message.delivery_tag} in ${delayMs}ms (${reason})`);
  }

  // ==================== Queue Statistics ====================

  async getStats(): Promise<QueueStats> {
    if (!this.queue) {
      throw new Error('[BullMQ] Queue not initialized');
    }

    const [waiting, active, completed, failed, delayed] = await Promise.all([
      this.queue.getWaitingCount(),
      this.queue.getActiveCount(),
      this.queue.getCompletedCount(),
      this.queue.getFailedCount(),
      this.queue.getDelayedCount(),
    ]);

    return { waiting, active, completed, failed, delayed };
  }

  // ==================== Health & Cleanup ====================

  async healthCheck(): Promise<boolean> {
    if (!this.publisher) return false;

    try {
      const result = await this.withTimeout(this.ping(), 'health check');
      return result === 'PONG';
    } catch (error) {
      console.error('[BullMQ] Health check failed:', error);
      return false;
    }
  }

  async close(): Promise<void> {
    for (const { lockTimer } of this.held.values()) {
      clearInterval(lockTimer);
    }
    this.held.clear();

    if (this.worker) {
      await this.worker.close();
      this.worker = null;
    }

    if (this.queue) {
      await this.queue.close();
      this.queue = null;
    }

    if (this.publisher) {
      await this.publisher.quit();
      this.publisher = null;
    }

    if (this.connection) {
      await this.connection.quit();
      this.connection = null;
    }

    console.log('[BullMQ] Closed all connections');
  }

  private async ensureWorker(): Promise<Worker<WorkItem>> {
    if (this.worker) return this.worker;

    if (!this.connection) {
      throw new Error('[BullMQ] Connection not initialized');
    }

    // No processor: jobs are pulled one at a time with getNextJob()
    const worker = new Worker<WorkItem>(this.config.queueName, null, {
      connection: this.connection,
      autorun: false,
      lockDuration: this.config.lockDurationMs,
      drainDelay: this.config.drainDelaySeconds,
      maxStalledCount: this.config.maxStalledCount,
    });

    worker.on('error', (err) => {
      console.error('[BullMQ] Worker error:', err);
    });

    this.worker = worker;
    await worker.startStalledCheckTimer();

    console.log(`[BullMQ] Consumer ${this.consumerId} ready on ${this.config.queueName}`);
    return worker;
  }

  private async ping(): Promise<string> {
    if (!this.publisher) {
      throw new Error('[BullMQ] Connection not initialized');
    }
    return this.publisher.ping();
  }

  private async withTimeout<T>(operation: Promise<T>, action: string): Promise<T> {
    const timeoutMs = this.config.commandTimeoutMs;
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new BrokerUnavailableError(`[BullMQ] ${action} got no answer from Redis within ${timeoutMs}ms`));
      }, timeoutMs);
    });

    try {
      return await Promise.race([operation, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private release(message: QueueMessage): HeldJob {
    const heldJob = this.held.get(message.delivery_tag);
    if (!heldJob) {
      throw new Error(`[BullMQ] Unknown delivery tag ${message.delivery_tag}`);
    }

    clearInterval(heldJob.lockTimer);
    this.held.delete(message.delivery_tag);
    return heldJob;
  }
}

function toBrokerError(error: unknown, action: string): PipelineError {
  const code = networkErrorCode(error);
  const message = error instanceof Error ? error.message : String(error);

  if ((code && BROKER_CONNECTION_CODES.has(code)) || BROKER_CONNECTION_MESSAGES.test(message)) {
    return new BrokerUnavailableError(`[BullMQ] ${action} failed: ${message}`, { cause: error });
  }

  return classifyError(error);
}

/**
 * Create queue adapter from loaded configuration
 */
export function createBullMQQueueAdapter(config: QueueConfig): BullMQQueueAdapter {
  return new BullMQQueueAdapter({
    host: config.host,
    port: config.port,
    password: config.password,
    db: config.db,
    queueName: config.queueName,
    lockDurationMs: config.lockDurationMs,
  });
}
