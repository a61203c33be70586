/**
 * ASR Adapter Factory
 *
 * Creates the appropriate ASR adapter based on configuration.
 */

import { z } from 'zod';
import {
  type ASRPort,
  type ASRConfig,
  type ASRTranscript,
  type TranscribeOptions,
  ASREngine,
  PermanentError,
  ReferenceExpiredError,
  classifyError,
} from '@batchscribe/domain';
import { bearer, joinUrl, sendRequest } from './http.js';

const TRANSCRIBE_RESPONSE = z.object({
  text: z.string(),
  duration_ms: z.number().nonnegative().optional(),
});

export interface HttpASRConfig {
  /** Base URL of the engine (e.g., http://asr:8000) */
  endpoint: string;

  /** Sent as a bearer token when set */
  apiKey?: string;

  /** Upper bound for one transcription request; the reference deadline may cut it shorter */
  timeoutMs: number;
}

/**
 * Create ASR adapter based on loaded configuration
 */
export function createASRAdapter(config: ASRConfig): ASRPort {
  if (config.engine === ASREngine.STUB) {
    return new StubASRAdapter();
  }

  if (!config.endpoint) {
    throw new Error('[ASR/Http] ASR_ENDPOINT not configured');
  }

  return new HttpASRAdapter({
    endpoint: config.endpoint,
    apiKey: config.apiKey,
    timeoutMs: config.timeoutMs,
  });
}

/**
 * Client for an ASR engine reached over request/response HTTP.
 * The engine fetches the audio itself from the reference URL.
 */
export class HttpASRAdapter implements ASRPort {
  constructor(private readonly config: HttpASRConfig) {}

  async initialize(): Promise<void> {
    console.log(`[ASR/Http] Using engine at ${this.config.endpoint} (timeout=${this.config.timeoutMs}ms)`);
  }

  getEngine(): ASREngine {
    return ASREngine.HTTP;
  }

  async transcribe(reference: string, options: TranscribeOptions): Promise<ASRTranscript> {
    const remainingMs = options.deadline.getTime() - Date.now();
    if (remainingMs <= 0) {
      throw new ReferenceExpiredError(
        `Reference for job ${options.jobId} expired at ${options.deadline.toISOString()}`
      );
    }

    const response = await sendRequest(
      joinUrl(this.config.endpoint, '/v1/transcribe'),
      {
        body: { url: reference, language: options.language, job_id: options.jobId },
        headers: bearer(this.config.apiKey),
        timeoutMs: Math.min(this.config.timeoutMs, remainingMs),
      },
      'ASR engine'
    );

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      if (error instanceof SyntaxError) {
        throw new PermanentError(`ASR engine returned malformed JSON for job ${options.jobId}`, response.status, {
          cause: error,
        });
      }
      // Connection reset or timeout while the body was streaming
      throw classifyError(error);
    }

    const parsed = TRANSCRIBE_RESPONSE.safeParse(payload);
    if (!parsed.success) {
      throw new PermanentError(
        `ASR engine returned a malformed transcript for job ${options.jobId}: ${parsed.error.issues[0]?.message}`,
        response.status
      );
    }

    return parsed.data;
  }

  async healthCheck(): Promise<boolean> {
    try {
      await sendRequest(joinUrl(this.config.endpoint, '/health'), { method: 'GET', timeoutMs: 5000 }, 'ASR engine');
      return true;
    } catch (error) {
      console.error('[ASR/Http] Health check failed:', error);
      return false;
    }
  }

  async close(): Promise<void> {
    console.log('[ASR/Http] Closed');
  }
}

/**
 * Stub ASR adapter for local development.
 * Answers instantly with a transcript naming the referenced object.
 */
export class StubASRAdapter implements ASRPort {
  async initialize(): Promise<void> {
    console.log('[ASR/Stub] Initialized');
  }

  getEngine(): ASREngine {
    return ASREngine.STUB;
  }

  async transcribe(reference: string, options: TranscribeOptions): Promise<ASRTranscript> {
    const objectKey = decodeURIComponent(new URL(reference).pathname.replace(/^\//, ''));

    return {
      text: `[stub ${options.language}] transcript of ${objectKey}`,
      duration_ms: 0,
    };
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    console.log('[ASR/Stub] Closed');
  }
}
