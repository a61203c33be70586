import type { ASREngine } from '../types/enums.js';

/**
 * ASR (Automatic Speech Recognition) port interface
 *
 * Production: HTTP engine adapter
 * Local: Stub adapter for development
 *
 * Implementations throw errors from the pipeline taxonomy (TransientError,
 * PermanentError, ReferenceExpiredError) so the worker can decide between
 * redelivery and dropping the item.
 */
export interface ASRPort {
  /**
   * Initialize the ASR engine connection
   */
  initialize(): Promise<void>;

  /**
   * Get the engine type
   */
  getEngine(): ASREngine;

  /**
   * Transcribe the audio behind a time-bounded reference
   */
  transcribe(reference: string, options: TranscribeOptions): Promise<ASRTranscript>;

  /**
   * Health check
   */
  healthCheck(): Promise<boolean>;

  /**
   * Close connection
   */
  close(): Promise<void>;
}

export interface TranscribeOptions {
  /** Job the request belongs to (for engine-side logs) */
  jobId: string;

  /** Language hint */
  language: string;

  /** The reference stops resolving at this instant */
  deadline: Date;
}

export interface ASRTranscript {
  text: string;

  /** Audio duration in ms, when the engine reports it */
  duration_ms?: number;
}
