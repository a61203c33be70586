import type { TranscriptResult } from '../types/entities.js';

/**
 * Result sink port interface
 *
 * Receives finished transcripts. The sink must tolerate duplicate deliveries:
 * upstream guarantees are at-least-once.
 */
export interface ResultSinkPort {
  /**
   * Deliver one result. Throws TransientError or PermanentError on failure.
   */
  deliver(result: TranscriptResult): Promise<void>;

  /**
   * Close connection
   */
  close(): Promise<void>;
}
