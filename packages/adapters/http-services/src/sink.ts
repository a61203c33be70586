import type { ResultSinkPort, TranscriptResult } from '@batchscribe/domain';
import { bearer, sendRequest } from './http.js';

export interface HttpResultSinkConfig {
  /** Base URL results are posted to */
  baseUrl: string;

  timeoutMs: number;

  authToken?: string;
}

/**
 * Posts transcripts to an HTTP receiver.
 *
 * The job id and status travel as query arguments (?id=...&status=...), the
 * transcript itself as a JSON body.
 */
export class HttpResultSink implements ResultSinkPort {
  constructor(private readonly config: HttpResultSinkConfig) {}

  async deliver(result: TranscriptResult): Promise<void> {
    const url = new URL(this.config.baseUrl);
    url.searchParams.set('id', result.job_id);
    url.searchParams.set('status', result.status);

    await sendRequest(
      url.toString(),
      {
        method: 'POST',
        body: result,
        headers: bearer(this.config.authToken),
        timeoutMs: this.config.timeoutMs,
      },
      'Result sink'
    );
  }

  async close(): Promise<void> {
    console.log('[Sink/Http] Closed');
  }
}
