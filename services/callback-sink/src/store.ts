import { parseTranscriptResult, type TranscriptResult } from '@batchscribe/domain';

export type QueryArgs = Record<string, string | string[]>;

/**
 * One request captured by the sink, as listed by GET /
 */
export interface RecordedRequest {
  text: string;
  args: QueryArgs;
  headers: Record<string, string | string[] | undefined>;
  method: string;

  /** Unix time in seconds */
  time: number;

  remote_addr: string;
}

/**
 * Keeps the most recent requests (newest first) and the latest transcript
 * posted for each job. A duplicate delivery replaces the earlier copy. Both
 * are capped at maxRequests; the job delivered longest ago is evicted first.
 */
export class RequestStore {
  private requests: RecordedRequest[] = [];
  private transcripts = new Map<string, TranscriptResult>();

  constructor(private readonly maxRequests: number = 100) {}

  record(request: RecordedRequest): void {
    this.requests.unshift(request);
    if (this.requests.length > this.maxRequests) {
      this.requests.length = this.maxRequests;
    }

    const transcript = parseTranscript(request.text);
    if (transcript) {
      // Re-inserting moves the job to the back of the eviction order
      this.transcripts.delete(transcript.job_id);
      this.transcripts.set(transcript.job_id, transcript);

      for (const jobId of this.transcripts.keys()) {
        if (this.transcripts.size <= this.maxRequests) break;
        this.transcripts.delete(jobId);
      }
    }
  }

  listRequests(): RecordedRequest[] {
    return [...this.requests];
  }

  /** Latest transcript per job, least recently delivered first */
  listTranscripts(): TranscriptResult[] {
    return [...this.transcripts.values()];
  }

  getTranscript(jobId: string): TranscriptResult | undefined {
    return this.transcripts.get(jobId);
  }
}

function parseTranscript(text: string): TranscriptResult | null {
  try {
    return parseTranscriptResult(JSON.parse(text));
  } catch {
    // Not JSON: kept as a plain request only
    return null;
  }
}
