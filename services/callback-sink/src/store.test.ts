import { describe, it, expect } from 'vitest';
import { TranscriptStatus, type TranscriptResult } from '@batchscribe/domain';
import { RequestStore, type RecordedRequest } from './store.js';

function transcript(jobId: string, text: string = `text of ${jobId}`): TranscriptResult {
  return {
    job_id: jobId,
    object_key: `${jobId}.wav`,
    reference: `https://media.storage.test/${jobId}.wav`,
    text,
    status: TranscriptStatus.SUCCESS,
  };
}

function request(text: string): RecordedRequest {
  return { text, args: {}, headers: {}, method: 'POST', time: 1772366400, remote_addr: '127.0.0.1' };
}

describe('RequestStore', () => {
  it('should keep no more transcripts than requests, evicting the oldest job', () => {
    const store = new RequestStore(2);

    for (const jobId of ['job-1', 'job-2', 'job-3']) {
      store.record(request(JSON.stringify(transcript(jobId))));
    }

    expect(store.listTranscripts().map((result) => result.job_id)).toEqual(['job-2', 'job-3']);
    expect(store.getTranscript('job-1')).toBeUndefined();
    expect(store.listRequests()).toHaveLength(2);
  });

  it('should count a redelivered job as the most recent', () => {
    const store = new RequestStore(2);

    store.record(request(JSON.stringify(transcript('job-1'))));
    store.record(request(JSON.stringify(transcript('job-2'))));
    store.record(request(JSON.stringify(transcript('job-1', 'second copy'))));
    store.record(request(JSON.stringify(transcript('job-3'))));

    expect(store.listTranscripts().map((result) => result.job_id)).toEqual(['job-1', 'job-3']);
    expect(store.getTranscript('job-1')?.text).toBe('second copy');
  });

  it('should not index bodies that are not transcripts', () => {
    const store = new RequestStore(2);

    store.record(request('plain text'));
    store.record(request('{"hello":"world"}'));

    expect(store.listTranscripts()).toEqual([]);
    expect(store.listRequests().map((recorded) => recorded.text)).toEqual(['{"hello":"world"}', 'plain text']);
  });
});
