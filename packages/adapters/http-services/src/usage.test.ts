import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { InvocationOutcome, TransientError, type UsageRecord } from '@batchscribe/domain';
import { HttpUsageReporter, LoggingUsageReporter, createUsageReporter } from './usage.js';

const usage: UsageRecord = {
  job_id: 'job-1',
  object_key: 'calls/a.wav',
  engine: 'http',
  invoked_at: '2026-01-01T00:00:00.000Z',
  duration_ms: 1200,
  outcome: InvocationOutcome.SUCCESS,
};

describe('HttpUsageReporter', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    fetchMock.mockReset();
  });

  it('should post the record to the collector', async () => {
    fetchMock.mockResolvedValueOnce(new Response(null, { status: 204 }));

    await new HttpUsageReporter('http://metering:9000/').record(usage);

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://metering:9000/v1/usage');
    expect(JSON.parse(String(init?.body))).toEqual(usage);
  });

  it('should surface collector failures to the caller', async () => {
    fetchMock.mockResolvedValueOnce(new Response('down', { status: 500 }));

    await expect(new HttpUsageReporter('http://metering:9000').record(usage)).rejects.toBeInstanceOf(
      TransientError
    );
  });
});

describe('createUsageReporter', () => {
  it('should log usage when no collector is configured', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const reporter = createUsageReporter(undefined);

    await reporter.record(usage);

    expect(reporter).toBeInstanceOf(LoggingUsageReporter);
    expect(log).toHaveBeenCalledWith('[Usage] job=job-1 engine=http outcome=success duration=1200ms');
    log.mockRestore();
  });

  it('should use the collector when a URL is set', () => {
    expect(createUsageReporter('http://metering:9000')).toBeInstanceOf(HttpUsageReporter);
  });
});
