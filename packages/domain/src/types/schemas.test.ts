import { describe, it, expect } from 'vitest';
import { parseTranscriptResult, parseWorkItem, serializeWorkItem } from './schemas.js';
import { PermanentError } from '../errors.js';
import { TranscriptStatus } from './enums.js';
import { isReferenceExpired, referenceDeadline, type WorkItem } from './entities.js';

const item: WorkItem = {
  job_id: 'job-1',
  object_key: 'audio/a.wav',
  reference: 'https://media.storage.test/audio/a.wav?X-Amz-Expires=3600',
  enqueued_at: '2026-01-01T00:00:00.000Z',
  validity_window_seconds: 3600,
};

describe('parseWorkItem', () => {
  it('should read back a serialized work item', () => {
    const parsed = parseWorkItem(serializeWorkItem(item));

    expect(parsed).toEqual(item);
    expect(Object.isFrozen(parsed)).toBe(true);
  });

  it('should reject invalid JSON as permanent', () => {
    expect(() => parseWorkItem('{not json')).toThrow(PermanentError);
    expect(() => parseWorkItem('{not json')).toThrow('Message body is not valid JSON: {not json');
  });

  it('should list schema violations', () => {
    const body = JSON.stringify({ ...item, reference: 'not a url', validity_window_seconds: -5 });

    expect(() => parseWorkItem(body)).toThrow(
      'Message body is not a work item: reference: Invalid url; validity_window_seconds: Number must be greater than 0'
    );
  });

  it('should reject unknown fields', () => {
    expect(() => parseWorkItem(JSON.stringify({ ...item, extra: true }))).toThrow(PermanentError);
  });
});

describe('parseTranscriptResult', () => {
  it('should accept a result and reject other shapes', () => {
    const result = {
      job_id: 'job-1',
      object_key: 'audio/a.wav',
      reference: item.reference,
      text: 'hello',
      status: TranscriptStatus.SUCCESS,
    };

    expect(parseTranscriptResult(result)).toEqual(result);
    expect(parseTranscriptResult({ text: 'hello' })).toBeNull();
  });
});

describe('reference validity', () => {
  it('should compute the deadline from the enqueue time', () => {
    expect(referenceDeadline(item).toISOString()).toBe('2026-01-01T01:00:00.000Z');
  });

  it('should treat the deadline itself as expired', () => {
    expect(isReferenceExpired(item, new Date('2026-01-01T00:59:59.999Z'))).toBe(false);
    expect(isReferenceExpired(item, new Date('2026-01-01T01:00:00.000Z'))).toBe(true);
  });
});
