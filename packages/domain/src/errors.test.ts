import { describe, it, expect } from 'vitest';
import {
  AccessError,
  BrokerUnavailableError,
  NotFoundError,
  PermanentError,
  ReferenceExpiredError,
  TransientError,
  classifyError,
  errorFromHttpResponse,
  isRetryable,
  networkErrorCode,
} from './errors.js';
import { FailureClassification } from './types/enums.js';

describe('error taxonomy', () => {
  it('should classify retryable and non-retryable classes', () => {
    expect(new TransientError('x').classification).toBe(FailureClassification.RETRYABLE);
    expect(new BrokerUnavailableError('x').retryable).toBe(true);
    expect(new PermanentError('x').retryable).toBe(false);
    expect(new ReferenceExpiredError('x').retryable).toBe(false);
    expect(new AccessError('x').retryable).toBe(false);
    expect(new NotFoundError('x').retryable).toBe(false);
  });

  it('should name errors after their class', () => {
    expect(new ReferenceExpiredError('gone').name).toBe('ReferenceExpiredError');
    expect(new ReferenceExpiredError('gone')).toBeInstanceOf(PermanentError);
  });
});

describe('errorFromHttpResponse', () => {
  it.each([408, 425, 429, 500, 502, 503])('should treat %i as transient', (status) => {
    const error = errorFromHttpResponse(status, '', '[ASR]');
    expect(error).toBeInstanceOf(TransientError);
    expect(error.message).toBe(`[ASR] responded ${status}`);
  });

  it('should treat 410 as an expired reference', () => {
    expect(errorFromHttpResponse(410, 'gone', '[ASR]')).toBeInstanceOf(ReferenceExpiredError);
  });

  it('should detect expiry mentioned in a 400 body', () => {
    const error = errorFromHttpResponse(400, 'fetch_data: Request has expired', '[ASR]');
    expect(error).toBeInstanceOf(ReferenceExpiredError);
    expect(error.message).toBe('[ASR] responded 400: fetch_data: Request has expired');
  });

  it('should map auth and missing resources', () => {
    expect(errorFromHttpResponse(403, 'forbidden', '[Sink]')).toBeInstanceOf(AccessError);
    expect(errorFromHttpResponse(404, '', '[Sink]')).toBeInstanceOf(NotFoundError);
  });

  it('should treat other 4xx as permanent with status code', () => {
    const error = errorFromHttpResponse(422, 'bad audio', '[ASR]');
    expect(error).toBeInstanceOf(PermanentError);
    expect(error).not.toBeInstanceOf(ReferenceExpiredError);
    expect(error).toMatchObject({ statusCode: 422 });
  });
});

describe('classifyError', () => {
  it('should pass taxonomy errors through untouched', () => {
    const original = new PermanentError('bad');
    expect(classifyError(original)).toBe(original);
  });

  it('should treat timeouts as transient', () => {
    const timeout = new Error('The operation was aborted due to timeout');
    timeout.name = 'TimeoutError';
    expect(classifyError(timeout)).toBeInstanceOf(TransientError);
  });

  it('should read network codes from the error cause', () => {
    const socketError = Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' });
    const fetchError = new TypeError('fetch failed', { cause: socketError });

    expect(networkErrorCode(fetchError)).toBe('ECONNREFUSED');
    expect(classifyError(fetchError)).toBeInstanceOf(TransientError);
    expect(classifyError(fetchError).message).toBe('Network error (ECONNREFUSED): fetch failed');
  });

  it('should treat media problems as permanent', () => {
    expect(classifyError(new Error('Unsupported codec in stream'))).toBeInstanceOf(PermanentError);
  });

  it('should default unknown failures to transient', () => {
    const classified = classifyError('something odd');
    expect(classified).toBeInstanceOf(TransientError);
    expect(classified.message).toBe('something odd');
    expect(isRetryable(new Error('boom'))).toBe(true);
  });
});
