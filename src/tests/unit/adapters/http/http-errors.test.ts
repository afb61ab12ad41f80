/**
 * Unit tests for toDeliveryError
 */

import { AxiosError, AxiosHeaders, AxiosResponse } from 'axios';
import { toDeliveryError } from '../../../../adapters/http/http-errors';
import { PermanentDeliveryError, TransientDeliveryError, ValidationError } from '../../../../types/RecoveryErrors';

function httpError(status: number): AxiosError {
  const response: AxiosResponse = {
    data: {},
    status,
    statusText: 'test',
    headers: {},
    config: { headers: new AxiosHeaders() },
  };
  return new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', undefined, undefined, response);
}

describe('toDeliveryError', () => {
  it('treats a request with no response as transient', () => {
    const error = toDeliveryError(new AxiosError('timeout of 5000ms exceeded', 'ECONNABORTED'), 'SMS send');

    expect(error).toBeInstanceOf(TransientDeliveryError);
    expect(error.message).toBe('SMS send failed: timeout of 5000ms exceeded');
    expect(error.error_code).toBe('ECONNABORTED');
    expect(error.retryable).toBe(true);
  });

  it.each([500, 503, 429])('treats HTTP %i as transient', (status) => {
    const error = toDeliveryError(httpError(status), 'SMS send');

    expect(error).toBeInstanceOf(TransientDeliveryError);
    expect(error.message).toBe(`SMS send failed with HTTP ${status}`);
    expect(error.error_code).toBe(`HTTP_${status}`);
  });

  it.each([400, 404, 422])('treats HTTP %i as permanent', (status) => {
    const error = toDeliveryError(httpError(status), 'Draft request');

    expect(error).toBeInstanceOf(PermanentDeliveryError);
    expect(error.message).toBe(`Draft request rejected with HTTP ${status}`);
    expect(error.retryable).toBe(false);
  });

  it('passes recovery errors through unchanged', () => {
    const original = new ValidationError('bad number');

    expect(toDeliveryError(original, 'SMS send')).toBe(original);
  });

  it('wraps anything else as transient', () => {
    const error = toDeliveryError(new Error('socket hang up'), 'Reply scoring');

    expect(error).toBeInstanceOf(TransientDeliveryError);
    expect(error.message).toBe('Reply scoring failed: socket hang up');
    expect(error.error_code).toBe('DOWNSTREAM_ERROR');
  });
});
