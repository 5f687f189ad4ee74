import { describe, it, expect } from 'vitest';
import { parseRunRequest } from './schemas.js';
import { ConfigurationError } from '../utils/error-handler.js';

describe('parseRunRequest', () => {
  it('should accept and trim a valid request', () => {
    const request = parseRunRequest({ fileNumber: ' 09853537 ', requestId: 'dp-20261018-1', deadlineMs: 1000 });
    expect(request).toEqual({ fileNumber: '09853537', requestId: 'dp-20261018-1', deadlineMs: 1000 });
    expect(Object.isFrozen(request)).toBe(true);
  });

  it('should reject a missing file number', () => {
    expect(() => parseRunRequest({ requestId: 'req-1', deadlineMs: 1000 })).toThrow(ConfigurationError);
  });

  it('should reject request ids that could escape the output directory', () => {
    expect(() => parseRunRequest({ fileNumber: '1', requestId: '../etc', deadlineMs: 1000 })).toThrow(ConfigurationError);
    expect(() => parseRunRequest({ fileNumber: '1', requestId: '..', deadlineMs: 1000 })).toThrow('must not be a relative path segment');
  });

  it('should reject a non-positive deadline', () => {
    expect(() => parseRunRequest({ fileNumber: '1', requestId: 'req-1', deadlineMs: 0 })).toThrow(ConfigurationError);
  });
});
