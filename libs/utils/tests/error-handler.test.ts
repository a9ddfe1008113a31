import { describe, it, expect } from 'vitest';
import { getErrorCode, getErrorMessage, HttpError, isAbortError } from '../src/error-handler.js';

describe('error-handler.ts', () => {
  describe('getErrorMessage', () => {
    it('should return the message of an Error', () => {
      expect(getErrorMessage(new Error('boom'))).toBe('boom');
    });

    it('should return strings unchanged', () => {
      expect(getErrorMessage('plain failure')).toBe('plain failure');
    });

    it('should fall back for anything else', () => {
      expect(getErrorMessage({ code: 42 })).toBe('Unknown error');
    });
  });

  describe('isAbortError', () => {
    it('should detect AbortError and TimeoutError', () => {
      const abort = new Error('aborted');
      abort.name = 'AbortError';
      const timeout = new Error('timed out');
      timeout.name = 'TimeoutError';

      expect(isAbortError(abort)).toBe(true);
      expect(isAbortError(timeout)).toBe(true);
      expect(isAbortError(new Error('other'))).toBe(false);
    });
  });

  describe('HttpError', () => {
    it('should carry status and url in its message', () => {
      const error = new HttpError(503, 'http://kuma.lan/api/status-page/default', 'Service Unavailable');

      expect(error.status).toBe(503);
      expect(error.url).toBe('http://kuma.lan/api/status-page/default');
      expect(error.message).toBe(
        'HTTP 503 Service Unavailable from http://kuma.lan/api/status-page/default'
      );
      expect(error.name).toBe('HttpError');
    });
  });

  describe('getErrorCode', () => {
    it('should read string codes only', () => {
      expect(getErrorCode(Object.assign(new Error('x'), { code: 'ENOENT' }))).toBe('ENOENT');
      expect(getErrorCode({ code: 7 })).toBeUndefined();
      expect(getErrorCode(null)).toBeUndefined();
    });
  });
});
