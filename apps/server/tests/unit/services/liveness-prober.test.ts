import { describe, it, expect } from 'vitest';
import {
  GET_TIMEOUT_MS,
  HEAD_TIMEOUT_MS,
  LivenessProber,
  normalizeUrl,
} from '@/services/liveness-prober.js';
import { FakeHttp } from '../../helpers/fake-http.js';

describe('liveness-prober.ts', () => {
  describe('normalizeUrl', () => {
    it('should add http:// to a bare host', () => {
      expect(normalizeUrl('192.168.1.5')).toBe('http://192.168.1.5');
    });

    it('should keep an existing scheme', () => {
      expect(normalizeUrl('https://nas.lan:5001')).toBe('https://nas.lan:5001');
      expect(normalizeUrl('http://router')).toBe('http://router');
    });

    it('should leave empty input empty', () => {
      expect(normalizeUrl('')).toBe('');
    });
  });

  describe('probe', () => {
    it('should report online after a successful HEAD without a GET', async () => {
      const http = new FakeHttp().on('http://plex.lan', { status: 200 });
      const result = await new LivenessProber(http.client).probe('plex.lan');

      expect(result.online).toBe(true);
      expect(http.requests).toHaveLength(1);
      expect(http.requests[0].options).toEqual({
        method: 'HEAD',
        timeoutMs: HEAD_TIMEOUT_MS,
        insecure: true,
      });
    });

    it('should fall back to GET when HEAD answers >= 400', async () => {
      const http = new FakeHttp().on('http://nas', (request) =>
        request.options.method === 'HEAD' ? { status: 405 } : { status: 200 }
      );
      const result = await new LivenessProber(http.client).probe('http://nas');

      expect(result.online).toBe(true);
      expect(http.requests.map((r) => r.options.method)).toEqual(['HEAD', 'GET']);
      expect(http.requests[1].options.timeoutMs).toBe(GET_TIMEOUT_MS);
    });

    it('should report offline when GET also answers >= 400', async () => {
      const http = new FakeHttp().on('http://nas', { status: 503 });
      const result = await new LivenessProber(http.client).probe('http://nas');

      expect(result.online).toBe(false);
    });

    it('should report offline with zero latency when both attempts fail', async () => {
      const http = new FakeHttp();
      const result = await new LivenessProber(http.client).probe('10.0.0.99');

      expect(result).toEqual({ online: false, latencyMs: 0 });
      expect(http.urls()).toEqual(['http://10.0.0.99', 'http://10.0.0.99']);
    });

    it('should not probe an empty url', async () => {
      const http = new FakeHttp();
      expect(await new LivenessProber(http.client).probe('')).toEqual({
        online: false,
        latencyMs: 0,
      });
      expect(http.requests).toHaveLength(0);
    });
  });
});
