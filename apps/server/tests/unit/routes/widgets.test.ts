import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import request from 'supertest';
import { DEFAULT_SETTINGS } from '@homelab/types';
import { resolveWeatherQuery } from '@/routes/widgets/routes/weather.js';
import { createTestApp, type TestApp } from '../../helpers/test-app.js';

const OPEN_METEO = 'https://api.open-meteo.com/v1/forecast';

const weatherPayload = {
  current: {
    temperature_2m: 72.5,
    apparent_temperature: 70.2,
    relative_humidity_2m: 55.6,
    weather_code: 2,
    wind_speed_10m: 8.9,
    wind_direction_10m: 200,
  },
};

describe('widget routes', () => {
  describe('resolveWeatherQuery', () => {
    const manual = { ...DEFAULT_SETTINGS.location, use_auto: false };

    it('should prefer request parameters', () => {
      expect(resolveWeatherQuery({ city: 'Oslo' }, { ...manual, city: 'Columbia' })).toEqual({
        city: 'Oslo',
      });
    });

    it('should leave the lookup automatic when use_auto is on', () => {
      expect(resolveWeatherQuery({}, { ...manual, use_auto: true, city: 'Columbia' })).toEqual(
        {}
      );
    });

    it('should fall back to the saved manual location', () => {
      expect(
        resolveWeatherQuery({}, { ...manual, city: 'Columbia', latitude: '34', longitude: '-81' })
      ).toEqual({ city: 'Columbia', lat: 34, lon: -81 });
    });

    it('should drop coordinates unless both parse', () => {
      expect(resolveWeatherQuery({}, { ...manual, latitude: '34', longitude: 'east' })).toEqual({});
    });
  });

  describe('HTTP', () => {
    let t: TestApp;

    beforeEach(async () => {
      t = await createTestApp();
    });

    afterEach(async () => {
      await t.cleanup();
    });

    it('should serve weather for query coordinates with the saved units', async () => {
      t.http.on(OPEN_METEO, { json: weatherPayload });

      const res = await request(t.app).get('/api/widgets/weather?lat=59.9&lon=10.75');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        success: true,
        data: {
          temp_c: 22,
          temp_f: 72,
          feels_like_c: 21,
          feels_like_f: 70,
          condition: 'Partly Cloudy',
          humidity: 55,
          wind_mph: 8,
          wind_dir: 'SSW',
          city: '59.90, 10.75',
          icon: 'fa-cloud-sun',
        },
        units: 'imperial',
      });
    });

    it('should use the saved manual location for the weather bar', async () => {
      t.http.on(OPEN_METEO, { json: weatherPayload });
      await t.settings.saveLocation({
        use_auto: false,
        city: 'Columbia',
        latitude: '34',
        longitude: '-81',
        units: 'metric',
      });

      const res = await request(t.app).get('/api/widgets/weather-bar');
      const url = new URL(t.http.urls()[0]);

      expect(res.body.data.city).toBe('Columbia');
      expect(res.body.units).toBe('metric');
      expect(url.searchParams.get('latitude')).toBe('34');
      expect(url.searchParams.get('longitude')).toBe('-81');
    });

    it('should return crypto prices', async () => {
      t.http.on('https://api.coingecko.com/api/v3/simple/price', {
        json: { bitcoin: { usd: 100, usd_24h_change: 1 } },
      });

      const res = await request(t.app).get('/api/widgets/crypto');

      expect(res.body).toEqual({
        success: true,
        data: [{ id: 'bitcoin', name: 'Bitcoin', price: 100, change_24h: 1 }],
      });
    });

    it('should answer 503 when a source has nothing to serve', async () => {
      const res = await request(t.app).get('/api/widgets/news');

      expect(res.status).toBe(503);
      expect(res.body).toEqual({ success: false, reason: 'unavailable' });
    });

    it('should fall back to the default subreddit for invalid names', async () => {
      const res = await request(t.app).get('/api/widgets/reddit?sub=../etc');

      expect(res.status).toBe(503);
      expect(res.body).toEqual({ success: false, reason: 'unavailable', subreddit: 'technology' });
    });

    it('should report a disabled integration without an error status', async () => {
      const res = await request(t.app).get('/api/widgets/pihole');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ success: false, reason: 'disabled' });
    });

    it('should report missing connection fields', async () => {
      await t.settings.updateIntegration('pihole', { enabled: true });

      const res = await request(t.app).get('/api/widgets/pihole');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ success: false, reason: 'not_configured', error: 'Missing url' });
    });

    it('should answer 502 for upstream failures', async () => {
      t.http.on('http://speed.lan/api/speedtest/latest', { status: 500 });
      await t.settings.updateIntegration('speedtest', { enabled: true, url: 'http://speed.lan' });

      const res = await request(t.app).get('/api/widgets/speedtest');

      expect(res.status).toBe(502);
      expect(res.body).toEqual({
        success: false,
        reason: 'upstream_error',
        error: 'HTTP 500 Error from http://speed.lan/api/speedtest/latest',
      });
    });

    it('should map /uptime-kuma to the uptime_kuma integration', async () => {
      t.http.on('http://kuma.lan/api/status-page/default', { json: {} });
      await t.settings.updateIntegration('uptime_kuma', { enabled: true, url: 'http://kuma.lan' });

      const res = await request(t.app).get('/api/widgets/uptime-kuma');

      expect(res.body).toEqual({
        success: true,
        data: {
          total_monitors: 0,
          up: 0,
          down: 0,
          paused: 0,
          health_percent: 0,
          monitors: [],
        },
      });
    });
  });
});
