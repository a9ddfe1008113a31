import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import request from 'supertest';
import { DEFAULT_SETTINGS } from '@homelab/types';
import { parseLocationForm } from '@/routes/settings/routes/location.js';
import { parseIntegrationForm } from '@/routes/settings/routes/integration.js';
import { createTestApp, type TestApp } from '../../helpers/test-app.js';

describe('settings routes', () => {
  let t: TestApp;

  beforeEach(async () => {
    t = await createTestApp();
  });

  afterEach(async () => {
    await t.cleanup();
  });

  it('should return the full settings document', async () => {
    const res = await request(t.app).get('/api/settings');

    expect(res.body).toEqual({ success: true, settings: DEFAULT_SETTINGS });
  });

  describe('POST /api/settings/theme', () => {
    it('should select a catalog theme', async () => {
      const res = await request(t.app).post('/api/settings/theme').send({ theme: 'nord' });

      expect(res.body).toEqual({ success: true, message: 'Theme set to nord' });
      expect(await t.settings.get('appearance.theme')).toBe('nord');
      expect(t.emitted).toEqual([
        { type: 'settings:changed', payload: { path: 'appearance.theme' } },
      ]);
    });

    it('should reject names outside the catalog', async () => {
      for (const theme of ['dark', 'toString', '']) {
        const res = await request(t.app).post('/api/settings/theme').send({ theme });

        expect(res.status).toBe(400);
        expect(res.body).toEqual({ success: false, error: 'Unknown theme' });
      }
      expect(await t.settings.get('appearance.theme')).toBe('dark');
    });
  });

  describe('location', () => {
    it('should normalise submitted form values', () => {
      expect(
        parseLocationForm({
          city: ' Oslo ',
          latitude: 59.9,
          longitude: '10.75',
          use_auto: 'False',
          units: 'kelvin',
          extra: 'ignored',
        })
      ).toEqual({ city: 'Oslo', latitude: '59.9', longitude: '10.75', use_auto: false });
    });

    it('should merge a save into the stored location', async () => {
      const res = await request(t.app)
        .post('/api/settings/location')
        .send({ city: 'Oslo', use_auto: false, units: 'metric' });

      const expected = {
        city: 'Oslo',
        latitude: '',
        longitude: '',
        timezone: '',
        use_auto: false,
        units: 'metric',
      };
      expect(res.body).toEqual({ success: true, location: expected });
      expect((await request(t.app).get('/api/settings/location')).body).toEqual({
        success: true,
        location: expected,
      });
    });
  });

  it('should toggle a widget', async () => {
    const res = await request(t.app).post('/api/settings/widget/crypto/toggle');

    expect(res.body).toEqual({ success: true, enabled: false });
    expect(t.emitted).toEqual([
      { type: 'settings:changed', payload: { path: 'widgets.crypto.enabled' } },
    ]);
  });

  it('should refuse a reserved widget name', async () => {
    const res = await request(t.app).post('/api/settings/widget/__proto__/toggle');

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ success: false, error: 'Invalid widget name' });
    expect(Object.hasOwn(Object.prototype, 'enabled')).toBe(false);
  });

  describe('integrations', () => {
    it('should take trimmed connection fields and a boolean enabled', () => {
      expect(
        parseIntegrationForm({ url: ' http://pi.hole ', api_key: 5, enabled: 'yes', slug: 'home' })
      ).toEqual({ url: 'http://pi.hole', slug: 'home' });
    });

    it('should toggle an integration', async () => {
      const res = await request(t.app).post('/api/settings/integration/pihole/toggle');

      expect(res.body).toEqual({ success: true, enabled: true });
      expect((await t.settings.getIntegrationConfig('pihole'))?.enabled).toBe(true);
    });

    it('should 404 for an unknown integration', async () => {
      const res = await request(t.app).post('/api/settings/integration/plex/toggle');

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ success: false, error: 'Unknown integration: plex' });
    });

    it('should save connection fields', async () => {
      const res = await request(t.app)
        .post('/api/settings/integration/pihole')
        .send({ url: ' http://pi.hole ', api_key: 'test-secret', enabled: true, bogus: 'x' });

      expect(res.body).toEqual({ success: true, message: 'Integration saved' });
      expect(await t.settings.getIntegrationConfig('pihole')).toEqual({
        enabled: true,
        url: 'http://pi.hole',
        api_key: 'test-secret',
      });
      expect(t.emitted).toEqual([
        { type: 'settings:changed', payload: { path: 'integrations.pihole' } },
      ]);
    });

    it('should test unsaved fields against the service', async () => {
      t.http.on('http://speed.lan/api/speedtest/latest', {
        json: { data: { download: 500, upload: 50, ping: 3 } },
      });

      const res = await request(t.app)
        .post('/api/settings/integration/speedtest/test')
        .send({ url: 'http://speed.lan' });

      expect(res.body).toEqual({
        success: true,
        message: 'Connection successful',
        data: {
          download_mbps: 500,
          upload_mbps: 50,
          ping_ms: 3,
          server: 'Unknown',
          isp: 'Unknown',
          tested_at: '',
        },
      });
    });

    it('should explain a failed test', async () => {
      const res = await request(t.app)
        .post('/api/settings/integration/portainer/test')
        .send({ url: 'http://portainer.lan' });

      expect(res.status).toBe(400);
      expect(res.body).toEqual({
        success: false,
        reason: 'not_configured',
        error: 'Missing api_key',
      });
    });
  });

  describe('generic settings', () => {
    it('should flip a boolean', async () => {
      const res = await request(t.app).post('/api/settings/appearance/animations_enabled/toggle');

      expect(res.body).toEqual({ success: true, value: false });
      expect(await t.settings.get('appearance.animations_enabled')).toBe(false);
    });

    it('should store any JSON value', async () => {
      const res = await request(t.app)
        .post('/api/settings/custom/columns')
        .send({ value: [3, 4] });

      expect(res.body).toEqual({ success: true });
      expect(await t.settings.get('custom.columns')).toEqual([3, 4]);
      expect(t.emitted).toEqual([
        { type: 'settings:changed', payload: { path: 'custom.columns' } },
      ]);
    });

    it('should refuse paths that reach the object prototype', async () => {
      const set = await request(t.app)
        .post('/api/settings/__proto__/polluted')
        .send({ value: 'yes' });
      const toggle = await request(t.app).post('/api/settings/__proto__/flag/toggle');
      const nested = await request(t.app)
        .post('/api/settings/custom/x.constructor')
        .send({ value: 1 });

      for (const res of [set, toggle, nested]) {
        expect(res.status).toBe(400);
        expect(res.body).toEqual({ success: false, error: 'Invalid setting path' });
      }
      expect(Object.hasOwn(Object.prototype, 'polluted')).toBe(false);
      expect(Object.hasOwn(Object.prototype, 'flag')).toBe(false);
      expect(t.emitted).toEqual([]);
    });

    it('should require a value', async () => {
      const res = await request(t.app).post('/api/settings/custom/columns').send({});

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ success: false, error: 'value is required' });
    });
  });
});
